import * as cheerio from "cheerio";
import ActivityTypeDetector, { UNKNOWN_EMOJI } from "./activityTypes";
import { addDays } from "./dates";
import { ParseError, errorMessage } from "./errors";
import { Logger, silentLogger } from "./logger";
import { ActivityRecord } from "./shared/types";

const ROW_ID_PREFIX = "training_";
const ACTIVITY_ID_PATTERN = /^\d+$/;
const HEALTH_NOTE_PATH = "/health/note/";
const SNIPPET_LENGTH = 200;

// "6,5 km" but never "18,7 km/h": the unit has to end the cell
const DISTANCE_PATTERN = /(\d+)[,.](\d+)\s*km$/;

type CheerioRoot = ReturnType<typeof cheerio.load>;

const defaultDetector = new ActivityTypeDetector();

/**
 * Distance in kilometers from one table cell, e.g. "6,5&nbsp;km" -> 6.5
 */
export function parseDistance(text: string): number | undefined {
  const normalized = text.replace(/\u00a0/g, " ").trim();
  const match = DISTANCE_PATTERN.exec(normalized);
  if (!match) return undefined;
  return parseFloat(`${match[1]}.${match[2]}`);
}

/**
 * Date segment of a health note link such as https://runalyze.com/health/note/2024-05-27
 */
export function dateFromNoteHref(href: string): string | undefined {
  const pathname = href.split(/[?#]/)[0];
  const segment = pathname.substring(pathname.lastIndexOf("/") + 1);
  return /^\d{4}-\d{2}-\d{2}$/.test(segment) ? segment : undefined;
}

function truncate(text: string, maxLength: number): string {
  return text.length <= maxLength ? text : `${text.substring(0, maxLength)}...`;
}

/**
 * Extract the activities listed on one databrowser week page, in page order.
 *
 * The page groups rows by day and only the first row of a day carries the
 * health note link, so later rows inherit the last date seen.
 */
export function parseActivitiesFromHTML(
  html: string,
  weekStart: Date,
  logger: Logger = silentLogger,
  detector: ActivityTypeDetector = defaultDetector
): ActivityRecord[] {
  let $: CheerioRoot;
  try {
    $ = cheerio.load(html);
  } catch (error) {
    throw new ParseError(`failed to parse week page: ${errorMessage(error)}`, { cause: error });
  }

  const weekEnd = addDays(weekStart, 6);
  const activities: ActivityRecord[] = [];
  let currentDate: string | undefined;

  $(`tr[id^='${ROW_ID_PREFIX}']`).each((_, element) => {
    const row = $(element);
    const rowId = row.attr("id");
    if (!rowId) return;

    const id = rowId.substring(ROW_ID_PREFIX.length);
    if (!ACTIVITY_ID_PATTERN.test(id)) {
      logger.debug("skipping row with non-numeric id", { rowId });
      return;
    }
    const rowHTML = row.html() ?? "";

    const noteHref = row.find(`a[href*='${HEALTH_NOTE_PATH}']`).last().attr("href");
    const noteDate = noteHref ? dateFromNoteHref(noteHref) : undefined;
    if (noteDate) {
      currentDate = noteDate;
    }

    // later cells win
    let distanceKm: number | undefined;
    for (const cell of row.find("td").toArray()) {
      distanceKm = parseDistance($(cell).text()) ?? distanceKm;
    }

    const iconClass =
      row.find("td").first().find("i[class]").last().attr("class") ??
      row.find("i[class*='icon']").last().attr("class");
    const type = iconClass?.trim() || "unknown";

    const typeEmoji = detector.detect(type, rowHTML);
    if (typeEmoji === UNKNOWN_EMOJI) {
      logger.debug("unknown activity type found", {
        activityId: id,
        type,
        rowHtmlSnippet: truncate(rowHTML, SNIPPET_LENGTH),
      });
    }

    activities.push({
      id,
      type,
      typeEmoji,
      ...(currentDate ? { date: currentDate } : {}),
      ...(distanceKm !== undefined ? { distanceKm } : {}),
      weekStart,
      weekEnd,
    });
  });

  return activities;
}

/**
 * Plain regex scan for activity ids, used when the page cannot be parsed
 */
export function findActivityIds(html: string): string[] {
  return Array.from(html.matchAll(/id="training_(\d+)"/g), (match) => match[1]);
}
