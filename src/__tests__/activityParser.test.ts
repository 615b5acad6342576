import * as fs from "fs";
import * as path from "path";
import {
  dateFromNoteHref,
  findActivityIds,
  parseActivitiesFromHTML,
  parseDistance,
} from "../activityParser";
import { RecordingLogger } from "../mocks.setup";

const FIXTURES_DIR = path.join(__dirname, "fixtures");
const WEEK_START = new Date(Date.UTC(2024, 4, 27));

const row = (id: string, cells: string): string =>
  `<table><tbody><tr class="r training" id="training_${id}">${cells}</tr></tbody></table>`;

describe("parseDistance", () => {
  it("should parse a comma decimal separated by a non-breaking space", () => {
    expect(parseDistance("6,5\u00a0km")).toBe(6.5);
  });

  it("should parse a dot decimal and surrounding whitespace", () => {
    expect(parseDistance("  10.25 km ")).toBe(10.25);
  });

  it("should parse a value without space before the unit", () => {
    expect(parseDistance("3,0km")).toBe(3);
  });

  it("should not treat a speed as a distance", () => {
    expect(parseDistance("18,7 km/h")).toBeUndefined();
  });

  it("should require a decimal part", () => {
    expect(parseDistance("5 km")).toBeUndefined();
  });

  it("should return undefined for unrelated text", () => {
    expect(parseDistance("32:14")).toBeUndefined();
  });
});

describe("dateFromNoteHref", () => {
  it("should take the last path segment", () => {
    expect(dateFromNoteHref("https://runalyze.com/health/note/2024-05-27")).toBe("2024-05-27");
  });

  it("should ignore query strings", () => {
    expect(dateFromNoteHref("/health/note/2024-05-27?edit=1")).toBe("2024-05-27");
  });

  it("should reject segments that are not dates", () => {
    expect(dateFromNoteHref("/health/note/new")).toBeUndefined();
  });
});

describe("parseActivitiesFromHTML", () => {
  describe("golden fixture", () => {
    it("should match the expected records for the week of 2024-05-27", () => {
      const html = fs.readFileSync(path.join(FIXTURES_DIR, "2024.05.27-week.html"), "utf-8");
      const expected: unknown = JSON.parse(
        fs.readFileSync(path.join(FIXTURES_DIR, "2024.05.27-week.json"), "utf-8")
      );

      const activities = parseActivitiesFromHTML(html, WEEK_START);

      expect(JSON.parse(JSON.stringify(activities))).toEqual(expected);
    });
  });

  it("should keep document order", () => {
    const html =
      "<table><tbody>" +
      '<tr id="training_3"><td>a</td></tr>' +
      '<tr id="training_1"><td>b</td></tr>' +
      '<tr id="training_2"><td>c</td></tr>' +
      "</tbody></table>";

    const ids = parseActivitiesFromHTML(html, WEEK_START).map((activity) => activity.id);

    expect(ids).toEqual(["3", "1", "2"]);
  });

  it("should set weekEnd six days after weekStart", () => {
    const [activity] = parseActivitiesFromHTML(row("1", "<td></td>"), WEEK_START);

    expect(activity.weekStart).toEqual(WEEK_START);
    expect(activity.weekEnd).toEqual(new Date(Date.UTC(2024, 5, 2)));
  });

  it("should carry the date of a previous row forward", () => {
    const html =
      "<table><tbody>" +
      '<tr id="training_1"><td><a href="/health/note/2024-05-28">Tue</a></td></tr>' +
      '<tr id="training_2"><td>second</td></tr>' +
      "</tbody></table>";

    const activities = parseActivitiesFromHTML(html, WEEK_START);

    expect(activities.map((activity) => activity.date)).toEqual(["2024-05-28", "2024-05-28"]);
  });

  it("should omit the date when no row has a note link", () => {
    const [activity] = parseActivitiesFromHTML(row("1", "<td>x</td>"), WEEK_START);

    expect(activity).not.toHaveProperty("date");
    expect(activity).not.toHaveProperty("distanceKm");
  });

  it("should take the last cell with a distance", () => {
    const [activity] = parseActivitiesFromHTML(
      row("1", "<td>4,2 km</td><td>9,9 km</td><td>12,0 km/h</td>"),
      WEEK_START
    );

    expect(activity.distanceKm).toBe(9.9);
  });

  it("should use the first cell's icon before any other icon", () => {
    const [activity] = parseActivitiesFromHTML(
      row("1", '<td><i class="icon-swim"></i></td><td><i class="icon-running"></i></td>'),
      WEEK_START
    );

    expect(activity.type).toBe("icon-swim");
    expect(activity.typeEmoji).toBe("🏊");
  });

  it("should take the last icon of the first cell", () => {
    const [activity] = parseActivitiesFromHTML(
      row("1", '<td><i class="icon-swim"></i><i class="icon-running"></i></td>'),
      WEEK_START
    );

    expect(activity.type).toBe("icon-running");
  });

  it("should take the date of the last note link in a row", () => {
    const [activity] = parseActivitiesFromHTML(
      row(
        "1",
        '<td><a href="/health/note/2024-05-28">Tue</a></td><td><a href="/health/note/2024-05-29">Wed</a></td>'
      ),
      WEEK_START
    );

    expect(activity.date).toBe("2024-05-29");
  });

  it("should skip rows whose id is not numeric", () => {
    const logger = new RecordingLogger();
    const html =
      "<table><tbody>" +
      '<tr id="training_../../etc/evil"><td><i class="icon-running"></i></td></tr>' +
      '<tr id="training_42"><td><i class="icon-running"></i></td></tr>' +
      "</tbody></table>";

    const activities = parseActivitiesFromHTML(html, WEEK_START, logger);

    expect(activities.map((activity) => activity.id)).toEqual(["42"]);
    expect(logger.entries).toEqual([
      {
        level: "debug",
        message: "skipping row with non-numeric id",
        fields: { rowId: "training_../../etc/evil" },
      },
    ]);
  });

  it("should fall back to any icon in the row", () => {
    const [activity] = parseActivitiesFromHTML(
      row("1", '<td>Mon</td><td><i class="icon-running"></i></td>'),
      WEEK_START
    );

    expect(activity.type).toBe("icon-running");
    expect(activity.typeEmoji).toBe("🏃");
  });

  it("should classify rows without icons from their text", () => {
    const [activity] = parseActivitiesFromHTML(row("1", "<td>Pool swimming session</td>"), WEEK_START);

    expect(activity.type).toBe("unknown");
    expect(activity.typeEmoji).toBe("🏊");
  });

  it("should log unclassified rows at debug level", () => {
    const logger = new RecordingLogger();

    parseActivitiesFromHTML(row("77", "<td>Something else</td>"), WEEK_START, logger);

    expect(logger.entries).toEqual([
      {
        level: "debug",
        message: "unknown activity type found",
        fields: {
          activityId: "77",
          type: "unknown",
          rowHtmlSnippet: "<td>Something else</td>",
        },
      },
    ]);
  });

  it("should return an empty list for a week without activities", () => {
    expect(parseActivitiesFromHTML("<div>No activities</div>", WEEK_START)).toEqual([]);
  });
});

describe("findActivityIds", () => {
  it("should find every training row id in order", () => {
    const html = '<tr id="training_5"></tr><tr id="other_6"></tr><tr id="training_7">';

    expect(findActivityIds(html)).toEqual(["5", "7"]);
  });

  it("should return nothing for pages without rows", () => {
    expect(findActivityIds("<p>empty</p>")).toEqual([]);
  });
});
