import { findActivityIds, parseActivitiesFromHTML } from "./activityParser";
import { UNKNOWN_EMOJI } from "./activityTypes";
import { addDays, formatDate } from "./dates";
import { errorMessage, toError } from "./errors";
import { Logger, silentLogger } from "./logger";
import { ActivityRecord, RunalyzeApi } from "./shared/types";

export type ActivityExtractor = (
  html: string,
  weekStart: Date,
  logger: Logger
) => ActivityRecord[];

export interface ActivityIteratorOptions {
  until: Date;                      // Monday of the first (most recent) week fetched
  since?: Date;                     // stop once the week anchor drops below this
  logger?: Logger;
  extract?: ActivityExtractor;
}

// Without a since bound, give up after this many empty weeks in a row
const MAX_EMPTY_WEEKS_WITHOUT_SINCE = 52;

/**
 * Walks the databrowser backwards one week at a time and yields every
 * activity found, in page order.
 *
 * Weeks without activities are skipped. A failed week fetch ends the
 * iteration; the cause is logged and kept in `error` rather than thrown.
 *
 * @example
 * for await (const activity of new ActivityIterator(client, { until, since })) {
 *   console.log(activity.id);
 * }
 */
export class ActivityIterator implements AsyncIterableIterator<ActivityRecord> {
  private client: Pick<RunalyzeApi, "fetchWeek">;
  private untilDate: Date;
  private sinceDate?: Date;
  private logger: Logger;
  private extract: ActivityExtractor;
  private done: boolean = false;
  private activities: ActivityRecord[] = [];
  private activityIndex: number = 0;
  private emptyWeeks: number = 0;
  private failure?: Error;

  constructor(client: Pick<RunalyzeApi, "fetchWeek">, options: ActivityIteratorOptions) {
    this.client = client;
    this.untilDate = options.until;
    this.sinceDate = options.since;
    this.logger = options.logger ?? silentLogger;
    this.extract = options.extract ?? parseActivitiesFromHTML;
  }

  /**
   * Why the iteration stopped early, if a week fetch failed
   */
  get error(): Error | undefined {
    return this.failure;
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<ActivityRecord> {
    return this;
  }

  async next(): Promise<IteratorResult<ActivityRecord>> {
    while (!this.done && this.activityIndex >= this.activities.length) {
      await this.fetchActivitiesForWeek();
    }

    if (this.done) {
      return { done: true, value: undefined };
    }

    const activity = this.activities[this.activityIndex];
    this.activityIndex++;
    return { done: false, value: activity };
  }

  private async fetchActivitiesForWeek(): Promise<void> {
    if (this.sinceDate && this.untilDate.getTime() < this.sinceDate.getTime()) {
      this.done = true;
      return;
    }
    if (!this.sinceDate && this.emptyWeeks >= MAX_EMPTY_WEEKS_WITHOUT_SINCE) {
      this.logger.debug("no activities for a year of weeks, stopping", {
        week: formatDate(this.untilDate),
      });
      this.done = true;
      return;
    }

    const weekStart = this.untilDate;
    let html: string;
    try {
      html = await this.client.fetchWeek(weekStart);
    } catch (error) {
      this.failure = toError(error);
      this.done = true;
      this.logger.warn("stopping: failed to fetch week", {
        week: formatDate(weekStart),
        error: errorMessage(error),
      });
      return;
    }

    this.activities = this.extractActivities(html, weekStart);
    this.activityIndex = 0;
    this.emptyWeeks = this.activities.length === 0 ? this.emptyWeeks + 1 : 0;
    this.untilDate = addDays(weekStart, -7);

    this.logger.debug("fetched week", {
      week: formatDate(weekStart),
      activities: this.activities.length,
    });
  }

  private extractActivities(html: string, weekStart: Date): ActivityRecord[] {
    try {
      return this.extract(html, weekStart, this.logger);
    } catch (error) {
      this.logger.debug("falling back to id scan", {
        week: formatDate(weekStart),
        error: errorMessage(error),
      });
      const weekEnd = addDays(weekStart, 6);
      return findActivityIds(html).map((id) => ({
        id,
        type: "unknown",
        typeEmoji: UNKNOWN_EMOJI,
        weekStart,
        weekEnd,
      }));
    }
  }
}

export default ActivityIterator;
