import { formatDate } from "./dates";
import { errorMessage } from "./errors";
import { ActivityRecord, DownloadResult, DownloadSummary } from "./shared/types";

export type ActivityState = "exists" | "downloaded" | "not available" | "error";

/**
 * User-facing output of a download run
 */
export interface Presentation {
  progress(message: string): void;
  status(message: string): void;
  error(error: unknown, message: string): void;
  weekHeader(weekStart: Date, weekEnd: Date): void;
  activityResult(activity: ActivityRecord, result: DownloadResult): void;
  finalResults(summary: DownloadSummary): void;
  jsonResults(summary: DownloadSummary): void;
}

export type OutputWriter = (line: string) => void;

const STATE_LABELS: Record<ActivityState, string> = {
  exists: "✅ Already downloaded",
  downloaded: "✅ Downloaded",
  "not available": "❌ Not available",
  error: "❌ Error",
};

export function activityState(result: DownloadResult): ActivityState {
  if (result.existed) return "exists";
  if (result.success) return "downloaded";
  return result.fileType === "none" ? "not available" : "error";
}

/**
 * "🏃 123 FIT ✅ Downloaded", with the skipped FIT attempt shown before a TCX result
 */
export function formatActivityLine(activity: ActivityRecord, result: DownloadResult): string {
  const state = activityState(result);
  const parts = [activity.typeEmoji, activity.id];

  if (result.fileType === "none") {
    parts.push("FIT/TCX (not available)");
  } else {
    if (result.fileType === "tcx" && !result.existed) {
      parts.push("FIT (not available)");
    }
    parts.push(result.fileType.toUpperCase());
  }

  parts.push(STATE_LABELS[state]);
  return parts.join(" ");
}

/**
 * The machine-readable summary printed at the end of a JSON mode run
 */
export function summaryToJSON(summary: DownloadSummary): Record<string, unknown> {
  return {
    summary: {
      processed: summary.processed,
      errors: summary.errors,
    },
    date_range: {
      since: formatDate(summary.since),
      until: formatDate(summary.until),
    },
    results: summary.results.map((result) => ({
      activity_id: result.activityId,
      success: result.success,
      file_type: result.fileType,
      existed: result.existed,
      ...(result.filePath ? { file_path: result.filePath } : {}),
      ...(result.error ? { error: result.error.message } : {}),
    })),
    ...(summary.iterationError ? { iteration_error: summary.iterationError.message } : {}),
  };
}

/**
 * Console output. Interactive mode prints emoji lines; JSON mode prints one
 * JSON object per event and the summary object at the end.
 */
export class ConsolePresentation implements Presentation {
  private jsonMode: boolean;
  private out: OutputWriter;
  private err: OutputWriter;

  constructor(
    jsonMode: boolean = false,
    out: OutputWriter = (line) => console.log(line),
    err: OutputWriter = (line) => console.error(line)
  ) {
    this.jsonMode = jsonMode;
    this.out = out;
    this.err = err;
  }

  progress(message: string): void {
    if (this.jsonMode) {
      this.event("progress", { message });
      return;
    }
    this.out(`⏳ ${message}`);
  }

  status(message: string): void {
    if (this.jsonMode) {
      this.event("status", { message });
      return;
    }
    this.out(`✅ ${message}`);
  }

  error(error: unknown, message: string): void {
    if (this.jsonMode) {
      this.event("error", { message, error: errorMessage(error) });
      return;
    }
    this.err(`❌ ${message}: ${errorMessage(error)}`);
  }

  weekHeader(weekStart: Date, weekEnd: Date): void {
    if (this.jsonMode) {
      this.event("week_start", {
        start_date: formatDate(weekStart),
        end_date: formatDate(weekEnd),
      });
      return;
    }
    this.out("");
    this.out(`📅 Week from ${formatDate(weekStart)} to ${formatDate(weekEnd)}`);
  }

  activityResult(activity: ActivityRecord, result: DownloadResult): void {
    if (this.jsonMode) {
      this.event("activity_status", {
        activity_id: activity.id,
        file_type: result.fileType,
        state: activityState(result),
      });
      return;
    }
    this.out(formatActivityLine(activity, result));
  }

  finalResults(summary: DownloadSummary): void {
    if (this.jsonMode) return;
    this.out("");
    this.out(`🎉 Download complete: ${summary.processed} processed, ${summary.errors} errors`);
    if (summary.iterationError) {
      this.err(`⚠️  Stopped early: ${summary.iterationError.message}`);
    }
  }

  jsonResults(summary: DownloadSummary): void {
    if (!this.jsonMode) return;
    this.out(JSON.stringify(summaryToJSON(summary)));
  }

  private event(name: string, fields: Record<string, unknown>): void {
    this.out(JSON.stringify({ event: name, ...fields }));
  }
}

export default ConsolePresentation;
