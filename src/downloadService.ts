import * as path from "path";
import { setTimeout as delay } from "timers/promises";
import { NoExportAvailableError, NotFoundError, errorMessage, toError } from "./errors";
import { Logger, silentLogger } from "./logger";
import {
  ActivityRecord,
  DownloadResult,
  ExportFormat,
  FALLBACK_FORMAT,
  FileSystem,
  PRIMARY_FORMAT,
  RunalyzeApi,
} from "./shared/types";

const FILE_MODE = 0o644;
const DEFAULT_PACING_DELAY_MS = 300;

export interface DownloadServiceOptions {
  pacingDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

type Attempt =
  | { kind: "saved"; filePath: string }
  | { kind: "missing" }
  | { kind: "failed"; error: Error };

/**
 * Downloads the export file of one activity into a directory.
 *
 * FIT is preferred; TCX is only tried when the FIT export does not exist.
 * An activity with either file already on disk is skipped without any request.
 */
export class DownloadService {
  private client: Pick<RunalyzeApi, "fetchExport">;
  private fs: FileSystem;
  private logger: Logger;
  private pacingDelayMs: number;
  private sleep: (ms: number) => Promise<void>;

  constructor(
    client: Pick<RunalyzeApi, "fetchExport">,
    fs: FileSystem,
    logger: Logger = silentLogger,
    options: DownloadServiceOptions = {}
  ) {
    this.client = client;
    this.fs = fs;
    this.logger = logger;
    this.pacingDelayMs = options.pacingDelayMs ?? DEFAULT_PACING_DELAY_MS;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  /**
   * Download one activity. Never rejects: failures are reported in the result.
   */
  async downloadActivity(activity: ActivityRecord, saveDir: string): Promise<DownloadResult> {
    const existing = this.findExisting(activity.id, saveDir);
    if (existing) {
      this.logger.debug("file already exists", { activityId: activity.id, path: existing.filePath });
      return {
        activityId: activity.id,
        success: true,
        fileType: existing.format,
        filePath: existing.filePath,
        existed: true,
      };
    }

    const result = await this.fetchWithFallback(activity.id, saveDir);
    if (this.pacingDelayMs > 0) {
      await this.sleep(this.pacingDelayMs);
    }
    return result;
  }

  private findExisting(
    activityId: string,
    saveDir: string
  ): { format: ExportFormat; filePath: string } | undefined {
    for (const format of [PRIMARY_FORMAT, FALLBACK_FORMAT]) {
      const filePath = this.filePathFor(activityId, format, saveDir);
      if (this.fs.exists(filePath)) {
        return { format, filePath };
      }
    }
    return undefined;
  }

  private async fetchWithFallback(activityId: string, saveDir: string): Promise<DownloadResult> {
    const primary = await this.attempt(activityId, PRIMARY_FORMAT, saveDir);
    if (primary.kind !== "missing") {
      return this.toResult(activityId, PRIMARY_FORMAT, primary);
    }

    this.logger.debug("FIT not available, trying TCX", { activityId });
    const fallback = await this.attempt(activityId, FALLBACK_FORMAT, saveDir);
    if (fallback.kind !== "missing") {
      return this.toResult(activityId, FALLBACK_FORMAT, fallback);
    }

    this.logger.warn("no export available", { activityId });
    return {
      activityId,
      success: false,
      fileType: "none",
      error: new NoExportAvailableError(activityId),
      existed: false,
    };
  }

  private async attempt(activityId: string, format: ExportFormat, saveDir: string): Promise<Attempt> {
    let data: Buffer;
    try {
      ({ data } = await this.client.fetchExport(activityId, format));
    } catch (error) {
      if (error instanceof NotFoundError) {
        return { kind: "missing" };
      }
      this.logger.error(`failed to download ${format.toUpperCase()} file`, {
        activityId,
        error: errorMessage(error),
      });
      return { kind: "failed", error: toError(error) };
    }

    const filePath = this.filePathFor(activityId, format, saveDir);
    try {
      this.fs.writeFile(filePath, data, FILE_MODE);
    } catch (error) {
      this.logger.error(`failed to save ${format.toUpperCase()} file`, {
        activityId,
        path: filePath,
        error: errorMessage(error),
      });
      return { kind: "failed", error: toError(error) };
    }

    this.logger.debug("saved export", { activityId, path: filePath, bytes: data.length });
    return { kind: "saved", filePath };
  }

  private toResult(activityId: string, format: ExportFormat, attempt: Attempt): DownloadResult {
    if (attempt.kind === "saved") {
      return {
        activityId,
        success: true,
        fileType: format,
        filePath: attempt.filePath,
        existed: false,
      };
    }
    return {
      activityId,
      success: false,
      fileType: format,
      ...(attempt.kind === "failed" ? { error: attempt.error } : {}),
      existed: false,
    };
  }

  private filePathFor(activityId: string, format: ExportFormat, saveDir: string): string {
    return path.join(saveDir, `${activityId}.${format}`);
  }
}

export default DownloadService;
