import ActivityIterator from "./activityIterator";
import AuthService from "./authService";
import { expandHome } from "./config";
import { DateWindow, formatDate, validateAndParseDates } from "./dates";
import DownloadService from "./downloadService";
import { ReportedError, ValidationError } from "./errors";
import NodeFileSystem from "./fileSystem";
import { Logger, silentLogger } from "./logger";
import ConsolePresentation, { Presentation } from "./presentation";
import RunalyzeClient, { RunalyzeClientOptions } from "./shared/runalyzeClient";
import { DownloadResult, DownloadSummary, FileSystem, RunalyzeApi } from "./shared/types";

const SAVE_DIR_MODE = 0o755;

export interface DownloadOptions {
  username: string;
  password: string;
  cookiePath: string;
  saveDir: string;
  until?: string;
  since?: string;
}

export interface DownloadRunnerDeps {
  logger?: Logger;
  presentation?: Presentation;
  fs?: FileSystem;
  createClient?: (options: RunalyzeClientOptions) => RunalyzeApi;
  now?: () => Date;
  homeDir?: string;
  pacingDelayMs?: number;
}

/**
 * Runs one complete download: validate, authenticate, walk the weeks and
 * save every activity, then report.
 */
export class DownloadRunner {
  private logger: Logger;
  private presentation: Presentation;
  private fs: FileSystem;
  private createClient: (options: RunalyzeClientOptions) => RunalyzeApi;
  private now: () => Date;
  private homeDir?: string;
  private pacingDelayMs?: number;

  constructor(deps: DownloadRunnerDeps = {}) {
    this.logger = deps.logger ?? silentLogger;
    this.presentation = deps.presentation ?? new ConsolePresentation();
    this.fs = deps.fs ?? new NodeFileSystem();
    this.createClient = deps.createClient ?? ((options) => new RunalyzeClient(options));
    this.now = deps.now ?? (() => new Date());
    this.homeDir = deps.homeDir;
    this.pacingDelayMs = deps.pacingDelayMs;
  }

  async run(options: DownloadOptions): Promise<DownloadSummary> {
    const window = validateAndParseDates(options, this.now());

    if (!options.username || !options.password) {
      throw new ValidationError(
        "username and password must be provided via config file, environment variables, or command line flags"
      );
    }

    this.logger.info("starting download", { username: options.username });

    const client = this.authenticatedClient(options);
    await this.authenticate(client);

    const saveDir = this.prepareSaveDirectory(options.saveDir);

    const summary = await this.downloadActivities(client, window, saveDir);

    this.presentation.finalResults(summary);
    this.presentation.jsonResults(summary);

    this.logger.info("download completed", {
      processed: summary.processed,
      errors: summary.errors,
    });
    return summary;
  }

  private authenticatedClient(options: DownloadOptions): RunalyzeApi {
    try {
      return this.createClient({
        username: options.username,
        password: options.password,
        cookiePath: expandHome(options.cookiePath, this.homeDir),
        logger: this.logger.child("client"),
      });
    } catch (error) {
      this.presentation.error(error, "Failed to create Runalyze client");
      throw new ReportedError(error);
    }
  }

  private async authenticate(client: RunalyzeApi): Promise<void> {
    this.presentation.progress("Verifying login credentials...");
    const auth = new AuthService(client, this.logger.child("auth"), this.now);
    try {
      await auth.ensureAuthenticated();
    } catch (error) {
      this.presentation.error(error, "Failed to authenticate with Runalyze");
      throw new ReportedError(error);
    }
    this.presentation.status("Successfully authenticated with Runalyze");
  }

  private prepareSaveDirectory(saveDir: string): string {
    const expanded = expandHome(saveDir, this.homeDir);
    try {
      this.fs.mkdirAll(expanded, SAVE_DIR_MODE);
    } catch (error) {
      this.presentation.error(error, `Failed to create save directory: ${expanded}`);
      throw new ReportedError(error);
    }
    return expanded;
  }

  private async downloadActivities(
    client: RunalyzeApi,
    window: DateWindow,
    saveDir: string
  ): Promise<DownloadSummary> {
    const since = formatDate(window.since);
    const until = formatDate(window.until);
    this.logger.info("download configuration", { since, until, saveDir });
    this.presentation.status(`Downloading activities from ${since} to ${until}`);

    const iterator = new ActivityIterator(client, {
      until: window.until,
      since: window.since,
      logger: this.logger.child("iterator"),
    });
    const downloader = new DownloadService(client, this.fs, this.logger.child("download"), {
      ...(this.pacingDelayMs !== undefined ? { pacingDelayMs: this.pacingDelayMs } : {}),
    });

    const results: DownloadResult[] = [];
    let currentWeek: number | undefined;
    let errors = 0;

    for await (const activity of iterator) {
      if (activity.weekStart.getTime() !== currentWeek) {
        currentWeek = activity.weekStart.getTime();
        this.presentation.weekHeader(activity.weekStart, activity.weekEnd);
      }

      this.logger.debug("processing activity", { activityId: activity.id, type: activity.type });
      const result = await downloader.downloadActivity(activity, saveDir);
      results.push(result);
      this.presentation.activityResult(activity, result);

      if (!result.success) {
        errors++;
      }
    }

    const iterationError = iterator.error;
    return {
      processed: results.length,
      errors,
      since: window.since,
      until: window.until,
      results,
      ...(iterationError ? { iterationError } : {}),
    };
  }
}

export default DownloadRunner;
