import { AxiosHeaders, AxiosResponse, InternalAxiosRequestConfig } from "axios";
import { addDays } from "./dates";
import { LogFields, LogLevel, Logger } from "./logger";
import { Presentation } from "./presentation";
import {
  ActivityRecord,
  DownloadResult,
  DownloadSummary,
  ExportFile,
  ExportFormat,
  FileSystem,
  RunalyzeApi,
} from "./shared/types";

/**
 * RunalyzeApi double: every method is a jest.fn that succeeds with empty data
 */
export const createMockApi = (): jest.Mocked<RunalyzeApi> => ({
  login: jest.fn<Promise<void>, []>().mockResolvedValue(undefined),
  fetchWeek: jest.fn<Promise<string>, [Date]>().mockResolvedValue(""),
  fetchExport: jest
    .fn<Promise<ExportFile>, [string, ExportFormat]>()
    .mockResolvedValue({ data: Buffer.from(""), filename: "export" }),
  persistSession: jest.fn<void, []>(),
});

/**
 * In-memory FileSystem; set `failWrites` or `failMkdir` to simulate disk errors
 */
export class MemoryFileSystem implements FileSystem {
  files = new Map<string, { data: Buffer; mode: number }>();
  directories = new Map<string, number>();
  failWrites = false;
  failMkdir = false;

  exists(path: string): boolean {
    return this.files.has(path);
  }

  writeFile(path: string, data: Buffer, mode: number): void {
    if (this.failWrites) {
      throw new Error(`EACCES: permission denied, open '${path}'`);
    }
    this.files.set(path, { data, mode });
  }

  mkdirAll(path: string, mode: number): void {
    if (this.failMkdir) {
      throw new Error(`EACCES: permission denied, mkdir '${path}'`);
    }
    this.directories.set(path, mode);
  }
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  fields?: LogFields;
}

/**
 * Logger that keeps every entry, children included, in one shared list
 */
export class RecordingLogger implements Logger {
  readonly entries: LogEntry[];
  private level: LogLevel;

  constructor(level: LogLevel = "trace", entries: LogEntry[] = []) {
    this.level = level;
    this.entries = entries;
  }

  trace(message: string, fields?: LogFields): void {
    this.record("trace", message, fields);
  }

  debug(message: string, fields?: LogFields): void {
    this.record("debug", message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.record("info", message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.record("warn", message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.record("error", message, fields);
  }

  isLevelEnabled(level: LogLevel): boolean {
    const order: LogLevel[] = ["trace", "debug", "info", "warn", "error"];
    return order.indexOf(level) >= order.indexOf(this.level);
  }

  child(): Logger {
    return new RecordingLogger(this.level, this.entries);
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }

  private record(level: LogLevel, message: string, fields?: LogFields): void {
    if (this.isLevelEnabled(level)) {
      this.entries.push({ level, message, ...(fields ? { fields } : {}) });
    }
  }
}

export type PresentationCall =
  | { kind: "progress"; message: string }
  | { kind: "status"; message: string }
  | { kind: "error"; message: string; error: unknown }
  | { kind: "weekHeader"; weekStart: Date; weekEnd: Date }
  | { kind: "activityResult"; activity: ActivityRecord; result: DownloadResult }
  | { kind: "finalResults"; summary: DownloadSummary }
  | { kind: "jsonResults"; summary: DownloadSummary };

/**
 * Presentation that records the calls it receives, in order
 */
export class RecordingPresentation implements Presentation {
  readonly calls: PresentationCall[] = [];

  progress(message: string): void {
    this.calls.push({ kind: "progress", message });
  }

  status(message: string): void {
    this.calls.push({ kind: "status", message });
  }

  error(error: unknown, message: string): void {
    this.calls.push({ kind: "error", message, error });
  }

  weekHeader(weekStart: Date, weekEnd: Date): void {
    this.calls.push({ kind: "weekHeader", weekStart, weekEnd });
  }

  activityResult(activity: ActivityRecord, result: DownloadResult): void {
    this.calls.push({ kind: "activityResult", activity, result });
  }

  finalResults(summary: DownloadSummary): void {
    this.calls.push({ kind: "finalResults", summary });
  }

  jsonResults(summary: DownloadSummary): void {
    this.calls.push({ kind: "jsonResults", summary });
  }

  kinds(): PresentationCall["kind"][] {
    return this.calls.map((call) => call.kind);
  }
}

export interface FakeResponse {
  status: number;
  headers?: Record<string, string | string[]>;
  data?: unknown;
}

/**
 * Axios adapter answering from `route` instead of the network
 */
export const createFakeAdapter = (route: (config: InternalAxiosRequestConfig) => FakeResponse) =>
  jest.fn(async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const answer = route(config);
    const headers = new AxiosHeaders();
    for (const [name, value] of Object.entries(answer.headers ?? {})) {
      headers.set(name, value);
    }
    return {
      data: answer.data ?? "",
      status: answer.status,
      statusText: String(answer.status),
      headers,
      config,
    };
  });

/**
 * Activity in the week starting Monday 2024-05-27
 */
export const makeActivity = (overrides: Partial<ActivityRecord> = {}): ActivityRecord => {
  const weekStart = overrides.weekStart ?? new Date(Date.UTC(2024, 4, 27));
  return {
    id: "135061340",
    type: "icon-sports-running",
    typeEmoji: "🏃",
    weekEnd: addDays(weekStart, 6),
    ...overrides,
    weekStart,
  };
};
