// Export formats offered by Runalyze, in the order they are tried
export type ExportFormat = "fit" | "tcx";

export type ResolvedFormat = ExportFormat | "none";

export const PRIMARY_FORMAT: ExportFormat = "fit";
export const FALLBACK_FORMAT: ExportFormat = "tcx";

// One logged workout as found on a databrowser week page
export interface ActivityRecord {
  readonly id: string;             // numeric id, e.g. "135061340"
  readonly type: string;           // raw icon class token or "unknown"
  readonly typeEmoji: string;      // category symbol, "❓" when unclassified
  readonly date?: string;          // ISO date (YYYY-MM-DD) of the day row
  readonly distanceKm?: number;
  readonly weekStart: Date;        // Monday 00:00 UTC
  readonly weekEnd: Date;          // Sunday 00:00 UTC (weekStart + 6 days)
}

export interface ExportFile {
  data: Buffer;
  filename: string;                // from content-disposition
}

export interface DownloadResult {
  activityId: string;
  success: boolean;
  fileType: ResolvedFormat;
  filePath?: string;
  error?: Error;
  existed: boolean;                // file was already on disk, nothing fetched
}

export interface DownloadSummary {
  processed: number;
  errors: number;
  since: Date;
  until: Date;
  results: DownloadResult[];
  iterationError?: Error;          // week pagination stopped on a fetch failure
}

/**
 * Remote capabilities of the authenticated web client
 */
export interface RunalyzeApi {
  login(): Promise<void>;
  fetchWeek(weekStart: Date): Promise<string>;
  fetchExport(activityId: string, format: ExportFormat): Promise<ExportFile>;
  persistSession(): void;
}

/**
 * File operations used by the download engine; throwing on failure
 */
export interface FileSystem {
  exists(path: string): boolean;
  writeFile(path: string, data: Buffer, mode: number): void;
  mkdirAll(path: string, mode: number): void;
}
