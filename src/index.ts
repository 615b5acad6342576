import ActivityIterator from "./activityIterator";
import ActivityTypeDetector from "./activityTypes";
import AuthService from "./authService";
import DownloadRunner from "./downloadRunner";
import DownloadService from "./downloadService";
import NodeFileSystem from "./fileSystem";
import ConsoleLogger from "./logger";
import ConsolePresentation from "./presentation";
import RunalyzeClient from "./shared/runalyzeClient";
import SessionStore from "./shared/sessionStore";

export * from "./errors";
export * from "./dates";
export * from "./shared/types";
export { parseActivitiesFromHTML, findActivityIds, parseDistance } from "./activityParser";
export { UNKNOWN_EMOJI, DEFAULT_ACTIVITY_TYPES } from "./activityTypes";
export type { ActivityTypeTables, IconRule, KeywordCategory } from "./activityTypes";
export { loadConfig, loadEnvFile, expandHome } from "./config";
export type { AppConfig, CliFlags } from "./config";
export { silentLogger, parseLogLevel } from "./logger";
export type { Logger, LogLevel, LogFields } from "./logger";
export type { Presentation } from "./presentation";
export { resolveCookieDomain } from "./shared/sessionStore";
export type { CookieEntry } from "./shared/sessionStore";
export type { DownloadOptions } from "./downloadRunner";

export {
  ActivityIterator,
  ActivityTypeDetector,
  AuthService,
  ConsoleLogger,
  ConsolePresentation,
  DownloadRunner,
  DownloadService,
  NodeFileSystem,
  RunalyzeClient,
  SessionStore,
};
