import * as fs from "fs";
import * as path from "path";
import { Cookie, CookieJar } from "tough-cookie";
import { RunalyzeError, errorMessage } from "../errors";
import { Logger, silentLogger } from "../logger";

export const CANONICAL_DOMAIN = "runalyze.com";
export const CANONICAL_URL = `https://${CANONICAL_DOMAIN}/`;

// One cookie as stored in the session file
export interface CookieEntry {
  name: string;
  value: string;
  domain: string;
  path: string;
  expires: string | null;   // ISO timestamp, null for session cookies
  secure: boolean;
  httpOnly: boolean;
  hostOnly?: boolean;
  sameSite?: string;
}

/**
 * Runalyze hands out some cookies without a Domain attribute. Those belong to
 * the canonical site domain.
 */
export function resolveCookieDomain(domain: string | null | undefined): string {
  const trimmed = (domain ?? "").trim().replace(/^\./, "");
  return trimmed === "" ? CANONICAL_DOMAIN : trimmed;
}

function isCookieEntry(value: unknown): value is CookieEntry {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    "value" in value &&
    typeof value.value === "string"
  );
}

function toEntry(cookie: Cookie): CookieEntry {
  const entry: CookieEntry = {
    name: cookie.key,
    value: cookie.value,
    domain: cookie.domain ?? "",
    path: cookie.path ?? "/",
    expires: cookie.expires instanceof Date ? cookie.expires.toISOString() : null,
    secure: cookie.secure,
    httpOnly: cookie.httpOnly,
    hostOnly: cookie.hostOnly === true,
  };
  if (typeof cookie.sameSite === "string") {
    entry.sameSite = cookie.sameSite;
  }
  return entry;
}

function fromEntry(entry: CookieEntry): { cookie: Cookie; url: string } {
  const domain = resolveCookieDomain(entry.domain);
  const cookie = new Cookie({
    key: entry.name,
    value: entry.value,
    path: entry.path || "/",
    secure: entry.secure === true,
    httpOnly: entry.httpOnly === true,
  });
  if (entry.expires) {
    cookie.expires = new Date(entry.expires);
  }
  if (entry.sameSite) {
    cookie.sameSite = entry.sameSite;
  }
  // host-only and domain-less cookies are pinned to the host of the url below
  if (entry.domain && !entry.hostOnly) {
    cookie.domain = domain;
  }
  return { cookie, url: `https://${domain}/` };
}

/**
 * Cookie jar persisted to a JSON file.
 *
 * Every mutation is written straight back to disk. Jar and file access are
 * synchronous, so load, save and set never interleave within one process.
 * Separate processes sharing the file are not coordinated (last write wins).
 */
export class SessionStore {
  readonly filePath: string;
  private jar: CookieJar;
  private logger: Logger;

  constructor(filePath: string, logger: Logger = silentLogger) {
    this.filePath = filePath;
    this.logger = logger;
    this.jar = new CookieJar();
    this.load();
  }

  /**
   * Replace the in-memory jar with the file contents. A missing file leaves the jar empty.
   */
  load(): void {
    this.logger.debug("loading cookies", { path: this.filePath });
    this.jar = new CookieJar();

    if (!fs.existsSync(this.filePath)) {
      this.logger.debug("cookie file does not exist", { path: this.filePath });
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.filePath, "utf-8"));
    } catch (error) {
      throw new RunalyzeError(
        `failed to read cookies from ${this.filePath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
    if (!Array.isArray(parsed)) {
      throw new RunalyzeError(`cookie file ${this.filePath} is not a JSON array`);
    }

    let loaded = 0;
    for (const item of parsed) {
      if (!isCookieEntry(item)) {
        this.logger.warn("skipping malformed cookie entry", { path: this.filePath });
        continue;
      }
      const { cookie, url } = fromEntry(item);
      try {
        this.jar.setCookieSync(cookie, url);
        loaded++;
      } catch (error) {
        this.logger.warn("skipping cookie that does not fit its domain", {
          name: item.name,
          domain: item.domain,
          error: errorMessage(error),
        });
      }
    }

    this.logger.debug("loaded cookie entries", { count: loaded });
    if (this.logger.isLevelEnabled("trace")) {
      for (const entry of this.entries()) {
        this.logger.trace("cookie", { name: entry.name, value: entry.value, domain: entry.domain });
      }
    }
  }

  /**
   * Write every cookie held for the site to disk, readable by the owner only
   */
  save(): void {
    const entries = this.entries();
    this.logger.trace("saving cookies", { path: this.filePath, count: entries.length });

    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, JSON.stringify(entries, null, 2), { mode: 0o600 });
    fs.chmodSync(this.filePath, 0o600);
  }

  /**
   * Store one Set-Cookie header value received from `url` and persist the jar.
   * Persistence failures are reported but the cookie stays usable in memory.
   */
  setCookie(header: string, url: string): void {
    try {
      this.jar.setCookieSync(header, url);
    } catch (error) {
      this.logger.debug("ignoring unparsable cookie", { url, error: errorMessage(error) });
      return;
    }

    try {
      this.save();
    } catch (error) {
      this.logger.warn("failed to save cookies", { path: this.filePath, error: errorMessage(error) });
    }
  }

  getCookieString(url: string): string {
    return this.jar.getCookieStringSync(url);
  }

  /**
   * Serializable view of the cookies held for the site, across all paths
   */
  entries(): CookieEntry[] {
    return this.jar.getCookiesSync(CANONICAL_URL, { allPaths: true }).map(toEntry);
  }
}

export default SessionStore;
