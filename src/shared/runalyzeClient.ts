import axios, {
  AxiosAdapter,
  AxiosInstance,
  AxiosResponse,
  InternalAxiosRequestConfig,
} from "axios";
import { endOfWeek, toEpochSeconds } from "../dates";
import {
  FilenameMissingError,
  LoginFailedError,
  NotFoundError,
  RedirectedToLoginError,
  TokenNotFoundError,
  UnexpectedStatusError,
} from "../errors";
import { Logger, silentLogger } from "../logger";
import SessionStore from "./sessionStore";
import { ExportFile, ExportFormat, RunalyzeApi } from "./types";

export const RUNALYZE_BASE_URL = "https://runalyze.com";

const LOGIN_URL = `${RUNALYZE_BASE_URL}/login`;

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

const BODY_PREVIEW_LENGTH = 512;

// Sent with every request; the site rejects clients that do not look like a browser
const COMMON_HEADERS: Record<string, string> = {
  "user-agent":
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/137.0.0.0 Safari/537.36",
  accept:
    "text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8,application/signed-exchange;v=b3;q=0.7",
  "accept-language": "en-GB,en;q=0.9,en-US;q=0.8",
  "sec-ch-ua": '"Google Chrome";v="137", "Chromium";v="137", "Not/A)Brand";v="24"',
  "sec-ch-ua-mobile": "?0",
  "sec-ch-ua-platform": '"macOS"',
  "sec-fetch-dest": "document",
  "sec-fetch-mode": "navigate",
  "sec-fetch-site": "same-origin",
  "sec-fetch-user": "?1",
  "upgrade-insecure-requests": "1",
};

export interface RunalyzeClientOptions {
  username: string;
  password: string;
  cookiePath: string;
  logger?: Logger;
  adapter?: AxiosAdapter; // replaces the HTTP transport, used by tests
}

function headerValues(response: AxiosResponse, name: string): string[] {
  const value: unknown = response.headers[name];
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === "string");
  }
  return typeof value === "string" ? [value] : [];
}

function headerValue(response: AxiosResponse, name: string): string | undefined {
  return headerValues(response, name)[0];
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (typeof data === "string") return Buffer.from(data);
  return Buffer.alloc(0);
}

function bodyPreview(data: unknown): string {
  if (typeof data === "string") return data.substring(0, BODY_PREVIEW_LENGTH);
  if (data instanceof URLSearchParams) return data.toString();
  if (Buffer.isBuffer(data) || data instanceof ArrayBuffer) {
    return `<${data.byteLength} bytes>`;
  }
  return "";
}

function redactPassword(body: string): string {
  return body.replace(/(_password=)[^&]*/, "$1***");
}

/**
 * Authenticated client for the Runalyze web interface.
 *
 * Redirects are never followed: every 3xx reaches the caller, which is how an
 * expired session (redirect to /login) is detected.
 */
export class RunalyzeClient implements RunalyzeApi {
  private username: string;
  private password: string;
  private client: AxiosInstance;
  private session: SessionStore;
  private logger: Logger;

  constructor(options: RunalyzeClientOptions) {
    this.username = options.username;
    this.password = options.password;
    this.logger = options.logger ?? silentLogger;
    this.session = new SessionStore(options.cookiePath, this.logger.child("cookies"));

    this.client = axios.create({
      headers: COMMON_HEADERS,
      maxRedirects: 0,
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });

    // Attach the session cookies and log every outgoing request
    this.client.interceptors.request.use((config) => {
      const url = config.url;
      if (url) {
        const cookieString = this.session.getCookieString(url);
        if (cookieString) {
          config.headers.Cookie = cookieString;
        }
      }
      this.logRequest(config);
      return config;
    });

    // Capture Set-Cookie headers into the persistent jar
    this.client.interceptors.response.use((response) => {
      const url = response.config.url;
      if (url) {
        for (const cookie of headerValues(response, "set-cookie")) {
          this.session.setCookie(cookie, url);
        }
      }
      this.logResponse(response);
      return response;
    });
  }

  /**
   * Get the cookie jar backing this client
   */
  getSession(): SessionStore {
    return this.session;
  }

  private logRequest(config: InternalAxiosRequestConfig): void {
    this.logger.debug("request", {
      method: (config.method ?? "get").toUpperCase(),
      url: config.url,
    });
    if (!this.logger.isLevelEnabled("trace")) return;

    this.logger.trace("request headers", { headers: config.headers.toJSON(true) });
    const body = bodyPreview(config.data);
    if (body) {
      this.logger.trace("request body", { body: redactPassword(body) });
    }
  }

  private logResponse(response: AxiosResponse): void {
    this.logger.debug("response", { status: response.status, url: response.config.url });
    if (!this.logger.isLevelEnabled("trace")) return;

    this.logger.trace("response headers", { headers: response.headers });
    const body = bodyPreview(response.data);
    if (body) {
      this.logger.trace("response body preview", { body });
    }
  }

  private isLoginRedirect(response: AxiosResponse): boolean {
    if (!REDIRECT_STATUSES.has(response.status)) return false;
    const location = headerValue(response, "location");
    if (!location) return false;
    try {
      return new URL(location, RUNALYZE_BASE_URL).pathname.endsWith("/login");
    } catch {
      // unparsable Location: an ordinary unexpected redirect
      return false;
    }
  }

  /**
   * Fetch the login form and scrape its csrf token
   */
  private async fetchLoginToken(): Promise<string> {
    const response = await this.client.get<unknown>(LOGIN_URL, { responseType: "text" });
    if (response.status !== 200) {
      throw new UnexpectedStatusError(response.status, LOGIN_URL);
    }

    const body = typeof response.data === "string" ? response.data : "";
    const match = /name="_csrf_token" value="([^"]+)"/.exec(body);
    if (!match) {
      throw new TokenNotFoundError();
    }
    return match[1];
  }

  /**
   * Log in with username and password. A redirect answer means the credentials were accepted.
   */
  async login(): Promise<void> {
    this.logger.info("logging in", { username: this.username });
    const csrfToken = await this.fetchLoginToken();

    const params = new URLSearchParams({
      _username: this.username,
      _password: this.password,
      _remember_me: "on",
      submit: "Sign in",
      _csrf_token: csrfToken,
    });

    const response = await this.client.post<unknown>(LOGIN_URL, params, {
      headers: {
        "content-type": "application/x-www-form-urlencoded",
        "cache-control": "max-age=0",
      },
      responseType: "text",
    });

    if (!REDIRECT_STATUSES.has(response.status)) {
      throw new LoginFailedError(response.status);
    }
  }

  /**
   * Fetch the databrowser HTML for the week starting at `weekStart`
   */
  async fetchWeek(weekStart: Date): Promise<string> {
    const start = toEpochSeconds(weekStart);
    const end = toEpochSeconds(endOfWeek(weekStart));
    const url = `${RUNALYZE_BASE_URL}/databrowser?start=${start}&end=${end}`;

    const response = await this.client.get<unknown>(url, {
      headers: {
        "x-requested-with": "XMLHttpRequest",
        accept: "text/html, */*; q=0.01",
        "sec-fetch-dest": "empty",
        "sec-fetch-mode": "cors",
      },
      responseType: "text",
    });

    if (this.isLoginRedirect(response)) {
      throw new RedirectedToLoginError();
    }
    if (response.status < 200 || response.status >= 300) {
      throw new UnexpectedStatusError(response.status, url);
    }

    return typeof response.data === "string" ? response.data : "";
  }

  /**
   * Download one activity export. A 404 surfaces as NotFoundError.
   */
  async fetchExport(activityId: string, format: ExportFormat): Promise<ExportFile> {
    const url = `${RUNALYZE_BASE_URL}/activity/${encodeURIComponent(activityId)}/export/file/${format}`;

    const response = await this.client.get<unknown>(url, {
      headers: { referer: `${RUNALYZE_BASE_URL}/dashboard` },
      responseType: "arraybuffer",
    });

    if (response.status === 404) {
      throw new NotFoundError(url);
    }
    if (this.isLoginRedirect(response)) {
      throw new RedirectedToLoginError();
    }
    if (response.status !== 200) {
      throw new UnexpectedStatusError(response.status, url);
    }

    const disposition = headerValue(response, "content-disposition");
    if (!disposition) {
      throw new FilenameMissingError();
    }
    const match = /filename="([^"]+)"/.exec(disposition);
    if (!match) {
      throw new FilenameMissingError(disposition);
    }

    return { data: toBuffer(response.data), filename: match[1] };
  }

  /**
   * Write the current session to disk
   */
  persistSession(): void {
    this.session.save();
  }
}

export default RunalyzeClient;
