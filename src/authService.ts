import { startOfWeek } from "./dates";
import { RedirectedToLoginError, errorMessage } from "./errors";
import { Logger, silentLogger } from "./logger";
import { RunalyzeApi } from "./shared/types";

export type AuthState = "unverified" | "verified";

/**
 * Makes sure the client holds a working session before any download starts.
 *
 * The current week page doubles as the probe: it answers with a redirect to
 * /login when the stored cookies are missing or expired.
 */
export class AuthService {
  private client: RunalyzeApi;
  private logger: Logger;
  private now: () => Date;
  private currentState: AuthState = "unverified";

  constructor(client: RunalyzeApi, logger: Logger = silentLogger, now: () => Date = () => new Date()) {
    this.client = client;
    this.logger = logger;
    this.now = now;
  }

  get state(): AuthState {
    return this.currentState;
  }

  /**
   * Probe the session, logging in once if it was rejected
   */
  async ensureAuthenticated(): Promise<void> {
    try {
      await this.probe();
      this.logger.debug("existing session is valid");
    } catch (error) {
      if (!(error instanceof RedirectedToLoginError)) {
        throw error;
      }

      this.logger.info("session expired, logging in");
      await this.client.login();
      await this.probe();
      this.logger.info("login verified");
    }

    this.persistSession();
    this.currentState = "verified";
  }

  private async probe(): Promise<void> {
    await this.client.fetchWeek(startOfWeek(this.now()));
  }

  private persistSession(): void {
    try {
      this.client.persistSession();
    } catch (error) {
      this.logger.warn("failed to save session", { error: errorMessage(error) });
    }
  }
}

export default AuthService;
