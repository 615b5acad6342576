import AuthService from "../authService";
import { LoginFailedError, RedirectedToLoginError, UnexpectedStatusError } from "../errors";
import { RecordingLogger, createMockApi } from "../mocks.setup";

describe("AuthService", () => {
  const now = () => new Date("2024-05-29T10:00:00Z");

  it("should keep a valid session without logging in", async () => {
    const api = createMockApi();
    const auth = new AuthService(api, new RecordingLogger(), now);

    await auth.ensureAuthenticated();

    expect(api.fetchWeek).toHaveBeenCalledWith(new Date(Date.UTC(2024, 4, 27)));
    expect(api.login).not.toHaveBeenCalled();
    expect(api.persistSession).toHaveBeenCalledTimes(1);
    expect(auth.state).toBe("verified");
  });

  it("should start unverified", () => {
    expect(new AuthService(createMockApi()).state).toBe("unverified");
  });

  it("should log in once when redirected to the login page", async () => {
    const api = createMockApi();
    api.fetchWeek.mockRejectedValueOnce(new RedirectedToLoginError()).mockResolvedValue("<table></table>");
    const auth = new AuthService(api, new RecordingLogger(), now);

    await auth.ensureAuthenticated();

    expect(api.login).toHaveBeenCalledTimes(1);
    expect(api.fetchWeek).toHaveBeenCalledTimes(2);
    expect(api.persistSession).toHaveBeenCalledTimes(1);
    expect(auth.state).toBe("verified");
  });

  it("should fail when the login is rejected", async () => {
    const api = createMockApi();
    api.fetchWeek.mockRejectedValue(new RedirectedToLoginError());
    api.login.mockRejectedValue(new LoginFailedError(200));
    const auth = new AuthService(api, new RecordingLogger(), now);

    await expect(auth.ensureAuthenticated()).rejects.toThrow(LoginFailedError);
    expect(api.fetchWeek).toHaveBeenCalledTimes(1);
    expect(api.persistSession).not.toHaveBeenCalled();
    expect(auth.state).toBe("unverified");
  });

  it("should fail when the new session is still rejected", async () => {
    const api = createMockApi();
    api.fetchWeek.mockRejectedValue(new RedirectedToLoginError());
    const auth = new AuthService(api, new RecordingLogger(), now);

    await expect(auth.ensureAuthenticated()).rejects.toThrow(RedirectedToLoginError);
    expect(api.login).toHaveBeenCalledTimes(1);
    expect(api.fetchWeek).toHaveBeenCalledTimes(2);
    expect(auth.state).toBe("unverified");
  });

  it("should not log in on other probe errors", async () => {
    const api = createMockApi();
    api.fetchWeek.mockRejectedValue(new UnexpectedStatusError(503));
    const auth = new AuthService(api, new RecordingLogger(), now);

    await expect(auth.ensureAuthenticated()).rejects.toThrow("unexpected status code: 503");
    expect(api.login).not.toHaveBeenCalled();
    expect(auth.state).toBe("unverified");
  });

  it("should only warn when the session cannot be saved", async () => {
    const api = createMockApi();
    api.persistSession.mockImplementation(() => {
      throw new Error("EACCES: permission denied");
    });
    const logger = new RecordingLogger("warn");
    const auth = new AuthService(api, logger, now);

    await auth.ensureAuthenticated();

    expect(auth.state).toBe("verified");
    expect(logger.entries).toEqual([
      {
        level: "warn",
        message: "failed to save session",
        fields: { error: "EACCES: permission denied" },
      },
    ]);
  });
});
