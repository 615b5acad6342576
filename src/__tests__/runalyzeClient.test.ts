import { InternalAxiosRequestConfig } from "axios";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  FilenameMissingError,
  LoginFailedError,
  NotFoundError,
  RedirectedToLoginError,
  TokenNotFoundError,
  UnexpectedStatusError,
} from "../errors";
import { FakeResponse, RecordingLogger, createFakeAdapter } from "../mocks.setup";
import RunalyzeClient from "../shared/runalyzeClient";

const LOGIN_PAGE =
  '<form method="post"><input type="hidden" name="_csrf_token" value="csrf-test-token"></form>';

type Route = (config: InternalAxiosRequestConfig) => FakeResponse;

describe("RunalyzeClient", () => {
  let tempDir: string;
  let cookiePath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "runalyze-client-"));
    cookiePath = path.join(tempDir, "cookies.json");
  });

  afterEach(() => {
    if (fs.existsSync(tempDir)) {
      fs.rmSync(tempDir, { recursive: true });
    }
  });

  const createClient = (route: Route, logger = new RecordingLogger("info")) => {
    const adapter = createFakeAdapter(route);
    const client = new RunalyzeClient({
      username: "runner",
      password: "test-secret",
      cookiePath,
      logger,
      adapter,
    });
    return { client, adapter };
  };

  const requestAt = (adapter: ReturnType<typeof createFakeAdapter>, index: number) =>
    adapter.mock.calls[index][0];

  const loginRoute: Route = (config): FakeResponse => {
    if (config.method === "get") {
      return {
        status: 200,
        headers: { "set-cookie": ["PHPSESSID=first-session; Path=/; HttpOnly"] },
        data: LOGIN_PAGE,
      };
    }
    return {
      status: 302,
      headers: {
        location: "https://runalyze.com/dashboard",
        "set-cookie": ["REMEMBERME=remember-token; Path=/; HttpOnly"],
      },
      data: "",
    };
  };

  describe("login", () => {
    it("should post the credentials with the csrf token", async () => {
      const { client, adapter } = createClient(loginRoute);

      await client.login();

      expect(adapter).toHaveBeenCalledTimes(2);
      const post = requestAt(adapter, 1);
      expect(post.method).toBe("post");
      expect(post.url).toBe("https://runalyze.com/login");
      const form = new URLSearchParams(String(post.data));
      expect(form.get("_username")).toBe("runner");
      expect(form.get("_password")).toBe("test-secret");
      expect(form.get("_remember_me")).toBe("on");
      expect(form.get("submit")).toBe("Sign in");
      expect(form.get("_csrf_token")).toBe("csrf-test-token");
    });

    it("should send the cookie received with the login form", async () => {
      const { client, adapter } = createClient(loginRoute);

      await client.login();

      expect(requestAt(adapter, 0).headers.get("Cookie")).toBeUndefined();
      expect(requestAt(adapter, 1).headers.get("Cookie")).toBe("PHPSESSID=first-session");
    });

    it("should store every cookie it receives", async () => {
      const { client } = createClient(loginRoute);

      await client.login();

      expect(client.getSession().getCookieString("https://runalyze.com/")).toBe(
        "PHPSESSID=first-session; REMEMBERME=remember-token"
      );
      expect(fs.existsSync(cookiePath)).toBe(true);
    });

    it("should fail when the login page has no csrf token", async () => {
      const { client } = createClient(() => ({ status: 200, data: "<form></form>" }));

      await expect(client.login()).rejects.toThrow(TokenNotFoundError);
    });

    it("should fail when the login page cannot be loaded", async () => {
      const { client } = createClient(() => ({ status: 503, data: "" }));

      await expect(client.login()).rejects.toThrow(UnexpectedStatusError);
    });

    it("should fail when the form is shown again", async () => {
      const { client } = createClient(() => ({ status: 200, data: LOGIN_PAGE }));

      const error = await client.login().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(LoginFailedError);
      expect(error).toHaveProperty("status", 200);
    });

    it("should never log the password", async () => {
      const logger = new RecordingLogger("trace");
      const { client } = createClient(loginRoute, logger);

      await client.login();

      const bodies = logger.entries.filter((entry) => entry.message === "request body");
      expect(bodies).toHaveLength(1);
      expect(bodies[0].fields).toEqual({
        body: "_username=runner&_password=***&_remember_me=on&submit=Sign+in&_csrf_token=csrf-test-token",
      });
    });
  });

  describe("fetchWeek", () => {
    const weekStart = new Date(Date.UTC(2024, 4, 27));

    it("should request the databrowser for the whole week", async () => {
      const { client, adapter } = createClient(() => ({ status: 200, data: "<table></table>" }));

      const html = await client.fetchWeek(weekStart);

      expect(html).toBe("<table></table>");
      const request = requestAt(adapter, 0);
      expect(request.url).toBe("https://runalyze.com/databrowser?start=1716768000&end=1717372799");
      expect(request.headers.get("X-Requested-With")).toBe("XMLHttpRequest");
      expect(request.maxRedirects).toBe(0);
    });

    it("should report a redirect to the login page", async () => {
      const { client } = createClient(() => ({
        status: 302,
        headers: { location: "https://runalyze.com/login" },
      }));

      await expect(client.fetchWeek(weekStart)).rejects.toThrow(RedirectedToLoginError);
    });

    it("should understand relative login redirects", async () => {
      const { client } = createClient(() => ({ status: 302, headers: { location: "/login" } }));

      await expect(client.fetchWeek(weekStart)).rejects.toThrow(RedirectedToLoginError);
    });

    it("should treat other redirects as unexpected", async () => {
      const { client } = createClient(() => ({ status: 302, headers: { location: "/dashboard" } }));

      await expect(client.fetchWeek(weekStart)).rejects.toThrow(UnexpectedStatusError);
    });

    it("should treat a malformed redirect location as unexpected", async () => {
      const { client } = createClient(() => ({ status: 302, headers: { location: "http://[bad" } }));

      const failure = await client.fetchWeek(weekStart).catch((error: unknown) => error);
      expect(failure).toBeInstanceOf(UnexpectedStatusError);
      expect(failure).toHaveProperty("status", 302);
    });

    it("should fail on server errors", async () => {
      const { client } = createClient(() => ({ status: 500 }));

      await expect(client.fetchWeek(weekStart)).rejects.toThrow("unexpected status code: 500");
    });
  });

  describe("fetchExport", () => {
    it("should return the file and its name", async () => {
      const data = Buffer.from([0x0e, 0x10, 0x43, 0x08]);
      const { client, adapter } = createClient(() => ({
        status: 200,
        headers: { "content-disposition": 'attachment; filename="2024-05-27-morning-run.fit"' },
        data,
      }));

      const file = await client.fetchExport("135061340", "fit");

      expect(requestAt(adapter, 0).url).toBe("https://runalyze.com/activity/135061340/export/file/fit");
      expect(requestAt(adapter, 0).responseType).toBe("arraybuffer");
      expect(file.filename).toBe("2024-05-27-morning-run.fit");
      expect(file.data.equals(data)).toBe(true);
    });

    it("should report a missing export as not found", async () => {
      const { client } = createClient(() => ({ status: 404 }));

      await expect(client.fetchExport("1", "tcx")).rejects.toThrow(NotFoundError);
    });

    it("should report an expired session", async () => {
      const { client } = createClient(() => ({ status: 302, headers: { location: "/login" } }));

      await expect(client.fetchExport("1", "fit")).rejects.toThrow(RedirectedToLoginError);
    });

    it("should fail without a content-disposition header", async () => {
      const { client } = createClient(() => ({ status: 200, data: Buffer.from("x") }));

      await expect(client.fetchExport("1", "fit")).rejects.toThrow("content-disposition header not found");
    });

    it("should fail when the header names no file", async () => {
      const { client } = createClient(() => ({
        status: 200,
        headers: { "content-disposition": "attachment" },
        data: Buffer.from("x"),
      }));

      await expect(client.fetchExport("1", "fit")).rejects.toThrow(FilenameMissingError);
    });

    it("should fail on other statuses", async () => {
      const { client } = createClient(() => ({ status: 403 }));

      await expect(client.fetchExport("1", "fit")).rejects.toThrow(UnexpectedStatusError);
    });
  });

  describe("persistSession", () => {
    it("should write the session file", () => {
      const { client } = createClient(() => ({ status: 200 }));

      client.persistSession();

      expect(JSON.parse(fs.readFileSync(cookiePath, "utf-8"))).toEqual([]);
    });

    it("should send cookies loaded from disk", async () => {
      fs.writeFileSync(
        cookiePath,
        JSON.stringify([
          { name: "REMEMBERME", value: "remember-token", domain: "runalyze.com", path: "/", expires: null, secure: true, httpOnly: true, hostOnly: true },
        ])
      );
      const { client, adapter } = createClient(() => ({ status: 200, data: "" }));

      await client.fetchWeek(new Date(Date.UTC(2024, 4, 27)));

      expect(requestAt(adapter, 0).headers.get("Cookie")).toBe("REMEMBERME=remember-token");
    });
  });
});
