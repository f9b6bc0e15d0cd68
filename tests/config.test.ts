import { describe, it, expect } from "vitest";
import { loadConfig, loadLoggingOptions } from "../src/config/config.js";
import { ConfigurationError } from "../src/errors.js";

const REQUIRED = {
  SOURCE_USERNAME: "alice",
  SOURCE_PASSWORD: "test-secret",
  DEST_USERNAME: "alice-gh",
  DEST_TOKEN: "test-token",
};

describe("loadConfig", () => {
  it("lists every missing secret", () => {
    let caught: unknown;
    try {
      loadConfig({});
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({
      code: "CONFIGURATION",
      missing: ["SOURCE_USERNAME", "SOURCE_PASSWORD", "DEST_USERNAME", "DEST_TOKEN"],
    });
  });

  it("treats blank values as missing", () => {
    expect(() => loadConfig({ ...REQUIRED, DEST_TOKEN: "   " })).toThrow(
      "Missing required environment variables: DEST_TOKEN"
    );
  });

  it("applies defaults", () => {
    const config = loadConfig(REQUIRED);

    expect(config).toEqual({
      credentials: {
        sourceUser: "alice",
        sourceSecret: "test-secret",
        destUser: "alice-gh",
        destToken: "test-token",
      },
      destOwner: undefined,
      destPrivate: false,
      destApiUrl: "https://api.github.com",
      destGitUrl: "https://github.com",
      repoListPath: "repos.txt",
      cloneDir: "temp_repos",
      maxNameAttempts: 1000,
      gitTimeoutMs: undefined,
      logFile: "repo_migration.log",
      logLevel: "info",
      reportPath: undefined,
    });
  });

  it("reads optional settings", () => {
    const config = loadConfig({
      ...REQUIRED,
      DEST_OWNER: "acme",
      DEST_PRIVATE: "true",
      DEST_GIT_URL: "https://git.example.com/",
      MAX_NAME_ATTEMPTS: "25",
      GIT_TIMEOUT_MS: "60000",
      REPORT_PATH: "state/report.json",
    });

    expect(config.destOwner).toBe("acme");
    expect(config.destPrivate).toBe(true);
    expect(config.destGitUrl).toBe("https://git.example.com");
    expect(config.maxNameAttempts).toBe(25);
    expect(config.gitTimeoutMs).toBe(60000);
    expect(config.reportPath).toBe("state/report.json");
  });

  it("rejects an invalid attempt cap", () => {
    expect(() => loadConfig({ ...REQUIRED, MAX_NAME_ATTEMPTS: "0" })).toThrow(
      /^Invalid value for MAX_NAME_ATTEMPTS/
    );
  });

  it("returns a frozen value", () => {
    const config = loadConfig(REQUIRED);

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.credentials)).toBe(true);
  });
});

describe("loadLoggingOptions", () => {
  it("falls back to defaults for unknown levels", () => {
    expect(loadLoggingOptions({ LOG_LEVEL: "verbose" })).toEqual({
      file: "repo_migration.log",
      level: "info",
    });
  });

  it("reads file and level", () => {
    expect(loadLoggingOptions({ LOG_FILE: "logs/run.log", LOG_LEVEL: "debug" })).toEqual({
      file: "logs/run.log",
      level: "debug",
    });
  });
});
