import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { loadAdGuardConfig } from "./adguard.config";

const ENV_KEYS = [
  "ADGUARD_HOST",
  "ADGUARD_PORT",
  "ADGUARD_TIMEOUT_MS",
  "ADGUARD_USERNAME",
  "ADGUARD_USERNAME_FILE",
  "ADGUARD_PASSWORD",
  "ADGUARD_PASSWORD_FILE",
];

describe("loadAdGuardConfig", () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it("falls back to localhost:3000 with a 10 second timeout and no auth", () => {
    const config = loadAdGuardConfig();

    expect(config).toEqual({
      baseUrl: "http://localhost:3000",
      timeoutMs: 10000,
      credentials: undefined,
    });
  });

  it("adds a scheme to bare hosts and strips trailing slashes", () => {
    process.env.ADGUARD_HOST = "adguard.lan/";
    process.env.ADGUARD_PORT = "8080";

    expect(loadAdGuardConfig().baseUrl).toBe("http://adguard.lan:8080");
  });

  it("keeps an explicit https scheme", () => {
    process.env.ADGUARD_HOST = "https://dns.example.test";
    process.env.ADGUARD_PORT = "443";

    expect(loadAdGuardConfig().baseUrl).toBe("https://dns.example.test:443");
  });

  it("rejects a port outside 1..65535", () => {
    process.env.ADGUARD_PORT = "70000";

    expect(() => loadAdGuardConfig()).toThrow(
      'ADGUARD_PORT must be an integer between 1 and 65535 (got "70000").',
    );
  });

  it("rejects a non-numeric timeout", () => {
    process.env.ADGUARD_TIMEOUT_MS = "soon";

    expect(() => loadAdGuardConfig()).toThrow(
      'ADGUARD_TIMEOUT_MS must be an integer between 1 and 600000 (got "soon").',
    );
  });

  it("enables session auth only when both username and password are set", () => {
    process.env.ADGUARD_USERNAME = "admin";

    expect(loadAdGuardConfig().credentials).toBeUndefined();

    process.env.ADGUARD_PASSWORD = "test-secret";

    expect(loadAdGuardConfig().credentials).toEqual({
      username: "admin",
      password: "test-secret",
    });
  });

  it("reads the password from ADGUARD_PASSWORD_FILE", () => {
    const dir = mkdtempSync(join(tmpdir(), "guardgate-config-test-"));
    try {
      const file = join(dir, "password");
      writeFileSync(file, "test-secret\n");
      process.env.ADGUARD_USERNAME = "admin";
      process.env.ADGUARD_PASSWORD_FILE = file;

      expect(loadAdGuardConfig().credentials).toEqual({
        username: "admin",
        password: "test-secret",
      });
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it("fails at startup when ADGUARD_PASSWORD_FILE cannot be read", () => {
    const missing = join(tmpdir(), "guardgate-config-test-missing", "password");
    process.env.ADGUARD_USERNAME = "admin";
    process.env.ADGUARD_PASSWORD = "test-secret";
    process.env.ADGUARD_PASSWORD_FILE = missing;

    expect(() => loadAdGuardConfig()).toThrow(
      `ADGUARD_PASSWORD_FILE points to "${missing}", which cannot be read`,
    );
  });

  it("returns a frozen object", () => {
    expect(Object.isFrozen(loadAdGuardConfig())).toBe(true);
  });
});
