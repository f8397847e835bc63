import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { readEnvSecret } from "./env-file";

describe("readEnvSecret", () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), "guardgate-env-file-test-"));
    delete process.env.GUARDGATE_TEST_SECRET;
    delete process.env.GUARDGATE_TEST_SECRET_FILE;
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
    delete process.env.GUARDGATE_TEST_SECRET;
    delete process.env.GUARDGATE_TEST_SECRET_FILE;
  });

  it("returns the plain variable when no _FILE variant is set", () => {
    process.env.GUARDGATE_TEST_SECRET = "direct-value";

    expect(readEnvSecret("GUARDGATE_TEST_SECRET")).toBe("direct-value");
  });

  it("returns undefined when neither variant is set", () => {
    expect(readEnvSecret("GUARDGATE_TEST_SECRET")).toBeUndefined();
  });

  it("prefers the file over the plain variable", () => {
    const filePath = join(testDir, "secret");
    writeFileSync(filePath, "file-value");
    process.env.GUARDGATE_TEST_SECRET = "direct-value";
    process.env.GUARDGATE_TEST_SECRET_FILE = filePath;

    expect(readEnvSecret("GUARDGATE_TEST_SECRET")).toBe("file-value");
  });

  it("drops the trailing line break but keeps inner spaces", () => {
    const filePath = join(testDir, "secret");
    writeFileSync(filePath, "test secret \r\n");
    process.env.GUARDGATE_TEST_SECRET_FILE = filePath;

    expect(readEnvSecret("GUARDGATE_TEST_SECRET")).toBe("test secret ");
  });

  it("does not write the secret back into process.env", () => {
    const filePath = join(testDir, "secret");
    writeFileSync(filePath, "file-value\n");
    process.env.GUARDGATE_TEST_SECRET_FILE = filePath;

    readEnvSecret("GUARDGATE_TEST_SECRET");

    expect(process.env.GUARDGATE_TEST_SECRET).toBeUndefined();
  });

  it("fails when the _FILE variant points to a missing file", () => {
    const filePath = join(testDir, "missing");
    process.env.GUARDGATE_TEST_SECRET = "direct-value";
    process.env.GUARDGATE_TEST_SECRET_FILE = filePath;

    expect(() => readEnvSecret("GUARDGATE_TEST_SECRET")).toThrow(
      `GUARDGATE_TEST_SECRET_FILE points to "${filePath}", which cannot be read`,
    );
  });
});
