import { readFileSync } from "fs";
import { Logger } from "@nestjs/common";

const logger = new Logger("EnvFile");

/**
 * Value of a secret setting. `<NAME>_FILE` (a Docker or Kubernetes secret
 * mount) takes precedence over `<NAME>`; the file's trailing line break is
 * dropped. A `_FILE` that cannot be read is a startup error, never a silent
 * fallback to the plain variable.
 */
export function readEnvSecret(name: string): string | undefined {
  const fileVar = `${name}_FILE`;
  const filePath = process.env[fileVar]?.trim();

  if (!filePath) {
    return process.env[name];
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(
      `${fileVar} points to "${filePath}", which cannot be read: ${message}`,
    );
  }

  logger.debug(`Loaded ${name} from ${fileVar}`);
  return content.replace(/[\r\n]+$/, "");
}
