import { Logger } from "@nestjs/common";
import { readEnvSecret } from "../utils/env-file";
import {
  DEFAULT_ADGUARD_HOST,
  DEFAULT_ADGUARD_PORT,
  DEFAULT_ADGUARD_TIMEOUT_MS,
} from "./adguard.constants";
import type { AdGuardConfig, AdGuardCredentials } from "./adguard.types";

function parseInteger(
  name: string,
  raw: string | undefined,
  fallback: number,
  min: number,
  max: number,
): number {
  const trimmed = raw?.trim();
  if (!trimmed) {
    return fallback;
  }

  const value = Number(trimmed);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(
      `${name} must be an integer between ${min} and ${max} (got "${trimmed}").`,
    );
  }

  return value;
}

/**
 * Builds the upstream configuration from the environment. Throws on values that
 * cannot be parsed so a misconfigured deployment fails at startup.
 */
export function loadAdGuardConfig(): AdGuardConfig {
  const logger = new Logger("AdGuardConfig");

  const rawHost = process.env.ADGUARD_HOST?.trim() || DEFAULT_ADGUARD_HOST;
  const host = (
    /^https?:\/\//i.test(rawHost) ? rawHost : `http://${rawHost}`
  ).replace(/\/+$/, "");

  const port = parseInteger(
    "ADGUARD_PORT",
    process.env.ADGUARD_PORT,
    DEFAULT_ADGUARD_PORT,
    1,
    65_535,
  );
  const timeoutMs = parseInteger(
    "ADGUARD_TIMEOUT_MS",
    process.env.ADGUARD_TIMEOUT_MS,
    DEFAULT_ADGUARD_TIMEOUT_MS,
    1,
    600_000,
  );

  const username = readEnvSecret("ADGUARD_USERNAME")?.trim();
  const password = readEnvSecret("ADGUARD_PASSWORD");

  let credentials: AdGuardCredentials | undefined;
  if (username && password) {
    credentials = { username, password };
  } else if (username || password) {
    logger.warn(
      "Only one of ADGUARD_USERNAME / ADGUARD_PASSWORD is set; upstream session authentication is disabled.",
    );
  }

  const config: AdGuardConfig = {
    baseUrl: `${host}:${port}`,
    timeoutMs,
    credentials,
  };

  logger.log(
    `AdGuard Home control API at ${config.baseUrl}/control ` +
      `(timeout ${timeoutMs}ms, ${credentials ? "session auth" : "no auth"})`,
  );

  return Object.freeze(config);
}
