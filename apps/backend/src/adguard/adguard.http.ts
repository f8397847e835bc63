import { HttpStatus, Logger } from "@nestjs/common";
import axios, { AxiosRequestConfig } from "axios";
import { parse, serialize } from "cookie";
import {
  FilteringException,
  UpstreamAuthException,
  UpstreamProtocolException,
  UpstreamUnavailableException,
} from "../common/exceptions";
import { ADGUARD_SESSION_COOKIE } from "./adguard.constants";
import type { AdGuardConfig, UpstreamSession } from "./adguard.types";

const MAX_DETAIL_LENGTH = 200;

export function upstreamRequestConfig(
  config: AdGuardConfig,
  session?: UpstreamSession,
): AxiosRequestConfig {
  return {
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    maxRedirects: 0,
    headers:
      session ?
        { Cookie: serialize(ADGUARD_SESSION_COOKIE, session.cookie) }
      : {},
  };
}

/** Pulls the session cookie value out of a Set-Cookie header (string or list). */
export function extractSessionCookie(setCookie: unknown): string | undefined {
  const headers = Array.isArray(setCookie) ? setCookie : [setCookie];

  for (const header of headers) {
    if (typeof header !== "string") {
      continue;
    }
    const value = parse(header)[ADGUARD_SESSION_COOKIE];
    if (value) {
      return value;
    }
  }

  return undefined;
}

export function isUnauthorizedError(error: unknown): boolean {
  return (
    axios.isAxiosError(error) &&
    error.response?.status === HttpStatus.UNAUTHORIZED
  );
}

function describeBody(data: unknown): string | undefined {
  let text: string | undefined;
  if (typeof data === "string") {
    text = data.trim();
  } else if (
    data &&
    typeof data === "object" &&
    "message" in data &&
    typeof data.message === "string"
  ) {
    text = data.message.trim();
  }

  if (!text) {
    return undefined;
  }
  return text.length > MAX_DETAIL_LENGTH ?
      `${text.slice(0, MAX_DETAIL_LENGTH)}…`
    : text;
}

/**
 * Maps anything thrown while talking to AdGuard Home onto the upstream error
 * taxonomy. Timeouts and refused connections are told apart in the log only.
 */
export function normalizeUpstreamError(
  error: unknown,
  context: string,
  logger: Logger,
): FilteringException {
  if (error instanceof FilteringException) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    if (error.response) {
      const { status, statusText, data } = error.response;

      if (
        status === HttpStatus.UNAUTHORIZED ||
        status === HttpStatus.FORBIDDEN
      ) {
        logger.warn(`AdGuard Home refused ${context} (HTTP ${status})`);
        return new UpstreamAuthException(
          `AdGuard Home refused ${context}: authentication required or rejected (HTTP ${status}).`,
          status === HttpStatus.FORBIDDEN ?
            HttpStatus.FORBIDDEN
          : HttpStatus.UNAUTHORIZED,
          { upstreamStatus: status },
        );
      }

      const detail = describeBody(data) ?? statusText;
      logger.warn(
        `AdGuard Home answered ${context} with HTTP ${status}${detail ? `: ${detail}` : ""}`,
      );
      return new UpstreamProtocolException(
        `AdGuard Home rejected ${context} (HTTP ${status}${detail ? `: ${detail}` : ""}).`,
        { upstreamStatus: status },
      );
    }

    if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
      logger.error(`Timed out waiting for AdGuard Home during ${context}`);
      return new UpstreamUnavailableException(
        `AdGuard Home did not answer ${context} in time.`,
      );
    }

    logger.error(
      `Network error while contacting AdGuard Home during ${context}: ${error.message}`,
    );
    return new UpstreamUnavailableException(
      `Unable to reach AdGuard Home for ${context}. Check ADGUARD_HOST and ADGUARD_PORT.`,
    );
  }

  logger.error(
    `Unexpected error while contacting AdGuard Home during ${context}`,
    error instanceof Error ? error.stack : String(error),
  );
  return new UpstreamUnavailableException(
    `Unexpected error while contacting AdGuard Home during ${context}.`,
  );
}
