export const ADGUARD_CONFIG_TOKEN = "ADGUARD_CONFIG";

/** Cookie AdGuard Home issues from POST /control/login. */
export const ADGUARD_SESSION_COOKIE = "agh_session";

export const DEFAULT_ADGUARD_HOST = "http://localhost";
export const DEFAULT_ADGUARD_PORT = 3000;
export const DEFAULT_ADGUARD_TIMEOUT_MS = 10_000;
