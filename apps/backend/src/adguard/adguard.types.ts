export interface AdGuardCredentials {
  username: string;
  password: string;
}

export interface AdGuardConfig {
  /** Scheme, host and port, without the /control suffix. */
  baseUrl: string;
  timeoutMs: number;
  credentials?: AdGuardCredentials;
}

/** Session established by POST /control/login. Held only by AdGuardSessionService. */
export interface UpstreamSession {
  cookie: string;
  createdAt: string;
}

export type NotFilteredReason =
  | "NotFilteredNotFound"
  | "NotFilteredWhiteList"
  | "NotFilteredError";

export type FilteredReason =
  | "FilteredBlackList"
  | "FilteredSafeBrowsing"
  | "FilteredParental"
  | "FilteredInvalid"
  | "FilteredSafeSearch"
  | "FilteredBlockedService";

export type RewriteReason = "Rewrite" | "RewriteEtcHosts" | "RewriteRule";

export type FilteringReason = NotFilteredReason | FilteredReason | RewriteReason;

export interface MatchedRule {
  text: string;
  filterListId?: number;
}

export interface DomainCheckResult {
  reason: FilteringReason;
  /** True iff reason starts with "Filtered". */
  blocked: boolean;
  rule?: string;
  filterId?: number;
  rules: MatchedRule[];
  serviceName?: string;
  cname?: string;
  ipAddrs?: string[];
}

export interface Filter {
  enabled: boolean;
  id: number;
  name: string;
  rulesCount: number;
  url: string;
  lastUpdated?: string;
}

export interface FilterStatus {
  enabled: boolean;
  interval?: number;
  filters: Filter[];
  whitelistFilters: Filter[];
  userRules: string[];
}
