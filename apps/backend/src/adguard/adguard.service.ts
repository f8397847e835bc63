/**
 * AdGuard Home control API client.
 *
 * Wraps the filtering endpoints this app needs and normalizes their responses
 * into DomainCheckResult / FilterStatus. Every call is bounded by the configured
 * timeout; a 401 triggers one re-login and one retry of the failed call.
 *
 * API reference: https://github.com/AdguardTeam/AdGuardHome/tree/master/openapi
 */

import { HttpService } from "@nestjs/axios";
import { Inject, Injectable, Logger } from "@nestjs/common";
import { AxiosRequestConfig } from "axios";
import { firstValueFrom } from "rxjs";
import type { ZodError } from "zod";
import { UpstreamProtocolException } from "../common/exceptions";
import { normalizeDomain } from "../utils/domain-validation";
import { AdGuardSessionService } from "./adguard-session.service";
import { ADGUARD_CONFIG_TOKEN } from "./adguard.constants";
import {
  isUnauthorizedError,
  normalizeUpstreamError,
  upstreamRequestConfig,
} from "./adguard.http";
import {
  CheckHostResponse,
  FilterResponse,
  FilterStatusResponse,
  checkHostResponseSchema,
  describeIssues,
  filterStatusResponseSchema,
} from "./adguard.schemas";
import type {
  AdGuardConfig,
  DomainCheckResult,
  Filter,
  FilterStatus,
  MatchedRule,
  UpstreamSession,
} from "./adguard.types";

@Injectable()
export class AdGuardService {
  private readonly logger = new Logger(AdGuardService.name);

  constructor(
    private readonly httpService: HttpService,
    private readonly sessions: AdGuardSessionService,
    @Inject(ADGUARD_CONFIG_TOKEN)
    private readonly config: AdGuardConfig,
  ) {}

  async checkHost(name: string): Promise<DomainCheckResult> {
    const domain = normalizeDomain(name);
    const context = `check_host for ${domain}`;

    const data = await this.send<unknown>(
      {
        method: "GET",
        url: "/control/filtering/check_host",
        params: { name: domain },
      },
      context,
    );

    const parsed = checkHostResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw this.protocolError(context, parsed.error);
    }

    const result = this.toDomainCheckResult(parsed.data);
    this.logger.log(`Checked ${domain}: ${result.reason}`);
    return result;
  }

  async getStatus(): Promise<FilterStatus> {
    const context = "filtering status";
    const data = await this.send<unknown>(
      { method: "GET", url: "/control/filtering/status" },
      context,
    );

    const parsed = filterStatusResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw this.protocolError(context, parsed.error);
    }

    return this.toFilterStatus(parsed.data);
  }

  /** Current user rules, in upstream order. */
  async getRules(): Promise<string[]> {
    const status = await this.getStatus();
    return status.userRules;
  }

  /** Replaces the whole user rule list. No retry beyond the auth refresh. */
  async setRules(rules: readonly string[]): Promise<void> {
    await this.send<unknown>(
      {
        method: "POST",
        url: "/control/filtering/set_rules",
        data: { rules: [...rules] },
      },
      `set_rules (${rules.length} rules)`,
    );
    this.logger.log(`Applied ${rules.length} user rules`);
  }

  private async send<T>(
    request: AxiosRequestConfig,
    context: string,
  ): Promise<T> {
    const session = await this.sessions.acquire();

    try {
      return await this.dispatch<T>(request, session);
    } catch (error) {
      if (!this.sessions.authEnabled || !isUnauthorizedError(error)) {
        throw normalizeUpstreamError(error, context, this.logger);
      }
    }

    this.logger.log(
      `AdGuard Home session rejected during ${context}; re-authenticating once`,
    );
    this.sessions.invalidate(session);
    const refreshed = await this.sessions.acquire();

    try {
      return await this.dispatch<T>(request, refreshed);
    } catch (error) {
      throw normalizeUpstreamError(error, context, this.logger);
    }
  }

  private async dispatch<T>(
    request: AxiosRequestConfig,
    session: UpstreamSession | undefined,
  ): Promise<T> {
    const response = await firstValueFrom(
      this.httpService.request<T>({
        ...upstreamRequestConfig(this.config, session),
        ...request,
      }),
    );
    return response.data;
  }

  private protocolError(
    context: string,
    error: ZodError,
  ): UpstreamProtocolException {
    const issues = describeIssues(error);
    this.logger.warn(`Unexpected AdGuard Home response for ${context}: ${issues}`);
    return new UpstreamProtocolException(
      `AdGuard Home returned an unexpected response for ${context}: ${issues}`,
    );
  }

  private toDomainCheckResult(response: CheckHostResponse): DomainCheckResult {
    const rules: MatchedRule[] =
      response.rules && response.rules.length > 0 ?
        response.rules.map((rule) => ({
          text: rule.text,
          filterListId: rule.filter_list_id ?? undefined,
        }))
      : response.rule ?
        [{ text: response.rule, filterListId: response.filter_id ?? undefined }]
      : [];

    const result: DomainCheckResult = {
      reason: response.reason,
      blocked: response.reason.startsWith("Filtered"),
      rules,
    };

    const rule = response.rule || rules[0]?.text;
    if (rule) {
      result.rule = rule;
    }

    const filterId = response.filter_id ?? rules[0]?.filterListId;
    if (filterId !== undefined) {
      result.filterId = filterId;
    }

    switch (response.reason) {
      case "FilteredBlockedService":
        if (response.service_name) {
          result.serviceName = response.service_name;
        }
        break;
      case "Rewrite":
      case "RewriteEtcHosts":
      case "RewriteRule":
        if (response.cname) {
          result.cname = response.cname;
        }
        if (response.ip_addrs && response.ip_addrs.length > 0) {
          result.ipAddrs = response.ip_addrs;
        }
        break;
      default:
        break;
    }

    return result;
  }

  private toFilterStatus(response: FilterStatusResponse): FilterStatus {
    const status: FilterStatus = {
      enabled: response.enabled,
      filters: (response.filters ?? []).map((filter) => this.toFilter(filter)),
      whitelistFilters: (response.whitelist_filters ?? []).map((filter) =>
        this.toFilter(filter),
      ),
      userRules: response.user_rules ?? [],
    };

    if (response.interval !== undefined && response.interval !== null) {
      status.interval = response.interval;
    }

    return status;
  }

  private toFilter(filter: FilterResponse): Filter {
    const result: Filter = {
      enabled: filter.enabled,
      id: filter.id,
      name: filter.name,
      rulesCount: filter.rules_count,
      url: filter.url,
    };
    if (filter.last_updated) {
      result.lastUpdated = filter.last_updated;
    }
    return result;
  }
}
