import type { AdGuardService } from "../src/adguard/adguard.service";
import type {
  DomainCheckResult,
  FilterStatus,
} from "../src/adguard/adguard.types";
import { allowedDomainOf } from "../src/filtering/allow-rules";
import { normalizeDomain } from "../src/utils/domain-validation";

const BLOCK_RULE_PATTERN = /^\|\|([^\^$|\s]+)\^$/i;

/**
 * In-memory stand-in for the AdGuard Home client. Understands `||domain^`
 * block rules and `@@||domain^` allow rules; allow rules win, as upstream.
 */
export class FakeAdGuard {
  rules: string[];
  enabled = true;
  /** When false, setRules succeeds without storing anything. */
  storeRules = true;
  getRulesError?: Error;

  readonly setRulesCalls: string[][] = [];
  getRulesCalls = 0;

  private readonly setRulesFailures: Error[] = [];

  constructor(rules: string[] = []) {
    this.rules = [...rules];
  }

  /** Queues errors for the next setRules calls, one per call. */
  failSetRules(...errors: Error[]): void {
    this.setRulesFailures.push(...errors);
  }

  asService(): AdGuardService {
    return this as unknown as AdGuardService;
  }

  async getRules(): Promise<string[]> {
    this.getRulesCalls += 1;
    if (this.getRulesError) {
      throw this.getRulesError;
    }
    return [...this.rules];
  }

  async setRules(rules: readonly string[]): Promise<void> {
    this.setRulesCalls.push([...rules]);
    const failure = this.setRulesFailures.shift();
    if (failure) {
      throw failure;
    }
    if (this.storeRules) {
      this.rules = [...rules];
    }
  }

  async getStatus(): Promise<FilterStatus> {
    if (this.getRulesError) {
      throw this.getRulesError;
    }
    return {
      enabled: this.enabled,
      filters: [],
      whitelistFilters: [],
      userRules: [...this.rules],
    };
  }

  async checkHost(name: string): Promise<DomainCheckResult> {
    const domain = normalizeDomain(name);

    const allow = this.rules.find((rule) => allowedDomainOf(rule) === domain);
    if (allow) {
      return {
        reason: "NotFilteredWhiteList",
        blocked: false,
        rule: allow,
        filterId: 0,
        rules: [{ text: allow, filterListId: 0 }],
      };
    }

    const block = this.rules.find(
      (rule) => BLOCK_RULE_PATTERN.exec(rule.trim())?.[1]?.toLowerCase() === domain,
    );
    if (block) {
      return {
        reason: "FilteredBlackList",
        blocked: true,
        rule: block,
        filterId: 0,
        rules: [{ text: block, filterListId: 0 }],
      };
    }

    return { reason: "NotFilteredNotFound", blocked: false, rules: [] };
  }
}
