import { Injectable, Logger } from "@nestjs/common";
import { AdGuardService } from "../adguard/adguard.service";
import {
  FilteringException,
  RollbackFailedException,
  RuleMutationException,
  UpstreamProtocolException,
  toFilteringException,
} from "../common/exceptions";
import { normalizeDomain } from "../utils/domain-validation";
import {
  allowRuleFor,
  allowedDomainOf,
  allowedDomains,
  hasAllowRule,
  sameRules,
  validateRules,
} from "./allow-rules";
import { RulesBackupService } from "./rules-backup.service";
import type {
  MutationOrigin,
  MutationOutcome,
  MutationStage,
  ReplaceRulesResult,
  RestoreBackupResult,
  RulesBackupMetadata,
  UnblockResult,
} from "./filtering.types";

function listDomains(domains: readonly string[]): string {
  return domains.join(", ");
}

/**
 * Applies rule-list changes so the previous list can always be recovered.
 *
 * Every mutation runs the same sequence: read the live rules, write them to a
 * new backup, apply the change, re-read to verify, and put the snapshot back
 * if anything after the backup fails. Nothing is applied without a backup.
 *
 * There is no lock: two concurrent mutations both start from their own
 * snapshot and the later setRules wins.
 */
@Injectable()
export class RulesGuardService {
  private readonly logger = new Logger(RulesGuardService.name);

  constructor(
    private readonly adguardService: AdGuardService,
    private readonly backups: RulesBackupService,
  ) {}

  async unblock(input: unknown): Promise<UnblockResult> {
    const domain = normalizeDomain(input);
    const rule = allowRuleFor(domain);

    const outcome = await this.mutate(
      "unblock",
      (snapshot) =>
        hasAllowRule(snapshot, domain) ? snapshot : [...snapshot, rule],
      domain,
    );

    if (!outcome.changed) {
      const existing =
        outcome.previous.find(
          (candidate) => allowedDomainOf(candidate) === domain,
        ) ?? rule;
      return {
        domain,
        status: "already-unblocked",
        message: `${domain} is already unblocked`,
        rule: existing.trim(),
        backup: outcome.backup,
        stage: outcome.stage,
      };
    }

    return {
      domain,
      status: "unblocked",
      message: `${domain} has been unblocked`,
      rule,
      backup: outcome.backup,
      stage: outcome.stage,
    };
  }

  /** Replaces the whole user rule list; a list equal to the current one is a no-op. */
  async replaceRules(
    input: unknown,
    origin: MutationOrigin = "set-rules",
  ): Promise<ReplaceRulesResult> {
    const rules = validateRules(input);
    const outcome = await this.mutate(origin, () => rules);

    const before = new Set(allowedDomains(outcome.previous));
    const after = allowedDomains(rules);
    const unblocked = after.filter((domain) => !before.has(domain));
    const alreadyUnblocked = after.filter((domain) => before.has(domain));

    return {
      ...outcome,
      origin,
      message: this.describeReplacement(outcome, unblocked, alreadyUnblocked),
      unblocked,
      alreadyUnblocked,
    };
  }

  /** Re-applies a stored backup. The restore is itself backed up first. */
  async restoreBackup(id: string): Promise<RestoreBackupResult> {
    const stored = await this.backups.read(id);
    const { rules, ...restoredFrom } = stored;
    this.logger.log(`Restoring rules backup ${id} (${rules.length} rules)`);

    const result = await this.replaceRules(rules, "restore");
    return { ...result, restoredFrom };
  }

  private describeReplacement(
    outcome: MutationOutcome,
    unblocked: string[],
    alreadyUnblocked: string[],
  ): string {
    if (outcome.changed) {
      if (unblocked.length === 1) {
        return `${unblocked[0]} has been unblocked`;
      }
      if (unblocked.length > 1) {
        return `${listDomains(unblocked)} have been unblocked`;
      }
      return `Rules updated (${outcome.rules.length} rules)`;
    }

    if (alreadyUnblocked.length === 1) {
      return `${alreadyUnblocked[0]} is already unblocked`;
    }
    if (alreadyUnblocked.length > 1) {
      return `${listDomains(alreadyUnblocked)} are already unblocked`;
    }
    return "Rules are unchanged";
  }

  private async mutate(
    origin: MutationOrigin,
    plan: (snapshot: string[]) => string[],
    subject?: string,
  ): Promise<MutationOutcome> {
    const label = subject ? `${origin} ${subject}` : origin;
    let stage: MutationStage = "start";
    const advance = (next: MutationStage): void => {
      stage = next;
      this.logger.debug(`${label}: ${next}`);
    };
    advance("start");

    let snapshot: string[];
    try {
      snapshot = await this.adguardService.getRules();
    } catch (error) {
      throw this.withStage(error, stage);
    }
    advance("snapshot-fetched");

    let backup: RulesBackupMetadata;
    try {
      backup = await this.backups.write(snapshot);
    } catch (error) {
      throw this.withStage(error, stage);
    }
    advance("backup-written");

    const next = plan(snapshot);
    if (sameRules(next, snapshot)) {
      advance("success");
      this.logger.log(`${label}: rules already in place, nothing to apply`);
      return {
        changed: false,
        previous: snapshot,
        rules: snapshot,
        backup,
        stage,
      };
    }

    advance("mutation-attempted");
    try {
      await this.adguardService.setRules(next);
      await this.verify(next);
    } catch (error) {
      const failure = toFilteringException(error);
      this.logger.warn(`${label} failed: ${failure.message}; rolling back`);

      const rollbackFailure = await this.rollback(snapshot);
      if (rollbackFailure) {
        advance("rollback-failed");
        this.logger.error(
          `${label}: rollback failed (${rollbackFailure.message}); restore backup ${backup.id} manually`,
        );
        throw new RollbackFailedException(failure, rollbackFailure, {
          backupId: backup.id,
          stage,
        });
      }

      advance("rolled-back");
      this.logger.log(`${label}: previous rule set restored`);
      throw new RuleMutationException(failure, { backupId: backup.id, stage });
    }

    advance("success");
    this.logger.log(`${label}: applied ${next.length} rules (backup ${backup.id})`);
    return { changed: true, previous: snapshot, rules: next, backup, stage };
  }

  private async verify(expected: string[]): Promise<void> {
    const visible = await this.adguardService.getRules();
    if (!sameRules(visible, expected, true)) {
      throw new UpstreamProtocolException(
        "AdGuard Home did not keep the submitted rule set.",
        { expectedCount: expected.length, visibleCount: visible.length },
      );
    }
  }

  private async rollback(
    snapshot: string[],
  ): Promise<FilteringException | undefined> {
    try {
      await this.adguardService.setRules(snapshot);
      return undefined;
    } catch (error) {
      return toFilteringException(error);
    }
  }

  private withStage(error: unknown, stage: MutationStage): FilteringException {
    const failure = toFilteringException(error);
    return new FilteringException(
      failure.code,
      failure.message,
      failure.getStatus(),
      { ...failure.details, stage, restored: false },
    );
  }
}
