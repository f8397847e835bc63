/**
 * Filtering Controller
 *
 * HTTP surface used by the browser script and the web UI.
 *
 * API Endpoints:
 * - GET  /control/filtering/check_host?name=<domain> - Is the domain filtered, and by which rule
 * - POST /control/filtering/whitelist/add            - Unblock one domain ({ name })
 * - GET  /control/filtering/status                   - Filtering status and user rules
 * - POST /control/filtering/set_rules                - Replace the user rules ({ rules })
 *
 * Backups:
 * - GET  /control/filtering/backups             - List rule backups, newest first
 * - GET  /control/filtering/backups/:id         - Backup metadata and rules
 * - POST /control/filtering/backups/:id/restore - Re-apply a backup
 */

import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
  UseGuards,
} from "@nestjs/common";
import { Throttle, ThrottlerGuard } from "@nestjs/throttler";
import { AdGuardService } from "../adguard/adguard.service";
import type { DomainCheckResult, FilterStatus } from "../adguard/adguard.types";
import { RulesBackupService } from "./rules-backup.service";
import { RulesGuardService } from "./rules-guard.service";
import type {
  RestoreBackupResult,
  RulesBackup,
  RulesBackupMetadata,
  SetRulesResponse,
  UnblockResponse,
} from "./filtering.types";

/** Request body for unblocking a domain */
interface WhitelistAddBody {
  name?: unknown;
}

/** Request body for replacing the user rules */
interface SetRulesBody {
  rules?: unknown;
}

@Controller("control/filtering")
export class FilteringController {
  constructor(
    private readonly adguardService: AdGuardService,
    private readonly rulesGuard: RulesGuardService,
    private readonly backups: RulesBackupService,
  ) {}

  @Get("check_host")
  checkHost(@Query("name") name?: string): Promise<DomainCheckResult> {
    return this.adguardService.checkHost(name ?? "");
  }

  @Post("whitelist/add")
  @HttpCode(HttpStatus.OK)
  @UseGuards(ThrottlerGuard)
  @Throttle({ default: { limit: 20, ttl: 10000 } })
  async addToWhitelist(
    @Body() body: WhitelistAddBody,
  ): Promise<UnblockResponse> {
    const result = await this.rulesGuard.unblock(body?.name);
    return { success: true, ...result };
  }

  @Get("status")
  getStatus(): Promise<FilterStatus> {
    return this.adguardService.getStatus();
  }

  @Post("set_rules")
  @HttpCode(HttpStatus.OK)
  @UseGuards(ThrottlerGuard)
  @Throttle({ default: { limit: 20, ttl: 10000 } })
  async setRules(@Body() body: SetRulesBody): Promise<SetRulesResponse> {
    const result = await this.rulesGuard.replaceRules(body?.rules, "set-rules");
    return {
      success: true,
      changed: result.changed,
      message: result.message,
      unblocked: result.unblocked,
      alreadyUnblocked: result.alreadyUnblocked,
      backup: result.backup,
      stage: result.stage,
    };
  }

  @Get("backups")
  listBackups(): Promise<RulesBackupMetadata[]> {
    return this.backups.list();
  }

  @Get("backups/:id")
  getBackup(@Param("id") id: string): Promise<RulesBackup> {
    return this.backups.read(id);
  }

  @Post("backups/:id/restore")
  @HttpCode(HttpStatus.OK)
  @UseGuards(ThrottlerGuard)
  @Throttle({ default: { limit: 20, ttl: 10000 } })
  restoreBackup(@Param("id") id: string): Promise<RestoreBackupResult> {
    return this.rulesGuard.restoreBackup(id);
  }
}
