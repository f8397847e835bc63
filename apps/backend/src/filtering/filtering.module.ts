import { Module } from "@nestjs/common";
import { ThrottlerModule } from "@nestjs/throttler";
import { AdGuardModule } from "../adguard/adguard.module";
import { RULES_BACKUP_OPTIONS_TOKEN } from "./filtering.constants";
import { FilteringController } from "./filtering.controller";
import type { RulesBackupOptions } from "./filtering.types";
import { RulesBackupService } from "./rules-backup.service";
import { RulesGuardService } from "./rules-guard.service";

@Module({
  imports: [
    AdGuardModule,
    // Mutations only: 20 requests per 10 seconds per client
    ThrottlerModule.forRoot([{ ttl: 10000, limit: 20 }]),
  ],
  controllers: [FilteringController],
  providers: [
    {
      provide: RULES_BACKUP_OPTIONS_TOKEN,
      useFactory: (): RulesBackupOptions => ({
        directory: process.env.RULES_BACKUP_DIR?.trim() || undefined,
      }),
    },
    RulesBackupService,
    RulesGuardService,
  ],
})
export class FilteringModule {}
