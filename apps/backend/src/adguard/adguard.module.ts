import { HttpModule } from "@nestjs/axios";
import { Module } from "@nestjs/common";
import { AdGuardSessionService } from "./adguard-session.service";
import { loadAdGuardConfig } from "./adguard.config";
import { ADGUARD_CONFIG_TOKEN } from "./adguard.constants";
import { AdGuardService } from "./adguard.service";
import type { AdGuardConfig } from "./adguard.types";

@Module({
  imports: [HttpModule],
  providers: [
    {
      provide: ADGUARD_CONFIG_TOKEN,
      useFactory: (): AdGuardConfig => loadAdGuardConfig(),
    },
    AdGuardSessionService,
    AdGuardService,
  ],
  exports: [AdGuardService],
})
export class AdGuardModule {}
