import { Controller, Get, Logger } from "@nestjs/common";
import { AdGuardService } from "./adguard/adguard.service";
import { AppService } from "./app.service";
import type { ControlStatus, HealthCheckBasic } from "./app.service";
import { toFilteringException } from "./common/exceptions";

@Controller()
export class AppController {
  private readonly logger = new Logger(AppController.name);

  constructor(
    private readonly appService: AppService,
    private readonly adguardService: AdGuardService,
  ) {}

  // Liveness only, for Docker health checks
  @Get("health")
  getHealth(): HealthCheckBasic {
    return this.appService.getBasicHealth();
  }

  @Get("control/status")
  async getControlStatus(): Promise<ControlStatus> {
    const { timestamp, uptime } = this.appService.getBasicHealth();

    try {
      const status = await this.adguardService.getStatus();
      return {
        status: "ok",
        app: "up",
        upstream: { reachable: true },
        filteringEnabled: status.enabled,
        timestamp,
        uptime,
      };
    } catch (error) {
      const failure = toFilteringException(error);
      this.logger.warn(`AdGuard Home status check failed: ${failure.message}`);
      return {
        status: "degraded",
        app: "up",
        upstream: {
          // Any answer, even a refusal, means the upstream is reachable
          reachable: failure.code !== "UpstreamUnavailable",
          error: failure.message,
        },
        filteringEnabled: null,
        timestamp,
        uptime,
      };
    }
  }
}
