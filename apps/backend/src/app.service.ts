import { Injectable } from "@nestjs/common";

export interface HealthCheckBasic {
  status: "ok";
  timestamp: string;
  uptime: number;
}

export interface UpstreamHealth {
  reachable: boolean;
  error?: string;
}

export interface ControlStatus {
  status: "ok" | "degraded";
  app: "up";
  upstream: UpstreamHealth;
  /** Null when the upstream status could not be read. */
  filteringEnabled: boolean | null;
  timestamp: string;
  uptime: number;
}

@Injectable()
export class AppService {
  private readonly startTime = Date.now();

  getBasicHealth(): HealthCheckBasic {
    return {
      status: "ok",
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
    };
  }
}
