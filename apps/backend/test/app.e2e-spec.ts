import { INestApplication } from "@nestjs/common";
import { mkdtempSync, rmSync } from "fs";
import os from "os";
import { join } from "path";
import request from "supertest";
import { App } from "supertest/types";
import {
  UpstreamAuthException,
  UpstreamUnavailableException,
} from "../src/common/exceptions";
import { createTestApp } from "./create-test-app";
import { FakeAdGuard } from "./fake-adguard";

describe("AppController (e2e)", () => {
  let app: INestApplication<App>;
  let adguard: FakeAdGuard;
  let backupDir: string;

  beforeEach(async () => {
    backupDir = mkdtempSync(join(os.tmpdir(), "guardgate-app-e2e-"));
    adguard = new FakeAdGuard(["||ads.example^"]);
    app = await createTestApp(adguard, backupDir);
  });

  afterEach(async () => {
    await app.close();
    rmSync(backupDir, { recursive: true, force: true });
  });

  it("/health (GET)", async () => {
    const response = await request(app.getHttpServer())
      .get("/health")
      .expect(200);

    expect(response.body).toMatchObject({ status: "ok" });
    expect(typeof response.body.uptime).toBe("number");
  });

  it("/control/status (GET) reports a healthy upstream", async () => {
    const response = await request(app.getHttpServer())
      .get("/control/status")
      .expect(200);

    expect(response.body).toMatchObject({
      status: "ok",
      app: "up",
      upstream: { reachable: true },
      filteringEnabled: true,
    });
  });

  it("/control/status (GET) stays 200 when the upstream is down", async () => {
    adguard.getRulesError = new UpstreamUnavailableException(
      "Unable to reach AdGuard Home for filtering status.",
    );

    const response = await request(app.getHttpServer())
      .get("/control/status")
      .expect(200);

    expect(response.body).toMatchObject({
      status: "degraded",
      app: "up",
      upstream: {
        reachable: false,
        error: "Unable to reach AdGuard Home for filtering status.",
      },
      filteringEnabled: null,
    });
  });

  it("/control/status (GET) counts an auth refusal as reachable", async () => {
    adguard.getRulesError = new UpstreamAuthException(
      "AdGuard Home refused filtering status.",
    );

    const response = await request(app.getHttpServer())
      .get("/control/status")
      .expect(200);

    expect(response.body).toMatchObject({
      status: "degraded",
      upstream: { reachable: true },
      filteringEnabled: null,
    });
  });
});
