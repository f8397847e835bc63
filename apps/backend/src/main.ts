import "reflect-metadata";
import "dotenv/config";
import { Logger, LogLevel } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { NestExpressApplication } from "@nestjs/platform-express";
import { readFileSync } from "fs";
import { resolve } from "path";
import { AppModule } from "./app.module";

const DEFAULT_PORT = 8000;

function logLevels(): LogLevel[] {
  return process.env.LOG_LEVEL === "debug" ?
      ["error", "warn", "log", "debug", "verbose"]
    : ["error", "warn", "log"];
}

function loadHttpsOptions(
  logger: Logger,
): { key: Buffer; cert: Buffer } | undefined {
  if (process.env.HTTPS_ENABLED !== "true") {
    return undefined;
  }

  const certPath = process.env.HTTPS_CERT_PATH;
  const keyPath = process.env.HTTPS_KEY_PATH;

  if (!certPath || !keyPath) {
    throw new Error(
      "HTTPS_ENABLED is true but HTTPS_CERT_PATH or HTTPS_KEY_PATH is missing",
    );
  }

  const options = {
    cert: readFileSync(resolve(certPath)),
    key: readFileSync(resolve(keyPath)),
  };
  logger.log(`HTTPS certificates loaded (certificate: ${certPath})`);
  return options;
}

async function bootstrap() {
  const logger = new Logger("Bootstrap");

  const trustProxyEnabled = process.env.TRUST_PROXY === "true";
  const trustProxyHops = Number.parseInt(
    process.env.TRUST_PROXY_HOPS ?? "1",
    10,
  );
  const trustProxyValue =
    Number.isFinite(trustProxyHops) && trustProxyHops > 0 ? trustProxyHops : 1;

  const httpsOptions = loadHttpsOptions(logger);

  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    httpsOptions,
    logger: logLevels(),
  });

  if (trustProxyEnabled) {
    app.set("trust proxy", trustProxyValue);
    logger.log(
      `Reverse proxy trust enabled (trust proxy = ${trustProxyValue}).`,
    );
  }

  // The userscript runs on arbitrary sites, so origins must be listed explicitly
  const corsOrigins = process.env.CORS_ORIGINS?.split(",")
    .map((o) => o.trim())
    .filter(Boolean);
  if (corsOrigins && corsOrigins.length > 0) {
    app.enableCors({ origin: corsOrigins });
    logger.log(`CORS enabled for origins: ${corsOrigins.join(", ")}`);
  } else if (process.env.NODE_ENV === "development") {
    app.enableCors();
    logger.log("CORS enabled for all origins (development mode)");
  }

  app.enableShutdownHooks();

  const port = Number.parseInt(process.env.PORT ?? "", 10) || DEFAULT_PORT;
  await app.listen(port);

  const protocol = httpsOptions ? "https" : "http";
  logger.log(`Application is running on: ${protocol}://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger("Bootstrap").error(
    "Failed to start",
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
