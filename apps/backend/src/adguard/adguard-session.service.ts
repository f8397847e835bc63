import { HttpService } from "@nestjs/axios";
import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
} from "@nestjs/common";
import { firstValueFrom } from "rxjs";
import {
  UpstreamAuthException,
  UpstreamProtocolException,
} from "../common/exceptions";
import { ADGUARD_CONFIG_TOKEN } from "./adguard.constants";
import {
  extractSessionCookie,
  normalizeUpstreamError,
  upstreamRequestConfig,
} from "./adguard.http";
import type { AdGuardConfig, UpstreamSession } from "./adguard.types";

/**
 * Owns the one AdGuard Home session this process uses.
 *
 * Lifecycle: `acquire()` logs in lazily, `invalidate()` discards a session the
 * upstream no longer accepts, and module shutdown logs out. Nothing else holds
 * the cookie.
 */
@Injectable()
export class AdGuardSessionService implements OnModuleDestroy {
  private readonly logger = new Logger(AdGuardSessionService.name);
  private current?: UpstreamSession;
  private pendingLogin?: Promise<UpstreamSession>;

  constructor(
    private readonly httpService: HttpService,
    @Inject(ADGUARD_CONFIG_TOKEN)
    private readonly config: AdGuardConfig,
  ) {}

  get authEnabled(): boolean {
    return this.config.credentials !== undefined;
  }

  /** Current session, logging in first if needed. Undefined when no credentials are configured. */
  async acquire(): Promise<UpstreamSession | undefined> {
    if (!this.authEnabled) {
      return undefined;
    }

    return this.current ?? this.login();
  }

  /** Drops `session` if it is still the current one; a newer session is kept. */
  invalidate(session: UpstreamSession | undefined): void {
    if (session && this.current === session) {
      this.current = undefined;
      this.logger.log("Discarded expired AdGuard Home session");
    }
  }

  /** Concurrent callers share a single in-flight login. */
  login(): Promise<UpstreamSession> {
    if (!this.pendingLogin) {
      this.pendingLogin = this.performLogin().finally(() => {
        this.pendingLogin = undefined;
      });
    }
    return this.pendingLogin;
  }

  async onModuleDestroy(): Promise<void> {
    const session = this.current;
    if (!session) {
      return;
    }

    this.current = undefined;

    try {
      await firstValueFrom(
        this.httpService.get("/control/logout", {
          ...upstreamRequestConfig(this.config, session),
          validateStatus: (status) => status < 400,
        }),
      );
      this.logger.log("Logged out of AdGuard Home");
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      this.logger.debug(`AdGuard Home logout failed (ignored): ${message}`);
    }
  }

  private async performLogin(): Promise<UpstreamSession> {
    const credentials = this.config.credentials;
    if (!credentials) {
      throw new UpstreamAuthException(
        "AdGuard Home credentials are not configured.",
      );
    }

    this.logger.log("Authenticating with AdGuard Home");

    let setCookie: unknown;
    try {
      const response = await firstValueFrom(
        this.httpService.post<unknown>(
          "/control/login",
          { name: credentials.username, password: credentials.password },
          upstreamRequestConfig(this.config),
        ),
      );
      setCookie = response.headers["set-cookie"];
    } catch (error) {
      throw normalizeUpstreamError(error, "login", this.logger);
    }

    const cookie = extractSessionCookie(setCookie);
    if (!cookie) {
      this.logger.error("AdGuard Home login succeeded without a session cookie");
      throw new UpstreamProtocolException(
        "AdGuard Home accepted the login but did not issue a session cookie.",
      );
    }

    const session: UpstreamSession = {
      cookie,
      createdAt: new Date().toISOString(),
    };
    this.current = session;
    this.logger.log("Authenticated with AdGuard Home");
    return session;
  }
}
