import { HttpException, HttpStatus } from "@nestjs/common";

/**
 * Stable error codes shared by the upstream client and the rule-mutation
 * guard. They appear verbatim in the `error` field of every failure body.
 */
export type FilteringErrorCode =
  | "InvalidInput"
  | "UpstreamAuthError"
  | "UpstreamUnavailable"
  | "UpstreamProtocolError"
  | "BackupWriteError"
  | "BackupReadError"
  | "BackupNotFound"
  | "RollbackFailed";

export type ExceptionDetails = Record<string, unknown>;

export class FilteringException extends HttpException {
  constructor(
    readonly code: FilteringErrorCode,
    message: string,
    status: number,
    readonly details: ExceptionDetails = {},
  ) {
    super({ statusCode: status, error: code, message, ...details }, status);
  }
}

export class InvalidInputException extends FilteringException {
  constructor(message: string, details?: ExceptionDetails) {
    super("InvalidInput", message, HttpStatus.BAD_REQUEST, details);
  }
}

export class UpstreamAuthException extends FilteringException {
  constructor(
    message: string,
    status: HttpStatus.UNAUTHORIZED | HttpStatus.FORBIDDEN = HttpStatus.UNAUTHORIZED,
    details?: ExceptionDetails,
  ) {
    super("UpstreamAuthError", message, status, details);
  }
}

export class UpstreamUnavailableException extends FilteringException {
  constructor(message: string, details?: ExceptionDetails) {
    super("UpstreamUnavailable", message, HttpStatus.SERVICE_UNAVAILABLE, details);
  }
}

export class UpstreamProtocolException extends FilteringException {
  constructor(message: string, details?: ExceptionDetails) {
    super("UpstreamProtocolError", message, HttpStatus.BAD_GATEWAY, details);
  }
}

export class BackupWriteException extends FilteringException {
  constructor(message: string, details?: ExceptionDetails) {
    super(
      "BackupWriteError",
      message,
      HttpStatus.INTERNAL_SERVER_ERROR,
      details,
    );
  }
}

export class BackupReadException extends FilteringException {
  constructor(message: string, details?: ExceptionDetails) {
    super(
      "BackupReadError",
      message,
      HttpStatus.INTERNAL_SERVER_ERROR,
      details,
    );
  }
}

export class BackupNotFoundException extends FilteringException {
  constructor(backupId: string) {
    super("BackupNotFound", `Backup "${backupId}" was not found.`, HttpStatus.NOT_FOUND, {
      backupId,
    });
  }
}

/**
 * A failed mutation whose rollback succeeded. Keeps the code and status of the
 * original failure.
 */
export class RuleMutationException extends FilteringException {
  constructor(
    readonly original: FilteringException,
    details: ExceptionDetails = {},
  ) {
    super(
      original.code,
      `${original.message} The previous rule set was restored.`,
      original.getStatus(),
      { ...original.details, ...details, restored: true },
    );
  }
}

export class RollbackFailedException extends FilteringException {
  constructor(
    readonly original: FilteringException,
    readonly rollbackError: FilteringException,
    details: ExceptionDetails & { backupId: string },
  ) {
    super(
      "RollbackFailed",
      `${original.message} The previous rule set could not be restored (${rollbackError.message}); ` +
        `AdGuard Home may still hold the new rule set. Restore backup ${details.backupId} manually.`,
      HttpStatus.INTERNAL_SERVER_ERROR,
      {
        ...details,
        cause: original.code,
        rollbackError: rollbackError.message,
        restored: false,
      },
    );
  }
}

export function toFilteringException(error: unknown): FilteringException {
  if (error instanceof FilteringException) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new UpstreamUnavailableException(
    `Unexpected error while talking to AdGuard Home: ${message}`,
  );
}
