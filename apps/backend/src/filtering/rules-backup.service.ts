import { Inject, Injectable, Logger } from "@nestjs/common";
import crypto from "crypto";
import { promises as fs } from "fs";
import os from "os";
import { join } from "path";
import {
  BackupNotFoundException,
  BackupReadException,
  BackupWriteException,
  InvalidInputException,
} from "../common/exceptions";
import { RULES_BACKUP_OPTIONS_TOKEN } from "./filtering.constants";
import type {
  RulesBackup,
  RulesBackupMetadata,
  RulesBackupOptions,
} from "./filtering.types";

const BACKUP_ID_PATTERN = /^\d{13}-[0-9a-f]{12}$/;
const BACKUP_FILE_PATTERN = /^rules-(\d{13}-[0-9a-f]{12})\.txt$/;

/** One rule per line, newline terminated. An empty list is an empty file. */
export function serializeRules(rules: readonly string[]): string {
  return rules.length === 0 ? "" : `${rules.join("\n")}\n`;
}

export function parseRules(content: string): string[] {
  if (content === "") {
    return [];
  }
  const body = content.endsWith("\n") ? content.slice(0, -1) : content;
  return body.split("\n");
}

export function isBackupId(value: string): boolean {
  return BACKUP_ID_PATTERN.test(value);
}

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && "code" in error && typeof error.code === "string" ?
      error.code
    : undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Append-only store of pre-mutation rule lists. Each record is a plain text
 * file in the upstream line format, created exclusively and flushed to disk
 * before the caller is allowed to mutate anything. Records are never
 * overwritten or pruned here; retention is left to the operator.
 */
@Injectable()
export class RulesBackupService {
  private readonly logger = new Logger(RulesBackupService.name);
  private readonly baseDirCandidates: string[];
  private baseDir?: string;

  constructor(
    @Inject(RULES_BACKUP_OPTIONS_TOKEN)
    options: RulesBackupOptions,
  ) {
    const configured = options.directory?.trim();
    this.baseDirCandidates =
      configured ?
        [configured]
      : [
          join(process.cwd(), "data", "rules-backups"),
          join(os.tmpdir(), "guardgate-rules-backups"),
        ];
  }

  private async ensureBaseDir(): Promise<string> {
    if (this.baseDir) {
      return this.baseDir;
    }

    for (const dir of this.baseDirCandidates) {
      try {
        await fs.mkdir(dir, { recursive: true });
        this.baseDir = dir;
        this.logger.log(`Storing rule backups in ${dir}`);
        return dir;
      } catch (error) {
        this.logger.warn(
          `Failed to initialize backup dir candidate ${dir}: ${errorMessage(error)}`,
        );
      }
    }

    throw new BackupWriteException(
      "Unable to initialize the rules backup directory; no changes were made.",
      { directories: this.baseDirCandidates },
    );
  }

  private backupPath(dir: string, id: string): string {
    return join(dir, `rules-${id}.txt`);
  }

  private buildBackupId(content: string): string {
    const hash = crypto
      .createHash("sha256")
      .update(content)
      .update(crypto.randomBytes(8))
      .digest("hex")
      .slice(0, 12);
    return `${Date.now()}-${hash}`;
  }

  private toMetadata(id: string, content: string): RulesBackupMetadata {
    return {
      id,
      createdAt: new Date(Number(id.slice(0, 13))).toISOString(),
      ruleCount: parseRules(content).length,
      sizeBytes: Buffer.byteLength(content, "utf8"),
    };
  }

  /** Persists `rules` verbatim. Resolves only once the file is synced and closed. */
  async write(rules: readonly string[]): Promise<RulesBackupMetadata> {
    const dir = await this.ensureBaseDir();
    const content = serializeRules(rules);
    const id = this.buildBackupId(content);
    const path = this.backupPath(dir, id);

    try {
      const handle = await fs.open(path, "wx");
      try {
        await handle.writeFile(content, "utf8");
        await handle.sync();
      } finally {
        await handle.close();
      }
    } catch (error) {
      this.logger.error(`Failed to write rules backup ${path}: ${errorMessage(error)}`);
      throw new BackupWriteException(
        `Unable to write the rules backup (${errorMessage(error)}); no changes were made.`,
        { path },
      );
    }

    this.logger.log(`Saved rules backup ${id} (${rules.length} rules)`);
    return this.toMetadata(id, content);
  }

  /** Newest first. */
  async list(): Promise<RulesBackupMetadata[]> {
    const dir = await this.ensureBaseDir();

    let files: string[];
    try {
      files = await fs.readdir(dir);
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        return [];
      }
      this.logger.error(`Failed to list rules backups in ${dir}: ${errorMessage(error)}`);
      throw new BackupReadException(
        `Unable to list rules backups (${errorMessage(error)}).`,
        { path: dir },
      );
    }

    const backups: RulesBackupMetadata[] = [];

    for (const file of files) {
      const match = BACKUP_FILE_PATTERN.exec(file);
      if (!match) continue;

      try {
        const content = await fs.readFile(join(dir, file), "utf8");
        backups.push(this.toMetadata(match[1], content));
      } catch (error) {
        this.logger.warn(`Failed to read rules backup ${file}: ${errorMessage(error)}`);
      }
    }

    return backups.sort((a, b) => b.id.localeCompare(a.id));
  }

  async read(id: string): Promise<RulesBackup> {
    if (!isBackupId(id)) {
      throw new InvalidInputException(`"${id}" is not a valid backup id`, {
        backupId: id,
      });
    }

    const dir = await this.ensureBaseDir();

    const path = this.backupPath(dir, id);

    try {
      const content = await fs.readFile(path, "utf8");
      return { ...this.toMetadata(id, content), rules: parseRules(content) };
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        throw new BackupNotFoundException(id);
      }
      this.logger.error(`Failed to read rules backup ${path}: ${errorMessage(error)}`);
      throw new BackupReadException(
        `Unable to read backup "${id}" (${errorMessage(error)}).`,
        { backupId: id, path },
      );
    }
  }
}
