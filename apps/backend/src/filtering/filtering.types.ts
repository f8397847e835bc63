export interface RulesBackupOptions {
  /** When set, the only directory backups are written to. */
  directory?: string;
}

export interface RulesBackupMetadata {
  id: string;
  createdAt: string;
  ruleCount: number;
  sizeBytes: number;
}

export interface RulesBackup extends RulesBackupMetadata {
  rules: string[];
}

export type MutationStage =
  | "start"
  | "snapshot-fetched"
  | "backup-written"
  | "mutation-attempted"
  | "success"
  | "rolled-back"
  | "rollback-failed";

export type MutationOrigin = "unblock" | "set-rules" | "restore";

export interface MutationOutcome {
  changed: boolean;
  /** Rules as they were before the attempt; also the content of `backup`. */
  previous: string[];
  rules: string[];
  backup: RulesBackupMetadata;
  stage: MutationStage;
}

export interface UnblockResult {
  domain: string;
  status: "unblocked" | "already-unblocked";
  message: string;
  rule: string;
  backup: RulesBackupMetadata;
  stage: MutationStage;
}

export interface ReplaceRulesResult extends MutationOutcome {
  origin: MutationOrigin;
  message: string;
  /** Domains whose allow rule is new in `rules`. */
  unblocked: string[];
  /** Domains whose allow rule was already in `previous`. */
  alreadyUnblocked: string[];
}

export interface RestoreBackupResult extends ReplaceRulesResult {
  restoredFrom: RulesBackupMetadata;
}

export interface SetRulesResponse {
  success: true;
  changed: boolean;
  message: string;
  unblocked: string[];
  alreadyUnblocked: string[];
  backup: RulesBackupMetadata;
  stage: MutationStage;
}

export interface UnblockResponse extends UnblockResult {
  success: true;
}
