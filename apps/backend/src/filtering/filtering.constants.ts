export const RULES_BACKUP_OPTIONS_TOKEN = "RULES_BACKUP_OPTIONS";
