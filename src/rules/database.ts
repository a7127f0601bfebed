import { Severity, type Rule } from "../scanner/types.js";
import type { DatabaseSnapshot } from "../resources/types.js";

export const DATABASE_RULES: readonly Rule<DatabaseSnapshot>[] = [
  {
    id: "publicly-accessible",
    title: "Database instance is publicly accessible",
    severity: Severity.High,
    message: "RDS instance {resource_id} is publicly accessible.",
    predicate: (db) => db.publicly_accessible === true,
    remediation: "Set PubliclyAccessible to false and reach the database from inside the VPC.",
  },
  {
    id: "storage-not-encrypted",
    title: "Database storage is not encrypted",
    severity: Severity.High,
    message: "RDS instance {resource_id} storage encryption is not enabled.",
    // Unknown encryption state counts as unencrypted.
    predicate: (db) => db.storage_encrypted !== true,
    remediation: "Restore from an encrypted snapshot copy into a new encrypted instance.",
  },
  {
    id: "no-backup-retention",
    title: "Database has no automated backups",
    severity: Severity.Warning,
    message: "RDS instance {resource_id} has no backup retention configured.",
    predicate: (db) => (db.backup_retention_period ?? 0) === 0,
    remediation: "Set a backup retention period of at least 7 days.",
  },
];
