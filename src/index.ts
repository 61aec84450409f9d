export { testLastBackup } from './services/backup-verifier.js';
export type { VerificationDependencies } from './services/backup-verifier.js';
export { newDatabase } from './services/database-provisioner.js';
export type { ProvisioningDependencies } from './services/database-provisioner.js';
export type { LastBackupTestResult } from './services/verification-plan.js';
export { testLastBackupSchema } from './schemas/test-last-backup.js';
export type { TestLastBackupInput, TestLastBackupOptions } from './schemas/test-last-backup.js';
export { newDatabaseSchema } from './schemas/new-database.js';
export type { NewDatabaseInput, NewDatabaseOptions } from './schemas/new-database.js';
export { createSqlServerConnector } from './engine/connection.js';
export { parseInstanceName } from './utils/instance-name.js';
export { localFileTransfer } from './engine/file-transfer.js';
export { createChangeGate } from './utils/change-gate.js';
export type { ChangeGate, ChangeMode } from './utils/change-gate.js';
export { createConsoleReporter } from './utils/reporter.js';
export type { Reporter } from './utils/reporter.js';
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
export type * from './engine/types.js';
