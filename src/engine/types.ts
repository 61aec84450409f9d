/**
 * Collaborator contracts for the SQL Server engine and the script host's file system.
 *
 * The workflows in services/ only talk to these interfaces. The production implementations
 * live in sqlserver-instance.ts (mssql) and file-transfer.ts (fs/promises); tests use fakes.
 */

export interface SqlCredential {
  username: string;
  password: string;
  /** When set, the login is a Windows account authenticated over NTLM */
  domain?: string;
}

export interface ServerVersion {
  major: number;
  minor: number;
  build: number;
}

export interface DefaultPaths {
  data: string;
  log: string;
  backup: string;
}

export interface DatabaseSummary {
  name: string;
  databaseId: number;
  state: string;
  recoveryModel: string;
}

export interface BackupRecord {
  serverName: string;
  database: string;
  /** Full file names, one per backup stripe */
  paths: string[];
  /** Backup set number within the media set, for RESTORE ... WITH FILE */
  position: number;
  totalSize: number;
  compressedSize: number | null;
  start: Date;
  end: Date;
  isCopyOnly: boolean;
}

export interface BackupHeader {
  position: number;
  databaseName: string;
  serverName: string;
  backupSize: number;
  compressedBackupSize: number | null;
  backupStartDate: Date | null;
  databaseVersion: number | null;
}

export type BackupFileType = 'D' | 'L' | 'F' | 'S';

export interface BackupFileListEntry {
  logicalName: string;
  physicalName: string;
  type: BackupFileType;
}

export interface FileRelocation {
  logicalName: string;
  physicalName: string;
}

export interface RestoreRequest {
  database: string;
  paths: string[];
  position: number;
  relocations: FileRelocation[];
}

export interface OperationResult {
  success: boolean;
  message?: string;
}

export interface TemplateFileSizes {
  primarySizeKb: number;
  logSizeKb: number;
}

export type RecoveryModel = 'Simple' | 'Full' | 'BulkLogged';

export interface DatabaseFileDefinition {
  logicalName: string;
  physicalName: string;
  sizeKb?: number;
  growthKb?: number;
  /** Absent means UNLIMITED */
  maxSizeKb?: number;
}

export interface FileGroupDefinition {
  name: string;
  files: DatabaseFileDefinition[];
}

export interface DatabaseLayout {
  primary: FileGroupDefinition;
  secondary?: FileGroupDefinition;
  log: DatabaseFileDefinition;
}

export interface DatabaseDefinition {
  name: string;
  collation?: string;
  recoveryModel?: RecoveryModel;
  layout?: DatabaseLayout;
}

export interface DatabaseFileDescriptor {
  logicalName: string;
  physicalName: string;
  type: 'ROWS' | 'LOG' | 'FILESTREAM' | 'FULLTEXT';
  fileGroup: string | null;
  sizeMb: number;
}

export interface DatabaseDescriptor {
  instance: string;
  name: string;
  status: string;
  recoveryModel: string;
  collation: string | null;
  owner: string | null;
  createDate: Date;
  sizeMb: number;
  files: DatabaseFileDescriptor[];
}

/**
 * A live connection to one SQL Server instance.
 */
export interface SqlInstance {
  /** The instance name as the caller wrote it */
  readonly name: string;
  /** NetBIOS name of the host, used to build administrative share paths */
  readonly computerName: string;
  readonly version: ServerVersion;
  readonly serviceAccount: string;

  listDatabases(): Promise<DatabaseSummary[]>;
  databaseExists(name: string): Promise<boolean>;
  getDefaultPaths(): Promise<DefaultPaths>;

  getLastFullBackup(database: string, options: { ignoreCopyOnly: boolean }): Promise<BackupRecord | null>;
  readBackupHeader(paths: string[], position: number): Promise<BackupHeader>;
  readBackupFileList(paths: string[], position: number): Promise<BackupFileListEntry[]>;

  /** Whether the instance's service account can see the file or directory */
  testPath(path: string): Promise<boolean>;
  createDirectory(path: string): Promise<OperationResult>;

  restoreDatabase(request: RestoreRequest): Promise<OperationResult>;
  verifyBackup(paths: string[], position: number): Promise<OperationResult>;
  checkDatabase(name: string): Promise<OperationResult>;
  dropDatabase(name: string): Promise<void>;

  getTemplateFileSizes(): Promise<TemplateFileSizes>;
  createDatabase(definition: DatabaseDefinition): Promise<void>;
  setDatabaseOwner(name: string, login: string): Promise<void>;
  setDefaultFileGroup(name: string, fileGroup: string): Promise<void>;
  getDatabase(name: string): Promise<DatabaseDescriptor | null>;

  close(): Promise<void>;
}

export interface InstanceConnector {
  connect(instance: string, credential?: SqlCredential): Promise<SqlInstance>;
}

/**
 * File operations performed from the machine running the scripts, usually against
 * administrative shares of the database hosts.
 */
export interface FileTransfer {
  ensureDirectory(path: string): Promise<void>;
  copyFile(source: string, destination: string): Promise<{ fileSize: number }>;
  removeFile(path: string): Promise<void>;
  /** Returns true when the directory was empty and has been removed */
  removeDirectoryIfEmpty(path: string): Promise<boolean>;
}
