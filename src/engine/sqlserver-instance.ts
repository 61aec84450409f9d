import type { ConnectionPool } from 'mssql';
import {
  SqlInstance,
  ServerVersion,
  DatabaseSummary,
  DefaultPaths,
  BackupRecord,
  BackupHeader,
  BackupFileListEntry,
  OperationResult,
  RestoreRequest,
  TemplateFileSizes,
  DatabaseDefinition,
  DatabaseDescriptor,
} from './types.js';
import { getServerInfo, getDefaultPaths } from '../db/server.js';
import { getLastFullBackup } from '../db/backup-history.js';
import { testPath, createDirectory } from '../db/files.js';
import { readBackupHeader, readBackupFileList, restoreDatabase, verifyBackup, checkDatabase } from '../db/restore.js';
import {
  listDatabases,
  databaseExists,
  dropDatabase,
  getTemplateFileSizes,
  createDatabase,
  setDatabaseOwner,
  setDefaultFileGroup,
  getDatabase,
} from '../db/databases.js';
import { parseServerVersion } from '../utils/versions.js';

/**
 * SqlInstance over an mssql connection pool. Every call queries the server, so the
 * catalog it reports is never stale after a restore or drop.
 */
export class SqlServerInstance implements SqlInstance {
  private constructor(
    readonly name: string,
    readonly computerName: string,
    readonly version: ServerVersion,
    readonly serviceAccount: string,
    private readonly pool: ConnectionPool
  ) {}

  static async open(name: string, pool: ConnectionPool): Promise<SqlServerInstance> {
    const info = await getServerInfo(pool);
    return new SqlServerInstance(
      name,
      info.computerName,
      parseServerVersion(info.productVersion),
      info.serviceAccount,
      pool
    );
  }

  listDatabases(): Promise<DatabaseSummary[]> {
    return listDatabases(this.pool);
  }

  databaseExists(name: string): Promise<boolean> {
    return databaseExists(this.pool, name);
  }

  getDefaultPaths(): Promise<DefaultPaths> {
    return getDefaultPaths(this.pool);
  }

  getLastFullBackup(database: string, options: { ignoreCopyOnly: boolean }): Promise<BackupRecord | null> {
    return getLastFullBackup(this.pool, database, options);
  }

  readBackupHeader(paths: string[], position: number): Promise<BackupHeader> {
    return readBackupHeader(this.pool, paths, position);
  }

  readBackupFileList(paths: string[], position: number): Promise<BackupFileListEntry[]> {
    return readBackupFileList(this.pool, paths, position);
  }

  testPath(path: string): Promise<boolean> {
    return testPath(this.pool, path);
  }

  createDirectory(path: string): Promise<OperationResult> {
    return createDirectory(this.pool, path);
  }

  restoreDatabase(request: RestoreRequest): Promise<OperationResult> {
    return restoreDatabase(this.pool, request);
  }

  verifyBackup(paths: string[], position: number): Promise<OperationResult> {
    return verifyBackup(this.pool, paths, position);
  }

  checkDatabase(name: string): Promise<OperationResult> {
    return checkDatabase(this.pool, name);
  }

  dropDatabase(name: string): Promise<void> {
    return dropDatabase(this.pool, name);
  }

  getTemplateFileSizes(): Promise<TemplateFileSizes> {
    return getTemplateFileSizes(this.pool);
  }

  createDatabase(definition: DatabaseDefinition): Promise<void> {
    return createDatabase(this.pool, definition);
  }

  setDatabaseOwner(name: string, login: string): Promise<void> {
    return setDatabaseOwner(this.pool, name, login);
  }

  setDefaultFileGroup(name: string, fileGroup: string): Promise<void> {
    return setDefaultFileGroup(this.pool, name, fileGroup);
  }

  getDatabase(name: string): Promise<DatabaseDescriptor | null> {
    return getDatabase(this.pool, this.name, name);
  }

  async close(): Promise<void> {
    await this.pool.close();
  }
}
