import sql from 'mssql';
import type { ConnectionPool } from 'mssql';
import {
  BackupHeader,
  BackupFileListEntry,
  BackupFileType,
  RestoreRequest,
  OperationResult,
} from '../engine/types.js';
import { quoteName, quoteString, diskList } from '../utils/sql.js';

export interface HeaderRow {
  Position: number;
  DatabaseName: string;
  ServerName: string;
  BackupSize: number | string;
  CompressedBackupSize: number | string | null;
  BackupStartDate: Date | null;
  DatabaseVersion: number | null;
}

interface FileListRow {
  LogicalName: string;
  PhysicalName: string;
  Type: string;
}

function toNumber(value: number | string | null): number | null {
  if (value === null) return null;
  return typeof value === 'number' ? value : Number(value);
}

function toFileType(value: string): BackupFileType {
  switch (value) {
    case 'D':
    case 'L':
    case 'F':
    case 'S':
      return value;
    default:
      throw new Error(`Unknown backup file type: ${value}`);
  }
}

function failure(error: unknown): OperationResult {
  return { success: false, message: error instanceof Error ? error.message : String(error) };
}

/**
 * HEADERONLY returns one row per backup set on the media
 */
export function selectBackupSet(rows: HeaderRow[], position: number): BackupHeader | null {
  const row = rows.find(r => r.Position === position);
  if (!row) {
    return null;
  }

  return {
    position: row.Position,
    databaseName: row.DatabaseName,
    serverName: row.ServerName,
    backupSize: toNumber(row.BackupSize) ?? 0,
    compressedBackupSize: toNumber(row.CompressedBackupSize),
    backupStartDate: row.BackupStartDate,
    databaseVersion: row.DatabaseVersion,
  };
}

/**
 * Striped backups must be read with every stripe.
 */
export async function readBackupHeader(pool: ConnectionPool, paths: string[], position: number): Promise<BackupHeader> {
  const result = await pool.request().query<HeaderRow>(`RESTORE HEADERONLY FROM ${diskList(paths)}`);
  const header = selectBackupSet(result.recordset, position);
  if (!header) {
    throw new Error(`Backup set ${position} not found in ${paths.join(', ')}`);
  }
  return header;
}

export async function readBackupFileList(
  pool: ConnectionPool,
  paths: string[],
  position: number
): Promise<BackupFileListEntry[]> {
  const result = await pool.request().query<FileListRow>(
    `RESTORE FILELISTONLY FROM ${diskList(paths)} WITH FILE = ${position}`
  );
  return result.recordset.map(row => ({
    logicalName: row.LogicalName,
    physicalName: row.PhysicalName,
    type: toFileType(row.Type),
  }));
}

export function buildRestoreStatement(request: RestoreRequest): string {
  const options = [
    `FILE = ${request.position}`,
    ...request.relocations.map(r => `MOVE ${quoteString(r.logicalName)} TO ${quoteString(r.physicalName)}`),
    'RECOVERY',
    'STATS = 10',
  ];
  return `RESTORE DATABASE ${quoteName(request.database)} FROM ${diskList(request.paths)} WITH ${options.join(', ')}`;
}

/**
 * Restore and report whether the database came online
 */
export async function restoreDatabase(pool: ConnectionPool, request: RestoreRequest): Promise<OperationResult> {
  try {
    await pool.request().query(buildRestoreStatement(request));
  } catch (error) {
    return failure(error);
  }

  const state = await pool.request()
    .input('name', sql.NVarChar(128), request.database)
    .query<{ state_desc: string }>('SELECT state_desc FROM sys.databases WHERE name = @name');
  const stateDesc = state.recordset[0]?.state_desc;

  if (stateDesc !== 'ONLINE') {
    return { success: false, message: `Restored database is ${stateDesc ?? 'missing'}` };
  }
  return { success: true };
}

export async function verifyBackup(pool: ConnectionPool, paths: string[], position: number): Promise<OperationResult> {
  try {
    await pool.request().query(`RESTORE VERIFYONLY FROM ${diskList(paths)} WITH FILE = ${position}`);
    return { success: true };
  } catch (error) {
    return failure(error);
  }
}

/**
 * DBCC CHECKDB reports corruption as errors, which the driver raises
 */
export async function checkDatabase(pool: ConnectionPool, name: string): Promise<OperationResult> {
  try {
    await pool.request().query(`DBCC CHECKDB (${quoteName(name)}) WITH NO_INFOMSGS, ALL_ERRORMSGS`);
    return { success: true };
  } catch (error) {
    return failure(error);
  }
}
