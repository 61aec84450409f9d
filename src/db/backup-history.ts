import sql from 'mssql';
import type { ConnectionPool } from 'mssql';
import { BackupRecord } from '../engine/types.js';

export interface BackupSetRow {
  backup_set_id: number;
  media_set_id: number;
  position: number;
  server_name: string;
  database_name: string;
  backup_start_date: Date;
  backup_finish_date: Date;
  backup_size: number | string;
  compressed_backup_size: number | string | null;
  is_copy_only: boolean;
}

export interface MediaFamilyRow {
  physical_device_name: string;
  family_sequence_number: number;
  mirror: number;
}

// backup_size is NUMERIC(20,0); tedious hands large values back as strings
function toNumber(value: number | string | null): number | null {
  if (value === null) return null;
  return typeof value === 'number' ? value : Number(value);
}

/**
 * One path per stripe. Copies written with MIRROR TO are alternatives, not extra stripes.
 */
export function stripePaths(families: MediaFamilyRow[]): string[] {
  return families
    .filter(f => f.mirror === 0)
    .sort((a, b) => a.family_sequence_number - b.family_sequence_number)
    .map(f => f.physical_device_name);
}

export function toBackupRecord(backupSet: BackupSetRow, families: MediaFamilyRow[]): BackupRecord {
  return {
    serverName: backupSet.server_name,
    database: backupSet.database_name,
    paths: stripePaths(families),
    position: backupSet.position,
    totalSize: toNumber(backupSet.backup_size) ?? 0,
    compressedSize: toNumber(backupSet.compressed_backup_size),
    start: backupSet.backup_start_date,
    end: backupSet.backup_finish_date,
    isCopyOnly: backupSet.is_copy_only,
  };
}

/**
 * Most recent full (type D) backup of a database from msdb history, with every stripe's file.
 */
export async function getLastFullBackup(
  pool: ConnectionPool,
  database: string,
  options: { ignoreCopyOnly: boolean }
): Promise<BackupRecord | null> {
  const result = await pool.request()
    .input('database', sql.NVarChar(128), database)
    .input('ignoreCopyOnly', sql.Bit, options.ignoreCopyOnly)
    .query<BackupSetRow>(`
      SELECT TOP (1)
        bs.backup_set_id,
        bs.media_set_id,
        bs.position,
        bs.server_name,
        bs.database_name,
        bs.backup_start_date,
        bs.backup_finish_date,
        bs.backup_size,
        bs.compressed_backup_size,
        bs.is_copy_only
      FROM msdb.dbo.backupset AS bs
      WHERE bs.database_name = @database
        AND bs.type = 'D'
        AND (@ignoreCopyOnly = 0 OR bs.is_copy_only = 0)
      ORDER BY bs.backup_finish_date DESC, bs.backup_set_id DESC
    `);

  const backupSet = result.recordset[0];
  if (!backupSet) {
    return null;
  }

  const files = await pool.request()
    .input('mediaSetId', sql.Int, backupSet.media_set_id)
    .query<MediaFamilyRow>(`
      SELECT physical_device_name, family_sequence_number, mirror
      FROM msdb.dbo.backupmediafamily
      WHERE media_set_id = @mediaSetId
        AND mirror = 0
      ORDER BY family_sequence_number
    `);

  return toBackupRecord(backupSet, files.recordset);
}
