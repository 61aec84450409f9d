import sql from 'mssql';
import type { ConnectionPool } from 'mssql';
import { OperationResult } from '../engine/types.js';

interface FileExistRow {
  'File Exists': number;
  'File is a Directory': number;
  'Parent Directory Exists': number;
}

/**
 * Ask the instance whether its service account can see a file or directory
 */
export async function testPath(pool: ConnectionPool, path: string): Promise<boolean> {
  const result = await pool.request()
    .input('path', sql.NVarChar(4000), path)
    .query<FileExistRow>('EXEC master.dbo.xp_fileexist @path');

  const row = result.recordset[0];
  if (!row) return false;
  return row['File Exists'] === 1 || row['File is a Directory'] === 1;
}

/**
 * Create a directory (and its parents) as the instance's service account
 */
export async function createDirectory(pool: ConnectionPool, path: string): Promise<OperationResult> {
  try {
    await pool.request()
      .input('path', sql.NVarChar(4000), path)
      .query('EXEC master.dbo.xp_create_subdir @path');
    return { success: await testPath(pool, path) };
  } catch (error) {
    return { success: false, message: error instanceof Error ? error.message : String(error) };
  }
}
