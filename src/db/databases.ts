import sql from 'mssql';
import type { ConnectionPool } from 'mssql';
import {
  DatabaseSummary,
  DatabaseDefinition,
  DatabaseDescriptor,
  DatabaseFileDescriptor,
  TemplateFileSizes,
} from '../engine/types.js';
import { quoteName } from '../utils/sql.js';
import { renderCreateDatabase } from './create-database.js';

// sys.database_files sizes are in 8 KB pages
const PAGE_KB = 8;

export async function listDatabases(pool: ConnectionPool): Promise<DatabaseSummary[]> {
  const result = await pool.request().query<{
    name: string;
    database_id: number;
    state_desc: string;
    recovery_model_desc: string;
  }>('SELECT name, database_id, state_desc, recovery_model_desc FROM sys.databases ORDER BY name');

  return result.recordset.map(row => ({
    name: row.name,
    databaseId: row.database_id,
    state: row.state_desc,
    recoveryModel: row.recovery_model_desc,
  }));
}

export async function databaseExists(pool: ConnectionPool, name: string): Promise<boolean> {
  const result = await pool.request()
    .input('name', sql.NVarChar(128), name)
    .query<{ found: number }>('SELECT COUNT(*) AS found FROM sys.databases WHERE name = @name');
  return (result.recordset[0]?.found ?? 0) > 0;
}

export async function dropDatabase(pool: ConnectionPool, name: string): Promise<void> {
  const quoted = quoteName(name);
  await pool.request()
    .input('name', sql.NVarChar(128), name)
    .query(`
      IF DATABASEPROPERTYEX(@name, 'Status') = 'ONLINE'
        ALTER DATABASE ${quoted} SET SINGLE_USER WITH ROLLBACK IMMEDIATE;
      DROP DATABASE ${quoted};
    `);
}

/**
 * Primary data file and log file sizes of the model database, which every new database copies
 */
export async function getTemplateFileSizes(pool: ConnectionPool): Promise<TemplateFileSizes> {
  const result = await pool.request().query<{ file_id: number; type: number; size: number }>(
    'SELECT file_id, type, size FROM model.sys.database_files'
  );
  const primary = result.recordset.find(f => f.file_id === 1);
  const log = result.recordset.find(f => f.type === 1);
  if (!primary || !log) {
    throw new Error('Could not read the model database file sizes');
  }
  return {
    primarySizeKb: primary.size * PAGE_KB,
    logSizeKb: log.size * PAGE_KB,
  };
}

export async function createDatabase(pool: ConnectionPool, definition: DatabaseDefinition): Promise<void> {
  for (const statement of renderCreateDatabase(definition)) {
    await pool.request().query(statement);
  }
}

export async function setDatabaseOwner(pool: ConnectionPool, name: string, login: string): Promise<void> {
  await pool.request().query(`ALTER AUTHORIZATION ON DATABASE::${quoteName(name)} TO ${quoteName(login)}`);
}

export async function setDefaultFileGroup(pool: ConnectionPool, name: string, fileGroup: string): Promise<void> {
  await pool.request().query(`ALTER DATABASE ${quoteName(name)} MODIFY FILEGROUP ${quoteName(fileGroup)} DEFAULT`);
}

interface DatabaseRow {
  name: string;
  state_desc: string;
  recovery_model_desc: string;
  collation_name: string | null;
  owner_name: string | null;
  create_date: Date;
}

interface FileRow {
  name: string;
  physical_name: string;
  type_desc: string;
  file_group: string | null;
  size: number;
}

function toFileType(typeDesc: string): DatabaseFileDescriptor['type'] {
  switch (typeDesc) {
    case 'LOG':
      return 'LOG';
    case 'FILESTREAM':
      return 'FILESTREAM';
    case 'FULLTEXT':
      return 'FULLTEXT';
    default:
      return 'ROWS';
  }
}

export async function getDatabase(pool: ConnectionPool, instance: string, name: string): Promise<DatabaseDescriptor | null> {
  const result = await pool.request()
    .input('name', sql.NVarChar(128), name)
    .query<DatabaseRow>(`
      SELECT d.name, d.state_desc, d.recovery_model_desc, d.collation_name,
             SUSER_SNAME(d.owner_sid) AS owner_name, d.create_date
      FROM sys.databases AS d
      WHERE d.name = @name
    `);
  const row = result.recordset[0];
  if (!row) {
    return null;
  }

  const files = await pool.request().query<FileRow>(`
    SELECT df.name, df.physical_name, df.type_desc, fg.name AS file_group, df.size
    FROM ${quoteName(name)}.sys.database_files AS df
    LEFT JOIN ${quoteName(name)}.sys.filegroups AS fg ON fg.data_space_id = df.data_space_id
    ORDER BY df.file_id
  `);

  const fileDescriptors: DatabaseFileDescriptor[] = files.recordset.map(f => ({
    logicalName: f.name,
    physicalName: f.physical_name,
    type: toFileType(f.type_desc),
    fileGroup: f.file_group,
    sizeMb: (f.size * PAGE_KB) / 1024,
  }));

  return {
    instance,
    name: row.name,
    status: row.state_desc,
    recoveryModel: row.recovery_model_desc,
    collation: row.collation_name,
    owner: row.owner_name,
    createDate: row.create_date,
    sizeMb: fileDescriptors.reduce((total, f) => total + f.sizeMb, 0),
    files: fileDescriptors,
  };
}
