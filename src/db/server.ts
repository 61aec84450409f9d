import type { ConnectionPool } from 'mssql';
import { DefaultPaths } from '../engine/types.js';
import { trimTrailingSeparator, directoryName } from '../utils/paths.js';

export interface ServerInfo {
  productVersion: string;
  computerName: string;
  serviceAccount: string;
}

export async function getServerInfo(pool: ConnectionPool): Promise<ServerInfo> {
  const result = await pool.request().query<{
    product_version: string;
    computer_name: string | null;
    machine_name: string | null;
  }>(`
    SELECT
      CAST(SERVERPROPERTY('ProductVersion') AS NVARCHAR(128)) AS product_version,
      CAST(SERVERPROPERTY('ComputerNamePhysicalNetBIOS') AS NVARCHAR(128)) AS computer_name,
      CAST(SERVERPROPERTY('MachineName') AS NVARCHAR(128)) AS machine_name
  `);
  const row = result.recordset[0];
  if (!row) {
    throw new Error('Server did not return its properties');
  }

  // sys.dm_server_services needs VIEW SERVER STATE; fall back to unknown without it
  let serviceAccount = 'unknown';
  try {
    const services = await pool.request().query<{ service_account: string }>(`
      SELECT TOP (1) service_account
      FROM sys.dm_server_services
      WHERE servicename LIKE N'SQL Server (%'
    `);
    serviceAccount = services.recordset[0]?.service_account ?? serviceAccount;
  } catch (error) {
    console.warn('Could not read the service account:', error instanceof Error ? error.message : error);
  }

  return {
    productVersion: row.product_version,
    computerName: row.computer_name || row.machine_name || 'localhost',
    serviceAccount,
  };
}

/**
 * Default data, log and backup directories of the instance.
 * InstanceDefaultDataPath/LogPath exist from SQL Server 2012; older builds fall back to
 * the location of master's files.
 */
export async function getDefaultPaths(pool: ConnectionPool): Promise<DefaultPaths> {
  const props = await pool.request().query<{ data_path: string | null; log_path: string | null }>(`
    SELECT
      CAST(SERVERPROPERTY('InstanceDefaultDataPath') AS NVARCHAR(512)) AS data_path,
      CAST(SERVERPROPERTY('InstanceDefaultLogPath') AS NVARCHAR(512)) AS log_path
  `);

  let data = props.recordset[0]?.data_path ?? null;
  let log = props.recordset[0]?.log_path ?? null;

  if (!data || !log) {
    const master = await pool.request().query<{ type: number; physical_name: string }>(`
      SELECT type, physical_name FROM sys.master_files WHERE database_id = 1
    `);
    const masterData = master.recordset.find(f => f.type === 0);
    const masterLog = master.recordset.find(f => f.type === 1);
    data = data || (masterData ? directoryName(masterData.physical_name) : null);
    log = log || (masterLog ? directoryName(masterLog.physical_name) : data);
  }

  if (!data || !log) {
    throw new Error('Could not determine the default data and log directories');
  }

  const backup = await pool.request().query<{ Value: string; Data: string | null }>(`
    EXEC master.dbo.xp_instance_regread
      N'HKEY_LOCAL_MACHINE',
      N'Software\\Microsoft\\MSSQLServer\\MSSQLServer',
      N'BackupDirectory'
  `);
  const backupDir = backup.recordset[0]?.Data || data;

  return {
    data: trimTrailingSeparator(data),
    log: trimTrailingSeparator(log),
    backup: trimTrailingSeparator(backupDir),
  };
}
