import sql from 'mssql';
import type { config as PoolConfig } from 'mssql';
import { ConnectionSettings } from '../config.js';
import { InstanceConnector, SqlCredential, SqlInstance } from './types.js';
import { SqlServerInstance } from './sqlserver-instance.js';
import { parseInstanceName } from '../utils/instance-name.js';

export function buildPoolConfig(
  instance: string,
  credential: SqlCredential,
  settings: ConnectionSettings
): PoolConfig {
  const address = parseInstanceName(instance);

  const config: PoolConfig = {
    server: address.host,
    port: address.port,
    database: 'master',
    connectionTimeout: settings.connectTimeoutMs,
    // Restores and DBCC CHECKDB run for as long as the engine needs
    requestTimeout: 0,
    pool: { max: 1, min: 0, idleTimeoutMillis: 30000 },
    options: {
      encrypt: settings.encrypt,
      trustServerCertificate: settings.trustServerCertificate,
      instanceName: address.instanceName,
      appName: 'sqlkeeper',
    },
  };

  config.user = credential.username;
  config.password = credential.password;
  // mssql switches tedious to NTLM when a domain is present
  if (credential.domain) {
    config.domain = credential.domain;
  }

  return config;
}

/**
 * Connector backed by the mssql client. One pool (of one connection) per instance handle.
 */
export function createSqlServerConnector(
  settings: ConnectionSettings,
  defaultCredential?: SqlCredential
): InstanceConnector {
  return {
    async connect(instance: string, credential?: SqlCredential): Promise<SqlInstance> {
      const effective = credential ?? defaultCredential;
      if (!effective) {
        throw new Error(`No credentials available to connect to ${instance}`);
      }

      const pool = new sql.ConnectionPool(buildPoolConfig(instance, effective, settings));
      await pool.connect();

      try {
        return await SqlServerInstance.open(instance, pool);
      } catch (error) {
        await pool.close();
        throw error;
      }
    },
  };
}
