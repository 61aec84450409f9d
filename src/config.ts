import { z } from 'zod';

const booleanFromEnv = (defaultValue: boolean) =>
  z.enum(['true', 'false', '1', '0']).optional().transform(v => (v === undefined ? defaultValue : v === 'true' || v === '1'));

const envSchema = z.object({
  SQLKEEPER_USERNAME: z.string().min(1).max(128).optional(),
  SQLKEEPER_PASSWORD: z.string().max(128).optional(),
  SQLKEEPER_DOMAIN: z.string().min(1).max(255).optional(),
  SQLKEEPER_DESTINATION_USERNAME: z.string().min(1).max(128).optional(),
  SQLKEEPER_DESTINATION_PASSWORD: z.string().max(128).optional(),
  SQLKEEPER_ENCRYPT: booleanFromEnv(true),
  SQLKEEPER_TRUST_SERVER_CERTIFICATE: booleanFromEnv(false),
  SQLKEEPER_CONNECT_TIMEOUT_MS: z.coerce.number().int().min(1000).max(600000).default(15000),
  SQLKEEPER_RESTORE_PREFIX: z.string().max(64).default('testrestore-'),
});

export interface ConnectionSettings {
  encrypt: boolean;
  trustServerCertificate: boolean;
  connectTimeoutMs: number;
}

export interface CredentialSettings {
  username?: string;
  password?: string;
  domain?: string;
}

export interface AppConfig {
  connection: ConnectionSettings;
  source: CredentialSettings;
  destination: CredentialSettings;
  restorePrefix: string;
}

/**
 * Read configuration from the environment. Throws a ZodError on invalid values.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    connection: {
      encrypt: parsed.SQLKEEPER_ENCRYPT,
      trustServerCertificate: parsed.SQLKEEPER_TRUST_SERVER_CERTIFICATE,
      connectTimeoutMs: parsed.SQLKEEPER_CONNECT_TIMEOUT_MS,
    },
    source: {
      username: parsed.SQLKEEPER_USERNAME,
      password: parsed.SQLKEEPER_PASSWORD,
      domain: parsed.SQLKEEPER_DOMAIN,
    },
    destination: {
      username: parsed.SQLKEEPER_DESTINATION_USERNAME ?? parsed.SQLKEEPER_USERNAME,
      password: parsed.SQLKEEPER_DESTINATION_PASSWORD ?? parsed.SQLKEEPER_PASSWORD,
      domain: parsed.SQLKEEPER_DOMAIN,
    },
    restorePrefix: parsed.SQLKEEPER_RESTORE_PREFIX,
  };
}
