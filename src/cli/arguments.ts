import { parseArgs } from 'util';
import { ZodError, ZodIssue } from 'zod';
import { AppConfig, CredentialSettings } from '../config.js';
import { SqlCredential } from '../engine/types.js';
import { ChangeMode } from '../utils/change-gate.js';
import { testLastBackupSchema, TestLastBackupOptions } from '../schemas/test-last-backup.js';
import { newDatabaseSchema, NewDatabaseOptions } from '../schemas/new-database.js';

export type OutputFormat = 'list' | 'json';

export interface Invocation<T> {
  help: false;
  options: T;
  mode: ChangeMode;
  silent: boolean;
  format: OutputFormat;
}

export type ParsedCommand<T> = { help: true } | Invocation<T>;

/**
 * Raised for arguments that cannot be turned into valid options. Nothing has been contacted yet.
 */
export class UsageError extends Error {
  constructor(message: string, readonly details: string[] = []) {
    super(message);
    this.name = 'UsageError';
  }
}

export function formatZodError(error: ZodError): string[] {
  return error.issues.map((e: ZodIssue) => `${e.path.join('.')}: ${e.message}`);
}

const commonOptions = {
  'sql-instance': { type: 'string', short: 's', multiple: true },
  username: { type: 'string', short: 'u' },
  password: { type: 'string', short: 'p' },
  domain: { type: 'string' },
  whatif: { type: 'boolean', default: false },
  confirm: { type: 'boolean', default: false },
  silent: { type: 'boolean', default: false },
  format: { type: 'string', default: 'list' },
  help: { type: 'boolean', short: 'h', default: false },
} as const;

// NaN for anything that is not a number, which the schemas then reject
function toNumber(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  return value.trim() === '' ? Number.NaN : Number(value);
}

function toCredential(
  username: string | undefined,
  password: string | undefined,
  domain: string | undefined,
  fallback: CredentialSettings
): SqlCredential | undefined {
  const user = username ?? fallback.username;
  if (!user) return undefined;
  return {
    username: user,
    password: password ?? fallback.password ?? '',
    domain: domain ?? fallback.domain,
  };
}

function resolveMode(whatif: boolean, confirm: boolean): ChangeMode {
  if (whatif && confirm) {
    throw new UsageError('--whatif and --confirm cannot be combined');
  }
  if (whatif) return 'whatif';
  return confirm ? 'confirm' : 'execute';
}

function resolveFormat(value: string): OutputFormat {
  if (value !== 'list' && value !== 'json') {
    throw new UsageError(`Unsupported format: ${value}`);
  }
  return value;
}

function parse<T>(run: () => T): T {
  try {
    return run();
  } catch (error) {
    if (error instanceof ZodError) {
      throw new UsageError('Validation failed', formatZodError(error));
    }
    if (error instanceof UsageError) {
      throw error;
    }
    // parseArgs reports unknown or malformed options with a TypeError
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

export function parseTestLastBackupArgs(argv: string[], config: AppConfig): ParsedCommand<TestLastBackupOptions> {
  return parse((): ParsedCommand<TestLastBackupOptions> => {
    const { values } = parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        ...commonOptions,
        destination: { type: 'string', short: 'd' },
        'destination-username': { type: 'string' },
        'destination-password': { type: 'string' },
        database: { type: 'string', multiple: true },
        'exclude-database': { type: 'string', multiple: true },
        'data-directory': { type: 'string' },
        'log-directory': { type: 'string' },
        prefix: { type: 'string' },
        'verify-only': { type: 'boolean', default: false },
        'no-check': { type: 'boolean', default: false },
        'no-drop': { type: 'boolean', default: false },
        'copy-file': { type: 'boolean', default: false },
        'copy-path': { type: 'string' },
        'max-mb': { type: 'string' },
        'ignore-copy-only': { type: 'boolean', default: false },
      },
    });

    if (values.help) {
      return { help: true };
    }
    const invocation = {
      help: false as const,
      mode: resolveMode(values.whatif ?? false, values.confirm ?? false),
      silent: values.silent ?? false,
      format: resolveFormat(values.format ?? 'list'),
    };

    const sqlCredential = toCredential(values.username, values.password, values.domain, config.source);
    // A login named on the command line outranks the environment for both ends
    const destinationCredential =
      values['destination-username'] === undefined && values.username !== undefined
        ? sqlCredential
        : toCredential(
            values['destination-username'],
            values['destination-password'],
            values.domain,
            config.destination
          );

    const options = testLastBackupSchema.parse({
      sqlInstance: values['sql-instance'] ?? [],
      sqlCredential,
      destination: values.destination,
      destinationCredential,
      database: values.database,
      excludeDatabase: values['exclude-database'],
      dataDirectory: values['data-directory'],
      logDirectory: values['log-directory'],
      prefix: values.prefix ?? config.restorePrefix,
      verifyOnly: values['verify-only'] ?? false,
      noCheck: values['no-check'] ?? false,
      noDrop: values['no-drop'] ?? false,
      copyFile: values['copy-file'] ?? false,
      copyPath: values['copy-path'],
      maxMb: toNumber(values['max-mb']),
      ignoreCopyOnly: values['ignore-copy-only'] ?? false,
    });

    return { ...invocation, options };
  });
}

export function parseNewDatabaseArgs(argv: string[], config: AppConfig): ParsedCommand<NewDatabaseOptions> {
  return parse((): ParsedCommand<NewDatabaseOptions> => {
    const { values } = parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        ...commonOptions,
        name: { type: 'string', short: 'n', multiple: true },
        collation: { type: 'string' },
        'recovery-model': { type: 'string' },
        owner: { type: 'string' },
        'data-file-path': { type: 'string' },
        'log-file-path': { type: 'string' },
        'primary-file-size': { type: 'string' },
        'primary-file-growth': { type: 'string' },
        'primary-file-max-size': { type: 'string' },
        'log-size': { type: 'string' },
        'log-growth': { type: 'string' },
        'log-max-size': { type: 'string' },
        'secondary-file-size': { type: 'string' },
        'secondary-file-growth': { type: 'string' },
        'secondary-file-max-size': { type: 'string' },
        'secondary-file-count': { type: 'string' },
        'default-file-group': { type: 'string' },
        'data-file-suffix': { type: 'string' },
        'log-file-suffix': { type: 'string' },
        'secondary-data-file-suffix': { type: 'string' },
      },
    });

    if (values.help) {
      return { help: true };
    }
    const invocation = {
      help: false as const,
      mode: resolveMode(values.whatif ?? false, values.confirm ?? false),
      silent: values.silent ?? false,
      format: resolveFormat(values.format ?? 'list'),
    };

    const options = newDatabaseSchema.parse({
      sqlInstance: values['sql-instance'] ?? [],
      sqlCredential: toCredential(values.username, values.password, values.domain, config.source),
      name: values.name,
      collation: values.collation,
      recoveryModel: values['recovery-model'],
      owner: values.owner,
      dataFilePath: values['data-file-path'],
      logFilePath: values['log-file-path'],
      primaryFileSize: toNumber(values['primary-file-size']),
      primaryFileGrowth: toNumber(values['primary-file-growth']),
      primaryFileMaxSize: toNumber(values['primary-file-max-size']),
      logSize: toNumber(values['log-size']),
      logGrowth: toNumber(values['log-growth']),
      logMaxSize: toNumber(values['log-max-size']),
      secondaryFileSize: toNumber(values['secondary-file-size']),
      secondaryFileGrowth: toNumber(values['secondary-file-growth']),
      secondaryFileMaxSize: toNumber(values['secondary-file-max-size']),
      secondaryFileCount: toNumber(values['secondary-file-count']),
      defaultFileGroup: values['default-file-group'],
      dataFileSuffix: values['data-file-suffix'],
      logFileSuffix: values['log-file-suffix'],
      secondaryDataFileSuffix: values['secondary-data-file-suffix'],
    });

    return { ...invocation, options };
  });
}
