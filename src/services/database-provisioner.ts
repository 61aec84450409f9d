/**
 * Database Provisioning
 *
 * Creates databases on one or more instances, optionally with an explicit layout: primary
 * file, log file and a secondary filegroup of N files. Each database is created on its own;
 * a failure is reported and the next name or instance is processed.
 */
import { SqlInstance, InstanceConnector, DatabaseDescriptor, TemplateFileSizes } from '../engine/types.js';
import { NewDatabaseOptions } from '../schemas/new-database.js';
import { ChangeGate } from '../utils/change-gate.js';
import { Reporter, errorMessage } from '../utils/reporter.js';
import { MIN_ADVANCED_LAYOUT_MAJOR, formatVersion } from '../utils/versions.js';
import { randomDatabaseName } from '../utils/format.js';
import { trimTrailingSeparator } from '../utils/paths.js';
import {
  buildDatabaseDefinition,
  hasAdvancedLayout,
  secondaryFileGroupName,
} from './database-definition.js';

export interface ProvisioningDependencies {
  connector: InstanceConnector;
  gate: ChangeGate;
  reporter: Reporter;
  onResult?: (database: DatabaseDescriptor) => void;
  random?: () => number;
}

interface InstancePaths {
  dataPath: string;
  logPath: string;
}

async function resolvePaths(server: SqlInstance, options: NewDatabaseOptions): Promise<InstancePaths> {
  if (options.dataFilePath && options.logFilePath) {
    return {
      dataPath: trimTrailingSeparator(options.dataFilePath),
      logPath: trimTrailingSeparator(options.logFilePath),
    };
  }
  const defaults = await server.getDefaultPaths();
  return {
    dataPath: trimTrailingSeparator(options.dataFilePath ?? defaults.data),
    logPath: trimTrailingSeparator(options.logFilePath ?? defaults.log),
  };
}

/**
 * Make sure the data and log directories exist on the instance host.
 * Returns false when one is missing and could not be created.
 */
async function ensureDirectories(
  server: SqlInstance,
  paths: InstancePaths,
  deps: ProvisioningDependencies
): Promise<boolean> {
  const directories = [...new Set([paths.dataPath, paths.logPath])];

  for (const directory of directories) {
    if (await server.testPath(directory)) continue;

    if (!(await deps.gate.shouldProcess(directory, `Creating directory on ${server.name}`))) {
      deps.reporter.info(`Directory ${directory} does not exist on ${server.name}`);
      continue;
    }

    const created = await server.createDirectory(directory);
    if (!created.success) {
      deps.reporter.warn(
        { instance: server.name },
        `Failed to create directory ${directory}${created.message ? `: ${created.message}` : ''}`
      );
      return false;
    }
    deps.reporter.info(`Created directory ${directory} on ${server.name}`);
  }
  return true;
}

async function createOne(
  server: SqlInstance,
  name: string,
  options: NewDatabaseOptions,
  paths: InstancePaths,
  template: TemplateFileSizes | null,
  deps: ProvisioningDependencies
): Promise<DatabaseDescriptor | null> {
  const target = { instance: server.name, database: name };

  if (await server.databaseExists(name)) {
    deps.reporter.warn(target, `Database ${name} already exists on ${server.name}`);
    return null;
  }

  if (!(await deps.gate.shouldProcess(server.name, `Creating database ${name}`))) {
    deps.reporter.info(`Creating database ${name} declined, skipping database`);
    return null;
  }

  try {
    const definition = buildDatabaseDefinition(name, options, { ...paths, template });
    await server.createDatabase(definition);
    deps.reporter.info(`Created database ${name} on ${server.name}`);

    if (options.owner) {
      await server.setDatabaseOwner(name, options.owner);
    }
    // PRIMARY is already the default filegroup of a new database
    if (options.defaultFileGroup === 'Secondary') {
      await server.setDefaultFileGroup(name, secondaryFileGroupName(name, options));
    }
  } catch (error) {
    deps.reporter.warn(target, `Failure creating database: ${errorMessage(error)}`);
    return null;
  }

  const descriptor = await server.getDatabase(name);
  if (!descriptor) {
    deps.reporter.warn(target, 'Database was created but could not be read back');
  }
  return descriptor;
}

async function provisionInstance(
  server: SqlInstance,
  options: NewDatabaseOptions,
  deps: ProvisioningDependencies
): Promise<DatabaseDescriptor[]> {
  const created: DatabaseDescriptor[] = [];
  const advanced = hasAdvancedLayout(options);

  if (advanced && server.version.major < MIN_ADVANCED_LAYOUT_MAJOR) {
    deps.reporter.warn(
      { instance: server.name },
      `Custom file layouts are not supported on version ${formatVersion(server.version)}`
    );
    return created;
  }

  const paths = await resolvePaths(server, options);
  if (!(await ensureDirectories(server, paths, deps))) {
    return created;
  }

  const names = options.name.length > 0 ? options.name : [randomDatabaseName(deps.random)];
  const template = advanced ? await server.getTemplateFileSizes() : null;

  for (const name of names) {
    try {
      const descriptor = await createOne(server, name, options, paths, template, deps);
      if (descriptor) {
        created.push(descriptor);
        deps.onResult?.(descriptor);
      }
    } catch (error) {
      deps.reporter.warn({ instance: server.name, database: name }, `Failure: ${errorMessage(error)}`);
    }
  }
  return created;
}

/**
 * Create the requested databases on every instance and return what was created.
 */
export async function newDatabase(
  options: NewDatabaseOptions,
  deps: ProvisioningDependencies
): Promise<DatabaseDescriptor[]> {
  const results: DatabaseDescriptor[] = [];

  for (const instanceName of options.sqlInstance) {
    let server: SqlInstance;
    try {
      server = await deps.connector.connect(instanceName, options.sqlCredential);
    } catch (error) {
      deps.reporter.warn({ instance: instanceName }, `Failure connecting: ${errorMessage(error)}`);
      continue;
    }

    try {
      results.push(...(await provisionInstance(server, options, deps)));
    } catch (error) {
      deps.reporter.warn({ instance: instanceName }, `Failure: ${errorMessage(error)}`);
    } finally {
      try {
        await server.close();
      } catch (error) {
        deps.reporter.warn({ instance: instanceName }, `Failed to close connection: ${errorMessage(error)}`);
      }
    }
  }

  return results;
}
