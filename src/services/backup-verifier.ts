/**
 * Backup Verification
 *
 * For every source instance and database: find the last full backup, optionally copy it next
 * to the destination, restore it under a prefixed name, run DBCC CHECKDB, drop the copy and
 * report one row per database.
 *
 * Instances and databases are processed one at a time. Connection and version problems end an
 * instance pair; everything else ends only the database it concerns.
 */
import {
  SqlInstance,
  InstanceConnector,
  FileTransfer,
  BackupRecord,
  DefaultPaths,
  OperationResult,
} from '../engine/types.js';
import { isSameInstance } from '../utils/instance-name.js';
import { TestLastBackupOptions } from '../schemas/test-last-backup.js';
import { ChangeGate } from '../utils/change-gate.js';
import { Reporter, errorMessage } from '../utils/reporter.js';
import { canRestoreAcross, formatVersion } from '../utils/versions.js';
import { isNetworkShared, joinPath, fileName, toAdminSharePath } from '../utils/paths.js';
import {
  LastBackupTestResult,
  ResultIdentity,
  createResult,
  planRestore,
  decideCheck,
  buildRelocations,
  copyDirectoryName,
  elapsedMs,
  SKIPPED,
  SUCCESS,
  FAILURE,
} from './verification-plan.js';

export interface VerificationDependencies {
  connector: InstanceConnector;
  files: FileTransfer;
  gate: ChangeGate;
  reporter: Reporter;
  /** Called as soon as each row is final */
  onResult?: (result: LastBackupTestResult) => void;
  now?: () => Date;
}

interface PairContext {
  source: SqlInstance;
  destination: SqlInstance;
  sameInstance: boolean;
  defaults: DefaultPaths;
  options: TestLastBackupOptions;
  deps: VerificationDependencies;
  now: () => Date;
}

type Relocation =
  | { kind: 'not-needed' }
  | { kind: 'copied'; backup: BackupRecord; copiedFiles: string[]; directory: string }
  | { kind: 'stopped' };

const TEMPDB = 'tempdb';

async function closeInstance(instance: SqlInstance, reporter: Reporter): Promise<void> {
  try {
    await instance.close();
  } catch (error) {
    reporter.warn({ instance: instance.name }, `Failed to close connection: ${errorMessage(error)}`);
  }
}

/**
 * Databases to test: the requested ones that exist on the source, or all but tempdb,
 * minus the exclusions. Requested tempdb is kept so it can be reported as skipped.
 */
async function resolveDatabases(
  source: SqlInstance,
  options: TestLastBackupOptions,
  reporter: Reporter
): Promise<string[]> {
  const catalog = await source.listDatabases();
  const excluded = new Set(options.excludeDatabase.map(name => name.toLowerCase()));

  let names: string[];
  if (options.database.length > 0) {
    names = [];
    for (const requested of options.database) {
      const match = catalog.find(db => db.name.toLowerCase() === requested.toLowerCase());
      if (match) {
        names.push(match.name);
      } else if (requested.toLowerCase() === TEMPDB) {
        names.push(TEMPDB);
      } else {
        reporter.warn({ instance: source.name, database: requested }, 'Database not found on the source instance');
      }
    }
  } else {
    names = catalog.map(db => db.name).filter(name => name.toLowerCase() !== TEMPDB);
  }

  const seen = new Set<string>();
  return names.filter(name => {
    const key = name.toLowerCase();
    if (excluded.has(key) || seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Copy the backup into <copy target>\<prefix dir> on the destination host and point the
 * record at the copy. Backups already on a share are left where they are.
 */
async function relocateBackup(ctx: PairContext, backup: BackupRecord): Promise<Relocation> {
  const { source, destination, options, deps } = ctx;
  const target = { instance: destination.name, database: backup.database };

  if (isNetworkShared(backup.paths)) {
    deps.reporter.info(`Backup of ${backup.database} is already on a network share, not copying it`);
    return { kind: 'not-needed' };
  }

  const localDirectory = joinPath(options.copyPath ?? ctx.defaults.backup, copyDirectoryName(options.prefix));
  const hostDirectory = toAdminSharePath(destination.computerName, localDirectory);

  if (!(await deps.gate.shouldProcess(hostDirectory, `Copying backup files of ${backup.database}`))) {
    deps.reporter.info(`Copy of ${backup.database} backup declined, skipping database`);
    return { kind: 'stopped' };
  }

  const copiedFiles: string[] = [];
  const localPaths: string[] = [];
  try {
    await deps.files.ensureDirectory(hostDirectory);
    for (const path of backup.paths) {
      const name = fileName(path);
      const sourcePath = toAdminSharePath(source.computerName, path);
      const destinationPath = joinPath(hostDirectory, name);
      deps.reporter.info(`Copying ${sourcePath} to ${destinationPath}`);
      await deps.files.copyFile(sourcePath, destinationPath);
      copiedFiles.push(destinationPath);
      localPaths.push(joinPath(localDirectory, name));
    }
  } catch (error) {
    deps.reporter.warn(target, `Failed to copy backup to ${hostDirectory}: ${errorMessage(error)}`);
    await removeCopies(ctx, target, copiedFiles, hostDirectory);
    return { kind: 'stopped' };
  }

  return {
    kind: 'copied',
    backup: { ...backup, paths: localPaths },
    copiedFiles,
    directory: hostDirectory,
  };
}

async function removeCopies(
  ctx: PairContext,
  target: { instance: string; database: string },
  copiedFiles: string[],
  directory: string
): Promise<void> {
  const { files, gate, reporter } = ctx.deps;

  for (const path of copiedFiles) {
    if (!(await gate.shouldProcess(path, 'Removing copied backup file'))) continue;
    try {
      await files.removeFile(path);
    } catch (error) {
      reporter.warn(target, `Failed to remove copied backup ${path}: ${errorMessage(error)}`);
    }
  }

  try {
    if (await files.removeDirectoryIfEmpty(directory)) {
      reporter.info(`Removed empty directory ${directory}`);
    }
  } catch (error) {
    reporter.warn(target, `Failed to remove directory ${directory}: ${errorMessage(error)}`);
  }
}

async function runRestore(
  ctx: PairContext,
  backup: BackupRecord,
  restoredName: string,
  dataDirectory: string,
  logDirectory: string
): Promise<OperationResult> {
  const { destination, options } = ctx;
  try {
    if (options.verifyOnly) {
      return await destination.verifyBackup(backup.paths, backup.position);
    }
    const fileList = await destination.readBackupFileList(backup.paths, backup.position);
    return await destination.restoreDatabase({
      database: restoredName,
      paths: backup.paths,
      position: backup.position,
      relocations: buildRelocations(fileList, options.prefix, dataDirectory, logDirectory),
    });
  } catch (error) {
    return { success: false, message: errorMessage(error) };
  }
}

async function dropRestoredCopy(ctx: PairContext, restoredName: string, database: string): Promise<void> {
  const { destination, deps } = ctx;
  const target = { instance: destination.name, database };

  try {
    if (!(await destination.databaseExists(restoredName))) return;
    if (!(await deps.gate.shouldProcess(destination.name, `Dropping database ${restoredName}`))) return;

    deps.reporter.info(`Dropping ${restoredName} on ${destination.name}`);
    await destination.dropDatabase(restoredName);
  } catch (error) {
    deps.reporter.warn(target, `Failed to drop ${restoredName}: ${errorMessage(error)}`);
  }
}

/**
 * Everything after the backup has been located and (maybe) copied. Returns null when the
 * database ends with a diagnostic instead of a row.
 */
async function restoreAndCheck(
  ctx: PairContext,
  identity: ResultIdentity,
  backup: BackupRecord | null,
  relocated: boolean
): Promise<LastBackupTestResult | null> {
  const { destination, options, deps, now } = ctx;
  const database = identity.database;
  const target = { instance: destination.name, database };

  const plan = await planRestore(
    { database, backup, sameInstance: ctx.sameInstance, relocated, maxMb: options.maxMb },
    destination
  );

  if (plan.kind === 'terminal') {
    if (plan.diagnostic) {
      deps.reporter.warn(target, plan.diagnostic);
    }
    return createResult(identity, {
      fileExists: plan.fileExists,
      size: plan.size,
      restoreResult: plan.restoreResult,
      dbccResult: SKIPPED,
      backupDate: backup?.start ?? null,
      backupFiles: backup?.paths ?? [],
    });
  }

  // planRestore only clears databases that have a backup
  if (!backup) return null;

  const restoredName = `${options.prefix}${database}`;
  if (await destination.databaseExists(restoredName)) {
    deps.reporter.warn(target, `Database ${restoredName} already exists on ${destination.name}, skipping`);
    return null;
  }

  const dataDirectory = options.dataDirectory ?? ctx.defaults.data;
  const logDirectory = options.logDirectory ?? ctx.defaults.log;
  for (const directory of [dataDirectory, logDirectory]) {
    if (!(await destination.testPath(directory))) {
      deps.reporter.warn(target, `Destination cannot access ${directory}, skipping`);
      return null;
    }
  }

  const action = options.verifyOnly
    ? `Verifying backup of ${database}`
    : `Restoring ${database} as ${restoredName}`;
  if (!(await deps.gate.shouldProcess(destination.name, action))) {
    deps.reporter.info(`${action} declined, skipping database`);
    return null;
  }

  deps.reporter.info(`${action} on ${destination.name}`);
  const restoreStart = now();
  const restore = await runRestore(ctx, backup, restoredName, dataDirectory, logDirectory);
  const restoreEnd = now();

  if (!restore.success) {
    deps.reporter.warn(target, `Restore failed: ${restore.message ?? 'unknown error'}`);
  }

  let dbccResult: string;
  let dbccStart: Date | null = null;
  let dbccEnd: Date | null = null;

  const decision = decideCheck({
    database,
    restoredName,
    restoreSucceeded: restore.success,
    verifyOnly: options.verifyOnly,
    noCheck: options.noCheck,
  });

  if (decision.run) {
    deps.reporter.info(`Running DBCC CHECKDB on ${restoredName}`);
    dbccStart = now();
    const check = await destination.checkDatabase(restoredName);
    dbccEnd = now();
    dbccResult = check.success ? SUCCESS : (check.message ?? FAILURE);
  } else {
    dbccResult = decision.dbccResult;
  }

  if (!options.noDrop && !options.verifyOnly) {
    await dropRestoredCopy(ctx, restoredName, database);
  }

  return createResult(identity, {
    fileExists: true,
    size: plan.size,
    restoreResult: restore.success ? SUCCESS : FAILURE,
    dbccResult,
    restoreStart,
    restoreEnd,
    restoreElapsedMs: elapsedMs(restoreStart, restoreEnd),
    dbccStart,
    dbccEnd,
    dbccElapsedMs: dbccStart && dbccEnd ? elapsedMs(dbccStart, dbccEnd) : null,
    backupDate: backup.start,
    backupFiles: backup.paths,
  });
}

async function verifyDatabase(ctx: PairContext, database: string): Promise<LastBackupTestResult | null> {
  const { source, destination, options, deps } = ctx;
  const identity: ResultIdentity = {
    sourceServer: source.name,
    testServer: destination.name,
    database,
  };

  if (database.toLowerCase() === TEMPDB) {
    deps.reporter.info('Skipping tempdb, it has no backup to test');
    return createResult(identity);
  }

  deps.reporter.info(`Looking for the last full backup of ${database} on ${source.name}`);
  const lastBackup = await source.getLastFullBackup(database, { ignoreCopyOnly: options.ignoreCopyOnly });

  let relocation: Relocation = { kind: 'not-needed' };
  if (options.copyFile && lastBackup) {
    relocation = await relocateBackup(ctx, lastBackup);
    if (relocation.kind === 'stopped') return null;
  }

  const backup = relocation.kind === 'copied' ? relocation.backup : lastBackup;
  try {
    return await restoreAndCheck(ctx, identity, backup, relocation.kind === 'copied');
  } finally {
    if (relocation.kind === 'copied') {
      await removeCopies(
        ctx,
        { instance: destination.name, database },
        relocation.copiedFiles,
        relocation.directory
      );
    }
  }
}

async function verifyInstancePair(
  source: SqlInstance,
  destination: SqlInstance,
  sameInstance: boolean,
  options: TestLastBackupOptions,
  deps: VerificationDependencies
): Promise<LastBackupTestResult[]> {
  const { reporter } = deps;
  const results: LastBackupTestResult[] = [];

  if (!sameInstance && !canRestoreAcross(source.version, destination.version)) {
    reporter.warn(
      { instance: source.name },
      `${destination.name} runs ${formatVersion(destination.version)}, older than ` +
        `${formatVersion(source.version)}; backups cannot be restored to an older version`
    );
    return results;
  }

  let databases: string[];
  let defaults: DefaultPaths;
  try {
    databases = await resolveDatabases(source, options, reporter);
    defaults = await destination.getDefaultPaths();
  } catch (error) {
    reporter.warn({ instance: source.name }, `Failed to prepare instance: ${errorMessage(error)}`);
    return results;
  }

  const ctx: PairContext = {
    source,
    destination,
    sameInstance,
    defaults,
    options,
    deps,
    now: deps.now ?? (() => new Date()),
  };

  for (const database of databases) {
    try {
      const result = await verifyDatabase(ctx, database);
      if (result) {
        results.push(result);
        deps.onResult?.(result);
      }
    } catch (error) {
      reporter.warn({ instance: source.name, database }, `Failure: ${errorMessage(error)}`);
    }
  }

  return results;
}

/**
 * Test the last full backup of every selected database on every source instance.
 */
export async function testLastBackup(
  options: TestLastBackupOptions,
  deps: VerificationDependencies
): Promise<LastBackupTestResult[]> {
  const { connector, reporter } = deps;
  const results: LastBackupTestResult[] = [];

  for (const sourceName of options.sqlInstance) {
    const destinationName = options.destination ?? sourceName;
    const sameInstance = isSameInstance(sourceName, destinationName);

    let source: SqlInstance;
    try {
      source = await connector.connect(sourceName, options.sqlCredential);
    } catch (error) {
      reporter.warn({ instance: sourceName }, `Failure connecting: ${errorMessage(error)}`);
      continue;
    }

    let destination: SqlInstance;
    if (sameInstance) {
      destination = source;
    } else {
      try {
        destination = await connector.connect(
          destinationName,
          options.destinationCredential ?? options.sqlCredential
        );
      } catch (error) {
        reporter.warn({ instance: destinationName }, `Failure connecting: ${errorMessage(error)}`);
        await closeInstance(source, reporter);
        continue;
      }
    }

    try {
      results.push(...(await verifyInstancePair(source, destination, sameInstance, options, deps)));
    } finally {
      if (!sameInstance) {
        await closeInstance(destination, reporter);
      }
      await closeInstance(source, reporter);
    }
  }

  return results;
}
