/**
 * Decisions of the backup verification workflow that do not touch the engine directly.
 *
 * Per database the flow is: found -> relocated? -> path checked -> size checked -> restored
 * -> checked -> dropped. planRestore() covers everything up to the restore and either ends the
 * database with a terminal result or clears it for restore; decideCheck() covers the check.
 */
import { BackupRecord, BackupFileListEntry, FileRelocation, SqlInstance } from '../engine/types.js';
import { isNetworkShared, joinPath, fileName } from '../utils/paths.js';
import { bytesToMb } from '../utils/format.js';

export const SKIPPED = 'Skipped';
export const SUCCESS = 'Success';
export const FAILURE = 'Failure';
export const NOT_ON_SHARED_LOCATION = 'Restore not located on shared location';

export interface LastBackupTestResult {
  sourceServer: string;
  testServer: string;
  database: string;
  /** null when the file was never looked for */
  fileExists: boolean | null;
  size: number | null;
  restoreResult: string;
  dbccResult: string;
  restoreStart: Date | null;
  restoreEnd: Date | null;
  restoreElapsedMs: number | null;
  dbccStart: Date | null;
  dbccEnd: Date | null;
  dbccElapsedMs: number | null;
  backupDate: Date | null;
  backupFiles: string[];
}

export type ResultIdentity = Pick<LastBackupTestResult, 'sourceServer' | 'testServer' | 'database'>;

export function createResult(
  identity: ResultIdentity,
  fields: Partial<Omit<LastBackupTestResult, keyof ResultIdentity>> = {}
): LastBackupTestResult {
  return {
    ...identity,
    fileExists: null,
    size: null,
    restoreResult: SKIPPED,
    dbccResult: SKIPPED,
    restoreStart: null,
    restoreEnd: null,
    restoreElapsedMs: null,
    dbccStart: null,
    dbccEnd: null,
    dbccElapsedMs: null,
    backupDate: null,
    backupFiles: [],
    ...fields,
  };
}

export type TerminalReason = 'not-found' | 'not-shared' | 'file-missing' | 'too-large';

export type RestorePlan =
  | {
      kind: 'terminal';
      reason: TerminalReason;
      fileExists: boolean | null;
      size: number | null;
      restoreResult: string;
      diagnostic?: string;
    }
  | { kind: 'restore'; size: number };

export interface PlanInput {
  database: string;
  backup: BackupRecord | null;
  sameInstance: boolean;
  /** The backup was copied next to the destination instance */
  relocated: boolean;
  maxMb?: number;
}

export function sizeExceededMessage(database: string, sizeMb: number, maxMb: number): string {
  return `The backup size for ${database} (${sizeMb} MB) exceeds the specified maximum size (${maxMb} MB).`;
}

export async function planRestore(
  input: PlanInput,
  destination: Pick<SqlInstance, 'testPath' | 'readBackupHeader'>
): Promise<RestorePlan> {
  const { backup } = input;

  if (!backup || backup.paths.length === 0) {
    return { kind: 'terminal', reason: 'not-found', fileExists: false, size: null, restoreResult: SKIPPED };
  }

  // A different host cannot read a path local to the source host
  if (!input.sameInstance && !input.relocated && !isNetworkShared(backup.paths)) {
    return {
      kind: 'terminal',
      reason: 'not-shared',
      fileExists: null,
      size: backup.totalSize,
      restoreResult: NOT_ON_SHARED_LOCATION,
    };
  }

  for (const path of backup.paths) {
    if (!(await destination.testPath(path))) {
      return {
        kind: 'terminal',
        reason: 'file-missing',
        fileExists: false,
        size: backup.totalSize,
        restoreResult: SKIPPED,
        diagnostic: `Backup file ${path} is not accessible from the destination`,
      };
    }
  }

  const header = await destination.readBackupHeader(backup.paths, backup.position);
  const size = header.backupSize;

  if (input.maxMb !== undefined) {
    const sizeMb = bytesToMb(size);
    if (sizeMb > input.maxMb) {
      return {
        kind: 'terminal',
        reason: 'too-large',
        fileExists: true,
        size,
        restoreResult: sizeExceededMessage(input.database, sizeMb, input.maxMb),
      };
    }
  }

  return { kind: 'restore', size };
}

export type CheckDecision = { run: true } | { run: false; dbccResult: string };

export function masterCheckSkippedMessage(restoredName: string): string {
  return `DBCC CHECKDB skipped for restored master (${restoredName}) database`;
}

/**
 * Whether to run DBCC CHECKDB on the restored copy. Checking a restored master online is
 * unsafe, so it is always skipped with an explicit message.
 */
export function decideCheck(input: {
  database: string;
  restoredName: string;
  restoreSucceeded: boolean;
  verifyOnly: boolean;
  noCheck: boolean;
}): CheckDecision {
  if (input.verifyOnly || input.noCheck) {
    return { run: false, dbccResult: SKIPPED };
  }
  if (input.database.toLowerCase() === 'master') {
    return { run: false, dbccResult: masterCheckSkippedMessage(input.restoredName) };
  }
  if (!input.restoreSucceeded) {
    return { run: false, dbccResult: SKIPPED };
  }
  return { run: true };
}

/**
 * MOVE targets for every file in the backup: log files to the log directory, everything
 * else to the data directory, each renamed with the prefix.
 */
export function buildRelocations(
  files: BackupFileListEntry[],
  prefix: string,
  dataDirectory: string,
  logDirectory: string
): FileRelocation[] {
  return files.map(file => ({
    logicalName: file.logicalName,
    physicalName: joinPath(
      file.type === 'L' ? logDirectory : dataDirectory,
      `${prefix}${fileName(file.physicalName)}`
    ),
  }));
}

/**
 * Directory under the copy target that holds relocated backups, named after the prefix
 */
export function copyDirectoryName(prefix: string): string {
  return prefix.replace(/[-_.]+$/, '') || 'testrestore';
}

export function elapsedMs(start: Date, end: Date): number {
  return end.getTime() - start.getTime();
}
