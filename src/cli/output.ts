import { DatabaseDescriptor } from '../engine/types.js';
import { LastBackupTestResult, SKIPPED } from '../services/verification-plan.js';
import { formatElapsed } from '../utils/format.js';

type Field = [label: string, value: string];

function formatDate(value: Date | null): string {
  return value ? value.toISOString() : '';
}

function formatFields(fields: Field[]): string {
  const width = Math.max(...fields.map(([label]) => label.length));
  return fields.map(([label, value]) => `${label.padEnd(width)} : ${value}`).join('\n');
}

export function formatLastBackupResult(result: LastBackupTestResult): string {
  return formatFields([
    ['SourceServer', result.sourceServer],
    ['TestServer', result.testServer],
    ['Database', result.database],
    ['FileExists', result.fileExists === null ? SKIPPED : String(result.fileExists)],
    ['Size', result.size === null ? '' : `${result.size} bytes`],
    ['RestoreResult', result.restoreResult],
    ['DbccResult', result.dbccResult],
    ['RestoreStart', formatDate(result.restoreStart)],
    ['RestoreEnd', formatDate(result.restoreEnd)],
    ['RestoreElapsed', formatElapsed(result.restoreElapsedMs)],
    ['DbccStart', formatDate(result.dbccStart)],
    ['DbccEnd', formatDate(result.dbccEnd)],
    ['DbccElapsed', formatElapsed(result.dbccElapsedMs)],
    ['BackupDate', formatDate(result.backupDate)],
    ['BackupFiles', result.backupFiles.join(', ')],
  ]);
}

export function formatDatabaseDescriptor(database: DatabaseDescriptor): string {
  const files = database.files.map(
    f => `${f.logicalName} (${f.type}${f.fileGroup ? `, ${f.fileGroup}` : ''}, ${f.sizeMb} MB) ${f.physicalName}`
  );
  return formatFields([
    ['SqlInstance', database.instance],
    ['Name', database.name],
    ['Status', database.status],
    ['RecoveryModel', database.recoveryModel],
    ['Collation', database.collation ?? ''],
    ['Owner', database.owner ?? ''],
    ['CreateDate', formatDate(database.createDate)],
    ['SizeMB', String(database.sizeMb)],
    ['Files', files.join('\n' + ' '.repeat('RecoveryModel'.length + 3))],
  ]);
}

export const TEST_LAST_BACKUP_USAGE = `Usage: sqlkeeper-test-last-backup --sql-instance <instance> [options]

Restores the last full backup of each database under a prefixed name, checks it with
DBCC CHECKDB and drops it again.

Options:
  -s, --sql-instance <name>     Source instance (repeatable)
  -u, --username <login>        Login for the source (default: SQLKEEPER_USERNAME)
  -p, --password <password>     Password (default: SQLKEEPER_PASSWORD)
      --domain <domain>         Authenticate with a Windows account over NTLM
  -d, --destination <name>      Instance to restore on (default: the source)
      --destination-username    Login for the destination (default: --username)
      --destination-password    Password for the destination
      --database <name>         Database to test (repeatable, default: all but tempdb)
      --exclude-database <name> Database to leave out (repeatable)
      --data-directory <path>   Where restored data files go (default: instance default)
      --log-directory <path>    Where restored log files go (default: instance default)
      --prefix <text>           Prefix for restored names (default: SQLKEEPER_RESTORE_PREFIX)
      --verify-only             RESTORE VERIFYONLY instead of a restore
      --no-check                Skip DBCC CHECKDB
      --no-drop                 Keep the restored database
      --copy-file               Copy the backup next to the destination first
      --copy-path <path>        Copy target (default: destination backup directory)
      --max-mb <n>              Skip backups larger than n MB
      --ignore-copy-only        Ignore copy-only backups
      --whatif                  Show what would change without changing anything
      --confirm                 Ask before every change
      --silent                  Only print results and warnings
      --format <list|json>      Output format (default: list)
  -h, --help                    Show this help
`;

export const NEW_DATABASE_USAGE = `Usage: sqlkeeper-new-database --sql-instance <instance> [options]

Creates databases, optionally with a custom file layout.

Options:
  -s, --sql-instance <name>          Instance (repeatable)
  -u, --username <login>             Login (default: SQLKEEPER_USERNAME)
  -p, --password <password>          Password (default: SQLKEEPER_PASSWORD)
      --domain <domain>              Authenticate with a Windows account over NTLM
  -n, --name <name>                  Database name (repeatable, default: random-<n>)
      --collation <name>             Collation
      --recovery-model <model>       Simple, Full or BulkLogged
      --owner <login>                Database owner
      --data-file-path <path>        Data file directory (default: instance default)
      --log-file-path <path>         Log file directory (default: instance default)
      --primary-file-size <MB>       Primary file size
      --primary-file-growth <MB>     Primary file growth
      --primary-file-max-size <MB>   Primary file max size
      --log-size <MB>                Log file size
      --log-growth <MB>              Log file growth
      --log-max-size <MB>            Log file max size
      --secondary-file-size <MB>     Secondary file size
      --secondary-file-growth <MB>   Secondary file growth
      --secondary-file-max-size <MB> Secondary file max size
      --secondary-file-count <n>     Number of secondary files (default: 1)
      --default-file-group <group>   Primary or Secondary
      --data-file-suffix <text>      Primary file name suffix (default: none)
      --log-file-suffix <text>       Log file name suffix (default: _log)
      --secondary-data-file-suffix   Secondary filegroup suffix (default: _MainData)
      --whatif                       Show what would change without changing anything
      --confirm                      Ask before every change
      --silent                       Only print results and warnings
      --format <list|json>           Output format (default: list)
  -h, --help                         Show this help
`;
