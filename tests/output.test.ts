import { describe, it, expect } from 'vitest';
import { formatLastBackupResult, formatDatabaseDescriptor } from '../src/cli/output.js';
import { createResult } from '../src/services/verification-plan.js';

const identity = { sourceServer: 'SQL01', testServer: 'SQL01', database: 'sales' };

describe('formatLastBackupResult', () => {
  it('should print one aligned line per field', () => {
    const text = formatLastBackupResult(
      createResult(identity, {
        fileExists: true,
        size: 10485760,
        restoreResult: 'Success',
        dbccResult: 'Success',
        restoreStart: new Date('2026-10-18T02:00:00Z'),
        restoreEnd: new Date('2026-10-18T02:00:01Z'),
        restoreElapsedMs: 1000,
        dbccStart: new Date('2026-10-18T02:00:02Z'),
        dbccEnd: new Date('2026-10-18T02:00:03Z'),
        dbccElapsedMs: 1000,
        backupDate: new Date('2026-10-17T23:00:00Z'),
        backupFiles: ['D:\\Backups\\sales.bak'],
      })
    );

    expect(text.split('\n')).toEqual([
      'SourceServer   : SQL01',
      'TestServer     : SQL01',
      'Database       : sales',
      'FileExists     : true',
      'Size           : 10485760 bytes',
      'RestoreResult  : Success',
      'DbccResult     : Success',
      'RestoreStart   : 2026-10-18T02:00:00.000Z',
      'RestoreEnd     : 2026-10-18T02:00:01.000Z',
      'RestoreElapsed : 00:00:01',
      'DbccStart      : 2026-10-18T02:00:02.000Z',
      'DbccEnd        : 2026-10-18T02:00:03.000Z',
      'DbccElapsed    : 00:00:01',
      'BackupDate     : 2026-10-17T23:00:00.000Z',
      'BackupFiles    : D:\\Backups\\sales.bak',
    ]);
  });

  it('should show a file never looked for as skipped and leave unknown values empty', () => {
    const lines = formatLastBackupResult(createResult(identity)).split('\n');

    expect(lines[3]).toBe('FileExists     : Skipped');
    expect(lines[4]).toBe('Size           : ');
    expect(lines[9]).toBe('RestoreElapsed : ');
  });
});

describe('formatDatabaseDescriptor', () => {
  it('should list the files under one another', () => {
    const text = formatDatabaseDescriptor({
      instance: 'SQL02',
      name: 'demo',
      status: 'ONLINE',
      recoveryModel: 'SIMPLE',
      collation: 'Latin1_General_CI_AS',
      owner: 'sa',
      createDate: new Date('2026-10-18T00:00:00Z'),
      sizeMb: 16,
      files: [
        { logicalName: 'demo', physicalName: 'D:\\Data\\demo.mdf', type: 'ROWS', fileGroup: 'PRIMARY', sizeMb: 8 },
        { logicalName: 'demo_log', physicalName: 'L:\\Logs\\demo_log.ldf', type: 'LOG', fileGroup: null, sizeMb: 8 },
      ],
    });

    expect(text.split('\n')).toEqual([
      'SqlInstance   : SQL02',
      'Name          : demo',
      'Status        : ONLINE',
      'RecoveryModel : SIMPLE',
      'Collation     : Latin1_General_CI_AS',
      'Owner         : sa',
      'CreateDate    : 2026-10-18T00:00:00.000Z',
      'SizeMB        : 16',
      'Files         : demo (ROWS, PRIMARY, 8 MB) D:\\Data\\demo.mdf',
      '                demo_log (LOG, 8 MB) L:\\Logs\\demo_log.ldf',
    ]);
  });
});
