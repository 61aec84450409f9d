/**
 * Backup verification workflow tests
 *
 * Runs testLastBackup() against in-process fake instances and checks the rows it reports,
 * the engine calls it makes and the diagnostics it raises.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { testLastBackup, VerificationDependencies } from '../src/services/backup-verifier.js';
import { testLastBackupSchema, TestLastBackupInput } from '../src/schemas/test-last-backup.js';
import { executeGate, createWhatIfGate } from '../src/utils/change-gate.js';
import {
  FakeSqlInstance,
  FakeConnector,
  FakeFileTransfer,
  RecordingReporter,
  createRecordingReporter,
  steppingClock,
  fullBackup,
  MB,
} from './helpers/fake-engine.js';

const T0 = new Date('2026-10-18T02:00:00Z').getTime();

function options(overrides: Partial<TestLastBackupInput> = {}) {
  return testLastBackupSchema.parse({
    sqlInstance: ['SQL01'],
    database: ['sales'],
    prefix: 'testrestore-',
    ...overrides,
  });
}

describe('testLastBackup', () => {
  let source: FakeSqlInstance;
  let connector: FakeConnector;
  let files: FakeFileTransfer;
  let reporter: RecordingReporter;
  let deps: VerificationDependencies;

  beforeEach(() => {
    source = new FakeSqlInstance({
      name: 'SQL01',
      computerName: 'SQL01HOST',
      databases: ['master', 'tempdb', 'model', 'msdb', 'sales'],
    });
    connector = new FakeConnector().add(source);
    files = new FakeFileTransfer();
    reporter = createRecordingReporter();
    deps = { connector, files, gate: executeGate, reporter, now: steppingClock() };
  });

  describe('on the source instance', () => {
    it('should restore, check and drop the last full backup', async () => {
      source.addBackup(fullBackup('sales'));

      const results = await testLastBackup(options(), deps);

      expect(results).toEqual([
        {
          sourceServer: 'SQL01',
          testServer: 'SQL01',
          database: 'sales',
          fileExists: true,
          size: 10 * MB,
          restoreResult: 'Success',
          dbccResult: 'Success',
          restoreStart: new Date(T0),
          restoreEnd: new Date(T0 + 1000),
          restoreElapsedMs: 1000,
          dbccStart: new Date(T0 + 2000),
          dbccEnd: new Date(T0 + 3000),
          dbccElapsedMs: 1000,
          backupDate: new Date('2026-10-17T23:00:00Z'),
          backupFiles: ['D:\\Backups\\sales.bak'],
        },
      ]);
      expect(source.callsTo('restoreDatabase')[0].args[0]).toEqual({
        database: 'testrestore-sales',
        paths: ['D:\\Backups\\sales.bak'],
        position: 1,
        relocations: [
          { logicalName: 'sales', physicalName: 'D:\\Data\\testrestore-sales.mdf' },
          { logicalName: 'sales_log', physicalName: 'L:\\Logs\\testrestore-sales_log.ldf' },
        ],
      });
      expect(source.callsTo('checkDatabase')[0].args).toEqual(['testrestore-sales']);
      expect(source.callsTo('dropDatabase')[0].args).toEqual(['testrestore-sales']);
      expect(source.databases.has('testrestore-sales')).toBe(false);
      expect(reporter.warnings).toEqual([]);
    });

    it('should skip the consistency check for a restored master', async () => {
      source.addBackup(fullBackup('master'));

      const [result] = await testLastBackup(options({ database: ['master'] }), deps);

      expect(result.restoreResult).toBe('Success');
      expect(result.dbccResult).toBe('DBCC CHECKDB skipped for restored master (testrestore-master) database');
      expect(result.dbccStart).toBeNull();
      expect(result.dbccElapsedMs).toBeNull();
      expect(source.callsTo('checkDatabase')).toEqual([]);
      expect(source.callsTo('dropDatabase')[0].args).toEqual(['testrestore-master']);
    });

    it('should report a database without a backup as skipped', async () => {
      const [result] = await testLastBackup(options(), deps);

      expect(result.fileExists).toBe(false);
      expect(result.size).toBeNull();
      expect(result.restoreResult).toBe('Skipped');
      expect(result.dbccResult).toBe('Skipped');
      expect(result.backupDate).toBeNull();
      expect(result.backupFiles).toEqual([]);
      expect(source.callsTo('restoreDatabase')).toEqual([]);
    });

    it('should refuse a backup larger than maxMb', async () => {
      source.addBackup(fullBackup('sales', { totalSize: 500 * MB }));

      const [result] = await testLastBackup(options({ maxMb: 100 }), deps);

      expect(result.fileExists).toBe(true);
      expect(result.size).toBe(500 * MB);
      expect(result.restoreResult).toBe(
        'The backup size for sales (500 MB) exceeds the specified maximum size (100 MB).'
      );
      expect(result.dbccResult).toBe('Skipped');
      expect(source.callsTo('restoreDatabase')).toEqual([]);
    });

    describe('with several backup sets appended to one file', () => {
      const secondSet = fullBackup('sales', {
        position: 2,
        totalSize: 20 * MB,
        start: new Date('2026-10-18T00:00:00Z'),
        end: new Date('2026-10-18T00:06:00Z'),
      });

      beforeEach(() => {
        source.addBackup(fullBackup('sales'));
        source.addBackup(secondSet, 20 * MB, [
          { logicalName: 'sales_v2', physicalName: 'C:\\Data\\sales_v2.mdf', type: 'D' },
          { logicalName: 'sales_v2_log', physicalName: 'C:\\Logs\\sales_v2_log.ldf', type: 'L' },
        ]);
      });

      it('should restore the most recent set, not the first one in the file', async () => {
        const [result] = await testLastBackup(options(), deps);

        expect(result.restoreResult).toBe('Success');
        expect(result.size).toBe(20 * MB);
        expect(result.backupDate).toEqual(new Date('2026-10-18T00:00:00Z'));
        expect(source.callsTo('readBackupHeader')[0].args).toEqual([['D:\\Backups\\sales.bak'], 2]);
        expect(source.callsTo('readBackupFileList')[0].args).toEqual([['D:\\Backups\\sales.bak'], 2]);
        expect(source.callsTo('restoreDatabase')[0].args[0]).toEqual({
          database: 'testrestore-sales',
          paths: ['D:\\Backups\\sales.bak'],
          position: 2,
          relocations: [
            { logicalName: 'sales_v2', physicalName: 'D:\\Data\\testrestore-sales_v2.mdf' },
            { logicalName: 'sales_v2_log', physicalName: 'L:\\Logs\\testrestore-sales_v2_log.ldf' },
          ],
        });
      });

      it('should compare the size of the most recent set with maxMb', async () => {
        const [result] = await testLastBackup(options({ maxMb: 15 }), deps);

        expect(result.size).toBe(20 * MB);
        expect(result.restoreResult).toBe(
          'The backup size for sales (20 MB) exceeds the specified maximum size (15 MB).'
        );
        expect(source.callsTo('restoreDatabase')).toEqual([]);
      });

      it('should verify the most recent set with verifyOnly', async () => {
        const [result] = await testLastBackup(options({ verifyOnly: true }), deps);

        expect(result.restoreResult).toBe('Success');
        expect(source.callsTo('verifyBackup')[0].args).toEqual([['D:\\Backups\\sales.bak'], 2]);
      });
    });

    it('should report a backup file the instance cannot see', async () => {
      source.addBackup(fullBackup('sales'));
      source.existingPaths.delete('d:\\backups\\sales.bak');

      const [result] = await testLastBackup(options(), deps);

      expect(result.fileExists).toBe(false);
      expect(result.size).toBe(10 * MB);
      expect(result.restoreResult).toBe('Skipped');
      expect(reporter.warnings).toEqual([
        {
          target: { instance: 'SQL01', database: 'sales' },
          message: 'Backup file D:\\Backups\\sales.bak is not accessible from the destination',
        },
      ]);
    });

    it('should skip the check and keep going when the restore fails', async () => {
      source.addBackup(fullBackup('sales'));
      source.restoreFailures.set('testrestore-sales', 'The media family on device is incorrectly formed.');

      const [result] = await testLastBackup(options(), deps);

      expect(result.restoreResult).toBe('Failure');
      expect(result.dbccResult).toBe('Skipped');
      expect(result.restoreElapsedMs).toBe(1000);
      expect(source.callsTo('checkDatabase')).toEqual([]);
      expect(source.callsTo('dropDatabase')).toEqual([]);
      expect(reporter.warnings.map(w => w.message)).toEqual([
        'Restore failed: The media family on device is incorrectly formed.',
      ]);
    });

    it('should report the check output when the check fails', async () => {
      source.addBackup(fullBackup('sales'));
      source.checkFailures.set('testrestore-sales', 'CHECKDB found 0 allocation errors and 2 consistency errors');

      const [result] = await testLastBackup(options(), deps);

      expect(result.restoreResult).toBe('Success');
      expect(result.dbccResult).toBe('CHECKDB found 0 allocation errors and 2 consistency errors');
      expect(source.callsTo('dropDatabase')).toHaveLength(1);
    });

    it('should not check with noCheck', async () => {
      source.addBackup(fullBackup('sales'));

      const [result] = await testLastBackup(options({ noCheck: true }), deps);

      expect(result.restoreResult).toBe('Success');
      expect(result.dbccResult).toBe('Skipped');
      expect(source.callsTo('checkDatabase')).toEqual([]);
    });

    it('should only verify the backup with verifyOnly', async () => {
      source.addBackup(fullBackup('sales'));

      const [result] = await testLastBackup(options({ verifyOnly: true }), deps);

      expect(result.restoreResult).toBe('Success');
      expect(result.dbccResult).toBe('Skipped');
      expect(source.callsTo('verifyBackup')[0].args).toEqual([['D:\\Backups\\sales.bak'], 1]);
      expect(source.callsTo('restoreDatabase')).toEqual([]);
      expect(source.callsTo('dropDatabase')).toEqual([]);
    });

    it('should keep the copy with noDrop and refuse to overwrite it on the next run', async () => {
      source.addBackup(fullBackup('sales'));

      const first = await testLastBackup(options({ noDrop: true }), deps);
      const second = await testLastBackup(options({ noDrop: true }), deps);

      expect(first).toHaveLength(1);
      expect(source.databases.has('testrestore-sales')).toBe(true);
      expect(second).toEqual([]);
      expect(source.callsTo('restoreDatabase')).toHaveLength(1);
      expect(reporter.warnings).toEqual([
        {
          target: { instance: 'SQL01', database: 'sales' },
          message: 'Database testrestore-sales already exists on SQL01, skipping',
        },
      ]);
    });

    it('should skip a database when the data directory is not reachable', async () => {
      source.addBackup(fullBackup('sales'));

      const results = await testLastBackup(options({ dataDirectory: 'X:\\Missing' }), deps);

      expect(results).toEqual([]);
      expect(reporter.warnings.map(w => w.message)).toEqual(['Destination cannot access X:\\Missing, skipping']);
      expect(source.callsTo('restoreDatabase')).toEqual([]);
    });

    it('should not restore when the gate declines', async () => {
      source.addBackup(fullBackup('sales'));
      const lines: string[] = [];

      const results = await testLastBackup(options(), {
        ...deps,
        gate: createWhatIfGate(line => lines.push(line)),
      });

      expect(results).toEqual([]);
      expect(lines).toEqual([
        'What if: Performing the operation "Restoring sales as testrestore-sales" on target "SQL01".',
      ]);
      expect(source.callsTo('restoreDatabase')).toEqual([]);
    });

    it('should hand each row to onResult as soon as it is final', async () => {
      source.addBackup(fullBackup('sales'));
      const seen: string[] = [];

      await testLastBackup(options(), { ...deps, onResult: result => seen.push(result.database) });

      expect(seen).toEqual(['sales']);
    });

    it('should close the connection when done', async () => {
      await testLastBackup(options(), deps);

      expect(source.closed).toBe(true);
    });
  });

  describe('database selection', () => {
    it('should test every database but tempdb when none is named', async () => {
      const results = await testLastBackup(options({ database: [] }), deps);

      expect(results.map(r => r.database)).toEqual(['master', 'model', 'msdb', 'sales']);
    });

    it('should apply exclusions ignoring case', async () => {
      const results = await testLastBackup(options({ database: [], excludeDatabase: ['MODEL', 'msdb'] }), deps);

      expect(results.map(r => r.database)).toEqual(['master', 'sales']);
    });

    it('should report a requested tempdb as skipped without looking for a backup', async () => {
      const [result] = await testLastBackup(options({ database: ['tempdb'] }), deps);

      expect(result.database).toBe('tempdb');
      expect(result.fileExists).toBeNull();
      expect(result.restoreResult).toBe('Skipped');
      expect(result.dbccResult).toBe('Skipped');
      expect(source.callsTo('getLastFullBackup')).toEqual([]);
    });

    it('should warn about a requested database the source does not have', async () => {
      const results = await testLastBackup(options({ database: ['missing', 'Sales'] }), deps);

      expect(results.map(r => r.database)).toEqual(['sales']);
      expect(reporter.warnings).toEqual([
        { target: { instance: 'SQL01', database: 'missing' }, message: 'Database not found on the source instance' },
      ]);
    });
  });

  describe('on another destination', () => {
    let destination: FakeSqlInstance;

    beforeEach(() => {
      destination = new FakeSqlInstance({
        name: 'SQL02',
        computerName: 'SQL02HOST',
        defaults: { backup: 'E:\\Backup' },
      });
      connector.add(destination);
    });

    it('should not restore a backup on a path local to the source host', async () => {
      source.addBackup(fullBackup('sales'));

      const [result] = await testLastBackup(options({ destination: 'SQL02' }), deps);

      expect(result.testServer).toBe('SQL02');
      expect(result.fileExists).toBeNull();
      expect(result.size).toBe(10 * MB);
      expect(result.restoreResult).toBe('Restore not located on shared location');
      expect(result.dbccResult).toBe('Skipped');
      expect(destination.callsTo('testPath')).toEqual([]);
    });

    it('should restore a backup on a network share', async () => {
      const path = '\\\\fileshare\\sql\\sales.bak';
      source.addBackup(fullBackup('sales', { paths: [path] }));
      destination.addBackupFile(path, 'sales', 10 * MB);

      const [result] = await testLastBackup(options({ destination: 'SQL02' }), deps);

      expect(result.restoreResult).toBe('Success');
      expect(result.dbccResult).toBe('Success');
      expect(destination.callsTo('restoreDatabase')).toHaveLength(1);
      expect(source.callsTo('restoreDatabase')).toEqual([]);
    });

    it('should connect to the destination with its own credential', async () => {
      await testLastBackup(
        options({
          destination: 'SQL02',
          sqlCredential: { username: 'source', password: 'test-secret' },
          destinationCredential: { username: 'dest', password: 'test-secret' },
        }),
        deps
      );

      expect(connector.connections.map(c => [c.instance, c.credential?.username])).toEqual([
        ['SQL01', 'source'],
        ['SQL02', 'dest'],
      ]);
      expect(destination.closed).toBe(true);
      expect(source.closed).toBe(true);
    });

    it('should refuse a destination on an older major version', async () => {
      const old = new FakeSqlInstance({ name: 'SQL03', version: { major: 15, minor: 0 } });
      connector.add(old);
      source.addBackup(fullBackup('sales'));

      const results = await testLastBackup(options({ destination: 'SQL03' }), deps);

      expect(results).toEqual([]);
      expect(reporter.warnings).toEqual([
        {
          target: { instance: 'SQL01' },
          message: 'SQL03 runs 15.0.1000, older than 16.0.1000; backups cannot be restored to an older version',
        },
      ]);
      expect(source.callsTo('listDatabases')).toEqual([]);
    });

    it('should refuse a destination on the same major but an older minor version', async () => {
      const newer = new FakeSqlInstance({ name: 'SQL04', version: { major: 16, minor: 1 } });
      connector.add(newer);

      const results = await testLastBackup(
        options({ sqlInstance: ['SQL04'], destination: 'SQL02' }),
        deps
      );

      expect(results).toEqual([]);
      expect(reporter.warnings).toHaveLength(1);
    });

    it('should allow a destination on a newer version', async () => {
      const newer = new FakeSqlInstance({ name: 'SQL05', version: { major: 17, minor: 0 } });
      connector.add(newer);

      const results = await testLastBackup(options({ destination: 'SQL05' }), deps);

      expect(results).toHaveLength(1);
      expect(results[0].testServer).toBe('SQL05');
    });

    describe('with copyFile', () => {
      it('should copy the backup next to the destination, restore from the copy and clean up', async () => {
        source.addBackup(fullBackup('sales'));
        destination.addBackupFile('E:\\Backup\\testrestore\\sales.bak', 'sales', 10 * MB);

        const [result] = await testLastBackup(options({ destination: 'SQL02', copyFile: true }), deps);

        expect(files.copies).toEqual([
          {
            source: '\\\\SQL01HOST\\D$\\Backups\\sales.bak',
            destination: '\\\\SQL02HOST\\E$\\Backup\\testrestore\\sales.bak',
          },
        ]);
        expect(result.restoreResult).toBe('Success');
        expect(result.backupFiles).toEqual(['E:\\Backup\\testrestore\\sales.bak']);
        expect(files.removed).toEqual(['\\\\SQL02HOST\\E$\\Backup\\testrestore\\sales.bak']);
        expect(files.removedDirectories).toEqual(['\\\\SQL02HOST\\E$\\Backup\\testrestore']);
      });

      it('should copy into copyPath when given', async () => {
        source.addBackup(fullBackup('sales'));
        destination.addBackupFile('F:\\Staging\\testrestore\\sales.bak', 'sales', 10 * MB);

        const [result] = await testLastBackup(
          options({ destination: 'SQL02', copyFile: true, copyPath: 'F:\\Staging' }),
          deps
        );

        expect(files.copies[0].destination).toBe('\\\\SQL02HOST\\F$\\Staging\\testrestore\\sales.bak');
        expect(result.restoreResult).toBe('Success');
      });

      it('should leave a backup on a network share where it is', async () => {
        const path = '\\\\fileshare\\sql\\sales.bak';
        source.addBackup(fullBackup('sales', { paths: [path] }));
        destination.addBackupFile(path, 'sales', 10 * MB);

        const [result] = await testLastBackup(options({ destination: 'SQL02', copyFile: true }), deps);

        expect(files.copies).toEqual([]);
        expect(result.backupFiles).toEqual([path]);
        expect(reporter.infos).toContain('Backup of sales is already on a network share, not copying it');
      });

      it('should skip the database and clean up when the copy fails', async () => {
        source.addBackup(fullBackup('sales'));
        files.failCopy = true;

        const results = await testLastBackup(options({ destination: 'SQL02', copyFile: true }), deps);

        expect(results).toEqual([]);
        expect(reporter.warnings).toEqual([
          {
            target: { instance: 'SQL02', database: 'sales' },
            message: 'Failed to copy backup to \\\\SQL02HOST\\E$\\Backup\\testrestore: The network path was not found.',
          },
        ]);
        expect(files.removedDirectories).toEqual(['\\\\SQL02HOST\\E$\\Backup\\testrestore']);
        expect(destination.callsTo('restoreDatabase')).toEqual([]);
      });
    });
  });

  describe('connection failures', () => {
    it('should warn and continue with the next instance', async () => {
      const results = await testLastBackup(options({ sqlInstance: ['SQL09', 'SQL01'] }), deps);

      expect(results.map(r => r.sourceServer)).toEqual(['SQL01']);
      expect(reporter.warnings).toEqual([
        {
          target: { instance: 'SQL09' },
          message: 'Failure connecting: A network-related or instance-specific error occurred while connecting to SQL09',
        },
      ]);
    });

    it('should close the source when the destination is unreachable', async () => {
      const results = await testLastBackup(options({ destination: 'SQL09' }), deps);

      expect(results).toEqual([]);
      expect(source.closed).toBe(true);
      expect(reporter.warnings[0].target).toEqual({ instance: 'SQL09' });
    });
  });
});
