#!/usr/bin/env node
import { ZodError } from 'zod';
import { loadConfig } from '../config.js';
import { parseTestLastBackupArgs, formatZodError, UsageError } from '../cli/arguments.js';
import { formatLastBackupResult, TEST_LAST_BACKUP_USAGE } from '../cli/output.js';
import { createSqlServerConnector } from '../engine/connection.js';
import { localFileTransfer } from '../engine/file-transfer.js';
import { testLastBackup } from '../services/backup-verifier.js';
import { createChangeGate } from '../utils/change-gate.js';
import { createConsoleReporter } from '../utils/reporter.js';

async function main() {
  try {
    const config = loadConfig();
    const command = parseTestLastBackupArgs(process.argv.slice(2), config);

    if (command.help) {
      console.log(TEST_LAST_BACKUP_USAGE);
      return;
    }

    const { options, mode, silent, format } = command;
    const results = await testLastBackup(options, {
      connector: createSqlServerConnector(config.connection),
      files: localFileTransfer,
      gate: createChangeGate(mode),
      reporter: createConsoleReporter({ silent }),
      onResult: format === 'list'
        ? (result) => console.log(`\n${formatLastBackupResult(result)}`)
        : undefined,
    });

    if (format === 'json') {
      console.log(JSON.stringify(results, null, 2));
    }
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(error.message);
      for (const detail of error.details) {
        console.error(`  ${detail}`);
      }
      console.error(`\n${TEST_LAST_BACKUP_USAGE}`);
    } else if (error instanceof ZodError) {
      console.error('Invalid configuration:');
      for (const detail of formatZodError(error)) {
        console.error(`  ${detail}`);
      }
    } else {
      console.error('test-last-backup failed:', error);
    }
    process.exit(1);
  }
}

main();
