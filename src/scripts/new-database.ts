#!/usr/bin/env node
import { ZodError } from 'zod';
import { loadConfig } from '../config.js';
import { parseNewDatabaseArgs, formatZodError, UsageError } from '../cli/arguments.js';
import { formatDatabaseDescriptor, NEW_DATABASE_USAGE } from '../cli/output.js';
import { createSqlServerConnector } from '../engine/connection.js';
import { newDatabase } from '../services/database-provisioner.js';
import { createChangeGate } from '../utils/change-gate.js';
import { createConsoleReporter } from '../utils/reporter.js';

async function main() {
  try {
    const config = loadConfig();
    const command = parseNewDatabaseArgs(process.argv.slice(2), config);

    if (command.help) {
      console.log(NEW_DATABASE_USAGE);
      return;
    }

    const { options, mode, silent, format } = command;
    const created = await newDatabase(options, {
      connector: createSqlServerConnector(config.connection),
      gate: createChangeGate(mode),
      reporter: createConsoleReporter({ silent }),
      onResult: format === 'list'
        ? (database) => console.log(`\n${formatDatabaseDescriptor(database)}`)
        : undefined,
    });

    if (format === 'json') {
      console.log(JSON.stringify(created, null, 2));
    }
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(error.message);
      for (const detail of error.details) {
        console.error(`  ${detail}`);
      }
      console.error(`\n${NEW_DATABASE_USAGE}`);
    } else if (error instanceof ZodError) {
      console.error('Invalid configuration:');
      for (const detail of formatZodError(error)) {
        console.error(`  ${detail}`);
      }
    } else {
      console.error('new-database failed:', error);
    }
    process.exit(1);
  }
}

main();
