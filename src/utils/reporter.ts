/**
 * Progress and diagnostic output for the workflows.
 *
 * Informational lines go to console.log and are dropped in silent mode. Warnings are
 * per-item diagnostics tagged with the instance and database they concern and are always shown.
 */

export interface Reporter {
  info(message: string): void;
  warn(target: DiagnosticTarget, message: string): void;
}

export interface DiagnosticTarget {
  instance: string;
  database?: string;
}

export function formatTarget(target: DiagnosticTarget): string {
  return target.database ? `[${target.instance}] ${target.database}` : `[${target.instance}]`;
}

export function createConsoleReporter(options: { silent?: boolean } = {}): Reporter {
  return {
    info(message: string) {
      if (!options.silent) {
        console.log(message);
      }
    },
    warn(target: DiagnosticTarget, message: string) {
      console.warn(`WARNING: ${formatTarget(target)}: ${message}`);
    },
  };
}

/**
 * Extract a readable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
