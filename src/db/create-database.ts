import { DatabaseDefinition, DatabaseFileDefinition, RecoveryModel } from '../engine/types.js';
import { quoteName, quoteString } from '../utils/sql.js';

const RECOVERY_MODEL_SQL: Record<RecoveryModel, string> = {
  Simple: 'SIMPLE',
  Full: 'FULL',
  BulkLogged: 'BULK_LOGGED',
};

function renderFile(file: DatabaseFileDefinition): string {
  const parts = [
    `NAME = ${quoteString(file.logicalName)}`,
    `FILENAME = ${quoteString(file.physicalName)}`,
  ];
  if (file.sizeKb !== undefined) parts.push(`SIZE = ${file.sizeKb}KB`);
  if (file.growthKb !== undefined) parts.push(`FILEGROWTH = ${file.growthKb}KB`);
  parts.push(`MAXSIZE = ${file.maxSizeKb === undefined ? 'UNLIMITED' : `${file.maxSizeKb}KB`}`);
  return `(${parts.join(', ')})`;
}

/**
 * Statements that create a database from its definition, in execution order:
 * CREATE DATABASE first, then the recovery model.
 */
export function renderCreateDatabase(definition: DatabaseDefinition): string[] {
  const lines = [`CREATE DATABASE ${quoteName(definition.name)}`];

  const { layout } = definition;
  if (layout) {
    const groups = [`ON PRIMARY ${layout.primary.files.map(renderFile).join(', ')}`];
    if (layout.secondary) {
      groups.push(`FILEGROUP ${quoteName(layout.secondary.name)} ${layout.secondary.files.map(renderFile).join(', ')}`);
    }
    lines.push(groups.join(', '));
    lines.push(`LOG ON ${renderFile(layout.log)}`);
  }

  if (definition.collation) {
    lines.push(`COLLATE ${definition.collation}`);
  }

  const statements = [lines.join(' ')];
  if (definition.recoveryModel) {
    statements.push(
      `ALTER DATABASE ${quoteName(definition.name)} SET RECOVERY ${RECOVERY_MODEL_SQL[definition.recoveryModel]}`
    );
  }
  return statements;
}
