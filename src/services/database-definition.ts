import {
  DatabaseDefinition,
  DatabaseFileDefinition,
  FileGroupDefinition,
  TemplateFileSizes,
} from '../engine/types.js';
import { NewDatabaseOptions } from '../schemas/new-database.js';
import { joinPath } from '../utils/paths.js';

const KB_PER_MB = 1024;

export const PRIMARY_FILEGROUP = 'PRIMARY';

export function hasSecondaryLayout(options: NewDatabaseOptions): boolean {
  return (
    options.secondaryFileSize !== undefined ||
    options.secondaryFileGrowth !== undefined ||
    options.secondaryFileMaxSize !== undefined ||
    options.secondaryFileCount !== undefined
  );
}

/**
 * Any option that needs an explicit file layout instead of the engine's defaults
 */
export function hasAdvancedLayout(options: NewDatabaseOptions): boolean {
  return (
    options.dataFilePath !== undefined ||
    options.logFilePath !== undefined ||
    options.primaryFileSize !== undefined ||
    options.primaryFileGrowth !== undefined ||
    options.primaryFileMaxSize !== undefined ||
    options.logSize !== undefined ||
    options.logGrowth !== undefined ||
    options.logMaxSize !== undefined ||
    options.defaultFileGroup !== undefined ||
    hasSecondaryLayout(options)
  );
}

function mbToKb(mb: number | undefined): number | undefined {
  return mb === undefined ? undefined : mb * KB_PER_MB;
}

// A database cannot be smaller than model, which it is copied from
function atLeast(sizeKb: number | undefined, floorKb: number): number | undefined {
  return sizeKb === undefined ? undefined : Math.max(sizeKb, floorKb);
}

export function secondaryFileGroupName(name: string, options: NewDatabaseOptions): string {
  return `${name}${options.secondaryDataFileSuffix}`;
}

export interface LayoutContext {
  dataPath: string;
  logPath: string;
  /** Required when the options ask for a custom layout */
  template: TemplateFileSizes | null;
}

export function buildDatabaseDefinition(
  name: string,
  options: NewDatabaseOptions,
  context: LayoutContext
): DatabaseDefinition {
  const definition: DatabaseDefinition = {
    name,
    collation: options.collation,
    recoveryModel: options.recoveryModel,
  };

  if (!hasAdvancedLayout(options)) {
    return definition;
  }

  const { template } = context;
  if (!template) {
    throw new Error('Template file sizes are required for a custom file layout');
  }

  const primaryName = `${name}${options.dataFileSuffix}`;
  const primaryFile: DatabaseFileDefinition = {
    logicalName: primaryName,
    physicalName: joinPath(context.dataPath, `${primaryName}.mdf`),
    sizeKb: atLeast(mbToKb(options.primaryFileSize), template.primarySizeKb),
    growthKb: mbToKb(options.primaryFileGrowth),
    maxSizeKb: atLeast(mbToKb(options.primaryFileMaxSize), template.primarySizeKb),
  };

  const logName = `${name}${options.logFileSuffix}`;
  const logFile: DatabaseFileDefinition = {
    logicalName: logName,
    physicalName: joinPath(context.logPath, `${logName}.ldf`),
    sizeKb: atLeast(mbToKb(options.logSize), template.logSizeKb),
    growthKb: mbToKb(options.logGrowth),
    maxSizeKb: atLeast(mbToKb(options.logMaxSize), template.logSizeKb),
  };

  let secondary: FileGroupDefinition | undefined;
  if (hasSecondaryLayout(options)) {
    const groupName = secondaryFileGroupName(name, options);
    const count = options.secondaryFileCount ?? 1;
    const files: DatabaseFileDefinition[] = [];

    for (let i = 1; i <= count; i++) {
      const fileName = `${groupName}_${i}`;
      files.push({
        logicalName: fileName,
        physicalName: joinPath(context.dataPath, `${fileName}.ndf`),
        sizeKb: mbToKb(options.secondaryFileSize),
        growthKb: mbToKb(options.secondaryFileGrowth),
        maxSizeKb: mbToKb(options.secondaryFileMaxSize),
      });
    }
    secondary = { name: groupName, files };
  }

  definition.layout = {
    primary: { name: PRIMARY_FILEGROUP, files: [primaryFile] },
    secondary,
    log: logFile,
  };
  return definition;
}
