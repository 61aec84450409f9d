import { z } from 'zod';
import { instanceNameSchema, credentialSchema, databaseNameSchema, directorySchema } from './common.js';

// Sizes are in megabytes
const sizeSchema = z.number().int().positive().max(16777216);
const growthSchema = z.number().int().min(0).max(16777216);

export const newDatabaseSchema = z.object({
  sqlInstance: z.array(instanceNameSchema).min(1, 'At least one instance is required'),
  sqlCredential: credentialSchema.optional(),
  name: z.array(databaseNameSchema).default([]),
  collation: z.string().regex(/^[A-Za-z0-9_]+$/, 'Invalid collation name').max(128).optional(),
  recoveryModel: z.enum(['Simple', 'Full', 'BulkLogged']).optional(),
  owner: z.string().min(1).max(128).optional(),
  dataFilePath: directorySchema.optional(),
  logFilePath: directorySchema.optional(),
  primaryFileSize: sizeSchema.optional(),
  primaryFileGrowth: growthSchema.optional(),
  primaryFileMaxSize: sizeSchema.optional(),
  logSize: sizeSchema.optional(),
  logGrowth: growthSchema.optional(),
  logMaxSize: sizeSchema.optional(),
  secondaryFileSize: sizeSchema.optional(),
  secondaryFileGrowth: growthSchema.optional(),
  secondaryFileMaxSize: sizeSchema.optional(),
  secondaryFileCount: z.number().int().min(1).max(32767).optional(),
  defaultFileGroup: z.enum(['Primary', 'Secondary']).optional(),
  dataFileSuffix: z.string().max(64).default(''),
  logFileSuffix: z.string().max(64).default('_log'),
  secondaryDataFileSuffix: z.string().max(64).default('_MainData'),
}).refine(
  (data) =>
    data.defaultFileGroup !== 'Secondary' ||
    data.secondaryFileSize !== undefined ||
    data.secondaryFileGrowth !== undefined ||
    data.secondaryFileMaxSize !== undefined ||
    data.secondaryFileCount !== undefined,
  {
    message: 'A secondary default filegroup needs secondary file options',
    path: ['defaultFileGroup'],
  }
);

export type NewDatabaseInput = z.input<typeof newDatabaseSchema>;
export type NewDatabaseOptions = z.infer<typeof newDatabaseSchema>;
