import { z } from 'zod';
import { instanceNameSchema, credentialSchema, databaseNameSchema, directorySchema } from './common.js';

export const testLastBackupSchema = z.object({
  sqlInstance: z.array(instanceNameSchema).min(1, 'At least one instance is required'),
  sqlCredential: credentialSchema.optional(),
  destination: instanceNameSchema.optional(),
  destinationCredential: credentialSchema.optional(),
  database: z.array(databaseNameSchema).default([]),
  excludeDatabase: z.array(databaseNameSchema).default([]),
  dataDirectory: directorySchema.optional(),
  logDirectory: directorySchema.optional(),
  // Becomes part of database and file names
  prefix: z.string().max(64).regex(/^[A-Za-z0-9_.-]*$/, 'Prefix may only contain letters, digits, _ . -'),
  verifyOnly: z.boolean().default(false),
  noCheck: z.boolean().default(false),
  noDrop: z.boolean().default(false),
  copyFile: z.boolean().default(false),
  copyPath: directorySchema.optional(),
  maxMb: z.number().int().positive().optional(),
  ignoreCopyOnly: z.boolean().default(false),
}).refine(
  (data) => data.copyPath === undefined || data.copyFile,
  {
    message: 'copyPath requires copyFile',
    path: ['copyPath'],
  }
);

export type TestLastBackupInput = z.input<typeof testLastBackupSchema>;
export type TestLastBackupOptions = z.infer<typeof testLastBackupSchema>;
