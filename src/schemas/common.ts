import { z } from 'zod';

// host, host\instance, host,port, host\instance,port
export const instanceNameSchema = z
  .string()
  .min(1)
  .max(255)
  .regex(/^[^\\,\s]+(\\[^,\s]+)?(,\d{1,5})?$/, 'Invalid instance name');

export const credentialSchema = z.object({
  username: z.string().min(1).max(128),
  password: z.string().max(128),
  domain: z.string().min(1).max(255).optional(),
});

export const databaseNameSchema = z.string().min(1).max(128);

export const directorySchema = z.string().min(1).max(260);
