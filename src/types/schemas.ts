import { z } from 'zod';

export const portRangeSchema = z
  .object({
    min: z.number().int().min(1).max(65535),
    max: z.number().int().min(1).max(65535),
  })
  .refine((range) => range.min <= range.max, { message: 'ports.min must not exceed ports.max' });

export const daemonSettingsSchema = z.object({
  binaryName: z.string().min(1).optional(),
  releaseRepo: z.string().regex(/^[^/\s]+\/[^/\s]+$/, 'expected "owner/repo"').optional(),
  apiBaseUrl: z.string().url().optional(),
  downloadBaseUrl: z.string().url().optional(),
});

export const appConfigSchema = z.object({
  ports: portRangeSchema.optional(),
  daemon: daemonSettingsSchema.optional(),
});

export const globalDefaultsSchema = z.object({
  binary: z.string().min(1).optional(),
});

export const environmentRecordSchema = z.object({
  path: z.string().min(1),
  email: z.string().min(1),
  port: z.number().int().nonnegative(),
  name: z.string(),
  serverUrl: z.string(),
  devMode: z.boolean(),
  binary: z.string().optional(),
  binaryVersion: z.string().optional(),
  binaryHash: z.string().optional(),
  binaryOs: z.string().optional(),
  binaryArch: z.string().optional(),
  createdAt: z.string().optional(),
  updatedAt: z.string().optional(),
});

export const registrySchema = z.record(z.string(), environmentRecordSchema);

// The daemon rewrites this file during its own login flow, so unknown keys are kept.
export const localConfigSchema = z
  .object({
    email: z.string().min(1),
    data_dir: z.string().min(1),
    server_url: z.string().min(1),
    client_url: z.string().optional(),
    client_token: z.string().optional(),
    refresh_token: z.string().optional(),
    dev_mode: z.boolean().optional(),
  })
  .passthrough();
