import { z } from 'zod';

// Largest length a JavaScript array can have
export const MAX_WRITE_COUNT = 4_294_967_295;

// A missing `number` decodes to 0 and is rejected later as non-positive
export const WriteRequestSchema = z.object({
  number: z.number().int().max(MAX_WRITE_COUNT).default(0)
});

const optionalString = z.string().trim().min(1).optional();

export const S3StorageConfigSchema = z.object({
  provider: z.literal('s3'),
  bucket: z.string().min(1),
  region: z.string().min(1).default('us-east-1'),
  endpoint: z.string().url().optional(),
  forcePathStyle: z.boolean().default(false),
  accessKeyId: optionalString,
  secretAccessKey: optionalString
}).refine(
  config => Boolean(config.accessKeyId) === Boolean(config.secretAccessKey),
  { message: 'accessKeyId and secretAccessKey must be set together', path: ['accessKeyId'] }
);

export const LocalStorageConfigSchema = z.object({
  provider: z.literal('local'),
  bucket: z.string().min(1),
  baseDirectory: z.string().min(1)
});

export const StorageConfigSchema = z.union([S3StorageConfigSchema, LocalStorageConfigSchema]);

export const AppConfigSchema = z.object({
  server: z.object({
    port: z.number().int().min(1).max(65535)
  }),
  storage: StorageConfigSchema,
  writes: z.object({
    timeoutMs: z.number().int().positive(),
    objectSize: z.number().int().positive()
  })
});
