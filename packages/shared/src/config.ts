import { z } from 'zod';

export const BaseConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  NODE_ID: z.coerce.number().int().min(0).max(1023).default(0),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;

export const DatabaseConfigSchema = z.object({
  DATABASE_URL: z.string().min(1),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
});

export const StorageConfigSchema = z.object({
  BLOB_STORE: z.enum(['s3', 'memory']).default('s3'),
  S3_ENDPOINT: z.string().url().optional(),
  S3_REGION: z.string().default('us-east-1'),
  S3_BUCKET: z.string().min(1).default('homestock-media'),
  S3_ACCESS_KEY: z.string().default(''),
  S3_SECRET_KEY: z.string().default(''),
});

export const IntegrityConfigSchema = z.object({
  MAX_TRAVERSAL_DEPTH: z.coerce.number().int().positive().default(64),
  TX_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  LISTING_PAGE_SIZE: z.coerce.number().int().positive().max(1000).default(50),
});

export const CoreConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema)
  .merge(StorageConfigSchema)
  .merge(IntegrityConfigSchema)
  .superRefine((config, ctx) => {
    if (config.BLOB_STORE !== 's3') return;
    for (const key of ['S3_ACCESS_KEY', 'S3_SECRET_KEY'] as const) {
      if (config[key] === '') {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'Required when BLOB_STORE is s3' });
      }
    }
  });

export type CoreConfig = z.infer<typeof CoreConfigSchema>;

export function loadConfig<T extends z.ZodType>(
  schema: T,
  env: Record<string, string | undefined> = process.env,
): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Config validation failed:\n${formatted}`);
  }
  return result.data;
}
