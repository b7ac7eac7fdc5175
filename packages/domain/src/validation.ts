import { z } from 'zod';
import { DomainError } from './errors';
import { ConditionRankSchema, ItemStatusSchema, ListingStatusSchema } from './enums';

export const MESSAGE_CONTENT_MAX_LENGTH = 4000;

const MAX_ID = 2n ** 63n - 1n;

const DECIMAL_ID = /^\d{1,19}$/;

// The refinement also runs after a failed regex check, so it tests the pattern again.
const IdSchema = z
  .string()
  .regex(DECIMAL_ID, 'Identifier must be a decimal id')
  .refine((value) => !DECIMAL_ID.test(value) || BigInt(value) <= MAX_ID, 'Identifier is out of range');

/** True when `value` can name a stored row (a decimal BIGINT). */
export function isId(value: string): boolean {
  return IdSchema.safeParse(value).success;
}

export const LoginIdSchema = z.string().trim().toLowerCase().min(1, 'Login id is required').max(255);
export const DisplayNameSchema = z.string().trim().min(1, 'Display name is required').max(100);
export const GroupNameSchema = z.string().trim().min(1, 'Group name is required').max(100);
export const CategoryNameSchema = z.string().trim().min(1, 'Category name is required').max(100);

export const ReferenceItemInputSchema = z.object({
  name: z.string().trim().min(1, 'Reference item name is required').max(255),
  brand: z.string().trim().max(255).nullish(),
});

export const CreateItemInputSchema = z.object({
  name: z.string().trim().min(1, 'Item name is required').max(255),
  description: z.string().max(10_000).nullish(),
  condition: ConditionRankSchema.nullish(),
  refItemId: IdSchema.nullish(),
  categoryId: IdSchema.nullish(),
});

export const UpdateItemInputSchema = CreateItemInputSchema.partial();

export const ItemListQuerySchema = z.object({
  status: ItemStatusSchema.optional(),
});

export const ListingFilterSchema = z.object({
  status: ListingStatusSchema.optional(),
  from: z.string().optional(),
  to: z.string().optional(),
});

export const ThreadTitleSchema = z.string().trim().max(255).nullish();

export const MessageContentSchema = z
  .string()
  .trim()
  .min(1, 'Message content is required')
  .max(MESSAGE_CONTENT_MAX_LENGTH, `Message must be at most ${MESSAGE_CONTENT_MAX_LENGTH} characters`);

export type CreateItemInput = z.input<typeof CreateItemInputSchema>;
export type UpdateItemInput = z.input<typeof UpdateItemInputSchema>;

/**
 * Parses untrusted input. Closed-set violations surface as `INVALID_ENUM_VALUE`,
 * everything else as `INVALID_INPUT`.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (result.success) return result.data;

  const issues = result.error.issues;
  const enumIssue = issues.find(isEnumIssue);
  if (enumIssue) {
    const field = enumIssue.path.join('.');
    throw new DomainError('INVALID_ENUM_VALUE', `Invalid ${field || 'value'}: ${enumIssue.message}`, {
      field,
      allowed: enumIssue.options.map(String),
    });
  }

  throw new DomainError('INVALID_INPUT', issues.map((issue) => issue.message).join('; '), {
    fields: issues.map((issue) => issue.path.join('.')),
  });
}

function isEnumIssue(issue: z.ZodIssue): issue is z.ZodIssue & z.ZodInvalidEnumValueIssue {
  return issue.code === z.ZodIssueCode.invalid_enum_value;
}
