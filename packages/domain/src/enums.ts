import { z } from 'zod';
import { DomainError } from './errors';

export const MemberRoleSchema = z.enum(['poster', 'viewer']);
export const CapabilitySchema = z.enum(['read', 'write', 'reply', 'react']);
export const ConditionRankSchema = z.enum(['S', 'A', 'B', 'C', 'D']);
export const ListingStatusSchema = z.enum(['active', 'sold', 'removed']);
export const ItemStatusSchema = z.enum(['active', 'archived']);
export const ReactionTypeSchema = z.enum(['like', 'heart', 'smile', 'sad', 'agree']);

export type MemberRole = z.infer<typeof MemberRoleSchema>;
export type Capability = z.infer<typeof CapabilitySchema>;
export type ConditionRank = z.infer<typeof ConditionRankSchema>;
export type ListingStatus = z.infer<typeof ListingStatusSchema>;
export type ItemStatus = z.infer<typeof ItemStatusSchema>;
export type ReactionType = z.infer<typeof ReactionTypeSchema>;

export function parseEnum<T extends [string, ...string[]]>(
  schema: z.ZodEnum<T>,
  field: string,
  value: unknown,
): T[number] {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new DomainError('INVALID_ENUM_VALUE', `Invalid ${field}: ${String(value)}`, {
      field,
      value: String(value),
      allowed: [...schema.options],
    });
  }
  return result.data;
}
