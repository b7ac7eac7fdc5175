export type ErrorCategory =
  | 'NotFound'
  | 'AlreadyExists'
  | 'NotAuthorized'
  | 'InvalidValue'
  | 'InUse'
  | 'ConcurrentConflict'
  | 'DeleteFailed';

export type DomainErrorKind =
  | 'USER_NOT_FOUND'
  | 'GROUP_NOT_FOUND'
  | 'NOT_A_MEMBER'
  | 'PARENT_NOT_FOUND'
  | 'CATEGORY_NOT_FOUND'
  | 'REFERENCE_ITEM_NOT_FOUND'
  | 'LISTING_NOT_FOUND'
  | 'REFERENCE_NOT_FOUND'
  | 'ITEM_NOT_FOUND'
  | 'IMAGE_NOT_FOUND'
  | 'THREAD_NOT_FOUND'
  | 'MESSAGE_NOT_FOUND'
  | 'REACTION_NOT_FOUND'
  | 'BLOB_NOT_FOUND'
  | 'DUPLICATE_LOGIN'
  | 'DUPLICATE_MEMBERSHIP'
  | 'DUPLICATE_REACTION'
  | 'NOT_AUTHORIZED'
  | 'INVALID_INPUT'
  | 'INVALID_ENUM_VALUE'
  | 'INVALID_PRICE'
  | 'INVALID_STATUS_TRANSITION'
  | 'CYCLE_DETECTED'
  | 'SELF_REFERENCE_CYCLE'
  | 'PARENT_NOT_IN_THREAD'
  | 'DEPTH_LIMIT_EXCEEDED'
  | 'CATEGORY_IN_USE'
  | 'REFERENCE_ITEM_IN_USE'
  | 'MEMBER_OWNS_ITEMS'
  | 'CONCURRENT_CONFLICT'
  | 'DELETE_FAILED';

const CATEGORY_MAP: Record<DomainErrorKind, ErrorCategory> = {
  USER_NOT_FOUND: 'NotFound',
  GROUP_NOT_FOUND: 'NotFound',
  NOT_A_MEMBER: 'NotFound',
  PARENT_NOT_FOUND: 'NotFound',
  CATEGORY_NOT_FOUND: 'NotFound',
  REFERENCE_ITEM_NOT_FOUND: 'NotFound',
  LISTING_NOT_FOUND: 'NotFound',
  REFERENCE_NOT_FOUND: 'NotFound',
  ITEM_NOT_FOUND: 'NotFound',
  IMAGE_NOT_FOUND: 'NotFound',
  THREAD_NOT_FOUND: 'NotFound',
  MESSAGE_NOT_FOUND: 'NotFound',
  REACTION_NOT_FOUND: 'NotFound',
  BLOB_NOT_FOUND: 'NotFound',
  DUPLICATE_LOGIN: 'AlreadyExists',
  DUPLICATE_MEMBERSHIP: 'AlreadyExists',
  DUPLICATE_REACTION: 'AlreadyExists',
  NOT_AUTHORIZED: 'NotAuthorized',
  INVALID_INPUT: 'InvalidValue',
  INVALID_ENUM_VALUE: 'InvalidValue',
  INVALID_PRICE: 'InvalidValue',
  INVALID_STATUS_TRANSITION: 'InvalidValue',
  CYCLE_DETECTED: 'InvalidValue',
  SELF_REFERENCE_CYCLE: 'InvalidValue',
  PARENT_NOT_IN_THREAD: 'InvalidValue',
  DEPTH_LIMIT_EXCEEDED: 'InvalidValue',
  CATEGORY_IN_USE: 'InUse',
  REFERENCE_ITEM_IN_USE: 'InUse',
  MEMBER_OWNS_ITEMS: 'InUse',
  CONCURRENT_CONFLICT: 'ConcurrentConflict',
  DELETE_FAILED: 'DeleteFailed',
};

export type ErrorDetailValue = string | number | boolean | null | string[];

/**
 * Structured failure raised by every integrity check. `kind` names the violated
 * invariant, `details` carries the offending identifiers.
 */
export class DomainError extends Error {
  public readonly category: ErrorCategory;

  constructor(
    public readonly kind: DomainErrorKind,
    message: string,
    public readonly details: Record<string, ErrorDetailValue> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DomainError';
    this.category = CATEGORY_MAP[kind];
  }
}

export function isDomainError(err: unknown): err is DomainError {
  return err instanceof DomainError;
}
