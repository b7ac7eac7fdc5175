import { DomainError, type DomainErrorKind, type ErrorDetailValue } from '@homestock/domain';

export const UNIQUE_VIOLATION = '23505';
export const FOREIGN_KEY_VIOLATION = '23503';

export function pgErrorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}

function pgConstraint(err: unknown): string | null {
  if (typeof err !== 'object' || err === null || !('constraint' in err)) return null;
  return typeof err.constraint === 'string' ? err.constraint : null;
}

/**
 * Rewrites constraint violations raised by a write into domain errors.
 * Anything else is rethrown untouched.
 */
export async function translateWriteErrors<T>(
  write: () => Promise<T>,
  onUnique?: { kind: DomainErrorKind; message: string; details: Record<string, ErrorDetailValue> },
): Promise<T> {
  try {
    return await write();
  } catch (err) {
    const code = pgErrorCode(err);
    if (code === UNIQUE_VIOLATION && onUnique) {
      throw new DomainError(onUnique.kind, onUnique.message, onUnique.details, { cause: err });
    }
    if (code === FOREIGN_KEY_VIOLATION) {
      throw new DomainError(
        'REFERENCE_NOT_FOUND',
        'Referenced row does not exist',
        { constraint: pgConstraint(err) },
        { cause: err },
      );
    }
    throw err;
  }
}
