import { DomainError } from './errors';
import { type Capability, type MemberRole } from './enums';
import { type Membership } from './group';
import { type MembershipRepository, type RowLock } from './ports';
import { isId } from './validation';

export const ROLE_CAPABILITIES: Record<MemberRole, ReadonlySet<Capability>> = {
  poster: new Set<Capability>(['read', 'write', 'reply', 'react']),
  viewer: new Set<Capability>(['read', 'reply', 'react']),
};

export function roleAllows(role: MemberRole, capability: Capability): boolean {
  return ROLE_CAPABILITIES[role].has(capability);
}

export function membershipAllows(membership: Membership | null, capability: Capability): boolean {
  return membership !== null && roleAllows(membership.role, capability);
}

/**
 * Loads the caller's membership and throws `NOT_AUTHORIZED` unless it grants `capability`.
 * With `lock`, the membership row stays locked until the transaction ends.
 */
export async function requireCapability<Tx>(
  memberships: MembershipRepository<Tx>,
  tx: Tx,
  userId: string,
  groupId: string,
  capability: Capability,
  lock?: RowLock,
): Promise<Membership> {
  const membership = await findMembership(memberships, tx, groupId, userId, lock);
  if (!membership || !roleAllows(membership.role, capability)) {
    throw new DomainError('NOT_AUTHORIZED', `User may not ${capability} in this group`, {
      userId,
      groupId,
      action: capability,
      role: membership?.role ?? null,
    });
  }
  return membership;
}

/** Malformed ids match no membership. */
export async function findMembership<Tx>(
  memberships: MembershipRepository<Tx>,
  tx: Tx,
  groupId: string,
  userId: string,
  lock?: RowLock,
): Promise<Membership | null> {
  if (!isId(groupId) || !isId(userId)) return null;
  return lock ? memberships.findLocked(tx, groupId, userId, lock) : memberships.find(tx, groupId, userId);
}
