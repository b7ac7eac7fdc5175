import { type FamilyGroup, type Membership } from './group';
import {
  type GroupRepository,
  type ItemRepository,
  type MembershipRepository,
  type UserRepository,
} from './ports';
import { CapabilitySchema, MemberRoleSchema, parseEnum, type Capability, type MemberRole } from './enums';
import { DomainError } from './errors';
import { findMembership, membershipAllows, requireCapability } from './permissions';
import { deleteAtomically, type CascadeReport, type DeletionDeps } from './cascade';
import { GroupNameSchema, isId, parseInput } from './validation';

export interface MembershipServiceDeps<Tx> extends DeletionDeps<Tx> {
  userRepo: UserRepository<Tx>;
  groupRepo: GroupRepository<Tx>;
  memberRepo: MembershipRepository<Tx>;
  itemRepo: ItemRepository<Tx>;
  generateId: () => string;
}

export class MembershipService<Tx> {
  constructor(private readonly deps: MembershipServiceDeps<Tx>) {}

  /** The creator joins as `poster` in the same transaction. */
  async createGroup(creatorId: string, name: string): Promise<FamilyGroup> {
    const groupName = parseInput(GroupNameSchema, name);
    const { userRepo, groupRepo, memberRepo, generateId } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const creator = isId(creatorId) ? await userRepo.findById(tx, creatorId) : null;
      if (!creator) {
        throw new DomainError('USER_NOT_FOUND', 'User not found', { userId: creatorId });
      }
      const group = await groupRepo.create(tx, { id: generateId(), name: groupName });
      await memberRepo.add(tx, { userId: creatorId, groupId: group.id, role: 'poster' });
      return group;
    });
  }

  async addMember(userId: string, groupId: string, role: MemberRole): Promise<Membership> {
    const parsedRole = parseEnum(MemberRoleSchema, 'role', role);
    const { userRepo, groupRepo, memberRepo } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const user = isId(userId) ? await userRepo.findById(tx, userId) : null;
      if (!user) {
        throw new DomainError('USER_NOT_FOUND', 'User not found', { userId });
      }
      const group = isId(groupId) ? await groupRepo.findById(tx, groupId) : null;
      if (!group) {
        throw new DomainError('GROUP_NOT_FOUND', 'Group not found', { groupId });
      }
      return memberRepo.add(tx, { userId, groupId, role: parsedRole });
    });
  }

  /** A demoted owner keeps their items; only removal is blocked by ownership. */
  async changeRole(userId: string, groupId: string, role: MemberRole): Promise<Membership> {
    const parsedRole = parseEnum(MemberRoleSchema, 'role', role);

    return this.deps.withTransaction(async (tx) => {
      const membership =
        isId(userId) && isId(groupId)
          ? await this.deps.memberRepo.updateRole(tx, groupId, userId, parsedRole)
          : null;
      if (!membership) {
        throw new DomainError('NOT_A_MEMBER', 'User is not a member of this group', { userId, groupId });
      }
      return membership;
    });
  }

  /**
   * Refuses with `MEMBER_OWNS_ITEMS` while the user still owns items in the group;
   * those items have to be deleted first. The membership row is locked for update,
   * so a concurrent `createItem` either commits before the check or waits and fails.
   */
  async removeMember(userId: string, groupId: string): Promise<void> {
    const { memberRepo, itemRepo } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const membership = await findMembership(memberRepo, tx, groupId, userId, 'update');
      if (!membership) {
        throw new DomainError('NOT_A_MEMBER', 'User is not a member of this group', { userId, groupId });
      }
      const itemIds = await itemRepo.listOwnedIds(tx, groupId, userId);
      if (itemIds.length > 0) {
        throw new DomainError(
          'MEMBER_OWNS_ITEMS',
          `User still owns ${itemIds.length} item(s) in this group`,
          { userId, groupId, itemIds },
        );
      }
      await memberRepo.remove(tx, groupId, userId);
    });
  }

  async authorize(userId: string, groupId: string, action: Capability): Promise<boolean> {
    const capability = parseEnum(CapabilitySchema, 'action', action);
    return this.deps.withTransaction(async (tx) => {
      const membership = await findMembership(this.deps.memberRepo, tx, groupId, userId);
      return membershipAllows(membership, capability);
    });
  }

  async require(userId: string, groupId: string, action: Capability): Promise<Membership> {
    const capability = parseEnum(CapabilitySchema, 'action', action);
    return this.deps.withTransaction(async (tx) =>
      requireCapability(this.deps.memberRepo, tx, userId, groupId, capability),
    );
  }

  async listMembers(actorId: string, groupId: string): Promise<Membership[]> {
    return this.deps.withTransaction(async (tx) => {
      await requireCapability(this.deps.memberRepo, tx, actorId, groupId, 'read');
      return this.deps.memberRepo.listByGroup(tx, groupId);
    });
  }

  async listGroupsForUser(userId: string): Promise<Array<FamilyGroup & { role: MemberRole }>> {
    if (!isId(userId)) return [];
    return this.deps.withTransaction(async (tx) => this.deps.groupRepo.listForUser(tx, userId));
  }

  async deleteGroup(actorId: string, groupId: string): Promise<CascadeReport> {
    return deleteAtomically(this.deps, { kind: 'group', id: groupId }, async (tx) => {
      const group = isId(groupId) ? await this.deps.groupRepo.findById(tx, groupId) : null;
      if (!group) {
        throw new DomainError('GROUP_NOT_FOUND', 'Group not found', { groupId });
      }
      await requireCapability(this.deps.memberRepo, tx, actorId, groupId, 'write');
    });
  }
}
