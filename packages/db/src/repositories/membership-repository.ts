import {
  MemberRoleSchema,
  type MemberRole,
  type Membership,
  type MembershipRepository,
  type RowLock,
} from '@homestock/domain';
import { type Queryable } from '../client';
import { toDate, toEnum, type Row } from '../rows';
import { translateWriteErrors } from '../pg-errors';

const MEMBER_COLUMNS = 'user_id, group_id, role, joined_at';

const LOCK_CLAUSES: Record<RowLock, string> = {
  share: 'FOR SHARE',
  update: 'FOR UPDATE',
};

export class PgMembershipRepository implements MembershipRepository<Queryable> {
  async add(tx: Queryable, member: { userId: string; groupId: string; role: MemberRole }): Promise<Membership> {
    const result = await translateWriteErrors(
      () =>
        tx.query(
          `INSERT INTO memberships (user_id, group_id, role)
           VALUES ($1, $2, $3)
           RETURNING ${MEMBER_COLUMNS}`,
          [member.userId, member.groupId, member.role],
        ),
      {
        kind: 'DUPLICATE_MEMBERSHIP',
        message: 'User is already a member of the group',
        details: { userId: member.userId, groupId: member.groupId },
      },
    );
    return mapMemberRow(result.rows[0]);
  }

  async find(tx: Queryable, groupId: string, userId: string): Promise<Membership | null> {
    const result = await tx.query(
      `SELECT ${MEMBER_COLUMNS} FROM memberships WHERE group_id = $1 AND user_id = $2`,
      [groupId, userId],
    );
    return result.rows[0] ? mapMemberRow(result.rows[0]) : null;
  }

  async findLocked(tx: Queryable, groupId: string, userId: string, lock: RowLock): Promise<Membership | null> {
    const result = await tx.query(
      `SELECT ${MEMBER_COLUMNS} FROM memberships WHERE group_id = $1 AND user_id = $2 ${LOCK_CLAUSES[lock]}`,
      [groupId, userId],
    );
    return result.rows[0] ? mapMemberRow(result.rows[0]) : null;
  }

  async updateRole(tx: Queryable, groupId: string, userId: string, role: MemberRole): Promise<Membership | null> {
    const result = await tx.query(
      `UPDATE memberships SET role = $3
       WHERE group_id = $1 AND user_id = $2
       RETURNING ${MEMBER_COLUMNS}`,
      [groupId, userId, role],
    );
    return result.rows[0] ? mapMemberRow(result.rows[0]) : null;
  }

  async remove(tx: Queryable, groupId: string, userId: string): Promise<boolean> {
    const result = await tx.query(`DELETE FROM memberships WHERE group_id = $1 AND user_id = $2`, [
      groupId,
      userId,
    ]);
    return (result.rowCount ?? 0) > 0;
  }

  async listByGroup(tx: Queryable, groupId: string): Promise<Membership[]> {
    const result = await tx.query(
      `SELECT ${MEMBER_COLUMNS} FROM memberships
       WHERE group_id = $1
       ORDER BY joined_at ASC, user_id ASC`,
      [groupId],
    );
    return result.rows.map(mapMemberRow);
  }
}

function mapMemberRow(row: Row): Membership {
  return {
    userId: String(row.user_id),
    groupId: String(row.group_id),
    role: toEnum(MemberRoleSchema, row.role),
    joinedAt: toDate(row.joined_at),
  };
}
