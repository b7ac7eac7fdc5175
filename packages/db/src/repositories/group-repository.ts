import {
  MemberRoleSchema,
  type FamilyGroup,
  type GroupRepository,
  type MemberRole,
} from '@homestock/domain';
import { type Queryable } from '../client';
import { toDate, toEnum, type Row } from '../rows';

export class PgGroupRepository implements GroupRepository<Queryable> {
  async create(tx: Queryable, group: { id: string; name: string }): Promise<FamilyGroup> {
    const result = await tx.query(
      `INSERT INTO family_groups (id, name)
       VALUES ($1, $2)
       RETURNING id, name, created_at`,
      [group.id, group.name],
    );
    return mapGroupRow(result.rows[0]);
  }

  async findById(tx: Queryable, id: string): Promise<FamilyGroup | null> {
    const result = await tx.query(`SELECT id, name, created_at FROM family_groups WHERE id = $1`, [id]);
    return result.rows[0] ? mapGroupRow(result.rows[0]) : null;
  }

  async listForUser(tx: Queryable, userId: string): Promise<Array<FamilyGroup & { role: MemberRole }>> {
    const result = await tx.query(
      `SELECT g.id, g.name, g.created_at, m.role
       FROM family_groups g
       JOIN memberships m ON m.group_id = g.id
       WHERE m.user_id = $1
       ORDER BY g.name ASC, g.id ASC`,
      [userId],
    );
    return result.rows.map((row) => ({ ...mapGroupRow(row), role: toEnum(MemberRoleSchema, row.role) }));
  }
}

function mapGroupRow(row: Row): FamilyGroup {
  return {
    id: String(row.id),
    name: String(row.name),
    createdAt: toDate(row.created_at),
  };
}
