import { type User, type UserRepository } from '@homestock/domain';
import { type Queryable } from '../client';
import { toDate, type Row } from '../rows';
import { translateWriteErrors } from '../pg-errors';

const USER_COLUMNS = 'id, login_id, credential_hash, display_name, created_at, updated_at';

export class PgUserRepository implements UserRepository<Queryable> {
  async create(
    tx: Queryable,
    user: { id: string; loginId: string; credentialHash: string; displayName: string },
  ): Promise<User> {
    const result = await translateWriteErrors(
      () =>
        tx.query(
          `INSERT INTO users (id, login_id, credential_hash, display_name)
           VALUES ($1, $2, $3, $4)
           RETURNING ${USER_COLUMNS}`,
          [user.id, user.loginId, user.credentialHash, user.displayName],
        ),
      { kind: 'DUPLICATE_LOGIN', message: 'Login id already taken', details: { loginId: user.loginId } },
    );
    return mapUserRow(result.rows[0]);
  }

  async findById(tx: Queryable, id: string): Promise<User | null> {
    const result = await tx.query(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async findByLoginId(tx: Queryable, loginId: string): Promise<User | null> {
    const result = await tx.query(`SELECT ${USER_COLUMNS} FROM users WHERE login_id = $1`, [loginId]);
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async updateDisplayName(tx: Queryable, id: string, displayName: string): Promise<User | null> {
    const result = await tx.query(
      `UPDATE users SET display_name = $2, updated_at = NOW()
       WHERE id = $1
       RETURNING ${USER_COLUMNS}`,
      [id, displayName],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }
}

function mapUserRow(row: Row): User {
  return {
    id: String(row.id),
    loginId: String(row.login_id),
    credentialHash: String(row.credential_hash),
    displayName: String(row.display_name),
    createdAt: toDate(row.created_at),
    updatedAt: toDate(row.updated_at),
  };
}
