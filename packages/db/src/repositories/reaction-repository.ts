import {
  ReactionTypeSchema,
  type MessageReaction,
  type ReactionRepository,
  type ReactionType,
} from '@homestock/domain';
import { type Queryable } from '../client';
import { toDate, toEnum, type Row } from '../rows';
import { translateWriteErrors } from '../pg-errors';

const REACTION_COLUMNS = 'id, message_id, user_id, type, created_at';

export class PgReactionRepository implements ReactionRepository<Queryable> {
  async add(
    tx: Queryable,
    reaction: { id: string; messageId: string; userId: string; type: ReactionType },
  ): Promise<MessageReaction> {
    const result = await translateWriteErrors(
      () =>
        tx.query(
          `INSERT INTO message_reactions (id, message_id, user_id, type)
           VALUES ($1, $2, $3, $4)
           RETURNING ${REACTION_COLUMNS}`,
          [reaction.id, reaction.messageId, reaction.userId, reaction.type],
        ),
      {
        kind: 'DUPLICATE_REACTION',
        message: 'Reaction already exists',
        details: { messageId: reaction.messageId, userId: reaction.userId, type: reaction.type },
      },
    );
    return mapReactionRow(result.rows[0]);
  }

  async remove(tx: Queryable, messageId: string, userId: string, type: ReactionType): Promise<boolean> {
    const result = await tx.query(
      `DELETE FROM message_reactions WHERE message_id = $1 AND user_id = $2 AND type = $3`,
      [messageId, userId, type],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async listByMessage(tx: Queryable, messageId: string): Promise<MessageReaction[]> {
    const result = await tx.query(
      `SELECT ${REACTION_COLUMNS} FROM message_reactions
       WHERE message_id = $1
       ORDER BY created_at ASC, id ASC`,
      [messageId],
    );
    return result.rows.map(mapReactionRow);
  }
}

function mapReactionRow(row: Row): MessageReaction {
  return {
    id: String(row.id),
    messageId: String(row.message_id),
    userId: String(row.user_id),
    type: toEnum(ReactionTypeSchema, row.type),
    createdAt: toDate(row.created_at),
  };
}
