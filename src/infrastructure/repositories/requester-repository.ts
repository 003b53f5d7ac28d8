/**
 * Requester repository: employees who submit HR requests.
 */
import type { SqliteDatabase } from '@/infrastructure/database.js';
import { asRequesterId } from '@/core/types.js';
import type { RequesterId } from '@/core/types.js';
import type { Requester, RequesterRepository } from '@/support/types.js';

interface RequesterRow {
  id: string;
  is_vip: number;
  created_at: string;
}

function toRequesterModel(row: RequesterRow): Requester {
  return {
    requesterId: asRequesterId(row.id),
    isVip: row.is_vip === 1,
    createdAt: new Date(row.created_at),
  };
}

/** Create a RequesterRepository backed by SQLite. */
export function createRequesterRepository(
  db: SqliteDatabase,
  now: () => Date = () => new Date(),
): RequesterRepository {
  const select = db.prepare('SELECT * FROM requesters WHERE id = ?');
  const insertIfMissing = db.prepare(
    'INSERT INTO requesters (id, is_vip, created_at) VALUES (?, 0, ?) ON CONFLICT(id) DO NOTHING',
  );
  const updateVip = db.prepare('UPDATE requesters SET is_vip = ? WHERE id = ?');

  function find(id: string): RequesterRow | undefined {
    return select.get(id) as RequesterRow | undefined;
  }

  return {
    async getOrCreate(id: RequesterId): Promise<Requester> {
      insertIfMissing.run(id, now().toISOString());
      const row = find(id);
      if (!row) throw new Error(`Requester ${id} vanished after insert`);
      return toRequesterModel(row);
    },

    async setVip(id: RequesterId, isVip: boolean): Promise<Requester | null> {
      const info = updateVip.run(Number(isVip), id);
      if (info.changes === 0) return null;
      const row = find(id);
      return row ? toRequesterModel(row) : null;
    },
  };
}
