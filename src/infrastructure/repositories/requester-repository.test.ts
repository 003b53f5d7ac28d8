import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { asRequesterId } from '@/core/types.js';
import { createDatabase } from '@/infrastructure/database.js';
import type { AppDatabase } from '@/infrastructure/database.js';
import type { RequesterRepository } from '@/support/types.js';
import { createMockLogger } from '@/testing/fixtures/workflow.js';
import { createRequesterRepository } from './requester-repository.js';

describe('RequesterRepository', () => {
  let db: AppDatabase;
  let requesters: RequesterRepository;
  const firstSeen = new Date('2025-03-01T09:00:00.000Z');

  beforeEach(() => {
    db = createDatabase({ path: ':memory:', logger: createMockLogger() });
    requesters = createRequesterRepository(db.client, () => firstSeen);
  });

  afterEach(() => {
    db.close();
  });

  describe('getOrCreate', () => {
    it('creates a non-VIP requester on first contact', async () => {
      const requester = await requesters.getOrCreate(asRequesterId('emp-1'));

      expect(requester).toEqual({ requesterId: 'emp-1', isVip: false, createdAt: firstSeen });
    });

    it('returns the stored requester on later contacts', async () => {
      await requesters.getOrCreate(asRequesterId('emp-1'));
      await requesters.setVip(asRequesterId('emp-1'), true);

      const requester = await requesters.getOrCreate(asRequesterId('emp-1'));

      expect(requester.isVip).toBe(true);
      const { total } = db.client.prepare('SELECT COUNT(*) AS total FROM requesters').get() as { total: number };
      expect(total).toBe(1);
    });
  });

  describe('setVip', () => {
    it('toggles the flag', async () => {
      await requesters.getOrCreate(asRequesterId('emp-1'));

      expect((await requesters.setVip(asRequesterId('emp-1'), true))?.isVip).toBe(true);
      expect((await requesters.setVip(asRequesterId('emp-1'), false))?.isVip).toBe(false);
    });

    it('returns null for an unknown requester', async () => {
      expect(await requesters.setVip(asRequesterId('nobody'), true)).toBeNull();
    });
  });
});
