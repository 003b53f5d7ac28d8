import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { asConversationId, asRequesterId } from '@/core/types.js';
import { createDatabase } from '@/infrastructure/database.js';
import type { AppDatabase } from '@/infrastructure/database.js';
import type { ConversationRepository, RequesterRepository, SaveConversationInput } from '@/support/types.js';
import { createMockLogger } from '@/testing/fixtures/workflow.js';
import { createConversationRepository } from './conversation-repository.js';
import { createRequesterRepository } from './requester-repository.js';

const EMPLOYEE = asRequesterId('emp-42');

function makeConversation(overrides?: Partial<SaveConversationInput>): SaveConversationInput {
  return {
    conversationId: asConversationId('conv_aaaaaaaaaaaa'),
    requesterId: EMPLOYEE,
    query: 'When is payday?',
    category: 'Payroll',
    sentiment: 'Neutral',
    priorityScore: 3,
    response: 'The last business day of the month.',
    responseTimeSeconds: 1.25,
    status: 'Resolved',
    escalated: false,
    ...overrides,
  };
}

describe('ConversationRepository', () => {
  let db: AppDatabase;
  let conversations: ConversationRepository;
  let requesters: RequesterRepository;

  beforeEach(async () => {
    db = createDatabase({ path: ':memory:', logger: createMockLogger() });
    let tick = 0;
    const clock = (): Date => new Date(Date.UTC(2025, 2, 1, 9, 0, tick++));
    conversations = createConversationRepository(db.client, clock);
    requesters = createRequesterRepository(db.client, clock);
    await requesters.getOrCreate(EMPLOYEE);
  });

  afterEach(() => {
    db.close();
  });

  it('saves a conversation and reads it back', async () => {
    await conversations.save(
      makeConversation({
        escalated: true,
        status: 'Escalated',
        escalationReason: 'Angry sentiment detected',
        metadata: { isVip: false },
      }),
    );

    const found = await conversations.findById(asConversationId('conv_aaaaaaaaaaaa'));

    expect(found).toMatchObject({
      conversationId: 'conv_aaaaaaaaaaaa',
      requesterId: 'emp-42',
      category: 'Payroll',
      status: 'Escalated',
      escalated: true,
      escalationReason: 'Angry sentiment detected',
      metadata: { isVip: false },
      responseTimeSeconds: 1.25,
    });
  });

  it('returns null for an unknown id', async () => {
    expect(await conversations.findById(asConversationId('conv_missing'))).toBeNull();
  });

  it('lists conversations most recent first', async () => {
    await conversations.save(makeConversation({ conversationId: asConversationId('conv_1') }));
    await conversations.save(makeConversation({ conversationId: asConversationId('conv_2') }));
    await conversations.save(makeConversation({ conversationId: asConversationId('conv_3') }));

    const listed = await conversations.listForRequester(EMPLOYEE, 2);

    expect(listed.map((c) => c.conversationId)).toEqual(['conv_3', 'conv_2']);
  });

  it('builds history from the last messages of the most recent conversations', async () => {
    await conversations.save(makeConversation({ conversationId: asConversationId('conv_old'), query: 'q-old', response: 'a-old' }));
    await conversations.save(makeConversation({ conversationId: asConversationId('conv_mid'), query: 'q-mid1', response: 'a-mid1' }));
    await conversations.save(makeConversation({ conversationId: asConversationId('conv_mid'), query: 'q-mid2', response: 'a-mid2' }));
    await conversations.save(makeConversation({ conversationId: asConversationId('conv_new'), query: 'q-new', response: 'a-new' }));

    const history = await conversations.recentHistory(EMPLOYEE, { conversations: 2 });

    expect(history).toEqual([
      { role: 'assistant', content: 'a-mid1' },
      { role: 'user', content: 'q-mid2' },
      { role: 'assistant', content: 'a-mid2' },
      { role: 'user', content: 'q-new' },
      { role: 'assistant', content: 'a-new' },
    ]);
  });

  it('keeps the first creation time when a conversation is saved again', async () => {
    await conversations.save(makeConversation({ priorityScore: 3 }));
    const second = await conversations.save(makeConversation({ priorityScore: 7 }));

    expect(second.priorityScore).toBe(7);
    expect(second.createdAt.toISOString()).toBe('2025-03-01T09:00:01.000Z');
  });

  it('stores feedback for a conversation', async () => {
    await conversations.save(makeConversation());

    const feedback = await conversations.addFeedback({
      conversationId: asConversationId('conv_aaaaaaaaaaaa'),
      rating: 4,
      comment: 'Helpful',
    });

    expect(feedback).toEqual({
      conversationId: 'conv_aaaaaaaaaaaa',
      rating: 4,
      comment: 'Helpful',
      createdAt: new Date('2025-03-01T09:00:02.000Z'),
    });
  });

  it('rejects a rating outside 1-5', async () => {
    await conversations.save(makeConversation());

    await expect(
      conversations.addFeedback({ conversationId: asConversationId('conv_aaaaaaaaaaaa'), rating: 9 }),
    ).rejects.toThrow(/CHECK constraint/);
  });
});

describe('RequesterRepository', () => {
  let db: AppDatabase;
  let requesters: RequesterRepository;

  beforeEach(() => {
    db = createDatabase({ path: ':memory:', logger: createMockLogger() });
    requesters = createRequesterRepository(db.client, () => new Date('2025-03-01T00:00:00.000Z'));
  });

  afterEach(() => {
    db.close();
  });

  it('creates a non-VIP requester on first contact and returns it afterwards', async () => {
    const first = await requesters.getOrCreate(EMPLOYEE);
    await requesters.setVip(EMPLOYEE, true);
    const second = await requesters.getOrCreate(EMPLOYEE);

    expect(first.isVip).toBe(false);
    expect(second.isVip).toBe(true);
    expect(second.createdAt.toISOString()).toBe('2025-03-01T00:00:00.000Z');
  });

  it('returns null when flagging an unknown requester', async () => {
    expect(await requesters.setVip(asRequesterId('nobody'), true)).toBeNull();
  });
});
