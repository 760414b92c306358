import { ConversationStore } from '../../src/services/conversation.store';
import { QualificationStatus } from '../../src/types/conversation';
import { appendMessage, createConversation, terminate } from '../../src/utils/conversation';
import { minutesAfter, T0 } from '../helpers/conversations';

function storedConversation(store: ConversationStore, phone: string, lastMessageAt: Date) {
  const conversation = createConversation(phone, undefined, T0);
  appendMessage(conversation, 'user', 'oi', {}, lastMessageAt);
  store.save(conversation);
  return conversation;
}

describe('ConversationStore', () => {
  it('should hand out a fresh unsaved conversation', () => {
    const store = new ConversationStore();

    const { conversation, created } = store.getOrCreate('5511999990000', 'Ana', T0);

    expect(created).toBe(true);
    expect(conversation.metadata).toEqual({ contactName: 'Ana' });
    expect(store.get('5511999990000')).toBeUndefined();
  });

  it('should return a working copy of a stored conversation', () => {
    const store = new ConversationStore();
    storedConversation(store, '5511999990000', T0);

    const { conversation, created } = store.getOrCreate('5511999990000');
    conversation.attempts = 9;

    expect(created).toBe(false);
    expect(store.get('5511999990000')?.attempts).toBe(0);
  });

  describe('sweepExpired', () => {
    const expire = (draft: ReturnType<typeof createConversation>) => {
      terminate(draft, QualificationStatus.TIMEOUT, 'timeout', minutesAfter(T0, 30));
      return draft.phone;
    };

    it('should time out idle conversations exactly once', async () => {
      const store = new ConversationStore();
      storedConversation(store, '5511000000001', T0);
      storedConversation(store, '5511000000002', minutesAfter(T0, 20));

      await expect(store.sweepExpired(minutesAfter(T0, 30), 30, expire)).resolves.toEqual(['5511000000001']);
      await expect(store.sweepExpired(minutesAfter(T0, 30), 30, expire)).resolves.toEqual([]);

      expect(store.get('5511000000001')?.status).toBe(QualificationStatus.TIMEOUT);
      expect(store.get('5511000000002')?.status).toBe(QualificationStatus.IN_PROGRESS);
    });

    it('should skip conversations that are already closed', async () => {
      const store = new ConversationStore();
      const closed = storedConversation(store, '5511000000001', T0);
      terminate(closed, QualificationStatus.QUALIFIED, 'ok', T0);

      await expect(store.sweepExpired(minutesAfter(T0, 60), 30, expire)).resolves.toEqual([]);
      expect(store.get('5511000000001')?.status).toBe(QualificationStatus.QUALIFIED);
    });

    it('should use the start time when there are no messages', async () => {
      const store = new ConversationStore();
      store.save(createConversation('5511000000003', undefined, T0));

      await expect(store.sweepExpired(minutesAfter(T0, 30), 30, expire)).resolves.toEqual(['5511000000003']);
    });
  });

  it('should count and list by status', () => {
    const store = new ConversationStore();
    storedConversation(store, '5511000000001', T0);
    const qualified = storedConversation(store, '5511000000002', T0);
    terminate(qualified, QualificationStatus.QUALIFIED, 'ok', T0);

    expect(store.countByStatus()).toEqual({
      in_progress: 1,
      qualified: 1,
      disqualified: 0,
      escalated: 0,
      timeout: 0,
    });
    expect(store.listActive().map((c) => c.phone)).toEqual(['5511000000001']);
    expect(store.list()).toHaveLength(2);
    expect(store.size).toBe(2);
  });
});
