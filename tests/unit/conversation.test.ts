import { QualificationStatus } from '../../src/types/conversation';
import {
  addNote,
  appendMessage,
  cloneConversation,
  contactNameOf,
  createConversation,
  lastActivityAt,
  mergeCollectedData,
  terminate,
  toConversationView,
} from '../../src/utils/conversation';
import { ConflictError } from '../../src/utils/errors';
import { normalizePhone, toE164 } from '../../src/utils/phone';
import { minutesAfter, T0 } from '../helpers/conversations';

describe('conversation helpers', () => {
  describe('mergeCollectedData', () => {
    it('should store only non-blank values and note each change', () => {
      const conversation = createConversation('5511999990000', undefined, T0);

      const changed = mergeCollectedData(conversation, { name: 'Ana', phone: null, email: '   ' }, T0);

      expect(changed).toEqual(['name']);
      expect(conversation.collectedData).toEqual({ name: 'Ana' });
      expect(conversation.notes).toEqual(["[2026-01-05T12:00:00.000Z] Campo 'name' coletado: Ana"]);
    });

    it('should be idempotent', () => {
      const conversation = createConversation('5511999990000', undefined, T0);
      mergeCollectedData(conversation, { name: 'Ana', budget: 500 }, T0);
      const before = cloneConversation(conversation);

      expect(mergeCollectedData(conversation, { name: 'Ana', budget: 500 }, T0)).toEqual([]);
      expect(conversation.collectedData).toEqual(before.collectedData);
      expect(conversation.notes).toEqual(before.notes);
    });

    it('should let a later value replace an earlier one', () => {
      const conversation = createConversation('5511999990000', undefined, T0);
      mergeCollectedData(conversation, { name: 'Ana' }, T0);

      expect(mergeCollectedData(conversation, { name: 'Ana Souza' }, T0)).toEqual(['name']);
      expect(conversation.collectedData.name).toBe('Ana Souza');
    });

    it('should never erase a value with null', () => {
      const conversation = createConversation('5511999990000', undefined, T0);
      mergeCollectedData(conversation, { name: 'Ana', active: false }, T0);
      mergeCollectedData(conversation, { name: null, active: null }, T0);

      expect(conversation.collectedData).toEqual({ name: 'Ana', active: false });
    });
  });

  describe('terminate', () => {
    it('should set status, end time and note once', () => {
      const conversation = createConversation('5511999990000', undefined, T0);
      const end = minutesAfter(T0, 5);

      terminate(conversation, QualificationStatus.QUALIFIED, 'qualificado', end);

      expect(conversation.status).toBe(QualificationStatus.QUALIFIED);
      expect(conversation.endedAt).toEqual(end);
      expect(conversation.notes).toEqual(['[2026-01-05T12:05:00.000Z] qualificado']);
    });

    it('should refuse to leave a terminal state', () => {
      const conversation = createConversation('5511999990000', undefined, T0);
      terminate(conversation, QualificationStatus.ESCALATED, 'escalado', T0);

      expect(() => terminate(conversation, QualificationStatus.TIMEOUT, 'timeout', T0)).toThrow(ConflictError);
      expect(conversation.status).toBe(QualificationStatus.ESCALATED);
    });
  });

  it('should freeze appended messages', () => {
    const conversation = createConversation('5511999990000', undefined, T0);
    const message = appendMessage(conversation, 'user', 'oi', { channel: 'sms' }, T0);

    expect(Object.isFrozen(message)).toBe(true);
    expect(conversation.messages).toHaveLength(1);
  });

  it('should measure inactivity from the last message, or the start', () => {
    const conversation = createConversation('5511999990000', undefined, T0);
    expect(lastActivityAt(conversation)).toEqual(T0);

    appendMessage(conversation, 'user', 'oi', {}, minutesAfter(T0, 3));
    expect(lastActivityAt(conversation)).toEqual(minutesAfter(T0, 3));
  });

  it('should prefer the collected name over the display name', () => {
    const conversation = createConversation('5511999990000', 'Contato WhatsApp', T0);
    expect(contactNameOf(conversation)).toBe('Contato WhatsApp');

    conversation.collectedData.name = 'Ana';
    expect(contactNameOf(conversation)).toBe('Ana');

    expect(contactNameOf(createConversation('5511999990000', undefined, T0))).toBeNull();
  });

  it('should clone independently and keep dates', () => {
    const conversation = createConversation('5511999990000', undefined, T0);
    appendMessage(conversation, 'user', 'oi', {}, T0);
    const copy = cloneConversation(conversation);

    copy.collectedData.name = 'Ana';
    copy.attempts = 3;

    expect(conversation.collectedData).toEqual({});
    expect(conversation.attempts).toBe(0);
    expect(copy.startedAt).toBeInstanceOf(Date);
    expect(copy.startedAt).not.toBe(conversation.startedAt);
    expect(copy.messages[0].timestamp.getTime()).toBe(T0.getTime());
  });

  it('should keep messages frozen in a clone', () => {
    const conversation = createConversation('5511999990000', undefined, T0);
    appendMessage(conversation, 'user', 'oi', { channel: 'whatsapp' }, T0);
    const copy = cloneConversation(conversation);

    appendMessage(copy, 'assistant', 'Olá!', {}, T0);

    expect(Object.isFrozen(copy.messages[0])).toBe(true);
    expect(Object.isFrozen(copy.messages[0].metadata)).toBe(true);
    expect(conversation.messages).toHaveLength(1);
    expect(copy.messages).toHaveLength(2);
  });

  it('should render a JSON-friendly view', () => {
    const conversation = createConversation('5511999990000', 'Ana', T0);
    appendMessage(conversation, 'user', 'oi', {}, T0);
    addNote(conversation, 'nota', T0);

    expect(toConversationView(conversation)).toEqual({
      phone: '5511999990000',
      status: 'in_progress',
      score: 0,
      attempts: 0,
      collected_data: {},
      messages: [{ role: 'user', content: 'oi', timestamp: '2026-01-05T12:00:00.000Z', metadata: {} }],
      messages_count: 1,
      notes: ['[2026-01-05T12:00:00.000Z] nota'],
      started_at: '2026-01-05T12:00:00.000Z',
      ended_at: null,
      metadata: { contactName: 'Ana' },
    });
  });
});

describe('normalizePhone', () => {
  it.each([
    ['whatsapp:+5511999990000', '5511999990000'],
    ['5511999990000@c.us', '5511999990000'],
    ['+1 (555) 123-4567', '15551234567'],
  ])('should normalize %s', (raw, expected) => {
    expect(normalizePhone(raw)).toBe(expected);
  });

  it('should reject implausible numbers', () => {
    expect(normalizePhone('123')).toBeNull();
    expect(normalizePhone('1234567890123456')).toBeNull();
    expect(normalizePhone('')).toBeNull();
  });

  it('should format E.164', () => {
    expect(toE164('5511999990000')).toBe('+5511999990000');
    expect(toE164('+5511999990000')).toBe('+5511999990000');
  });
});
