import {
  CollectedData,
  CollectedValue,
  ConversationView,
  LeadConversation,
  Message,
  MessageRole,
  QualificationStatus,
  TerminalStatus,
} from '../types/conversation';
import { ExtractedData } from '../types/qualification';
import { ConflictError } from './errors';

export function createConversation(phone: string, contactName?: string, now: Date = new Date()): LeadConversation {
  return {
    phone,
    messages: [],
    collectedData: {},
    status: QualificationStatus.IN_PROGRESS,
    score: 0,
    attempts: 0,
    notes: [],
    startedAt: now,
    endedAt: null,
    metadata: contactName ? { contactName } : {},
  };
}

/** Working copy for a turn. Messages are frozen, so they are shared. */
export function cloneConversation(conversation: LeadConversation): LeadConversation {
  return {
    ...conversation,
    messages: [...conversation.messages],
    collectedData: { ...conversation.collectedData },
    notes: [...conversation.notes],
    startedAt: new Date(conversation.startedAt),
    endedAt: conversation.endedAt ? new Date(conversation.endedAt) : null,
    metadata: { ...conversation.metadata },
  };
}

export function isTerminal(status: QualificationStatus): status is TerminalStatus {
  return status !== QualificationStatus.IN_PROGRESS;
}

export function appendMessage(
  conversation: LeadConversation,
  role: MessageRole,
  content: string,
  metadata: Record<string, unknown> = {},
  now: Date = new Date()
): Message {
  const message: Message = Object.freeze({ role, content, timestamp: now, metadata: Object.freeze({ ...metadata }) });
  conversation.messages.push(message);
  return message;
}

export function addNote(conversation: LeadConversation, note: string, now: Date = new Date()): void {
  conversation.notes.push(`[${now.toISOString()}] ${note}`);
}

export function isFilled(value: CollectedValue | null | undefined): value is CollectedValue {
  if (value === null || value === undefined) return false;
  if (typeof value === 'string') return value.trim().length > 0;
  return true;
}

export function filledFieldCount(data: CollectedData): number {
  return Object.values(data).filter((value) => isFilled(value)).length;
}

/**
 * Merges freshly extracted facts into the conversation. A later non-null
 * answer replaces an earlier one; null or blank values never erase anything.
 * Returns the fields whose stored value changed.
 */
export function mergeCollectedData(
  conversation: LeadConversation,
  extracted: ExtractedData,
  now: Date = new Date()
): string[] {
  const changed: string[] = [];

  for (const [field, value] of Object.entries(extracted)) {
    if (!isFilled(value)) continue;
    if (conversation.collectedData[field] === value) continue;

    conversation.collectedData[field] = value;
    addNote(conversation, `Campo '${field}' coletado: ${value}`, now);
    changed.push(field);
  }

  return changed;
}

export function terminate(
  conversation: LeadConversation,
  status: TerminalStatus,
  note: string,
  now: Date = new Date()
): void {
  if (isTerminal(conversation.status)) {
    throw new ConflictError(`Conversation ${conversation.phone} is already ${conversation.status}`);
  }

  conversation.status = status;
  conversation.endedAt = now;
  addNote(conversation, note, now);
}

export function lastActivityAt(conversation: LeadConversation): Date {
  const last = conversation.messages[conversation.messages.length - 1];
  return last ? last.timestamp : conversation.startedAt;
}

export function userMessages(conversation: LeadConversation): Message[] {
  return conversation.messages.filter((m) => m.role === 'user');
}

export function contactNameOf(conversation: LeadConversation): string | null {
  const collected = conversation.collectedData.name;
  if (isFilled(collected)) return String(collected);

  const contactName = conversation.metadata.contactName;
  return typeof contactName === 'string' && contactName.trim().length > 0 ? contactName.trim() : null;
}

export function toConversationView(conversation: LeadConversation): ConversationView {
  return {
    phone: conversation.phone,
    status: conversation.status,
    score: conversation.score,
    attempts: conversation.attempts,
    collected_data: { ...conversation.collectedData },
    messages: conversation.messages.map((m) => ({
      role: m.role,
      content: m.content,
      timestamp: m.timestamp.toISOString(),
      metadata: { ...m.metadata },
    })),
    messages_count: conversation.messages.length,
    notes: [...conversation.notes],
    started_at: conversation.startedAt.toISOString(),
    ended_at: conversation.endedAt ? conversation.endedAt.toISOString() : null,
    metadata: { ...conversation.metadata },
  };
}
