import { LeadConversation, QualificationStatus } from '../types/conversation';
import { QualificationStats } from '../types/qualification';
import { cloneConversation, createConversation, isTerminal, lastActivityAt } from '../utils/conversation';
import { KeyedMutex } from '../utils/keyed-mutex';

/**
 * In-process repository of conversations keyed by normalized phone. Writers go
 * through withLock so turns for one phone never interleave.
 */
export class ConversationStore {
  private conversations = new Map<string, LeadConversation>();
  private mutex = new KeyedMutex();

  get(phone: string): LeadConversation | undefined {
    return this.conversations.get(phone);
  }

  /**
   * Working copy of the stored conversation, or a fresh one. Nothing is stored
   * until save() is called with it.
   */
  getOrCreate(
    phone: string,
    contactName?: string,
    now: Date = new Date()
  ): { conversation: LeadConversation; created: boolean } {
    const stored = this.conversations.get(phone);
    if (stored) {
      return { conversation: cloneConversation(stored), created: false };
    }
    return { conversation: createConversation(phone, contactName, now), created: true };
  }

  save(conversation: LeadConversation): void {
    this.conversations.set(conversation.phone, conversation);
  }

  withLock<T>(phone: string, fn: () => Promise<T> | T): Promise<T> {
    return this.mutex.runExclusive(phone, fn);
  }

  /**
   * Applies `expire` to every in-progress conversation idle for at least
   * `timeoutMinutes`. Each candidate is re-checked under its own lock, so a
   * turn that lands first keeps it alive and a second sweep finds nothing.
   */
  async sweepExpired<T>(
    now: Date,
    timeoutMinutes: number,
    expire: (draft: LeadConversation) => T
  ): Promise<T[]> {
    const cutoff = now.getTime() - timeoutMinutes * 60_000;
    const isExpired = (conversation: LeadConversation) =>
      !isTerminal(conversation.status) && lastActivityAt(conversation).getTime() <= cutoff;

    const candidates = [...this.conversations.values()].filter(isExpired).map((c) => c.phone);
    const results: T[] = [];

    for (const phone of candidates) {
      await this.withLock(phone, () => {
        const current = this.conversations.get(phone);
        if (!current || !isExpired(current)) return;

        const draft = cloneConversation(current);
        const result = expire(draft);
        this.save(draft);
        results.push(result);
      });
    }

    return results;
  }

  list(): LeadConversation[] {
    return [...this.conversations.values()];
  }

  listActive(): LeadConversation[] {
    return this.list().filter((c) => c.status === QualificationStatus.IN_PROGRESS);
  }

  countByStatus(): QualificationStats {
    const counts: QualificationStats = {
      [QualificationStatus.IN_PROGRESS]: 0,
      [QualificationStatus.QUALIFIED]: 0,
      [QualificationStatus.DISQUALIFIED]: 0,
      [QualificationStatus.ESCALATED]: 0,
      [QualificationStatus.TIMEOUT]: 0,
    };
    for (const conversation of this.conversations.values()) {
      counts[conversation.status]++;
    }
    return counts;
  }

  get size(): number {
    return this.conversations.size;
  }
}
