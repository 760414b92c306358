import { ConversationView, LeadConversation, QualificationStatus, TerminalStatus } from '../types/conversation';
import {
  DisqualificationReason,
  ExtractedData,
  QualificationCriteria,
  QualificationResult,
  QualificationStats,
} from '../types/qualification';
import { AIProvider, ProviderStats } from '../types/provider';
import { criteriaPatchSchema, criteriaSchema, freezeCriteria } from '../config/criteria';
import { ConversationStore } from './conversation.store';
import { HandoffService } from './handoff.service';
import { PromptService } from './prompt.service';
import { ScoringService } from './scoring.service';
import {
  appendMessage,
  cloneConversation,
  isTerminal,
  mergeCollectedData,
  terminate,
  toConversationView,
} from '../utils/conversation';
import { ProviderError, ValidationError } from '../utils/errors';
import { normalizePhone } from '../utils/phone';
import { logger } from '../utils/logger';

export interface QualificationServiceDeps {
  provider: AIProvider;
  criteria: QualificationCriteria;
  store?: ConversationStore;
  scoring?: ScoringService;
  prompts?: PromptService;
  handoff?: HandoffService;
  clock?: () => Date;
}

export interface ProcessOptions {
  /** Aborting discards the turn: nothing is committed. */
  signal?: AbortSignal;
}

interface Closing {
  status: TerminalStatus;
  reason: string;
  note: string;
  response: string;
}

const REPLY_OPTIONS = { maxTokens: 150, temperature: 0.7 };

/**
 * Runs the qualification conversation for every lead: one turn per inbound
 * message, serialized per phone, committed only when the turn completes.
 */
export class QualificationService {
  private readonly provider: AIProvider;
  private readonly store: ConversationStore;
  private readonly scoring: ScoringService;
  private readonly prompts: PromptService;
  private readonly handoff: HandoffService;
  private readonly clock: () => Date;
  private criteria: QualificationCriteria;

  constructor(deps: QualificationServiceDeps) {
    this.provider = deps.provider;
    this.criteria = freezeCriteria(criteriaSchema.parse(deps.criteria));
    this.store = deps.store ?? new ConversationStore();
    this.scoring = deps.scoring ?? new ScoringService();
    this.prompts = deps.prompts ?? new PromptService();
    this.handoff = deps.handoff ?? new HandoffService(this.scoring);
    this.clock = deps.clock ?? (() => new Date());
  }

  async processMessage(
    phone: string,
    message: string,
    metadata: Record<string, unknown> = {},
    options: ProcessOptions = {}
  ): Promise<QualificationResult> {
    const normalized = normalizePhone(phone);
    if (!normalized) {
      return this.rejected(`Invalid phone number: ${phone}`);
    }

    const text = message.trim();
    if (!text) {
      return this.rejected('Message must not be empty');
    }

    const contactName = typeof metadata.name === 'string' && metadata.name.trim() ? metadata.name.trim() : undefined;
    // Criteria are captured once so a concurrent update never splits a turn.
    const criteria = this.criteria;
    const { signal } = options;

    return this.store.withLock(normalized, async () => {
      const { conversation: draft, created } = this.store.getOrCreate(normalized, contactName, this.clock());

      if (isTerminal(draft.status)) {
        logger.debug('Message received for closed conversation', { phone: normalized, status: draft.status });
        return this.closedResult(draft);
      }

      if (created) {
        logger.info('New lead conversation', { phone: normalized, businessType: criteria.businessType });
      }

      appendMessage(draft, 'user', text, metadata, this.clock());
      draft.attempts += 1;
      if (contactName && !draft.metadata.contactName) {
        draft.metadata.contactName = contactName;
      }

      await this.extractFacts(draft, criteria, signal);
      draft.score = this.scoring.calculateScore(draft);

      const result = await this.decide(draft, criteria, signal);

      if (signal?.aborted) {
        logger.info('Turn abandoned, changes discarded', { phone: normalized, attempts: draft.attempts });
        return this.rejected('Turn aborted before completion');
      }

      this.store.save(draft);
      logger.info('Turn processed', {
        phone: normalized,
        status: result.status,
        score: result.score,
        attempts: draft.attempts,
      });
      return result;
    });
  }

  /** Manual close. Null when the phone has no conversation. */
  async endConversation(
    phone: string,
    reason: string = 'manual',
    status: TerminalStatus = QualificationStatus.DISQUALIFIED
  ): Promise<QualificationResult | null> {
    return this.closeManually(phone, status, reason);
  }

  async escalate(phone: string, reason: string = 'manual'): Promise<QualificationResult | null> {
    return this.closeManually(phone, QualificationStatus.ESCALATED, reason);
  }

  /** Times out idle conversations; each result carries its CRM payload. */
  async expireConversations(now: Date = this.clock()): Promise<QualificationResult[]> {
    const criteria = this.criteria;
    const results = await this.store.sweepExpired(now, criteria.timeoutMinutes, (draft) =>
      this.close(draft, criteria, now, {
        status: QualificationStatus.TIMEOUT,
        reason: 'inactivity',
        note: `Encerrado por inatividade após ${criteria.timeoutMinutes} minutos`,
        response: this.prompts.timeoutMessage(draft),
      })
    );

    if (results.length > 0) {
      logger.info('Idle conversations timed out', { count: results.length });
    }
    return results;
  }

  getStats(): QualificationStats {
    return this.store.countByStatus();
  }

  getConversation(phone: string): ConversationView | null {
    const normalized = normalizePhone(phone);
    const conversation = normalized ? this.store.get(normalized) : undefined;
    return conversation ? toConversationView(conversation) : null;
  }

  listActive(): ConversationView[] {
    return this.store.listActive().map(toConversationView);
  }

  getCriteria(): QualificationCriteria {
    return this.criteria;
  }

  /** Validates a partial update and swaps in a new frozen criteria object. */
  updateCriteria(patch: unknown): QualificationCriteria {
    const parsedPatch = criteriaPatchSchema.safeParse(patch);
    if (!parsedPatch.success) {
      throw new ValidationError(this.describeIssues(parsedPatch.error.issues));
    }

    const merged = criteriaSchema.safeParse({ ...this.criteria, ...parsedPatch.data });
    if (!merged.success) {
      throw new ValidationError(this.describeIssues(merged.error.issues));
    }

    this.criteria = freezeCriteria(merged.data);
    logger.info('Qualification criteria updated', { criteria: this.criteria });
    return this.criteria;
  }

  healthCheck(): Promise<boolean> {
    return this.provider.healthCheck();
  }

  getProviderStats(): ProviderStats {
    return this.provider.getStats();
  }

  private async extractFacts(
    draft: LeadConversation,
    criteria: QualificationCriteria,
    signal?: AbortSignal
  ): Promise<void> {
    const schema = this.prompts.extractionSchema(criteria);

    let extracted: ExtractedData;
    try {
      extracted = await this.provider.extractStructuredData(this.prompts.extractionFor(draft, criteria), schema, {
        signal,
      });
    } catch (error) {
      if (!(error instanceof ProviderError)) throw error;
      logger.warn('Extraction failed, continuing without new facts', { phone: draft.phone, error: error.message });
      return;
    }

    const known: ExtractedData = {};
    for (const field of Object.keys(schema)) {
      known[field] = extracted[field] ?? null;
    }

    const changed = mergeCollectedData(draft, known, this.clock());
    if (changed.length > 0) {
      logger.debug('Collected data updated', { phone: draft.phone, fields: changed });
    }
  }

  private async decide(
    draft: LeadConversation,
    criteria: QualificationCriteria,
    signal?: AbortSignal
  ): Promise<QualificationResult> {
    const now = this.clock();

    const disqualification = this.scoring.disqualificationReason(draft, criteria);
    if (disqualification) {
      return this.close(draft, criteria, now, this.disqualifying(draft, disqualification));
    }

    const escalation = this.scoring.escalationReason(draft, criteria);
    if (escalation) {
      return this.close(draft, criteria, now, {
        status: QualificationStatus.ESCALATED,
        reason: escalation,
        note: `Escalado para atendimento humano: ${escalation}`,
        response: this.prompts.escalationMessage(draft),
      });
    }

    if (this.scoring.shouldQualify(draft, criteria)) {
      return this.close(draft, criteria, now, {
        status: QualificationStatus.QUALIFIED,
        reason: 'criteria_met',
        note: `Lead qualificado com score ${draft.score}`,
        response: this.prompts.handoffMessage(draft, criteria),
      });
    }

    return this.reply(draft, criteria, signal);
  }

  private async reply(
    draft: LeadConversation,
    criteria: QualificationCriteria,
    signal?: AbortSignal
  ): Promise<QualificationResult> {
    let response: string;
    let fallback = false;

    try {
      response = await this.provider.generateResponse(this.prompts.forTurn(draft, criteria), {
        ...REPLY_OPTIONS,
        signal,
      });
    } catch (error) {
      if (!(error instanceof ProviderError)) throw error;
      logger.warn('Reply generation failed, using fallback', {
        phone: draft.phone,
        kind: error.kind,
        attempts: error.attempts,
      });
      response = this.prompts.fallbackResponse();
      fallback = true;
    }

    appendMessage(draft, 'assistant', response, { fallback }, this.clock());

    return {
      success: true,
      status: draft.status,
      response,
      collected_data: { ...draft.collectedData },
      score: draft.score,
      should_send_to_crm: false,
      crm_data: null,
      metadata: {
        phone: draft.phone,
        attempts: draft.attempts,
        missing_fields: this.prompts.missingFields(criteria, draft.collectedData),
        fallback,
      },
    };
  }

  private disqualifying(draft: LeadConversation, reason: DisqualificationReason): Closing {
    return {
      status: QualificationStatus.DISQUALIFIED,
      reason,
      note: `Lead desqualificado: ${reason}`,
      response: this.prompts.disqualificationMessage(draft, reason),
    };
  }

  /** Terminal transition shared by automatic decisions, manual overrides and timeouts. */
  private close(
    draft: LeadConversation,
    criteria: QualificationCriteria,
    now: Date,
    closing: Closing
  ): QualificationResult {
    terminate(draft, closing.status, closing.note, now);
    appendMessage(draft, 'assistant', closing.response, { status: closing.status }, now);

    const crmData = this.handoff.buildCrmData(draft, criteria, now);

    logger.info('Conversation closed', {
      phone: draft.phone,
      status: closing.status,
      reason: closing.reason,
      score: draft.score,
      priority: crmData.priority,
    });

    return {
      success: true,
      status: closing.status,
      response: closing.response,
      collected_data: { ...draft.collectedData },
      score: draft.score,
      should_send_to_crm: true,
      crm_data: crmData,
      metadata: {
        phone: draft.phone,
        attempts: draft.attempts,
        reason: closing.reason,
        priority: crmData.priority,
      },
    };
  }

  private async closeManually(
    phone: string,
    status: TerminalStatus,
    reason: string
  ): Promise<QualificationResult | null> {
    const normalized = normalizePhone(phone);
    if (!normalized || !this.store.get(normalized)) {
      return null;
    }

    const criteria = this.criteria;

    return this.store.withLock(normalized, () => {
      const stored = this.store.get(normalized);
      if (!stored) return null;

      if (isTerminal(stored.status)) {
        return {
          ...this.closedResult(stored),
          success: false,
          metadata: { phone: normalized, error: `Conversation already ${stored.status}` },
        };
      }

      const draft = cloneConversation(stored);
      const result = this.close(draft, criteria, this.clock(), this.manualClosing(draft, status, reason, criteria));
      this.store.save(draft);
      return result;
    });
  }

  private manualClosing(
    draft: LeadConversation,
    status: TerminalStatus,
    reason: string,
    criteria: QualificationCriteria
  ): Closing {
    const note = `Encerrado manualmente (${status}): ${reason}`;

    switch (status) {
      case QualificationStatus.QUALIFIED:
        return { status, reason, note, response: this.prompts.handoffMessage(draft, criteria) };
      case QualificationStatus.ESCALATED:
        return { status, reason, note, response: this.prompts.escalationMessage(draft) };
      case QualificationStatus.TIMEOUT:
        return { status, reason, note, response: this.prompts.timeoutMessage(draft) };
      default:
        return { ...this.disqualifying(draft, 'manual'), reason, note };
    }
  }

  private closedResult(conversation: LeadConversation): QualificationResult {
    return {
      success: true,
      status: conversation.status,
      response: this.prompts.closedMessage(),
      collected_data: { ...conversation.collectedData },
      score: conversation.score,
      should_send_to_crm: false,
      crm_data: null,
      metadata: { phone: conversation.phone, closed: true },
    };
  }

  private rejected(error: string): QualificationResult {
    logger.warn('Message rejected', { error });
    return {
      success: false,
      status: QualificationStatus.IN_PROGRESS,
      response: '',
      collected_data: {},
      score: 0,
      should_send_to_crm: false,
      crm_data: null,
      metadata: { error },
    };
  }

  private describeIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
    return issues.map((issue) => `${issue.path.join('.') || 'criteria'}: ${issue.message}`).join('; ');
  }
}
