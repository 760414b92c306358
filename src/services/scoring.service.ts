import { LeadConversation } from '../types/conversation';
import {
  BusinessType,
  DisqualificationReason,
  EscalationReason,
  LeadPriority,
  QualificationCriteria,
} from '../types/qualification';
import { DEFAULT_SCORING_RULES, ScoringRules } from '../config/scoring';
import { filledFieldCount, isFilled, userMessages } from '../utils/conversation';

export interface ScoreFactors {
  completeness: number;
  engagement: number;
  positiveSignals: number;
  urgency: number;
}

const HIGH_POTENTIAL_SCORE = 70;

/**
 * Deterministic decision rules over a conversation snapshot. Keyword matching
 * is lowercase substring matching over user-authored messages only.
 */
export class ScoringService {
  constructor(private readonly rules: ScoringRules = DEFAULT_SCORING_RULES) {}

  scoreFactors(conversation: LeadConversation): ScoreFactors {
    const texts = this.userTexts(conversation);

    const completeness = Math.min(filledFieldCount(conversation.collectedData) / this.rules.expectedFactCount, 1);
    const engagement = Math.min(texts.length / 5, 1);

    let positiveCount = 0;
    for (const text of texts) {
      positiveCount += this.rules.positiveSignals.filter((signal) => text.includes(signal)).length;
    }

    return {
      completeness: Math.floor(completeness * 40),
      engagement: Math.floor(engagement * 30),
      positiveSignals: Math.floor(Math.min(positiveCount / 3, 1) * 20),
      urgency: this.urgencyScore(conversation),
    };
  }

  calculateScore(conversation: LeadConversation): number {
    const f = this.scoreFactors(conversation);
    const raw = f.completeness + f.engagement + f.positiveSignals + f.urgency;
    return Math.min(100, Math.max(0, raw));
  }

  /** Highest urgency weight found in any user message, scaled to 0-10. */
  urgencyScore(conversation: LeadConversation): number {
    let weight = 0;
    for (const text of this.userTexts(conversation)) {
      for (const [keyword, points] of Object.entries(this.rules.urgencyKeywords)) {
        if (text.includes(keyword)) {
          weight = Math.max(weight, points);
        }
      }
    }

    return Math.min(Math.round((weight * 10) / this.rules.maxUrgencyWeight), 10);
  }

  criticalFields(businessType: BusinessType | string): readonly string[] {
    const fields: Readonly<Record<string, readonly string[]>> = this.rules.criticalFields;
    return fields[businessType] ?? this.rules.criticalFields.default;
  }

  hasCriticalFields(conversation: LeadConversation, criteria: QualificationCriteria): boolean {
    return this.criticalFields(criteria.businessType).every((field) =>
      isFilled(conversation.collectedData[field])
    );
  }

  disqualificationReason(
    conversation: LeadConversation,
    criteria: QualificationCriteria
  ): DisqualificationReason | null {
    const optedOut = this.userTexts(conversation).some((text) =>
      this.rules.disqualificationKeywords.some((keyword) => text.includes(keyword))
    );
    if (optedOut) return 'opt_out';

    if (conversation.attempts >= criteria.maxAttempts && filledFieldCount(conversation.collectedData) < 2) {
      return 'attempts_exhausted';
    }

    return null;
  }

  shouldDisqualify(conversation: LeadConversation, criteria: QualificationCriteria): boolean {
    return this.disqualificationReason(conversation, criteria) !== null;
  }

  shouldQualify(conversation: LeadConversation, criteria: QualificationCriteria): boolean {
    if (!this.hasCriticalFields(conversation, criteria)) return false;
    if (this.calculateScore(conversation) < criteria.minScore) return false;
    return !this.shouldDisqualify(conversation, criteria);
  }

  escalationReason(conversation: LeadConversation, criteria: QualificationCriteria): EscalationReason | null {
    const askedForHuman = this.userTexts(conversation).some((text) =>
      this.rules.humanRequestKeywords.some((keyword) => text.includes(keyword))
    );
    if (askedForHuman) return 'human_requested';

    const qualifies = this.shouldQualify(conversation, criteria);

    // A lead that already meets the qualification bar is not stuck.
    const stalled =
      conversation.attempts >= criteria.maxAttempts - 1 && filledFieldCount(conversation.collectedData) < 3;
    if (stalled && !qualifies) return 'stalled';

    if (this.calculateScore(conversation) >= HIGH_POTENTIAL_SCORE && !qualifies) {
      return 'high_potential';
    }

    return null;
  }

  shouldEscalate(conversation: LeadConversation, criteria: QualificationCriteria): boolean {
    return this.escalationReason(conversation, criteria) !== null;
  }

  determinePriority(conversation: LeadConversation): LeadPriority {
    const score = this.calculateScore(conversation);
    const urgency = this.urgencyScore(conversation);

    if (score >= 80 && urgency >= 7) return 'urgent';
    if (score >= 70 || urgency >= 7) return 'high';
    if (score >= 50) return 'medium';
    return 'low';
  }

  suggestTags(conversation: LeadConversation): string[] {
    const tags = new Set<string>(['ai_qualified']);

    if (this.urgencyScore(conversation) >= 7) {
      tags.add('urgent');
    }

    const allText = this.userTexts(conversation).join(' ');
    for (const [keyword, tag] of Object.entries(this.rules.keywordTags)) {
      if (allText.includes(keyword)) {
        tags.add(tag);
      }
    }

    return [...tags];
  }

  generateSummary(conversation: LeadConversation): string {
    const score = this.calculateScore(conversation);
    const priority = this.determinePriority(conversation);
    const parts: string[] = [`Score: ${score}/100 | Prioridade: ${priority.toUpperCase()}`];

    const facts = Object.entries(conversation.collectedData).filter(([, value]) => isFilled(value));
    if (facts.length > 0) {
      parts.push('', 'Informações coletadas:');
      for (const [key, value] of facts) {
        parts.push(`• ${key}: ${value}`);
      }
    }

    if (conversation.notes.length > 0) {
      parts.push('', 'Observações:');
      for (const note of conversation.notes.slice(-3)) {
        parts.push(`• ${note}`);
      }
    }

    const fromLead = userMessages(conversation);
    if (fromLead.length > 0) {
      const first = fromLead[0].content;
      const excerpt = first.length > 100 ? `${first.slice(0, 100)}...` : first;
      parts.push('', `Mensagens do cliente: ${fromLead.length}`);
      parts.push(`Primeira mensagem: "${excerpt}"`);
    }

    return parts.join('\n');
  }

  private userTexts(conversation: LeadConversation): string[] {
    return userMessages(conversation).map((m) => m.content.toLowerCase());
  }
}
