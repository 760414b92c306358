import { CollectedData, LeadConversation, Message } from '../types/conversation';
import { DisqualificationReason, ExtractionSchema, QualificationCriteria } from '../types/qualification';
import { ChatMessage } from '../types/provider';
import { DEFAULT_SCORING_RULES, ScoringRules } from '../config/scoring';
import { contactNameOf, isFilled } from '../utils/conversation';
import {
  BUSINESS_PROFILES,
  CLOSED_MESSAGE,
  CONTINUE_PROMPT,
  DISQUALIFICATION_MESSAGE,
  ESCALATION_MESSAGE,
  EXTRACTION_PROMPT,
  FALLBACK_RESPONSE,
  FIRST_CONTACT_PROMPT,
  HANDOFF_MESSAGE,
  SYSTEM_PROMPT,
  TIMEOUT_MESSAGE,
  formatList,
  quote,
  renderTemplate,
} from '../utils/prompts';

export const HISTORY_WINDOW = 10;

const DISQUALIFICATION_COPY: Record<DisqualificationReason, { reason: string; alternative: string }> = {
  opt_out: {
    reason: 'vamos respeitar o seu pedido e não enviaremos mais mensagens',
    alternative: 'Se mudar de ideia, estamos por aqui.',
  },
  attempts_exhausted: {
    reason: 'não conseguimos reunir as informações necessárias para seguir com o atendimento',
    alternative: 'Você pode nos enviar seus dados a qualquer momento para retomarmos.',
  },
  manual: {
    reason: 'este atendimento foi encerrado pela nossa equipe',
    alternative: 'Se precisar de algo, é só responder esta mensagem.',
  },
};

/**
 * Builds backend instructions and lead-facing copy from a conversation
 * snapshot. Everything here is pure.
 */
export class PromptService {
  constructor(private readonly rules: ScoringRules = DEFAULT_SCORING_RULES) {}

  systemPrompt(criteria: QualificationCriteria): string {
    const profile = BUSINESS_PROFILES[criteria.businessType];
    const fields = profile ? profile.fieldLabels : criteria.requiredFields;

    return renderTemplate(SYSTEM_PROMPT, {
      required_fields: formatList(fields),
      critical_fields: formatList(this.criticalFields(criteria)),
      max_attempts: String(criteria.maxAttempts),
    });
  }

  firstContact(message: string): string {
    return renderTemplate(FIRST_CONTACT_PROMPT, { user_message: quote(message) });
  }

  continueConversation(history: Message[], collected: CollectedData, missingFields: string[], message: string): string {
    return renderTemplate(CONTINUE_PROMPT, {
      conversation_history: this.formatHistory(history),
      collected_data: this.formatCollectedData(collected),
      missing_fields: missingFields.length > 0 ? missingFields.join(', ') : 'Todos os dados coletados',
      user_message: quote(message),
    });
  }

  extraction(conversationText: string, schema: ExtractionSchema): string {
    return renderTemplate(EXTRACTION_PROMPT, {
      conversation_text: conversationText,
      schema: JSON.stringify(Object.fromEntries(Object.entries(schema).map(([k, t]) => [k, `${t} | null`])), null, 2),
    });
  }

  extractionFor(conversation: LeadConversation, criteria: QualificationCriteria): string {
    return this.extraction(this.formatHistory(conversation.messages), this.extractionSchema(criteria));
  }

  /** First contact on the opening turn, continuation afterwards. */
  forTurn(conversation: LeadConversation, criteria: QualificationCriteria): ChatMessage[] {
    const latest = [...conversation.messages].reverse().find((m) => m.role === 'user');
    const message = latest ? latest.content : '';

    const instruction =
      conversation.attempts === 1
        ? this.firstContact(message)
        : this.continueConversation(
            conversation.messages,
            conversation.collectedData,
            this.missingFields(criteria, conversation.collectedData),
            message
          );

    return [
      { role: 'system', content: this.systemPrompt(criteria) },
      { role: 'user', content: instruction },
    ];
  }

  extractionSchema(criteria: QualificationCriteria): ExtractionSchema {
    const fields = new Set<string>([...criteria.requiredFields, ...this.criticalFields(criteria)]);
    const schema: ExtractionSchema = {};
    for (const field of fields) {
      schema[field] = 'string';
    }
    return schema;
  }

  missingFields(criteria: QualificationCriteria, collected: CollectedData): string[] {
    return Object.keys(this.extractionSchema(criteria)).filter((field) => !isFilled(collected[field]));
  }

  formatHistory(messages: Message[]): string {
    return messages
      .slice(-HISTORY_WINDOW)
      .filter((m) => m.role !== 'system')
      .map((m) => `${m.role === 'user' ? 'Cliente' : 'Você'}: ${quote(m.content)}`)
      .join('\n');
  }

  formatCollectedData(collected: CollectedData): string {
    const lines = Object.entries(collected)
      .filter(([, value]) => isFilled(value))
      .map(([key, value]) => `- ${key}: ${quote(String(value))}`);
    return lines.length > 0 ? lines.join('\n') : 'Nenhum dado coletado ainda';
  }

  handoffMessage(conversation: LeadConversation, criteria: QualificationCriteria): string {
    const profile = BUSINESS_PROFILES[criteria.businessType];
    return renderTemplate(HANDOFF_MESSAGE, {
      name_suffix: this.nameSuffix(conversation),
      additional_info: profile ? profile.qualificationMessage : 'Obrigado pela atenção!',
    });
  }

  escalationMessage(conversation: LeadConversation): string {
    return renderTemplate(ESCALATION_MESSAGE, { name_suffix: this.nameSuffix(conversation) });
  }

  disqualificationMessage(conversation: LeadConversation, reason: DisqualificationReason): string {
    const copy = DISQUALIFICATION_COPY[reason];
    return renderTemplate(DISQUALIFICATION_MESSAGE, {
      name_suffix: this.nameSuffix(conversation),
      disqualification_reason: copy.reason,
      alternative_action: copy.alternative,
    });
  }

  timeoutMessage(conversation: LeadConversation): string {
    return renderTemplate(TIMEOUT_MESSAGE, { name_suffix: this.nameSuffix(conversation) });
  }

  closedMessage(): string {
    return CLOSED_MESSAGE;
  }

  fallbackResponse(): string {
    return FALLBACK_RESPONSE;
  }

  private criticalFields(criteria: QualificationCriteria): readonly string[] {
    const fields: Readonly<Record<string, readonly string[]>> = this.rules.criticalFields;
    return fields[criteria.businessType] ?? this.rules.criticalFields.default;
  }

  private nameSuffix(conversation: LeadConversation): string {
    const name = contactNameOf(conversation);
    return name ? `, ${name}` : '';
  }
}
