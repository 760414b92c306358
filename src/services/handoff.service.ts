import { LeadConversation } from '../types/conversation';
import { CRMLeadData, QualificationCriteria } from '../types/qualification';
import { contactNameOf } from '../utils/conversation';
import { ScoringService } from './scoring.service';

export const UNKNOWN_LEAD_NAME = 'Não informado';
// Width of leads.name
export const MAX_LEAD_NAME_LENGTH = 255;

/** Shapes a closed conversation into the payload the lead pipeline stores. */
export class HandoffService {
  constructor(private readonly scoring: ScoringService = new ScoringService()) {}

  buildCrmData(conversation: LeadConversation, criteria: QualificationCriteria, closedAt: Date): CRMLeadData {
    return {
      phone: conversation.phone,
      name: (contactNameOf(conversation) ?? UNKNOWN_LEAD_NAME).slice(0, MAX_LEAD_NAME_LENGTH),
      status: conversation.status,
      source: 'ai_qualification',
      priority: this.scoring.determinePriority(conversation),
      tags: this.scoring.suggestTags(conversation),
      custom_fields: {
        ...conversation.collectedData,
        attempts: conversation.attempts,
        business_type: criteria.businessType,
      },
      notes: this.scoring.generateSummary(conversation),
      qualification_score: conversation.score,
      qualified_at: closedAt.toISOString(),
      started_at: conversation.startedAt.toISOString(),
    };
  }
}
