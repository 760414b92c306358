import { CollectedData, CollectedValue, QualificationStatus } from './conversation';

export const BUSINESS_TYPES = ['default', 'ecommerce', 'services', 'b2b', 'real_estate'] as const;

export type BusinessType = (typeof BUSINESS_TYPES)[number];

export interface QualificationCriteria {
  readonly requiredFields: readonly string[];
  readonly minScore: number;
  readonly maxAttempts: number;
  readonly timeoutMinutes: number;
  readonly businessType: BusinessType;
}

export type LeadPriority = 'urgent' | 'high' | 'medium' | 'low';

export type DisqualificationReason = 'opt_out' | 'attempts_exhausted' | 'manual';

export type EscalationReason = 'human_requested' | 'stalled' | 'high_potential' | 'manual';

export type ExtractionFieldType = 'string' | 'number' | 'boolean';

export type ExtractionSchema = Record<string, ExtractionFieldType>;

export type ExtractedData = Record<string, CollectedValue | null>;

export interface CRMLeadData {
  phone: string;
  name: string;
  status: QualificationStatus;
  source: 'ai_qualification';
  priority: LeadPriority;
  tags: string[];
  custom_fields: Record<string, CollectedValue>;
  notes: string;
  qualification_score: number;
  qualified_at: string;
  started_at: string;
}

export interface QualificationResult {
  success: boolean;
  status: QualificationStatus;
  response: string;
  collected_data: CollectedData;
  score: number;
  should_send_to_crm: boolean;
  crm_data: CRMLeadData | null;
  metadata: Record<string, unknown>;
}

export type QualificationStats = Record<QualificationStatus, number>;
