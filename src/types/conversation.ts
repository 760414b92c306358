export enum QualificationStatus {
  IN_PROGRESS = 'in_progress',
  QUALIFIED = 'qualified',
  DISQUALIFIED = 'disqualified',
  ESCALATED = 'escalated',
  TIMEOUT = 'timeout',
}

export type TerminalStatus = Exclude<QualificationStatus, QualificationStatus.IN_PROGRESS>;

export type MessageRole = 'user' | 'assistant' | 'system';

export type CollectedValue = string | number | boolean;

export type CollectedData = Record<string, CollectedValue>;

export interface Message {
  readonly role: MessageRole;
  readonly content: string;
  readonly timestamp: Date;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface LeadConversation {
  phone: string;
  messages: Message[];
  collectedData: CollectedData;
  status: QualificationStatus;
  score: number;
  attempts: number;
  notes: string[];
  startedAt: Date;
  endedAt: Date | null;
  metadata: Record<string, unknown>;
}

/** JSON-friendly view returned by introspection calls and the HTTP API. */
export interface ConversationView {
  phone: string;
  status: QualificationStatus;
  score: number;
  attempts: number;
  collected_data: CollectedData;
  messages: Array<{ role: MessageRole; content: string; timestamp: string; metadata: Record<string, unknown> }>;
  messages_count: number;
  notes: string[];
  started_at: string;
  ended_at: string | null;
  metadata: Record<string, unknown>;
}
