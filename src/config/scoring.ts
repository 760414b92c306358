import { BusinessType } from '../types/qualification';

export interface ScoringRules {
  readonly disqualificationKeywords: readonly string[];
  readonly humanRequestKeywords: readonly string[];
  readonly positiveSignals: readonly string[];
  /** keyword -> weight (1..3) */
  readonly urgencyKeywords: Readonly<Record<string, number>>;
  /** keyword -> tag */
  readonly keywordTags: Readonly<Record<string, string>>;
  readonly criticalFields: Readonly<Record<BusinessType, readonly string[]>>;
  readonly expectedFactCount: number;
  readonly maxUrgencyWeight: number;
}

function deepFreeze<T extends object>(value: T): T {
  for (const nested of Object.values(value)) {
    if (typeof nested === 'object' && nested !== null && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

export const DEFAULT_SCORING_RULES: ScoringRules = deepFreeze({
  disqualificationKeywords: ['spam', 'teste', 'bot', 'desisto', 'não quero mais', 'me tire da lista'],
  humanRequestKeywords: ['falar com pessoa', 'atendente', 'humano', 'pessoa real'],
  positiveSignals: [
    'interessado',
    'quero',
    'preciso',
    'gostaria',
    'quando',
    'como',
    'quanto custa',
    'valor',
    'comprar',
    'contratar',
    'orçamento',
  ],
  urgencyKeywords: {
    urgente: 3,
    hoje: 3,
    agora: 3,
    rápido: 2,
    logo: 2,
    'em breve': 1,
  },
  keywordTags: {
    orçamento: 'budget_request',
    valor: 'pricing_inquiry',
    comprar: 'ready_to_buy',
    dúvida: 'has_questions',
    comparar: 'comparing_options',
    urgente: 'urgent',
    problema: 'has_issue',
  },
  criticalFields: {
    default: ['name', 'phone'],
    ecommerce: ['name', 'phone', 'product_interest'],
    services: ['name', 'phone', 'service_type', 'location'],
    b2b: ['name', 'phone', 'company', 'role'],
    real_estate: ['name', 'phone', 'property_type', 'budget'],
  },
  expectedFactCount: 5,
  maxUrgencyWeight: 3,
});
