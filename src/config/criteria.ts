import { z } from 'zod';
import { BUSINESS_TYPES, QualificationCriteria } from '../types/qualification';
import type { Env } from './env';

export const criteriaSchema = z.object({
  requiredFields: z.array(z.string().trim().min(1)).min(1),
  minScore: z.number().int().min(0).max(100),
  maxAttempts: z.number().int().min(1),
  timeoutMinutes: z.number().positive(),
  businessType: z.enum(BUSINESS_TYPES),
});

export const criteriaPatchSchema = criteriaSchema.partial().strict();

export type CriteriaInput = z.infer<typeof criteriaSchema>;

export function freezeCriteria(input: CriteriaInput): QualificationCriteria {
  return Object.freeze({
    ...input,
    requiredFields: Object.freeze([...input.requiredFields]),
  });
}

export function criteriaFromEnv(
  source: Pick<
    Env,
    | 'REQUIRED_FIELDS'
    | 'QUALIFICATION_MIN_SCORE'
    | 'QUALIFICATION_MAX_ATTEMPTS'
    | 'QUALIFICATION_TIMEOUT_MINUTES'
    | 'BUSINESS_TYPE'
  >
): QualificationCriteria {
  return freezeCriteria(
    criteriaSchema.parse({
      requiredFields: source.REQUIRED_FIELDS.split(',')
        .map((field) => field.trim())
        .filter((field) => field.length > 0),
      minScore: source.QUALIFICATION_MIN_SCORE,
      maxAttempts: source.QUALIFICATION_MAX_ATTEMPTS,
      timeoutMinutes: source.QUALIFICATION_TIMEOUT_MINUTES,
      businessType: source.BUSINESS_TYPE,
    })
  );
}
