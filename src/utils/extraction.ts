import { z } from 'zod';
import { CollectedValue } from '../types/conversation';
import { ExtractedData, ExtractionFieldType, ExtractionSchema } from '../types/qualification';

const extractionPayloadSchema = z.record(z.unknown());

export function emptyExtraction(schema: ExtractionSchema): ExtractedData {
  const result: ExtractedData = {};
  for (const key of Object.keys(schema)) {
    result[key] = null;
  }
  return result;
}

function stripCodeFence(raw: string): string {
  const trimmed = raw.trim();
  const fenced = trimmed.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  return fenced ? fenced[1] : trimmed;
}

function coerce(value: unknown, type: ExtractionFieldType): CollectedValue | null {
  if (value === null || value === undefined) return null;

  switch (type) {
    case 'number': {
      if (typeof value === 'number') return Number.isFinite(value) ? value : null;
      if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value.replace(',', '.'));
        return Number.isFinite(parsed) ? parsed : null;
      }
      return null;
    }
    case 'boolean': {
      if (typeof value === 'boolean') return value;
      if (value === 'true') return true;
      if (value === 'false') return false;
      return null;
    }
    default: {
      if (typeof value === 'number' || typeof value === 'boolean') return String(value);
      if (typeof value !== 'string') return null;
      const text = value.trim();
      return text === '' || text.toLowerCase() === 'null' ? null : text;
    }
  }
}

/**
 * Parses a model reply into the extraction schema. Returns null when the reply
 * is not a JSON object; otherwise every schema key is present, with unknown
 * keys dropped and unusable values set to null.
 */
export function parseExtractedData(raw: string, schema: ExtractionSchema): ExtractedData | null {
  let payload: unknown;
  try {
    payload = JSON.parse(stripCodeFence(raw));
  } catch {
    return null;
  }

  const parsed = extractionPayloadSchema.safeParse(payload);
  if (!parsed.success || Array.isArray(payload)) {
    return null;
  }

  const result = emptyExtraction(schema);
  for (const [key, type] of Object.entries(schema)) {
    result[key] = coerce(parsed.data[key], type);
  }
  return result;
}
