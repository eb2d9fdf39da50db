import { z } from 'zod';

import { type DiagnosisFields, SEVERITIES } from '../types';
import { clampConfidence, cleanDiseaseName, normalizeDiseaseType, parseFlag } from './fields';
import type { ParseStrategy } from './strategy';

// Every field catches its own failure, so one bad value never sinks the record.
const flag = z.preprocess(parseFlag, z.boolean()).optional().catch(undefined);

const diseaseName = z
  .string()
  .transform(cleanDiseaseName)
  .optional()
  .catch(undefined);

const diseaseType = z
  .string()
  .transform((value, ctx) => {
    const type = normalizeDiseaseType(value);
    if (type === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown disease type "${value}"` });
      return z.NEVER;
    }
    return type;
  })
  .optional()
  .catch(undefined);

const severity = z.string().trim().toLowerCase().pipe(z.enum(SEVERITIES)).optional().catch(undefined);

const confidence = z
  .preprocess(
    (value) => (typeof value === 'string' ? Number.parseFloat(value) : value),
    z.number().finite(),
  )
  .transform(clampConfidence)
  .optional()
  .catch(undefined);

const textList = z
  .preprocess((value) => (typeof value === 'string' ? [value] : value), z.array(z.unknown()))
  .transform((items) =>
    items.filter((item): item is string => typeof item === 'string' && item.trim() !== ''),
  )
  .optional()
  .catch(undefined);

const diagnosisFieldsSchema = z.object({
  diseaseDetected: flag,
  diseaseName,
  diseaseType,
  severity,
  confidence,
  symptoms: textList,
  possibleCauses: textList,
  treatment: textList,
});

const FIELD_KEYS: Partial<Record<string, keyof DiagnosisFields>> = {
  diseasedetected: 'diseaseDetected',
  diseasename: 'diseaseName',
  diseasetype: 'diseaseType',
  severity: 'severity',
  severitylevel: 'severity',
  confidence: 'confidence',
  confidencescore: 'confidence',
  confidencepercent: 'confidence',
  symptoms: 'symptoms',
  observedsymptoms: 'symptoms',
  possiblecauses: 'possibleCauses',
  causes: 'possibleCauses',
  treatment: 'treatment',
  treatments: 'treatment',
  recommendations: 'treatment',
  recommendedtreatment: 'treatment',
};

type RawFields = Partial<Record<keyof DiagnosisFields, unknown>>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickFields(raw: Record<string, unknown>): RawFields {
  const picked: RawFields = {};
  for (const [key, value] of Object.entries(raw)) {
    const field = FIELD_KEYS[key.toLowerCase().replace(/[^a-z]/g, '')];
    if (field !== undefined && !(field in picked)) {
      picked[field] = value;
    }
  }
  return picked;
}

/** Index of the brace closing the object opened at `start`, or -1. */
function closingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (char === '\\') i++;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"') inString = true;
    else if (char === '{') depth++;
    else if (char === '}' && --depth === 0) return i;
  }
  return -1;
}

function tryParseJson(candidate: string): unknown {
  try {
    return JSON.parse(candidate);
  } catch {
    return undefined;
  }
}

export interface LocatedJsonObject {
  value: Record<string, unknown>;
  /** Offset of the opening brace. */
  start: number;
  /** Offset just past the closing brace. */
  end: number;
}

/**
 * First syntactically valid JSON object in the text. Models like to wrap
 * their answer in prose or code fences, so every `{` is a candidate start.
 */
export function locateJsonObject(text: string): LocatedJsonObject | undefined {
  for (let start = text.indexOf('{'); start !== -1; start = text.indexOf('{', start + 1)) {
    const close = closingBrace(text, start);
    if (close === -1) continue;
    const parsed = tryParseJson(text.slice(start, close + 1));
    if (isRecord(parsed)) return { value: parsed, start, end: close + 1 };
  }
  return undefined;
}

export function findJsonObject(text: string): Record<string, unknown> | undefined {
  return locateJsonObject(text)?.value;
}

export const jsonStrategy: ParseStrategy = {
  name: 'json',
  extract(text) {
    const object = findJsonObject(text);
    if (object === undefined) return undefined;

    let raw = pickFields(object);
    if (Object.keys(raw).length === 0) {
      // {"diagnosis": {...}} and similar single-level wrappers
      const nested = Object.values(object).find(isRecord);
      if (nested !== undefined) raw = pickFields(nested);
    }
    return diagnosisFieldsSchema.parse(raw);
  },
};
