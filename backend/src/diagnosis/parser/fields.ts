import { type DiagnosisFields, type DiagnosisResult, type DiseaseType, isDiseaseType } from '../types';

export const INVALID_IMAGE_GUIDANCE: readonly string[] = [
  'Upload a clear photo of a single plant leaf.',
  'Take the photo close up so the leaf fills most of the frame.',
  'Use good, even lighting; natural daylight works best.',
  'Focus on the affected area of the leaf.',
  'Avoid blurry or dark images.',
];

const TYPE_ALIASES: Partial<Record<string, DiseaseType>> = {
  fungus: 'fungal',
  fungi: 'fungal',
  bacteria: 'bacterial',
  bacterium: 'bacterial',
  virus: 'viral',
  pests: 'pest',
  insect: 'pest',
  insects: 'pest',
  nutrient: 'nutrient_deficiency',
  nutritional: 'nutrient_deficiency',
  deficiency: 'nutrient_deficiency',
  nutritional_deficiency: 'nutrient_deficiency',
  none: 'healthy',
  invalid: 'invalid_image',
};

const NAME_HINTS: Array<[RegExp, DiseaseType]> = [
  [/virus|viral|mosaic/i, 'viral'],
  [/bacteri|canker|fire blight/i, 'bacterial'],
  [/mite|aphid|insect|beetle|caterpillar|thrip|whitefl|borer|leaf ?miner/i, 'pest'],
  [/deficien|chlorosis/i, 'nutrient_deficiency'],
];

const NULLISH_TEXT = new Set(['', 'null', 'none', 'n/a', 'na', 'nil', 'undefined']);

/**
 * Maps free-form type labels onto the fixed set: "Nutrient deficiency"
 * becomes nutrient_deficiency, "Fungal infection" becomes fungal.
 */
export function normalizeDiseaseType(value: string): DiseaseType | undefined {
  const key = value.trim().toLowerCase().replace(/[\s-]+/g, '_');
  if (isDiseaseType(key)) return key;

  const alias = TYPE_ALIASES[key];
  if (alias) return alias;

  const [first] = key.split('_');
  if (first && first !== key) {
    return isDiseaseType(first) ? first : TYPE_ALIASES[first];
  }
  return undefined;
}

export function parseFlag(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  switch (value.trim().toLowerCase()) {
    case 'true':
    case 'yes':
      return true;
    case 'false':
    case 'no':
      return false;
    default:
      return value;
  }
}

export function clampConfidence(value: number): number {
  return Math.min(100, Math.max(0, value));
}

export function cleanDiseaseName(value: string): string | undefined {
  const name = value.trim();
  return NULLISH_TEXT.has(name.toLowerCase()) ? undefined : name;
}

export function hasAnyField(fields: DiagnosisFields): boolean {
  return Object.values(fields).some((value) => value !== undefined);
}

function inferDiseaseType(name: string | undefined): DiseaseType {
  if (name) {
    for (const [pattern, type] of NAME_HINTS) {
      if (pattern.test(name)) return type;
    }
  }
  return 'fungal';
}

function freezeResult(result: DiagnosisResult): DiagnosisResult {
  Object.freeze(result.symptoms);
  Object.freeze(result.possible_causes);
  Object.freeze(result.treatment);
  return Object.freeze(result);
}

export function invalidImageResult(timestamp: string): DiagnosisResult {
  return freezeResult({
    disease_detected: false,
    disease_name: null,
    disease_type: 'invalid_image',
    severity: 'none',
    confidence: 0,
    symptoms: [],
    possible_causes: [],
    treatment: [...INVALID_IMAGE_GUIDANCE],
    analysis_timestamp: timestamp,
  });
}

function isDetection(fields: DiagnosisFields): boolean {
  if (fields.diseaseDetected !== undefined) return fields.diseaseDetected;
  if (fields.diseaseType !== undefined) return fields.diseaseType !== 'healthy';
  return fields.diseaseName !== undefined;
}

/**
 * Fills every field a strategy could not recover with its default. The
 * detection flag wins over a type that contradicts it: a record that is not
 * a detection is healthy and carries no disease name, and a detection is
 * never typed healthy.
 */
export function assembleResult(fields: DiagnosisFields, timestamp: string): DiagnosisResult {
  if (fields.diseaseType === 'invalid_image') {
    return invalidImageResult(timestamp);
  }

  const detected = isDetection(fields);
  let diseaseType: DiseaseType = 'healthy';
  if (detected) {
    diseaseType =
      fields.diseaseType !== undefined && fields.diseaseType !== 'healthy'
        ? fields.diseaseType
        : inferDiseaseType(fields.diseaseName);
  }

  return freezeResult({
    disease_detected: detected,
    disease_name: detected ? fields.diseaseName ?? null : null,
    disease_type: diseaseType,
    severity: fields.severity ?? 'none',
    confidence: fields.confidence ?? 0,
    symptoms: [...(fields.symptoms ?? [])],
    possible_causes: [...(fields.possibleCauses ?? [])],
    treatment: [...(fields.treatment ?? [])],
    analysis_timestamp: timestamp,
  });
}
