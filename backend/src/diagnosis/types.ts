export const DISEASE_TYPES = [
  'fungal',
  'bacterial',
  'viral',
  'pest',
  'nutrient_deficiency',
  'healthy',
  'invalid_image',
] as const;

export type DiseaseType = (typeof DISEASE_TYPES)[number];

export const SEVERITIES = ['none', 'mild', 'moderate', 'severe'] as const;

export type Severity = (typeof SEVERITIES)[number];

/** Wire shape returned by the API, one per request. */
export interface DiagnosisResult {
  readonly disease_detected: boolean;
  readonly disease_name: string | null;
  readonly disease_type: DiseaseType;
  readonly severity: Severity;
  /** Percentage, 0 to 100. */
  readonly confidence: number;
  readonly symptoms: readonly string[];
  readonly possible_causes: readonly string[];
  readonly treatment: readonly string[];
  /** ISO-8601. */
  readonly analysis_timestamp: string;
}

/** Whatever a parse strategy managed to recover; absent means "use the default". */
export interface DiagnosisFields {
  diseaseDetected?: boolean;
  diseaseName?: string;
  diseaseType?: DiseaseType;
  severity?: Severity;
  confidence?: number;
  symptoms?: string[];
  possibleCauses?: string[];
  treatment?: string[];
}

export function isDiseaseType(value: string): value is DiseaseType {
  return (DISEASE_TYPES as readonly string[]).includes(value);
}

export function isSeverity(value: string): value is Severity {
  return (SEVERITIES as readonly string[]).includes(value);
}
