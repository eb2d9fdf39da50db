import { findDiseaseInfo } from './knowledge';
import type { DiagnosisResult, DiseaseType, Severity } from './types';

export type DiagnosisStatus = 'Healthy' | 'Infected' | 'Invalid';

/** What the results panel shows for one diagnosis. */
export interface DiagnosisReport {
  status: DiagnosisStatus;
  title: string;
  /** Whole percent for the progress bar. */
  confidence: number;
  severity: Severity;
  diseaseType: DiseaseType;
  symptoms: string[];
  causes: string[];
  treatment: string[];
  about: string | null;
  tips: string[];
  analyzedAt: string;
}

const NO_TREATMENT = 'No treatment data supplied.';

function statusOf(result: DiagnosisResult): DiagnosisStatus {
  if (result.disease_type === 'invalid_image') return 'Invalid';
  return result.disease_detected ? 'Infected' : 'Healthy';
}

function composeExplanation(name: string, symptoms: readonly string[], causes: readonly string[]): string {
  let text = `${name} is a plant disease that needs attention.`;
  if (symptoms.length > 0) {
    text += ` Common symptoms include: ${symptoms.join(', ')}.`;
  }
  if (causes.length > 0) {
    text += ` It is typically caused by: ${causes.join(', ')}.`;
  }
  return `${text} Monitor the plant closely, remove affected parts, keep air moving around it and follow the treatment above.`;
}

function aboutText(result: DiagnosisResult): string | null {
  if (result.disease_type === 'invalid_image') return null;
  if (result.disease_name === null) {
    return result.disease_type === 'healthy' ? findDiseaseInfo('healthy') ?? null : null;
  }

  const known = findDiseaseInfo(result.disease_name);
  if (known !== undefined) return known;
  if (result.symptoms.length > 0 || result.possible_causes.length > 0) {
    return composeExplanation(result.disease_name, result.symptoms, result.possible_causes);
  }
  return null;
}

export function buildDiagnosisReport(result: DiagnosisResult): DiagnosisReport {
  const status = statusOf(result);
  const invalid = status === 'Invalid';

  return {
    status,
    title: invalid ? 'Invalid Image' : result.disease_name ?? 'Healthy',
    confidence: Math.round(Math.min(100, Math.max(0, result.confidence))),
    severity: result.severity,
    diseaseType: result.disease_type,
    symptoms: [...result.symptoms],
    causes: [...result.possible_causes],
    treatment: invalid ? [] : result.treatment.length > 0 ? [...result.treatment] : [NO_TREATMENT],
    about: aboutText(result),
    tips: invalid ? [...result.treatment] : [],
    analyzedAt: result.analysis_timestamp,
  };
}
