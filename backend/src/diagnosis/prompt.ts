import { DISEASE_TYPES, SEVERITIES } from './types';

const quoted = (values: readonly string[]) => values.map((value) => `"${value}"`).join(', ');

const DIAGNOSIS_PROMPT = `You are a plant pathologist reviewing a single photo.

Step 1 - Leaf check: decide whether the image shows a plant leaf.
If it does NOT show a plant leaf, answer with exactly this JSON and nothing else:
{"disease_detected": false, "disease_name": null, "disease_type": "invalid_image", "severity": "none", "confidence": 0, "symptoms": [], "possible_causes": [], "treatment": []}

Step 2 - Diagnosis: if it is a plant leaf, examine it for disease, pests and nutrient problems.
Return ONLY a valid JSON object, with no prose and no code fences, using exactly these fields:
{
  "disease_detected": true or false,
  "disease_name": "name of the disease, or null when the leaf is healthy",
  "disease_type": one of ${quoted(DISEASE_TYPES.filter((type) => type !== 'invalid_image'))},
  "severity": one of ${quoted(SEVERITIES)},
  "confidence": a number from 0 to 100,
  "symptoms": ["observed symptom", ...],
  "possible_causes": ["likely cause", ...],
  "treatment": ["actionable recommendation", ...]
}

Rules:
- A healthy leaf uses "disease_detected": false, "disease_name": null, "disease_type": "healthy" and "severity": "none"; "treatment" then holds care advice.
- Keep every list entry to one short sentence.`;

/** The instruction sent alongside every uploaded image. */
export function buildDiagnosisPrompt(): string {
  return DIAGNOSIS_PROMPT;
}
