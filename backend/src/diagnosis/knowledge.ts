import { z } from 'zod';

import knowledgeData from '../data/disease-knowledge.json';

export const NO_ADDITIONAL_INFO = 'No additional information is available for this disease.';

const knowledge = new Map(
  Object.entries(z.record(z.string().min(1)).parse(knowledgeData)).map(
    ([name, info]) => [name.trim().toLowerCase(), info] as const,
  ),
);

function key(diseaseName: string): string {
  return diseaseName.trim().toLowerCase();
}

/** Background text for a known disease, matched case-insensitively. */
export function findDiseaseInfo(diseaseName: string): string | undefined {
  return knowledge.get(key(diseaseName));
}

export function lookupDiseaseInfo(diseaseName: string): string {
  return findDiseaseInfo(diseaseName) ?? NO_ADDITIONAL_INFO;
}

export function knownDiseases(): string[] {
  return [...knowledge.keys()];
}
