import { type DiagnosisFields, type Severity, isSeverity } from '../types';
import {
  clampConfidence,
  cleanDiseaseName,
  hasAnyField,
  normalizeDiseaseType,
  parseFlag,
} from './fields';
import type { ParseStrategy } from './strategy';

const DETECTED = /\bdisease[\s_-]?detected\b[\s"'*_]*[:=][\s"'*_]*(true|false|yes|no)\b/i;
const NAME = /\bdisease[\s_-]?name\b[\s"'*_]*[:=][\s*_]*(?:"([^"\n]*)"|'([^'\n]*)'|([^,\n}]+))/i;
const TYPE = /\bdisease[\s_-]?type\b[\s"'*_]*[:=][\s"'*_]*([a-z][a-z _-]*)/i;
const SEVERITY =
  /\bseverity\b[\s"'*_]*(?:level)?[\s"'*_]*[:=]?\s*(?:is\s+)?[\s"'*_]*(none|mild|moderate|severe)\b/i;
const CONFIDENCE =
  /\bconfidence\b[\s"'*_]*(?:level|score)?[\s"'*_]*[:=]?\s*(?:of|is|at|around|about)?[\s"'*_]*(\d{1,3}(?:\.\d+)?)/i;

const BULLET = /^\s*(?:[-*+•]|\d+[.)])\s+(.+?)\s*$/;
const HEADING = /^\s*(?:#{1,6}\s*)?(?:\d+[.)]\s*)?[*_]{0,2}([A-Za-z][A-Za-z _]*?)[*_]{0,2}\s*(?::[*_]{0,2}\s*(.*?))?\s*$/;

const SYMPTOM_LABELS = ['symptoms', 'observed symptoms'];
const CAUSE_LABELS = ['possible causes', 'causes', 'why this happens'];
const TREATMENT_LABELS = ['treatment', 'treatments', 'recommended treatment', 'recommendations'];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function labelPattern(labels: readonly string[]): string {
  return labels.map((label) => label.split(' ').map(escapeRegExp).join('[\\s_-]+')).join('|');
}

function cleanItem(item: string): string {
  return item
    .replace(/\*\*|__/g, '')
    .trim()
    .replace(/^["']|["'],?$/g, '')
    .trim();
}

function stripDecorations(value: string): string {
  return value.replace(/^[\s"'*_]+|[\s"'*_.]+$/g, '');
}

/** `"symptoms": ["a", "b"]`, also when the surrounding JSON is broken. */
function inlineArray(text: string, labels: readonly string[]): string[] | undefined {
  const pattern = new RegExp(`["']?(?:${labelPattern(labels)})["']?\\s*[:=]\\s*\\[([^\\]]*)\\]`, 'i');
  const match = pattern.exec(text);
  if (!match) return undefined;

  const body = match[1];
  const quoted = [...body.matchAll(/"((?:[^"\\]|\\.)*)"|'([^']*)'/g)]
    .map((item) => (item[1] ?? item[2]).replace(/\\(.)/g, '$1').trim())
    .filter((item) => item !== '');
  if (quoted.length > 0) return quoted;

  return body
    .split(',')
    .map(cleanItem)
    .filter((item) => item !== '');
}

/** A heading such as `**Symptoms:**` followed by bullet lines. */
function bulletSection(text: string, labels: readonly string[]): string[] | undefined {
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const heading = HEADING.exec(lines[i]);
    if (!heading) continue;
    const label = heading[1].toLowerCase().replace(/[\s_]+/g, ' ').trim();
    if (!labels.includes(label)) continue;

    const items: string[] = [];
    for (let j = i + 1; j < lines.length; j++) {
      if (lines[j].trim() === '') {
        if (items.length > 0) break;
        continue;
      }
      const bullet = BULLET.exec(lines[j]);
      if (!bullet) break;
      const item = cleanItem(bullet[1]);
      if (item !== '') items.push(item);
    }

    const inline = heading[2] ?? '';
    if (items.length === 0 && inline !== '') {
      return inline
        .split(inline.includes(';') ? ';' : ',')
        .map(cleanItem)
        .filter((item) => item !== '');
    }
    return items;
  }
  return undefined;
}

function extractList(text: string, labels: readonly string[]): string[] | undefined {
  return inlineArray(text, labels) ?? bulletSection(text, labels);
}

function extractName(text: string): string | undefined {
  const match = NAME.exec(text);
  if (!match) return undefined;
  const value = match[1] ?? match[2] ?? match[3];
  return cleanDiseaseName(stripDecorations(value));
}

function extractSeverity(text: string): Severity | undefined {
  const match = SEVERITY.exec(text);
  if (!match) return undefined;
  const severity = match[1].toLowerCase();
  return isSeverity(severity) ? severity : undefined;
}

function extractDetected(text: string): boolean | undefined {
  const match = DETECTED.exec(text);
  if (!match) return undefined;
  const flag = parseFlag(match[1]);
  return typeof flag === 'boolean' ? flag : undefined;
}

/**
 * Field-by-field recovery for completions that hold no parseable JSON.
 * Each field is searched for independently; whatever is not found stays unset.
 */
export const regexStrategy: ParseStrategy = {
  name: 'regex',
  extract(text) {
    const typeMatch = TYPE.exec(text);
    const confidenceMatch = CONFIDENCE.exec(text);

    const fields: DiagnosisFields = {
      diseaseDetected: extractDetected(text),
      diseaseName: extractName(text),
      diseaseType: typeMatch ? normalizeDiseaseType(typeMatch[1]) : undefined,
      severity: extractSeverity(text),
      confidence: confidenceMatch ? clampConfidence(Number.parseFloat(confidenceMatch[1])) : undefined,
      symptoms: extractList(text, SYMPTOM_LABELS),
      possibleCauses: extractList(text, CAUSE_LABELS),
      treatment: extractList(text, TREATMENT_LABELS),
    };

    return hasAnyField(fields) ? fields : undefined;
  },
};
