import type { DiagnosisResult } from '../types';
import { assembleResult, invalidImageResult } from './fields';
import { jsonStrategy, locateJsonObject } from './json.strategy';
import { indicatesNonLeafImage } from './leaf-validation';
import { regexStrategy } from './regex.strategy';
import type { ParseStrategy, ParseStrategyName } from './strategy';

export type ParseOutcome = ParseStrategyName | 'leaf_validation' | 'defaults';

export interface ParsedCompletion {
  result: DiagnosisResult;
  /** Which path produced the result. */
  strategy: ParseOutcome;
}

export interface CompletionParserOptions {
  /** Tried in order; the first one that recognizes the text wins. */
  strategies?: readonly ParseStrategy[];
  now?: () => Date;
}

export type CompletionParser = (text: string) => ParsedCompletion;

/** Completion text outside its JSON answer. */
function proseAround(text: string): string {
  const located = locateJsonObject(text);
  if (located === undefined) return text;
  return `${text.slice(0, located.start)}\n${text.slice(located.end)}`;
}

/**
 * Builds a parser that turns a model completion into a DiagnosisResult.
 * It never throws: text nobody can read becomes the default record.
 */
export function createCompletionParser(options: CompletionParserOptions = {}): CompletionParser {
  const strategies = options.strategies ?? [jsonStrategy, regexStrategy];
  const now = options.now ?? (() => new Date());

  return (text) => {
    const timestamp = now().toISOString();

    if (indicatesNonLeafImage(proseAround(text))) {
      return { result: invalidImageResult(timestamp), strategy: 'leaf_validation' };
    }

    for (const strategy of strategies) {
      const fields = strategy.extract(text);
      if (fields === undefined) continue;
      if (fields.diseaseType === 'invalid_image') {
        return { result: invalidImageResult(timestamp), strategy: 'leaf_validation' };
      }
      return { result: assembleResult(fields, timestamp), strategy: strategy.name };
    }

    return { result: assembleResult({}, timestamp), strategy: 'defaults' };
  };
}

export const parseCompletion: CompletionParser = createCompletionParser();

export { findJsonObject, jsonStrategy, locateJsonObject } from './json.strategy';
export { regexStrategy } from './regex.strategy';
export { indicatesNonLeafImage } from './leaf-validation';
export { INVALID_IMAGE_GUIDANCE } from './fields';
export type { ParseStrategy, ParseStrategyName } from './strategy';
