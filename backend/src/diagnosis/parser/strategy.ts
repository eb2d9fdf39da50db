import type { DiagnosisFields } from '../types';

export type ParseStrategyName = 'json' | 'regex';

/**
 * One way of reading a model completion. Returns `undefined` when the
 * strategy does not apply to the text at all, so the next one can try.
 */
export interface ParseStrategy {
  readonly name: ParseStrategyName;
  extract(text: string): DiagnosisFields | undefined;
}
