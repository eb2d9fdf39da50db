import { describe, expect, it } from 'vitest';

import { findJsonObject, jsonStrategy } from './json.strategy';

describe('findJsonObject', () => {
  it('ignores braces inside strings', () => {
    expect(findJsonObject('Result: {"disease_name": "Spot {type B}", "confidence": 40} done')).toEqual({
      disease_name: 'Spot {type B}',
      confidence: 40,
    });
  });

  it('skips arrays and broken candidates', () => {
    expect(findJsonObject('[{"a": 1}')).toEqual({ a: 1 });
    expect(findJsonObject("{'single': 'quotes'} then {\"ok\": true}")).toEqual({ ok: true });
  });

  it('returns undefined when nothing parses', () => {
    expect(findJsonObject('no json here')).toBeUndefined();
    expect(findJsonObject('{"unterminated": ')).toBeUndefined();
  });
});

describe('jsonStrategy', () => {
  it('does not apply to text without an object', () => {
    expect(jsonStrategy.extract('Severity: mild')).toBeUndefined();
  });

  it('leaves unrecognized fields unset', () => {
    expect(jsonStrategy.extract('{"plant": "tomato", "severity": "Moderate "}')).toEqual({
      severity: 'moderate',
    });
  });
});
