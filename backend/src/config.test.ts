import { describe, expect, it } from 'vitest';

import { loadConfig } from './config';
import { ConfigError } from './errors';

const baseEnv = { ANTHROPIC_API_KEY: 'test-secret' };

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig(baseEnv)).toEqual({
      port: 5000,
      anthropicApiKey: 'test-secret',
      vision: {
        model: 'claude-sonnet-4-20250514',
        temperature: 0.3,
        maxTokens: 1024,
        timeoutMs: 90_000,
      },
      upload: {
        maxBytes: 10 * 1024 * 1024,
        maxDimension: undefined,
      },
      corsOrigin: undefined,
    });
  });

  it('coerces numeric variables and treats blanks as unset', () => {
    const config = loadConfig({
      ...baseEnv,
      PORT: '8080',
      VISION_TEMPERATURE: '0',
      MAX_UPLOAD_BYTES: '2048',
      MAX_IMAGE_DIMENSION: '1600',
      VISION_MODEL: '   ',
      CORS_ORIGIN: 'http://localhost:5173',
    });

    expect(config.port).toBe(8080);
    expect(config.vision.temperature).toBe(0);
    expect(config.upload.maxBytes).toBe(2048);
    expect(config.upload.maxDimension).toBe(1600);
    expect(config.vision.model).toBe('claude-sonnet-4-20250514');
    expect(config.corsOrigin).toBe('http://localhost:5173');
  });

  it('requires the API key', () => {
    const error = (() => {
      try {
        loadConfig({ ANTHROPIC_API_KEY: '' });
      } catch (caught) {
        return caught;
      }
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ issues: ['ANTHROPIC_API_KEY: Required'] });
  });

  it('reports every invalid variable', () => {
    expect(() => loadConfig({ ...baseEnv, VISION_TEMPERATURE: '2', PORT: 'eighty' })).toThrow(
      /VISION_TEMPERATURE[\s\S]*PORT|PORT[\s\S]*VISION_TEMPERATURE/,
    );
  });
});
