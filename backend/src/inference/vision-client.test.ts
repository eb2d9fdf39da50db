import Anthropic from '@anthropic-ai/sdk';
import { describe, expect, it, vi } from 'vitest';

import { InferenceUnavailableError } from '../errors';
import type { EncodedImage } from '../image/encoder';
import { AnthropicVisionClient, type MessagesApi, toInferenceError } from './vision-client';

const image: EncodedImage = {
  data: 'aGVsbG8=',
  mediaType: 'image/png',
  sourceFormat: 'png',
  width: 4,
  height: 4,
  byteLength: 5,
  normalized: false,
};

const settings = { model: 'test-vision-model', temperature: 0.3, maxTokens: 1024 };

function clientWith(create: MessagesApi['create']) {
  return new AnthropicVisionClient({ create }, settings);
}

describe('AnthropicVisionClient', () => {
  it('sends the image block and prompt with the configured settings', async () => {
    const create = vi.fn<MessagesApi['create']>().mockResolvedValue({
      content: [{ type: 'text', text: '{"disease_detected": false}' }],
    });

    await clientWith(create).complete({ prompt: 'Inspect this leaf.', image });

    expect(create).toHaveBeenCalledTimes(1);
    expect(create).toHaveBeenCalledWith({
      model: 'test-vision-model',
      max_tokens: 1024,
      temperature: 0.3,
      messages: [
        {
          role: 'user',
          content: [
            { type: 'image', source: { type: 'base64', media_type: 'image/png', data: 'aGVsbG8=' } },
            { type: 'text', text: 'Inspect this leaf.' },
          ],
        },
      ],
    });
  });

  it('joins the text blocks of the reply', async () => {
    const create = vi.fn<MessagesApi['create']>().mockResolvedValue({
      content: [
        { type: 'text', text: '  {"severity": ' },
        { type: 'tool_use' },
        { type: 'text', text: '"mild"}\n' },
      ],
    });

    await expect(clientWith(create).complete({ prompt: 'p', image })).resolves.toBe('{"severity": "mild"}');
  });

  it('returns an empty completion when the reply has no text', async () => {
    const create = vi.fn<MessagesApi['create']>().mockResolvedValue({ content: [] });
    await expect(clientWith(create).complete({ prompt: 'p', image })).resolves.toBe('');
  });

  it('wraps SDK failures without retrying', async () => {
    const create = vi.fn<MessagesApi['create']>().mockRejectedValue(
      new Anthropic.APIError(429, undefined, 'rate limited', undefined),
    );

    const error = await clientWith(create)
      .complete({ prompt: 'p', image })
      .catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(InferenceUnavailableError);
    expect(error).toMatchObject({ reason: 'rate_limited', status: 503, code: 'inference_unavailable' });
    expect(create).toHaveBeenCalledTimes(1);
  });
});

describe('toInferenceError', () => {
  it.each([
    ['timeout', new Anthropic.APIConnectionTimeoutError()],
    ['network', new Anthropic.APIConnectionError({ message: 'socket hang up' })],
    ['authentication', new Anthropic.APIError(401, undefined, 'invalid x-api-key', undefined)],
    ['authentication', new Anthropic.APIError(403, undefined, 'forbidden', undefined)],
    ['rate_limited', new Anthropic.APIError(429, undefined, 'slow down', undefined)],
    ['upstream', new Anthropic.APIError(529, undefined, 'overloaded', undefined)],
    ['upstream', new Error('unexpected')],
  ])('maps to %s', (reason, error) => {
    const mapped = toInferenceError(error);

    expect(mapped.reason).toBe(reason);
    expect(mapped.cause).toBe(error);
  });

  it('passes an existing inference error through', () => {
    const original = new InferenceUnavailableError('timeout', 'too slow');
    expect(toInferenceError(original)).toBe(original);
  });
});
