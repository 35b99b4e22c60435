import { describe, it, expect, vi } from 'vitest';
import { ModelGateway, computeBackoffDelay } from '../../src/llm/gateway.js';
import {
  FatalProviderError,
  ModelError,
  TransientProviderError,
  UnexpectedProviderError,
} from '../../src/utils/errors.js';
import { textMessage, type ChatProvider, type GenerateRequest, type ModelResponse } from '../../src/llm/types.js';

const request: GenerateRequest = {
  modelId: 'qwen2.5:14b',
  messages: [textMessage('user', 'hello')],
  inference: { temperature: 0 },
};

function reply(text: string): ModelResponse {
  return { message: textMessage('assistant', text), stopReason: 'end_turn' };
}

function fakeProvider(profile: string, log: string[] = []) {
  const chat = vi.fn(async (_request: GenerateRequest): Promise<ModelResponse> => {
    log.push(profile);
    return reply(`from ${profile}`);
  });
  const provider: ChatProvider = { profile, chat };
  return { provider, chat };
}

function throttled(): TransientProviderError {
  return new TransientProviderError('throttling', 'slow down');
}

describe('computeBackoffDelay', () => {
  it('should double from the base delay and cap at the max delay', () => {
    const delays = [0, 1, 2, 3, 4, 5].map((n) => computeBackoffDelay(n, 20_000, 300_000));
    expect(delays).toEqual([20_000, 40_000, 80_000, 160_000, 300_000, 300_000]);
  });

  it('should be non-decreasing and never exceed the max delay', () => {
    let previous = 0;
    for (let retry = 0; retry <= 12; retry++) {
      const delay = computeBackoffDelay(retry, 3, 1000);
      expect(delay).toBeGreaterThanOrEqual(previous);
      expect(delay).toBeLessThanOrEqual(1000);
      previous = delay;
    }
  });
});

describe('ModelGateway', () => {
  describe('retries', () => {
    it('should retry transient errors with backoff and return the eventual response', async () => {
      const { provider, chat } = fakeProvider('default');
      chat.mockRejectedValueOnce(throttled()).mockRejectedValueOnce(throttled());
      const sleep = vi.fn(async (_ms: number) => {});

      const gateway = new ModelGateway([provider], { maxRetries: 3, baseDelayMs: 10, maxDelayMs: 100, sleep });
      const response = await gateway.generateResponse(request);

      expect(response.message.content).toEqual([{ type: 'text', text: 'from default' }]);
      expect(chat).toHaveBeenCalledTimes(3);
      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([10, 20]);
    });

    it('should raise a fatal error once the retry count reaches maxRetries', async () => {
      const { provider, chat } = fakeProvider('default');
      chat.mockRejectedValue(throttled());
      const sleep = vi.fn(async (_ms: number) => {});

      const gateway = new ModelGateway([provider], { maxRetries: 2, baseDelayMs: 10, maxDelayMs: 100, sleep });

      const failure = gateway.generateResponse(request);
      await expect(failure).rejects.toBeInstanceOf(FatalProviderError);
      await expect(failure).rejects.toThrow('Maximum retries (2) exceeded');
      expect(chat).toHaveBeenCalledTimes(3);
      expect(sleep).toHaveBeenCalledTimes(2);
    });

    it('should not retry fatal provider errors', async () => {
      const { provider, chat } = fakeProvider('default');
      const fatal = new FatalProviderError('model not found', { status: 404 });
      chat.mockRejectedValueOnce(fatal);
      const sleep = vi.fn(async (_ms: number) => {});

      const gateway = new ModelGateway([provider], { maxRetries: 5, baseDelayMs: 10, maxDelayMs: 100, sleep });

      await expect(gateway.generateResponse(request)).rejects.toBe(fatal);
      expect(chat).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('should wrap non-provider failures as unexpected errors', async () => {
      const { provider, chat } = fakeProvider('default');
      chat.mockRejectedValueOnce(new TypeError('fetch failed'));

      const gateway = new ModelGateway([provider], { maxRetries: 5, baseDelayMs: 10, maxDelayMs: 100 });

      const failure = gateway.generateResponse(request);
      await expect(failure).rejects.toBeInstanceOf(UnexpectedProviderError);
      await expect(failure).rejects.toThrow('Unexpected error: fetch failed');
    });
  });

  describe('profile rotation', () => {
    it('should switch to the next profile on each attempt', async () => {
      const log: string[] = [];
      const first = fakeProvider('east', log);
      const second = fakeProvider('west', log);
      first.chat.mockImplementationOnce(async () => {
        log.push('east');
        throw throttled();
      });

      const gateway = new ModelGateway([first.provider, second.provider], {
        maxRetries: 3,
        baseDelayMs: 1,
        maxDelayMs: 1,
        sleep: async () => {},
      });

      const response = await gateway.generateResponse(request);
      await gateway.generateResponse(request);

      expect(response.message.content).toEqual([{ type: 'text', text: 'from west' }]);
      expect(log).toEqual(['east', 'west', 'east']);
    });

    it('should reject an empty provider list', () => {
      expect(() => new ModelGateway([], { maxRetries: 1, baseDelayMs: 1, maxDelayMs: 1 })).toThrow(ModelError);
    });
  });

  describe('describeImage', () => {
    it('should send the image to the vision model at temperature 0', async () => {
      const { provider, chat } = fakeProvider('default');
      chat.mockResolvedValueOnce(reply('  A bar chart of sales.  '));

      const gateway = new ModelGateway([provider], {
        maxRetries: 1,
        baseDelayMs: 1,
        maxDelayMs: 1,
        visionModel: 'llava:13b',
        maxTokens: 512,
      });

      const description = await gateway.describeImage({ type: 'image', format: 'png', data: 'aGVsbG8=' }, 'chart.png');

      expect(description).toBe('A bar chart of sales.');
      const sent = chat.mock.calls[0][0];
      expect(sent.modelId).toBe('llava:13b');
      expect(sent.inference).toEqual({ temperature: 0, maxTokens: 512 });
      expect(sent.messages[0].content).toEqual([
        { type: 'image', format: 'png', data: 'aGVsbG8=' },
        { type: 'text', text: 'Describe this file: chart.png' },
      ]);
    });

    it('should fail when no vision model is configured', async () => {
      const { provider } = fakeProvider('default');
      const gateway = new ModelGateway([provider], { maxRetries: 1, baseDelayMs: 1, maxDelayMs: 1 });

      await expect(
        gateway.describeImage({ type: 'image', format: 'png', data: '' }, 'x.png')
      ).rejects.toThrow('No vision model configured');
    });
  });
});
