import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SYSTEM_INSTRUCTION_PREFIX, YandexCompletionService, toYandexMessages } from './completion';
import { MalformedUpstreamResponseError, UpstreamCallError } from '../types/api';
import type { ChatMessage, YandexConfig } from '../types';

const yandexConfig: YandexConfig = {
  apiKey: 'test-key',
  folderId: 'test-folder',
  baseUrl: 'https://llm.test/foundationModels/v1',
  chatModel: 'yandexgpt-lite',
  embedModel: 'text-search-doc',
  defaultEmbeddingDimension: 256,
  maxEmbeddingChars: 10000,
  requestTimeoutMs: 1000
};

const messages: ChatMessage[] = [
  { role: 'system', content: 'Be brief.' },
  { role: 'user', content: 'Hi' },
  { role: 'assistant', content: 'Hello!' },
  { role: 'user', content: 'Capital of France?' }
];

function completionResponse(text: string): Response {
  return new Response(JSON.stringify({ result: { alternatives: [{ message: { role: 'assistant', text } }] } }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' }
  });
}

describe('toYandexMessages', () => {
  it('sends the system entry as a prefixed user entry', () => {
    expect(toYandexMessages(messages)).toEqual([
      { role: 'user', text: `${SYSTEM_INSTRUCTION_PREFIX}Be brief.` },
      { role: 'user', text: 'Hi' },
      { role: 'assistant', text: 'Hello!' },
      { role: 'user', text: 'Capital of France?' }
    ]);
  });
});

describe('YandexCompletionService', () => {
  const fetchMock = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns the first alternative', async () => {
    fetchMock.mockResolvedValueOnce(completionResponse('Paris.'));
    const service = new YandexCompletionService(yandexConfig);

    expect(await service.complete(messages, { temperature: 0.3, maxTokens: 500 })).toBe('Paris.');

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://llm.test/foundationModels/v1/completion');
    expect(JSON.parse(String(init?.body))).toEqual({
      modelUri: 'gpt://test-folder/yandexgpt-lite',
      completionOptions: { stream: false, temperature: 0.3, maxTokens: '500' },
      messages: toYandexMessages(messages)
    });
  });

  it('raises MalformedUpstreamResponseError when there are no alternatives', async () => {
    fetchMock.mockResolvedValueOnce(
      new Response(JSON.stringify({ result: { alternatives: [] } }), { status: 200 })
    );
    const service = new YandexCompletionService(yandexConfig);

    await expect(service.complete(messages, { temperature: 0.7, maxTokens: 10 })).rejects.toBeInstanceOf(
      MalformedUpstreamResponseError
    );
  });

  it('raises MalformedUpstreamResponseError for a non-JSON body', async () => {
    fetchMock.mockResolvedValueOnce(new Response('<html>gateway</html>', { status: 200 }));
    const service = new YandexCompletionService(yandexConfig);

    await expect(service.complete(messages, { temperature: 0.7, maxTokens: 10 })).rejects.toBeInstanceOf(
      MalformedUpstreamResponseError
    );
  });

  it('raises UpstreamCallError when the service is unreachable', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
    const service = new YandexCompletionService(yandexConfig);

    await expect(service.complete(messages, { temperature: 0.7, maxTokens: 10 })).rejects.toThrow(
      new UpstreamCallError('Yandex completion', 'request failed: fetch failed')
    );
  });

  it('reports image understanding as not supported', async () => {
    const service = new YandexCompletionService(yandexConfig);

    expect(await service.analyzeImage('https://example.com/a.png')).toEqual({
      status: 'not_supported',
      capability: 'image-understanding',
      message: 'Image understanding is not available for this model provider'
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
