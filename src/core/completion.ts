import { z } from 'zod';
import { logger } from '../utils/logger';
import { postJson } from './http';
import type { ChatMessage, CompletionOptions, NotSupportedResult, YandexConfig } from '../types';

export interface CompletionClient {
  readonly modelName: string;
  complete(messages: ChatMessage[], options: CompletionOptions): Promise<string>;
  analyzeImage(imageUrl: string, query?: string): Promise<NotSupportedResult>;
}

interface YandexMessage {
  role: 'user' | 'assistant';
  text: string;
}

const completionResponseSchema = z.object({
  result: z.object({
    alternatives: z
      .array(
        z.object({
          message: z.object({
            text: z.string()
          })
        })
      )
      .min(1)
  })
});

export const SYSTEM_INSTRUCTION_PREFIX = 'System instruction: ';

/**
 * The completion API has no system role: a system entry is sent as a user
 * entry carrying the instruction prefix.
 */
export function toYandexMessages(messages: ChatMessage[]): YandexMessage[] {
  return messages.map((msg): YandexMessage =>
    msg.role === 'system'
      ? { role: 'user', text: `${SYSTEM_INSTRUCTION_PREFIX}${msg.content}` }
      : { role: msg.role, text: msg.content }
  );
}

export class YandexCompletionService implements CompletionClient {
  public readonly modelName: string;
  private readonly modelUri: string;
  private readonly url: string;
  private readonly headers: Record<string, string>;

  constructor(private readonly config: YandexConfig) {
    this.modelName = config.chatModel;
    this.modelUri = `gpt://${config.folderId}/${config.chatModel}`;
    this.url = `${config.baseUrl}/completion`;
    this.headers = {
      Authorization: `Api-Key ${config.apiKey}`,
      'x-folder-id': config.folderId
    };

    logger.info(`Completion service initialized with model: ${this.modelUri}`);
  }

  async complete(messages: ChatMessage[], options: CompletionOptions): Promise<string> {
    const startTime = Date.now();
    const payload = {
      modelUri: this.modelUri,
      completionOptions: {
        stream: false,
        temperature: options.temperature,
        maxTokens: String(options.maxTokens)
      },
      messages: toYandexMessages(messages)
    };

    logger.debug('Sending completion request', { messages: messages.length, modelUri: this.modelUri });

    const data = await postJson(this.url, payload, completionResponseSchema, {
      service: 'Yandex completion',
      headers: this.headers,
      timeoutMs: this.config.requestTimeoutMs
    });
    const answer = data.result.alternatives[0].message.text;

    logger.performance('Completion request', Date.now() - startTime, { answerLength: answer.length });
    return answer;
  }

  async analyzeImage(imageUrl: string, query?: string): Promise<NotSupportedResult> {
    logger.warn('Image understanding requested but not implemented', { imageUrl, hasQuery: query !== undefined });
    return {
      status: 'not_supported',
      capability: 'image-understanding',
      message: 'Image understanding is not available for this model provider'
    };
  }
}
