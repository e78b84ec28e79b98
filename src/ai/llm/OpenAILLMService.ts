import OpenAI, { APIConnectionTimeoutError, APIError, type ClientOptions } from 'openai';
import type { ILLMService, LLMMessage, LLMOptions, LLMResponse } from './types';
import { UpstreamParseError, UpstreamTimeoutError, UpstreamTransportError } from '../../errors';

export interface OpenAILLMServiceOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  /** Replaces the HTTP transport of the SDK client. */
  fetch?: ClientOptions['fetch'];
}

const OPENAI_BASE_URL = 'https://api.openai.com/v1';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pulls `choices[0].message.content` out of a chat-completions envelope.
 * Throws UpstreamParseError when the envelope has no usable first choice.
 */
export function extractFirstChoiceContent(payload: unknown): string {
  const raw = String(JSON.stringify(payload));
  if (!isRecord(payload) || !Array.isArray(payload.choices)) {
    throw new UpstreamParseError('Completion response has no choices array', raw);
  }
  if (payload.choices.length === 0) {
    throw new UpstreamParseError('Completion response returned no choices', raw);
  }
  const first: unknown = payload.choices[0];
  const message = isRecord(first) ? first.message : undefined;
  const content = isRecord(message) ? message.content : undefined;
  if (typeof content !== 'string') {
    throw new UpstreamParseError('First completion choice has no text content', raw);
  }
  return content;
}

/**
 * Chat completions against the OpenAI API. The client is built once with the
 * injected key; retries are disabled and every call is bounded by `timeoutMs`.
 */
export class OpenAILLMService implements ILLMService {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly timeoutMs: number;

  constructor(options: OpenAILLMServiceOptions) {
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: OPENAI_BASE_URL,
      timeout: options.timeoutMs,
      maxRetries: 0,
      fetch: options.fetch,
    });
  }

  async chat(messages: LLMMessage[], options?: LLMOptions): Promise<LLMResponse> {
    let body: string;
    try {
      const response = await this.client.chat.completions
        .create({
          model: this.model,
          messages: messages.map((m) => ({ role: m.role, content: m.content })),
          ...(options?.jsonResponse ? { response_format: { type: 'json_object' as const } } : {}),
        })
        .asResponse();
      body = await response.text();
    } catch (error) {
      throw this.toUpstreamError(error);
    }

    let completion: unknown;
    try {
      completion = JSON.parse(body);
    } catch (error) {
      throw new UpstreamParseError('Completion response body is not valid JSON', body, { cause: error });
    }
    return { content: extractFirstChoiceContent(completion) };
  }

  private toUpstreamError(error: unknown): Error {
    if (error instanceof APIConnectionTimeoutError) {
      return new UpstreamTimeoutError(this.timeoutMs, { cause: error });
    }
    if (error instanceof APIError) {
      return new UpstreamTransportError(error.message, error.status, { cause: error });
    }
    return new UpstreamTransportError(error instanceof Error ? error.message : String(error), undefined, {
      cause: error,
    });
  }
}
