/**
 * LLM abstraction: the rest of the app talks to this interface, never to the
 * provider SDK directly.
 */

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMOptions {
  /** Ask the provider for a JSON object as the message content. */
  jsonResponse?: boolean;
}

export interface LLMResponse {
  content: string;
}

export interface ILLMService {
  chat(messages: LLMMessage[], options?: LLMOptions): Promise<LLMResponse>;
}
