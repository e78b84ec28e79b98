/**
 * Single LLM provider export. The service is built once at startup from the
 * loaded configuration and shared by every request.
 */
import type { AppConfig } from '../../config';
import type { ILLMService } from './types';
import { OpenAILLMService } from './OpenAILLMService';

export function createLLMService(cfg: AppConfig): ILLMService {
  return new OpenAILLMService({
    apiKey: cfg.openai.apiKey,
    model: cfg.openai.model,
    timeoutMs: cfg.openai.timeoutMs,
  });
}

export { OpenAILLMService, extractFirstChoiceContent } from './OpenAILLMService';
export type { ILLMService, LLMMessage, LLMOptions, LLMResponse } from './types';
