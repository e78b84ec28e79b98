/**
 * Startup: validate configuration, wire services, start the HTTP server.
 */
import { createServer, Server } from 'http';
import { createApp } from './api/app';
import { type AppConfig, assertConfig } from './config';
import { logger } from './config/logger';
import { createLLMService } from './ai/llm';
import { ChatCompletionService } from './services/chat-completion.service';
import { IngredientService } from './services/ingredient.service';

export async function start(cfg: AppConfig): Promise<Server> {
  assertConfig(cfg);

  const llm = createLLMService(cfg);
  const ingredientService = new IngredientService(new ChatCompletionService(llm));
  const httpServer = createServer(createApp({ ingredientService }));

  const host = process.env.HOST || '0.0.0.0';
  const server = httpServer.listen(cfg.port, host, () => {
    logger.info(`Server listening on ${host}:${cfg.port} (env: ${cfg.env})`);
    logger.info(`Classifying with model ${cfg.openai.model} (timeout ${cfg.openai.timeoutMs}ms)`);
  });

  return server;
}

/** Logs the whole error and lets the process exit once the logger has flushed. */
export function reportStartupFailure(e: unknown): void {
  logger.error('Startup failed:', e);
  process.exitCode = 1;
}
