import type { ILLMService } from '../ai/llm';
import { buildIngredientPrompt } from '../ai/prompts/templates';

/**
 * Turns an ingredient into a single-message completion request and returns
 * the raw message content. Empty ingredients are not rejected here.
 */
export class ChatCompletionService {
    constructor(private readonly llm: ILLMService) {}

    async complete(ingredient: string): Promise<string> {
        const response = await this.llm.chat(
            [{ role: 'user', content: buildIngredientPrompt(ingredient) }],
            { jsonResponse: true }
        );
        return response.content;
    }
}
