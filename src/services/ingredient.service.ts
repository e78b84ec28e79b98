import { ClassificationParseError } from '../errors';
import type { Classification } from '../types';
import type { ChatCompletionService } from './chat-completion.service';

export class IngredientService {
    constructor(private readonly completions: ChatCompletionService) {}

    /**
     * Classify an ingredient. Every call goes upstream; results are not cached.
     * The completion content must be a JSON object with a string `classification`.
     */
    async categorize(ingredient: string): Promise<Classification> {
        const content = await this.completions.complete(ingredient);
        return parseClassification(content);
    }
}

export function parseClassification(content: string): Classification {
    let parsed: unknown;
    try {
        parsed = JSON.parse(content);
    } catch (error) {
        throw new ClassificationParseError('Completion content is not valid JSON', content, { cause: error });
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new ClassificationParseError('Completion content is not a JSON object', content);
    }
    const classification = 'classification' in parsed ? parsed.classification : undefined;
    if (typeof classification !== 'string') {
        throw new ClassificationParseError('Completion content has no string "classification" field', content);
    }
    return classification;
}
