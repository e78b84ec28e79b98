import { describe, it, expect } from 'vitest';
import { IngredientService, parseClassification } from '../services/ingredient.service';
import { ChatCompletionService } from '../services/chat-completion.service';
import { OpenAILLMService } from '../ai/llm';
import { ClassificationParseError, UpstreamParseError } from '../errors';
import { FakeProvider, completionEnvelope } from './helpers/fakeProvider';

function serviceFor(provider: FakeProvider): IngredientService {
    const llm = new OpenAILLMService({
        apiKey: 'test-secret',
        model: 'gpt-4o-mini',
        timeoutMs: 1000,
        fetch: provider.fetch,
    });
    return new IngredientService(new ChatCompletionService(llm));
}

describe('parseClassification', () => {
    it('returns the classification field', () => {
        expect(parseClassification('{"classification":"vegan"}')).toBe('vegan');
    });

    it('returns labels outside the usual three verbatim', () => {
        expect(parseClassification('{"classification":"Pescatarian","reason":"fish"}')).toBe('Pescatarian');
    });

    it('rejects content that is not JSON', () => {
        let error: unknown;
        try {
            parseClassification('vegan');
        } catch (e) {
            error = e;
        }
        expect(error).toBeInstanceOf(ClassificationParseError);
        expect(error).toMatchObject({
            message: 'Completion content is not valid JSON',
            content: 'vegan',
            statusCode: 500,
        });
    });

    it('rejects JSON that is not an object', () => {
        expect(() => parseClassification('["vegan"]')).toThrow('Completion content is not a JSON object');
        expect(() => parseClassification('null')).toThrow('Completion content is not a JSON object');
    });

    it('rejects objects without a string classification', () => {
        expect(() => parseClassification('{"category":"vegan"}')).toThrow(
            'Completion content has no string "classification" field'
        );
        expect(() => parseClassification('{"classification":3}')).toThrow(ClassificationParseError);
    });
});

describe('IngredientService', () => {
    it('classifies an ingredient from the provider content', async () => {
        const provider = new FakeProvider().replyWithContent('{"classification":"vegan"}');

        await expect(serviceFor(provider).categorize('oat milk')).resolves.toBe('vegan');
    });

    it('calls the provider again for a repeated ingredient', async () => {
        const provider = new FakeProvider()
            .replyWithContent('{"classification":"vegetarian"}')
            .replyWithContent('{"classification":"vegetarian"}');
        const service = serviceFor(provider);

        await service.categorize('honey');
        await service.categorize('honey');

        expect(provider.requests).toHaveLength(2);
    });

    it('surfaces an empty choices list as UpstreamParseError', async () => {
        const provider = new FakeProvider().replyWith(completionEnvelope());

        await expect(serviceFor(provider).categorize('salt')).rejects.toBeInstanceOf(UpstreamParseError);
    });

    it('surfaces unreadable content as ClassificationParseError', async () => {
        const provider = new FakeProvider().replyWithContent('It is vegan.');

        await expect(serviceFor(provider).categorize('rice')).rejects.toBeInstanceOf(ClassificationParseError);
    });
});
