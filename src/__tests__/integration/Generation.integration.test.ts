import { describe, test, expect, afterEach, jest } from '@jest/globals';
import { OpenRouterGenerationService } from '../../infrastructure/generation/OpenRouterGenerationService.js';
import { GenerationServiceError } from '../../Platform/Errors.js';
import type { GenerationRequest } from '../../Platform/Ports.js';

const request: GenerationRequest = {
    tier: 'orchestrator',
    system: 'Settle the dispute.',
    prompt: 'Candidates: claim-1, claim-2',
    context: { 'factions.rebels.strength': 40 }
};

function completion(content: string | null): Response {
    return new Response(JSON.stringify({ choices: [{ message: { content } }] }), {
        status: 200,
        headers: { 'Content-Type': 'application/json' }
    });
}

describe('OpenRouter generation service', () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    test('posts a chat completion for the tier model and returns the reply', async () => {
        const fetchSpy = jest.spyOn(globalThis, 'fetch').mockResolvedValue(completion('claim-2'));
        const service = new OpenRouterGenerationService({ apiKey: 'test-key', baseUrl: 'http://models.test/v1/', orchestratorModel: 'test/arbiter' });

        await expect(service.generate(request)).resolves.toBe('claim-2');

        const [url, init] = fetchSpy.mock.calls[0] ?? [];
        expect(url).toBe('http://models.test/v1/chat/completions');
        expect(init?.method).toBe('POST');
        expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-key' });
        const body: unknown = JSON.parse(String(init?.body));
        expect(body).toMatchObject({
            model: 'test/arbiter',
            messages: [
                { role: 'system', content: 'Settle the dispute.' },
                { role: 'user', content: 'Candidates: claim-1, claim-2\n\nWorld context:\n{\n  "factions.rebels.strength": 40\n}' }
            ]
        });
    });

    test('each tier has its own model', () => {
        const service = new OpenRouterGenerationService({ apiKey: 'test-key', advisorModel: 'test/advisor' });
        expect(service.modelFor('advisor')).toBe('test/advisor');
        expect(service.modelFor('orchestrator')).toBe('google/gemini-3-flash-preview');
    });

    test('an error status is reported with the response text', async () => {
        jest.spyOn(globalThis, 'fetch').mockResolvedValue(new Response('quota exceeded', { status: 429, statusText: 'Too Many Requests' }));
        const service = new OpenRouterGenerationService({ apiKey: 'test-key' });

        const failure = service.generate(request);
        await expect(failure).rejects.toThrow(GenerationServiceError);
        await expect(failure).rejects.toThrow('OpenRouter API error: 429 Too Many Requests - quota exceeded');
    });

    test('an empty reply is an error', async () => {
        jest.spyOn(globalThis, 'fetch').mockResolvedValue(completion(null));
        const service = new OpenRouterGenerationService({ apiKey: 'test-key' });
        await expect(service.generate(request)).rejects.toThrow('OpenRouter returned an empty response');
    });

    test('network failures are wrapped', async () => {
        jest.spyOn(globalThis, 'fetch').mockRejectedValue(new Error('getaddrinfo ENOTFOUND'));
        const service = new OpenRouterGenerationService({ apiKey: 'test-key' });
        await expect(service.generate(request)).rejects.toThrow('OpenRouter request failed: getaddrinfo ENOTFOUND');
    });

    test('an API key is required', () => {
        expect(() => new OpenRouterGenerationService({ apiKey: '' })).toThrow(GenerationServiceError);
    });
});
