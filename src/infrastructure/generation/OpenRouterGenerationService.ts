import { z } from 'zod';
import type { GenerationRequest, GenerationService } from '../../Platform/Ports.js';
import type { ModelTier } from '../../kernel-core/L0/Ontology.js';
import { GenerationServiceError } from '../../Platform/Errors.js';

export const DEFAULT_OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

export interface OpenRouterOptions {
    apiKey: string;
    baseUrl?: string;
    advisorModel?: string;
    orchestratorModel?: string;
    temperature?: number;
    maxTokens?: number;
    timeoutMs?: number;
}

const CompletionSchema = z.object({
    choices: z.array(z.object({
        message: z.object({ content: z.string().nullable().optional() }),
    })).min(1),
});

/**
 * OpenAI-compatible chat completions over fetch. One model per tier; the
 * world context travels as a JSON block after the prompt.
 */
export class OpenRouterGenerationService implements GenerationService {
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly models: Record<ModelTier, string>;
    private readonly temperature: number;
    private readonly maxTokens: number;
    private readonly timeoutMs: number;

    constructor(options: OpenRouterOptions) {
        if (!options.apiKey) {
            throw new GenerationServiceError('OpenRouter API key is not set');
        }
        this.apiKey = options.apiKey;
        this.baseUrl = (options.baseUrl ?? DEFAULT_OPENROUTER_BASE_URL).replace(/\/+$/, '');
        this.models = {
            advisor: options.advisorModel ?? 'moonshotai/kimi-k2-0905',
            orchestrator: options.orchestratorModel ?? 'google/gemini-3-flash-preview'
        };
        this.temperature = options.temperature ?? 0.7;
        this.maxTokens = options.maxTokens ?? 2048;
        this.timeoutMs = options.timeoutMs ?? 60_000;
    }

    public modelFor(tier: ModelTier): string {
        return this.models[tier];
    }

    async generate(request: GenerationRequest): Promise<string> {
        const model = this.models[request.tier];
        const content = Object.keys(request.context).length > 0
            ? `${request.prompt}\n\nWorld context:\n${JSON.stringify(request.context, null, 2)}`
            : request.prompt;

        let response: Response;
        try {
            response = await fetch(`${this.baseUrl}/chat/completions`, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    Authorization: `Bearer ${this.apiKey}`,
                    'X-Title': 'Regency Kernel'
                },
                body: JSON.stringify({
                    model,
                    messages: [
                        { role: 'system', content: request.system },
                        { role: 'user', content }
                    ],
                    temperature: this.temperature,
                    max_tokens: this.maxTokens
                }),
                signal: AbortSignal.timeout(this.timeoutMs)
            });
        } catch (e) {
            throw new GenerationServiceError(`OpenRouter request failed: ${e instanceof Error ? e.message : String(e)}`, undefined, { model });
        }

        if (!response.ok) {
            const errorText = await response.text();
            throw new GenerationServiceError(`OpenRouter API error: ${response.status} ${response.statusText} - ${errorText}`, response.status, { model });
        }

        const body: unknown = await response.json();
        const parsed = CompletionSchema.safeParse(body);
        const reply = parsed.success ? parsed.data.choices[0]?.message.content : undefined;
        if (!reply) {
            throw new GenerationServiceError('OpenRouter returned an empty response', response.status, { model });
        }
        return reply;
    }
}
