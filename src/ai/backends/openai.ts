import OpenAI from 'openai';
import type { GenerationRequest, TextBackend } from '../types.js';
import type { TokenUsageTracker } from '../usage.js';

const MAX_TOKENS = 1000;

export class OpenAIBackend implements TextBackend {
    readonly name = 'openai';
    private readonly client: OpenAI;

    constructor(
        apiKey: string,
        private readonly model: string,
        private readonly usage?: TokenUsageTracker
    ) {
        this.client = new OpenAI({ apiKey });
    }

    async generate(request: GenerationRequest): Promise<string | null> {
        const response = await this.client.chat.completions.create({
            model: this.model,
            messages: [{ role: 'user', content: request.prompt }],
            temperature: request.temperature,
            max_tokens: MAX_TOKENS,
        });

        this.usage?.track(response.usage);
        return response.choices[0]?.message?.content?.trim() || null;
    }
}
