import Anthropic from '@anthropic-ai/sdk';
import type { GenerationRequest, TextBackend } from '../types.js';
import type { TokenUsageTracker } from '../usage.js';

const MAX_TOKENS = 1000;

export class AnthropicBackend implements TextBackend {
    readonly name = 'anthropic';
    private readonly client: Anthropic;

    constructor(
        apiKey: string,
        private readonly model: string,
        private readonly usage?: TokenUsageTracker
    ) {
        this.client = new Anthropic({ apiKey });
    }

    async generate(request: GenerationRequest): Promise<string | null> {
        const response = await this.client.messages.create({
            model: this.model,
            max_tokens: MAX_TOKENS,
            temperature: request.temperature,
            messages: [{ role: 'user', content: request.prompt }],
        });

        this.usage?.track({
            prompt_tokens: response.usage.input_tokens,
            completion_tokens: response.usage.output_tokens,
        });

        const text = response.content
            .flatMap(block => block.type === 'text' ? [block.text] : [])
            .join('');
        return text.trim() || null;
    }
}
