import { BedrockRuntimeClient, InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';
import { z } from 'zod';
import type { GenerationRequest, TextBackend } from '../types.js';
import type { LLMConfig } from '../../shared/config.js';
import type { TokenUsageTracker } from '../usage.js';

const MAX_TOKENS = 1000;

const ResponseSchema = z.object({
    content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
    usage: z.object({ input_tokens: z.number(), output_tokens: z.number() }).optional(),
});

/** Sends a JSON request body to a model and returns the raw response body */
export type BedrockInvoke = (modelId: string, body: string) => Promise<Uint8Array | undefined>;

function createInvoke(config: LLMConfig['bedrock']): BedrockInvoke {
    // Explicit keys when configured, otherwise the default AWS credential chain (profile, IAM role)
    const client = new BedrockRuntimeClient({
        region: config.region,
        ...(config.accessKeyId && config.secretAccessKey ? {
            credentials: {
                accessKeyId: config.accessKeyId,
                secretAccessKey: config.secretAccessKey,
                sessionToken: config.sessionToken,
            },
        } : {}),
    });

    return async (modelId, body) => {
        const response = await client.send(new InvokeModelCommand({
            modelId,
            body,
            contentType: 'application/json',
            accept: 'application/json',
        }));
        return response.body;
    };
}

/**
 * Claude through AWS Bedrock's Anthropic messages format.
 */
export class BedrockBackend implements TextBackend {
    readonly name = 'aws-anthropic';
    private readonly invoke: BedrockInvoke;

    constructor(
        private readonly config: LLMConfig['bedrock'],
        private readonly usage?: TokenUsageTracker,
        invoke?: BedrockInvoke
    ) {
        this.invoke = invoke ?? createInvoke(config);
    }

    async generate(request: GenerationRequest): Promise<string | null> {
        const body = JSON.stringify({
            anthropic_version: 'bedrock-2023-05-31',
            max_tokens: MAX_TOKENS,
            temperature: request.temperature,
            messages: [{ role: 'user', content: request.prompt }],
        });

        const raw = await this.invoke(this.config.modelId, body);
        if (!raw) return null;

        const parsed = ResponseSchema.parse(JSON.parse(new TextDecoder().decode(raw)));
        if (parsed.usage) {
            this.usage?.track({
                prompt_tokens: parsed.usage.input_tokens,
                completion_tokens: parsed.usage.output_tokens,
            });
        }

        const text = parsed.content
            .filter(block => block.type === 'text')
            .map(block => block.text ?? '')
            .join('');
        return text.trim() || null;
    }
}
