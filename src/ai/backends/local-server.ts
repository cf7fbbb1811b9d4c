/**
 * Self-hosted OpenAI-compatible chat server (LM Studio, llama.cpp server, Ollama's /v1 API).
 * Always last in the chain.
 */

import axios, { AxiosError } from 'axios';
import { z } from 'zod';
import type { GenerationRequest, TextBackend } from '../types.js';
import type { LLMConfig } from '../../shared/config.js';
import type { TokenUsageTracker } from '../usage.js';
import { logger } from '../../shared/logging.js';
import { sleep as defaultSleep, type Sleep } from '../../shared/time-utils.js';

const MAX_RETRIES = 3;

const CompletionSchema = z.object({
    choices: z.array(z.object({
        message: z.object({ content: z.string().nullable().optional() }),
    })),
    usage: z.object({
        prompt_tokens: z.number().optional(),
        completion_tokens: z.number().optional(),
        total_tokens: z.number().optional(),
    }).optional(),
});

// Small local models sometimes answer with a refusal instead of a summary
const GARBAGE_PATTERNS = [
    'please provide',
    'i cannot',
    'i can\'t',
    'i don\'t have',
    'as an ai language model',
    'not enough information',
    'unable to summarize',
    'insufficient information',
    'no article content',
    'without more context',
];

export function isGarbageResponse(text: string): boolean {
    const lower = text.toLowerCase();
    return GARBAGE_PATTERNS.some(p => lower.includes(p));
}

export type LocalPost = (url: string, body: unknown, timeoutMs: number) => Promise<{ status: number; data: unknown }>;

const defaultPost: LocalPost = async (url, body, timeoutMs) => {
    const response = await axios.post<unknown>(url, body, {
        timeout: timeoutMs,
        headers: { 'Content-Type': 'application/json' },
        // 429 is handled by the retry loop below
        validateStatus: status => status < 400 || status === 429,
    });
    return { status: response.status, data: response.data };
};

export class LocalServerBackend implements TextBackend {
    readonly name = 'local';

    constructor(
        private readonly config: LLMConfig['local'],
        private readonly usage?: TokenUsageTracker,
        private readonly post: LocalPost = defaultPost,
        private readonly sleep: Sleep = defaultSleep
    ) {}

    async generate(request: GenerationRequest): Promise<string | null> {
        const body = {
            model: this.config.model,
            messages: [{ role: 'user', content: request.prompt }],
            temperature: request.temperature,
        };

        let retries = 0;
        while (true) {
            let response: { status: number; data: unknown };
            try {
                response = await this.post(this.config.url, body, this.config.timeoutMs);
            } catch (err) {
                if (err instanceof AxiosError && err.code === 'ECONNREFUSED') {
                    throw new Error(`local LLM server not reachable at ${this.config.url}`, { cause: err });
                }
                throw err;
            }

            if (response.status === 429 && retries < MAX_RETRIES) {
                retries++;
                const waitTime = Math.pow(2, retries) * 2000;
                logger.warn(`[Local LLM] Rate limited, waiting ${waitTime / 1000}s (retry ${retries}/${MAX_RETRIES})`);
                await this.sleep(waitTime);
                continue;
            }
            if (response.status === 429) {
                throw new Error('local LLM server still rate limited after retries');
            }

            const completion = CompletionSchema.parse(response.data);
            this.usage?.track(completion.usage);

            const content = completion.choices[0]?.message.content?.trim() ?? '';
            if (!content) return null;
            if (isGarbageResponse(content)) {
                logger.warn(`[Local LLM] Rejected unusable response: "${content.substring(0, 60)}"`);
                return null;
            }
            return content;
        }
    }
}
