import type { UsageReport } from './types.js';
import { logger } from '../shared/logging.js';

/**
 * Cumulative token usage for one run, fed by the cloud backends.
 */
export class TokenUsageTracker {
    prompt = 0;
    completion = 0;
    total = 0;
    requests = 0;

    track(usage: UsageReport | undefined): void {
        if (!usage) return;
        const prompt = usage.prompt_tokens || 0;
        const completion = usage.completion_tokens || 0;
        this.prompt += prompt;
        this.completion += completion;
        this.total += usage.total_tokens || prompt + completion;
        this.requests++;
    }

    log(label = 'AI'): void {
        if (this.requests === 0) return;
        logger.info(`[${label}] Token usage: ${this.total.toLocaleString()} total (${this.prompt.toLocaleString()} prompt + ${this.completion.toLocaleString()} completion) across ${this.requests} requests`);
    }
}
