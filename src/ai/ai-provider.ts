/**
 * AI Provider
 *
 * Builds the backend chain once per run from configuration. Order:
 * 1. Local model (in-process) - only when it is the preferred backend
 * 2. AWS Bedrock Claude       - USE_AWS_BEDROCK
 * 3. OpenAI                   - USE_EXTERNAL_LLM + OPENAI_API_KEY
 * 4. Anthropic                - USE_EXTERNAL_LLM + ANTHROPIC_API_KEY
 * 5. Local OpenAI-compatible server - always, last resort
 */

import type { TextBackend } from './types.js';
import { BackendChain } from './chain.js';
import { TokenUsageTracker } from './usage.js';
import { LocalModelBackend, fileModelLoader, type ModelLoader } from './backends/local-model.js';
import { BedrockBackend } from './backends/bedrock.js';
import { OpenAIBackend } from './backends/openai.js';
import { AnthropicBackend } from './backends/anthropic.js';
import { LocalServerBackend } from './backends/local-server.js';
import type { LLMConfig } from '../shared/config.js';
import { logger } from '../shared/logging.js';

export type BackendProvider = {
    chain: BackendChain;
    usage: TokenUsageTracker;
};

export type ProviderOverrides = {
    modelLoader?: ModelLoader;
};

export function createBackends(config: LLMConfig, usage: TokenUsageTracker, overrides: ProviderOverrides = {}): TextBackend[] {
    const backends: TextBackend[] = [];

    if (config.preferred === 'transformer' && config.useTransformer) {
        backends.push(new LocalModelBackend({ modelName: config.transformerModel, loader: overrides.modelLoader ?? fileModelLoader(config.transformerModelPath) }));
    }
    if (config.bedrock.enabled) {
        backends.push(new BedrockBackend(config.bedrock, usage));
    }
    if (config.useExternal && config.openai.apiKey) {
        backends.push(new OpenAIBackend(config.openai.apiKey, config.openai.model, usage));
    }
    if (config.useExternal && config.anthropic.apiKey) {
        backends.push(new AnthropicBackend(config.anthropic.apiKey, config.anthropic.model, usage));
    }
    backends.push(new LocalServerBackend(config.local, usage));

    return backends;
}

export function createBackendProvider(config: LLMConfig, overrides: ProviderOverrides = {}): BackendProvider {
    const usage = new TokenUsageTracker();
    const chain = new BackendChain(createBackends(config, usage, overrides));
    logger.info(`🔧 LLM backends: ${chain.backends.map(b => b.name).join(' → ')}`);
    return { chain, usage };
}
