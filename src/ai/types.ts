export type BackendName = 'transformer' | 'aws-anthropic' | 'openai' | 'anthropic' | 'local';

export type GenerationRequest = {
    prompt: string;
    temperature: number;
    /** Article text for backends that summarize the source directly instead of following the prompt */
    sourceText?: string;
    /** Output length bounds in words, used by the local model */
    maxLength?: number;
    minLength?: number;
};

/**
 * One way of turning a prompt into text. Returns null (or throws) when it has no answer;
 * the chain moves on to the next backend either way.
 */
export interface TextBackend {
    readonly name: BackendName;
    generate(request: GenerationRequest): Promise<string | null>;
}

/**
 * What the summarizer needs from the backend chain.
 */
export interface TextGenerator {
    generate(request: GenerationRequest): Promise<string | null>;
    /** Backend that produced the most recent answer */
    readonly lastUsed: BackendName | null;
    /** Backends that answered at least once, e.g. "aws-anthropic, local"; "none" when nothing did */
    describeUsage(): string;
}

// OpenAI-style usage block (prompt_tokens etc.)
export type UsageReport = {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
};
