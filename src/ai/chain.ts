import type { BackendName, GenerationRequest, TextBackend, TextGenerator } from './types.js';
import { BackendError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logging.js';

/**
 * Tries each backend in order and returns the first non-empty answer.
 * Backend failures are logged and never propagate; null means nobody answered.
 */
export class BackendChain implements TextGenerator {
    private readonly used = new Set<BackendName>();
    private last: BackendName | null = null;

    constructor(readonly backends: readonly TextBackend[]) {}

    get lastUsed(): BackendName | null {
        return this.last;
    }

    get backendsUsed(): BackendName[] {
        return [...this.used];
    }

    describeUsage(): string {
        return this.used.size > 0 ? [...this.used].join(', ') : 'none';
    }

    async generate(request: GenerationRequest): Promise<string | null> {
        for (const backend of this.backends) {
            try {
                const text = (await backend.generate(request))?.trim();
                if (text) {
                    this.last = backend.name;
                    this.used.add(backend.name);
                    return text;
                }
                logger.debug(`[${backend.name}] empty response, trying next backend`);
            } catch (err) {
                const error = new BackendError(backend.name, errorMessage(err), { cause: err });
                logger.error(`❌ ${backend.name} call failed: ${error.message}`, { backend: error.backend });
            }
        }

        logger.warn('⚠️ No LLM backend produced a response');
        return null;
    }
}
