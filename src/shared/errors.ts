// Error taxonomy. Source and backend errors are handled per item; pipeline, delivery and
// config errors fail the whole run.

export type ErrorKind = 'source' | 'backend' | 'pipeline' | 'delivery' | 'config';

export class NewsletterError extends Error {
    readonly kind: ErrorKind;

    constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'NewsletterError';
        this.kind = kind;
    }
}

export class SourceError extends NewsletterError {
    constructor(readonly source: string, message: string, options?: { cause?: unknown }) {
        super('source', message, options);
        this.name = 'SourceError';
    }
}

export class BackendError extends NewsletterError {
    constructor(readonly backend: string, message: string, options?: { cause?: unknown }) {
        super('backend', message, options);
        this.name = 'BackendError';
    }
}

export class PipelineError extends NewsletterError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('pipeline', message, options);
        this.name = 'PipelineError';
    }
}

export class DeliveryError extends NewsletterError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('delivery', message, options);
        this.name = 'DeliveryError';
    }
}

export class ConfigError extends NewsletterError {
    constructor(message: string, readonly missing: string[] = []) {
        super('config', message);
        this.name = 'ConfigError';
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
