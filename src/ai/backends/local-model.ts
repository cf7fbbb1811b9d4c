/**
 * In-process summarization model: extractive, word-frequency based.
 *
 * The source text is split into sentences, each sentence is scored by the document frequency
 * of its content words, and a beam search picks the highest-scoring set of sentences whose
 * length stays within [minLength, maxLength] words. Picked sentences are joined in source order.
 * It only answers requests that carry the article text; free-form prompts fall through to the
 * next backend.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { GenerationRequest, TextBackend } from '../types.js';
import { logger } from '../../shared/logging.js';
import { packagePath } from '../../shared/paths.js';

export type ExtractiveModel = {
    name: string;
    stopwords: ReadonlySet<string>;
};

export type ModelLoader = () => Promise<ExtractiveModel>;

export type SummaryLimits = {
    numBeams: number;
    maxLength: number;
    minLength: number;
};

export const DEFAULT_LIMITS: SummaryLimits = { numBeams: 4, maxLength: 120, minLength: 40 };
export const DEFAULT_MODEL_PATH = packagePath('data', 'stopwords.json');

// First sentence of a news story usually carries the lede
const LEAD_BONUS = 0.25;

const ModelFileSchema = z.object({
    name: z.string(),
    stopwords: z.array(z.string()),
});

export function fileModelLoader(path: string = DEFAULT_MODEL_PATH): ModelLoader {
    return async () => {
        const parsed = ModelFileSchema.parse(JSON.parse(await readFile(path, 'utf8')));
        return { name: parsed.name, stopwords: new Set(parsed.stopwords.map(w => w.toLowerCase())) };
    };
}

export function splitSentences(text: string): string[] {
    return text
        .replace(/\s+/g, ' ')
        .split(/(?<=[.!?])\s+/)
        .map(s => s.trim())
        .filter(s => s.length > 0);
}

function wordCount(text: string): number {
    return text.split(/\s+/).filter(w => w).length;
}

function contentWords(model: ExtractiveModel, sentence: string): string[] {
    return (sentence.toLowerCase().match(/[a-z0-9']+/g) ?? []).filter(w => !model.stopwords.has(w));
}

type ScoredSentence = { index: number; text: string; words: number; score: number };

export function scoreSentences(model: ExtractiveModel, sentences: string[]): ScoredSentence[] {
    const tokens = sentences.map(s => contentWords(model, s));
    const freq = new Map<string, number>();
    for (const words of tokens) {
        for (const word of words) freq.set(word, (freq.get(word) ?? 0) + 1);
    }
    const maxFreq = Math.max(1, ...freq.values());

    return sentences.map((text, index) => {
        const words = tokens[index];
        const base = words.length === 0
            ? 0
            : words.reduce((sum, w) => sum + (freq.get(w) ?? 0) / maxFreq, 0) / words.length;
        return { index, text, words: wordCount(text), score: base + (index === 0 ? LEAD_BONUS : 0) };
    });
}

type Beam = { picked: number[]; words: number; score: number };

const byBeamRank = (a: Beam, b: Beam) => b.score - a.score || a.words - b.words;

/**
 * Indices (ascending) of the best sentence set. With one beam this is a greedy search.
 */
export function beamSelect(sentences: ScoredSentence[], limits: SummaryLimits): number[] {
    let beams: Beam[] = [{ picked: [], words: 0, score: 0 }];
    const finished: Beam[] = [];

    while (beams.length > 0) {
        const next: Beam[] = [];
        for (const beam of beams) {
            const last = beam.picked.length > 0 ? beam.picked[beam.picked.length - 1] : -1;
            let extended = false;
            for (const sentence of sentences) {
                if (sentence.index <= last || beam.words + sentence.words > limits.maxLength) continue;
                next.push({
                    picked: [...beam.picked, sentence.index],
                    words: beam.words + sentence.words,
                    score: beam.score + sentence.score,
                });
                extended = true;
            }
            if (!extended && beam.picked.length > 0) finished.push(beam);
        }
        next.sort(byBeamRank);
        beams = next.slice(0, Math.max(1, limits.numBeams));
    }

    const longEnough = finished.filter(b => b.words >= limits.minLength);
    const pool = (longEnough.length > 0 ? longEnough : finished).sort(byBeamRank);
    return pool.length > 0 ? pool[0].picked : [];
}

export function summarizeExtractive(model: ExtractiveModel, text: string, limits: SummaryLimits = DEFAULT_LIMITS): string {
    const sentences = splitSentences(text);
    if (sentences.length === 0) return '';

    const picked = beamSelect(scoreSentences(model, sentences), limits);
    if (picked.length === 0) {
        // Every sentence is longer than maxLength on its own
        return sentences[0].split(/\s+/).slice(0, limits.maxLength).join(' ') + '...';
    }
    return picked.map(i => sentences[i]).join(' ');
}

export type LocalModelOptions = {
    modelName: string;
    loader?: ModelLoader;
    limits?: Partial<SummaryLimits>;
};

export class LocalModelBackend implements TextBackend {
    readonly name = 'transformer';
    private readonly loader: ModelLoader;
    private readonly limits: SummaryLimits;
    private model: Promise<ExtractiveModel> | null = null;

    constructor(private readonly options: LocalModelOptions) {
        this.loader = options.loader ?? fileModelLoader();
        this.limits = { ...DEFAULT_LIMITS, ...options.limits };
    }

    private loadModel(): Promise<ExtractiveModel> {
        if (!this.model) {
            logger.info(`🤖 Loading local summarization model (${this.options.modelName})...`);
            this.model = this.loader().catch((err: unknown) => {
                // Allow a later call to retry the load
                this.model = null;
                throw err;
            });
        }
        return this.model;
    }

    async generate(request: GenerationRequest): Promise<string | null> {
        const source = request.sourceText?.trim();
        if (!source) return null;

        const model = await this.loadModel();
        const summary = summarizeExtractive(model, source, {
            numBeams: this.limits.numBeams,
            maxLength: request.maxLength ?? this.limits.maxLength,
            minLength: request.minLength ?? this.limits.minLength,
        });
        return summary || null;
    }
}
