/**
 * Runtime configuration read from the environment (.env is loaded by the CLI entry points).
 * Every setting has a default so a bare checkout can generate a newsletter against a local LLM.
 */

import path from 'path';
import type { LogLevel } from './logging.js';
import { packagePath } from './paths.js';

export type PreferredLLM = 'transformer' | 'aws-anthropic' | 'openai' | 'anthropic' | 'local';

export type LLMConfig = {
    preferred: PreferredLLM;
    useExternal: boolean;
    useTransformer: boolean;
    transformerModel: string;
    transformerModelPath: string;
    openai: { apiKey?: string; model: string };
    anthropic: { apiKey?: string; model: string };
    bedrock: {
        enabled: boolean;
        region: string;
        modelId: string;
        accessKeyId?: string;
        secretAccessKey?: string;
        sessionToken?: string;
    };
    local: { url: string; model: string; timeoutMs: number };
};

export type EmailConfig = {
    from?: string;
    to: string[];
    smtpServer?: string;
    smtpPort: number;
    user?: string;
    password?: string;
};

export type PipelineConfig = {
    maxArticles: number;
    articlesPerFeed: number;
    maxArticlesPerCategory: number;
    minArticleLength: number;
    maxArticleAgeHours: number;
    delayBetweenRequestsMs: number;
    delayBetweenSummariesMs: number;
    hackerNewsUrl: string;
};

export type ScheduleConfig = {
    /** ISO weekdays, Monday = 1 ... Sunday = 7 */
    days: number[];
    skipHolidays: boolean;
    holidayCountry: string;
    retryAttempts: number;
    retryDelayMinutes: number;
    adminEmail?: string;
    logRetentionDays: number;
};

export type AppConfig = {
    llm: LLMConfig;
    email: EmailConfig;
    pipeline: PipelineConfig;
    schedule: ScheduleConfig;
    outputDir: string;
    templatePath: string;
    logDir: string;
    logLevel: LogLevel;
};

const PREFERRED_VALUES: PreferredLLM[] = ['transformer', 'aws-anthropic', 'openai', 'anthropic', 'local'];
const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

function readInt(value: string | undefined, fallback: number): number {
    if (!value) return fallback;
    const parsed = parseInt(value, 10);
    return Number.isFinite(parsed) ? parsed : fallback;
}

function readBool(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined || value === '') return fallback;
    return ['true', '1', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function readList(value: string | undefined): string[] {
    return (value || '').split(',').map(v => v.trim()).filter(v => v);
}

function readOptional(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}

function readPreferred(value: string | undefined): PreferredLLM {
    const lower = (value || '').trim().toLowerCase();
    return PREFERRED_VALUES.find(p => p === lower) ?? 'local';
}

function readLogLevel(value: string | undefined): LogLevel {
    const lower = (value || '').trim().toLowerCase();
    return LOG_LEVELS.find(l => l === lower) ?? 'info';
}

// Overrides resolve against the working directory, defaults against the package
function readPath(value: string | undefined, fallback: string): string {
    return value ? path.resolve(value) : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const scheduleDays = readList(env.SCHEDULE_DAYS)
        .map(d => parseInt(d, 10))
        .filter(d => d >= 1 && d <= 7);

    return {
        llm: {
            preferred: readPreferred(env.PREFERRED_LLM),
            useExternal: readBool(env.USE_EXTERNAL_LLM, false),
            useTransformer: readBool(env.USE_TRANSFORMER, false),
            transformerModel: env.TRANSFORMER_MODEL || 'extractive-news',
            transformerModelPath: readPath(env.TRANSFORMER_MODEL_PATH, packagePath('data', 'stopwords.json')),
            openai: {
                apiKey: readOptional(env.OPENAI_API_KEY),
                model: env.OPENAI_MODEL || 'gpt-4',
            },
            anthropic: {
                apiKey: readOptional(env.ANTHROPIC_API_KEY),
                model: env.ANTHROPIC_MODEL || 'claude-3-sonnet-20240229',
            },
            bedrock: {
                enabled: readBool(env.USE_AWS_BEDROCK, false),
                region: env.AWS_REGION || 'us-east-1',
                modelId: env.BEDROCK_MODEL_ID || 'anthropic.claude-3-sonnet-20240229-v1:0',
                accessKeyId: readOptional(env.AWS_ACCESS_KEY_ID),
                secretAccessKey: readOptional(env.AWS_SECRET_ACCESS_KEY),
                sessionToken: readOptional(env.AWS_SESSION_TOKEN),
            },
            local: {
                url: env.LOCAL_LLM_URL || 'http://localhost:1234/v1/chat/completions',
                model: env.LOCAL_LLM_MODEL || 'mistral-7b-instruct-v0.1.Q4_K_M',
                timeoutMs: readInt(env.LOCAL_LLM_TIMEOUT_MS, 30000),
            },
        },
        email: {
            from: readOptional(env.EMAIL_FROM),
            to: readList(env.EMAIL_TO),
            smtpServer: readOptional(env.SMTP_SERVER),
            smtpPort: readInt(env.SMTP_PORT, 465),
            user: readOptional(env.EMAIL_USER),
            password: readOptional(env.EMAIL_PASSWORD),
        },
        pipeline: {
            maxArticles: readInt(env.MAX_ARTICLES, 12),
            articlesPerFeed: readInt(env.ARTICLES_PER_FEED, 5),
            maxArticlesPerCategory: readInt(env.MAX_ARTICLES_PER_CATEGORY, 3),
            minArticleLength: readInt(env.MIN_ARTICLE_LENGTH, 300),
            maxArticleAgeHours: readInt(env.MAX_ARTICLE_AGE_HOURS, 72),
            delayBetweenRequestsMs: readInt(env.DELAY_BETWEEN_REQUESTS_MS, 2000),
            delayBetweenSummariesMs: readInt(env.DELAY_BETWEEN_SUMMARIES_MS, 3000),
            hackerNewsUrl: env.HACKER_NEWS_API || 'https://hacker-news.firebaseio.com/v0',
        },
        schedule: {
            days: scheduleDays.length > 0 ? scheduleDays : [1, 2, 3, 4, 5],
            skipHolidays: readBool(env.SKIP_HOLIDAYS, true),
            holidayCountry: env.HOLIDAY_COUNTRY || 'US',
            retryAttempts: Math.max(1, readInt(env.RETRY_ATTEMPTS, 3)),
            retryDelayMinutes: readInt(env.RETRY_DELAY_MINUTES, 10),
            adminEmail: readOptional(env.ADMIN_EMAIL),
            logRetentionDays: readInt(env.LOG_RETENTION_DAYS, 30),
        },
        outputDir: env.OUTPUT_DIR || 'output',
        templatePath: readPath(env.NEWSLETTER_TEMPLATE, packagePath('templates', 'newsletter_template.html')),
        logDir: env.LOG_DIR || 'logs',
        logLevel: readLogLevel(env.LOG_LEVEL),
    };
}
