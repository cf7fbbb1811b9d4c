import { parseArgs } from 'util';
import type { SummaryStyle } from '../types/index.js';
import type { LogLevel } from '../shared/logging.js';
import { ConfigError } from '../shared/errors.js';

export type NewsletterAction = 'generate' | 'send-only' | 'test-email' | 'send-test' | 'help';

export type NewsletterCliOptions = {
    action: NewsletterAction;
    maxArticles?: number;
    style: SummaryStyle;
    outputDir?: string;
    fetchImages: boolean;
    generateOnly: boolean;
    htmlFile?: string;
    subject?: string;
    showSummary: boolean;
    logLevel?: LogLevel;
};

export type SchedulerAction = 'scheduled' | 'test' | 'force' | 'dry-run' | 'help';

export type SchedulerCliOptions = {
    action: SchedulerAction;
    adminEmail?: string;
    logLevel?: LogLevel;
};

const STYLES: SummaryStyle[] = ['editorial', 'rundown', 'basic'];

export const NEWSLETTER_USAGE = `AI newsletter generator

Usage: newsletter [options]

Generation:
  --max-articles N       Maximum number of articles to include
  --style STYLE          editorial | rundown | basic (default: editorial)
  --output-dir PATH      Output directory for generated files
  --fetch-images         Fetch images for articles (default)
  --no-images            Skip image fetching

Actions:
  --generate-only        Generate without sending email
  --send-only            Send an existing newsletter without regenerating
  --test-email           Test the SMTP configuration
  --send-test            Send a test email

Email:
  --html-file PATH       HTML file to send with --send-only
  --subject TEXT         Custom email subject

Output:
  -v, --verbose          Debug logging
  -q, --quiet            Warnings and errors only
  --no-summary           Skip the generation summary
  -h, --help             Show this help

Examples:
  newsletter                                   Generate and send
  newsletter --generate-only --max-articles 15 Generate 15 articles, don't send
  newsletter --send-only --html-file custom.html
  newsletter --test-email`;

export const SCHEDULER_USAGE = `AI newsletter scheduler

Usage: scheduler [options]

  --test                 Test configuration and dependencies
  --force                Run regardless of schedule and holidays
  --dry-run              Generate the newsletter but do not send it
  -v, --verbose          Debug logging
  --admin-email ADDR     Override the admin address for notifications
  -h, --help             Show this help`;

function logLevelFor(verbose: boolean | undefined, quiet: boolean | undefined): LogLevel | undefined {
    if (verbose) return 'debug';
    if (quiet) return 'warn';
    return undefined;
}

function readMaxArticles(value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new ConfigError(`--max-articles expects a positive integer, got "${value}"`);
    }
    return parsed;
}

function readStyle(value: string | undefined): SummaryStyle {
    if (value === undefined) return 'editorial';
    const style = STYLES.find(s => s === value);
    if (!style) {
        throw new ConfigError(`--style must be one of ${STYLES.join(', ')}, got "${value}"`);
    }
    return style;
}

/**
 * Parse the generator's command line. Unknown flags and bad values throw.
 */
export function parseNewsletterArgs(argv: string[]): NewsletterCliOptions {
    const { values } = parseArgs({
        args: argv,
        strict: true,
        allowPositionals: false,
        options: {
            'max-articles': { type: 'string' },
            'style': { type: 'string' },
            'output-dir': { type: 'string' },
            'fetch-images': { type: 'boolean' },
            'no-images': { type: 'boolean' },
            'generate-only': { type: 'boolean' },
            'send-only': { type: 'boolean' },
            'test-email': { type: 'boolean' },
            'send-test': { type: 'boolean' },
            'html-file': { type: 'string' },
            'subject': { type: 'string' },
            'verbose': { type: 'boolean', short: 'v' },
            'quiet': { type: 'boolean', short: 'q' },
            'no-summary': { type: 'boolean' },
            'help': { type: 'boolean', short: 'h' },
        },
    });

    let action: NewsletterAction = 'generate';
    if (values.help) action = 'help';
    else if (values['test-email']) action = 'test-email';
    else if (values['send-test']) action = 'send-test';
    else if (values['send-only']) action = 'send-only';

    return {
        action,
        maxArticles: readMaxArticles(values['max-articles']),
        style: readStyle(values.style),
        outputDir: values['output-dir'],
        fetchImages: !values['no-images'],
        generateOnly: values['generate-only'] ?? false,
        htmlFile: values['html-file'],
        subject: values.subject,
        showSummary: !values['no-summary'],
        logLevel: logLevelFor(values.verbose, values.quiet),
    };
}

export function parseSchedulerArgs(argv: string[]): SchedulerCliOptions {
    const { values } = parseArgs({
        args: argv,
        strict: true,
        allowPositionals: false,
        options: {
            'test': { type: 'boolean' },
            'force': { type: 'boolean' },
            'dry-run': { type: 'boolean' },
            'verbose': { type: 'boolean', short: 'v' },
            'admin-email': { type: 'string' },
            'help': { type: 'boolean', short: 'h' },
        },
    });

    let action: SchedulerAction = 'scheduled';
    if (values.help) action = 'help';
    else if (values.test) action = 'test';
    else if (values['dry-run']) action = 'dry-run';
    else if (values.force) action = 'force';

    return {
        action,
        adminEmail: values['admin-email'],
        logLevel: logLevelFor(values.verbose, false),
    };
}
