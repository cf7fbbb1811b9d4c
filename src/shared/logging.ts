// Structured logging utility
import { appendFileSync, existsSync, mkdirSync, readdirSync, statSync, unlinkSync } from 'fs';
import path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
    level: LogLevel;
    message: string;
    timestamp: string;
    context?: Record<string, unknown>;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const settings: { consoleLevel: LogLevel; file: string | null; fileFailed: boolean } = {
    consoleLevel: 'info',
    file: null,
    fileFailed: false,
};

export function setLogLevel(level: LogLevel): void {
    settings.consoleLevel = level;
}

/**
 * Mirror every entry to `<dir>/<name>` (created on demand). Pass null to stop file logging.
 */
export function setLogFile(dir: string | null, name = 'newsletter.log'): void {
    settings.file = dir ? path.join(dir, name) : null;
    settings.fileFailed = false;
}

export function formatLogLine(entry: LogEntry): string {
    const context = entry.context && Object.keys(entry.context).length > 0 ? ' ' + JSON.stringify(entry.context) : '';
    return `${entry.timestamp} [${entry.level.toUpperCase()}] ${entry.message}${context}\n`;
}

function writeFile(entry: LogEntry): void {
    if (!settings.file || settings.fileFailed) return;
    try {
        const dir = path.dirname(settings.file);
        if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
        appendFileSync(settings.file, formatLogLine(entry));
    } catch (err) {
        // Report once, then keep logging to the console only
        settings.fileFailed = true;
        process.stderr.write(`[logging] cannot write ${settings.file}: ${err instanceof Error ? err.message : String(err)}\n`);
    }
}

function writeConsole(entry: LogEntry): void {
    if (LEVEL_ORDER[entry.level] < LEVEL_ORDER[settings.consoleLevel]) return;
    const context = entry.context && Object.keys(entry.context).length > 0 ? ' ' + JSON.stringify(entry.context) : '';
    const line = `${entry.message}${context}`;
    if (entry.level === 'error') {
        console.error(line);
    } else if (entry.level === 'warn') {
        console.warn(line);
    } else {
        console.log(line);
    }
}

export function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const entry: LogEntry = {
        level,
        message,
        timestamp: new Date().toISOString(),
        context
    };
    writeConsole(entry);
    writeFile(entry);
}

export const logger = {
    debug: (message: string, context?: Record<string, unknown>) => log('debug', message, context),
    info: (message: string, context?: Record<string, unknown>) => log('info', message, context),
    warn: (message: string, context?: Record<string, unknown>) => log('warn', message, context),
    error: (message: string, context?: Record<string, unknown>) => log('error', message, context),
};

/**
 * Console banner in the style of the CLI summaries.
 */
export function banner(title: string): void {
    logger.info('');
    logger.info('═'.repeat(60));
    logger.info(title);
    logger.info('═'.repeat(60));
}

/**
 * Delete `*.log*` files in `dir` last modified more than `retentionDays` ago.
 * Returns the removed file names.
 */
export function cleanupOldLogs(dir: string, retentionDays: number, now: Date = new Date()): string[] {
    if (!existsSync(dir)) return [];
    const cutoff = now.getTime() - retentionDays * 24 * 60 * 60 * 1000;
    const removed: string[] = [];

    for (const name of readdirSync(dir)) {
        if (!name.includes('.log')) continue;
        const file = path.join(dir, name);
        try {
            if (statSync(file).mtimeMs < cutoff) {
                unlinkSync(file);
                removed.push(name);
                logger.info(`🧹 Cleaned up old log file: ${file}`);
            }
        } catch (err) {
            logger.warn(`⚠️ Failed to clean up ${file}: ${err instanceof Error ? err.message : String(err)}`);
        }
    }
    return removed;
}
