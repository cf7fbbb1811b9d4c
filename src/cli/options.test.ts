import { describe, it, expect } from 'vitest';
import { parseNewsletterArgs, parseSchedulerArgs } from './options.js';
import { ConfigError } from '../shared/errors.js';

describe('parseNewsletterArgs', () => {
    it('defaults to generate and send with images and a summary', () => {
        expect(parseNewsletterArgs([])).toEqual({
            action: 'generate',
            maxArticles: undefined,
            style: 'editorial',
            outputDir: undefined,
            fetchImages: true,
            generateOnly: false,
            htmlFile: undefined,
            subject: undefined,
            showSummary: true,
            logLevel: undefined
        });
    });

    it('reads generation flags', () => {
        const options = parseNewsletterArgs([
            '--max-articles', '15', '--style', 'rundown', '--output-dir', 'out', '--no-images', '--generate-only', '--no-summary', '-q'
        ]);

        expect(options).toMatchObject({
            action: 'generate',
            maxArticles: 15,
            style: 'rundown',
            outputDir: 'out',
            fetchImages: false,
            generateOnly: true,
            showSummary: false,
            logLevel: 'warn'
        });
    });

    it('picks the send-only action with a file and subject', () => {
        expect(parseNewsletterArgs(['--send-only', '--html-file', 'custom.html', '--subject', 'Hello', '-v'])).toMatchObject({
            action: 'send-only',
            htmlFile: 'custom.html',
            subject: 'Hello',
            logLevel: 'debug'
        });
    });

    it('gives the email checks priority over generation', () => {
        expect(parseNewsletterArgs(['--test-email', '--send-only']).action).toBe('test-email');
        expect(parseNewsletterArgs(['--send-test']).action).toBe('send-test');
        expect(parseNewsletterArgs(['-h', '--test-email']).action).toBe('help');
    });

    it('rejects bad values and unknown flags', () => {
        expect(() => parseNewsletterArgs(['--style', 'poetic'])).toThrow(ConfigError);
        expect(() => parseNewsletterArgs(['--max-articles', '0'])).toThrow('--max-articles expects a positive integer, got "0"');
        expect(() => parseNewsletterArgs(['--bogus'])).toThrow();
    });
});

describe('parseSchedulerArgs', () => {
    it('defaults to the scheduled run', () => {
        expect(parseSchedulerArgs([])).toEqual({ action: 'scheduled', adminEmail: undefined, logLevel: undefined });
    });

    it('reads modes and the admin override', () => {
        expect(parseSchedulerArgs(['--force', '--admin-email', 'ops@example.com', '--verbose'])).toEqual({
            action: 'force',
            adminEmail: 'ops@example.com',
            logLevel: 'debug'
        });
        expect(parseSchedulerArgs(['--dry-run', '--force']).action).toBe('dry-run');
        expect(parseSchedulerArgs(['--test']).action).toBe('test');
    });
});
