import { describe, it, expect, vi } from 'vitest';
import type { SendMailOptions } from 'nodemailer';
import {
    adminReportHtml,
    generateAndSend,
    runScheduledNewsletter,
    sendAdminNotification,
    successMessage,
    testConfiguration,
    type SchedulerDeps
} from './runner.js';
import type { MailTransport } from '../delivery/email.js';
import { loadConfig } from '../shared/config.js';
import { cleanupOldLogs } from '../shared/logging.js';
import { DeliveryError, PipelineError } from '../shared/errors.js';
import type { GenerationResult } from '../types/index.js';

vi.mock('../shared/logging.js', () => ({
    logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
    banner: vi.fn(),
    cleanupOldLogs: vi.fn(() => [])
}));

const MONDAY = new Date(2026, 9, 19, 7);
const SATURDAY = new Date(2026, 9, 17, 7);

const config = loadConfig({
    EMAIL_FROM: 'digest@example.com',
    EMAIL_TO: 'reader@example.com',
    SMTP_SERVER: 'smtp.example.com',
    EMAIL_USER: 'digest@example.com',
    EMAIL_PASSWORD: 'test-secret',
    ADMIN_EMAIL: 'admin@example.com'
});

class FakeTransport implements MailTransport {
    sent: SendMailOptions[] = [];

    async sendMail(options: SendMailOptions): Promise<{ messageId?: string }> {
        this.sent.push(options);
        return { messageId: '<admin@example.com>' };
    }

    async verify(): Promise<unknown> {
        return true;
    }
}

function generationResult(): GenerationResult {
    return {
        content: {
            intro: '',
            summaries: [],
            editorsTakes: [],
            categorizedSummaries: {},
            articles: [],
            generationInfo: { llmUsed: 'local', timestamp: '2026-10-19T07:00:00.000Z', totalArticles: 4, categories: [] }
        },
        articles: [],
        files: { premiumHtml: 'output/newsletter_premium.html', emailHtml: 'output/newsletter_email_premium.html' },
        timestamp: '2026-10-19T07:00:00.000Z',
        stats: { totalArticles: 4, summariesGenerated: 4, editorsTakes: 2, categories: 3, imagesProcessed: 1 }
    };
}

function makeDeps(overrides: Partial<SchedulerDeps> = {}) {
    const transport = new FakeTransport();
    const deps = {
        config,
        generate: vi.fn(async () => generationResult()),
        send: vi.fn(async (_htmlPath: string) => {}),
        createTransport: vi.fn(() => transport),
        holidays: () => undefined,
        sleep: vi.fn(async (_ms: number) => {}),
        now: () => MONDAY,
        ...overrides
    };
    return { deps, transport };
}

describe('successMessage', () => {
    it('lists the stats and recipients', () => {
        expect(successMessage(generationResult(), ['reader@example.com'])).toBe([
            'Newsletter generated and sent successfully!',
            '',
            '📊 Generation Stats:',
            '• Articles processed: 4',
            '• Summaries generated: 4',
            '• Categories covered: 3',
            '• Images processed: 1',
            '',
            '📁 Files generated: 2',
            '📧 Email sent to: reader@example.com'
        ].join('\n'));
    });
});

describe('adminReportHtml', () => {
    it('colours the report and escapes the message', () => {
        const ok = adminReportHtml('Done', 'a < b', true, MONDAY);
        expect(ok).toContain('<h2>✅ AI Newsletter Scheduler Report</h2>');
        expect(ok).toContain('<p><strong>Time:</strong> 2026-10-19 07:00:00</p>');
        expect(ok).toContain('background-color: #d4edda; border: 1px solid #c3e6cb;');
        expect(ok).toContain('<pre>a &lt; b</pre>');

        const failed = adminReportHtml('Failed', 'x', false, MONDAY);
        expect(failed).toContain('<h2>❌ AI Newsletter Scheduler Report</h2>');
        expect(failed).toContain('background-color: #f8d7da; border: 1px solid #f5c6cb;');
    });
});

describe('sendAdminNotification', () => {
    it('mails the admin address', async () => {
        const { deps, transport } = makeDeps();

        await expect(sendAdminNotification('All good', 'Details', true, deps)).resolves.toBe(true);
        expect(transport.sent[0].to).toBe('admin@example.com');
        expect(transport.sent[0].subject).toBe('🤖 AI Newsletter Scheduler: All good');
    });

    it('falls back to the first newsletter recipient', async () => {
        const { deps, transport } = makeDeps({
            config: { ...config, schedule: { ...config.schedule, adminEmail: undefined } }
        });

        await sendAdminNotification('All good', 'Details', true, deps);
        expect(transport.sent[0].to).toBe('reader@example.com');
    });

    it('reports false with nobody to notify', async () => {
        const { deps } = makeDeps({
            config: { ...config, email: { ...config.email, to: [] }, schedule: { ...config.schedule, adminEmail: undefined } }
        });

        await expect(sendAdminNotification('All good', 'Details', true, deps)).resolves.toBe(false);
        expect(deps.createTransport).not.toHaveBeenCalled();
    });
});

describe('generateAndSend', () => {
    it('sends the email version', async () => {
        const { deps } = makeDeps();

        const result = await generateAndSend(deps);

        expect(result.success).toBe(true);
        expect(deps.send).toHaveBeenCalledWith('output/newsletter_email_premium.html');
        expect(deps.generate).toHaveBeenCalledWith(config, { maxArticles: 12, fetchImages: true });
    });

    it('reports a failed send', async () => {
        const { deps } = makeDeps({
            send: vi.fn(async () => {
                throw new DeliveryError('SMTP down');
            })
        });

        expect(await generateAndSend(deps)).toEqual({
            success: false,
            message: 'Newsletter generated but email sending failed: SMTP down',
            stats: generationResult().stats
        });
    });

    it('fails without an HTML file', async () => {
        const { deps } = makeDeps({
            generate: vi.fn(async () => ({ ...generationResult(), files: { markdown: 'output/newsletter_premium.md' } }))
        });

        const result = await generateAndSend(deps);
        expect(result.success).toBe(false);
        expect(result.message).toBe('No HTML file found to send');
    });

    it('skips the send in a dry run', async () => {
        const { deps } = makeDeps();

        const result = await generateAndSend(deps, true);
        expect(result).toEqual({
            success: true,
            message: 'Newsletter generated (dry run, not sent): output/newsletter_email_premium.html',
            stats: generationResult().stats
        });
        expect(deps.send).not.toHaveBeenCalled();
    });
});

describe('runScheduledNewsletter', () => {
    it('cleans old logs and skips unscheduled days as a success', async () => {
        const { deps } = makeDeps({ now: () => SATURDAY });

        await expect(runScheduledNewsletter(deps)).resolves.toBe(true);
        expect(cleanupOldLogs).toHaveBeenCalledWith('logs', 30, SATURDAY);
        expect(deps.generate).not.toHaveBeenCalled();
        expect(deps.createTransport).not.toHaveBeenCalled();
    });

    it('notifies the admin after a successful run', async () => {
        const { deps, transport } = makeDeps();

        await expect(runScheduledNewsletter(deps)).resolves.toBe(true);
        expect(deps.generate).toHaveBeenCalledTimes(1);
        expect(deps.sleep).not.toHaveBeenCalled();
        expect(transport.sent).toHaveLength(1);
        expect(transport.sent[0].subject).toBe('🤖 AI Newsletter Scheduler: Newsletter Sent Successfully');
    });

    it('retries after a failure and stops at the first success', async () => {
        const generate = vi.fn(async () => generationResult())
            .mockRejectedValueOnce(new PipelineError('feeds down'));
        const { deps } = makeDeps({ generate });

        await expect(runScheduledNewsletter(deps)).resolves.toBe(true);
        expect(generate).toHaveBeenCalledTimes(2);
        expect(deps.sleep).toHaveBeenCalledTimes(1);
        expect(deps.sleep).toHaveBeenCalledWith(600000);
    });

    it('reports the last error after every attempt fails', async () => {
        const generate = vi.fn(async (): Promise<GenerationResult> => {
            throw new PipelineError('feeds down');
        });
        const { deps, transport } = makeDeps({ generate });

        await expect(runScheduledNewsletter(deps)).resolves.toBe(false);
        expect(generate).toHaveBeenCalledTimes(3);
        expect(deps.sleep).toHaveBeenCalledTimes(2);
        expect(transport.sent[0].subject).toBe('🤖 AI Newsletter Scheduler: Newsletter Generation Failed');
        expect(transport.sent[0].html).toContain(
            '<pre>Newsletter generation failed after 3 attempts.\n\nLast error:\nNewsletter generation failed: feeds down\n\n' +
            'Please check the logs and system configuration.</pre>'
        );
    });

    it('ignores the schedule when forced', async () => {
        const { deps, transport } = makeDeps({ now: () => SATURDAY });

        await expect(runScheduledNewsletter(deps, 'force')).resolves.toBe(true);
        expect(deps.send).toHaveBeenCalledTimes(1);
        expect(transport.sent[0].subject).toBe('🤖 AI Newsletter Scheduler: Newsletter Sent (Forced)');
    });

    it('generates without sending or notifying in a dry run', async () => {
        const { deps } = makeDeps({ now: () => SATURDAY });

        await expect(runScheduledNewsletter(deps, 'dry-run')).resolves.toBe(true);
        expect(deps.generate).toHaveBeenCalledTimes(1);
        expect(deps.send).not.toHaveBeenCalled();
        expect(deps.createTransport).not.toHaveBeenCalled();
    });
});

describe('testConfiguration', () => {
    it('passes when email, generation and schedule check out', async () => {
        const { deps } = makeDeps();

        await expect(testConfiguration(deps)).resolves.toBe(true);
        expect(deps.generate).toHaveBeenCalledWith(config, { maxArticles: 3, fetchImages: false });
    });

    it('fails when generation fails', async () => {
        const { deps } = makeDeps({
            generate: vi.fn(async (): Promise<GenerationResult> => {
                throw new PipelineError('No AI articles found');
            })
        });

        await expect(testConfiguration(deps)).resolves.toBe(false);
    });

    it('fails with incomplete email settings', async () => {
        const { deps } = makeDeps({ config: { ...config, email: { ...config.email, password: undefined } } });

        await expect(testConfiguration(deps)).resolves.toBe(false);
        expect(deps.createTransport).not.toHaveBeenCalled();
    });
});
