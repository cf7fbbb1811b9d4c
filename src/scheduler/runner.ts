/**
 * Daily scheduled run: schedule gate, generate + send with linear retry, and an admin report
 * by email once the run settles.
 */

import type { GenerationResult, GenerationStats } from '../types/index.js';
import type { AppConfig } from '../shared/config.js';
import { generateEnhancedNewsletter, pickEmailFile, sendEnhancedNewsletter } from '../newsletter/generator.js';
import { sendNewsletterContent, testEmailConfig, type TransportFactory } from '../delivery/email.js';
import { escapeHtml } from '../newsletter/render/markup.js';
import { shouldRunToday, type HolidayLookup } from './schedule.js';
import { errorMessage } from '../shared/errors.js';
import { cleanupOldLogs, logger } from '../shared/logging.js';
import { formatTimestamp, sleep as defaultSleep, type Sleep } from '../shared/time-utils.js';

export type SchedulerDeps = {
    config: AppConfig;
    /** Defaults to a full editorial generation with images */
    generate?: (config: AppConfig, options: { maxArticles?: number; fetchImages?: boolean }) => Promise<GenerationResult>;
    send?: (htmlPath: string) => Promise<void>;
    createTransport?: TransportFactory;
    holidays?: HolidayLookup;
    sleep?: Sleep;
    now?: () => Date;
};

export type AttemptResult = {
    success: boolean;
    message: string;
    stats?: GenerationStats;
};

export type RunMode = 'scheduled' | 'force' | 'dry-run';

function withDefaults(deps: SchedulerDeps) {
    const { config } = deps;
    return {
        generate: deps.generate ?? ((cfg: AppConfig, options: { maxArticles?: number; fetchImages?: boolean }) =>
            generateEnhancedNewsletter(cfg, { ...options, style: 'editorial' })),
        send: deps.send ?? ((htmlPath: string) =>
            sendEnhancedNewsletter(htmlPath, undefined, { config: config.email, createTransport: deps.createTransport })),
        sleep: deps.sleep ?? defaultSleep,
        now: deps.now ?? (() => new Date()),
    };
}

export function adminRecipient(config: AppConfig): string | undefined {
    return config.schedule.adminEmail ?? config.email.to[0];
}

// =============================================================================
// ADMIN NOTIFICATION
// =============================================================================

export function adminReportHtml(status: string, message: string, success: boolean, now: Date): string {
    const emoji = success ? '✅' : '❌';
    const background = success ? '#d4edda' : '#f8d7da';
    const border = success ? '#c3e6cb' : '#f5c6cb';

    return `<html>
<body>
    <h2>${emoji} AI Newsletter Scheduler Report</h2>
    <p><strong>Time:</strong> ${formatTimestamp(now)}</p>
    <p><strong>Status:</strong> ${escapeHtml(status)}</p>
    <div style="background-color: ${background}; border: 1px solid ${border}; padding: 15px; margin: 10px 0; border-radius: 5px;">
        <pre>${escapeHtml(message)}</pre>
    </div>
</body>
</html>`;
}

/**
 * Email the run outcome to the admin address. Returns false when there is nobody to tell
 * or the send fails; a failed report never fails the run.
 */
export async function sendAdminNotification(status: string, message: string, success: boolean, deps: SchedulerDeps): Promise<boolean> {
    const admin = adminRecipient(deps.config);
    if (!admin) {
        logger.warn('⚠️ No admin email configured for notifications');
        return false;
    }

    const now = (deps.now ?? (() => new Date()))();
    try {
        await sendNewsletterContent(adminReportHtml(status, message, success, now), `🤖 AI Newsletter Scheduler: ${status}`, {
            config: deps.config.email,
            createTransport: deps.createTransport,
            to: [admin],
            now: () => now,
        });
        logger.info(`📨 Admin notification sent: ${status}`);
        return true;
    } catch (error) {
        logger.error(`❌ Failed to send admin notification: ${errorMessage(error)}`);
        return false;
    }
}

// =============================================================================
// ONE ATTEMPT
// =============================================================================

export function successMessage(result: GenerationResult, recipients: string[]): string {
    const { stats } = result;
    return [
        'Newsletter generated and sent successfully!',
        '',
        '📊 Generation Stats:',
        `• Articles processed: ${stats.totalArticles}`,
        `• Summaries generated: ${stats.summariesGenerated}`,
        `• Categories covered: ${stats.categories}`,
        `• Images processed: ${stats.imagesProcessed}`,
        '',
        `📁 Files generated: ${Object.keys(result.files).length}`,
        `📧 Email sent to: ${recipients.length > 0 ? recipients.join(', ') : 'configured recipient'}`,
    ].join('\n');
}

/**
 * Generate from scratch and, unless `dryRun`, send the email version.
 */
export async function generateAndSend(deps: SchedulerDeps, dryRun = false): Promise<AttemptResult> {
    const { generate, send } = withDefaults(deps);

    let result: GenerationResult;
    try {
        logger.info('🚀 Starting newsletter generation...');
        result = await generate(deps.config, { maxArticles: deps.config.pipeline.maxArticles, fetchImages: true });
    } catch (error) {
        return { success: false, message: `Newsletter generation failed: ${errorMessage(error)}` };
    }
    logger.info('✅ Newsletter generated successfully');

    const htmlPath = pickEmailFile(result.files);
    if (!htmlPath) {
        return { success: false, message: 'No HTML file found to send', stats: result.stats };
    }

    if (dryRun) {
        logger.info(`🧪 Dry run: skipping email for ${htmlPath}`);
        return { success: true, message: `Newsletter generated (dry run, not sent): ${htmlPath}`, stats: result.stats };
    }

    try {
        await send(htmlPath);
    } catch (error) {
        return { success: false, message: `Newsletter generated but email sending failed: ${errorMessage(error)}`, stats: result.stats };
    }

    logger.info('🎉 Newsletter sent successfully!');
    return { success: true, message: successMessage(result, deps.config.email.to), stats: result.stats };
}

// =============================================================================
// SCHEDULED RUN
// =============================================================================

export async function runScheduledNewsletter(deps: SchedulerDeps, mode: RunMode = 'scheduled'): Promise<boolean> {
    const { config } = deps;
    const { sleep, now } = withDefaults(deps);

    cleanupOldLogs(config.logDir, config.schedule.logRetentionDays, now());

    if (mode === 'dry-run') {
        logger.info('🧪 Dry run mode - generating newsletter without sending');
        const attempt = await generateAndSend(deps, true);
        if (attempt.success) {
            logger.info(`✅ Dry run completed successfully: ${attempt.message}`);
        } else {
            logger.error(`❌ Dry run failed: ${attempt.message}`);
        }
        return attempt.success;
    }

    if (mode === 'force') {
        logger.info('🚀 Force mode - running regardless of schedule');
        const attempt = await generateAndSend(deps);
        await sendAdminNotification(
            attempt.success ? 'Newsletter Sent (Forced)' : 'Newsletter Failed (Forced)',
            attempt.message,
            attempt.success,
            deps
        );
        return attempt.success;
    }

    logger.info('🕐 Newsletter scheduler started');
    const decision = shouldRunToday(now(), config.schedule, deps.holidays);
    if (!decision.shouldRun) {
        logger.info(`⏭️ Skipping newsletter today: ${decision.reason}`);
        return true;
    }
    logger.info(`✅ Running newsletter: ${decision.reason}`);

    const attempts = config.schedule.retryAttempts;
    let lastMessage = '';
    for (let attempt = 1; attempt <= attempts; attempt++) {
        logger.info(`📝 Newsletter generation attempt ${attempt}/${attempts}`);
        const result = await generateAndSend(deps);

        if (result.success) {
            await sendAdminNotification('Newsletter Sent Successfully', result.message, true, deps);
            logger.info('🎉 Newsletter scheduler completed successfully');
            return true;
        }

        lastMessage = result.message;
        logger.error(`❌ Attempt ${attempt} failed: ${result.message}`);

        if (attempt < attempts) {
            logger.info(`⏳ Waiting ${config.schedule.retryDelayMinutes} minutes before retry...`);
            await sleep(config.schedule.retryDelayMinutes * 60 * 1000);
        }
    }

    const failure = [
        `Newsletter generation failed after ${attempts} attempts.`,
        '',
        'Last error:',
        lastMessage,
        '',
        'Please check the logs and system configuration.',
    ].join('\n');
    await sendAdminNotification('Newsletter Generation Failed', failure, false, deps);
    logger.error('💥 Newsletter scheduler failed after all retry attempts');
    return false;
}

// =============================================================================
// CONFIGURATION TEST
// =============================================================================

/**
 * Check email settings, a small generation without images, and the schedule gate.
 */
export async function testConfiguration(deps: SchedulerDeps): Promise<boolean> {
    const { generate, now } = withDefaults(deps);
    const errors: string[] = [];

    logger.info('🧪 Testing scheduler configuration...');

    if (!await testEmailConfig({ config: deps.config.email, createTransport: deps.createTransport })) {
        errors.push('Email configuration test failed');
    }

    try {
        logger.info('Testing newsletter generation (dry run)...');
        await generate(deps.config, { maxArticles: 3, fetchImages: false });
        logger.info('✅ Newsletter generation test passed');
    } catch (error) {
        errors.push(`Newsletter generation test error: ${errorMessage(error)}`);
    }

    try {
        const decision = shouldRunToday(now(), deps.config.schedule, deps.holidays);
        logger.info(`📅 Schedule check: ${decision.reason}`);
    } catch (error) {
        errors.push(`Schedule checking error: ${errorMessage(error)}`);
    }

    if (errors.length > 0) {
        logger.error('❌ Configuration test failed:');
        for (const error of errors) {
            logger.error(`  • ${error}`);
        }
        return false;
    }

    logger.info('✅ All configuration tests passed!');
    return true;
}
