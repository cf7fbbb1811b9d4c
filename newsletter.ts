#!/usr/bin/env node
import 'dotenv/config';
import path from 'path';
import { NEWSLETTER_USAGE, parseNewsletterArgs, type NewsletterCliOptions } from './src/cli/options.js';
import { loadConfig, type AppConfig } from './src/shared/config.js';
import { errorMessage } from './src/shared/errors.js';
import { logger, setLogFile, setLogLevel } from './src/shared/logging.js';
import {
    generateEnhancedNewsletter,
    pickEmailFile,
    printGenerationSummary,
    sendEnhancedNewsletter
} from './src/newsletter/generator.js';
import { sendTestEmail, testEmailConfig } from './src/delivery/email.js';

async function run(options: NewsletterCliOptions, config: AppConfig): Promise<boolean> {
    const delivery = { config: config.email };

    switch (options.action) {
        case 'help':
            console.log(NEWSLETTER_USAGE);
            return true;

        case 'test-email':
            logger.info('🔧 Testing email configuration...');
            return testEmailConfig(delivery);

        case 'send-test':
            logger.info('📧 Sending test email...');
            return sendTestEmail(delivery);

        case 'send-only': {
            logger.info('📧 Sending existing newsletter...');
            const htmlFile = options.htmlFile ?? path.join(options.outputDir ?? config.outputDir, 'newsletter_email_premium.html');
            await sendEnhancedNewsletter(htmlFile, options.subject, delivery);
            return true;
        }

        case 'generate': {
            const result = await generateEnhancedNewsletter(config, {
                maxArticles: options.maxArticles,
                style: options.style,
                outputDir: options.outputDir,
                fetchImages: options.fetchImages,
            });

            if (options.showSummary) {
                printGenerationSummary(result);
            }

            if (!options.generateOnly) {
                const htmlPath = pickEmailFile(result.files);
                if (!htmlPath) {
                    logger.error('❌ No HTML file found to send');
                    return false;
                }
                try {
                    await sendEnhancedNewsletter(htmlPath, options.subject, delivery);
                } catch (error) {
                    logger.warn(`⚠️ Newsletter generated but email sending failed: ${errorMessage(error)}`);
                    return false;
                }
            }

            logger.info('🎉 All operations completed successfully!');
            return true;
        }
    }
}

async function main(): Promise<void> {
    let options: NewsletterCliOptions;
    try {
        options = parseNewsletterArgs(process.argv.slice(2));
    } catch (error) {
        console.error(`❌ ${errorMessage(error)}\n`);
        console.error(NEWSLETTER_USAGE);
        process.exit(1);
    }

    const config = loadConfig();
    setLogLevel(options.logLevel ?? config.logLevel);
    setLogFile(config.logDir);

    process.on('SIGINT', () => {
        logger.info('⏹️ Operation cancelled by user');
        process.exit(1);
    });

    try {
        const success = await run(options, config);
        process.exit(success ? 0 : 1);
    } catch (error) {
        logger.error(`❌ ${errorMessage(error)}`);
        if (error instanceof Error && error.stack) logger.debug(error.stack);
        process.exit(1);
    }
}

main().catch(err => {
    console.error('Unexpected error:', err);
    process.exit(1);
});
