#!/usr/bin/env node
import 'dotenv/config';
import { SCHEDULER_USAGE, parseSchedulerArgs, type SchedulerCliOptions } from './src/cli/options.js';
import { loadConfig } from './src/shared/config.js';
import { errorMessage } from './src/shared/errors.js';
import { logger, setLogFile, setLogLevel } from './src/shared/logging.js';
import { runScheduledNewsletter, testConfiguration } from './src/scheduler/runner.js';

async function main(): Promise<void> {
    let options: SchedulerCliOptions;
    try {
        options = parseSchedulerArgs(process.argv.slice(2));
    } catch (error) {
        console.error(`❌ ${errorMessage(error)}\n`);
        console.error(SCHEDULER_USAGE);
        process.exit(1);
    }

    if (options.action === 'help') {
        console.log(SCHEDULER_USAGE);
        process.exit(0);
    }

    const base = loadConfig();
    const config = options.adminEmail
        ? { ...base, schedule: { ...base.schedule, adminEmail: options.adminEmail } }
        : base;

    setLogLevel(options.logLevel ?? config.logLevel);
    setLogFile(config.logDir, 'newsletter_scheduler.log');

    process.on('SIGINT', () => {
        logger.info('⏹️ Scheduler interrupted by user');
        process.exit(1);
    });

    try {
        const success = options.action === 'test'
            ? await testConfiguration({ config })
            : await runScheduledNewsletter({ config }, options.action);
        process.exit(success ? 0 : 1);
    } catch (error) {
        logger.error(`💥 Unexpected scheduler error: ${errorMessage(error)}`);
        if (error instanceof Error && error.stack) logger.error(error.stack);
        process.exit(1);
    }
}

main().catch(err => {
    console.error('Unexpected error:', err);
    process.exit(1);
});
