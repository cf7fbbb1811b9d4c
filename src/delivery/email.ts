import * as fs from 'fs';
import nodemailer from 'nodemailer';
import type { SendMailOptions } from 'nodemailer';
import type { EmailConfig } from '../shared/config.js';
import { ConfigError, DeliveryError, errorMessage } from '../shared/errors.js';
import { banner, logger } from '../shared/logging.js';
import { formatLongDate } from '../shared/time-utils.js';

// =============================================================================
// SMTP SETTINGS
// =============================================================================

export type SmtpSettings = {
    from: string;
    to: string[];
    host: string;
    port: number;
    user: string;
    password: string;
};

export interface MailTransport {
    sendMail(options: SendMailOptions): Promise<{ messageId?: string }>;
    verify(): Promise<unknown>;
    close?(): void;
}

export type TransportFactory = (settings: SmtpSettings) => MailTransport;

export const smtpTransport: TransportFactory = settings => nodemailer.createTransport({
    host: settings.host,
    port: settings.port,
    secure: settings.port === 465,
    auth: { user: settings.user, pass: settings.password },
});

/**
 * Check that every SMTP setting is present. Throws a ConfigError naming the missing
 * environment variables.
 */
export function validateEmailConfig(config: EmailConfig): SmtpSettings {
    const { from, smtpServer, user, password } = config;
    const missing: string[] = [];
    if (!from) missing.push('EMAIL_FROM');
    if (config.to.length === 0) missing.push('EMAIL_TO');
    if (!smtpServer) missing.push('SMTP_SERVER');
    if (!user) missing.push('EMAIL_USER');
    if (!password) missing.push('EMAIL_PASSWORD');

    if (!from || !smtpServer || !user || !password || missing.length > 0) {
        throw new ConfigError(`Missing email configuration: ${missing.join(', ')}`, missing);
    }
    return { from, to: config.to, host: smtpServer, port: config.smtpPort, user, password };
}

export function defaultSubject(date: Date): string {
    return `🧠 Your AI News Digest – ${formatLongDate(date)}`;
}

/**
 * Plain-text alternative for clients that do not render HTML.
 */
export function htmlToText(html: string): string {
    return html
        .replace(/<(style|script|head)[^>]*>[\s\S]*?<\/\1>/gi, '')
        .replace(/<br\s*\/?>/gi, '\n')
        .replace(/<\/(p|div|h[1-6]|li|tr|ul)>/gi, '\n')
        .replace(/<li[^>]*>/gi, '• ')
        .replace(/<[^>]*>/g, '')
        .replace(/&nbsp;/g, ' ')
        .replace(/&lt;/g, '<')
        .replace(/&gt;/g, '>')
        .replace(/&quot;/g, '"')
        .replace(/&amp;/g, '&')
        .split('\n')
        .map(line => line.trim())
        .join('\n')
        .replace(/\n{3,}/g, '\n\n')
        .trim();
}

// =============================================================================
// SENDING
// =============================================================================

export type DeliveryOptions = {
    config: EmailConfig;
    createTransport?: TransportFactory;
    /** Recipients other than EMAIL_TO, e.g. the scheduler's admin address */
    to?: string[];
    now?: () => Date;
};

/**
 * Send an HTML message with a plain-text alternative. Returns the message id.
 */
export async function sendNewsletterContent(html: string, subject: string | undefined, options: DeliveryOptions): Promise<string | undefined> {
    const settings = validateEmailConfig(options.config);
    const recipients = options.to && options.to.length > 0 ? options.to : settings.to;
    const finalSubject = subject || defaultSubject((options.now ?? (() => new Date()))());
    const transport = (options.createTransport ?? smtpTransport)(settings);

    banner('📧 EMAIL SENDING');
    logger.info(`📤 Sending email to ${recipients.join(', ')}...`);
    logger.info(`   Subject: ${finalSubject}`);

    try {
        const info = await transport.sendMail({
            from: settings.from,
            to: recipients.join(', '),
            subject: finalSubject,
            text: htmlToText(html),
            html,
        });
        logger.info(`✅ Email sent successfully to ${recipients.join(', ')}`);
        if (info.messageId) logger.info(`   Message ID: ${info.messageId}`);
        return info.messageId;
    } catch (error) {
        throw new DeliveryError(`Failed to send email: ${errorMessage(error)}`, { cause: error });
    } finally {
        transport.close?.();
    }
}

export async function sendNewsletterEmail(htmlPath: string, subject: string | undefined, options: DeliveryOptions): Promise<string | undefined> {
    if (!fs.existsSync(htmlPath)) {
        throw new DeliveryError(`HTML file not found: ${htmlPath}`);
    }
    const html = fs.readFileSync(htmlPath, 'utf8');
    return sendNewsletterContent(html, subject, options);
}

// =============================================================================
// CONFIGURATION CHECKS
// =============================================================================

/**
 * Connect and log in without sending anything.
 */
export async function testEmailConfig(options: DeliveryOptions): Promise<boolean> {
    let settings: SmtpSettings;
    try {
        settings = validateEmailConfig(options.config);
    } catch (error) {
        logger.error(`❌ ${errorMessage(error)}`);
        return false;
    }

    logger.info('🔧 Testing SMTP connection...');
    const transport = (options.createTransport ?? smtpTransport)(settings);
    try {
        await transport.verify();
        logger.info('✅ Email configuration test successful');
        return true;
    } catch (error) {
        logger.error(`❌ Email configuration test failed: ${errorMessage(error)}`);
        return false;
    } finally {
        transport.close?.();
    }
}

export const TEST_EMAIL_SUBJECT = '🧪 AI Newsletter Configuration Test';

const TEST_EMAIL_HTML = `<html>
<body>
    <h1>🧪 AI Newsletter Test Email</h1>
    <p>This is a test email to verify your newsletter email configuration is working correctly.</p>
    <p>If you received this email, your setup is ready to send newsletters!</p>
</body>
</html>`;

export async function sendTestEmail(options: DeliveryOptions): Promise<boolean> {
    try {
        await sendNewsletterContent(TEST_EMAIL_HTML, TEST_EMAIL_SUBJECT, options);
        return true;
    } catch (error) {
        logger.error(`❌ ${errorMessage(error)}`);
        return false;
    }
}
