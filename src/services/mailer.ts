import type { Logger } from '../logging/logger.js';

export type TemplateData = Record<string, string>;

/**
 * Templated message sender
 */
export interface IMailer {
  sendTemplate(template: string, data: TemplateData, recipients: string[]): Promise<void>;
}

/**
 * Writes outgoing messages to the log instead of delivering them
 *
 * Template data is left out, since it may carry reset links.
 */
export class LoggingMailer implements IMailer {
  constructor(private readonly logger: Logger) {}

  async sendTemplate(template: string, _data: TemplateData, recipients: string[]): Promise<void> {
    this.logger.info('Mail queued', { template, recipients });
  }
}

export interface SentMessage {
  template: string;
  data: TemplateData;
  recipients: string[];
}

/**
 * Keeps sent messages in memory
 */
export class MemoryMailer implements IMailer {
  readonly sent: SentMessage[] = [];

  async sendTemplate(template: string, data: TemplateData, recipients: string[]): Promise<void> {
    this.sent.push({ template, data: { ...data }, recipients: [...recipients] });
  }
}
