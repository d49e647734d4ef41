import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import type { SessionManager } from './session-service.js';
import type { TokenManager } from './token-service.js';
import type { PasswordService } from './password-service.js';

export interface CleanupSchedulerOptions {
  sessions: SessionManager;
  tokens: TokenManager;
  passwords?: PasswordService;
  intervalMs: number;
  logger?: Logger;
  /**
   * Aborting this signal stops the scheduler
   */
  signal?: AbortSignal;
}

export interface CleanupResult {
  sessions: number;
  revocations: number;
  resetTokens: number;
}

/**
 * Periodic sweep of expired sessions, revocation entries and reset tokens
 */
export class CleanupScheduler {
  private readonly options: CleanupSchedulerOptions;
  private readonly logger: Logger;
  private controller: AbortController | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private current: Promise<void> | null = null;
  private readonly onAbort = (): void => this.halt();

  constructor(options: CleanupSchedulerOptions) {
    this.options = options;
    this.logger = (options.logger ?? silentLogger).child({ component: 'cleanup-scheduler' });
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer || this.options.signal?.aborted) {
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.options.signal?.addEventListener('abort', this.onAbort, { once: true });

    this.timer = setInterval(() => {
      if (controller.signal.aborted || this.current) {
        return;
      }
      this.current = this.sweep(controller.signal).finally(() => {
        this.current = null;
      });
    }, this.options.intervalMs);

    // Do not keep the process alive for cleanup alone
    this.timer.unref();

    this.logger.info('Cleanup scheduler started', { intervalMs: this.options.intervalMs });
  }

  /**
   * Stop scheduling and wait for a sweep in progress to finish
   */
  async stop(): Promise<void> {
    this.halt();
    if (this.current) {
      await this.current;
    }
  }

  /**
   * Run every cleanup once
   */
  async runOnce(): Promise<CleanupResult> {
    const result: CleanupResult = { sessions: 0, revocations: 0, resetTokens: 0 };
    const { sessions, tokens, passwords } = this.options;

    try {
      result.sessions = await sessions.cleanupExpired();
    } catch (err) {
      this.logger.error('Session cleanup failed', { error: err });
    }

    try {
      result.revocations = await tokens.cleanupExpiredRevocations();
    } catch (err) {
      this.logger.error('Revocation cleanup failed', { error: err });
    }

    if (passwords) {
      try {
        result.resetTokens = await passwords.cleanupExpiredTokens();
      } catch (err) {
        this.logger.error('Password reset cleanup failed', { error: err });
      }
    }

    return result;
  }

  private async sweep(signal: AbortSignal): Promise<void> {
    if (signal.aborted) {
      return;
    }
    const result = await this.runOnce();
    this.logger.debug('Cleanup sweep finished', { ...result });
  }

  private halt(): void {
    this.options.signal?.removeEventListener('abort', this.onAbort);
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.info('Cleanup scheduler stopped');
    }
    this.controller?.abort();
    this.controller = null;
  }
}
