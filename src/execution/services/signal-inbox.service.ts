/**
 * Signal Inbox Service - Feeds signals waiting in the inbox to the engine.
 *
 * Each message is settled after submission: QUEUED with the entry id, or
 * REJECTED with the reason. A message whose settle fails stays pending and
 * is submitted again on the next drain, where the symbol slot rejects it.
 */

import type { SignalInboxRepository, InboxOutcome } from '../interfaces/repository.interface';
import type { Clock } from '../interfaces/clock.interface';
import type { InvalidSignalError } from '../errors/execution-errors';
import type { QueuedEntry, Signal } from '../types/execution.types';
import type { Result } from '../types/result';
import { parseSignal } from '../schemas/snapshot.schema';
import { getComponentLogger, logError } from '../../config/logger';

export interface SignalSink {
  submitSignal(signal: Signal): Promise<Result<QueuedEntry, InvalidSignalError>>;
}

export interface InboxDrainReport {
  received: number;
  queued: number;
  rejected: number;
}

export class SignalInboxService {
  private readonly logger = getComponentLogger('SignalInbox');
  private timer: ReturnType<typeof setInterval> | null = null;
  private currentDrain: Promise<InboxDrainReport | null> | null = null;
  private draining = false;

  constructor(
    private readonly inbox: SignalInboxRepository,
    private readonly sink: SignalSink,
    private readonly clock: Clock,
    private readonly pollIntervalMs: number
  ) {}

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) {
      throw new Error('Signal inbox already started');
    }
    this.timer = setInterval(() => {
      this.currentDrain = this.drain().catch((error: unknown) => {
        if (error instanceof Error) {
          logError(error, { operation: 'drainSignalInbox' });
        } else {
          this.logger.error({ error }, 'Signal inbox drain failed');
        }
        return null;
      });
    }, this.pollIntervalMs);
    this.logger.info({ pollIntervalMs: this.pollIntervalMs }, 'Signal inbox polling started');
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.currentDrain) {
      await this.currentDrain;
      this.currentDrain = null;
    }
  }

  /**
   * Submits every pending message once. Returns null while a previous drain is still running.
   */
  async drain(): Promise<InboxDrainReport | null> {
    if (this.draining) {
      return null;
    }

    this.draining = true;
    try {
      const messages = await this.inbox.pending();
      const report: InboxDrainReport = { received: messages.length, queued: 0, rejected: 0 };

      for (const message of messages) {
        const outcome = await this.submit(message.payload, message.readError);
        await this.inbox.settle(message.id, outcome, this.clock.now());

        if (outcome.status === 'QUEUED') {
          report.queued += 1;
        } else {
          report.rejected += 1;
          this.logger.warn({ messageId: message.id, reason: outcome.reason }, 'Inbox signal rejected');
        }
      }

      if (messages.length > 0) {
        this.logger.info(report, 'Signal inbox drained');
      }
      return report;
    } finally {
      this.draining = false;
    }
  }

  private async submit(payload: unknown, readError: string | undefined): Promise<InboxOutcome> {
    if (readError !== undefined) {
      return { status: 'REJECTED', reason: `Invalid signal: ${readError}` };
    }

    const parsed = parseSignal(payload);
    if (!parsed.success) {
      return { status: 'REJECTED', reason: `Invalid signal: ${parsed.error}` };
    }

    const submitted = await this.sink.submitSignal(parsed.data);
    return submitted.success
      ? { status: 'QUEUED', entryId: submitted.data.id }
      : { status: 'REJECTED', reason: submitted.error.message };
  }
}
