import { describeError, ErrorFormatter, TransportError, toError } from '../errors/MonitorError.js';
import { Clock, systemClock } from '../scan/Clock.js';
import { DispatchOutcome, InactiveCandidate } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { MailTransport, TransportResult } from './MailTransport.js';
import { renderInactivityMessage } from './templates.js';

export interface DispatcherOptions {
  subject: string;
}

export interface NotificationDispatcher {
  dispatch(candidate: InactiveCandidate): Promise<DispatchOutcome>;
}

/**
 * Sends one inactivity notice per call and reports how it went.
 *
 * dispatch() never rejects: a transport that fails or throws becomes a
 * `failed` outcome, so one bad address cannot stop the rest of a batch.
 * There is no retry within a cycle.
 */
export class EmailDispatcher implements NotificationDispatcher {
  constructor(
    private readonly transport: MailTransport,
    private readonly options: DispatcherOptions,
    private readonly clock: Clock = systemClock
  ) {}

  async dispatch(candidate: InactiveCandidate): Promise<DispatchOutcome> {
    const { record } = candidate;
    const attemptedAt = this.clock.now();

    let result: TransportResult;
    try {
      const message = renderInactivityMessage(candidate, this.options.subject);
      result = await this.transport.send(record.email, message.subject, message.body);
    } catch (error) {
      const transportError = new TransportError(record.id, describeError(error), toError(error));
      logger.warn(`Mail transport threw for user ${record.id}`, {
        error: ErrorFormatter.formatErrorForLogs(transportError)
      });
      result = { ok: false, reason: transportError.message };
    }

    if (result.ok) {
      logger.info(`Notified user ${record.id}`, { mode: result.mode });
      return Object.freeze({
        status: 'sent',
        recipientId: record.id,
        recipientEmail: record.email,
        attemptedAt
      });
    }

    logger.warn(`Failed to notify user ${record.id}: ${result.reason}`);
    return Object.freeze({
      status: 'failed',
      recipientId: record.id,
      recipientEmail: record.email,
      attemptedAt,
      reason: result.reason || 'unknown transport failure'
    });
  }
}
