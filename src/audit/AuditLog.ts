import { z } from 'zod';
import { DatabaseManager } from '../database/DatabaseManager.js';
import { AuditReadError, AuditWriteError, toError } from '../errors/MonitorError.js';
import { AuditEntry, DispatchOutcome, DispatchStatus } from '../types/index.js';
import { logger } from '../utils/logger.js';

/**
 * Append-only record of dispatch attempts, keyed by cycle
 */
export interface AuditLog {
  /**
   * Resolves once the entry is durable. Rejects with AuditWriteError.
   */
  record(cycleId: string, outcome: DispatchOutcome): Promise<void>;

  /**
   * Entries of one cycle in append order. Rejects with AuditReadError;
   * never resolves empty because of a failure.
   */
  recent(cycleId: string): Promise<AuditEntry[]>;
}

/**
 * Recipients already recorded as `sent` in a cycle
 */
export async function sentRecipients(auditLog: AuditLog, cycleId: string): Promise<Set<string>> {
  const entries = await auditLog.recent(cycleId);
  return new Set(
    entries.filter((entry) => entry.status === DispatchStatus.SENT).map((entry) => entry.recipient)
  );
}

export function toAuditEntry(cycleId: string, outcome: DispatchOutcome): AuditEntry {
  return {
    cycle_id: cycleId,
    recipient: outcome.recipientId,
    recipient_email: outcome.recipientEmail,
    timestamp: outcome.attemptedAt,
    status: outcome.status,
    reason: outcome.status === 'failed' ? outcome.reason : undefined
  };
}

const auditRowSchema = z.object({
  id: z.number().int(),
  cycle_id: z.string(),
  recipient: z.string(),
  recipient_email: z.string(),
  timestamp: z.number(),
  status: z.enum([DispatchStatus.SENT, DispatchStatus.FAILED]),
  reason: z.string().nullable()
});

/**
 * Audit log in the `dispatch_audit` table.
 *
 * Appends go through a single chain, so concurrent dispatch workers never
 * interleave writes. A failed append rejects its own caller only; the chain
 * carries on with the next entry.
 */
export class SqliteAuditLog implements AuditLog {
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly dbManager: DatabaseManager) {}

  record(cycleId: string, outcome: DispatchOutcome): Promise<void> {
    const write = this.writeChain.then(() => this.append(toAuditEntry(cycleId, outcome)));
    // The caller sees the failure through `write`
    this.writeChain = write.then(
      () => undefined,
      () => undefined
    );
    return write;
  }

  async recent(cycleId: string): Promise<AuditEntry[]> {
    try {
      const rows = await this.dbManager.queryAll(
        `SELECT id, cycle_id, recipient, recipient_email, timestamp, status, reason
         FROM dispatch_audit WHERE cycle_id = ? ORDER BY id`,
        [cycleId]
      );

      return rows.map((row) => {
        const parsed = auditRowSchema.parse(row);
        return {
          id: parsed.id,
          cycle_id: parsed.cycle_id,
          recipient: parsed.recipient,
          recipient_email: parsed.recipient_email,
          timestamp: new Date(parsed.timestamp),
          status: parsed.status,
          reason: parsed.reason ?? undefined
        };
      });
    } catch (error) {
      logger.error(`Failed to read audit entries for cycle ${cycleId}:`, error);
      throw new AuditReadError(cycleId, toError(error));
    }
  }

  /**
   * Wait for every append queued so far
   */
  async flush(): Promise<void> {
    await this.writeChain;
  }

  private async append(entry: AuditEntry): Promise<void> {
    try {
      // Autocommit: sqlite has persisted the row when the callback fires
      await this.dbManager.execute(
        `INSERT INTO dispatch_audit (cycle_id, recipient, recipient_email, timestamp, status, reason)
         VALUES (?, ?, ?, ?, ?, ?)`,
        [
          entry.cycle_id,
          entry.recipient,
          entry.recipient_email,
          entry.timestamp.getTime(),
          entry.status,
          entry.reason ?? null
        ]
      );
    } catch (error) {
      logger.error(`Failed to append audit entry for ${entry.recipient}:`, error);
      throw new AuditWriteError(entry.cycle_id, entry.recipient, toError(error));
    }
  }
}
