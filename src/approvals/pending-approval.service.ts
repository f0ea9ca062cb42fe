/**
 * Pending-Approval Ledger
 *
 * pending -> approved -> executed
 * pending -> rejected
 *
 * Every transition is synchronous over one in-process map, so a unit can
 * never be approved twice or approved and rejected by racing requests.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { v4 as uuidv4 } from 'uuid';
import {
  PENDING_LEDGER_OPTIONS,
  PendingLedgerOptions,
  PendingStatus,
  PendingUnit,
} from './types/pending-unit.types';
import { assertSafeStatement } from './statement-safety.classifier';
import { InvalidPendingStateError } from '../common/errors/query-cache.errors';

@Injectable()
export class PendingApprovalService {
  private readonly logger = new Logger(PendingApprovalService.name);
  private readonly units = new Map<string, PendingUnit>();

  constructor(
    @Inject(PENDING_LEDGER_OPTIONS) private readonly options: PendingLedgerOptions,
  ) {}

  /**
   * Record a statement for review. Unsafe statements never enter the ledger.
   */
  create(question: string, statement: string, explanation: string): PendingUnit {
    assertSafeStatement(statement);

    const unit: PendingUnit = {
      id: uuidv4(),
      question,
      statement,
      explanation,
      status: 'pending',
      createdAt: new Date().toISOString(),
    };
    this.units.set(unit.id, unit);

    this.logger.log(`[Ledger] id=${unit.id} status=pending`);
    return { ...unit };
  }

  approve(id: string): PendingUnit {
    const unit = this.transition(id, 'pending', 'approved');
    unit.decidedAt = new Date().toISOString();
    return { ...unit };
  }

  reject(id: string): PendingUnit {
    const unit = this.transition(id, 'pending', 'rejected');
    unit.decidedAt = new Date().toISOString();
    return { ...unit };
  }

  markExecuted(id: string): PendingUnit {
    const unit = this.transition(id, 'approved', 'executed');
    unit.executedAt = new Date().toISOString();
    return { ...unit };
  }

  get(id: string): PendingUnit {
    return { ...this.require(id) };
  }

  list(status?: PendingStatus): PendingUnit[] {
    const units = [...this.units.values()];
    return units
      .filter((unit) => status === undefined || unit.status === status)
      .map((unit) => ({ ...unit }));
  }

  @Cron(CronExpression.EVERY_5_MINUTES)
  handleSweep(): void {
    this.sweep(Date.now());
  }

  /**
   * Drop units whose last change is older than the retention window
   */
  sweep(now: number): number {
    const cutoff = now - this.options.retentionMinutes * 60_000;
    let evicted = 0;

    for (const [id, unit] of this.units) {
      const lastChange = Date.parse(unit.executedAt ?? unit.decidedAt ?? unit.createdAt);
      if (lastChange < cutoff) {
        this.units.delete(id);
        evicted++;
      }
    }

    if (evicted > 0) {
      this.logger.log(`[Ledger] status=swept evicted=${evicted} remaining=${this.units.size}`);
    }
    return evicted;
  }

  private transition(id: string, from: PendingStatus, to: PendingStatus): PendingUnit {
    const unit = this.require(id);

    if (unit.status !== from) {
      throw new InvalidPendingStateError(
        id,
        'invalid_state',
        `Pending unit ${id} is ${unit.status}; only ${from} units can become ${to}`,
      );
    }

    unit.status = to;
    this.logger.log(`[Ledger] id=${id} status=${to}`);
    return unit;
  }

  private require(id: string): PendingUnit {
    const unit = this.units.get(id);
    if (!unit) {
      throw new InvalidPendingStateError(id, 'not_found', `Pending unit ${id} not found`);
    }
    return unit;
  }
}
