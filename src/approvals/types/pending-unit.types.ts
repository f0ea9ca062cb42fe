export type PendingStatus = 'pending' | 'approved' | 'rejected' | 'executed';

/**
 * A generated statement waiting for a human decision.
 * Timestamps are ISO-8601 strings.
 */
export interface PendingUnit {
  id: string;
  question: string;
  statement: string;
  explanation: string;
  status: PendingStatus;
  createdAt: string;
  decidedAt?: string;
  executedAt?: string;
}

export interface PendingLedgerOptions {
  retentionMinutes: number;
}

export const PENDING_LEDGER_OPTIONS = 'PENDING_LEDGER_OPTIONS';
