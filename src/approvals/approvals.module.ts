import { Module } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { PENDING_LEDGER_OPTIONS, PendingLedgerOptions } from './types/pending-unit.types';
import { PendingApprovalService } from './pending-approval.service';

@Module({
  providers: [
    {
      provide: PENDING_LEDGER_OPTIONS,
      useFactory: (config: AppConfig): PendingLedgerOptions => ({
        retentionMinutes: config.pendingRetentionMinutes,
      }),
      inject: [APP_CONFIG],
    },
    PendingApprovalService,
  ],
  exports: [PendingApprovalService],
})
export class ApprovalsModule {}
