/**
 * SQL Query Pipeline
 *
 * question -> gen tier (generate + classify) -> pending unit
 * approve  -> res tier (execute under the execution timeout) -> executed
 *
 * autoApprove is a caller-asserted trust flag: the ledger is skipped and the
 * statement goes straight to the res tier.
 *
 * Statements are classified before they are cached and again when read
 * from the cache, so an entry written by an older classifier cannot
 * bypass the current rules.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { TieredCacheService } from '../cache/tiered-cache.service';
import { CacheOutcome } from '../cache/tiers/tier.types';
import { GeneratedStatementRecord, ResultSetRecord } from '../cache/records/cache-records';
import { PendingApprovalService } from '../approvals/pending-approval.service';
import { PendingUnit } from '../approvals/types/pending-unit.types';
import { assertSafeStatement } from '../approvals/statement-safety.classifier';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { SQL_EXECUTOR, SQL_GENERATOR, SqlExecutor, SqlGenerator } from '../providers/types';
import { callCollaborator } from '../common/utils/call-collaborator';
import { withTimeout } from '../common/utils/with-timeout';
import {
  ComputeError,
  ExecutionTimeoutError,
  QueryCacheError,
  describeError,
} from '../common/errors/query-cache.errors';
import { validateQuestion } from './validation/query-validator';

const DEFAULT_EXECUTION_TIMEOUT_MS = 30000;

export interface SqlAskOptions {
  autoApprove?: boolean;
}

export interface PendingSqlAnswer {
  status: 'pending_approval';
  pending: PendingUnit;
  confidence: number;
  statementCached: boolean;
}

export interface ExecutedSqlAnswer {
  status: 'executed';
  statement: string;
  /** Absent for auto-approved questions, which never enter the ledger */
  pending?: PendingUnit;
  result: ResultSetRecord;
  resultCached: boolean;
}

export type ApprovedSqlAnswer = ExecutedSqlAnswer & { pending: PendingUnit };

export type SqlAnswer = PendingSqlAnswer | ExecutedSqlAnswer;

@Injectable()
export class SqlQueryPipeline {
  private readonly logger = new Logger(SqlQueryPipeline.name);

  constructor(
    private readonly cache: TieredCacheService,
    private readonly ledger: PendingApprovalService,
    @Inject(SQL_GENERATOR) private readonly generator: SqlGenerator,
    @Inject(SQL_EXECUTOR) private readonly executor: SqlExecutor,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  ask(question: string, options?: { autoApprove?: false }): Promise<PendingSqlAnswer>;
  ask(question: string, options: { autoApprove: true }): Promise<ExecutedSqlAnswer>;
  ask(question: string, options?: SqlAskOptions): Promise<SqlAnswer>;
  async ask(question: string, options: SqlAskOptions = {}): Promise<SqlAnswer> {
    const trimmed = validateQuestion(question);
    const generated = await this.resolveStatement(trimmed);

    if (options.autoApprove) {
      this.logger.log(`[Ask] statement_cached=${generated.hit} auto_approve=true`);
      const execution = await this.execute(generated.value.sql);
      return {
        status: 'executed',
        statement: generated.value.sql,
        result: execution.value,
        resultCached: execution.hit,
      };
    }

    const pending = this.ledger.create(
      trimmed,
      generated.value.sql,
      generated.value.explanation,
    );
    this.logger.log(`[Ask] pending=${pending.id} statement_cached=${generated.hit}`);

    return {
      status: 'pending_approval',
      pending,
      confidence: generated.value.confidence,
      statementCached: generated.hit,
    };
  }

  /**
   * Approve a pending unit and run its statement.
   * A failed execution leaves the unit approved but not executed.
   */
  async approve(id: string): Promise<ApprovedSqlAnswer> {
    const approved = this.ledger.approve(id);
    const execution = await this.execute(approved.statement);
    const executed = this.ledger.markExecuted(id);

    return {
      status: 'executed',
      statement: executed.statement,
      pending: executed,
      result: execution.value,
      resultCached: execution.hit,
    };
  }

  reject(id: string): PendingUnit {
    return this.ledger.reject(id);
  }

  private async resolveStatement(
    question: string,
  ): Promise<CacheOutcome<GeneratedStatementRecord>> {
    const outcome = await this.cache.lookupOrCompute(
      'gen',
      question,
      async (): Promise<GeneratedStatementRecord> => {
        const statement = await callCollaborator(
          'SqlGenerator',
          this.config.collaboratorTimeoutMs,
          () => this.generator.generate(question),
        );
        assertSafeStatement(statement.sql);

        return {
          sql: statement.sql,
          explanation: statement.explanation,
          confidence: statement.confidence,
          createdAt: new Date().toISOString(),
        };
      },
    );

    if (outcome.hit) {
      assertSafeStatement(outcome.value.sql);
    }
    return outcome;
  }

  /**
   * Fresh rows go through the res codec, so a miss returns exactly what a later hit decodes
   */
  private async execute(statement: string): Promise<CacheOutcome<ResultSetRecord>> {
    assertSafeStatement(statement);
    const timeoutMs = this.config.sql?.executionTimeoutMs ?? DEFAULT_EXECUTION_TIMEOUT_MS;
    const { codec } = this.cache.policy('res');

    return this.cache.lookupOrCompute('res', statement, async (): Promise<ResultSetRecord> => {
      const started = Date.now();

      try {
        const result = await withTimeout(
          this.executor.execute(statement, timeoutMs),
          timeoutMs,
          () => new ExecutionTimeoutError('SQL execution', timeoutMs),
        );
        const executionMs = Date.now() - started;
        this.logger.log(`[Execute] rows=${result.rows.length} duration=${executionMs}ms`);

        return codec.decode(
          codec.encode({
            rows: result.rows,
            columns: result.columns,
            rowCount: result.rows.length,
            executionMs,
          }),
        );
      } catch (error) {
        this.logger.warn(`[Execute] status=failed error=${describeError(error)}`);
        if (error instanceof QueryCacheError) {
          throw error;
        }
        throw new ComputeError(
          'SqlExecutor',
          describeError(error),
          error instanceof Error ? error : undefined,
        );
      }
    });
  }
}
