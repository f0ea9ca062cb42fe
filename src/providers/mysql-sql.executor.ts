import { Logger } from '@nestjs/common';
import type { FieldPacket, Pool, RowDataPacket } from 'mysql2/promise';
import { ExecutionTimeoutError } from '../common/errors/query-cache.errors';
import type { SchemaSource } from './langchain-sql.generator';
import type { SqlExecutor, SqlResult } from './types';

/**
 * SqlExecutor over a mysql2 pool.
 *
 * Each statement runs in its own READ ONLY transaction that is always
 * rolled back, so the database refuses writes even if one slips past
 * the classifier.
 */
export class MySqlExecutor implements SqlExecutor, SchemaSource {
  private readonly logger = new Logger(MySqlExecutor.name);
  private schemaDescription: string | null = null;

  constructor(private readonly pool: Pool) {}

  async execute(statement: string, timeoutMs: number): Promise<SqlResult> {
    const connection = await this.pool.getConnection();

    try {
      await connection.query('START TRANSACTION READ ONLY');
      const [rows, fields] = await connection.query<RowDataPacket[]>({
        sql: statement,
        timeout: timeoutMs,
      });
      return {
        rows: rows.map((row) => ({ ...row })),
        columns: columnNames(fields),
      };
    } catch (error) {
      if (isTimeout(error)) {
        throw new ExecutionTimeoutError('SQL execution', timeoutMs);
      }
      throw error;
    } finally {
      await connection.query('ROLLBACK').catch((rollbackError: unknown) => {
        this.logger.warn(
          `[Execute] status=rollback_failed error=${rollbackError instanceof Error ? rollbackError.message : String(rollbackError)}`,
        );
      });
      connection.release();
    }
  }

  /**
   * One line per table: `name(column type, ...)`. Read once, then reused.
   */
  async describeSchema(): Promise<string> {
    if (this.schemaDescription !== null) {
      return this.schemaDescription;
    }

    const [rows] = await this.pool.query<RowDataPacket[]>(
      `SELECT TABLE_NAME AS tableName, COLUMN_NAME AS columnName, COLUMN_TYPE AS columnType
         FROM information_schema.COLUMNS
        WHERE TABLE_SCHEMA = DATABASE()
        ORDER BY TABLE_NAME, ORDINAL_POSITION`,
    );

    const tables = new Map<string, string[]>();
    for (const row of rows) {
      const table = String(row.tableName);
      const columns = tables.get(table) ?? [];
      columns.push(`${String(row.columnName)} ${String(row.columnType)}`);
      tables.set(table, columns);
    }

    this.schemaDescription = [...tables.entries()]
      .map(([table, columns]) => `${table}(${columns.join(', ')})`)
      .join('\n');
    this.logger.log(`[Schema] tables=${tables.size}`);
    return this.schemaDescription;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

function columnNames(fields: FieldPacket[] | undefined): string[] {
  return fields ? fields.map((field) => field.name) : [];
}

function isTimeout(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'PROTOCOL_SEQUENCE_TIMEOUT' || error.code === 'ER_QUERY_TIMEOUT')
  );
}
