import type { CompletionClient, GeneratedStatement, SqlGenerator } from './types';

export interface SchemaSource {
  describeSchema(): Promise<string>;
}

const SYSTEM_PROMPT = `You translate questions into a single read-only MySQL statement.

Rules:
1. Use only the tables and columns listed in the schema
2. Produce exactly one SELECT (or WITH ... SELECT) statement
3. Never modify data or schema
4. Add LIMIT 100 unless the question asks for an aggregate

Reply with JSON only, no markdown:
{"sql": "<statement>", "explanation": "<one sentence>", "confidence": <0..1>}`;

/**
 * SqlGenerator that prompts a chat model with the live schema
 */
export class LangChainSqlGenerator implements SqlGenerator {
  constructor(
    private readonly completion: CompletionClient,
    private readonly schema: SchemaSource,
  ) {}

  async generate(question: string): Promise<GeneratedStatement> {
    const schema = await this.schema.describeSchema();
    const output = await this.completion.complete(
      SYSTEM_PROMPT,
      `Schema:\n${schema}\n\nQuestion: ${question}`,
    );
    return parseGeneratedStatement(output);
  }
}

/**
 * Read the model's JSON reply, tolerating a markdown fence around it
 */
export function parseGeneratedStatement(output: string): GeneratedStatement {
  const fenced = output.match(/```(?:json)?\s*([\s\S]*?)```/i);
  const body = (fenced ? fenced[1] : output).trim();

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    throw new Error(`SQL generator returned non-JSON output: ${body.slice(0, 120)}`);
  }

  if (parsed === null || typeof parsed !== 'object') {
    throw new Error('SQL generator returned a non-object reply');
  }

  const sql: unknown = Reflect.get(parsed, 'sql');
  const explanation: unknown = Reflect.get(parsed, 'explanation');
  const confidence: unknown = Reflect.get(parsed, 'confidence');

  if (typeof sql !== 'string' || sql.trim().length === 0) {
    throw new Error('SQL generator reply has no sql field');
  }

  return {
    sql: sql.trim(),
    explanation: typeof explanation === 'string' ? explanation : '',
    confidence:
      typeof confidence === 'number' && Number.isFinite(confidence)
        ? Math.min(1, Math.max(0, confidence))
        : 0.5,
  };
}
