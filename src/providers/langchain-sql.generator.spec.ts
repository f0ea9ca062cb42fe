import { LangChainSqlGenerator, parseGeneratedStatement } from './langchain-sql.generator';
import type { CompletionClient } from './types';

describe('parseGeneratedStatement', () => {
  it('reads a bare JSON reply', () => {
    const statement = parseGeneratedStatement(
      '{"sql": " SELECT COUNT(*) FROM orders ", "explanation": "Counts orders", "confidence": 0.9}',
    );

    expect(statement).toEqual({
      sql: 'SELECT COUNT(*) FROM orders',
      explanation: 'Counts orders',
      confidence: 0.9,
    });
  });

  it('reads a reply wrapped in a json fence', () => {
    const statement = parseGeneratedStatement(
      'Here you go:\n```json\n{"sql": "SELECT 1", "explanation": "", "confidence": 1}\n```',
    );

    expect(statement.sql).toBe('SELECT 1');
  });

  it('clamps confidence and defaults missing fields', () => {
    expect(parseGeneratedStatement('{"sql": "SELECT 1", "confidence": 7}').confidence).toBe(1);
    expect(parseGeneratedStatement('{"sql": "SELECT 1"}')).toEqual({
      sql: 'SELECT 1',
      explanation: '',
      confidence: 0.5,
    });
  });

  it('rejects output that is not JSON', () => {
    expect(() => parseGeneratedStatement('SELECT 1')).toThrow(
      'SQL generator returned non-JSON output: SELECT 1',
    );
  });

  it('rejects a reply without a statement', () => {
    expect(() => parseGeneratedStatement('{"explanation": "none"}')).toThrow(
      'SQL generator reply has no sql field',
    );
    expect(() => parseGeneratedStatement('[1, 2]')).toThrow('SQL generator reply has no sql field');
    expect(() => parseGeneratedStatement('42')).toThrow('SQL generator returned a non-object reply');
  });
});

describe('LangChainSqlGenerator', () => {
  it('prompts with the schema and the question', async () => {
    const prompts: string[] = [];
    const completion: CompletionClient = {
      complete: async (_system, prompt) => {
        prompts.push(prompt);
        return '{"sql": "SELECT name FROM customers", "explanation": "Lists names", "confidence": 0.8}';
      },
    };
    const generator = new LangChainSqlGenerator(completion, {
      describeSchema: async () => 'customers(id int, name varchar(64))',
    });

    const statement = await generator.generate('who are our customers?');

    expect(statement.sql).toBe('SELECT name FROM customers');
    expect(prompts).toEqual([
      'Schema:\ncustomers(id int, name varchar(64))\n\nQuestion: who are our customers?',
    ]);
  });
});
