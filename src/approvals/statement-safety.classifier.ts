/**
 * Statement Safety Classifier
 *
 * Pure predicate over generated SQL. Runs before any cache write or ledger
 * entry. Comments and quoted text are removed first, so a keyword inside a
 * string literal ('DELETE me') does not count. MySQL runs the body of an
 * executable comment (`/*! ... *\/`, `/*!50000 ... *\/`), so that body is kept
 * and classified like the rest of the statement.
 */

import { UnsafeStatementError } from '../common/errors/query-cache.errors';

export interface SafetyVerdict {
  safe: boolean;
  violations: string[];
}

const READ_ONLY_LEADERS = ['SELECT', 'WITH', 'SHOW', 'EXPLAIN', 'DESCRIBE', 'DESC'];

// INSERT() and REPLACE() are also string functions; only the statement forms count
const MUTATING_PATTERNS: Array<{ label: string; pattern: RegExp }> = [
  { label: 'INSERT', pattern: /\bINSERT\b(?!\s*\()/i },
  { label: 'UPDATE', pattern: /\bUPDATE\b/i },
  { label: 'DELETE', pattern: /\bDELETE\b/i },
  { label: 'MERGE', pattern: /\bMERGE\b/i },
  { label: 'REPLACE', pattern: /\bREPLACE\b(?!\s*\()/i },
  { label: 'UPSERT', pattern: /\bUPSERT\b/i },
  { label: 'DROP', pattern: /\bDROP\b/i },
  { label: 'CREATE', pattern: /\bCREATE\b/i },
  { label: 'ALTER', pattern: /\bALTER\b/i },
  { label: 'TRUNCATE', pattern: /\bTRUNCATE\b/i },
  { label: 'RENAME', pattern: /\bRENAME\b/i },
  { label: 'GRANT', pattern: /\bGRANT\b/i },
  { label: 'REVOKE', pattern: /\bREVOKE\b/i },
  { label: 'CALL', pattern: /\bCALL\b/i },
  { label: 'LOCK', pattern: /\bLOCK\b/i },
  { label: 'INTO OUTFILE', pattern: /\bINTO\s+OUTFILE\b/i },
  { label: 'INTO DUMPFILE', pattern: /\bINTO\s+DUMPFILE\b/i },
];

export function classifyStatement(statement: string): SafetyVerdict {
  const stripped = stripCommentsAndLiterals(statement).trim();
  const body = stripped.replace(/[\s;]+$/, '');

  if (body.length === 0) {
    return { safe: false, violations: ['statement is empty'] };
  }

  const violations: string[] = [];

  if (body.includes(';')) {
    violations.push('contains more than one statement');
  }

  const leader = body.replace(/^\(+\s*/, '').match(/^[A-Za-z]+/);
  const keyword = leader ? leader[0].toUpperCase() : '';
  if (!READ_ONLY_LEADERS.includes(keyword)) {
    violations.push(`does not start with a read-only keyword (found "${keyword || body.slice(0, 10)}")`);
  }

  for (const { label, pattern } of MUTATING_PATTERNS) {
    if (pattern.test(body)) {
      violations.push(`contains ${label}`);
    }
  }

  return { safe: violations.length === 0, violations };
}

/**
 * Throws UnsafeStatementError listing every violation
 */
export function assertSafeStatement(statement: string): void {
  const verdict = classifyStatement(statement);
  if (!verdict.safe) {
    throw new UnsafeStatementError(statement, verdict.violations);
  }
}

/**
 * Replace comments with a space and quoted text with an empty placeholder.
 * Executable comments keep their body, minus the optional version number.
 * Handles doubled-quote and backslash escapes inside literals.
 */
export function stripCommentsAndLiterals(statement: string): string {
  let output = '';
  let index = 0;
  let insideExecutable = false;

  while (index < statement.length) {
    const char = statement[index];
    const next = statement[index + 1];

    if (char === '-' && next === '-') {
      index = skipUntil(statement, index + 2, '\n');
      output += ' ';
      continue;
    }

    if (char === '#') {
      index = skipUntil(statement, index + 1, '\n');
      output += ' ';
      continue;
    }

    if (char === '/' && next === '*' && statement[index + 2] === '!') {
      const versioned = /^\d*/.exec(statement.slice(index + 3));
      index += 3 + (versioned ? versioned[0].length : 0);
      insideExecutable = true;
      output += ' ';
      continue;
    }

    if (insideExecutable && char === '*' && next === '/') {
      index += 2;
      insideExecutable = false;
      output += ' ';
      continue;
    }

    if (char === '/' && next === '*') {
      const end = statement.indexOf('*/', index + 2);
      index = end === -1 ? statement.length : end + 2;
      output += ' ';
      continue;
    }

    if (char === "'" || char === '"' || char === '`') {
      index = skipQuoted(statement, index + 1, char);
      output += char === '`' ? 'identifier' : "''";
      continue;
    }

    output += char;
    index++;
  }

  return output;
}

function skipUntil(text: string, from: number, terminator: string): number {
  const end = text.indexOf(terminator, from);
  return end === -1 ? text.length : end;
}

function skipQuoted(text: string, from: number, quote: string): number {
  let index = from;
  while (index < text.length) {
    const char = text[index];
    if (char === '\\' && quote !== '`') {
      index += 2;
      continue;
    }
    if (char === quote) {
      if (text[index + 1] === quote) {
        index += 2;
        continue;
      }
      return index + 1;
    }
    index++;
  }
  return text.length;
}
