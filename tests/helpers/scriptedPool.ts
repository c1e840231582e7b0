/**
 * SqlPool stand-in that records statements and answers from a script.
 * Every connect() hands out the same session.
 */

import type { QueryResultRow } from 'pg';
import type { SqlPool, SqlSession } from '../../src/database/pool';

export interface RecordedQuery {
  /** Statement with whitespace collapsed */
  text: string;
  values?: unknown[];
}

export type ScriptAnswer = QueryResultRow[] | { rows: QueryResultRow[]; rowCount: number } | Error;

export type QueryScript = (text: string, values?: unknown[]) => ScriptAnswer;

export function scriptedPool(script: QueryScript = () => []) {
  const queries: RecordedQuery[] = [];

  const query = jest.fn();
  query.mockImplementation(async (text: string, values?: unknown[]) => {
    const statement = text.replace(/\s+/g, ' ').trim();
    queries.push({ text: statement, values });
    const answer = script(statement, values);
    if (answer instanceof Error) throw answer;
    const rows = Array.isArray(answer) ? answer : answer.rows;
    const rowCount = Array.isArray(answer) ? answer.length : answer.rowCount;
    return { rows, rowCount, command: '', oid: 0, fields: [] };
  });

  const release = jest.fn();
  const session: SqlSession = { query, release };
  const pool: SqlPool = {
    query,
    connect: jest.fn(async () => session),
    end: jest.fn(async () => undefined),
  };

  return { pool, session, queries, release, statements: () => queries.map(q => q.text) };
}

export function pgError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}
