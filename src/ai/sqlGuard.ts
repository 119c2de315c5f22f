/**
 * SQL Guard — turns model-generated text into a single, row-bounded SQL Server SELECT.
 *
 * The guard is an ordered list of passes over raw text. Each pass either returns
 * the (possibly rewritten) statement or a rejection; the first rejection wins and
 * nothing after it runs. Later passes rely on earlier ones having passed.
 *
 *  1. empty input
 *  2. markdown code fences are stripped
 *  3. comments (--, block comments)
 *  4. statement terminators: one trailing ';' is dropped, anything else is refused
 *  5. WITH / CTE prefix
 *  6. must start with SELECT
 *  7. deny-listed substrings (unscoped: `created_at` trips on "create")
 *  8. duplicated leading TOP clauses are collapsed
 *  9. TOP anywhere except right after SELECT [DISTINCT]
 * 10. TOP clamped to [1, 100], or TOP (100) inserted
 * 11. collapse again
 *
 * The guard is pure: no I/O, no shared state. It does not replace a read-only
 * database login.
 */

import { SqlValidationError } from '../utils/errors.js';
import type { SqlGuardResult, SqlRejection } from './types.js';

export const MAX_TOP_ROWS = 100;
export const MIN_TOP_ROWS = 1;

/** Checked in this order; the first hit is the one reported. */
export const FORBIDDEN_TOKENS = [
  'insert',
  'update',
  'delete',
  'drop',
  'alter',
  'truncate',
  'merge',
  'create',
  'grant',
  'revoke',
  'execute',
  'exec',
  'xp_',
  'sp_',
  'openrowset',
  'opendatasource',
] as const;

export type ForbiddenToken = (typeof FORBIDDEN_TOKENS)[number];

type GuardPass = (sql: string) => string | SqlRejection;

const FENCE_OPEN_RE = /^```[a-zA-Z0-9_-]*\s*\n/;
const FENCE_CLOSE_RE = /\n```\s*$/;
// Word boundaries count any Unicode letter or digit as part of a word, so an
// identifier like `[Maßtop]` does not end in the keyword `top`.
const WORD_CHAR = String.raw`[\p{L}\p{N}_]`;
const NOT_AFTER_WORD = `(?<!${WORD_CHAR})`;
const NOT_BEFORE_WORD = `(?!${WORD_CHAR})`;

const CTE_RE = new RegExp(String.raw`^\s*with${NOT_BEFORE_WORD}`, 'iu');
const SELECT_RE = new RegExp(String.raw`^\s*select${NOT_BEFORE_WORD}`, 'iu');
const SELECT_PREFIX_RE = /^\s*select\s+(?:distinct\s+)?/iu;
const TOP_WORD_RE = new RegExp(`${NOT_AFTER_WORD}top${NOT_BEFORE_WORD}`, 'iu');

// `TOP (n)` or `TOP n`. The bare form must not run into a word (`TOP 10x`).
const TOP_CLAUSE = String.raw`top\s*\(\s*(\d+)\s*\)|top\s+(\d+)${NOT_BEFORE_WORD}`;
const LEADING_TOP_RE = new RegExp(String.raw`^(?:${TOP_CLAUSE})\s*`, 'iu');
const TOP_PREFIX_RE = new RegExp(
  String.raw`^\s*select\s+(?:distinct\s+)?(?:${TOP_CLAUSE})?\s*`,
  'iu',
);

function reject(reason: SqlRejection['reason'], message: string, token?: string): SqlRejection {
  return token === undefined ? { reason, message } : { reason, message, token };
}

const rejectEmpty: GuardPass = (sql) =>
  sql.trim() ? sql : reject('EmptyInput', 'Empty SQL');

export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith('```')) {
    return trimmed;
  }
  return trimmed.replace(FENCE_OPEN_RE, '').replace(FENCE_CLOSE_RE, '').trim();
}

const rejectComments: GuardPass = (sql) =>
  sql.includes('--') || sql.includes('/*') || sql.includes('*/')
    ? reject('CommentNotAllowed', 'SQL comments are not allowed')
    : sql;

const stripTerminator: GuardPass = (sql) => {
  const count = sql.split(';').length - 1;
  if (count > 1) {
    return reject('MultipleStatements', 'Multiple statements are not allowed');
  }
  const trimmed = sql.trimEnd();
  if (count === 1 && !trimmed.endsWith(';')) {
    return reject('MisplacedTerminator', 'Semicolons are only allowed at the end');
  }
  return trimmed.replace(/;$/, '').trim();
};

const rejectCte: GuardPass = (sql) =>
  CTE_RE.test(sql) ? reject('CteNotAllowed', 'CTEs (WITH ...) are not allowed') : sql;

const requireSelect: GuardPass = (sql) =>
  SELECT_RE.test(sql) ? sql : reject('NotASelect', 'Only SELECT statements are allowed');

const rejectForbiddenTokens: GuardPass = (sql) => {
  const lowered = sql.toLowerCase();
  const token = FORBIDDEN_TOKENS.find((candidate) => lowered.includes(candidate));
  return token
    ? reject('ForbiddenToken', `Forbidden token detected: ${token}`, token)
    : sql;
};

/**
 * Keeps the first of several back-to-back TOP clauses right after
 * SELECT [DISTINCT]. `SELECT TOP (100) TOP (100) x` becomes `SELECT TOP (100) x`.
 */
export function collapseDuplicateLeadingTop(sql: string): string {
  const prefix = SELECT_PREFIX_RE.exec(sql);
  if (!prefix) {
    return sql;
  }

  const head = sql.slice(0, prefix[0].length);
  const afterSelect = sql.slice(head.length);

  const first = LEADING_TOP_RE.exec(afterSelect);
  if (!first) {
    return sql;
  }

  const keptTop = first[0].trim();
  let rest = afterSelect.slice(first[0].length).trimStart();
  for (let next = LEADING_TOP_RE.exec(rest); next; next = LEADING_TOP_RE.exec(rest)) {
    rest = rest.slice(next[0].length).trimStart();
  }

  return `${head}${keptTop} ${rest}`;
}

const rejectMisplacedTop: GuardPass = (sql) => {
  const prefix = TOP_PREFIX_RE.exec(sql);
  if (prefix && TOP_WORD_RE.test(sql.slice(prefix[0].length))) {
    return reject('MisplacedTop', 'TOP is only allowed immediately after SELECT');
  }
  return sql;
};

export function clampTop(n: number): number {
  if (Number.isNaN(n)) {
    return MAX_TOP_ROWS;
  }
  return Math.min(Math.max(n, MIN_TOP_ROWS), MAX_TOP_ROWS);
}

const enforceRowLimit: GuardPass = (sql) => {
  // `SELECT*` passes the SELECT check but leaves nowhere to put TOP.
  const prefix = SELECT_PREFIX_RE.exec(sql);
  if (!prefix) {
    return reject('NotASelect', 'Only SELECT statements are allowed');
  }

  const head = sql.slice(0, prefix[0].length);
  const afterSelect = sql.slice(head.length);

  const top = LEADING_TOP_RE.exec(afterSelect);
  if (top) {
    const requested = parseInt(top[1] ?? top[2] ?? '', 10);
    const rest = afterSelect.slice(top[0].length);
    return `${head}TOP (${clampTop(requested)}) ${rest.trimStart()}`;
  }

  return `${head}TOP (${MAX_TOP_ROWS}) ${afterSelect.trimStart()}`;
};

const GUARD_PASSES: readonly GuardPass[] = [
  rejectEmpty,
  stripCodeFences,
  rejectComments,
  stripTerminator,
  rejectCte,
  requireSelect,
  rejectForbiddenTokens,
  collapseDuplicateLeadingTop,
  rejectMisplacedTop,
  enforceRowLimit,
  collapseDuplicateLeadingTop,
];

export function guardSql(candidate: string): SqlGuardResult {
  let sql = candidate;
  for (const pass of GUARD_PASSES) {
    const outcome = pass(sql);
    if (typeof outcome !== 'string') {
      return { ok: false, ...outcome };
    }
    sql = outcome;
  }
  return { ok: true, sql };
}

/**
 * Returns the normalized statement or throws SqlValidationError carrying the
 * rejection reason. Callers must not execute anything when this throws.
 */
export function validateAndNormalizeSql(candidate: string): string {
  const result = guardSql(candidate);
  if (!result.ok) {
    throw new SqlValidationError(result.reason, result.message, result.token);
  }
  return result.sql;
}
