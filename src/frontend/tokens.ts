/**
 * @module tokens
 *
 * Token kinds、关键字表与字面量单位定义。
 */

import { TokenKind } from '../types.js';
import type { BuiltinTypeName, DurationUnit, DurationValue, MoneyValue, Token } from '../types.js';

export { TokenKind };

/** 语言关键字 */
export const KW = {
  SCOPE: 'scope',
  STATUTE: 'statute',
  STRUCT: 'struct',
  ENUM: 'enum',
  FUNC: 'func',
  MATCH: 'match',
  CASE: 'case',
  CONSEQUENCE: 'consequence',
  REFERENCING: 'referencing',
  FROM: 'from',
  PASS: 'pass',
  RETURN: 'return',
  IF: 'if',
} as const;

export type Keyword = (typeof KW)[keyof typeof KW];

export const KEYWORDS: ReadonlySet<string> = new Set<string>(Object.values(KW));

/** 内建类型关键字，词法阶段产生 TYPE token */
export const TYPE_KEYWORDS: ReadonlySet<string> = new Set<Exclude<BuiltinTypeName, 'pass'>>([
  'int',
  'integer',
  'float',
  'bool',
  'boolean',
  'string',
  'money',
  'date',
  'duration',
  'percent',
]);

export const BOOLEAN_WORDS: ReadonlyMap<string, boolean> = new Map([
  ['TRUE', true],
  ['true', true],
  ['FALSE', false],
  ['false', false],
]);

export const CURRENCY_SYMBOLS: ReadonlySet<string> = new Set(['$', '£', '€', '¥', '₹']);

/** 时长单位（含复数形式）到规范单数单位的映射 */
export const DURATION_UNITS: ReadonlyMap<string, DurationUnit> = new Map<string, DurationUnit>([
  ['year', 'year'],
  ['years', 'year'],
  ['month', 'month'],
  ['months', 'month'],
  ['week', 'week'],
  ['weeks', 'week'],
  ['day', 'day'],
  ['days', 'day'],
  ['hour', 'hour'],
  ['hours', 'hour'],
  ['minute', 'minute'],
  ['minutes', 'minute'],
  ['second', 'second'],
  ['seconds', 'second'],
]);

export type TokenCategory =
  | 'identifier'
  | 'keyword'
  | 'integer'
  | 'float'
  | 'string'
  | 'boolean'
  | 'money'
  | 'percent'
  | 'date'
  | 'duration'
  | 'operator'
  | 'punctuation'
  | 'comment'
  | 'end-of-input';

const OPERATOR_KINDS: ReadonlySet<TokenKind> = new Set([
  TokenKind.ASSIGN,
  TokenKind.EQ,
  TokenKind.NEQ,
  TokenKind.LT,
  TokenKind.LTE,
  TokenKind.GT,
  TokenKind.GTE,
  TokenKind.PLUS,
  TokenKind.MINUS,
  TokenKind.STAR,
  TokenKind.SLASH,
  TokenKind.MOD,
  TokenKind.AND,
  TokenKind.OR,
  TokenKind.NOT,
]);

/**
 * 将细粒度 TokenKind 归入语言定义的 token 类别（供语法高亮等工具使用）。
 */
export function tokenCategory(kind: TokenKind): TokenCategory {
  switch (kind) {
    case TokenKind.IDENT:
      return 'identifier';
    case TokenKind.KEYWORD:
    case TokenKind.TYPE:
      return 'keyword';
    case TokenKind.INT:
      return 'integer';
    case TokenKind.FLOAT:
      return 'float';
    case TokenKind.STRING:
      return 'string';
    case TokenKind.BOOL:
      return 'boolean';
    case TokenKind.MONEY:
      return 'money';
    case TokenKind.PERCENT:
      return 'percent';
    case TokenKind.DATE:
      return 'date';
    case TokenKind.DURATION:
      return 'duration';
    case TokenKind.COMMENT:
      return 'comment';
    case TokenKind.EOF:
      return 'end-of-input';
    default:
      return OPERATOR_KINDS.has(kind) ? 'operator' : 'punctuation';
  }
}

/** 错误消息中使用的 token 描述 */
export function describeToken(token: Token): string {
  if (token.kind === TokenKind.EOF) return 'end of input';
  return `'${token.lexeme}'`;
}

export function isMoneyValue(value: Token['value']): value is MoneyValue {
  return typeof value === 'object' && value !== null && 'currency' in value;
}

export function isDurationValue(value: Token['value']): value is DurationValue {
  return typeof value === 'object' && value !== null && 'parts' in value;
}

export function isBuiltinTypeName(word: string): word is BuiltinTypeName {
  return word === 'pass' || TYPE_KEYWORDS.has(word);
}
