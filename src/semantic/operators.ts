/**
 * 运算符类型表。返回 null 表示操作数类型不匹配。
 */

import type { BinaryOp, UnaryOp } from '../types.js';
import { TypeSystem, Types } from './types.js';
import type { PrimitiveKind, Type } from './types.js';

type Rule = (left: Type, right: Type) => Type | null;

const ORDERED_KINDS: ReadonlySet<Type['kind']> = new Set<PrimitiveKind>([
  'Int',
  'Float',
  'Money',
  'Percent',
  'Date',
  'Duration',
  'String',
]);

function numeric(left: Type, right: Type): Type | null {
  if (!TypeSystem.isNumeric(left) || !TypeSystem.isNumeric(right)) return null;
  return left.kind === 'Int' && right.kind === 'Int' ? Types.Int : Types.Float;
}

function sameKind(kinds: readonly PrimitiveKind[]): Rule {
  return (left, right) => (left.kind === right.kind && kinds.some(k => k === left.kind) ? left : null);
}

function firstOf(...rules: Rule[]): Rule {
  return (left, right) => {
    for (const rule of rules) {
      const result = rule(left, right);
      if (result) return result;
    }
    return null;
  };
}

function scalesWith(subject: PrimitiveKind, factors: readonly PrimitiveKind[], commutative: boolean): Rule {
  return (left, right) => {
    if (left.kind === subject && factors.some(k => k === right.kind)) return left;
    if (commutative && right.kind === subject && factors.some(k => k === left.kind)) return right;
    return null;
  };
}

const additive = sameKind(['Money', 'Percent', 'Duration']);

const BINARY_RULES: Readonly<Record<BinaryOp, Rule>> = {
  '+': firstOf(
    numeric,
    additive,
    sameKind(['String']),
    (l, r) => (l.kind === 'Date' && r.kind === 'Duration') || (l.kind === 'Duration' && r.kind === 'Date') ? Types.Date : null
  ),
  '-': firstOf(
    numeric,
    additive,
    (l, r) => (l.kind === 'Date' && r.kind === 'Duration' ? Types.Date : null),
    (l, r) => (l.kind === 'Date' && r.kind === 'Date' ? Types.Duration : null)
  ),
  '*': firstOf(
    numeric,
    scalesWith('Money', ['Int', 'Float', 'Percent'], true),
    scalesWith('Percent', ['Int', 'Float'], true),
    scalesWith('Duration', ['Int'], true)
  ),
  '/': firstOf(
    numeric,
    (l, r) => (l.kind === 'Money' && r.kind === 'Money' ? Types.Float : null),
    scalesWith('Money', ['Int', 'Float', 'Percent'], false),
    scalesWith('Percent', ['Int', 'Float'], false),
    scalesWith('Duration', ['Int'], false)
  ),
  '%': (l, r) => (l.kind === 'Int' && r.kind === 'Int' ? Types.Int : null),
  '&&': (l, r) => (l.kind === 'Boolean' && r.kind === 'Boolean' ? Types.Boolean : null),
  '||': (l, r) => (l.kind === 'Boolean' && r.kind === 'Boolean' ? Types.Boolean : null),
  '==': (l, r) => (TypeSystem.isComparable(l, r) ? Types.Boolean : null),
  '!=': (l, r) => (TypeSystem.isComparable(l, r) ? Types.Boolean : null),
  '<': ordered,
  '<=': ordered,
  '>': ordered,
  '>=': ordered,
};

function ordered(left: Type, right: Type): Type | null {
  if (TypeSystem.isNumeric(left) && TypeSystem.isNumeric(right)) return Types.Boolean;
  return left.kind === right.kind && ORDERED_KINDS.has(left.kind) ? Types.Boolean : null;
}

const LOGICAL_OR_COMPARISON: ReadonlySet<BinaryOp> = new Set<BinaryOp>([
  '&&',
  '||',
  '==',
  '!=',
  '<',
  '<=',
  '>',
  '>=',
]);

/**
 * 二元运算结果类型。Unknown 操作数不报错：比较与逻辑运算得到 Boolean，其余得到 Unknown。
 */
export function binaryResultType(op: BinaryOp, left: Type, right: Type): Type | null {
  if (TypeSystem.isUnknown(left) || TypeSystem.isUnknown(right)) {
    return LOGICAL_OR_COMPARISON.has(op) ? Types.Boolean : Types.Unknown;
  }
  return BINARY_RULES[op](left, right);
}

export function unaryResultType(op: UnaryOp, operand: Type): Type | null {
  if (TypeSystem.isUnknown(operand)) return op === '!' ? Types.Boolean : Types.Unknown;
  if (op === '!') return operand.kind === 'Boolean' ? Types.Boolean : null;
  switch (operand.kind) {
    case 'Int':
    case 'Float':
    case 'Money':
    case 'Percent':
    case 'Duration':
      return operand;
    default:
      return null;
  }
}

/** 错误消息中描述运算符要求的操作数 */
export function describeOperandRequirement(op: BinaryOp | UnaryOp, unary = false): string {
  if (unary) return op === '!' ? 'bool' : 'a numeric, money, percent or duration value';
  switch (op) {
    case '&&':
    case '||':
      return 'bool operands';
    case '==':
    case '!=':
      return 'operands of compatible types';
    case '<':
    case '<=':
    case '>':
    case '>=':
      return 'operands of the same ordered type';
    case '%':
      return 'int operands';
    default:
      return 'compatible arithmetic operands';
  }
}
