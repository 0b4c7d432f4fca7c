/**
 * AST 美化打印：将 Program 输出为规范格式的源码。
 *
 * 输出可被重新解析，且（忽略位置信息后）与原 AST 结构相等。
 */

import type {
  BinaryOp,
  Block,
  DurationPart,
  Expression,
  Item,
  Literal,
  MatchExpr,
  Pattern,
  Program,
  Statement,
  TypeNode,
} from '../types.js';
import { foldAst } from './ast_visitor.js';

const INDENT = '  ';

const BINARY_PRECEDENCE: Readonly<Record<BinaryOp, number>> = {
  '||': 1,
  '&&': 2,
  '==': 3,
  '!=': 3,
  '<': 4,
  '<=': 4,
  '>': 4,
  '>=': 4,
  '+': 5,
  '-': 5,
  '*': 6,
  '/': 6,
  '%': 6,
};

const UNARY_PRECEDENCE = 7;
const POSTFIX_PRECEDENCE = 8;

function indent(n: number): string {
  return INDENT.repeat(n);
}

function precedenceOf(e: Expression): number {
  switch (e.kind) {
    case 'Binary':
      return BINARY_PRECEDENCE[e.op];
    case 'Unary':
      return UNARY_PRECEDENCE;
    default:
      return POSTFIX_PRECEDENCE;
  }
}

/** 把 `1.5e-7` 这类指数写法展开成普通小数，词法器不认指数 */
function expandExponent(text: string): string {
  const match = /^(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) return text;
  const digits = `${match[1] ?? ''}${match[2] ?? ''}`;
  const point = (match[1] ?? '').length + Number(match[3]);
  if (point <= 0) return `0.${'0'.repeat(-point)}${digits}`;
  if (point >= digits.length) return `${digits}${'0'.repeat(point - digits.length)}`;
  return `${digits.slice(0, point)}.${digits.slice(point)}`;
}

/**
 * 数值字面量的源码写法：始终是普通十进制，整数值的浮点数补 `.0`。
 * 负数（含 `-0`，负数模式会产生）保留符号。
 */
export function formatNumber(value: number, float: boolean): string {
  if (!Number.isFinite(value)) return String(value);
  const negative = value < 0 || Object.is(value, -0);
  const magnitude = Math.abs(value);
  let text = Number.isInteger(magnitude) ? BigInt(magnitude).toString() : expandExponent(String(magnitude));
  if (float && Number.isInteger(magnitude)) text += '.0';
  return negative ? `-${text}` : text;
}

export function escapeString(value: string): string {
  let out = '';
  for (const ch of value) {
    switch (ch) {
      case '\\':
        out += '\\\\';
        break;
      case '"':
        out += '\\"';
        break;
      case '\n':
        out += '\\n';
        break;
      case '\t':
        out += '\\t';
        break;
      case '\r':
        out += '\\r';
        break;
      case '\0':
        out += '\\0';
        break;
      default: {
        const code = ch.codePointAt(0) ?? 0;
        out += code < 0x20 || code === 0x7f ? `\\u{${code.toString(16)}}` : ch;
      }
    }
  }
  return `"${out}"`;
}

function formatDurationPart(part: DurationPart): string {
  return `${part.amount} ${part.unit}${part.amount === 1 ? '' : 's'}`;
}

export function formatLiteral(literal: Literal): string {
  switch (literal.kind) {
    case 'Int':
      return formatNumber(literal.value, false);
    case 'Float':
      return formatNumber(literal.value, true);
    case 'Percent':
      return `${formatNumber(literal.value, false)}%`;
    case 'String':
      return escapeString(literal.value);
    case 'Bool':
      return literal.value ? 'TRUE' : 'FALSE';
    case 'Money':
      return `${literal.currency}${literal.amount}`;
    case 'Date':
      return literal.value;
    case 'Duration':
      return literal.parts.map(formatDurationPart).join(', ');
    case 'PassLiteral':
      return 'pass';
  }
}

export function formatTypeNode(t: TypeNode): string {
  switch (t.kind) {
    case 'BuiltinType':
      return t.name;
    case 'NamedType':
      return t.name;
    case 'UnionType':
      return t.members.map(formatTypeNode).join(' || ');
  }
}

export function formatPattern(p: Pattern): string {
  switch (p.kind) {
    case 'WildcardPattern':
      return '_';
    case 'LiteralPattern':
      return formatLiteral(p.literal);
    case 'NamePattern':
      return p.name;
    case 'VariantPattern':
      return `${p.enumName}.${p.variant}`;
    case 'StructPattern': {
      const fields = p.fields.map(f => (f.pattern ? `${f.name}: ${formatPattern(f.pattern)}` : f.name));
      return fields.length === 0 ? `${p.typeName} {}` : `${p.typeName} { ${fields.join(', ')} }`;
    }
  }
}

function containsStructLiteral(e: Expression): boolean {
  return foldAst(e, false, (found, node) => found || node.kind === 'StructLiteral');
}

class Printer {
  expr(e: Expression, lvl: number): string {
    switch (e.kind) {
      case 'Name':
        return e.name;
      case 'FieldAccess':
        return `${this.operand(e.target, POSTFIX_PRECEDENCE, lvl)}.${e.field}`;
      case 'Index':
        return `${this.operand(e.target, POSTFIX_PRECEDENCE, lvl)}[${this.expr(e.index, lvl)}]`;
      case 'Call':
        return `${this.operand(e.callee, POSTFIX_PRECEDENCE, lvl)}(${e.args.map(a => this.expr(a, lvl)).join(', ')})`;
      case 'Unary':
        return `${e.op}${this.operand(e.operand, UNARY_PRECEDENCE, lvl)}`;
      case 'Binary': {
        const prec = BINARY_PRECEDENCE[e.op];
        // 左结合：右操作数同级也要加括号
        const left = this.operand(e.left, prec, lvl);
        const right = this.operand(e.right, prec + 1, lvl);
        return `${left} ${e.op} ${right}`;
      }
      case 'StructLiteral': {
        const fields = e.fields.map(f => `${f.name} := ${this.expr(f.value, lvl)}`);
        const body = fields.length === 0 ? '{}' : `{ ${fields.join(', ')} }`;
        return e.typeName ? `${e.typeName} ${body}` : body;
      }
      case 'Match':
        return this.match(e, lvl);
      default:
        return formatLiteral(e);
    }
  }

  private operand(e: Expression, minPrecedence: number, lvl: number): string {
    const text = this.expr(e, lvl);
    return precedenceOf(e) < minPrecedence ? `(${text})` : text;
  }

  private match(m: MatchExpr, lvl: number): string {
    let head = 'match';
    if (m.scrutinee) {
      const scrutinee = this.expr(m.scrutinee, lvl);
      head += containsStructLiteral(m.scrutinee) ? ` (${scrutinee})` : ` ${scrutinee}`;
    }
    if (m.arms.length === 0) return `${head} {}`;
    const arms = m.arms.map(arm => {
      const guard = arm.guard ? ` if ${this.expr(arm.guard, lvl + 1)}` : '';
      const consequence = this.expr(arm.consequence, lvl + 1);
      return `${indent(lvl + 1)}case ${formatPattern(arm.pattern)}${guard} := consequence ${consequence};`;
    });
    return `${head} {\n${arms.join('\n')}\n${indent(lvl)}}`;
  }

  statement(s: Statement, lvl: number): string {
    const pad = indent(lvl);
    switch (s.kind) {
      case 'VariableDecl': {
        const value = s.value ? ` := ${this.expr(s.value, lvl)}` : '';
        return `${pad}${formatTypeNode(s.type)} ${s.name}${value};`;
      }
      case 'Return':
        return s.form === 'assign'
          ? `${pad}:= ${this.expr(s.expr, lvl)};`
          : `${pad}return ${this.expr(s.expr, lvl)};`;
      case 'PassStmt':
        return `${pad}pass;`;
      case 'ExprStmt':
        return `${pad}${this.expr(s.expr, lvl)};`;
    }
  }

  block(b: Block, lvl: number): string {
    if (b.statements.length === 0) return '{}';
    const body = b.statements.map(s => this.statement(s, lvl + 1)).join('\n');
    return `{\n${body}\n${indent(lvl)}}`;
  }

  item(item: Item, lvl: number): string {
    const pad = indent(lvl);
    switch (item.kind) {
      case 'Referencing':
        return `${pad}referencing ${item.names.map(n => n.name).join(', ')} from ${item.module};`;
      case 'Scope': {
        if (item.items.length === 0) return `${pad}${item.keyword} ${item.name} {}`;
        const body = item.items.map(i => this.item(i, lvl + 1)).join('\n');
        return `${pad}${item.keyword} ${item.name} {\n${body}\n${pad}}`;
      }
      case 'Struct': {
        if (item.fields.length === 0) return `${pad}struct ${item.name} {}`;
        const fields = item.fields.map(f => `${indent(lvl + 1)}${formatTypeNode(f.type)} ${f.name},`);
        return `${pad}struct ${item.name} {\n${fields.join('\n')}\n${pad}}`;
      }
      case 'Enum':
        return `${pad}enum ${item.name} { ${item.variants.map(v => v.name).join(', ')} }`;
      case 'Function': {
        const ret = item.returnType ? `${formatTypeNode(item.returnType)} ` : '';
        const params = item.params.map(p => `${formatTypeNode(p.type)} ${p.name}`).join(', ');
        return `${pad}${ret}func ${item.name}(${params}) ${this.block(item.body, lvl)}`;
      }
      case 'VariableDecl':
      case 'ExprStmt':
        return this.statement(item, lvl);
    }
  }
}

/**
 * 将 Program 打印为源码文本（以换行结尾）。
 */
export function printProgram(program: Program): string {
  const printer = new Printer();
  const items = program.items.map(item => printer.item(item, 0));
  return items.length === 0 ? '' : `${items.join('\n')}\n`;
}

export function printExpression(e: Expression): string {
  return new Printer().expr(e, 0);
}

const SPAN_KEYS: ReadonlySet<string> = new Set(['span', 'nameSpan', 'fieldSpan']);

/**
 * 深拷贝节点并去掉所有位置信息，用于结构比较。
 */
export function stripSpans(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(stripSpans);
  if (typeof value === 'object' && value !== null) {
    const out: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      if (!SPAN_KEYS.has(key)) out[key] = stripSpans(child);
    }
    return out;
  }
  return value;
}
