/**
 * match 分支模式解析器
 */

import { Node } from '../ast/ast.js';
import { KW, TokenKind, describeToken } from '../frontend/tokens.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import type { FieldPattern, Literal, Pattern } from '../types.js';
import type { ParserContext } from './context.js';
import type { ParserTools } from './parser-tools.js';
import { tokenText } from './parser-tools.js';
import { parseLiteralToken } from './expr-parser.js';
import { assignSpan, spanSince, tokenSpan } from './span-utils.js';

function negate(literal: Literal): Literal | null {
  switch (literal.kind) {
    case 'Int':
      return Node.Int(-literal.value);
    case 'Float':
      return Node.Float(-literal.value);
    case 'Percent':
      return Node.Percent(-literal.value);
    default:
      return null;
  }
}

function parseStructPatternBody(ctx: ParserContext, tools: ParserTools): FieldPattern[] {
  tools.expect(TokenKind.LBRACE, "'{'");
  const fields: FieldPattern[] = [];
  while (!ctx.at(TokenKind.RBRACE) && !ctx.at(TokenKind.EOF)) {
    const nameTok = tools.parseIdent();
    let sub: Pattern | null = null;
    if (tools.eat(TokenKind.COLON)) {
      sub = parsePattern(ctx, tools);
    }
    fields.push(assignSpan(Node.FieldPattern(tokenText(nameTok), sub), spanSince(ctx, nameTok)));
    if (!tools.eat(TokenKind.COMMA)) break;
  }
  tools.expect(TokenKind.RBRACE, "'}'");
  return fields;
}

/**
 * 解析模式:
 * - `_` 通配符
 * - 字面量（含负数）与 `pass`
 * - `Name` 绑定或枚举变体（由语义阶段判定）
 * - `Enum.Variant` 限定变体
 * - `Struct { field, field: pattern }` 结构体解构
 */
export function parsePattern(ctx: ParserContext, tools: ParserTools): Pattern {
  const start = ctx.peek();

  if (start.kind === TokenKind.UNDERSCORE) {
    ctx.next();
    return assignSpan(Node.WildcardPattern(), tokenSpan(start));
  }

  if (start.kind === TokenKind.MINUS) {
    ctx.next();
    const numTok = ctx.peek();
    const literal = parseLiteralToken(ctx);
    const negated = literal ? negate(literal) : null;
    if (!negated) {
      throw Diagnostics.expectedPattern(describeToken(numTok), tokenSpan(numTok));
    }
    const span = spanSince(ctx, start);
    assignSpan(negated, span);
    return assignSpan(Node.LiteralPattern(negated), span);
  }

  if (ctx.isKeyword(KW.PASS)) {
    ctx.next();
    const literal = assignSpan(Node.PassLiteral(), tokenSpan(start));
    return assignSpan(Node.LiteralPattern(literal), tokenSpan(start));
  }

  const literal = parseLiteralToken(ctx);
  if (literal) {
    return assignSpan(Node.LiteralPattern(literal), literal.span);
  }

  if (start.kind === TokenKind.IDENT) {
    ctx.next();
    const name = tokenText(start);
    if (ctx.at(TokenKind.DOT) && ctx.peek(1).kind === TokenKind.IDENT) {
      ctx.next();
      const variant = tokenText(ctx.next());
      return assignSpan(Node.VariantPattern(name, variant), spanSince(ctx, start));
    }
    if (ctx.at(TokenKind.LBRACE)) {
      const fields = parseStructPatternBody(ctx, tools);
      return assignSpan(Node.StructPattern(name, fields), spanSince(ctx, start));
    }
    return assignSpan(Node.NamePattern(name), tokenSpan(start));
  }

  throw Diagnostics.expectedPattern(describeToken(start), tokenSpan(start));
}
