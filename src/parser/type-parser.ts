/**
 * 类型注解解析器
 * 语法: basetype ("||" basetype)*，basetype = 内建类型 | pass | 点号限定名
 */

import { Node } from '../ast/ast.js';
import { TokenKind, describeToken, isBuiltinTypeName } from '../frontend/tokens.js';
import { KW } from '../frontend/tokens.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import type { TypeNode } from '../types.js';
import type { ParserContext } from './context.js';
import { assignSpan, spanFromSources, spanSince, tokenSpan } from './span-utils.js';
import { tokenText } from './parser-tools.js';

function parseBaseType(ctx: ParserContext): TypeNode {
  const start = ctx.peek();
  if (start.kind === TokenKind.TYPE || ctx.isKeyword(KW.PASS)) {
    ctx.next();
    const name = tokenText(start);
    if (!isBuiltinTypeName(name)) {
      throw Diagnostics.expectedType(describeToken(start), tokenSpan(start));
    }
    return assignSpan(Node.BuiltinType(name), tokenSpan(start));
  }
  if (start.kind === TokenKind.IDENT) {
    ctx.next();
    const parts = [tokenText(start)];
    while (ctx.at(TokenKind.DOT) && ctx.peek(1).kind === TokenKind.IDENT) {
      ctx.next();
      parts.push(tokenText(ctx.next()));
    }
    return assignSpan(Node.NamedType(parts.join('.')), spanSince(ctx, start));
  }
  throw Diagnostics.expectedType(describeToken(start), tokenSpan(start));
}

/**
 * 解析类型注解，`||` 连接的多个成员组成联合类型。
 */
export function parseType(ctx: ParserContext): TypeNode {
  const first = parseBaseType(ctx);
  if (!ctx.at(TokenKind.OR)) return first;
  const members: TypeNode[] = [first];
  while (ctx.at(TokenKind.OR)) {
    ctx.next();
    members.push(parseBaseType(ctx));
  }
  const last = members[members.length - 1] ?? first;
  return assignSpan(Node.UnionType(members), spanFromSources(first, last));
}

/**
 * 向前看（不消费）判断当前位置是否以类型注解开头，并返回类型之后的 token 偏移。
 * 用于区分 `Penalty p := ...;` 这类声明与表达式语句。
 */
export function scanTypeAhead(ctx: ParserContext, offset = 0): number | null {
  let k = offset;
  for (;;) {
    const tok = ctx.peek(k);
    if (tok.kind === TokenKind.TYPE || (tok.kind === TokenKind.KEYWORD && tok.value === KW.PASS)) {
      k++;
    } else if (tok.kind === TokenKind.IDENT) {
      k++;
      while (ctx.peek(k).kind === TokenKind.DOT && ctx.peek(k + 1).kind === TokenKind.IDENT) {
        k += 2;
      }
    } else {
      return null;
    }
    if (ctx.peek(k).kind !== TokenKind.OR) return k;
    k++;
  }
}
