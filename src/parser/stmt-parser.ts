/**
 * 函数体语句解析器
 */

import { Node } from '../ast/ast.js';
import { KW, TokenKind } from '../frontend/tokens.js';
import type { Block, Expression, ExprStmt, Statement, Token, TypeNode, VariableDecl } from '../types.js';
import type { ParserContext } from './context.js';
import type { ParserTools } from './parser-tools.js';
import { tokenText } from './parser-tools.js';
import { parseExpression } from './expr-parser.js';
import { parseType, scanTypeAhead } from './type-parser.js';
import { assignSpan, spanSince, tokenSpan } from './span-utils.js';
import { parseRecovering } from './recovery.js';

/**
 * 判断当前位置是否是 `type name` 形式的声明（或 `type func`）。
 */
export function atDeclaration(ctx: ParserContext): boolean {
  const afterType = scanTypeAhead(ctx);
  if (afterType === null) return false;
  if (ctx.peek().kind === TokenKind.TYPE) return true;
  const following = ctx.peek(afterType);
  return following.kind === TokenKind.IDENT || (following.kind === TokenKind.KEYWORD && following.value === KW.FUNC);
}

/**
 * 在已解析类型之后解析变量声明的剩余部分:
 * `name [:= expr] ;`
 */
export function parseVariableDeclRest(
  ctx: ParserContext,
  tools: ParserTools,
  start: Token,
  type: TypeNode
): VariableDecl {
  const nameTok = tools.parseIdent();
  let value: Expression | null = null;
  if (tools.eat(TokenKind.ASSIGN)) {
    value = parseExpression(ctx, tools);
  }
  tools.expectTerminator('declaration');
  return assignSpan(
    Node.VariableDecl(type, tokenText(nameTok), tokenSpan(nameTok), value),
    spanSince(ctx, start)
  );
}

export function parseExprStmt(ctx: ParserContext, tools: ParserTools): ExprStmt {
  const start = ctx.peek();
  const expr = parseExpression(ctx, tools);
  tools.expectTerminator('expression');
  return assignSpan(Node.ExprStmt(expr), spanSince(ctx, start));
}

function parseStatement(ctx: ParserContext, tools: ParserTools): Statement {
  const start = ctx.peek();

  if (start.kind === TokenKind.ASSIGN) {
    ctx.next();
    const expr = parseExpression(ctx, tools);
    tools.expectTerminator('result expression');
    return assignSpan(Node.Return(expr, 'assign'), spanSince(ctx, start));
  }

  if (ctx.isKeyword(KW.RETURN)) {
    ctx.next();
    const expr = parseExpression(ctx, tools);
    tools.expectTerminator('return statement');
    return assignSpan(Node.Return(expr, 'return'), spanSince(ctx, start));
  }

  if (ctx.isKeyword(KW.PASS) && ctx.peek(1).kind === TokenKind.SEMICOLON) {
    ctx.next();
    ctx.next();
    return assignSpan(Node.PassStmt(), spanSince(ctx, start));
  }

  if (atDeclaration(ctx)) {
    const type = parseType(ctx);
    return parseVariableDeclRest(ctx, tools, start, type);
  }

  return parseExprStmt(ctx, tools);
}

/**
 * 解析 `{ stmt* }` 语句块；单条语句出错时跳到下一个语句边界继续。
 */
export function parseBlock(ctx: ParserContext, tools: ParserTools): Block {
  const open = tools.expect(TokenKind.LBRACE, "'{'");
  const statements = parseRecovering(ctx, true, () => parseStatement(ctx, tools));
  tools.expect(TokenKind.RBRACE, "'}'");
  return assignSpan(Node.Block(statements), spanSince(ctx, open));
}
