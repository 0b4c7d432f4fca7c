/**
 * 表达式解析器（递归下降 + 优先级分层）
 *
 * 优先级从低到高：
 * `||` < `&&` < `== !=` < `< <= > >=` < `+ -` < `* / %` < 前缀 `! -` < 后缀（`.field`、`[index]`、调用）
 * 所有二元运算符左结合。
 */

import { Node } from '../ast/ast.js';
import { KW, TokenKind, describeToken, isDurationValue, isMoneyValue } from '../frontend/tokens.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import type {
  BinaryOp,
  Expression,
  FieldInit,
  Literal,
  MatchArm,
  MatchExpr,
  StructLiteral,
  Token,
} from '../types.js';
import type { ParserContext } from './context.js';
import type { ParserTools } from './parser-tools.js';
import { tokenNumber, tokenText } from './parser-tools.js';
import { parsePattern } from './pattern-parser.js';
import { assignSpan, spanFromSources, spanSince, tokenSpan } from './span-utils.js';

const BINARY_LEVELS: ReadonlyArray<ReadonlyMap<TokenKind, BinaryOp>> = [
  new Map<TokenKind, BinaryOp>([[TokenKind.OR, '||']]),
  new Map<TokenKind, BinaryOp>([[TokenKind.AND, '&&']]),
  new Map<TokenKind, BinaryOp>([
    [TokenKind.EQ, '=='],
    [TokenKind.NEQ, '!='],
  ]),
  new Map<TokenKind, BinaryOp>([
    [TokenKind.LT, '<'],
    [TokenKind.LTE, '<='],
    [TokenKind.GT, '>'],
    [TokenKind.GTE, '>='],
  ]),
  new Map<TokenKind, BinaryOp>([
    [TokenKind.PLUS, '+'],
    [TokenKind.MINUS, '-'],
  ]),
  new Map<TokenKind, BinaryOp>([
    [TokenKind.STAR, '*'],
    [TokenKind.SLASH, '/'],
    [TokenKind.MOD, '%'],
  ]),
];

/**
 * 若当前 token 是字面量则消费并返回对应节点，否则返回 null（不消费）。
 */
export function parseLiteralToken(ctx: ParserContext): Literal | null {
  const tok = ctx.peek();
  let literal: Literal;
  switch (tok.kind) {
    case TokenKind.INT:
      literal = Node.Int(tokenNumber(tok));
      break;
    case TokenKind.FLOAT:
      literal = Node.Float(tokenNumber(tok));
      break;
    case TokenKind.PERCENT:
      literal = Node.Percent(tokenNumber(tok));
      break;
    case TokenKind.STRING:
      literal = Node.String(tokenText(tok));
      break;
    case TokenKind.BOOL:
      literal = Node.Bool(tok.value === true);
      break;
    case TokenKind.DATE:
      literal = Node.Date(tokenText(tok));
      break;
    case TokenKind.MONEY:
      if (!isMoneyValue(tok.value)) return null;
      literal = Node.Money(tok.value.currency, tok.value.amount);
      break;
    case TokenKind.DURATION:
      if (!isDurationValue(tok.value)) return null;
      literal = Node.Duration(tok.value.parts);
      break;
    default:
      return null;
  }
  ctx.next();
  return assignSpan(literal, tokenSpan(tok));
}

/** `{ }` 或 `{ ident :=` 开头时才视为结构体字面量 */
function atStructLiteralBody(ctx: ParserContext): boolean {
  if (ctx.noStructLiteral || !ctx.at(TokenKind.LBRACE)) return false;
  const first = ctx.peek(1);
  if (first.kind === TokenKind.RBRACE) return true;
  return first.kind === TokenKind.IDENT && ctx.peek(2).kind === TokenKind.ASSIGN;
}

function parseStructLiteral(
  ctx: ParserContext,
  tools: ParserTools,
  typeName: string | null,
  start: Token
): StructLiteral {
  tools.expect(TokenKind.LBRACE, "'{'");
  const fields: FieldInit[] = [];
  ctx.withStructLiterals(true, () => {
    while (ctx.at(TokenKind.IDENT)) {
      const nameTok = ctx.next();
      tools.expect(TokenKind.ASSIGN, "':='");
      const value = parseExpression(ctx, tools);
      fields.push(assignSpan(Node.FieldInit(tokenText(nameTok), value), spanFromSources(nameTok, value)));
      if (!tools.eat(TokenKind.COMMA)) break;
    }
  });
  tools.expect(TokenKind.RBRACE, "'}'");
  return assignSpan(Node.StructLiteral(typeName, fields), spanSince(ctx, start));
}

function parseArm(ctx: ParserContext, tools: ParserTools): MatchArm {
  const start = tools.expectKeyword(KW.CASE);
  const pattern = parsePattern(ctx, tools);
  let guard: Expression | null = null;
  if (ctx.isKeyword(KW.IF)) {
    ctx.next();
    guard = ctx.withStructLiterals(true, () => parseExpression(ctx, tools));
  }
  tools.expect(TokenKind.ASSIGN, "':='");
  if (ctx.isKeyword(KW.CONSEQUENCE)) ctx.next();
  const consequence = ctx.withStructLiterals(true, () => parseExpression(ctx, tools));
  tools.expectTerminator('match arm');
  return assignSpan(Node.MatchArm(pattern, guard, consequence), spanSince(ctx, start));
}

/**
 * 解析 match 表达式:
 * `match [scrutinee] { case pattern [if guard] := [consequence] expr; ... }`
 */
export function parseMatch(ctx: ParserContext, tools: ParserTools): MatchExpr {
  const start = tools.expectKeyword(KW.MATCH);
  ctx.debug.depth++;
  ctx.debug.log('match');
  try {
    let scrutinee: Expression | null = null;
    if (!ctx.at(TokenKind.LBRACE)) {
      scrutinee = ctx.withStructLiterals(false, () => parseExpression(ctx, tools));
    }
    tools.expect(TokenKind.LBRACE, "'{'");
    const arms: MatchArm[] = [];
    while (ctx.isKeyword(KW.CASE)) {
      arms.push(parseArm(ctx, tools));
    }
    tools.expect(TokenKind.RBRACE, "'case' or '}'");
    return assignSpan(Node.Match(scrutinee, arms), spanSince(ctx, start));
  } finally {
    ctx.debug.depth--;
  }
}

function parsePrimary(ctx: ParserContext, tools: ParserTools): Expression {
  const tok = ctx.peek();

  const literal = parseLiteralToken(ctx);
  if (literal) return literal;

  if (ctx.isKeyword(KW.PASS)) {
    ctx.next();
    return assignSpan(Node.PassLiteral(), tokenSpan(tok));
  }

  if (ctx.isKeyword(KW.MATCH)) {
    return parseMatch(ctx, tools);
  }

  if (tok.kind === TokenKind.IDENT) {
    ctx.next();
    if (atStructLiteralBody(ctx)) {
      return parseStructLiteral(ctx, tools, tokenText(tok), tok);
    }
    return assignSpan(Node.Name(tokenText(tok)), tokenSpan(tok));
  }

  if (atStructLiteralBody(ctx)) {
    return parseStructLiteral(ctx, tools, null, tok);
  }

  if (tok.kind === TokenKind.LPAREN) {
    ctx.next();
    const inner = ctx.withStructLiterals(true, () => parseExpression(ctx, tools));
    tools.expect(TokenKind.RPAREN, "')'");
    return inner;
  }

  throw Diagnostics.expectedExpression(describeToken(tok), tokenSpan(tok));
}

function parsePostfix(ctx: ParserContext, tools: ParserTools): Expression {
  let expr = parsePrimary(ctx, tools);
  for (;;) {
    if (ctx.at(TokenKind.DOT)) {
      ctx.next();
      const fieldTok = tools.parseIdent();
      expr = assignSpan(
        Node.FieldAccess(expr, tokenText(fieldTok), tokenSpan(fieldTok)),
        spanFromSources(expr, fieldTok)
      );
    } else if (ctx.at(TokenKind.LBRACKET)) {
      ctx.next();
      const index = ctx.withStructLiterals(true, () => parseExpression(ctx, tools));
      const close = tools.expect(TokenKind.RBRACKET, "']'");
      expr = assignSpan(Node.Index(expr, index), spanFromSources(expr, close));
    } else if (ctx.at(TokenKind.LPAREN)) {
      ctx.next();
      const args: Expression[] = [];
      ctx.withStructLiterals(true, () => {
        while (!ctx.at(TokenKind.RPAREN) && !ctx.at(TokenKind.EOF)) {
          args.push(parseExpression(ctx, tools));
          if (!tools.eat(TokenKind.COMMA)) break;
        }
      });
      const close = tools.expect(TokenKind.RPAREN, "')'");
      expr = assignSpan(Node.Call(expr, args), spanFromSources(expr, close));
    } else {
      return expr;
    }
  }
}

function parseUnary(ctx: ParserContext, tools: ParserTools): Expression {
  const tok = ctx.peek();
  if (tok.kind === TokenKind.NOT || tok.kind === TokenKind.MINUS) {
    ctx.next();
    const operand = parseUnary(ctx, tools);
    const op = tok.kind === TokenKind.NOT ? '!' : '-';
    return assignSpan(Node.Unary(op, operand), spanFromSources(tok, operand));
  }
  return parsePostfix(ctx, tools);
}

function parseBinaryLevel(ctx: ParserContext, tools: ParserTools, level: number): Expression {
  const ops = BINARY_LEVELS[level];
  if (!ops) return parseUnary(ctx, tools);
  let left = parseBinaryLevel(ctx, tools, level + 1);
  for (;;) {
    const op = ops.get(ctx.peek().kind);
    if (!op) return left;
    ctx.next();
    const right = parseBinaryLevel(ctx, tools, level + 1);
    left = assignSpan(Node.Binary(op, left, right), spanFromSources(left, right));
  }
}

export function parseExpression(ctx: ParserContext, tools: ParserTools): Expression {
  return parseBinaryLevel(ctx, tools, 0);
}
