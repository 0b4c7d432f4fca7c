import type { ParserContext } from './context.js';
import type { Position, Span, Token } from '../types.js';

type SpanSource = Token | { span: Span };

function clonePosition(pos: Position): Position {
  return { line: pos.line, col: pos.col };
}

export function cloneSpan(span: Span): Span {
  return {
    start: clonePosition(span.start),
    end: clonePosition(span.end),
  };
}

export function tokenSpan(token: Token): Span {
  return { start: clonePosition(token.start), end: clonePosition(token.end) };
}

export function spanFromTokens(start: Token, end: Token): Span {
  return {
    start: clonePosition(start.start),
    end: clonePosition(end.end),
  };
}

function toSpan(source: SpanSource): Span {
  if ('span' in source) {
    return source.span;
  }
  return {
    start: source.start,
    end: source.end,
  };
}

export function isBefore(a: Position, b: Position): boolean {
  return a.line < b.line || (a.line === b.line && a.col < b.col);
}

function isAfter(a: Position, b: Position): boolean {
  return a.line > b.line || (a.line === b.line && a.col > b.col);
}

export function spanFromSources(first: SpanSource, ...rest: SpanSource[]): Span {
  const initial = toSpan(first);
  let start = initial.start;
  let end = initial.end;

  for (const source of rest) {
    const span = toSpan(source);
    if (isBefore(span.start, start)) {
      start = span.start;
    }
    if (isAfter(span.end, end)) {
      end = span.end;
    }
  }

  return {
    start: clonePosition(start),
    end: clonePosition(end),
  };
}

/** 判断 outer 是否完整包含 inner */
export function spanContains(outer: Span, inner: Span): boolean {
  return !isBefore(inner.start, outer.start) && !isAfter(inner.end, outer.end);
}

/** 从 start token 到最近一次消费的 token 的区间 */
export function spanSince(ctx: ParserContext, start: Token): Span {
  return spanFromTokens(start, lastConsumedToken(ctx));
}

export function lastConsumedToken(ctx: ParserContext): Token {
  return ctx.previous();
}

/** 紧跟在上一个 token 之后的单字符区间，用于报告缺失的终结符 */
export function spanAfter(token: Token): Span {
  return {
    start: clonePosition(token.end),
    end: { line: token.end.line, col: token.end.col + 1 },
  };
}

export function assignSpan<T extends { span: Span }>(node: T, span: Span): T {
  node.span = span;
  return node;
}
