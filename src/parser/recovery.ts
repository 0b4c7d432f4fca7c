/**
 * 错误恢复：出错后跳到下一个语句边界（`;`、当前层级的 `}` 或可开始新条目的关键字）。
 */

import { KW, TokenKind } from '../frontend/tokens.js';
import { DiagnosticError } from '../diagnostics/diagnostics.js';
import type { Token } from '../types.js';
import type { ParserContext } from './context.js';

const ITEM_KEYWORDS: ReadonlySet<string> = new Set([
  KW.REFERENCING,
  KW.SCOPE,
  KW.STATUTE,
  KW.STRUCT,
  KW.ENUM,
  KW.FUNC,
  KW.RETURN,
]);

function startsItem(tok: Token): boolean {
  if (tok.kind === TokenKind.TYPE) return true;
  return tok.kind === TokenKind.KEYWORD && typeof tok.value === 'string' && ITEM_KEYWORDS.has(tok.value);
}

/**
 * @param nested 位于 `{ ... }` 内部时为 true：遇到本层 `}` 停下（不消费），交由外层闭合
 */
export function syncToBoundary(ctx: ParserContext, nested: boolean): void {
  let depth = 0;
  let advanced = false;
  while (!ctx.at(TokenKind.EOF)) {
    const tok = ctx.peek();
    if (tok.kind === TokenKind.RBRACE) {
      if (depth === 0) {
        if (!nested) ctx.next();
        return;
      }
      depth--;
    } else if (tok.kind === TokenKind.LBRACE) {
      depth++;
    } else if (tok.kind === TokenKind.SEMICOLON && depth === 0) {
      ctx.next();
      return;
    } else if (advanced && depth === 0 && startsItem(tok)) {
      return;
    }
    ctx.next();
    advanced = true;
  }
}

/**
 * 列表内部（结构体字段）的恢复：跳到本层的 `,` 或 `;`（消费）或 `}`（不消费）。
 * 类型关键字在这里不是边界，否则下一个字段会被当作新条目。
 */
export function syncToSeparator(ctx: ParserContext): void {
  let depth = 0;
  while (!ctx.at(TokenKind.EOF)) {
    const tok = ctx.peek();
    if (tok.kind === TokenKind.RBRACE) {
      if (depth === 0) return;
      depth--;
    } else if (tok.kind === TokenKind.LBRACE) {
      depth++;
    } else if (depth === 0 && (tok.kind === TokenKind.COMMA || tok.kind === TokenKind.SEMICOLON)) {
      ctx.next();
      return;
    }
    ctx.next();
  }
}

/**
 * 反复调用 parseOne 直到 EOF（或 nested 时遇到 `}`）。
 * 恢复模式下把语法错误记录到 ctx.diagnostics 并同步到下一个边界；否则直接抛出。
 */
export function parseRecovering<T>(
  ctx: ParserContext,
  nested: boolean,
  parseOne: () => T | null
): T[] {
  const results: T[] = [];
  while (!ctx.at(TokenKind.EOF) && !(nested && ctx.at(TokenKind.RBRACE))) {
    try {
      const result = parseOne();
      if (result !== null) results.push(result);
    } catch (e) {
      if (!ctx.recover || !(e instanceof DiagnosticError)) throw e;
      ctx.diagnostics.push(e.diagnostic);
      ctx.debug.log(`recovering after ${e.diagnostic.code}`);
      syncToBoundary(ctx, nested);
    }
  }
  return results;
}
