import type { Token } from '../types.js';
import { TokenKind } from '../frontend/tokens.js';
import { ConfigService } from '../config/config-service.js';
import type { Diagnostic, ParseError } from '../diagnostics/diagnostics.js';
import { createLogger } from '../utils/logger.js';

/**
 * Parser 上下文接口
 * 包含词法标记流（已去除 trivia）和解析状态。每次 parse 调用创建独立实例，不存在全局状态。
 */
export interface ParserContext {
  /** 有效 token（不含注释），总以 EOF 结尾 */
  readonly tokens: readonly Token[];
  index: number;
  /** 是否在错误后恢复并继续解析 */
  readonly recover: boolean;
  /** 可恢复错误的收集列表 */
  readonly diagnostics: Diagnostic[];
  /** match 被匹配值中禁止结构体字面量，避免与 match 主体的 `{` 混淆 */
  noStructLiteral: boolean;
  debug: { enabled: boolean; depth: number; log(message: string): void };
  /** 查看第 N 个 Token */
  peek(offset?: number): Token;
  /** 消费当前 Token 并前进；到达 EOF 后不再前进 */
  next(): Token;
  at(kind: TokenKind, value?: Token['value']): boolean;
  isKeyword(kw: string): boolean;
  /** 最近一次消费的 Token */
  previous(): Token;
  /** 记录可恢复错误；非恢复模式下直接抛出 */
  report(error: ParseError): void;
  withStructLiterals<T>(allowed: boolean, body: () => T): T;
}

const parserLogger = createLogger('parser');

function ensureEof(tokens: readonly Token[]): Token[] {
  const significant = tokens.filter(tok => tok.channel !== 'trivia');
  const last = significant[significant.length - 1];
  if (last && last.kind === TokenKind.EOF) return significant;
  const end = last ? last.end : { line: 1, col: 1 };
  significant.push({ kind: TokenKind.EOF, value: null, lexeme: '', start: end, end });
  return significant;
}

export function createParserContext(
  tokens: readonly Token[],
  options: { recover: boolean }
): ParserContext {
  const stream = ensureEof(tokens);
  const eof = stream[stream.length - 1];
  const ctx: ParserContext = {
    tokens: stream,
    index: 0,
    recover: options.recover,
    diagnostics: [],
    noStructLiteral: false,
    debug: {
      enabled: ConfigService.getInstance().debugParser,
      depth: 0,
      log: (message: string): void => {
        if (!ctx.debug.enabled) return;
        parserLogger.debug(message, { depth: ctx.debug.depth, at: ctx.peek().start });
      },
    },
    peek: (offset = 0): Token => ctx.tokens[ctx.index + offset] ?? eof,
    next: (): Token => {
      const tok = ctx.peek();
      if (tok.kind !== TokenKind.EOF) ctx.index++;
      return tok;
    },
    at: (kind: TokenKind, value?: Token['value']): boolean => {
      const t = ctx.peek();
      if (t.kind !== kind) return false;
      if (value === undefined) return true;
      return t.value === value;
    },
    isKeyword: (kw: string): boolean => ctx.at(TokenKind.KEYWORD, kw),
    previous: (): Token => ctx.tokens[ctx.index - 1] ?? ctx.peek(),
    report: (error: ParseError): void => {
      if (!ctx.recover) throw error;
      ctx.diagnostics.push(error.diagnostic);
    },
    withStructLiterals: <T>(allowed: boolean, body: () => T): T => {
      const saved = ctx.noStructLiteral;
      ctx.noStructLiteral = !allowed;
      try {
        return body();
      } finally {
        ctx.noStructLiteral = saved;
      }
    },
  };

  return ctx;
}
