/**
 * 解析器工具函数集合
 * 提供期望验证、标识符解析与终结符处理等辅助功能
 */

import { TokenKind, describeToken } from '../frontend/tokens.js';
import type { Token } from '../types.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import type { ParseError } from '../diagnostics/diagnostics.js';
import type { ParserContext } from './context.js';
import { spanAfter, tokenSpan } from './span-utils.js';

/**
 * 解析器工具函数接口
 */
export interface ParserTools {
  /**
   * 构造 "期望 X" 错误（由调用方 throw）
   * @param expected 期望内容的描述
   * @param tok 可选的错误位置 token（默认使用当前 token）
   */
  expected: (expected: string, tok?: Token) => ParseError;

  /**
   * 期望并消费指定种类的 token
   */
  expect: (kind: TokenKind, expected: string) => Token;

  /**
   * 期望并消费指定关键字
   */
  expectKeyword: (kw: string) => Token;

  /**
   * 解析普通标识符，返回标识符 token
   */
  parseIdent: () => Token;

  /**
   * 消费 `;`；缺失时记录可恢复错误。
   * 上一个 token 是 `}` 时 `;` 可省略。
   */
  expectTerminator: (after: string) => void;

  /**
   * 如果当前 token 是指定种类则消费并返回 true
   */
  eat: (kind: TokenKind) => boolean;
}

/**
 * 创建解析器工具函数集合
 */
export function createParserTools(ctx: ParserContext): ParserTools {
  const tools: ParserTools = {
    expected(expected: string, tok: Token = ctx.peek()): ParseError {
      return Diagnostics.expectedToken(expected, describeToken(tok), tokenSpan(tok));
    },

    expect(kind: TokenKind, expected: string): Token {
      if (!ctx.at(kind)) throw tools.expected(expected);
      return ctx.next();
    },

    expectKeyword(kw: string): Token {
      if (!ctx.isKeyword(kw)) throw tools.expected(`'${kw}'`);
      return ctx.next();
    },

    parseIdent(): Token {
      const tok = ctx.peek();
      if (tok.kind !== TokenKind.IDENT) {
        throw Diagnostics.expectedIdentifier(describeToken(tok), tokenSpan(tok));
      }
      return ctx.next();
    },

    expectTerminator(after: string): void {
      if (ctx.at(TokenKind.SEMICOLON)) {
        ctx.next();
        return;
      }
      const prev = ctx.previous();
      if (prev.kind === TokenKind.RBRACE) return;
      ctx.report(Diagnostics.missingTerminator(after, describeToken(ctx.peek()), spanAfter(prev)));
    },

    eat(kind: TokenKind): boolean {
      if (!ctx.at(kind)) return false;
      ctx.next();
      return true;
    },
  };
  return tools;
}

/** 读取 token 的字符串值（IDENT/KEYWORD/TYPE/STRING/DATE） */
export function tokenText(tok: Token): string {
  return typeof tok.value === 'string' ? tok.value : tok.lexeme;
}

/** 读取 token 的数值（INT/FLOAT/PERCENT） */
export function tokenNumber(tok: Token): number {
  return typeof tok.value === 'number' ? tok.value : Number(tok.lexeme);
}
