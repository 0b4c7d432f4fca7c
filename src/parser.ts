/**
 * 语法分析主入口
 * 负责协调各个子模块完成整个文件的解析。解析器是 token 输入的纯函数，不进行任何文件 I/O。
 */

import { Node } from './ast/ast.js';
import type { Program, Token } from './types.js';
import type { Diagnostic } from './diagnostics/diagnostics.js';
import { createParserContext } from './parser/context.js';
import { createParserTools } from './parser/parser-tools.js';
import { collectTopLevelItems } from './parser/decl-parser.js';
import { assignSpan, spanFromTokens } from './parser/span-utils.js';

export interface ParseOptions {
  /**
   * 出错后是否跳到下一个语句边界继续解析（默认 true，适合编辑器场景）。
   * 为 false 时第一个语法错误以 ParseError 抛出。
   */
  readonly recover?: boolean;
  /** 记录在 Program 节点上的文件路径 */
  readonly file?: string;
}

/**
 * 解析结果
 *
 * 包含尽可能完整的 AST 和解析过程中收集的可恢复错误。
 * 即使存在语法错误，也会返回已成功解析的条目。
 */
export interface ParseResult {
  program: Program;
  diagnostics: Diagnostic[];
}

/**
 * 解析标记流生成 AST
 *
 * @param tokens 词法标记数组（可包含 trivia 注释，会被忽略）
 * @throws {ParseError} recover 为 false 时遇到第一个语法错误
 */
export function parse(tokens: readonly Token[], options: ParseOptions = {}): ParseResult {
  const ctx = createParserContext(tokens, { recover: options.recover ?? true });
  const tools = createParserTools(ctx);
  const items = collectTopLevelItems(ctx, tools);
  const program = Node.Program(options.file ?? null, items);
  const first = ctx.tokens[0] ?? ctx.peek();
  const last = ctx.tokens.length > 1 ? ctx.tokens[ctx.tokens.length - 2] ?? first : first;
  assignSpan(program, spanFromTokens(first, last));
  return { program, diagnostics: ctx.diagnostics };
}
