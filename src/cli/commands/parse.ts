import { readFileSync } from 'node:fs';
import { stripSpans } from '../../ast/printer.js';
import { DiagnosticError, formatDiagnostic } from '../../diagnostics/diagnostics.js';
import { lex } from '../../frontend/lexer.js';
import { parse } from '../../parser.js';
import type { ParseResult } from '../../parser.js';
import type { CommandResult } from './command-result.js';
import { exitCodeFor, formatAll } from './command-result.js';

export interface ParseOptions {
  spans?: boolean;
}

/**
 * 读取并解析单个文件（不解析 referencing）。词法错误以诊断形式返回。
 */
export function parseFile(file: string): { source: string; result: ParseResult | null; messages: string[] } {
  const source = readFileSync(file, 'utf8');
  try {
    const parsed = parse(lex(source), { file });
    const result = { program: parsed.program, diagnostics: parsed.diagnostics.map(d => ({ ...d, file })) };
    return { source, result, messages: [] };
  } catch (error) {
    if (!(error instanceof DiagnosticError)) throw error;
    return { source, result: null, messages: [formatDiagnostic({ ...error.diagnostic, file }, source)] };
  }
}

/**
 * `yh parse <file>`：输出 JSON 格式的 AST；默认省略位置信息。
 */
export function parseCommand(file: string, options: ParseOptions = {}): CommandResult {
  const { source, result, messages } = parseFile(file);
  if (!result) return { exitCode: 1, output: '', messages };
  const ast = options.spans ? result.program : stripSpans(result.program);
  return {
    exitCode: exitCodeFor(result.diagnostics),
    output: JSON.stringify(ast, null, 2),
    messages: formatAll(result.diagnostics, () => source),
  };
}
