import { printProgram } from '../../ast/printer.js';
import type { CommandResult } from './command-result.js';
import { formatAll } from './command-result.js';
import { parseFile } from './parse.js';

/**
 * `yh fmt <file>`：按规范格式输出源码。存在语法错误时不输出。
 */
export function fmtCommand(file: string): CommandResult {
  const { source, result, messages } = parseFile(file);
  if (!result) return { exitCode: 1, output: '', messages };
  if (result.diagnostics.length > 0) {
    return { exitCode: 1, output: '', messages: formatAll(result.diagnostics, () => source) };
  }
  return { exitCode: 0, output: printProgram(result.program).trimEnd(), messages: [] };
}
