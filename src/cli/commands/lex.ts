import { readFileSync } from 'node:fs';
import { DiagnosticError, formatDiagnostic } from '../../diagnostics/diagnostics.js';
import { lex } from '../../frontend/lexer.js';
import { tokenCategory } from '../../frontend/tokens.js';
import type { Token } from '../../types.js';
import type { CommandResult } from './command-result.js';

export interface LexOptions {
  comments?: boolean;
}

function toJson(token: Token): Record<string, unknown> {
  return {
    kind: token.kind,
    category: tokenCategory(token.kind),
    lexeme: token.lexeme,
    value: token.value,
    start: token.start,
    end: token.end,
    ...(token.channel ? { channel: token.channel } : {}),
  };
}

/**
 * `yh lex <file>`：输出 JSON 格式的 token 列表。
 */
export function lexCommand(file: string, options: LexOptions = {}): CommandResult {
  const source = readFileSync(file, 'utf8');
  try {
    const tokens = lex(source, { keepComments: Boolean(options.comments) });
    return { exitCode: 0, output: JSON.stringify(tokens.map(toJson), null, 2), messages: [] };
  } catch (error) {
    if (!(error instanceof DiagnosticError)) throw error;
    return {
      exitCode: 1,
      output: '',
      messages: [formatDiagnostic({ ...error.diagnostic, file }, source)],
    };
  }
}
