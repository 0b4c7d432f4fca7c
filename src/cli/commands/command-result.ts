import type { Diagnostic } from '../../diagnostics/diagnostics.js';
import { formatDiagnostic, isError } from '../../diagnostics/diagnostics.js';

export interface CommandResult {
  readonly exitCode: 0 | 1;
  /** 写到 stdout 的内容（不含结尾换行） */
  readonly output: string;
  /** 写到 stderr 的诊断与提示 */
  readonly messages: readonly string[];
}

export function formatAll(diagnostics: readonly Diagnostic[], sourceOf: (file: string | undefined) => string | undefined): string[] {
  return diagnostics.map(d => formatDiagnostic(d, sourceOf(d.file)));
}

export function exitCodeFor(diagnostics: readonly Diagnostic[]): 0 | 1 {
  return diagnostics.some(isError) ? 1 : 0;
}
