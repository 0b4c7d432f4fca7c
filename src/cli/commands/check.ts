import { ConfigError, check } from '../../compiler.js';
import type { Diagnostic } from '../../diagnostics/diagnostics.js';
import { DiagnosticSeverity } from '../../diagnostics/diagnostics.js';
import { ResolveError } from '../../resolver/errors.js';
import type { ResolvedProgram } from '../../resolver/module-resolver.js';
import type { CommandResult } from './command-result.js';
import { exitCodeFor, formatAll } from './command-result.js';

export interface CheckCommandOptions {
  searchPath?: string[];
  json?: boolean;
  config?: string;
}

function countBySeverity(diagnostics: readonly Diagnostic[], severity: DiagnosticSeverity): number {
  return diagnostics.filter(d => d.severity === severity).length;
}

export function summarize(diagnostics: readonly Diagnostic[]): string {
  const errors = countBySeverity(diagnostics, DiagnosticSeverity.Error);
  const warnings = countBySeverity(diagnostics, DiagnosticSeverity.Warning);
  return `${errors} error(s), ${warnings} warning(s)`;
}

/**
 * `yh check <file>`：解析全部模块并进行语义分析。
 * 致命错误（词法、语法、模块解析、配置）或任何 error 级诊断时退出码为 1。
 */
export function checkCommand(file: string, options: CheckCommandOptions = {}): CommandResult {
  let program: ResolvedProgram | null = null;
  let diagnostics: readonly Diagnostic[];
  try {
    program = check(file, {
      ...(options.searchPath && options.searchPath.length > 0 ? { searchPaths: options.searchPath } : {}),
      ...(options.config !== undefined ? { configPath: options.config } : {}),
    });
    diagnostics = program.diagnostics;
  } catch (error) {
    if (error instanceof ResolveError) diagnostics = [error.diagnostic];
    else if (error instanceof ConfigError) diagnostics = error.diagnostics;
    else throw error;
  }

  const exitCode = program ? exitCodeFor(diagnostics) : 1;
  if (options.json) {
    const report = {
      ok: exitCode === 0,
      modules: program ? program.modules.map(m => m.id) : [],
      diagnostics,
    };
    return { exitCode, output: JSON.stringify(report, null, 2), messages: [] };
  }

  const sources = new Map<string, string>(program ? program.modules.map(m => [m.path, m.source] as const) : []);
  return {
    exitCode,
    output: summarize(diagnostics),
    messages: formatAll(diagnostics, f => (f === undefined ? undefined : sources.get(f))),
  };
}
