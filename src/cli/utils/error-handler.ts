import type { Diagnostic } from '../../diagnostics/diagnostics.js';
import { DiagnosticError, formatDiagnostic } from '../../diagnostics/diagnostics.js';
import { error as logError, warn as logWarn } from './logger.js';

type CliErrorCategory = 'lexical' | 'syntax' | 'module' | 'config' | 'semantic' | 'unknown';

interface DiagnosticCarrier extends Error {
  diagnostics?: Diagnostic[];
}

/** 一行待输出的错误信息；hint 用警告颜色输出 */
export interface ErrorLine {
  readonly level: 'error' | 'hint';
  readonly text: string;
}

function isDiagnostic(value: unknown): value is Diagnostic {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    typeof value.code === 'string' &&
    'message' in value &&
    typeof value.message === 'string' &&
    'span' in value
  );
}

function isDiagnosticArray(value: unknown): value is Diagnostic[] {
  return Array.isArray(value) && value.every(isDiagnostic);
}

function isDiagnosticCarrier(error: unknown): error is DiagnosticCarrier {
  return error instanceof Error && 'diagnostics' in error && isDiagnosticArray(error.diagnostics);
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

function classify(code: string): CliErrorCategory {
  switch (code.charAt(0)) {
    case 'L':
      return 'lexical';
    case 'P':
      return 'syntax';
    case 'R':
      return 'module';
    case 'C':
      return 'config';
    case 'S':
      return 'semantic';
    default:
      return 'unknown';
  }
}

function hintFor(code: string): string | null {
  switch (classify(code)) {
    case 'module':
      return '请检查 referencing 语句中的模块路径，或通过 --search-path 添加搜索目录';
    case 'config':
      return 'yh.config.json 存在格式问题，请按照 schemas/yh-config.schema.json 修复后重试';
    default:
      return null;
  }
}

function diagnosticLines(diags: readonly Diagnostic[]): ErrorLine[] {
  const lines: ErrorLine[] = [];
  const hinted = new Set<string>();
  for (const diag of diags) {
    lines.push({ level: 'error', text: formatDiagnostic(diag) });
    const hint = hintFor(diag.code);
    if (hint && !hinted.has(hint)) {
      hinted.add(hint);
      lines.push({ level: 'hint', text: hint });
    }
  }
  return lines;
}

function nodeErrorLine(error: NodeJS.ErrnoException): ErrorLine {
  const code = error.code ?? 'UNKNOWN';
  switch (code) {
    case 'EACCES':
    case 'EPERM':
      return { level: 'error', text: `文件权限不足：${error.message}` };
    case 'ENOENT':
      return { level: 'error', text: `未找到目标文件：${error.message}` };
    case 'EISDIR':
      return { level: 'error', text: `目标是目录而不是文件：${error.message}` };
    default:
      return { level: 'error', text: `文件系统错误(${code})：${error.message}` };
  }
}

export function createDiagnosticsError(diagnostics: Diagnostic[]): Error {
  const error: DiagnosticCarrier = new Error('CLI_DIAGNOSTIC_ERROR');
  error.diagnostics = diagnostics;
  return error;
}

/**
 * 把任意异常转换为待输出的行。
 */
export function describeError(error: unknown): ErrorLine[] {
  if (error instanceof DiagnosticError) return diagnosticLines([error.diagnostic]);
  if (isDiagnosticCarrier(error)) return diagnosticLines(error.diagnostics ?? []);
  if (isDiagnosticArray(error)) return diagnosticLines(error);
  if (isNodeError(error)) return [nodeErrorLine(error)];
  if (error instanceof Error) return [{ level: 'error', text: error.message }];
  return [{ level: 'error', text: '发生未知错误，请重试' }];
}

/**
 * 输出错误并把进程退出码设为 1。
 */
export function handleError(error: unknown): void {
  for (const line of describeError(error)) {
    if (line.level === 'hint') logWarn(line.text);
    else logError(line.text);
  }
  process.exitCode = 1;
}
