/**
 * @module diagnostics
 *
 * 诊断系统模块。
 *
 * 包含：
 * - 结构化诊断 (Diagnostic, DiagnosticBuilder, DiagnosticError)
 * - 词法与语法错误 (LexError, ParseError)
 * - 诊断严重级别与代码 (DiagnosticSeverity, DiagnosticCode)
 */

export {
  DiagnosticSeverity,
  DiagnosticCode,
  DiagnosticError,
  DiagnosticBuilder,
  Diagnostics,
  LexError,
  ParseError,
  formatDiagnostic,
  toDiagnostic,
  isError,
  dummyPosition,
  type Diagnostic,
  type FixIt,
  type RelatedInformation,
} from './diagnostics.js';
