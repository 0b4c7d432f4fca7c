// Structured diagnostics with error codes, spans, and fix-its

import type { Position, Span } from '../types.js';

export enum DiagnosticSeverity {
  Error = 'error',
  Warning = 'warning',
  Info = 'info',
  Hint = 'hint',
}

export enum DiagnosticCode {
  // Lexer errors (L001-L099)
  L001_UnexpectedCharacter = 'L001',
  L002_UnterminatedString = 'L002',
  L003_UnterminatedComment = 'L003',
  L004_InvalidEscape = 'L004',
  L005_InvalidDate = 'L005',
  L006_NonCanonicalDate = 'L006',
  L007_NumberOutOfRange = 'L007',

  // Parser errors (P001-P099)
  P001_ExpectedToken = 'P001',
  P002_UnexpectedToken = 'P002',
  P003_ExpectedExpression = 'P003',
  P004_ExpectedType = 'P004',
  P005_ExpectedPattern = 'P005',
  P006_MissingTerminator = 'P006',
  P007_ExpectedIdentifier = 'P007',

  // Module resolution errors (R001-R099)
  R001_ModuleNotFound = 'R001',
  R002_CircularImport = 'R002',
  R003_MissingSymbol = 'R003',
  R004_DuplicateExport = 'R004',
  R005_InvalidSource = 'R005',

  // Semantic errors and warnings (S001-S099)
  S001_TypeMismatch = 'S001',
  S002_UnresolvedReference = 'S002',
  S003_DuplicateDeclaration = 'S003',
  S004_UnreachableArm = 'S004',
  S005_InexhaustiveMatch = 'S005',
  S006_MissingField = 'S006',
  S007_ArityMismatch = 'S007',
  S008_CyclicDefinition = 'S008',
  S009_MissingReturn = 'S009',

  // Project configuration (C001-C099)
  C001_ConfigParseError = 'C001',
  C002_ConfigSchemaViolation = 'C002',
}

export interface FixIt {
  readonly description: string;
  readonly span: Span;
  readonly replacement: string;
}

export interface RelatedInformation {
  readonly span: Span;
  readonly message: string;
  readonly file?: string;
}

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly span: Span;
  /** 诊断所属文件；单文件解析时可省略 */
  readonly file?: string;
  readonly fixIts?: readonly FixIt[];
  readonly relatedInformation?: readonly RelatedInformation[];
}

export class DiagnosticError extends Error {
  public readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.diagnostic = diagnostic;
    this.name = 'DiagnosticError';
  }

  get pos(): Position {
    return this.diagnostic.span.start;
  }
}

/**
 * 词法错误：非法字符、未闭合的字符串或块注释、非法转义与日期。
 */
export class LexError extends DiagnosticError {
  readonly position: Position;
  readonly unexpectedChar: string | undefined;

  constructor(diagnostic: Diagnostic, unexpectedChar?: string) {
    super(diagnostic);
    this.name = 'LexError';
    this.position = diagnostic.span.start;
    this.unexpectedChar = unexpectedChar;
  }
}

/**
 * 语法错误：记录期望内容与实际遇到的 token。
 */
export class ParseError extends DiagnosticError {
  readonly expected: string;
  readonly found: string;
  readonly position: Position;

  constructor(diagnostic: Diagnostic, expected: string, found: string) {
    super(diagnostic);
    this.name = 'ParseError';
    this.expected = expected;
    this.found = found;
    this.position = diagnostic.span.start;
  }
}

export class DiagnosticBuilder {
  private severity: DiagnosticSeverity = DiagnosticSeverity.Error;
  private code?: DiagnosticCode;
  private message?: string;
  private span?: Span;
  private file?: string;
  private fixIts: FixIt[] = [];
  private relatedInformation: RelatedInformation[] = [];

  static error(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Error).withCode(code);
  }

  static warning(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Warning).withCode(code);
  }

  static info(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Info).withCode(code);
  }

  withSeverity(severity: DiagnosticSeverity): DiagnosticBuilder {
    this.severity = severity;
    return this;
  }

  withCode(code: DiagnosticCode): DiagnosticBuilder {
    this.code = code;
    return this;
  }

  withMessage(message: string): DiagnosticBuilder {
    this.message = message;
    return this;
  }

  withSpan(span: Span): DiagnosticBuilder {
    this.span = span;
    return this;
  }

  withPosition(pos: Position): DiagnosticBuilder {
    this.span = { start: pos, end: { line: pos.line, col: pos.col + 1 } };
    return this;
  }

  withFile(file: string | undefined): DiagnosticBuilder {
    if (file !== undefined) this.file = file;
    return this;
  }

  withFixIt(description: string, span: Span, replacement: string): DiagnosticBuilder {
    this.fixIts.push({ description, span, replacement });
    return this;
  }

  withRelated(span: Span, message: string, file?: string): DiagnosticBuilder {
    this.relatedInformation.push(file !== undefined ? { span, message, file } : { span, message });
    return this;
  }

  build(): Diagnostic {
    if (!this.code) throw new Error('Diagnostic code is required');
    if (!this.message) throw new Error('Diagnostic message is required');
    if (!this.span) throw new Error('Diagnostic span is required');

    return {
      severity: this.severity,
      code: this.code,
      message: this.message,
      span: this.span,
      ...(this.file !== undefined ? { file: this.file } : {}),
      ...(this.fixIts.length > 0 ? { fixIts: [...this.fixIts] } : {}),
      ...(this.relatedInformation.length > 0
        ? { relatedInformation: [...this.relatedInformation] }
        : {}),
    };
  }

  throw(): never {
    throw new DiagnosticError(this.build());
  }
}

// Common diagnostic patterns
export const Diagnostics = {
  unexpectedCharacter: (char: string, pos: Position): LexError =>
    new LexError(
      DiagnosticBuilder.error(DiagnosticCode.L001_UnexpectedCharacter)
        .withMessage(`Unexpected character '${char}'`)
        .withPosition(pos)
        .build(),
      char
    ),

  unterminatedString: (pos: Position): LexError =>
    new LexError(
      DiagnosticBuilder.error(DiagnosticCode.L002_UnterminatedString)
        .withMessage('Unterminated string literal')
        .withPosition(pos)
        .build()
    ),

  unterminatedComment: (pos: Position): LexError =>
    new LexError(
      DiagnosticBuilder.error(DiagnosticCode.L003_UnterminatedComment)
        .withMessage('Unterminated block comment')
        .withPosition(pos)
        .build()
    ),

  invalidEscape: (sequence: string, pos: Position): LexError =>
    new LexError(
      DiagnosticBuilder.error(DiagnosticCode.L004_InvalidEscape)
        .withMessage(`Invalid escape sequence '${sequence}'`)
        .withPosition(pos)
        .build(),
      sequence
    ),

  invalidDate: (text: string, pos: Position): LexError =>
    new LexError(
      DiagnosticBuilder.error(DiagnosticCode.L005_InvalidDate)
        .withMessage(`Invalid calendar date '${text}'`)
        .withPosition(pos)
        .build()
    ),

  nonCanonicalDate: (text: string, canonical: string, span: Span): LexError =>
    new LexError(
      DiagnosticBuilder.error(DiagnosticCode.L006_NonCanonicalDate)
        .withMessage(`Date '${text}' must be written as YYYY-MM-DD`)
        .withSpan(span)
        .withFixIt('Use ISO date format', span, canonical)
        .build()
    ),

  numberOutOfRange: (text: string, span: Span): LexError =>
    new LexError(
      DiagnosticBuilder.error(DiagnosticCode.L007_NumberOutOfRange)
        .withMessage(`Number literal '${text}' is out of range`)
        .withSpan(span)
        .build()
    ),

  expectedToken: (expected: string, found: string, span: Span): ParseError =>
    new ParseError(
      DiagnosticBuilder.error(DiagnosticCode.P001_ExpectedToken)
        .withMessage(`Expected ${expected}, found ${found}`)
        .withSpan(span)
        .build(),
      expected,
      found
    ),

  unexpectedToken: (found: string, span: Span, context?: string): ParseError =>
    new ParseError(
      DiagnosticBuilder.error(DiagnosticCode.P002_UnexpectedToken)
        .withMessage(context ? `Unexpected ${found} ${context}` : `Unexpected ${found}`)
        .withSpan(span)
        .build(),
      context ?? 'item',
      found
    ),

  expectedExpression: (found: string, span: Span): ParseError =>
    new ParseError(
      DiagnosticBuilder.error(DiagnosticCode.P003_ExpectedExpression)
        .withMessage(`Expected expression, found ${found}`)
        .withSpan(span)
        .build(),
      'expression',
      found
    ),

  expectedType: (found: string, span: Span): ParseError =>
    new ParseError(
      DiagnosticBuilder.error(DiagnosticCode.P004_ExpectedType)
        .withMessage(`Expected type, found ${found}`)
        .withSpan(span)
        .build(),
      'type',
      found
    ),

  expectedPattern: (found: string, span: Span): ParseError =>
    new ParseError(
      DiagnosticBuilder.error(DiagnosticCode.P005_ExpectedPattern)
        .withMessage(`Expected pattern, found ${found}`)
        .withSpan(span)
        .build(),
      'pattern',
      found
    ),

  missingTerminator: (after: string, found: string, span: Span): ParseError =>
    new ParseError(
      DiagnosticBuilder.error(DiagnosticCode.P006_MissingTerminator)
        .withMessage(`Expected ';' after ${after}, found ${found}`)
        .withSpan(span)
        .withFixIt("Add ';'", { start: span.start, end: span.start }, ';')
        .build(),
      "';'",
      found
    ),

  expectedIdentifier: (found: string, span: Span): ParseError =>
    new ParseError(
      DiagnosticBuilder.error(DiagnosticCode.P007_ExpectedIdentifier)
        .withMessage(`Expected identifier, found ${found}`)
        .withSpan(span)
        .build(),
      'identifier',
      found
    ),
};

/**
 * 将捕获到的异常统一转换为 Diagnostic。
 */
export function toDiagnostic(error: unknown, fallbackSpan?: Span): Diagnostic {
  if (error instanceof DiagnosticError) return error.diagnostic;
  const message = error instanceof Error ? error.message : String(error);
  return DiagnosticBuilder.error(DiagnosticCode.P002_UnexpectedToken)
    .withMessage(message)
    .withSpan(fallbackSpan ?? { start: dummyPosition(), end: dummyPosition() })
    .build();
}

export function isError(diagnostic: Diagnostic): boolean {
  return diagnostic.severity === DiagnosticSeverity.Error;
}

// Utility to format diagnostics for display
export function formatDiagnostic(diagnostic: Diagnostic, source?: string): string {
  const { severity, code, message, span } = diagnostic;
  const pos = `${span.start.line}:${span.start.col}`;
  const location = diagnostic.file ? `${diagnostic.file}:${pos}` : pos;

  let result = `${severity} ${code}: ${message} at ${location}`;

  if (source) {
    const lines = source.split(/\r?\n/);
    const line = lines[span.start.line - 1];
    if (line !== undefined) {
      const width = span.end.line === span.start.line ? Math.max(1, span.end.col - span.start.col) : 1;
      result += `\n> ${span.start.line}| ${line}`;
      result += `\n> ${' '.repeat(String(span.start.line).length)}  ${' '.repeat(Math.max(0, span.start.col - 1))}${'^'.repeat(width)}`;
    }
  }

  if (diagnostic.relatedInformation) {
    for (const related of diagnostic.relatedInformation) {
      const where = `${related.span.start.line}:${related.span.start.col}`;
      result += `\n  note: ${related.message} at ${related.file ? `${related.file}:${where}` : where}`;
    }
  }

  if (diagnostic.fixIts && diagnostic.fixIts.length > 0) {
    result += '\n\nSuggested fixes:';
    for (const fixIt of diagnostic.fixIts) {
      result += `\n  - ${fixIt.description}: "${fixIt.replacement}"`;
    }
  }

  return result;
}

// Utility to create a dummy position for diagnostics without source location
export function dummyPosition(): Position {
  return { line: 1, col: 1 };
}
