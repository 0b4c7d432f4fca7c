/**
 * @module analyzer
 *
 * 语义分析：在已解析的多模块程序上进行类型检查、match 分支检查与引用校验。
 *
 * 分析不会中途终止：所有问题都以 Diagnostic 收集，一次报告全部错误与警告。
 * 模块级名字可以先使用后声明；函数体内的局部名字必须先声明后使用。
 */

import { performance } from 'node:perf_hooks';
import { DiagnosticBuilder, DiagnosticCode } from '../diagnostics/diagnostics.js';
import type { Diagnostic } from '../diagnostics/diagnostics.js';
import type {
  BinaryExpr,
  CallExpr,
  EnumDef,
  Expression,
  FieldAccess,
  FunctionDef,
  Item,
  Literal,
  MatchExpr,
  NamedType,
  Pattern,
  Span,
  Statement,
  StructDef,
  StructLiteral,
  TypeNode,
  UnaryExpr,
  VariableDecl,
} from '../types.js';
import { formatLiteral } from '../ast/printer.js';
import type { Module, ResolvedProgram } from '../resolver/module-resolver.js';
import { QUALIFIER, qualify } from '../resolver/symbol-table.js';
import type { ProgramSymbol, SymbolTable } from '../resolver/symbol-table.js';
import { enterScopeEnv, lookupName, lookupPath, moduleEnv, resolveTypeNode } from '../resolver/type-resolver.js';
import type { NameEnv } from '../resolver/type-resolver.js';
import { createLogger, logPerformance } from '../utils/logger.js';
import { BOOLEAN_DOMAIN, computeCoverage } from './match.js';
import type { ArmShape } from './match.js';
import { binaryResultType, describeOperandRequirement, unaryResultType } from './operators.js';
import { DuplicateSymbolError, ScopeStack } from './scope.js';
import type { LocalKind } from './scope.js';
import { TypeSystem, Types } from './types.js';
import type { Type, UserDefinedType } from './types.js';

const analyzerLogger = createLogger('analyzer');

interface Named {
  readonly name: string;
  readonly span: Span;
}

interface FunctionSignature {
  readonly params: readonly Type[];
  readonly ret: Type;
}

interface FunctionFrame {
  readonly returnType: Type | null;
}

function literalType(literal: Literal): Type {
  switch (literal.kind) {
    case 'Int':
      return Types.Int;
    case 'Float':
      return Types.Float;
    case 'String':
      return Types.String;
    case 'Bool':
      return Types.Boolean;
    case 'Money':
      return Types.Money;
    case 'Percent':
      return Types.Percent;
    case 'Date':
      return Types.Date;
    case 'Duration':
      return Types.Duration;
    case 'PassLiteral':
      return Types.Pass;
  }
}

function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  const fileA = a.file ?? '';
  const fileB = b.file ?? '';
  if (fileA !== fileB) return fileA < fileB ? -1 : 1;
  if (a.span.start.line !== b.span.start.line) return a.span.start.line - b.span.start.line;
  return a.span.start.col - b.span.start.col;
}

class SemanticAnalyzer {
  private readonly diagnostics: Diagnostic[] = [];
  private readonly locals = new ScopeStack();
  private readonly fieldTypeCache = new Map<string, Map<string, Type>>();
  private readonly signatureCache = new Map<string, FunctionSignature>();
  private module: Module | null = null;
  private env: NameEnv = moduleEnv('');
  /** 正在分析的模块级声明（名字引用图的起点） */
  private currentDecl: string | null = null;
  private frame: FunctionFrame | null = null;

  constructor(private readonly symbols: SymbolTable) {}

  run(modules: readonly Module[]): Diagnostic[] {
    for (const module of modules) {
      this.module = module;
      this.env = moduleEnv(module.id);
      analyzerLogger.debug('Analyzing module', { module: module.id });
      this.checkItems(module.program.items);
    }
    this.module = null;
    this.checkCyclicDefinitions();
    return this.diagnostics;
  }

  // ------------------------------------------------------------------
  // 诊断
  // ------------------------------------------------------------------

  private file(): string | undefined {
    return this.module?.path;
  }

  private error(code: DiagnosticCode, message: string, span: Span, related?: { span: Span; message: string }): void {
    const builder = DiagnosticBuilder.error(code).withMessage(message).withSpan(span).withFile(this.file());
    if (related) builder.withRelated(related.span, related.message, this.file());
    this.diagnostics.push(builder.build());
  }

  private warning(code: DiagnosticCode, message: string, span: Span): void {
    this.diagnostics.push(
      DiagnosticBuilder.warning(code).withMessage(message).withSpan(span).withFile(this.file()).build()
    );
  }

  private mismatch(expected: Type, actual: Type, span: Span, context: string): void {
    this.error(
      DiagnosticCode.S001_TypeMismatch,
      `Type mismatch in ${context}: expected '${TypeSystem.format(expected)}', found '${TypeSystem.format(actual)}'`,
      span
    );
  }

  private unresolved(message: string, span: Span): void {
    this.error(DiagnosticCode.S002_UnresolvedReference, message, span);
  }

  /** 同一层级内重复的名字：每个重复出现报告一次，并指向第一次出现 */
  private checkDuplicates(entries: readonly Named[], what: string, owner?: string): void {
    const seen = new Map<string, Named>();
    for (const entry of entries) {
      const first = seen.get(entry.name);
      if (first) {
        this.error(
          DiagnosticCode.S003_DuplicateDeclaration,
          `Duplicate ${what} '${entry.name}'${owner ? ` in ${owner}` : ''}`,
          entry.span,
          { span: first.span, message: `'${entry.name}' first declared here` }
        );
      } else {
        seen.set(entry.name, entry);
      }
    }
  }

  // ------------------------------------------------------------------
  // 名字与类型解析
  // ------------------------------------------------------------------

  private recordReference(target: ProgramSymbol): void {
    if (this.currentDecl === null || this.symbols.isFrozen) return;
    this.symbols.addReference(this.currentDecl, target.qualifiedName);
  }

  /** 由限定名还原符号所在的查找环境 */
  private envOf(symbol: ProgramSymbol): NameEnv {
    const parts = symbol.qualifiedName.split(QUALIFIER);
    const scopes: ProgramSymbol[] = [];
    for (let i = 1; i < parts.length - 1; i++) {
      const scope = this.symbols.get(qualify(...parts.slice(0, i + 1)));
      if (scope) scopes.push(scope);
    }
    return { moduleId: symbol.moduleId, scopes };
  }

  private ownSymbol(item: { readonly name: string }): ProgramSymbol | undefined {
    const symbol = lookupName(this.symbols, this.env, item.name);
    return symbol && symbol.node === item ? symbol : undefined;
  }

  private resolveType(node: TypeNode, env: NameEnv = this.env): Type {
    return resolveTypeNode(this.symbols, env, node, (named: NamedType, found) => {
      if (found) {
        this.unresolved(`'${named.name}' is a ${found.kind}, not a type`, named.span);
      } else {
        this.unresolved(`Unknown type '${named.name}'`, named.span);
      }
    });
  }

  private symbolOfType(t: Type): ProgramSymbol | undefined {
    return t.kind === 'UserDefined' ? this.symbols.get(t.qualifiedName) : undefined;
  }

  private structFieldTypes(symbol: ProgramSymbol): Map<string, Type> {
    const cached = this.fieldTypeCache.get(symbol.qualifiedName);
    if (cached) return cached;
    const fields = new Map<string, Type>();
    if (symbol.node.kind === 'Struct') {
      const env = this.envOf(symbol);
      for (const field of symbol.node.fields) {
        if (!fields.has(field.name)) fields.set(field.name, resolveTypeNode(this.symbols, env, field.type));
      }
    }
    this.fieldTypeCache.set(symbol.qualifiedName, fields);
    return fields;
  }

  private enumVariants(symbol: ProgramSymbol): string[] {
    if (symbol.node.kind !== 'Enum') return [];
    return [...new Set(symbol.node.variants.map(v => v.name))];
  }

  private signatureOf(symbol: ProgramSymbol): FunctionSignature {
    const cached = this.signatureCache.get(symbol.qualifiedName);
    if (cached) return cached;
    const env = this.envOf(symbol);
    const node = symbol.node;
    const signature: FunctionSignature =
      node.kind === 'Function'
        ? {
            params: node.params.map(p => resolveTypeNode(this.symbols, env, p.type)),
            ret: node.returnType ? resolveTypeNode(this.symbols, env, node.returnType) : Types.Unknown,
          }
        : { params: [], ret: Types.Unknown };
    this.signatureCache.set(symbol.qualifiedName, signature);
    return signature;
  }

  /** 期望类型中唯一的结构体类型（用于匿名结构体字面量） */
  private expectedStruct(expected: Type | undefined): UserDefinedType | undefined {
    if (!expected) return undefined;
    const candidates = expected.kind === 'Union' ? expected.members : [expected];
    const structs = candidates.filter(
      (t): t is UserDefinedType => t.kind === 'UserDefined' && this.symbolOfType(t)?.kind === 'struct'
    );
    return structs.length === 1 ? structs[0] : undefined;
  }

  // ------------------------------------------------------------------
  // 声明
  // ------------------------------------------------------------------

  private checkItems(items: readonly Item[]): void {
    const declared: Named[] = [];
    for (const item of items) {
      if (
        item.kind === 'Scope' ||
        item.kind === 'Struct' ||
        item.kind === 'Enum' ||
        item.kind === 'Function' ||
        item.kind === 'VariableDecl'
      ) {
        declared.push({ name: item.name, span: item.nameSpan });
      }
    }
    this.checkDuplicates(declared, 'declaration');
    for (const item of items) this.checkItem(item);
  }

  private checkItem(item: Item): void {
    switch (item.kind) {
      case 'Referencing':
        return;
      case 'Scope': {
        const symbol = this.ownSymbol(item);
        const saved = this.env;
        if (symbol) this.env = enterScopeEnv(this.env, symbol);
        this.checkItems(item.items);
        this.env = saved;
        return;
      }
      case 'Struct':
        this.checkStruct(item);
        return;
      case 'Enum':
        this.checkEnum(item);
        return;
      case 'Function':
        this.withDecl(item, () => this.checkFunction(item));
        return;
      case 'VariableDecl':
        this.withDecl(item, () => this.checkVariableDecl(item));
        return;
      case 'ExprStmt':
        this.infer(item.expr);
        return;
    }
  }

  private withDecl(item: { readonly name: string }, body: () => void): void {
    const saved = this.currentDecl;
    this.currentDecl = this.ownSymbol(item)?.qualifiedName ?? null;
    try {
      body();
    } finally {
      this.currentDecl = saved;
    }
  }

  private checkStruct(def: StructDef): void {
    this.checkDuplicates(
      def.fields.map(f => ({ name: f.name, span: f.span })),
      'field',
      `struct '${def.name}'`
    );
    for (const field of def.fields) this.resolveType(field.type);
  }

  private checkEnum(def: EnumDef): void {
    this.checkDuplicates(
      def.variants.map(v => ({ name: v.name, span: v.span })),
      'variant',
      `enum '${def.name}'`
    );
  }

  private checkFunction(def: FunctionDef): void {
    const params = def.params.map(p => ({ param: p, type: this.resolveType(p.type) }));
    const returnType = def.returnType ? this.resolveType(def.returnType) : null;
    const savedFrame = this.frame;
    this.frame = { returnType };
    try {
      this.locals.within(() => {
        for (const { param, type } of params) {
          this.defineLocal(param.name, type, 'param', param.span);
        }
        for (const statement of def.body.statements) this.checkStatement(statement);
      });
    } finally {
      this.frame = savedFrame;
    }

    if (
      returnType &&
      returnType.kind !== 'Pass' &&
      !TypeSystem.isUnknown(returnType) &&
      !def.body.statements.some(s => s.kind === 'Return')
    ) {
      this.warning(
        DiagnosticCode.S009_MissingReturn,
        `Function '${def.name}' declares return type '${TypeSystem.format(returnType)}' but never returns a value`,
        def.nameSpan
      );
    }
  }

  private defineLocal(name: string, type: Type, kind: LocalKind, span: Span): void {
    try {
      this.locals.define(name, type, kind, span);
    } catch (error) {
      if (!(error instanceof DuplicateSymbolError)) throw error;
      this.error(DiagnosticCode.S003_DuplicateDeclaration, `Duplicate ${kind} '${name}'`, span, {
        span: error.existing.span,
        message: `'${name}' first declared here`,
      });
    }
  }

  private checkVariableDecl(decl: VariableDecl): Type {
    const declared = this.resolveType(decl.type);
    if (decl.value) {
      const actual = this.infer(decl.value, declared);
      if (!TypeSystem.isAssignable(declared, actual)) {
        this.mismatch(declared, actual, decl.value.span, `declaration of '${decl.name}'`);
      }
    }
    return declared;
  }

  private checkStatement(s: Statement): void {
    switch (s.kind) {
      case 'VariableDecl': {
        const declared = this.checkVariableDecl(s);
        this.defineLocal(s.name, declared, 'variable', s.nameSpan);
        return;
      }
      case 'Return': {
        const expected = this.frame?.returnType ?? undefined;
        const actual = this.infer(s.expr, expected);
        if (expected && !TypeSystem.isAssignable(expected, actual)) {
          this.mismatch(expected, actual, s.expr.span, 'return value');
        }
        return;
      }
      case 'PassStmt':
        return;
      case 'ExprStmt':
        this.infer(s.expr);
        return;
    }
  }

  // ------------------------------------------------------------------
  // 表达式
  // ------------------------------------------------------------------

  /**
   * 自底向上推断表达式类型。expected 仅用于确定匿名结构体字面量的类型。
   */
  infer(e: Expression, expected?: Type): Type {
    switch (e.kind) {
      case 'Int':
      case 'Float':
      case 'String':
      case 'Bool':
      case 'Money':
      case 'Percent':
      case 'Date':
      case 'Duration':
      case 'PassLiteral':
        return literalType(e);
      case 'Name':
        return this.inferName(e.name, e.span);
      case 'FieldAccess':
        return this.inferFieldAccess(e);
      case 'Index': {
        const target = this.infer(e.target);
        const index = this.infer(e.index);
        if (target.kind === 'String') {
          if (!TypeSystem.isAssignable(Types.Int, index)) this.mismatch(Types.Int, index, e.index.span, 'index');
          return Types.String;
        }
        if (!TypeSystem.isUnknown(target)) {
          this.error(
            DiagnosticCode.S001_TypeMismatch,
            `Type '${TypeSystem.format(target)}' cannot be indexed`,
            e.target.span
          );
        }
        return Types.Unknown;
      }
      case 'Binary':
        return this.inferBinary(e);
      case 'Unary':
        return this.inferUnary(e);
      case 'Call':
        return this.inferCall(e);
      case 'StructLiteral':
        return this.inferStructLiteral(e, expected);
      case 'Match':
        return this.inferMatch(e, expected);
    }
  }

  private inferName(name: string, span: Span): Type {
    const local = this.locals.lookup(name);
    if (local) return local.type;
    const symbol = lookupName(this.symbols, this.env, name);
    if (!symbol) {
      this.unresolved(`Unresolved reference '${name}'`, span);
      return Types.Unknown;
    }
    return this.valueOf(symbol);
  }

  /** 把模块级符号当作值使用时的类型 */
  private valueOf(symbol: ProgramSymbol): Type {
    this.recordReference(symbol);
    return symbol.kind === 'variable' ? symbol.type : Types.Unknown;
  }

  /** `a.b.c` 形式且首段不是局部变量时返回名字路径 */
  private staticPath(e: Expression): string[] | null {
    if (e.kind === 'Name') return this.locals.lookup(e.name) ? null : [e.name];
    if (e.kind === 'FieldAccess') {
      const base = this.staticPath(e.target);
      return base ? [...base, e.field] : null;
    }
    return null;
  }

  private inferFieldAccess(e: FieldAccess): Type {
    const path = this.staticPath(e.target);
    const owner = path ? lookupPath(this.symbols, this.env, path) : undefined;
    if (owner && owner.kind === 'enum') {
      if (!this.enumVariants(owner).includes(e.field)) {
        this.unresolved(`Enum '${owner.name}' has no variant '${e.field}'`, e.fieldSpan);
        return Types.Unknown;
      }
      this.recordReference(owner);
      return owner.type;
    }
    if (owner && owner.kind === 'scope') {
      const member = owner.members.get(e.field);
      if (!member) {
        this.unresolved(`Scope '${owner.name}' has no member '${e.field}'`, e.fieldSpan);
        return Types.Unknown;
      }
      return this.valueOf(member);
    }

    const target = this.infer(e.target);
    if (TypeSystem.isUnknown(target)) return Types.Unknown;
    const structSymbol = this.symbolOfType(target);
    if (structSymbol && structSymbol.kind === 'struct') {
      const fieldType = this.structFieldTypes(structSymbol).get(e.field);
      if (fieldType) return fieldType;
      this.unresolved(`Struct '${structSymbol.name}' has no field '${e.field}'`, e.fieldSpan);
      return Types.Unknown;
    }
    this.unresolved(`Type '${TypeSystem.format(target)}' has no field '${e.field}'`, e.fieldSpan);
    return Types.Unknown;
  }

  private inferBinary(e: BinaryExpr): Type {
    const left = this.infer(e.left);
    const right = this.infer(e.right);
    const result = binaryResultType(e.op, left, right);
    if (result) return result;
    this.error(
      DiagnosticCode.S001_TypeMismatch,
      `Operator '${e.op}' cannot be applied to '${TypeSystem.format(left)}' and '${TypeSystem.format(right)}'; expected ${describeOperandRequirement(e.op)}`,
      e.span
    );
    return binaryResultType(e.op, Types.Unknown, Types.Unknown) ?? Types.Unknown;
  }

  private inferUnary(e: UnaryExpr): Type {
    const operand = this.infer(e.operand);
    const result = unaryResultType(e.op, operand);
    if (result) return result;
    this.error(
      DiagnosticCode.S001_TypeMismatch,
      `Operator '${e.op}' cannot be applied to '${TypeSystem.format(operand)}'; expected ${describeOperandRequirement(e.op, true)}`,
      e.span
    );
    return e.op === '!' ? Types.Boolean : Types.Unknown;
  }

  private inferCall(e: CallExpr): Type {
    const path = this.staticPath(e.callee);
    const callee = path ? lookupPath(this.symbols, this.env, path) : undefined;
    if (callee && callee.kind === 'function') {
      this.recordReference(callee);
      const signature = this.signatureOf(callee);
      if (signature.params.length !== e.args.length) {
        this.error(
          DiagnosticCode.S007_ArityMismatch,
          `Function '${callee.name}' expects ${signature.params.length} argument(s), found ${e.args.length}`,
          e.span
        );
      }
      e.args.forEach((arg, i) => {
        const paramType = signature.params[i];
        const actual = this.infer(arg, paramType);
        if (paramType && !TypeSystem.isAssignable(paramType, actual)) {
          this.mismatch(paramType, actual, arg.span, `argument ${i + 1} of '${callee.name}'`);
        }
      });
      return signature.ret;
    }

    if (callee) {
      this.recordReference(callee);
      this.error(DiagnosticCode.S001_TypeMismatch, `'${callee.name}' is a ${callee.kind}, not a function`, e.callee.span);
    } else {
      const calleeType = this.infer(e.callee);
      if (!TypeSystem.isUnknown(calleeType)) {
        this.error(
          DiagnosticCode.S001_TypeMismatch,
          `Expression of type '${TypeSystem.format(calleeType)}' is not callable`,
          e.callee.span
        );
      }
    }
    for (const arg of e.args) this.infer(arg);
    return Types.Unknown;
  }

  private inferStructLiteral(e: StructLiteral, expected: Type | undefined): Type {
    this.checkDuplicates(
      e.fields.map(f => ({ name: f.name, span: f.span })),
      'field initializer'
    );

    let structType: UserDefinedType | undefined;
    if (e.typeName !== null) {
      const symbol = lookupPath(this.symbols, this.env, e.typeName.split('.'));
      if (symbol && symbol.kind === 'struct' && symbol.type.kind === 'UserDefined') {
        this.recordReference(symbol);
        structType = symbol.type;
      } else {
        this.unresolved(
          symbol ? `'${e.typeName}' is a ${symbol.kind}, not a struct` : `Unknown struct '${e.typeName}'`,
          e.span
        );
      }
    } else {
      structType = this.expectedStruct(expected);
      if (!structType && expected && !TypeSystem.isUnknown(expected)) {
        this.error(
          DiagnosticCode.S001_TypeMismatch,
          `Anonymous struct literal cannot be used where '${TypeSystem.format(expected)}' is expected`,
          e.span
        );
      }
    }

    const symbol = structType ? this.symbolOfType(structType) : undefined;
    if (!structType || !symbol) {
      for (const f of e.fields) this.infer(f.value);
      return Types.Unknown;
    }

    const fieldTypes = this.structFieldTypes(symbol);
    for (const f of e.fields) {
      const fieldType = fieldTypes.get(f.name);
      const actual = this.infer(f.value, fieldType);
      if (!fieldType) {
        this.unresolved(`Struct '${symbol.name}' has no field '${f.name}'`, f.span);
      } else if (!TypeSystem.isAssignable(fieldType, actual)) {
        this.mismatch(fieldType, actual, f.value.span, `field '${f.name}'`);
      }
    }
    const given = new Set(e.fields.map(f => f.name));
    const missing = [...fieldTypes.keys()].filter(name => !given.has(name));
    if (missing.length > 0) {
      this.error(
        DiagnosticCode.S006_MissingField,
        `Missing field(s) ${missing.map(m => `'${m}'`).join(', ')} in '${symbol.name}' literal`,
        e.span
      );
    }
    return structType;
  }

  // ------------------------------------------------------------------
  // match
  // ------------------------------------------------------------------

  private inferMatch(e: MatchExpr, expected: Type | undefined): Type {
    const scrutineeType = e.scrutinee ? this.infer(e.scrutinee) : Types.Boolean;
    const shapes: ArmShape[] = [];
    const results: Type[] = [];

    for (const arm of e.arms) {
      this.locals.within(() => {
        let shape = this.checkPattern(arm.pattern, scrutineeType);
        if (arm.guard) {
          const guardType = this.infer(arm.guard);
          if (!TypeSystem.isAssignable(Types.Boolean, guardType)) {
            this.mismatch(Types.Boolean, guardType, arm.guard.span, 'match guard');
          }
          shape = { kind: 'partial' };
        }
        shapes.push(shape);
        results.push(this.infer(arm.consequence, expected));
      });
    }

    const coverage = computeCoverage(shapes, this.domainOf(scrutineeType));
    for (const index of coverage.unreachable) {
      const arm = e.arms[index];
      if (arm) {
        this.warning(
          DiagnosticCode.S004_UnreachableArm,
          'Unreachable match arm: earlier arms already match every value it can match',
          arm.span
        );
      }
    }
    if (!coverage.exhaustive && !TypeSystem.isUnknown(scrutineeType)) {
      const message =
        coverage.missing.length > 0
          ? `Match is not exhaustive: missing ${coverage.missing.map(m => `'${m}'`).join(', ')}`
          : `Match on '${TypeSystem.format(scrutineeType)}' is not exhaustive; add a 'case _' arm`;
      this.warning(DiagnosticCode.S005_InexhaustiveMatch, message, e.span);
    }

    return results.length > 0 ? TypeSystem.union(results) : Types.Unknown;
  }

  private domainOf(t: Type): readonly string[] | null {
    if (t.kind === 'Boolean') return BOOLEAN_DOMAIN;
    const symbol = this.symbolOfType(t);
    if (symbol && symbol.kind === 'enum') return this.enumVariants(symbol);
    return null;
  }

  private patternMismatch(patternType: Type, scrutineeType: Type, span: Span): boolean {
    if (TypeSystem.isComparable(scrutineeType, patternType)) return false;
    this.error(
      DiagnosticCode.S001_TypeMismatch,
      `Pattern of type '${TypeSystem.format(patternType)}' cannot match a value of type '${TypeSystem.format(scrutineeType)}'`,
      span
    );
    return true;
  }

  /**
   * 检查模式与被匹配值的类型，定义模式中的绑定，并返回分支形状。
   */
  private checkPattern(p: Pattern, scrutineeType: Type): ArmShape {
    switch (p.kind) {
      case 'WildcardPattern':
        return { kind: 'catchAll' };
      case 'LiteralPattern': {
        const type = literalType(p.literal);
        if (this.patternMismatch(type, scrutineeType, p.span)) return { kind: 'partial' };
        if (p.literal.kind === 'Bool') return { kind: 'value', key: p.literal.value ? 'TRUE' : 'FALSE' };
        return { kind: 'value', key: `${p.literal.kind}:${formatLiteral(p.literal)}` };
      }
      case 'NamePattern': {
        const enumSymbol = this.symbolOfType(scrutineeType);
        if (enumSymbol && enumSymbol.kind === 'enum' && this.enumVariants(enumSymbol).includes(p.name)) {
          return { kind: 'value', key: p.name };
        }
        this.defineLocal(p.name, scrutineeType, 'binding', p.span);
        return { kind: 'catchAll' };
      }
      case 'VariantPattern': {
        const symbol = lookupPath(this.symbols, this.env, p.enumName.split('.'));
        if (!symbol || symbol.kind !== 'enum') {
          this.unresolved(symbol ? `'${p.enumName}' is a ${symbol.kind}, not an enum` : `Unknown enum '${p.enumName}'`, p.span);
          return { kind: 'partial' };
        }
        this.recordReference(symbol);
        if (!this.enumVariants(symbol).includes(p.variant)) {
          this.unresolved(`Enum '${symbol.name}' has no variant '${p.variant}'`, p.span);
          return { kind: 'partial' };
        }
        if (this.patternMismatch(symbol.type, scrutineeType, p.span)) return { kind: 'partial' };
        return TypeSystem.equals(symbol.type, scrutineeType) ? { kind: 'value', key: p.variant } : { kind: 'partial' };
      }
      case 'StructPattern': {
        const symbol = lookupPath(this.symbols, this.env, p.typeName.split('.'));
        if (!symbol || symbol.kind !== 'struct') {
          this.unresolved(symbol ? `'${p.typeName}' is a ${symbol.kind}, not a struct` : `Unknown struct '${p.typeName}'`, p.span);
          return { kind: 'partial' };
        }
        this.recordReference(symbol);
        const mismatched = this.patternMismatch(symbol.type, scrutineeType, p.span);
        this.checkDuplicates(
          p.fields.map(f => ({ name: f.name, span: f.span })),
          'field pattern'
        );
        const fieldTypes = this.structFieldTypes(symbol);
        let irrefutable = !mismatched && TypeSystem.equals(symbol.type, scrutineeType);
        for (const field of p.fields) {
          const fieldType = fieldTypes.get(field.name);
          if (!fieldType) {
            this.unresolved(`Struct '${symbol.name}' has no field '${field.name}'`, field.span);
            irrefutable = false;
            continue;
          }
          if (field.pattern) {
            const sub = this.checkPattern(field.pattern, fieldType);
            if (sub.kind !== 'catchAll') irrefutable = false;
          } else {
            this.defineLocal(field.name, fieldType, 'binding', field.span);
          }
        }
        return irrefutable ? { kind: 'catchAll' } : { kind: 'partial' };
      }
    }
  }

  // ------------------------------------------------------------------
  // 名字引用图
  // ------------------------------------------------------------------

  /** 模块级变量之间的循环定义（函数递归允许） */
  private checkCyclicDefinitions(): void {
    const reported = new Set<string>();
    for (const cycle of this.symbols.referenceCycles()) {
      const members = cycle.slice(0, -1).map(name => this.symbols.get(name));
      const variables = members.filter((s): s is ProgramSymbol => s !== undefined && s.kind === 'variable');
      if (variables.length === 0 || variables.length !== members.length) continue;
      const key = variables.map(v => v.qualifiedName).sort().join('|');
      if (reported.has(key)) continue;
      reported.add(key);
      const [first] = variables;
      if (!first) continue;
      const names = [...variables.map(v => v.name), first.name].join(' -> ');
      this.diagnostics.push(
        DiagnosticBuilder.error(DiagnosticCode.S008_CyclicDefinition)
          .withMessage(`Cyclic definition: ${names}`)
          .withSpan(first.span)
          .withFile(first.file)
          .build()
      );
    }
  }
}

/**
 * 分析已解析的程序，返回全部诊断（含各模块的可恢复语法错误），按文件与位置排序。
 * 返回空数组表示程序有效。分析完成后符号表被冻结。
 */
export function analyze(program: ResolvedProgram): Diagnostic[] {
  const startTime = performance.now();
  const semantic = new SemanticAnalyzer(program.symbols).run(program.modules);
  program.symbols.freeze();
  const all = [...program.diagnostics, ...semantic].sort(compareDiagnostics);
  logPerformance({
    component: 'analyzer',
    operation: 'analyze',
    duration: performance.now() - startTime,
    metadata: { modules: program.modules.length, diagnostics: all.length },
  });
  return all;
}
