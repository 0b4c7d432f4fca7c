import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { lex } from '../../../src/frontend/lexer.js';
import { parse } from '../../../src/parser.js';
import type { ParseOptions, ParseResult } from '../../../src/parser.js';
import { Node } from '../../../src/ast/ast.js';
import { stripSpans } from '../../../src/ast/printer.js';
import type { Span } from '../../../src/types.js';

const NO_SPAN: Span = { start: { line: 0, col: 0 }, end: { line: 0, col: 0 } };

function parseSource(source: string, options: ParseOptions = {}): ParseResult {
  return parse(lex(source), options);
}

function itemsOf(source: string): unknown {
  const { program, diagnostics } = parseSource(source);
  assert.deepEqual(diagnostics, []);
  return stripSpans(program.items);
}

describe('语法分析器：声明', () => {
  it('应该解析 referencing 导入（模块路径可含关键字段）', () => {
    assert.deepEqual(
      itemsOf('referencing Fine, Severity from lib/penalties;\nreferencing Theft from statute/theft;'),
      stripSpans([
        Node.Referencing([Node.ImportedName('Fine'), Node.ImportedName('Severity')], 'lib/penalties'),
        Node.Referencing([Node.ImportedName('Theft')], 'statute/theft'),
      ])
    );
  });

  it('结构体字段可用逗号或分号分隔，类型可为联合类型', () => {
    assert.deepEqual(
      itemsOf('struct Offence { string name, money fine; int || pass points }'),
      stripSpans([
        Node.Struct('Offence', NO_SPAN, [
          Node.Field(Node.BuiltinType('string'), 'name'),
          Node.Field(Node.BuiltinType('money'), 'fine'),
          Node.Field(Node.UnionType([Node.BuiltinType('int'), Node.BuiltinType('pass')]), 'points'),
        ]),
      ])
    );
  });

  it('枚举允许尾随逗号，`}` 后的分号可选', () => {
    assert.deepEqual(
      itemsOf('enum Severity { Minor, Major, };'),
      stripSpans([Node.Enum('Severity', NO_SPAN, [Node.Variant('Minor'), Node.Variant('Major')])])
    );
  });

  it('应该解析带返回类型与参数的函数', () => {
    assert.deepEqual(
      itemsOf('money func fine(Severity s, integer count) {\n  := $100;\n}'),
      stripSpans([
        Node.Function(
          'fine',
          NO_SPAN,
          [
            Node.Parameter(Node.NamedType('Severity'), 's'),
            Node.Parameter(Node.BuiltinType('integer'), 'count'),
          ],
          Node.BuiltinType('money'),
          Node.Block([Node.Return(Node.Money('$', '100'), 'assign')])
        ),
      ])
    );
  });

  it('省略返回类型的函数 returnType 为 null', () => {
    assert.deepEqual(
      itemsOf('func noop() { pass; }'),
      stripSpans([Node.Function('noop', NO_SPAN, [], null, Node.Block([Node.PassStmt()]))])
    );
  });

  it('应该解析 scope 与 statute 块及其成员', () => {
    assert.deepEqual(
      itemsOf('statute Theft {\n  struct Item { string name }\n  int limit := 5;\n}\nscope Empty {}'),
      stripSpans([
        Node.Scope('statute', 'Theft', NO_SPAN, [
          Node.Struct('Item', NO_SPAN, [Node.Field(Node.BuiltinType('string'), 'name')]),
          Node.VariableDecl(Node.BuiltinType('int'), 'limit', NO_SPAN, Node.Int(5)),
        ]),
        Node.Scope('scope', 'Empty', NO_SPAN, []),
      ])
    );
  });

  it('应该区分变量声明与表达式语句', () => {
    assert.deepEqual(
      itemsOf('Penalties.Severity s;\nfine(s);'),
      stripSpans([
        Node.VariableDecl(Node.NamedType('Penalties.Severity'), 's', NO_SPAN, null),
        Node.ExprStmt(Node.Call(Node.Name('fine'), [Node.Name('s')])),
      ])
    );
  });

  it('应该解析 return 与 := 两种返回语句', () => {
    assert.deepEqual(
      itemsOf('func f() { return 1; := 2; }'),
      stripSpans([
        Node.Function(
          'f',
          NO_SPAN,
          [],
          null,
          Node.Block([Node.Return(Node.Int(1), 'return'), Node.Return(Node.Int(2), 'assign')])
        ),
      ])
    );
  });

  it('应该解析带 consequence 的 match 表达式', () => {
    const source = [
      'money func fine(Severity s) {',
      '  return match s {',
      '    case Minor := consequence $100;',
      '    case _ := $0;',
      '  };',
      '}',
    ].join('\n');
    assert.deepEqual(
      itemsOf(source),
      stripSpans([
        Node.Function(
          'fine',
          NO_SPAN,
          [Node.Parameter(Node.NamedType('Severity'), 's')],
          Node.BuiltinType('money'),
          Node.Block([
            Node.Return(
              Node.Match(Node.Name('s'), [
                Node.MatchArm(Node.NamePattern('Minor'), null, Node.Money('$', '100')),
                Node.MatchArm(Node.WildcardPattern(), null, Node.Money('$', '0')),
              ])
            ),
          ])
        ),
      ])
    );
  });

  it('`}` 结尾的语句可以省略分号', () => {
    const { program, diagnostics } = parseSource('int x := match y { case _ := 1; }\nint z := 2;');
    assert.deepEqual(diagnostics, []);
    assert.deepEqual(
      program.items.map(i => i.kind),
      ['VariableDecl', 'VariableDecl']
    );
  });
});

describe('语法分析器：位置信息', () => {
  it('Program 记录文件路径，区间从第一个 token 到最后一个非 EOF token', () => {
    const { program } = parseSource('int x := 1;', { file: 'a.yh' });
    assert.equal(program.file, 'a.yh');
    assert.deepEqual(program.span, { start: { line: 1, col: 1 }, end: { line: 1, col: 12 } });
  });

  it('未给出文件路径时 file 为 null', () => {
    assert.equal(parseSource('').program.file, null);
  });

  it('声明的 span 覆盖整个语句，nameSpan 只覆盖名字', () => {
    const { program } = parseSource('int x := 1;');
    const decl = program.items[0];
    assert.ok(decl && decl.kind === 'VariableDecl');
    assert.deepEqual(decl.span, { start: { line: 1, col: 1 }, end: { line: 1, col: 12 } });
    assert.deepEqual(decl.nameSpan, { start: { line: 1, col: 5 }, end: { line: 1, col: 6 } });
  });

  it('跨行声明的 span 从首个 token 开始到结尾 `}`', () => {
    const { program } = parseSource('enum E {\n  A,\n  B\n}');
    const decl = program.items[0];
    assert.ok(decl && decl.kind === 'Enum');
    assert.deepEqual(decl.span, { start: { line: 1, col: 1 }, end: { line: 4, col: 2 } });
    assert.deepEqual(
      decl.variants.map(v => v.span.start),
      [
        { line: 2, col: 3 },
        { line: 3, col: 3 },
      ]
    );
  });

  it('字段访问记录字段名的 fieldSpan', () => {
    const { program } = parseSource('a.total;');
    const stmt = program.items[0];
    assert.ok(stmt && stmt.kind === 'ExprStmt' && stmt.expr.kind === 'FieldAccess');
    assert.deepEqual(stmt.expr.fieldSpan, { start: { line: 1, col: 3 }, end: { line: 1, col: 8 } });
    assert.deepEqual(stmt.expr.span, { start: { line: 1, col: 1 }, end: { line: 1, col: 8 } });
  });

  it('忽略词法分析保留的注释 token', () => {
    const tokens = lex('// header\nint x := 1; /* trailing */', { keepComments: true });
    const { program, diagnostics } = parse(tokens);
    assert.deepEqual(diagnostics, []);
    assert.equal(program.items.length, 1);
  });
});
