import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { lex } from '../../../src/frontend/lexer.js';
import { parse } from '../../../src/parser.js';
import type { ParseResult } from '../../../src/parser.js';
import { DiagnosticCode, ParseError } from '../../../src/diagnostics/diagnostics.js';

function parseSource(source: string): ParseResult {
  return parse(lex(source));
}

function parseErrorOf(source: string): ParseError {
  try {
    parse(lex(source), { recover: false });
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  assert.fail(`expected a ParseError for ${JSON.stringify(source)}`);
}

describe('语法错误恢复', () => {
  it('缺少分号时报告 P006 并继续解析', () => {
    const { program, diagnostics } = parseSource('int x := 1\nint y := 2;');
    assert.deepEqual(
      program.items.map(i => (i.kind === 'VariableDecl' ? i.name : i.kind)),
      ['x', 'y']
    );
    assert.equal(diagnostics.length, 1);
    const [diag] = diagnostics;
    assert.equal(diag?.code, DiagnosticCode.P006_MissingTerminator);
    assert.equal(diag?.message, "Expected ';' after declaration, found 'int'");
    assert.deepEqual(diag?.span, { start: { line: 1, col: 11 }, end: { line: 1, col: 12 } });
    assert.deepEqual(
      diag?.fixIts?.map(f => [f.description, f.replacement]),
      [["Add ';'", ';']]
    );
  });

  it('跳到下一个分号后继续解析', () => {
    const { program, diagnostics } = parseSource('int x := ;\nint y := 2;');
    assert.deepEqual(
      diagnostics.map(d => [d.code, d.message]),
      [[DiagnosticCode.P003_ExpectedExpression, "Expected expression, found ';'"]]
    );
    assert.deepEqual(diagnostics[0]?.span, { start: { line: 1, col: 10 }, end: { line: 1, col: 11 } });
    assert.deepEqual(
      program.items.map(i => (i.kind === 'VariableDecl' ? i.name : i.kind)),
      ['y']
    );
  });

  it('遇到可开始新条目的关键字时停止跳过', () => {
    const { program, diagnostics } = parseSource('int x := 1 + ) struct A {}');
    assert.deepEqual(
      diagnostics.map(d => d.message),
      ["Expected expression, found ')'"]
    );
    assert.deepEqual(
      program.items.map(i => i.kind),
      ['Struct']
    );
  });

  it('顶层多余的 `}` 被消费后继续', () => {
    const { program, diagnostics } = parseSource('}\nint a := 1;');
    assert.deepEqual(
      diagnostics.map(d => d.message),
      ["Expected expression, found '}'"]
    );
    assert.equal(program.items.length, 1);
  });

  it('函数体内的错误不影响后续语句与条目', () => {
    const { program, diagnostics } = parseSource('func f() { int := 1; return 2; }\nint z := 3;');
    assert.deepEqual(
      diagnostics.map(d => [d.code, d.message]),
      [[DiagnosticCode.P007_ExpectedIdentifier, "Expected identifier, found ':='"]]
    );
    const [fn, z] = program.items;
    assert.ok(fn && fn.kind === 'Function');
    assert.deepEqual(
      fn.body.statements.map(s => s.kind),
      ['Return']
    );
    assert.ok(z && z.kind === 'VariableDecl');
    assert.equal(z.name, 'z');
  });

  it('scope 内的 referencing 被报告并丢弃', () => {
    const { program, diagnostics } = parseSource('scope S {\n  referencing A from b;\n  int x := 1;\n}');
    assert.deepEqual(
      diagnostics.map(d => [d.code, d.message]),
      [
        [
          DiagnosticCode.P002_UnexpectedToken,
          "Unexpected 'referencing' inside a scope block; move it to the top of the file",
        ],
      ]
    );
    assert.deepEqual(diagnostics[0]?.span, { start: { line: 2, col: 3 }, end: { line: 2, col: 14 } });
    const scope = program.items[0];
    assert.ok(scope && scope.kind === 'Scope');
    assert.deepEqual(
      scope.items.map(i => i.kind),
      ['VariableDecl']
    );
  });

  it('match 主体中缺少 case 时报告期望内容', () => {
    const { diagnostics } = parseSource('int x := match y { 1 };');
    assert.deepEqual(
      diagnostics.map(d => [d.code, d.message]),
      [
        [DiagnosticCode.P001_ExpectedToken, "Expected 'case' or '}', found '1'"],
        [DiagnosticCode.P003_ExpectedExpression, "Expected expression, found ';'"],
      ]
    );
  });

  it('结构体字段出错时只丢弃该字段', () => {
    const { program, diagnostics } = parseSource('struct P { int a, 5 b, string c }\nint x := 1;');
    assert.deepEqual(
      diagnostics.map(d => [d.code, d.message, d.span.start.col]),
      [[DiagnosticCode.P004_ExpectedType, "Expected type, found '5'", 19]]
    );
    const [struct, decl] = program.items;
    assert.ok(struct && struct.kind === 'Struct');
    assert.deepEqual(
      struct.fields.map(f => f.name),
      ['a', 'c']
    );
    assert.equal(decl?.kind, 'VariableDecl');
    assert.equal(program.items.length, 2);
  });

  it('一个文件中可以收集多个错误', () => {
    const { program, diagnostics } = parseSource('int a := ;\nint b := );\nint c := 3;');
    assert.deepEqual(
      diagnostics.map(d => d.span.start.line),
      [1, 2]
    );
    assert.equal(program.items.length, 1);
  });
});

describe('非恢复模式', () => {
  it('第一个语法错误以 ParseError 抛出', () => {
    const error = parseErrorOf('int x := ;\nint y := ;');
    assert.equal(error.diagnostic.code, DiagnosticCode.P003_ExpectedExpression);
    assert.equal(error.found, "';'");
    assert.equal(error.diagnostic.span.start.line, 1);
  });

  it('缺少分号也会抛出', () => {
    const error = parseErrorOf('int x := 1');
    assert.equal(error.diagnostic.code, DiagnosticCode.P006_MissingTerminator);
    assert.equal(error.diagnostic.message, "Expected ';' after declaration, found end of input");
  });

  it('缺少类型时报告 P004', () => {
    const error = parseErrorOf('struct A { 1 x }');
    assert.equal(error.diagnostic.code, DiagnosticCode.P004_ExpectedType);
    assert.equal(error.diagnostic.message, "Expected type, found '1'");
  });

  it('无效模式报告 P005', () => {
    const error = parseErrorOf('match x { case := 1; }');
    assert.equal(error.diagnostic.code, DiagnosticCode.P005_ExpectedPattern);
    assert.equal(error.diagnostic.message, "Expected pattern, found ':='");
  });
});
