import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import * as fc from 'fast-check';
import { lex } from '../../src/frontend/lexer.js';
import { BOOLEAN_WORDS, DURATION_UNITS, KEYWORDS, TYPE_KEYWORDS } from '../../src/frontend/tokens.js';
import { parse } from '../../src/parser.js';
import { printProgram, stripSpans } from '../../src/ast/printer.js';
import { LexError } from '../../src/diagnostics/diagnostics.js';
import { TokenKind } from '../../src/types.js';
import type { Position, Program, Token } from '../../src/types.js';

const RESERVED = new Set<string>([...KEYWORDS, ...TYPE_KEYWORDS, ...BOOLEAN_WORDS.keys(), ...DURATION_UNITS.keys()]);

const lowerIdent = fc.stringMatching(/^[a-z][a-zA-Z0-9]{0,6}$/).filter(s => !RESERVED.has(s));
const typeName = fc.stringMatching(/^[A-Z][a-zA-Z0-9]{0,6}$/).filter(s => !RESERVED.has(s));

const pad = (n: number, width: number): string => String(n).padStart(width, '0');

const floatText = fc.oneof(
  fc.tuple(fc.stringMatching(/^[0-9]{1,22}$/), fc.stringMatching(/^[0-9]{1,8}$/)).map(([w, f]) => `${w}.${f}`),
  // 小于 1e-6 的值，String() 会给出指数写法
  fc.tuple(fc.integer({ min: 6, max: 20 }), fc.stringMatching(/^[1-9][0-9]{0,4}$/)).map(
    ([zeros, digits]) => `0.${'0'.repeat(zeros)}${digits}`
  )
);

const moneyText = fc.tuple(
  fc.constantFrom('$', '£', '€'),
  fc.nat(10_000_000),
  fc.option(fc.stringMatching(/^[0-9]{2}$/), { nil: undefined })
).map(([currency, amount, cents]) => `${currency}${withThousands(amount)}${cents === undefined ? '' : `.${cents}`}`);

const durationUnit = fc.constantFrom(...DURATION_UNITS.keys());
const durationText = fc
  .array(fc.tuple(fc.nat(500), durationUnit), { minLength: 1, maxLength: 3 })
  .map(parts => parts.map(([n, unit]) => `${n} ${unit}`).join(', '));

const dateText = fc
  .tuple(fc.integer({ min: 1000, max: 9999 }), fc.integer({ min: 1, max: 12 }), fc.integer({ min: 1, max: 28 }))
  .map(([y, m, d]) => `${y}-${pad(m, 2)}-${pad(d, 2)}`);

const stringText = fc
  .array(fc.constantFrom('a', 'z', ' ', '罚', '\\n', '\\t', '\\"', '\\\\', '\\x41', '\\u{7}'), { maxLength: 6 })
  .map(parts => `"${parts.join('')}"`);

const literalText = fc.oneof(
  fc.nat(100000).map(String),
  fc.constant(String(Number.MAX_SAFE_INTEGER)),
  floatText,
  moneyText,
  fc.oneof(fc.nat(100), floatText).map(n => `${n}%`),
  durationText,
  dateText,
  stringText,
  fc.constantFrom('TRUE', 'FALSE')
);

const { expr } = fc.letrec<{ expr: string; leaf: string; binary: string }>(tie => ({
  leaf: fc.oneof(literalText, lowerIdent),
  binary: fc
    .tuple(tie('expr'), fc.constantFrom('+', '-', '*', '/', '==', '<', '&&', '||'), tie('expr'))
    .map(([left, op, right]) => `(${left} ${op} ${right})`),
  expr: fc.oneof({ depthSize: 'small', withCrossShrink: true }, tie('leaf'), tie('binary')),
}));

const { pattern } = fc.letrec<{ pattern: string; structPattern: string }>(tie => ({
  structPattern: fc
    .tuple(
      typeName,
      fc.array(fc.tuple(lowerIdent, fc.option(tie('pattern'), { nil: undefined })), { maxLength: 2 })
    )
    .map(([name, fields]) => {
      const body = fields.map(([f, sub]) => (sub === undefined ? f : `${f}: ${sub}`)).join(', ');
      return `${name} { ${body} }`;
    }),
  pattern: fc.oneof(
    { depthSize: 'small', withCrossShrink: true },
    fc.constant('_'),
    literalText,
    fc.oneof(fc.nat(1000), floatText).map(n => `-${n}`),
    fc.constant('pass'),
    lowerIdent,
    fc.tuple(typeName, typeName).map(([e, v]) => `${e}.${v}`),
    tie('structPattern')
  ),
}));

const arm = fc
  .tuple(pattern, fc.option(expr, { nil: undefined }), expr)
  .map(([p, guard, body]) => `case ${p}${guard === undefined ? '' : ` if ${guard}`} := ${body};`);

const matchItem = fc
  .tuple(lowerIdent, fc.option(expr, { nil: undefined }), fc.array(arm, { minLength: 1, maxLength: 3 }))
  .map(([n, subject, arms]) => `int ${n} := match ${subject === undefined ? '' : `${subject} `}{ ${arms.join(' ')} };`);

const item = fc.oneof(
  fc
    .tuple(fc.constantFrom('int', 'bool', 'string', 'money', 'float', 'date', 'duration'), lowerIdent, expr)
    .map(([t, n, e]) => `${t} ${n} := ${e};`),
  fc.tuple(typeName, fc.array(lowerIdent, { maxLength: 3 })).map(
    ([n, fields]) => `struct ${n} { ${fields.map(f => `int ${f}`).join(', ')} }`
  ),
  fc.tuple(typeName, fc.array(typeName, { minLength: 1, maxLength: 3 })).map(([n, vs]) => `enum ${n} { ${vs.join(', ')} }`),
  fc.tuple(lowerIdent, expr).map(([n, e]) => `func ${n}() { return ${e}; }`),
  matchItem
);

const programSource = fc.array(item, { maxLength: 5 }).map(items => items.join('\n'));

function parseClean(source: string): Program {
  const { program, diagnostics } = parse(lex(source));
  assert.deepEqual(diagnostics, []);
  return program;
}

function before(a: Position, b: Position): boolean {
  return a.line < b.line || (a.line === b.line && a.col <= b.col);
}

function withThousands(n: number): string {
  return String(n).replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

describe('属性测试', () => {
  it('词法分析要么抛出 LexError，要么以 EOF 结尾且位置单调', () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 60 }), input => {
        let tokens: Token[];
        try {
          tokens = lex(input);
        } catch (error) {
          return error instanceof LexError;
        }
        const last = tokens[tokens.length - 1];
        if (!last || last.kind !== TokenKind.EOF) return false;
        return tokens.every((t, i) => {
          const next = tokens[i + 1];
          return before(t.start, t.end) && (!next || before(t.end, next.start));
        });
      }),
      { numRuns: 200 }
    );
  });

  it('非关键字标识符词法分析为单个 IDENT', () => {
    fc.assert(
      fc.property(lowerIdent, name => {
        const tokens = lex(name);
        return tokens.length === 2 && tokens[0]?.kind === TokenKind.IDENT && tokens[0].lexeme === name;
      })
    );
  });

  it('带千分位的金额去掉逗号', () => {
    fc.assert(
      fc.property(fc.nat(10_000_000), amount => {
        const token = lex(`$${withThousands(amount)}`)[0];
        assert.ok(token && token.kind === TokenKind.MONEY);
        assert.deepEqual(token.value, { currency: '$', amount: String(amount) });
      })
    );
  });

  it('错误恢复模式下解析不抛出异常', () => {
    const fragment = fc.constantFrom(
      'int', 'x', ':=', '1', ';', '{', '}', '(', ')', 'match', 'case', '_', 'struct', 'enum',
      'func', 'return', 'scope', 'referencing', 'from', ',', '.', '+', '&&', '"s"', 'TRUE'
    );
    fc.assert(
      fc.property(fc.array(fragment, { maxLength: 40 }), parts => {
        const { program } = parse(lex(parts.join(' ')));
        return program.kind === 'Program';
      }),
      { numRuns: 300 }
    );
  });

  it('格式化输出重新解析后得到相同的 AST', () => {
    fc.assert(
      fc.property(programSource, source => {
        const program = parseClean(source);
        const reparsed = parseClean(printProgram(program));
        assert.deepEqual(stripSpans(reparsed), stripSpans(program));
      }),
      { numRuns: 150 }
    );
  });

  it('格式化是幂等的', () => {
    fc.assert(
      fc.property(programSource, source => {
        const once = printProgram(parseClean(source));
        return printProgram(parseClean(once)) === once;
      }),
      { numRuns: 150 }
    );
  });
});
