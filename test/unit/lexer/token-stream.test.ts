import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { tokenize, lex } from '../../../src/frontend/lexer.js';
import { describeToken, tokenCategory } from '../../../src/frontend/tokens.js';
import { LexError } from '../../../src/diagnostics/diagnostics.js';
import { TokenKind } from '../../../src/types.js';

describe('TokenStream', () => {
  it('可以重复迭代，每次得到相同的结果', () => {
    const stream = tokenize('money fine := $100;');
    const first = [...stream].map(t => t.lexeme);
    const second = stream.toArray().map(t => t.lexeme);
    assert.deepEqual(first, ['money', 'fine', ':=', '$100', ';', '']);
    assert.deepEqual(second, first);
  });

  it('惰性扫描：错误在迭代到出错位置时才抛出', () => {
    const stream = tokenize('a b @');
    const iterator = stream[Symbol.iterator]();
    assert.equal(iterator.next().value?.lexeme, 'a');
    assert.equal(iterator.next().value?.lexeme, 'b');
    assert.throws(() => iterator.next(), LexError);
  });

  it('keepComments 在 trivia 通道输出注释', () => {
    const tokens = lex('x // note\n/* block */ y', { keepComments: true });
    assert.deepEqual(
      tokens.map(t => [t.kind, t.channel ?? null]),
      [
        [TokenKind.IDENT, null],
        [TokenKind.COMMENT, 'trivia'],
        [TokenKind.COMMENT, 'trivia'],
        [TokenKind.IDENT, null],
        [TokenKind.EOF, null],
      ]
    );
    assert.deepEqual(tokens[1]?.value, { text: 'note', block: false });
    assert.deepEqual(tokens[2]?.value, { text: 'block', block: true });
  });
});

describe('tokenCategory', () => {
  it('把细粒度 kind 归入语言类别', () => {
    const categories = lex('x scope int 1 1.5 "s" TRUE $1 5% 2024-01-01 3 days := { // c', {
      keepComments: true,
    }).map(t => tokenCategory(t.kind));
    assert.deepEqual(categories, [
      'identifier',
      'keyword',
      'keyword',
      'integer',
      'float',
      'string',
      'boolean',
      'money',
      'percent',
      'date',
      'duration',
      'operator',
      'punctuation',
      'comment',
      'end-of-input',
    ]);
  });

  it('错误消息中的 token 描述', () => {
    const [ident, eof] = lex('abc');
    assert.ok(ident && eof);
    assert.equal(describeToken(ident), "'abc'");
    assert.equal(describeToken(eof), 'end of input');
  });
});
