/**
 * @module lexer
 *
 * 词法分析器：将 `.yh` 源代码转换为 Token 流。
 *
 * **功能**：
 * - 识别关键字、类型关键字、标识符、运算符和标点符号
 * - 识别法律领域字面量：金额（`$1,000.50`）、百分比（`15%`）、日期（`2024-01-31`）、时长（`2 years, 3 months`）
 * - 处理字符串转义（`\n`、`\xNN`、`\u{...}` 等）
 * - 跳过空白与注释；`keepComments` 模式下以 trivia 通道输出注释
 * - 跟踪每个 token 的位置信息（行号和列号，均从 1 开始）
 *
 * **最长匹配规则**：
 * - MONEY 优先于货币符号 + INT
 * - PERCENT（数字紧跟 `%`）优先于 INT + MOD
 * - DATE 优先于 INT MINUS INT MINUS INT
 * - DURATION 贪婪地吸收以逗号分隔的后续时长片段
 */

import { TokenKind, BOOLEAN_WORDS, CURRENCY_SYMBOLS, DURATION_UNITS, KEYWORDS, TYPE_KEYWORDS } from './tokens.js';
import type { DurationPart, Position, Token, TokenValue } from '../types.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';

export interface LexOptions {
  /** 以 COMMENT token（trivia 通道）输出注释，供语法高亮使用 */
  readonly keepComments?: boolean;
}

const ISO_DATE = /(\d{4})-(\d{2})-(\d{2})(?![\w])/y;
const DAY_FIRST_DATE = /(\d{2})-(\d{2})-(\d{4})(?![\w])/y;
const DURATION_HEAD = /[ \t]*([A-Za-z]+)(?![\w])/y;
const DURATION_TAIL = /[ \t]*,[ \t]*(\d+)[ \t]*([A-Za-z]+)(?![\w])/y;

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isHexDigit(ch: string): boolean {
  return /^[0-9A-Fa-f]$/.test(ch);
}

function isIdentifierStart(ch: string): boolean {
  if (!ch) return false;
  return ch === '_' || /\p{L}/u.test(ch);
}

function isIdentifierPart(ch: string): boolean {
  if (!ch) return false;
  return ch === '_' || /[\p{L}\p{N}]/u.test(ch);
}

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r' || ch === '\f' || ch === '\v';
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const daysInMonth = [31, isLeapYear(year) ? 29 : 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];
  return day <= (daysInMonth[month - 1] ?? 0);
}

function matchAt(pattern: RegExp, input: string, index: number): RegExpExecArray | null {
  pattern.lastIndex = index;
  return pattern.exec(input);
}

function* scan(input: string, options: LexOptions): Generator<Token, void, undefined> {
  let i = 0;
  let line = 1;
  let col = 1;

  const peek = (): string => input[i] ?? '';
  const peekAt = (offset: number): string => input[i + offset] ?? '';
  /** 当前位置的完整字符；辅助平面字符占两个 UTF-16 码元 */
  const peekChar = (): string => {
    const codePoint = input.codePointAt(i);
    return codePoint === undefined ? '' : String.fromCodePoint(codePoint);
  };
  const here = (): Position => ({ line, col });

  // 跟踪上一个字符是否为 \r，用于正确处理 CRLF 避免重复计数
  let lastWasCR = false;
  const next = (): string => {
    const ch = input[i++] ?? '';
    if (ch === '\n') {
      if (!lastWasCR) {
        line++;
      }
      col = 1;
      lastWasCR = false;
    } else if (ch === '\r') {
      line++;
      col = 1;
      lastWasCR = true;
    } else {
      col++;
      lastWasCR = false;
    }
    return ch;
  };

  const advance = (count: number): void => {
    for (let k = 0; k < count; k++) next();
  };

  const make = (
    kind: TokenKind,
    value: TokenValue,
    start: Position,
    startIndex: number,
    channel?: Token['channel']
  ): Token => {
    const base = { kind, value, lexeme: input.slice(startIndex, i), start, end: here() };
    return channel ? { ...base, channel } : base;
  };

  const readDigits = (): string => {
    let digits = '';
    while (isDigit(peek())) digits += next();
    return digits;
  };

  /** 整数必须能被精确表示，浮点数必须是有限值 */
  const checkRange = (value: number, integer: boolean, start: Position, startIndex: number): number => {
    if (integer ? Number.isSafeInteger(value) : Number.isFinite(value)) return value;
    const text = input.slice(startIndex, i);
    throw Diagnostics.numberOutOfRange(text, { start, end: { line: start.line, col: start.col + text.length } });
  };

  const readEscape = (stringStart: Position): string => {
    const escPos = here();
    next(); // '\'
    if (i >= input.length) throw Diagnostics.unterminatedString(stringStart);
    const e = next();
    switch (e) {
      case '\\':
        return '\\';
      case '"':
        return '"';
      case 'n':
        return '\n';
      case 't':
        return '\t';
      case 'r':
        return '\r';
      case '0':
        return '\0';
      case 'x': {
        const hex = peek() + peekAt(1);
        if (!isHexDigit(peek()) || !isHexDigit(peekAt(1))) {
          throw Diagnostics.invalidEscape(`\\x${hex}`, escPos);
        }
        advance(2);
        return String.fromCharCode(parseInt(hex, 16));
      }
      case 'u': {
        let hex = '';
        if (peek() === '{') {
          next();
          while (isHexDigit(peek()) && hex.length < 6) hex += next();
          if (peek() !== '}' || hex.length === 0) {
            throw Diagnostics.invalidEscape(`\\u{${hex}`, escPos);
          }
          next();
        } else {
          for (let k = 0; k < 4; k++) {
            if (!isHexDigit(peek())) throw Diagnostics.invalidEscape(`\\u${hex}${peek()}`, escPos);
            hex += next();
          }
        }
        const codePoint = parseInt(hex, 16);
        if (codePoint > 0x10ffff) {
          throw Diagnostics.invalidEscape(`\\u{${hex}}`, escPos);
        }
        return String.fromCodePoint(codePoint);
      }
      default:
        throw Diagnostics.invalidEscape(`\\${e}`, escPos);
    }
  };

  const scanString = (): Token => {
    const start = here();
    const startIndex = i;
    next(); // opening quote
    let val = '';
    for (;;) {
      if (i >= input.length) throw Diagnostics.unterminatedString(start);
      const c = peek();
      if (c === '"') {
        next();
        break;
      }
      val += c === '\\' ? readEscape(start) : next();
    }
    return make(TokenKind.STRING, val, start, startIndex);
  };

  const scanMoney = (): Token => {
    const start = here();
    const startIndex = i;
    const currency = next();
    let amount = readDigits();
    // 千分位分组必须是精确的 `,DDD`
    if (amount.length <= 3) {
      while (
        peek() === ',' &&
        isDigit(peekAt(1)) &&
        isDigit(peekAt(2)) &&
        isDigit(peekAt(3)) &&
        !isDigit(peekAt(4))
      ) {
        next();
        amount += readDigits();
      }
    }
    if (peek() === '.' && isDigit(peekAt(1))) {
      next();
      amount += `.${readDigits()}`;
    }
    return make(TokenKind.MONEY, { currency, amount }, start, startIndex);
  };

  const scanNumber = (): Token => {
    const start = here();
    const startIndex = i;

    const iso = matchAt(ISO_DATE, input, i);
    if (iso) {
      const [text, y, m, d] = iso;
      if (!isCalendarDate(Number(y), Number(m), Number(d))) {
        throw Diagnostics.invalidDate(text, start);
      }
      advance(text.length);
      return make(TokenKind.DATE, text, start, startIndex);
    }
    const dayFirst = matchAt(DAY_FIRST_DATE, input, i);
    if (dayFirst) {
      const [text, d, m, y] = dayFirst;
      const span = { start, end: { line, col: col + text.length } };
      throw Diagnostics.nonCanonicalDate(text, `${y}-${m}-${d}`, span);
    }

    const whole = readDigits();
    if (peek() === '.' && isDigit(peekAt(1))) {
      next();
      const value = checkRange(Number(`${whole}.${readDigits()}`), false, start, startIndex);
      if (peek() === '%') {
        next();
        return make(TokenKind.PERCENT, value, start, startIndex);
      }
      return make(TokenKind.FLOAT, value, start, startIndex);
    }
    if (peek() === '%') {
      next();
      return make(TokenKind.PERCENT, checkRange(Number(whole), true, start, startIndex), start, startIndex);
    }

    const head = matchAt(DURATION_HEAD, input, i);
    const headUnit = head ? DURATION_UNITS.get(head[1] ?? '') : undefined;
    if (head && headUnit) {
      const amount = checkRange(Number(whole), true, start, startIndex);
      const parts: DurationPart[] = [{ amount, unit: headUnit }];
      advance(head[0].length);
      for (;;) {
        const tail = matchAt(DURATION_TAIL, input, i);
        const tailUnit = tail ? DURATION_UNITS.get(tail[2] ?? '') : undefined;
        if (!tail || !tailUnit) break;
        const digits = tail[1] ?? '';
        const offset = tail[0].indexOf(digits);
        advance(offset);
        const partStart = here();
        const partIndex = i;
        advance(digits.length);
        const amount = checkRange(Number(digits), true, partStart, partIndex);
        advance(tail[0].length - offset - digits.length);
        parts.push({ amount, unit: tailUnit });
      }
      return make(TokenKind.DURATION, { parts }, start, startIndex);
    }

    return make(TokenKind.INT, checkRange(Number(whole), true, start, startIndex), start, startIndex);
  };

  const scanWord = (): Token => {
    const start = here();
    const startIndex = i;
    let word = '';
    for (let ch = peekChar(); isIdentifierPart(ch); ch = peekChar()) {
      advance(ch.length);
      word += ch;
    }
    if (word === '_') return make(TokenKind.UNDERSCORE, '_', start, startIndex);
    const bool = BOOLEAN_WORDS.get(word);
    if (bool !== undefined) return make(TokenKind.BOOL, bool, start, startIndex);
    if (TYPE_KEYWORDS.has(word)) return make(TokenKind.TYPE, word, start, startIndex);
    if (KEYWORDS.has(word)) return make(TokenKind.KEYWORD, word, start, startIndex);
    return make(TokenKind.IDENT, word, start, startIndex);
  };

  /** 单字符或双字符运算符/标点；返回 null 表示不认识的字符 */
  const scanSymbol = (): Token | null => {
    const start = here();
    const startIndex = i;
    const ch = peek();
    const two = ch + peekAt(1);
    const twoChar: Record<string, TokenKind> = {
      ':=': TokenKind.ASSIGN,
      '==': TokenKind.EQ,
      '!=': TokenKind.NEQ,
      '<=': TokenKind.LTE,
      '>=': TokenKind.GTE,
      '&&': TokenKind.AND,
      '||': TokenKind.OR,
    };
    const twoKind = twoChar[two];
    if (twoKind) {
      advance(2);
      return make(twoKind, two, start, startIndex);
    }
    const oneChar: Record<string, TokenKind> = {
      '<': TokenKind.LT,
      '>': TokenKind.GT,
      '+': TokenKind.PLUS,
      '-': TokenKind.MINUS,
      '*': TokenKind.STAR,
      '/': TokenKind.SLASH,
      '%': TokenKind.MOD,
      '!': TokenKind.NOT,
      '{': TokenKind.LBRACE,
      '}': TokenKind.RBRACE,
      '(': TokenKind.LPAREN,
      ')': TokenKind.RPAREN,
      '[': TokenKind.LBRACKET,
      ']': TokenKind.RBRACKET,
      ',': TokenKind.COMMA,
      '.': TokenKind.DOT,
      ':': TokenKind.COLON,
      ';': TokenKind.SEMICOLON,
    };
    const oneKind = oneChar[ch];
    if (oneKind) {
      next();
      return make(oneKind, ch, start, startIndex);
    }
    return null;
  };

  // Skip UTF-8 BOM if present
  if (input.charCodeAt(0) === 0xfeff) {
    i++;
  }

  while (i < input.length) {
    const ch = peek();

    if (isWhitespace(ch)) {
      next();
      continue;
    }

    // Line comment
    if (ch === '/' && peekAt(1) === '/') {
      const start = here();
      const startIndex = i;
      while (i < input.length && peek() !== '\n' && peek() !== '\r') next();
      if (options.keepComments) {
        const text = input.slice(startIndex + 2, i).trim();
        yield make(TokenKind.COMMENT, { text, block: false }, start, startIndex, 'trivia');
      }
      continue;
    }

    // Block comment
    if (ch === '/' && peekAt(1) === '*') {
      const start = here();
      const startIndex = i;
      advance(2);
      while (!(peek() === '*' && peekAt(1) === '/')) {
        if (i >= input.length) throw Diagnostics.unterminatedComment(start);
        next();
      }
      advance(2);
      if (options.keepComments) {
        const text = input.slice(startIndex + 2, i - 2).trim();
        yield make(TokenKind.COMMENT, { text, block: true }, start, startIndex, 'trivia');
      }
      continue;
    }

    if (ch === '"') {
      yield scanString();
      continue;
    }

    if (CURRENCY_SYMBOLS.has(ch) && isDigit(peekAt(1))) {
      yield scanMoney();
      continue;
    }

    if (isDigit(ch)) {
      yield scanNumber();
      continue;
    }

    if (isIdentifierStart(peekChar())) {
      yield scanWord();
      continue;
    }

    const symbol = scanSymbol();
    if (symbol) {
      yield symbol;
      continue;
    }

    const codePoint = input.codePointAt(i) ?? 0;
    throw Diagnostics.unexpectedCharacter(String.fromCodePoint(codePoint), here());
  }

  const end = here();
  yield { kind: TokenKind.EOF, value: null, lexeme: '', start: end, end };
}

/**
 * 惰性、可重启的 Token 序列。每次迭代都会从头重新扫描源码。
 */
export class TokenStream implements Iterable<Token> {
  constructor(
    private readonly source: string,
    private readonly options: LexOptions = {}
  ) {}

  [Symbol.iterator](): Iterator<Token> {
    return scan(this.source, this.options);
  }

  /** 物化为数组，供解析器使用 */
  toArray(): Token[] {
    return [...this];
  }
}

/**
 * 对源码进行惰性词法分析。
 *
 * @throws {LexError} 在迭代过程中遇到非法字符、未闭合字符串/注释、非法转义或日期时抛出
 */
export function tokenize(source: string, options: LexOptions = {}): TokenStream {
  return new TokenStream(source, options);
}

/**
 * 对源码进行词法分析并返回完整的 Token 数组（以 EOF 结尾）。
 *
 * @example
 * ```typescript
 * const tokens = lex('int x := 42;');
 * // TYPE(int) IDENT(x) ASSIGN INT(42) SEMICOLON EOF
 * ```
 */
export function lex(source: string, options: LexOptions = {}): Token[] {
  return tokenize(source, options).toArray();
}
