/**
 * 顶层声明解析器
 * 负责解析 referencing 导入、scope/statute 块、struct、enum、func 与顶层变量声明
 */

import { Node } from '../ast/ast.js';
import { KW, TokenKind, describeToken } from '../frontend/tokens.js';
import { DiagnosticError, Diagnostics } from '../diagnostics/diagnostics.js';
import type {
  EnumDef,
  Field,
  FunctionDef,
  ImportedName,
  Item,
  Parameter,
  ReferencingStmt,
  ScopeDef,
  StructDef,
  Token,
  TypeNode,
  Variant,
} from '../types.js';
import type { ParserContext } from './context.js';
import type { ParserTools } from './parser-tools.js';
import { tokenText } from './parser-tools.js';
import { parseType } from './type-parser.js';
import { atDeclaration, parseBlock, parseExprStmt, parseVariableDeclRest } from './stmt-parser.js';
import { parseRecovering, syncToSeparator } from './recovery.js';
import { assignSpan, spanSince, tokenSpan } from './span-utils.js';

/**
 * 模块路径的一段可以是任意单词（包括与关键字同名的目录，如 `statute/theft`）
 */
function parseModuleSegment(ctx: ParserContext, tools: ParserTools): string {
  const tok = ctx.peek();
  if (tok.kind === TokenKind.IDENT || tok.kind === TokenKind.KEYWORD || tok.kind === TokenKind.TYPE) {
    ctx.next();
    return tokenText(tok);
  }
  throw tools.expected('module name');
}

/**
 * 解析导入语句
 * 语法: referencing A, B from path/to/module;
 */
export function parseReferencing(ctx: ParserContext, tools: ParserTools): ReferencingStmt {
  const start = tools.expectKeyword(KW.REFERENCING);
  const names: ImportedName[] = [];
  do {
    const nameTok = tools.parseIdent();
    names.push(assignSpan(Node.ImportedName(tokenText(nameTok)), tokenSpan(nameTok)));
  } while (tools.eat(TokenKind.COMMA));
  tools.expectKeyword(KW.FROM);
  const segments = [parseModuleSegment(ctx, tools)];
  while (tools.eat(TokenKind.SLASH)) {
    segments.push(parseModuleSegment(ctx, tools));
  }
  tools.expectTerminator('referencing statement');
  return assignSpan(Node.Referencing(names, segments.join('/')), spanSince(ctx, start));
}

/**
 * 解析结构体定义
 * 语法: struct Name { type field, type field, }
 */
export function parseStruct(ctx: ParserContext, tools: ParserTools): StructDef {
  const start = tools.expectKeyword(KW.STRUCT);
  const nameTok = tools.parseIdent();
  tools.expect(TokenKind.LBRACE, "'{'");
  const fields: Field[] = [];
  while (!ctx.at(TokenKind.RBRACE) && !ctx.at(TokenKind.EOF)) {
    try {
      const fieldStart = ctx.peek();
      const type = parseType(ctx);
      const fieldName = tools.parseIdent();
      fields.push(assignSpan(Node.Field(type, tokenText(fieldName)), spanSince(ctx, fieldStart)));
      if (!tools.eat(TokenKind.COMMA) && !tools.eat(TokenKind.SEMICOLON) && !ctx.at(TokenKind.RBRACE)) {
        throw tools.expected("',' or '}'");
      }
    } catch (e) {
      // 出错的字段被丢弃，其余字段照常解析
      if (!ctx.recover || !(e instanceof DiagnosticError)) throw e;
      ctx.diagnostics.push(e.diagnostic);
      syncToSeparator(ctx);
    }
  }
  tools.expect(TokenKind.RBRACE, "'}'");
  tools.eat(TokenKind.SEMICOLON);
  return assignSpan(
    Node.Struct(tokenText(nameTok), tokenSpan(nameTok), fields),
    spanSince(ctx, start)
  );
}

/**
 * 解析枚举定义
 * 语法: enum Name { A, B, C }
 */
export function parseEnum(ctx: ParserContext, tools: ParserTools): EnumDef {
  const start = tools.expectKeyword(KW.ENUM);
  const nameTok = tools.parseIdent();
  tools.expect(TokenKind.LBRACE, "'{'");
  const variants: Variant[] = [];
  while (!ctx.at(TokenKind.RBRACE) && !ctx.at(TokenKind.EOF)) {
    const variantTok = tools.parseIdent();
    variants.push(assignSpan(Node.Variant(tokenText(variantTok)), tokenSpan(variantTok)));
    if (!tools.eat(TokenKind.COMMA) && !ctx.at(TokenKind.RBRACE)) {
      throw tools.expected("',' or '}'");
    }
  }
  tools.expect(TokenKind.RBRACE, "'}'");
  tools.eat(TokenKind.SEMICOLON);
  return assignSpan(
    Node.Enum(tokenText(nameTok), tokenSpan(nameTok), variants),
    spanSince(ctx, start)
  );
}

function parseParameters(ctx: ParserContext, tools: ParserTools): Parameter[] {
  tools.expect(TokenKind.LPAREN, "'('");
  const params: Parameter[] = [];
  while (!ctx.at(TokenKind.RPAREN) && !ctx.at(TokenKind.EOF)) {
    const paramStart = ctx.peek();
    const type = parseType(ctx);
    const nameTok = tools.parseIdent();
    params.push(assignSpan(Node.Parameter(type, tokenText(nameTok)), spanSince(ctx, paramStart)));
    if (!tools.eat(TokenKind.COMMA)) break;
  }
  tools.expect(TokenKind.RPAREN, "')'");
  return params;
}

/**
 * 解析函数定义（返回类型已由调用方解析或缺省）
 * 语法: [type] func name(type a, type b) { ... }
 */
export function parseFunction(
  ctx: ParserContext,
  tools: ParserTools,
  start: Token,
  returnType: TypeNode | null
): FunctionDef {
  tools.expectKeyword(KW.FUNC);
  const nameTok = tools.parseIdent();
  ctx.debug.log(`func ${tokenText(nameTok)}`);
  const params = parseParameters(ctx, tools);
  const body = parseBlock(ctx, tools);
  tools.eat(TokenKind.SEMICOLON);
  return assignSpan(
    Node.Function(tokenText(nameTok), tokenSpan(nameTok), params, returnType, body),
    spanSince(ctx, start)
  );
}

/**
 * 解析 scope/statute 块
 * 语法: scope Name { items }
 */
export function parseScope(ctx: ParserContext, tools: ParserTools): ScopeDef {
  const start = ctx.next();
  const keyword = start.value === KW.STATUTE ? 'statute' : 'scope';
  const nameTok = tools.parseIdent();
  tools.expect(TokenKind.LBRACE, "'{'");
  ctx.debug.depth++;
  const items = parseRecovering(ctx, true, () => parseItem(ctx, tools, true));
  ctx.debug.depth--;
  tools.expect(TokenKind.RBRACE, "'}'");
  tools.eat(TokenKind.SEMICOLON);
  return assignSpan(
    Node.Scope(keyword, tokenText(nameTok), tokenSpan(nameTok), items),
    spanSince(ctx, start)
  );
}

/**
 * 解析单个条目；scope 内出现的 referencing 记录为错误并丢弃（返回 null）。
 */
export function parseItem(ctx: ParserContext, tools: ParserTools, nested: boolean): Item | null {
  const start = ctx.peek();

  if (start.kind === TokenKind.KEYWORD) {
    switch (start.value) {
      case KW.REFERENCING: {
        const stmt = parseReferencing(ctx, tools);
        if (nested) {
          ctx.report(
            Diagnostics.unexpectedToken(describeToken(start), tokenSpan(start), 'inside a scope block; move it to the top of the file')
          );
          return null;
        }
        return stmt;
      }
      case KW.SCOPE:
      case KW.STATUTE:
        return parseScope(ctx, tools);
      case KW.STRUCT:
        return parseStruct(ctx, tools);
      case KW.ENUM:
        return parseEnum(ctx, tools);
      case KW.FUNC:
        return parseFunction(ctx, tools, start, null);
      default:
        break;
    }
  }

  if (atDeclaration(ctx)) {
    const type = parseType(ctx);
    if (ctx.isKeyword(KW.FUNC)) {
      return parseFunction(ctx, tools, start, type);
    }
    return parseVariableDeclRest(ctx, tools, start, type);
  }

  return parseExprStmt(ctx, tools);
}

export function collectTopLevelItems(ctx: ParserContext, tools: ParserTools): Item[] {
  return parseRecovering(ctx, false, () => parseItem(ctx, tools, false));
}
