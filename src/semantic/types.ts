/**
 * 语义阶段的类型模型。
 *
 * 类型按结构比较；联合类型在构造时展开、去重，比较时与成员顺序无关。
 */

import type { BuiltinTypeName } from '../types.js';

export type PrimitiveKind =
  | 'Int'
  | 'Float'
  | 'String'
  | 'Boolean'
  | 'Money'
  | 'Date'
  | 'Duration'
  | 'Percent';

export interface PrimitiveType {
  readonly kind: PrimitiveKind;
}

export interface UserDefinedType {
  readonly kind: 'UserDefined';
  /** 声明时的名字 */
  readonly name: string;
  /** 全局唯一的限定名，如 `penalties::Theft::Penalty` */
  readonly qualifiedName: string;
}

export interface UnionType {
  readonly kind: 'Union';
  readonly members: readonly Type[];
}

/** `pass` 的类型，可赋给任意类型 */
export interface PassType {
  readonly kind: 'Pass';
}

/** 出错后的占位类型，不再引发后续错误 */
export interface UnknownType {
  readonly kind: 'Unknown';
}

export type Type = PrimitiveType | UserDefinedType | UnionType | PassType | UnknownType;

export const Types = {
  Int: { kind: 'Int' },
  Float: { kind: 'Float' },
  String: { kind: 'String' },
  Boolean: { kind: 'Boolean' },
  Money: { kind: 'Money' },
  Date: { kind: 'Date' },
  Duration: { kind: 'Duration' },
  Percent: { kind: 'Percent' },
  Pass: { kind: 'Pass' },
  Unknown: { kind: 'Unknown' },
} as const satisfies Record<string, Type>;

const BUILTIN_TYPES: Readonly<Record<BuiltinTypeName, Type>> = {
  int: Types.Int,
  integer: Types.Int,
  float: Types.Float,
  bool: Types.Boolean,
  boolean: Types.Boolean,
  string: Types.String,
  money: Types.Money,
  date: Types.Date,
  duration: Types.Duration,
  percent: Types.Percent,
  pass: Types.Pass,
};

const DISPLAY_NAMES: Readonly<Record<PrimitiveKind, string>> = {
  Int: 'int',
  Float: 'float',
  String: 'string',
  Boolean: 'bool',
  Money: 'money',
  Date: 'date',
  Duration: 'duration',
  Percent: 'percent',
};

export class TypeSystem {
  static unknown(): Type {
    return Types.Unknown;
  }

  static fromBuiltin(name: BuiltinTypeName): Type {
    return BUILTIN_TYPES[name];
  }

  static userDefined(name: string, qualifiedName: string): UserDefinedType {
    return { kind: 'UserDefined', name, qualifiedName };
  }

  static isUnknown(t: Type): boolean {
    return t.kind === 'Unknown';
  }

  static isNumeric(t: Type): boolean {
    return t.kind === 'Int' || t.kind === 'Float';
  }

  /**
   * 构造联合类型：展开嵌套联合、去重；只剩一个成员时直接返回该成员。
   */
  static union(members: readonly Type[]): Type {
    const flat: Type[] = [];
    const push = (t: Type): void => {
      if (t.kind === 'Union') {
        for (const m of t.members) push(m);
        return;
      }
      if (!flat.some(existing => TypeSystem.equals(existing, t))) flat.push(t);
    };
    for (const m of members) push(m);
    if (flat.length === 0) return Types.Unknown;
    if (flat.length === 1) return flat[0] ?? Types.Unknown;
    return { kind: 'Union', members: flat };
  }

  /**
   * 结构相等。联合类型按成员集合比较。
   */
  static equals(t1: Type, t2: Type): boolean {
    if (t1.kind === 'Union' || t2.kind === 'Union') {
      if (t1.kind !== 'Union' || t2.kind !== 'Union') return false;
      if (t1.members.length !== t2.members.length) return false;
      return (
        t1.members.every(a => t2.members.some(b => TypeSystem.equals(a, b))) &&
        t2.members.every(b => t1.members.some(a => TypeSystem.equals(a, b)))
      );
    }
    if (t1.kind === 'UserDefined' || t2.kind === 'UserDefined') {
      return t1.kind === 'UserDefined' && t2.kind === 'UserDefined' && t1.qualifiedName === t2.qualifiedName;
    }
    return t1.kind === t2.kind;
  }

  /**
   * source 类型的值能否放入 target 类型的位置。
   */
  static isAssignable(target: Type, source: Type): boolean {
    if (TypeSystem.isUnknown(target) || TypeSystem.isUnknown(source)) return true;
    if (source.kind === 'Pass') return true;
    if (TypeSystem.equals(target, source)) return true;
    if (target.kind === 'Float' && source.kind === 'Int') return true;
    if (source.kind === 'Union') {
      return source.members.every(m => TypeSystem.isAssignable(target, m));
    }
    if (target.kind === 'Union') {
      return target.members.some(m => TypeSystem.isAssignable(m, source));
    }
    return false;
  }

  /**
   * 用于 `==`/`!=` 的可比较性：可互相赋值即可比较。
   */
  static isComparable(a: Type, b: Type): boolean {
    return TypeSystem.isAssignable(a, b) || TypeSystem.isAssignable(b, a);
  }

  static format(t: Type): string {
    switch (t.kind) {
      case 'UserDefined':
        return t.name;
      case 'Union':
        return t.members.map(m => TypeSystem.format(m)).join(' || ');
      case 'Pass':
        return 'pass';
      case 'Unknown':
        return '<unknown>';
      default:
        return DISPLAY_NAMES[t.kind];
    }
  }
}
