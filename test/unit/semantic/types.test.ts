import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { TypeSystem, Types } from '../../../src/semantic/types.js';
import { binaryResultType, describeOperandRequirement, unaryResultType } from '../../../src/semantic/operators.js';

const penalty = TypeSystem.userDefined('Penalty', 'main::Penalty');
const otherPenalty = TypeSystem.userDefined('Penalty', 'lib::Penalty');

describe('TypeSystem', () => {
  it('fromBuiltin 把同义拼写映射到同一类型', () => {
    assert.equal(TypeSystem.fromBuiltin('integer'), Types.Int);
    assert.equal(TypeSystem.fromBuiltin('boolean'), TypeSystem.fromBuiltin('bool'));
    assert.equal(TypeSystem.fromBuiltin('pass'), Types.Pass);
  });

  it('用户定义类型按限定名比较', () => {
    assert.ok(TypeSystem.equals(penalty, TypeSystem.userDefined('Penalty', 'main::Penalty')));
    assert.ok(!TypeSystem.equals(penalty, otherPenalty));
  });

  it('union 展开嵌套、去重，只剩一个成员时返回该成员', () => {
    const nested = TypeSystem.union([Types.Int, TypeSystem.union([Types.Money, Types.Int])]);
    assert.equal(TypeSystem.format(nested), 'int || money');
    assert.equal(TypeSystem.union([Types.Int, Types.Int]), Types.Int);
    assert.equal(TypeSystem.union([]), Types.Unknown);
  });

  it('联合类型比较与成员顺序无关', () => {
    assert.ok(
      TypeSystem.equals(TypeSystem.union([Types.Int, Types.Pass]), TypeSystem.union([Types.Pass, Types.Int]))
    );
    assert.ok(!TypeSystem.equals(TypeSystem.union([Types.Int, Types.Pass]), Types.Int));
  });

  it('isAssignable 的规则', () => {
    assert.ok(TypeSystem.isAssignable(Types.Float, Types.Int));
    assert.ok(!TypeSystem.isAssignable(Types.Int, Types.Float));
    assert.ok(TypeSystem.isAssignable(penalty, Types.Pass));
    assert.ok(TypeSystem.isAssignable(Types.Money, Types.Unknown));
    assert.ok(TypeSystem.isAssignable(TypeSystem.union([Types.Int, Types.Pass]), Types.Int));
    assert.ok(!TypeSystem.isAssignable(Types.Int, TypeSystem.union([Types.Int, Types.String])));
    assert.ok(TypeSystem.isAssignable(TypeSystem.union([Types.Int, Types.String]), TypeSystem.union([Types.String, Types.Int])));
    assert.ok(!TypeSystem.isAssignable(penalty, otherPenalty));
  });

  it('format 输出源码中的拼写', () => {
    assert.equal(TypeSystem.format(Types.Boolean), 'bool');
    assert.equal(TypeSystem.format(penalty), 'Penalty');
    assert.equal(TypeSystem.format(Types.Unknown), '<unknown>');
  });
});

describe('运算符类型规则', () => {
  it('数值运算在有 float 时得到 float', () => {
    assert.equal(binaryResultType('+', Types.Int, Types.Int), Types.Int);
    assert.equal(binaryResultType('*', Types.Int, Types.Float), Types.Float);
    assert.equal(binaryResultType('%', Types.Int, Types.Float), null);
  });

  it('金额、百分比与时长的运算', () => {
    assert.equal(binaryResultType('+', Types.Money, Types.Money), Types.Money);
    assert.equal(binaryResultType('*', Types.Percent, Types.Money), Types.Money);
    assert.equal(binaryResultType('/', Types.Money, Types.Money), Types.Float);
    assert.equal(binaryResultType('/', Types.Int, Types.Money), null);
    assert.equal(binaryResultType('*', Types.Duration, Types.Float), null);
    assert.equal(binaryResultType('+', Types.Money, Types.Int), null);
  });

  it('日期与时长的运算', () => {
    assert.equal(binaryResultType('+', Types.Duration, Types.Date), Types.Date);
    assert.equal(binaryResultType('-', Types.Date, Types.Date), Types.Duration);
    assert.equal(binaryResultType('-', Types.Duration, Types.Date), null);
  });

  it('比较与逻辑运算得到 bool', () => {
    assert.equal(binaryResultType('<', Types.Date, Types.Date), Types.Boolean);
    assert.equal(binaryResultType('<', Types.Int, Types.Float), Types.Boolean);
    assert.equal(binaryResultType('<', Types.Boolean, Types.Boolean), null);
    assert.equal(binaryResultType('==', penalty, Types.Pass), Types.Boolean);
    assert.equal(binaryResultType('==', Types.String, Types.Int), null);
    assert.equal(binaryResultType('||', Types.Boolean, Types.Int), null);
  });

  it('Unknown 操作数不再报错', () => {
    assert.equal(binaryResultType('+', Types.Unknown, Types.String), Types.Unknown);
    assert.equal(binaryResultType('&&', Types.Unknown, Types.Int), Types.Boolean);
    assert.equal(unaryResultType('!', Types.Unknown), Types.Boolean);
  });

  it('一元运算', () => {
    assert.equal(unaryResultType('-', Types.Money), Types.Money);
    assert.equal(unaryResultType('-', Types.String), null);
    assert.equal(unaryResultType('!', Types.Int), null);
    assert.equal(describeOperandRequirement('!', true), 'bool');
    assert.equal(describeOperandRequirement('%'), 'int operands');
  });
});
