/**
 * match 分支覆盖分析：不可达分支与穷尽性。
 *
 * 分析只依赖每个分支的形状，与 AST 解耦：
 * - catchAll：无守卫的 `_` 或变量绑定，匹配任意值
 * - value：无守卫且匹配单个取值（布尔字面量、枚举变体、其他字面量），key 用于去重
 * - partial：带守卫或无法静态判断覆盖范围的分支
 */

export type ArmShape =
  | { readonly kind: 'catchAll' }
  | { readonly kind: 'value'; readonly key: string }
  | { readonly kind: 'partial' };

export interface CoverageResult {
  /** 不可达分支的下标（按出现顺序） */
  readonly unreachable: readonly number[];
  /** 封闭域中没有被覆盖的取值；开放域为空 */
  readonly missing: readonly string[];
  readonly exhaustive: boolean;
}

export const BOOLEAN_DOMAIN: readonly string[] = ['TRUE', 'FALSE'];

/**
 * @param domain 封闭类型的全部取值（布尔或枚举变体）；开放类型传 null
 */
export function computeCoverage(arms: readonly ArmShape[], domain: readonly string[] | null): CoverageResult {
  const unreachable: number[] = [];
  const covered = new Set<string>();
  let catchAll = false;

  arms.forEach((arm, index) => {
    if (catchAll) {
      unreachable.push(index);
      return;
    }
    switch (arm.kind) {
      case 'catchAll':
        catchAll = true;
        return;
      case 'value':
        if (covered.has(arm.key)) {
          unreachable.push(index);
          return;
        }
        covered.add(arm.key);
        return;
      case 'partial':
        return;
    }
  });

  if (catchAll) return { unreachable, missing: [], exhaustive: true };
  if (domain === null) return { unreachable, missing: [], exhaustive: false };
  const missing = domain.filter(value => !covered.has(value));
  return { unreachable, missing, exhaustive: missing.length === 0 };
}
