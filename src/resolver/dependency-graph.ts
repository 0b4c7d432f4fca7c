/**
 * 有向依赖图：记录声明之间的名字引用关系，用于检测循环定义。
 * 边 from -> to 表示 from 依赖 to。
 */

/**
 * DFS访问状态
 */
const enum VisitState {
  UNVISITED = 0,
  VISITING = 1,
  VISITED = 2,
}

export class DependencyGraph {
  private readonly adjacency = new Map<string, Set<string>>();

  /**
   * 添加节点；重复添加无副作用
   */
  addNode(id: string): void {
    if (!this.adjacency.has(id)) {
      this.adjacency.set(id, new Set());
    }
  }

  hasNode(id: string): boolean {
    return this.adjacency.has(id);
  }

  /**
   * 添加依赖边，from 依赖 to
   */
  addEdge(from: string, to: string): void {
    if (!this.adjacency.has(from) || !this.adjacency.has(to)) {
      throw new Error(`Cannot add edge ${from} -> ${to}: unknown node`);
    }
    this.adjacency.get(from)?.add(to);
  }

  /**
   * DFS检测环，每个环以起点结尾（如 `[a, b, a]`）
   */
  detectCycles(): string[][] | null {
    const states = new Map<string, VisitState>();
    const cycles: string[][] = [];
    const stack: string[] = [];

    const dfs = (nodeId: string): void => {
      states.set(nodeId, VisitState.VISITING);
      stack.push(nodeId);

      for (const neighbor of this.adjacency.get(nodeId) ?? []) {
        const state = states.get(neighbor) ?? VisitState.UNVISITED;
        if (state === VisitState.UNVISITED) {
          dfs(neighbor);
        } else if (state === VisitState.VISITING) {
          const cycleStartIndex = stack.indexOf(neighbor);
          if (cycleStartIndex !== -1) {
            const cyclePath = stack.slice(cycleStartIndex);
            cyclePath.push(neighbor);
            cycles.push(cyclePath);
          }
        }
      }

      stack.pop();
      states.set(nodeId, VisitState.VISITED);
    };

    for (const nodeId of this.adjacency.keys()) {
      if ((states.get(nodeId) ?? VisitState.UNVISITED) === VisitState.UNVISITED) {
        dfs(nodeId);
      }
    }

    return cycles.length > 0 ? cycles : null;
  }
}
