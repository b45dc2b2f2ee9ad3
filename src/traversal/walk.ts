import type { Graph } from '../ir/graph.js';
import type { IrNode, NodeId } from '../types.js';
import { DepthFirstCursor, EXHAUSTED } from './cursor.js';

/**
 * 以可迭代形式消费一个新游标。
 */
export function* depthFirstNodes(graph: Graph): IterableIterator<IrNode> {
  const cursor = new DepthFirstCursor(graph);
  for (let node = cursor.next(); node !== EXHAUSTED; node = cursor.next()) {
    yield node;
  }
}

export function collectDepthFirst(graph: Graph): IrNode[] {
  return [...depthFirstNodes(graph)];
}

/**
 * 节点的嵌套深度：根块中的节点为 0，每经过一个拥有者加 1。
 */
export function nodeDepth(graph: Graph, node: NodeId): number {
  let depth = 0;
  let owner = graph.owningNode(graph.owningBlock(node));
  while (owner !== null) {
    depth++;
    owner = graph.owningNode(graph.owningBlock(owner));
  }
  return depth;
}
