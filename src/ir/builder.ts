/**
 * IR 图构造。
 *
 * - `GraphBuilder`：命令式接口，按节点种类自动分配子块
 * - `buildGraph`：把 `Ir.*` 描述的树落成 arena
 * - `toTree`：arena → 树，供 JSON 序列化使用
 *
 * 两个方向都用显式工作栈，深层嵌套不会耗尽调用栈。
 */

import { Graph } from './graph.js';
import {
  CHILD_BLOCK_COUNT,
  type BlockId,
  type IrBlock,
  type IrNode,
  type IrTreeNode,
  type NodeId,
  type NodeKind,
} from '../types.js';

interface MutableBlock {
  id: BlockId;
  owningNode: NodeId | null;
  nodes: NodeId[];
}

export class GraphBuilder {
  private readonly nodeTable: IrNode[] = [];
  private readonly blockTable: MutableBlock[] = [];
  readonly rootBlock: BlockId;

  constructor() {
    this.rootBlock = this.newBlock(null);
  }

  private newBlock(owningNode: NodeId | null): BlockId {
    const id = this.blockTable.length;
    this.blockTable.push({ id, owningNode, nodes: [] });
    return id;
  }

  /**
   * 在块末尾追加节点，并按种类分配子块（Conditional 为 then/else，Region 为 body）。
   *
   * @returns 新节点 id
   */
  append(block: BlockId, kind: NodeKind, label: string): NodeId {
    const target = this.blockTable[block];
    if (!target) {
      throw new RangeError(`GraphBuilder.append: unknown block ${block}`);
    }
    const id = this.nodeTable.length;
    const blocks: BlockId[] = [];
    for (let i = 0; i < CHILD_BLOCK_COUNT[kind]; i++) {
      blocks.push(this.newBlock(id));
    }
    this.nodeTable.push({ id, kind, label, owningBlock: block, blocks });
    target.nodes.push(id);
    return id;
  }

  childBlocks(node: NodeId): readonly BlockId[] {
    const found = this.nodeTable[node];
    if (!found) {
      throw new RangeError(`GraphBuilder.childBlocks: unknown node ${node}`);
    }
    return found.blocks;
  }

  build(): Graph {
    const blocks: IrBlock[] = this.blockTable.map(b => ({
      id: b.id,
      owningNode: b.owningNode,
      nodes: [...b.nodes],
    }));
    return Graph.fromArena({ root: this.rootBlock, nodes: [...this.nodeTable], blocks });
  }
}

/**
 * 从声明式树构造图。
 *
 * 子块数量以树中给出的 `blocks` 为准，不强制符合种类要求；
 * 种类与子块数量是否匹配由 `validateGraph` 检查（G005）。
 */
export function buildGraph(rootNodes: readonly IrTreeNode[]): Graph {
  const nodes: IrNode[] = [];
  const blocks: MutableBlock[] = [{ id: 0, owningNode: null, nodes: [] }];
  const pending: Array<{ block: BlockId; items: readonly IrTreeNode[] }> = [
    { block: 0, items: rootNodes },
  ];

  let work = pending.pop();
  while (work) {
    const target = blocks[work.block];
    if (!target) throw new RangeError(`buildGraph: unknown block ${work.block}`);
    for (const item of work.items) {
      const id = nodes.length;
      const childIds: BlockId[] = [];
      for (const childItems of item.blocks ?? []) {
        const childId = blocks.length;
        blocks.push({ id: childId, owningNode: id, nodes: [] });
        childIds.push(childId);
        pending.push({ block: childId, items: childItems });
      }
      nodes.push({ id, kind: item.kind, label: item.label, owningBlock: work.block, blocks: childIds });
      target.nodes.push(id);
    }
    work = pending.pop();
  }

  return Graph.fromArena({ root: 0, nodes, blocks });
}

interface MutableTreeNode {
  kind: NodeKind;
  label: string;
  blocks?: MutableTreeNode[][];
}

/**
 * 把图还原为声明式树（根块的节点列表）。
 */
export function toTree(graph: Graph): IrTreeNode[] {
  const root: MutableTreeNode[] = [];
  const pending: Array<{ block: BlockId; into: MutableTreeNode[] }> = [
    { block: graph.rootBlock, into: root },
  ];

  let work = pending.pop();
  while (work) {
    for (const id of graph.nodes(work.block)) {
      const node = graph.node(id);
      const tree: MutableTreeNode = { kind: node.kind, label: node.label };
      if (node.blocks.length > 0) {
        const childLists: MutableTreeNode[][] = [];
        for (const child of node.blocks) {
          const into: MutableTreeNode[] = [];
          childLists.push(into);
          pending.push({ block: child, into });
        }
        tree.blocks = childLists;
      }
      work.into.push(tree);
    }
    work = pending.pop();
  }

  return root;
}
