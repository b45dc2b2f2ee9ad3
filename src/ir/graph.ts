import { Diagnostics, TraversalInvariantError } from '../diagnostics/diagnostics.js';
import type { BlockId, GraphArena, IrBlock, IrNode, NodeId, NodeKind } from '../types.js';

/**
 * IR 图：一个根块加上节点/块 arena。
 *
 * 只提供读取能力；回指（`owningBlock` / `owningNode`）都是普通 id，
 * 不表示所有权。图的构造与合法性由调用方负责，见 `buildGraph` 与 `validateGraph`。
 */
export class Graph {
  private constructor(
    readonly rootBlock: BlockId,
    private readonly nodeTable: readonly IrNode[],
    private readonly blockTable: readonly IrBlock[]
  ) {}

  /** 包装原始 arena，不做校验 */
  static fromArena(arena: GraphArena): Graph {
    return new Graph(arena.root, [...arena.nodes], [...arena.blocks]);
  }

  get nodeCount(): number {
    return this.nodeTable.length;
  }

  get blockCount(): number {
    return this.blockTable.length;
  }

  hasNode(id: NodeId): boolean {
    return Number.isInteger(id) && id >= 0 && id < this.nodeTable.length;
  }

  hasBlock(id: BlockId): boolean {
    return Number.isInteger(id) && id >= 0 && id < this.blockTable.length;
  }

  node(id: NodeId): IrNode {
    const node = this.hasNode(id) ? this.nodeTable[id] : undefined;
    if (!node) throw new TraversalInvariantError(Diagnostics.unknownNode(id).build());
    return node;
  }

  block(id: BlockId): IrBlock {
    const block = this.hasBlock(id) ? this.blockTable[id] : undefined;
    if (!block) throw new TraversalInvariantError(Diagnostics.unknownBlock(id).build());
    return block;
  }

  kind(node: NodeId): NodeKind {
    return this.node(node).kind;
  }

  owningBlock(node: NodeId): BlockId {
    return this.node(node).owningBlock;
  }

  childBlocks(node: NodeId): readonly BlockId[] {
    return this.node(node).blocks;
  }

  nodes(block: BlockId): readonly NodeId[] {
    return this.block(block).nodes;
  }

  owningNode(block: BlockId): NodeId | null {
    return this.block(block).owningNode;
  }

  allNodes(): readonly IrNode[] {
    return this.nodeTable;
  }

  allBlocks(): readonly IrBlock[] {
    return this.blockTable;
  }
}
