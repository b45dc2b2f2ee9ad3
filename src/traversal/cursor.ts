import { ConfigService } from '../config/config-service.js';
import { Diagnostics, TraversalInvariantError } from '../diagnostics/diagnostics.js';
import type { Graph } from '../ir/graph.js';
import type { BlockId, IrNode, NodeId } from '../types.js';
import { createLogger, type Logger } from '../utils/logger.js';

/** 遍历结束信号，与任何节点值都不相等 */
export const EXHAUSTED: unique symbol = Symbol('ir-walker.exhausted');
export type Exhausted = typeof EXHAUSTED;

interface Position {
  readonly block: BlockId;
  readonly index: number;
}

/**
 * 对整张图做先序、深度优先的单向遍历，不使用递归也不维护显式栈。
 *
 * 到达块尾时沿 `owningBlock` / `owningNode` 回指上溯，在父块中线性查找
 * 拥有者的位置后继续；最坏代价 O(n·d)。Conditional 的 then / else 两个分支
 * 都会按声明顺序访问，与运行时只执行其一无关。
 *
 * 前提：游标存活期间图不被修改（不做运行时检查）。同一张图上的多个游标互不影响。
 *
 * @example
 * ```typescript
 * const cursor = new DepthFirstCursor(graph);
 * for (let n = cursor.next(); n !== EXHAUSTED; n = cursor.next()) {
 *   console.log(n.label);
 * }
 * ```
 */
export class DepthFirstCursor {
  private position: Position | null;
  private readonly trace: Logger | null;

  constructor(private readonly graph: Graph) {
    const root = graph.rootBlock;
    this.position = graph.nodes(root).length > 0 ? { block: root, index: 0 } : null;
    this.trace = ConfigService.getInstance().traceTraversal ? createLogger('traversal') : null;
  }

  get exhausted(): boolean {
    return this.position === null;
  }

  /**
   * 返回当前位置的节点并前进一步；遍历完成后始终返回 `EXHAUSTED`。
   */
  next(): IrNode | Exhausted {
    if (this.position === null) return EXHAUSTED;
    const { block, index } = this.position;
    const id = this.graph.nodes(block)[index];
    if (id === undefined) {
      throw new TraversalInvariantError(Diagnostics.positionOutOfRange(block, index).build());
    }
    const node = this.graph.node(id);
    this.advance(node);
    return node;
  }

  private advance(node: IrNode): void {
    for (const child of node.blocks) {
      if (this.graph.nodes(child).length > 0) {
        this.trace?.debug('descend', { from: node.id, block: child });
        this.position = { block: child, index: 0 };
        return;
      }
    }
    // Plain 节点，或所有子块均为空的控制节点
    this.finish(node.id);
  }

  /**
   * 移到 `from` 在所属块中的下一个兄弟；若已是块尾则逐层上溯。
   */
  private finish(from: NodeId): void {
    let current = from;
    for (;;) {
      const block = this.graph.owningBlock(current);
      const siblings = this.graph.nodes(block);
      const index = this.indexIn(siblings, current, block);
      if (index + 1 < siblings.length) {
        this.position = { block, index: index + 1 };
        return;
      }

      // 块已耗尽
      const owner = this.graph.owningNode(block);
      if (owner === null) {
        if (block !== this.graph.rootBlock) {
          throw new TraversalInvariantError(Diagnostics.blockDetachedFromRoot(current, block).build());
        }
        this.trace?.debug('exhausted', { last: current });
        this.position = null;
        return;
      }

      const resumed = this.resumeInOwner(owner, block);
      if (resumed !== null) {
        this.trace?.debug('descend', { from: owner, block: resumed });
        this.position = { block: resumed, index: 0 };
        return;
      }
      this.trace?.debug('climb', { from: current, to: owner });
      current = owner;
    }
  }

  /**
   * `exhaustedBlock` 结束后，拥有者中下一个非空子块（then 之后的 else）；没有则返回 null。
   */
  private resumeInOwner(owner: NodeId, exhaustedBlock: BlockId): BlockId | null {
    const ownerNode = this.graph.node(owner);
    if (ownerNode.kind === 'Plain') {
      throw new TraversalInvariantError(
        Diagnostics.ownerWithoutChildBlocks(owner, exhaustedBlock).build()
      );
    }
    const slot = ownerNode.blocks.indexOf(exhaustedBlock);
    if (slot < 0) {
      throw new TraversalInvariantError(
        Diagnostics.blockNotOwnedByOwner(owner, exhaustedBlock).build()
      );
    }
    for (const later of ownerNode.blocks.slice(slot + 1)) {
      if (this.graph.nodes(later).length > 0) return later;
    }
    return null;
  }

  private indexIn(siblings: readonly NodeId[], node: NodeId, block: BlockId): number {
    const index = siblings.indexOf(node);
    if (index < 0) {
      throw new TraversalInvariantError(Diagnostics.nodeMissingFromBlock(node, block).build());
    }
    return index;
  }
}
