/**
 * IR 图结构校验
 *
 * 检查遍历所依赖的数据模型不变量：所有权唯一、回指一致、子块数量与节点种类匹配、
 * 自根块可达（无环、无孤立块）。返回诊断数组，空数组表示校验通过。
 */

import {
  DiagnosticBuilder,
  DiagnosticCode,
  DiagnosticError,
  type Diagnostic,
} from '../diagnostics/diagnostics.js';
import { CHILD_BLOCK_COUNT, type BlockId, type NodeId } from '../types.js';
import type { Graph } from './graph.js';

export function validateGraph(graph: Graph): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  const nodes = graph.allNodes();
  const blocks = graph.allBlocks();

  nodes.forEach((node, index) => {
    if (node.id !== index) {
      diagnostics.push(
        DiagnosticBuilder.error(DiagnosticCode.G013_IdMismatch)
          .withMessage(`Node stored at index ${index} carries id ${node.id}`)
          .withNode(index)
          .build()
      );
    }
  });
  blocks.forEach((block, index) => {
    if (block.id !== index) {
      diagnostics.push(
        DiagnosticBuilder.error(DiagnosticCode.G013_IdMismatch)
          .withMessage(`Block stored at index ${index} carries id ${block.id}`)
          .withBlock(index)
          .build()
      );
    }
  });

  const root = graph.rootBlock;
  if (!graph.hasBlock(root)) {
    diagnostics.push(
      DiagnosticBuilder.error(DiagnosticCode.G001_MissingRootBlock)
        .withMessage(`Root block ${root} does not exist`)
        .withBlock(root)
        .build()
    );
    return diagnostics;
  }
  if (graph.block(root).owningNode !== null) {
    diagnostics.push(
      DiagnosticBuilder.error(DiagnosticCode.G002_RootBlockOwned)
        .withMessage(`Root block ${root} must not have an owning node`)
        .withBlock(root)
        .build()
    );
  }

  checkNodes(graph, diagnostics);
  checkBlocks(graph, diagnostics);
  checkReachability(graph, diagnostics);

  return diagnostics;
}

function checkNodes(graph: Graph, diagnostics: Diagnostic[]): void {
  const claimedBy = new Map<BlockId, NodeId>();

  for (const node of graph.allNodes()) {
    const expected = CHILD_BLOCK_COUNT[node.kind];
    if (node.blocks.length !== expected) {
      diagnostics.push(
        DiagnosticBuilder.error(DiagnosticCode.G005_ChildBlockCountMismatch)
          .withMessage(
            `${node.kind} node '${node.label}' must own ${expected} child block(s), found ${node.blocks.length}`
          )
          .withNode(node.id)
          .build()
      );
    }

    if (node.kind === 'Conditional' && node.blocks.length === 2 && node.blocks[0] === node.blocks[1]) {
      diagnostics.push(
        DiagnosticBuilder.error(DiagnosticCode.G006_SharedConditionalBranch)
          .withMessage(`Conditional node '${node.label}' uses the same block for then and else`)
          .withNode(node.id)
          .build()
      );
    }

    for (const child of node.blocks) {
      if (!graph.hasBlock(child)) {
        diagnostics.push(
          DiagnosticBuilder.error(DiagnosticCode.G003_DanglingBlockReference)
            .withMessage(`Node '${node.label}' references missing child block ${child}`)
            .withNode(node.id)
            .withBlock(child)
            .build()
        );
        continue;
      }

      const previous = claimedBy.get(child);
      if (previous !== undefined && previous !== node.id) {
        diagnostics.push(
          DiagnosticBuilder.error(DiagnosticCode.G010_BlockClaimedTwice)
            .withMessage(`Block ${child} is claimed by nodes ${previous} and ${node.id}`)
            .withNode(node.id)
            .withBlock(child)
            .build()
        );
      } else {
        claimedBy.set(child, node.id);
      }

      if (graph.block(child).owningNode !== node.id) {
        diagnostics.push(
          DiagnosticBuilder.error(DiagnosticCode.G009_BlockOwnerMismatch)
            .withMessage(`Block ${child} does not point back at its owner '${node.label}'`)
            .withNode(node.id)
            .withBlock(child)
            .build()
        );
      }
    }

    if (!graph.hasBlock(node.owningBlock)) {
      diagnostics.push(
        DiagnosticBuilder.error(DiagnosticCode.G003_DanglingBlockReference)
          .withMessage(`Node '${node.label}' names missing owning block ${node.owningBlock}`)
          .withNode(node.id)
          .withBlock(node.owningBlock)
          .build()
      );
      continue;
    }

    const occurrences = graph.nodes(node.owningBlock).filter(id => id === node.id).length;
    if (occurrences !== 1) {
      diagnostics.push(
        DiagnosticBuilder.error(DiagnosticCode.G007_NodeNotInOwningBlock)
          .withMessage(
            occurrences === 0
              ? `Node '${node.label}' is missing from its owning block ${node.owningBlock}`
              : `Node '${node.label}' appears ${occurrences} times in block ${node.owningBlock}`
          )
          .withNode(node.id)
          .withBlock(node.owningBlock)
          .build()
      );
    }
  }
}

function checkBlocks(graph: Graph, diagnostics: Diagnostic[]): void {
  for (const block of graph.allBlocks()) {
    if (block.owningNode === null) {
      if (block.id !== graph.rootBlock) {
        diagnostics.push(
          DiagnosticBuilder.error(DiagnosticCode.G011_OrphanBlock)
            .withMessage(`Block ${block.id} has no owning node and is not the root block`)
            .withBlock(block.id)
            .build()
        );
      }
    } else if (!graph.hasNode(block.owningNode)) {
      diagnostics.push(
        DiagnosticBuilder.error(DiagnosticCode.G004_DanglingNodeReference)
          .withMessage(`Block ${block.id} names missing owning node ${block.owningNode}`)
          .withBlock(block.id)
          .withNode(block.owningNode)
          .build()
      );
    }

    for (const id of block.nodes) {
      if (!graph.hasNode(id)) {
        diagnostics.push(
          DiagnosticBuilder.error(DiagnosticCode.G004_DanglingNodeReference)
            .withMessage(`Block ${block.id} lists missing node ${id}`)
            .withBlock(block.id)
            .withNode(id)
            .build()
        );
      } else if (graph.node(id).owningBlock !== block.id) {
        diagnostics.push(
          DiagnosticBuilder.error(DiagnosticCode.G008_NodeInForeignBlock)
            .withMessage(`Block ${block.id} lists node ${id}, which belongs to block ${graph.node(id).owningBlock}`)
            .withBlock(block.id)
            .withNode(id)
            .build()
        );
      }
    }
  }
}

function checkReachability(graph: Graph, diagnostics: Diagnostic[]): void {
  const seenBlocks = new Set<BlockId>([graph.rootBlock]);
  const seenNodes = new Set<NodeId>();
  const pending: BlockId[] = [graph.rootBlock];

  let block = pending.pop();
  while (block !== undefined) {
    for (const id of graph.nodes(block)) {
      if (!graph.hasNode(id) || seenNodes.has(id)) continue;
      seenNodes.add(id);
      for (const child of graph.childBlocks(id)) {
        if (graph.hasBlock(child) && !seenBlocks.has(child)) {
          seenBlocks.add(child);
          pending.push(child);
        }
      }
    }
    block = pending.pop();
  }

  for (const b of graph.allBlocks()) {
    if (!seenBlocks.has(b.id)) {
      diagnostics.push(
        DiagnosticBuilder.error(DiagnosticCode.G012_Unreachable)
          .withMessage(`Block ${b.id} is not reachable from the root block`)
          .withBlock(b.id)
          .build()
      );
    }
  }
  for (const n of graph.allNodes()) {
    if (!seenNodes.has(n.id)) {
      diagnostics.push(
        DiagnosticBuilder.error(DiagnosticCode.G012_Unreachable)
          .withMessage(`Node '${n.label}' is not reachable from the root block`)
          .withNode(n.id)
          .build()
      );
    }
  }
}

/**
 * 校验失败时抛出第一条诊断。
 */
export function assertValidGraph(graph: Graph): void {
  const [first] = validateGraph(graph);
  if (first) throw new DiagnosticError(first);
}
