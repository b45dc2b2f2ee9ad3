import type { BlockId, IrNode, NodeId } from '../types.js';
import type { Graph } from './graph.js';

type Line =
  | { kind: 'node'; id: NodeId; depth: number }
  | { kind: 'header'; owner: IrNode; slot: number; block: BlockId; depth: number };

const ROLES: Record<IrNode['kind'], readonly string[]> = {
  Plain: [],
  Conditional: ['then', 'else'],
  Region: ['body'],
};

function indent(depth: number): string {
  return '  '.repeat(depth);
}

function roleOf(owner: IrNode, slot: number): string {
  return ROLES[owner.kind][slot] ?? `block${slot}`;
}

/**
 * 以缩进文本输出整张图，子块以 `then:` / `else:` / `body:` 标题分组。
 */
export function formatGraph(graph: Graph): string {
  const rootNodes = graph.nodes(graph.rootBlock);
  if (rootNodes.length === 0) return '(empty)';

  const out: string[] = [];
  const stack: Line[] = [...rootNodes].reverse().map((id): Line => ({ kind: 'node', id, depth: 0 }));

  let item = stack.pop();
  while (item) {
    if (item.kind === 'header') {
      const empty = graph.nodes(item.block).length === 0;
      out.push(`${indent(item.depth)}${roleOf(item.owner, item.slot)}:${empty ? ' (empty)' : ''}`);
    } else {
      const node = graph.node(item.id);
      out.push(node.blocks.length > 0 ? `${indent(item.depth)}${node.label} : ${node.kind}` : `${indent(item.depth)}${node.label}`);
      for (let slot = node.blocks.length - 1; slot >= 0; slot--) {
        const block = node.blocks[slot];
        if (block === undefined) continue;
        const children = graph.nodes(block);
        for (let i = children.length - 1; i >= 0; i--) {
          const child = children[i];
          if (child !== undefined) stack.push({ kind: 'node', id: child, depth: item.depth + 2 });
        }
        stack.push({ kind: 'header', owner: node, slot, block, depth: item.depth + 1 });
      }
    }
    item = stack.pop();
  }

  return out.join('\n');
}
