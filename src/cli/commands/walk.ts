import { performance } from 'node:perf_hooks';
import { collectDepthFirst, nodeDepth } from '../../traversal/walk.js';
import type { NodeKind } from '../../types.js';
import { logPerformance } from '../../utils/logger.js';
import { requireGraph } from '../utils/graph-file.js';
import { output } from '../utils/logger.js';

export interface WalkOptions {
  json?: boolean;
}

export interface WalkEntry {
  readonly id: number;
  readonly kind: NodeKind;
  readonly label: string;
  readonly depth: number;
}

/**
 * 按深度优先顺序列出图中所有节点。
 *
 * 文本模式每行一个节点，按嵌套深度缩进两个空格；`--json` 输出 WalkEntry 数组。
 */
export async function walkCommand(file: string, options: WalkOptions = {}): Promise<void> {
  const graph = requireGraph(file);

  const started = performance.now();
  const entries: WalkEntry[] = collectDepthFirst(graph).map(node => ({
    id: node.id,
    kind: node.kind,
    label: node.label,
    depth: nodeDepth(graph, node.id),
  }));
  logPerformance({
    component: 'cli',
    operation: 'walk',
    duration: performance.now() - started,
    metadata: { nodes: entries.length },
  });

  if (options.json) {
    output(JSON.stringify(entries, null, 2));
    return;
  }
  for (const entry of entries) {
    output(`${'  '.repeat(entry.depth)}${entry.label}`);
  }
}
