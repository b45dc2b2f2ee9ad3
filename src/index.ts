/**
 * @module ir-walker
 *
 * 层次化 IR 图的深度优先遍历。
 *
 * 图由块（有序节点序列）组成；Conditional 节点拥有 then / else 两个子块，
 * Region 节点拥有一个子块。`DepthFirstCursor` 以先序顺序逐个返回节点，
 * 不使用递归。
 *
 * @example 基础用法
 * ```typescript
 * import { Ir, buildGraph, DepthFirstCursor, EXHAUSTED } from 'ir-walker';
 *
 * const graph = buildGraph([
 *   Ir.plain('load'),
 *   Ir.conditional('if', [Ir.plain('add')], [Ir.plain('sub')]),
 *   Ir.plain('store'),
 * ]);
 * const cursor = new DepthFirstCursor(graph);
 * for (let n = cursor.next(); n !== EXHAUSTED; n = cursor.next()) {
 *   console.log(n.label); // load, if, add, sub, store
 * }
 * ```
 */

export const VERSION = '0.1.0';

// IR 模型
export { Graph } from './ir/graph.js';
export { Ir } from './ir/ir.js';
export { GraphBuilder, buildGraph, toTree } from './ir/builder.js';
export { validateGraph, assertValidGraph } from './ir/validator.js';
export { formatGraph } from './ir/pretty.js';
export {
  GRAPH_JSON_VERSION,
  MAX_JSON_DEPTH,
  serializeGraph,
  parseGraphJson,
  loadGraphFile,
  isValidGraphJson,
} from './ir/ir_json.js';
export type { GraphEnvelope } from './ir/ir_json.js';

// 遍历
export {
  DepthFirstCursor,
  EXHAUSTED,
  depthFirstNodes,
  collectDepthFirst,
  nodeDepth,
} from './traversal/index.js';
export type { Exhausted } from './traversal/index.js';

// 诊断
export * from './diagnostics/index.js';

// 配置与日志
export { ConfigService } from './config/config-service.js';
export { Logger, LogLevel, createLogger } from './utils/logger.js';

export { CHILD_BLOCK_COUNT, NODE_KINDS } from './types.js';
export type {
  NodeId,
  BlockId,
  NodeKind,
  IrNode,
  IrBlock,
  GraphArena,
  IrTreeNode,
  IrLocation,
} from './types.js';
