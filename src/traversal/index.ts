/**
 * @module traversal
 *
 * 深度优先遍历：游标 (DepthFirstCursor) 与基于它的迭代辅助函数。
 */

export { DepthFirstCursor, EXHAUSTED } from './cursor.js';
export type { Exhausted } from './cursor.js';
export { depthFirstNodes, collectDepthFirst, nodeDepth } from './walk.js';
