import type { Graph } from '../../ir/graph.js';
import { loadGraphFile } from '../../ir/ir_json.js';
import { createDiagnosticsError } from './error-handler.js';

/**
 * 读取图文件；失败时抛出携带诊断的错误，交由 handleError 输出。
 */
export function requireGraph(file: string): Graph {
  const loaded = loadGraphFile(file);
  if (Array.isArray(loaded)) {
    throw createDiagnosticsError(loaded);
  }
  return loaded;
}
