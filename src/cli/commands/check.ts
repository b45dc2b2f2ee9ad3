import { validateGraph } from '../../ir/validator.js';
import { createDiagnosticsError } from '../utils/error-handler.js';
import { requireGraph } from '../utils/graph-file.js';
import { success } from '../utils/logger.js';

/**
 * 校验图文件。`IR_WALKER_VALIDATE=0` 时加载阶段不校验，这里仍会完整检查一次。
 */
export async function checkCommand(file: string): Promise<void> {
  const graph = requireGraph(file);
  const diagnostics = validateGraph(graph);
  if (diagnostics.length > 0) {
    throw createDiagnosticsError(diagnostics);
  }
  success(`${file}: ${graph.nodeCount} nodes, ${graph.blockCount} blocks`);
}
