import { formatGraph } from '../../ir/pretty.js';
import { requireGraph } from '../utils/graph-file.js';
import { output } from '../utils/logger.js';

export async function printCommand(file: string): Promise<void> {
  output(formatGraph(requireGraph(file)));
}
