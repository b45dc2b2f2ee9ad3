// 声明式 IR 构造器：先描述树，再由 buildGraph 落成 arena

import type { IrTreeNode } from '../types.js';

export const Ir = {
  plain: (label: string): IrTreeNode => ({ kind: 'Plain', label }),

  conditional: (
    label: string,
    thenNodes: readonly IrTreeNode[],
    elseNodes: readonly IrTreeNode[]
  ): IrTreeNode => ({
    kind: 'Conditional',
    label,
    blocks: [thenNodes, elseNodes],
  }),

  region: (label: string, body: readonly IrTreeNode[]): IrTreeNode => ({
    kind: 'Region',
    label,
    blocks: [body],
  }),
};
