// IR 图的数据模型：节点与块保存在 arena 中，通过数字 id 互相引用

/** 节点在 arena 中的下标 */
export type NodeId = number;

/** 块在 arena 中的下标 */
export type BlockId = number;

/**
 * 节点种类。
 *
 * - `Plain`：普通指令，不拥有子块
 * - `Conditional`：拥有 then / else 两个子块
 * - `Region`：拥有一个子块（循环体、作用域块等，遍历行为一致）
 */
export type NodeKind = 'Plain' | 'Conditional' | 'Region';

export const NODE_KINDS: readonly NodeKind[] = ['Plain', 'Conditional', 'Region'];

/** 每种节点应拥有的子块数量 */
export const CHILD_BLOCK_COUNT: Readonly<Record<NodeKind, number>> = {
  Plain: 0,
  Conditional: 2,
  Region: 1,
};

export interface IrNode {
  readonly id: NodeId;
  readonly kind: NodeKind;
  /** 操作名，仅用于展示与测试 */
  readonly label: string;
  /** 直接包含该节点的块（非拥有关系的回指） */
  readonly owningBlock: BlockId;
  /** 按声明顺序排列的子块；Conditional 为 [then, else] */
  readonly blocks: readonly BlockId[];
}

export interface IrBlock {
  readonly id: BlockId;
  /** 拥有该块的节点；根块为 null */
  readonly owningNode: NodeId | null;
  readonly nodes: readonly NodeId[];
}

/** 未经校验的原始 arena，由 `Graph.fromArena` 包装 */
export interface GraphArena {
  readonly root: BlockId;
  readonly nodes: readonly IrNode[];
  readonly blocks: readonly IrBlock[];
}

/**
 * 声明式树形节点，`Ir.plain / Ir.conditional / Ir.region` 的产物，
 * 也是 JSON 格式中的节点形状。
 */
export interface IrTreeNode {
  readonly kind: NodeKind;
  readonly label: string;
  /** 省略等同于没有子块 */
  readonly blocks?: readonly (readonly IrTreeNode[])[];
}

/** 诊断附带的 IR 位置；取代源码 span */
export interface IrLocation {
  readonly block?: BlockId;
  readonly node?: NodeId;
  /** JSON 输入中的路径（JSON Pointer） */
  readonly path?: string;
}
