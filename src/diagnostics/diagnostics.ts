// Structured diagnostics with error codes and IR locations

import type { BlockId, IrLocation, NodeId } from '../types.js';

export enum DiagnosticSeverity {
  Error = 'error',
}

export enum DiagnosticCode {
  // Graph structure errors (G001-G099)
  G001_MissingRootBlock = 'G001',
  G002_RootBlockOwned = 'G002',
  G003_DanglingBlockReference = 'G003',
  G004_DanglingNodeReference = 'G004',
  G005_ChildBlockCountMismatch = 'G005',
  G006_SharedConditionalBranch = 'G006',
  G007_NodeNotInOwningBlock = 'G007',
  G008_NodeInForeignBlock = 'G008',
  G009_BlockOwnerMismatch = 'G009',
  G010_BlockClaimedTwice = 'G010',
  G011_OrphanBlock = 'G011',
  G012_Unreachable = 'G012',
  G013_IdMismatch = 'G013',

  // Traversal invariant violations (T001-T099)
  T001_OwnerWithoutChildBlocks = 'T001',
  T002_NodeMissingFromBlock = 'T002',
  T003_BlockNotOwnedByOwner = 'T003',
  T004_UnknownId = 'T004',
  T005_PositionOutOfRange = 'T005',
  T006_BlockDetachedFromRoot = 'T006',

  // Graph input errors (J001-J099)
  J001_InvalidJson = 'J001',
  J002_UnsupportedVersion = 'J002',
  J003_SchemaViolation = 'J003',
  J004_FileNotFound = 'J004',
  J005_FileUnreadable = 'J005',
  J006_NestingTooDeep = 'J006',
}

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly location: IrLocation;
}

export class DiagnosticError extends Error {
  public readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.diagnostic = diagnostic;
    this.name = 'DiagnosticError';
  }
}

/**
 * 图结构不满足遍历前提时抛出的内部一致性错误。
 *
 * 说明调用方构造了畸形的图；遍历是确定性的，不应重试。
 */
export class TraversalInvariantError extends DiagnosticError {
  constructor(diagnostic: Diagnostic) {
    super(diagnostic);
    this.name = 'TraversalInvariantError';
  }
}

export class DiagnosticBuilder {
  private code?: DiagnosticCode;
  private message?: string;
  private location: IrLocation = {};

  static error(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withCode(code);
  }

  withCode(code: DiagnosticCode): DiagnosticBuilder {
    this.code = code;
    return this;
  }

  withMessage(message: string): DiagnosticBuilder {
    this.message = message;
    return this;
  }

  withNode(node: NodeId): DiagnosticBuilder {
    this.location = { ...this.location, node };
    return this;
  }

  withBlock(block: BlockId): DiagnosticBuilder {
    this.location = { ...this.location, block };
    return this;
  }

  withPath(path: string): DiagnosticBuilder {
    this.location = { ...this.location, path };
    return this;
  }

  build(): Diagnostic {
    if (!this.code) throw new Error('Diagnostic code is required');
    if (!this.message) throw new Error('Diagnostic message is required');

    return {
      severity: DiagnosticSeverity.Error,
      code: this.code,
      message: this.message,
      location: this.location,
    };
  }
}

// Common diagnostic patterns
export const Diagnostics = {
  ownerWithoutChildBlocks: (owner: NodeId, block: BlockId): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.T001_OwnerWithoutChildBlocks)
      .withMessage(`Node ${owner} owns block ${block} but its kind has no child blocks`)
      .withNode(owner)
      .withBlock(block),

  nodeMissingFromBlock: (node: NodeId, block: BlockId): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.T002_NodeMissingFromBlock)
      .withMessage(`Node ${node} is not listed in its owning block ${block}`)
      .withNode(node)
      .withBlock(block),

  blockNotOwnedByOwner: (owner: NodeId, block: BlockId): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.T003_BlockNotOwnedByOwner)
      .withMessage(`Block ${block} names node ${owner} as owner, but the node does not list it`)
      .withNode(owner)
      .withBlock(block),

  positionOutOfRange: (block: BlockId, index: number): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.T005_PositionOutOfRange)
      .withMessage(`Cursor position ${index} is past the end of block ${block}; was the graph mutated?`)
      .withBlock(block),

  blockDetachedFromRoot: (node: NodeId, block: BlockId): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.T006_BlockDetachedFromRoot)
      .withMessage(`Block ${block} holding node ${node} has no owning node but is not the root block`)
      .withNode(node)
      .withBlock(block),

  unknownNode: (node: NodeId): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.T004_UnknownId)
      .withMessage(`Unknown node id ${node}`)
      .withNode(node),

  unknownBlock: (block: BlockId): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.T004_UnknownId)
      .withMessage(`Unknown block id ${block}`)
      .withBlock(block),
};

function describeLocation(location: IrLocation): string {
  const parts: string[] = [];
  if (location.node !== undefined) parts.push(`node ${location.node}`);
  if (location.block !== undefined) parts.push(`block ${location.block}`);
  if (location.path !== undefined) parts.push(`at ${location.path || '/'}`);
  return parts.length > 0 ? ` (${parts.join(', ')})` : '';
}

// Utility to format diagnostics for display
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const { severity, code, message, location } = diagnostic;
  return `${severity} ${code}: ${message}${describeLocation(location)}`;
}
