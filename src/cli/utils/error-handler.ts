import type { Diagnostic } from '../../diagnostics/diagnostics.js';
import { DiagnosticCode, DiagnosticError, formatDiagnostic } from '../../diagnostics/diagnostics.js';
import { error as logError, warn as logWarn } from './logger.js';

type CliErrorCategory = 'graph' | 'traversal' | 'input' | 'unknown';

interface DiagnosticCarrier extends Error {
  diagnostics?: Diagnostic[];
}

const KNOWN_CODES = new Set<string>(Object.values(DiagnosticCode));

function isDiagnostic(value: unknown): value is Diagnostic {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    typeof value.code === 'string' &&
    KNOWN_CODES.has(value.code)
  );
}

function isDiagnosticArray(value: unknown): value is Diagnostic[] {
  return Array.isArray(value) && value.every(isDiagnostic);
}

function isDiagnosticCarrier(error: unknown): error is DiagnosticCarrier {
  return error instanceof Error && 'diagnostics' in error && isDiagnosticArray(error.diagnostics);
}

function classify(code: DiagnosticCode): CliErrorCategory {
  if (code.startsWith('G')) return 'graph';
  if (code.startsWith('T')) return 'traversal';
  if (code.startsWith('J')) return 'input';
  return 'unknown';
}

function hintFor(code: DiagnosticCode): string | null {
  switch (classify(code)) {
    case 'graph':
      return '图结构不满足所有权约束，请检查生成该图的工具';
    case 'traversal':
      return '遍历时发现内部不一致，图在遍历期间可能被修改或本身畸形';
    case 'input':
      return '输入文件格式有误，请按照 ir.schema.json 修复后重试';
    default:
      return null;
  }
}

function printDiagnostics(diags: Diagnostic[]): void {
  for (const diag of diags) {
    logError(formatDiagnostic(diag));
  }
  // 同类诊断只提示一次
  const hints = new Set<string>();
  for (const diag of diags) {
    const hint = hintFor(diag.code);
    if (hint) hints.add(hint);
  }
  for (const hint of hints) {
    logWarn(hint);
  }
}

export function createDiagnosticsError(diagnostics: Diagnostic[]): Error {
  const error: DiagnosticCarrier = new Error('CLI_DIAGNOSTIC_ERROR');
  error.diagnostics = diagnostics;
  return error;
}

export function handleError(error: unknown): never {
  if (error instanceof DiagnosticError) {
    printDiagnostics([error.diagnostic]);
    process.exit(1);
  }

  if (isDiagnosticCarrier(error)) {
    printDiagnostics(error.diagnostics ?? []);
    process.exit(1);
  }

  if (isDiagnosticArray(error)) {
    printDiagnostics(error);
    process.exit(1);
  }

  if (error instanceof Error) {
    logError(error.message);
  } else {
    logError('发生未知错误，请重试');
  }

  process.exit(1);
}
