/**
 * @module diagnostics
 *
 * 诊断系统模块。
 *
 * 包含：
 * - 结构化诊断 (Diagnostic, DiagnosticBuilder, DiagnosticError)
 * - 遍历不变量错误 (TraversalInvariantError)
 * - 诊断严重级别与代码 (DiagnosticSeverity, DiagnosticCode)
 */

export {
  DiagnosticSeverity,
  DiagnosticCode,
  DiagnosticError,
  TraversalInvariantError,
  DiagnosticBuilder,
  Diagnostics,
  formatDiagnostic,
  type Diagnostic,
} from './diagnostics.js';
