/**
 * @module diagnostics
 *
 * 诊断系统模块。
 *
 * 包含：
 * - 结构化诊断 (Diagnostic, DiagnosticBuilder, DiagnosticError)
 * - 诊断严重级别 (DiagnosticSeverity)
 * - 诊断代码 (DiagnosticCode)
 */

export {
  DiagnosticSeverity,
  DiagnosticCode,
  DiagnosticError,
  DiagnosticBuilder,
  Diagnostics,
  formatDiagnostic,
  type Diagnostic,
  type RelatedInformation,
} from './diagnostics.js';
