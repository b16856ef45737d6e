/**
 * Diagnostics produced while parsing and resolving outlines.
 *
 * The goal is to keep all "user-facing" feedback structured:
 * - `code`: stable identifier for programmatic handling.
 * - `message`: human-readable description.
 * - `line`: 0-based line index (when applicable).
 *
 * The engine never aborts on a single bad line; everything it finds is
 * reported here next to a best-effort model.
 */
export type DiagnosticSeverity = 'error' | 'warning';

export type DiagnosticCode =
  | 'LEX_ERROR'
  | 'ORPHAN_TEXT'
  | 'MALFORMED_DATE'
  | 'MALFORMED_RECURRENCE_SPEC'
  | 'DUPLICATE_TAG_DEFINITION'
  | 'UNRESOLVED_DEPENDENCY'
  | 'CYCLIC_DEPENDENCY'
  | 'MISSING_NEXT_ACTION'
  | 'EMPTY_DOCUMENT';

export interface Diagnostic {
  severity: DiagnosticSeverity;
  code: DiagnosticCode;
  message: string;
  line?: number; // 0-based
}

/**
 * Helper for building a warning diagnostic.
 */
export function warningDiagnostic(
  code: DiagnosticCode,
  message: string,
  line?: number
): Diagnostic {
  return { severity: 'warning', code, message, line };
}
