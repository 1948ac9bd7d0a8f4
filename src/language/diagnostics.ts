import { Span } from './ast';

export type DiagnosticSeverity = 'error' | 'warning';

export interface Diagnostic {
  severity: DiagnosticSeverity;
  /** Stable machine-readable identifier, e.g. `E_UNKNOWN_TYPE`. */
  code: string;
  message: string;
  span?: Span;
}

export function error(code: string, message: string, span?: Span): Diagnostic {
  return { severity: 'error', code, message, span };
}

export function warning(code: string, message: string, span?: Span): Diagnostic {
  return { severity: 'warning', code, message, span };
}

export function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}

/**
 * Renders a diagnostic as `line:column message`, the form used in error
 * responses and script output.
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const location = diagnostic.span
    ? `${diagnostic.span.start.line}:${diagnostic.span.start.column} `
    : '';
  return `${location}${diagnostic.severity}[${diagnostic.code}]: ${diagnostic.message}`;
}

/**
 * Base class for failures that carry schema diagnostics.
 */
export class SchemaError extends Error {
  constructor(
    message: string,
    readonly diagnostics: Diagnostic[],
  ) {
    super(message);
    this.name = new.target.name;
  }

  get errors(): Diagnostic[] {
    return this.diagnostics.filter((d) => d.severity === 'error');
  }
}

export class SchemaParseError extends SchemaError {
  constructor(diagnostics: Diagnostic[]) {
    super(summarize('Schema parsing failed', diagnostics), diagnostics);
  }
}

export class SchemaValidationError extends SchemaError {
  constructor(diagnostics: Diagnostic[]) {
    super(summarize('Schema validation failed', diagnostics), diagnostics);
  }
}

function summarize(title: string, diagnostics: Diagnostic[]): string {
  const count = diagnostics.filter((d) => d.severity === 'error').length;
  return `${title} with ${count} error${count === 1 ? '' : 's'}`;
}
