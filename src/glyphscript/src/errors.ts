import type { Position } from './tokens.js';

export enum ErrorCode {
  ParseUnexpectedToken = 2001,
  ParseExpectedValue = 2002,
  ParseUndefinedVar = 2003,
  ParseUnknownCommand = 2004,
  ParseMissingBracket = 2005,
  ParseInvalidProperty = 2006,
  ParseExpectedColor = 2007,
  ParseExpectedNumber = 2008,
  ParseExpectedPair = 2009,
  ParseExpectedString = 2010,
  ParseMissingEquals = 2011,
  ParseEmptyValue = 2012,

  WsInvalidMessage = 4001,
  WsInvalidPayload = 4002,
  WsConnectionError = 4003,
  WsBroadcastError = 4004,

  RenderSvgError = 5003,
}

export type ErrorCategory = 'lexer' | 'parser' | 'runtime' | 'transport' | 'render';

export type Severity = 'info' | 'warning' | 'error' | 'fatal';

/**
 * What the pipeline did after recording a diagnostic:
 * - `skip`: the offending construct (token, line or block) was dropped
 * - `passThroughLiteral`: an unresolved reference was kept as its literal text
 * - `resumeAtNextToken`: parsing moved one token forward and carried on
 */
export type RecoveryAction = 'skip' | 'passThroughLiteral' | 'resumeAtNextToken';

export interface Diagnostic {
  readonly code: ErrorCode;
  readonly message: string;
  readonly line: number;
  readonly column: number;
  readonly severity: Severity;
  readonly recovery?: RecoveryAction;
  readonly context?: string;
}

/** Wire shape handed to transport and tool callers. */
export interface ErrorRecord {
  code: number;
  category: ErrorCategory;
  message: string;
  line: number;
  column: number;
  severity: Severity;
  context?: string;
}

const CATEGORIES: Record<number, ErrorCategory> = {
  1: 'lexer',
  2: 'parser',
  3: 'runtime',
  4: 'transport',
  5: 'render',
};

const SEVERITY_RANK: Record<Severity, number> = { info: 0, warning: 1, error: 2, fatal: 3 };

/** Codes are grouped by thousands: 1xxx lexer, 2xxx parser, 3xxx runtime, 4xxx transport, 5xxx render. */
export function categoryOf(code: number): ErrorCategory {
  return CATEGORIES[Math.floor(code / 1000)] ?? 'runtime';
}

export function diagnostic(
  code: ErrorCode,
  message: string,
  at: Position = { line: 0, column: 0 },
  extra: { severity?: Severity; recovery?: RecoveryAction; context?: string } = {},
): Diagnostic {
  return {
    code,
    message,
    line: at.line,
    column: at.column,
    severity: extra.severity ?? 'error',
    ...(extra.recovery !== undefined ? { recovery: extra.recovery } : {}),
    ...(extra.context !== undefined ? { context: extra.context } : {}),
  };
}

export function toRecord(d: Diagnostic): ErrorRecord {
  return {
    code: d.code,
    category: categoryOf(d.code),
    message: d.message,
    line: d.line,
    column: d.column,
    severity: d.severity,
    ...(d.context ? { context: d.context } : {}),
  };
}

export function formatDiagnostic(d: Diagnostic): string {
  const location = d.line || d.column ? `[${d.line}:${d.column}] ` : '';
  return `${location}E${d.code}: ${d.message}`;
}

export function errorsToResponse(errors: readonly Diagnostic[], includeWarnings = true): ErrorRecord[] {
  return errors
    .filter(e => includeWarnings || SEVERITY_RANK[e.severity] >= SEVERITY_RANK.error)
    .map(toRecord);
}

export function hasFatal(errors: readonly Diagnostic[]): boolean {
  return errors.some(e => e.severity === 'fatal');
}

export function summarizeErrors(errors: readonly Diagnostic[]): string {
  if (errors.length === 0) {
    return 'No errors';
  }
  return errors.map(formatDiagnostic).join('; ');
}
