import { describe, expect, it } from 'vitest';
import {
  categoryOf,
  diagnostic,
  ErrorCode,
  errorsToResponse,
  formatDiagnostic,
  hasFatal,
  summarizeErrors,
  toRecord,
} from './errors.js';

const undefinedVar = diagnostic(ErrorCode.ParseUndefinedVar, 'Undefined variable: $x', { line: 2, column: 5 }, {
  recovery: 'passThroughLiteral',
});

describe('categoryOf', () => {
  it('derives the category from the code range', () => {
    expect([1001, ErrorCode.ParseUnknownCommand, 3001, ErrorCode.WsInvalidMessage, ErrorCode.RenderSvgError].map(c => categoryOf(c))).toEqual([
      'lexer',
      'parser',
      'runtime',
      'transport',
      'render',
    ]);
  });
});

describe('toRecord', () => {
  it('serializes to the wire shape', () => {
    expect(toRecord(undefinedVar)).toEqual({
      code: 2003,
      category: 'parser',
      message: 'Undefined variable: $x',
      line: 2,
      column: 5,
      severity: 'error',
    });
  });

  it('includes context when present', () => {
    const d = diagnostic(ErrorCode.ParseUnknownCommand, "Unknown command: 'rectt'", undefined, { context: "Did you mean 'rect'?" });
    expect(toRecord(d).context).toBe("Did you mean 'rect'?");
  });
});

describe('formatting and filtering', () => {
  const warning = diagnostic(ErrorCode.ParseInvalidProperty, 'Unknown canvas property', { line: 1, column: 8 }, { severity: 'warning' });
  const fatal = diagnostic(ErrorCode.RenderSvgError, 'Render failed: boom', undefined, { severity: 'fatal' });

  it('formats with an optional location', () => {
    expect(formatDiagnostic(undefinedVar)).toBe('[2:5] E2003: Undefined variable: $x');
    expect(formatDiagnostic(fatal)).toBe('E5003: Render failed: boom');
  });

  it('drops warnings on request', () => {
    expect(errorsToResponse([undefinedVar, warning]).map(r => r.code)).toEqual([2003, 2006]);
    expect(errorsToResponse([undefinedVar, warning], false).map(r => r.code)).toEqual([2003]);
  });

  it('detects fatal errors', () => {
    expect(hasFatal([undefinedVar, warning])).toBe(false);
    expect(hasFatal([undefinedVar, fatal])).toBe(true);
  });

  it('summarizes', () => {
    expect(summarizeErrors([])).toBe('No errors');
    expect(summarizeErrors([undefinedVar, warning])).toBe(
      '[2:5] E2003: Undefined variable: $x; [1:8] E2006: Unknown canvas property',
    );
  });
});
