// Structured diagnostics with error codes and spans

import type { Location, Span } from '../types.js';

export enum DiagnosticSeverity {
  Error = 'error',
  Warning = 'warning',
  Info = 'info',
}

export enum DiagnosticCode {
  // IR structure (I001-I099)
  I001_UnresolvedOperand = 'I001',
  I002_DuplicateValue = 'I002',
  I003_TerminatorInBody = 'I003',
  I004_TerminatorNotMarked = 'I004',
  I005_UnknownSuccessor = 'I005',
  I006_DenseShapeMismatch = 'I006',
  I007_DuplicateSymbol = 'I007',
  I008_ReservedEntryLabel = 'I008',
}

export interface RelatedInformation {
  readonly span: Span;
  readonly message: string;
}

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly span: Span;
  readonly file?: string;
  readonly relatedInformation?: readonly RelatedInformation[];
}

export class DiagnosticError extends Error {
  public readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.diagnostic = diagnostic;
    this.name = 'DiagnosticError';
  }
}

export class DiagnosticBuilder {
  private severity: DiagnosticSeverity = DiagnosticSeverity.Error;
  private code?: DiagnosticCode;
  private message?: string;
  private span?: Span;
  private file?: string;
  private relatedInformation: RelatedInformation[] = [];

  static error(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Error).withCode(code);
  }

  static warning(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Warning).withCode(code);
  }

  withSeverity(severity: DiagnosticSeverity): DiagnosticBuilder {
    this.severity = severity;
    return this;
  }

  withCode(code: DiagnosticCode): DiagnosticBuilder {
    this.code = code;
    return this;
  }

  withMessage(message: string): DiagnosticBuilder {
    this.message = message;
    return this;
  }

  withSpan(span: Span): DiagnosticBuilder {
    this.span = span;
    return this;
  }

  withLocation(loc: Location): DiagnosticBuilder {
    this.span = { start: loc.start, end: loc.end };
    this.file = loc.file;
    return this;
  }

  withRelated(span: Span, message: string): DiagnosticBuilder {
    this.relatedInformation.push({ span, message });
    return this;
  }

  build(): Diagnostic {
    if (!this.code) throw new Error('Diagnostic code is required');
    if (!this.message) throw new Error('Diagnostic message is required');
    if (!this.span) throw new Error('Diagnostic span is required');

    return {
      severity: this.severity,
      code: this.code,
      message: this.message,
      span: this.span,
      ...(this.file !== undefined ? { file: this.file } : {}),
      ...(this.relatedInformation.length > 0
        ? { relatedInformation: [...this.relatedInformation] }
        : {}),
    };
  }

  throw(): never {
    throw new DiagnosticError(this.build());
  }
}

// Common diagnostic patterns
export const Diagnostics = {
  unresolvedOperand: (operand: string, opName: string, loc: Location): DiagnosticBuilder =>
    DiagnosticBuilder.warning(DiagnosticCode.I001_UnresolvedOperand)
      .withMessage(`Operand '${operand}' of '${opName}' is not defined in the enclosing block`)
      .withLocation(loc),

  duplicateValue: (name: string, loc: Location): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.I002_DuplicateValue)
      .withMessage(`Value '${name}' is defined more than once in the same block`)
      .withLocation(loc),

  terminatorInBody: (opName: string, loc: Location): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.I003_TerminatorInBody)
      .withMessage(`Terminator '${opName}' appears before the end of its block`)
      .withLocation(loc),

  terminatorNotMarked: (opName: string, loc: Location): DiagnosticBuilder =>
    DiagnosticBuilder.warning(DiagnosticCode.I004_TerminatorNotMarked)
      .withMessage(`Block terminator '${opName}' is not marked as a terminator`)
      .withLocation(loc),

  unknownSuccessor: (label: string, opName: string, loc: Location): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.I005_UnknownSuccessor)
      .withMessage(`Successor '^${label}' of '${opName}' does not name a block in the enclosing region`)
      .withLocation(loc),

  denseShapeMismatch: (attrName: string, expected: string, loc: Location): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.I006_DenseShapeMismatch)
      .withMessage(`Dense literal '${attrName}' does not match its shape: ${expected}`)
      .withLocation(loc),

  duplicateSymbol: (symbol: string, loc: Location, previous: Location): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.I007_DuplicateSymbol)
      .withMessage(`Symbol '@${symbol}' is already defined`)
      .withLocation(loc)
      .withRelated(previous, 'previous definition is here'),

  reservedEntryLabel: (label: string, loc: Location): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.I008_ReservedEntryLabel)
      .withMessage(`Block label '^${label}' is reserved for the entry block of a region`)
      .withLocation(loc),
};

// Utility to format diagnostics for display
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const { severity, code, message, span, file } = diagnostic;
  const pos = `${span.start.line}:${span.start.col}`;
  return `${severity} ${code}: ${message} at ${file ? `${file}:` : ''}${pos}`;
}
