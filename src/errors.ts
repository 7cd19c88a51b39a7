// src/errors.ts
import { TerminationCondition } from './types.js';

export enum ParseErrorKind {
  UnbalancedRightBracket = 'UnbalancedRightBracket',
  UnbalancedLeftBracket = 'UnbalancedLeftBracket',
}

const parseMessages: Record<ParseErrorKind, string> = {
  [ParseErrorKind.UnbalancedRightBracket]: 'Expected matching `[` before `]`, found lone `]` first.',
  [ParseErrorKind.UnbalancedLeftBracket]: 'Unbalanced `[`. Expected matching `]`, found end of file.',
};

export class ParseError extends Error {
  constructor(
    public readonly kind: ParseErrorKind,
    /** Character offset of the lone `]`, or of the innermost unclosed `[`. */
    public readonly position: number
  ) {
    super(parseMessages[kind]);
    this.name = 'ParseError';
  }
}

export type IOOperation = 'read' | 'write';

export class IOError extends Error {
  constructor(
    public readonly operation: IOOperation,
    public readonly pc: number,
    public readonly cc: number,
    cause: unknown
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${operation} at PC=${pc}, CC=${cc}: ${detail}`, { cause });
    this.name = 'IOError';
  }
}

export const describeTermination = (condition: TerminationCondition): string => {
  switch (condition) {
    case TerminationCondition.MaximumIterationsReached:
      return 'Maximum iterations reached.';
    case TerminationCondition.AllInstructionsFinished:
      return 'Finished normally.';
  }
};
