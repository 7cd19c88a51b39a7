// src/types.ts
export enum OpType {
  RIGHT = 'RIGHT',
  LEFT = 'LEFT',
  ADD = 'ADD',
  SUB = 'SUB',
  OUTPUT = 'OUTPUT',
  INPUT = 'INPUT',
  OPEN = 'OPEN',
  CLOSE = 'CLOSE',
}

export type PlainOpType =
  | OpType.RIGHT
  | OpType.LEFT
  | OpType.ADD
  | OpType.SUB
  | OpType.OUTPUT
  | OpType.INPUT;

export interface PlainOp {
  readonly type: PlainOpType;
}

/**
 * One side of a loop. `target` is the index of the matching bracket:
 * OPEN jumps there when the current cell is zero, CLOSE when it is not.
 */
export interface JumpOp {
  readonly type: OpType.OPEN | OpType.CLOSE;
  readonly target: number;
}

export type Op = PlainOp | JumpOp;

export type Program = readonly Op[];

export enum CharCode {
  LT = 60,    // '<'
  GT = 62,    // '>'
  ADD = 43,   // '+'
  COMMA = 44, // ','
  SUB = 45,   // '-'
  DOT = 46,   // '.'
  LB = 91,    // '['
  RB = 93     // ']'
}

export const MEMORY_SIZE = 32768;

export enum TerminationCondition {
  MaximumIterationsReached = 'MaximumIterationsReached',
  AllInstructionsFinished = 'AllInstructionsFinished',
}

export interface OutputSink {
  /**
   * Receives the UTF-8 form of the character whose code is the byte under
   * the memory pointer: one byte below 0x80, two from there up.
   * Throws if the write fails.
   */
  write(bytes: Uint8Array): void;
}

export interface InputSource {
  /**
   * Reads up to `buffer.length` bytes into `buffer` and returns the count.
   * Zero means nothing is available yet; a hard failure throws.
   */
  read(buffer: Uint8Array): number;
}
