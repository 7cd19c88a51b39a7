// src/index.ts
export { parse } from './parser.js';
export { Interpreter, execute, run } from './interpreter.js';
export { ByteArraySink, ByteArraySource, EmptySource, FdSink, FdSource } from './io.js';
export { ParseError, ParseErrorKind, IOError, describeTermination } from './errors.js';
export type { IOOperation } from './errors.js';
export { OpType, CharCode, MEMORY_SIZE, TerminationCondition } from './types.js';
export type { Op, PlainOp, PlainOpType, JumpOp, Program, OutputSink, InputSource } from './types.js';
