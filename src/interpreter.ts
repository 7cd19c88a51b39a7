// src/interpreter.ts
import {
    OpType,
    MEMORY_SIZE,
    TerminationCondition,
    type Program,
    type OutputSink,
    type InputSource,
} from './types.js';
import { IOError } from './errors.js';
import { parse } from './parser.js';

const MAX_ITERATIONS_LIMIT = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * Budgets are unsigned 64-bit counts. Anything past the safe integer range
 * is clamped, which no run can exhaust anyway.
 */
const toIterationLimit = (maxIterations: number | bigint): number => {
    if (typeof maxIterations === 'bigint') {
        if (maxIterations < 0n) {
            throw new RangeError(`maxIterations must not be negative, got ${maxIterations}`);
        }
        return maxIterations > MAX_ITERATIONS_LIMIT ? Number.MAX_SAFE_INTEGER : Number(maxIterations);
    }
    if (!Number.isInteger(maxIterations) || maxIterations < 0) {
        throw new RangeError(`maxIterations must be a non-negative integer, got ${maxIterations}`);
    }
    return Math.min(maxIterations, Number.MAX_SAFE_INTEGER);
};

export class Interpreter {
    private cells = new Uint8Array(MEMORY_SIZE);
    private cc = 0;
    private pc = 0;
    private readonly readBuf = new Uint8Array(1);

    constructor(
        private readonly prog: Program,
        private readonly output: OutputSink,
        private readonly input: InputSource
    ) { }

    /**
     * Runs the program from a zeroed tape for at most `maxIterations`
     * dispatches. Each call starts over; nothing carries between runs.
     */
    run(maxIterations: number | bigint): TerminationCondition {
        const limit = toIterationLimit(maxIterations);
        this.cells = new Uint8Array(MEMORY_SIZE);
        this.cc = 0;
        this.pc = 0;

        for (let step = 0; step < limit; step++) {
            if (this.pc >= this.prog.length) {
                return TerminationCondition.AllInstructionsFinished;
            }

            const op = this.prog[this.pc];
            switch (op.type) {
                case OpType.RIGHT:
                    this.cc = (this.cc + 1) % MEMORY_SIZE;
                    break;
                case OpType.LEFT:
                    this.cc = (this.cc + MEMORY_SIZE - 1) % MEMORY_SIZE;
                    break;
                case OpType.ADD:
                    this.cells[this.cc] = (this.cells[this.cc] + 1) & 0xFF;
                    break;
                case OpType.SUB:
                    this.cells[this.cc] = (this.cells[this.cc] - 1) & 0xFF;
                    break;
                case OpType.OUTPUT:
                    this.writeChar(this.cells[this.cc]);
                    break;
                case OpType.INPUT:
                    this.cells[this.cc] = this.readByte();
                    break;
                case OpType.OPEN:
                    if (this.cells[this.cc] === 0) {
                        this.pc = op.target;
                        continue;
                    }
                    break;
                case OpType.CLOSE:
                    if (this.cells[this.cc] !== 0) {
                        this.pc = op.target;
                        continue;
                    }
                    break;
            }
            this.pc++;
        }

        return TerminationCondition.MaximumIterationsReached;
    }

    private writeChar(byte: number): void {
        const bytes = byte < 0x80
            ? Uint8Array.of(byte)
            : Uint8Array.of(0xC0 | (byte >> 6), 0x80 | (byte & 0x3F));
        try {
            this.output.write(bytes);
        } catch (e) {
            throw new IOError('write', this.pc, this.cc, e);
        }
    }

    // Polls until the source hands over a byte. A source that keeps
    // returning 0 stalls the run here; the budget does not tick meanwhile.
    private readByte(): number {
        for (;;) {
            let count: number;
            try {
                count = this.input.read(this.readBuf);
            } catch (e) {
                throw new IOError('read', this.pc, this.cc, e);
            }
            if (count >= 1) {
                return this.readBuf[0];
            }
        }
    }
}

export const execute = (
    prog: Program,
    output: OutputSink,
    input: InputSource,
    maxIterations: number | bigint
): TerminationCondition => new Interpreter(prog, output, input).run(maxIterations);

export const run = (
    source: Iterable<string>,
    output: OutputSink,
    input: InputSource,
    maxIterations: number | bigint
): TerminationCondition => execute(parse(source), output, input, maxIterations);
