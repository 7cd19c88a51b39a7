// src/parser.ts
import { OpType, CharCode, type Op, type PlainOpType, type Program } from './types.js';
import { ParseError, ParseErrorKind } from './errors.js';

const opMap: Partial<Record<number, PlainOpType>> = {
    [CharCode.GT]: OpType.RIGHT,
    [CharCode.LT]: OpType.LEFT,
    [CharCode.ADD]: OpType.ADD,
    [CharCode.SUB]: OpType.SUB,
    [CharCode.DOT]: OpType.OUTPUT,
    [CharCode.COMMA]: OpType.INPUT,
};

interface PendingOpen {
    index: number;     // slot of the placeholder in prog
    position: number;  // offset of the '[' in the source
}

/**
 * Single pass over `source`, which may arrive in chunks of any length;
 * positions count characters across chunks. Each '[' leaves a placeholder
 * OPEN that its ']' overwrites, so both sides of a loop end up pointing at
 * each other. Characters outside the command set are skipped.
 */
export const parse = (source: Iterable<string>): Program => {
    const prog: Op[] = [];
    const bracketStack: PendingOpen[] = [];
    let position = 0;

    for (const chunk of source) {
        for (const ch of chunk) {
            const c = ch.codePointAt(0);
            const opType = c === undefined ? undefined : opMap[c];

            if (opType) {
                prog.push({ type: opType });
            } else if (c === CharCode.LB) {
                bracketStack.push({ index: prog.length, position });
                prog.push({ type: OpType.OPEN, target: 0 });
            } else if (c === CharCode.RB) {
                const open = bracketStack.pop();
                if (!open) {
                    throw new ParseError(ParseErrorKind.UnbalancedRightBracket, position);
                }
                prog[open.index] = { type: OpType.OPEN, target: prog.length };
                prog.push({ type: OpType.CLOSE, target: open.index });
            }
            position++;
        }
    }

    const unclosed = bracketStack.pop();
    if (unclosed) {
        throw new ParseError(ParseErrorKind.UnbalancedLeftBracket, unclosed.position);
    }

    return prog;
};
