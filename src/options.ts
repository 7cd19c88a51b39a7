// src/options.ts
export const DEFAULT_MAX_ITERATIONS = BigInt(Number.MAX_SAFE_INTEGER);

export interface CliOptions {
    file: string | null;
    maxIterations: bigint;
    showTime: boolean;
    help: boolean;
}

export class OptionsError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'OptionsError';
    }
}

export const USAGE = `
Tape Interpreter

Usage: bf-tape [options] <file>

Options:
  --max-iterations, -n   Stop after this many instructions [default: ${DEFAULT_MAX_ITERATIONS}]
  --time, -t             Show execution time
  --help, -h             Show this help
`;

const parseCount = (value: string | undefined): bigint => {
    if (value === undefined || !/^\d+$/.test(value)) {
        throw new OptionsError(`Invalid iteration count: ${value ?? '(missing)'}`);
    }
    return BigInt(value);
};

export const parseArgs = (args: readonly string[]): CliOptions => {
    const options: CliOptions = {
        file: null,
        maxIterations: DEFAULT_MAX_ITERATIONS,
        showTime: false,
        help: false,
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--help' || arg === '-h') {
            options.help = true;
        } else if (arg === '--max-iterations' || arg === '-n') {
            i++;
            options.maxIterations = parseCount(args[i]);
        } else if (arg === '--time' || arg === '-t') {
            options.showTime = true;
        } else if (arg.startsWith('-')) {
            throw new OptionsError(`Unknown option: ${arg}`);
        } else {
            options.file = arg;
        }
    }

    return options;
};
