#!/usr/bin/env node
// src/cli.ts
import fs from 'fs';
import { pathToFileURL } from 'url';
import { parse } from './parser.js';
import { execute } from './interpreter.js';
import { describeTermination } from './errors.js';
import { FdSink, FdSource } from './io.js';
import { TerminationCondition, type InputSource, type OutputSink } from './types.js';
import { parseArgs, USAGE, type CliOptions } from './options.js';

export interface CliStreams {
    output: OutputSink;
    input: InputSource;
}

/** Returns the exit code: 0 finished, 2 out of iterations, 1 on any error. */
export function runCli(
    args: readonly string[],
    streams: CliStreams = { output: new FdSink(1), input: new FdSource(0) }
): number {
    let options: CliOptions;
    try {
        options = parseArgs(args);
    } catch (err) {
        console.error(err instanceof Error ? err.message : String(err));
        console.log(USAGE);
        return 1;
    }

    if (options.help) {
        console.log(USAGE);
        return 0;
    }

    if (!options.file) {
        console.error('No input file specified');
        console.log(USAGE);
        return 1;
    }

    try {
        const content = fs.readFileSync(options.file, 'utf8');
        const start = process.hrtime.bigint();

        const condition = execute(parse(content), streams.output, streams.input, options.maxIterations);

        if (options.showTime) {
            const end = process.hrtime.bigint();
            const timeMs = Number(end - start) / 1e6;
            console.error(`\nExecution time: ${timeMs.toFixed(2)}ms`);
        }
        if (condition === TerminationCondition.MaximumIterationsReached) {
            console.error(`\n${describeTermination(condition)}`);
            return 2;
        }
        return 0;
    } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : 'Unknown error'}`);
        return 1;
    }
}

const invokedPath = process.argv[1];
if (invokedPath && import.meta.url === pathToFileURL(fs.realpathSync(invokedPath)).href) {
    process.exit(runCli(process.argv.slice(2)));
}
