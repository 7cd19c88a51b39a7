import fs from 'fs';
import os from 'os';
import path from 'path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { runCli } from './cli.js';
import { ByteArraySink, ByteArraySource, EmptySource, FdSource } from './io.js';

describe('bf-tape cli', () => {
    let tempDir: string;

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'bf-tape-cli-'));
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    const writeProgram = (source: string): string => {
        const file = path.join(tempDir, 'prog.bf');
        fs.writeFileSync(file, source, 'utf8');
        return file;
    };

    it('returns 0 when the program finishes', () => {
        const output = new ByteArraySink();
        const code = runCli([writeProgram(',+.')], { output, input: new ByteArraySource('a') });

        expect(code).toBe(0);
        expect(output.text()).toBe('b');
        expect(console.error).not.toHaveBeenCalled();
    });

    it('returns 2 when the iteration budget runs out', () => {
        const code = runCli(['-n', '100', writeProgram('+[]')], {
            output: new ByteArraySink(),
            input: new EmptySource(),
        });

        expect(code).toBe(2);
        expect(console.error).toHaveBeenCalledWith('\nMaximum iterations reached.');
    });

    it('reports execution time with --time', () => {
        const code = runCli(['--time', writeProgram('+')], {
            output: new ByteArraySink(),
            input: new EmptySource(),
        });

        expect(code).toBe(0);
        expect(console.error).toHaveBeenCalledTimes(1);
        expect(vi.mocked(console.error).mock.calls[0][0]).toMatch(/^\nExecution time: \d+\.\d{2}ms$/);
    });

    it('returns 1 on a parse error', () => {
        const code = runCli([writeProgram('[')], { output: new ByteArraySink(), input: new EmptySource() });

        expect(code).toBe(1);
        expect(console.error).toHaveBeenCalledWith('Error: Unbalanced `[`. Expected matching `]`, found end of file.');
    });

    it('returns 1 when input ends while the program still reads', () => {
        const inputFile = path.join(tempDir, 'empty.txt');
        fs.writeFileSync(inputFile, '');
        const fd = fs.openSync(inputFile, 'r');
        try {
            const code = runCli([writeProgram(',')], { output: new ByteArraySink(), input: new FdSource(fd) });

            expect(code).toBe(1);
            expect(console.error).toHaveBeenCalledWith('Error: Failed to read at PC=0, CC=0: end of input');
        } finally {
            fs.closeSync(fd);
        }
    });

    it('returns 1 when the program file cannot be read', () => {
        const code = runCli([path.join(tempDir, 'missing.bf')], {
            output: new ByteArraySink(),
            input: new EmptySource(),
        });

        expect(code).toBe(1);
    });

    it('returns 1 without a program file', () => {
        expect(runCli([])).toBe(1);
        expect(console.error).toHaveBeenCalledWith('No input file specified');
    });

    it('returns 1 on an unknown option', () => {
        expect(runCli(['--mode', 'jit'])).toBe(1);
        expect(console.error).toHaveBeenCalledWith('Unknown option: --mode');
    });

    it('returns 0 for --help', () => {
        expect(runCli(['--help'])).toBe(0);
    });
});
