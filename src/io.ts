// src/io.ts
import fs from 'fs';
import type { InputSource, OutputSink } from './types.js';

export class ByteArraySink implements OutputSink {
    private readonly data: number[] = [];

    write(bytes: Uint8Array): void {
        this.data.push(...bytes);
    }

    bytes(): Uint8Array {
        return Uint8Array.from(this.data);
    }

    text(): string {
        return Buffer.from(this.data).toString('utf8');
    }
}

/**
 * Serves its bytes once, then reports "nothing yet" forever.
 * String input is taken as UTF-8.
 */
export class ByteArraySource implements InputSource {
    private readonly data: Uint8Array;
    private offset = 0;

    constructor(data: Uint8Array | string) {
        this.data = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
    }

    read(buffer: Uint8Array): number {
        const count = Math.min(buffer.length, this.data.length - this.offset);
        buffer.set(this.data.subarray(this.offset, this.offset + count));
        this.offset += count;
        return count;
    }
}

export class EmptySource implements InputSource {
    read(_buffer: Uint8Array): number {
        return 0;
    }
}

export class FdSink implements OutputSink {
    constructor(private readonly fd: number) { }

    write(bytes: Uint8Array): void {
        let offset = 0;
        while (offset < bytes.length) {
            offset += fs.writeSync(this.fd, bytes, offset);
        }
    }
}

/**
 * Blocking reads from a file descriptor. EAGAIN from a non-blocking
 * descriptor counts as "nothing yet"; end of file is an error, so a program
 * that keeps asking for input stops instead of spinning.
 */
export class FdSource implements InputSource {
    constructor(private readonly fd: number) { }

    read(buffer: Uint8Array): number {
        let count: number;
        try {
            count = fs.readSync(this.fd, buffer, 0, buffer.length, null);
        } catch (err) {
            if (err instanceof Error && 'code' in err && err.code === 'EAGAIN') {
                return 0;
            }
            throw err;
        }
        if (count === 0) {
            throw new Error('end of input');
        }
        return count;
    }
}
