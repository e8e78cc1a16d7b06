import fs from 'node:fs';
import type { OutputWriter } from '../dbn/sink.js';
import { CliError } from './args.js';

/**
 * Buffered synchronous writer over a file descriptor. Chunks are batched up
 * to `highWaterMark` bytes; `flush()` drains the batch.
 */
export class FdWriter implements OutputWriter {
    private readonly encoder = new TextEncoder();
    private pending: Uint8Array[] = [];
    private pendingBytes = 0;

    constructor(private readonly fd: number, private readonly highWaterMark: number = 64 * 1024) { }

    write(chunk: string | Uint8Array): void {
        const bytes = typeof chunk === 'string' ? this.encoder.encode(chunk) : chunk.slice();
        this.pending.push(bytes);
        this.pendingBytes += bytes.length;
        if (this.pendingBytes >= this.highWaterMark) this.flush();
    }

    flush(): void {
        const batch = Buffer.concat(this.pending);
        this.pending = [];
        this.pendingBytes = 0;
        let offset = 0;
        while (offset < batch.length) {
            offset += fs.writeSync(this.fd, batch, offset);
        }
    }
}

/**
 * Opens a file for writing. Without `force` an existing file is an error
 * rather than being truncated.
 */
export function openOutputFile(filePath: string, force: boolean): number {
    try {
        return fs.openSync(filePath, force ? 'w' : 'wx');
    } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'EEXIST') {
            throw new CliError('Output file exists. Pass --force flag to overwrite the existing file.', { output: filePath });
        }
        const reason = err instanceof Error ? err.message : String(err);
        throw new CliError(`Unable to open output file '${filePath}': ${reason}`, { output: filePath });
    }
}
