import type { OutputWriter } from '../../src/dbn/sink.js';

/** Accepts `accept` writes, then fails every later one with `code`. */
export class FailingWriter implements OutputWriter {
    public readonly chunks: (string | Uint8Array)[] = [];

    constructor(private readonly accept: number, private readonly code: string = 'EPIPE') { }

    write(chunk: string | Uint8Array): void {
        if (this.chunks.length >= this.accept) {
            throw Object.assign(new Error(`write ${this.code}`), { code: this.code });
        }
        this.chunks.push(chunk);
    }
}
