import { LimitExceededError } from './errors.js';

/**
 * Growable byte arena with a write end and a read cursor.
 *
 * Bytes in `[readCursor, writeEnd)` are unconsumed. `compact()` moves them to
 * the head so the arena doesn't grow without bound under streaming input.
 * The backing ArrayBuffer always starts at offset 0, so after a compaction the
 * first unconsumed byte is 8-byte aligned.
 */
export class ByteBuffer {
    public static readonly DEFAULT_INITIAL_CAPACITY = 64 * 1024; // 64KB
    public static readonly DEFAULT_MAX_BYTES = 256 * 1024 * 1024; // 256MB

    private data: Uint8Array;
    private writeEnd: number = 0;
    private readCursor: number = 0;
    private readonly maxBytes: number;

    constructor(initialCapacity: number = ByteBuffer.DEFAULT_INITIAL_CAPACITY, maxBytes: number = ByteBuffer.DEFAULT_MAX_BYTES) {
        this.data = new Uint8Array(Math.max(16, initialCapacity));
        this.maxBytes = maxBytes;
    }

    /** Number of unconsumed bytes. */
    get length(): number {
        return this.writeEnd - this.readCursor;
    }

    get capacity(): number {
        return this.data.length;
    }

    /** Offset of the read cursor inside the arena. */
    get readOffset(): number {
        return this.readCursor;
    }

    append(chunk: Uint8Array): void {
        if (chunk.length === 0) return;
        const unconsumed = this.length + chunk.length;
        if (unconsumed > this.maxBytes) {
            throw new LimitExceededError(
                `Decode buffer limit exceeded (${unconsumed} > ${this.maxBytes} bytes buffered)`
            );
        }
        if (this.writeEnd + chunk.length > this.data.length) {
            this.grow(this.writeEnd + chunk.length);
        }
        this.data.set(chunk, this.writeEnd);
        this.writeEnd += chunk.length;
    }

    /** The unconsumed bytes. Shares memory with the arena; invalidated by append() and compact(). */
    unread(): Uint8Array {
        return this.data.subarray(this.readCursor, this.writeEnd);
    }

    consume(n: number): void {
        if (n < 0 || n > this.length) {
            throw new RangeError(`Cannot consume ${n} bytes, ${this.length} buffered`);
        }
        this.readCursor += n;
    }

    /** Drops every byte before the read cursor. */
    compact(): void {
        if (this.readCursor === 0) return;
        this.data.copyWithin(0, this.readCursor, this.writeEnd);
        this.writeEnd -= this.readCursor;
        this.readCursor = 0;
    }

    private grow(required: number): void {
        let capacity = this.data.length;
        while (capacity < required) capacity *= 2;
        const next = new Uint8Array(capacity);
        next.set(this.data.subarray(0, this.writeEnd));
        this.data = next;
    }
}
