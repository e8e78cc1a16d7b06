import { ByteBuffer } from './byte-buffer.js';
import { minSizeForRType, type RecordEnum } from './catalog.js';
import { IncompleteDataError, TruncatedRecordError } from './errors.js';
import { RECORD_HEADER_SIZE, RECORD_LENGTH_MULT } from './format.js';
import { decodeMetadata, freezeMetadata, type Metadata } from './metadata.js';
import { RecordRef } from './record-ref.js';
import type { DecoderOptions } from './types.js';

export type DecoderState = 'awaiting_metadata' | 'streaming_records' | 'failed';

export type DecodedItem = { kind: 'metadata'; metadata: Metadata } | RecordEnum;

/**
 * Resumable decoder for one DBN byte stream.
 *
 * Feed arbitrarily chunked bytes with `write()` and call `decode()` to collect
 * everything that is complete so far: the metadata block once, then every
 * whole record. A partial trailing record stays buffered until more bytes
 * arrive. `decode()` never blocks and never performs I/O.
 */
export class DbnDecoder {
    private readonly buf: ByteBuffer;
    private readonly options: Required<DecoderOptions>;
    private _state: DecoderState = 'awaiting_metadata';
    private _metadata: Metadata | null = null;
    private terminalError: TruncatedRecordError | null = null;
    /** Stream offset of the first unconsumed byte. */
    private streamOffset: number = 0;
    private _skippedRecords: number = 0;

    constructor(options: DecoderOptions = {}) {
        const defaults: Required<DecoderOptions> = {
            logger: null,
            maxBufferBytes: ByteBuffer.DEFAULT_MAX_BYTES,
            initialCapacity: ByteBuffer.DEFAULT_INITIAL_CAPACITY,
        };
        this.options = { ...defaults, ...options };
        this.buf = new ByteBuffer(this.options.initialCapacity, this.options.maxBufferBytes);
    }

    get state(): DecoderState {
        return this._state;
    }

    /** The decoded metadata, once the preamble has been consumed. */
    get metadata(): Metadata | null {
        return this._metadata;
    }

    /** The latched terminal error, once the state is `failed`. */
    get error(): TruncatedRecordError | null {
        return this.terminalError;
    }

    /** Records skipped because their discriminant is outside the catalog. */
    get skippedRecords(): number {
        return this._skippedRecords;
    }

    /** Appends bytes to the internal buffer. Invalidates every outstanding RecordRef. */
    write(bytes: Uint8Array): void {
        this.buf.append(bytes);
    }

    /** A copy of the buffered, not yet decoded bytes. */
    buffer(): Uint8Array {
        return this.buf.unread().slice();
    }

    /**
     * Decodes every complete item currently buffered into owned values.
     *
     * An empty result means more bytes are needed.
     *
     * @throws MalformedMetadataError while awaiting metadata; the state and
     * buffer are left unchanged
     * @throws TruncatedRecordError once a record declares a length shorter
     * than its schema; from then on every call throws it
     */
    decode(): DecodedItem[] {
        const items: DecodedItem[] = [];
        this.pump(
            (metadata) => items.push({ kind: 'metadata', metadata }),
            (ref, tsOut) => items.push(ref.asEnum(tsOut)),
        );
        return items;
    }

    /**
     * Zero-copy variant of `decode()`: calls `visit` with a view over each
     * complete record still in the buffer. Views are only valid during the
     * callback. The metadata is consumed silently and exposed on `metadata`.
     *
     * @returns the number of records visited
     */
    decodeRefs(visit: (ref: RecordRef) => void): number {
        let visited = 0;
        this.pump(
            () => { },
            (ref) => { visit(ref); visited++; },
        );
        return visited;
    }

    private pump(
        onMetadata: (metadata: Metadata) => void,
        onRecord: (ref: RecordRef, tsOut: boolean) => void,
    ): void {
        if (this.terminalError) throw this.terminalError;

        let emitted = 0;
        if (this._state === 'awaiting_metadata') {
            const decoded = decodeMetadata(this.buf.unread());
            if (!decoded) return;
            const metadata = freezeMetadata(decoded.metadata);
            this.buf.consume(decoded.length);
            this.buf.compact();
            this.streamOffset += decoded.length;
            this._metadata = metadata;
            this._state = 'streaming_records';
            this.options.logger?.debug?.(
                `Decoded metadata for ${metadata.dataset} (${metadata.schema}), ${decoded.length} bytes`
            );
            onMetadata(metadata);
            emitted++;
        }

        const tsOut = this._metadata?.tsOut ?? false;
        const data = this.buf.unread();
        let pos = 0;
        try {
            while (data.length - pos >= RECORD_HEADER_SIZE) {
                const rtype = data[pos + 1];
                const size = data[pos] * RECORD_LENGTH_MULT;
                if (size < RECORD_HEADER_SIZE) {
                    this.fail(new TruncatedRecordError(this.streamOffset + pos, rtype, size, RECORD_HEADER_SIZE));
                    break;
                }
                if (data.length - pos < size) break;

                const minSize = minSizeForRType(rtype);
                if (minSize === undefined) {
                    this._skippedRecords++;
                    this.options.logger?.debug?.(
                        `Skipping record with unknown rtype 0x${rtype.toString(16).padStart(2, '0')} ` +
                        `at byte ${this.streamOffset + pos} (${size} bytes)`
                    );
                    pos += size;
                    continue;
                }
                const required = tsOut ? minSize + 8 : minSize;
                if (size < required) {
                    this.fail(new TruncatedRecordError(this.streamOffset + pos, rtype, size, required));
                    break;
                }

                onRecord(new RecordRef(data.subarray(pos, pos + size)), tsOut);
                emitted++;
                pos += size;
            }
        } finally {
            this.buf.consume(pos);
            this.streamOffset += pos;
            this.buf.compact();
        }

        if (this.terminalError && emitted === 0) throw this.terminalError;
    }

    private fail(err: TruncatedRecordError): void {
        this.terminalError = err;
        this._state = 'failed';
        this.options.logger?.error?.(err.message);
    }

    /**
     * Decodes a complete in-memory stream.
     *
     * The whole of `data` is buffered at once, so `maxBufferBytes` is raised to
     * at least `data.length`.
     *
     * @throws IncompleteDataError when `data` ends before the metadata or
     * mid-record
     */
    static decodeAll(data: Uint8Array, options: DecoderOptions = {}): { metadata: Metadata; records: RecordEnum[] } {
        const maxBufferBytes = Math.max(data.length, options.maxBufferBytes ?? ByteBuffer.DEFAULT_MAX_BYTES);
        const decoder = new DbnDecoder({ initialCapacity: data.length, ...options, maxBufferBytes });
        decoder.write(data);
        const records: RecordEnum[] = [];
        for (const item of decoder.decode()) {
            if (item.kind !== 'metadata') records.push(item);
        }
        if (decoder.terminalError) throw decoder.terminalError;
        if (!decoder.metadata) {
            throw new IncompleteDataError(`Input ended before the metadata block was complete (${data.length} bytes)`);
        }
        const leftover = decoder.buf.length;
        if (leftover > 0) {
            throw new IncompleteDataError(`Input ended mid-record: ${leftover} trailing bytes`);
        }
        return { metadata: decoder.metadata, records };
    }
}
