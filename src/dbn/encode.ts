import { withSchema, type RecordEnum } from './catalog.js';
import { DbnError, type RecordIdentity } from './errors.js';
import { encodeMetadata, type Metadata } from './metadata.js';
import { recordSize } from './record.js';
import type { RecordRef } from './record-ref.js';
import { MemoryWriter, SinkBase, recordIdentity, type OutputWriter, type SinkSignal } from './sink.js';
import type { DbnEncoderOptions } from './types.js';

/**
 * Writes a DBN stream: the metadata block on construction, then each record
 * in its binary layout.
 */
export class DbnEncoder extends SinkBase<RecordEnum> {
    private readonly options: Required<DbnEncoderOptions>;
    private written = 0;

    constructor(out: OutputWriter, metadata: Metadata, options: DbnEncoderOptions = {}) {
        super(out);
        const defaults: Required<DbnEncoderOptions> = { logger: null };
        this.options = { ...defaults, ...options };
        const block = encodeMetadata(metadata);
        this.out.write(block);
        this.options.logger?.debug?.(`Wrote ${block.length} byte metadata block for ${metadata.dataset}`);
    }

    /** Records written so far. */
    get recordsWritten(): number {
        return this.written;
    }

    /** Copies a record view's bytes through unchanged. */
    encodeRef(ref: RecordRef): SinkSignal {
        const signal = this.guard(
            () => {
                const hd = ref.header();
                return { kind: 'raw', rtype: hd.rtype, publisherId: hd.publisherId, productId: hd.productId, tsEvent: hd.tsEvent };
            },
            () => this.out.write(ref.bytes.subarray(0, ref.recordSize())),
        );
        if (signal === 'continue') this.written++;
        return signal;
    }

    protected identify(record: RecordEnum): RecordIdentity {
        return recordIdentity(record);
    }

    protected encode(rec: RecordEnum): void {
        const bytes = withSchema(rec, (schema, record) => {
            const declared = recordSize(record.hd);
            if (declared < schema.size) {
                throw new DbnError(`Header declares ${declared} bytes, ${schema.name} needs ${schema.size}`);
            }
            const buf = new Uint8Array(declared);
            schema.write(new DataView(buf.buffer), 0, record);
            return buf;
        });
        this.out.write(bytes);
        this.written++;
    }
}

/** Encodes a whole stream into memory. */
export function encodeDbn(metadata: Metadata, records: Iterable<RecordEnum>, options: DbnEncoderOptions = {}): Uint8Array {
    const out = new MemoryWriter();
    const encoder = new DbnEncoder(out, metadata, options);
    encoder.encodeRecords([...records]);
    return out.toBytes();
}
