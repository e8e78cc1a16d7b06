import {
    INSTRUMENT_DEF, ERROR, IMBALANCE, MBO, MBP1, MBP10, OHLCV, STAT, STATUS, SYMBOL_MAPPING, SYSTEM, TRADE,
    kindForRType, rtypeFromU8, type RecordEnum,
} from './catalog.js';
import { InvalidViewConstructionError, TruncatedRecordError } from './errors.js';
import { RECORD_ALIGN, RECORD_HEADER_SIZE, RType } from './format.js';
import { ByteReader } from './byte-cursor.js';
import { readHeader, recordSize, type HasHeader, type RecordHeader, type RecordSchema } from './record.js';

/**
 * A non-owning, read-only view over one record's bytes, polymorphic over the
 * record catalog.
 *
 * The view shares memory with the buffer it was built from. It is only valid
 * while that buffer is neither written to nor compacted; views handed out by
 * `DbnDecoder.decodeRefs()` expire when the callback returns.
 */
export class RecordRef {
    public readonly bytes: Uint8Array;
    private readonly view: DataView;
    private cachedHeader: RecordHeader | null = null;

    /**
     * @throws InvalidViewConstructionError when `bytes` is shorter than a
     * record header or not word aligned within its backing buffer.
     */
    constructor(bytes: Uint8Array) {
        if (bytes.byteLength < RECORD_HEADER_SIZE) {
            throw new InvalidViewConstructionError(
                `RecordRef needs at least ${RECORD_HEADER_SIZE} bytes, got ${bytes.byteLength}`
            );
        }
        if (bytes.byteOffset % RECORD_ALIGN !== 0) {
            throw new InvalidViewConstructionError(
                `RecordRef requires ${RECORD_ALIGN}-byte alignment, got byte offset ${bytes.byteOffset}`
            );
        }
        this.bytes = bytes;
        this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    }

    /** Encodes an owned record into a fresh buffer and returns a view over it. */
    static fromRecord<T extends HasHeader>(schema: RecordSchema<T>, record: T): RecordRef {
        const bytes = new Uint8Array(Math.max(schema.size, recordSize(record.hd)));
        schema.write(new DataView(bytes.buffer), 0, record);
        return new RecordRef(bytes);
    }

    header(): RecordHeader {
        if (!this.cachedHeader) {
            this.cachedHeader = readHeader(new ByteReader(this.view, 0));
        }
        return this.cachedHeader;
    }

    /** Size in bytes as declared by the header. */
    recordSize(): number {
        return recordSize(this.header());
    }

    /** @throws UnknownRecordTypeError */
    rtype(): RType {
        return rtypeFromU8(this.header().rtype);
    }

    has<T extends HasHeader>(schema: RecordSchema<T>): boolean {
        return schema.hasRType(this.header().rtype);
    }

    /**
     * Projects the record as `schema`, or returns undefined when it is another
     * type.
     *
     * @throws TruncatedRecordError when the discriminant matches but the
     * declared length is shorter than the schema. That is a framing
     * corruption, not a type mismatch.
     */
    get<T extends HasHeader>(schema: RecordSchema<T>): T | undefined {
        if (!this.has(schema)) return undefined;
        this.requireSize(schema.size);
        return schema.read(this.view, 0);
    }

    /**
     * Projects without checking the discriminant or the length. Only for hot
     * loops that have already branched on `has()`.
     */
    getUnchecked<T extends HasHeader>(schema: RecordSchema<T>): T {
        return schema.read(this.view, 0);
    }

    /**
     * Converts to the tagged union for exhaustive matching.
     *
     * @param tsOut read the trailing out-timestamp after the record body
     * @throws UnknownRecordTypeError, TruncatedRecordError
     */
    asEnum(tsOut: boolean = false): RecordEnum {
        const kind = kindForRType(this.header().rtype);
        switch (kind) {
            case 'mbo': return { kind, record: this.project(MBO, tsOut), tsOut: this.tsOut(MBO, tsOut) };
            case 'trade': return { kind, record: this.project(TRADE, tsOut), tsOut: this.tsOut(TRADE, tsOut) };
            case 'mbp1': return { kind, record: this.project(MBP1, tsOut), tsOut: this.tsOut(MBP1, tsOut) };
            case 'mbp10': return { kind, record: this.project(MBP10, tsOut), tsOut: this.tsOut(MBP10, tsOut) };
            case 'ohlcv': return { kind, record: this.project(OHLCV, tsOut), tsOut: this.tsOut(OHLCV, tsOut) };
            case 'status': return { kind, record: this.project(STATUS, tsOut), tsOut: this.tsOut(STATUS, tsOut) };
            case 'instrumentDef': return { kind, record: this.project(INSTRUMENT_DEF, tsOut), tsOut: this.tsOut(INSTRUMENT_DEF, tsOut) };
            case 'imbalance': return { kind, record: this.project(IMBALANCE, tsOut), tsOut: this.tsOut(IMBALANCE, tsOut) };
            case 'stat': return { kind, record: this.project(STAT, tsOut), tsOut: this.tsOut(STAT, tsOut) };
            case 'error': return { kind, record: this.project(ERROR, tsOut), tsOut: this.tsOut(ERROR, tsOut) };
            case 'symbolMapping': return { kind, record: this.project(SYMBOL_MAPPING, tsOut), tsOut: this.tsOut(SYMBOL_MAPPING, tsOut) };
            case 'system': return { kind, record: this.project(SYSTEM, tsOut), tsOut: this.tsOut(SYSTEM, tsOut) };
        }
    }

    private project<T extends HasHeader>(schema: RecordSchema<T>, tsOut: boolean): T {
        this.requireSize(tsOut ? schema.size + 8 : schema.size);
        return schema.read(this.view, 0);
    }

    private tsOut<T extends HasHeader>(schema: RecordSchema<T>, tsOut: boolean): bigint | undefined {
        return tsOut ? this.view.getBigUint64(schema.size, true) : undefined;
    }

    private requireSize(expected: number): void {
        const size = this.recordSize();
        if (size < expected || this.bytes.byteLength < expected) {
            throw new TruncatedRecordError(this.bytes.byteOffset, this.header().rtype, size, expected);
        }
    }
}
