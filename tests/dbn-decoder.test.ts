import { MBO, OHLCV, RECORD_KINDS, type RecordEnum } from '../src/dbn/catalog.js';
import { DbnDecoder, type DecodedItem } from '../src/dbn/decode.js';
import { encodeDbn } from '../src/dbn/encode.js';
import {
    IncompleteDataError, LimitExceededError, MalformedMetadataError, TruncatedRecordError,
} from '../src/dbn/errors.js';
import { RType } from '../src/dbn/format.js';
import { encodeMetadata } from '../src/dbn/metadata.js';
import {
    concat, header, mboMsg, ohlcvMsg, rawRecord, recordBytes, sampleRecord, testMetadata, TS_RECV,
} from './helpers/fixtures.js';

const META_LEN = 208;

function mboRecords(count: number): RecordEnum[] {
    const out: RecordEnum[] = [];
    for (let i = 0; i < count; i++) {
        out.push({ kind: 'mbo', record: mboMsg({ orderId: BigInt(1_000 + i), sequence: i }) });
    }
    return out;
}

function records(items: DecodedItem[]): RecordEnum[] {
    const out: RecordEnum[] = [];
    for (const item of items) {
        if (item.kind !== 'metadata') out.push(item);
    }
    return out;
}

describe('DbnDecoder', () => {
    it('decodes metadata first, then records in order', () => {
        const decoder = new DbnDecoder();
        decoder.write(encodeDbn(testMetadata(), mboRecords(3)));
        const items = decoder.decode();

        expect(items).toHaveLength(4);
        expect(items[0]).toEqual({ kind: 'metadata', metadata: testMetadata() });
        expect(records(items)).toEqual(mboRecords(3));
        expect(decoder.state).toBe('streaming_records');
        expect(decoder.metadata?.dataset).toBe('TEST.MDP3');
        expect(decoder.buffer()).toHaveLength(0);
    });

    it('freezes the exposed metadata all the way down', () => {
        const decoder = new DbnDecoder();
        decoder.write(encodeMetadata(testMetadata()));
        const [item] = decoder.decode();
        const metadata = decoder.metadata;
        if (!metadata) throw new Error('metadata not decoded');

        expect(item).toEqual({ kind: 'metadata', metadata });
        expect(Object.isFrozen(metadata)).toBe(true);
        expect(() => metadata.symbols.push('NQU2')).toThrow(TypeError);
        expect(() => metadata.partial.push('NQU2')).toThrow(TypeError);
        expect(() => metadata.notFound.push('NQU2')).toThrow(TypeError);
        expect(() => metadata.mappings.pop()).toThrow(TypeError);
        expect(() => { metadata.mappings[0].rawSymbol = 'NQU2'; }).toThrow(TypeError);
        expect(() => metadata.mappings[0].intervals.push({ startDate: '2022-07-22', endDate: '2022-07-23', symbol: '1' }))
            .toThrow(TypeError);
        expect(() => { metadata.mappings[0].intervals[0].symbol = '1'; }).toThrow(TypeError);
        expect(metadata).toEqual(testMetadata());
    });

    it('yields the same sequence when fed one byte at a time', () => {
        const stream = encodeDbn(testMetadata(), mboRecords(5));
        const decoder = new DbnDecoder();
        const items: DecodedItem[] = [];
        for (let i = 0; i < stream.length; i++) {
            decoder.write(stream.subarray(i, i + 1));
            items.push(...decoder.decode());
        }
        expect(items[0].kind).toBe('metadata');
        expect(records(items)).toEqual(mboRecords(5));
        expect(decoder.buffer()).toHaveLength(0);
    });

    it('decodes every record kind with out-timestamps, fed one byte at a time', () => {
        const sent = RECORD_KINDS.map((kind, i) => sampleRecord(kind, TS_RECV + BigInt(i)));
        const encoded = encodeDbn(testMetadata({ tsOut: true }), sent);
        const stream = concat(
            encoded.subarray(0, META_LEN),
            rawRecord(6, 0x99),
            encoded.subarray(META_LEN),
        );
        const decoder = new DbnDecoder();
        const items: DecodedItem[] = [];
        for (let i = 0; i < stream.length; i++) {
            decoder.write(stream.subarray(i, i + 1));
            items.push(...decoder.decode());
        }
        expect(records(items)).toEqual(sent);
        expect(records(items).map((r) => r.tsOut)).toEqual(RECORD_KINDS.map((_, i) => TS_RECV + BigInt(i)));
        expect(decoder.skippedRecords).toBe(1);
        expect(decoder.buffer()).toHaveLength(0);
    });

    it('yields the same sequence for uneven chunk sizes', () => {
        const stream = encodeDbn(testMetadata(), mboRecords(20));
        for (const chunkSize of [3, 7, 55, 57, 113, 1_000]) {
            const decoder = new DbnDecoder({ initialCapacity: 16 });
            const items: DecodedItem[] = [];
            for (let i = 0; i < stream.length; i += chunkSize) {
                decoder.write(stream.subarray(i, i + chunkSize));
                items.push(...decoder.decode());
            }
            expect(records(items), `chunk size ${chunkSize}`).toEqual(mboRecords(20));
        }
    });

    it('holds a split record until its remaining bytes arrive', () => {
        const stream = encodeDbn(testMetadata(), mboRecords(1));
        const decoder = new DbnDecoder();
        decoder.write(stream.subarray(0, META_LEN + 30));

        const first = decoder.decode();
        expect(first).toHaveLength(1);
        expect(first[0].kind).toBe('metadata');
        expect(decoder.buffer()).toHaveLength(30);

        decoder.write(stream.subarray(META_LEN + 30));
        expect(records(decoder.decode())).toEqual(mboRecords(1));
    });

    it('returns nothing while the metadata is incomplete', () => {
        const decoder = new DbnDecoder();
        decoder.write(encodeMetadata(testMetadata()).subarray(0, 100));
        expect(decoder.decode()).toEqual([]);
        expect(decoder.state).toBe('awaiting_metadata');
        expect(decoder.buffer()).toHaveLength(100);
    });

    it('leaves state and buffer untouched on malformed metadata', () => {
        const bytes = encodeMetadata(testMetadata());
        bytes[0] = 0x58;
        const decoder = new DbnDecoder();
        decoder.write(bytes);
        expect(() => decoder.decode()).toThrow(MalformedMetadataError);
        expect(decoder.state).toBe('awaiting_metadata');
        expect(decoder.buffer()).toEqual(bytes);
    });

    it('skips unknown record types using their declared length', () => {
        const debug = vi.fn();
        const decoder = new DbnDecoder({ logger: { debug } });
        const [first, second] = mboRecords(2);
        decoder.write(concat(
            encodeMetadata(testMetadata()),
            recordBytes(MBO, mboMsg({ orderId: 1_000n, sequence: 0 })),
            rawRecord(6, 0x99),
            recordBytes(MBO, mboMsg({ orderId: 1_001n, sequence: 1 })),
        ));

        expect(records(decoder.decode())).toEqual([first, second]);
        expect(decoder.skippedRecords).toBe(1);
        expect(debug).toHaveBeenCalledWith('Skipping record with unknown rtype 0x99 at byte 264 (24 bytes)');
    });

    it('returns records before a truncated one, then fails on every call', () => {
        const truncated = recordBytes(MBO, mboMsg()).subarray(0, 40);
        truncated[0] = 10;
        const decoder = new DbnDecoder();
        decoder.write(concat(
            encodeMetadata(testMetadata()),
            recordBytes(MBO, mboMsg()),
            truncated,
            recordBytes(MBO, mboMsg()),
        ));

        const items = decoder.decode();
        expect(items).toHaveLength(2);
        expect(decoder.state).toBe('failed');
        expect(decoder.error).toBeInstanceOf(TruncatedRecordError);

        expect(() => decoder.decode()).toThrow(TruncatedRecordError);
        decoder.write(recordBytes(MBO, mboMsg()));
        expect(() => decoder.decode()).toThrow(
            'Malformed record at byte 264: rtype 0xa0 expects at least 56 bytes, header declares 40'
        );
    });

    it('throws at once when nothing precedes the truncated record', () => {
        const decoder = new DbnDecoder();
        decoder.write(encodeMetadata(testMetadata()));
        decoder.decode();

        const truncated = recordBytes(OHLCV, ohlcvMsg()).subarray(0, 48);
        truncated[0] = 12;
        decoder.write(truncated);
        try {
            decoder.decode();
            expect.fail('expected decode to throw');
        } catch (err) {
            expect(err).toBeInstanceOf(TruncatedRecordError);
            if (err instanceof TruncatedRecordError) {
                expect(err.offset).toBe(META_LEN);
                expect(err.rtype).toBe(RType.OHLCV_1S);
                expect(err.recordSize).toBe(48);
                expect(err.expectedSize).toBe(56);
            }
        }
        expect(decoder.state).toBe('failed');
    });

    it('treats a length shorter than the header as terminal', () => {
        const decoder = new DbnDecoder();
        decoder.write(concat(encodeMetadata(testMetadata()), rawRecord(2, 0x99)));
        const items = decoder.decode();
        expect(items).toHaveLength(1);
        expect(() => decoder.decode()).toThrow('header declares 8');
    });

    it('requires room for ts_out when the stream carries it', () => {
        const metadata = testMetadata({ tsOut: true });
        const rec = { ...mboMsg({ hd: header(RType.MBO, 16) }), tsOut: 1_658_441_851_000_000_900n };
        const decoder = new DbnDecoder();
        decoder.write(encodeDbn(metadata, [{ kind: 'mbo', record: rec, tsOut: rec.tsOut }]));

        const [item] = records(decoder.decode());
        expect(item.kind).toBe('mbo');
        expect(item.tsOut).toBe(1_658_441_851_000_000_900n);

        const plain = new DbnDecoder();
        plain.write(concat(encodeMetadata(metadata), recordBytes(MBO, mboMsg())));
        expect(plain.decode()).toHaveLength(1);
        expect(() => plain.decode()).toThrow('expects at least 64 bytes, header declares 56');
    });

    it('visits zero-copy views', () => {
        const decoder = new DbnDecoder();
        decoder.write(encodeDbn(testMetadata(), mboRecords(3)));
        const orderIds: bigint[] = [];
        const visited = decoder.decodeRefs((ref) => {
            orderIds.push(ref.get(MBO)?.orderId ?? -1n);
        });
        expect(visited).toBe(3);
        expect(orderIds).toEqual([1_000n, 1_001n, 1_002n]);
        expect(decoder.metadata?.schema).toBe('mbo');
    });

    it('enforces the buffer limit', () => {
        const decoder = new DbnDecoder({ maxBufferBytes: 64 });
        decoder.write(new Uint8Array(64));
        expect(() => decoder.write(new Uint8Array(1))).toThrow(LimitExceededError);
    });

    describe('decodeAll', () => {
        it('decodes a complete stream', () => {
            const { metadata, records: decoded } = DbnDecoder.decodeAll(encodeDbn(testMetadata(), mboRecords(2)));
            expect(metadata).toEqual(testMetadata());
            expect(decoded).toEqual(mboRecords(2));
        });

        it('buffers inputs larger than the configured limit', () => {
            const stream = encodeDbn(testMetadata(), mboRecords(2));
            const { records: decoded } = DbnDecoder.decodeAll(stream, { maxBufferBytes: 64 });
            expect(decoded).toEqual(mboRecords(2));
        });

        it('rejects a stream that ends mid-record', () => {
            const stream = encodeDbn(testMetadata(), mboRecords(2));
            expect(() => DbnDecoder.decodeAll(stream.subarray(0, stream.length - 3)))
                .toThrow(new IncompleteDataError('Input ended mid-record: 53 trailing bytes'));
        });

        it('rejects a stream without its whole metadata block', () => {
            expect(() => DbnDecoder.decodeAll(encodeMetadata(testMetadata()).subarray(0, 50)))
                .toThrow(IncompleteDataError);
        });
    });
});
