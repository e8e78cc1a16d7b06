/**
 * The metadata preamble: decoded once before any record, encoded once before
 * the first record, and patched in place when a writer learns the final time
 * range or record count.
 */
import { ByteReader, ByteWriter } from './byte-cursor.js';
import { MalformedMetadataError } from './errors.js';
import {
    DBN_MAGIC, DBN_VERSION, METADATA_ALIGN, METADATA_DATASET_CSTR_LEN, METADATA_FIXED_LEN,
    METADATA_PREFIX_SIZE, METADATA_RESERVED_LEN, SCHEMAS, STYPES, SYMBOL_CSTR_LEN, UNDEF_TIMESTAMP,
    schemaFromU16, stypeFromU8, type Schema, type SType,
} from './format.js';

export interface MappingInterval {
    /** First day the mapping applies, `YYYY-MM-DD`. */
    startDate: string;
    /** Day after the last day the mapping applies, `YYYY-MM-DD`. */
    endDate: string;
    symbol: string;
}

export interface SymbolMapping {
    rawSymbol: string;
    intervals: MappingInterval[];
}

export interface Metadata {
    version: number;
    dataset: string;
    schema: Schema;
    stypeIn: SType;
    stypeOut: SType;
    /** Nanoseconds since the UNIX epoch. */
    start: bigint;
    end: bigint | null;
    limit: bigint | null;
    recordCount: bigint | null;
    /** Records carry a trailing out-timestamp. */
    tsOut: boolean;
    symbols: string[];
    /** Symbols resolved for only part of the requested range. */
    partial: string[];
    notFound: string[];
    mappings: SymbolMapping[];
}

export interface DecodedMetadata {
    metadata: Metadata;
    /** Bytes the whole block occupies, padding included. */
    length: number;
}

// Offsets of the patchable fields, from the start of the block.
const START_OFFSET = METADATA_PREFIX_SIZE + METADATA_DATASET_CSTR_LEN + 2;
const END_OFFSET = START_OFFSET + 8;
const LIMIT_OFFSET = END_OFFSET + 8;
const RECORD_COUNT_OFFSET = LIMIT_OFFSET + 8;
const VAR_SECTION_OFFSET = METADATA_PREFIX_SIZE + METADATA_FIXED_LEN + 4;

function dateToU32(date: string): number {
    const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(date);
    if (!m) throw new RangeError(`Invalid mapping date '${date}', expected YYYY-MM-DD`);
    return Number(m[1]) * 10_000 + Number(m[2]) * 100 + Number(m[3]);
}

function u32ToDate(value: number): string {
    const year = Math.floor(value / 10_000);
    const month = Math.floor(value / 100) % 100;
    const day = value % 100;
    return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * Parses the metadata block at the start of `data`.
 *
 * @returns null when `data` doesn't yet hold the whole block
 * @throws MalformedMetadataError when the bytes can never form a valid block
 */
export function decodeMetadata(data: Uint8Array): DecodedMetadata | null {
    const prefixBytes = Math.min(data.length, DBN_MAGIC.length);
    for (let i = 0; i < prefixBytes; i++) {
        if (data[i] !== DBN_MAGIC[i]) {
            throw new MalformedMetadataError('missing DBN prefix', i);
        }
    }
    if (data.length < METADATA_PREFIX_SIZE) return null;

    const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    const version = view.getUint8(3);
    if (version === 0 || version > DBN_VERSION) {
        throw new MalformedMetadataError(`unsupported version ${version}`, 3);
    }
    const frameLength = view.getUint32(4, true);
    if (frameLength < METADATA_FIXED_LEN + 4) {
        throw new MalformedMetadataError(`frame length ${frameLength} is shorter than the fixed section`, 4);
    }
    const total = METADATA_PREFIX_SIZE + frameLength;
    if (data.length < total) return null;

    const r = new ByteReader(new DataView(data.buffer, data.byteOffset, total), METADATA_PREFIX_SIZE);
    const dataset = r.cstr(METADATA_DATASET_CSTR_LEN);
    const schemaPos = r.pos;
    const schema = schemaFromU16(r.u16());
    if (schema === undefined) {
        throw new MalformedMetadataError(`unknown schema ${view.getUint16(schemaPos, true)}`, schemaPos);
    }
    const start = r.u64();
    const end = r.u64();
    const limit = r.u64();
    const recordCount = r.u64();
    const stypePos = r.pos;
    const stypeIn = stypeFromU8(r.u8());
    const stypeOut = stypeFromU8(r.u8());
    if (stypeIn === undefined || stypeOut === undefined) {
        throw new MalformedMetadataError('unknown symbology type', stypePos);
    }
    const tsOut = r.u8();
    if (tsOut > 1) {
        throw new MalformedMetadataError(`invalid ts_out flag ${tsOut}`, r.pos - 1);
    }
    r.skip(METADATA_RESERVED_LEN);
    const schemaDefinitionLength = r.u32();
    if (schemaDefinitionLength !== 0) {
        throw new MalformedMetadataError('schema definitions are not supported', r.pos - 4);
    }

    const readCount = (itemSize: number): number => {
        if (r.pos + 4 > total) throw new MalformedMetadataError('truncated count', r.pos);
        const count = r.u32();
        if (r.pos + count * itemSize > total) {
            throw new MalformedMetadataError(`count ${count} overruns the metadata frame`, r.pos - 4);
        }
        return count;
    };
    const readSymbols = (): string[] => {
        const count = readCount(SYMBOL_CSTR_LEN);
        const out: string[] = [];
        for (let i = 0; i < count; i++) out.push(r.cstr(SYMBOL_CSTR_LEN));
        return out;
    };

    const symbols = readSymbols();
    const partial = readSymbols();
    const notFound = readSymbols();
    const mappings: SymbolMapping[] = [];
    const mappingCount = readCount(SYMBOL_CSTR_LEN + 4);
    for (let i = 0; i < mappingCount; i++) {
        const rawSymbol = r.cstr(SYMBOL_CSTR_LEN);
        const intervalCount = readCount(8 + SYMBOL_CSTR_LEN);
        const intervals: MappingInterval[] = [];
        for (let j = 0; j < intervalCount; j++) {
            intervals.push({
                startDate: u32ToDate(r.u32()),
                endDate: u32ToDate(r.u32()),
                symbol: r.cstr(SYMBOL_CSTR_LEN),
            });
        }
        mappings.push({ rawSymbol, intervals });
    }

    return {
        metadata: {
            version,
            dataset,
            schema,
            stypeIn,
            stypeOut,
            start,
            end: end === UNDEF_TIMESTAMP ? null : end,
            limit: limit === 0n ? null : limit,
            recordCount: recordCount === UNDEF_TIMESTAMP ? null : recordCount,
            tsOut: tsOut === 1,
            symbols,
            partial,
            notFound,
            mappings,
        },
        length: total,
    };
}

function encodedLength(metadata: Metadata): number {
    const symbolLists = metadata.symbols.length + metadata.partial.length + metadata.notFound.length;
    let len = VAR_SECTION_OFFSET + 4 * 4 + symbolLists * SYMBOL_CSTR_LEN;
    for (const mapping of metadata.mappings) {
        len += SYMBOL_CSTR_LEN + 4 + mapping.intervals.length * (8 + SYMBOL_CSTR_LEN);
    }
    return Math.ceil(len / METADATA_ALIGN) * METADATA_ALIGN;
}

/** Encodes `metadata` as a block padded to a multiple of 8 bytes. */
export function encodeMetadata(metadata: Metadata): Uint8Array {
    const total = encodedLength(metadata);
    const bytes = new Uint8Array(total);
    const w = new ByteWriter(new DataView(bytes.buffer));

    bytes.set(DBN_MAGIC, 0);
    w.pos = DBN_MAGIC.length;
    w.u8(metadata.version);
    w.u32(total - METADATA_PREFIX_SIZE);
    w.cstr(metadata.dataset, METADATA_DATASET_CSTR_LEN);
    w.u16(SCHEMAS.indexOf(metadata.schema));
    w.u64(metadata.start);
    w.u64(metadata.end ?? UNDEF_TIMESTAMP);
    w.u64(metadata.limit ?? 0n);
    w.u64(metadata.recordCount ?? UNDEF_TIMESTAMP);
    w.u8(STYPES.indexOf(metadata.stypeIn));
    w.u8(STYPES.indexOf(metadata.stypeOut));
    w.u8(metadata.tsOut ? 1 : 0);
    w.skip(METADATA_RESERVED_LEN);
    w.u32(0); // schema definition length

    for (const list of [metadata.symbols, metadata.partial, metadata.notFound]) {
        w.u32(list.length);
        for (const symbol of list) w.cstr(symbol, SYMBOL_CSTR_LEN);
    }
    w.u32(metadata.mappings.length);
    for (const mapping of metadata.mappings) {
        w.cstr(mapping.rawSymbol, SYMBOL_CSTR_LEN);
        w.u32(mapping.intervals.length);
        for (const interval of mapping.intervals) {
            w.u32(dateToU32(interval.startDate));
            w.u32(dateToU32(interval.endDate));
            w.cstr(interval.symbol, SYMBOL_CSTR_LEN);
        }
    }
    return bytes;
}

/** Deep-freezes `metadata`, its symbol lists and every mapping, in place. */
export function freezeMetadata(metadata: Metadata): Metadata {
    for (const mapping of metadata.mappings) {
        for (const interval of mapping.intervals) Object.freeze(interval);
        Object.freeze(mapping.intervals);
        Object.freeze(mapping);
    }
    Object.freeze(metadata.mappings);
    Object.freeze(metadata.symbols);
    Object.freeze(metadata.partial);
    Object.freeze(metadata.notFound);
    return Object.freeze(metadata);
}

export interface MetadataUpdate {
    start?: bigint;
    end?: bigint | null;
    limit?: bigint | null;
    recordCount?: bigint | null;
}

/**
 * Patches the time range, limit and record count of an already encoded block
 * in place. Fields absent from `update` are left as they are.
 */
export function updateEncodedMetadata(bytes: Uint8Array, update: MetadataUpdate): void {
    for (let i = 0; i < DBN_MAGIC.length; i++) {
        if (bytes[i] !== DBN_MAGIC[i]) throw new MalformedMetadataError('missing DBN prefix', i);
    }
    if (bytes.length < VAR_SECTION_OFFSET) {
        throw new MalformedMetadataError('block too short to update', bytes.length);
    }
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    if (update.start !== undefined) view.setBigUint64(START_OFFSET, update.start, true);
    if (update.end !== undefined) view.setBigUint64(END_OFFSET, update.end ?? UNDEF_TIMESTAMP, true);
    if (update.limit !== undefined) view.setBigUint64(LIMIT_OFFSET, update.limit ?? 0n, true);
    if (update.recordCount !== undefined) {
        view.setBigUint64(RECORD_COUNT_OFFSET, update.recordCount ?? UNDEF_TIMESTAMP, true);
    }
}
