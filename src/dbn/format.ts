export const DBN_MAGIC = new Uint8Array([0x44, 0x42, 0x4e]); // "DBN"
export const DBN_VERSION = 1;

/** `"DBN"` + version byte + u32 frame length. */
export const METADATA_PREFIX_SIZE = 8;

// Fixed section of the metadata frame, after the 8-byte prefix:
// dataset(16) schema(2) start(8) end(8) limit(8) record_count(8)
// stype_in(1) stype_out(1) ts_out(1) reserved(47)
export const METADATA_DATASET_CSTR_LEN = 16;
export const METADATA_RESERVED_LEN = 47;
export const METADATA_FIXED_LEN = 100;
export const SYMBOL_CSTR_LEN = 22;

/** Whole metadata blocks are padded to this many bytes. */
export const METADATA_ALIGN = 8;

export const RECORD_HEADER_SIZE = 16;
/** `RecordHeader.length` counts words of this many bytes. */
export const RECORD_LENGTH_MULT = 4;
/** Required byte alignment of a record start inside its backing buffer. */
export const RECORD_ALIGN = 4;

/** Prices are signed integers in units of 1e-9. */
export const FIXED_PRICE_SCALE = 1_000_000_000n;

/** The sentinel for a null or undefined price (i64 max). */
export const UNDEF_PRICE = 9_223_372_036_854_775_807n;
/** The sentinel for a null or undefined timestamp (u64 max). */
export const UNDEF_TIMESTAMP = 18_446_744_073_709_551_615n;
/** The sentinel for a null or undefined order quantity (u32 max). */
export const UNDEF_ORDER_SIZE = 4_294_967_295;
/** The sentinel for a null or undefined statistic quantity (i32 max). */
export const UNDEF_STAT_QUANTITY = 2_147_483_647;

/** Record discriminants. */
export enum RType {
    MBP_0 = 0x00,
    MBP_1 = 0x01,
    MBP_10 = 0x0a,
    OHLCV_DEPRECATED = 0x11,
    STATUS = 0x12,
    INSTRUMENT_DEF = 0x13,
    IMBALANCE = 0x14,
    ERROR = 0x15,
    SYMBOL_MAPPING = 0x16,
    SYSTEM = 0x17,
    STATISTICS = 0x18,
    OHLCV_1S = 0x20,
    OHLCV_1M = 0x21,
    OHLCV_1H = 0x22,
    OHLCV_1D = 0x23,
    MBO = 0xa0,
}

const RTYPE_VALUES: ReadonlySet<number> = new Set(
    Object.values(RType).filter((v): v is number => typeof v === 'number')
);

export function isRType(value: number): value is RType {
    return RTYPE_VALUES.has(value);
}

export const SCHEMAS = [
    'mbo',
    'mbp-1',
    'mbp-10',
    'tbbo',
    'trades',
    'ohlcv-1s',
    'ohlcv-1m',
    'ohlcv-1h',
    'ohlcv-1d',
    'definition',
    'statistics',
    'status',
    'imbalance',
] as const;

/** Dataset schema names, encoded on the wire as their index in {@link SCHEMAS}. */
export type Schema = typeof SCHEMAS[number];

export const STYPES = ['product_id', 'native', 'smart'] as const;

/** Symbology types, encoded on the wire as their index in {@link STYPES}. */
export type SType = typeof STYPES[number];

export function schemaFromU16(value: number): Schema | undefined {
    return SCHEMAS[value];
}

export function stypeFromU8(value: number): SType | undefined {
    return STYPES[value];
}
