/**
 * DBN public API
 *
 * @module dbn
 */

import { DbnDecoder } from './dbn/decode.js';
import { DbnEncoder, encodeDbn } from './dbn/encode.js';
import { CsvEncoder } from './dbn/csv.js';
import { JsonEncoder } from './dbn/json.js';
import { maybeDecompress, zstdCompress } from './dbn/compression.js';
import type { RecordEnum } from './dbn/catalog.js';
import type { Metadata } from './dbn/metadata.js';
import type { DbnEncoderOptions, DecoderOptions } from './dbn/types.js';

export type { DbnLogger as Logger, DecoderOptions, TextEncoderOptions, DbnEncoderOptions } from './dbn/types.js';
export type { DecoderState, DecodedItem } from './dbn/decode.js';
export type { Metadata, SymbolMapping, MappingInterval, MetadataUpdate } from './dbn/metadata.js';
export type { RecordHeader, HasHeader, WithTsOut, Column, FieldRole, FieldValue } from './dbn/record.js';
export type {
    MboMsg, BidAskPair, TradeMsg, Mbp1Msg, Mbp10Msg, OhlcvMsg, StatusMsg, InstrumentDefMsg, ImbalanceMsg,
    StatMsg, ErrorMsg, SymbolMappingMsg, SystemMsg, RecordKind, RecordOf, RecordEnum,
} from './dbn/catalog.js';
export type { EncodeSink, OutputWriter, SinkSignal } from './dbn/sink.js';
export type { Schema, SType } from './dbn/format.js';

export {
    DbnError, UnknownRecordTypeError, MalformedMetadataError, TruncatedRecordError,
    InvalidViewConstructionError, IncompleteDataError, LimitExceededError, EncodeError,
} from './dbn/errors.js';
export {
    RType, SCHEMAS, STYPES, UNDEF_PRICE, UNDEF_TIMESTAMP, UNDEF_ORDER_SIZE, UNDEF_STAT_QUANTITY, FIXED_PRICE_SCALE,
} from './dbn/format.js';
export {
    CATALOG, RECORD_KINDS, MBO, TRADE, MBP1, MBP10, OHLCV, STATUS, INSTRUMENT_DEF, IMBALANCE, STAT, ERROR,
    SYMBOL_MAPPING, SYSTEM, kindForRType, minSizeForRType, rtypeFromU8, recordKindForSchema, columnNames,
} from './dbn/catalog.js';
export { RecordSchema, makeHeader, recordSize } from './dbn/record.js';
export { RecordRef } from './dbn/record-ref.js';
export { decodeMetadata, encodeMetadata, freezeMetadata, updateEncodedMetadata } from './dbn/metadata.js';
export { DbnDecoder, DbnEncoder, CsvEncoder, JsonEncoder, encodeDbn };
export { MemoryWriter, isClosedPipe } from './dbn/sink.js';
export { fmtPx, fmtTs } from './dbn/pretty.js';
export { isZstdFrame, zstdCompress, zstdDecompress, maybeDecompress } from './dbn/compression.js';

// The DBN Namespace Object
export const DBN = {
    /**
     * Encodes metadata and records into a DBN stream, zstd-compressed when
     * `compress` is set.
     */
    encode: async (
        metadata: Metadata,
        records: Iterable<RecordEnum>,
        options: DbnEncoderOptions & { compress?: boolean } = {},
    ): Promise<Uint8Array> => {
        const { compress = false, ...encoderOptions } = options;
        const bytes = encodeDbn(metadata, records, encoderOptions);
        return compress ? await zstdCompress(bytes) : bytes;
    },

    /**
     * Decodes a complete DBN stream, plain or zstd-compressed.
     */
    decode: async (data: Uint8Array, options?: DecoderOptions): Promise<{ metadata: Metadata; records: RecordEnum[] }> => {
        return DbnDecoder.decodeAll(await maybeDecompress(data), options);
    },

    /**
     * Resumable decoder class for chunked input.
     */
    Decoder: DbnDecoder,

    /**
     * Binary encoder class.
     */
    Encoder: DbnEncoder,
};

export default DBN;
