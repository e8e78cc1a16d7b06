import {
    ERROR, IMBALANCE, INSTRUMENT_DEF, MBO, MBP1, MBP10, OHLCV, STAT, STATUS, SYMBOL_MAPPING, SYSTEM, TRADE,
    type BidAskPair, type ErrorMsg, type ImbalanceMsg, type InstrumentDefMsg, type MboMsg, type Mbp10Msg,
    type Mbp1Msg, type OhlcvMsg, type RecordEnum, type RecordKind, type StatMsg, type StatusMsg,
    type SymbolMappingMsg, type SystemMsg, type TradeMsg,
} from '../../src/dbn/catalog.js';
import { RType, UNDEF_PRICE } from '../../src/dbn/format.js';
import type { Metadata } from '../../src/dbn/metadata.js';
import type { HasHeader, RecordHeader, RecordSchema } from '../../src/dbn/record.js';
import { RecordRef } from '../../src/dbn/record-ref.js';

export const TS_EVENT = 1_658_441_851_000_000_000n;
export const TS_RECV = 1_658_441_851_000_000_100n;

export function header(rtype: number, length: number, tsEvent: bigint = TS_EVENT): RecordHeader {
    return { length, rtype, publisherId: 1, productId: 5482, tsEvent };
}

export function mboMsg(overrides: Partial<MboMsg> = {}): MboMsg {
    return {
        hd: header(RType.MBO, MBO.length),
        orderId: 647_784_973_705n,
        price: 3_722_750_000_000n,
        size: 1,
        flags: 128,
        channelId: 0,
        action: 'C',
        side: 'A',
        tsRecv: TS_RECV,
        tsInDelta: 22_993,
        sequence: 1_170_352,
        ...overrides,
    };
}

export function tradeMsg(overrides: Partial<TradeMsg> = {}): TradeMsg {
    return {
        hd: header(RType.MBP_0, TRADE.length),
        price: 3_720_250_000_000n,
        size: 5,
        action: 'T',
        side: 'A',
        flags: 129,
        depth: 0,
        tsRecv: TS_RECV,
        tsInDelta: 19_251,
        sequence: 1_170_380,
        ...overrides,
    };
}

export function mbp1Msg(overrides: Partial<Mbp1Msg> = {}): Mbp1Msg {
    return {
        ...tradeMsg(),
        hd: header(RType.MBP_1, MBP1.length),
        action: 'A',
        levels: [{
            bidPx: 372_000_000_000_000n,
            askPx: 372_500_000_000_000n,
            bidSz: 10,
            askSz: 5,
            bidCt: 5,
            askCt: 2,
        }],
        ...overrides,
    };
}

export function ohlcvMsg(overrides: Partial<OhlcvMsg> = {}): OhlcvMsg {
    return {
        hd: header(RType.OHLCV_1S, OHLCV.length),
        open: 5000n,
        high: 8000n,
        low: 3000n,
        close: 6000n,
        volume: 55_000n,
        ...overrides,
    };
}

/** Level `i` of a ten-deep book: prices step by 0.25, sizes by one. */
export function bookLevel(i: number): BidAskPair {
    return {
        bidPx: 3_720_000_000_000n - BigInt(i) * 250_000_000n,
        askPx: 3_720_250_000_000n + BigInt(i) * 250_000_000n,
        bidSz: 10 + i,
        askSz: 20 + i,
        bidCt: 1 + i,
        askCt: 2 + i,
    };
}

export function mbp10Msg(overrides: Partial<Mbp10Msg> = {}): Mbp10Msg {
    return {
        ...tradeMsg(),
        hd: header(RType.MBP_10, MBP10.length),
        action: 'A',
        side: 'B',
        depth: 3,
        levels: Array.from({ length: 10 }, (_, i) => bookLevel(i)),
        ...overrides,
    };
}

export function statusMsg(overrides: Partial<StatusMsg> = {}): StatusMsg {
    return {
        hd: header(RType.STATUS, STATUS.length),
        tsRecv: TS_RECV,
        group: 'ES',
        tradingStatus: 17,
        haltReason: 3,
        tradingEvent: 4,
        ...overrides,
    };
}

export function instrumentDefMsg(overrides: Partial<InstrumentDefMsg> = {}): InstrumentDefMsg {
    return {
        hd: header(RType.INSTRUMENT_DEF, INSTRUMENT_DEF.length),
        tsRecv: TS_RECV,
        minPriceIncrement: 250_000_000n,
        displayFactor: 1_000_000_000n,
        expiration: 1_663_248_600_000_000_000n,
        activation: 1_647_557_400_000_000_000n,
        highLimitPrice: 4_000_000_000_000n,
        lowLimitPrice: 3_400_000_000_000n,
        maxPriceVariation: 150_000_000_000n,
        tradingReferencePrice: 3_722_500_000_000n,
        unitOfMeasureQty: 50_000_000_000n,
        minPriceIncrementAmount: 12_500_000_000n,
        priceRatio: UNDEF_PRICE,
        instAttribValue: -7,
        underlyingId: 11,
        clearedVolume: 12,
        marketDepthImplied: 2,
        marketDepth: 10,
        marketSegmentId: 64,
        maxTradeVol: 3000,
        minLotSize: 1,
        minLotSizeBlock: 5,
        minLotSizeRoundLot: 6,
        minTradeVol: 1,
        openInterestQty: 13,
        contractMultiplier: 50,
        decayQuantity: 14,
        originalContractSize: 15,
        relatedSecurityId: 16,
        tradingReferenceDate: 19_194,
        applId: -2,
        maturityYear: 2022,
        decayStartDate: 17,
        channelId: 310,
        currency: 'USD',
        settlCurrency: 'USD',
        secsubtype: 'NA',
        symbol: 'ESU2',
        group: 'ES',
        exchange: 'XCME',
        asset: 'ES',
        cfi: 'FFIXSX',
        securityType: 'FUT',
        unitOfMeasure: 'IPNT',
        underlying: 'ES',
        related: 'ESZ2',
        matchAlgorithm: 'F',
        mdSecurityTradingStatus: 2,
        mainFraction: 4,
        priceDisplayFormat: 5,
        settlPriceType: 6,
        subFraction: 7,
        underlyingProduct: 8,
        securityUpdateAction: 'A',
        maturityMonth: 9,
        maturityDay: 16,
        maturityWeek: 3,
        userDefinedInstrument: 'N',
        contractMultiplierUnit: -1,
        flowScheduleType: 1,
        tickRule: 18,
        ...overrides,
    };
}

export function imbalanceMsg(overrides: Partial<ImbalanceMsg> = {}): ImbalanceMsg {
    return {
        hd: header(RType.IMBALANCE, IMBALANCE.length),
        tsRecv: TS_RECV,
        refPrice: 229_430_000_000n,
        auctionTime: 1_658_441_900_000_000_000n,
        contBookClrPrice: 229_440_000_000n,
        auctInterestClrPrice: 229_450_000_000n,
        ssrFillingPrice: UNDEF_PRICE,
        indMatchPrice: 229_460_000_000n,
        upperCollar: 240_900_000_000n,
        lowerCollar: 217_950_000_000n,
        pairedQty: 1_000,
        totalImbalanceQty: 2_000,
        marketImbalanceQty: 300,
        unpairedQty: 40,
        auctionType: 'O',
        side: 'B',
        auctionStatus: 1,
        freezeStatus: 2,
        numExtensions: 3,
        unpairedSide: 'A',
        significantImbalance: 'L',
        ...overrides,
    };
}

export function statMsg(overrides: Partial<StatMsg> = {}): StatMsg {
    return {
        hd: header(RType.STATISTICS, STAT.length),
        tsRecv: TS_RECV,
        tsRef: 1_658_400_000_000_000_000n,
        price: 3_721_000_000_000n,
        quantity: -5,
        sequence: 1_170_400,
        tsInDelta: 18_000,
        statType: 3,
        channelId: 12,
        updateAction: 1,
        statFlags: 2,
        ...overrides,
    };
}

export function errorMsg(overrides: Partial<ErrorMsg> = {}): ErrorMsg {
    return { hd: header(RType.ERROR, ERROR.length), err: 'Gateway disconnected', ...overrides };
}

export function symbolMappingMsg(overrides: Partial<SymbolMappingMsg> = {}): SymbolMappingMsg {
    return {
        hd: header(RType.SYMBOL_MAPPING, SYMBOL_MAPPING.length),
        stypeInSymbol: 'ESU2',
        stypeOutSymbol: '5482',
        startTs: 1_658_361_600_000_000_000n,
        endTs: 1_658_448_000_000_000_000n,
        ...overrides,
    };
}

export function systemMsg(overrides: Partial<SystemMsg> = {}): SystemMsg {
    return { hd: header(RType.SYSTEM, SYSTEM.length), msg: 'Heartbeat', ...overrides };
}

/**
 * One representative record of `kind`. With `tsOut`, the header length also
 * covers the trailing out-timestamp.
 */
export function sampleRecord(kind: RecordKind, tsOut?: bigint): RecordEnum {
    const rec = plainRecord(kind);
    if (tsOut === undefined) return rec;
    rec.record.hd.length += 2;
    return { ...rec, tsOut };
}

function plainRecord(kind: RecordKind): RecordEnum {
    switch (kind) {
        case 'mbo': return { kind, record: mboMsg() };
        case 'trade': return { kind, record: tradeMsg() };
        case 'mbp1': return { kind, record: mbp1Msg() };
        case 'mbp10': return { kind, record: mbp10Msg() };
        case 'ohlcv': return { kind, record: ohlcvMsg() };
        case 'status': return { kind, record: statusMsg() };
        case 'instrumentDef': return { kind, record: instrumentDefMsg() };
        case 'imbalance': return { kind, record: imbalanceMsg() };
        case 'stat': return { kind, record: statMsg() };
        case 'error': return { kind, record: errorMsg() };
        case 'symbolMapping': return { kind, record: symbolMappingMsg() };
        case 'system': return { kind, record: systemMsg() };
    }
}

/** Encoded length 208: 112 fixed + 16 counts + 22 symbol + 56 mapping, padded from 206. */
export function testMetadata(overrides: Partial<Metadata> = {}): Metadata {
    return {
        version: 1,
        dataset: 'TEST.MDP3',
        schema: 'mbo',
        stypeIn: 'native',
        stypeOut: 'product_id',
        start: TS_EVENT,
        end: TS_EVENT + 1_000_000_000n,
        limit: null,
        recordCount: null,
        tsOut: false,
        symbols: ['ESU2'],
        partial: [],
        notFound: [],
        mappings: [{
            rawSymbol: 'ESU2',
            intervals: [{ startDate: '2022-07-21', endDate: '2022-07-22', symbol: '5482' }],
        }],
        ...overrides,
    };
}

export function recordBytes<T extends HasHeader>(schema: RecordSchema<T>, record: T): Uint8Array {
    return RecordRef.fromRecord(schema, record).bytes;
}

export function concat(...parts: Uint8Array[]): Uint8Array {
    const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0));
    let offset = 0;
    for (const p of parts) {
        out.set(p, offset);
        offset += p.length;
    }
    return out;
}

/** A raw record of `length` words with only the header's first two bytes set. */
export function rawRecord(length: number, rtype: number): Uint8Array {
    const bytes = new Uint8Array(Math.max(length * 4, 16));
    bytes[0] = length;
    bytes[1] = rtype;
    return bytes;
}
