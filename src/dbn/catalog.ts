/**
 * The record catalog: every fixed-layout record type with its discriminants,
 * byte layout and text columns.
 */
import { ByteReader, ByteWriter } from './byte-cursor.js';
import { UnknownRecordTypeError } from './errors.js';
import { RType, isRType, type Schema } from './format.js';
import { RecordSchema, columnsFor, type Column, type HasHeader, type RecordHeader } from './record.js';

export interface MboMsg extends HasHeader {
    orderId: bigint;
    price: bigint;
    size: number;
    flags: number;
    channelId: number;
    action: string;
    side: string;
    tsRecv: bigint;
    tsInDelta: number;
    sequence: number;
}

export interface BidAskPair {
    bidPx: bigint;
    askPx: bigint;
    bidSz: number;
    askSz: number;
    bidCt: number;
    askCt: number;
}

export interface TradeMsg extends HasHeader {
    price: bigint;
    size: number;
    action: string;
    side: string;
    flags: number;
    /** Book level where the update occurred. */
    depth: number;
    tsRecv: bigint;
    tsInDelta: number;
    sequence: number;
}

export interface Mbp1Msg extends TradeMsg {
    levels: BidAskPair[];
}

export interface Mbp10Msg extends TradeMsg {
    levels: BidAskPair[];
}

export interface OhlcvMsg extends HasHeader {
    open: bigint;
    high: bigint;
    low: bigint;
    close: bigint;
    volume: bigint;
}

export interface StatusMsg extends HasHeader {
    tsRecv: bigint;
    group: string;
    tradingStatus: number;
    haltReason: number;
    tradingEvent: number;
}

export interface InstrumentDefMsg extends HasHeader {
    tsRecv: bigint;
    minPriceIncrement: bigint;
    displayFactor: bigint;
    expiration: bigint;
    activation: bigint;
    highLimitPrice: bigint;
    lowLimitPrice: bigint;
    maxPriceVariation: bigint;
    tradingReferencePrice: bigint;
    unitOfMeasureQty: bigint;
    minPriceIncrementAmount: bigint;
    priceRatio: bigint;
    instAttribValue: number;
    underlyingId: number;
    clearedVolume: number;
    marketDepthImplied: number;
    marketDepth: number;
    marketSegmentId: number;
    maxTradeVol: number;
    minLotSize: number;
    minLotSizeBlock: number;
    minLotSizeRoundLot: number;
    minTradeVol: number;
    openInterestQty: number;
    contractMultiplier: number;
    decayQuantity: number;
    originalContractSize: number;
    relatedSecurityId: number;
    tradingReferenceDate: number;
    applId: number;
    maturityYear: number;
    decayStartDate: number;
    channelId: number;
    currency: string;
    settlCurrency: string;
    secsubtype: string;
    symbol: string;
    group: string;
    exchange: string;
    asset: string;
    cfi: string;
    securityType: string;
    unitOfMeasure: string;
    underlying: string;
    related: string;
    matchAlgorithm: string;
    mdSecurityTradingStatus: number;
    mainFraction: number;
    priceDisplayFormat: number;
    settlPriceType: number;
    subFraction: number;
    underlyingProduct: number;
    /** `A`dd, `D`elete or `M`odify. */
    securityUpdateAction: string;
    maturityMonth: number;
    maturityDay: number;
    maturityWeek: number;
    /** `Y` or `N`. */
    userDefinedInstrument: string;
    contractMultiplierUnit: number;
    flowScheduleType: number;
    tickRule: number;
}

export interface ImbalanceMsg extends HasHeader {
    tsRecv: bigint;
    refPrice: bigint;
    auctionTime: bigint;
    contBookClrPrice: bigint;
    auctInterestClrPrice: bigint;
    ssrFillingPrice: bigint;
    indMatchPrice: bigint;
    upperCollar: bigint;
    lowerCollar: bigint;
    pairedQty: number;
    totalImbalanceQty: number;
    marketImbalanceQty: number;
    unpairedQty: number;
    auctionType: string;
    side: string;
    auctionStatus: number;
    freezeStatus: number;
    numExtensions: number;
    unpairedSide: string;
    significantImbalance: string;
}

export interface StatMsg extends HasHeader {
    tsRecv: bigint;
    tsRef: bigint;
    price: bigint;
    quantity: number;
    sequence: number;
    tsInDelta: number;
    statType: number;
    channelId: number;
    updateAction: number;
    statFlags: number;
}

export interface ErrorMsg extends HasHeader {
    err: string;
}

export interface SymbolMappingMsg extends HasHeader {
    stypeInSymbol: string;
    stypeOutSymbol: string;
    startTs: bigint;
    endTs: bigint;
}

export interface SystemMsg extends HasHeader {
    msg: string;
}

function readLevels(r: ByteReader, count: number): BidAskPair[] {
    const levels: BidAskPair[] = [];
    for (let i = 0; i < count; i++) {
        levels.push({
            bidPx: r.i64(),
            askPx: r.i64(),
            bidSz: r.u32(),
            askSz: r.u32(),
            bidCt: r.u32(),
            askCt: r.u32(),
        });
    }
    return levels;
}

function writeLevels(w: ByteWriter, levels: BidAskPair[], count: number): void {
    if (levels.length !== count) {
        throw new RangeError(`Expected ${count} book levels, got ${levels.length}`);
    }
    for (const level of levels) {
        w.i64(level.bidPx);
        w.i64(level.askPx);
        w.u32(level.bidSz);
        w.u32(level.askSz);
        w.u32(level.bidCt);
        w.u32(level.askCt);
    }
}

function readTradeBody(r: ByteReader, hd: RecordHeader): TradeMsg {
    return {
        hd,
        price: r.i64(),
        size: r.u32(),
        action: r.char(),
        side: r.char(),
        flags: r.u8(),
        depth: r.u8(),
        tsRecv: r.u64(),
        tsInDelta: r.i32(),
        sequence: r.u32(),
    };
}

function writeTradeBody(w: ByteWriter, m: TradeMsg): void {
    w.i64(m.price);
    w.u32(m.size);
    w.char(m.action);
    w.char(m.side);
    w.u8(m.flags);
    w.u8(m.depth);
    w.u64(m.tsRecv);
    w.i32(m.tsInDelta);
    w.u32(m.sequence);
}

function tradeColumns<T extends TradeMsg>(): Column<T>[] {
    const { col, px, ts, header } = columnsFor<T>();
    return [
        ...header(),
        px('price', (m) => m.price),
        col('size', (m) => m.size),
        col('action', (m) => m.action),
        col('side', (m) => m.side),
        col('flags', (m) => m.flags),
        col('depth', (m) => m.depth),
        ts('ts_recv', (m) => m.tsRecv),
        col('ts_in_delta', (m) => m.tsInDelta),
        col('sequence', (m) => m.sequence),
    ];
}

function levelColumns<T extends { levels: BidAskPair[] }>(count: number): Column<T>[] {
    const out: Column<T>[] = [];
    for (let i = 0; i < count; i++) {
        const n = String(i).padStart(2, '0');
        out.push(
            { name: `bid_px_${n}`, role: 'px', value: (m) => m.levels[i].bidPx },
            { name: `ask_px_${n}`, role: 'px', value: (m) => m.levels[i].askPx },
            { name: `bid_sz_${n}`, role: 'plain', value: (m) => m.levels[i].bidSz },
            { name: `ask_sz_${n}`, role: 'plain', value: (m) => m.levels[i].askSz },
            { name: `bid_ct_${n}`, role: 'plain', value: (m) => m.levels[i].bidCt },
            { name: `ask_ct_${n}`, role: 'plain', value: (m) => m.levels[i].askCt },
        );
    }
    return out;
}

const mbo = columnsFor<MboMsg>();
export const MBO = new RecordSchema<MboMsg>(
    'mbo',
    [RType.MBO],
    56,
    (r, hd) => ({
        hd,
        orderId: r.u64(),
        price: r.i64(),
        size: r.u32(),
        flags: r.u8(),
        channelId: r.u8(),
        action: r.char(),
        side: r.char(),
        tsRecv: r.u64(),
        tsInDelta: r.i32(),
        sequence: r.u32(),
    }),
    (w, m) => {
        w.u64(m.orderId);
        w.i64(m.price);
        w.u32(m.size);
        w.u8(m.flags);
        w.u8(m.channelId);
        w.char(m.action);
        w.char(m.side);
        w.u64(m.tsRecv);
        w.i32(m.tsInDelta);
        w.u32(m.sequence);
    },
    [
        ...mbo.header(),
        mbo.col('order_id', (m) => m.orderId),
        mbo.px('price', (m) => m.price),
        mbo.col('size', (m) => m.size),
        mbo.col('flags', (m) => m.flags),
        mbo.col('channel_id', (m) => m.channelId),
        mbo.col('action', (m) => m.action),
        mbo.col('side', (m) => m.side),
        mbo.ts('ts_recv', (m) => m.tsRecv),
        mbo.col('ts_in_delta', (m) => m.tsInDelta),
        mbo.col('sequence', (m) => m.sequence),
    ],
);

/** Trades: market-by-price with zero book levels. */
export const TRADE = new RecordSchema<TradeMsg>(
    'trade',
    [RType.MBP_0],
    48,
    readTradeBody,
    writeTradeBody,
    tradeColumns<TradeMsg>(),
);

export const MBP1 = new RecordSchema<Mbp1Msg>(
    'mbp-1',
    [RType.MBP_1],
    80,
    (r, hd) => ({ ...readTradeBody(r, hd), levels: readLevels(r, 1) }),
    (w, m) => { writeTradeBody(w, m); writeLevels(w, m.levels, 1); },
    [...tradeColumns<Mbp1Msg>(), ...levelColumns<Mbp1Msg>(1)],
);

export const MBP10 = new RecordSchema<Mbp10Msg>(
    'mbp-10',
    [RType.MBP_10],
    368,
    (r, hd) => ({ ...readTradeBody(r, hd), levels: readLevels(r, 10) }),
    (w, m) => { writeTradeBody(w, m); writeLevels(w, m.levels, 10); },
    [...tradeColumns<Mbp10Msg>(), ...levelColumns<Mbp10Msg>(10)],
);

const ohlcv = columnsFor<OhlcvMsg>();
export const OHLCV = new RecordSchema<OhlcvMsg>(
    'ohlcv',
    [RType.OHLCV_DEPRECATED, RType.OHLCV_1S, RType.OHLCV_1M, RType.OHLCV_1H, RType.OHLCV_1D],
    56,
    (r, hd) => ({
        hd,
        open: r.i64(),
        high: r.i64(),
        low: r.i64(),
        close: r.i64(),
        volume: r.u64(),
    }),
    (w, m) => {
        w.i64(m.open);
        w.i64(m.high);
        w.i64(m.low);
        w.i64(m.close);
        w.u64(m.volume);
    },
    [
        ...ohlcv.header(),
        ohlcv.px('open', (m) => m.open),
        ohlcv.px('high', (m) => m.high),
        ohlcv.px('low', (m) => m.low),
        ohlcv.px('close', (m) => m.close),
        ohlcv.col('volume', (m) => m.volume),
    ],
);

const status = columnsFor<StatusMsg>();
export const STATUS = new RecordSchema<StatusMsg>(
    'status',
    [RType.STATUS],
    48,
    (r, hd) => ({
        hd,
        tsRecv: r.u64(),
        group: r.cstr(21),
        tradingStatus: r.u8(),
        haltReason: r.u8(),
        tradingEvent: r.u8(),
    }),
    (w, m) => {
        w.u64(m.tsRecv);
        w.cstr(m.group, 21);
        w.u8(m.tradingStatus);
        w.u8(m.haltReason);
        w.u8(m.tradingEvent);
    },
    [
        ...status.header(),
        status.ts('ts_recv', (m) => m.tsRecv),
        status.col('group', (m) => m.group),
        status.col('trading_status', (m) => m.tradingStatus),
        status.col('halt_reason', (m) => m.haltReason),
        status.col('trading_event', (m) => m.tradingEvent),
    ],
);

const def = columnsFor<InstrumentDefMsg>();
export const INSTRUMENT_DEF = new RecordSchema<InstrumentDefMsg>(
    'instrument_def',
    [RType.INSTRUMENT_DEF],
    360,
    (r, hd) => {
        const m: InstrumentDefMsg = {
            hd,
            tsRecv: r.u64(),
            minPriceIncrement: r.i64(),
            displayFactor: r.i64(),
            expiration: r.u64(),
            activation: r.u64(),
            highLimitPrice: r.i64(),
            lowLimitPrice: r.i64(),
            maxPriceVariation: r.i64(),
            tradingReferencePrice: r.i64(),
            unitOfMeasureQty: r.i64(),
            minPriceIncrementAmount: r.i64(),
            priceRatio: r.i64(),
            instAttribValue: r.i32(),
            underlyingId: r.u32(),
            clearedVolume: r.i32(),
            marketDepthImplied: r.i32(),
            marketDepth: r.i32(),
            marketSegmentId: r.u32(),
            maxTradeVol: r.u32(),
            minLotSize: r.i32(),
            minLotSizeBlock: r.i32(),
            minLotSizeRoundLot: r.i32(),
            minTradeVol: r.u32(),
            openInterestQty: r.i32(),
            contractMultiplier: r.i32(),
            decayQuantity: r.i32(),
            originalContractSize: r.i32(),
            relatedSecurityId: r.u32(),
            tradingReferenceDate: r.u16(),
            applId: r.i16(),
            maturityYear: r.u16(),
            decayStartDate: r.u16(),
            channelId: r.u16(),
            currency: r.cstr(4),
            settlCurrency: r.cstr(4),
            secsubtype: r.cstr(6),
            symbol: r.cstr(22),
            group: r.cstr(21),
            exchange: r.cstr(5),
            asset: r.cstr(7),
            cfi: r.cstr(7),
            securityType: r.cstr(7),
            unitOfMeasure: r.cstr(31),
            underlying: r.cstr(21),
            related: r.cstr(21),
            matchAlgorithm: r.char(),
            mdSecurityTradingStatus: r.u8(),
            mainFraction: r.u8(),
            priceDisplayFormat: r.u8(),
            settlPriceType: r.u8(),
            subFraction: r.u8(),
            underlyingProduct: r.u8(),
            securityUpdateAction: r.char(),
            maturityMonth: r.u8(),
            maturityDay: r.u8(),
            maturityWeek: r.u8(),
            userDefinedInstrument: r.char(),
            contractMultiplierUnit: r.i8(),
            flowScheduleType: r.i8(),
            tickRule: r.u8(),
        };
        r.skip(3);
        return m;
    },
    (w, m) => {
        w.u64(m.tsRecv);
        w.i64(m.minPriceIncrement);
        w.i64(m.displayFactor);
        w.u64(m.expiration);
        w.u64(m.activation);
        w.i64(m.highLimitPrice);
        w.i64(m.lowLimitPrice);
        w.i64(m.maxPriceVariation);
        w.i64(m.tradingReferencePrice);
        w.i64(m.unitOfMeasureQty);
        w.i64(m.minPriceIncrementAmount);
        w.i64(m.priceRatio);
        w.i32(m.instAttribValue);
        w.u32(m.underlyingId);
        w.i32(m.clearedVolume);
        w.i32(m.marketDepthImplied);
        w.i32(m.marketDepth);
        w.u32(m.marketSegmentId);
        w.u32(m.maxTradeVol);
        w.i32(m.minLotSize);
        w.i32(m.minLotSizeBlock);
        w.i32(m.minLotSizeRoundLot);
        w.u32(m.minTradeVol);
        w.i32(m.openInterestQty);
        w.i32(m.contractMultiplier);
        w.i32(m.decayQuantity);
        w.i32(m.originalContractSize);
        w.u32(m.relatedSecurityId);
        w.u16(m.tradingReferenceDate);
        w.i16(m.applId);
        w.u16(m.maturityYear);
        w.u16(m.decayStartDate);
        w.u16(m.channelId);
        w.cstr(m.currency, 4);
        w.cstr(m.settlCurrency, 4);
        w.cstr(m.secsubtype, 6);
        w.cstr(m.symbol, 22);
        w.cstr(m.group, 21);
        w.cstr(m.exchange, 5);
        w.cstr(m.asset, 7);
        w.cstr(m.cfi, 7);
        w.cstr(m.securityType, 7);
        w.cstr(m.unitOfMeasure, 31);
        w.cstr(m.underlying, 21);
        w.cstr(m.related, 21);
        w.char(m.matchAlgorithm);
        w.u8(m.mdSecurityTradingStatus);
        w.u8(m.mainFraction);
        w.u8(m.priceDisplayFormat);
        w.u8(m.settlPriceType);
        w.u8(m.subFraction);
        w.u8(m.underlyingProduct);
        w.char(m.securityUpdateAction);
        w.u8(m.maturityMonth);
        w.u8(m.maturityDay);
        w.u8(m.maturityWeek);
        w.char(m.userDefinedInstrument);
        w.i8(m.contractMultiplierUnit);
        w.i8(m.flowScheduleType);
        w.u8(m.tickRule);
        w.skip(3);
    },
    [
        ...def.header(),
        def.ts('ts_recv', (m) => m.tsRecv),
        def.px('min_price_increment', (m) => m.minPriceIncrement),
        def.px('display_factor', (m) => m.displayFactor),
        def.ts('expiration', (m) => m.expiration),
        def.ts('activation', (m) => m.activation),
        def.px('high_limit_price', (m) => m.highLimitPrice),
        def.px('low_limit_price', (m) => m.lowLimitPrice),
        def.px('max_price_variation', (m) => m.maxPriceVariation),
        def.px('trading_reference_price', (m) => m.tradingReferencePrice),
        def.px('unit_of_measure_qty', (m) => m.unitOfMeasureQty),
        def.px('min_price_increment_amount', (m) => m.minPriceIncrementAmount),
        def.px('price_ratio', (m) => m.priceRatio),
        def.col('inst_attrib_value', (m) => m.instAttribValue),
        def.col('underlying_id', (m) => m.underlyingId),
        def.col('cleared_volume', (m) => m.clearedVolume),
        def.col('market_depth_implied', (m) => m.marketDepthImplied),
        def.col('market_depth', (m) => m.marketDepth),
        def.col('market_segment_id', (m) => m.marketSegmentId),
        def.col('max_trade_vol', (m) => m.maxTradeVol),
        def.col('min_lot_size', (m) => m.minLotSize),
        def.col('min_lot_size_block', (m) => m.minLotSizeBlock),
        def.col('min_lot_size_round_lot', (m) => m.minLotSizeRoundLot),
        def.col('min_trade_vol', (m) => m.minTradeVol),
        def.col('open_interest_qty', (m) => m.openInterestQty),
        def.col('contract_multiplier', (m) => m.contractMultiplier),
        def.col('decay_quantity', (m) => m.decayQuantity),
        def.col('original_contract_size', (m) => m.originalContractSize),
        def.col('related_security_id', (m) => m.relatedSecurityId),
        def.col('trading_reference_date', (m) => m.tradingReferenceDate),
        def.col('appl_id', (m) => m.applId),
        def.col('maturity_year', (m) => m.maturityYear),
        def.col('decay_start_date', (m) => m.decayStartDate),
        def.col('channel_id', (m) => m.channelId),
        def.col('currency', (m) => m.currency),
        def.col('settl_currency', (m) => m.settlCurrency),
        def.col('secsubtype', (m) => m.secsubtype),
        def.col('symbol', (m) => m.symbol),
        def.col('group', (m) => m.group),
        def.col('exchange', (m) => m.exchange),
        def.col('asset', (m) => m.asset),
        def.col('cfi', (m) => m.cfi),
        def.col('security_type', (m) => m.securityType),
        def.col('unit_of_measure', (m) => m.unitOfMeasure),
        def.col('underlying', (m) => m.underlying),
        def.col('related', (m) => m.related),
        def.col('match_algorithm', (m) => m.matchAlgorithm),
        def.col('md_security_trading_status', (m) => m.mdSecurityTradingStatus),
        def.col('main_fraction', (m) => m.mainFraction),
        def.col('price_display_format', (m) => m.priceDisplayFormat),
        def.col('settl_price_type', (m) => m.settlPriceType),
        def.col('sub_fraction', (m) => m.subFraction),
        def.col('underlying_product', (m) => m.underlyingProduct),
        def.col('security_update_action', (m) => m.securityUpdateAction),
        def.col('maturity_month', (m) => m.maturityMonth),
        def.col('maturity_day', (m) => m.maturityDay),
        def.col('maturity_week', (m) => m.maturityWeek),
        def.col('user_defined_instrument', (m) => m.userDefinedInstrument),
        def.col('contract_multiplier_unit', (m) => m.contractMultiplierUnit),
        def.col('flow_schedule_type', (m) => m.flowScheduleType),
        def.col('tick_rule', (m) => m.tickRule),
    ],
);

const imb = columnsFor<ImbalanceMsg>();
export const IMBALANCE = new RecordSchema<ImbalanceMsg>(
    'imbalance',
    [RType.IMBALANCE],
    112,
    (r, hd) => {
        const m: ImbalanceMsg = {
            hd,
            tsRecv: r.u64(),
            refPrice: r.i64(),
            auctionTime: r.u64(),
            contBookClrPrice: r.i64(),
            auctInterestClrPrice: r.i64(),
            ssrFillingPrice: r.i64(),
            indMatchPrice: r.i64(),
            upperCollar: r.i64(),
            lowerCollar: r.i64(),
            pairedQty: r.u32(),
            totalImbalanceQty: r.u32(),
            marketImbalanceQty: r.u32(),
            unpairedQty: r.u32(),
            auctionType: r.char(),
            side: r.char(),
            auctionStatus: r.u8(),
            freezeStatus: r.u8(),
            numExtensions: r.u8(),
            unpairedSide: r.char(),
            significantImbalance: r.char(),
        };
        r.skip(1);
        return m;
    },
    (w, m) => {
        w.u64(m.tsRecv);
        w.i64(m.refPrice);
        w.u64(m.auctionTime);
        w.i64(m.contBookClrPrice);
        w.i64(m.auctInterestClrPrice);
        w.i64(m.ssrFillingPrice);
        w.i64(m.indMatchPrice);
        w.i64(m.upperCollar);
        w.i64(m.lowerCollar);
        w.u32(m.pairedQty);
        w.u32(m.totalImbalanceQty);
        w.u32(m.marketImbalanceQty);
        w.u32(m.unpairedQty);
        w.char(m.auctionType);
        w.char(m.side);
        w.u8(m.auctionStatus);
        w.u8(m.freezeStatus);
        w.u8(m.numExtensions);
        w.char(m.unpairedSide);
        w.char(m.significantImbalance);
        w.skip(1);
    },
    [
        ...imb.header(),
        imb.ts('ts_recv', (m) => m.tsRecv),
        imb.px('ref_price', (m) => m.refPrice),
        imb.ts('auction_time', (m) => m.auctionTime),
        imb.px('cont_book_clr_price', (m) => m.contBookClrPrice),
        imb.px('auct_interest_clr_price', (m) => m.auctInterestClrPrice),
        imb.px('ssr_filling_price', (m) => m.ssrFillingPrice),
        imb.px('ind_match_price', (m) => m.indMatchPrice),
        imb.px('upper_collar', (m) => m.upperCollar),
        imb.px('lower_collar', (m) => m.lowerCollar),
        imb.col('paired_qty', (m) => m.pairedQty),
        imb.col('total_imbalance_qty', (m) => m.totalImbalanceQty),
        imb.col('market_imbalance_qty', (m) => m.marketImbalanceQty),
        imb.col('unpaired_qty', (m) => m.unpairedQty),
        imb.col('auction_type', (m) => m.auctionType),
        imb.col('side', (m) => m.side),
        imb.col('auction_status', (m) => m.auctionStatus),
        imb.col('freeze_status', (m) => m.freezeStatus),
        imb.col('num_extensions', (m) => m.numExtensions),
        imb.col('unpaired_side', (m) => m.unpairedSide),
        imb.col('significant_imbalance', (m) => m.significantImbalance),
    ],
);

const stat = columnsFor<StatMsg>();
export const STAT = new RecordSchema<StatMsg>(
    'stat',
    [RType.STATISTICS],
    64,
    (r, hd) => {
        const m: StatMsg = {
            hd,
            tsRecv: r.u64(),
            tsRef: r.u64(),
            price: r.i64(),
            quantity: r.i32(),
            sequence: r.u32(),
            tsInDelta: r.i32(),
            statType: r.u16(),
            channelId: r.u16(),
            updateAction: r.u8(),
            statFlags: r.u8(),
        };
        r.skip(6);
        return m;
    },
    (w, m) => {
        w.u64(m.tsRecv);
        w.u64(m.tsRef);
        w.i64(m.price);
        w.i32(m.quantity);
        w.u32(m.sequence);
        w.i32(m.tsInDelta);
        w.u16(m.statType);
        w.u16(m.channelId);
        w.u8(m.updateAction);
        w.u8(m.statFlags);
        w.skip(6);
    },
    [
        ...stat.header(),
        stat.ts('ts_recv', (m) => m.tsRecv),
        stat.ts('ts_ref', (m) => m.tsRef),
        stat.px('price', (m) => m.price),
        stat.col('quantity', (m) => m.quantity),
        stat.col('sequence', (m) => m.sequence),
        stat.col('ts_in_delta', (m) => m.tsInDelta),
        stat.col('stat_type', (m) => m.statType),
        stat.col('channel_id', (m) => m.channelId),
        stat.col('update_action', (m) => m.updateAction),
        stat.col('stat_flags', (m) => m.statFlags),
    ],
);

const err = columnsFor<ErrorMsg>();
export const ERROR = new RecordSchema<ErrorMsg>(
    'error',
    [RType.ERROR],
    80,
    (r, hd) => ({ hd, err: r.cstr(64) }),
    (w, m) => w.cstr(m.err, 64),
    [...err.header(), err.col('err', (m) => m.err)],
);

const sym = columnsFor<SymbolMappingMsg>();
export const SYMBOL_MAPPING = new RecordSchema<SymbolMappingMsg>(
    'symbol_mapping',
    [RType.SYMBOL_MAPPING],
    80,
    (r, hd) => {
        const stypeInSymbol = r.cstr(22);
        const stypeOutSymbol = r.cstr(22);
        r.skip(4);
        return { hd, stypeInSymbol, stypeOutSymbol, startTs: r.u64(), endTs: r.u64() };
    },
    (w, m) => {
        w.cstr(m.stypeInSymbol, 22);
        w.cstr(m.stypeOutSymbol, 22);
        w.skip(4);
        w.u64(m.startTs);
        w.u64(m.endTs);
    },
    [
        ...sym.header(),
        sym.col('stype_in_symbol', (m) => m.stypeInSymbol),
        sym.col('stype_out_symbol', (m) => m.stypeOutSymbol),
        sym.ts('start_ts', (m) => m.startTs),
        sym.ts('end_ts', (m) => m.endTs),
    ],
);

const sys = columnsFor<SystemMsg>();
export const SYSTEM = new RecordSchema<SystemMsg>(
    'system',
    [RType.SYSTEM],
    80,
    (r, hd) => ({ hd, msg: r.cstr(64) }),
    (w, m) => w.cstr(m.msg, 64),
    [...sys.header(), sys.col('msg', (m) => m.msg)],
);

export const CATALOG = {
    mbo: MBO,
    trade: TRADE,
    mbp1: MBP1,
    mbp10: MBP10,
    ohlcv: OHLCV,
    status: STATUS,
    instrumentDef: INSTRUMENT_DEF,
    imbalance: IMBALANCE,
    stat: STAT,
    error: ERROR,
    symbolMapping: SYMBOL_MAPPING,
    system: SYSTEM,
} as const;

export type RecordKind = keyof typeof CATALOG;

export type RecordOf<K extends RecordKind> = typeof CATALOG[K] extends RecordSchema<infer T> ? T : never;

/**
 * A closed tagged union over every catalog entry, for exhaustive `switch`
 * dispatch. `tsOut` is present when the stream carries out-timestamps.
 */
export type RecordEnum = {
    [K in RecordKind]: { kind: K; record: RecordOf<K>; tsOut?: bigint };
}[RecordKind];

export const RECORD_KINDS: readonly RecordKind[] = [
    'mbo', 'trade', 'mbp1', 'mbp10', 'ohlcv', 'status',
    'instrumentDef', 'imbalance', 'stat', 'error', 'symbolMapping', 'system',
];

const KIND_BY_RTYPE = new Map<number, RecordKind>();
const SIZE_BY_RTYPE = new Map<number, number>();
for (const kind of RECORD_KINDS) {
    const schema = CATALOG[kind];
    for (const rtype of schema.rtypes) {
        KIND_BY_RTYPE.set(rtype, kind);
        SIZE_BY_RTYPE.set(rtype, schema.size);
    }
}

/** Catalog lookup by discriminant. Throws UnknownRecordTypeError outside the catalog. */
export function kindForRType(rtype: number): RecordKind {
    const kind = KIND_BY_RTYPE.get(rtype);
    if (kind === undefined) throw new UnknownRecordTypeError(rtype);
    return kind;
}

/** Minimum byte size of the record `rtype` designates, or undefined when unknown. */
export function minSizeForRType(rtype: number): number | undefined {
    return SIZE_BY_RTYPE.get(rtype);
}

export function rtypeFromU8(raw: number): RType {
    if (!isRType(raw)) throw new UnknownRecordTypeError(raw);
    return raw;
}

/**
 * Calls `fn` with the schema matching `rec.kind` and the record itself, typed
 * together. Records carrying `tsOut` are paired with the ts_out variant.
 */
export function withSchema<R>(
    rec: RecordEnum,
    fn: <T extends HasHeader>(schema: RecordSchema<T>, record: T) => R,
): R {
    const tsOut = rec.tsOut;
    const apply = <T extends HasHeader>(schema: RecordSchema<T>, record: T): R =>
        tsOut === undefined ? fn(schema, record) : fn(schema.withTsOut(), { ...record, tsOut });

    switch (rec.kind) {
        case 'mbo': return apply(MBO, rec.record);
        case 'trade': return apply(TRADE, rec.record);
        case 'mbp1': return apply(MBP1, rec.record);
        case 'mbp10': return apply(MBP10, rec.record);
        case 'ohlcv': return apply(OHLCV, rec.record);
        case 'status': return apply(STATUS, rec.record);
        case 'instrumentDef': return apply(INSTRUMENT_DEF, rec.record);
        case 'imbalance': return apply(IMBALANCE, rec.record);
        case 'stat': return apply(STAT, rec.record);
        case 'error': return apply(ERROR, rec.record);
        case 'symbolMapping': return apply(SYMBOL_MAPPING, rec.record);
        case 'system': return apply(SYSTEM, rec.record);
    }
}

/** The record type a stream of `schema` carries. */
export function recordKindForSchema(schema: Schema): RecordKind {
    switch (schema) {
        case 'mbo': return 'mbo';
        case 'mbp-1': return 'mbp1';
        case 'tbbo': return 'mbp1';
        case 'mbp-10': return 'mbp10';
        case 'trades': return 'trade';
        case 'ohlcv-1s':
        case 'ohlcv-1m':
        case 'ohlcv-1h':
        case 'ohlcv-1d': return 'ohlcv';
        case 'definition': return 'instrumentDef';
        case 'statistics': return 'stat';
        case 'status': return 'status';
        case 'imbalance': return 'imbalance';
    }
}

/** Text column names of a record kind, with the trailing `ts_out` column when enabled. */
export function columnNames(kind: RecordKind, tsOut: boolean = false): string[] {
    const names = <T extends HasHeader>(schema: RecordSchema<T>): string[] =>
        (tsOut ? schema.withTsOut().columns : schema.columns).map((c) => c.name);
    switch (kind) {
        case 'mbo': return names(MBO);
        case 'trade': return names(TRADE);
        case 'mbp1': return names(MBP1);
        case 'mbp10': return names(MBP10);
        case 'ohlcv': return names(OHLCV);
        case 'status': return names(STATUS);
        case 'instrumentDef': return names(INSTRUMENT_DEF);
        case 'imbalance': return names(IMBALANCE);
        case 'stat': return names(STAT);
        case 'error': return names(ERROR);
        case 'symbolMapping': return names(SYMBOL_MAPPING);
        case 'system': return names(SYSTEM);
    }
}
