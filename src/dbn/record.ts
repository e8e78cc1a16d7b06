import { ByteReader, ByteWriter } from './byte-cursor.js';
import { RECORD_HEADER_SIZE, RECORD_LENGTH_MULT, RType } from './format.js';

/** Common prefix of every record. */
export interface RecordHeader {
    /** Record size in 4-byte words. */
    length: number;
    rtype: number;
    publisherId: number;
    productId: number;
    /** Nanoseconds since the UNIX epoch. */
    tsEvent: bigint;
}

export interface HasHeader {
    hd: RecordHeader;
}

export type WithTsOut<T extends HasHeader> = T & {
    /** Nanoseconds since the UNIX epoch at which the record left the gateway. */
    tsOut: bigint;
};

export function recordSize(hd: RecordHeader): number {
    return hd.length * RECORD_LENGTH_MULT;
}

export function readHeader(r: ByteReader): RecordHeader {
    return {
        length: r.u8(),
        rtype: r.u8(),
        publisherId: r.u16(),
        productId: r.u32(),
        tsEvent: r.u64(),
    };
}

export function writeHeader(w: ByteWriter, hd: RecordHeader): void {
    w.u8(hd.length);
    w.u8(hd.rtype);
    w.u16(hd.publisherId);
    w.u32(hd.productId);
    w.u64(hd.tsEvent);
}

export type FieldValue = number | bigint | string;

/** How a text sink may present a field. */
export type FieldRole = 'plain' | 'px' | 'ts';

export interface Column<T> {
    readonly name: string;
    readonly role: FieldRole;
    value(rec: T): FieldValue;
}

export function col<T>(name: string, value: (rec: T) => FieldValue): Column<T> {
    return { name, role: 'plain', value };
}

export function px<T>(name: string, value: (rec: T) => bigint): Column<T> {
    return { name, role: 'px', value };
}

export function ts<T>(name: string, value: (rec: T) => bigint): Column<T> {
    return { name, role: 'ts', value };
}

/**
 * Column builders bound to one record type, so a schema's column list reads
 * as a flat sequence of `col`, `px` and `ts` entries.
 */
export function columnsFor<T extends HasHeader>() {
    return {
        col: (name: string, value: (rec: T) => FieldValue) => col<T>(name, value),
        px: (name: string, value: (rec: T) => bigint) => px<T>(name, value),
        ts: (name: string, value: (rec: T) => bigint) => ts<T>(name, value),
        header: () => headerColumns<T>(),
    };
}

export function headerColumns<T extends HasHeader>(): Column<T>[] {
    return [
        col<T>('rtype', (m) => m.hd.rtype),
        col<T>('publisher_id', (m) => m.hd.publisherId),
        col<T>('product_id', (m) => m.hd.productId),
        ts<T>('ts_event', (m) => m.hd.tsEvent),
    ];
}

/**
 * A fixed-layout record type: its byte size, the discriminants it accepts,
 * how its body is laid out, and its text columns in field order.
 */
export class RecordSchema<T extends HasHeader> {
    private readonly rtypeSet: ReadonlySet<number>;
    private tsOutVariant: RecordSchema<WithTsOut<T>> | null = null;

    constructor(
        public readonly name: string,
        public readonly rtypes: readonly RType[],
        public readonly size: number,
        private readonly readBody: (r: ByteReader, hd: RecordHeader) => T,
        private readonly writeBody: (w: ByteWriter, rec: T) => void,
        public readonly columns: readonly Column<T>[],
    ) {
        if (size % RECORD_LENGTH_MULT !== 0) {
            throw new RangeError(`${name}: size ${size} is not a multiple of ${RECORD_LENGTH_MULT}`);
        }
        this.rtypeSet = new Set(rtypes);
    }

    hasRType(rtype: number): boolean {
        return this.rtypeSet.has(rtype);
    }

    /** Length in words to put in the header of a record of this schema. */
    get length(): number {
        return this.size / RECORD_LENGTH_MULT;
    }

    read(view: DataView, offset: number): T {
        const r = new ByteReader(view, offset);
        const hd = readHeader(r);
        return this.readBody(r, hd);
    }

    write(view: DataView, offset: number, rec: T): void {
        const w = new ByteWriter(view, offset);
        writeHeader(w, rec.hd);
        this.writeBody(w, rec);
    }

    /** The variant of this schema followed by a trailing u64 `ts_out`. */
    withTsOut(): RecordSchema<WithTsOut<T>> {
        if (this.tsOutVariant) return this.tsOutVariant;
        const bodyEnd = this.size - RECORD_HEADER_SIZE;
        this.tsOutVariant = new RecordSchema<WithTsOut<T>>(
            this.name,
            this.rtypes,
            this.size + 8,
            (r, hd) => {
                const start = r.pos;
                const rec = this.readBody(r, hd);
                r.pos = start + bodyEnd;
                return { ...rec, tsOut: r.u64() };
            },
            (w, rec) => {
                const start = w.pos;
                this.writeBody(w, rec);
                w.pos = start + bodyEnd;
                w.u64(rec.tsOut);
            },
            [...this.columns, ts('ts_out', (m: WithTsOut<T>) => m.tsOut)],
        );
        return this.tsOutVariant;
    }
}

/** A header whose `length` covers exactly `schema`. */
export function makeHeader<T extends HasHeader>(
    schema: RecordSchema<T>,
    rtype: number,
    publisherId: number,
    productId: number,
    tsEvent: bigint,
): RecordHeader {
    return { length: schema.length, rtype, publisherId, productId, tsEvent };
}
