/**
 * Sequential little-endian readers and writers over a DataView.
 *
 * Record layouts are declared as a series of reads/writes in field order,
 * so offsets follow from the order of the calls.
 */

export class ByteReader {
    constructor(private readonly view: DataView, public pos: number = 0) { }

    u8(): number { return this.view.getUint8(this.pos++); }
    i8(): number { return this.view.getInt8(this.pos++); }
    u16(): number { const v = this.view.getUint16(this.pos, true); this.pos += 2; return v; }
    i16(): number { const v = this.view.getInt16(this.pos, true); this.pos += 2; return v; }
    u32(): number { const v = this.view.getUint32(this.pos, true); this.pos += 4; return v; }
    i32(): number { const v = this.view.getInt32(this.pos, true); this.pos += 4; return v; }
    u64(): bigint { const v = this.view.getBigUint64(this.pos, true); this.pos += 8; return v; }
    i64(): bigint { const v = this.view.getBigInt64(this.pos, true); this.pos += 8; return v; }

    /** A single `c_char`. NUL reads as the empty string. */
    char(): string {
        const c = this.view.getUint8(this.pos++);
        return c === 0 ? '' : String.fromCharCode(c);
    }

    /** A NUL-padded fixed-width ASCII string. */
    cstr(len: number): string {
        let out = '';
        for (let i = 0; i < len; i++) {
            const c = this.view.getUint8(this.pos + i);
            if (c === 0) break;
            out += String.fromCharCode(c);
        }
        this.pos += len;
        return out;
    }

    skip(len: number): void {
        this.pos += len;
    }
}

export class ByteWriter {
    constructor(private readonly view: DataView, public pos: number = 0) { }

    u8(v: number): void { this.view.setUint8(this.pos++, v); }
    i8(v: number): void { this.view.setInt8(this.pos++, v); }
    u16(v: number): void { this.view.setUint16(this.pos, v, true); this.pos += 2; }
    i16(v: number): void { this.view.setInt16(this.pos, v, true); this.pos += 2; }
    u32(v: number): void { this.view.setUint32(this.pos, v, true); this.pos += 4; }
    i32(v: number): void { this.view.setInt32(this.pos, v, true); this.pos += 4; }
    u64(v: bigint): void { this.view.setBigUint64(this.pos, v, true); this.pos += 8; }
    i64(v: bigint): void { this.view.setBigInt64(this.pos, v, true); this.pos += 8; }

    char(v: string): void {
        if (v.length > 1) throw new RangeError(`Expected a single character, got '${v}'`);
        this.view.setUint8(this.pos++, v.length === 0 ? 0 : v.charCodeAt(0) & 0xff);
    }

    cstr(v: string, len: number): void {
        if (v.length > len) throw new RangeError(`String '${v}' exceeds ${len} bytes`);
        for (let i = 0; i < len; i++) {
            this.view.setUint8(this.pos + i, i < v.length ? v.charCodeAt(i) & 0xff : 0);
        }
        this.pos += len;
    }

    /** Zero fill. */
    skip(len: number): void {
        for (let i = 0; i < len; i++) this.view.setUint8(this.pos + i, 0);
        this.pos += len;
    }
}
