import type { RecordEnum } from './catalog.js';
import { EncodeError, type RecordIdentity } from './errors.js';
import { prettyPx, prettyTs } from './pretty.js';
import type { FieldRole, FieldValue } from './record.js';
import type { TextEncoderOptions } from './types.js';

/** `'stop'` means the consumer went away; callers stop producing without error. */
export type SinkSignal = 'continue' | 'stop';

export interface EncodeSink<R> {
    encodeRecord(record: R): SinkSignal;
    encodeRecords(records: readonly R[]): void;
    encodeStream(records: Iterable<R> | AsyncIterable<R>): Promise<void>;
}

/** Synchronous byte or text destination a sink writes into. */
export interface OutputWriter {
    write(chunk: string | Uint8Array): void;
    flush?(): void;
}

/** Collects everything written to it. */
export class MemoryWriter implements OutputWriter {
    private readonly chunks: Uint8Array[] = [];
    private readonly encoder = new TextEncoder();

    write(chunk: string | Uint8Array): void {
        this.chunks.push(typeof chunk === 'string' ? this.encoder.encode(chunk) : chunk.slice());
    }

    toBytes(): Uint8Array {
        const total = this.chunks.reduce((sum, c) => sum + c.length, 0);
        const out = new Uint8Array(total);
        let offset = 0;
        for (const c of this.chunks) {
            out.set(c, offset);
            offset += c.length;
        }
        return out;
    }

    toString(): string {
        return new TextDecoder().decode(this.toBytes());
    }
}

/** True for the error a write raises once the reading end of a pipe has closed. */
export function isClosedPipe(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'EPIPE';
}

export function recordIdentity(rec: RecordEnum): RecordIdentity {
    const hd = rec.record.hd;
    return {
        kind: rec.kind,
        rtype: hd.rtype,
        publisherId: hd.publisherId,
        productId: hd.productId,
        tsEvent: hd.tsEvent,
    };
}

/**
 * Renders one field for a text sink. Returns null where a pretty-printed
 * sentinel has no value; plain 64-bit integers come back as decimal strings.
 */
export function renderField(value: FieldValue, role: FieldRole, options: Required<TextEncoderOptions>): string | number | null {
    if (typeof value === 'bigint') {
        if (role === 'px' && options.prettyPx) return prettyPx(value);
        if (role === 'ts' && options.prettyTs) return prettyTs(value);
        return value.toString();
    }
    return value;
}

export function resolveTextOptions(options: TextEncoderOptions): Required<TextEncoderOptions> {
    const defaults: Required<TextEncoderOptions> = {
        prettyPx: false,
        prettyTs: false,
        writeHeader: true,
    };
    return { ...defaults, ...options };
}

/**
 * Shared stop/error policy of the concrete sinks. Subclasses only write; a
 * closed pipe latches `'stop'` and any other failure becomes an EncodeError
 * naming the record.
 */
export abstract class SinkBase<R> implements EncodeSink<R> {
    private stopped = false;

    constructor(protected readonly out: OutputWriter) { }

    protected abstract encode(record: R): void;

    protected abstract identify(record: R): RecordIdentity;

    /** True once the destination has closed. */
    get closed(): boolean {
        return this.stopped;
    }

    encodeRecord(record: R): SinkSignal {
        return this.guard(() => this.identify(record), () => this.encode(record));
    }

    encodeRecords(records: readonly R[]): void {
        for (const record of records) {
            if (this.encodeRecord(record) === 'stop') return;
        }
        this.flush();
    }

    async encodeStream(records: Iterable<R> | AsyncIterable<R>): Promise<void> {
        for await (const record of records) {
            if (this.encodeRecord(record) === 'stop') return;
        }
        this.flush();
    }

    flush(): void {
        if (this.stopped) return;
        try {
            this.out.flush?.();
        } catch (err) {
            if (!isClosedPipe(err)) throw err;
            this.stopped = true;
        }
    }

    protected guard(identify: () => RecordIdentity, write: () => void): SinkSignal {
        if (this.stopped) return 'stop';
        try {
            write();
            return 'continue';
        } catch (err) {
            if (isClosedPipe(err)) {
                this.stopped = true;
                return 'stop';
            }
            if (err instanceof EncodeError) throw err;
            throw new EncodeError(identify(), err);
        }
    }
}
