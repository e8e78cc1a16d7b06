import { withSchema, type RecordEnum } from './catalog.js';
import type { RecordIdentity } from './errors.js';
import { SinkBase, recordIdentity, renderField, resolveTextOptions, type OutputWriter } from './sink.js';
import type { TextEncoderOptions } from './types.js';

/**
 * Writes newline-delimited JSON: one flat object per record, keyed by column
 * name. 64-bit integers are strings so no precision is lost; pretty-printed
 * sentinels are null.
 */
export class JsonEncoder extends SinkBase<RecordEnum> {
    private readonly options: Required<TextEncoderOptions>;

    constructor(out: OutputWriter, options: TextEncoderOptions = {}) {
        super(out);
        this.options = resolveTextOptions(options);
    }

    protected identify(record: RecordEnum): RecordIdentity {
        return recordIdentity(record);
    }

    protected encode(rec: RecordEnum): void {
        const line = withSchema(rec, (schema, record) => {
            const obj: Record<string, string | number | null> = {};
            for (const c of schema.columns) {
                obj[c.name] = renderField(c.value(record), c.role, this.options);
            }
            return JSON.stringify(obj);
        });
        this.out.write(`${line}\n`);
    }
}
