import { stringify } from 'csv-stringify/sync';
import { columnNames, withSchema, type RecordEnum, type RecordKind } from './catalog.js';
import { DbnError, type RecordIdentity } from './errors.js';
import { SinkBase, recordIdentity, renderField, resolveTextOptions, type OutputWriter, type SinkSignal } from './sink.js';
import type { TextEncoderOptions } from './types.js';

function csvLine(fields: readonly (string | number)[]): string {
    return stringify([fields], { record_delimiter: 'unix' });
}

/**
 * Writes records as CSV, one row per record, preceded by one header row.
 *
 * A CSV stream holds a single record type: the header comes from the first
 * record (or from `encodeHeader()`) and a record of any other type fails.
 */
export class CsvEncoder extends SinkBase<RecordEnum> {
    private readonly options: Required<TextEncoderOptions>;
    private header: string | null = null;

    constructor(out: OutputWriter, options: TextEncoderOptions = {}) {
        super(out);
        this.options = resolveTextOptions(options);
    }

    /**
     * Fixes the column layout up front, writing the header row when enabled.
     * Lets an empty stream still produce its header.
     */
    encodeHeader(kind: RecordKind, tsOut: boolean = false): SinkSignal {
        return this.guard(
            () => ({ kind, rtype: 0, publisherId: 0, productId: 0, tsEvent: 0n }),
            () => this.writeHeaderRow(columnNames(kind, tsOut)),
        );
    }

    protected identify(record: RecordEnum): RecordIdentity {
        return recordIdentity(record);
    }

    protected encode(rec: RecordEnum): void {
        withSchema(rec, (schema, record) => {
            const names = schema.columns.map((c) => c.name);
            if (this.header === null) {
                this.writeHeaderRow(names);
            } else if (names.join(',') !== this.header) {
                throw new DbnError(`Cannot write a ${rec.kind} record into a CSV stream with columns ${this.header}`);
            }
            const row = schema.columns.map((c) => renderField(c.value(record), c.role, this.options) ?? '');
            this.out.write(csvLine(row));
        });
    }

    private writeHeaderRow(names: readonly string[]): void {
        if (this.header !== null) {
            throw new DbnError('CSV header already written');
        }
        this.header = names.join(',');
        if (this.options.writeHeader) {
            this.out.write(csvLine(names));
        }
    }
}
