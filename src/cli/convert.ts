import fs from 'node:fs';
import { readFile } from 'node:fs/promises';
import { recordKindForSchema } from '../dbn/catalog.js';
import { maybeDecompress } from '../dbn/compression.js';
import { CsvEncoder } from '../dbn/csv.js';
import { DbnDecoder } from '../dbn/decode.js';
import { IncompleteDataError } from '../dbn/errors.js';
import { JsonEncoder } from '../dbn/json.js';
import type { OutputWriter } from '../dbn/sink.js';
import type { DbnLogger } from '../dbn/types.js';
import { CliError, defaultOutputPath, inferEncoding, type EncodingArg } from './args.js';
import { FdWriter, openOutputFile } from './output.js';

export interface ConvertOptions {
    input: string;
    output?: string;
    stdout?: boolean;
    encoding?: EncodingArg;
    force?: boolean;
    prettyPx?: boolean;
    prettyTs?: boolean;
    logger?: DbnLogger | null;
    /** Bytes handed to the decoder per step. */
    chunkSize?: number;
}

export interface ConvertResult {
    /** Output path, or null for stdout. */
    output: string | null;
    records: number;
    skipped: number;
    /** True when the reader closed stdout before everything was written. */
    stopped: boolean;
}

const STDOUT_FD = 1;

/**
 * Converts a DBN file (optionally zstd-compressed) to CSV or JSON.
 *
 * @throws CliError for argument problems, or the decoder's and sinks' errors
 */
export async function convert(options: ConvertOptions): Promise<ConvertResult> {
    if (options.stdout && options.output !== undefined) {
        throw new CliError('Cannot use both --stdout and --output');
    }
    const logger = options.logger ?? null;
    const encoding = inferEncoding(options.encoding ?? 'infer', options.output);

    let raw: Uint8Array;
    try {
        raw = await readFile(options.input);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new CliError(`Unable to read input file '${options.input}': ${reason}`, { input: options.input });
    }
    const data = await maybeDecompress(raw);
    if (data !== raw) logger?.debug?.(`Decompressed ${raw.length} bytes of zstd into ${data.length}`);

    const outputPath = options.stdout ? null : options.output ?? defaultOutputPath(options.input, encoding);
    const fd = outputPath === null ? STDOUT_FD : openOutputFile(outputPath, options.force ?? false);
    logger?.info?.(`Converting ${options.input} to ${outputPath ?? 'stdout'} as ${encoding}`);

    try {
        const result = decodeInto(data, new FdWriter(fd), encoding, options, logger);
        return { output: outputPath, ...result };
    } finally {
        if (fd !== STDOUT_FD) fs.closeSync(fd);
    }
}

function decodeInto(
    data: Uint8Array,
    out: OutputWriter,
    encoding: 'csv' | 'json',
    options: ConvertOptions,
    logger: DbnLogger | null,
): Omit<ConvertResult, 'output'> {
    const textOptions = { prettyPx: options.prettyPx ?? false, prettyTs: options.prettyTs ?? false };
    const csv = encoding === 'csv' ? new CsvEncoder(out, textOptions) : null;
    const sink = csv ?? new JsonEncoder(out, textOptions);
    const decoder = new DbnDecoder({ logger });
    const chunkSize = options.chunkSize ?? 1024 * 1024;

    let records = 0;
    for (let offset = 0; offset < data.length; offset += chunkSize) {
        decoder.write(data.subarray(offset, offset + chunkSize));
        const items = decoder.decode();
        for (const item of items) {
            if (item.kind === 'metadata') {
                if (csv) csv.encodeHeader(recordKindForSchema(item.metadata.schema), item.metadata.tsOut);
                continue;
            }
            if (sink.encodeRecord(item) === 'stop') {
                logger?.info?.(`Output closed after ${records} records`);
                return { records, skipped: decoder.skippedRecords, stopped: true };
            }
            records++;
        }
    }

    if (decoder.error) throw decoder.error;
    if (decoder.metadata === null) {
        throw new IncompleteDataError('Input ended before the metadata block was complete');
    }
    const trailing = decoder.buffer().length;
    if (trailing > 0) {
        throw new IncompleteDataError(`Input ended mid-record: ${trailing} trailing bytes`);
    }
    sink.flush();
    logger?.info?.(`Wrote ${records} records, skipped ${decoder.skippedRecords}`);
    return { records, skipped: decoder.skippedRecords, stopped: sink.closed };
}
