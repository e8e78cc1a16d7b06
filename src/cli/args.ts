import path from 'node:path';
import { DbnError } from '../dbn/errors.js';

export const OUTPUT_ENCODINGS = ['csv', 'json'] as const;
export type OutputEncoding = typeof OUTPUT_ENCODINGS[number];
export type EncodingArg = OutputEncoding | 'infer';

/** Bad arguments or a filesystem clash. */
export class CliError extends DbnError {
    constructor(message: string, public readonly context?: Record<string, string>) {
        super(message);
        this.name = 'CliError';
    }
}

export function parseEncodingArg(value: string): EncodingArg {
    if (value === 'infer') return value;
    const match = OUTPUT_ENCODINGS.find((e) => e === value);
    if (match === undefined) {
        throw new CliError(`Unknown encoding '${value}', expected one of infer, ${OUTPUT_ENCODINGS.join(', ')}`);
    }
    return match;
}

/**
 * Resolves the output encoding. `infer` looks at the output file's extension,
 * so it needs an explicit `--output`.
 */
export function inferEncoding(encoding: EncodingArg, output: string | undefined): OutputEncoding {
    if (encoding !== 'infer') return encoding;
    const ext = output === undefined ? '' : path.extname(output).slice(1);
    if (ext === 'csv' || ext === 'json') return ext;
    if (ext !== '') {
        throw new CliError(`Unable to infer output encoding from output file with extension '${ext}'`);
    }
    throw new CliError('Unable to infer output encoding from output file without an extension');
}

/** The input path with its `.zst` suffix dropped and its extension replaced by the encoding's. */
export function defaultOutputPath(input: string, encoding: OutputEncoding): string {
    const base = input.endsWith('.zst') ? input.slice(0, -'.zst'.length) : input;
    const { dir, name } = path.parse(base);
    if (name === '') {
        throw new CliError('Unable to set extension for output because the input file name was empty', { input });
    }
    return path.join(dir, `${name}.${encoding}`);
}
