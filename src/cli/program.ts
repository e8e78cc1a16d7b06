import { Command, CommanderError, Option } from 'commander';
import type { DbnLogger } from '../dbn/types.js';
import { CliError, parseEncodingArg, type EncodingArg } from './args.js';
import { convert } from './convert.js';

type CliFlags = {
    output?: string;
    stdout?: boolean;
    encoding: EncodingArg;
    force?: boolean;
    prettyPx?: boolean;
    prettyTs?: boolean;
    verbose?: boolean;
};

/** `[dbn]`-prefixed stderr logger, or null when quiet. */
export function cliLogger(verbose: boolean): DbnLogger | null {
    if (!verbose) return null;
    const log = (msg: string) => console.error(`[dbn] ${msg}`);
    return { debug: log, info: log, warn: log, error: log };
}

/** The single-line JSON error report written to stderr. */
export function formatError(err: unknown): string {
    const message = err instanceof Error ? err.message : String(err);
    const output: Record<string, unknown> = { error: message };
    if (err instanceof CliError && err.context) output.context = err.context;
    return JSON.stringify(output);
}

export function buildProgram(env: NodeJS.ProcessEnv = process.env): Command {
    const program = new Command();

    program
        .name('dbn')
        .description('Convert a DBN file to CSV or newline-delimited JSON')
        .version('0.1.0')
        .argument('<file>', 'DBN file to convert, optionally zstd-compressed')
        .option('-o, --output <file>', 'Path to save the result to. Derived from the input file name when omitted')
        .addOption(new Option('-c, --stdout', 'Write the result to stdout').conflicts('output'))
        .option(
            '-e, --encoding <encoding>',
            'Output encoding: csv, json, or infer from the output file extension',
            parseEncodingArg,
            'infer',
        )
        .option('-f, --force', 'Allow overwriting an existing output file')
        .option('--pretty-px', 'Format prices as decimals')
        .option('--pretty-ts', 'Format timestamps as ISO 8601')
        .option('-v, --verbose', 'Log progress to stderr')
        .action(async (file: string, flags: CliFlags) => {
            const verbose = flags.verbose === true || env.DBN_CLI_VERBOSE === '1';
            await convert({
                input: file,
                output: flags.output,
                stdout: flags.stdout,
                encoding: flags.encoding,
                force: flags.force,
                prettyPx: flags.prettyPx,
                prettyTs: flags.prettyTs,
                logger: cliLogger(verbose),
            });
        });

    return program;
}

/**
 * Parses `argv` and runs the conversion. Usage errors are reported like any
 * other failure, as one JSON line on stderr.
 */
export async function run(argv: readonly string[] = process.argv, env: NodeJS.ProcessEnv = process.env): Promise<number> {
    const program = buildProgram(env)
        .exitOverride()
        .configureOutput({ writeErr: () => undefined });
    try {
        await program.parseAsync([...argv]);
        return 0;
    } catch (err) {
        // --help and --version exit through the override too
        if (err instanceof CommanderError && err.exitCode === 0) return 0;
        console.error(formatError(err));
        return 1;
    }
}
