import { FIXED_PRICE_SCALE, UNDEF_PRICE, UNDEF_TIMESTAMP } from './format.js';

/** Formats a 1e-9 fixed-point price as a decimal with nine fractional digits. */
export function fmtPx(px: bigint): string {
    const negative = px < 0n;
    const abs = negative ? -px : px;
    const int = abs / FIXED_PRICE_SCALE;
    const frac = (abs % FIXED_PRICE_SCALE).toString().padStart(9, '0');
    return `${negative ? '-' : ''}${int}.${frac}`;
}

/** Formats nanoseconds since the UNIX epoch as ISO 8601 UTC, e.g. `2022-06-10T14:30:00.000000001Z`. */
export function fmtTs(ts: bigint): string {
    const millis = ts / 1_000_000n;
    const nanos = (ts % 1_000_000_000n).toString().padStart(9, '0');
    const iso = new Date(Number(millis)).toISOString();
    // toISOString always ends in `.sssZ`
    return `${iso.slice(0, -4)}${nanos}Z`;
}

/** A price, or null when it is the undefined sentinel. */
export function prettyPx(px: bigint): string | null {
    return px === UNDEF_PRICE ? null : fmtPx(px);
}

/** A timestamp, or null when it is 0 or the undefined sentinel. */
export function prettyTs(ts: bigint): string | null {
    return ts === 0n || ts === UNDEF_TIMESTAMP ? null : fmtTs(ts);
}
