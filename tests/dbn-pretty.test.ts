import { UNDEF_PRICE, UNDEF_TIMESTAMP } from '../src/dbn/format.js';
import { fmtPx, fmtTs, prettyPx, prettyTs } from '../src/dbn/pretty.js';

describe('pretty formatting', () => {
    it('formats fixed-point prices with nine decimals', () => {
        expect(fmtPx(3_720_250_000_000n)).toBe('3720.250000000');
        expect(fmtPx(5000n)).toBe('0.000005000');
        expect(fmtPx(0n)).toBe('0.000000000');
        expect(fmtPx(-1n)).toBe('-0.000000001');
        expect(fmtPx(-1_500_000_000n)).toBe('-1.500000000');
    });

    it('formats nanosecond timestamps as ISO 8601', () => {
        expect(fmtTs(1_658_441_851_000_000_100n)).toBe('2022-07-21T22:17:31.000000100Z');
        expect(fmtTs(1n)).toBe('1970-01-01T00:00:00.000000001Z');
        expect(fmtTs(1_658_441_851_123_456_789n)).toBe('2022-07-21T22:17:31.123456789Z');
    });

    it('maps sentinels to null', () => {
        expect(prettyPx(UNDEF_PRICE)).toBeNull();
        expect(prettyPx(1_000_000_000n)).toBe('1.000000000');
        expect(prettyTs(0n)).toBeNull();
        expect(prettyTs(UNDEF_TIMESTAMP)).toBeNull();
    });
});
