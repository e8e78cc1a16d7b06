export class DbnError extends Error {
    constructor(message: string, public originalError?: unknown) {
        super(message);
        this.name = 'DbnError';
    }
}

/**
 * The discriminant is outside the record catalog. Recoverable: the decoder
 * skips such records using the header's self-described length.
 */
export class UnknownRecordTypeError extends DbnError {
    constructor(public readonly rtype: number) {
        super(`Unknown record type 0x${rtype.toString(16).padStart(2, '0')}`);
        this.name = 'UnknownRecordTypeError';
    }
}

/** The metadata preamble could not be parsed. The decoder state is left unchanged. */
export class MalformedMetadataError extends DbnError {
    constructor(message: string, public readonly offset: number) {
        super(`Malformed metadata at byte ${offset}: ${message}`);
        this.name = 'MalformedMetadataError';
    }
}

/**
 * A record declares fewer bytes than its schema needs. Terminal for the
 * stream, since the position of the following record can't be trusted.
 */
export class TruncatedRecordError extends DbnError {
    constructor(
        public readonly offset: number,
        public readonly rtype: number,
        public readonly recordSize: number,
        public readonly expectedSize: number,
    ) {
        super(
            `Malformed record at byte ${offset}: rtype 0x${rtype.toString(16).padStart(2, '0')} ` +
            `expects at least ${expectedSize} bytes, header declares ${recordSize}`
        );
        this.name = 'TruncatedRecordError';
    }
}

/** A RecordRef was built over an undersized or misaligned slice. A caller bug. */
export class InvalidViewConstructionError extends DbnError {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidViewConstructionError';
    }
}

/** One-shot decoding reached the end of its input mid-block or mid-record. */
export class IncompleteDataError extends DbnError {
    constructor(message: string) {
        super(message);
        this.name = 'IncompleteDataError';
    }
}

export class LimitExceededError extends DbnError {
    constructor(message: string) {
        super(message);
        this.name = 'LimitExceededError';
    }
}

/** Identity of the record a sink failed on. */
export interface RecordIdentity {
    kind: string;
    rtype: number;
    publisherId: number;
    productId: number;
    tsEvent: bigint;
}

export class EncodeError extends DbnError {
    constructor(public readonly record: RecordIdentity, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(
            `Failed to encode ${record.kind} record (rtype 0x${record.rtype.toString(16).padStart(2, '0')}, ` +
            `publisher_id ${record.publisherId}, product_id ${record.productId}, ts_event ${record.tsEvent}): ${reason}`,
            cause
        );
        this.name = 'EncodeError';
    }
}
