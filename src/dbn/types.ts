export type DbnLogger = {
    debug?: (msg: string) => void;
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

export type DecoderOptions = {
    /** Optional logger hook; the decoder never writes to the console itself. */
    logger?: DbnLogger | null;
    /**
     * Upper bound on buffered, not yet decoded bytes. `write()` throws
     * LimitExceededError beyond it. Default 256 MiB.
     */
    maxBufferBytes?: number;
    /** Initial capacity of the decode buffer. Default 64 KiB. */
    initialCapacity?: number;
};

export type TextEncoderOptions = {
    /** Render fixed-point prices as decimals; the undefined-price sentinel becomes empty. */
    prettyPx?: boolean;
    /** Render nanosecond timestamps as ISO 8601; 0 and the undefined sentinel become empty. */
    prettyTs?: boolean;
    /** CSV only: write the column header row before the first record. Default true. */
    writeHeader?: boolean;
};

export type DbnEncoderOptions = {
    /** Optional logger hook. */
    logger?: DbnLogger | null;
};
