/**
 * Type declarations for zstd-codec, which ships none.
 * @see https://www.npmjs.com/package/zstd-codec
 */
declare module 'zstd-codec' {
    export interface ZstdSimple {
        compress(data: Uint8Array, level?: number): Uint8Array | null;
        decompress(data: Uint8Array): Uint8Array | null;
    }

    export interface ZstdStreaming {
        compress(data: Uint8Array, level?: number): Uint8Array | null;
        /** `sizeHint` presizes the output for frames that omit their content size. */
        decompress(data: Uint8Array, sizeHint?: number): Uint8Array | null;
    }

    export interface ZstdModule {
        Simple: new () => ZstdSimple;
        Streaming: new () => ZstdStreaming;
    }

    export const ZstdCodec: {
        run(callback: (zstd: ZstdModule) => void): void;
    };
}
