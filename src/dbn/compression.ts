import { ZstdCodec, type ZstdModule } from 'zstd-codec';
import { DbnError } from './errors.js';

/** Frame magic number of a zstd frame, little endian 0xFD2FB528. */
export const ZSTD_MAGIC = new Uint8Array([0x28, 0xb5, 0x2f, 0xfd]);

export function isZstdFrame(data: Uint8Array): boolean {
    if (data.length < ZSTD_MAGIC.length) return false;
    return ZSTD_MAGIC.every((b, i) => data[i] === b);
}

let zstdInstance: ZstdModule | null = null;

async function getZstd(): Promise<ZstdModule> {
    if (zstdInstance) return zstdInstance;
    return new Promise((resolve) => {
        ZstdCodec.run((zstd) => {
            zstdInstance = zstd;
            resolve(zstd);
        });
    });
}

export async function zstdCompress(data: Uint8Array, level: number = 3): Promise<Uint8Array> {
    const zstd = await getZstd();
    const compressed = new zstd.Simple().compress(data, level);
    if (!compressed) throw new DbnError('Zstd compression failed');
    return compressed;
}

/**
 * Decompresses one or more zstd frames. Frames written by streaming encoders
 * may omit their content size, so this goes through the streaming API.
 *
 * @throws DbnError when the data is not valid zstd or inflates past `maxSize`
 */
export async function zstdDecompress(data: Uint8Array, maxSize?: number): Promise<Uint8Array> {
    const zstd = await getZstd();
    const decompressed = new zstd.Streaming().decompress(data);
    if (!decompressed) throw new DbnError('Zstd decompression failed');
    if (maxSize !== undefined && decompressed.length > maxSize) {
        throw new DbnError(`Decompressed size limit exceeded (${decompressed.length} > ${maxSize})`);
    }
    return decompressed;
}

/** Returns `data` decompressed when it starts with a zstd frame, unchanged otherwise. */
export async function maybeDecompress(data: Uint8Array, maxSize?: number): Promise<Uint8Array> {
    return isZstdFrame(data) ? zstdDecompress(data, maxSize) : data;
}
