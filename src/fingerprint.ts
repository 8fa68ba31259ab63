import { createHash } from 'crypto';
import { createReadStream } from 'fs';

export type HashAlgorithm = 'sha256' | 'sha512' | 'blake2b512';

export const HASH_ALGORITHMS: readonly HashAlgorithm[] = ['sha256', 'sha512', 'blake2b512'];

export const DEFAULT_CHUNK_SIZE = 64 * 1024;

// Larger read buffers fail on allocation.
export const MAX_CHUNK_SIZE = 64 * 1024 * 1024;

export interface Fingerprint {
  /** Hex digest of the full content. */
  digest: string;
  size: number;
}

export const UNREADABLE = 'unreadable';

export type FingerprintResult = Fingerprint | typeof UNREADABLE;

export interface FingerprintOptions {
  algorithm?: HashAlgorithm;
  chunkSize?: number;
}

export function isHashAlgorithm(value: unknown): value is HashAlgorithm {
  return HASH_ALGORITHMS.some((algorithm) => algorithm === value);
}

/**
 * Stream a file through the hash in chunks of at most `chunkSize` bytes.
 * Never rejects: a file that cannot be opened or read resolves to UNREADABLE.
 */
export function fingerprintFile(path: string, options: FingerprintOptions = {}): Promise<FingerprintResult> {
  const digest = createHash(options.algorithm ?? 'sha256');
  let size = 0;

  return new Promise<FingerprintResult>((resolve) => {
    const stream = createReadStream(path, { highWaterMark: options.chunkSize ?? DEFAULT_CHUNK_SIZE });

    stream.on('error', () => resolve(UNREADABLE));
    stream.on('data', (chunk) => {
      size += chunk.length;
      digest.update(chunk);
    });
    stream.on('end', () => resolve({ digest: digest.digest('hex'), size }));
  });
}
