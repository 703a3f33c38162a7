import { createHash, getHashes } from 'node:crypto';
import { ConfigError, DIGEST_ALGORITHMS, type DigestAlgorithm } from '@filewarden/shared';

/**
 * Incremental digest over a byte stream.
 */
export interface Digest {
  update(chunk: Uint8Array): void;
  /** Returns the lowercase hex digest. The digest cannot be updated afterwards. */
  finalize(): string;
}

export type DigestFactory = () => Digest;

export function isDigestAlgorithm(value: string): value is DigestAlgorithm {
  return (DIGEST_ALGORITHMS as readonly string[]).includes(value);
}

/**
 * Selects the digest implementation once per run. Fails with a ConfigError when the
 * algorithm is unknown or unavailable in this Node.js build (e.g. md5 under FIPS).
 */
export function createDigestFactory(algorithm: string): DigestFactory {
  if (!isDigestAlgorithm(algorithm)) {
    throw new ConfigError(`Unsupported hash algorithm: ${algorithm}`, {
      details: { supported: [...DIGEST_ALGORITHMS] },
    });
  }
  if (!getHashes().includes(algorithm)) {
    throw new ConfigError(`Hash algorithm ${algorithm} is not available in this Node.js build`);
  }

  return () => {
    const hash = createHash(algorithm);
    return {
      update: (chunk) => {
        hash.update(chunk);
      },
      finalize: () => hash.digest('hex'),
    };
  };
}
