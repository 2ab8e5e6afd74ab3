/**
 * Cryptographic feature hashing for string tokens.
 *
 * id = max(SHA3-224(utf8(token)) mod numEmbeddings, paddingIdx + 5)
 *
 * The digest is read as one big-endian unsigned integer, so the result depends
 * on every byte and is the same on every platform and in every process.
 */
import { createHash } from "node:crypto";
import { firstHashedId, type Quantizer } from "@hashtok/core";

export const STRING_HASH_ALGORITHM = "sha3-224";

/** Digest of a token as an unsigned integer. */
export function digestToken(token: string): bigint {
  const hex = createHash(STRING_HASH_ALGORITHM).update(token, "utf8").digest("hex");
  return BigInt(`0x${hex}`);
}

export class CryptoHashQuantizer implements Quantizer<string> {
  readonly numEmbeddings: number;
  readonly firstId: number;
  private readonly _modulus: bigint;

  constructor(numEmbeddings: number, paddingIdx: number) {
    this.numEmbeddings = numEmbeddings;
    this.firstId = firstHashedId(paddingIdx);
    this._modulus = BigInt(numEmbeddings);
  }

  quantize(token: string): number {
    const bucket = Number(digestToken(token) % this._modulus);
    return Math.max(bucket, this.firstId);
  }

  /** Quantize a flat list of tokens. */
  quantizeAll(tokens: readonly string[]): Int32Array {
    const out = new Int32Array(tokens.length);
    for (let i = 0; i < tokens.length; i++) out[i] = this.quantize(tokens[i]);
    return out;
  }
}
