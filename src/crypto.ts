import { ed25519, x25519 } from "@noble/curves/ed25519";
import { sha3_256 } from "@noble/hashes/sha3";
import type { SeededRng } from "./rng";
import {
  asEncryptKey,
  asSignKey,
  asXorName,
  type PublicEncryptKey,
  type PublicSignKey,
  type XorName,
} from "./types/brands";
import { bytesToHex, fromHex } from "./utils/bytes";

export interface PublicKeys {
  readonly signKey: PublicSignKey;
  readonly encryptKey: PublicEncryptKey;
}

/** Network name of a client: SHA3-256 of its signing key. */
export const clientNameFromKey = (key: PublicSignKey): XorName =>
  asXorName(bytesToHex(sha3_256(fromHex(key))));

export const nameOf = (keys: PublicKeys): XorName => clientNameFromKey(keys.signKey);

/** Full identity of a client. Secrets come from the caller's stream. */
export class SecretKeys {
  readonly publicKeys: PublicKeys;

  private constructor(
    private readonly signSecret: Uint8Array,
    encryptSecret: Uint8Array,
  ) {
    this.publicKeys = {
      signKey: asSignKey(bytesToHex(ed25519.getPublicKey(signSecret))),
      encryptKey: asEncryptKey(bytesToHex(x25519.getPublicKey(encryptSecret))),
    };
  }

  static generate(rng: SeededRng): SecretKeys {
    return new SecretKeys(rng.bytes(32), rng.bytes(32));
  }

  get name(): XorName {
    return nameOf(this.publicKeys);
  }

  sign(msg: Uint8Array): Uint8Array {
    return ed25519.sign(msg, this.signSecret);
  }
}

export const verify = (sig: Uint8Array, msg: Uint8Array, key: PublicSignKey): boolean =>
  ed25519.verify(sig, msg, fromHex(key));

/** Content address of immutable data. */
export const contentName = (value: Uint8Array): XorName => asXorName(bytesToHex(sha3_256(value)));
