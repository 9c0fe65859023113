import { bytesToHex as hexBody, hexToBytes } from "@noble/hashes/utils";
import type { Hex } from "../types/brands";

export const bytesToHex = (bytes: Uint8Array): Hex => `0x${hexBody(bytes)}`;

export const fromHex = (hex: Hex): Uint8Array => hexToBytes(hex.slice(2));

export const utf8 = (s: string): Uint8Array => new Uint8Array(Buffer.from(s, "utf8"));

/* true when `a` is strictly closer to `target` than `b` in XOR distance */
export const closerTo = (target: Uint8Array, a: Uint8Array, b: Uint8Array): boolean => {
  for (let i = 0; i < target.length; i++) {
    const da = a[i] ^ target[i];
    const db = b[i] ^ target[i];
    if (da !== db) return da < db;
  }
  return false;
};
