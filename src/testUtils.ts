import { ClientAuthority, ClientManagerAuthority } from "./authority";
import type { HarnessConfig } from "./config";
import { clientNameFromKey, SecretKeys } from "./crypto";
import { ImmutableData, MutableData } from "./core/data";
import { HarnessError } from "./core/errors";
import { unwrap } from "./core/result";
import type { EntryAction, EntryActions, EntryKey, Value } from "./core/types";
import type { SeededRng } from "./rng";
import { asXorName, type PublicSignKey } from "./types/brands";
import { bytesToHex } from "./utils/bytes";

/** Key size of the fresh keys inserted by {@link genMutableDataEntryActions}. */
export const DEFAULT_INSERT_KEY_SIZE = 10;
/** Content size of inserted and updated values. */
export const ACTION_CONTENT_SIZE = 10;

export const genVec = (size: number, rng: SeededRng): Uint8Array => rng.bytes(size);

export const genImmutableData = (size: number, rng: SeededRng): ImmutableData =>
  new ImmutableData(genVec(size, rng));

export const genMutableDataEntry = (rng: SeededRng): [EntryKey, Value] => {
  const key = bytesToHex(genVec(rng.range(1, 10), rng));
  const content = genVec(rng.range(1, 10), rng);
  return [key, { content, entryVersion: 0 }];
};

/** `num` entries with distinct keys, all at version 0. */
export const genMutableDataEntries = (num: number, rng: SeededRng): Map<EntryKey, Value> => {
  const entries = new Map<EntryKey, Value>();
  while (entries.size < num) {
    const [key, value] = genMutableDataEntry(rng);
    if (!entries.has(key)) entries.set(key, value);
  }
  return entries;
};

/** Random record with a single owner and no permissions. */
export const genMutableData = (
  tag: number,
  numEntries: number,
  owner: PublicSignKey,
  rng: SeededRng,
): MutableData =>
  unwrap(
    MutableData.create({
      name: asXorName(bytesToHex(rng.bytes(32))),
      tag,
      entries: genMutableDataEntries(numEntries, rng),
      owners: new Set([owner]),
    }),
    "generate mutable data",
  );

export interface EntryActionOptions {
  /** Length of inserted keys. Short keys run out of fresh names quickly. */
  keySize?: number;
  /** Fresh-key draws allowed per insert before giving up. */
  maxAttempts?: number;
}

/**
 * A batch of `count` actions valid against `data` as it stands: updates and
 * deletes of existing keys with the successor version, then inserts of keys
 * that neither `data` nor the batch already holds.
 */
export const genMutableDataEntryActions = (
  data: MutableData,
  count: number,
  rng: SeededRng,
  { keySize = DEFAULT_INSERT_KEY_SIZE, maxAttempts = 64 }: EntryActionOptions = {},
): EntryActions => {
  const actions: EntryActions = new Map();
  const keys = data.keys();
  const modify = Math.min(rng.range(0, count + 1), keys.length);

  for (const key of rng.sample(keys, modify)) {
    const current = data.get(key);
    if (!current) continue;
    const version = current.entryVersion + 1;
    const action: EntryAction = rng.bool()
      ? { type: "del", version }
      : { type: "update", value: { content: genVec(ACTION_CONTENT_SIZE, rng), entryVersion: version } };
    actions.set(key, action);
  }

  while (actions.size < count) {
    let key: EntryKey | undefined;
    for (let attempt = 0; attempt < maxAttempts && key === undefined; attempt++) {
      const candidate = bytesToHex(genVec(keySize, rng));
      if (!actions.has(candidate) && data.get(candidate) === undefined) key = candidate;
    }
    if (key === undefined) {
      throw new HarnessError(`no fresh ${keySize}-byte key after ${maxAttempts} attempts`, {
        existing: keys.length,
        batch: actions.size,
      });
    }
    actions.set(key, { type: "ins", value: { content: genVec(ACTION_CONTENT_SIZE, rng), entryVersion: 0 } });
  }
  return actions;
};

export const genClientAuthority = (rng: SeededRng): ClientAuthority =>
  new ClientAuthority(SecretKeys.generate(rng).publicKeys, asXorName(bytesToHex(rng.bytes(32))));

export const genClientManagerAuthority = (key: PublicSignKey): ClientManagerAuthority =>
  new ClientManagerAuthority(clientNameFromKey(key));

/** Iteration count for randomized tests. */
export const iterations = (config: Pick<HarnessConfig, "iterations">): number => config.iterations;
