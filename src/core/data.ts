import { contentName } from "../crypto";
import type { PublicSignKey, XorName } from "../types/brands";
import { fromHex, utf8 } from "../utils/bytes";
import { err, ok, type Result } from "./result";
import type {
  Action,
  ClientError,
  EntryActions,
  EntryError,
  EntryKey,
  PermissionSet,
  User,
  Value,
} from "./types";

export const MAX_IMMUTABLE_DATA_SIZE_IN_BYTES = 1024 * 1024 + 10 * 1024;
export const MAX_MUTABLE_DATA_SIZE_IN_BYTES = 1024 * 1024;
export const MAX_MUTABLE_DATA_ENTRIES = 100;

/** Reserved tag of the account session packet. */
export const TYPE_TAG_SESSION_PACKET = 0;
/** Entry key holding the serialised account packet. */
export const ACC_LOGIN_ENTRY_KEY: Uint8Array = utf8("Login");

const cloneValue = (v: Value): Value => ({ content: v.content.slice(), entryVersion: v.entryVersion });

/* ── immutable data ──────────────────────────────────────── */
export class ImmutableData {
  readonly name: XorName;
  readonly value: Uint8Array;

  constructor(value: Uint8Array) {
    this.value = value.slice();
    this.name = contentName(this.value);
  }

  get size(): number {
    return this.value.length;
  }
}

/* ── mutable data ────────────────────────────────────────── */
export interface MutableDataInit {
  name: XorName;
  tag: number;
  permissions?: Map<User, PermissionSet>;
  entries?: Map<EntryKey, Value>;
  owners: Set<PublicSignKey>;
}

const actionOf = { ins: "insert", update: "update", del: "delete" } as const;

/**
 * Versioned key/value record. Entry versions start at 0 and every accepted
 * mutation of a key must carry `current + 1`; the shell `version` follows the
 * same rule for permission and owner changes.
 */
export class MutableData {
  readonly name: XorName;
  readonly tag: number;
  private shellVersion: number;
  private readonly perms: Map<User, PermissionSet>;
  private readonly data: Map<EntryKey, Value>;
  private ownerKeys: Set<PublicSignKey>;

  private constructor(init: Required<MutableDataInit>, version: number) {
    this.name = init.name;
    this.tag = init.tag;
    this.shellVersion = version;
    this.perms = new Map(init.permissions);
    this.data = new Map([...init.entries].map(([k, v]) => [k, cloneValue(v)]));
    this.ownerKeys = new Set(init.owners);
  }

  static create(init: MutableDataInit): Result<MutableData, ClientError> {
    const md = new MutableData(
      { permissions: new Map(), entries: new Map(), ...init },
      0,
    );
    if (md.ownerKeys.size > 1) return err({ type: "InvalidOwners" });
    const limits = md.checkLimits();
    return limits.ok ? ok(md) : limits;
  }

  get version(): number {
    return this.shellVersion;
  }

  get owners(): ReadonlySet<PublicSignKey> {
    return this.ownerKeys;
  }

  get permissions(): ReadonlyMap<User, PermissionSet> {
    return this.perms;
  }

  get entries(): ReadonlyMap<EntryKey, Value> {
    return this.data;
  }

  keys(): EntryKey[] {
    return [...this.data.keys()];
  }

  get(key: EntryKey): Value | undefined {
    return this.data.get(key);
  }

  clone(): MutableData {
    return new MutableData(
      {
        name: this.name,
        tag: this.tag,
        permissions: this.perms,
        entries: this.data,
        owners: this.ownerKeys,
      },
      this.shellVersion,
    );
  }

  /** Everything but the entries. */
  shell(): MutableData {
    return new MutableData(
      {
        name: this.name,
        tag: this.tag,
        permissions: this.perms,
        entries: new Map(),
        owners: this.ownerKeys,
      },
      this.shellVersion,
    );
  }

  serialisedSize(): number {
    let size = 32 + 8 + 8 + this.ownerKeys.size * 32;
    for (const [key, value] of this.data) size += fromHex(key).length + value.content.length + 8;
    for (const user of this.perms.keys()) size += user === "anyone" ? 1 : 33;
    return size;
  }

  isActionAllowed(requester: PublicSignKey, action: Action): boolean {
    if (this.ownerKeys.has(requester)) return true;
    const own = this.perms.get(requester)?.[action];
    if (own !== undefined) return own;
    return this.perms.get("anyone")?.[action] ?? false;
  }

  /** Applies the whole batch or nothing. */
  mutateEntries(actions: EntryActions, requester: PublicSignKey): Result<void, ClientError> {
    for (const action of actions.values()) {
      if (!this.isActionAllowed(requester, actionOf[action.type])) {
        return err({ type: "AccessDenied" });
      }
    }

    const errors = new Map<EntryKey, EntryError>();
    for (const [key, action] of actions) {
      const current = this.data.get(key);
      switch (action.type) {
        case "ins":
          if (current) errors.set(key, { type: "EntryExists", version: current.entryVersion });
          else if (action.value.entryVersion !== 0) errors.set(key, { type: "InvalidSuccessor", version: 0 });
          break;
        case "update":
          if (!current) errors.set(key, { type: "NoSuchEntry" });
          else if (action.value.entryVersion !== current.entryVersion + 1)
            errors.set(key, { type: "InvalidSuccessor", version: current.entryVersion });
          break;
        case "del":
          if (!current) errors.set(key, { type: "NoSuchEntry" });
          else if (action.version !== current.entryVersion + 1)
            errors.set(key, { type: "InvalidSuccessor", version: current.entryVersion });
          break;
      }
    }
    if (errors.size > 0) return err({ type: "InvalidEntryActions", errors });

    const next = new Map(this.data);
    for (const [key, action] of actions) {
      if (action.type === "del") next.delete(key);
      else next.set(key, cloneValue(action.value));
    }
    const candidate = new MutableData(
      { name: this.name, tag: this.tag, permissions: this.perms, entries: next, owners: this.ownerKeys },
      this.shellVersion,
    );
    const limits = candidate.checkLimits();
    if (!limits.ok) return limits;

    this.data.clear();
    for (const [key, value] of next) this.data.set(key, value);
    return ok();
  }

  setUserPermissions(
    user: User,
    permissions: PermissionSet,
    version: number,
    requester: PublicSignKey,
  ): Result<void, ClientError> {
    if (!this.isActionAllowed(requester, "managePermissions")) return err({ type: "AccessDenied" });
    if (version !== this.shellVersion + 1) return err({ type: "InvalidSuccessor" });
    this.perms.set(user, { ...permissions });
    this.shellVersion = version;
    return ok();
  }

  delUserPermissions(user: User, version: number, requester: PublicSignKey): Result<void, ClientError> {
    if (!this.isActionAllowed(requester, "managePermissions")) return err({ type: "AccessDenied" });
    if (!this.perms.has(user)) return err({ type: "NoSuchKey" });
    if (version !== this.shellVersion + 1) return err({ type: "InvalidSuccessor" });
    this.perms.delete(user);
    this.shellVersion = version;
    return ok();
  }

  changeOwner(newOwners: ReadonlySet<PublicSignKey>, version: number, requester: PublicSignKey): Result<void, ClientError> {
    if (!this.ownerKeys.has(requester)) return err({ type: "AccessDenied" });
    if (newOwners.size !== 1) return err({ type: "InvalidOwners" });
    if (version !== this.shellVersion + 1) return err({ type: "InvalidSuccessor" });
    this.ownerKeys = new Set(newOwners);
    this.shellVersion = version;
    return ok();
  }

  private checkLimits(): Result<void, ClientError> {
    if (this.data.size > MAX_MUTABLE_DATA_ENTRIES) return err({ type: "TooManyEntries" });
    if (this.serialisedSize() > MAX_MUTABLE_DATA_SIZE_IN_BYTES) return err({ type: "DataTooLarge" });
    return ok();
  }
}
