import type { PublicKeys } from "../crypto";
import type { Hex, MessageId, PublicSignKey, XorName } from "../types/brands";
import type { ImmutableData, MutableData } from "./data";
import type { Result } from "./result";

/* ── addressing ──────────────────────────────────────────── */
export type Authority =
  | { type: "client"; clientKeys: PublicKeys; proxyNodeName: XorName }
  | { type: "clientManager"; name: XorName }
  | { type: "naeManager"; name: XorName };

/* ── mutable data ────────────────────────────────────────── */
export interface Value {
  content: Uint8Array;
  entryVersion: number;
}

/** Entry keys are byte strings, kept hex-encoded so they can key a Map. */
export type EntryKey = Hex;

export type EntryAction =
  | { type: "ins"; value: Value }
  | { type: "update"; value: Value }
  | { type: "del"; version: number };

export type EntryActions = Map<EntryKey, EntryAction>;

export type Action = "insert" | "update" | "delete" | "managePermissions";
export type PermissionSet = Readonly<Partial<Record<Action, boolean>>>;
export type User = "anyone" | PublicSignKey;

/* ── accounts ────────────────────────────────────────────── */
export interface AccountInfo {
  mutationsDone: number;
  mutationsAvailable: number;
}

export interface AuthKeys {
  keys: Set<PublicSignKey>;
  version: number;
}

export type AccountPacket =
  | { type: "withInvitation"; invitationString: string; accPkt: Uint8Array }
  | { type: "accPkt"; accPkt: Uint8Array };

/* ── errors carried in responses ─────────────────────────── */
export type EntryError =
  | { type: "NoSuchEntry" }
  | { type: "EntryExists"; version: number }
  | { type: "InvalidSuccessor"; version: number };

export type ClientError =
  | { type: "AccessDenied" }
  | { type: "NoSuchAccount" }
  | { type: "AccountExists" }
  | { type: "NoSuchData" }
  | { type: "DataExists" }
  | { type: "DataTooLarge" }
  | { type: "TooManyEntries" }
  | { type: "InvalidEntryActions"; errors: Map<EntryKey, EntryError> }
  | { type: "NoSuchEntry" }
  | { type: "NoSuchKey" }
  | { type: "InvalidOwners" }
  | { type: "InvalidSuccessor" }
  | { type: "InvalidOperation" }
  | { type: "LowBalance" }
  | { type: "NetworkOther"; message: string };

/* ── requests ────────────────────────────────────────────── */
type DataRef = { name: XorName; tag: number; msgId: MessageId };

export type Request =
  | { type: "PutIData"; data: ImmutableData; msgId: MessageId }
  | { type: "GetIData"; name: XorName; msgId: MessageId }
  | { type: "PutMData"; data: MutableData; msgId: MessageId; requester: PublicSignKey }
  | ({ type: "GetMDataVersion" } & DataRef)
  | ({ type: "GetMDataShell" } & DataRef)
  | ({ type: "ListMDataEntries" } & DataRef)
  | ({ type: "GetMDataValue"; key: EntryKey } & DataRef)
  | ({ type: "MutateMDataEntries"; actions: EntryActions; requester: PublicSignKey } & DataRef)
  | ({ type: "ListMDataPermissions" } & DataRef)
  | ({ type: "ListMDataUserPermissions"; user: User } & DataRef)
  | ({
      type: "SetMDataUserPermissions";
      user: User;
      permissions: PermissionSet;
      version: number;
      requester: PublicSignKey;
    } & DataRef)
  | ({ type: "DelMDataUserPermissions"; user: User; version: number; requester: PublicSignKey } & DataRef)
  | ({
      type: "ChangeMDataOwner";
      newOwners: Set<PublicSignKey>;
      version: number;
      requester: PublicSignKey;
    } & DataRef)
  | { type: "GetAccountInfo"; msgId: MessageId }
  | { type: "ListAuthKeysAndVersion"; msgId: MessageId }
  | { type: "InsAuthKey"; key: PublicSignKey; version: number; msgId: MessageId }
  | { type: "DelAuthKey"; key: PublicSignKey; version: number; msgId: MessageId };

export type RequestKind = Request["type"];

/* ── responses: one per request kind ─────────────────────── */
export interface ResponseValues {
  PutIData: void;
  GetIData: ImmutableData;
  PutMData: void;
  GetMDataVersion: number;
  GetMDataShell: MutableData;
  ListMDataEntries: Map<EntryKey, Value>;
  GetMDataValue: Value;
  MutateMDataEntries: void;
  ListMDataPermissions: Map<User, PermissionSet>;
  ListMDataUserPermissions: PermissionSet;
  SetMDataUserPermissions: void;
  DelMDataUserPermissions: void;
  ChangeMDataOwner: void;
  GetAccountInfo: AccountInfo;
  ListAuthKeysAndVersion: AuthKeys;
  InsAuthKey: void;
  DelAuthKey: void;
}

export type ResponseKind = keyof ResponseValues;

export type Response = {
  [K in ResponseKind]: { type: K; res: Result<ResponseValues[K], ClientError>; msgId: MessageId };
}[ResponseKind];

export type ResponseOf<K extends ResponseKind> = Extract<Response, { type: K }>;

export const isResponse = <K extends ResponseKind>(r: Response, kind: K): r is ResponseOf<K> =>
  r.type === kind;

/* ── events surfaced by a client participant ─────────────── */
export type Event =
  | { type: "connected" }
  | { type: "terminated" }
  | { type: "response"; response: Response; src: Authority; dst: Authority };
