import { decAccountPacket } from "../codec/rlp";
import { clientNameFromKey, nameOf, verify } from "../crypto";
import {
  ACC_LOGIN_ENTRY_KEY,
  ImmutableData,
  MAX_IMMUTABLE_DATA_SIZE_IN_BYTES,
  type MutableData,
  TYPE_TAG_SESSION_PACKET,
} from "../core/data";
import { err, ok, type Result } from "../core/result";
import type {
  AccountInfo,
  Authority,
  ClientError,
  Request,
  Response,
  Value,
} from "../core/types";
import type { ILogger } from "../logging";
import { asXorName, type MessageId, type PublicSignKey, type XorName } from "../types/brands";
import { bytesToHex, fromHex } from "../utils/bytes";
import {
  type Delivered,
  type EndpointId,
  type Network,
  type RoutedMessage,
  routingName,
  type ServiceHandle,
} from "./network";

interface Account {
  info: AccountInfo;
  authKeys: Set<PublicSignKey>;
  authVersion: number;
}

interface PendingWrite {
  client: Authority;
  createAccount: boolean;
}

type Mutation = Extract<
  Request,
  {
    type:
      | "PutIData"
      | "PutMData"
      | "MutateMDataEntries"
      | "SetMDataUserPermissions"
      | "DelMDataUserPermissions"
      | "ChangeMDataOwner";
  }
>;

const isMutation = (r: Request): r is Mutation =>
  r.type === "PutIData" ||
  r.type === "PutMData" ||
  r.type === "MutateMDataEntries" ||
  r.type === "SetMDataUserPermissions" ||
  r.type === "DelMDataUserPermissions" ||
  r.type === "ChangeMDataOwner";

const LOGIN_KEY = bytesToHex(ACC_LOGIN_ENTRY_KEY);

const errorResponse = (request: Request, error: ClientError): Response => ({
  type: request.type,
  res: err(error),
  msgId: request.msgId,
});

const cloneValue = (v: Value): Value => ({ content: v.content.slice(), entryVersion: v.entryVersion });

/** Bytes a client request puts on the wire, as judged by its proxy. */
export const payloadSize = (request: Request): number => {
  switch (request.type) {
    case "PutIData":
      return request.data.size;
    case "PutMData":
      return request.data.serialisedSize();
    case "MutateMDataEntries": {
      let size = 0;
      for (const [key, action] of request.actions) {
        size += fromHex(key).length + (action.type === "del" ? 8 : action.value.content.length + 8);
      }
      return size;
    }
    default:
      return 0;
  }
};

const dataNameOf = (request: Mutation): XorName =>
  request.type === "PutIData" || request.type === "PutMData" ? request.data.name : request.name;

const mdataKey = (name: XorName, tag: number) => `${name}:${tag}`;

export interface TestNodeOptions {
  /** Mutations granted to a freshly created account. */
  maxMutations: number;
}

/**
 * Storage node. Acts as proxy for the clients that bootstrapped through it,
 * and as client manager and data manager for every name it is XOR-closest
 * to. Processes one packet per `poll`.
 */
export class TestNode {
  readonly name: XorName;
  private readonly network: Network;
  private readonly handle: ServiceHandle;
  private readonly log: ILogger;
  private readonly maxMutations: number;

  private readonly clientNames = new Map<EndpointId, XorName>();
  private readonly clientEndpoints = new Map<XorName, EndpointId>();
  private readonly idata = new Map<XorName, ImmutableData>();
  private readonly mdata = new Map<string, MutableData>();
  private readonly accounts = new Map<XorName, Account>();
  private readonly pending = new Map<MessageId, PendingWrite>();

  constructor(network: Network, opts: TestNodeOptions) {
    this.network = network;
    this.handle = network.newServiceHandle();
    this.name = asXorName(bytesToHex(network.newRng().bytes(32)));
    this.log = network.logger.child({ node: this.name.slice(0, 10) });
    this.maxMutations = opts.maxMutations;
    network.registerNode(this.name, this.handle.endpoint);
  }

  poll(): boolean {
    const delivered = this.handle.receive();
    if (!delivered) return false;
    this.handlePacket(delivered);
    return true;
  }

  /** Writes forwarded to a data manager and not yet answered. */
  get pendingWrites(): number {
    return this.pending.size;
  }

  /** Stored immutable chunk, if this node is its data manager. */
  storedIData(name: XorName): ImmutableData | undefined {
    return this.idata.get(name);
  }

  private handlePacket({ from, packet }: Delivered): void {
    switch (packet.type) {
      case "bootstrapRequest": {
        const clientName = nameOf(packet.clientKeys);
        this.clientNames.set(from, clientName);
        this.clientEndpoints.set(clientName, from);
        this.handle.send(from, { type: "bootstrapResponse", proxyNodeName: this.name });
        this.log.debug({ client: clientName.slice(0, 10) }, "client bootstrapped");
        return;
      }
      case "message": {
        const clientName = this.clientNames.get(from);
        if (clientName === undefined) this.receive(packet.message);
        else this.fromClient(from, clientName, packet.message);
        return;
      }
      default:
        this.log.warn({ from, packet: packet.type }, "unexpected packet dropped");
    }
  }

  private fromClient(endpoint: EndpointId, clientName: XorName, message: RoutedMessage): void {
    const { src, content } = message;
    if (content.type !== "request" || src.type !== "client" || nameOf(src.clientKeys) !== clientName) {
      this.log.warn({ client: clientName.slice(0, 10) }, "malformed client message dropped");
      return;
    }
    if (!verify(content.signature, fromHex(content.request.msgId), src.clientKeys.signKey)) {
      this.log.warn({ msgId: content.request.msgId }, "bad request signature, dropped");
      return;
    }
    if (payloadSize(content.request) > MAX_IMMUTABLE_DATA_SIZE_IN_BYTES) {
      this.log.info({ client: clientName.slice(0, 10) }, "oversized message, terminating client");
      this.clientNames.delete(endpoint);
      this.clientEndpoints.delete(clientName);
      this.handle.send(endpoint, { type: "disconnect" });
      return;
    }
    this.dispatch(message);
  }

  /* ── routing ───────────────────────────────────────────── */
  private targetNode(dst: Authority): XorName | undefined {
    return dst.type === "client" ? dst.proxyNodeName : this.network.closestNode(dst.name);
  }

  /** False when no node can take the message; it is dropped. */
  private dispatch(message: RoutedMessage): boolean {
    const target = this.targetNode(message.dst);
    const endpoint = target === undefined ? undefined : this.network.nodeEndpoint(target);
    if (endpoint === undefined) {
      this.log.warn({ dst: routingName(message.dst) }, "no route, message dropped");
      return false;
    }
    this.log.debug({ dst: message.dst.type, content: message.content.type, via: target?.slice(0, 10) }, "routed");
    this.handle.send(endpoint, { type: "message", message });
    return true;
  }

  private receive(message: RoutedMessage): void {
    const { dst } = message;
    if (this.targetNode(dst) !== this.name) {
      this.dispatch(message);
      return;
    }
    if (dst.type === "client") {
      const endpoint = this.clientEndpoints.get(nameOf(dst.clientKeys));
      if (endpoint === undefined) this.log.warn("response for a client that is gone, dropped");
      else this.handle.send(endpoint, { type: "message", message });
      return;
    }
    this.process(message);
  }

  private reply(to: Authority, from: Authority, response: Response): void {
    this.dispatch({ src: from, dst: to, content: { type: "response", response } });
  }

  private process({ src, dst, content }: RoutedMessage): void {
    if (dst.type === "client") return;
    if (content.type === "response") {
      if (dst.type === "clientManager") this.onWriteResult(dst.name, content.response);
      else this.log.warn({ response: content.response.type }, "stray response dropped");
      return;
    }
    if (dst.type === "clientManager") this.asClientManager(src, dst.name, content.request, content.signature);
    else this.reply(src, dst, this.asDataManager(src, content.request));
  }

  /* ── client manager ────────────────────────────────────── */
  private asClientManager(src: Authority, accountName: XorName, request: Request, signature: Uint8Array): void {
    const self: Authority = { type: "clientManager", name: accountName };
    if (src.type !== "client") {
      this.reply(src, self, errorResponse(request, { type: "InvalidOperation" }));
      return;
    }
    const requester = src.clientKeys.signKey;
    const isOwner = clientNameFromKey(requester) === accountName;
    const account = this.accounts.get(accountName);

    switch (request.type) {
      case "GetAccountInfo":
        this.reply(src, self, {
          type: "GetAccountInfo",
          res: !account ? err({ type: "NoSuchAccount" }) : isOwner ? ok({ ...account.info }) : err({ type: "AccessDenied" }),
          msgId: request.msgId,
        });
        return;
      case "ListAuthKeysAndVersion":
        this.reply(src, self, {
          type: "ListAuthKeysAndVersion",
          res: !account
            ? err({ type: "NoSuchAccount" })
            : isOwner
              ? ok({ keys: new Set(account.authKeys), version: account.authVersion })
              : err({ type: "AccessDenied" }),
          msgId: request.msgId,
        });
        return;
      case "InsAuthKey":
      case "DelAuthKey": {
        let res: Result<void, ClientError>;
        if (!account) res = err({ type: "NoSuchAccount" });
        else if (!isOwner) res = err({ type: "AccessDenied" });
        else if (request.type === "DelAuthKey" && !account.authKeys.has(request.key)) res = err({ type: "NoSuchKey" });
        else if (request.version !== account.authVersion + 1) res = err({ type: "InvalidSuccessor" });
        else {
          if (request.type === "InsAuthKey") account.authKeys.add(request.key);
          else account.authKeys.delete(request.key);
          account.authVersion = request.version;
          res = ok();
        }
        this.reply(src, self, { type: request.type, res, msgId: request.msgId });
        return;
      }
    }

    if (!isMutation(request)) {
      this.reply(src, self, errorResponse(request, { type: "InvalidOperation" }));
      return;
    }
    const refused = this.checkMutation(request, requester, accountName, account);
    if (refused) {
      this.reply(src, self, errorResponse(request, refused));
      return;
    }

    const createAccount = request.type === "PutMData" && request.data.tag === TYPE_TAG_SESSION_PACKET;
    this.pending.set(request.msgId, { client: src, createAccount });
    const forwarded = this.dispatch({
      src: self,
      dst: { type: "naeManager", name: dataNameOf(request) },
      content: { type: "request", request, signature },
    });
    if (!forwarded) this.pending.delete(request.msgId);
  }

  private checkMutation(
    request: Mutation,
    requester: PublicSignKey,
    accountName: XorName,
    account: Account | undefined,
  ): ClientError | undefined {
    if ("requester" in request && request.requester !== requester) return { type: "AccessDenied" };
    const isOwner = clientNameFromKey(requester) === accountName;

    if (request.type === "PutMData" && request.data.tag === TYPE_TAG_SESSION_PACKET) {
      if (account) return { type: "AccountExists" };
      if (!isOwner) return { type: "AccessDenied" };
      const login = request.data.get(LOGIN_KEY);
      if (login) {
        try {
          decAccountPacket(login.content);
        } catch (e) {
          this.log.info({ reason: e instanceof Error ? e.message : String(e) }, "rejecting session packet");
          return { type: "InvalidOperation" };
        }
      }
    } else {
      if (!account) return { type: "NoSuchAccount" };
      if (!isOwner && !account.authKeys.has(requester)) return { type: "AccessDenied" };
      if (account.info.mutationsAvailable <= 0) return { type: "LowBalance" };
    }

    if (request.type === "PutMData") {
      const owners = [...request.data.owners];
      if (owners.length !== 1 || clientNameFromKey(owners[0]) !== accountName) return { type: "InvalidOwners" };
    }
    return undefined;
  }

  private onWriteResult(accountName: XorName, response: Response): void {
    const pending = this.pending.get(response.msgId);
    if (!pending) {
      this.log.warn({ msgId: response.msgId }, "write result without a pending request, dropped");
      return;
    }
    this.pending.delete(response.msgId);

    if (response.res.ok) {
      let account = this.accounts.get(accountName);
      if (!account && pending.createAccount) {
        account = {
          info: { mutationsDone: 0, mutationsAvailable: this.maxMutations },
          authKeys: new Set(),
          authVersion: 0,
        };
        this.accounts.set(accountName, account);
      }
      if (account) {
        account.info.mutationsDone += 1;
        account.info.mutationsAvailable = Math.max(0, account.info.mutationsAvailable - 1);
      }
    }
    this.reply(pending.client, { type: "clientManager", name: accountName }, response);
  }

  /* ── data manager ──────────────────────────────────────── */
  private lookup(name: XorName, tag: number): Result<MutableData, ClientError> {
    const md = this.mdata.get(mdataKey(name, tag));
    return md ? ok(md) : err({ type: "NoSuchData" });
  }

  private asDataManager(src: Authority, request: Request): Response {
    if (isMutation(request) && src.type !== "clientManager") {
      return errorResponse(request, { type: "InvalidOperation" });
    }

    switch (request.type) {
      case "PutIData": {
        if (!this.idata.has(request.data.name)) {
          this.idata.set(request.data.name, new ImmutableData(request.data.value));
        }
        return { type: "PutIData", res: ok(), msgId: request.msgId };
      }
      case "GetIData": {
        const data = this.idata.get(request.name);
        return {
          type: "GetIData",
          res: data ? ok(new ImmutableData(data.value)) : err({ type: "NoSuchData" }),
          msgId: request.msgId,
        };
      }
      case "PutMData": {
        const key = mdataKey(request.data.name, request.data.tag);
        if (this.mdata.has(key)) return { type: "PutMData", res: err({ type: "DataExists" }), msgId: request.msgId };
        this.mdata.set(key, request.data.clone());
        return { type: "PutMData", res: ok(), msgId: request.msgId };
      }
      case "GetMDataVersion": {
        const md = this.lookup(request.name, request.tag);
        return { type: request.type, res: md.ok ? ok(md.value.version) : md, msgId: request.msgId };
      }
      case "GetMDataShell": {
        const md = this.lookup(request.name, request.tag);
        return { type: request.type, res: md.ok ? ok(md.value.shell()) : md, msgId: request.msgId };
      }
      case "ListMDataEntries": {
        const md = this.lookup(request.name, request.tag);
        return {
          type: request.type,
          res: md.ok ? ok(new Map([...md.value.entries].map(([k, v]) => [k, cloneValue(v)]))) : md,
          msgId: request.msgId,
        };
      }
      case "GetMDataValue": {
        const md = this.lookup(request.name, request.tag);
        const value = md.ok ? md.value.get(request.key) : undefined;
        return {
          type: request.type,
          res: !md.ok ? md : value ? ok(cloneValue(value)) : err({ type: "NoSuchEntry" }),
          msgId: request.msgId,
        };
      }
      case "MutateMDataEntries": {
        const md = this.lookup(request.name, request.tag);
        return {
          type: request.type,
          res: md.ok ? md.value.mutateEntries(request.actions, request.requester) : md,
          msgId: request.msgId,
        };
      }
      case "ListMDataPermissions": {
        const md = this.lookup(request.name, request.tag);
        return { type: request.type, res: md.ok ? ok(new Map(md.value.permissions)) : md, msgId: request.msgId };
      }
      case "ListMDataUserPermissions": {
        const md = this.lookup(request.name, request.tag);
        const set = md.ok ? md.value.permissions.get(request.user) : undefined;
        return {
          type: request.type,
          res: !md.ok ? md : set ? ok({ ...set }) : err({ type: "NoSuchKey" }),
          msgId: request.msgId,
        };
      }
      case "SetMDataUserPermissions": {
        const md = this.lookup(request.name, request.tag);
        return {
          type: request.type,
          res: md.ok
            ? md.value.setUserPermissions(request.user, request.permissions, request.version, request.requester)
            : md,
          msgId: request.msgId,
        };
      }
      case "DelMDataUserPermissions": {
        const md = this.lookup(request.name, request.tag);
        return {
          type: request.type,
          res: md.ok ? md.value.delUserPermissions(request.user, request.version, request.requester) : md,
          msgId: request.msgId,
        };
      }
      case "ChangeMDataOwner": {
        const md = this.lookup(request.name, request.tag);
        return {
          type: request.type,
          res: md.ok ? md.value.changeOwner(request.newOwners, request.version, request.requester) : md,
          msgId: request.msgId,
        };
      }
      default:
        return errorResponse(request, { type: "InvalidOperation" });
    }
  }
}

/** Creates `count` nodes on the network, in creation order. */
export const createNodes = (network: Network, count: number, opts: TestNodeOptions): TestNode[] =>
  Array.from({ length: count }, () => new TestNode(network, opts));
