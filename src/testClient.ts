import { ClientAuthority } from "./authority";
import { encAccountPacket } from "./codec/rlp";
import { SecretKeys } from "./crypto";
import { ACC_LOGIN_ENTRY_KEY, ImmutableData, MutableData, TYPE_TAG_SESSION_PACKET } from "./core/data";
import { HarnessError } from "./core/errors";
import { err, ok, unwrap, type Result } from "./core/result";
import {
  type AccountInfo,
  type Authority,
  type AuthKeys,
  type ClientError,
  type EntryActions,
  type EntryKey,
  type Event,
  isResponse,
  type PermissionSet,
  type Request,
  type ResponseKind,
  type ResponseOf,
  type User,
  type Value,
} from "./core/types";
import type { ILogger } from "./logging";
import type { BootstrapConfig, Network } from "./mock/network";
import * as poll from "./mock/poll";
import { RoutingClient } from "./mock/routingClient";
import type { TestNode } from "./mock/testNode";
import type { SeededRng } from "./rng";
import { asMessageId, asXorName, type MessageId, type PublicSignKey, type XorName } from "./types/brands";
import { bytesToHex } from "./utils/bytes";

export const newMessageId = (rng: SeededRng): MessageId => asMessageId(bytesToHex(rng.bytes(32)));

export interface ResponseEvent<K extends ResponseKind> {
  response: ResponseOf<K>;
  src: Authority;
}

/**
 * Asserts that `event` is the `kind` response to `msgId`. Anything else
 * breaks the one-event-per-request contract and throws.
 */
export const expectResponseEvent = <K extends ResponseKind>(
  event: Event | undefined,
  kind: K,
  msgId: MessageId,
): ResponseEvent<K> => {
  if (event === undefined) throw new HarnessError(`no event, expecting ${kind} response`);
  if (event.type === "terminated") throw new HarnessError(`unexpected termination, expecting ${kind} response`);
  if (event.type !== "response" || !isResponse(event.response, kind)) {
    throw new HarnessError(`unexpected event, expecting ${kind} response`, event);
  }
  if (event.response.msgId !== msgId) {
    throw new HarnessError(`${kind} response for ${event.response.msgId}, expecting ${msgId}`, event);
  }
  return { response: event.response, src: event.src };
};

export const expectResponse = <K extends ResponseKind>(
  event: Event | undefined,
  kind: K,
  msgId: MessageId,
): ResponseOf<K> => expectResponseEvent(event, kind, msgId).response;

export interface TestClientOptions {
  bootstrapConfig?: BootstrapConfig;
  fullId?: SecretKeys;
  /** Stream for identities, message ids and account names. Forked from the network when absent. */
  rng?: SeededRng;
}

/**
 * Client for use in tests only. Every `…Response` method sends one request,
 * runs the network to quiescence and returns the correlated result; the
 * plain variants only send and hand back the message id.
 *
 * Read-style requests drain stale events before sending; write-style
 * requests never do, so a caller can still observe their replies.
 */
export class TestClient {
  private readonly routingClient: RoutingClient;
  private readonly keys: SecretKeys;
  private readonly rng: SeededRng;
  private readonly log: ILogger;
  private clientManager: Authority;
  private state: "constructed" | "connected" | "terminated" = "constructed";

  constructor(network: Network, opts: TestClientOptions = {}) {
    this.rng = opts.rng ?? network.newRng();
    this.keys = opts.fullId ?? SecretKeys.generate(this.rng);
    this.log = network.logger.child({ client: this.keys.name.slice(0, 10) });
    this.routingClient = new RoutingClient(network.newServiceHandle(), this.keys, opts.bootstrapConfig, this.log);
    this.clientManager = { type: "clientManager", name: this.keys.name };
  }

  static withId(network: Network, bootstrapConfig: BootstrapConfig | undefined, fullId: SecretKeys): TestClient {
    return new TestClient(network, { bootstrapConfig, fullId });
  }

  /**
   * Sends all mutations to `name`'s client manager from now on. By default
   * it is this client's own; apps acting for another owner rebind it.
   */
  setClientManager(name: XorName): void {
    this.clientManager = { type: "clientManager", name };
  }

  /** Next event from the participant, if any. */
  tryRecv(): Event | undefined {
    const event = this.routingClient.tryNextEvent();
    if (event?.type === "connected") this.state = "connected";
    else if (event?.type === "terminated") this.state = "terminated";
    return event;
  }

  /** Empties this client's inbound queue. */
  poll(): number {
    let processed = 0;
    while (this.routingClient.poll()) processed += 1;
    return processed;
  }

  pollOnce(): boolean {
    return this.routingClient.poll();
  }

  /** Checks the client connected to the network. */
  ensureConnected(nodes: readonly TestNode[]): void {
    poll.nodesAndClient(nodes, this);
    const event = this.tryRecv();
    if (event?.type !== "connected") throw new HarnessError("expecting connected", event);
  }

  close(): void {
    this.routingClient.close();
  }

  fullId(): SecretKeys {
    return this.keys;
  }

  signingPublicKey(): PublicSignKey {
    return this.keys.publicKeys.signKey;
  }

  name(): XorName {
    return this.keys.name;
  }

  authority(): ClientAuthority {
    const proxy = this.routingClient.proxyNodeName;
    if (proxy === undefined) throw new HarnessError("client has no proxy yet");
    return new ClientAuthority(this.keys.publicKeys, proxy);
  }

  /* ── accounts ──────────────────────────────────────────── */

  /** Stores an empty session packet, creating the account. */
  createAccount(nodes: readonly TestNode[]): MutableData {
    const data = this.composeAccountData();
    unwrap(this.putMDataResponse(data, nodes), "create account");
    return data;
  }

  createAccountWithInvitationResponse(invitationCode: string, nodes: readonly TestNode[]): Result<void, ClientError> {
    return this.putMDataResponse(this.composeAccountData(invitationCode), nodes);
  }

  createAccountWithInvitation(invitationCode: string): MessageId {
    return this.putMData(this.composeAccountData(invitationCode));
  }

  /** Session packet owned by this client, with the invitation under the login key. */
  composeAccountData(invitationCode?: string): MutableData {
    const entries = new Map<EntryKey, Value>();
    if (invitationCode !== undefined) {
      const content = encAccountPacket({
        type: "withInvitation",
        invitationString: invitationCode,
        accPkt: new Uint8Array(0),
      });
      entries.set(bytesToHex(ACC_LOGIN_ENTRY_KEY), { content, entryVersion: 0 });
    }
    return unwrap(
      MutableData.create({
        name: asXorName(bytesToHex(this.rng.bytes(32))),
        tag: TYPE_TAG_SESSION_PACKET,
        entries,
        owners: new Set([this.signingPublicKey()]),
      }),
      "compose account data",
    );
  }

  /* ── immutable data ────────────────────────────────────── */

  putIData(data: ImmutableData): MessageId {
    const msgId = newMessageId(this.rng);
    this.putIDataWithMsgId(data, msgId);
    return msgId;
  }

  putIDataWithMsgId(data: ImmutableData, msgId: MessageId): void {
    this.send(this.clientManager, { type: "PutIData", data: new ImmutableData(data.value), msgId });
  }

  putIDataResponse(data: ImmutableData, nodes: readonly TestNode[]): Result<void, ClientError> {
    return this.putIDataResponseWithMsgId(data, newMessageId(this.rng), nodes);
  }

  putIDataResponseWithMsgId(data: ImmutableData, msgId: MessageId, nodes: readonly TestNode[]): Result<void, ClientError> {
    this.putIDataWithMsgId(data, msgId);
    poll.nodesAndClient(nodes, this);
    return expectResponse(this.tryRecv(), "PutIData", msgId).res;
  }

  /** Puts data too large for the proxy; its termination maps to `InvalidOperation`. */
  putLargeSizedIData(data: ImmutableData, nodes: readonly TestNode[]): Result<void, ClientError> {
    const msgId = this.putIData(data);
    poll.nodesAndClient(nodes, this);
    const event = this.tryRecv();
    if (event?.type === "terminated") return err({ type: "InvalidOperation" });
    return expectResponse(event, "PutIData", msgId).res;
  }

  /** Like {@link putIDataResponse}, but silence is an error result, not a fault. */
  putIDataMayResponse(data: ImmutableData, nodes: readonly TestNode[]): Result<void, ClientError> {
    const msgId = this.putIData(data);
    poll.nodesAndClient(nodes, this);
    const event = this.tryRecv();
    if (event === undefined) {
      this.log.debug({ msgId }, "no response");
      return err({ type: "NetworkOther", message: "No Response" });
    }
    return expectResponse(event, "PutIData", msgId).res;
  }

  getIDataResponse(name: XorName, nodes: readonly TestNode[]): Result<ImmutableData, ClientError> {
    const res = this.getIDataResponseWithSrc(name, nodes);
    return res.ok ? ok(res.value.data) : res;
  }

  /** Fetches immutable data along with the authority that answered. */
  getIDataResponseWithSrc(
    name: XorName,
    nodes: readonly TestNode[],
  ): Result<{ data: ImmutableData; src: Authority }, ClientError> {
    this.flush();
    const msgId = newMessageId(this.rng);
    this.send({ type: "naeManager", name }, { type: "GetIData", name, msgId });
    poll.nodesAndClient(nodes, this);

    const { response, src } = expectResponseEvent(this.tryRecv(), "GetIData", msgId);
    return response.res.ok ? ok({ data: response.res.value, src }) : response.res;
  }

  /* ── mutable data ──────────────────────────────────────── */

  putMData(data: MutableData): MessageId {
    const msgId = newMessageId(this.rng);
    this.send(this.clientManager, { type: "PutMData", data: data.clone(), msgId, requester: this.signingPublicKey() });
    return msgId;
  }

  putMDataResponse(data: MutableData, nodes: readonly TestNode[]): Result<void, ClientError> {
    const msgId = this.putMData(data);
    poll.nodesAndClient(nodes, this);
    return expectResponse(this.tryRecv(), "PutMData", msgId).res;
  }

  getMDataVersionResponse(name: XorName, tag: number, nodes: readonly TestNode[]): Result<number, ClientError> {
    const msgId = this.sendRead({ type: "GetMDataVersion", name, tag, msgId: newMessageId(this.rng) }, nodes);
    return expectResponse(this.tryRecv(), "GetMDataVersion", msgId).res;
  }

  getMDataShellResponse(name: XorName, tag: number, nodes: readonly TestNode[]): Result<MutableData, ClientError> {
    const msgId = this.sendRead({ type: "GetMDataShell", name, tag, msgId: newMessageId(this.rng) }, nodes);
    return expectResponse(this.tryRecv(), "GetMDataShell", msgId).res;
  }

  listMDataEntriesResponse(
    name: XorName,
    tag: number,
    nodes: readonly TestNode[],
  ): Result<Map<EntryKey, Value>, ClientError> {
    const msgId = this.sendRead({ type: "ListMDataEntries", name, tag, msgId: newMessageId(this.rng) }, nodes);
    return expectResponse(this.tryRecv(), "ListMDataEntries", msgId).res;
  }

  getMDataValueResponse(
    name: XorName,
    tag: number,
    key: EntryKey,
    nodes: readonly TestNode[],
  ): Result<Value, ClientError> {
    const msgId = this.sendRead({ type: "GetMDataValue", name, tag, key, msgId: newMessageId(this.rng) }, nodes);
    return expectResponse(this.tryRecv(), "GetMDataValue", msgId).res;
  }

  mutateMDataEntries(name: XorName, tag: number, actions: EntryActions): MessageId {
    const msgId = newMessageId(this.rng);
    this.send(this.clientManager, {
      type: "MutateMDataEntries",
      name,
      tag,
      actions: new Map(actions),
      msgId,
      requester: this.signingPublicKey(),
    });
    return msgId;
  }

  mutateMDataEntriesResponse(
    name: XorName,
    tag: number,
    actions: EntryActions,
    nodes: readonly TestNode[],
  ): Result<void, ClientError> {
    const msgId = this.mutateMDataEntries(name, tag, actions);
    poll.nodesAndClient(nodes, this);
    return expectResponse(this.tryRecv(), "MutateMDataEntries", msgId).res;
  }

  listMDataPermissionsResponse(
    name: XorName,
    tag: number,
    nodes: readonly TestNode[],
  ): Result<Map<User, PermissionSet>, ClientError> {
    const msgId = this.sendRead({ type: "ListMDataPermissions", name, tag, msgId: newMessageId(this.rng) }, nodes);
    return expectResponse(this.tryRecv(), "ListMDataPermissions", msgId).res;
  }

  listMDataUserPermissionsResponse(
    name: XorName,
    tag: number,
    user: User,
    nodes: readonly TestNode[],
  ): Result<PermissionSet, ClientError> {
    const msgId = this.sendRead(
      { type: "ListMDataUserPermissions", name, tag, user, msgId: newMessageId(this.rng) },
      nodes,
    );
    return expectResponse(this.tryRecv(), "ListMDataUserPermissions", msgId).res;
  }

  setMDataUserPermissionsResponse(
    name: XorName,
    tag: number,
    user: User,
    permissions: PermissionSet,
    version: number,
    nodes: readonly TestNode[],
  ): Result<void, ClientError> {
    const msgId = this.sendWrite(
      {
        type: "SetMDataUserPermissions",
        name,
        tag,
        user,
        permissions,
        version,
        msgId: newMessageId(this.rng),
        requester: this.signingPublicKey(),
      },
      nodes,
    );
    return expectResponse(this.tryRecv(), "SetMDataUserPermissions", msgId).res;
  }

  delMDataUserPermissionsResponse(
    name: XorName,
    tag: number,
    user: User,
    version: number,
    nodes: readonly TestNode[],
  ): Result<void, ClientError> {
    const msgId = this.sendWrite(
      {
        type: "DelMDataUserPermissions",
        name,
        tag,
        user,
        version,
        msgId: newMessageId(this.rng),
        requester: this.signingPublicKey(),
      },
      nodes,
    );
    return expectResponse(this.tryRecv(), "DelMDataUserPermissions", msgId).res;
  }

  changeMDataOwnerResponse(
    name: XorName,
    tag: number,
    newOwners: Set<PublicSignKey>,
    version: number,
    nodes: readonly TestNode[],
  ): Result<void, ClientError> {
    const msgId = this.sendWrite(
      {
        type: "ChangeMDataOwner",
        name,
        tag,
        newOwners: new Set(newOwners),
        version,
        msgId: newMessageId(this.rng),
        requester: this.signingPublicKey(),
      },
      nodes,
    );
    return expectResponse(this.tryRecv(), "ChangeMDataOwner", msgId).res;
  }

  /* ── account info & auth keys ──────────────────────────── */

  getAccountInfoResponse(nodes: readonly TestNode[]): Result<AccountInfo, ClientError> {
    const msgId = this.sendRead({ type: "GetAccountInfo", msgId: newMessageId(this.rng) }, nodes, this.clientManager);
    return expectResponse(this.tryRecv(), "GetAccountInfo", msgId).res;
  }

  listAuthKeysAndVersionResponse(nodes: readonly TestNode[]): Result<AuthKeys, ClientError> {
    const msgId = this.sendRead(
      { type: "ListAuthKeysAndVersion", msgId: newMessageId(this.rng) },
      nodes,
      this.clientManager,
    );
    return expectResponse(this.tryRecv(), "ListAuthKeysAndVersion", msgId).res;
  }

  insAuthKey(key: PublicSignKey, version: number): MessageId {
    const msgId = newMessageId(this.rng);
    this.send(this.clientManager, { type: "InsAuthKey", key, version, msgId });
    return msgId;
  }

  insAuthKeyResponse(key: PublicSignKey, version: number, nodes: readonly TestNode[]): Result<void, ClientError> {
    const msgId = this.insAuthKey(key, version);
    poll.nodesAndClient(nodes, this);
    return expectResponse(this.tryRecv(), "InsAuthKey", msgId).res;
  }

  delAuthKey(key: PublicSignKey, version: number): MessageId {
    const msgId = newMessageId(this.rng);
    this.send(this.clientManager, { type: "DelAuthKey", key, version, msgId });
    return msgId;
  }

  delAuthKeyResponse(key: PublicSignKey, version: number, nodes: readonly TestNode[]): Result<void, ClientError> {
    const msgId = this.delAuthKey(key, version);
    poll.nodesAndClient(nodes, this);
    return expectResponse(this.tryRecv(), "DelAuthKey", msgId).res;
  }

  /* ── plumbing ──────────────────────────────────────────── */

  private send(dst: Authority, request: Request): void {
    if (this.state !== "connected") {
      throw new HarnessError(`${request.type} sent while client is ${this.state}`);
    }
    unwrap(this.routingClient.send(dst, request), `send ${request.type}`);
  }

  /** Drains, sends to the data's manager (or `dst`) and runs the network. */
  private sendRead(request: Request, nodes: readonly TestNode[], dst?: Authority): MessageId {
    this.flush();
    const target: Authority = dst ?? { type: "naeManager", name: "name" in request ? request.name : this.name() };
    this.send(target, request);
    poll.nodesAndClient(nodes, this);
    return request.msgId;
  }

  private sendWrite(request: Request, nodes: readonly TestNode[]): MessageId {
    this.send(this.clientManager, request);
    poll.nodesAndClient(nodes, this);
    return request.msgId;
  }

  private flush(): void {
    for (let event = this.tryRecv(); event; event = this.tryRecv()) {
      this.log.debug({ event: event.type }, "stale event discarded");
    }
  }
}
