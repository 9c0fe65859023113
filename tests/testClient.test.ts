import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config";
import { decAccountPacket } from "../src/codec/rlp";
import { SecretKeys } from "../src/crypto";
import { ACC_LOGIN_ENTRY_KEY, MAX_IMMUTABLE_DATA_SIZE_IN_BYTES } from "../src/core/data";
import { HarnessError } from "../src/core/errors";
import { ok, unwrap } from "../src/core/result";
import type { Event } from "../src/core/types";
import { connectClient } from "../src/harness";
import { makeLogger } from "../src/logging";
import { Network } from "../src/mock/network";
import { SeededRng } from "../src/rng";
import * as poll from "../src/mock/poll";
import { expectResponse, TestClient } from "../src/testClient";
import {
  genImmutableData,
  genMutableData,
  genMutableDataEntryActions,
  iterations,
} from "../src/testUtils";
import { asMessageId, asXorName } from "../src/types/brands";
import { bytesToHex } from "../src/utils/bytes";
import { setup, signKey } from "./helpers/harness";

const TAG = 15000;

describe("expectResponse", () => {
  const msgId = asMessageId("0x01");
  const response: Event = {
    type: "response",
    response: { type: "GetMDataVersion", res: ok(3), msgId },
    src: { type: "naeManager", name: asXorName("0x02") },
    dst: { type: "naeManager", name: asXorName("0x03") },
  };

  it("returns the matching response", () => {
    expect(expectResponse(response, "GetMDataVersion", msgId).res).toEqual({ ok: true, value: 3 });
  });

  it("treats silence as fatal", () => {
    expect(() => expectResponse(undefined, "GetIData", msgId)).toThrow("no event, expecting GetIData response");
  });

  it("treats termination as fatal", () => {
    expect(() => expectResponse({ type: "terminated" }, "PutIData", msgId)).toThrow(
      "unexpected termination, expecting PutIData response",
    );
  });

  it("rejects another kind", () => {
    expect(() => expectResponse(response, "GetMDataShell", msgId)).toThrow(HarnessError);
  });

  it("rejects another message id", () => {
    expect(() => expectResponse(response, "GetMDataVersion", asMessageId("0x09"))).toThrow(
      "GetMDataVersion response for 0x01, expecting 0x09",
    );
  });
});

describe("TestClient", () => {
  describe("connection", () => {
    it("bootstraps through the first node", () => {
      const { client, nodes } = setup();
      const auth = client.authority();
      expect(auth.proxyNodeName).toBe(nodes[0].name);
      expect(auth.name()).toBe(client.name());
      expect(auth.clientKey()).toBe(client.signingPublicKey());
    });

    it("refuses to send before it connected", () => {
      const { network, rng } = setup();
      const fresh = new TestClient(network);
      expect(() => fresh.putIData(genImmutableData(10, rng))).toThrow("PutIData sent while client is constructed");
    });

    it("fails to connect with no node to bootstrap through", () => {
      const client = new TestClient(new Network(1, makeLogger("silent")));
      expect(() => client.ensureConnected([])).toThrow("expecting connected");
    });

    it("reproduces the same identity from the same seed", () => {
      expect(setup({ seed: 3 }).client.name()).toBe(setup({ seed: 3 }).client.name());
    });

    it("draws its identity from a supplied stream", () => {
      const { network } = setup();
      const a = new TestClient(network, { rng: new SeededRng(77) });
      const b = new TestClient(network, { rng: new SeededRng(77) });
      expect(a.name()).toBe(b.name());
      expect(a.name()).toBe(SecretKeys.generate(new SeededRng(77)).name);
    });
  });

  describe("accounts", () => {
    it("creates an account and charges it one mutation", () => {
      const { client, nodes } = setup();
      expect(client.getAccountInfoResponse(nodes)).toEqual({ ok: false, error: { type: "NoSuchAccount" } });

      const data = client.createAccount(nodes);
      expect(data.tag).toBe(0);
      expect([...data.owners]).toEqual([client.signingPublicKey()]);
      expect(client.getAccountInfoResponse(nodes)).toEqual(ok({ mutationsDone: 1, mutationsAvailable: 999 }));
    });

    it("refuses a second account for the same key", () => {
      const { client, nodes } = setup();
      client.createAccount(nodes);
      expect(client.createAccountWithInvitationResponse("test-invite", nodes)).toEqual({
        ok: false,
        error: { type: "AccountExists" },
      });
      expect(client.getAccountInfoResponse(nodes)).toEqual(ok({ mutationsDone: 1, mutationsAvailable: 999 }));
    });

    it("creates an account with an invitation", () => {
      const { client, nodes } = setup();
      expect(client.createAccountWithInvitationResponse("test-invite", nodes)).toEqual(ok());
      expect(unwrap(client.getAccountInfoResponse(nodes), "account info").mutationsDone).toBe(1);
    });

    it("stores the invitation under the login entry", () => {
      const { client } = setup();
      const data = client.composeAccountData("test-invite");
      expect(data.keys()).toEqual([bytesToHex(ACC_LOGIN_ENTRY_KEY)]);
      const login = data.get(bytesToHex(ACC_LOGIN_ENTRY_KEY));
      expect(login && decAccountPacket(login.content)).toEqual({
        type: "withInvitation",
        invitationString: "test-invite",
        accPkt: new Uint8Array(0),
      });
      expect(client.composeAccountData().entries.size).toBe(0);
    });

    it("keeps a hex-looking invitation as text", () => {
      const { client } = setup();
      const login = client.composeAccountData("0x1234").get(bytesToHex(ACC_LOGIN_ENTRY_KEY));
      expect(login && decAccountPacket(login.content)).toEqual({
        type: "withInvitation",
        invitationString: "0x1234",
        accPkt: new Uint8Array(0),
      });
    });

    it("leaves no write outstanding once answered", () => {
      const { client, nodes, rng } = setup();
      client.createAccount(nodes);
      const md = genMutableData(TAG, 2, client.signingPublicKey(), rng);
      expect(client.putMDataResponse(md, nodes)).toEqual(ok());
      expect(client.putMDataResponse(md, nodes)).toEqual({ ok: false, error: { type: "DataExists" } });
      expect(client.putIDataResponse(genImmutableData(10, rng), nodes)).toEqual(ok());
      expect(nodes.map((n) => n.pendingWrites)).toEqual(nodes.map(() => 0));
    });

    it("runs out of balance", () => {
      const { client, nodes, rng } = setup({ maxMutations: 2 });
      client.createAccount(nodes);
      expect(client.putIDataResponse(genImmutableData(10, rng), nodes)).toEqual(ok());
      expect(client.getAccountInfoResponse(nodes)).toEqual(ok({ mutationsDone: 2, mutationsAvailable: 0 }));
      expect(client.putIDataResponse(genImmutableData(10, rng), nodes)).toEqual({
        ok: false,
        error: { type: "LowBalance" },
      });
    });
  });

  describe("immutable data", () => {
    it("stores and fetches a chunk on its closest node", () => {
      const { client, nodes, network, rng } = setup();
      client.createAccount(nodes);
      const data = genImmutableData(100, rng);

      expect(client.putIDataResponse(data, nodes)).toEqual(ok());
      const fetched = unwrap(client.getIDataResponse(data.name, nodes), "get idata");
      expect(fetched.value).toEqual(data.value);

      const holders = nodes.filter((n) => n.storedIData(data.name) !== undefined).map((n) => n.name);
      expect(holders).toEqual([network.closestNode(data.name)]);
    });

    it("reports the data manager as the source", () => {
      const { client, nodes, rng } = setup();
      client.createAccount(nodes);
      const data = genImmutableData(20, rng);
      client.putIDataResponse(data, nodes);
      const res = unwrap(client.getIDataResponseWithSrc(data.name, nodes), "get idata");
      expect(res.src).toEqual({ type: "naeManager", name: data.name });
    });

    it("accepts the same chunk twice", () => {
      const { client, nodes, rng } = setup();
      client.createAccount(nodes);
      const data = genImmutableData(30, rng);
      expect(client.putIDataResponse(data, nodes)).toEqual(ok());
      expect(client.putIDataResponse(data, nodes)).toEqual(ok());
      expect(client.getAccountInfoResponse(nodes)).toEqual(ok({ mutationsDone: 3, mutationsAvailable: 997 }));
    });

    it("correlates a caller-chosen message id", () => {
      const { client, nodes, rng } = setup();
      client.createAccount(nodes);
      expect(client.putIDataResponseWithMsgId(genImmutableData(5, rng), asMessageId("0xabcd"), nodes)).toEqual(ok());
    });

    it("needs an account to store", () => {
      const { client, nodes, rng } = setup();
      expect(client.putIDataResponse(genImmutableData(10, rng), nodes)).toEqual({
        ok: false,
        error: { type: "NoSuchAccount" },
      });
    });

    it("reports missing chunks", () => {
      const { client, nodes, rng } = setup();
      expect(client.getIDataResponse(genImmutableData(10, rng).name, nodes)).toEqual({
        ok: false,
        error: { type: "NoSuchData" },
      });
    });

    it("is cut off for an oversized chunk", () => {
      const { client, nodes, rng } = setup();
      const res = client.putLargeSizedIData(genImmutableData(MAX_IMMUTABLE_DATA_SIZE_IN_BYTES + 1, rng), nodes);
      expect(res).toEqual({ ok: false, error: { type: "InvalidOperation" } });
      expect(() => client.putIData(genImmutableData(10, rng))).toThrow("PutIData sent while client is terminated");
    });

    it("turns silence into an error result only where asked", () => {
      const { client, nodes, network, rng } = setup();
      const proxy = network.nodeEndpoint(nodes[0].name);
      if (proxy === undefined) throw new Error("proxy not registered");
      network.close(proxy);

      expect(client.putIDataMayResponse(genImmutableData(10, rng), nodes)).toEqual({
        ok: false,
        error: { type: "NetworkOther", message: "No Response" },
      });
      expect(() => client.putIDataResponse(genImmutableData(10, rng), nodes)).toThrow(
        "no event, expecting PutIData response",
      );
    });
  });

  describe("event handling", () => {
    it("leaves write replies for the caller", () => {
      const { client, nodes, rng } = setup();
      client.createAccount(nodes);
      const msgId = client.putIData(genImmutableData(10, rng));
      poll.nodesAndClient(nodes, client);
      expect(expectResponse(client.tryRecv(), "PutIData", msgId).res).toEqual(ok());
    });

    it("fails a write when an earlier reply is still queued", () => {
      const { client, nodes, rng } = setup();
      client.createAccount(nodes);
      const data = genImmutableData(10, rng);
      const first = client.putIData(data);
      expect(() => client.putIDataResponse(data, nodes)).toThrow(`PutIData response for ${first}, expecting`);
    });

    it("drains stale replies before a read", () => {
      const { client, nodes, rng } = setup();
      client.createAccount(nodes);
      const data = genImmutableData(10, rng);
      client.putIData(data);
      poll.nodesAndClient(nodes, client);
      expect(unwrap(client.getIDataResponse(data.name, nodes), "get idata").name).toBe(data.name);
      expect(client.tryRecv()).toBeUndefined();
    });

    it("has nothing left after polling to quiescence", () => {
      const { client } = setup();
      expect(client.poll()).toBe(0);
      expect(client.pollOnce()).toBe(false);
    });
  });

  describe("mutable data", () => {
    it("sends the record as it was when put", () => {
      const { client, nodes, rng } = setup();
      client.createAccount(nodes);
      const owner = client.signingPublicKey();
      const md = genMutableData(TAG, 4, owner, rng);
      const before = new Map(md.entries);

      client.putMData(md);
      expect(md.mutateEntries(genMutableDataEntryActions(md, 3, rng), owner)).toEqual(ok());
      poll.nodesAndClient(nodes, client);

      expect(client.listMDataEntriesResponse(md.name, TAG, nodes)).toEqual(ok(before));
    });

    it("stores a record and reads it back", () => {
      const { client, nodes, rng } = setup();
      client.createAccount(nodes);
      const md = genMutableData(TAG, 5, client.signingPublicKey(), rng);

      expect(client.putMDataResponse(md, nodes)).toEqual(ok());
      expect(client.getMDataVersionResponse(md.name, TAG, nodes)).toEqual(ok(0));
      expect(client.listMDataEntriesResponse(md.name, TAG, nodes)).toEqual(ok(new Map(md.entries)));

      const [key, value] = [...md.entries][0];
      expect(client.getMDataValueResponse(md.name, TAG, key, nodes)).toEqual(ok(value));

      const shell = unwrap(client.getMDataShellResponse(md.name, TAG, nodes), "shell");
      expect(shell.entries.size).toBe(0);
      expect([...shell.owners]).toEqual([client.signingPublicKey()]);

      expect(client.putMDataResponse(md, nodes)).toEqual({ ok: false, error: { type: "DataExists" } });
      expect(client.getMDataVersionResponse(md.name, TAG + 1, nodes)).toEqual({
        ok: false,
        error: { type: "NoSuchData" },
      });
    });

    it("refuses a record owned by someone else", () => {
      const { client, nodes, rng } = setup();
      client.createAccount(nodes);
      const md = genMutableData(TAG, 1, signKey(99), rng);
      expect(client.putMDataResponse(md, nodes)).toEqual({ ok: false, error: { type: "InvalidOwners" } });
    });

    it("applies generated batches the same way a local copy does", () => {
      const { client, nodes, rng } = setup();
      client.createAccount(nodes);
      const owner = client.signingPublicKey();
      const local = genMutableData(TAG, 5, owner, rng);
      client.putMDataResponse(local, nodes);

      const rounds = iterations(loadConfig({}, process.env));
      for (let i = 0; i < rounds; i++) {
        const actions = genMutableDataEntryActions(local, rng.range(1, 10), rng);
        const res = client.mutateMDataEntriesResponse(local.name, TAG, actions, nodes);
        expect(res).toEqual(local.mutateEntries(actions, owner));
        expect(client.listMDataEntriesResponse(local.name, TAG, nodes)).toEqual(ok(new Map(local.entries)));
      }
    });

    it("reports every entry of a stale batch", () => {
      const { client, nodes, rng } = setup();
      client.createAccount(nodes);
      const md = genMutableData(TAG, 4, client.signingPublicKey(), rng);
      client.putMDataResponse(md, nodes);
      const actions = genMutableDataEntryActions(md, 4, rng);

      expect(client.mutateMDataEntriesResponse(md.name, TAG, actions, nodes)).toEqual(ok());
      const again = client.mutateMDataEntriesResponse(md.name, TAG, actions, nodes);
      expect(again.ok ? undefined : again.error.type).toBe("InvalidEntryActions");
      if (!again.ok && again.error.type === "InvalidEntryActions") {
        expect([...again.error.errors.keys()].sort()).toEqual([...actions.keys()].sort());
      }
    });

    it("reflects each action in the fetched values", () => {
      const { client, nodes, rng } = setup();
      client.createAccount(nodes);
      const md = genMutableData(TAG, 6, client.signingPublicKey(), rng);
      client.putMDataResponse(md, nodes);
      const actions = genMutableDataEntryActions(md, 6, rng);
      client.mutateMDataEntriesResponse(md.name, TAG, actions, nodes);

      for (const [key, action] of actions) {
        const res = client.getMDataValueResponse(md.name, TAG, key, nodes);
        if (action.type === "del") expect(res).toEqual({ ok: false, error: { type: "NoSuchEntry" } });
        else expect(res).toEqual(ok(action.value));
      }
    });

    it("manages user permissions with shell versions", () => {
      const { client, nodes, rng } = setup();
      client.createAccount(nodes);
      const md = genMutableData(TAG, 1, client.signingPublicKey(), rng);
      client.putMDataResponse(md, nodes);
      const user = signKey(50);

      expect(client.setMDataUserPermissionsResponse(md.name, TAG, user, { insert: true }, 1, nodes)).toEqual(ok());
      expect(client.listMDataUserPermissionsResponse(md.name, TAG, user, nodes)).toEqual(ok({ insert: true }));
      expect(client.listMDataPermissionsResponse(md.name, TAG, nodes)).toEqual(ok(new Map([[user, { insert: true }]])));
      expect(client.getMDataVersionResponse(md.name, TAG, nodes)).toEqual(ok(1));

      expect(client.setMDataUserPermissionsResponse(md.name, TAG, user, { update: true }, 1, nodes)).toEqual({
        ok: false,
        error: { type: "InvalidSuccessor" },
      });
      expect(client.delMDataUserPermissionsResponse(md.name, TAG, user, 2, nodes)).toEqual(ok());
      expect(client.listMDataUserPermissionsResponse(md.name, TAG, user, nodes)).toEqual({
        ok: false,
        error: { type: "NoSuchKey" },
      });
    });

    it("hands a record over to a new owner", () => {
      const { client, nodes, rng } = setup();
      client.createAccount(nodes);
      const md = genMutableData(TAG, 2, client.signingPublicKey(), rng);
      client.putMDataResponse(md, nodes);
      const heir = signKey(51);

      expect(client.changeMDataOwnerResponse(md.name, TAG, new Set([heir]), 1, nodes)).toEqual(ok());
      const shell = unwrap(client.getMDataShellResponse(md.name, TAG, nodes), "shell");
      expect([...shell.owners]).toEqual([heir]);
      expect(shell.version).toBe(1);

      const actions = genMutableDataEntryActions(md, 1, rng);
      expect(client.mutateMDataEntriesResponse(md.name, TAG, actions, nodes)).toEqual({
        ok: false,
        error: { type: "AccessDenied" },
      });
    });
  });

  describe("auth keys", () => {
    it("lets an authorised app act on the owner's account", () => {
      const harness = setup();
      const { client: owner, nodes, rng } = harness;
      owner.createAccount(nodes);
      const app = connectClient(harness);

      expect(owner.insAuthKeyResponse(app.signingPublicKey(), 1, nodes)).toEqual(ok());
      expect(owner.listAuthKeysAndVersionResponse(nodes)).toEqual(
        ok({ keys: new Set([app.signingPublicKey()]), version: 1 }),
      );

      app.setClientManager(owner.name());
      expect(app.putIDataResponse(genImmutableData(10, rng), nodes)).toEqual(ok());
      expect(app.getAccountInfoResponse(nodes)).toEqual({ ok: false, error: { type: "AccessDenied" } });
      expect(owner.getAccountInfoResponse(nodes)).toEqual(ok({ mutationsDone: 2, mutationsAvailable: 998 }));

      expect(owner.delAuthKeyResponse(app.signingPublicKey(), 2, nodes)).toEqual(ok());
      expect(app.putIDataResponse(genImmutableData(10, rng), nodes)).toEqual({
        ok: false,
        error: { type: "AccessDenied" },
      });
    });

    it("versions the key set", () => {
      const { client, nodes } = setup();
      client.createAccount(nodes);
      const key = signKey(60);

      expect(client.insAuthKeyResponse(key, 2, nodes)).toEqual({ ok: false, error: { type: "InvalidSuccessor" } });
      expect(client.delAuthKeyResponse(key, 1, nodes)).toEqual({ ok: false, error: { type: "NoSuchKey" } });
      expect(client.insAuthKeyResponse(key, 1, nodes)).toEqual(ok());
      expect(client.listAuthKeysAndVersionResponse(nodes)).toEqual(ok({ keys: new Set([key]), version: 1 }));
    });
  });
});
