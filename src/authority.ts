import { nameOf, type PublicKeys } from "./crypto";
import type { Authority } from "./core/types";
import type { PublicSignKey, XorName } from "./types/brands";

/** A connected client and the node relaying its traffic. */
export class ClientAuthority {
  constructor(
    readonly clientKeys: PublicKeys,
    readonly proxyNodeName: XorName,
  ) {}

  name(): XorName {
    return nameOf(this.clientKeys);
  }

  clientKey(): PublicSignKey {
    return this.clientKeys.signKey;
  }

  toAuthority(): Authority {
    return { type: "client", clientKeys: this.clientKeys, proxyNodeName: this.proxyNodeName };
  }
}

/** The group that processes a client's mutations. */
export class ClientManagerAuthority {
  constructor(private readonly address: XorName) {}

  name(): XorName {
    return this.address;
  }

  toAuthority(): Authority {
    return { type: "clientManager", name: this.address };
  }
}
