import type { PublicKeys } from "../crypto";
import type { Authority, Request, Response } from "../core/types";
import type { ILogger } from "../logging";
import { SeededRng } from "../rng";
import type { XorName } from "../types/brands";
import { closerTo, fromHex } from "../utils/bytes";

export type EndpointId = number;

/** Which node a client bootstraps through. Defaults to the first node. */
export interface BootstrapConfig {
  contacts: XorName[];
}

export type RoutedContent =
  | { type: "request"; request: Request; signature: Uint8Array }
  | { type: "response"; response: Response };

export interface RoutedMessage {
  src: Authority;
  dst: Authority;
  content: RoutedContent;
}

/* ── wire packets between endpoints ──────────────────────── */
export type Packet =
  | { type: "bootstrapRequest"; clientKeys: PublicKeys }
  | { type: "bootstrapResponse"; proxyNodeName: XorName }
  | { type: "disconnect" }
  | { type: "message"; message: RoutedMessage };

export interface Delivered {
  from: EndpointId;
  packet: Packet;
}

/** The name a routed message travels towards. */
export const routingName = (a: Authority): XorName =>
  a.type === "client" ? a.proxyNodeName : a.name;

/**
 * In-process network: FIFO packet queues per endpoint plus a registry of node
 * names for XOR-closest routing. It never moves packets by itself; each
 * participant drains its own queue when polled.
 */
export class Network {
  readonly logger: ILogger;
  private readonly rng: SeededRng;
  private readonly queues = new Map<EndpointId, Delivered[]>();
  private readonly nodeNames = new Map<XorName, EndpointId>();
  private nextEndpoint: EndpointId = 0;

  constructor(seed: number, logger: ILogger) {
    this.rng = new SeededRng(seed);
    this.logger = logger;
  }

  newRng(): SeededRng {
    return this.rng.fork();
  }

  newServiceHandle(): ServiceHandle {
    const id = this.nextEndpoint++;
    this.queues.set(id, []);
    return new ServiceHandle(this, id);
  }

  registerNode(name: XorName, endpoint: EndpointId): void {
    this.nodeNames.set(name, endpoint);
  }

  nodeEndpoint(name: XorName): EndpointId | undefined {
    return this.nodeNames.get(name);
  }

  nodeNamesInOrder(): XorName[] {
    return [...this.nodeNames.keys()];
  }

  /** Node whose name is XOR-closest to `target`. */
  closestNode(target: XorName): XorName | undefined {
    const t = fromHex(target);
    let best: XorName | undefined;
    for (const name of this.nodeNames.keys()) {
      if (best === undefined || closerTo(t, fromHex(name), fromHex(best))) best = name;
    }
    return best;
  }

  send(from: EndpointId, to: EndpointId, packet: Packet): void {
    const queue = this.queues.get(to);
    if (!queue) {
      this.logger.warn({ from, to, packet: packet.type }, "packet to unknown endpoint dropped");
      return;
    }
    queue.push({ from, packet });
  }

  receive(endpoint: EndpointId): Delivered | undefined {
    return this.queues.get(endpoint)?.shift();
  }

  close(endpoint: EndpointId): void {
    this.queues.delete(endpoint);
    for (const [name, id] of this.nodeNames) if (id === endpoint) this.nodeNames.delete(name);
  }
}

/** One participant's attachment to the network. */
export class ServiceHandle {
  constructor(
    readonly network: Network,
    readonly endpoint: EndpointId,
  ) {}

  send(to: EndpointId, packet: Packet): void {
    this.network.send(this.endpoint, to, packet);
  }

  receive(): Delivered | undefined {
    return this.network.receive(this.endpoint);
  }

  close(): void {
    this.network.close(this.endpoint);
  }
}
