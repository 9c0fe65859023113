import type { SecretKeys } from "../crypto";
import { err, ok, type Result } from "../core/result";
import type { Authority, Event, Request } from "../core/types";
import type { ILogger } from "../logging";
import type { XorName } from "../types/brands";
import { fromHex } from "../utils/bytes";
import type { BootstrapConfig, EndpointId, ServiceHandle } from "./network";

export type InterfaceError = "NotConnected";

type State =
  | { type: "bootstrapping"; proxy: EndpointId }
  | { type: "connected"; proxy: EndpointId; proxyNodeName: XorName }
  | { type: "disconnected" };

/**
 * Client-side network participant. Sending only enqueues; replies surface as
 * events once the client is polled.
 */
export class RoutingClient {
  private readonly events: Event[] = [];
  private state: State;

  constructor(
    private readonly handle: ServiceHandle,
    private readonly fullId: SecretKeys,
    bootstrapConfig: BootstrapConfig | undefined,
    private readonly log: ILogger,
  ) {
    const network = handle.network;
    const contact = bootstrapConfig?.contacts[0] ?? network.nodeNamesInOrder()[0];
    const proxy = contact === undefined ? undefined : network.nodeEndpoint(contact);
    if (proxy === undefined) {
      this.log.warn({ contact }, "no bootstrap node reachable");
      this.state = { type: "disconnected" };
      this.events.push({ type: "terminated" });
      return;
    }
    this.state = { type: "bootstrapping", proxy };
    handle.send(proxy, { type: "bootstrapRequest", clientKeys: fullId.publicKeys });
  }

  get proxyNodeName(): XorName | undefined {
    return this.state.type === "connected" ? this.state.proxyNodeName : undefined;
  }

  send(dst: Authority, request: Request): Result<void, InterfaceError> {
    if (this.state.type !== "connected") return err("NotConnected");
    const src: Authority = {
      type: "client",
      clientKeys: this.fullId.publicKeys,
      proxyNodeName: this.state.proxyNodeName,
    };
    const signature = this.fullId.sign(fromHex(request.msgId));
    this.handle.send(this.state.proxy, {
      type: "message",
      message: { src, dst, content: { type: "request", request, signature } },
    });
    this.log.debug({ request: request.type, msgId: request.msgId, dst: dst.type }, "request sent");
    return ok();
  }

  /** Handles one inbound packet. False when nothing was pending. */
  poll(): boolean {
    const delivered = this.handle.receive();
    if (!delivered) return false;
    const { packet } = delivered;

    switch (packet.type) {
      case "bootstrapResponse":
        if (this.state.type === "bootstrapping") {
          this.state = { type: "connected", proxy: this.state.proxy, proxyNodeName: packet.proxyNodeName };
          this.events.push({ type: "connected" });
        }
        break;
      case "disconnect":
        this.state = { type: "disconnected" };
        this.events.push({ type: "terminated" });
        break;
      case "message":
        if (packet.message.content.type === "response") {
          const { src, dst, content } = packet.message;
          this.events.push({ type: "response", response: content.response, src, dst });
        } else {
          this.log.warn({ request: packet.message.content.request.type }, "client got a request, ignored");
        }
        break;
      case "bootstrapRequest":
        this.log.warn({ from: delivered.from }, "client got a bootstrap request, ignored");
        break;
    }
    return true;
  }

  tryNextEvent(): Event | undefined {
    return this.events.shift();
  }

  close(): void {
    this.state = { type: "disconnected" };
    this.handle.close();
  }
}
