import { inspect } from "node:util";

/**
 * A broken harness contract: an unexpected event, no event at quiescence,
 * a request before the client connected. Tests are expected to die on it.
 */
export class HarnessError extends Error {
  readonly context: unknown;

  constructor(message: string, context?: unknown) {
    super(context === undefined ? message : `${message}: ${inspect(context, { depth: 6 })}`);
    this.name = "HarnessError";
    this.context = context;
  }
}
