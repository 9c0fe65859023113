import { HarnessError } from "../core/errors";

/** Anything that processes at most one unit of pending work per call. */
export interface Pollable {
  pollOnce(): boolean;
}

/** Rounds after which a still-busy network is treated as livelocked. */
export const MAX_POLL_ROUNDS = 100_000;

const rounds = (participants: readonly Pollable[]): number => {
  for (let round = 0; round < MAX_POLL_ROUNDS; round++) {
    let progressed = false;
    for (const p of participants) {
      if (p.pollOnce()) progressed = true;
    }
    if (!progressed) return round;
  }
  throw new HarnessError(`network still busy after ${MAX_POLL_ROUNDS} rounds`);
};

/** Polls the nodes round-robin until none made progress. Returns the busy rounds. */
export const nodes = (ns: readonly { poll(): boolean }[]): number =>
  rounds(ns.map((n) => ({ pollOnce: () => n.poll() })));

/** Same as {@link nodes}, with the client taking its turn after the nodes each round. */
export const nodesAndClient = (ns: readonly { poll(): boolean }[], client: Pollable): number =>
  rounds([...ns.map((n) => ({ pollOnce: () => n.poll() })), client]);
