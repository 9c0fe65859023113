import { type HarnessConfig, type HarnessConfigInput, loadConfig } from "./config";
import { type ILogger, makeLogger } from "./logging";
import { Network } from "./mock/network";
import * as poll from "./mock/poll";
import { createNodes, type TestNode } from "./mock/testNode";
import { TestClient, type TestClientOptions } from "./testClient";

export interface Harness {
  config: HarnessConfig;
  logger: ILogger;
  network: Network;
  nodes: TestNode[];
}

/** Seeded network with `config.nodeCount` nodes, settled. */
export const createHarness = (input: HarnessConfigInput = {}): Harness => {
  const config = loadConfig(input);
  const logger = makeLogger(config.logLevel, config.prettyLogs);
  const network = new Network(config.seed, logger);
  const nodes = createNodes(network, config.nodeCount, { maxMutations: config.maxMutations });
  poll.nodes(nodes);
  logger.info({ seed: config.seed, nodes: nodes.length }, "harness ready");
  return { config, logger, network, nodes };
};

/** A client bootstrapped through the first node and connected. */
export const connectClient = (harness: Harness, opts: TestClientOptions = {}): TestClient => {
  const client = new TestClient(harness.network, opts);
  client.ensureConnected(harness.nodes);
  return client;
};
