export * from "./authority";
export * from "./config";
export * from "./crypto";
export * from "./core/data";
export * from "./core/errors";
export * from "./core/result";
export * from "./core/types";
export * from "./codec/rlp";
export * from "./harness";
export * from "./logging";
export * from "./mock/network";
export * as poll from "./mock/poll";
export { RoutingClient, type InterfaceError } from "./mock/routingClient";
export { TestNode, createNodes, type TestNodeOptions } from "./mock/testNode";
export * from "./rng";
export * from "./testClient";
export * from "./testUtils";
export * from "./types/brands";
export { bytesToHex, fromHex, utf8 } from "./utils/bytes";
