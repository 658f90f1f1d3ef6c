export * from "./types";
export { AgentDirectory } from "./agentDirectory";
export type { AgentDirectoryDeps } from "./agentDirectory";
export { RemoteDirectoryClient } from "./remoteDirectoryClient";
export type { RemoteDirectoryClientOptions } from "./remoteDirectoryClient";
export { HeartbeatPublisher } from "./heartbeatPublisher";
export type { HeartbeatPublisherOptions } from "./heartbeatPublisher";
