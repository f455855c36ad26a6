export { StaticCredentialProvider } from "./credentials.js";
export type { CredentialProvider } from "./credentials.js";
export { DEFAULT_REQUEST_TIMEOUT_MS, RemoteGateway } from "./remote-gateway.js";
export type {
  Gateway,
  ProcessMessageRequest,
  ProcessMessageResult,
  RemoteGatewayOptions,
  RemoteMessageRecord,
  RemoteSession,
} from "./remote-gateway.js";
