export { SignerError, describeFailure, isSignerError, type SignerErrorCode } from "./errors.js";
export {
  NOSTR_CONNECT_KIND,
  eventTemplateSchema,
  getEventHash,
  nostrEventSchema,
  nowSeconds,
  verifyEvent,
  type EventTemplate,
  type NostrEvent,
} from "./event.js";
export {
  APPROVAL_METHODS,
  SIGNER_METHODS,
  decodeMessage,
  encodeRequest,
  encodeResponse,
  errorResponse,
  isApprovalMethod,
  resultResponse,
  summarizeRequest,
  type ApprovalMethod,
  type ApprovalRequest,
  type DecodedMessage,
  type SignerMethod,
  type SignerRequest,
  type SignerResponse,
} from "./protocol.js";
export { parseConnectUri, type ConnectMetadata, type ConnectUri } from "./connectUri.js";
export { TransportKeys } from "./transportKeys.js";
export { SignerSession, type SessionInfo } from "./session.js";
export {
  ApprovalGate,
  DEFAULT_APPROVAL_TIMEOUT_MS,
  MAX_APPROVAL_TIMEOUT_MS,
  type ApprovalGateOptions,
  type ApprovalHandler,
  type Decision,
  type GateEvent,
  type PendingRequest,
  type RequestState,
} from "./approvalGate.js";
export { SignerEngine, type DecideOptions, type EngineEvent, type SignerEngineOptions } from "./engine.js";
export type { InboundHandler, RelayErrorHandler, SignerTransport } from "./transport.js";
export { RelayTransport, type ConnectionState, type RelayTransportOptions } from "./relayTransport.js";
