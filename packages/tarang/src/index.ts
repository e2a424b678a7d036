// @setu/tarang: WebSocket session layer

// Session (Tarang)
export { WebSocket } from "./websocket.js";
export type { TextHandler, BinaryHandler, UpgradeHandler, WebSocketOptions, AttachOptions } from "./websocket.js";
export { FrameSequence } from "./frame-sequence.js";
export type { MessageKind, CompletedMessage } from "./frame-sequence.js";

// Frames
export {
	Opcode,
	CloseCode,
	MAX_CONTROL_PAYLOAD,
	isControlOpcode,
	applyMask,
	makeFrame,
	unmaskedPayload,
	makeMaskKey,
	encodeCloseCode,
	decodeCloseCode,
} from "./frame.js";
export type { PeerRole, WebSocketFrame } from "./frame.js";
export { DEFAULT_MAX_FRAME_SIZE, encodeFrame, parseFrame, FrameDecoder } from "./frame-codec.js";

// Handshake
export { WebSocketClient, connect, getDefaultConnectionGroup } from "./client.js";
export type { GroupProvider, RequestHeaders, WebSocketClientOptions, ConnectOptions } from "./client.js";
export { UpgradeRequestHandler, normalizeRequestPath } from "./upgrade-request-handler.js";
export type { UpgradeRequestOptions } from "./upgrade-request-handler.js";
export {
	WS_MAGIC_GUID,
	WEBSOCKET_VERSION,
	generateRequestKey,
	computeAcceptKey,
	verifyUpgradeResponse,
	HttpClientUpgradeCodec,
} from "./upgrade.js";
export type { UpgradeRequestSink, ClientUpgradeConfig } from "./upgrade.js";
export { acceptUpgrade, validateUpgradeRequest } from "./server.js";

// HTTP
export {
	MAX_RESPONSE_HEAD_BYTES,
	serializeRequestHead,
	findHeader,
	HttpParseError,
	ResponseHeadParser,
} from "./http-codec.js";
export type { HttpVersion, HttpHeaderList, HttpRequestHead, HttpResponseHead } from "./http-codec.js";

// Transport & resources
export { tcpConnector, nodeTlsWrapper } from "./transport.js";
export type { TransportConnector, TransportConnectOptions, TlsWrapper } from "./transport.js";
export { ConnectionGroup } from "./connection-group.js";
export { ResultCell } from "./result-cell.js";
export { resolveEndpoint, parseWebSocketUrl, hostHeaderFor, defaultPort } from "./endpoint.js";
export type { WebSocketScheme, EndpointOptions, Endpoint } from "./endpoint.js";
export { resolveClientConfig, MAX_CONFIGURABLE_FRAME_SIZE, DEFAULT_CONNECT_TIMEOUT_MS } from "./config.js";
export type { WebSocketClientConfig } from "./config.js";

// Errors
export {
	InvalidUrlError,
	UpgradeRefusedError,
	AlreadyShutDownError,
	ProtocolViolationError,
	TransportError,
} from "./errors.js";
