/**
 * @narrator/gateway: HTTP control plane and WebSocket observer transport.
 */

export { GatewayServer } from './server.js';
export type { GatewayServerOptions, GatewayRunner } from './server.js';

export { ObserverBridge } from './ws-bridge.js';
export type { ObserverBridgeOpts, ObserverHost } from './ws-bridge.js';

export { encodeEnvelope, parseClientFrame, statusUpdateFor } from './protocol.js';
export type {
  ClientEnvelope,
  GatewayErrorCode,
  ServerEnvelope,
  ServerEvent,
  StatusUpdate,
} from './protocol.js';
