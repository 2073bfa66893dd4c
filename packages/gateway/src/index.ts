/**
 * @citeline/gateway
 *
 * WebSocket and HTTP server for the research engine: one session per
 * connection, `chat` and `clear` frames in, turn events out.
 */

// Main exports
export { ResearchGateway, createResearchGateway, type GatewayConfig, type GatewayEvents } from "./gateway.js";
export { SessionManager, type SessionSummary } from "./session-manager.js";
export { ConnectionHandler } from "./connection-handler.js";
export { HttpRoutes, type HttpRoutesOptions } from "./http-routes.js";

// Transport layer
export {
  type Transport,
  type TransportClient,
  type TransportEvents,
  BaseTransport,
} from "./transport.js";
export { WSTransport, createWSTransport, type WSTransportConfig } from "./ws-transport.js";

// Configuration
export { GatewayEnvSchema, EnvError, loadEnv, parseEnv, toResearchConfig, type GatewayEnv } from "./env.js";
