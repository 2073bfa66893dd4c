/**
 * Gateway Transport Interface
 *
 * Abstracts the socket layer from the research connection logic. A transport
 * accepts clients, hands their raw frames to the gateway and delivers server
 * events back with write acknowledgement, so the producer of those events can
 * wait for each write before generating the next.
 */

import type { ServerEvent } from "@citeline/shared";

// ============================================================================
// Transport Interface
// ============================================================================

/**
 * A connected client from the transport's perspective.
 */
export interface TransportClient {
  /** Unique client identifier */
  readonly id: string;

  readonly connectedAt: Date;

  /**
   * Send an event. Resolves once the frame has been written to the socket.
   *
   * @throws AbortError when the connection is already closed
   */
  send(event: ServerEvent): Promise<void>;

  /** Close the connection */
  close(code?: number, reason?: string): void;

  /** Check if connected */
  readonly isConnected: boolean;
}

/**
 * Events emitted by a transport.
 */
export interface TransportEvents {
  /** Client connected */
  connection: (client: TransportClient) => void;

  /** Client disconnected */
  disconnect: (clientId: string, reason?: string) => void;

  /** Raw text frame received from a client */
  message: (client: TransportClient, data: string) => void;

  /** Transport error */
  error: (error: Error) => void;
}

/**
 * Transport interface.
 */
export interface Transport {
  /** Start accepting connections */
  start(): Promise<void>;

  /** Close every client and stop accepting connections */
  stop(): Promise<void>;

  /** Register event handlers */
  on<K extends keyof TransportEvents>(event: K, handler: TransportEvents[K]): void;

  /** Get a client by ID */
  getClient(id: string): TransportClient | undefined;

  /** Get all connected clients */
  getClients(): TransportClient[];

  /** Number of connected clients */
  readonly clientCount: number;
}

// ============================================================================
// Base Transport Implementation (shared logic)
// ============================================================================

/**
 * Base class with shared transport functionality.
 */
export abstract class BaseTransport implements Transport {
  protected clients = new Map<string, TransportClient>();
  protected handlers: Partial<TransportEvents> = {};

  abstract start(): Promise<void>;
  abstract stop(): Promise<void>;

  on<K extends keyof TransportEvents>(event: K, handler: TransportEvents[K]): void {
    this.handlers[event] = handler;
  }

  getClient(id: string): TransportClient | undefined {
    return this.clients.get(id);
  }

  getClients(): TransportClient[] {
    return Array.from(this.clients.values());
  }

  get clientCount(): number {
    return this.clients.size;
  }
}
