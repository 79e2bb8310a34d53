/**
 * MCP Transport Types
 *
 * A transport moves whole envelopes. Framing (newline-delimited JSON on a
 * pipe, one text frame per message on a socket) stays inside the
 * implementation.
 */

import type { MCPTransportKind } from '../../../shared/types/mcp';
import type { DecodeResult, MCPMessage } from '../protocol/envelope';

export interface MCPTransport {
  readonly type: MCPTransportKind;
  readonly isConnected: boolean;

  /**
   * Open the underlying channel. Rejects when it cannot be opened.
   */
  connect(): Promise<void>;

  /**
   * Send one envelope. Rejects with MCPTransportError once the peer is gone.
   */
  send(message: MCPMessage): Promise<void>;

  /**
   * Received frames in arrival order, decoded. The sequence ends when the
   * peer goes away or close() is called, and can be consumed only once.
   */
  receive(): AsyncIterable<DecodeResult>;

  close(): Promise<void>;
}
