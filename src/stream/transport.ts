// src/stream/transport.ts
// Socket abstraction under the stream connection, with a `ws` implementation

import { WebSocket, type RawData } from "ws";

export interface TransportHandlers {
  onOpen(): void;
  onMessage(data: string): void;
  onClose(code: number, reason: string): void;
  onError(error: Error): void;
}

/**
 * One physical connection. After close() no handler fires again.
 */
export interface TransportSocket {
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export interface Transport {
  connect(url: string, handlers: TransportHandlers): TransportSocket;
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  return Buffer.from(data).toString("utf8");
}

/**
 * Transport over the `ws` package
 */
export class WebSocketTransport implements Transport {
  connect(url: string, handlers: TransportHandlers): TransportSocket {
    const ws = new WebSocket(url);
    let detached = false;

    ws.on("open", () => {
      if (!detached) handlers.onOpen();
    });
    ws.on("message", (data) => {
      if (!detached) handlers.onMessage(rawDataToString(data));
    });
    ws.on("close", (code, reason) => {
      if (!detached) handlers.onClose(code, reason.toString("utf8"));
    });
    // Stays registered after detach: an unhandled 'error' would crash the process
    ws.on("error", (error) => {
      if (!detached) handlers.onError(error);
    });

    return {
      send(data: string): void {
        if (ws.readyState !== WebSocket.OPEN) {
          throw new Error(`WebSocket is not open (readyState=${ws.readyState})`);
        }
        ws.send(data);
      },
      close(code = 1000, reason = ""): void {
        if (detached) return;
        detached = true;
        if (ws.readyState === WebSocket.CONNECTING) {
          ws.terminate();
        } else if (ws.readyState === WebSocket.OPEN) {
          ws.close(code, reason);
        }
      },
    };
  }
}
