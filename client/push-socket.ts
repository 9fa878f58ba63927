import WebSocket from "ws";

import { toError } from "./errors";

export interface PushSocketHandlers {
  readonly onOpen: () => void;
  readonly onMessage: (data: string) => void;
  readonly onError: (error: Error) => void;
  readonly onClose: (code: number, reason: string) => void;
}

export interface PushSocket {
  readonly close: () => void;
}

/** Opens a socket to `url` and reports its lifecycle through `handlers`. */
export type PushSocketFactory = (url: string, handlers: PushSocketHandlers) => PushSocket;

const decodeFrame = (data: WebSocket.RawData): string => {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf8");
  }
  return data.toString("utf8");
};

export const createWebSocketFactory =
  (userAgent: string): PushSocketFactory =>
  (url, handlers) => {
    const socket = new WebSocket(url, { headers: { "User-Agent": userAgent } });
    // Closing a socket that is still connecting makes ws emit an error too.
    let closeRequested = false;

    socket.on("open", () => {
      handlers.onOpen();
    });
    socket.on("message", (data, isBinary) => {
      if (isBinary) {
        handlers.onError(new Error("Push channel received an unexpected binary frame."));
        return;
      }
      handlers.onMessage(decodeFrame(data));
    });
    socket.on("error", (error) => {
      if (closeRequested) {
        return;
      }
      handlers.onError(toError(error));
    });
    socket.on("close", (code, reason) => {
      socket.removeAllListeners();
      handlers.onClose(code, reason.toString("utf8"));
    });

    return {
      close: () => {
        if (socket.readyState === WebSocket.CLOSED || socket.readyState === WebSocket.CLOSING) {
          return;
        }
        closeRequested = true;
        socket.close();
      },
    };
  };
