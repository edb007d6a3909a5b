import type { Request, Response } from "express";

export const SSE_HEARTBEAT_MS = 15_000;

export function wantsSse(req: Request): boolean {
  const accepts = req.headers.accept ?? "";
  const streamFlag = req.query.stream;
  const streamRequested = typeof streamFlag === "string" && streamFlag.toLowerCase() === "true";
  return accepts.includes("text/event-stream") || streamRequested;
}

export function sendSseEvent(res: Response, eventName: string, payload: unknown): void {
  res.write(`event: ${eventName}\n`);
  res.write(`data: ${JSON.stringify(payload)}\n\n`);
}

export interface SseChannel {
  readonly closed: boolean;
  send(eventName: string, payload: unknown): void;
  end(): void;
}

/**
 * Switches the response to an event stream, sends the `ack` event and keeps
 * the connection alive with comment heartbeats. `onClose` runs when the
 * client disconnects before `end()`.
 */
export function openSseChannel(
  req: Request,
  res: Response,
  ack: unknown,
  onClose?: () => void
): SseChannel {
  res.setHeader("Content-Type", "text/event-stream; charset=utf-8");
  res.setHeader("Cache-Control", "no-cache, no-transform");
  res.setHeader("Connection", "keep-alive");
  res.flushHeaders();

  let closed = false;
  let ended = false;
  const heartbeat = setInterval(() => {
    res.write(": heartbeat\n\n");
  }, SSE_HEARTBEAT_MS);

  res.on("close", () => {
    closed = true;
    clearInterval(heartbeat);
    if (!ended) {
      onClose?.();
    }
  });

  sendSseEvent(res, "ack", ack);

  return {
    get closed() {
      return closed;
    },
    send(eventName, payload) {
      if (!closed) {
        sendSseEvent(res, eventName, payload);
      }
    },
    end() {
      ended = true;
      clearInterval(heartbeat);
      if (!closed) {
        res.end();
      }
    }
  };
}
