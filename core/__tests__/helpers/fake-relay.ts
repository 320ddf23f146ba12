import { WebSocketServer, type WebSocket } from "ws";

export type FakeRelayMode =
  | { kind: "accept" }
  | { kind: "reject"; reason: string }
  | { kind: "silent" }
  | { kind: "close" }
  /** Sends garbage and an OK for another id before the real OK. */
  | { kind: "noisy" };

export interface FakeRelay {
  url: string;
  /** Every frame clients sent, parsed. */
  received: unknown[][];
  stop(): Promise<void>;
}

function parse(text: string): unknown[] | null {
  try {
    const value: unknown = JSON.parse(text);
    return Array.isArray(value) ? value : null;
  } catch {
    return null;
  }
}

function eventId(frame: unknown[]): string {
  const event: unknown = frame[1];
  if (typeof event === "object" && event !== null && "id" in event && typeof event.id === "string") {
    return event.id;
  }
  return "";
}

function handle(socket: WebSocket, frame: unknown[], mode: FakeRelayMode): void {
  if (frame[0] === "REQ") {
    socket.send(JSON.stringify(["EOSE", frame[1]]));
    return;
  }
  if (frame[0] !== "EVENT") return;

  const id = eventId(frame);
  switch (mode.kind) {
    case "accept":
      socket.send(JSON.stringify(["OK", id, true, ""]));
      break;
    case "reject":
      socket.send(JSON.stringify(["OK", id, false, mode.reason]));
      break;
    case "close":
      socket.close();
      break;
    case "noisy":
      socket.send("not json");
      socket.send(JSON.stringify(["NOTICE", "hello"]));
      socket.send(JSON.stringify(["OK", "f".repeat(64), false, "blocked: not you"]));
      socket.send(JSON.stringify(["OK", id, true, ""]));
      break;
    case "silent":
      break;
  }
}

/** In-process NIP-01 relay on a random local port. */
export function startFakeRelay(mode: FakeRelayMode): Promise<FakeRelay> {
  return new Promise((resolve, reject) => {
    const server = new WebSocketServer({ host: "127.0.0.1", port: 0 });
    const received: unknown[][] = [];

    server.on("connection", (socket) => {
      socket.on("message", (data) => {
        const frame = parse(data.toString());
        if (!frame) return;
        received.push(frame);
        handle(socket, frame, mode);
      });
    });

    server.once("error", reject);
    server.once("listening", () => {
      const address = server.address();
      if (typeof address !== "object" || address === null) {
        reject(new Error("Fake relay has no TCP address"));
        return;
      }
      resolve({
        url: `ws://127.0.0.1:${address.port}`,
        received,
        stop: () =>
          new Promise<void>((done, fail) => {
            for (const client of server.clients) client.terminate();
            server.close((err) => (err ? fail(err) : done()));
          }),
      });
    });
  });
}

/** Nothing listens on port 1. */
export const UNREACHABLE_RELAY = "ws://127.0.0.1:1";
