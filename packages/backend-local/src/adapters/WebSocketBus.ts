/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { WebSocket } from "ws";

import type { BroadcastChannel, Logger, MatchEvent } from "../core.js";

const OPEN = 1;
const GOING_AWAY = 1001;

/**
 * Fans match events out to WebSocket subscribers. A socket may follow several
 * channels (the shared match channel and its own player channel); it is
 * dropped from all of them when it closes.
 */
export class WebSocketBus implements BroadcastChannel {
  #channels: Map<string, Set<WebSocket>> = new Map();
  #subscriptions: Map<WebSocket, readonly string[]> = new Map();
  readonly #logger: Logger | undefined;

  constructor(logger?: Logger) {
    this.#logger = logger;
  }

  async publish(channel: string, event: MatchEvent): Promise<void> {
    const sockets = this.#channels.get(channel);
    if (!sockets || sockets.size === 0) {
      return;
    }

    const message = JSON.stringify({ channel, ...event });
    let delivered = 0;
    for (const socket of sockets) {
      if (socket.readyState !== OPEN) {
        continue;
      }
      try {
        socket.send(message);
        delivered += 1;
      } catch (error) {
        this.#logger?.warn?.("Failed to deliver event", {
          channel,
          type: event.type,
          error,
        });
      }
    }

    this.#logger?.debug?.("Event published", { channel, type: event.type, delivered });
  }

  subscriberCount(channel: string): number {
    return this.#channels.get(channel)?.size ?? 0;
  }

  /** Subscribes `socket` to `channels`. Subscribing an already known socket is ignored. */
  subscribe(socket: WebSocket, channels: readonly string[]): void {
    if (this.#subscriptions.has(socket)) {
      this.#logger?.warn?.("WebSocket already subscribed", { channels });
      return;
    }

    this.#subscriptions.set(socket, [...channels]);
    for (const channel of channels) {
      let sockets = this.#channels.get(channel);
      if (!sockets) {
        sockets = new Set<WebSocket>();
        this.#channels.set(channel, sockets);
      }
      sockets.add(socket);
    }
    this.#logger?.info?.("WebSocket client subscribed", { channels });

    socket.on("close", () => {
      this.#unsubscribe(socket);
      this.#logger?.info?.("WebSocket client disconnected", { channels });
    });

    socket.on("error", (error: Error) => {
      this.#logger?.warn?.("WebSocket client error", { channels, error });
    });
  }

  /** Closes every subscribed socket, e.g. on shutdown. */
  close(reason = "Server shutting down"): void {
    for (const socket of [...this.#subscriptions.keys()]) {
      this.#unsubscribe(socket);
      socket.close(GOING_AWAY, reason);
    }
  }

  #unsubscribe(socket: WebSocket): void {
    const channels = this.#subscriptions.get(socket);
    if (!channels) {
      return;
    }
    this.#subscriptions.delete(socket);

    for (const channel of channels) {
      const sockets = this.#channels.get(channel);
      sockets?.delete(socket);
      if (sockets?.size === 0) {
        this.#channels.delete(channel);
      }
    }
  }
}
