import { serve } from "@hono/node-server";
import { createNodeWebSocket } from "@hono/node-ws";
import type { Context } from "hono";
import type { WSContext } from "hono/ws";
import type { AddressInfo } from "node:net";
import type { WebSocket } from "ws";

import { RealScheduler } from "./adapters/RealScheduler.js";
import { WebSocketBus } from "./adapters/WebSocketBus.js";
import { createBackendApp } from "./app.js";
import { loadServerConfig } from "./config.js";
import {
  EliminatePlayer,
  InMemoryMap,
  InMemoryPlayerWorld,
  MATCH_CHANNEL,
  MatchCoordinator,
  Roster,
  ZoneController,
  dispatchCommand,
  effectiveZoneConfig,
  playerChannel,
} from "./core.js";
import type { CommandContext } from "./core.js";
import { createConsoleLogger, withNamespace } from "./logger.js";

export async function startServer(): Promise<void> {
  const logger = createConsoleLogger("backend-local");
  const { port, match: config } = loadServerConfig();

  const scheduler = new RealScheduler({ logger: withNamespace(logger, "scheduler") });
  const bus = new WebSocketBus(logger);
  const roster = new Roster();
  const map = new InMemoryMap();

  let coordinator: MatchCoordinator | undefined;
  const createContext = (): CommandContext => {
    if (!coordinator) {
      throw new Error("Match coordinator is not ready");
    }
    return { match: coordinator, logger };
  };

  const world = new InMemoryPlayerWorld({
    onDowned(playerId) {
      void dispatchCommand(new EliminatePlayer(playerId, Date.now()), createContext()).catch(
        (error: unknown) => {
          logger.error("Failed to eliminate downed player", { playerId, error });
        },
      );
    },
  });

  const zone = new ZoneController({
    config: effectiveZoneConfig(config),
    scheduler,
    bus,
    roster,
    positions: world,
    damageSink: world,
    spawnPoints: map,
    logger: withNamespace(logger, "zone"),
  });

  coordinator = new MatchCoordinator({
    config,
    scheduler,
    bus,
    roster,
    zone,
    spawnPoints: map,
    placement: world,
    logger: withNamespace(logger, "match"),
  });

  const app = createBackendApp({
    port,
    match: coordinator,
    world,
    logger,
    createContext,
    dispatch: dispatchCommand,
  });

  const { upgradeWebSocket, injectWebSocket } = createNodeWebSocket({ app });

  const subscribe = (channels: readonly string[]) => ({
    onOpen(_event: Event, ws: WSContext<WebSocket>): void {
      const rawSocket = ws.raw;
      if (!rawSocket) {
        logger.warn("WebSocket connection missing raw handle", { channels });
        return;
      }
      bus.subscribe(rawSocket, channels);
    },
  });

  app.get(
    "/ws",
    upgradeWebSocket(() => subscribe([MATCH_CHANNEL])),
  );

  app.get(
    "/ws/:playerId",
    upgradeWebSocket((c: Context) => {
      const playerId = c.req.param("playerId") ?? "";
      return subscribe([MATCH_CHANNEL, playerChannel(playerId)]);
    }),
  );

  coordinator.start();

  const server = serve({ fetch: app.fetch, port }, (info: AddressInfo) => {
    logger.info("Server listening", info);
  });

  injectWebSocket(server);

  const shutdown = (): void => {
    logger.info("Shutting down");
    scheduler.dispose();
    bus.close();
    server.close();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

void startServer().catch((error) => {
  createConsoleLogger("backend-local").error("Failed to start backend", { error });
  process.exit(1);
});
