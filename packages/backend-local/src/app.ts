import { Hono } from "hono";
import type { Context, Next } from "hono";

import {
  EliminatePlayer,
  JoinMatch,
  LeaveMatch,
  MatchCommandInputError,
  PlayerNotFoundError,
  SelectMode,
  type Command,
  type CommandContext,
  type InMemoryPlayerWorld,
  type Logger,
  type MatchCoordinator,
  type Position,
} from "./core.js";

type DispatchCommand = (command: Command, context: CommandContext) => Promise<void>;

/** Read side of the coordinator exposed over HTTP. */
export type MatchView = Pick<
  MatchCoordinator,
  "getSnapshot" | "getZoneState" | "getTeams" | "isConnected" | "isAlive"
>;

export interface CreateBackendAppOptions {
  readonly port: number;
  readonly match: MatchView;
  readonly world: InMemoryPlayerWorld;
  readonly logger: Logger;
  readonly createContext: () => CommandContext;
  readonly dispatch: DispatchCommand;
}

export function createBackendApp({
  port,
  match,
  world,
  logger,
  createContext,
  dispatch,
}: CreateBackendAppOptions): Hono {
  const app = new Hono();

  const run = async (c: Context, build: () => Command): Promise<Response> => {
    let command: Command | undefined;
    try {
      command = build();
      await dispatch(command, createContext());
      return c.json({ ok: true });
    } catch (error) {
      logger.warn?.("Command rejected", { type: command?.type, error });
      if (error instanceof MatchCommandInputError) {
        return c.json({ error: error.message, issues: error.issues }, 400);
      }
      if (error instanceof PlayerNotFoundError) {
        return c.json({ error: error.message }, 404);
      }
      return c.json({ error: getErrorMessage(error) }, 500);
    }
  };

  app.use("/api/*", async (c: Context, next: Next): Promise<Response> => {
    c.header("Access-Control-Allow-Origin", "*");
    c.header("Access-Control-Allow-Headers", "Content-Type");
    c.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (c.req.method === "OPTIONS") {
      return c.json({ ok: true });
    }
    await next();
    return c.res;
  });

  app.get("/api/health", (c: Context) =>
    c.json({ ok: true, timestamp: Date.now(), config: { port } }),
  );

  app.get("/api/match", (c: Context) => c.json(match.getSnapshot()));

  app.get("/api/zone", (c: Context) => {
    const zone = match.getZoneState();
    if (!zone) {
      return c.json({ error: "Zone is not configured" }, 404);
    }
    return c.json(zone);
  });

  app.get("/api/teams", (c: Context) => c.json(Object.fromEntries(match.getTeams())));

  app.post("/api/mode", async (c: Context) => {
    const body = await readBody(c);
    const mode = body?.["mode"];
    if (typeof mode !== "string") {
      return c.json({ error: "mode is required" }, 400);
    }
    return run(c, () => new SelectMode(mode, Date.now()));
  });

  app.post("/api/players/:id/join", (c: Context) =>
    run(c, () => new JoinMatch(playerIdParam(c), Date.now())),
  );

  app.post("/api/players/:id/leave", async (c: Context) => {
    const playerId = playerIdParam(c);
    const response = await run(c, () => new LeaveMatch(playerId, Date.now()));
    if (response.ok) {
      world.forget(playerId);
    }
    return response;
  });

  app.post("/api/players/:id/eliminate", async (c: Context) => {
    const playerId = playerIdParam(c);
    const body = await readBody(c);
    const killerId = body?.["killerId"];
    if (killerId !== undefined && typeof killerId !== "string") {
      return c.json({ error: "killerId must be a string" }, 400);
    }
    return run(c, () => new EliminatePlayer(playerId, Date.now(), killerId));
  });

  app.post("/api/players/:id/position", async (c: Context) => {
    const playerId = playerIdParam(c);
    if (!match.isConnected(playerId)) {
      return c.json({ error: `Player not found: ${playerId}` }, 404);
    }

    const position = toPosition(await readBody(c));
    if (!position) {
      return c.json({ error: "x, y and z must be finite numbers" }, 400);
    }

    world.reportPosition(playerId, position);
    return c.json({ ok: true });
  });

  app.get("/api/players/:id", (c: Context) => {
    const playerId = playerIdParam(c);
    if (!match.isConnected(playerId)) {
      return c.json({ error: `Player not found: ${playerId}` }, 404);
    }

    const body = world.getBody(playerId);
    return c.json({
      id: playerId,
      alive: match.isAlive(playerId),
      health: body?.health ?? null,
      position: body?.position ?? null,
    });
  });

  return app;
}

function playerIdParam(c: Context): string {
  return c.req.param("id") ?? "";
}

async function readBody(c: Context): Promise<Record<string, unknown> | null> {
  const body: unknown = await c.req.json().catch(() => null);
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    return null;
  }
  return Object.fromEntries(Object.entries(body));
}

function toPosition(body: Record<string, unknown> | null): Position | undefined {
  const x = body?.["x"];
  const y = body?.["y"];
  const z = body?.["z"];
  if (!isFiniteNumber(x) || !isFiniteNumber(y) || !isFiniteNumber(z)) {
    return undefined;
  }
  return { x, y, z };
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return "Unknown error";
}
