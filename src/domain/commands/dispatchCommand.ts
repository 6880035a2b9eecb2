import type { CommandContext, Command } from "./Command.js";

/** Runs a command against the match, logging its outcome. Failures are rethrown to the caller. */
export async function dispatchCommand(
  command: Command,
  ctx: CommandContext,
): Promise<void> {
  const started = Date.now();
  const phase = ctx.match.getPhase();

  try {
    ctx.logger?.info?.(`[CMD] ${command.type}`, { command, phase });
    await command.execute(ctx);
    ctx.logger?.info?.(`[CMD OK] ${command.type}`, {
      ms: Date.now() - started,
    });
  } catch (error) {
    ctx.logger?.error?.(`[CMD ERR] ${command.type}`, {
      phase,
      ms: Date.now() - started,
      error,
    });
    throw error;
  }
}
