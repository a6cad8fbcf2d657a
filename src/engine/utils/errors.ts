// ─────────────────────────────────────────────
//  Engine error types
//  Rule violations by agents are never errors: predicates and
//  executors report them as `false`. These cover engine misuse.
// ─────────────────────────────────────────────

export class GameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Invalid argument from engine code or setup (negative damage, bad map, negative radius). */
export class IllegalArgumentError extends GameError {}

/** An agent hosted in a worker failed to start or threw during its turn. */
export class AgentFault extends GameError {}

export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}
