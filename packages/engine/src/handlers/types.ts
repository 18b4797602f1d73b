import type { TurnErrorCode, TurnOutcome } from "@wayfarer/schemas";
import type { CommandArgs, CommandGrammar, CommandHandler } from "../command-grammar.js";
import type { GameContext } from "../context.js";

export type GameHandler = CommandHandler<GameContext, TurnOutcome>;
export type GameGrammar = CommandGrammar<GameContext, TurnOutcome>;

export const OK: TurnOutcome = { status: "ok" };

export function rejected(code: TurnErrorCode, subject?: string): TurnOutcome {
  return subject === undefined ? { status: "rejected", code } : { status: "rejected", code, subject };
}

/** Read a bound capture or fixed param. Every template that reaches a handler binds what it reads. */
export function arg(args: CommandArgs, name: string): string {
  return args[name] ?? "";
}
