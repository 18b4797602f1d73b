import { TemplateError } from "@wayfarer/schemas";
import { tokenize } from "./tokenizer.js";

/**
 * Command grammar: templates made of literal words and ALL-CAPS placeholders,
 * matched against input by linear scan in registration order. The first
 * template that binds completely wins.
 *
 *   take ITEM             → { item: "brass key" }  for "take brass key"
 *   use ITEM on TARGET    → split at the leftmost "on"
 *   north                 → fixed params { direction: "north" }
 */

export type TemplateToken =
  | { kind: "literal"; value: string }
  | { kind: "placeholder"; name: string };

/** Bound captures (lower-cased placeholder names) merged with the template's fixed params. */
export type CommandArgs = Readonly<Record<string, string>>;

export type CommandHandler<C, R> = (ctx: C, args: CommandArgs) => R;

export interface CompiledTemplate<C, R> {
  readonly source: string;
  readonly tokens: readonly TemplateToken[];
  readonly handler: CommandHandler<C, R>;
  readonly params: CommandArgs;
}

export interface CommandMatch<C, R> {
  template: CompiledTemplate<C, R>;
  args: CommandArgs;
}

export type DispatchResult<C, R> =
  | { matched: true; template: CompiledTemplate<C, R>; args: CommandArgs; result: R }
  | { matched: false };

const PLACEHOLDER_RE = /^[A-Z][A-Z0-9_]*$/;

export function compileTemplate(source: string): TemplateToken[] {
  const words = source.trim().split(/\s+/).filter(Boolean);
  if (words.length === 0) {
    throw new TemplateError("Command template is empty");
  }
  const tokens: TemplateToken[] = words.map((word) =>
    PLACEHOLDER_RE.test(word)
      ? { kind: "placeholder", name: word.toLowerCase() }
      : { kind: "literal", value: word.toLowerCase() }
  );
  for (let i = 1; i < tokens.length; i++) {
    if (tokens[i]?.kind === "placeholder" && tokens[i - 1]?.kind === "placeholder") {
      throw new TemplateError(`Template "${source}" has adjacent placeholders`, { template: source });
    }
  }
  const names = tokens.flatMap((t) => (t.kind === "placeholder" ? [t.name] : []));
  if (new Set(names).size !== names.length) {
    throw new TemplateError(`Template "${source}" repeats a placeholder`, { template: source });
  }
  return tokens;
}

/**
 * Bind input tokens against a compiled template. A placeholder takes every
 * token up to the leftmost occurrence of the next literal (or the end of
 * input) and must take at least one.
 */
export function bindTokens(tokens: readonly TemplateToken[], input: readonly string[]): Record<string, string> | null {
  const captures: Record<string, string> = {};
  let pos = 0;

  for (let k = 0; k < tokens.length; k++) {
    const token = tokens[k];
    if (!token) return null;

    if (token.kind === "literal") {
      if (input[pos] !== token.value) return null;
      pos++;
      continue;
    }

    const next = tokens[k + 1];
    let end: number;
    if (next === undefined) {
      end = input.length;
    } else if (next.kind === "literal") {
      end = input.indexOf(next.value, pos);
      if (end === -1) return null;
    } else {
      return null;
    }
    if (end <= pos) return null;
    captures[token.name] = input.slice(pos, end).join(" ");
    pos = end;
  }

  return pos === input.length ? captures : null;
}

export class CommandGrammar<C, R> {
  private templates: CompiledTemplate<C, R>[] = [];

  register(source: string, handler: CommandHandler<C, R>, params: Record<string, string> = {}): CompiledTemplate<C, R> {
    const template: CompiledTemplate<C, R> = {
      source: source.trim(),
      tokens: compileTemplate(source),
      handler,
      params: { ...params },
    };
    this.templates.push(template);
    return template;
  }

  /** Register several aliases for one handler, in the order given. */
  registerAll(sources: readonly string[], handler: CommandHandler<C, R>, params: Record<string, string> = {}): void {
    for (const source of sources) this.register(source, handler, params);
  }

  match(line: string): CommandMatch<C, R> | null {
    const input = tokenize(line);
    if (input.length === 0) return null;
    for (const template of this.templates) {
      const captures = bindTokens(template.tokens, input);
      if (captures) {
        return { template, args: { ...template.params, ...captures } };
      }
    }
    return null;
  }

  dispatch(ctx: C, line: string): DispatchResult<C, R> {
    const found = this.match(line);
    if (!found) return { matched: false };
    return { matched: true, template: found.template, args: found.args, result: found.template.handler(ctx, found.args) };
  }

  list(): string[] {
    return this.templates.map((t) => t.source);
  }

  get size(): number {
    return this.templates.length;
  }
}
