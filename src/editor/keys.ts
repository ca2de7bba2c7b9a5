import type { KeyInput } from "./state.js";

/** Subset of the key object neo-blessed passes to keypress handlers. */
export type BlessedKey = {
  name?: string;
  full?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
};

const NAME_ALIASES: Record<string, string> = {
  linefeed: "enter",
  esc: "escape",
};

function isPrintable(ch: string): boolean {
  if ([...ch].length !== 1) return false;
  const code = ch.codePointAt(0) ?? 0;
  return code >= 0x20 && code !== 0x7f;
}

/**
 * Normalise a neo-blessed keypress into a KeyInput. Printable characters are
 * keyed by the character itself ("G", "$", " "), everything else by name.
 * With ctrl held the key is the bare letter ("r" for ctrl-r).
 *
 * neo-blessed reports a carriage return twice, first as `enter` and then as
 * `return`. The second event comes back with an empty key so callers drop it.
 */
export function fromBlessedKey(
  ch: string | undefined,
  key: BlessedKey | undefined,
): KeyInput {
  const ctrl = key?.ctrl ?? false;
  const meta = key?.meta ?? false;
  const rawName = key?.name ?? "";
  if (rawName === "return") return { key: "", ctrl, meta };
  const name = NAME_ALIASES[rawName] ?? rawName;

  if (ctrl) return { key: name, ctrl, meta };
  if (ch !== undefined && isPrintable(ch)) return { key: ch, ctrl, meta };
  return { key: name, ctrl, meta };
}

export function keyOf(
  key: string,
  mods: Partial<Pick<KeyInput, "ctrl" | "meta">> = {},
): KeyInput {
  return { key, ctrl: mods.ctrl ?? false, meta: mods.meta ?? false };
}

export function sameKey(a: KeyInput | null, b: KeyInput): boolean {
  return (
    a !== null && a.key === b.key && a.ctrl === b.ctrl && a.meta === b.meta
  );
}
