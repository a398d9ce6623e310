// worldcore/mud/handles/NearbyHandles.ts
//
// Short handles for things in the same room:
//
//   rat       first thing whose name has a word starting with "rat"
//   rat.2     the second one, in room order
//   cr_k3x... an instance id, exactly
//
// Commands that take a target all resolve through here so "attack rat" and
// "get rat" agree on which rat is first.

import type { EntityInstance } from "../../shared/Entity";

export interface HandleToken {
  base: string;
  idx: number;
}

const ARTICLES = new Set(["a", "an", "the"]);

// Accept "rat", "rat.2", "dock_rat.10"
export function parseHandleToken(token: string): HandleToken | null {
  const t = token.trim().toLowerCase();
  if (!t) return null;
  const m = /^([a-z0-9_' -]+?)(?:\.(\d+))?$/.exec(t);
  if (!m) return null;

  const base = (m[1] ?? "").trim();
  if (!base) return null;

  const idxStr = m[2];
  const idx = idxStr ? Number(idxStr) : 1;
  if (!Number.isFinite(idx) || idx <= 0) return null;
  return { base, idx };
}

/** Lower-case words of a display name, articles dropped. */
export function nameWords(name: string): string[] {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9 ]/g, " ")
    .split(/\s+/)
    .filter((w) => w && !ARTICLES.has(w));
}

export function matchesHandle(e: EntityInstance, base: string): boolean {
  const wanted = nameWords(base.replace(/_/g, " "));
  if (!wanted.length) return false;
  const words = nameWords(e.name);
  // Every word of the handle must prefix some word of the name, in order.
  let from = 0;
  for (const w of wanted) {
    const at = words.findIndex((x, i) => i >= from && x.startsWith(w));
    if (at < 0) return e.templateId === base;
    from = at + 1;
  }
  return true;
}

/**
 * Finds one entity among `candidates` (room order) by id or handle.
 * Returns undefined when nothing matches or the index runs past the matches.
 */
export function resolveHandle<T extends EntityInstance>(candidates: readonly T[], token: string): T | undefined {
  const raw = token.trim();
  if (!raw) return undefined;

  const byId = candidates.find((e) => e.id === raw);
  if (byId) return byId;

  const parsed = parseHandleToken(raw);
  if (!parsed) return undefined;

  let seen = 0;
  for (const e of candidates) {
    if (!matchesHandle(e, parsed.base)) continue;
    seen++;
    if (seen === parsed.idx) return e;
  }
  return undefined;
}
