// worldcore/combat/CombatSession.ts
//
// Shared per-room fight state. Initiative is rolled once at creation and
// frozen; anyone who joins later is appended behind it, in join order.

import type { CombatModifier, DamageType, ManeuverDef, ReactionTrigger } from "../shared/ContentTypes";
import type { ScheduledTask } from "../core/TaskScheduler";
import type { CombatStateTag } from "./Combatant";
import type { HitOutcome } from "./HitResolver";

export type RoundPhase = "action" | "reaction" | "resolution" | "summary";

export type PrimaryAction =
  | { kind: "attack"; targetId: string }
  | { kind: "maneuver"; maneuver: ManeuverDef; targetId: string }
  | { kind: "support"; maneuver: ManeuverDef; targetId: string }
  | { kind: "disengage" };

export interface PendingDisengage {
  attemptedAt: number; // world ms
  previousTargetId: string | null;
  timeout: ScheduledTask | null;
}

export interface ParticipantState {
  id: string;
  state: CombatStateTag;
  /** modifier -> last round it applies to */
  modifiers: Map<CombatModifier, number>;
  primaryUsed: boolean;
  minorUsed: boolean;
  reactionsUsed: number;
  readiedReaction: ManeuverDef | null;
  joinedRound: number;
  pendingDisengage: PendingDisengage | null;
}

export interface QueuedHit {
  attackerId: string;
  targetId: string;
  raw: number;
  damageType: DamageType;
  outcome: Exclude<HitOutcome, "miss">;
  label: string;
}

export interface ReactionTriggerEvent {
  trigger: ReactionTrigger;
  reactorId: string;
  againstId: string;
}

export interface InitiativeRoll {
  id: string;
  roll: number;
}

export class CombatSession {
  readonly initiative: readonly string[];
  private readonly lateJoiners: string[] = [];
  readonly participants = new Map<string, ParticipantState>();

  round = 1;
  phase: RoundPhase = "action";
  roundStartedAt: number;

  queuedHits: QueuedHit[] = [];
  triggers: ReactionTriggerEvent[] = [];
  reactionsThisRound = 0;
  /** Status lines for this round's summary. */
  notable: string[] = [];

  constructor(
    readonly roomId: string,
    rolls: readonly InitiativeRoll[],
    readonly createdAt: number,
  ) {
    const ordered = [...rolls].sort((a, b) => b.roll - a.roll || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    this.initiative = Object.freeze(ordered.map((r) => r.id));
    this.roundStartedAt = createdAt;
    for (const r of ordered) this.participants.set(r.id, newParticipant(r.id, 1));
  }

  /** Initiative order then late joiners, skipping anyone who has left. */
  actionQueue(): string[] {
    return [...this.initiative, ...this.lateJoiners].filter((id) => this.participants.has(id));
  }

  queueIndex(id: string): number {
    const idx = this.actionQueue().indexOf(id);
    return idx === -1 ? Number.MAX_SAFE_INTEGER : idx;
  }

  get(id: string): ParticipantState | undefined {
    return this.participants.get(id);
  }

  has(id: string): boolean {
    return this.participants.has(id);
  }

  /** Adds a late joiner behind everyone already queued. Returns the existing state if present. */
  join(id: string): ParticipantState {
    const existing = this.participants.get(id);
    if (existing) return existing;
    const p = newParticipant(id, this.round);
    this.participants.set(id, p);
    if (!this.initiative.includes(id) && !this.lateJoiners.includes(id)) {
      this.lateJoiners.push(id);
    }
    return p;
  }

  leave(id: string): ParticipantState | undefined {
    const p = this.participants.get(id);
    this.participants.delete(id);
    return p;
  }

  /** Participants whose primary action the round waits for. */
  acting(): ParticipantState[] {
    return this.actionQueue()
      .map((id) => this.participants.get(id))
      .filter((p): p is ParticipantState => !!p && p.state !== "Observing");
  }

  /** Participants trading blows; a session with none left is over. */
  fighting(): ParticipantState[] {
    return [...this.participants.values()].filter((p) => p.state === "Engaged" || p.state === "Disengaging");
  }

  everyoneActed(): boolean {
    const acting = this.acting();
    return acting.length > 0 && acting.every((p) => p.primaryUsed);
  }

  hasModifier(id: string, mod: CombatModifier): boolean {
    return this.participants.get(id)?.modifiers.has(mod) ?? false;
  }

  modifiersOf(id: string): ReadonlySet<CombatModifier> {
    return new Set(this.participants.get(id)?.modifiers.keys() ?? []);
  }

  /** Apply for `rounds` rounds including the current one. */
  addModifier(id: string, mod: CombatModifier, rounds: number): void {
    const p = this.participants.get(id);
    if (!p) return;
    const until = this.round + Math.max(1, rounds) - 1;
    p.modifiers.set(mod, Math.max(p.modifiers.get(mod) ?? 0, until));
  }

  /** Drops modifiers whose last round has passed; returns (id, modifier) pairs dropped. */
  expireModifiers(): Array<[string, CombatModifier]> {
    const dropped: Array<[string, CombatModifier]> = [];
    for (const p of this.participants.values()) {
      for (const [mod, until] of p.modifiers) {
        if (until <= this.round) {
          p.modifiers.delete(mod);
          dropped.push([p.id, mod]);
        }
      }
    }
    return dropped;
  }

  beginNextRound(now: number): void {
    this.round++;
    this.phase = "action";
    this.roundStartedAt = now;
    this.queuedHits = [];
    this.triggers = [];
    this.reactionsThisRound = 0;
    this.notable = [];
    for (const p of this.participants.values()) {
      p.primaryUsed = false;
      p.minorUsed = false;
      p.reactionsUsed = 0;
    }
  }
}

function newParticipant(id: string, round: number): ParticipantState {
  return {
    id,
    state: "Observing",
    modifiers: new Map(),
    primaryUsed: false,
    minorUsed: false,
    reactionsUsed: 0,
    readiedReaction: null,
    joinedRound: round,
    pendingDisengage: null,
  };
}
