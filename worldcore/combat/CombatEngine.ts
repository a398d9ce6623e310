// worldcore/combat/CombatEngine.ts
//
// Round/state-machine layer. Every public method here is synchronous and
// assumes the caller holds the room lock for the room it touches (MudRuntime
// takes it for intents; scheduled work below takes it through RoomLocks).
//
// Round shape: action -> reaction -> resolution -> summary. Primary actions
// arrive from attack tickers and explicit intents in lock order; the round
// closes once every acting participant has spent its primary, when a ticker
// fires for someone who already acted, or when the tick sweep finds it open
// past roundTimeoutSec. Supporters drop back to Observing as a round closes.

import type { RuntimeConfig } from "../config/RuntimeConfig";
import type { EntityManager } from "../core/EntityManager";
import type { RoomLocks } from "../core/RoomLocks";
import type { ScheduledTask, TaskScheduler } from "../core/TaskScheduler";
import type { ContentCatalog, ManeuverDef, RangeBand } from "../shared/ContentTypes";
import type { CombatantInstance } from "../shared/Entity";
import type { EventSink } from "../shared/events";
import { IntentResult, fail, succeed } from "../shared/IntentResult";
import type { WeatherEffect } from "../world/WeatherService";
import { Logger } from "../utils/logger";
import type { RandomFn } from "../utils/Rng";
import { AttackTicker, attackIntervalMs } from "./AttackTicker";
import {
  CombatStateTag,
  FAR_RANGED_ACCURACY_PENALTY,
  asCombatant,
  inReach,
  stepBand,
} from "./Combatant";
import { formatHealLine, formatHitLine, formatMissLine, formatModifierLine, formatRoundSummary } from "./CombatLog";
import { CombatSession, InitiativeRoll, ParticipantState, PrimaryAction } from "./CombatSession";
import type { DeathPipeline } from "./DeathPipeline";
import { clampSkill, resolveHit, rollD100, rollD20 } from "./HitResolver";
import { canAfford, findManeuver, staminaShortfall, tickerDelayMs } from "./Maneuvers";
import { applyArmorMitigation } from "./Mitigation";

const log = Logger.scope("COMBAT");

export type WeatherModifierFn = (roomId: string, effect: WeatherEffect) => number;

export interface CombatEngineDeps {
  entities: EntityManager;
  content: ContentCatalog;
  config: RuntimeConfig;
  events: EventSink;
  scheduler: TaskScheduler;
  locks: RoomLocks;
  deaths: DeathPipeline;
  rng: RandomFn;
  weather?: WeatherModifierFn;
}

interface FleeWindow {
  roomId: string;
  until: number; // world ms
  fromTargetId: string | null;
  /** Who was fighting the fleer when it broke away; they are the ones who may give chase. */
  opponentIds: string[];
  task: ScheduledTask;
}

type TargetCheck = { ok: true; target: CombatantInstance } | { ok: false; result: IntentResult };

export class CombatEngine {
  readonly ticker: AttackTicker;
  private readonly sessions = new Map<string, CombatSession>();
  private readonly fleeing = new Map<string, FleeWindow>();
  /** Linkdead combatants: they never auto-engage. */
  private readonly passive = new Set<string>();

  constructor(private readonly deps: CombatEngineDeps) {
    this.ticker = new AttackTicker(deps.scheduler, (id) => this.inRoomOf(id, () => this.onTickerFire(id)));
  }

  // ---------------------------------------------------------------------------
  // Queries

  now(): number {
    return this.deps.scheduler.now();
  }

  session(roomId: string): CombatSession | undefined {
    return this.sessions.get(roomId);
  }

  listSessionRoomIds(): string[] {
    return [...this.sessions.keys()];
  }

  stateOf(id: string): CombatStateTag {
    const roomId = this.deps.entities.roomOf(id);
    if (!roomId) return "Observing";
    return this.sessions.get(roomId)?.get(id)?.state ?? "Observing";
  }

  isInCombat(id: string): boolean {
    return this.stateOf(id) !== "Observing";
  }

  isFleeing(id: string): boolean {
    const w = this.fleeing.get(id);
    return !!w && w.until > this.now();
  }

  /** Current target: the ticker's, else the recorded engagement. */
  targetOf(id: string): string | undefined {
    return this.ticker.get(id)?.targetId ?? this.deps.entities.getPosition(id)?.engagedTargetId;
  }

  bandOf(id: string): RangeBand {
    return this.deps.entities.getPosition(id)?.rangeBand ?? "engaged";
  }

  // ---------------------------------------------------------------------------
  // Intents (lock held by caller)

  attack(attackerId: string, targetId: string): IntentResult {
    const attacker = this.deps.entities.getCombatant(attackerId);
    if (!attacker) return fail("invalid_target", "You are not in the world.");
    const roomId = this.deps.entities.roomOf(attackerId);
    if (!roomId) return fail("invalid_target", "You are not in the world.");
    if (this.isSafeRoom(roomId)) return fail("blocked", "This is a place of peace. Nobody fights here.");

    const check = this.checkTarget(attacker, targetId, roomId);
    if (!check.ok) return check.result;
    const target = check.target;

    const current = this.ticker.get(attackerId);
    if (current && current.targetId === target.id) {
      return fail("noop", `You are already attacking ${target.name}.`);
    }

    const session = this.sessions.get(roomId);
    const aBand = this.prospectiveBand(session, attacker.id, "far");
    const tBand = this.prospectiveBand(session, target.id, aBand);
    if (!inReach(attacker.attack, aBand, tBand)) {
      return fail("invalid_target", `${target.name} is out of reach. Advance or use a ranged weapon.`);
    }

    this.clearFlee(attackerId);
    const switched = !!current;
    this.engage(attacker, target, roomId);
    return succeed(switched ? `You turn your attacks on ${target.name}.` : `You attack ${target.name}!`);
  }

  useManeuver(actorId: string, maneuverId: string, targetId?: string): IntentResult {
    const found = findManeuver(this.deps.content, maneuverId);
    if (!found.ok) return found.result;
    const maneuver = found.maneuver;

    const actor = this.deps.entities.getCombatant(actorId);
    const roomId = this.deps.entities.roomOf(actorId);
    if (!actor || !roomId) return fail("invalid_target", "You are not in the world.");

    switch (maneuver.kind) {
      case "reaction":
        return this.readyReaction(actor, roomId, maneuver);
      case "support":
        return this.useSupport(actor, roomId, maneuver, targetId ?? actor.id);
      case "strike":
        return this.useStrike(actor, roomId, maneuver, targetId ?? this.targetOf(actorId));
    }
  }

  disengage(actorId: string): IntentResult {
    const actor = this.deps.entities.getCombatant(actorId);
    const roomId = this.deps.entities.roomOf(actorId);
    if (!actor || !roomId) return fail("invalid_target", "You are not in the world.");

    const session = this.sessions.get(roomId);
    const p = session?.get(actorId);
    if (!session || !p || p.state === "Observing") return fail("invalid_action", "You are not fighting anyone.");
    if (p.state === "Disengaging") return fail("noop", "You are already trying to break away.");
    if (session.hasModifier(actorId, "pinned")) return fail("blocked", "You are pinned and cannot break away.");

    return this.submitPrimary(session, actor, { kind: "disengage" });
  }

  joinCombat(actorId: string): IntentResult {
    const actor = this.deps.entities.getCombatant(actorId);
    const roomId = this.deps.entities.roomOf(actorId);
    if (!actor || !roomId) return fail("invalid_target", "You are not in the world.");

    const session = this.sessions.get(roomId);
    if (!session) return fail("invalid_action", "There is no fight here to join.");
    const existing = session.get(actorId);
    if (existing && existing.state !== "Observing") return fail("noop", "You are already fighting.");

    const target = this.firstHostileParticipant(session, actor);
    if (!target) return fail("invalid_target", "There is no one here you can fight.");

    this.ensureParticipant(session, actor, "far");
    if (inReach(actor.attack, this.bandOf(actorId), this.bandOf(target.id))) {
      this.setEngaged(session, actor, target);
      return succeed(`You join the fight against ${target.name}.`);
    }
    this.deps.events.toRoom(roomId, { kind: "notice", text: `${actor.name} joins the fight from a distance.`, roomId }, [actorId]);
    return succeed(`You join the fight at a distance. Advance to close in on ${target.name}.`);
  }

  advance(actorId: string): IntentResult {
    return this.shiftBand(actorId, "in");
  }

  retreat(actorId: string): IntentResult {
    return this.shiftBand(actorId, "out");
  }

  /** Mid-fight, a successful interaction (picking something up) spends the minor action. */
  interact(actorId: string, act: () => IntentResult): IntentResult {
    const roomId = this.deps.entities.roomOf(actorId);
    const p = roomId ? this.sessions.get(roomId)?.get(actorId) : undefined;
    if (p?.minorUsed) return fail("invalid_action", "You have already used your minor action this round.");
    const result = act();
    if (result.ok && p) p.minorUsed = true;
    return result;
  }

  // ---------------------------------------------------------------------------
  // Room membership (lock held by caller)

  /** Leaving the room, dying elsewhere, or being removed: drop out of the room's fight. */
  leaveCombat(id: string): void {
    this.ticker.cancel(id, "left");
    this.clearFlee(id);

    const roomId = this.deps.entities.roomOf(id);
    const session = roomId ? this.sessions.get(roomId) : undefined;
    if (session) {
      const p = session.leave(id);
      if (p?.pendingDisengage) this.deps.scheduler.cancel(p.pendingDisengage.timeout);
    }
    this.deps.entities.setEngagement(id, { rangeBand: null, engagedTargetId: null });

    if (session) {
      this.retargetAttackersOf(session, id);
      this.endIfQuiet(session);
    }
  }

  /** Session dropped: stop swinging, stay where you are, keep others' fight going. */
  disconnect(id: string): void {
    this.passive.add(id);
    this.ticker.cancel(id, "disconnect");
    this.clearFlee(id);
    const roomId = this.deps.entities.roomOf(id);
    const session = roomId ? this.sessions.get(roomId) : undefined;
    const p = session?.get(id);
    if (session && p) {
      if (p.pendingDisengage) this.deps.scheduler.cancel(p.pendingDisengage.timeout);
      p.pendingDisengage = null;
      p.state = "Observing";
      this.endIfQuiet(session);
    }
    this.deps.entities.setEngagement(id, { engagedTargetId: null });
  }

  reconnect(id: string): void {
    this.passive.delete(id);
  }

  /** A pursuer has just been moved into `roomId` after `targetId`. */
  engageFromPursuit(pursuerId: string, targetId: string, roomId: string): void {
    const pursuer = this.deps.entities.getCombatant(pursuerId);
    const target = this.deps.entities.getCombatant(targetId);
    if (!pursuer || !target) return;
    if (this.deps.entities.roomOf(pursuerId) !== roomId || this.deps.entities.roomOf(targetId) !== roomId) return;

    let session = this.sessions.get(roomId);
    if (!session) {
      session = this.createSession(roomId, [target, pursuer]);
    } else {
      this.ensureParticipant(session, target, "engaged");
      this.ensureParticipant(session, pursuer, "near");
    }
    this.deps.entities.setEngagement(pursuerId, { rangeBand: "near" });
    this.deps.events.toRoom(roomId, { kind: "notice", text: `${pursuer.name} follows ${target.name} in!`, roomId });
    this.setEngaged(session, pursuer, target);
  }

  /** Aggressive creatures in the room go for a player who just arrived. */
  aggroOnEntry(roomId: string, playerId: string): void {
    if (this.isSafeRoom(roomId)) return;
    const player = this.deps.entities.getCombatant(playerId);
    if (!player || player.kind !== "player") return;

    for (const c of this.deps.entities.listCombatantsInRoom(roomId)) {
      if (c.kind !== "creature" || !c.behavior.aggressive) continue;
      if (this.stateOf(c.id) !== "Observing" || !asCombatant(c).canAttack(player)) continue;
      this.engage(c, player, roomId);
    }
  }

  /** Tick sweep for one room: close a round left open too long. */
  sweepRoom(roomId: string): void {
    const session = this.sessions.get(roomId);
    if (!session) return;
    if (this.endIfQuiet(session)) return;
    if (this.now() - session.roundStartedAt >= this.deps.config.roundTimeoutSec * 1000) {
      log.child({ roomId }).debug("Round timed out", { round: session.round });
      this.closeRound(session);
      this.closeRoundsIfDone(session);
    }
  }

  // ---------------------------------------------------------------------------
  // Ticker

  private async inRoomOf(id: string, fn: () => void): Promise<void> {
    const roomId = this.deps.entities.roomOf(id);
    if (!roomId) {
      this.ticker.cancel(id, "gone");
      return;
    }
    await this.deps.locks.withRoom(roomId, () => {
      if (this.deps.entities.roomOf(id) !== roomId) return;
      fn();
    });
  }

  /** One autoattack. Lock held. */
  onTickerFire(id: string): void {
    const attacker = this.deps.entities.getCombatant(id);
    const state = this.ticker.get(id);
    if (!attacker || !state) {
      this.ticker.cancel(id, "gone");
      return;
    }
    const roomId = this.deps.entities.roomOf(id);
    const session = roomId ? this.sessions.get(roomId) : undefined;
    if (!session || session.get(id)?.state !== "Engaged") {
      this.ticker.cancel(id, "not engaged");
      return;
    }
    if (session.get(id)?.primaryUsed) {
      // Already acted: this swing opens the next round.
      this.closeRound(session);
      if (this.sessions.get(session.roomId) !== session || session.get(id)?.state !== "Engaged") return;
    }
    const targetId = this.ticker.get(id)?.targetId;
    if (!targetId) return;
    this.submitPrimary(session, attacker, { kind: "attack", targetId });
  }

  // ---------------------------------------------------------------------------
  // Action phase

  private submitPrimary(session: CombatSession, actor: CombatantInstance, action: PrimaryAction): IntentResult {
    const p = session.get(actor.id);
    if (!p) return fail("invalid_action", "You are not in this fight.");

    if (p.primaryUsed) return fail("invalid_action", "You have already acted this round.");

    const result = this.executePrimary(session, actor, action);
    this.closeRoundsIfDone(session);
    return result;
  }

  private executePrimary(session: CombatSession, actor: CombatantInstance, action: PrimaryAction): IntentResult {
    switch (action.kind) {
      case "attack":
        return this.executeStrike(session, actor, action.targetId, null);
      case "maneuver":
        return this.executeStrike(session, actor, action.targetId, action.maneuver);
      case "support":
        return this.executeSupport(session, actor, action.targetId, action.maneuver);
      case "disengage":
        return this.executeDisengage(session, actor);
    }
  }

  private executeStrike(
    session: CombatSession,
    actor: CombatantInstance,
    targetId: string,
    maneuver: ManeuverDef | null,
  ): IntentResult {
    const p = session.get(actor.id);
    if (!p) return fail("invalid_action", "You are not in this fight.");

    const check = this.checkTarget(actor, targetId, session.roomId);
    if (!check.ok) {
      if (!maneuver) this.handleLostTarget(session, actor);
      return check.result;
    }
    const target = check.target;

    if (!inReach(actor.attack, this.bandOf(actor.id), this.bandOf(target.id))) {
      if (!maneuver && actor.kind !== "player") {
        this.closeDistance(session, actor, target);
        p.primaryUsed = true;
        return succeed("closing");
      }
      if (!maneuver) this.handleLostTarget(session, actor);
      return fail("invalid_target", `${target.name} is out of reach.`);
    }

    if (maneuver) {
      if (!asCombatant(actor).spendStamina(maneuver.staminaCost)) return staminaShortfall(actor, maneuver);
      this.ticker.addDelay(actor.id, tickerDelayMs(maneuver));
    }

    p.primaryUsed = true;
    this.rollAndQueue(session, actor, target, maneuver, false);
    return succeed(maneuver ? `You use ${maneuver.name} on ${target.name}.` : `You attack ${target.name}.`);
  }

  private executeSupport(
    session: CombatSession,
    actor: CombatantInstance,
    targetId: string,
    maneuver: ManeuverDef,
  ): IntentResult {
    const p = session.get(actor.id);
    if (!p) return fail("invalid_action", "You are not in this fight.");

    const target = this.deps.entities.getCombatant(targetId);
    if (!target || this.deps.entities.roomOf(targetId) !== session.roomId || target.hp <= 0) {
      return fail("invalid_target", "They are not here.");
    }
    if (asCombatant(actor).canAttack(target)) return fail("invalid_target", `${target.name} is not an ally.`);
    if (!asCombatant(actor).spendStamina(maneuver.staminaCost)) return staminaShortfall(actor, maneuver);

    // A fighter keeps swinging; the maneuver only pushes the next swing back.
    if (p.state === "Observing") p.state = "Supporting";
    else this.ticker.addDelay(actor.id, tickerDelayMs(maneuver));
    p.primaryUsed = true;

    const amount = Math.max(0, maneuver.heal ?? 0);
    if (amount > 0) {
      const before = target.hp;
      const after = asCombatant(target).heal(amount);
      this.deps.events.toRoom(session.roomId, {
        kind: "notice",
        text: formatHealLine({
          healerName: actor.name,
          targetName: target.name,
          label: maneuver.name,
          amount: after - before,
          hpAfter: after,
          maxHp: target.maxHp,
        }),
        roomId: session.roomId,
      });
    }
    this.applyManeuverModifier(session, actor, target, maneuver);
    return succeed(`You use ${maneuver.name} on ${target.id === actor.id ? "yourself" : target.name}.`);
  }

  private executeDisengage(session: CombatSession, actor: CombatantInstance): IntentResult {
    const p = session.get(actor.id);
    if (!p || p.state === "Observing") return fail("invalid_action", "You are not fighting anyone.");
    if (p.state === "Disengaging") return fail("noop", "You are already trying to break away.");
    if (session.hasModifier(actor.id, "pinned")) return fail("blocked", "You are pinned and cannot break away.");

    const roomId = session.roomId;
    const previousTargetId = this.targetOf(actor.id) ?? null;
    this.ticker.cancel(actor.id, "disengage");

    p.state = "Disengaging";
    p.primaryUsed = true;
    p.pendingDisengage = {
      attemptedAt: this.now(),
      previousTargetId,
      timeout: this.deps.scheduler.after(this.deps.config.disengageTimeoutSec * 1000, `disengage:${actor.id}`, () =>
        this.deps.locks.withRoom(roomId, () => this.expireDisengage(roomId, actor.id)),
      ),
    };

    for (const opp of this.opponentsOf(session, actor)) {
      session.triggers.push({ trigger: "disengage", reactorId: opp.id, againstId: actor.id });
    }

    this.deps.events.toEntity(actor.id, { kind: "state", text: "You look for an opening to break away.", roomId });
    this.deps.events.toRoom(roomId, { kind: "notice", text: `${actor.name} tries to break away.`, roomId }, [actor.id]);
    return succeed("You try to break away.");
  }

  private useStrike(
    actor: CombatantInstance,
    roomId: string,
    maneuver: ManeuverDef,
    targetId: string | undefined,
  ): IntentResult {
    if (!targetId) return fail("invalid_target", `Use ${maneuver.name} on whom?`);
    if (this.isSafeRoom(roomId)) return fail("blocked", "This is a place of peace. Nobody fights here.");

    const check = this.checkTarget(actor, targetId, roomId);
    if (!check.ok) return check.result;
    const target = check.target;

    const existing = this.sessions.get(roomId);
    const aBand = this.prospectiveBand(existing, actor.id, "far");
    const tBand = this.prospectiveBand(existing, target.id, aBand);
    if (!inReach(actor.attack, aBand, tBand)) return fail("invalid_target", `${target.name} is out of reach.`);
    if (!canAfford(actor, maneuver)) return staminaShortfall(actor, maneuver);

    this.clearFlee(actor.id);
    if (!this.ticker.isActive(actor.id)) this.engage(actor, target, roomId);
    const session = this.sessions.get(roomId);
    if (!session) return fail("invalid_action", "There is no fight here.");
    return this.submitPrimary(session, actor, { kind: "maneuver", maneuver, targetId: target.id });
  }

  private useSupport(actor: CombatantInstance, roomId: string, maneuver: ManeuverDef, targetId: string): IntentResult {
    const session = this.sessions.get(roomId);
    if (!session) return fail("invalid_action", "There is no fight here.");
    if (!canAfford(actor, maneuver)) return staminaShortfall(actor, maneuver);
    this.ensureParticipant(session, actor, "far");
    return this.submitPrimary(session, actor, { kind: "support", maneuver, targetId });
  }

  /** Readying a reaction is a minor action. */
  private readyReaction(actor: CombatantInstance, roomId: string, maneuver: ManeuverDef): IntentResult {
    const session = this.sessions.get(roomId);
    const p = session?.get(actor.id);
    if (!session || !p) return fail("invalid_action", "You are not in a fight.");
    if (p.minorUsed) return fail("invalid_action", "You have already used your minor action this round.");
    if (!canAfford(actor, maneuver)) return staminaShortfall(actor, maneuver);
    if (p.readiedReaction?.id === maneuver.id) return fail("noop", `You already have ${maneuver.name} ready.`);

    p.readiedReaction = maneuver;
    p.minorUsed = true;
    return succeed(`You ready ${maneuver.name}.`);
  }

  private shiftBand(actorId: string, dir: "in" | "out"): IntentResult {
    const roomId = this.deps.entities.roomOf(actorId);
    const actor = this.deps.entities.getCombatant(actorId);
    const session = roomId ? this.sessions.get(roomId) : undefined;
    const p = session?.get(actorId);
    if (!actor || !roomId || !session || !p) return fail("invalid_action", "You are not in a fight.");
    if (p.minorUsed) return fail("invalid_action", "You have already moved this round.");
    if (dir === "out" && session.hasModifier(actorId, "pinned")) return fail("blocked", "You are pinned in place.");

    const band = this.bandOf(actorId);
    const next = stepBand(band, dir);
    if (next === band) {
      return fail("noop", dir === "in" ? "You can't get any closer." : "You can't get any further away.");
    }

    this.deps.entities.setEngagement(actorId, { rangeBand: next });
    p.minorUsed = true;
    this.deps.events.toRoom(
      roomId,
      { kind: "notice", text: `${actor.name} ${dir === "in" ? "advances" : "falls back"} to ${next} range.`, roomId },
      [actorId],
    );

    const targetId = this.ticker.get(actorId)?.targetId;
    if (targetId && !inReach(actor.attack, next, this.bandOf(targetId))) {
      this.handleLostTarget(session, actor);
    }
    return succeed(`You ${dir === "in" ? "advance" : "fall back"} to ${next} range.`);
  }

  private closeDistance(session: CombatSession, actor: CombatantInstance, target: CombatantInstance): void {
    const band = this.bandOf(actor.id);
    if (band !== "engaged") {
      const next = stepBand(band, "in");
      this.deps.entities.setEngagement(actor.id, { rangeBand: next });
      this.deps.events.toRoom(session.roomId, {
        kind: "notice",
        text: `${actor.name} closes in on ${target.name}.`,
        roomId: session.roomId,
      });
      return;
    }
    // Already in the thick of it but the target is out at range: try someone closer.
    const closer = this.pickNewTarget(session, actor, true);
    if (closer && closer.id !== target.id) this.setEngaged(session, actor, closer);
  }

  // ---------------------------------------------------------------------------
  // Round closing

  private closeRoundsIfDone(session: CombatSession): void {
    for (let guard = 0; guard < 4; guard++) {
      if (this.sessions.get(session.roomId) !== session || !session.everyoneActed()) return;
      this.closeRound(session);
    }
  }

  private closeRound(session: CombatSession): void {
    session.phase = "reaction";
    this.runReactions(session);

    session.phase = "resolution";
    this.resolve(session);

    session.phase = "summary";
    this.summarize(session);

    for (const p of session.participants.values()) {
      if (p.state === "Supporting") p.state = "Observing";
    }
    if (this.endIfQuiet(session)) return;
    session.beginNextRound(this.now());
  }

  private runReactions(session: CombatSession): void {
    const max = this.deps.config.maxReactionsPerRound;
    for (const trig of session.triggers) {
      if (session.reactionsThisRound >= max) break;

      const p = session.get(trig.reactorId);
      const m = p?.readiedReaction;
      if (!p || !m || m.trigger !== trig.trigger || p.reactionsUsed > 0) continue;
      if (session.hasModifier(p.id, "staggered")) continue;

      const reactor = this.deps.entities.getCombatant(trig.reactorId);
      const against = this.deps.entities.getCombatant(trig.againstId);
      if (!reactor || !against || against.hp <= 0) continue;
      if (this.deps.entities.roomOf(against.id) !== session.roomId) continue;
      if (!inReach(reactor.attack, this.bandOf(reactor.id), this.bandOf(against.id))) continue;
      if (!asCombatant(reactor).spendStamina(m.staminaCost)) {
        this.deps.events.toEntity(reactor.id, { kind: "notice", text: `You are too winded for ${m.name}.` });
        continue;
      }

      p.readiedReaction = null;
      p.reactionsUsed++;
      session.reactionsThisRound++;
      this.deps.events.toRoom(session.roomId, {
        kind: "notice",
        text: `${reactor.name} reacts with ${m.name}!`,
        roomId: session.roomId,
      });
      this.rollAndQueue(session, reactor, against, m, true);
    }
    session.triggers = [];
  }

  private resolve(session: CombatSession): void {
    const { entities, config, events } = this.deps;
    const roomId = session.roomId;
    const fallen = new Set<string>();

    for (const hit of session.queuedHits) {
      if (fallen.has(hit.attackerId)) continue;
      const attacker = entities.getCombatant(hit.attackerId);
      if (!attacker || entities.roomOf(attacker.id) !== roomId) continue;
      const target = entities.getCombatant(hit.targetId);
      if (!target || target.hp <= 0 || entities.roomOf(target.id) !== roomId) continue;

      const mit = applyArmorMitigation(hit.raw, hit.damageType, target.armor, config.secondaryArmorRate);
      const hpAfter = asCombatant(target).takeDamage(mit.final);
      events.toRoom(roomId, {
        kind: hit.outcome === "crit" ? "crit" : "hit",
        text: formatHitLine({
          attackerName: attacker.name,
          targetName: target.name,
          label: hit.label,
          outcome: hit.outcome,
          damage: mit.final,
          absorbed: mit.absorbed,
          hpAfter,
          maxHp: target.maxHp,
        }),
        roomId,
        data: { attackerId: attacker.id, targetId: target.id, raw: mit.raw, final: mit.final, absorbed: mit.absorbed },
      });

      if (hpAfter <= 0) {
        fallen.add(target.id);
        this.handleDeath(session, target, attacker);
      }
    }
    session.queuedHits = [];

    this.resolveDisengages(session);
    session.expireModifiers();
    this.regenerate(session);
  }

  private handleDeath(session: CombatSession, victim: CombatantInstance, killer?: CombatantInstance): void {
    this.ticker.cancel(victim.id, "died");
    this.clearFlee(victim.id);
    const p = session.leave(victim.id);
    if (p?.pendingDisengage) this.deps.scheduler.cancel(p.pendingDisengage.timeout);
    this.passive.delete(victim.id);

    session.notable.push(`${victim.name} falls.`);
    this.deps.deaths.handle(victim, this.now(), killer?.name);
    this.retargetAttackersOf(session, victim.id);
  }

  private resolveDisengages(session: CombatSession): void {
    for (const p of [...session.participants.values()]) {
      const pending = p.pendingDisengage;
      if (!pending) continue;
      p.pendingDisengage = null;
      this.deps.scheduler.cancel(pending.timeout);

      const actor = this.deps.entities.getCombatant(p.id);
      if (!actor) continue;

      if (session.hasModifier(p.id, "pinned")) {
        this.failDisengage(session, actor, pending.previousTargetId, "You are pinned and cannot break away!");
        continue;
      }

      const opps = this.opponentsOf(session, actor);
      const oppAccuracy = opps.length
        ? Math.max(...opps.map((o) => asCombatant(o).effectiveAccuracy(session.modifiersOf(o.id))))
        : this.deps.config.disengageDifficulty;
      const squall = this.weather(session.roomId, "disengage_failure");
      const avo = clampSkill(asCombatant(actor).effectiveAvoidance(session.modifiersOf(actor.id)) - squall);
      const opp = clampSkill(oppAccuracy);

      const mine = rollD100(this.deps.rng);
      const theirs = rollD100(this.deps.rng);
      const success = mine <= avo && (mine < theirs || theirs > opp);
      log.debug("Disengage check", { id: actor.id, mine, theirs, avo, opp, success });

      if (success) this.grantFlee(session, actor, pending.previousTargetId, opps.map((o) => o.id));
      else this.failDisengage(session, actor, pending.previousTargetId, "You fail to break away!");
    }
  }

  private grantFlee(
    session: CombatSession,
    actor: CombatantInstance,
    previousTargetId: string | null,
    opponentIds: string[],
  ): void {
    const p = session.get(actor.id);
    if (p) p.state = "Observing";
    this.deps.entities.setEngagement(actor.id, { engagedTargetId: null });

    this.clearFlee(actor.id);
    const until = this.now() + this.deps.config.fleeWindowSec * 1000;
    const task = this.deps.scheduler.schedule(until, `flee:${actor.id}`, () =>
      this.inRoomOf(actor.id, () => this.expireFlee(actor.id)),
    );
    this.fleeing.set(actor.id, { roomId: session.roomId, until, fromTargetId: previousTargetId, opponentIds, task });

    session.notable.push(`${actor.name} breaks away.`);
    this.deps.events.toEntity(actor.id, {
      kind: "state",
      text: "You break away! Now is your chance to leave.",
      roomId: session.roomId,
    });
    this.retargetAttackersOf(session, actor.id);
  }

  private failDisengage(
    session: CombatSession,
    actor: CombatantInstance,
    previousTargetId: string | null,
    text: string,
  ): void {
    const p = session.get(actor.id);
    if (!p) return;
    p.state = "Engaged";
    this.deps.events.toEntity(actor.id, { kind: "state", text, roomId: session.roomId });

    const prev = previousTargetId ? this.checkTarget(actor, previousTargetId, session.roomId) : null;
    if (prev?.ok) {
      this.setEngaged(session, actor, prev.target);
    } else {
      this.handleLostTarget(session, actor);
    }
  }

  private expireDisengage(roomId: string, id: string): void {
    const session = this.sessions.get(roomId);
    const p = session?.get(id);
    const actor = this.deps.entities.getCombatant(id);
    if (!session || !p || !p.pendingDisengage || !actor) return;
    const pending = p.pendingDisengage;
    p.pendingDisengage = null;
    this.failDisengage(session, actor, pending.previousTargetId, "Your chance to break away passes.");
  }

  private expireFlee(id: string): void {
    const w = this.fleeing.get(id);
    if (!w) return;
    this.fleeing.delete(id);

    const actor = this.deps.entities.getCombatant(id);
    if (!actor || this.deps.entities.roomOf(id) !== w.roomId) return;

    const prev = w.fromTargetId ? this.checkTarget(actor, w.fromTargetId, w.roomId) : null;
    if (prev?.ok && !this.passive.has(id)) {
      this.deps.events.toEntity(id, {
        kind: "state",
        text: `You linger too long. ${prev.target.name} is upon you again.`,
        roomId: w.roomId,
      });
      this.engage(actor, prev.target, w.roomId);
      return;
    }
    this.deps.events.toEntity(id, { kind: "notice", text: "You catch your breath.", roomId: w.roomId });
  }

  /** Opponents recorded when the flee window opened; empty when none is open. */
  fleeOpponents(id: string): string[] {
    return this.isFleeing(id) ? [...(this.fleeing.get(id)?.opponentIds ?? [])] : [];
  }

  /** Consumes the flee window, if any. Returns whether one was open. */
  consumeFleeWindow(id: string): boolean {
    const open = this.isFleeing(id);
    this.clearFlee(id);
    return open;
  }

  private clearFlee(id: string): void {
    const w = this.fleeing.get(id);
    if (!w) return;
    this.deps.scheduler.cancel(w.task);
    this.fleeing.delete(id);
  }

  private regenerate(session: CombatSession): void {
    const regen = this.deps.config.staminaRegenPerRound;
    const drain = this.weather(session.roomId, "stamina_drain");
    for (const id of session.participants.keys()) {
      const c = this.deps.entities.getCombatant(id);
      if (!c) continue;
      c.stamina = Math.max(0, Math.min(c.maxStamina, Math.floor(c.stamina + regen - drain)));
    }
  }

  private summarize(session: CombatSession): void {
    let hostiles = 0;
    for (const id of session.participants.keys()) {
      const c = this.deps.entities.getCombatant(id);
      if (c && c.kind !== "player" && c.hp > 0) hostiles++;
    }
    this.deps.events.toRoom(session.roomId, {
      kind: "round_summary",
      text: formatRoundSummary({ round: session.round, hostiles, notable: session.notable }),
      roomId: session.roomId,
      data: { round: session.round, hostiles },
    });
  }

  /** Ends the session once nobody in it is fighting. Returns true when it ended. */
  private endIfQuiet(session: CombatSession): boolean {
    if (this.sessions.get(session.roomId) !== session) return true;
    if (session.fighting().length > 0) return false;

    this.sessions.delete(session.roomId);
    for (const p of session.participants.values()) {
      p.state = "Observing";
      this.ticker.cancel(p.id, "session ended");
      if (p.pendingDisengage) this.deps.scheduler.cancel(p.pendingDisengage.timeout);
      this.deps.entities.setEngagement(p.id, { rangeBand: null, engagedTargetId: null });
    }
    log.child({ roomId: session.roomId }).debug("Combat session ended", { rounds: session.round });
    return true;
  }

  // ---------------------------------------------------------------------------
  // Engagement

  private engage(attacker: CombatantInstance, target: CombatantInstance, roomId: string): void {
    let session = this.sessions.get(roomId);
    if (!session) {
      session = this.createSession(roomId, [attacker, target]);
    } else {
      this.ensureParticipant(session, attacker, "far");
      this.ensureParticipant(session, target, this.bandOf(attacker.id));
    }
    this.setEngaged(session, attacker, target);
  }

  private setEngaged(session: CombatSession, attacker: CombatantInstance, target: CombatantInstance): void {
    const p = session.get(attacker.id);
    if (!p) return;
    p.state = "Engaged";
    this.deps.entities.setEngagement(attacker.id, { engagedTargetId: target.id });
    target.lastAttackerId = attacker.id;

    const result = this.ticker.start(attacker.id, target.id, this.intervalFor(attacker));
    if (result !== "same_target") {
      this.deps.events.toEntity(attacker.id, {
        kind: "state",
        text: `You are fighting ${target.name}.`,
        roomId: session.roomId,
        data: { state: "Engaged", targetId: target.id },
      });
    }
    this.provoke(session, target, attacker);
  }

  /** Someone who is attacked while idle fights back, when they can. */
  private provoke(session: CombatSession, target: CombatantInstance, attacker: CombatantInstance): void {
    const p = session.get(target.id);
    if (!p || p.state !== "Observing") return;
    if (this.passive.has(target.id) || this.isFleeing(target.id)) return;
    if (!asCombatant(target).canAttack(attacker)) return;
    if (target.kind === "player" && !inReach(target.attack, this.bandOf(target.id), this.bandOf(attacker.id))) return;
    this.setEngaged(session, target, attacker);
  }

  /** `goneId` is never picked, even while it is still indexed in the room. */
  private handleLostTarget(session: CombatSession, actor: CombatantInstance, goneId?: string): void {
    const p = session.get(actor.id);
    if (!p) {
      this.ticker.cancel(actor.id, "not in session");
      return;
    }
    if (p.state === "Disengaging") return;

    const next = this.pickNewTarget(session, actor, actor.kind === "player", goneId);
    if (next) {
      this.setEngaged(session, actor, next);
      return;
    }

    this.ticker.cancel(actor.id, "no target");
    p.state = "Observing";
    this.deps.entities.setEngagement(actor.id, { engagedTargetId: null });
    this.deps.events.toEntity(actor.id, {
      kind: "state",
      text: "You have no one left to fight.",
      roomId: session.roomId,
      data: { state: "Observing" },
    });
  }

  private retargetAttackersOf(session: CombatSession, goneId: string): void {
    for (const attackerId of this.ticker.listAttackersOf(goneId)) {
      const attacker = this.deps.entities.getCombatant(attackerId);
      if (attacker) this.handleLostTarget(session, attacker, goneId);
      else this.ticker.cancel(attackerId, "gone");
    }
  }

  /**
   * Players only turn on someone who is attacking them and in reach.
   * Creatures follow their threat profile, preferring targets in reach.
   */
  private pickNewTarget(
    session: CombatSession,
    actor: CombatantInstance,
    reachOnly: boolean,
    excludeId?: string,
  ): CombatantInstance | null {
    const roomId = session.roomId;
    const self = asCombatant(actor);
    const candidates = this.deps.entities
      .listCombatantsInRoom(roomId)
      .filter((c) => c.id !== actor.id && c.id !== excludeId && self.canAttack(c) && !this.isFleeing(c.id))
      .sort((a, b) => session.queueIndex(a.id) - session.queueIndex(b.id));
    const reachable = candidates.filter((c) => inReach(actor.attack, this.bandOf(actor.id), this.bandOf(c.id)));

    if (actor.kind === "player") {
      return reachable.find((c) => this.targetOf(c.id) === actor.id) ?? null;
    }

    const pool = reachable.length ? reachable : reachOnly ? [] : candidates;
    if (!pool.length) return null;
    switch (actor.behavior.threat) {
      case "last_attacker":
        return pool.find((c) => c.id === actor.lastAttackerId) ?? pool[0];
      case "lowest_hp":
        return pool.reduce((best, c) => (c.hp < best.hp ? c : best), pool[0]);
      case "first":
        return pool[0];
    }
  }

  private createSession(roomId: string, members: CombatantInstance[]): CombatSession {
    const rolls: InitiativeRoll[] = members.map((m) => ({
      id: m.id,
      roll: rollD20(this.deps.rng) + asCombatant(m).initiativeBonus(),
    }));
    const session = new CombatSession(roomId, rolls, this.now());
    this.sessions.set(roomId, session);
    for (const m of members) this.deps.entities.setEngagement(m.id, { rangeBand: "engaged" });
    log.child({ roomId }).debug("Combat session created", { initiative: session.initiative });
    return session;
  }

  private ensureParticipant(session: CombatSession, c: CombatantInstance, band: RangeBand): ParticipantState {
    const existing = session.get(c.id);
    if (existing) return existing;
    const p = session.join(c.id);
    this.deps.entities.setEngagement(c.id, { rangeBand: band });
    return p;
  }

  /** Band someone would fight from: their own if already in, else where they would join. */
  private prospectiveBand(session: CombatSession | undefined, id: string, joinBand: RangeBand): RangeBand {
    if (!session) return "engaged";
    return session.has(id) ? this.bandOf(id) : joinBand;
  }

  private firstHostileParticipant(session: CombatSession, actor: CombatantInstance): CombatantInstance | null {
    const self = asCombatant(actor);
    for (const id of session.actionQueue()) {
      const c = this.deps.entities.getCombatant(id);
      if (c && self.canAttack(c) && !this.isFleeing(c.id)) return c;
    }
    return null;
  }

  /** Hostiles in the room whose attacks are aimed at `actor`. */
  private opponentsOf(session: CombatSession, actor: CombatantInstance): CombatantInstance[] {
    return this.deps.entities
      .listCombatantsInRoom(session.roomId)
      .filter((c) => c.id !== actor.id && c.hp > 0 && asCombatant(c).canAttack(actor) && this.targetOf(c.id) === actor.id)
      .sort((a, b) => session.queueIndex(a.id) - session.queueIndex(b.id));
  }

  // ---------------------------------------------------------------------------
  // Hits

  private rollAndQueue(
    session: CombatSession,
    attacker: CombatantInstance,
    target: CombatantInstance,
    maneuver: ManeuverDef | null,
    isReaction: boolean,
  ): void {
    const { config, events } = this.deps;
    const roomId = session.roomId;
    const a = asCombatant(attacker);
    const d = asCombatant(target);

    let extra = maneuver?.accuracyMod ?? 0;
    if (attacker.attack.reach === "ranged" && (this.bandOf(attacker.id) === "far" || this.bandOf(target.id) === "far")) {
      extra += this.weather(roomId, "ranged_accuracy_far") - FAR_RANGED_ACCURACY_PENALTY;
    }

    const result = resolveHit({
      accuracy: a.effectiveAccuracy(session.modifiersOf(attacker.id), extra),
      avoidance: d.effectiveAvoidance(session.modifiersOf(target.id)),
      profile: attacker.attack,
      damageMultiplier: maneuver?.damageMultiplier,
      critMultiplier: config.critMultiplier,
      glanceMultiplier: config.glanceMultiplier,
      rng: this.deps.rng,
    });

    const label = maneuver?.name ?? attacker.attack.verb ?? "attack";
    target.lastAttackerId = attacker.id;
    if (!isReaction) session.triggers.push({ trigger: "attacked", reactorId: target.id, againstId: attacker.id });

    if (result.outcome === "miss") {
      events.toRoom(roomId, {
        kind: "miss",
        text: formatMissLine({ attackerName: attacker.name, targetName: target.name, label }),
        roomId,
        data: { attackerId: attacker.id, targetId: target.id },
      });
      return;
    }

    session.queuedHits.push({
      attackerId: attacker.id,
      targetId: target.id,
      raw: result.raw,
      damageType: attacker.attack.damageType,
      outcome: result.outcome,
      label,
    });
    if (maneuver) this.applyManeuverModifier(session, attacker, target, maneuver);
  }

  private applyManeuverModifier(
    session: CombatSession,
    actor: CombatantInstance,
    target: CombatantInstance,
    maneuver: ManeuverDef,
  ): void {
    const applies = maneuver.applies;
    if (!applies) return;
    const who = applies.to === "self" ? actor : target;
    if (!session.has(who.id)) return;
    session.addModifier(who.id, applies.modifier, applies.rounds);
    session.notable.push(formatModifierLine(who.name, applies.modifier));
  }

  // ---------------------------------------------------------------------------
  // Helpers

  private checkTarget(attacker: CombatantInstance, targetId: string, roomId: string): TargetCheck {
    const target = this.deps.entities.getCombatant(targetId);
    if (!target) return { ok: false, result: fail("invalid_target", "That target is no longer here.") };
    if (this.deps.entities.roomOf(target.id) !== roomId) {
      return { ok: false, result: fail("invalid_target", `${target.name} is not here.`) };
    }
    if (target.hp <= 0) return { ok: false, result: fail("invalid_target", `${target.name} is already dead.`) };
    if (this.isFleeing(target.id)) {
      return { ok: false, result: fail("invalid_target", `${target.name} is slipping away.`) };
    }
    if (!asCombatant(attacker).canAttack(target)) {
      return { ok: false, result: fail("invalid_target", `You can't attack ${target.name}.`) };
    }
    return { ok: true, target };
  }

  private intervalFor(c: CombatantInstance): number {
    return attackIntervalMs(c.attack, this.deps.config.baseAttackIntervalSec, this.deps.config.minAttackIntervalSec);
  }

  private isSafeRoom(roomId: string): boolean {
    return this.deps.content.getRoom(roomId)?.flags.safe === true;
  }

  private weather(roomId: string, effect: WeatherEffect): number {
    return this.deps.weather ? this.deps.weather(roomId, effect) : 0;
  }
}
