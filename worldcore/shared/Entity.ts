// worldcore/shared/Entity.ts

import type {
  ArmorPieceTemplate,
  AttackProfile,
  BehaviorProfile,
  RangeBand,
} from "./ContentTypes";

/** An armor piece as worn: template values plus its own wear. */
export interface ArmorPieceState extends ArmorPieceTemplate {
  itemId: string;
  name: string;
  durability: number;
}

/** Set on a creature while it follows someone out of the room it was fighting in. */
export interface PursuitState {
  anchorRoomId: string;
  targetId: string;
  startedAt: number; // world ms
  roomsAway: number;
}

interface InstanceBase {
  id: string;
  readonly templateId: string;
  name: string;
  createdAt: number; // world ms
  expiresAt?: number; // world ms
}

export interface CombatantStats {
  hp: number;
  maxHp: number;
  stamina: number;
  maxStamina: number;
  accuracy: number;
  avoidance: number;
  faction: string;
  attack: AttackProfile;
  armor: ArmorPieceState[];
  behavior: BehaviorProfile;
  originRoomId: string;
  lastAttackerId?: string;
  pursuit?: PursuitState;
}

export interface PlayerInstance extends InstanceBase, CombatantStats {
  kind: "player";
  sessionId: string;
  characterId: string;
}

export interface CreatureInstance extends InstanceBase, CombatantStats {
  kind: "creature";
  spawnRuleId?: string;
  spawnRoomId?: string;
  lootTableId?: string;
  encounterId?: string;
  tier?: string;
  role?: string;
}

export interface NpcInstance extends InstanceBase, CombatantStats {
  kind: "npc";
  lootTableId?: string;
}

export interface ItemInstance extends InstanceBase {
  kind: "item";
  quantity: number;
  durability?: number;
  lootRuleId?: string;
  lootRoomId?: string;
  /** Loot reserved for one session; others cannot pick it up. */
  ownerSessionId?: string;
}

export type CombatantInstance = PlayerInstance | CreatureInstance | NpcInstance;
export type EntityInstance = CombatantInstance | ItemInstance;

export function isCombatant(e: EntityInstance | undefined): e is CombatantInstance {
  return !!e && e.kind !== "item";
}

/** Where an instance is. Only EntityManager changes roomId. */
export interface EntityPosition {
  entityId: string;
  roomId: string;
  rangeBand?: RangeBand;
  engagedTargetId?: string;
}
