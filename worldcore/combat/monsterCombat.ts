// worldcore/combat/monsterCombat.ts

import type { GameEntity } from "../entities/GameEntity";
import type { MonsterKind } from "../shared/Entity";
import { InvalidArgumentError } from "../shared/errors";
import { Logger } from "../utils/logger";

const log = Logger.scope("COMBAT");

export interface MonsterDamageResult {
  damage: number;
  health: number;
  defeated: boolean;
  // true only on the hit that took health to 0 or below
  killed: boolean;
}

function requireAmount(amount: unknown, what: string): number {
  if (typeof amount !== "number" || !Number.isFinite(amount) || amount < 0) {
    throw new InvalidArgumentError(`${what} must be a non-negative number, got ${String(amount)}`);
  }
  return amount;
}

export function applyMonsterDamage(
  state: MonsterKind,
  amount: unknown
): MonsterDamageResult {
  const damage = requireAmount(amount, "Damage");
  state.health -= damage;

  let killed = false;
  if (state.health <= 0 && !state.defeated) {
    state.defeated = true;
    killed = true;
  }

  return { damage, health: state.health, defeated: state.defeated, killed };
}

export function healMonster(state: MonsterKind, amount: unknown): number {
  const heal = requireAmount(amount, "Heal");
  state.health += heal;
  if (state.health > 0) state.defeated = false;
  return state.health;
}

/**
 * One monster hits another for the attacker's damage.
 * Goes through the target's event hook so it behaves exactly like a
 * "damage" event delivered by the host.
 */
export function attack(attacker: GameEntity, target: GameEntity): MonsterDamageResult {
  const a = attacker.kind;
  if (a.kind !== "monster") {
    throw new InvalidArgumentError(`Attacker must be a monster, got ${a.kind}`);
  }
  // kind is a live read-only view, so it reflects the hit below
  const state = target.kind;
  if (state.kind !== "monster") {
    throw new InvalidArgumentError(`Target must be a monster, got ${state.kind}`);
  }
  const wasDefeated = state.defeated;

  target.event("damage", a.damage);

  log.debug("attack", {
    attacker: attacker.id,
    target: target.id,
    damage: a.damage,
    health: state.health,
  });

  return {
    damage: a.damage,
    health: state.health,
    defeated: state.defeated,
    killed: state.defeated && !wasDefeated,
  };
}
