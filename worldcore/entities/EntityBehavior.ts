// worldcore/entities/EntityBehavior.ts

import type { GameEntity } from "./GameEntity";
import { applyMonsterDamage, healMonster } from "../combat/monsterCombat";
import {
  EntityAction,
  isEntityAction,
  type EntityKind,
  type GenericKind,
  type MonsterKind,
  type PlayerKind,
} from "../shared/Entity";
import { UserEvents, WorldEvents, type EventName, type EventValue } from "../shared/events";
import { InvalidArgumentError } from "../shared/errors";
import { Logger } from "../utils/logger";

const log = Logger.scope("ENTITY");

/**
 * What an entity kind can do when an event reaches it.
 * Anything a kind doesn't understand is ignored.
 */
export interface EntityBehavior<K extends EntityKind> {
  event(entity: GameEntity, state: K, name: EventName, value: EventValue): void;
  userEvent(entity: GameEntity, state: K, name: EventName, value: EventValue): void;
}

const GenericBehavior: EntityBehavior<GenericKind> = {
  event() {},
  userEvent() {},
};

const MonsterBehavior: EntityBehavior<MonsterKind> = {
  event(entity, state, name, value) {
    switch (name) {
      case WorldEvents.Damage: {
        const hit = applyMonsterDamage(state, value);
        if (hit.killed) {
          log.debug("Monster defeated", { entityId: entity.id, health: hit.health });
        }
        return;
      }
      case WorldEvents.Heal:
        healMonster(state, value);
        return;
      default:
        return;
    }
  },
  userEvent() {},
};

const PlayerBehavior: EntityBehavior<PlayerKind> = {
  event() {},
  userEvent(entity, state, name, value) {
    if (name !== UserEvents.Action) return;
    if (!isEntityAction(value)) {
      throw new InvalidArgumentError(`Unknown action code: ${String(value)}`);
    }
    state.lastAction = value;
    if (value !== EntityAction.NONE) entity.face(value);
  },
};

export function dispatchEvent(
  entity: GameEntity,
  state: EntityKind,
  name: EventName,
  value: EventValue
): void {
  switch (state.kind) {
    case "generic":
      return GenericBehavior.event(entity, state, name, value);
    case "monster":
      return MonsterBehavior.event(entity, state, name, value);
    case "player":
      return PlayerBehavior.event(entity, state, name, value);
  }
}

export function dispatchUserEvent(
  entity: GameEntity,
  state: EntityKind,
  name: EventName,
  value: EventValue
): void {
  switch (state.kind) {
    case "generic":
      return GenericBehavior.userEvent(entity, state, name, value);
    case "monster":
      return MonsterBehavior.userEvent(entity, state, name, value);
    case "player":
      return PlayerBehavior.userEvent(entity, state, name, value);
  }
}
