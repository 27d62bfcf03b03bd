// worldcore/core/EntityManager.ts

import { Config } from "../config/config";
import { GameEntity, rebuild } from "../entities/GameEntity";
import { decodeManager, encodeManager } from "../protocol/EntityCodec";
import {
  EntityType,
  type AttributeBag,
  type AttributeValue,
  type EntitySnapshot,
  type Vec2,
  type Vec3,
} from "../shared/Entity";
import type { EventName, EventValue } from "../shared/events";
import {
  DecodeError,
  InvalidArgumentError,
  NotFoundError,
} from "../shared/errors";
import { Logger } from "../utils/logger";
import { NoopPlayerRegistry, type PlayerRegistry } from "./PlayerRegistry";

const log = Logger.scope("ENTITY");

function requireRegistryId(value: number, what: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError(`${what} must be a non-negative integer, got ${value}`);
  }
  return value;
}

export class EntityManager {
  readonly id: number;

  // Invariant: every entity we own lives in this Map.
  // Key = entity.id, produced by nextId exactly once.
  private readonly entities = new Map<number, GameEntity>();

  // Never decremented, so ids are never reused (even after delete).
  private nextId = 0;

  constructor(
    id: number,
    private readonly players: PlayerRegistry = NoopPlayerRegistry
  ) {
    this.id = requireRegistryId(id, "Manager id");
  }

  /** Count of ids handed out so far (deleted entities included). */
  get allocatedCount(): number {
    return this.nextId;
  }

  get size(): number {
    return this.entities.size;
  }

  /**
   * Register an entity and hand back its new id.
   *
   * Invariants enforced here:
   *  - Only GameEntity instances are accepted (InvalidArgumentError).
   *  - An entity is stamped once, ever (AlreadyRegisteredError).
   *  - Player entities are reported to the PlayerRegistry before the add
   *    completes; if that throws, the add is rolled back entirely.
   */
  addEntity(entity: unknown): number {
    if (!(entity instanceof GameEntity)) {
      throw new InvalidArgumentError("Only GameEntity instances can be added.");
    }

    const id = this.nextId;
    entity.bindToManager(this.id, id);
    this.nextId += 1;
    this.entities.set(id, entity);

    if (entity.type === EntityType.PLAYER) {
      try {
        this.players.registerPlayer(this.id, id);
      } catch (err) {
        this.entities.delete(id);
        // Only rewind if the registry didn't allocate ids of its own meanwhile
        if (this.nextId === id + 1) this.nextId = id;
        entity.unbind();
        throw err;
      }
    }

    log.debug("Entity added", { managerId: this.id, entityId: id, type: entity.type });
    return id;
  }

  hasEntity(entityId: number): boolean {
    return this.entities.has(entityId);
  }

  /** Read-only copy of the entity's state. */
  getEntity(entityId: number): EntitySnapshot {
    return this.require(entityId).snapshot();
  }

  /**
   * Remove an entity from the registry.
   *
   * NOTE: the PlayerRegistry is not told; see PlayerRegistry.
   */
  deleteEntity(entityId: number): void {
    const entity = this.require(entityId);
    this.entities.delete(entityId);
    log.debug("Entity removed", { managerId: this.id, entityId, type: entity.type });
  }

  getEntityPosition(entityId: number): Vec3 {
    return this.require(entityId).position;
  }

  setEntityPosition(entityId: number, position: Vec3): void {
    this.require(entityId).setPosition(position);
  }

  getEntityOrientation(entityId: number): Vec2 {
    return this.require(entityId).orientation;
  }

  setEntityOrientation(entityId: number, direction: Vec2): void {
    this.require(entityId).setOrientation(direction);
  }

  updateAttribute(entityId: number, key: string, value: AttributeValue): void {
    this.require(entityId).updateAttribute(key, value);
  }

  getEntityAttributes(entityId: number): AttributeBag {
    return this.require(entityId).getAllAttributes();
  }

  /** Snapshot of every entity's attribute bag, keyed by id. */
  getAllEntities(): Map<number, AttributeBag> {
    const out = new Map<number, AttributeBag>();
    for (const [id, entity] of this.entities) {
      out.set(id, entity.getAllAttributes());
    }
    return out;
  }

  entityIds(): number[] {
    return Array.from(this.entities.keys());
  }

  event(entityId: number, name: EventName, value: EventValue): void {
    this.require(entityId).event(name, value);
  }

  /** Input events are only for player entities (InvalidArgumentError otherwise). */
  userEvent(entityId: number, name: EventName, value: EventValue): void {
    const entity = this.require(entityId);
    if (entity.type !== EntityType.PLAYER) {
      throw new InvalidArgumentError(
        `User events only go to player entities; ${entityId} is ${entity.type}`
      );
    }
    entity.userEvent(name, value);
  }

  /**
   * Deliver an event to every entity registered when the broadcast starts.
   *
   * Entities deleted by an earlier handler are skipped; entities added
   * during the broadcast don't receive it. Callers must not rely on the
   * delivery order. A throwing handler stops the broadcast.
   */
  broadcast(name: EventName, value: EventValue): void {
    const ids = this.entityIds();
    let delivered = 0;

    for (const id of ids) {
      const entity = this.entities.get(id);
      if (!entity) continue;
      entity.event(name, value);
      delivered++;
    }

    log.debug("broadcast", { managerId: this.id, event: name, delivered });
  }

  serialize(): Uint8Array {
    return encodeManager({
      id: this.id,
      nextId: this.nextId,
      entities: Array.from(this.entities.values(), (e) => e.toRecord()),
    });
  }

  /**
   * Rebuild a manager from serialize() output.
   *
   * Players are not re-announced to the registry: they were registered
   * when first added.
   */
  static deserialize(
    bytes: Uint8Array,
    players: PlayerRegistry = NoopPlayerRegistry
  ): EntityManager {
    const record = decodeManager(bytes);
    const manager = new EntityManager(record.id, players);

    for (const r of record.entities) {
      if (r.id === null || r.managerId !== record.id) {
        throw new DecodeError(
          `Entity record ${String(r.id)} is not registered to manager ${record.id}`
        );
      }
      if (r.id >= record.nextId) {
        throw new DecodeError(`Entity id ${r.id} was never allocated (nextId ${record.nextId})`);
      }
      if (manager.entities.has(r.id)) {
        throw new DecodeError(`Duplicate entity id ${r.id}`);
      }
      manager.entities.set(r.id, rebuild(() => GameEntity.fromRecord(r)));
    }

    manager.nextId = record.nextId;
    return manager;
  }

  debug(): string {
    const lines = [`EntityManager ${this.id} (nextId=${this.nextId}, entities=${this.entities.size})`];
    for (const [id, entity] of this.entities) {
      lines.push(` - ID ${id} [${entity.type}]: ${JSON.stringify(entity.getAllAttributes())}`);
    }
    return lines.join("\n");
  }

  private require(entityId: number): GameEntity {
    const entity = this.entities.get(entityId);
    if (!entity) {
      if (Config.debugEntity) {
        log.debug("lookup miss", { managerId: this.id, entityId });
      }
      throw new NotFoundError(entityId);
    }
    return entity;
  }
}
