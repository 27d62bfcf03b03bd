// worldcore/entities/GameEntity.ts

import { Config } from "../config/config";
import {
  decodeEntity,
  encodeEntity,
  type EntityRecord,
} from "../protocol/EntityCodec";
import {
  EntityAction,
  EntityType,
  isAttributeValue,
  isEntityAction,
  type AttributeBag,
  type AttributeValue,
  type EntityKind,
  type EntitySnapshot,
  type Vec2,
  type Vec3,
} from "../shared/Entity";
import type { EventName, EventValue } from "../shared/events";
import { AlreadyRegisteredError, DecodeError, InvalidArgumentError } from "../shared/errors";
import { dispatchEvent, dispatchUserEvent } from "./EntityBehavior";

export interface GameEntityOptions {
  // Defaults to PLAYER for the player kind, NPC otherwise
  type?: EntityType;
  kind?: EntityKind;
  position?: Vec3;
  orientation?: Vec2;
  level?: number;
  attributes?: AttributeBag;
}

export interface MonsterOptions extends Omit<GameEntityOptions, "kind" | "type"> {
  health: number;
  damage: number;
}

const f32 = Math.fround;

// Facing for each directional action, on the XZ plane (north is -Z)
const FACING: Record<Exclude<EntityAction, EntityAction.NONE>, Vec2> = {
  [EntityAction.EAST]: [1, 0],
  [EntityAction.WEST]: [-1, 0],
  [EntityAction.NORTH]: [0, -1],
  [EntityAction.SOUTH]: [0, 1],
};

function toVec3(p: Vec3): Vec3 {
  if (!p.every(Number.isFinite)) {
    throw new InvalidArgumentError(`Position must be 3 finite numbers, got [${p.join(", ")}]`);
  }
  return [f32(p[0]), f32(p[1]), f32(p[2])];
}

function requireDirection(d: Vec2): number {
  const len = Math.hypot(d[0], d[1]);
  if (!Number.isFinite(len) || len === 0) {
    throw new InvalidArgumentError(`Orientation must be a non-zero finite vector, got [${d.join(", ")}]`);
  }
  return len;
}

function toUnitVec2(d: Vec2): Vec2 {
  const len = requireDirection(d);
  return [f32(d[0] / len), f32(d[1] / len)];
}

// Stored orientations are already normalized; a second pass can drift by an ulp.
function toStoredVec2(d: Vec2): Vec2 {
  requireDirection(d);
  return [f32(d[0]), f32(d[1])];
}

function requireLevel(level: number): number {
  if (!Number.isInteger(level) || level < 1) {
    throw new InvalidArgumentError(`Level must be an integer >= 1, got ${level}`);
  }
  return level;
}

function requireAttribute(key: string, value: unknown): AttributeValue {
  if (key.length === 0 || key.length > Config.maxAttributeKeyLength) {
    throw new InvalidArgumentError(
      `Attribute key must be 1..${Config.maxAttributeKeyLength} characters, got ${key.length}`
    );
  }
  // Blobs decode into plain objects, where this key can't survive
  if (key === "__proto__") {
    throw new InvalidArgumentError(`Attribute key "${key}" is reserved`);
  }
  if (!isAttributeValue(value) || (typeof value === "number" && !Number.isFinite(value))) {
    throw new InvalidArgumentError(`Unsupported value for attribute "${key}": ${String(value)}`);
  }
  return value;
}

/** Run a rebuild step, reporting rejected values as a decode failure. */
export function rebuild<T>(fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof InvalidArgumentError) {
      throw new DecodeError(`Invalid value in blob: ${err.message}`);
    }
    throw err;
  }
}

function requireKind(kind: EntityKind): EntityKind {
  switch (kind.kind) {
    case "monster":
      if (!Number.isFinite(kind.health)) {
        throw new InvalidArgumentError(`Monster health must be finite, got ${kind.health}`);
      }
      if (!Number.isFinite(kind.damage) || kind.damage < 0) {
        throw new InvalidArgumentError(
          `Monster damage must be a non-negative finite number, got ${kind.damage}`
        );
      }
      return { ...kind };
    case "player":
      if (!isEntityAction(kind.lastAction)) {
        throw new InvalidArgumentError(`Unknown action code: ${String(kind.lastAction)}`);
      }
      return { ...kind };
    case "generic":
      return { ...kind };
  }
}

function copyKind(kind: EntityKind): EntityKind {
  return { ...kind };
}

/**
 * A single addressable game object.
 *
 * Entities are built standalone and become addressable once an
 * EntityManager stamps them with an id. Kind-specific behavior (monster
 * combat, player input) lives in the kind payload and is dispatched by
 * EntityBehavior, not by subclassing.
 */
export class GameEntity {
  readonly type: EntityType;

  private _id: number | null = null;
  private _managerId: number | null = null;
  private readonly _kind: EntityKind;
  private _position: Vec3;
  private _orientation: Vec2;
  private _level: number;
  private readonly attributes = new Map<string, AttributeValue>();

  constructor(opts: GameEntityOptions = {}) {
    const kind: EntityKind = opts.kind ?? { kind: "generic" };
    const type = opts.type ?? (kind.kind === "player" ? EntityType.PLAYER : EntityType.NPC);
    if (kind.kind === "player" && type !== EntityType.PLAYER) {
      throw new InvalidArgumentError("The player kind requires EntityType.PLAYER");
    }

    this.type = type;
    this._kind = requireKind(kind);
    this._position = toVec3(opts.position ?? [0, 0, 0]);
    this._orientation = toUnitVec2(opts.orientation ?? [1, 0]);
    this._level = requireLevel(opts.level ?? 1);

    for (const [key, value] of Object.entries(opts.attributes ?? {})) {
      this.attributes.set(key, requireAttribute(key, value));
    }
  }

  static npc(opts: Omit<GameEntityOptions, "type" | "kind"> = {}): GameEntity {
    return new GameEntity({ ...opts, type: EntityType.NPC });
  }

  static player(opts: Omit<GameEntityOptions, "type" | "kind"> = {}): GameEntity {
    return new GameEntity({
      ...opts,
      type: EntityType.PLAYER,
      kind: { kind: "player", lastAction: EntityAction.NONE },
    });
  }

  static monster(opts: MonsterOptions): GameEntity {
    const { health, damage, ...rest } = opts;
    return new GameEntity({
      ...rest,
      type: EntityType.NPC,
      kind: { kind: "monster", health, damage, defeated: health <= 0 },
    });
  }

  // --- identity -----------------------------------------------------------

  /** Id assigned by the owning manager; null until registered. */
  get id(): number | null {
    return this._id;
  }

  get managerId(): number | null {
    return this._managerId;
  }

  isRegistered(): boolean {
    return this._id !== null;
  }

  /**
   * Stamp the registration. Only EntityManager calls this.
   * @internal
   */
  bindToManager(managerId: number, id: number): void {
    if (this._id !== null && this._managerId !== null) {
      throw new AlreadyRegisteredError(this._id, this._managerId);
    }
    this._id = id;
    this._managerId = managerId;
  }

  /**
   * Undo a registration that never completed (failed player registry call).
   * @internal
   */
  unbind(): void {
    this._id = null;
    this._managerId = null;
  }

  // --- state --------------------------------------------------------------

  /** Live read-only view of the kind payload. */
  get kind(): Readonly<EntityKind> {
    return this._kind;
  }

  get position(): Vec3 {
    return this._position;
  }

  get orientation(): Vec2 {
    return this._orientation;
  }

  get level(): number {
    return this._level;
  }

  setPosition(position: Vec3): void {
    this._position = toVec3(position);
  }

  /** Normalizes the direction; a zero vector is rejected. */
  setOrientation(direction: Vec2): void {
    this._orientation = toUnitVec2(direction);
  }

  setLevel(level: number): void {
    this._level = requireLevel(level);
  }

  updateAttribute(key: string, value: AttributeValue): void {
    this.attributes.set(key, requireAttribute(key, value));
  }

  getAttribute(key: string): AttributeValue | undefined {
    return this.attributes.get(key);
  }

  removeAttribute(key: string): boolean {
    return this.attributes.delete(key);
  }

  /** Copy of the attribute bag; changing it does not touch the entity. */
  getAllAttributes(): AttributeBag {
    return Object.fromEntries(this.attributes);
  }

  // --- movement -------------------------------------------------------------

  face(action: EntityAction): void {
    if (action === EntityAction.NONE) return;
    this._orientation = FACING[action];
  }

  /** Face a point on the XZ plane; ignored when it is our own position. */
  faceAt(x: number, z: number): void {
    const dx = x - this._position[0];
    const dz = z - this._position[2];
    if (dx * dx + dz * dz < Number.EPSILON) return;
    this.setOrientation([dx, dz]);
  }

  turnLeft(degrees: number): void {
    this.rotate((-degrees * Math.PI) / 180);
  }

  turnRight(degrees: number): void {
    this.rotate((degrees * Math.PI) / 180);
  }

  moveForward(distance: number): void {
    const [x, y, z] = this._position;
    const [ox, oz] = this._orientation;
    this.setPosition([x + ox * distance, y, z + oz * distance]);
  }

  moveBackward(distance: number): void {
    this.moveForward(-distance);
  }

  private rotate(radians: number): void {
    const [x, z] = this._orientation;
    const cos = Math.cos(radians);
    const sin = Math.sin(radians);
    this.setOrientation([x * cos - z * sin, x * sin + z * cos]);
  }

  // --- events -------------------------------------------------------------

  /** World/lifecycle event (tick, damage, ...). */
  event(name: EventName, value: EventValue): void {
    dispatchEvent(this, this._kind, name, value);
  }

  /** Input event. The manager only routes these to player entities. */
  userEvent(name: EventName, value: EventValue): void {
    dispatchUserEvent(this, this._kind, name, value);
  }

  // --- snapshots & serialization -------------------------------------------

  snapshot(): EntitySnapshot {
    return {
      id: this._id,
      managerId: this._managerId,
      type: this.type,
      kind: copyKind(this._kind),
      position: this._position,
      orientation: this._orientation,
      level: this._level,
      attributes: this.getAllAttributes(),
    };
  }

  toRecord(): EntityRecord {
    return {
      id: this._id,
      managerId: this._managerId,
      type: this.type,
      kind: copyKind(this._kind),
      position: [...this._position],
      orientation: [...this._orientation],
      level: this._level,
      attributes: this.getAllAttributes(),
    };
  }

  /**
   * Rebuild an entity from a decoded record, registration included.
   * Throws InvalidArgumentError when the record's values break an entity rule.
   */
  static fromRecord(record: EntityRecord): GameEntity {
    if ((record.id === null) !== (record.managerId === null)) {
      throw new InvalidArgumentError("Record must carry both id and managerId, or neither");
    }
    const e = new GameEntity({
      type: record.type,
      kind: record.kind,
      position: record.position,
      orientation: record.orientation,
      level: record.level,
      attributes: record.attributes,
    });
    e._orientation = toStoredVec2(record.orientation);
    if (record.id !== null && record.managerId !== null) {
      e.bindToManager(record.managerId, record.id);
    }
    return e;
  }

  serialize(): Uint8Array {
    return encodeEntity(this.toRecord());
  }

  /** Throws DecodeError for malformed bytes or values no entity could hold. */
  static deserialize(bytes: Uint8Array): GameEntity {
    return rebuild(() => GameEntity.fromRecord(decodeEntity(bytes)));
  }

  debug(): string {
    const k = this._kind;
    const kindLine =
      k.kind === "monster"
        ? `monster health=${k.health} damage=${k.damage} defeated=${k.defeated}`
        : k.kind === "player"
          ? `player lastAction=${EntityAction[k.lastAction]}`
          : "generic";

    return [
      `Entity ${this._id ?? "(unregistered)"} manager=${this._managerId ?? "-"}`,
      `  type: ${this.type}`,
      `  kind: ${kindLine}`,
      `  position: [${this._position.join(", ")}]`,
      `  orientation: [${this._orientation.join(", ")}]`,
      `  level: ${this._level}`,
      `  attributes: ${JSON.stringify(this.getAllAttributes())}`,
    ].join("\n");
  }
}
