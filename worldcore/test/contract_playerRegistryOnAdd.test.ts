// worldcore/test/contract_playerRegistryOnAdd.test.ts
//
// addEntity reports player entities to the injected PlayerRegistry exactly
// once, and any failed add leaves the manager exactly as it was.

import test from "node:test";
import assert from "node:assert/strict";

import { EntityManager } from "../core/EntityManager";
import { InMemoryPlayerRegistry, type PlayerRegistry } from "../core/PlayerRegistry";
import { GameEntity } from "../entities/GameEntity";
import { EntityType } from "../shared/Entity";
import { AlreadyRegisteredError, InvalidArgumentError } from "../shared/errors";

test("players trigger one registry call with (managerId, entityId); NPCs trigger none", () => {
  const registry = new InMemoryPlayerRegistry();
  const mgr = new EntityManager(12, registry);

  mgr.addEntity(GameEntity.npc());
  mgr.addEntity(GameEntity.monster({ health: 5, damage: 1 }));
  assert.equal(registry.size, 0);

  const pid = mgr.addEntity(GameEntity.player());
  assert.deepEqual(registry.list(), [{ managerId: 12, entityId: pid }]);

  // a generic entity tagged PLAYER still counts as a player
  const gid = mgr.addEntity(new GameEntity({ type: EntityType.PLAYER }));
  assert.deepEqual(registry.playersFor(12), [pid, gid]);
  assert.deepEqual(registry.playersFor(13), []);
});

test("the registry sees the entity already present when it is called", () => {
  let seen: boolean | null = null;
  let mgr: EntityManager | null = null;
  const registry: PlayerRegistry = {
    registerPlayer(_managerId, entityId) {
      seen = mgr?.hasEntity(entityId) ?? null;
    },
  };
  mgr = new EntityManager(1, registry);

  mgr.addEntity(GameEntity.player());
  assert.equal(seen, true);
});

test("a failing registry rolls the add back and propagates", () => {
  const boom = new Error("registry offline");
  let fail = true;
  const registry: PlayerRegistry = {
    registerPlayer() {
      if (fail) throw boom;
    },
  };
  const mgr = new EntityManager(2, registry);
  mgr.addEntity(GameEntity.npc());

  const player = GameEntity.player();
  assert.throws(() => mgr.addEntity(player), (err: unknown) => err === boom);

  assert.equal(mgr.allocatedCount, 1);
  assert.deepEqual(mgr.entityIds(), [0]);
  assert.equal(player.id, null);
  assert.equal(player.managerId, null);

  // The same entity can be added once the registry recovers, and gets the id
  // the failed attempt would have used.
  fail = false;
  assert.equal(mgr.addEntity(player), 1);
  assert.equal(player.id, 1);
});

test("a failing registry that added entities itself doesn't rewind the counter", () => {
  let mgr: EntityManager | null = null;
  const registry: PlayerRegistry = {
    registerPlayer() {
      mgr?.addEntity(GameEntity.npc());
      throw new Error("registry offline");
    },
  };
  mgr = new EntityManager(3, registry);

  const player = GameEntity.player();
  assert.throws(() => mgr?.addEntity(player), /registry offline/);

  // id 0 went to the player and was rolled back; id 1 belongs to the NPC
  assert.deepEqual(mgr.entityIds(), [1]);
  assert.equal(mgr.allocatedCount, 2);
  assert.equal(player.id, null);
  assert.equal(mgr.addEntity(GameEntity.npc()), 2);
});

test("re-adding a registered entity is AlreadyRegistered, to any manager", () => {
  const a = new EntityManager(1);
  const b = new EntityManager(2);
  const e = GameEntity.npc();
  a.addEntity(e);

  for (const mgr of [a, b]) {
    assert.throws(() => mgr.addEntity(e), (err: unknown) => {
      assert.ok(err instanceof AlreadyRegisteredError);
      assert.equal(err.code, "ALREADY_REGISTERED");
      assert.equal(err.entityId, 0);
      assert.equal(err.managerId, 1);
      return true;
    });
  }
  assert.equal(a.allocatedCount, 1);
  assert.equal(b.allocatedCount, 0);
});

test("a deleted entity stays stamped and cannot come back", () => {
  const mgr = new EntityManager(1);
  const e = GameEntity.npc();
  const id = mgr.addEntity(e);
  mgr.deleteEntity(id);

  assert.equal(e.id, id);
  assert.throws(() => mgr.addEntity(e), AlreadyRegisteredError);
  assert.equal(mgr.size, 0);
});

test("deleting a player does not call the registry", () => {
  const registry = new InMemoryPlayerRegistry();
  const mgr = new EntityManager(1, registry);
  const id = mgr.addEntity(GameEntity.player());

  mgr.deleteEntity(id);
  assert.equal(registry.size, 1);
});

test("anything that isn't a GameEntity is InvalidArgument", () => {
  const mgr = new EntityManager(1);
  const fakes: unknown[] = [null, 42, "entity", { id: 0, type: "npc" }];

  for (const fake of fakes) {
    assert.throws(() => mgr.addEntity(fake), InvalidArgumentError);
  }
  assert.equal(mgr.allocatedCount, 0);
});

test("manager ids must be non-negative integers", () => {
  assert.throws(() => new EntityManager(-1), InvalidArgumentError);
  assert.throws(() => new EntityManager(1.5), InvalidArgumentError);
  assert.equal(new EntityManager(0).id, 0);
});
