// worldcore/test/contract_entityIdsMonotonic.test.ts
//
// Ids come from a per-manager counter that only ever goes up: deleting an
// entity never frees its id, and every lookup on a dead id is NotFound.

import test from "node:test";
import assert from "node:assert/strict";

import { EntityManager } from "../core/EntityManager";
import { InMemoryPlayerRegistry } from "../core/PlayerRegistry";
import { GameEntity } from "../entities/GameEntity";
import { NotFoundError } from "../shared/errors";

test("ids are handed out 0,1,2,... and stamped on the entity", () => {
  const mgr = new EntityManager(1);
  const entities = [GameEntity.npc(), GameEntity.npc(), GameEntity.player()];

  const ids = entities.map((e) => mgr.addEntity(e));

  assert.deepEqual(ids, [0, 1, 2]);
  assert.equal(mgr.allocatedCount, 3);
  assert.equal(mgr.size, 3);
  entities.forEach((e, i) => {
    assert.equal(e.id, i);
    assert.equal(e.managerId, 1);
  });
});

test("an entity is unregistered until a manager adds it", () => {
  const e = GameEntity.npc();
  assert.equal(e.id, null);
  assert.equal(e.managerId, null);
  assert.equal(e.isRegistered(), false);

  new EntityManager(0).addEntity(e);
  assert.equal(e.id, 0);
  assert.equal(e.managerId, 0);
  assert.equal(e.isRegistered(), true);
});

test("deleted ids are never reused", () => {
  const mgr = new EntityManager(2);
  mgr.addEntity(GameEntity.npc());
  mgr.addEntity(GameEntity.npc());

  mgr.deleteEntity(1);
  mgr.deleteEntity(0);

  assert.equal(mgr.addEntity(GameEntity.npc()), 2);
  assert.equal(mgr.allocatedCount, 3);
  assert.deepEqual(mgr.entityIds(), [2]);
});

test("every operation on a deleted id fails with NotFound and changes nothing", () => {
  const mgr = new EntityManager(3);
  const id = mgr.addEntity(GameEntity.player());
  const keep = mgr.addEntity(GameEntity.npc({ attributes: { hp: 10 } }));
  mgr.deleteEntity(id);

  const calls: Array<() => unknown> = [
    () => mgr.getEntity(id),
    () => mgr.deleteEntity(id),
    () => mgr.getEntityPosition(id),
    () => mgr.setEntityPosition(id, [1, 2, 3]),
    () => mgr.getEntityOrientation(id),
    () => mgr.setEntityOrientation(id, [0, 1]),
    () => mgr.updateAttribute(id, "hp", 1),
    () => mgr.getEntityAttributes(id),
    () => mgr.event(id, "tick", 1),
    () => mgr.userEvent(id, "action", 1),
  ];

  for (const call of calls) {
    assert.throws(call, (err: unknown) => {
      assert.ok(err instanceof NotFoundError);
      assert.equal(err.code, "NOT_FOUND");
      assert.equal(err.entityId, id);
      return true;
    });
  }

  assert.equal(mgr.allocatedCount, 2);
  assert.deepEqual(mgr.entityIds(), [keep]);
  assert.deepEqual(mgr.getEntityAttributes(keep), { hp: 10 });
});

test("a world with an NPC and a player: delete, miss, then keep counting", () => {
  const registry = new InMemoryPlayerRegistry();
  const mgr = new EntityManager(7, registry);

  const e1 = GameEntity.npc({ level: 1, position: [0, 0, 0] });
  assert.equal(mgr.addEntity(e1), 0);
  assert.deepEqual(registry.list(), []);

  assert.equal(mgr.addEntity(GameEntity.player()), 1);
  assert.deepEqual(registry.list(), [{ managerId: 7, entityId: 1 }]);

  mgr.deleteEntity(0);
  assert.throws(() => mgr.getEntityPosition(0), NotFoundError);

  assert.equal(mgr.addEntity(GameEntity.npc()), 2);
});

test("positions round-trip through the manager", () => {
  const mgr = new EntityManager(4);
  const id = mgr.addEntity(GameEntity.npc());

  assert.deepEqual(mgr.getEntityPosition(id), [0, 0, 0]);
  mgr.setEntityPosition(id, [1.5, -2.25, 10]);
  assert.deepEqual(mgr.getEntityPosition(id), [1.5, -2.25, 10]);

  // float32 storage
  mgr.setEntityPosition(id, [0.1, 0, 0]);
  assert.equal(mgr.getEntityPosition(id)[0], Math.fround(0.1));
});

test("getEntity hands out a copy, not the live entity", () => {
  const mgr = new EntityManager(5);
  const id = mgr.addEntity(GameEntity.npc({ attributes: { name: "rat" } }));

  const snap = mgr.getEntity(id);
  assert.equal(snap.id, id);
  assert.equal(snap.managerId, 5);
  assert.equal(snap.level, 1);
  assert.deepEqual(snap.orientation, [1, 0]);
  assert.deepEqual(snap.kind, { kind: "generic" });

  mgr.updateAttribute(id, "name", "big rat");
  assert.deepEqual(snap.attributes, { name: "rat" });
  assert.deepEqual(mgr.getEntity(id).attributes, { name: "big rat" });
});

test("getAllEntities maps every id to a copy of its attributes", () => {
  const mgr = new EntityManager(6);
  const a = mgr.addEntity(GameEntity.npc({ attributes: { hp: 5 } }));
  const b = mgr.addEntity(GameEntity.npc());
  mgr.updateAttribute(b, "flag", true);

  const all = mgr.getAllEntities();
  assert.deepEqual(
    all,
    new Map([
      [a, { hp: 5 }],
      [b, { flag: true }],
    ])
  );

  const bag = all.get(a);
  assert.ok(bag);
  bag.hp = 999;
  assert.deepEqual(mgr.getEntityAttributes(a), { hp: 5 });
});

test("debug lists one line per entity", () => {
  const mgr = new EntityManager(8);
  mgr.addEntity(GameEntity.npc({ attributes: { hp: 3 } }));
  mgr.addEntity(GameEntity.player());

  assert.equal(
    mgr.debug(),
    [
      "EntityManager 8 (nextId=2, entities=2)",
      ' - ID 0 [npc]: {"hp":3}',
      " - ID 1 [player]: {}",
    ].join("\n")
  );
});
