// worldcore/core/PlayerRegistry.ts

/**
 * External collaborator told about every player entity a manager adds.
 *
 * NOTE: EntityManager.deleteEntity does NOT call back here. A host that
 * tracks players must reconcile on its own (e.g. check
 * EntityManager.hasEntity before acting on a stored player id).
 */
export interface PlayerRegistry {
  /**
   * Called synchronously from addEntity, exactly once per player entity.
   * Throwing aborts the add and leaves the manager unchanged.
   */
  registerPlayer(managerId: number, entityId: number): void;
}

export const NoopPlayerRegistry: PlayerRegistry = {
  registerPlayer() {},
};

export interface PlayerRegistration {
  managerId: number;
  entityId: number;
}

/** Keeps every registration in memory, in call order. */
export class InMemoryPlayerRegistry implements PlayerRegistry {
  private readonly registrations: PlayerRegistration[] = [];

  registerPlayer(managerId: number, entityId: number): void {
    this.registrations.push({ managerId, entityId });
  }

  /** Registration history, oldest first. */
  list(): PlayerRegistration[] {
    return this.registrations.map((r) => ({ ...r }));
  }

  playersFor(managerId: number): number[] {
    return this.registrations
      .filter((r) => r.managerId === managerId)
      .map((r) => r.entityId);
  }

  get size(): number {
    return this.registrations.length;
  }
}
