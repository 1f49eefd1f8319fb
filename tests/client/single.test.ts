import type { Kysely } from "kysely";
import { pino } from "pino";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
  AccessDeniedError,
  type AssignmentClient,
  ConflictError,
  ContainerNotFoundError,
  createAssignments,
  KyselyAssignmentStore,
  PersistenceError,
  PrincipalNotFoundError,
  ValidationError,
  WorkItemNotFoundError,
} from "src/index.ts";
import type { DB } from "src/store/kysely/schema.ts";
import {
  assign,
  assignedIds,
  destroyDb,
  getDb,
  listUpdatedAt,
  SEEDED_AT,
  seedFixtures,
  tickingClock,
} from "tests/helpers/db.ts";

describe("single assignee operations", () => {
  let db: Kysely<DB>;
  let client: AssignmentClient;
  let clock: ReturnType<typeof tickingClock>;

  beforeEach(async () => {
    db = await getDb();
    await seedFixtures(db);
    clock = tickingClock();
    client = createAssignments(new KyselyAssignmentStore(db), {
      logger: pino({ level: "silent" }),
      now: clock.now,
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await destroyDb();
  });

  describe("addAssignee", () => {
    test("assigns a user who can read the list and touches it", async () => {
      const assignment = await client.addAssignee({
        workItemId: 1,
        principalId: 3,
      });
      expect(assignment).toEqual({
        workItemId: 1,
        principalId: 3,
        created: new Date("2024-01-01T00:00:01.000Z"),
      });
      expect(await assignedIds(db, 1)).toEqual([3]);
      expect(await listUpdatedAt(db, 1)).toBe("2024-01-01T00:00:01.000Z");
      expect(clock.calls()).toBe(1);
    });

    test("rejects a user without access to the list", async () => {
      const error = await client
        .addAssignee({ workItemId: 1, principalId: 4 })
        .catch((err: unknown) => err);
      expect(error).toBeInstanceOf(AccessDeniedError);
      expect(error).toMatchObject({ containerId: 1, principalId: 4 });
      expect(await assignedIds(db, 1)).toEqual([]);
      expect(await listUpdatedAt(db, 1)).toBe(SEEDED_AT);
    });

    test("rejects an unknown task", async () => {
      await expect(
        client.addAssignee({ workItemId: 404, principalId: 2 }),
      ).rejects.toThrow(WorkItemNotFoundError);
    });

    test("rejects a task whose list is missing", async () => {
      await expect(
        client.addAssignee({ workItemId: 4, principalId: 2 }),
      ).rejects.toThrow(ContainerNotFoundError);
    });

    test("rejects an unknown user", async () => {
      await expect(
        client.addAssignee({ workItemId: 1, principalId: 10 }),
      ).rejects.toThrow(PrincipalNotFoundError);
    });

    test("rejects a duplicate without touching the list", async () => {
      await assign(db, 1, [2]);
      await expect(
        client.addAssignee({ workItemId: 1, principalId: 2 }),
      ).rejects.toThrow(ConflictError);
      expect(await listUpdatedAt(db, 1)).toBe(SEEDED_AT);
    });

    test("rejects malformed ids before touching the store", async () => {
      const spy = vi.spyOn(KyselyAssignmentStore.prototype, "transaction");
      await expect(
        client.addAssignee({ workItemId: -1, principalId: 2 }),
      ).rejects.toThrow(ValidationError);
      expect(spy).not.toHaveBeenCalled();
    });

    test("honours an injected access gate", async () => {
      const gated = createAssignments(new KyselyAssignmentStore(db), {
        logger: pino({ level: "silent" }),
        accessGate: () => ({
          canAssign: async (principalId) => principalId === 4,
          canRead: async () => true,
        }),
      });
      await gated.addAssignee({ workItemId: 1, principalId: 4 });
      await expect(
        gated.addAssignee({ workItemId: 1, principalId: 2 }),
      ).rejects.toThrow(AccessDeniedError);
      expect(await assignedIds(db, 1)).toEqual([4]);
    });

    test("wraps lower-layer failures in PersistenceError", async () => {
      const cause = new Error("connection reset");
      vi.spyOn(
        KyselyAssignmentStore.prototype,
        "touchContainer",
      ).mockRejectedValueOnce(cause);
      const error = await client
        .addAssignee({ workItemId: 1, principalId: 2 })
        .catch((err: unknown) => err);
      expect(error).toBeInstanceOf(PersistenceError);
      expect(error).toMatchObject({ cause });
      expect(await assignedIds(db, 1)).toEqual([]);
    });
  });

  describe("removeAssignee", () => {
    test("removes the pair and touches the list", async () => {
      await assign(db, 1, [2, 7]);
      expect(
        await client.removeAssignee({ workItemId: 1, principalId: 2 }),
      ).toBe(true);
      expect(await assignedIds(db, 1)).toEqual([7]);
      expect(await listUpdatedAt(db, 1)).toBe("2024-01-01T00:00:01.000Z");
    });

    test("succeeds on an absent pair without touching the list", async () => {
      expect(
        await client.removeAssignee({ workItemId: 1, principalId: 2 }),
      ).toBe(false);
      expect(
        await client.removeAssignee({ workItemId: 404, principalId: 2 }),
      ).toBe(false);
      expect(await listUpdatedAt(db, 1)).toBe(SEEDED_AT);
      expect(clock.calls()).toBe(0);
    });

    test("is idempotent", async () => {
      await assign(db, 1, [2]);
      const request = { workItemId: 1, principalId: 2 };
      expect(await client.removeAssignee(request)).toBe(true);
      expect(await client.removeAssignee(request)).toBe(false);
      expect(await assignedIds(db, 1)).toEqual([]);
      expect(clock.calls()).toBe(1);
    });

    test("keeps the pair when the task's list is missing", async () => {
      await assign(db, 4, [2]);
      await expect(
        client.removeAssignee({ workItemId: 4, principalId: 2 }),
      ).rejects.toThrow(ContainerNotFoundError);
      expect(await assignedIds(db, 4)).toEqual([2]);
    });
  });
});
