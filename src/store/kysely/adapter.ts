import type { Kysely } from "kysely";
import { ConflictError, ContainerNotFoundError } from "../../core/errors.ts";
import type {
	Assignment,
	Container,
	Principal,
	PrincipalQuery,
	WorkItem,
} from "../../core/types.ts";
import type { AssignmentStore } from "../interface.ts";
import type { DB } from "./schema.ts";

const UNIQUE_VIOLATION = "23505";

function isUniqueViolation(err: unknown): boolean {
	if (typeof err !== "object" || err === null || !("code" in err)) {
		return false;
	}
	return err.code === UNIQUE_VIOLATION;
}

function usernamePattern(search: string | undefined): string {
	return `%${search ?? ""}%`;
}

export class KyselyAssignmentStore implements AssignmentStore {
	constructor(private readonly db: Kysely<DB>) {}

	async findWorkItem(workItemId: number): Promise<WorkItem | undefined> {
		const row = await this.db
			.selectFrom("tasks")
			.select(["id", "list_id"])
			.where("id", "=", workItemId)
			.executeTakeFirst();
		return row ? { id: row.id, containerId: row.list_id } : undefined;
	}

	async findContainer(containerId: number): Promise<Container | undefined> {
		const row = await this.db
			.selectFrom("lists")
			.select(["id", "namespace_id", "owner_id"])
			.where("id", "=", containerId)
			.executeTakeFirst();
		return row
			? { id: row.id, namespaceId: row.namespace_id, ownerId: row.owner_id }
			: undefined;
	}

	async findPrincipal(principalId: number): Promise<Principal | undefined> {
		return this.db
			.selectFrom("users")
			.select(["id", "username", "name", "email"])
			.where("id", "=", principalId)
			.executeTakeFirst();
	}

	async canReadContainer(
		containerId: number,
		principalId: number,
	): Promise<boolean> {
		const row = await this.db
			.selectFrom("lists")
			.innerJoin("namespaces", "namespaces.id", "lists.namespace_id")
			.select("lists.id")
			.where("lists.id", "=", containerId)
			.where((eb) =>
				eb.or([
					eb("lists.owner_id", "=", principalId),
					eb("namespaces.owner_id", "=", principalId),
					eb.exists(
						eb
							.selectFrom("list_users")
							.select("list_users.list_id")
							.whereRef("list_users.list_id", "=", "lists.id")
							.where("list_users.user_id", "=", principalId),
					),
					eb.exists(
						eb
							.selectFrom("team_members")
							.innerJoin(
								"team_lists",
								"team_lists.team_id",
								"team_members.team_id",
							)
							.select("team_members.team_id")
							.whereRef("team_lists.list_id", "=", "lists.id")
							.where("team_members.user_id", "=", principalId),
					),
					eb.exists(
						eb
							.selectFrom("team_members")
							.innerJoin(
								"team_namespaces",
								"team_namespaces.team_id",
								"team_members.team_id",
							)
							.select("team_members.team_id")
							.whereRef(
								"team_namespaces.namespace_id",
								"=",
								"lists.namespace_id",
							)
							.where("team_members.user_id", "=", principalId),
					),
				]),
			)
			.executeTakeFirst();
		return row !== undefined;
	}

	async listAssignedPrincipalIds(workItemId: number): Promise<number[]> {
		const rows = await this.db
			.selectFrom("task_assignees")
			.select("user_id")
			.where("task_id", "=", workItemId)
			.orderBy("user_id")
			.execute();
		return rows.map((row) => row.user_id);
	}

	async insertAssignment(assignment: Assignment): Promise<void> {
		try {
			await this.db
				.insertInto("task_assignees")
				.values({
					task_id: assignment.workItemId,
					user_id: assignment.principalId,
					created: assignment.created,
				})
				.execute();
		} catch (err) {
			if (isUniqueViolation(err)) {
				throw new ConflictError(assignment.workItemId, assignment.principalId);
			}
			throw err;
		}
	}

	async deleteAssignment(
		workItemId: number,
		principalId: number,
	): Promise<boolean> {
		const result = await this.db
			.deleteFrom("task_assignees")
			.where("task_id", "=", workItemId)
			.where("user_id", "=", principalId)
			.executeTakeFirstOrThrow();
		return result.numDeletedRows > 0n;
	}

	async deleteAssignments(
		workItemId: number,
		principalIds: number[],
	): Promise<number> {
		if (principalIds.length === 0) {
			return 0;
		}
		const result = await this.db
			.deleteFrom("task_assignees")
			.where("task_id", "=", workItemId)
			.where("user_id", "in", principalIds)
			.executeTakeFirstOrThrow();
		return Number(result.numDeletedRows);
	}

	async deleteAllAssignments(workItemId: number): Promise<number> {
		const result = await this.db
			.deleteFrom("task_assignees")
			.where("task_id", "=", workItemId)
			.executeTakeFirstOrThrow();
		return Number(result.numDeletedRows);
	}

	async listPrincipals(
		workItemId: number,
		query: PrincipalQuery,
	): Promise<Principal[]> {
		let select = this.db
			.selectFrom("task_assignees")
			.innerJoin("users", "users.id", "task_assignees.user_id")
			.select(["users.id", "users.username", "users.name", "users.email"])
			.where("task_assignees.task_id", "=", workItemId)
			.where((eb) =>
				eb("users.username", "ilike", usernamePattern(query.search)),
			)
			.orderBy("users.id");
		if (query.limit !== undefined) {
			select = select.limit(query.limit).offset(query.offset ?? 0);
		}
		return select.execute();
	}

	// Not read in the same statement or snapshot as listPrincipals; under
	// concurrent writes the total can disagree with the page.
	async countPrincipals(
		workItemId: number,
		query: Pick<PrincipalQuery, "search">,
	): Promise<number> {
		const row = await this.db
			.selectFrom("task_assignees")
			.innerJoin("users", "users.id", "task_assignees.user_id")
			.select((eb) => eb.fn.countAll().as("total"))
			.where("task_assignees.task_id", "=", workItemId)
			.where((eb) =>
				eb("users.username", "ilike", usernamePattern(query.search)),
			)
			.executeTakeFirstOrThrow();
		return Number(row.total);
	}

	async listAssigneesForWorkItems(
		workItemIds: number[],
	): Promise<Map<number, Principal[]>> {
		const byWorkItem = new Map<number, Principal[]>(
			workItemIds.map((id) => [id, []]),
		);
		if (workItemIds.length === 0) {
			return byWorkItem;
		}
		const rows = await this.db
			.selectFrom("task_assignees")
			.innerJoin("users", "users.id", "task_assignees.user_id")
			.select([
				"task_assignees.task_id",
				"users.id",
				"users.username",
				"users.name",
				"users.email",
			])
			.where("task_assignees.task_id", "in", workItemIds)
			.orderBy("task_assignees.task_id")
			.orderBy("users.id")
			.execute();
		for (const { task_id, ...principal } of rows) {
			byWorkItem.get(task_id)?.push(principal);
		}
		return byWorkItem;
	}

	async touchContainer(containerId: number, at: Date): Promise<void> {
		const result = await this.db
			.updateTable("lists")
			.set({ updated: at })
			.where("id", "=", containerId)
			.executeTakeFirstOrThrow();
		if (result.numUpdatedRows === 0n) {
			throw new ContainerNotFoundError(containerId);
		}
	}

	transaction<T>(fn: (store: AssignmentStore) => Promise<T>): Promise<T> {
		return this.db
			.transaction()
			.execute((trx) => fn(new KyselyAssignmentStore(trx)));
	}
}
