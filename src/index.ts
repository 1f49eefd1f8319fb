import { storeAccessGate } from "./core/access.ts";
import { runReconciliation } from "./core/bulk.ts";
import {
	AccessDeniedError,
	AssignmentError,
	ContainerNotFoundError,
	ForbiddenError,
	PersistenceError,
	PrincipalNotFoundError,
	WorkItemNotFoundError,
} from "./core/errors.ts";
import { pageWindow } from "./core/pagination.ts";
import type {
	AddAssigneeRequest,
	Assignment,
	AssignmentOptions,
	ListAssigneesForWorkItemsRequest,
	ListAssigneesRequest,
	ListAssigneesResult,
	Principal,
	ReconciliationResult,
	RemoveAssigneeRequest,
	ReplaceAssigneesRequest,
} from "./core/types.ts";
import {
	addAssigneeSchema,
	listAssigneesForWorkItemsSchema,
	listAssigneesSchema,
	parseRequest,
	removeAssigneeSchema,
	replaceAssigneesSchema,
} from "./core/validation.ts";
import { createLogger } from "./logger.ts";
import type { AssignmentStore } from "./store/interface.ts";

const DEFAULT_MAX_ITEMS_PER_PAGE = 50;

export interface AssignmentClient {
	addAssignee(request: AddAssigneeRequest): Promise<Assignment>;
	removeAssignee(request: RemoveAssigneeRequest): Promise<boolean>;
	listAssignees(request: ListAssigneesRequest): Promise<ListAssigneesResult>;
	replaceAssignees(
		request: ReplaceAssigneesRequest,
	): Promise<ReconciliationResult>;
	listAssigneesForWorkItems(
		request: ListAssigneesForWorkItemsRequest,
	): Promise<Map<number, Principal[]>>;
}

/** Domain errors pass through; anything else becomes a PersistenceError. */
async function guard<T>(operation: string, run: () => Promise<T>): Promise<T> {
	try {
		return await run();
	} catch (err) {
		if (err instanceof AssignmentError) {
			throw err;
		}
		throw new PersistenceError(operation, err);
	}
}

export function createAssignments(
	store: AssignmentStore,
	options: AssignmentOptions = {},
): AssignmentClient {
	const accessGate = options.accessGate ?? storeAccessGate;
	const logger = options.logger ?? createLogger();
	const maxItemsPerPage = options.maxItemsPerPage ?? DEFAULT_MAX_ITEMS_PER_PAGE;
	const now = options.now ?? (() => new Date());

	return {
		async addAssignee(request: AddAssigneeRequest): Promise<Assignment> {
			const { workItemId, principalId } = parseRequest(
				addAssigneeSchema,
				request,
			);
			return guard("addAssignee", () =>
				store.transaction(async (tx) => {
					const workItem = await tx.findWorkItem(workItemId);
					if (!workItem) {
						throw new WorkItemNotFoundError(workItemId);
					}
					const container = await tx.findContainer(workItem.containerId);
					if (!container) {
						throw new ContainerNotFoundError(workItem.containerId);
					}
					const principal = await tx.findPrincipal(principalId);
					if (!principal) {
						throw new PrincipalNotFoundError(principalId);
					}
					if (!(await accessGate(tx).canAssign(principalId, container))) {
						throw new AccessDeniedError(container.id, principalId);
					}

					const assignment: Assignment = {
						workItemId,
						principalId,
						created: now(),
					};
					await tx.insertAssignment(assignment);
					await tx.touchContainer(container.id, assignment.created);
					logger.info({ workItemId, principalId }, "assignee added");
					return assignment;
				}),
			);
		},

		async removeAssignee(request: RemoveAssigneeRequest): Promise<boolean> {
			const { workItemId, principalId } = parseRequest(
				removeAssigneeSchema,
				request,
			);
			return guard("removeAssignee", () =>
				store.transaction(async (tx) => {
					const removed = await tx.deleteAssignment(workItemId, principalId);
					if (!removed) {
						return false;
					}
					const workItem = await tx.findWorkItem(workItemId);
					if (workItem) {
						await tx.touchContainer(workItem.containerId, now());
					}
					logger.info({ workItemId, principalId }, "assignee removed");
					return true;
				}),
			);
		},

		async listAssignees(
			request: ListAssigneesRequest,
		): Promise<ListAssigneesResult> {
			const { workItemId, callerId, search, page, perPage } = parseRequest(
				listAssigneesSchema,
				request,
			);
			return guard("listAssignees", async () => {
				const workItem = await store.findWorkItem(workItemId);
				if (!workItem) {
					throw new WorkItemNotFoundError(workItemId);
				}
				const container = await store.findContainer(workItem.containerId);
				if (!container) {
					throw new ContainerNotFoundError(workItem.containerId);
				}
				if (!(await accessGate(store).canRead(callerId, container))) {
					throw new ForbiddenError(workItemId, callerId);
				}

				const { limit, offset } = pageWindow(page, perPage, maxItemsPerPage);
				const items = await store.listPrincipals(workItemId, {
					search,
					limit,
					offset,
				});
				// Counted separately from the page above; may drift from it
				// under concurrent writes.
				const total = await store.countPrincipals(workItemId, { search });
				return { items, count: items.length, total };
			});
		},

		async replaceAssignees(
			request: ReplaceAssigneesRequest,
		): Promise<ReconciliationResult> {
			const parsed = parseRequest(replaceAssigneesSchema, request);
			return guard("replaceAssignees", () =>
				runReconciliation(store, parsed, {
					accessGate,
					logger,
					now,
					onPhase: options.onPhase,
				}),
			);
		},

		async listAssigneesForWorkItems(
			request: ListAssigneesForWorkItemsRequest,
		): Promise<Map<number, Principal[]>> {
			const { workItemIds } = parseRequest(
				listAssigneesForWorkItemsSchema,
				request,
			);
			return guard("listAssigneesForWorkItems", () =>
				store.listAssigneesForWorkItems(workItemIds),
			);
		},
	};
}

// Re-exports
export { assignmentOptions, type Config, loadConfig } from "./config.ts";
export {
	type AccessGate,
	type AccessGateFactory,
	StoreAccessGate,
	storeAccessGate,
} from "./core/access.ts";
export { runReconciliation } from "./core/bulk.ts";
export {
	AccessDeniedError,
	AssignmentError,
	ConflictError,
	ContainerNotFoundError,
	ForbiddenError,
	NotFoundError,
	PersistenceError,
	PrincipalNotFoundError,
	ValidationError,
	WorkItemNotFoundError,
} from "./core/errors.ts";
export { pageWindow } from "./core/pagination.ts";
export {
	isEmptyDelta,
	type ReconciliationDelta,
	reconcile,
} from "./core/reconcile.ts";
export type {
	AddAssigneeRequest,
	Assignment,
	AssignmentOptions,
	Container,
	ListAssigneesForWorkItemsRequest,
	ListAssigneesRequest,
	ListAssigneesResult,
	Principal,
	ReconciliationPhase,
	ReconciliationResult,
	RemoveAssigneeRequest,
	ReplaceAssigneesRequest,
	WorkItem,
} from "./core/types.ts";
export { createLogger } from "./logger.ts";
export type { AssignmentStore } from "./store/interface.ts";
export { KyselyAssignmentStore } from "./store/kysely/adapter.ts";
export { createDb, createPool } from "./store/kysely/db.ts";
export { migrateToLatest } from "./store/kysely/migrator.ts";
export type { DB } from "./store/kysely/schema.ts";
