import type {
	Assignment,
	Container,
	Principal,
	PrincipalQuery,
	WorkItem,
} from "../core/types.ts";

export interface AssignmentStore {
	findWorkItem(workItemId: number): Promise<WorkItem | undefined>;
	findContainer(containerId: number): Promise<Container | undefined>;
	findPrincipal(principalId: number): Promise<Principal | undefined>;

	/** Whether the user can read the list through ownership or a share. */
	canReadContainer(containerId: number, principalId: number): Promise<boolean>;

	/** Ids of the task's current assignees, ascending. */
	listAssignedPrincipalIds(workItemId: number): Promise<number[]>;

	/** Throws ConflictError when the pair already exists. */
	insertAssignment(assignment: Assignment): Promise<void>;
	/** Returns whether a row was removed. */
	deleteAssignment(workItemId: number, principalId: number): Promise<boolean>;
	deleteAssignments(workItemId: number, principalIds: number[]): Promise<number>;
	deleteAllAssignments(workItemId: number): Promise<number>;

	listPrincipals(
		workItemId: number,
		query: PrincipalQuery,
	): Promise<Principal[]>;
	countPrincipals(
		workItemId: number,
		query: Pick<PrincipalQuery, "search">,
	): Promise<number>;
	listAssigneesForWorkItems(
		workItemIds: number[],
	): Promise<Map<number, Principal[]>>;

	/** Rejects with ContainerNotFoundError when no list row was updated. */
	touchContainer(containerId: number, at: Date): Promise<void>;

	/**
	 * Run `fn` against a store bound to a single transaction. Commits when
	 * `fn` resolves, rolls back when it rejects.
	 */
	transaction<T>(fn: (store: AssignmentStore) => Promise<T>): Promise<T>;
}
