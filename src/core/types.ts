import type { Logger } from "pino";
import type { AccessGateFactory } from "./access.ts";

export interface Principal {
	id: number;
	username: string;
	name: string;
	email: string | null;
}

export interface WorkItem {
	id: number;
	containerId: number;
}

export interface Container {
	id: number;
	namespaceId: number;
	ownerId: number;
}

export interface Assignment {
	workItemId: number;
	principalId: number;
	created: Date;
}

export interface AddAssigneeRequest {
	workItemId: number;
	principalId: number;
}

export interface RemoveAssigneeRequest {
	workItemId: number;
	principalId: number;
}

export interface ListAssigneesRequest {
	workItemId: number;
	/** The user asking; must be able to read the task's list. */
	callerId: number;
	search?: string;
	page?: number;
	perPage?: number;
}

export interface ListAssigneesResult {
	items: Principal[];
	/** Number of items on this page. */
	count: number;
	/**
	 * Total matching assignees, counted by a separate query. Under concurrent
	 * writes it may disagree with the page it accompanies.
	 */
	total: number;
}

export interface ReplaceAssigneesRequest {
	workItemId: number;
	/** The full desired set. An empty list unassigns everyone. */
	principalIds: number[];
}

export interface ListAssigneesForWorkItemsRequest {
	workItemIds: number[];
}

export interface PrincipalQuery {
	search?: string;
	/** Omit to read every row. */
	limit?: number;
	offset?: number;
}

export type ReconciliationPhase =
	| "started"
	| "loaded"
	| "diffed"
	| "validated"
	| "applied"
	| "committed"
	| "rolledBack";

export interface ReconciliationResult {
	workItemId: number;
	/** Assignees after the call, ordered by user id. */
	assignees: Principal[];
	added: number[];
	removed: number[];
	changed: boolean;
}

export interface AssignmentOptions {
	/**
	 * Builds the gate used for each transaction. Defaults to the store's own
	 * access query.
	 */
	accessGate?: AccessGateFactory;
	logger?: Logger;
	maxItemsPerPage?: number;
	now?: () => Date;
	onPhase?: (phase: ReconciliationPhase, workItemId: number) => void;
}
