import type { AssignmentStore } from "../store/interface.ts";
import type { Container } from "./types.ts";

/**
 * Decides whether a user may be associated with a list. Rejections are
 * errors; a `false` answer is a denial.
 */
export interface AccessGate {
	canAssign(principalId: number, container: Container): Promise<boolean>;
	canRead(principalId: number, container: Container): Promise<boolean>;
}

/** Gates are bound to the store of the transaction they check within. */
export type AccessGateFactory = (store: AssignmentStore) => AccessGate;

/**
 * Default gate: a user may be assigned to tasks of any list they can read.
 */
export class StoreAccessGate implements AccessGate {
	constructor(private readonly store: AssignmentStore) {}

	canAssign(principalId: number, container: Container): Promise<boolean> {
		return this.store.canReadContainer(container.id, principalId);
	}

	canRead(principalId: number, container: Container): Promise<boolean> {
		return this.store.canReadContainer(container.id, principalId);
	}
}

export const storeAccessGate: AccessGateFactory = (store) =>
	new StoreAccessGate(store);
