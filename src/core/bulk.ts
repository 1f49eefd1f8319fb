import type { Logger } from "pino";
import type { AssignmentStore } from "../store/interface.ts";
import type { AccessGateFactory } from "./access.ts";
import {
	AccessDeniedError,
	ContainerNotFoundError,
	PrincipalNotFoundError,
	WorkItemNotFoundError,
} from "./errors.ts";
import { isEmptyDelta, reconcile } from "./reconcile.ts";
import type {
	ReconciliationPhase,
	ReconciliationResult,
	ReplaceAssigneesRequest,
} from "./types.ts";

export interface ReconciliationContext {
	accessGate: AccessGateFactory;
	logger: Logger;
	now: () => Date;
	onPhase?: (phase: ReconciliationPhase, workItemId: number) => void;
}

/**
 * Replace a task's assignees with `request.principalIds` inside one
 * transaction.
 *
 * Every addition is validated before anything is written, in ascending id
 * order, so the first failure reported is always the lowest offending id.
 * Removals are applied before additions and the list's `updated` marker is
 * touched once, only when the delta is non-empty. Any failure rolls the whole
 * scope back.
 */
export async function runReconciliation(
	store: AssignmentStore,
	request: ReplaceAssigneesRequest,
	context: ReconciliationContext,
): Promise<ReconciliationResult> {
	const { workItemId } = request;
	const log = context.logger.child({ workItemId });

	const advance = (phase: ReconciliationPhase): void => {
		log.debug({ phase }, "reconciliation phase");
		context.onPhase?.(phase, workItemId);
	};

	advance("started");
	try {
		const result = await store.transaction<ReconciliationResult>(async (tx) => {
			const workItem = await tx.findWorkItem(workItemId);
			if (!workItem) {
				throw new WorkItemNotFoundError(workItemId);
			}
			const current = await tx.listAssignedPrincipalIds(workItemId);
			advance("loaded");

			const delta = reconcile(current, request.principalIds);
			advance("diffed");

			if (isEmptyDelta(delta)) {
				advance("validated");
				advance("applied");
				return {
					workItemId,
					assignees: await tx.listPrincipals(workItemId, {}),
					added: [],
					removed: [],
					changed: false,
				};
			}

			// A non-empty delta always touches the list, so it must exist even
			// when nothing is being added.
			const container = await tx.findContainer(workItem.containerId);
			if (!container) {
				throw new ContainerNotFoundError(workItem.containerId);
			}
			const gate = context.accessGate(tx);
			for (const principalId of delta.toAdd) {
				const principal = await tx.findPrincipal(principalId);
				if (!principal) {
					throw new PrincipalNotFoundError(principalId);
				}
				if (!(await gate.canAssign(principalId, container))) {
					throw new AccessDeniedError(container.id, principalId);
				}
			}
			advance("validated");

			if (delta.kind === "clear") {
				await tx.deleteAllAssignments(workItemId);
			} else {
				await tx.deleteAssignments(workItemId, delta.toRemove);
			}
			const created = context.now();
			for (const principalId of delta.toAdd) {
				await tx.insertAssignment({ workItemId, principalId, created });
			}
			await tx.touchContainer(container.id, created);
			advance("applied");

			return {
				workItemId,
				assignees: await tx.listPrincipals(workItemId, {}),
				added: delta.toAdd,
				removed: delta.toRemove,
				changed: true,
			};
		});
		advance("committed");
		if (result.changed) {
			log.info(
				{ added: result.added, removed: result.removed },
				"assignees replaced",
			);
		}
		return result;
	} catch (err) {
		advance("rolledBack");
		log.warn({ err }, "assignee reconciliation rolled back");
		throw err;
	}
}
