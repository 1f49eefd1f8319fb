export type DeltaKind = "noop" | "clear" | "diff";

export interface ReconciliationDelta {
	kind: DeltaKind;
	/** Ascending user ids. */
	toAdd: number[];
	/** Ascending user ids. */
	toRemove: number[];
}

const ascending = (a: number, b: number): number => a - b;

/**
 * Compute the minimal add/remove delta that turns `current` into `desired`.
 * Membership is keyed by user id; duplicates and ordering are ignored.
 * Both output lists are sorted ascending so callers iterate them in a
 * stable order.
 */
export function reconcile(
	current: Iterable<number>,
	desired: Iterable<number>,
): ReconciliationDelta {
	const currentIds = new Set(current);
	const desiredIds = new Set(desired);

	if (desiredIds.size === 0) {
		if (currentIds.size === 0) {
			return { kind: "noop", toAdd: [], toRemove: [] };
		}
		return {
			kind: "clear",
			toAdd: [],
			toRemove: [...currentIds].sort(ascending),
		};
	}

	const toAdd: number[] = [];
	for (const id of desiredIds) {
		if (!currentIds.has(id)) {
			toAdd.push(id);
		}
	}

	const toRemove: number[] = [];
	for (const id of currentIds) {
		if (!desiredIds.has(id)) {
			toRemove.push(id);
		}
	}

	return {
		kind: "diff",
		toAdd: toAdd.sort(ascending),
		toRemove: toRemove.sort(ascending),
	};
}

export function isEmptyDelta(delta: ReconciliationDelta): boolean {
	return delta.toAdd.length === 0 && delta.toRemove.length === 0;
}
