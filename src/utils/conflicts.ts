import type { Conflict, FieldPath } from "../types";
import { comparePaths, pathsEqual } from "./fieldPath";
import type { FieldSet } from "./fieldSet";
import { compareStrings } from "./helpers";
import type { ManagedFields } from "./managedFields";

/**
 * Paths in `changed` that some manager other than `manager` owns.
 * `changed` must hold only the paths whose value the operation alters, so
 * re-declaring an unchanged value never conflicts.
 */
export function detectConflicts(changed: FieldSet, managed: ManagedFields, manager: string): Conflict[] {
	const conflicts: Conflict[] = [];
	if (changed.isEmpty()) {
		return conflicts;
	}
	for (const [owner, set] of managed) {
		if (owner === manager) continue;
		for (const path of set.fields.intersection(changed).paths()) {
			conflicts.push({ manager: owner, path });
		}
	}
	return conflicts;
}

/**
 * Conflicting paths per manager, in the order given
 */
export function conflictsByManager(conflicts: readonly Conflict[]): Map<string, FieldPath[]> {
	const grouped = new Map<string, FieldPath[]>();
	for (const conflict of conflicts) {
		grouped.set(conflict.manager, [...(grouped.get(conflict.manager) ?? []), conflict.path]);
	}
	return grouped;
}

export function sortConflicts(conflicts: readonly Conflict[]): Conflict[] {
	return [...conflicts].sort((a, b) => compareStrings(a.manager, b.manager) || comparePaths(a.path, b.path));
}

/**
 * Order-insensitive equality of two conflict lists
 */
export function conflictsEqual(a: readonly Conflict[], b: readonly Conflict[]): boolean {
	if (a.length !== b.length) {
		return false;
	}
	const left = sortConflicts(a);
	const right = sortConflicts(b);
	return left.every((conflict, i) => conflict.manager === right[i].manager && pathsEqual(conflict.path, right[i].path));
}
