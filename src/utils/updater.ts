import { type Conflict, Operation } from "../types";
import { resolveUpdaterOptions, type UpdaterConfig, type UpdaterOptions } from "./config";
import { detectConflicts } from "./conflicts";
import { ConflictError } from "./errors";
import { isKeyFieldPath, pathToString } from "./fieldPath";
import { FieldSet } from "./fieldSet";
import type { Logger } from "./logger";
import { type ManagedFields, newVersionedSet } from "./managedFields";
import type { Comparison, TypedValue } from "./typedValue";

export interface MergeRequest {
	liveObject: TypedValue;
	liveManaged: ManagedFields;
	incomingObject: TypedValue;
	manager: string;
	apiVersion: string;
}

export interface MergeResult {
	object: TypedValue;
	managed: ManagedFields;
	/**
	 * Ownership taken from other managers. Always empty for a successful Apply.
	 */
	conflicts: readonly Conflict[];
}

interface Reconciled {
	managed: ManagedFields;
	comparison: Comparison;
	conflicts: Conflict[];
}

/**
 * Merges writes from several managers into one object while tracking
 * which manager owns which field. Holds configuration only; every call is
 * a pure function of its arguments.
 */
export class Updater {
	private readonly config: UpdaterConfig;
	private readonly logger: Logger;

	constructor(options: UpdaterOptions = {}) {
		const { config, logger } = resolveUpdaterOptions(options);
		this.config = config;
		this.logger = logger;
	}

	/**
	 * Unconditional write. The writer takes every path whose value it changes,
	 * displacing any other owner.
	 */
	update(liveObject: TypedValue, liveManaged: ManagedFields, incomingObject: TypedValue, manager: string, apiVersion: string): MergeResult {
		const merged = liveObject.merge(incomingObject);
		const { managed, comparison, conflicts } = this.reconcile(liveObject, merged, liveManaged, manager, true);

		const previous = managed.get(manager)?.fields ?? FieldSet.empty();
		// A variant switch lists a path as both removed and added
		const owned = previous.difference(comparison.removed).union(comparison.added).union(comparison.modified);
		const result = managed.set(manager, newVersionedSet(owned, apiVersion, false));

		this.logger.debug("update", { manager, apiVersion, owned: owned.size, displaced: conflicts.length });
		return { object: merged, managed: result, conflicts };
	}

	/**
	 * Declarative write. The applier's ownership becomes exactly the fields of
	 * `configObject`.
	 * @throws ConflictError when `force` is false and a declared value differs
	 * from one owned by another manager; nothing is merged in that case
	 */
	apply(liveObject: TypedValue, liveManaged: ManagedFields, configObject: TypedValue, manager: string, apiVersion: string, force = false): MergeResult {
		const declared = configObject.toFieldSet();
		const previous = liveManaged.get(manager);
		let managed = liveManaged.set(manager, newVersionedSet(declared, apiVersion, true));

		let merged = liveObject.merge(configObject);
		if (this.config.removeDanglingFields && previous) {
			merged = this.removeDangling(merged, managed, manager, previous.fields.difference(declared));
		}

		const reconciled = this.reconcile(liveObject, merged, managed, manager, force);
		managed = reconciled.managed;

		this.logger.debug(force ? "force apply" : "apply", { manager, apiVersion, declared: declared.size });
		return { object: merged, managed, conflicts: reconciled.conflicts };
	}

	forceApply(liveObject: TypedValue, liveManaged: ManagedFields, configObject: TypedValue, manager: string, apiVersion: string): MergeResult {
		return this.apply(liveObject, liveManaged, configObject, manager, apiVersion, true);
	}

	run(operation: Operation, request: MergeRequest): MergeResult {
		const { liveObject, liveManaged, incomingObject, manager, apiVersion } = request;
		switch (operation) {
			case Operation.Update:
				return this.update(liveObject, liveManaged, incomingObject, manager, apiVersion);
			case Operation.Apply:
				return this.apply(liveObject, liveManaged, incomingObject, manager, apiVersion);
			case Operation.ForceApply:
				return this.forceApply(liveObject, liveManaged, incomingObject, manager, apiVersion);
		}
	}

	/**
	 * Detect conflicts between the change from `liveObject` to `merged` and
	 * every other manager. Unless forced, any conflict aborts; otherwise the
	 * conflicting and removed paths leave the other managers' sets.
	 */
	private reconcile(liveObject: TypedValue, merged: TypedValue, managed: ManagedFields, manager: string, force: boolean): Reconciled {
		const comparison = liveObject.compare(merged);
		const changed = comparison.added.union(comparison.modified);
		const conflicts = detectConflicts(changed, managed, manager);

		if (conflicts.length > 0 && !force) {
			throw new ConflictError(conflicts);
		}
		if (conflicts.length > 0) {
			this.logger.info("overriding conflicts", { manager, conflicts: conflicts.map((c) => `${c.manager} ${pathToString(c.path)}`) });
		}

		let result = managed;
		for (const [owner, set] of managed) {
			if (owner === manager) continue;
			const taken = set.fields.intersection(changed).union(set.fields.intersection(comparison.removed));
			if (taken.isEmpty()) continue;
			result = result.set(owner, newVersionedSet(set.fields.difference(taken), set.apiVersion, set.applied));
		}
		return { managed: result, comparison, conflicts };
	}

	/**
	 * Remove values the applier stopped declaring, unless its new declaration
	 * or another manager still owns them or something beneath them. Key
	 * fields go only together with their list item.
	 */
	private removeDangling(merged: TypedValue, managed: ManagedFields, manager: string, withdrawn: FieldSet): TypedValue {
		const claims = [...managed].map(([, set]) => set.fields);
		const unclaimed = withdrawn.filter((path) => !claims.some((fields) => fields.hasPrefix(path)));
		const dangling = unclaimed.filter((path) => !isKeyFieldPath(path) || unclaimed.has(path.slice(0, -1)));
		if (dangling.isEmpty()) {
			return merged;
		}
		this.logger.debug("removing dangling fields", { manager, fields: dangling.paths().map(pathToString) });
		return merged.removeItems(dangling);
	}
}

const defaultUpdater = new Updater();

export function update(liveObject: TypedValue, liveManaged: ManagedFields, incomingObject: TypedValue, manager: string, apiVersion: string): MergeResult {
	return defaultUpdater.update(liveObject, liveManaged, incomingObject, manager, apiVersion);
}

export function apply(liveObject: TypedValue, liveManaged: ManagedFields, incomingObject: TypedValue, manager: string, apiVersion: string): MergeResult {
	return defaultUpdater.apply(liveObject, liveManaged, incomingObject, manager, apiVersion);
}

export function forceApply(liveObject: TypedValue, liveManaged: ManagedFields, incomingObject: TypedValue, manager: string, apiVersion: string): MergeResult {
	return defaultUpdater.forceApply(liveObject, liveManaged, incomingObject, manager, apiVersion);
}
