import { parse, printParseErrorCode, type ParseError } from "jsonc-parser";
import { z } from "zod";
import type { ManagedFieldsEntry, ManagedFieldsRecord } from "../types";
import { ManagedFieldsError, MergeError } from "./errors";
import { parsePath, pathToString } from "./fieldPath";
import { FieldSet } from "./fieldSet";
import { compareStrings, isPlainObject } from "./helpers";

/**
 * Fields one manager owns, stamped with the schema version they were
 * computed against and whether an applier produced them
 */
export interface VersionedSet {
	readonly fields: FieldSet;
	readonly apiVersion: string;
	readonly applied: boolean;
}

export function newVersionedSet(fields: FieldSet, apiVersion: string, applied: boolean): VersionedSet {
	return Object.freeze({ fields, apiVersion, applied });
}

export function versionedSetsEqual(a: VersionedSet, b: VersionedSet): boolean {
	return a.apiVersion === b.apiVersion && a.applied === b.applied && a.fields.equals(b.fields);
}

const entrySchema = z.object({
	fields: z.array(z.string()),
	apiVersion: z.string(),
	applied: z.boolean(),
});

/**
 * Immutable table of manager → owned fields. `set` and `remove` return a
 * new table; a snapshot held by a caller never changes. No manager is ever
 * mapped to an empty field set.
 */
export class ManagedFields implements Iterable<[string, VersionedSet]> {
	private readonly entries: ReadonlyMap<string, VersionedSet>;

	private constructor(entries: ReadonlyMap<string, VersionedSet>) {
		this.entries = entries;
	}

	static empty(): ManagedFields {
		return new ManagedFields(new Map());
	}

	static from(entries: Readonly<Record<string, VersionedSet>>): ManagedFields {
		let managed = ManagedFields.empty();
		for (const [manager, set] of Object.entries(entries)) {
			managed = managed.set(manager, set);
		}
		return managed;
	}

	/**
	 * Decode the persisted layout produced by `toJSON`
	 * @throws ManagedFieldsError when the layout or one of its paths is malformed
	 */
	static fromJSON(data: unknown): ManagedFields {
		if (!isPlainObject(data)) {
			throw new ManagedFieldsError(`Invalid managed fields: expected an object, got ${data === null ? "null" : Array.isArray(data) ? "array" : typeof data}`);
		}

		let managed = ManagedFields.empty();
		// Entries are read one by one so that any own key, "__proto__" included, names a manager
		for (const [manager, raw] of Object.entries(data)) {
			const result = entrySchema.safeParse(raw);
			if (!result.success) {
				throw new ManagedFieldsError(
					`Invalid managed fields for ${JSON.stringify(manager)}: ${result.error.issues
						.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
						.join(", ")}`,
				);
			}
			let fields: FieldSet;
			try {
				fields = FieldSet.fromPaths(result.data.fields.map(parsePath));
			} catch (error) {
				if (error instanceof MergeError) {
					throw new ManagedFieldsError(`Invalid managed fields for ${JSON.stringify(manager)}: ${error.message}`);
				}
				throw error;
			}
			managed = managed.set(manager, newVersionedSet(fields, result.data.apiVersion, result.data.applied));
		}
		return managed;
	}

	/**
	 * Decode the persisted layout from JSON (comments and trailing commas allowed)
	 */
	static parse(text: string): ManagedFields {
		const errors: ParseError[] = [];
		const data: unknown = parse(text, errors, { allowTrailingComma: true });
		if (errors.length > 0) {
			const [first] = errors;
			throw new ManagedFieldsError(`Invalid managed fields JSON: ${printParseErrorCode(first.error)} at offset ${first.offset}`);
		}
		return ManagedFields.fromJSON(data);
	}

	get size(): number {
		return this.entries.size;
	}

	isEmpty(): boolean {
		return this.entries.size === 0;
	}

	has(manager: string): boolean {
		return this.entries.has(manager);
	}

	get(manager: string): VersionedSet | undefined {
		return this.entries.get(manager);
	}

	/**
	 * Replace the manager's whole entry. An empty field set removes it.
	 */
	set(manager: string, set: VersionedSet): ManagedFields {
		if (set.fields.isEmpty()) {
			return this.remove(manager);
		}
		const entries = new Map(this.entries);
		entries.set(manager, set);
		return new ManagedFields(entries);
	}

	remove(manager: string): ManagedFields {
		if (!this.entries.has(manager)) {
			return this;
		}
		const entries = new Map(this.entries);
		entries.delete(manager);
		return new ManagedFields(entries);
	}

	managers(): string[] {
		return [...this.entries.keys()].sort(compareStrings);
	}

	equals(other: ManagedFields): boolean {
		if (this.size !== other.size) {
			return false;
		}
		for (const [manager, set] of this.entries) {
			const match = other.get(manager);
			if (!match || !versionedSetsEqual(set, match)) {
				return false;
			}
		}
		return true;
	}

	/** Entries in manager order */
	*[Symbol.iterator](): Iterator<[string, VersionedSet]> {
		for (const manager of this.managers()) {
			const set = this.entries.get(manager);
			if (set) {
				yield [manager, set];
			}
		}
	}

	/** Persisted layout, keyed in manager order */
	toJSON(): ManagedFieldsRecord {
		return Object.fromEntries(
			[...this].map(([manager, set]): [string, ManagedFieldsEntry] => [
				manager,
				{ fields: set.fields.paths().map(pathToString), apiVersion: set.apiVersion, applied: set.applied },
			]),
		);
	}

	toString(): string {
		return [...this].map(([manager, set]) => `${manager}@${set.apiVersion}${set.applied ? " (applied)" : ""}: ${set.fields.toString()}`).join("\n");
	}
}
