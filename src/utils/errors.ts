import type { Conflict, FieldPath } from "../types";
import { conflictsByManager } from "./conflicts";
import { pathToString } from "./fieldPath";

export class MergeError extends Error {
	readonly code: string;

	constructor(code: string, message: string) {
		super(message);
		this.code = code;
		this.name = this.constructor.name;
	}
}

/**
 * Raised by Apply when the declared values disagree with fields owned by
 * other managers. Nothing is merged when this is thrown.
 */
export class ConflictError extends MergeError {
	readonly conflicts: readonly Conflict[];

	constructor(conflicts: readonly Conflict[]) {
		super("CONFLICT", conflictsToString(conflicts));
		this.conflicts = conflicts;
	}
}

export class TypedValueError extends MergeError {
	readonly path: FieldPath;

	constructor(path: FieldPath, message: string) {
		super("INVALID_VALUE", path.length === 0 ? message : `${pathToString(path)}: ${message}`);
		this.path = path;
	}
}

export class SchemaError extends MergeError {
	constructor(message: string) {
		super("INVALID_SCHEMA", message);
	}
}

export class PathParseError extends MergeError {
	readonly text: string;
	readonly offset: number;

	constructor(text: string, offset: number, reason: string) {
		super("INVALID_PATH", `Invalid path ${JSON.stringify(text)} at offset ${offset}: ${reason}`);
		this.text = text;
		this.offset = offset;
	}
}

export class ManagedFieldsError extends MergeError {
	constructor(message: string) {
		super("INVALID_MANAGED_FIELDS", message);
	}
}

export function conflictToString(conflict: Conflict): string {
	return `conflict with ${JSON.stringify(conflict.manager)}: ${pathToString(conflict.path)}`;
}

/**
 * A single conflict reads as one line; several are grouped by manager:
 *
 *   conflicts with "controller":
 *   - .replicas
 *   - .image
 */
export function conflictsToString(conflicts: readonly Conflict[]): string {
	if (conflicts.length === 1) {
		return conflictToString(conflicts[0]);
	}

	const byManager = conflictsByManager(conflicts);
	const lines: string[] = [];
	for (const manager of [...byManager.keys()].sort()) {
		lines.push(`conflicts with ${JSON.stringify(manager)}:`);
		for (const path of byManager.get(manager) ?? []) {
			lines.push(`- ${pathToString(path)}`);
		}
	}
	return lines.join("\n");
}
