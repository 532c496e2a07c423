import { describe, expect, it } from "vitest";
import type { Conflict } from "../../types";
import { conflictsByManager, conflictsEqual, detectConflicts, sortConflicts } from "../conflicts";
import { ConflictError, conflictsToString, conflictToString, MergeError } from "../errors";
import { key, makePath, pathToString } from "../fieldPath";
import { FieldSet } from "../fieldSet";
import { ManagedFields, newVersionedSet } from "../managedFields";

const fields = (...names: string[]): FieldSet => FieldSet.fromPaths(names.map((name) => makePath(name)));

describe("conflicts.ts - Conflict Detection", () => {
	const managed = ManagedFields.from({
		default: newVersionedSet(fields("numeric", "string"), "v1", true),
		controller: newVersionedSet(fields("string", "bool"), "v2", false),
		other: newVersionedSet(fields("name"), "v1", true),
	});

	describe("detectConflicts()", () => {
		it("should report changed paths owned by other managers", () => {
			const conflicts = detectConflicts(fields("string", "bool"), managed, "default");
			expect(conflicts).toEqual([
				{ manager: "controller", path: makePath("bool") },
				{ manager: "controller", path: makePath("string") },
			]);
		});

		it("should ignore the acting manager's own fields", () => {
			expect(detectConflicts(fields("numeric"), managed, "default")).toEqual([]);
		});

		it("should report every other owner of a shared path", () => {
			const conflicts = detectConflicts(fields("string"), managed, "other");
			expect(conflicts.map((c) => c.manager)).toEqual(["controller", "default"]);
		});

		it("should report nothing when nothing changed", () => {
			expect(detectConflicts(FieldSet.empty(), managed, "someone")).toEqual([]);
		});

		it("should match exact paths only", () => {
			const nested = ManagedFields.from({ controller: newVersionedSet(FieldSet.of(makePath("labels")), "v1", false) });
			expect(detectConflicts(FieldSet.of(makePath("labels", "app")), nested, "default")).toEqual([]);
		});
	});

	describe("✓ Ordering and equality", () => {
		const conflicts: Conflict[] = [
			{ manager: "b", path: makePath("y") },
			{ manager: "a", path: makePath("z") },
			{ manager: "b", path: makePath("x") },
		];

		it("should sort by manager, then path", () => {
			expect(sortConflicts(conflicts).map((c) => `${c.manager}${pathToString(c.path)}`)).toEqual(["a.z", "b.x", "b.y"]);
		});

		it("should group by manager in the given order", () => {
			const grouped = conflictsByManager(conflicts);
			expect([...grouped.keys()]).toEqual(["b", "a"]);
			expect(grouped.get("b")?.map(pathToString)).toEqual([".y", ".x"]);
		});

		it("should compare lists regardless of order", () => {
			expect(conflictsEqual(conflicts, [...conflicts].reverse())).toBe(true);
			expect(conflictsEqual(conflicts, conflicts.slice(1))).toBe(false);
			expect(conflictsEqual([{ manager: "a", path: makePath("x") }], [{ manager: "a", path: makePath("y") }])).toBe(false);
		});
	});
});

describe("errors.ts - ConflictError", () => {
	it("should describe a single conflict on one line", () => {
		const conflict: Conflict = { manager: "controller", path: makePath("ports", key({ port: 80, protocol: "TCP" }), "name") };
		expect(conflictToString(conflict)).toBe('conflict with "controller": .ports[port=80,protocol="TCP"].name');
		expect(new ConflictError([conflict]).message).toBe('conflict with "controller": .ports[port=80,protocol="TCP"].name');
	});

	it("should group several conflicts by manager", () => {
		const error = new ConflictError([
			{ manager: "controller", path: makePath("replicas") },
			{ manager: "autoscaler", path: makePath("replicas") },
			{ manager: "controller", path: makePath("image") },
		]);
		expect(error.message).toBe(['conflicts with "autoscaler":', "- .replicas", 'conflicts with "controller":', "- .replicas", "- .image"].join("\n"));
	});

	it("should carry its conflicts and code", () => {
		const conflicts: Conflict[] = [{ manager: "controller", path: makePath("string") }];
		const error = new ConflictError(conflicts);
		expect(error).toBeInstanceOf(MergeError);
		expect(error.name).toBe("ConflictError");
		expect(error.code).toBe("CONFLICT");
		expect(error.conflicts).toEqual(conflicts);
	});

	it("should render an empty list as an empty message", () => {
		expect(conflictsToString([])).toBe("");
	});
});
