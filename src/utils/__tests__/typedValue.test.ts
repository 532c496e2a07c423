import { describe, expect, it } from "vitest";
import { leafFieldsSchema, workloadSchema } from "../../data/schemas";
import { TypedValueError } from "../errors";
import { key, makePath, pathToString, value as valueElement } from "../fieldPath";
import { FieldSet } from "../fieldSet";
import { isPlainObject } from "../helpers";
import { Schema } from "../schema";
import { isSameComparison, TypedValue } from "../typedValue";

const schema = new Schema(workloadSchema);
const typed = (data: unknown): TypedValue => TypedValue.from(schema, data);
const paths = (set: FieldSet): string[] => set.paths().map(pathToString);

describe("typedValue.ts - TypedValue", () => {
	describe("✓ Validation", () => {
		it("should accept an empty object", () => {
			expect(typed({}).isEmpty()).toBe(true);
		});

		it("should reject scalars of the wrong type", () => {
			expect(() => typed({ replicas: "three" })).toThrow(".replicas: expected integer, got string");
			expect(() => typed({ replicas: 1.5 })).toThrow(".replicas: expected integer, got number");
			expect(() => typed({ labels: { app: 1 } })).toThrow(".labels.app: expected string, got number");
		});

		it("should reject fields the schema does not declare", () => {
			expect(() => typed({ image: "web" })).toThrow('field not declared in schema: "image"');
		});

		it("should reject a container where a scalar is expected and the reverse", () => {
			expect(() => typed({ name: {} })).toThrow(".name: expected string, got object");
			expect(() => typed({ labels: "app" })).toThrow(".labels: expected object, got string");
			expect(() => typed({ finalizers: {} })).toThrow(".finalizers: expected array, got object");
		});

		it("should validate items of atomic lists", () => {
			expect(() => typed({ args: ["--a", 1] })).toThrow(".args: expected string, got number");
		});

		it("should reject non-scalar and duplicate set items", () => {
			expect(() => typed({ finalizers: [{}] })).toThrow(".finalizers: item 0: set items must be scalars, got object");
			expect(() => typed({ finalizers: ["a", "a"] })).toThrow(".finalizers: item 1: duplicate entry");
		});

		it("should require scalar key fields and unique keys in map lists", () => {
			expect(() => typed({ ports: [{ port: 80 }] })).toThrow('.ports: item 0: key field "protocol" must be a scalar, got nothing');
			expect(() =>
				typed({
					ports: [
						{ port: 80, protocol: "TCP" },
						{ port: 80, protocol: "TCP", name: "http" },
					],
				}),
			).toThrow(".ports: item 1: duplicate entry");
		});

		it("should expose the failing path on the error", () => {
			try {
				typed({ labels: { app: false } });
				expect.unreachable();
			} catch (error) {
				expect(error).toBeInstanceOf(TypedValueError);
				if (error instanceof TypedValueError) {
					expect(pathToString(error.path)).toBe(".labels.app");
					expect(error.code).toBe("INVALID_VALUE");
				}
			}
		});

		it("should copy its input", () => {
			const data = { labels: { app: "web" } };
			const value = typed(data);
			data.labels.app = "changed";
			expect(value.value).toEqual({ labels: { app: "web" } });
		});

		it("should freeze its value", () => {
			const data = { labels: { app: "web" }, finalizers: ["a"] };
			const value = typed(data);
			const tree = value.value;
			expect(Object.isFrozen(tree)).toBe(true);
			expect(isPlainObject(tree) && Object.isFrozen(tree.labels)).toBe(true);
			expect(isPlainObject(tree) && Object.isFrozen(tree.finalizers)).toBe(true);
			expect(Object.isFrozen(data.labels)).toBe(false);
		});

		it("should merge frozen operands into a new frozen value", () => {
			const merged = typed({ labels: { x: "1" } }).merge(typed({ labels: { y: "2" } }));
			expect(Object.isFrozen(merged.value)).toBe(true);
			expect(merged.value).toEqual({ labels: { x: "1", y: "2" } });
		});
	});

	describe("✓ toFieldSet()", () => {
		it("should list containers and leaves, not the root", () => {
			const value = typed({ name: "web", labels: { app: "web" } });
			expect(paths(value.toFieldSet())).toEqual([".labels", ".labels.app", ".name"]);
		});

		it("should address map list items by key and set items by value", () => {
			const value = typed({ ports: [{ port: 80, protocol: "TCP" }], finalizers: ["a"] });
			expect(paths(value.toFieldSet())).toEqual([
				".finalizers",
				'.finalizers[="a"]',
				".ports",
				'.ports[port=80,protocol="TCP"]',
				'.ports[port=80,protocol="TCP"].port',
				'.ports[port=80,protocol="TCP"].protocol',
			]);
		});

		it("should stop at atomic nodes", () => {
			const value = typed({ args: ["--a", "--b"], selector: { app: "web" } });
			expect(paths(value.toFieldSet())).toEqual([".args", ".selector"]);
		});

		it("should descend into untyped objects", () => {
			const untyped = new Schema({ type: "object" });
			const value = TypedValue.from(untyped, { a: { b: 1 }, c: [1] });
			expect(paths(value.toFieldSet())).toEqual([".a", ".a.b", ".c"]);
		});
	});

	describe("✓ compare()", () => {
		it("should split changes into added, modified and removed", () => {
			const before = typed({ name: "a", labels: { x: "1", y: "2" } });
			const after = typed({ name: "b", labels: { x: "1", z: "3" }, replicas: 2 });
			const comparison = before.compare(after);
			expect(paths(comparison.added)).toEqual([".labels.z", ".replicas"]);
			expect(paths(comparison.modified)).toEqual([".name"]);
			expect(paths(comparison.removed)).toEqual([".labels.y"]);
		});

		it("should report nothing for equal values", () => {
			const left = typed({ ports: [{ port: 80, protocol: "TCP" }] });
			const right = typed({ ports: [{ port: 80, protocol: "TCP" }] });
			expect(isSameComparison(left.compare(right))).toBe(true);
		});

		it("should compare atomic nodes as one leaf", () => {
			const comparison = typed({ args: ["a"], selector: { app: "1" } }).compare(typed({ args: ["b"], selector: { app: "2" } }));
			expect(paths(comparison.modified)).toEqual([".args", ".selector"]);
			expect(comparison.added.isEmpty()).toBe(true);
			expect(comparison.removed.isEmpty()).toBe(true);
		});

		it("should list every path beneath an added or removed item", () => {
			const comparison = typed({ ports: [{ port: 80, protocol: "TCP" }] }).compare(typed({ ports: [{ port: 443, protocol: "TCP" }] }));
			expect(paths(comparison.added)).toEqual([
				'.ports[port=443,protocol="TCP"]',
				'.ports[port=443,protocol="TCP"].port',
				'.ports[port=443,protocol="TCP"].protocol',
			]);
			expect(paths(comparison.removed)).toEqual([
				'.ports[port=80,protocol="TCP"]',
				'.ports[port=80,protocol="TCP"].port',
				'.ports[port=80,protocol="TCP"].protocol',
			]);
		});

		it("should compare a oneOf variant switch as one modified node", () => {
			const comparison = typed({ strategy: { type: "RollingUpdate", maxSurge: 1 } }).compare(typed({ strategy: { type: "Recreate" } }));
			expect(paths(comparison.modified)).toEqual([".strategy"]);
			expect(paths(comparison.added)).toEqual([".strategy.type"]);
			expect(paths(comparison.removed)).toEqual([".strategy.maxSurge", ".strategy.type"]);
		});

		it("should compare fields within one variant as usual", () => {
			const comparison = typed({ strategy: { type: "RollingUpdate", maxSurge: 1 } }).compare(typed({ strategy: { type: "RollingUpdate", maxSurge: 2 } }));
			expect(paths(comparison.modified)).toEqual([".strategy.maxSurge"]);
			expect(comparison.added.isEmpty()).toBe(true);
			expect(comparison.removed.isEmpty()).toBe(true);
		});

		it("should refuse values of different schemas", () => {
			const other = TypedValue.from(new Schema(leafFieldsSchema), {});
			expect(() => typed({}).compare(other)).toThrow("values of different schemas cannot be combined");
		});
	});

	describe("✓ merge()", () => {
		it("should overlay maps field by field", () => {
			const merged = typed({ name: "a", labels: { x: "1" } }).merge(typed({ labels: { x: "2", y: "3" } }));
			expect(merged.value).toEqual({ name: "a", labels: { x: "2", y: "3" } });
		});

		it("should union set items keeping existing order", () => {
			const merged = typed({ finalizers: ["a", "b"] }).merge(typed({ finalizers: ["c", "a"] }));
			expect(merged.value).toEqual({ finalizers: ["a", "b", "c"] });
		});

		it("should merge map list items by key", () => {
			const merged = typed({ ports: [{ port: 80, protocol: "TCP", name: "http" }] }).merge(
				typed({
					ports: [
						{ port: 443, protocol: "TCP" },
						{ port: 80, protocol: "TCP", name: "web" },
					],
				}),
			);
			expect(merged.value).toEqual({
				ports: [
					{ port: 80, protocol: "TCP", name: "web" },
					{ port: 443, protocol: "TCP" },
				],
			});
		});

		it("should replace atomic lists and maps whole", () => {
			const merged = typed({ args: ["a", "b"], selector: { app: "web" } }).merge(typed({ args: ["c"], selector: { tier: "db" } }));
			expect(merged.value).toEqual({ args: ["c"], selector: { tier: "db" } });
		});

		it("should switch oneOf variants", () => {
			const merged = typed({ strategy: { type: "Recreate" } }).merge(typed({ strategy: { type: "RollingUpdate", maxSurge: 1 } }));
			expect(merged.value).toEqual({ strategy: { type: "RollingUpdate", maxSurge: 1 } });
		});

		it("should drop the fields of the previous variant", () => {
			const merged = typed({ strategy: { type: "RollingUpdate", maxSurge: 1 } }).merge(typed({ strategy: { type: "Recreate" } }));
			expect(merged.value).toEqual({ strategy: { type: "Recreate" } });
			expect(paths(merged.toFieldSet())).toEqual([".strategy", ".strategy.type"]);
		});

		it("should leave both operands unchanged", () => {
			const left = typed({ labels: { x: "1" } });
			const right = typed({ labels: { y: "2" } });
			left.merge(right);
			expect(left.value).toEqual({ labels: { x: "1" } });
			expect(right.value).toEqual({ labels: { y: "2" } });
		});
	});

	describe("✓ removeItems()", () => {
		const value = typed({ name: "a", labels: { x: "1", y: "2" }, finalizers: ["a", "b"] });

		it("should remove a field", () => {
			expect(value.removeItems(FieldSet.of(makePath("labels", "x"))).value).toEqual({ name: "a", labels: { y: "2" }, finalizers: ["a", "b"] });
		});

		it("should remove a container with everything beneath it", () => {
			expect(value.removeItems(FieldSet.of(makePath("labels"))).value).toEqual({ name: "a", finalizers: ["a", "b"] });
		});

		it("should remove set items", () => {
			expect(value.removeItems(FieldSet.of(makePath("finalizers", valueElement("a")))).value).toEqual({
				name: "a",
				labels: { x: "1", y: "2" },
				finalizers: ["b"],
			});
		});

		it("should remove map list items", () => {
			const ports = typed({
				ports: [
					{ port: 80, protocol: "TCP" },
					{ port: 53, protocol: "UDP" },
				],
			});
			expect(ports.removeItems(FieldSet.of(makePath("ports", key({ port: 53, protocol: "UDP" })))).value).toEqual({
				ports: [{ port: 80, protocol: "TCP" }],
			});
		});

		it("should return the same value for an empty set", () => {
			expect(value.removeItems(FieldSet.empty())).toBe(value);
		});
	});
});
