import type { FieldPath, JSONSchemaDefinition, PathElement, Scalar, ScalarType, TypeNode } from "../types";
import { TypedValueError } from "./errors";
import { elementKey, field, key, value as valueElement } from "./fieldPath";
import { FieldSet } from "./fieldSet";
import { cloneValue, deepFreeze, isEqual, isPlainObject, isScalar } from "./helpers";
import type { Schema } from "./schema";

/**
 * Result of comparing two values of the same schema
 */
export interface Comparison {
	readonly added: FieldSet;
	readonly modified: FieldSet;
	readonly removed: FieldSet;
}

export const isSameComparison = (comparison: Comparison): boolean =>
	comparison.added.isEmpty() && comparison.modified.isEmpty() && comparison.removed.isEmpty();

interface Child {
	element: PathElement;
	definition: JSONSchemaDefinition;
	value: unknown;
}

interface Node {
	type: TypeNode;
	/** Undefined for scalars and untyped non-objects */
	children: Child[] | undefined;
	/** Owned and replaced as one leaf */
	atomic: boolean;
}

interface ComparisonBuilder {
	added: FieldPath[];
	modified: FieldPath[];
	removed: FieldPath[];
}

const describeData = (data: unknown): string =>
	data === undefined ? "nothing" : data === null ? "null" : Array.isArray(data) ? "array" : typeof data;

function scalarMatches(type: ScalarType, data: unknown): boolean {
	switch (type) {
		case "string":
			return typeof data === "string";
		case "number":
			return typeof data === "number" && Number.isFinite(data);
		case "integer":
			return typeof data === "number" && Number.isInteger(data);
		case "boolean":
			return typeof data === "boolean";
		case "null":
			return data === null;
	}
}

function mapChildren(type: Extract<TypeNode, { kind: "map" }>, data: Record<string, unknown>, path: FieldPath): Child[] {
	const children: Child[] = [];
	for (const [name, item] of Object.entries(data)) {
		if (item === undefined) continue;
		const definition = Object.hasOwn(type.properties, name) ? type.properties[name] : type.additionalProperties ?? true;
		if (definition === false) {
			throw new TypedValueError(path, `field not declared in schema: ${JSON.stringify(name)}`);
		}
		children.push({ element: field(name), definition, value: item });
	}
	return children;
}

function listChildren(type: Extract<TypeNode, { kind: "list" }>, data: unknown[], path: FieldPath): Child[] {
	const seen = new Set<string>();
	return data.map((item, index): Child => {
		let element: PathElement;
		if (type.listType === "map") {
			if (!isPlainObject(item)) {
				throw new TypedValueError(path, `item ${index}: expected object, got ${describeData(item)}`);
			}
			const fields: Record<string, Scalar> = {};
			for (const name of type.keys) {
				const keyValue = item[name];
				if (!isScalar(keyValue)) {
					throw new TypedValueError(path, `item ${index}: key field ${JSON.stringify(name)} must be a scalar, got ${describeData(keyValue)}`);
				}
				fields[name] = keyValue;
			}
			element = key(fields);
		} else {
			if (!isScalar(item)) {
				throw new TypedValueError(path, `item ${index}: set items must be scalars, got ${describeData(item)}`);
			}
			element = valueElement(item);
		}

		const identity = elementKey(element);
		if (seen.has(identity)) {
			throw new TypedValueError(path, `item ${index}: duplicate entry`);
		}
		seen.add(identity);
		return { element, definition: type.items, value: item };
	});
}

/**
 * Resolve and validate one node of `data`, listing its children
 */
function inspect(schema: Schema, definition: JSONSchemaDefinition, data: unknown, path: FieldPath): Node {
	const type = schema.resolve(definition, data);
	switch (type.kind) {
		case "scalar":
			if (!type.types.some((scalarType) => scalarMatches(scalarType, data))) {
				throw new TypedValueError(path, `expected ${type.types.join(" | ")}, got ${describeData(data)}`);
			}
			return { type, children: undefined, atomic: true };
		case "untyped":
			if (data === undefined) {
				throw new TypedValueError(path, "expected a value, got nothing");
			}
			if (!isPlainObject(data)) {
				return { type, children: undefined, atomic: true };
			}
			return { type, children: mapChildren({ kind: "map", mapType: "granular", properties: {}, additionalProperties: true }, data, path), atomic: false };
		case "map":
			if (!isPlainObject(data)) {
				throw new TypedValueError(path, `expected object, got ${describeData(data)}`);
			}
			return { type, children: mapChildren(type, data, path), atomic: type.mapType === "atomic" };
		case "list":
			if (!Array.isArray(data)) {
				throw new TypedValueError(path, `expected array, got ${describeData(data)}`);
			}
			if (type.listType === "atomic") {
				for (const item of data) {
					walk(schema, type.items, item, path, undefined);
				}
				return { type, children: undefined, atomic: true };
			}
			return { type, children: listChildren(type, data, path), atomic: false };
	}
}

const isLeaf = (node: Node): boolean => node.atomic || node.children === undefined;

const childrenOf = (node: Node): Child[] => (isLeaf(node) ? [] : node.children ?? []);

const variantOf = (type: TypeNode): string | undefined => (type.kind === "map" || type.kind === "list" ? type.variant : undefined);

/**
 * Nodes that must be compared and merged as one value: leaves, and
 * containers of different shape or schema variant on each side
 */
const isWholeValue = (left: Node, right: Node): boolean =>
	isLeaf(left) || isLeaf(right) || left.type.kind !== right.type.kind || variantOf(left.type) !== variantOf(right.type);

/**
 * Validate `data` and, unless below an atomic node, record every non-root path
 */
function walk(schema: Schema, definition: JSONSchemaDefinition, data: unknown, path: FieldPath, out: FieldPath[] | undefined): void {
	const node = inspect(schema, definition, data, path);
	if (out && path.length > 0) {
		out.push(path);
	}
	const record = node.atomic ? undefined : out;
	for (const child of node.children ?? []) {
		walk(schema, child.definition, child.value, record ? [...path, child.element] : path, record);
	}
}

function diff(
	schema: Schema,
	left: { definition: JSONSchemaDefinition; value: unknown },
	right: { definition: JSONSchemaDefinition; value: unknown },
	path: FieldPath,
	result: ComparisonBuilder,
): void {
	const leftNode = inspect(schema, left.definition, left.value, path);
	const rightNode = inspect(schema, right.definition, right.value, path);

	if (isWholeValue(leftNode, rightNode)) {
		if (!isEqual(left.value, right.value)) {
			result.modified.push(path);
			for (const child of childrenOf(leftNode)) {
				walk(schema, child.definition, child.value, [...path, child.element], result.removed);
			}
			for (const child of childrenOf(rightNode)) {
				walk(schema, child.definition, child.value, [...path, child.element], result.added);
			}
		}
		return;
	}

	const rightChildren = new Map(childrenOf(rightNode).map((child): [string, Child] => [elementKey(child.element), child]));
	const leftKeys = new Set<string>();
	for (const child of childrenOf(leftNode)) {
		const identity = elementKey(child.element);
		leftKeys.add(identity);
		const childPath = [...path, child.element];
		const match = rightChildren.get(identity);
		if (match) {
			diff(schema, child, match, childPath, result);
		} else {
			walk(schema, child.definition, child.value, childPath, result.removed);
		}
	}
	for (const [identity, child] of rightChildren) {
		if (!leftKeys.has(identity)) {
			walk(schema, child.definition, child.value, [...path, child.element], result.added);
		}
	}
}

/**
 * Reassemble a container of the same shape as `container` from its children
 */
function rebuild(container: unknown, children: Array<{ element: PathElement; value: unknown }>): unknown {
	if (Array.isArray(container)) {
		return children.map((child) => child.value);
	}
	return Object.fromEntries(
		children.flatMap((child): Array<[string, unknown]> => (child.element.kind === "field" ? [[child.element.name, child.value]] : [])),
	);
}

function mergeValues(
	schema: Schema,
	left: { definition: JSONSchemaDefinition; value: unknown },
	right: { definition: JSONSchemaDefinition; value: unknown },
	path: FieldPath,
): unknown {
	const leftNode = inspect(schema, left.definition, left.value, path);
	const rightNode = inspect(schema, right.definition, right.value, path);
	if (isWholeValue(leftNode, rightNode)) {
		return cloneValue(right.value);
	}

	const rightChildren = new Map(childrenOf(rightNode).map((child): [string, Child] => [elementKey(child.element), child]));
	const merged: Array<{ element: PathElement; value: unknown }> = [];
	for (const child of childrenOf(leftNode)) {
		const identity = elementKey(child.element);
		const match = rightChildren.get(identity);
		merged.push({
			element: child.element,
			value: match ? mergeValues(schema, child, match, [...path, child.element]) : cloneValue(child.value),
		});
		rightChildren.delete(identity);
	}
	for (const child of rightChildren.values()) {
		merged.push({ element: child.element, value: cloneValue(child.value) });
	}
	return rebuild(right.value, merged);
}

function removePaths(schema: Schema, definition: JSONSchemaDefinition, data: unknown, path: FieldPath, set: FieldSet): unknown {
	const node = inspect(schema, definition, data, path);
	if (isLeaf(node)) {
		return cloneValue(data);
	}
	const kept: Array<{ element: PathElement; value: unknown }> = [];
	for (const child of childrenOf(node)) {
		const childPath = [...path, child.element];
		if (set.has(childPath)) continue;
		kept.push({ element: child.element, value: removePaths(schema, child.definition, child.value, childPath, set) });
	}
	return rebuild(data, kept);
}

/**
 * A value validated against a schema. Never mutated; every operation
 * returns a new value.
 */
export class TypedValue {
	readonly schema: Schema;
	/** Validated copy of the input, deeply frozen */
	readonly value: unknown;
	private readonly fieldSet: FieldSet;

	private constructor(schema: Schema, value: unknown, fieldSet: FieldSet) {
		this.schema = schema;
		this.value = value;
		this.fieldSet = fieldSet;
	}

	/**
	 * @throws TypedValueError when `value` does not conform to `schema`
	 */
	static from(schema: Schema, value: unknown): TypedValue {
		const copy = cloneValue(value);
		const paths: FieldPath[] = [];
		walk(schema, schema.root, copy, [], paths);
		return new TypedValue(schema, deepFreeze(copy), FieldSet.fromPaths(paths));
	}

	/**
	 * Every path present, containers included; the root is not listed
	 */
	toFieldSet(): FieldSet {
		return this.fieldSet;
	}

	isEmpty(): boolean {
		return this.fieldSet.isEmpty();
	}

	compare(other: TypedValue): Comparison {
		this.assertSameSchema(other);
		const result: ComparisonBuilder = { added: [], modified: [], removed: [] };
		diff(this.schema, { definition: this.schema.root, value: this.value }, { definition: other.schema.root, value: other.value }, [], result);
		return {
			added: FieldSet.fromPaths(result.added),
			modified: FieldSet.fromPaths(result.modified),
			removed: FieldSet.fromPaths(result.removed),
		};
	}

	/**
	 * Overlay `other` on this value; `other` wins wherever both have a leaf
	 */
	merge(other: TypedValue): TypedValue {
		this.assertSameSchema(other);
		const merged = mergeValues(this.schema, { definition: this.schema.root, value: this.value }, { definition: other.schema.root, value: other.value }, []);
		return TypedValue.from(this.schema, merged);
	}

	/**
	 * Copy of this value without the given paths (and everything beneath them)
	 */
	removeItems(set: FieldSet): TypedValue {
		if (set.isEmpty()) {
			return this;
		}
		return TypedValue.from(this.schema, removePaths(this.schema, this.schema.root, this.value, [], set));
	}

	private assertSameSchema(other: TypedValue): void {
		if (other.schema !== this.schema) {
			throw new TypedValueError([], "values of different schemas cannot be combined");
		}
	}
}
