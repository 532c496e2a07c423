import type { FieldPath, KeyField, PathElement, Scalar } from "../types";
import { PathParseError } from "./errors";
import { canonicalScalar, compareStrings, isScalar } from "./helpers";

const KIND_ORDER: Record<PathElement["kind"], number> = { field: 0, key: 1, value: 2 };
const BARE_NAME = /^[A-Za-z0-9_$-]+$/;

export const field = (name: string): PathElement => ({ kind: "field", name });

/**
 * Build a key element; key fields are stored sorted by name so that
 * `{a, b}` and `{b, a}` address the same list item.
 */
export const key = (fields: Readonly<Record<string, Scalar>>): PathElement => ({
	kind: "key",
	fields: Object.entries(fields)
		.map(([name, value]): KeyField => ({ name, value }))
		.sort((a, b) => compareStrings(a.name, b.name)),
});

export const value = (item: Scalar): PathElement => ({ kind: "value", value: item });

/**
 * Build a path; plain strings are field names
 * @example makePath("spec", "ports", key({ port: 80 }), "name")
 */
export function makePath(...parts: Array<string | PathElement>): FieldPath {
	return parts.map((part) => (typeof part === "string" ? field(part) : part));
}

/**
 * Canonical identity of an element. Two elements are equal iff their keys are.
 */
export function elementKey(element: PathElement): string {
	switch (element.kind) {
		case "field":
			return `f:${element.name}`;
		case "key":
			return `k:{${element.fields.map((f) => `${JSON.stringify(f.name)}:${canonicalScalar(f.value)}`).join(",")}}`;
		case "value":
			return `v:${canonicalScalar(element.value)}`;
	}
}

export function pathKey(path: FieldPath): string {
	return JSON.stringify(path.map(elementKey));
}

export function elementsEqual(a: PathElement, b: PathElement): boolean {
	return elementKey(a) === elementKey(b);
}

export function pathsEqual(a: FieldPath, b: FieldPath): boolean {
	return a.length === b.length && a.every((element, i) => elementsEqual(element, b[i]));
}

function compareScalars(a: Scalar, b: Scalar): number {
	const rank = (v: Scalar): number => (v === null ? 0 : typeof v === "boolean" ? 1 : typeof v === "number" ? 2 : 3);
	const byRank = rank(a) - rank(b);
	if (byRank !== 0) return byRank;
	if (typeof a === "number" && typeof b === "number") return a - b;
	return compareStrings(canonicalScalar(a), canonicalScalar(b));
}

export function compareElements(a: PathElement, b: PathElement): number {
	if (a.kind !== b.kind) {
		return KIND_ORDER[a.kind] - KIND_ORDER[b.kind];
	}
	if (a.kind === "field" && b.kind === "field") {
		return compareStrings(a.name, b.name);
	}
	if (a.kind === "value" && b.kind === "value") {
		return compareScalars(a.value, b.value);
	}
	if (a.kind === "key" && b.kind === "key") {
		const length = Math.min(a.fields.length, b.fields.length);
		for (let i = 0; i < length; i++) {
			const byName = compareStrings(a.fields[i].name, b.fields[i].name);
			if (byName !== 0) return byName;
			const byValue = compareScalars(a.fields[i].value, b.fields[i].value);
			if (byValue !== 0) return byValue;
		}
		return a.fields.length - b.fields.length;
	}
	return 0;
}

/**
 * Lexicographic order; a parent sorts before its children
 */
export function comparePaths(a: FieldPath, b: FieldPath): number {
	const length = Math.min(a.length, b.length);
	for (let i = 0; i < length; i++) {
		const result = compareElements(a[i], b[i]);
		if (result !== 0) return result;
	}
	return a.length - b.length;
}

/**
 * True when `prefix` is `path` itself or one of its ancestors
 */
export function isPrefix(prefix: FieldPath, path: FieldPath): boolean {
	return prefix.length <= path.length && prefix.every((element, i) => elementsEqual(element, path[i]));
}

/**
 * True when `path` ends at a key field of the list item it sits under
 */
export function isKeyFieldPath(path: FieldPath): boolean {
	if (path.length < 2) return false;
	const last = path[path.length - 1];
	const item = path[path.length - 2];
	return last.kind === "field" && item.kind === "key" && item.fields.some((keyField) => keyField.name === last.name);
}

const formatName = (name: string): string => (BARE_NAME.test(name) ? name : JSON.stringify(name));

export function elementToString(element: PathElement): string {
	switch (element.kind) {
		case "field":
			return `.${formatName(element.name)}`;
		case "key":
			return `[${element.fields.map((f) => `${formatName(f.name)}=${canonicalScalar(f.value)}`).join(",")}]`;
		case "value":
			return `[=${canonicalScalar(element.value)}]`;
	}
}

/**
 * Human readable and persisted form, e.g. `.spec.ports[port=80,protocol="TCP"].name`
 */
export function pathToString(path: FieldPath): string {
	return path.map(elementToString).join("");
}

/**
 * Cursor over a serialized path. Values inside brackets are JSON scalars.
 */
class PathReader {
	position = 0;

	constructor(readonly text: string) {}

	get done(): boolean {
		return this.position >= this.text.length;
	}

	peek(): string {
		return this.text.charAt(this.position);
	}

	error(reason: string): PathParseError {
		return new PathParseError(this.text, this.position, reason);
	}

	expect(char: string): void {
		if (this.peek() !== char) {
			throw this.error(`expected ${JSON.stringify(char)}`);
		}
		this.position++;
	}

	readName(stops: string): string {
		if (this.peek() === '"') {
			const literal = this.readLiteral();
			if (typeof literal !== "string") {
				throw this.error("expected a quoted name");
			}
			return literal;
		}
		const start = this.position;
		while (!this.done && !stops.includes(this.peek())) {
			this.position++;
		}
		const name = this.text.slice(start, this.position);
		if (!BARE_NAME.test(name)) {
			this.position = start;
			throw this.error("expected a name");
		}
		return name;
	}

	readLiteral(): Scalar {
		const start = this.position;
		if (this.peek() === '"') {
			this.position++;
			while (!this.done && this.peek() !== '"') {
				this.position += this.peek() === "\\" ? 2 : 1;
			}
			this.expect('"');
		} else {
			while (!this.done && this.peek() !== "," && this.peek() !== "]") {
				this.position++;
			}
		}
		let parsed: unknown;
		try {
			parsed = JSON.parse(this.text.slice(start, this.position));
		} catch {
			this.position = start;
			throw this.error("expected a JSON scalar");
		}
		if (!isScalar(parsed)) {
			this.position = start;
			throw this.error("expected a JSON scalar");
		}
		return parsed;
	}

	readElement(): PathElement {
		if (this.peek() === ".") {
			this.position++;
			return field(this.readName(".["));
		}
		this.expect("[");
		if (this.peek() === "=") {
			this.position++;
			const item = this.readLiteral();
			this.expect("]");
			return value(item);
		}
		const fields: Record<string, Scalar> = {};
		for (;;) {
			const name = this.readName("=");
			this.expect("=");
			fields[name] = this.readLiteral();
			if (this.peek() !== ",") break;
			this.position++;
		}
		this.expect("]");
		return key(fields);
	}
}

export function parsePath(text: string): FieldPath {
	const reader = new PathReader(text);
	const path: PathElement[] = [];
	while (!reader.done) {
		path.push(reader.readElement());
	}
	return path;
}
