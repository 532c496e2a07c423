import type { FieldPath } from "../types";
import { comparePaths, elementKey, pathToString } from "./fieldPath";

interface Member {
	path: FieldPath;
	/** Identity keys of the path and of every ancestor, root first */
	prefixes: readonly string[];
}

function toMember(path: FieldPath): Member {
	const elements = path.map(elementKey);
	const prefixes: string[] = [];
	for (let i = 0; i <= elements.length; i++) {
		prefixes.push(JSON.stringify(elements.slice(0, i)));
	}
	return { path, prefixes };
}

const identity = (member: Member): string => member.prefixes[member.prefixes.length - 1];

/**
 * Immutable set of field paths. Every operation returns a new set.
 */
export class FieldSet implements Iterable<FieldPath> {
	private readonly members: ReadonlyMap<string, Member>;
	private sorted: readonly FieldPath[] | undefined;

	private constructor(members: ReadonlyMap<string, Member>) {
		this.members = members;
	}

	static empty(): FieldSet {
		return new FieldSet(new Map());
	}

	static of(...paths: FieldPath[]): FieldSet {
		return FieldSet.fromPaths(paths);
	}

	static fromPaths(paths: Iterable<FieldPath>): FieldSet {
		const members = new Map<string, Member>();
		for (const path of paths) {
			const member = toMember([...path]);
			members.set(identity(member), member);
		}
		return new FieldSet(members);
	}

	private static fromMembers(members: Iterable<Member>): FieldSet {
		return new FieldSet(new Map([...members].map((member): [string, Member] => [identity(member), member])));
	}

	get size(): number {
		return this.members.size;
	}

	isEmpty(): boolean {
		return this.members.size === 0;
	}

	/** Exact membership */
	has(path: FieldPath): boolean {
		return this.members.has(identity(toMember(path)));
	}

	/**
	 * True when `path` or one of its ancestors is a member. Owning a
	 * container covers everything beneath it.
	 */
	contains(path: FieldPath): boolean {
		return toMember(path).prefixes.some((prefix) => this.members.has(prefix));
	}

	/**
	 * True when `path` or one of its descendants is a member
	 */
	hasPrefix(path: FieldPath): boolean {
		const target = identity(toMember(path));
		for (const member of this.members.values()) {
			if (member.prefixes.includes(target)) {
				return true;
			}
		}
		return false;
	}

	union(other: FieldSet): FieldSet {
		return FieldSet.fromMembers([...this.members.values(), ...other.members.values()]);
	}

	/** Members of this set that are not members of `other` */
	difference(other: FieldSet): FieldSet {
		return this.filterMembers((key) => !other.members.has(key));
	}

	intersection(other: FieldSet): FieldSet {
		return this.filterMembers((key) => other.members.has(key));
	}

	/**
	 * Members with no descendant in the set
	 */
	leaves(): FieldSet {
		const parents = new Set<string>();
		for (const member of this.members.values()) {
			for (const prefix of member.prefixes.slice(0, -1)) {
				parents.add(prefix);
			}
		}
		return this.filterMembers((key) => !parents.has(key));
	}

	filter(predicate: (path: FieldPath) => boolean): FieldSet {
		return FieldSet.fromMembers([...this.members.values()].filter((member) => predicate(member.path)));
	}

	equals(other: FieldSet): boolean {
		return this.size === other.size && [...this.members.keys()].every((key) => other.members.has(key));
	}

	/**
	 * Members in path order: parents before children, siblings by element order
	 */
	paths(): readonly FieldPath[] {
		if (!this.sorted) {
			this.sorted = [...this.members.values()].map((member) => member.path).sort(comparePaths);
		}
		return this.sorted;
	}

	[Symbol.iterator](): Iterator<FieldPath> {
		return this.paths()[Symbol.iterator]();
	}

	toString(): string {
		return `{${this.paths().map(pathToString).join(", ")}}`;
	}

	private filterMembers(predicate: (key: string) => boolean): FieldSet {
		const members = new Map<string, Member>();
		for (const [key, member] of this.members) {
			if (predicate(key)) {
				members.set(key, member);
			}
		}
		return new FieldSet(members);
	}
}
