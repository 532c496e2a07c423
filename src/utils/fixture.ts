import { parse, printParseErrorCode, type ParseError } from "jsonc-parser";
import { type Conflict, Operation } from "../types";
import { conflictsEqual } from "./conflicts";
import { ConflictError, conflictsToString } from "./errors";
import { isEqual, isPlainObject, sortKeys } from "./helpers";
import { ManagedFields } from "./managedFields";
import type { Schema } from "./schema";
import { TypedValue } from "./typedValue";
import { Updater } from "./updater";

export class FixtureError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "FixtureError";
	}
}

/**
 * Builds typed values from JSON text. Comments and trailing commas are
 * allowed; blank text is the empty object.
 */
export class Parser {
	readonly schema: Schema;

	constructor(schema: Schema) {
		this.schema = schema;
	}

	fromText(text: string): TypedValue {
		if (text.trim() === "") {
			return TypedValue.from(this.schema, {});
		}
		const errors: ParseError[] = [];
		const data: unknown = parse(text, errors, { allowTrailingComma: true });
		if (errors.length > 0) {
			const [first] = errors;
			throw new FixtureError(`Invalid object text: ${printParseErrorCode(first.error)} at offset ${first.offset}`);
		}
		return TypedValue.from(this.schema, data);
	}
}

export interface Step {
	operation: Operation;
	manager: string;
	apiVersion: string;
	object: string;
	/** When set, the step must fail with exactly these conflicts */
	conflicts?: readonly Conflict[];
}

export interface TestCase {
	steps: readonly Step[];
	/** Expected final object */
	object: string;
	/** Expected final managed fields */
	managed: ManagedFields;
}

/**
 * Live object and managed fields carried from step to step
 */
export class State {
	live: TypedValue;
	managed: ManagedFields;

	constructor(
		readonly parser: Parser,
		readonly updater: Updater = new Updater(),
	) {
		this.live = parser.fromText("");
		this.managed = ManagedFields.empty();
	}

	/**
	 * Run one step. A failed step leaves the state untouched.
	 */
	run(step: Step): void {
		const result = this.updater.run(step.operation, {
			liveObject: this.live,
			liveManaged: this.managed,
			incomingObject: this.parser.fromText(step.object),
			manager: step.manager,
			apiVersion: step.apiVersion,
		});
		this.live = result.object;
		this.managed = result.managed;
	}
}

function runStep(state: State, step: Step, index: number): void {
	const label = `step ${index} (${step.operation} by ${JSON.stringify(step.manager)})`;
	if (!step.conflicts) {
		state.run(step);
		return;
	}

	try {
		state.run(step);
	} catch (error) {
		if (!(error instanceof ConflictError)) {
			throw error;
		}
		if (!conflictsEqual(error.conflicts, step.conflicts)) {
			throw new FixtureError(`${label}: expected ${conflictsToString(step.conflicts)}\ngot ${error.message}`);
		}
		return;
	}
	throw new FixtureError(`${label}: expected ${conflictsToString(step.conflicts)}, got success`);
}

const stableJSON = (value: unknown): string => JSON.stringify(isPlainObject(value) ? sortKeys(value, { deep: true }) : value);

/**
 * Replay every step against an empty object and check the final state
 * @throws FixtureError on the first mismatch
 */
export function runTestCase(parser: Parser, testCase: TestCase, updater?: Updater): State {
	const state = new State(parser, updater);
	testCase.steps.forEach((step, index) => runStep(state, step, index));

	const expected = parser.fromText(testCase.object);
	if (!isEqual(state.live.value, expected.value)) {
		throw new FixtureError(`expected object ${stableJSON(expected.value)}, got ${stableJSON(state.live.value)}`);
	}
	if (!state.managed.equals(testCase.managed)) {
		throw new FixtureError(`expected managed fields:\n${testCase.managed.toString()}\ngot:\n${state.managed.toString()}`);
	}
	return state;
}
