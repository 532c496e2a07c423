export type {
	Conflict,
	FieldPath,
	JSONSchema,
	KeyField,
	ListType,
	ManagedFieldsEntry,
	ManagedFieldsRecord,
	MapType,
	PathElement,
	Scalar,
} from "./types";
export { Operation } from "./types";
export type { UpdaterOptions } from "./utils/config";
export { conflictsEqual, detectConflicts, sortConflicts } from "./utils/conflicts";
export {
	ConflictError,
	ManagedFieldsError,
	MergeError,
	PathParseError,
	SchemaError,
	TypedValueError,
	conflictToString,
	conflictsToString,
} from "./utils/errors";
export { comparePaths, field, key, makePath, parsePath, pathToString, pathsEqual, value } from "./utils/fieldPath";
export { FieldSet } from "./utils/fieldSet";
export type { Step, TestCase } from "./utils/fixture";
export { FixtureError, Parser, State, runTestCase } from "./utils/fixture";
export { createLogger, type Logger, type LoggerOptions, type LogLevel } from "./utils/logger";
export { ManagedFields, newVersionedSet, type VersionedSet } from "./utils/managedFields";
export { Schema } from "./utils/schema";
export { type Comparison, TypedValue } from "./utils/typedValue";
export type { MergeRequest, MergeResult } from "./utils/updater";
export { Updater, apply, forceApply, update } from "./utils/updater";
