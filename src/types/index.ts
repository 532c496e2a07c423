import type { JSONSchema7, JSONSchema7Definition } from "json-schema";

export type JSONSchema = JSONSchema7;
export type JSONSchemaDefinition = JSONSchema7Definition;

// Path types
export type Scalar = string | number | boolean | null;

export interface KeyField {
	name: string;
	value: Scalar;
}

export type PathElement =
	| { readonly kind: "field"; readonly name: string }
	| { readonly kind: "key"; readonly fields: readonly Readonly<KeyField>[] }
	| { readonly kind: "value"; readonly value: Scalar };

export type FieldPath = readonly PathElement[];

// Merge types
export enum Operation {
	Update = "Update",
	Apply = "Apply",
	ForceApply = "ForceApply",
}

export interface Conflict {
	readonly manager: string;
	readonly path: FieldPath;
}

/**
 * Persisted form of one manager's entry, stored next to the object
 * and handed back verbatim on the next call.
 */
export interface ManagedFieldsEntry {
	fields: string[];
	apiVersion: string;
	applied: boolean;
}

export type ManagedFieldsRecord = Record<string, ManagedFieldsEntry>;

// Schema extension keywords
export type ListType = "atomic" | "set" | "map";
export type MapType = "granular" | "atomic";

declare module "json-schema" {
	interface JSONSchema7 {
		/** How list items are identified: as a whole, by value, or by key fields */
		"x-list-type"?: ListType;
		"x-list-map-keys"?: string[];
		"x-map-type"?: MapType;
	}
}

export type ScalarType = "string" | "number" | "integer" | "boolean" | "null";

/**
 * Resolved shape of one schema node. `variant` names the oneOf/anyOf
 * branches taken to reach a map or list node, e.g. `oneOf[1]`.
 */
export type TypeNode =
	| { kind: "scalar"; types: readonly ScalarType[] }
	| {
			kind: "map";
			mapType: MapType;
			properties: Readonly<Record<string, JSONSchemaDefinition>>;
			additionalProperties: JSONSchemaDefinition | undefined;
			variant?: string;
	  }
	| { kind: "list"; listType: ListType; keys: readonly string[]; items: JSONSchemaDefinition; variant?: string }
	| { kind: "untyped" };
