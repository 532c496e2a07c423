import type { JSONSchema7TypeName } from "json-schema";
import { z } from "zod";
import type { JSONSchema, JSONSchemaDefinition, ScalarType, TypeNode } from "../types";
import { SchemaError } from "./errors";
import { isPlainObject } from "./helpers";

const ONE_OF = "oneOf";
const ANY_OF = "anyOf";
const ALL_OF = "allOf";

const SCALAR_TYPES: readonly ScalarType[] = ["string", "number", "integer", "boolean", "null"];

/**
 * Merge extension keywords carried next to the standard JSON Schema keywords
 */
const extensionsSchema = z
	.object({
		"x-list-type": z.enum(["atomic", "set", "map"]).optional(),
		"x-list-map-keys": z.array(z.string().min(1)).min(1).optional(),
		"x-map-type": z.enum(["granular", "atomic"]).optional(),
	})
	.refine((ext) => ext["x-list-type"] !== "map" || ext["x-list-map-keys"] !== undefined, {
		message: 'x-list-map-keys is required when x-list-type is "map"',
	});

export function hasSchemaVariants(schema: JSONSchema): boolean {
	return !!(schema[ONE_OF] || schema[ANY_OF] || schema[ALL_OF]);
}

export function getSchemaVariants(schema: JSONSchema): JSONSchema[] | undefined {
	const variants = schema[ONE_OF] || schema[ANY_OF] || schema[ALL_OF];
	return Array.isArray(variants) ? variants.map(toSchemaObject) : undefined;
}

export function getSubschemaKeyword(schema: JSONSchema): string {
	if (schema.oneOf) return ONE_OF;
	if (schema.anyOf) return ANY_OF;
	if (schema.allOf) return ALL_OF;
	return "";
}

const toSchemaObject = (definition: JSONSchemaDefinition): JSONSchema =>
	typeof definition === "boolean" ? (definition ? {} : { not: {} }) : definition;

/**
 * Find common discriminator field across all variants
 * Returns the field name that has const values in variants and exists in data
 */
function findCommonDiscriminatorField(variants: JSONSchema[], data: unknown): { field: string; value: unknown } | null {
	if (!isPlainObject(data)) {
		return null;
	}

	const discriminatorFields = new Set<string>();
	for (const variant of variants) {
		for (const [field, propSchema] of Object.entries(variant.properties ?? {})) {
			if (typeof propSchema === "object" && propSchema.const !== undefined) {
				discriminatorFields.add(field);
			}
		}
	}

	for (const field of discriminatorFields) {
		if (field in data) {
			return { field, value: data[field] };
		}
	}

	return null;
}

const typeNames = (schema: JSONSchema): JSONSchema7TypeName[] =>
	schema.type === undefined ? [] : Array.isArray(schema.type) ? schema.type : [schema.type];

const dataType = (data: unknown): string => (data === null ? "null" : Array.isArray(data) ? "array" : typeof data);

function typeMatches(variant: JSONSchema, data: unknown): boolean {
	const types = typeNames(variant);
	const actual = dataType(data);
	return types.some((type) => type === actual || (type === "integer" && actual === "number" && Number.isInteger(data)));
}

/**
 * Pick the oneOf/anyOf variant that describes `data`: discriminator const first,
 * then required fields, then a const value, then the type
 */
export function chooseSubschemaSync(data: unknown, variants: JSONSchema[]): { selectedIndex: number; schema: JSONSchema } {
	if (variants.length === 0) {
		throw new SchemaError("No variants provided to chooseSubschemaSync");
	}

	if (isPlainObject(data)) {
		const discriminator = findCommonDiscriminatorField(variants, data);
		if (discriminator) {
			const index = variants.findIndex((variant) => {
				const prop = variant.properties?.[discriminator.field];
				return typeof prop === "object" && prop.const === discriminator.value;
			});
			if (index >= 0) {
				return { selectedIndex: index, schema: variants[index] };
			}
		}

		const index = variants.findIndex((variant) => {
			const required = variant.required ?? [];
			return required.length > 0 && required.every((field) => field in data);
		});
		if (index >= 0) {
			return { selectedIndex: index, schema: variants[index] };
		}
	}

	const byConst = variants.findIndex((variant) => variant.const !== undefined && variant.const === data);
	if (byConst >= 0) {
		return { selectedIndex: byConst, schema: variants[byConst] };
	}

	const byType = variants.findIndex((variant) => typeMatches(variant, data));
	if (byType >= 0) {
		return { selectedIndex: byType, schema: variants[byType] };
	}

	return { selectedIndex: 0, schema: variants[0] };
}

/**
 * Flatten allOf variants into one object schema. Properties and required
 * lists are combined; later variants win on scalar keywords.
 */
function mergeAllOf(schema: JSONSchema, variants: JSONSchema[]): JSONSchema {
	const { allOf: _allOf, ...rest } = schema;
	let merged: JSONSchema = rest;
	for (const variant of variants) {
		merged = {
			...merged,
			...variant,
			properties: { ...merged.properties, ...variant.properties },
			required: [...(merged.required ?? []), ...(variant.required ?? [])],
		};
	}
	return merged;
}

/**
 * A JSON Schema document able to describe values node by node
 */
export class Schema {
	readonly root: JSONSchema;

	constructor(root: JSONSchema) {
		this.root = root;
		this.readExtensions(root);
	}

	/**
	 * Follow local `$ref`s to the referenced definition
	 */
	dereference(definition: JSONSchemaDefinition): JSONSchemaDefinition {
		const seen = new Set<string>();
		let current = definition;
		while (typeof current === "object" && current.$ref !== undefined) {
			const ref = current.$ref;
			if (seen.has(ref)) {
				throw new SchemaError(`Circular $ref: ${ref}`);
			}
			seen.add(ref);
			current = this.lookup(ref);
		}
		return current;
	}

	/**
	 * Resolve the node that describes `data` under `definition`
	 */
	resolve(definition: JSONSchemaDefinition, data: unknown): TypeNode {
		return this.resolveNode(definition, data, []);
	}

	private resolveNode(definition: JSONSchemaDefinition, data: unknown, chosen: readonly string[]): TypeNode {
		const resolved = this.dereference(definition);
		if (resolved === false) {
			throw new SchemaError("Schema `false` admits no value");
		}
		if (resolved === true) {
			return { kind: "untyped" };
		}

		if (hasSchemaVariants(resolved)) {
			const variants = getSchemaVariants(resolved) ?? [];
			if (getSubschemaKeyword(resolved) === ALL_OF) {
				return this.resolveNode(mergeAllOf(resolved, variants.map((v) => toSchemaObject(this.dereference(v)))), data, chosen);
			}
			const keyword = getSubschemaKeyword(resolved);
			const { oneOf: _oneOf, anyOf: _anyOf, ...base } = resolved;
			const { selectedIndex, schema: variant } = chooseSubschemaSync(data, variants.map((v) => toSchemaObject(this.dereference(v))));
			return this.resolveNode({ ...base, ...variant }, data, [...chosen, `${keyword}[${selectedIndex}]`]);
		}

		return this.describe(resolved, data, chosen.length > 0 ? chosen.join("/") : undefined);
	}

	private describe(schema: JSONSchema, data: unknown, variant: string | undefined): TypeNode {
		const extensions = this.readExtensions(schema);
		const declared = typeNames(schema);

		const isMap = declared.includes("object") || (declared.length === 0 && (schema.properties !== undefined || schema.additionalProperties !== undefined));
		const isList = declared.includes("array") || (declared.length === 0 && schema.items !== undefined);
		const scalars = SCALAR_TYPES.filter((type) => declared.includes(type));

		// Union types pick the member matching the data
		if (isMap && (isPlainObject(data) || (!isList && scalars.length === 0))) {
			return {
				kind: "map",
				mapType: extensions["x-map-type"] ?? "granular",
				properties: schema.properties ?? {},
				additionalProperties: schema.additionalProperties,
				variant,
			};
		}
		if (isList && (Array.isArray(data) || scalars.length === 0)) {
			if (Array.isArray(schema.items)) {
				throw new SchemaError("Tuple `items` are not supported");
			}
			return {
				kind: "list",
				listType: extensions["x-list-type"] ?? "atomic",
				keys: extensions["x-list-map-keys"] ?? [],
				items: schema.items ?? true,
				variant,
			};
		}
		if (scalars.length > 0) {
			return { kind: "scalar", types: scalars };
		}
		return { kind: "untyped" };
	}

	private readExtensions(schema: JSONSchema): z.infer<typeof extensionsSchema> {
		const result = extensionsSchema.safeParse(schema);
		if (!result.success) {
			throw new SchemaError(`Invalid merge extensions: ${result.error.issues.map((issue) => issue.message).join(", ")}`);
		}
		return result.data;
	}

	private lookup(ref: string): JSONSchemaDefinition {
		const match = /^#\/(definitions|\$defs)\/(.+)$/.exec(ref);
		if (!match) {
			throw new SchemaError(`Unsupported $ref: ${ref}`);
		}
		const [, section, name] = match;
		const table = section === "definitions" ? this.root.definitions : readDefs(this.root);
		const target = table?.[name];
		if (target === undefined) {
			throw new SchemaError(`Unresolved $ref: ${ref}`);
		}
		return target;
	}
}

const definitionSchema = z.custom<JSONSchemaDefinition>((value) => typeof value === "boolean" || isPlainObject(value));
const defsSchema = z.object({ $defs: z.record(definitionSchema).optional() });

/**
 * draft-07 typings predate `$defs`; read it through a validating parse
 */
function readDefs(root: JSONSchema): Record<string, JSONSchemaDefinition> | undefined {
	const result = defsSchema.safeParse(root);
	return result.success ? result.data.$defs : undefined;
}
