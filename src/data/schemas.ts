import type { JSONSchema } from "../types";

/**
 * Schemas shared by the merge scenarios
 *
 * 1. leafFields: three scalar fields
 * 2. workload: nested maps, a set-like list, an associative list keyed by
 *    two fields, an atomic list, an atomic map and a oneOf discriminated
 *    by `type`
 */

export const leafFieldsSchema: JSONSchema = {
	type: "object",
	additionalProperties: false,
	properties: {
		numeric: { type: "number" },
		string: { type: "string" },
		bool: { type: "boolean" },
	},
};

export const workloadSchema: JSONSchema = {
	type: "object",
	additionalProperties: false,
	properties: {
		name: { type: "string" },
		replicas: { type: "integer" },
		labels: {
			type: "object",
			additionalProperties: { type: "string" },
		},
		finalizers: {
			type: "array",
			items: { type: "string" },
			"x-list-type": "set",
		},
		ports: {
			type: "array",
			items: { $ref: "#/definitions/port" },
			"x-list-type": "map",
			"x-list-map-keys": ["port", "protocol"],
		},
		args: {
			type: "array",
			items: { type: "string" },
		},
		selector: {
			type: "object",
			additionalProperties: { type: "string" },
			"x-map-type": "atomic",
		},
		strategy: {
			oneOf: [
				{
					type: "object",
					additionalProperties: false,
					properties: { type: { const: "Recreate" } },
				},
				{
					type: "object",
					additionalProperties: false,
					properties: {
						type: { const: "RollingUpdate" },
						maxSurge: { type: "integer" },
					},
				},
			],
		},
	},
	definitions: {
		port: {
			type: "object",
			additionalProperties: false,
			properties: {
				port: { type: "integer" },
				protocol: { type: "string" },
				name: { type: "string" },
			},
		},
	},
};
