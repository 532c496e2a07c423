import { z } from "zod";
import { MergeError } from "./errors";
import { createLogger, type Logger } from "./logger";

export const updaterConfigSchema = z
	.object({
		/**
		 * Drop values an applier stops declaring when no other manager
		 * still owns them
		 */
		removeDanglingFields: z.boolean().default(false),
		logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).default("silent"),
	})
	.strict();

export type UpdaterConfig = z.output<typeof updaterConfigSchema>;

export type UpdaterOptions = z.input<typeof updaterConfigSchema> & {
	/** Overrides `logLevel` */
	logger?: Logger;
};

export interface ResolvedUpdaterOptions {
	config: UpdaterConfig;
	logger: Logger;
}

export function resolveUpdaterOptions(options: UpdaterOptions = {}): ResolvedUpdaterOptions {
	const { logger, ...rest } = options;
	const result = updaterConfigSchema.safeParse(rest);
	if (!result.success) {
		throw new MergeError("INVALID_OPTIONS", `Invalid updater options: ${result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join(", ")}`);
	}
	const config = result.data;
	return {
		config,
		logger:
			logger ??
			(config.logLevel === "silent"
				? createLogger({ silent: true, context: "updater" })
				: createLogger({ level: config.logLevel, context: "updater" })),
	};
}
