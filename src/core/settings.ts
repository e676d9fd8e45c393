import { z } from "zod";
import type { Auth } from "./auth";
import { InterfaceError } from "./errors";
import { createConsoleLogger, type Logger } from "./logger";

export const DEFAULT_API_ENDPOINT = "api.app.firebolt.io";
export const DEFAULT_TIMEOUT_MS = 60_000;

const isFunction = (value: unknown) => typeof value === "function";

const authSchema = z.custom<Auth>(
	(value) =>
		typeof value === "object" &&
		value !== null &&
		"getToken" in value &&
		isFunction(value.getToken) &&
		"invalidate" in value &&
		isFunction(value.invalidate),
	{ message: "auth must provide getToken() and invalidate()" },
);

const loggerSchema = z.custom<Logger>(
	(value) =>
		typeof value === "object" &&
		value !== null &&
		["debug", "info", "warn", "error"].every(
			(level) => level in value && isFunction(Reflect.get(value, level)),
		),
	{ message: "logger must provide debug, info, warn and error" },
);

export const connectOptionsSchema = z.object({
	auth: authSchema,
	accountName: z.string().min(1, "accountName is required"),
	database: z.string().min(1).optional(),
	engineName: z.string().min(1).optional(),
	engineUrl: z.string().min(1).optional(),
	apiEndpoint: z.string().min(1).default(DEFAULT_API_ENDPOINT),
	timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
	additionalHeaders: z.record(z.string()).optional(),
	fetch: z.custom<typeof fetch>(isFunction, "fetch must be a function").optional(),
	logger: loggerSchema.optional(),
});

export type ConnectOptions = z.input<typeof connectOptionsSchema>;

export interface ConnectionSettings
	extends Omit<z.output<typeof connectOptionsSchema>, "logger"> {
	logger: Logger;
}

/** Validate connect options and apply defaults. */
export function resolveSettings(options: ConnectOptions): ConnectionSettings {
	const parsed = connectOptionsSchema.safeParse(options);
	if (!parsed.success) {
		throw new InterfaceError(
			`Invalid connection options: ${parsed.error.issues
				.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
				.join("; ")}`,
		);
	}
	const settings = parsed.data;
	if (settings.engineName && settings.engineUrl) {
		throw new InterfaceError("Provide either engineName or engineUrl, not both");
	}
	return {
		...settings,
		apiEndpoint: fixUrlSchema(settings.apiEndpoint),
		engineUrl: settings.engineUrl ? fixUrlSchema(settings.engineUrl) : undefined,
		logger: settings.logger ?? createConsoleLogger(),
	};
}

export function fixUrlSchema(url: string): string {
	return url.startsWith("http") ? url : `https://${url}`;
}
