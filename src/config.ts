/**
 * Environment configuration, validated with zod at the entry point.
 *
 * - z.string() = REQUIRED
 * - .default('x') = OPTIONAL with default
 */
import { z } from "zod";
import type { AssignmentOptions } from "./core/types.ts";
import { createLogger } from "./logger.ts";

/**
 * Transform string to number with default.
 * NOTE: .default() must come before .transform() since it operates on the input type
 */
const numberString = (defaultValue: number) =>
	z
		.string()
		.default(String(defaultValue))
		.transform((v) => Number.parseInt(v, 10))
		.pipe(z.number().int().positive());

export const envSchema = z.object({
	POSTGRES_HOST: z.string().default("localhost"),
	POSTGRES_PORT: numberString(5432),
	POSTGRES_USER: z.string().min(1),
	POSTGRES_PASSWORD: z.string(),
	POSTGRES_DB: z.string().min(1),
	POSTGRES_POOL_MAX: numberString(10),
	MAX_ITEMS_PER_PAGE: numberString(50),
	LOG_LEVEL: z
		.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
		.default("info"),
});

export type Env = z.infer<typeof envSchema>;

export interface Config {
	postgres: {
		host: string;
		port: number;
		user: string;
		password: string;
		database: string;
		max: number;
	};
	maxItemsPerPage: number;
	logLevel: Env["LOG_LEVEL"];
}

/** Throws a ZodError naming every missing or malformed variable. */
export function loadConfig(
	env: Record<string, string | undefined> = process.env,
): Config {
	const parsed = envSchema.parse(env);
	return {
		postgres: {
			host: parsed.POSTGRES_HOST,
			port: parsed.POSTGRES_PORT,
			user: parsed.POSTGRES_USER,
			password: parsed.POSTGRES_PASSWORD,
			database: parsed.POSTGRES_DB,
			max: parsed.POSTGRES_POOL_MAX,
		},
		maxItemsPerPage: parsed.MAX_ITEMS_PER_PAGE,
		logLevel: parsed.LOG_LEVEL,
	};
}

/** Client options carried by the environment: log level and page cap. */
export function assignmentOptions(config: Config): AssignmentOptions {
	return {
		logger: createLogger(config.logLevel),
		maxItemsPerPage: config.maxItemsPerPage,
	};
}
