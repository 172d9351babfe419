import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { AppError, errnoCode, toErrorMessage } from "./errors";

export const LOG_LEVELS = [
	"silent",
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const resumePolicySchema = z.object({
	/** Prompts requested sooner than this after the auto-stop are dropped (lock/unlock flicker) */
	minDelayMs: z.number().int().nonnegative(),
	/** Prompts requested later than this after the auto-stop are dropped and the context expires */
	maxAgeMs: z.number().int().positive(),
	/** No second prompt within this window of the previous one */
	debounceMs: z.number().int().nonnegative(),
	/** Delay of the single follow-up prompt */
	retryDelayMs: z.number().int().positive(),
});

export type ResumePolicy = z.infer<typeof resumePolicySchema>;

export const DEFAULT_RESUME_POLICY: ResumePolicy = {
	minDelayMs: 2_000,
	maxAgeMs: 4 * 60 * 60 * 1000,
	debounceMs: 10_000,
	retryDelayMs: 20_000,
};

export interface AppConfig {
	port: number;
	host: string;
	dataDir: string;
	logLevel: LogLevel;
	/** When true, a session cannot start without a non-blank note */
	requireNote: boolean;
	tickIntervalMs: number;
	resume: ResumePolicy;
}

export const DEFAULT_DATA_DIR = join(homedir(), ".timekeeper");
export const CONFIG_FILE_NAME = "config.json";

export const DEFAULT_CONFIG: AppConfig = {
	port: 3000,
	host: "127.0.0.1",
	dataDir: DEFAULT_DATA_DIR,
	logLevel: "info",
	requireNote: true,
	tickIntervalMs: 1000,
	resume: DEFAULT_RESUME_POLICY,
};

const fileConfigSchema = z
	.object({
		port: z.number().int().min(0).max(65535),
		host: z.string().min(1),
		logLevel: z.enum(LOG_LEVELS),
		requireNote: z.boolean(),
		tickIntervalMs: z.number().int().positive(),
		resume: resumePolicySchema.partial(),
	})
	.partial();

type FileConfig = z.infer<typeof fileConfigSchema>;

const booleanFromEnv = z
	.enum(["true", "false", "1", "0"])
	.transform((value) => value === "true" || value === "1");

const envSchema = z.object({
	TIMEKEEPER_PORT: z.coerce.number().int().min(0).max(65535).optional(),
	TIMEKEEPER_HOST: z.string().min(1).optional(),
	TIMEKEEPER_DATA_DIR: z.string().min(1).optional(),
	TIMEKEEPER_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
	TIMEKEEPER_REQUIRE_NOTE: booleanFromEnv.optional(),
	TIMEKEEPER_TICK_INTERVAL_MS: z.coerce.number().int().positive().optional(),
	TIMEKEEPER_RESUME_MIN_DELAY_MS: z.coerce.number().int().nonnegative().optional(),
	TIMEKEEPER_RESUME_MAX_AGE_MS: z.coerce.number().int().positive().optional(),
	TIMEKEEPER_RESUME_DEBOUNCE_MS: z.coerce.number().int().nonnegative().optional(),
	TIMEKEEPER_RESUME_RETRY_DELAY_MS: z.coerce.number().int().positive().optional(),
});

export interface LoadConfigOptions {
	env?: NodeJS.ProcessEnv;
	/** Called when config.json exists but cannot be used; defaults apply instead */
	onFileError?: (filePath: string, message: string) => void;
}

async function loadFileConfig(
	filePath: string,
	onFileError?: LoadConfigOptions["onFileError"],
): Promise<FileConfig> {
	let raw: string;
	try {
		raw = await readFile(filePath, "utf-8");
	} catch (error: unknown) {
		if (errnoCode(error) !== "ENOENT") {
			onFileError?.(filePath, toErrorMessage(error));
		}
		return {};
	}

	try {
		const parsed = fileConfigSchema.safeParse(JSON.parse(raw));
		if (parsed.success) {
			return parsed.data;
		}
		onFileError?.(filePath, parsed.error.message);
	} catch (error: unknown) {
		onFileError?.(filePath, toErrorMessage(error));
	}
	return {};
}

/**
 * Resolve the runtime configuration.
 * Priority: environment variables > config.json in the data directory > defaults.
 */
export async function loadConfig(
	options: LoadConfigOptions = {},
): Promise<AppConfig> {
	const parsedEnv = envSchema.safeParse(options.env ?? process.env);
	if (!parsedEnv.success) {
		throw new AppError(
			"INVALID_CONFIG",
			`Invalid environment configuration: ${parsedEnv.error.message}`,
		);
	}
	const env = parsedEnv.data;

	const dataDir = env.TIMEKEEPER_DATA_DIR ?? DEFAULT_CONFIG.dataDir;
	const fileConfig = await loadFileConfig(
		join(dataDir, CONFIG_FILE_NAME),
		options.onFileError,
	);

	return {
		port: env.TIMEKEEPER_PORT ?? fileConfig.port ?? DEFAULT_CONFIG.port,
		host: env.TIMEKEEPER_HOST ?? fileConfig.host ?? DEFAULT_CONFIG.host,
		dataDir,
		logLevel:
			env.TIMEKEEPER_LOG_LEVEL ?? fileConfig.logLevel ?? DEFAULT_CONFIG.logLevel,
		requireNote:
			env.TIMEKEEPER_REQUIRE_NOTE ??
			fileConfig.requireNote ??
			DEFAULT_CONFIG.requireNote,
		tickIntervalMs:
			env.TIMEKEEPER_TICK_INTERVAL_MS ??
			fileConfig.tickIntervalMs ??
			DEFAULT_CONFIG.tickIntervalMs,
		resume: {
			minDelayMs:
				env.TIMEKEEPER_RESUME_MIN_DELAY_MS ??
				fileConfig.resume?.minDelayMs ??
				DEFAULT_RESUME_POLICY.minDelayMs,
			maxAgeMs:
				env.TIMEKEEPER_RESUME_MAX_AGE_MS ??
				fileConfig.resume?.maxAgeMs ??
				DEFAULT_RESUME_POLICY.maxAgeMs,
			debounceMs:
				env.TIMEKEEPER_RESUME_DEBOUNCE_MS ??
				fileConfig.resume?.debounceMs ??
				DEFAULT_RESUME_POLICY.debounceMs,
			retryDelayMs:
				env.TIMEKEEPER_RESUME_RETRY_DELAY_MS ??
				fileConfig.resume?.retryDelayMs ??
				DEFAULT_RESUME_POLICY.retryDelayMs,
		},
	};
}
