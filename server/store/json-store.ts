import type { StoreConfig, VersionedFile } from "./store-types";
import { mkdir, rename, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { AppError, errnoCode, toErrorMessage } from "../errors";

const STORE_VERSION = 1;

const envelopeSchema = z.object({
	version: z.number().int(),
	data: z.unknown(),
});

/**
 * One JSON document on disk, wrapped in a `{ version, data }` envelope and
 * decoded through a zod schema on every load.
 */
export class JsonStore<T> {
	private readonly config: StoreConfig;
	private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;

	constructor(config: StoreConfig, schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
		this.config = config;
		this.schema = schema;
	}

	/** Returns `undefined` when the file does not exist. */
	async load(): Promise<T | undefined> {
		let raw: string;
		try {
			raw = await readFile(this.config.filePath, "utf-8");
		} catch (err: unknown) {
			if (errnoCode(err) === "ENOENT") {
				return undefined;
			}
			throw new AppError(
				"STORE_READ_FAILED",
				`Cannot read ${this.config.filePath}: ${toErrorMessage(err)}`,
				{ cause: err },
			);
		}

		let json: unknown;
		try {
			json = JSON.parse(raw);
		} catch (err: unknown) {
			throw new AppError(
				"STORE_CORRUPT",
				`Invalid JSON in ${this.config.filePath}`,
				{ cause: err },
			);
		}

		const envelope = envelopeSchema.safeParse(json);
		if (!envelope.success) {
			throw new AppError(
				"STORE_CORRUPT",
				`Missing version envelope in ${this.config.filePath}`,
			);
		}
		const decoded = this.schema.safeParse(envelope.data.data);
		if (!decoded.success) {
			throw new AppError(
				"STORE_CORRUPT",
				`Unexpected content in ${this.config.filePath}: ${decoded.error.message}`,
			);
		}
		return decoded.data;
	}

	/** Load, or persist and return `defaultData` when the file does not exist yet. */
	async loadOrDefault(defaultData: T): Promise<T> {
		const loaded = await this.load();
		if (loaded !== undefined) {
			return loaded;
		}
		await this.save(defaultData);
		return defaultData;
	}

	/** Atomic replace: write a sibling temp file, then rename over the target. */
	async save(data: T): Promise<void> {
		const tmpPath = `${this.config.filePath}.tmp`;
		const versioned: VersionedFile<T> = { version: STORE_VERSION, data };
		try {
			await mkdir(dirname(this.config.filePath), { recursive: true });
			await writeFile(tmpPath, JSON.stringify(versioned, null, 2), "utf-8");
			await rename(tmpPath, this.config.filePath);
		} catch (err: unknown) {
			throw new AppError(
				"STORE_WRITE_FAILED",
				`Cannot write ${this.config.filePath}: ${toErrorMessage(err)}`,
				{ cause: err },
			);
		}
	}
}
