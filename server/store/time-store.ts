import { join } from "node:path";
import { projectListSchema } from "../projects/project-types";
import { timeEntryListSchema } from "../sessions/session-types";
import { JsonStore } from "./json-store";
import type { CollectionName, TimeCollections } from "./store-types";

export const COLLECTION_FILES: Record<CollectionName, string> = {
	projects: "projects.json",
	entries: "time_entries.json",
};

type CollectionStores = {
	[K in CollectionName]: JsonStore<TimeCollections[K]>;
};

/**
 * Durable key/value document store for the tracker's collections.
 * Each collection lives in its own file under `dataDir`.
 */
export class TimeStore {
	private readonly stores: CollectionStores;

	constructor(public readonly dataDir: string) {
		this.stores = {
			projects: new JsonStore(
				{ filePath: join(dataDir, COLLECTION_FILES.projects) },
				projectListSchema,
			),
			entries: new JsonStore(
				{ filePath: join(dataDir, COLLECTION_FILES.entries) },
				timeEntryListSchema,
			),
		};
	}

	/** `undefined` means NotFound. Throws AppError on unreadable or corrupt files. */
	load<K extends CollectionName>(
		name: K,
	): Promise<TimeCollections[K] | undefined> {
		return this.stores[name].load();
	}

	save<K extends CollectionName>(
		name: K,
		value: TimeCollections[K],
	): Promise<void> {
		return this.stores[name].save(value);
	}

	loadOrDefault<K extends CollectionName>(
		name: K,
		defaultValue: TimeCollections[K],
	): Promise<TimeCollections[K]> {
		return this.stores[name].loadOrDefault(defaultValue);
	}
}
