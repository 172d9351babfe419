import type { Project } from "../projects/project-types";
import type { TimeEntry } from "../sessions/session-types";

export interface StoreConfig {
	/** Path to JSON file */
	filePath: string;
}

export interface VersionedFile<T> {
	version: number;
	data: T;
}

/** Named collections persisted by the TimeStore */
export interface TimeCollections {
	projects: Project[];
	entries: TimeEntry[];
}

export type CollectionName = keyof TimeCollections;
