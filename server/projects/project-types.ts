import { z } from "zod";

/**
 * A user-defined project that time entries are tracked against.
 * Never deleted; entries reference it by `id` only.
 */
export interface Project {
	/** UUID v4 generated on add */
	id: string;
	/** Trimmed, non-empty display name */
	name: string;
}

export const projectSchema = z.object({
	id: z.string().min(1),
	name: z.string().min(1),
});

export const projectListSchema = z.array(projectSchema);

/** Display name used when an entry points at a project that no longer resolves */
export const UNKNOWN_PROJECT_NAME = "Unknown";
