import type { Project } from "./project-types";
import { UNKNOWN_PROJECT_NAME } from "./project-types";

export type ProjectNameLookup = (projectId: string) => string;

/**
 * Build a lookup-or-default resolver for project names.
 * Entries hold soft references, so a dangling id resolves to "Unknown".
 */
export function createProjectNameLookup(
	projects: readonly Project[],
): ProjectNameLookup {
	const namesById = new Map(projects.map((project) => [project.id, project.name]));
	return (projectId) => namesById.get(projectId) ?? UNKNOWN_PROJECT_NAME;
}

export function findProject(
	projects: readonly Project[],
	projectId: string | null | undefined,
): Project | undefined {
	if (!projectId) {
		return undefined;
	}
	return projects.find((project) => project.id === projectId);
}
