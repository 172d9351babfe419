import { z } from "zod";
import type { Project } from "../projects/project-types";

export type EndedReason = "user" | "system";

export const endedReasonSchema = z.enum(["user", "system"]);

/**
 * One span of tracked time against one project.
 * `endAt` is absent exactly while the entry is running; at most one entry
 * in the log may be running. `startAt` never changes after creation and
 * `endAt`/`endedReason` are written once.
 */
export interface TimeEntry {
	/** UUID v4 generated on start */
	id: string;
	/** Soft reference to Project.id */
	projectId: string;
	/** ISO 8601 UTC with millisecond precision */
	startAt: string;
	/** ISO 8601 UTC; absent while running */
	endAt?: string;
	/** Who ended the entry; absent while running */
	endedReason?: EndedReason;
	/** Task description; absent in entries written before notes existed */
	note?: string;
}

export const timeEntrySchema = z.object({
	id: z.string().min(1),
	projectId: z.string().min(1),
	startAt: z.string().datetime({ offset: true }),
	endAt: z.string().datetime({ offset: true }).optional(),
	endedReason: endedReasonSchema.optional(),
	note: z.string().optional(),
});

export const timeEntryListSchema = z.array(timeEntrySchema);

/**
 * Transient state kept after an auto-stop so the user can be offered a
 * one-action resume. Never persisted.
 */
export interface ResumeContext {
	/** Increments on every auto-stop; retry timers compare against it */
	episode: number;
	lastAutoStoppedProjectId: string;
	lastAutoStoppedNote: string;
	/** Epoch ms */
	lastAutoStopAt: number;
	/** Epoch ms of the last prompt actually delivered */
	lastPromptAt: number | null;
	promptsShown: number;
	hasRetried: boolean;
}

export type PrimaryActionKind = "start" | "switch" | "stop";

export type PrimaryActionLabel = "Start" | "Switch" | "Stop";

/** Read-only view of the engine state handed to adapters and listeners. */
export interface TrackerSnapshot {
	projects: Project[];
	selectedProjectId: string | null;
	currentNote: string;
	runningEntry: TimeEntry | null;
	runningSeconds: number;
	/** Today's total for the selected project, live */
	todaySeconds: number;
	canStart: boolean;
	canSwitchTask: boolean;
	primaryActionLabel: PrimaryActionLabel;
	/** Label shown by a compact tray/menu-bar client */
	trayLabel: string;
	resume: {
		projectId: string;
		autoStoppedAt: string;
		promptsShown: number;
	} | null;
}

/** Result of `primaryAction()`: which transition ran, or null when nothing applied */
export type PrimaryActionResult = PrimaryActionKind | null;
