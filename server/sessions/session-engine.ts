import { randomUUID } from "node:crypto";
import { EventEmitter } from "node:events";
import type { ActivityGate, ResumePrompt, Unsubscribe } from "../activity/activity-gate";
import { DEFAULT_RESUME_POLICY, type ResumePolicy } from "../config";
import { toErrorMessage } from "../errors";
import type { Logger } from "../logger";
import { createProjectNameLookup, findProject } from "../projects/project-lookup";
import type { Project } from "../projects/project-types";
import {
	findRunningEntry,
	runningSeconds,
	totalSecondsAllTime,
	totalSecondsToday,
} from "../reports/aggregation";
import { trayLabel } from "../reports/time-format";
import type { TimeStore } from "../store/time-store";
import type { CollectionName } from "../store/store-types";
import { ResumeCoordinator } from "./resume-coordinator";
import type {
	EndedReason,
	PrimaryActionResult,
	TimeEntry,
	TrackerSnapshot,
} from "./session-types";

export interface SessionEngineDeps {
	store: Pick<TimeStore, "loadOrDefault" | "save">;
	logger: Logger;
	activityGate?: ActivityGate;
	resumePrompt?: ResumePrompt;
	/** Start policy: refuse to start without a non-blank note (default true) */
	requireNote?: boolean;
	resumePolicy?: ResumePolicy;
	clock?: () => Date;
}

export type SnapshotListener = (snapshot: TrackerSnapshot) => void;

const STATE_EVENT = "state";

function sortableEndMs(entry: TimeEntry): number {
	return Date.parse(entry.endAt ?? entry.startAt);
}

/**
 * Sole owner of projects, the entry log, the selection and the running
 * session. Every mutation and every inbound signal runs on one promise
 * queue, so operations never interleave across their persistence awaits.
 */
export class SessionEngine {
	private projects: Project[] = [];
	private entries: TimeEntry[] = [];
	private selectedProjectId: string | null = null;
	private currentNote = "";
	/** Cache of the open entry's id; the log stays authoritative */
	private runningEntryId: string | null = null;
	/** Set by the first pause signal of an episode, reset on resume or start */
	private pauseLatched = false;
	private queue: Promise<void> = Promise.resolve();
	/** One listener per connected client; no upper bound */
	private readonly emitter = new EventEmitter().setMaxListeners(0);
	private readonly detachers: Unsubscribe[] = [];
	private readonly resume: ResumeCoordinator;
	private readonly requireNote: boolean;
	private readonly clock: () => Date;
	private readonly logger: Logger;

	constructor(private readonly deps: SessionEngineDeps) {
		this.logger = deps.logger;
		this.requireNote = deps.requireNote ?? true;
		this.clock = deps.clock ?? (() => new Date());
		this.resume = new ResumeCoordinator({
			policy: deps.resumePolicy ?? DEFAULT_RESUME_POLICY,
			logger: deps.logger,
			deliver: (projectId) => this.deliverPrompt(projectId),
			onRetryDue: (episode) => {
				this.dispatch("resume-retry", () => {
					if (this.resume.handleRetry(episode, this.clock(), this.isRunning())) {
						this.notify();
					}
				});
			},
		});
	}

	/** Load persisted state and start listening to the activity gate and prompt. */
	static async create(deps: SessionEngineDeps): Promise<SessionEngine> {
		const engine = new SessionEngine(deps);
		await engine.load();
		engine.attach();
		return engine;
	}

	/**
	 * Read both collections (creating empty ones on first run) and rebuild
	 * the running/selection state from the log. Read failures fall back to
	 * empty collections.
	 */
	async load(): Promise<void> {
		await this.enqueue(async () => {
			this.projects = await this.loadOrEmpty("projects", () =>
				this.deps.store.loadOrDefault("projects", []),
			);
			this.entries = await this.loadOrEmpty("entries", () =>
				this.deps.store.loadOrDefault("entries", []),
			);
			await this.healOpenEntries();
			this.restoreSelection();
			this.notify();
		});
	}

	attach(): void {
		const { activityGate, resumePrompt } = this.deps;
		if (activityGate) {
			this.detachers.push(
				activityGate.onPause(() => this.handlePauseSignal()),
				activityGate.onResume(() => {
					this.dispatch("activity-resumed", () => this.handleResumed());
				}),
			);
		}
		if (resumePrompt) {
			this.detachers.push(
				resumePrompt.onUserAccepted((projectId) => {
					this.dispatch("prompt-accepted", async () => {
						await this.resumeFromPromptNow(projectId);
					});
				}),
			);
		}
	}

	subscribe(listener: SnapshotListener): Unsubscribe {
		this.emitter.on(STATE_EVENT, listener);
		return () => {
			this.emitter.off(STATE_EVENT, listener);
		};
	}

	/** Resolves once every operation and signal queued so far has run. */
	idle(): Promise<void> {
		return this.enqueue(() => undefined);
	}

	// -- Queries (read-only, never queued) --

	getSnapshot(now: Date = this.clock()): TrackerSnapshot {
		const running = this.getRunningEntry();
		const currentRunningSeconds = runningSeconds(this.entries, now);
		const todaySeconds =
			this.selectedProjectId === null
				? 0
				: totalSecondsToday(this.entries, this.selectedProjectId, now);
		const canSwitchTask = this.canSwitchTask(this.currentNote);
		const context = this.resume.current;

		return {
			projects: this.projects.map((project) => ({ ...project })),
			selectedProjectId: this.selectedProjectId,
			currentNote: this.currentNote,
			runningEntry: running ? { ...running } : null,
			runningSeconds: currentRunningSeconds,
			todaySeconds,
			canStart: running === undefined && this.canStart(),
			canSwitchTask,
			primaryActionLabel:
				running === undefined ? "Start" : canSwitchTask ? "Switch" : "Stop",
			trayLabel: trayLabel({
				running: running !== undefined,
				runningSeconds: currentRunningSeconds,
				selectedProjectId: this.selectedProjectId,
				todaySeconds,
			}),
			resume: context
				? {
						projectId: context.lastAutoStoppedProjectId,
						autoStoppedAt: new Date(context.lastAutoStopAt).toISOString(),
						promptsShown: context.promptsShown,
					}
				: null,
		};
	}

	/** Copies of both collections for report rendering. */
	getLog(): { projects: Project[]; entries: TimeEntry[] } {
		return {
			projects: this.projects.map((project) => ({ ...project })),
			entries: this.entries.map((entry) => ({ ...entry })),
		};
	}

	runningSeconds(now: Date = this.clock()): number {
		return runningSeconds(this.entries, now);
	}

	totalSecondsToday(projectId: string, now: Date = this.clock()): number {
		return totalSecondsToday(this.entries, projectId, now);
	}

	totalSecondsAllTime(projectId: string, now: Date = this.clock()): number {
		return totalSecondsAllTime(this.entries, projectId, now);
	}

	// -- Operations --

	/** Create and select a project. Blank names are ignored and resolve to null. */
	addProject(name: string): Promise<Project | null> {
		return this.enqueue(async () => {
			const trimmed = name.trim();
			if (trimmed === "") {
				return null;
			}
			const project: Project = { id: randomUUID(), name: trimmed };
			this.projects = [...this.projects, project];
			this.selectedProjectId = project.id;
			await this.persist("projects");
			this.notify();
			return { ...project };
		});
	}

	selectProject(projectId: string): Promise<boolean> {
		return this.enqueue(() => {
			if (!findProject(this.projects, projectId)) {
				return false;
			}
			this.selectedProjectId = projectId;
			this.notify();
			return true;
		});
	}

	/** Update the draft note; it is only committed when a session starts. */
	setNote(note: string): Promise<void> {
		return this.enqueue(() => {
			this.currentNote = note;
			this.notify();
		});
	}

	/** Restore the draft to the running entry's note. */
	continuePreviousTask(): Promise<boolean> {
		return this.enqueue(() => {
			const running = this.getRunningEntry();
			const runningNote = running?.note?.trim() ?? "";
			if (runningNote === "") {
				return false;
			}
			this.currentNote = runningNote;
			this.notify();
			return true;
		});
	}

	/**
	 * Start tracking `projectId` (default: the selection) with `note`
	 * (default: the draft). Resolves to the new entry, or null when the
	 * project is unknown or the note is required and blank.
	 */
	startSession(projectId?: string, note?: string): Promise<TimeEntry | null> {
		return this.enqueue(async () => {
			const entry = await this.beginEntry(
				projectId ?? this.selectedProjectId,
				note ?? this.currentNote,
			);
			if (entry) {
				this.notify();
			}
			return entry;
		});
	}

	/** Resolves to true when an open entry was closed. Calling it while idle is a no-op. */
	stopSession(reason: EndedReason): Promise<boolean> {
		return this.enqueue(async () => {
			const stopped = await this.endRunningEntry(reason);
			this.notify();
			return stopped;
		});
	}

	/** Close the running entry and open a new one on the same project with `newNote`. */
	switchTask(newNote?: string): Promise<TimeEntry | null> {
		return this.enqueue(async () => {
			const entry = await this.switchRunningTask(newNote ?? this.currentNote);
			if (entry) {
				this.notify();
			}
			return entry;
		});
	}

	/** The single toggle: start when idle, switch when the draft differs, otherwise stop. */
	primaryAction(): Promise<PrimaryActionResult> {
		return this.enqueue(async (): Promise<PrimaryActionResult> => {
			if (!this.isRunning()) {
				const started = await this.beginEntry(
					this.selectedProjectId,
					this.currentNote,
				);
				if (!started) {
					return null;
				}
				this.notify();
				return "start";
			}
			if (this.canSwitchTask(this.currentNote)) {
				await this.switchRunningTask(this.currentNote);
				this.notify();
				return "switch";
			}
			await this.endRunningEntry("user");
			this.notify();
			return "stop";
		});
	}

	resumeFromPrompt(projectId?: string): Promise<TimeEntry | null> {
		return this.enqueue(() => this.resumeFromPromptNow(projectId));
	}

	/**
	 * Inbound "activity paused"; repeated signals within one episode are dropped.
	 * The latch is read on the queue, in order with the resumes and starts
	 * that reset it.
	 */
	handlePauseSignal(): void {
		this.dispatch("activity-paused", async () => {
			if (this.pauseLatched) {
				this.logger.debug("Duplicate pause signal ignored");
				return;
			}
			this.pauseLatched = true;
			if (await this.endRunningEntry("system")) {
				this.notify();
			}
		});
	}

	/** Inbound "activity resumed": never restarts tracking, may offer a prompt. */
	handleResumeSignal(): Promise<void> {
		return this.enqueue(() => this.handleResumed());
	}

	/** Stop with reason `user`, cancel timers and detach from the gate. Used on quit. */
	stopAndShutdown(): Promise<void> {
		return this.enqueue(async () => {
			await this.endRunningEntry("user");
			this.resume.clear("shutdown");
			for (const detach of this.detachers.splice(0)) {
				detach();
			}
			this.notify();
			this.emitter.removeAllListeners();
		});
	}

	// -- Internals (run on the queue) --

	private enqueue<T>(operation: () => Promise<T> | T): Promise<T> {
		const run = this.queue.then(operation);
		this.queue = run.then(
			() => undefined,
			() => undefined,
		);
		return run;
	}

	/** Queue work triggered by a signal or timer; failures are logged, not thrown. */
	private dispatch(label: string, operation: () => Promise<void> | void): void {
		this.enqueue(operation).catch((error: unknown) => {
			this.logger.error({ err: toErrorMessage(error), label }, "Engine event failed");
		});
	}

	private handleResumed(): void {
		this.pauseLatched = false;
		if (this.resume.requestPrompt(this.clock(), this.isRunning())) {
			this.notify();
		}
	}

	private async resumeFromPromptNow(projectId?: string): Promise<TimeEntry | null> {
		if (this.isRunning()) {
			return null;
		}
		const context = this.resume.current;
		if (context === null) {
			this.logger.debug("Resume ignored: nothing was auto-stopped");
			return null;
		}
		if (this.resume.expireIfStale(this.clock())) {
			this.notify();
			return null;
		}

		const target = [projectId, this.selectedProjectId, context.lastAutoStoppedProjectId]
			.map((candidate) => findProject(this.projects, candidate))
			.find((project) => project !== undefined);
		if (!target) {
			return null;
		}

		const note =
			target.id === context.lastAutoStoppedProjectId
				? context.lastAutoStoppedNote
				: this.currentNote;
		const entry = await this.beginEntry(target.id, note);
		if (entry) {
			this.notify();
		}
		return entry;
	}

	private async beginEntry(
		projectId: string | null,
		note: string,
	): Promise<TimeEntry | null> {
		const project = findProject(this.projects, projectId);
		if (!project) {
			return null;
		}
		const trimmed = note.trim();
		if (this.requireNote && trimmed === "") {
			return null;
		}

		if (this.runningEntryId !== null) {
			this.logger.warn(
				{ entryId: this.runningEntryId },
				"Starting while another entry is open; closing it first",
			);
			await this.endRunningEntry("system");
		}

		const entry: TimeEntry = {
			id: randomUUID(),
			projectId: project.id,
			startAt: this.clock().toISOString(),
			...(trimmed === "" ? {} : { note: trimmed }),
		};
		this.entries = [...this.entries, entry];
		this.runningEntryId = entry.id;
		this.selectedProjectId = project.id;
		this.currentNote = trimmed;
		this.pauseLatched = false;
		this.resume.clear("session started");
		await this.persist("entries");
		return { ...entry };
	}

	private async endRunningEntry(reason: EndedReason): Promise<boolean> {
		const runningId = this.runningEntryId;
		if (runningId === null) {
			return false;
		}
		// Cleared first so a missing or already-closed entry cannot leave a stuck reference.
		this.runningEntryId = null;

		const entry = this.entries.find((candidate) => candidate.id === runningId);
		if (!entry || entry.endAt !== undefined) {
			this.logger.warn({ entryId: runningId }, "Running entry reference was stale");
			if (reason === "user") {
				this.resume.clear("user stop");
			}
			return false;
		}

		const endAt = this.clock();
		const closed: TimeEntry = {
			...entry,
			endAt: endAt.toISOString(),
			endedReason: reason,
		};
		this.entries = this.entries.map((candidate) =>
			candidate.id === runningId ? closed : candidate,
		);
		await this.persist("entries");

		if (reason === "user") {
			this.resume.clear("user stop");
		} else {
			this.resume.arm(closed.projectId, closed.note ?? "", endAt);
		}
		return true;
	}

	private async switchRunningTask(newNote: string): Promise<TimeEntry | null> {
		const running = this.getRunningEntry();
		if (!running || !this.canSwitchTask(newNote)) {
			return null;
		}
		await this.endRunningEntry("user");
		return this.beginEntry(running.projectId, newNote);
	}

	private canStart(): boolean {
		if (!findProject(this.projects, this.selectedProjectId)) {
			return false;
		}
		return !this.requireNote || this.currentNote.trim() !== "";
	}

	private canSwitchTask(newNote: string): boolean {
		const running = this.getRunningEntry();
		if (!running) {
			return false;
		}
		const trimmed = newNote.trim();
		return trimmed !== "" && trimmed !== (running.note ?? "").trim();
	}

	private getRunningEntry(): TimeEntry | undefined {
		if (this.runningEntryId === null) {
			return undefined;
		}
		return this.entries.find(
			(entry) => entry.id === this.runningEntryId && entry.endAt === undefined,
		);
	}

	private isRunning(): boolean {
		return this.getRunningEntry() !== undefined;
	}

	private deliverPrompt(projectId: string): void {
		const { resumePrompt } = this.deps;
		if (!resumePrompt) {
			throw new Error("No resume prompt is attached");
		}
		const projectName = createProjectNameLookup(this.projects)(projectId);
		resumePrompt.show({ projectId, projectName });
	}

	private async loadOrEmpty<T>(
		name: CollectionName,
		load: () => Promise<T[]>,
	): Promise<T[]> {
		try {
			return await load();
		} catch (error: unknown) {
			this.logger.error(
				{ err: toErrorMessage(error), collection: name },
				"Failed to load collection, starting empty",
			);
			return [];
		}
	}

	/**
	 * Adopt the newest open entry as running. Older open entries break the
	 * single-running-entry rule; they are closed where the newer one began.
	 */
	private async healOpenEntries(): Promise<void> {
		const open = this.entries
			.filter((entry) => entry.endAt === undefined)
			.sort((a, b) => Date.parse(b.startAt) - Date.parse(a.startAt));
		const [newest, ...stale] = open;
		this.runningEntryId = newest ? newest.id : null;
		if (!newest || stale.length === 0) {
			return;
		}

		const staleIds = new Set(stale.map((entry) => entry.id));
		this.entries = this.entries.map((entry): TimeEntry =>
			staleIds.has(entry.id)
				? { ...entry, endAt: newest.startAt, endedReason: "system" }
				: entry,
		);
		this.logger.warn({ count: stale.length }, "Closed extra open entries found on load");
		await this.persist("entries");
	}

	private restoreSelection(): void {
		const running = findRunningEntry(this.entries);
		if (running) {
			this.selectedProjectId = running.projectId;
			this.currentNote = running.note ?? "";
			return;
		}

		const latest = [...this.entries].sort(
			(a, b) => sortableEndMs(b) - sortableEndMs(a),
		)[0];
		if (latest && findProject(this.projects, latest.projectId)) {
			this.selectedProjectId = latest.projectId;
			this.currentNote = latest.note ?? "";
			return;
		}
		this.selectedProjectId = this.projects[0]?.id ?? null;
	}

	/** Store failures are logged; the in-memory change stands. */
	private async persist(name: CollectionName): Promise<void> {
		try {
			if (name === "projects") {
				await this.deps.store.save("projects", this.projects);
			} else {
				await this.deps.store.save("entries", this.entries);
			}
		} catch (error: unknown) {
			this.logger.error(
				{ err: toErrorMessage(error), collection: name },
				"Failed to persist collection",
			);
		}
	}

	private notify(): void {
		if (this.emitter.listenerCount(STATE_EVENT) === 0) {
			return;
		}
		const snapshot = this.getSnapshot();
		for (const listener of this.emitter.listeners(STATE_EVENT)) {
			try {
				listener(snapshot);
			} catch (error: unknown) {
				this.logger.warn({ err: toErrorMessage(error) }, "State listener failed");
			}
		}
	}
}
