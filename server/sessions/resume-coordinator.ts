import type { ResumePolicy } from "../config";
import { toErrorMessage } from "../errors";
import type { Logger } from "../logger";
import type { ResumeContext } from "./session-types";

/** The first prompt plus its single retry */
export const MAX_PROMPTS_PER_EPISODE = 2;

export interface ResumeCoordinatorDeps {
	policy: ResumePolicy;
	logger: Logger;
	/** Surface the prompt for a project; throws when it cannot be delivered. */
	deliver: (projectId: string) => void;
	/** Called from the retry timer; the owner marshals it back onto its queue. */
	onRetryDue: (episode: number) => void;
}

/**
 * Owns the transient resume context created by an auto-stop and decides
 * when a resume prompt may be shown. Has no notion of entries; callers pass
 * in whether a session is running.
 */
export class ResumeCoordinator {
	private context: ResumeContext | null = null;
	private retryTimer: ReturnType<typeof setTimeout> | null = null;
	private episodes = 0;

	constructor(private readonly deps: ResumeCoordinatorDeps) {}

	get current(): Readonly<ResumeContext> | null {
		return this.context;
	}

	get hasPendingRetry(): boolean {
		return this.retryTimer !== null;
	}

	/** Start a new episode after an auto-stop, replacing any previous one. */
	arm(projectId: string, note: string, stoppedAt: Date): void {
		this.cancelRetry();
		this.episodes += 1;
		this.context = {
			episode: this.episodes,
			lastAutoStoppedProjectId: projectId,
			lastAutoStoppedNote: note,
			lastAutoStopAt: stoppedAt.getTime(),
			lastPromptAt: null,
			promptsShown: 0,
			hasRetried: false,
		};
	}

	clear(reason: string): void {
		if (this.context === null && this.retryTimer === null) {
			return;
		}
		this.cancelRetry();
		this.context = null;
		this.deps.logger.debug({ reason }, "Resume context cleared");
	}

	/** True when the context is older than the policy allows; clears it as a side effect. */
	expireIfStale(now: Date): boolean {
		if (this.context === null) {
			return false;
		}
		const age = now.getTime() - this.context.lastAutoStopAt;
		if (age <= this.deps.policy.maxAgeMs) {
			return false;
		}
		this.clear("expired");
		return true;
	}

	/**
	 * Evaluate a prompt request (typically on unlock).
	 * Returns true only when a prompt was delivered.
	 */
	requestPrompt(now: Date, sessionRunning: boolean): boolean {
		const context = this.context;
		if (context === null) {
			return false;
		}
		if (sessionRunning) {
			this.deps.logger.debug("Resume prompt skipped: session already running");
			return false;
		}

		const sinceStop = now.getTime() - context.lastAutoStopAt;
		if (sinceStop < this.deps.policy.minDelayMs) {
			this.deps.logger.debug({ sinceStop }, "Resume prompt skipped: too soon");
			return false;
		}
		if (this.expireIfStale(now)) {
			return false;
		}
		if (
			context.lastPromptAt !== null &&
			now.getTime() - context.lastPromptAt < this.deps.policy.debounceMs
		) {
			this.deps.logger.debug("Resume prompt skipped: shown recently");
			return false;
		}
		if (context.promptsShown >= MAX_PROMPTS_PER_EPISODE) {
			return false;
		}

		if (!this.tryDeliver(context, now)) {
			return false;
		}
		if (!context.hasRetried && this.retryTimer === null) {
			this.scheduleRetry(context.episode);
		}
		return true;
	}

	/** Run the follow-up prompt for `episode`, if that episode is still current. */
	handleRetry(episode: number, now: Date, sessionRunning: boolean): boolean {
		const context = this.context;
		if (context === null || context.episode !== episode || context.hasRetried) {
			return false;
		}
		context.hasRetried = true;

		if (sessionRunning || this.expireIfStale(now)) {
			return false;
		}
		if (context.promptsShown >= MAX_PROMPTS_PER_EPISODE) {
			return false;
		}
		return this.tryDeliver(context, now);
	}

	cancelRetry(): void {
		if (this.retryTimer !== null) {
			clearTimeout(this.retryTimer);
			this.retryTimer = null;
		}
	}

	private scheduleRetry(episode: number): void {
		this.retryTimer = setTimeout(() => {
			this.retryTimer = null;
			this.deps.onRetryDue(episode);
		}, this.deps.policy.retryDelayMs);
	}

	/** A failed delivery leaves the context untouched so a later request can try again. */
	private tryDeliver(context: ResumeContext, now: Date): boolean {
		try {
			this.deps.deliver(context.lastAutoStoppedProjectId);
		} catch (error: unknown) {
			this.deps.logger.warn(
				{ err: toErrorMessage(error), projectId: context.lastAutoStoppedProjectId },
				"Resume prompt could not be delivered",
			);
			return false;
		}
		context.lastPromptAt = now.getTime();
		context.promptsShown += 1;
		return true;
	}
}
