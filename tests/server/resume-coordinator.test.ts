import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_RESUME_POLICY } from "../../server/config";
import {
	MAX_PROMPTS_PER_EPISODE,
	ResumeCoordinator,
} from "../../server/sessions/resume-coordinator";
import { silentLogger } from "../helpers/silent-logger";

const STOPPED_AT = new Date("2026-01-15T12:00:00.000Z");

function after(ms: number): Date {
	return new Date(STOPPED_AT.getTime() + ms);
}

describe("ResumeCoordinator", () => {
	let deliver: ReturnType<typeof vi.fn<(projectId: string) => void>>;
	let onRetryDue: ReturnType<typeof vi.fn<(episode: number) => void>>;
	let coordinator: ResumeCoordinator;

	beforeEach(() => {
		vi.useFakeTimers();
		deliver = vi.fn<(projectId: string) => void>();
		onRetryDue = vi.fn<(episode: number) => void>();
		coordinator = new ResumeCoordinator({
			policy: DEFAULT_RESUME_POLICY,
			logger: silentLogger(),
			deliver,
			onRetryDue,
		});
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("does nothing without an auto-stop", () => {
		expect(coordinator.requestPrompt(after(5_000), false)).toBe(false);
		expect(deliver).not.toHaveBeenCalled();
	});

	it("drops requests that arrive too soon after the auto-stop", () => {
		coordinator.arm("proj-aaa-111", "write tests", STOPPED_AT);

		expect(coordinator.requestPrompt(after(1_000), false)).toBe(false);
		expect(deliver).not.toHaveBeenCalled();
		expect(coordinator.current?.promptsShown).toBe(0);
	});

	it("delivers a prompt and schedules one retry", () => {
		coordinator.arm("proj-aaa-111", "write tests", STOPPED_AT);

		expect(coordinator.requestPrompt(after(3_000), false)).toBe(true);

		expect(deliver).toHaveBeenCalledWith("proj-aaa-111");
		expect(coordinator.current?.promptsShown).toBe(1);
		expect(coordinator.hasPendingRetry).toBe(true);

		vi.advanceTimersByTime(DEFAULT_RESUME_POLICY.retryDelayMs);

		expect(onRetryDue).toHaveBeenCalledWith(1);
		expect(coordinator.hasPendingRetry).toBe(false);
	});

	it("debounces a second request inside the window", () => {
		coordinator.arm("proj-aaa-111", "write tests", STOPPED_AT);
		coordinator.requestPrompt(after(3_000), false);

		expect(coordinator.requestPrompt(after(8_000), false)).toBe(false);
		expect(deliver).toHaveBeenCalledTimes(1);
	});

	it("shows at most two prompts per episode", () => {
		coordinator.arm("proj-aaa-111", "write tests", STOPPED_AT);
		coordinator.requestPrompt(after(3_000), false);
		vi.advanceTimersByTime(DEFAULT_RESUME_POLICY.retryDelayMs);

		expect(coordinator.handleRetry(1, after(23_000), false)).toBe(true);
		expect(coordinator.current?.promptsShown).toBe(MAX_PROMPTS_PER_EPISODE);
		expect(coordinator.requestPrompt(after(60_000), false)).toBe(false);
		expect(coordinator.handleRetry(1, after(61_000), false)).toBe(false);
		expect(deliver).toHaveBeenCalledTimes(2);
	});

	it("expires the context after the maximum age", () => {
		coordinator.arm("proj-aaa-111", "write tests", STOPPED_AT);

		expect(
			coordinator.requestPrompt(after(DEFAULT_RESUME_POLICY.maxAgeMs + 1), false),
		).toBe(false);
		expect(coordinator.current).toBeNull();
	});

	it("keeps the context when delivery fails", () => {
		deliver.mockImplementationOnce(() => {
			throw new Error("no client");
		});
		coordinator.arm("proj-aaa-111", "write tests", STOPPED_AT);

		expect(coordinator.requestPrompt(after(3_000), false)).toBe(false);
		expect(coordinator.current?.promptsShown).toBe(0);
		expect(coordinator.current?.lastPromptAt).toBeNull();
		expect(coordinator.hasPendingRetry).toBe(false);

		expect(coordinator.requestPrompt(after(4_000), false)).toBe(true);
		expect(coordinator.current?.promptsShown).toBe(1);
	});

	it("skips the prompt while a session is running", () => {
		coordinator.arm("proj-aaa-111", "write tests", STOPPED_AT);

		expect(coordinator.requestPrompt(after(3_000), true)).toBe(false);
		expect(deliver).not.toHaveBeenCalled();
	});

	it("ignores a retry from a superseded episode", () => {
		coordinator.arm("proj-aaa-111", "write tests", STOPPED_AT);
		coordinator.arm("proj-bbb-222", "deploy", after(1_000));

		expect(coordinator.current?.episode).toBe(2);
		expect(coordinator.handleRetry(1, after(25_000), false)).toBe(false);
		expect(deliver).not.toHaveBeenCalled();
	});

	it("clear cancels a pending retry", () => {
		coordinator.arm("proj-aaa-111", "write tests", STOPPED_AT);
		coordinator.requestPrompt(after(3_000), false);

		coordinator.clear("user stop");
		vi.advanceTimersByTime(DEFAULT_RESUME_POLICY.retryDelayMs);

		expect(coordinator.current).toBeNull();
		expect(onRetryDue).not.toHaveBeenCalled();
	});
});
