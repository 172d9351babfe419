import type { TimeEntry } from "../sessions/session-types";

/** A portion of one entry that falls inside a single local calendar day. */
export interface DaySlice {
	entry: TimeEntry;
	/** Local calendar date, `yyyy-MM-dd` */
	date: string;
	startMs: number;
	endMs: number;
	durationMs: number;
}

export function startOfLocalDay(ms: number): number {
	const day = new Date(ms);
	day.setHours(0, 0, 0, 0);
	return day.getTime();
}

/** Next local midnight; calendar arithmetic so DST days of 23h/25h stay correct. */
export function startOfNextLocalDay(ms: number): number {
	const day = new Date(ms);
	return new Date(
		day.getFullYear(),
		day.getMonth(),
		day.getDate() + 1,
	).getTime();
}

function pad(value: number, width = 2): string {
	return String(value).padStart(width, "0");
}

export function localDateKey(ms: number): string {
	const day = new Date(ms);
	return `${day.getFullYear()}-${pad(day.getMonth() + 1)}-${pad(day.getDate())}`;
}

export function findRunningEntry(
	entries: readonly TimeEntry[],
): TimeEntry | undefined {
	return entries.find((entry) => entry.endAt === undefined);
}

/** `[startAt, endAt ?? now]` in epoch ms; an inverted span collapses to zero length. */
export function entrySpan(
	entry: TimeEntry,
	now: Date,
): { startMs: number; endMs: number } {
	const startMs = Date.parse(entry.startAt);
	const endMs =
		entry.endAt === undefined ? now.getTime() : Date.parse(entry.endAt);
	return { startMs, endMs: Math.max(startMs, endMs) };
}

function wholeSeconds(ms: number): number {
	return Math.max(0, Math.floor(ms / 1000));
}

export function runningSeconds(
	entries: readonly TimeEntry[],
	now: Date,
): number {
	const running = findRunningEntry(entries);
	if (!running) {
		return 0;
	}
	return wholeSeconds(now.getTime() - Date.parse(running.startAt));
}

/**
 * Seconds tracked for `projectId` since local midnight of `now`.
 * Entries that began before midnight count only from midnight on;
 * the running entry counts up to `now`.
 */
export function totalSecondsToday(
	entries: readonly TimeEntry[],
	projectId: string,
	now: Date,
): number {
	const dayStart = startOfLocalDay(now.getTime());
	let total = 0;
	for (const entry of entries) {
		if (entry.projectId !== projectId) {
			continue;
		}
		const { startMs, endMs } = entrySpan(entry, now);
		if (endMs < dayStart) {
			continue;
		}
		total += wholeSeconds(endMs - Math.max(startMs, dayStart));
	}
	return total;
}

export function totalSecondsAllTime(
	entries: readonly TimeEntry[],
	projectId: string,
	now: Date,
): number {
	let total = 0;
	for (const entry of entries) {
		if (entry.projectId !== projectId) {
			continue;
		}
		const { startMs, endMs } = entrySpan(entry, now);
		total += wholeSeconds(endMs - startMs);
	}
	return total;
}

/**
 * Split an entry at every local midnight it crosses.
 * The slice durations always add up to the entry's full span.
 */
export function sliceByLocalDay(entry: TimeEntry, now: Date): DaySlice[] {
	const { startMs, endMs } = entrySpan(entry, now);
	if (endMs === startMs) {
		return [];
	}

	const slices: DaySlice[] = [];
	let cursor = startMs;
	while (cursor < endMs) {
		const sliceEnd = Math.min(endMs, startOfNextLocalDay(cursor));
		slices.push({
			entry,
			date: localDateKey(cursor),
			startMs: cursor,
			endMs: sliceEnd,
			durationMs: sliceEnd - cursor,
		});
		cursor = sliceEnd;
	}
	return slices;
}
