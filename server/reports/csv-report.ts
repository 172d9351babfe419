import type { Project } from "../projects/project-types";
import { createProjectNameLookup } from "../projects/project-lookup";
import type { TimeEntry } from "../sessions/session-types";
import { entrySpan, sliceByLocalDay } from "./aggregation";

export type SummaryVariant =
	| "daily"
	| "project-daily"
	| "project-task"
	| "project-note";

export type ReportVariant = SummaryVariant | "entry-log";

type GroupKey = "project" | "date" | "task" | "note";

interface SummaryLayout {
	keys: readonly GroupKey[];
	header: readonly string[];
}

/**
 * Column layout per summary variant. Rows always sort by project name
 * (case-insensitive), then date, then task/note, skipping absent keys.
 */
export const SUMMARY_LAYOUTS: Record<SummaryVariant, SummaryLayout> = {
	daily: { keys: ["date"], header: ["date", "hours"] },
	"project-daily": {
		keys: ["project", "date", "task"],
		header: ["project", "date", "task", "hours"],
	},
	"project-task": {
		keys: ["project", "task"],
		header: ["project", "task", "hours"],
	},
	"project-note": {
		keys: ["project", "note"],
		header: ["project", "note", "hours"],
	},
};

export const REPORT_VARIANTS: readonly ReportVariant[] = [
	"daily",
	"project-daily",
	"project-task",
	"project-note",
	"entry-log",
];

export const ENTRY_LOG_HEADER = ["project", "start", "end", "hours"] as const;

/** Task columns show this for blank notes; note columns leave them blank. */
export const NO_TASK_PLACEHOLDER = "(no task)";

export interface ReportInput {
	entries: readonly TimeEntry[];
	projects: readonly Project[];
	now: Date;
	/** Restrict the report to one project */
	projectId?: string;
}

interface Bucket {
	projectId: string;
	projectName: string;
	date: string;
	text: string;
	durationMs: number;
}

export function isReportVariant(value: string): value is ReportVariant {
	return REPORT_VARIANTS.some((variant) => variant === value);
}

export function escapeCsvField(value: string): string {
	if (/[",\r\n]/.test(value)) {
		return `"${value.replaceAll('"', '""')}"`;
	}
	return value;
}

/**
 * Hours with exactly three decimals, rounded to nearest with ties away
 * from zero. Computed on integer thousandths so no float formatting is
 * involved and the separator is always ".".
 */
export function formatHours(durationMs: number): string {
	const thousandths = Math.round(Math.max(0, durationMs) / 3600);
	const whole = Math.floor(thousandths / 1000);
	const fraction = thousandths % 1000;
	return `${whole}.${String(fraction).padStart(3, "0")}`;
}

function compareText(a: string, b: string): number {
	const lowerA = a.toLowerCase();
	const lowerB = b.toLowerCase();
	if (lowerA !== lowerB) {
		return lowerA < lowerB ? -1 : 1;
	}
	if (a !== b) {
		return a < b ? -1 : 1;
	}
	return 0;
}

function compareBuckets(
	keys: readonly GroupKey[],
	a: Bucket,
	b: Bucket,
): number {
	for (const key of keys) {
		let order = 0;
		switch (key) {
			case "project":
				order =
					compareText(a.projectName, b.projectName) ||
					compareText(a.projectId, b.projectId);
				break;
			case "date":
				order = compareText(a.date, b.date);
				break;
			case "task":
			case "note":
				order = compareText(a.text, b.text);
				break;
		}
		if (order !== 0) {
			return order;
		}
	}
	return 0;
}

function noteText(entry: TimeEntry, keys: readonly GroupKey[]): string {
	const trimmed = entry.note?.trim() ?? "";
	if (trimmed === "" && keys.includes("task")) {
		return NO_TASK_PLACEHOLDER;
	}
	return trimmed;
}

function toCsv(header: readonly string[], rows: readonly string[][]): string {
	const lines = [header.join(","), ...rows.map((row) => row.map(escapeCsvField).join(","))];
	return `${lines.join("\n")}\n`;
}

/**
 * Grouped summary: each entry is split at local midnights, slices are
 * summed per bucket, one row per bucket.
 */
export function buildSummaryCsv(
	variant: SummaryVariant,
	input: ReportInput,
): string {
	const layout = SUMMARY_LAYOUTS[variant];
	const projectName = createProjectNameLookup(input.projects);
	const buckets = new Map<string, Bucket>();

	for (const entry of input.entries) {
		if (input.projectId !== undefined && entry.projectId !== input.projectId) {
			continue;
		}
		const text = noteText(entry, layout.keys);
		for (const slice of sliceByLocalDay(entry, input.now)) {
			const bucket: Bucket = {
				projectId: layout.keys.includes("project") ? entry.projectId : "",
				projectName: layout.keys.includes("project")
					? projectName(entry.projectId)
					: "",
				date: layout.keys.includes("date") ? slice.date : "",
				text: layout.keys.some((key) => key === "task" || key === "note")
					? text
					: "",
				durationMs: 0,
			};
			const bucketKey = JSON.stringify([
				bucket.projectId,
				bucket.date,
				bucket.text,
			]);
			const existing = buckets.get(bucketKey) ?? bucket;
			existing.durationMs += slice.durationMs;
			buckets.set(bucketKey, existing);
		}
	}

	const rows = [...buckets.values()]
		.sort((a, b) => compareBuckets(layout.keys, a, b))
		.map((bucket) => {
			const cells = layout.keys.map((key) => {
				switch (key) {
					case "project":
						return bucket.projectName;
					case "date":
						return bucket.date;
					case "task":
					case "note":
						return bucket.text;
				}
			});
			return [...cells, formatHours(bucket.durationMs)];
		});

	return toCsv(layout.header, rows);
}

function pad(value: number): string {
	return String(value).padStart(2, "0");
}

/** Local `yyyy-MM-dd HH:mm` */
export function formatLocalMinute(ms: number): string {
	const date = new Date(ms);
	return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

/** One row per completed entry, oldest first; the running entry is skipped. */
export function buildEntryLogCsv(input: ReportInput): string {
	const projectName = createProjectNameLookup(input.projects);
	const rows = input.entries
		.filter((entry) => entry.endAt !== undefined)
		.filter(
			(entry) =>
				input.projectId === undefined || entry.projectId === input.projectId,
		)
		.map((entry) => ({ entry, span: entrySpan(entry, input.now) }))
		.sort((a, b) => a.span.startMs - b.span.startMs)
		.map(({ entry, span }) => [
			projectName(entry.projectId),
			formatLocalMinute(span.startMs),
			formatLocalMinute(span.endMs),
			formatHours(span.endMs - span.startMs),
		]);

	return toCsv(ENTRY_LOG_HEADER, rows);
}

export function buildReportCsv(
	variant: ReportVariant,
	input: ReportInput,
): string {
	if (variant === "entry-log") {
		return buildEntryLogCsv(input);
	}
	return buildSummaryCsv(variant, input);
}
