import { describe, expect, it } from "vitest";
import {
	buildEntryLogCsv,
	buildReportCsv,
	buildSummaryCsv,
	escapeCsvField,
	formatHours,
	isReportVariant,
	type ReportInput,
} from "../../server/reports/csv-report";
import type { TimeEntry } from "../../server/sessions/session-types";
import { makeEntry, makeRunningEntry } from "../fixtures/entries";
import {
	MOCK_PROJECT_A,
	MOCK_PROJECT_B,
	MOCK_PROJECT_C,
} from "../fixtures/projects";
import { localDate, localIso } from "../helpers/local-time";

const projects = [MOCK_PROJECT_A, MOCK_PROJECT_B, MOCK_PROJECT_C];

function week(): TimeEntry[] {
	return [
		makeEntry({
			startAt: localIso(2026, 1, 15, 9),
			endAt: localIso(2026, 1, 15, 10, 30),
			note: "write tests",
		}),
		makeEntry({
			projectId: MOCK_PROJECT_B.id,
			startAt: localIso(2026, 1, 15, 23),
			endAt: localIso(2026, 1, 16, 1),
			note: "deploy",
		}),
		makeEntry({
			startAt: localIso(2026, 1, 16, 8),
			endAt: localIso(2026, 1, 16, 8, 15),
			note: undefined,
		}),
		makeEntry({
			startAt: localIso(2026, 1, 16, 9),
			endAt: localIso(2026, 1, 16, 9, 45),
			note: "write tests",
		}),
	];
}

function input(entries: TimeEntry[], projectId?: string): ReportInput {
	return { entries, projects, now: localDate(2026, 1, 17, 12), projectId };
}

describe("formatHours", () => {
	it("renders exactly three decimals", () => {
		expect(formatHours(5_400_000)).toBe("1.500");
		expect(formatHours(10_800_000)).toBe("3.000");
	});

	it("rounds one second down to zero", () => {
		expect(formatHours(1000)).toBe("0.000");
	});

	it("rounds ties away from zero", () => {
		expect(formatHours(1800)).toBe("0.001");
	});

	it("rounds up near a whole hour", () => {
		expect(formatHours(10_799_999)).toBe("3.000");
	});
});

describe("escapeCsvField", () => {
	it("quotes fields with commas, quotes or newlines", () => {
		expect(escapeCsvField("plain")).toBe("plain");
		expect(escapeCsvField("Acme, Inc")).toBe('"Acme, Inc"');
		expect(escapeCsvField('fix "quoted" bug')).toBe('"fix ""quoted"" bug"');
		expect(escapeCsvField("two\nlines")).toBe('"two\nlines"');
	});
});

describe("buildSummaryCsv", () => {
	it("daily sums midnight-split slices per local date", () => {
		expect(buildSummaryCsv("daily", input(week()))).toBe(
			"date,hours\n2026-01-15,2.500\n2026-01-16,2.000\n",
		);
	});

	it("splits an overnight entry into two one-hour day rows", () => {
		const entries = [
			makeEntry({
				startAt: localIso(2024, 1, 1, 23),
				endAt: localIso(2024, 1, 2, 1),
			}),
		];

		expect(buildSummaryCsv("daily", input(entries))).toBe(
			"date,hours\n2024-01-01,1.000\n2024-01-02,1.000\n",
		);
	});

	it("project-task groups by project and task with a placeholder for blank notes", () => {
		expect(buildSummaryCsv("project-task", input(week()))).toBe(
			[
				"project,task,hours",
				"Alpha,(no task),0.250",
				"Alpha,write tests,2.250",
				"beta,deploy,2.000",
				"",
			].join("\n"),
		);
	});

	it("project-note leaves blank notes empty", () => {
		expect(buildSummaryCsv("project-note", input(week()))).toBe(
			[
				"project,note,hours",
				"Alpha,,0.250",
				"Alpha,write tests,2.250",
				"beta,deploy,2.000",
				"",
			].join("\n"),
		);
	});

	it("project-daily groups by project, date and task", () => {
		expect(buildSummaryCsv("project-daily", input(week()))).toBe(
			[
				"project,date,task,hours",
				"Alpha,2026-01-15,write tests,1.500",
				"Alpha,2026-01-16,(no task),0.250",
				"Alpha,2026-01-16,write tests,0.750",
				"beta,2026-01-15,deploy,1.000",
				"beta,2026-01-16,deploy,1.000",
				"",
			].join("\n"),
		);
	});

	it("sorts project names case-insensitively", () => {
		const entries = [
			makeEntry({ projectId: MOCK_PROJECT_C.id, note: "plan" }),
			makeEntry({ projectId: MOCK_PROJECT_B.id, note: "plan" }),
			makeEntry({ projectId: MOCK_PROJECT_A.id, note: "plan" }),
		];

		expect(buildSummaryCsv("project-task", input(entries))).toBe(
			"project,task,hours\nAlpha,plan,1.000\nbeta,plan,1.000\nGamma,plan,1.000\n",
		);
	});

	it("escapes project names and notes", () => {
		const entries = [
			makeEntry({ projectId: "proj-acme", note: 'fix "quoted", bug' }),
		];

		expect(
			buildSummaryCsv("project-note", {
				...input(entries),
				projects: [{ id: "proj-acme", name: "Acme, Inc" }],
			}),
		).toBe('project,note,hours\n"Acme, Inc","fix ""quoted"", bug",1.000\n');
	});

	it("names dangling project references Unknown", () => {
		const entries = [makeEntry({ projectId: "proj-missing", note: "lost" })];

		expect(buildSummaryCsv("project-task", input(entries))).toBe(
			"project,task,hours\nUnknown,lost,1.000\n",
		);
	});

	it("counts the running entry up to now", () => {
		const entries = [makeRunningEntry({ startAt: localIso(2026, 1, 17, 11) })];

		expect(buildSummaryCsv("daily", input(entries))).toBe(
			"date,hours\n2026-01-17,1.000\n",
		);
	});

	it("filters to one project", () => {
		expect(buildSummaryCsv("daily", input(week(), MOCK_PROJECT_B.id))).toBe(
			"date,hours\n2026-01-15,1.000\n2026-01-16,1.000\n",
		);
	});

	it("renders only the header for an empty log", () => {
		expect(buildSummaryCsv("daily", input([]))).toBe("date,hours\n");
	});
});

describe("buildEntryLogCsv", () => {
	it("lists completed entries oldest first and skips the running one", () => {
		const entries = [
			makeRunningEntry({ startAt: localIso(2026, 1, 17, 11) }),
			...week().reverse(),
		];

		expect(buildEntryLogCsv(input(entries))).toBe(
			[
				"project,start,end,hours",
				"Alpha,2026-01-15 09:00,2026-01-15 10:30,1.500",
				"beta,2026-01-15 23:00,2026-01-16 01:00,2.000",
				"Alpha,2026-01-16 08:00,2026-01-16 08:15,0.250",
				"Alpha,2026-01-16 09:00,2026-01-16 09:45,0.750",
				"",
			].join("\n"),
		);
	});

	it("filters to one project", () => {
		expect(buildEntryLogCsv(input(week(), MOCK_PROJECT_B.id))).toBe(
			"project,start,end,hours\nbeta,2026-01-15 23:00,2026-01-16 01:00,2.000\n",
		);
	});
});

describe("buildReportCsv", () => {
	it("dispatches entry-log and summary variants", () => {
		expect(buildReportCsv("entry-log", input([]))).toBe("project,start,end,hours\n");
		expect(buildReportCsv("project-task", input([]))).toBe("project,task,hours\n");
	});

	it("recognizes report variant names", () => {
		expect(isReportVariant("project-daily")).toBe(true);
		expect(isReportVariant("weekly")).toBe(false);
	});
});
