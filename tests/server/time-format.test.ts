import { describe, expect, it } from "vitest";
import { EMPTY_TRAY_LABEL, formatHms, trayLabel } from "../../server/reports/time-format";

describe("formatHms", () => {
	it("pads hours, minutes and seconds", () => {
		expect(formatHms(0)).toBe("00:00:00");
		expect(formatHms(3661)).toBe("01:01:01");
	});

	it("does not wrap past 99 hours", () => {
		expect(formatHms(360_000)).toBe("100:00:00");
	});
});

describe("trayLabel", () => {
	it("shows running seconds while running", () => {
		expect(
			trayLabel({
				running: true,
				runningSeconds: 65,
				selectedProjectId: "proj-aaa-111",
				todaySeconds: 4000,
			}),
		).toBe("00:01:05");
	});

	it("shows today's total for the selection while idle", () => {
		expect(
			trayLabel({
				running: false,
				runningSeconds: 0,
				selectedProjectId: "proj-aaa-111",
				todaySeconds: 4000,
			}),
		).toBe("01:06:40");
	});

	it("shows the empty label without a selection", () => {
		expect(
			trayLabel({
				running: false,
				runningSeconds: 0,
				selectedProjectId: null,
				todaySeconds: 0,
			}),
		).toBe(EMPTY_TRAY_LABEL);
	});
});
