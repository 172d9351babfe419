import { mkdir, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { AppError, toErrorMessage } from "../errors";
import type { ReportVariant } from "./csv-report";

function pad(value: number): string {
	return String(value).padStart(2, "0");
}

/** Local `yyyyMMdd-HHmmss` */
export function exportTimestamp(now: Date): string {
	return `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}-${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
}

export function exportFileName(variant: ReportVariant, now: Date): string {
	return `time_entries-${variant}-${exportTimestamp(now)}.csv`;
}

/** Write a rendered report into `dir` atomically and return its path. */
export async function exportCsv(
	dir: string,
	variant: ReportVariant,
	csv: string,
	now: Date,
): Promise<string> {
	const filePath = join(dir, exportFileName(variant, now));
	const tmpPath = `${filePath}.tmp`;
	try {
		await mkdir(dir, { recursive: true });
		await writeFile(tmpPath, csv, "utf-8");
		await rename(tmpPath, filePath);
	} catch (err: unknown) {
		throw new AppError(
			"STORE_WRITE_FAILED",
			`Cannot write export ${filePath}: ${toErrorMessage(err)}`,
			{ cause: err },
		);
	}
	return filePath;
}
