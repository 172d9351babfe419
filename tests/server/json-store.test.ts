import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	existsSync,
	mkdirSync,
	mkdtempSync,
	readFileSync,
	rmSync,
	writeFileSync,
} from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { Project } from "../../server/projects/project-types";
import { projectListSchema } from "../../server/projects/project-types";
import { JsonStore } from "../../server/store/json-store";
import { MOCK_PROJECTS } from "../fixtures/projects";

describe("JsonStore", () => {
	let tempDir: string;
	let filePath: string;
	let store: JsonStore<Project[]>;

	beforeEach(() => {
		tempDir = mkdtempSync(join(tmpdir(), "timekeeper-test-"));
		filePath = join(tempDir, "nested", "projects.json");
		store = new JsonStore({ filePath }, projectListSchema);
	});

	afterEach(() => {
		rmSync(tempDir, { recursive: true, force: true });
	});

	function writeRaw(content: string): void {
		mkdirSync(dirname(filePath), { recursive: true });
		writeFileSync(filePath, content, "utf-8");
	}

	it("returns undefined when the file does not exist", async () => {
		expect(await store.load()).toBeUndefined();
	});

	it("round-trips data inside a version envelope", async () => {
		await store.save(MOCK_PROJECTS);

		expect(await store.load()).toEqual(MOCK_PROJECTS);
		expect(JSON.parse(readFileSync(filePath, "utf-8"))).toEqual({
			version: 1,
			data: MOCK_PROJECTS,
		});
		expect(existsSync(`${filePath}.tmp`)).toBe(false);
	});

	it("loadOrDefault persists the default on first run", async () => {
		const loaded = await store.loadOrDefault([]);

		expect(loaded).toEqual([]);
		expect(JSON.parse(readFileSync(filePath, "utf-8"))).toEqual({
			version: 1,
			data: [],
		});
	});

	it("loadOrDefault returns stored data without overwriting it", async () => {
		await store.save(MOCK_PROJECTS);

		expect(await store.loadOrDefault([])).toEqual(MOCK_PROJECTS);
		expect(await store.load()).toEqual(MOCK_PROJECTS);
	});

	it("rejects invalid JSON as STORE_CORRUPT", async () => {
		writeRaw("{not json");

		await expect(store.load()).rejects.toMatchObject({
			name: "AppError",
			code: "STORE_CORRUPT",
		});
	});

	it("rejects a payload without the version envelope", async () => {
		writeRaw(JSON.stringify(MOCK_PROJECTS));

		await expect(store.load()).rejects.toMatchObject({ code: "STORE_CORRUPT" });
	});

	it("rejects data that does not match the schema", async () => {
		writeRaw(JSON.stringify({ version: 1, data: [{ id: "proj-1" }] }));

		await expect(store.load()).rejects.toMatchObject({ code: "STORE_CORRUPT" });
	});

	it("reports unreadable paths as STORE_READ_FAILED", async () => {
		mkdirSync(filePath, { recursive: true });

		await expect(store.load()).rejects.toMatchObject({
			code: "STORE_READ_FAILED",
		});
	});

	it("wraps write failures as STORE_WRITE_FAILED", async () => {
		writeFileSync(join(tempDir, "blocker"), "", "utf-8");
		const blocked = new JsonStore(
			{ filePath: join(tempDir, "blocker", "projects.json") },
			projectListSchema,
		);

		await expect(blocked.save(MOCK_PROJECTS)).rejects.toMatchObject({
			code: "STORE_WRITE_FAILED",
		});
	});
});
