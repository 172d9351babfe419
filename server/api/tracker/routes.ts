import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";
import type { ActivitySignals } from "../../activity/activity-gate";
import { AppError, toErrorMessage, type AppErrorCode } from "../../errors";
import { exportCsv } from "../../reports/csv-export";
import { buildReportCsv, isReportVariant, type ReportVariant } from "../../reports/csv-report";
import type { SessionEngine } from "../../sessions/session-engine";
import type { PromptChannel } from "../../websocket/prompt-channel";

export interface TrackerRoutesDeps {
	engine: Pick<
		SessionEngine,
		| "getSnapshot"
		| "getLog"
		| "addProject"
		| "selectProject"
		| "setNote"
		| "startSession"
		| "stopSession"
		| "switchTask"
		| "primaryAction"
		| "continuePreviousTask"
		| "totalSecondsToday"
		| "totalSecondsAllTime"
	>;
	signals: Pick<ActivitySignals, "pause" | "resume">;
	prompts: Pick<PromptChannel, "accept">;
	/** Directory CSV exports are written into */
	exportDir: string;
	clock?: () => Date;
}

const STATUS_BY_CODE: Partial<Record<AppErrorCode, number>> = {
	INVALID_REQUEST: 400,
	UNKNOWN_REPORT: 404,
};

const addProjectBody = z.object({ name: z.string() });
const selectProjectBody = z.object({ projectId: z.string() });
const noteBody = z.object({ note: z.string() });
const startBody = z
	.object({ projectId: z.string().optional(), note: z.string().optional() })
	.default({});
const switchBody = z.object({ note: z.string().optional() }).default({});
const acceptBody = z.object({ projectId: z.string().optional() }).default({});
const reportParams = z.object({ variant: z.string() });
const reportQuery = z.object({ projectId: z.string().optional() });
const projectParams = z.object({ projectId: z.string() });

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
	const parsed = schema.safeParse(value ?? undefined);
	if (!parsed.success) {
		throw new AppError("INVALID_REQUEST", parsed.error.message);
	}
	return parsed.data;
}

function parseVariant(params: unknown): ReportVariant {
	const { variant } = parse(reportParams, params);
	if (!isReportVariant(variant)) {
		throw new AppError("UNKNOWN_REPORT", `Unknown report: ${variant}`);
	}
	return variant;
}

/** Fastify's own request errors (bad JSON, wrong content type) carry a 4xx statusCode. */
function clientErrorStatus(error: unknown): number | undefined {
	if (typeof error !== "object" || error === null || !("statusCode" in error)) {
		return undefined;
	}
	const { statusCode } = error;
	return typeof statusCode === "number" && statusCode >= 400 && statusCode < 500
		? statusCode
		: undefined;
}

function sendError(reply: FastifyReply, error: unknown): FastifyReply {
	if (error instanceof AppError) {
		return reply
			.code(STATUS_BY_CODE[error.code] ?? 500)
			.send({ code: error.code, message: error.message });
	}
	const status = clientErrorStatus(error);
	if (status !== undefined) {
		return reply
			.code(status)
			.send({ code: "INVALID_REQUEST", message: toErrorMessage(error) });
	}
	reply.log.error({ err: error }, "Unhandled route error");
	return reply.code(500).send({ code: "INTERNAL", message: "Internal error" });
}

/**
 * HTTP surface of the tracker. Commands resolve through the engine queue;
 * activity and prompt routes only enqueue signals and answer 202.
 */
export async function registerTrackerRoutes(
	app: FastifyInstance,
	deps: TrackerRoutesDeps,
): Promise<void> {
	const clock = deps.clock ?? (() => new Date());

	app.setErrorHandler((error, _request, reply) => sendError(reply, error));

	app.get("/api/state", async () => deps.engine.getSnapshot(clock()));

	app.post("/api/projects", async (request, reply) => {
		const { name } = parse(addProjectBody, request.body);
		const project = await deps.engine.addProject(name);
		return reply.code(project ? 201 : 200).send({ applied: project !== null, project });
	});

	app.post("/api/projects/select", async (request) => {
		const { projectId } = parse(selectProjectBody, request.body);
		return { applied: await deps.engine.selectProject(projectId) };
	});

	app.post("/api/note", async (request) => {
		const { note } = parse(noteBody, request.body);
		await deps.engine.setNote(note);
		return { applied: true };
	});

	app.post("/api/session/start", async (request) => {
		const body = parse(startBody, request.body);
		const entry = await deps.engine.startSession(body.projectId, body.note);
		return { applied: entry !== null, entry };
	});

	app.post("/api/session/stop", async () => ({
		applied: await deps.engine.stopSession("user"),
	}));

	app.post("/api/session/switch", async (request) => {
		const body = parse(switchBody, request.body);
		const entry = await deps.engine.switchTask(body.note);
		return { applied: entry !== null, entry };
	});

	app.post("/api/session/primary", async () => ({
		action: await deps.engine.primaryAction(),
	}));

	app.post("/api/session/continue", async () => ({
		applied: await deps.engine.continuePreviousTask(),
	}));

	app.post("/api/activity/paused", async (_request, reply) => {
		deps.signals.pause();
		return reply.code(202).send({ accepted: true });
	});

	app.post("/api/activity/resumed", async (_request, reply) => {
		deps.signals.resume();
		return reply.code(202).send({ accepted: true });
	});

	app.post("/api/prompt/accept", async (request, reply) => {
		const { projectId } = parse(acceptBody, request.body);
		deps.prompts.accept(projectId);
		return reply.code(202).send({ accepted: true });
	});

	app.get("/api/projects/:projectId/totals", async (request) => {
		const { projectId } = parse(projectParams, request.params);
		const now = clock();
		return {
			projectId,
			todaySeconds: deps.engine.totalSecondsToday(projectId, now),
			allTimeSeconds: deps.engine.totalSecondsAllTime(projectId, now),
		};
	});

	app.get("/api/reports/:variant", async (request, reply) => {
		const variant = parseVariant(request.params);
		const { projectId } = parse(reportQuery, request.query);
		const csv = buildReportCsv(variant, {
			...deps.engine.getLog(),
			now: clock(),
			projectId,
		});
		return reply.type("text/csv; charset=utf-8").send(csv);
	});

	app.post("/api/reports/:variant/export", async (request, reply) => {
		const variant = parseVariant(request.params);
		const { projectId } = parse(acceptBody, request.body);
		const now = clock();
		const csv = buildReportCsv(variant, {
			...deps.engine.getLog(),
			now,
			projectId,
		});
		const path = await exportCsv(deps.exportDir, variant, csv, now);
		return reply.code(201).send({ path });
	});
}
