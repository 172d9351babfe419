import fastifyWebsocket from "@fastify/websocket";
import Fastify, { type FastifyBaseLogger } from "fastify";
import { ActivitySignals } from "./activity/activity-gate";
import { registerTrackerRoutes } from "./api/tracker/routes";
import { loadConfig } from "./config";
import { toErrorMessage } from "./errors";
import { createLogger } from "./logger";
import { SessionEngine } from "./sessions/session-engine";
import { TimeStore } from "./store/time-store";
import { handleWebSocket } from "./websocket";
import { PromptChannel } from "./websocket/prompt-channel";

async function main() {
	const fileErrors: string[] = [];
	const config = await loadConfig({
		onFileError: (filePath, message) => {
			fileErrors.push(`${filePath}: ${message}`);
		},
	});
	const logger = createLogger(config.logLevel);
	for (const fileError of fileErrors) {
		logger.warn({ err: fileError }, "Ignoring unusable config file");
	}

	const signals = new ActivitySignals();
	const prompts = new PromptChannel();
	const engine = await SessionEngine.create({
		store: new TimeStore(config.dataDir),
		logger: logger.child({ component: "engine" }),
		activityGate: signals,
		resumePrompt: prompts,
		requireNote: config.requireNote,
		resumePolicy: config.resume,
	});

	const fastifyLogger: FastifyBaseLogger = logger;
	const app = Fastify({ loggerInstance: fastifyLogger });

	// WebSocket support
	await app.register(fastifyWebsocket);

	app.get("/ws", { websocket: true }, (socket, _req) => {
		handleWebSocket(socket, {
			engine,
			signals,
			prompts,
			logger,
			tickIntervalMs: config.tickIntervalMs,
		});
	});

	await registerTrackerRoutes(app, {
		engine,
		signals,
		prompts,
		exportDir: config.dataDir,
	});

	await app.listen({ port: config.port, host: config.host });
	logger.info({ dataDir: config.dataDir }, "Timekeeper ready");

	let shuttingDown = false;
	const shutdown = async (signal: string) => {
		if (shuttingDown) {
			return;
		}
		shuttingDown = true;
		logger.info({ signal }, "Shutting down");
		try {
			await engine.stopAndShutdown();
			await app.close();
			process.exit(0);
		} catch (error) {
			logger.error({ err: toErrorMessage(error) }, "Shutdown failed");
			process.exit(1);
		}
	};

	process.on("SIGINT", () => {
		void shutdown("SIGINT");
	});
	process.on("SIGTERM", () => {
		void shutdown("SIGTERM");
	});
}

main().catch((err: unknown) => {
	console.error("Failed to start server:", toErrorMessage(err));
	process.exit(1);
});
