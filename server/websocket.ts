import { randomUUID } from "node:crypto";
import type { ClientMessage, ServerMessage } from "../shared/types";
import type { ActivitySignals } from "./activity/activity-gate";
import { toErrorMessage } from "./errors";
import type { Logger } from "./logger";
import type { SessionEngine } from "./sessions/session-engine";
import { clientMessageSchema } from "./websocket/message-schema";
import type { PromptChannel } from "./websocket/prompt-channel";

export type WebSocketLike = {
	send: (payload: string) => void;
	on: {
		(event: "message", listener: (raw: unknown) => void): void;
		(event: "close", listener: () => void): void;
		(event: "error", listener: (error: Error) => void): void;
	};
};

export interface WebSocketDeps {
	engine: Pick<
		SessionEngine,
		| "subscribe"
		| "getSnapshot"
		| "addProject"
		| "selectProject"
		| "setNote"
		| "startSession"
		| "stopSession"
		| "switchTask"
		| "primaryAction"
		| "continuePreviousTask"
	>;
	signals: Pick<ActivitySignals, "pause" | "resume">;
	prompts: Pick<PromptChannel, "register" | "accept">;
	logger: Logger;
	/** Interval of `tracker:tick` pushes; 0 disables them */
	tickIntervalMs: number;
}

function sendEnvelope(socket: WebSocketLike, message: ServerMessage): void {
	socket.send(JSON.stringify(message));
}

function decodeRaw(raw: unknown): string {
	if (typeof raw === "string") {
		return raw;
	}
	if (Buffer.isBuffer(raw)) {
		return raw.toString("utf-8");
	}
	if (Array.isArray(raw) && raw.every((chunk) => Buffer.isBuffer(chunk))) {
		return Buffer.concat(raw).toString("utf-8");
	}
	if (raw instanceof ArrayBuffer) {
		return Buffer.from(raw).toString("utf-8");
	}
	return String(raw);
}

function extractRequestId(value: unknown): string | undefined {
	if (typeof value !== "object" || value === null || !("requestId" in value)) {
		return undefined;
	}
	const { requestId } = value;
	return typeof requestId === "string" ? requestId : undefined;
}

/**
 * WebSocket connection handler.
 * Routes client commands and activity/prompt signals to the engine, pushes
 * state on every change, a periodic tick, and resume prompts.
 */
export function handleWebSocket(
	socket: WebSocketLike,
	deps: WebSocketDeps,
): void {
	const connectionId = randomUUID();
	const log = deps.logger.child({ component: "ws", connectionId });
	log.info("Client connected");

	const unregisterPrompt = deps.prompts.register(connectionId, (message) => {
		sendEnvelope(socket, message);
	});
	const unsubscribe = deps.engine.subscribe((snapshot) => {
		sendEnvelope(socket, { type: "tracker:state", snapshot });
	});
	const tickTimer =
		deps.tickIntervalMs > 0
			? setInterval(() => {
					const snapshot = deps.engine.getSnapshot();
					sendEnvelope(socket, {
						type: "tracker:tick",
						runningSeconds: snapshot.runningSeconds,
						todaySeconds: snapshot.todaySeconds,
						trayLabel: snapshot.trayLabel,
					});
				}, deps.tickIntervalMs)
			: null;

	sendEnvelope(socket, {
		type: "tracker:state",
		snapshot: deps.engine.getSnapshot(),
	});

	socket.on("message", (raw: unknown) => {
		void handleIncomingMessage(socket, raw, deps, log);
	});

	socket.on("close", () => {
		if (tickTimer) {
			clearInterval(tickTimer);
		}
		unsubscribe();
		unregisterPrompt();
		log.info("Client disconnected");
	});

	socket.on("error", (err: Error) => {
		log.error({ err: err.message }, "Socket error");
	});
}

async function handleIncomingMessage(
	socket: WebSocketLike,
	raw: unknown,
	deps: WebSocketDeps,
	log: Logger,
): Promise<void> {
	let parsed: unknown;
	try {
		parsed = JSON.parse(decodeRaw(raw));
	} catch {
		sendEnvelope(socket, { type: "error", message: "Invalid message format" });
		return;
	}

	const decoded = clientMessageSchema.safeParse(parsed);
	if (!decoded.success) {
		sendEnvelope(socket, {
			type: "error",
			requestId: extractRequestId(parsed),
			message: "Invalid message format",
		});
		return;
	}

	const message = decoded.data;
	log.debug({ type: message.type }, "Received");
	try {
		await routeMessage(socket, message, deps);
	} catch (error: unknown) {
		log.error({ err: toErrorMessage(error), type: message.type }, "Failed to handle message");
		sendEnvelope(socket, {
			type: "error",
			requestId: message.requestId,
			message: toErrorMessage(error),
		});
	}
}

async function routeMessage(
	socket: WebSocketLike,
	message: ClientMessage,
	deps: WebSocketDeps,
): Promise<void> {
	const { requestId } = message;
	const result = (applied: boolean) => {
		sendEnvelope(socket, {
			type: "command:result",
			command: message.type,
			applied,
			requestId,
		});
	};

	switch (message.type) {
		case "tracker:get": {
			sendEnvelope(socket, {
				type: "tracker:state",
				snapshot: deps.engine.getSnapshot(),
				requestId,
			});
			return;
		}
		case "project:add": {
			const project = await deps.engine.addProject(message.name);
			if (project) {
				sendEnvelope(socket, { type: "project:added", project, requestId });
				return;
			}
			result(false);
			return;
		}
		case "project:select": {
			result(await deps.engine.selectProject(message.projectId));
			return;
		}
		case "note:set": {
			await deps.engine.setNote(message.note);
			result(true);
			return;
		}
		case "session:start": {
			const entry = await deps.engine.startSession(
				message.projectId,
				message.note,
			);
			if (entry) {
				sendEnvelope(socket, { type: "session:started", entry, requestId });
				return;
			}
			result(false);
			return;
		}
		case "session:stop": {
			result(await deps.engine.stopSession("user"));
			return;
		}
		case "session:switch": {
			const entry = await deps.engine.switchTask(message.note);
			if (entry) {
				sendEnvelope(socket, { type: "session:started", entry, requestId });
				return;
			}
			result(false);
			return;
		}
		case "session:primary": {
			result((await deps.engine.primaryAction()) !== null);
			return;
		}
		case "session:continue": {
			result(await deps.engine.continuePreviousTask());
			return;
		}
		case "activity:paused": {
			deps.signals.pause();
			result(true);
			return;
		}
		case "activity:resumed": {
			deps.signals.resume();
			result(true);
			return;
		}
		case "prompt:accept": {
			deps.prompts.accept(message.projectId);
			result(true);
			return;
		}
	}
}
