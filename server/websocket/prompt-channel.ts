import { EventEmitter } from "node:events";
import type { ServerMessage } from "../../shared/types";
import type {
	ResumePrompt,
	ResumePromptRequest,
	Unsubscribe,
} from "../activity/activity-gate";
import { AppError } from "../errors";

type PromptSender = (message: ServerMessage) => void;

const ACCEPTED_EVENT = "accepted";

/**
 * ResumePrompt delivered to every connected WebSocket client.
 * Acceptance comes back through `accept` (from the socket or HTTP surface).
 */
export class PromptChannel implements ResumePrompt {
	private readonly connections = new Map<string, PromptSender>();
	private readonly emitter = new EventEmitter();

	register(connectionId: string, send: PromptSender): Unsubscribe {
		this.connections.set(connectionId, send);
		return () => {
			this.connections.delete(connectionId);
		};
	}

	get connectionCount(): number {
		return this.connections.size;
	}

	show(request: ResumePromptRequest): void {
		if (this.connections.size === 0) {
			throw new AppError(
				"PROMPT_UNDELIVERED",
				"No client connected to show the resume prompt",
			);
		}
		for (const send of this.connections.values()) {
			send({
				type: "prompt:show",
				projectId: request.projectId,
				projectName: request.projectName,
			});
		}
	}

	onUserAccepted(listener: (projectId?: string) => void): Unsubscribe {
		this.emitter.on(ACCEPTED_EVENT, listener);
		return () => {
			this.emitter.off(ACCEPTED_EVENT, listener);
		};
	}

	accept(projectId?: string): void {
		queueMicrotask(() => {
			this.emitter.emit(ACCEPTED_EVENT, projectId);
		});
	}
}
