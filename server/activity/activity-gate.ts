import { EventEmitter } from "node:events";

export type Unsubscribe = () => void;

/**
 * Source of "activity paused" (lock, sleep, screensaver) and "activity
 * resumed" (unlock) signals. Signals may repeat for a single real pause.
 */
export interface ActivityGate {
	onPause(listener: () => void): Unsubscribe;
	onResume(listener: () => void): Unsubscribe;
}

export interface ResumePromptRequest {
	projectId: string;
	projectName: string;
}

/**
 * Surfaces a "resume?" prompt to the user. `show` is fire-and-forget and
 * throws when the prompt cannot be delivered; acceptance arrives later,
 * at most once per prompt, possibly never.
 */
export interface ResumePrompt {
	show(request: ResumePromptRequest): void;
	onUserAccepted(listener: (projectId?: string) => void): Unsubscribe;
}

type ActivitySignal = "paused" | "resumed";

/**
 * ActivityGate fed by the platform adapter through the HTTP and WebSocket
 * surfaces. Listeners always run on a later tick than the inbound call.
 */
export class ActivitySignals implements ActivityGate {
	private readonly emitter = new EventEmitter();

	onPause(listener: () => void): Unsubscribe {
		return this.subscribe("paused", listener);
	}

	onResume(listener: () => void): Unsubscribe {
		return this.subscribe("resumed", listener);
	}

	pause(): void {
		this.signal("paused");
	}

	resume(): void {
		this.signal("resumed");
	}

	private signal(signal: ActivitySignal): void {
		queueMicrotask(() => {
			this.emitter.emit(signal);
		});
	}

	private subscribe(signal: ActivitySignal, listener: () => void): Unsubscribe {
		this.emitter.on(signal, listener);
		return () => {
			this.emitter.off(signal, listener);
		};
	}
}
