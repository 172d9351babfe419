import type { Project } from "../server/projects/project-types";
import type { TimeEntry, TrackerSnapshot } from "../server/sessions/session-types";

export type { ClientMessage } from "../server/websocket/message-schema";
export type { Project, TimeEntry, TrackerSnapshot };

/**
 * Server -> Client WebSocket messages.
 */
export type ServerMessage =
	| { type: "tracker:state"; snapshot: TrackerSnapshot; requestId?: string }
	| {
			type: "tracker:tick";
			runningSeconds: number;
			todaySeconds: number;
			trayLabel: string;
	  }
	| { type: "prompt:show"; projectId: string; projectName: string }
	| { type: "project:added"; project: Project; requestId?: string }
	| { type: "session:started"; entry: TimeEntry; requestId?: string }
	| {
			type: "command:result";
			command: string;
			applied: boolean;
			requestId?: string;
	  }
	| { type: "error"; requestId?: string; message: string };
