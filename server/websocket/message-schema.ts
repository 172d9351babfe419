import { z } from "zod";

const requestId = z.string().optional();

/** Client -> Server WebSocket messages. `requestId` correlates the reply. */
export const clientMessageSchema = z.discriminatedUnion("type", [
	z.object({ type: z.literal("tracker:get"), requestId }),
	z.object({ type: z.literal("project:add"), requestId, name: z.string() }),
	z.object({
		type: z.literal("project:select"),
		requestId,
		projectId: z.string(),
	}),
	z.object({ type: z.literal("note:set"), requestId, note: z.string() }),
	z.object({
		type: z.literal("session:start"),
		requestId,
		projectId: z.string().optional(),
		note: z.string().optional(),
	}),
	z.object({ type: z.literal("session:stop"), requestId }),
	z.object({
		type: z.literal("session:switch"),
		requestId,
		note: z.string().optional(),
	}),
	z.object({ type: z.literal("session:primary"), requestId }),
	z.object({ type: z.literal("session:continue"), requestId }),
	z.object({ type: z.literal("activity:paused"), requestId }),
	z.object({ type: z.literal("activity:resumed"), requestId }),
	z.object({
		type: z.literal("prompt:accept"),
		requestId,
		projectId: z.string().optional(),
	}),
]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;
