export const EMPTY_TRAY_LABEL = "--:--:--";

/** `HH:MM:SS`; hours keep growing past 99 rather than wrapping. */
export function formatHms(totalSeconds: number): string {
	const seconds = Math.max(0, Math.floor(totalSeconds));
	const h = Math.floor(seconds / 3600);
	const m = Math.floor((seconds % 3600) / 60);
	const s = seconds % 60;
	return [h, m, s].map((part) => String(part).padStart(2, "0")).join(":");
}

export function trayLabel(state: {
	running: boolean;
	runningSeconds: number;
	selectedProjectId: string | null;
	todaySeconds: number;
}): string {
	if (state.running) {
		return formatHms(state.runningSeconds);
	}
	if (state.selectedProjectId !== null) {
		return formatHms(state.todaySeconds);
	}
	return EMPTY_TRAY_LABEL;
}
