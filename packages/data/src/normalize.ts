import type { Bar } from "@tradeloop/core";
import type { BarRequest } from "./types";

/**
 * Sorts by date and keeps one bar per date; a later duplicate replaces an
 * earlier one.
 */
export const normalizeBars = (bars: Bar[], request: BarRequest = {}): Bar[] => {
	const byDate = new Map<string, Bar>();
	for (const bar of bars) {
		byDate.set(bar.date, bar);
	}
	let ordered = [...byDate.values()].sort((a, b) =>
		a.date < b.date ? -1 : a.date > b.date ? 1 : 0
	);
	if (request.asOf !== undefined) {
		const asOf = request.asOf;
		ordered = ordered.filter((bar) => bar.date <= asOf);
	}
	if (request.limit !== undefined && request.limit >= 0 && ordered.length > request.limit) {
		ordered = ordered.slice(ordered.length - request.limit);
	}
	return ordered;
};
