import { formatDistance, formatDuration } from "@/lib/format";
import { summarizeResult } from "@/lib/routeWeather";
import type { RouteWeatherResult } from "@/types";

interface RouteSummaryProps {
	result: RouteWeatherResult;
}

export function RouteSummary({ result }: RouteSummaryProps) {
	const { route, start, end } = result;
	const { points, hazards, errors } = summarizeResult(result);
	return (
		<div className="mt-4 rounded-lg border border-neutral-200 bg-white p-3 text-sm text-neutral-600">
			<p className="font-medium text-neutral-800">
				{start.name} → {end.name}
			</p>
			<p className="mt-1">
				<span>{formatDistance(route.totalDistanceMeters)}</span>
				{route.durationSeconds != null && (
					<>
						{" · "}
						<span>{formatDuration(route.durationSeconds)}</span>
					</>
				)}
				{" · "}
				<span>
					{hazards} of {points} points flagged
				</span>
				{errors > 0 && <span className="text-red-600"> ({errors} without weather)</span>}
			</p>
			{result.simulated && (
				<span className="mt-2 inline-block rounded bg-amber-100 px-2 py-0.5 text-xs text-amber-800">Simulated weather</span>
			)}
		</div>
	);
}
