import { AlertTriangle, CheckCircle2 } from "lucide-react";
import { formatDistance } from "@/lib/format";
import type { WeatherPoint } from "@/types";

interface WeatherPointListProps {
	points: WeatherPoint[];
}

export function WeatherPointList({ points }: WeatherPointListProps) {
	if (points.length === 0) return null;
	return (
		<section className="mt-4">
			<h2 className="text-base font-semibold text-neutral-800">Weather Along Route</h2>
			<ul className="mt-2 space-y-2">
				{points.map((point) => (
					<li
						key={point.label}
						data-hazard={point.isHazard}
						className={`flex items-start gap-3 rounded-lg p-3 ${point.isHazard ? "bg-red-50" : "bg-emerald-50"}`}
					>
						{point.isHazard ? (
							<AlertTriangle aria-label="Hazard" className="mt-0.5 h-5 w-5 shrink-0 text-red-600" />
						) : (
							<CheckCircle2 aria-label="Clear" className="mt-0.5 h-5 w-5 shrink-0 text-emerald-600" />
						)}
						<div className="min-w-0">
							<p className="text-sm font-medium text-neutral-800">
								{point.label}
								<span className="ml-2 text-xs font-normal text-neutral-500">{formatDistance(point.distanceMeters)}</span>
							</p>
							<p className="text-xs text-neutral-600">{point.conditionSummary}</p>
							{point.hazardMessage && <p className="text-xs text-red-600">{point.hazardMessage}</p>}
						</div>
					</li>
				))}
			</ul>
		</section>
	);
}
