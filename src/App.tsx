import { useState, type FormEvent } from "react";
import { Loader2 } from "lucide-react";
import { RouteSummary } from "@/components/RouteSummary";
import { WeatherPointList } from "@/components/WeatherPointList";
import { useRouteWeather } from "@/hooks/useRouteWeather";
import type { RouteWeatherDeps } from "@/lib/routeWeather";

interface AppProps {
	services: RouteWeatherDeps;
	intervalMeters?: number;
}

const App = ({ services, intervalMeters }: AppProps) => {
	const [startLocation, setStartLocation] = useState("");
	const [endLocation, setEndLocation] = useState("");
	const { status, result, error, run } = useRouteWeather(services, intervalMeters);
	const loading = status === "loading";

	const onSubmit = (e: FormEvent<HTMLFormElement>) => {
		e.preventDefault();
		void run({ start: startLocation, end: endLocation });
	};

	return (
		<div className="mx-auto flex min-h-screen max-w-xl flex-col p-4">
			<h1 className="text-lg font-semibold text-neutral-900">Route Weather</h1>
			<form onSubmit={onSubmit} className="mt-4 space-y-3">
				<input
					type="text"
					aria-label="Start location"
					placeholder="Start location (e.g. San Marcos, TX)"
					value={startLocation}
					onChange={(e) => setStartLocation(e.target.value)}
					className="w-full rounded-lg border border-neutral-300 px-3 py-2 text-sm"
				/>
				<input
					type="text"
					aria-label="Destination"
					placeholder="Destination (e.g. Austin, TX)"
					value={endLocation}
					onChange={(e) => setEndLocation(e.target.value)}
					className="w-full rounded-lg border border-neutral-300 px-3 py-2 text-sm"
				/>
				<button
					type="submit"
					disabled={loading}
					className="flex w-full items-center justify-center rounded-lg bg-blue-600 px-3 py-2 text-sm font-semibold text-white hover:bg-blue-700 disabled:opacity-50"
				>
					{loading ? <Loader2 aria-label="Loading" className="h-4 w-4 animate-spin" /> : "Check Route Weather"}
				</button>
			</form>
			{error && <p className="mt-2 text-sm text-red-600">{error}</p>}
			{result && (
				<>
					<RouteSummary result={result} />
					<WeatherPointList points={result.weatherPoints} />
				</>
			)}
		</div>
	);
};

export default App;
