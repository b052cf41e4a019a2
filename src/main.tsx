import { StrictMode } from "react";
import { createRoot } from "react-dom/client";
import App from "./App";
import { loadConfig } from "./config";
import { createServices } from "./services";
import "./index.css";

const config = loadConfig(import.meta.env);
const services = createServices(config);

const root = document.getElementById("root");
if (!root) throw new Error("Missing #root element");

createRoot(root).render(
	<StrictMode>
		<App services={services} intervalMeters={config.samplingIntervalMeters} />
	</StrictMode>
);
