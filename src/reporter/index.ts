export { type StatsReporterConfig, StatsReporter } from "./stats-reporter.js";
