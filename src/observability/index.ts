export { LatencyHistogram, type LatencySnapshot } from "./latency-histogram.js";
