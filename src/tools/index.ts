export { createChartTools, type ChartTools } from "./chart-tools.js";
