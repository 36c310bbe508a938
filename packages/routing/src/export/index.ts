export { routeReportToJson, type RouteReport } from "./route-report.js";
export { routesToMarkdown, type RouteQuery } from "./markdown.js";
export { explanationToText, networkToText } from "./text.js";
