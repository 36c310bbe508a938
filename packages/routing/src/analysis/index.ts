export {
  analyzeNetwork,
  type AnalysisExtremes,
  type AnalysisSummary,
  type AnalyzedRoute,
  type NetworkAnalysis,
} from "./network-analysis.js";
export { compareSearchStrategies, type StrategyComparison } from "./strategy-comparison.js";
