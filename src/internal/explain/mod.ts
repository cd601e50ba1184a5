export { explainSelector, formatExplanation, formatHint } from "./explain.js";

export type { ExplainOptions, OptimizationHint, SelectorExplanation } from "./explain.js";
