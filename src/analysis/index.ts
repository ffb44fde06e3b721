export {
  type AnalysisConfigList,
  type AnalysisConfigView,
  AnalysisConfigsService,
} from "./analysis-configs.service.js";
export {
  ANALYSIS_DEFAULTS,
  type EffectiveAnalysisConfig,
  hashAnalysisConfig,
  mergeAnalysisConfig,
} from "./analysis.config.js";
export { AnalysisModule } from "./analysis.module.js";
export { buildAnalysisPrompt, extractInputText, extractOutputText } from "./analysis.prompt.js";
export { AnalysisService, type AnalysisView, type CategoryScore } from "./analysis.service.js";
