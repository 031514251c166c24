export { classifyCommandRisk, type RiskAssessment } from './risk-classifier.js';

export {
  execCommandToolDefinition,
  execCommandHandler,
  execNeedsConfirmation,
  MAX_EXEC_TIMEOUT_SEC,
} from './exec-tool.js';

export {
  listFilesToolDefinition,
  readFileToolDefinition,
  grepFilesToolDefinition,
  writeFileToolDefinition,
  replaceInFileToolDefinition,
  listFilesHandler,
  readFileHandler,
  grepFilesHandler,
  writeFileHandler,
  replaceInFileHandler,
} from './file-tools.js';

export { updatePlanToolDefinition, updatePlanHandler } from './plan-tool.js';

export { globToRegExp, matchesGlob } from './glob.js';

export {
  registerBuiltinTools,
  createBuiltinToolSpecs,
  type RegisterBuiltinOptions,
} from './register.js';
