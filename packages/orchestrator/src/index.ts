// Profiles
export { DEFAULT_SUBAGENT_PROFILES, mergeProfiles, effectiveSandboxMode } from './profiles.js';

// Delegation
export { SubagentDelegator, DELEGATE_TOOL_NAME } from './subagent-delegator.js';
export type { SubagentDelegatorOptions, DelegateOptions, DelegationResult } from './subagent-delegator.js';
export { SubagentConfigError } from './errors.js';

// Tools
export {
  createDelegateTaskTool,
  createDelegateTaskHandler,
  registerDelegateTaskTool,
  DEFAULT_DELEGATE_TIMEOUT_MS,
} from './tools/index.js';
