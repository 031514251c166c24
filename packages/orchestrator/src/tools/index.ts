export {
  createDelegateTaskTool,
  createDelegateTaskHandler,
  registerDelegateTaskTool,
  DEFAULT_DELEGATE_TIMEOUT_MS,
} from './delegate-task-tool.js';
