export { wireSession, createSession } from './session-wiring.js';
export type { SessionWiringOptions, WiredSession } from './session-wiring.js';

export { createConsoleLogger } from './console-logger.js';
export type { ConsoleSink } from './console-logger.js';
