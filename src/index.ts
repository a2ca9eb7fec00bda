export * from './status-display/index.js';
export { createSubsystemLogger, type SubsystemLogger } from './logging/subsystem.js';
