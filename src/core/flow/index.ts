export { Flow, createFlow } from './flow.js';
export type { CreateFlowOptions, TransitionEvent, FailureEvent, SettledEvent } from './flow.js';
export { assertFlowOptions } from './options.js';
export type { FlowConfig, FlowOptions } from './options.js';
