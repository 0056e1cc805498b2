export { Flow, createFlow, assertFlowOptions } from './flow/index.js';
export type {
  CreateFlowOptions,
  TransitionEvent,
  FailureEvent,
  SettledEvent,
  FlowConfig,
  FlowOptions,
} from './flow/index.js';
export { ControllerRegistry, ViewRegistry, anyEvent, anyState, stateType, stateValue } from './registry/index.js';
export type { EventKey, StateSelector } from './registry/index.js';
export {
  FlowError,
  ControllerNotFoundError,
  ViewNotFoundError,
  LockTimeoutError,
  FlowConfigError,
} from './errors.js';
export type { FlowStage, FlowErrorCode, ConfigIssue } from './errors.js';
export { createSession, withState } from './session.js';
export type { Session, SessionId, SessionVars } from './session.js';
export { ancestry, searchInHierarchy, typeName } from './hierarchy.js';
export type { TypeRef } from './hierarchy.js';
export type * from './types.js';
