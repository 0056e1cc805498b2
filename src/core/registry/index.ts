export { ControllerRegistry, anyEvent, anyState, stateType, stateValue } from './controller-registry.js';
export type { EventKey, StateSelector } from './controller-registry.js';
export { ViewRegistry } from './view-registry.js';
