/**
 * Flow Types
 *
 * Contracts between the pipeline and the code it drives:
 *
 *   event ──controller──> new state ──view──> rendered output
 *
 * Controllers and views are plain async functions. The registries keep them behind
 * `transit` / `render` method interfaces so that bindings for different event and
 * state types can share one table.
 */

import type { FlowError } from './errors.js';
import type { TypeRef } from './hierarchy.js';
import type { Session, SessionId, SessionVars } from './session.js';

export interface FlowEvent {
  readonly sessionId: SessionId;
}

export type EventType<E extends FlowEvent> = TypeRef<E>;

export type StateType<S> = TypeRef<S>;

export type ControllerFn<E extends FlowEvent, From, To> = (event: E, from: From) => Promise<To>;

export type InitialControllerFn<E extends FlowEvent, To> = (event: E) => Promise<To>;

export interface Controller<E extends FlowEvent> {
  transit(event: E, from: unknown): Promise<unknown>;
}

export interface ViewContext<S, R, E extends FlowEvent> {
  session: Session<S>;
  state: S;
  renderer: R;
  event: E;
}

export type ViewFn<S, R, E extends FlowEvent> = (context: ViewContext<S, R, E>) => Promise<void>;

export interface View<R, E extends FlowEvent> {
  render(context: ViewContext<unknown, R, E>): Promise<void>;
}

export interface FailureContext<R, E extends FlowEvent> {
  error: FlowError;
  event: E;
  /** Session as of the failing stage, when it had been loaded. */
  session?: Session;
  renderer: R;
}

export type FailureViewFn<R, E extends FlowEvent> = (context: FailureContext<R, E>) => Promise<void>;

export type RendererFactory<R, E extends FlowEvent> = (event: E) => R;

export interface EventSource<E extends FlowEvent> {
  onEvent(listener: (event: E) => void): void;
}

export interface StoredSession {
  state: unknown;
  vars: SessionVars;
}

export interface SessionStorage {
  acquireLock(sessionId: SessionId): Promise<void>;
  releaseLock(sessionId: SessionId): Promise<void>;
  loadStateAndVars(sessionId: SessionId): Promise<StoredSession>;
  store(sessionId: SessionId, state: unknown, vars: SessionVars): Promise<void>;
}

export interface Executor {
  execute(task: () => Promise<void>): void;
}
