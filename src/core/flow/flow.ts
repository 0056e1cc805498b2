import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import { config } from '../../config/index.js';
import { createChildLogger } from '../../config/logger.js';
import { createExecutor } from '../../executor/index.js';
import { InMemorySessionStorage } from '../../storage/index.js';
import { FlowError, type FlowStage } from '../errors.js';
import { describeState, isAbsent, typeName } from '../hierarchy.js';
import { ControllerRegistry, ViewRegistry } from '../registry/index.js';
import { createSession, withState, type Session, type SessionId } from '../session.js';
import type {
  Controller,
  EventSource,
  Executor,
  FailureViewFn,
  FlowEvent,
  InitialControllerFn,
  RendererFactory,
  SessionStorage,
} from '../types.js';
import { assertFlowOptions, type FlowConfig } from './options.js';

const defaultLogger = createChildLogger('flow');

type StageResult<T> = { ok: true; value: T } | { ok: false; error: FlowError };

type LockedOutcome = { ok: true } | { ok: false; error: FlowError; session?: Session };

/** Renderer created for one event, shared by the view and the failure view. */
interface RenderScope<R> {
  created?: { renderer: R };
}

export interface TransitionEvent<E extends FlowEvent> {
  sessionId: SessionId;
  from: unknown;
  to: unknown;
  event: E;
}

export interface FailureEvent<E extends FlowEvent> {
  sessionId: SessionId;
  error: FlowError;
  event: E;
}

export interface SettledEvent<E extends FlowEvent> {
  sessionId: SessionId;
  event: E;
  outcome: 'success' | 'failure';
  error?: FlowError;
}

async function attempt<T>(stage: FlowStage, step: () => T | Promise<T>): Promise<StageResult<T>> {
  try {
    return { ok: true, value: await step() };
  } catch (error) {
    return { ok: false, error: FlowError.from(stage, error) };
  }
}

/**
 * Flow drives each submitted event through
 *
 *   lock → load → dispatch → transition → bind view → store → render → unlock
 *
 * A failing stage jumps to the failure view, after which the lock is released.
 * Only a failed lock acquisition skips the release, and renders the failure only
 * when unlocked rendering is allowed.
 *
 * Emits `transition`, `failure`, `settled` and `drained`.
 */
export class Flow<R, E extends FlowEvent> extends EventEmitter {
  private readonly eventSource: EventSource<E>;
  private readonly controllers: ControllerRegistry<E>;
  private readonly views: ViewRegistry<R, E>;
  private readonly initial: InitialControllerFn<E, unknown>;
  private readonly failView: FailureViewFn<R, E>;
  private readonly rendererFactory: RendererFactory<R, E>;
  private readonly storage: SessionStorage;
  private readonly executor: Executor;
  private readonly allowUnlockedRendering: boolean;
  private readonly log: Logger;

  private initialized = false;
  private pending = 0;

  constructor(options: FlowConfig<R, E>) {
    super();
    assertFlowOptions(options);
    this.eventSource = options.eventSource;
    this.controllers = options.controllers ?? new ControllerRegistry<E>();
    this.views = options.views ?? new ViewRegistry<R, E>();
    this.initial = options.initial;
    this.failView = options.failView;
    this.rendererFactory = options.rendererFactory;
    this.storage =
      options.storage ??
      new InMemorySessionStorage({ stripes: config.lock.stripes, acquireTimeoutMs: config.lock.timeoutMs });
    this.executor = options.executor ?? createExecutor(config.flow.executor, config.flow.poolSize);
    this.allowUnlockedRendering = options.allowUnlockedRendering ?? config.flow.allowUnlockedRendering;
    this.log = options.logger ?? defaultLogger;
  }

  /**
   * Subscribes to the event source. Further calls do nothing.
   */
  init(): void {
    if (this.initialized) return;
    this.initialized = true;
    this.eventSource.onEvent((event) => this.submit(event));
  }

  /**
   * Hands the event to the executor and returns. Never throws.
   */
  submit(event: E): void {
    this.pending++;
    this.log.debug({ sessionId: event.sessionId, eventType: typeName(event) }, 'Received event');
    try {
      this.executor.execute(() => this.process(event));
    } catch (error) {
      void this.abandon(FlowError.lockAcquisition(error), event);
    }
  }

  /** Events submitted but not yet settled. */
  get inFlight(): number {
    return this.pending;
  }

  /**
   * Resolves once every submitted event has settled.
   */
  drain(): Promise<void> {
    if (this.pending === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.once('drained', resolve));
  }

  private async process(event: E): Promise<void> {
    const { sessionId } = event;

    const locked = await attempt('lock', () => this.storage.acquireLock(sessionId));
    if (!locked.ok) {
      await this.abandon(locked.error, event);
      return;
    }

    // Past this point the lock is held: release and settle must run whatever happens.
    const scope: RenderScope<R> = {};
    let failure: FlowError | undefined;
    try {
      const outcome = await this.runLocked(event, scope);
      if (!outcome.ok) {
        failure = outcome.error;
        this.reportFailure(outcome.error, event);
        await this.renderFailure(outcome.error, event, outcome.session, scope);
      }
    } finally {
      await this.releaseLock(sessionId);
      this.settle(event, failure);
    }
  }

  private async runLocked(event: E, scope: RenderScope<R>): Promise<LockedOutcome> {
    const { sessionId } = event;

    const loaded = await attempt('load', async () => {
      const stored = await this.storage.loadStateAndVars(sessionId);
      return createSession(sessionId, stored.state, stored.vars);
    });
    if (!loaded.ok) return loaded;
    const session = loaded.value;

    const dispatched = await attempt('dispatch', () => this.dispatch(event, session.state));
    if (!dispatched.ok) return { ...dispatched, session };

    const transitioned = await attempt('transition', () => dispatched.value.transit(event, session.state));
    if (!transitioned.ok) return { ...transitioned, session };
    const next = withState(session, transitioned.value);

    const bound = await attempt('bind', () => this.views.resolve(next.state));
    if (!bound.ok) return { ...bound, session: next };

    const stored = await attempt('store', () => this.storage.store(sessionId, next.state, next.vars));
    if (!stored.ok) return { ...stored, session: next };

    this.log.debug({ sessionId, state: describeState(next.state) }, 'Set new state');
    this.notify('transition', { sessionId, from: session.state, to: next.state, event } satisfies TransitionEvent<E>);

    const rendered = await attempt('render', () =>
      bound.value.render({ session: next, state: next.state, renderer: this.rendererFor(event, scope), event })
    );
    if (!rendered.ok) return { ...rendered, session: next };

    return { ok: true };
  }

  private dispatch(event: E, state: unknown): Controller<E> {
    if (isAbsent(state)) {
      return { transit: (e: E) => this.initial(e) };
    }
    return this.controllers.resolve(event, state);
  }

  private rendererFor(event: E, scope: RenderScope<R>): R {
    if (!scope.created) {
      scope.created = { renderer: this.rendererFactory(event) };
    }
    return scope.created.renderer;
  }

  /**
   * Lock-failure path: nothing to release, and the failure is rendered only when
   * unlocked rendering is allowed.
   */
  private async abandon(error: FlowError, event: E): Promise<void> {
    this.reportFailure(error, event);
    if (this.allowUnlockedRendering) {
      await this.renderFailure(error, event, undefined, {});
    }
    this.settle(event, error);
  }

  private reportFailure(error: FlowError, event: E): void {
    this.log.error(
      { err: error.cause ?? error, stage: error.stage, sessionId: event.sessionId, eventType: typeName(event) },
      error.message
    );
    this.notify('failure', { sessionId: event.sessionId, error, event } satisfies FailureEvent<E>);
  }

  private async renderFailure(
    error: FlowError,
    event: E,
    session: Session | undefined,
    scope: RenderScope<R>
  ): Promise<void> {
    try {
      await this.failView({ error, event, session, renderer: this.rendererFor(event, scope) });
    } catch (renderError) {
      this.log.error(
        { err: renderError, failure: error.message, sessionId: event.sessionId },
        'Failed to render failure'
      );
    }
  }

  private async releaseLock(sessionId: SessionId): Promise<void> {
    this.log.debug({ sessionId }, 'Releasing session lock');
    try {
      await this.storage.releaseLock(sessionId);
    } catch (error) {
      const failure = FlowError.lockRelease(error);
      this.log.error({ err: error, sessionId }, failure.message);
    }
  }

  private settle(event: E, error?: FlowError): void {
    this.pending--;
    const settled: SettledEvent<E> = {
      sessionId: event.sessionId,
      event,
      outcome: error ? 'failure' : 'success',
      error,
    };
    this.notify('settled', settled);
    if (this.pending === 0) {
      this.notify('drained');
    }
  }

  /**
   * Emits to observers. A throwing listener is logged and never reaches the pipeline.
   */
  private notify(eventName: string, ...args: unknown[]): void {
    try {
      this.emit(eventName, ...args);
    } catch (error) {
      this.log.error({ err: error, eventName }, 'Flow listener failed');
    }
  }
}

export interface CreateFlowOptions {
  /** Subscribe to the event source right away. Defaults to true. */
  initialized?: boolean;
}

/**
 * Validates the configuration and builds a Flow. Throws FlowConfigError when the
 * event source, initial controller, failure view or renderer factory is missing.
 */
export function createFlow<R, E extends FlowEvent>(
  flowConfig: FlowConfig<R, E>,
  { initialized = true }: CreateFlowOptions = {}
): Flow<R, E> {
  const flow = new Flow(flowConfig);
  if (initialized) {
    flow.init();
  }
  return flow;
}
