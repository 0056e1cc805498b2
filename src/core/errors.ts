import { describeState, typeName } from './hierarchy.js';

export type FlowStage = 'lock' | 'load' | 'dispatch' | 'transition' | 'bind' | 'store' | 'render' | 'unlock';

export type FlowErrorCode =
  | 'LOCK_ACQUISITION_FAILURE'
  | 'STATE_LOAD_FAILURE'
  | 'DISPATCH_FAILURE'
  | 'TRANSITION_FAILURE'
  | 'VIEW_BINDING_FAILURE'
  | 'STORE_FAILURE'
  | 'RENDER_FAILURE'
  | 'LOCK_RELEASE_FAILURE';

const stageCodes: Record<FlowStage, FlowErrorCode> = {
  lock: 'LOCK_ACQUISITION_FAILURE',
  load: 'STATE_LOAD_FAILURE',
  dispatch: 'DISPATCH_FAILURE',
  transition: 'TRANSITION_FAILURE',
  bind: 'VIEW_BINDING_FAILURE',
  store: 'STORE_FAILURE',
  render: 'RENDER_FAILURE',
  unlock: 'LOCK_RELEASE_FAILURE',
};

const stageLabels: Record<FlowStage, string> = {
  lock: 'Failed to acquire session lock',
  load: 'Failed to retrieve session state/vars',
  dispatch: 'Failed to dispatch event',
  transition: 'Failed to perform transition',
  bind: 'Failed to bind view',
  store: 'Failed to store session',
  render: 'Failed to render view',
  unlock: 'Failed to release session lock',
};

function messageOf(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Failure of one pipeline stage. The underlying error, when there is one, is kept as `cause`.
 */
export class FlowError extends Error {
  readonly code: FlowErrorCode;

  constructor(
    public readonly stage: FlowStage,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FlowError';
    this.code = stageCodes[stage];
  }

  /**
   * Wraps a thrown value into a FlowError for the given stage. A FlowError already
   * raised for that same stage is returned as is; one from another stage is wrapped.
   */
  static from(stage: FlowStage, cause: unknown): FlowError {
    if (cause instanceof FlowError && cause.stage === stage) {
      return cause;
    }
    return new FlowError(stage, `${stageLabels[stage]}: ${messageOf(cause)}`, undefined, { cause });
  }

  static lockAcquisition(cause: unknown): FlowError {
    return FlowError.from('lock', cause);
  }

  static stateLoad(cause: unknown): FlowError {
    return FlowError.from('load', cause);
  }

  static dispatch(cause: unknown): FlowError {
    return FlowError.from('dispatch', cause);
  }

  static transition(cause: unknown): FlowError {
    return FlowError.from('transition', cause);
  }

  static viewBinding(cause: unknown): FlowError {
    return FlowError.from('bind', cause);
  }

  static store(cause: unknown): FlowError {
    return FlowError.from('store', cause);
  }

  static render(cause: unknown): FlowError {
    return FlowError.from('render', cause);
  }

  static lockRelease(cause: unknown): FlowError {
    return FlowError.from('unlock', cause);
  }
}

export class ControllerNotFoundError extends FlowError {
  constructor(
    public readonly eventType: string,
    public readonly state: unknown
  ) {
    super(
      'dispatch',
      `No controller registered for state ${describeState(state)} and event type ${eventType}`,
      { eventType, state }
    );
    this.name = 'ControllerNotFoundError';
  }
}

export class ViewNotFoundError extends FlowError {
  constructor(public readonly state: unknown) {
    super('bind', `No view defined for state type ${typeName(state)}`, { state });
    this.name = 'ViewNotFoundError';
  }
}

export class LockTimeoutError extends FlowError {
  constructor(
    public readonly sessionId: string | number,
    public readonly timeoutMs: number
  ) {
    super('lock', `Timed out after ${timeoutMs}ms waiting for session lock ${sessionId}`, {
      sessionId,
      timeoutMs,
    });
    this.name = 'LockTimeoutError';
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Raised by createFlow when the options are incomplete. Never reaches the failure view.
 */
export class FlowConfigError extends Error {
  constructor(public readonly issues: ConfigIssue[]) {
    super(`Invalid flow configuration: ${issues.map((i) => `${i.path} ${i.message}`).join('; ')}`);
    this.name = 'FlowConfigError';
  }
}
