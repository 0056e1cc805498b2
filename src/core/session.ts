export type SessionId = string | number;

export type SessionVars = Readonly<Record<string, unknown>>;

/**
 * A session as seen by one event's processing. Values are frozen; a transition
 * produces a new Session instead of changing this one.
 */
export interface Session<S = unknown> {
  readonly id: SessionId;
  readonly state: S;
  readonly vars: SessionVars;
}

export function createSession<S>(id: SessionId, state: S, vars: SessionVars = {}): Session<S> {
  return Object.freeze({
    id,
    state,
    vars: Object.freeze({ ...vars }),
  });
}

export function withState<S>(session: Session<unknown>, state: S): Session<S> {
  return createSession(session.id, state, session.vars);
}
