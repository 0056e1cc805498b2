import { describe, it, expect } from 'vitest';
import { createSession, withState } from './session.js';

describe('Session', () => {
  it('should freeze the session and a copy of its vars', () => {
    const vars = { lang: 'en' };
    const session = createSession(7, 'idle', vars);

    expect(Object.isFrozen(session)).toBe(true);
    expect(Object.isFrozen(session.vars)).toBe(true);
    expect(session.vars).not.toBe(vars);
    expect(session.vars).toEqual({ lang: 'en' });
  });

  it('should default vars to an empty record', () => {
    expect(createSession('chat-1', undefined).vars).toEqual({});
  });

  it('should produce a new session on transition', () => {
    const session = createSession(7, 'idle', { lang: 'en' });
    const next = withState(session, 'busy');

    expect(next).not.toBe(session);
    expect(next.id).toBe(7);
    expect(next.state).toBe('busy');
    expect(next.vars).toEqual({ lang: 'en' });
    expect(session.state).toBe('idle');
  });
});
