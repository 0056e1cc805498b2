import { describe, it, expect, beforeEach } from 'vitest';
import { ViewRegistry } from './view-registry.js';
import { ViewNotFoundError } from '../errors.js';
import { createSession } from '../session.js';
import type { FlowEvent } from '../types.js';

class Ping implements FlowEvent {
  constructor(readonly sessionId: number) {}
}

class Screen {}
class MenuScreen extends Screen {}
class HelpScreen extends Screen {}
class ArchivedMenu extends MenuScreen {}
class ErrorScreen extends Screen {}
class Unrelated {}

const screenView = async () => undefined;
const menuView = async () => undefined;

describe('ViewRegistry', () => {
  let views: ViewRegistry<string[], Ping>;

  beforeEach(() => {
    views = new ViewRegistry<string[], Ping>().bind([Screen], screenView).bind([MenuScreen, HelpScreen], menuView);
  });

  it('should resolve the view bound to the exact state type', () => {
    expect(views.resolve(new MenuScreen()).render).toBe(menuView);
    expect(views.resolve(new HelpScreen()).render).toBe(menuView);
  });

  it('should walk the state ancestry to the nearest bound type', () => {
    expect(views.resolve(new ArchivedMenu()).render).toBe(menuView);
    expect(views.resolve(new ErrorScreen()).render).toBe(screenView);
  });

  it('should render through the bound view', async () => {
    const lines: string[] = [];
    const titled = new ViewRegistry<string[], Ping>().bind([MenuScreen], async ({ state, renderer, session }) => {
      renderer.push(`${state.constructor.name} for ${session.id}`);
    });
    const state = new MenuScreen();

    await titled.resolve(state).render({ session: createSession(4, state), state, renderer: lines, event: new Ping(4) });

    expect(lines).toEqual(['MenuScreen for 4']);
  });

  it('should throw ViewNotFoundError for an unbound state type', () => {
    expect(() => views.resolve(new Unrelated())).toThrow(ViewNotFoundError);
    expect(() => views.resolve(new Unrelated())).toThrow('No view defined for state type Unrelated');
  });

  it('should throw ViewNotFoundError for an absent state', () => {
    expect(() => views.resolve(undefined)).toThrow('No view defined for state type undefined');
    expect(views.find(null)).toBeUndefined();
  });

  it('should let a later binding replace an earlier one', () => {
    const replacement = async () => undefined;
    views.bind([HelpScreen], replacement);

    expect(views.resolve(new HelpScreen()).render).toBe(replacement);
    expect(views.resolve(new MenuScreen()).render).toBe(menuView);
    expect(views.size).toBe(3);
  });
});
