import { ViewNotFoundError } from '../errors.js';
import { isAbsent, prototypeOf, searchInHierarchy } from '../hierarchy.js';
import type { FlowEvent, StateType, View, ViewFn } from '../types.js';

/**
 * ViewRegistry binds state types to views. A state is rendered by the view bound
 * to its own type or, failing that, to its nearest bound ancestor.
 */
export class ViewRegistry<R, E extends FlowEvent> {
  private views: Map<object, View<R, E>> = new Map();

  bind<S>(stateTypes: ReadonlyArray<StateType<S>>, view: ViewFn<S, R, E>): this {
    const binding: View<R, E> = { render: view };
    for (const type of stateTypes) {
      this.views.set(prototypeOf(type), binding);
    }
    return this;
  }

  find(state: unknown): View<R, E> | undefined {
    if (isAbsent(state)) {
      return undefined;
    }
    return searchInHierarchy(state, (proto) => this.views.get(proto));
  }

  resolve(state: unknown): View<R, E> {
    const view = this.find(state);
    if (!view) {
      throw new ViewNotFoundError(state);
    }
    return view;
  }

  get size(): number {
    return this.views.size;
  }
}
