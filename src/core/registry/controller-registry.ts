import { ControllerNotFoundError } from '../errors.js';
import { ancestry, isAbsent, prototypeOf, searchInHierarchy, typeName } from '../hierarchy.js';
import type { Controller, ControllerFn, EventType, FlowEvent, StateType } from '../types.js';

export type StateSelector<S> =
  | { readonly kind: 'any' }
  | { readonly kind: 'type'; readonly type: StateType<S> }
  | { readonly kind: 'value'; readonly value: S };

/** Matches every state of a session that already has one. */
export function anyState(): StateSelector<unknown> {
  return { kind: 'any' };
}

/** Matches states that are instances of `type` or of one of its subclasses. */
export function stateType<S>(type: StateType<S>): StateSelector<S> {
  return { kind: 'type', type };
}

/** Matches a state equal to `value` (primitives by value, objects by identity). */
export function stateValue<S>(value: S): StateSelector<S> {
  return { kind: 'value', value };
}

/**
 * Event key that every event falls back to: bindings under it are tried after
 * those of all the event's own types.
 */
export const anyEvent = Symbol('anyEvent');

export type EventKey<E extends FlowEvent> = EventType<E> | typeof anyEvent;

interface BindingGroup<E extends FlowEvent> {
  values: Map<unknown, Controller<E>>;
  types: Map<object, Controller<E>>;
  any?: Controller<E>;
}

/**
 * ControllerRegistry maps (event type, state selector) pairs to controllers.
 *
 * Lookup walks the event's type ancestry from the most specific type upwards. For
 * each event type it tries, in order: an exact state value, the state's type
 * ancestry, and finally an any-state binding. A precise state match on a broad
 * event type therefore wins over an any-state match on a narrower event type.
 */
export class ControllerRegistry<E extends FlowEvent> {
  private bindings: Map<object, BindingGroup<E>> = new Map();
  private count = 0;

  register<E1 extends E, S, To>(
    eventType: EventKey<E1>,
    selector: StateSelector<S>,
    controller: ControllerFn<E1, S, To>
  ): this {
    const group = this.groupFor(typeof eventType === 'symbol' ? Object.prototype : prototypeOf(eventType));
    const binding: Controller<E> = { transit: controller };

    switch (selector.kind) {
      case 'value':
        this.track(group.values.has(selector.value));
        group.values.set(selector.value, binding);
        break;
      case 'type': {
        const key = prototypeOf(selector.type);
        this.track(group.types.has(key));
        group.types.set(key, binding);
        break;
      }
      case 'any':
        this.track(group.any !== undefined);
        group.any = binding;
        break;
    }
    return this;
  }

  /**
   * Returns the most specific controller for the event and state, or undefined.
   */
  find(event: E, state: unknown): Controller<E> | undefined {
    for (const eventProto of ancestry(event)) {
      const group = this.bindings.get(eventProto);
      if (!group) continue;

      const exact = group.values.get(state);
      if (exact) return exact;

      if (!isAbsent(state)) {
        const typed = searchInHierarchy(state, (stateProto) => group.types.get(stateProto));
        if (typed) return typed;
      }

      if (group.any) return group.any;
    }
    return undefined;
  }

  resolve(event: E, state: unknown): Controller<E> {
    const controller = this.find(event, state);
    if (!controller) {
      throw new ControllerNotFoundError(typeName(event), state);
    }
    return controller;
  }

  get size(): number {
    return this.count;
  }

  private groupFor(eventProto: object): BindingGroup<E> {
    let group = this.bindings.get(eventProto);
    if (!group) {
      group = { values: new Map(), types: new Map() };
      this.bindings.set(eventProto, group);
    }
    return group;
  }

  private track(replaced: boolean): void {
    if (!replaced) {
      this.count++;
    }
  }
}
