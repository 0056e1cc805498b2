import type { Logger } from 'pino';
import { z } from 'zod';
import { FlowConfigError } from '../errors.js';
import { ControllerRegistry, ViewRegistry } from '../registry/index.js';
import type {
  EventSource,
  Executor,
  FailureViewFn,
  FlowEvent,
  InitialControllerFn,
  RendererFactory,
  SessionStorage,
} from '../types.js';

/**
 * Everything a Flow is assembled from. Collaborators are optional here so that a
 * configuration can be put together piecemeal; createFlow rejects it unless the
 * required ones are present.
 */
export interface FlowConfig<R, E extends FlowEvent> {
  eventSource?: EventSource<E>;
  controllers?: ControllerRegistry<E>;
  views?: ViewRegistry<R, E>;
  initial?: InitialControllerFn<E, unknown>;
  failView?: FailureViewFn<R, E>;
  rendererFactory?: RendererFactory<R, E>;
  storage?: SessionStorage;
  executor?: Executor;
  allowUnlockedRendering?: boolean;
  logger?: Logger;
}

export type FlowOptions<R, E extends FlowEvent> = FlowConfig<R, E> & {
  eventSource: EventSource<E>;
  initial: InitialControllerFn<E, unknown>;
  failView: FailureViewFn<R, E>;
  rendererFactory: RendererFactory<R, E>;
};

const flowConfigSchema = z.object({
  eventSource: z.object({ onEvent: z.function() }),
  controllers: z.instanceof(ControllerRegistry).optional(),
  views: z.instanceof(ViewRegistry).optional(),
  initial: z.function(),
  failView: z.function(),
  rendererFactory: z.function(),
  storage: z
    .object({
      acquireLock: z.function(),
      releaseLock: z.function(),
      loadStateAndVars: z.function(),
      store: z.function(),
    })
    .optional(),
  executor: z.object({ execute: z.function() }).optional(),
  allowUnlockedRendering: z.boolean().optional(),
});

export function assertFlowOptions<R, E extends FlowEvent>(
  config: FlowConfig<R, E>
): asserts config is FlowOptions<R, E> {
  const result = flowConfigSchema.safeParse(config);
  if (!result.success) {
    throw new FlowConfigError(
      result.error.errors.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }
}
