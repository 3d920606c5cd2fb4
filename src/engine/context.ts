/**
 * Engine context
 *
 * One context per configuration pass. Reconfiguring builds a fresh one and
 * swaps it in; nothing in a context outlives the pass except the shared
 * SubscriptionHub, which keeps host subscriptions from being duplicated.
 */

import type {
  Component,
  EngineContext,
  Host,
  LazylineOptions,
  RenderErrorHandler,
} from '../shared/types.js';
import type { SubscriptionHub } from './updaters.js';

export interface ContextInit {
  host: Host;
  options: LazylineOptions;
  subscriptions: SubscriptionHub;
  onError?: RenderErrorHandler;
}

/** Default render failure policy: log and carry on. */
export function logRenderError(error: unknown, component: Component): void {
  const message = error instanceof Error ? error.message : String(error);
  console.warn(`[lazyline] component ${component.id} failed to render: ${message}`);
}

export function createContext(init: ContextInit): EngineContext {
  return {
    host: init.host,
    options: init.options,
    subscriptions: init.subscriptions,
    onError: init.onError ?? logRenderError,
    components: new Map(),
    sections: { left: [], center: [], right: [] },
    cache: new Map(),
    updaters: new Map(),
    hovered: undefined,
  };
}

/** Ids restart at 1 for every context and are never reused within one. */
export function nextId(ctx: EngineContext): number {
  return ctx.components.size + 1;
}

export function getComponent(ctx: EngineContext, id: number): Component | undefined {
  return ctx.components.get(id);
}
