/**
 * Update Dispatcher
 *
 * Links host events to the components that re-render when they fire.
 *
 * Event names are normalised first:
 *   "BufEnter"         → event "BufEnter", no pattern, key "BufEnter"
 *   "User:GitChanged"  → event "User", pattern "GitChanged", key "User:GitChanged"
 *
 * Many user events share the host's single "User" event and are told apart
 * by pattern, so the host filters while the engine keeps one subscriber set
 * per key.
 */

import type { EngineContext, Host } from '../shared/types.js';
import { render } from './render.js';

const USER_PREFIX = 'User:';

export interface EventKey {
  /** Normalised key the subscriber sets are stored under */
  key: string;
  /** Event name the host subscribes to */
  event: string;
  /** Host-side filter, only for user events */
  pattern?: string;
}

export function eventKey(name: string): EventKey {
  if (name.startsWith(USER_PREFIX) && name.length > USER_PREFIX.length) {
    return { key: name, event: 'User', pattern: name.slice(USER_PREFIX.length) };
  }
  if (name === USER_PREFIX) {
    return { key: 'User', event: 'User' };
  }
  return { key: name, event: name };
}

// ---------------------------------------------------------------------------
// Host subscriptions
// ---------------------------------------------------------------------------

/**
 * Host-level subscriptions, shared by every configuration pass.
 *
 * The host is subscribed at most once per key. The callback dispatches by
 * key into whatever context is current when it fires, so a new pass picks up
 * new subscriber sets without subscribing again.
 */
export class SubscriptionHub {
  private readonly subscribed = new Set<string>();

  constructor(
    private readonly host: Host,
    private readonly dispatch: (key: string) => void
  ) {}

  /** Subscribe the host to this key unless already done. Returns true on a new subscription. */
  ensure(target: EventKey): boolean {
    if (this.subscribed.has(target.key)) return false;
    this.subscribed.add(target.key);
    this.host.subscribe(target.event, target.pattern, () => this.dispatch(target.key));
    return true;
  }

  has(key: string): boolean {
    return this.subscribed.has(key);
  }

  get size(): number {
    return this.subscribed.size;
  }
}

// ---------------------------------------------------------------------------
// Registration & firing
// ---------------------------------------------------------------------------

/** Subscribe a component id to an event. Idempotent per (event, id). */
export function registerUpdater(ctx: EngineContext, event: string, id: number): void {
  const target = eventKey(event);
  let ids = ctx.updaters.get(target.key);
  if (!ids) {
    ids = new Set();
    ctx.updaters.set(target.key, ids);
  }
  ids.add(id);
  ctx.subscriptions.ensure(target);
}

/**
 * Re-render every component subscribed to an event. A failing component is
 * reported through ctx.onError and the rest still render.
 *
 * Returns how many components rendered without throwing.
 */
export function fireUpdater(ctx: EngineContext, event: string): number {
  const { key } = eventKey(event);
  const ids = ctx.updaters.get(key);
  if (!ids) return 0;

  if (ctx.options.debug) {
    console.debug(`[lazyline] ${key} → ${ids.size} component(s)`);
  }

  let rendered = 0;
  for (const id of ids) {
    const component = ctx.components.get(id);
    if (!component) continue;
    try {
      render(ctx, component);
      rendered++;
    } catch (err: unknown) {
      ctx.onError(err, component);
    }
  }
  return rendered;
}
