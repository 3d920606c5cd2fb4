/**
 * Lazyline engine facade
 *
 * What a host binding talks to. It owns the pieces that outlive a single
 * configuration pass (host, options, host subscriptions, key listener) and
 * swaps in a fresh EngineContext on every setup().
 *
 * Usage:
 *   const line = new Lazyline(host);
 *   line.setup({
 *     left: [{ provider: () => mode(), update: ['ModeChanged'] }],
 *     right: [{ provider: clock, lazy: true, default: '--:--', update: ['User:Tick'] }],
 *   });
 *   // host calls line.compose() on redraw, line.click(id) from click regions
 */

import type {
  ClickInfo,
  Component,
  EngineContext,
  Host,
  LayoutConfig,
  LazylineOptions,
  OptionOverrides,
  RenderErrorHandler,
} from './shared/types.js';
import { loadOptions, resolveOptions } from './config/loader.js';
import { createContext, getComponent } from './engine/context.js';
import { buildRegistry } from './engine/registry.js';
import { refresh } from './engine/render.js';
import { fireUpdater, SubscriptionHub } from './engine/updaters.js';
import { dispatchClick, mouseLeave } from './engine/hover.js';
import { compose } from './hud/layout.js';
import { resolveMousePosition } from './hud/hit-test.js';

export const GLOBAL_STATUSLINE_REQUIRED =
  '[lazyline] A global status line is required (set laststatus=3).';

export interface LazylineInit {
  options?: OptionOverrides | LazylineOptions;
  /** Called when a component throws while rendering. Defaults to console.warn. */
  onRenderError?: RenderErrorHandler;
}

export class Lazyline {
  readonly options: LazylineOptions;
  private readonly subscriptions: SubscriptionHub;
  private readonly onRenderError?: RenderErrorHandler;
  private context: EngineContext | undefined;
  private keyListenerInstalled = false;

  constructor(
    private readonly host: Host,
    init: LazylineInit = {}
  ) {
    this.options = resolveOptions(init.options);
    this.onRenderError = init.onRenderError;
    this.subscriptions = new SubscriptionHub(host, (key) => this.fire(key));
  }

  /** Construct with options from the config files and LAZYLINE_* env vars. */
  static fromConfigFiles(
    host: Host,
    workingDirectory?: string,
    onRenderError?: RenderErrorHandler
  ): Lazyline {
    return new Lazyline(host, {
      options: loadOptions(workingDirectory),
      onRenderError,
    });
  }

  /**
   * Build the status line from a layout. Returns false (after one error
   * notification) when the host can't show a global status line.
   *
   * A malformed layout throws LazylineConfigError and the previous
   * configuration stays live.
   */
  setup(layout: LayoutConfig): boolean {
    if (!this.host.supportsGlobalStatusline()) {
      this.host.notify(GLOBAL_STATUSLINE_REQUIRED, 'error');
      return false;
    }

    const next = createContext({
      host: this.host,
      options: this.options,
      subscriptions: this.subscriptions,
      onError: this.onRenderError,
    });
    buildRegistry(next, layout);

    // Components of the old pass are gone; drop its hover without callbacks
    if (this.context) this.context.hovered = undefined;
    this.context = next;

    if (this.options.debug) {
      console.debug(
        `[lazyline] setup: ${next.components.size} component(s), ${next.updaters.size} updater key(s)`
      );
    }

    if (!this.keyListenerInstalled) {
      this.keyListenerInstalled = true;
      this.host.onKey((key) => {
        if (key === this.options.mouseMoveKey) this.mouseMove();
      });
    }

    this.host.installStatusline({
      compose: () => this.compose(),
      click: (id, click) => this.click(id, click),
    });

    return true;
  }

  /** Current status line markup. '' before setup. */
  compose(): string {
    if (!this.context) return '';
    return compose(this.context, this.host.getViewportSize().columns);
  }

  /** Dispatch a click from a click region. Unknown ids are ignored. */
  click(id: number, click?: ClickInfo): void {
    if (!this.context) return;
    dispatchClick(this.context, id, click);
  }

  /** Re-render every component subscribed to an event. */
  fire(event: string): number {
    if (!this.context) return 0;
    return fireUpdater(this.context, event);
  }

  /** Manual re-render of one component, or of all of them. */
  refresh(id?: number): void {
    if (!this.context) return;
    refresh(this.context, id);
  }

  /** Sample the mouse and update hover state. */
  mouseMove(): void {
    const ctx = this.context;
    if (!ctx || !this.options.features.hover) return;
    try {
      resolveMousePosition(ctx, this.host.getMousePosition(), this.host.getViewportSize());
    } catch (err: unknown) {
      this.reportHoverError(ctx, err);
    }
  }

  /** Leave whichever component is hovered. */
  mouseLeave(): void {
    if (this.context) mouseLeave(this.context);
  }

  getComponent(id: number): Component | undefined {
    return this.context ? getComponent(this.context, id) : undefined;
  }

  hovered(): Component | undefined {
    return this.context?.hovered;
  }

  /** Read-only view of the live context, mostly for inspection and tests. */
  getContext(): EngineContext | undefined {
    return this.context;
  }

  private reportHoverError(ctx: EngineContext, err: unknown): void {
    const component = ctx.hovered;
    if (component) {
      ctx.onError(err, component);
      return;
    }
    const message = err instanceof Error ? err.message : String(err);
    console.warn(`[lazyline] mouse move failed: ${message}`);
  }
}
