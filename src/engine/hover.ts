/**
 * Hover Tracker & click dispatch
 *
 * Two states: idle, or hovering exactly one component.
 *
 *   mouseEnter(c)  idle        → hovering(c)   onMouseEnter, re-render
 *                  hovering(c) → hovering(c)   nothing (repeat mouse samples)
 *                  hovering(o) → hovering(c)   full leave of o first
 *   mouseLeave()   hovering(c) → idle          onMouseLeave, re-render
 *                  idle        → idle          nothing
 *
 * Hover callbacks and re-renders report failures through ctx.onError, so a
 * broken component cannot leave the tracker half-way through a transition.
 */

import type {
  ClickInfo,
  Component,
  EngineContext,
  HoverHandler,
} from '../shared/types.js';
import { renderSafely } from './render.js';

function runHandler(
  ctx: EngineContext,
  component: Component,
  handler: HoverHandler | undefined
): void {
  if (!handler) return;
  try {
    handler(component);
  } catch (err: unknown) {
    ctx.onError(err, component);
  }
}

export function mouseLeave(ctx: EngineContext): void {
  const component = ctx.hovered;
  if (!component) return;

  runHandler(ctx, component, component.onMouseLeave);
  component.hovered = false;
  renderSafely(ctx, component);
  ctx.hovered = undefined;
}

export function mouseEnter(ctx: EngineContext, component: Component): void {
  if (ctx.hovered) {
    if (ctx.hovered.id === component.id) return;
    mouseLeave(ctx);
  }

  ctx.hovered = component;
  component.hovered = true;
  runHandler(ctx, component, component.onMouseEnter);
  renderSafely(ctx, component);
}

// ---------------------------------------------------------------------------
// Clicks
// ---------------------------------------------------------------------------

const DEFAULT_CLICK: ClickInfo = { clicks: 1, button: 'l', modifiers: '' };

/**
 * Route a click from the host's click region to its component.
 * Unknown ids and components without onClick are ignored.
 */
export function dispatchClick(
  ctx: EngineContext,
  id: number,
  click: ClickInfo = DEFAULT_CLICK
): boolean {
  const component = ctx.components.get(id);
  if (!component?.onClick) return false;
  component.onClick(component, click);
  return true;
}
