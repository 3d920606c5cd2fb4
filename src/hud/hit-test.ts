/**
 * Hit Tester
 *
 * Maps a mouse position on the status line to the component under it, and
 * drives the hover tracker from the result.
 */

import type {
  Component,
  EngineContext,
  ScreenPosition,
  Section,
  ViewportSize,
} from '../shared/types.js';
import { mouseEnter, mouseLeave } from '../engine/hover.js';
import { layoutFor } from './layout.js';

function walk(
  ctx: EngineContext,
  section: Section,
  start: number,
  column: number
): Component | undefined {
  let running = start;
  for (const id of ctx.sections[section]) {
    const component = ctx.components.get(id);
    if (!component) continue;
    running += component.width;
    if (column < running) return component;
  }
  return undefined;
}

/**
 * Component covering a 0-based column, or undefined for gaps and the space
 * past the last component.
 */
export function hitTest(
  ctx: EngineContext,
  column: number,
  columns: number
): Component | undefined {
  if (column < 0) return undefined;
  const layout = layoutFor(ctx, columns);

  // compose() cuts the left section at centerStart
  if (column < layout.centerStart) return walk(ctx, 'left', 0, column);

  const center = walk(ctx, 'center', layout.centerStart, column);
  if (center) return center;
  if (column < layout.rightStart) return undefined;

  return walk(ctx, 'right', layout.rightStart, column);
}

/** Screen row (1-based) the status line is drawn on. */
export function statuslineRow(ctx: EngineContext, viewport: ViewportSize): number {
  return viewport.rows - ctx.options.commandLineHeight;
}

/**
 * Resolve a host mouse position (1-based cell) and update hover state.
 * Anything off the status line row leaves the hovered component.
 */
export function resolveMousePosition(
  ctx: EngineContext,
  position: ScreenPosition,
  viewport: ViewportSize
): Component | undefined {
  if (position.row !== statuslineRow(ctx, viewport)) {
    mouseLeave(ctx);
    return undefined;
  }

  const component = hitTest(ctx, position.column - 1, viewport.columns);
  if (component) {
    mouseEnter(ctx, component);
  } else {
    mouseLeave(ctx);
  }
  return component;
}
