/**
 * Layout Composer
 *
 * Builds the final status line from the three sections:
 *
 *   [left……………|pad]  [center]  [pad……………][right]
 *   0            centerStart        rightStart     columns
 *
 * The center section is centred on the full line width regardless of how
 * wide left and right are. Left is cut at centerStart when it would run
 * into the center; the pad before right never goes negative.
 */

import type { EngineContext, Section } from '../shared/types.js';
import { renderSafely } from '../engine/render.js';
import { displayWidth, escapeText, spaces, truncateMarkup } from './markup.js';

export interface LineLayout {
  columns: number;
  leftWidth: number;
  centerWidth: number;
  rightWidth: number;
  /** First column of the center section (0-based) */
  centerStart: number;
  /** First column of the right section (0-based) */
  rightStart: number;
}

/** Sum of the current widths of a section's components. */
export function sectionWidth(ctx: EngineContext, section: Section): number {
  let width = 0;
  for (const id of ctx.sections[section]) {
    width += ctx.components.get(id)?.width ?? 0;
  }
  return width;
}

/**
 * Column arithmetic shared by compose() and the hit tester, so what is
 * drawn and what is clickable always line up. An uneven split leaves the
 * extra column on the left of the center section.
 */
export function computeLayout(
  columns: number,
  leftWidth: number,
  centerWidth: number,
  rightWidth: number
): LineLayout {
  return {
    columns,
    leftWidth,
    centerWidth,
    rightWidth,
    centerStart: Math.max(0, Math.ceil(columns / 2) - Math.ceil(centerWidth / 2)),
    rightStart: Math.max(0, columns - rightWidth),
  };
}

export function layoutFor(ctx: EngineContext, columns: number): LineLayout {
  return computeLayout(
    columns,
    sectionWidth(ctx, 'left'),
    sectionWidth(ctx, 'center'),
    sectionWidth(ctx, 'right')
  );
}

/**
 * Concatenate a section: cached markup first, then an eager render for
 * non-lazy components, then the lazy placeholder. A placeholder also sets
 * the component's width so centring accounts for it before the first real
 * render.
 */
export function collectSection(ctx: EngineContext, section: Section): string {
  let text = '';
  for (const id of ctx.sections[section]) {
    const component = ctx.components.get(id);
    if (!component) continue;

    const cached = ctx.cache.get(id);
    if (cached !== undefined) {
      text += cached;
    } else if (!component.lazy) {
      text += renderSafely(ctx, component);
    } else if (component.default !== undefined) {
      text += escapeText(component.default);
      component.width = displayWidth(component.default);
    }
  }
  return text;
}

/** Compose the full status line for a line `columns` cells wide. */
export function compose(ctx: EngineContext, columns: number): string {
  const leftText = collectSection(ctx, 'left');
  const centerText = collectSection(ctx, 'center');
  const rightText = collectSection(ctx, 'right');

  const layout = layoutFor(ctx, columns);

  let line =
    layout.leftWidth > layout.centerStart
      ? truncateMarkup(leftText, layout.centerStart)
      : leftText + spaces(layout.centerStart - layout.leftWidth);

  line += centerText;
  line += spaces(layout.rightStart - (layout.centerStart + layout.centerWidth));
  line += rightText;

  return line;
}
