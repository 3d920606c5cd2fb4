/**
 * Render Pipeline
 *
 * provider → width → style → markup → cache.
 *
 * Empty provider output skips the frame: nothing is cached and the previous
 * cached string keeps showing.
 */

import type {
  Component,
  EngineContext,
  StyleAttributes,
  StyleDefinition,
} from '../shared/types.js';
import { clickSpan, displayWidth, escapeText, styleSpan } from '../hud/markup.js';
import { evaluate } from './value.js';

// ---------------------------------------------------------------------------
// Styles
// ---------------------------------------------------------------------------

/** Style name for a component. Stable across renders, so redefinitions overwrite. */
export function styleName(ctx: EngineContext, component: Component): string {
  return `${ctx.options.stylePrefix}${component.id}`;
}

/**
 * Evaluate a component's style. `hl` wins when set: a string links to an
 * existing style, a table is used as is. Otherwise the individual
 * attributes are evaluated and the ones that resolve are kept.
 */
export function resolveStyle(component: Component): StyleDefinition {
  const { style } = component;

  const hl = evaluate(style.hl, component);
  if (typeof hl === 'string') return { link: hl };
  if (hl) return { ...hl };

  const attrs: StyleAttributes = {};
  const fg = evaluate(style.fg, component);
  if (fg !== undefined) attrs.fg = fg;
  const bg = evaluate(style.bg, component);
  if (bg !== undefined) attrs.bg = bg;
  const sp = evaluate(style.sp, component);
  if (sp !== undefined) attrs.sp = sp;
  const bold = evaluate(style.bold, component);
  if (bold !== undefined) attrs.bold = bold;
  const italic = evaluate(style.italic, component);
  if (italic !== undefined) attrs.italic = italic;
  const underline = evaluate(style.underline, component);
  if (underline !== undefined) attrs.underline = underline;
  const undercurl = evaluate(style.undercurl, component);
  if (undercurl !== undefined) attrs.undercurl = undercurl;
  return attrs;
}

/** Register the component's current style with the host and return its name. */
export function highlight(ctx: EngineContext, component: Component): string {
  const name = styleName(ctx, component);
  ctx.host.defineStyle(name, resolveStyle(component));
  return name;
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

/**
 * Render a component into the cache and return the markup.
 * Returns '' (and leaves the cache alone) when the provider has nothing.
 * Provider and style functions may throw; callers decide how to isolate that.
 */
export function render(ctx: EngineContext, component: Component): string {
  const text = evaluate(component.provider, component);
  if (!text) return '';

  component.width = displayWidth(text);

  let markup = styleSpan(highlight(ctx, component), escapeText(text), ctx.options.resetStyle);
  if (component.onClick && ctx.options.features.clicks) {
    markup = clickSpan(component.id, ctx.options.clickHandler, markup);
  }

  ctx.cache.set(component.id, markup);
  return markup;
}

/** render() with failures reported through ctx.onError. */
export function renderSafely(ctx: EngineContext, component: Component): string {
  try {
    return render(ctx, component);
  } catch (err: unknown) {
    ctx.onError(err, component);
    return '';
  }
}

/**
 * Manual re-render of one component, or of every component when no id is
 * given. Unknown ids are ignored.
 */
export function refresh(ctx: EngineContext, id?: number): void {
  if (id !== undefined) {
    const component = ctx.components.get(id);
    if (component) renderSafely(ctx, component);
    return;
  }
  for (const component of ctx.components.values()) {
    renderSafely(ctx, component);
  }
}
