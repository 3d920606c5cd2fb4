/**
 * Registry & Construction
 *
 * Turns layout entries into registered components:
 *   - components get the next id, join their section, subscribe to updates
 *   - groups resolve inherited attributes into each child, then vanish
 *
 * Everything is validated before the first registration, so a bad entry
 * never leaves a half-built component behind.
 */

import {
  SECTIONS,
  type Component,
  type ComponentConfig,
  type EngineContext,
  type GroupConfig,
  type InheritableConfig,
  type LayoutConfig,
  type LayoutEntry,
  type Section,
} from '../shared/types.js';
import {
  isGroupConfig,
  validateComponentConfig,
  validateEntry,
  validateLayout,
} from '../config/validate.js';
import { nextId } from './context.js';
import { registerUpdater } from './updaters.js';
import { toValue } from './value.js';

// ---------------------------------------------------------------------------
// Inheritance
// ---------------------------------------------------------------------------

/**
 * Resolve a child's attributes against its group: the child's own value
 * wins, otherwise the group's applies. `default` only flows down to a child
 * that ends up lazy.
 */
export function inherit(child: LayoutEntry, group: InheritableConfig): LayoutEntry {
  const lazy = child.lazy ?? group.lazy;
  return {
    ...child,
    lazy,
    default: lazy ? child.default ?? group.default : child.default,
    update: child.update ?? group.update,
    onClick: child.onClick ?? group.onClick,
    onMouseEnter: child.onMouseEnter ?? group.onMouseEnter,
    onMouseLeave: child.onMouseLeave ?? group.onMouseLeave,
    fg: child.fg ?? group.fg,
    bg: child.bg ?? group.bg,
    sp: child.sp ?? group.sp,
    bold: child.bold ?? group.bold,
    italic: child.italic ?? group.italic,
    underline: child.underline ?? group.underline,
    undercurl: child.undercurl ?? group.undercurl,
    hl: child.hl ?? group.hl,
  };
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

function register(ctx: EngineContext, config: ComponentConfig, section: Section): Component {
  const component: Component = {
    id: nextId(ctx),
    section,
    lazy: config.lazy ?? false,
    default: config.default,
    update: [...(config.update ?? [])],
    provider: toValue(config.provider) ?? { kind: 'literal', value: undefined },
    style: {
      fg: toValue(config.fg),
      bg: toValue(config.bg),
      sp: toValue(config.sp),
      bold: toValue(config.bold),
      italic: toValue(config.italic),
      underline: toValue(config.underline),
      undercurl: toValue(config.undercurl),
      hl: toValue(config.hl),
    },
    onClick: config.onClick,
    onMouseEnter: config.onMouseEnter,
    onMouseLeave: config.onMouseLeave,
    width: 0,
    hovered: false,
  };

  ctx.components.set(component.id, component);
  ctx.sections[section].push(component.id);
  for (const event of component.update) {
    registerUpdater(ctx, event, component.id);
  }
  return component;
}

/**
 * Create and register one component. Throws LazylineConfigError for a
 * malformed entry without registering anything.
 */
export function createComponent(
  ctx: EngineContext,
  config: ComponentConfig,
  section: Section,
  path = `${section}[${ctx.sections[section].length}]`
): Component {
  validateComponentConfig(config, path);
  return register(ctx, config, section);
}

function expand(
  ctx: EngineContext,
  group: GroupConfig,
  section: Section,
  out: Component[]
): void {
  for (const child of group.components) {
    const resolved = inherit(child, group);
    if (isGroupConfig(resolved)) {
      expand(ctx, resolved, section, out);
    } else {
      out.push(register(ctx, resolved, section));
    }
  }
}

/**
 * Expand a group into components, in declared order. The group itself is
 * not kept.
 */
export function createGroup(
  ctx: EngineContext,
  config: GroupConfig,
  section: Section,
  path = `${section}[${ctx.sections[section].length}]`
): Component[] {
  validateEntry(config, path);
  const components: Component[] = [];
  expand(ctx, config, section, components);
  return components;
}

/**
 * Register a full layout into a (fresh) context: left, then center, then
 * right, each in configuration order.
 */
export function buildRegistry(ctx: EngineContext, layout: LayoutConfig): void {
  validateLayout(layout);
  for (const section of SECTIONS) {
    for (const entry of layout[section] ?? []) {
      if (isGroupConfig(entry)) {
        expand(ctx, entry, section, []);
      } else {
        register(ctx, entry, section);
      }
    }
  }
}
