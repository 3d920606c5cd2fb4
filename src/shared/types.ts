/**
 * Shared types for lazyline
 *
 * These types define the contract between the engine and its two neighbours:
 * the user's layout configuration (what to draw) and the host editor (where
 * to draw it, and which events drive redraws).
 *
 * Pattern: configuration types accept loose "literal or function" values;
 * runtime types hold the normalised form. Every engine operation reads from
 * an EngineContext, never from module state.
 */

import type { SubscriptionHub } from '../engine/updaters.js';

// ---------------------------------------------------------------------------
// Values
// ---------------------------------------------------------------------------

/** What configuration accepts: a literal, or a function of the component. */
export type ValueInput<T> = T | ((component: Component) => T);

/** Normalised form of a ValueInput, resolved by evaluate(). */
export type Value<T> =
  | { kind: 'literal'; value: T }
  | { kind: 'computed'; compute: (component: Component) => T };

// ---------------------------------------------------------------------------
// Styles
// ---------------------------------------------------------------------------

/** A full attribute set for a named style. */
export interface StyleAttributes {
  fg?: string;
  bg?: string;
  /** Special colour (underline/undercurl) */
  sp?: string;
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
  undercurl?: boolean;
}

/** Either an alias of an existing style or a full attribute set. */
export type StyleDefinition = { link: string } | StyleAttributes;

/** Opaque highlight descriptor: a style name to link to, or attributes. */
export type HighlightDescriptor = string | StyleAttributes;

// ---------------------------------------------------------------------------
// Layout configuration
// ---------------------------------------------------------------------------

export type Section = 'left' | 'center' | 'right';

export const SECTIONS: readonly Section[] = ['left', 'center', 'right'];

/** Mouse click details forwarded by the host's click regions. */
export interface ClickInfo {
  /** 1 for a single click, 2 for a double click, … */
  clicks: number;
  /** "l", "m" or "r" */
  button: string;
  /** Modifier keys held during the click ("s", "c", "a", "m") */
  modifiers: string;
}

export type ClickHandler = (component: Component, click: ClickInfo) => void;
export type HoverHandler = (component: Component) => void;

/**
 * Attributes a Group can hand down to its children.
 * A child's own value always wins over the group's.
 */
export interface InheritableConfig {
  lazy?: boolean;
  /** Placeholder shown while a lazy component has not rendered yet */
  default?: string;
  /** Host events that trigger a re-render, e.g. "BufEnter" or "User:GitChanged" */
  update?: string[];
  onClick?: ClickHandler;
  onMouseEnter?: HoverHandler;
  onMouseLeave?: HoverHandler;
  fg?: ValueInput<string | undefined>;
  bg?: ValueInput<string | undefined>;
  sp?: ValueInput<string | undefined>;
  bold?: ValueInput<boolean | undefined>;
  italic?: ValueInput<boolean | undefined>;
  underline?: ValueInput<boolean | undefined>;
  undercurl?: ValueInput<boolean | undefined>;
  /** Overrides the individual style attributes when set */
  hl?: ValueInput<HighlightDescriptor>;
}

export interface ComponentConfig extends InheritableConfig {
  /** The text to show. Empty or missing output skips the frame. */
  provider: ValueInput<string | null | undefined>;
}

export interface GroupConfig extends InheritableConfig {
  components: LayoutEntry[];
}

export type LayoutEntry = ComponentConfig | GroupConfig;

/** The three ordered sections of the status line. */
export interface LayoutConfig {
  left?: LayoutEntry[];
  center?: LayoutEntry[];
  right?: LayoutEntry[];
}

// ---------------------------------------------------------------------------
// Runtime component
// ---------------------------------------------------------------------------

export interface ComponentStyle {
  fg?: Value<string | undefined>;
  bg?: Value<string | undefined>;
  sp?: Value<string | undefined>;
  bold?: Value<boolean | undefined>;
  italic?: Value<boolean | undefined>;
  underline?: Value<boolean | undefined>;
  undercurl?: Value<boolean | undefined>;
  hl?: Value<HighlightDescriptor>;
}

/**
 * A fully resolved component. Configuration fields are fixed at creation;
 * width and hovered change while the engine runs.
 */
export interface Component {
  readonly id: number;
  readonly section: Section;
  readonly lazy: boolean;
  readonly default?: string;
  readonly update: readonly string[];
  readonly provider: Value<string | null | undefined>;
  readonly style: ComponentStyle;
  readonly onClick?: ClickHandler;
  readonly onMouseEnter?: HoverHandler;
  readonly onMouseLeave?: HoverHandler;
  /** Display width of the last rendered text, in terminal cells */
  width: number;
  hovered: boolean;
}

// ---------------------------------------------------------------------------
// Host boundary
// ---------------------------------------------------------------------------

/** 1-based screen cell, as reported by the host's mouse query. */
export interface ScreenPosition {
  column: number;
  row: number;
}

export interface ViewportSize {
  columns: number;
  rows: number;
}

export type NotifyLevel = 'info' | 'warn' | 'error';

/** Entry points the host calls back into. */
export interface StatuslineEntry {
  compose: () => string;
  click: (id: number, click?: ClickInfo) => void;
}

/**
 * Everything the engine needs from the editor. A real binding adapts the
 * editor's autocommands, mouse query and highlight registry to this shape.
 */
export interface Host {
  /** Subscribe to an editor event, optionally filtered by pattern. */
  subscribe(event: string, pattern: string | undefined, callback: () => void): void;
  /** Raw key stream; the engine only reacts to the mouse-move key. */
  onKey(listener: (key: string) => void): void;
  getMousePosition(): ScreenPosition;
  getViewportSize(): ViewportSize;
  /** (Re)define a named style. Redefining an existing name overwrites it. */
  defineStyle(name: string, style: StyleDefinition): void;
  notify(message: string, level: NotifyLevel): void;
  /** Whether the editor draws one status line across all windows. */
  supportsGlobalStatusline(): boolean;
  installStatusline(entry: StatuslineEntry): void;
}

// ---------------------------------------------------------------------------
// Engine options
// ---------------------------------------------------------------------------

/**
 * Engine options.
 *
 * Built by merging: defaults → user config → project config → env vars.
 * Defaults live in config/loader.ts.
 */
export interface LazylineOptions {
  /** Style names are `${stylePrefix}${id}` */
  stylePrefix: string;
  /** Style switched back to after each component */
  resetStyle: string;
  /** Function name the host's click regions call */
  clickHandler: string;
  /** Key the host emits on mouse movement */
  mouseMoveKey: string;
  /** Rows below the status line (the command line) */
  commandLineHeight: number;
  features: {
    /** Track hover from mouse movement (default: true) */
    hover: boolean;
    /** Wrap clickable components in click regions (default: true) */
    clicks: boolean;
  };
  /** Log setup and updater activity through console.debug */
  debug: boolean;
}

/** Recursively optional, for option overrides. */
export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export type OptionOverrides = DeepPartial<LazylineOptions>;

// ---------------------------------------------------------------------------
// Engine context
// ---------------------------------------------------------------------------

/** Receives failures of providers, style functions and hover callbacks. */
export type RenderErrorHandler = (error: unknown, component: Component) => void;

/**
 * All mutable engine state for one configuration pass. A new pass builds a
 * new context; only the SubscriptionHub carries over.
 */
export interface EngineContext {
  readonly host: Host;
  readonly options: LazylineOptions;
  readonly subscriptions: SubscriptionHub;
  readonly onError: RenderErrorHandler;
  readonly components: Map<number, Component>;
  readonly sections: Record<Section, number[]>;
  /** Last rendered (styled, click-wrapped) string per component id */
  readonly cache: Map<number, string>;
  /** Normalised event key → subscribed component ids */
  readonly updaters: Map<string, Set<number>>;
  hovered: Component | undefined;
}
