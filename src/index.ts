/**
 * lazyline
 *
 * A lazy, clickable, hover-aware three-section status line engine for a
 * host editor. Components render on the events they subscribe to; the host
 * asks for the composed line on redraw.
 */

// Engine facade
export { Lazyline, GLOBAL_STATUSLINE_REQUIRED } from './lazyline.js';
export type { LazylineInit } from './lazyline.js';

// Config
export {
  loadOptions,
  resolveOptions,
  loadJsoncFile,
  loadEnvConfig,
  parseOptions,
  getConfigPaths,
  deepMerge,
  DEFAULT_OPTIONS,
  validateLayout,
} from './config/index.js';

// Engine
export {
  literal,
  computed,
  evaluate,
  createContext,
  createComponent,
  createGroup,
  buildRegistry,
  inherit,
  eventKey,
  registerUpdater,
  fireUpdater,
  SubscriptionHub,
  render,
  highlight,
  resolveStyle,
  refresh,
  mouseEnter,
  mouseLeave,
  dispatchClick,
} from './engine/index.js';
export type { EventKey } from './engine/index.js';

// HUD
export {
  compose,
  computeLayout,
  sectionWidth,
  hitTest,
  resolveMousePosition,
  stripMarkup,
  truncateMarkup,
  displayWidth,
} from './hud/index.js';
export type { LineLayout } from './hud/index.js';

// Errors
export { LazylineError, LazylineConfigError } from './shared/errors.js';

// Types
export type {
  Component,
  ComponentConfig,
  GroupConfig,
  LayoutConfig,
  LayoutEntry,
  InheritableConfig,
  Section,
  Value,
  ValueInput,
  StyleAttributes,
  StyleDefinition,
  HighlightDescriptor,
  ClickInfo,
  Host,
  ScreenPosition,
  ViewportSize,
  NotifyLevel,
  StatuslineEntry,
  LazylineOptions,
  OptionOverrides,
  EngineContext,
  RenderErrorHandler,
} from './shared/types.js';
