export { literal, computed, toValue, evaluate } from './value.js';
export { createContext, nextId, getComponent, logRenderError } from './context.js';
export type { ContextInit } from './context.js';
export { inherit, createComponent, createGroup, buildRegistry } from './registry.js';
export {
  eventKey,
  registerUpdater,
  fireUpdater,
  SubscriptionHub,
} from './updaters.js';
export type { EventKey } from './updaters.js';
export {
  styleName,
  resolveStyle,
  highlight,
  render,
  renderSafely,
  refresh,
} from './render.js';
export { mouseEnter, mouseLeave, dispatchClick } from './hover.js';
