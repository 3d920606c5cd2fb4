/**
 * HUD
 *
 * Everything about the drawn line: markup, composition, and mapping mouse
 * positions back onto components.
 */

export {
  escapeText,
  styleSpan,
  clickSpan,
  spaces,
  displayWidth,
  tokenize,
  stripMarkup,
  markupWidth,
  truncateMarkup,
} from './markup.js';
export type { MarkupToken } from './markup.js';
export {
  sectionWidth,
  computeLayout,
  layoutFor,
  collectSection,
  compose,
} from './layout.js';
export type { LineLayout } from './layout.js';
export { hitTest, statuslineRow, resolveMousePosition } from './hit-test.js';
