import { describe, it, expect, beforeEach } from 'vitest';
import type { EngineContext } from '../shared/types.js';
import { buildRegistry } from '../engine/registry.js';
import { compose } from '../hud/layout.js';
import { hitTest, resolveMousePosition, statuslineRow } from '../hud/hit-test.js';
import { makeContext } from './helpers/fake-host.js';

const COLUMNS = 20;

/**
 * 20 columns:  ab cde . . . . XY . . . . . . r st
 *              0  2           9              17
 */
function buildLine(commandLineHeight = 0): EngineContext {
  const ctx = makeContext(undefined, { commandLineHeight });
  buildRegistry(ctx, {
    left: [{ provider: 'ab' }, { provider: 'cde' }],
    center: [{ provider: 'XY' }],
    right: [{ provider: 'r' }, { provider: 'st' }],
  });
  compose(ctx, COLUMNS);
  return ctx;
}

const idAt = (ctx: EngineContext, column: number): number | undefined =>
  hitTest(ctx, column, COLUMNS)?.id;

describe('hitTest', () => {
  let ctx: EngineContext;

  beforeEach(() => {
    ctx = buildLine();
  });

  it('should find left components from column 0', () => {
    expect(idAt(ctx, 0)).toBe(1);
    expect(idAt(ctx, 1)).toBe(1);
    expect(idAt(ctx, 2)).toBe(2);
    expect(idAt(ctx, 4)).toBe(2);
  });

  it('should find nothing in the gap before the center', () => {
    for (const column of [5, 6, 7, 8]) {
      expect(idAt(ctx, column)).toBeUndefined();
    }
  });

  it('should find the center component at its centred position', () => {
    expect(idAt(ctx, 9)).toBe(3);
    expect(idAt(ctx, 10)).toBe(3);
  });

  it('should find nothing in the gap before the right section', () => {
    for (const column of [11, 12, 16]) {
      expect(idAt(ctx, column)).toBeUndefined();
    }
  });

  it('should find right components flush with the edge', () => {
    expect(idAt(ctx, 17)).toBe(4);
    expect(idAt(ctx, 18)).toBe(5);
    expect(idAt(ctx, 19)).toBe(5);
  });

  it('should find nothing off either end', () => {
    expect(idAt(ctx, -1)).toBeUndefined();
    expect(idAt(ctx, 20)).toBeUndefined();
  });
});

describe('hitTest on an odd-width line', () => {
  it('should put an even-width center one column right of the middle', () => {
    const ctx = makeContext();
    buildRegistry(ctx, {
      left: [{ provider: 'a' }],
      center: [{ provider: 'XY' }],
      right: [{ provider: 'z' }],
    });
    compose(ctx, 11);

    expect(hitTest(ctx, 4, 11)).toBeUndefined();
    expect(hitTest(ctx, 5, 11)?.id).toBe(2);
    expect(hitTest(ctx, 6, 11)?.id).toBe(2);
    expect(hitTest(ctx, 7, 11)).toBeUndefined();
    expect(hitTest(ctx, 10, 11)?.id).toBe(3);
  });
});

describe('hitTest with a truncated left section', () => {
  it('should give the drawn center columns to the center component', () => {
    const ctx = makeContext();
    buildRegistry(ctx, {
      left: [{ provider: 'abcdefgh' }],
      center: [{ provider: 'XY' }],
    });
    compose(ctx, 10);

    expect(hitTest(ctx, 3, 10)?.id).toBe(1);
    expect(hitTest(ctx, 4, 10)?.id).toBe(2);
    expect(hitTest(ctx, 5, 10)?.id).toBe(2);
    expect(hitTest(ctx, 6, 10)).toBeUndefined();
  });
});

describe('statuslineRow', () => {
  it('should sit on the last row without a command line', () => {
    const ctx = buildLine();
    expect(statuslineRow(ctx, { columns: COLUMNS, rows: 24 })).toBe(24);
  });

  it('should sit above the command line', () => {
    const ctx = buildLine(1);
    expect(statuslineRow(ctx, { columns: COLUMNS, rows: 24 })).toBe(23);
  });
});

describe('resolveMousePosition', () => {
  const viewport = { columns: COLUMNS, rows: 24 };

  it('should convert 1-based columns and hover the component', () => {
    const ctx = buildLine();

    const hit = resolveMousePosition(ctx, { column: 1, row: 24 }, viewport);

    expect(hit?.id).toBe(1);
    expect(ctx.hovered?.id).toBe(1);
    expect(ctx.components.get(1)?.hovered).toBe(true);
  });

  it('should move hover between components', () => {
    const ctx = buildLine();

    resolveMousePosition(ctx, { column: 1, row: 24 }, viewport);
    resolveMousePosition(ctx, { column: 10, row: 24 }, viewport);

    expect(ctx.hovered?.id).toBe(3);
    expect(ctx.components.get(1)?.hovered).toBe(false);
  });

  it('should leave when the mouse is over a gap', () => {
    const ctx = buildLine();

    resolveMousePosition(ctx, { column: 1, row: 24 }, viewport);
    const hit = resolveMousePosition(ctx, { column: 7, row: 24 }, viewport);

    expect(hit).toBeUndefined();
    expect(ctx.hovered).toBeUndefined();
  });

  it('should leave when the mouse is on another row', () => {
    const ctx = buildLine();

    resolveMousePosition(ctx, { column: 1, row: 24 }, viewport);
    const hit = resolveMousePosition(ctx, { column: 1, row: 10 }, viewport);

    expect(hit).toBeUndefined();
    expect(ctx.hovered).toBeUndefined();
  });

  it('should use the row above the command line', () => {
    const ctx = buildLine(1);

    expect(resolveMousePosition(ctx, { column: 18, row: 24 }, viewport)).toBeUndefined();
    expect(resolveMousePosition(ctx, { column: 18, row: 23 }, viewport)?.id).toBe(4);
  });
});
