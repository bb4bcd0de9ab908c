/**
 * Unit Tests: Field Matcher
 *
 * Request validation, spatial tolerance, and run/target pairing.
 */
import { describe, test, expect } from 'vitest';
import {
  boxesWithinTolerance,
  groupTargetsByPage,
  matchRuns,
  parseReplacementRequest,
} from '../fieldMatcher';
import { InvalidRequestError } from '../../errors';
import type { BoundingBox, FieldTarget, TextRun } from '../../types';

function textRun(text: string, box: BoundingBox, page = 0): TextRun {
  return {
    key: `p${page}_x${box.x1}y${box.y1}a${box.x2}b${box.y2}_${text}`,
    page,
    boundingBox: box,
    text,
    fontFamily: 'Helvetica',
    fontSize: 12,
    color: { r: 1, g: 0, b: 0 },
  };
}

function target(key: string, replacement: string): FieldTarget {
  const { targets } = parseReplacementRequest({ [key]: replacement });
  return targets[0];
}

// ─── parseReplacementRequest ─────────────────────────────────

describe('parseReplacementRequest', () => {
  test('decodes keys into targets', () => {
    const { targets, rejected } = parseReplacementRequest({ 'p0_x10y10a60b20_{{name}}': 'Alice' });
    expect(rejected).toEqual([]);
    expect(targets).toEqual([
      {
        key: 'p0_x10y10a60b20_{{name}}',
        page: 0,
        boundingBox: { x1: 10, y1: 10, x2: 60, y2: 20 },
        originalText: '{{name}}',
        replacement: 'Alice',
      },
    ]);
  });

  test('reports malformed keys without throwing', () => {
    const { targets, rejected } = parseReplacementRequest({
      'not-a-key': 'x',
      'p0_x10y10a60b20_{{name}}': 'Alice',
    });
    expect(targets).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0]).toMatchObject({ key: 'not-a-key', status: 'skipped', reason: 'malformed-key' });
  });

  test('unescapes the original text from the key', () => {
    const { targets } = parseReplacementRequest({ 'p0_x1y2a3b4_say \\"hi\\"': 'x' });
    expect(targets[0].originalText).toBe('say "hi"');
  });

  test('empty request throws', () => {
    expect(() => parseReplacementRequest({})).toThrow(InvalidRequestError);
  });

  test.each([[null], ['p0_x1y2a3b4_t'], [['a']], [{ 'p0_x1y2a3b4_t': 5 }]])(
    'non-mapping request %j throws',
    (request) => {
      expect(() => parseReplacementRequest(request)).toThrow(InvalidRequestError);
    },
  );
});

// ─── tolerance ───────────────────────────────────────────────

describe('boxesWithinTolerance', () => {
  const stored = { x1: 10, y1: 10, x2: 50, y2: 20 };

  test('accepts drift just under the tolerance', () => {
    expect(boxesWithinTolerance(stored, { x1: 19.99, y1: 10, x2: 50, y2: 20 })).toBe(true);
  });

  test('rejects drift just over the tolerance', () => {
    expect(boxesWithinTolerance(stored, { x1: 20.01, y1: 10, x2: 50, y2: 20 })).toBe(false);
  });

  test('checks every coordinate', () => {
    expect(boxesWithinTolerance(stored, { x1: 10, y1: 10, x2: 50, y2: 30.5 })).toBe(false);
  });
});

// ─── matchRuns ───────────────────────────────────────────────

describe('matchRuns', () => {
  test('pairs a run with its target and carries the run attributes', () => {
    const runs = [textRun('{{name}}', { x1: 11, y1: 10, x2: 61, y2: 20 })];
    const { edits, unmatched } = matchRuns(runs, [target('p0_x10y10a60b20_{{name}}', 'Alice')]);

    expect(unmatched).toEqual([]);
    expect(edits).toEqual([
      {
        key: 'p0_x10y10a60b20_{{name}}',
        page: 0,
        rect: { x1: 11, y1: 10, x2: 61, y2: 20 },
        originalText: '{{name}}',
        replacement: 'Alice',
        fontSize: 12,
        fontFamily: 'Helvetica',
        color: { r: 1, g: 0, b: 0 },
      },
    ]);
  });

  test('text must match exactly', () => {
    const runs = [textRun('{{Name}}', { x1: 10, y1: 10, x2: 60, y2: 20 })];
    const { edits, unmatched } = matchRuns(runs, [target('p0_x10y10a60b20_{{name}}', 'Alice')]);
    expect(edits).toEqual([]);
    expect(unmatched.map((t) => t.key)).toEqual(['p0_x10y10a60b20_{{name}}']);
  });

  test('first run in extraction order wins', () => {
    const runs = [
      textRun('{{x}}', { x1: 15, y1: 10, x2: 65, y2: 20 }),
      textRun('{{x}}', { x1: 10, y1: 10, x2: 60, y2: 20 }),
    ];
    const { edits } = matchRuns(runs, [target('p0_x10y10a60b20_{{x}}', 'v')]);
    expect(edits).toHaveLength(1);
    expect(edits[0].rect.x1).toBe(15);
  });

  test('a run serves at most one target', () => {
    const runs = [textRun('{{x}}', { x1: 10, y1: 10, x2: 60, y2: 20 })];
    const { edits, unmatched } = matchRuns(runs, [
      target('p0_x10y10a60b20_{{x}}', 'first'),
      target('p0_x12y10a62b20_{{x}}', 'second'),
    ]);
    expect(edits.map((e) => e.replacement)).toEqual(['first']);
    expect(unmatched.map((t) => t.key)).toEqual(['p0_x12y10a62b20_{{x}}']);
  });
});

describe('groupTargetsByPage', () => {
  test('groups in request order', () => {
    const { targets } = parseReplacementRequest({
      'p1_x0y0a1b1_a': '1',
      'p0_x0y0a1b1_b': '2',
      'p1_x5y5a6b6_c': '3',
    });
    const groups = groupTargetsByPage(targets);
    expect([...groups.keys()]).toEqual([1, 0]);
    expect(groups.get(1)?.map((t) => t.originalText)).toEqual(['a', 'c']);
  });
});
