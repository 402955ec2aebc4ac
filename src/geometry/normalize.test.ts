import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { NormalizationResult } from '../types/geometry';
import { InvalidGeometryError, MissingParameterError } from './errors';
import { deriveParameters, normalizeParameters, parseShapeKey } from './normalize';
import type { ShapeRules } from './registry';

function assertClose(actual: unknown, expected: number, tolerance = 1e-6) {
  assert.ok(
    typeof actual === 'number' && Math.abs(actual - expected) < tolerance,
    `expected ${String(actual)} ≈ ${expected}`,
  );
}

test('parseShapeKey normalizes spelling and aliases', () => {
  assert.equal(parseShapeKey('Right Triangle'), 'right_triangle');
  assert.equal(parseShapeKey(' similar-triangles '), 'similar_triangles');
  assert.equal(parseShapeKey('Square'), 'rectangle');
  assert.equal(parseShapeKey('triangle'), 'general_triangle');
  assert.equal(parseShapeKey('hexagon'), 'hexagon');
});

test('circle radius from diameter or circumference', () => {
  const fromDiameter = normalizeParameters('circle', { diameter: 10 });
  assert.deepEqual(fromDiameter.parameters, { radius: 5 });
  assert.deepEqual(fromDiameter.measurements, { diameter: 10, circumference: 10 * Math.PI, area: 25 * Math.PI });

  assertClose(normalizeParameters('circle', { circumference: '2*π' }).parameters.radius, 1);
  assertClose(normalizeParameters('circle', { area: 'π' }).parameters.radius, 1);
});

test('first declared alternative wins when several apply', () => {
  assert.deepEqual(normalizeParameters('circle', { diameter: 10, circumference: 100 }).parameters, { radius: 5 });

  const triangle = normalizeParameters('right_triangle', { hypotenuse: 10, side2: 6, angle: 30 });
  assert.equal(triangle.parameters.side1, 8, 'Pythagoras is declared before hypotenuse·sin(angle)');
});

test('rectangle from a side or from area and one dimension', () => {
  assert.deepEqual(normalizeParameters('rectangle', { side: 4 }).parameters, { width: 4, height: 4 });

  const rectangle = normalizeParameters('rectangle', { area: 20, height: 4 });
  assert.deepEqual(rectangle.parameters, { width: 5, height: 4 });
  assert.equal(rectangle.measurements.perimeter, 18);
  assert.equal(rectangle.measurements.area, 20);

  assert.deepEqual(normalizeParameters('square', { perimeter: 12 }).parameters, { width: 3, height: 3 });
  assert.deepEqual(normalizeParameters('rectangle', { width: '2*3', height: '4' }).parameters, { width: 6, height: 4 });
});

test('rectangle from area and perimeter keeps both measurements', () => {
  const result = normalizeParameters('rectangle', { area: 21, perimeter: 20 });
  assert.deepEqual(result.parameters, { width: 7, height: 3 });
  assert.equal(result.measurements.area, 21);
  assert.equal(result.measurements.perimeter, 20);

  assert.throws(
    () => normalizeParameters('rectangle', { area: 30, perimeter: 20 }),
    { message: 'Invalid rectangle: no rectangle has perimeter 20 and area 30' },
  );
});

test('supplied measurements the resolved shape contradicts are reported', (t) => {
  const warn = t.mock.method(console, 'warn', () => {});
  const messages = () => warn.mock.calls.map((call) => String(call.arguments[0]));

  const equilateral = normalizeParameters('equilateral_triangle', { side: 3, height: 10 });
  assert.deepEqual(equilateral.parameters, { side: 3 });
  assert.equal(messages().length, 1);
  assert.match(messages()[0], /^⚠️ Ignoring height=10 for equilateral_triangle; the resolved shape gives height=2\.598/);

  warn.mock.resetCalls();
  const rightTriangle = normalizeParameters('right_triangle', { hypotenuse: 10, angle: 60, angles: [30, 60, 90] });
  assert.equal(rightTriangle.parameters.side1, 5);
  assert.equal(messages().length, 1);
  assert.match(messages()[0], /^⚠️ Ignoring angle=60 for right_triangle; the resolved shape gives angle=(30|29\.99)/);

  warn.mock.resetCalls();
  normalizeParameters('equilateral_triangle', { side: 3, perimeter: 9 });
  assert.deepEqual(messages(), []);
});

test('30-60-90 triangle from the hypotenuse', () => {
  const result = normalizeParameters('right_triangle', { hypotenuse: 10, angles: [30, 60, 90] });
  assert.deepEqual(Object.keys(result.parameters), ['side1', 'side2', 'hypotenuse']);
  assert.equal(result.parameters.side1, 5);
  assertClose(result.parameters.side2, 8.660254);
  assert.equal(result.parameters.hypotenuse, 10);
  assert.deepEqual(result.angles, [30, 60, 90]);
  assertClose(result.measurements.angle, 30);
});

test('conflicting 30-60-90 side is rejected', () => {
  assert.throws(
    () => normalizeParameters('right_triangle', { hypotenuse: 10, side1: 3, angles: [30, 60, 90] }),
    InvalidGeometryError,
  );
});

test('right triangle from a general right-angled hint', () => {
  const result = normalizeParameters('right_triangle', { hypotenuse: 10, angles: [90, 50, 40] });
  assertClose(result.parameters.side1, 10 * Math.sin((40 * Math.PI) / 180));
  assertClose(result.parameters.side2, 10 * Math.cos((40 * Math.PI) / 180));
});

test('right triangle legs and inconsistent hypotenuse', () => {
  assert.deepEqual(normalizeParameters('right_triangle', { leg1: 3, leg2: 4 }).parameters, {
    side1: 3,
    side2: 4,
    hypotenuse: 5,
  });
  assert.throws(
    () => normalizeParameters('right_triangle', { side1: 3, side2: 4, hypotenuse: 6 }),
    InvalidGeometryError,
  );
});

test('general triangle validity and measurements', () => {
  assert.throws(
    () => normalizeParameters('general_triangle', { side_a: 1, side_b: 1, side_c: 10 }),
    (error: unknown) => error instanceof InvalidGeometryError && error.shape === 'general_triangle',
  );

  const result = normalizeParameters('general_triangle', { side_a: 3, side_b: 4, side_c: 5 });
  assert.deepEqual(result.parameters, { side_a: 3, side_b: 4, side_c: 5 });
  assert.equal(result.measurements.area, 6);
  assertClose(result.measurements.angle_a, 36.8699, 1e-4);
  assertClose(result.measurements.angle_b, 53.1301, 1e-4);
  assertClose(result.measurements.angle_c, 90);
  assert.equal(result.measurements.height, 4);
  assert.equal(result.measurements.perimeter, 12);
});

test('general triangle side from the included angle', () => {
  const result = normalizeParameters('triangle', { side_b: 5, side_c: 5, angle_a: 60 });
  assertClose(result.parameters.side_a, 5);
});

test('missing parameters are reported after three passes', () => {
  assert.throws(
    () => normalizeParameters('right_triangle', {}),
    (error: unknown) => {
      assert.ok(error instanceof MissingParameterError);
      assert.deepEqual(error.missing, ['side1', 'side2', 'hypotenuse']);
      assert.equal(error.passes, 3);
      assert.equal(error.message, 'Missing or invalid parameter(s) for right_triangle: side1, side2, hypotenuse');
      return true;
    },
  );
});

test('uncoercible values are dropped, not fatal', () => {
  const result = normalizeParameters('circle', { radius: 'DROP TABLE', diameter: 10 });
  assert.deepEqual(result.parameters, { radius: 5 });
  assert.deepEqual(result.dropped, ['radius']);
});

test('an invalid angle hint is discarded', () => {
  const result = normalizeParameters('right_triangle', { side1: 3, side2: 4, angles: [30, 60, 80] });
  assert.equal(result.angles, undefined);
  assert.equal(result.parameters.hypotenuse, 5);

  const malformed = normalizeParameters('right_triangle', { side1: 3, side2: 4, angles: [30, 'x', 90] });
  assert.deepEqual(malformed.dropped, ['angles']);
});

test('other shapes resolve their canonical sets', () => {
  const isosceles = normalizeParameters('isosceles_triangle', { base: 6, height: 4 });
  assert.deepEqual(isosceles.parameters, { base: 6, equal_sides: 5 });
  assert.deepEqual(isosceles.measurements, { height: 4, area: 12, perimeter: 16 });

  const equilateral = normalizeParameters('equilateral_triangle', { perimeter: 12 });
  assert.deepEqual(equilateral.parameters, { side: 4 });
  assertClose(equilateral.measurements.height, 2 * Math.sqrt(3));

  const similar = normalizeParameters('similar_triangles', { side1: 6, side2: 3 });
  assert.deepEqual(similar.parameters, { ratio: 2, corresponding_side1: 6, corresponding_side2: 3 });
  assert.deepEqual(similar.measurements, { area_ratio: 4 });

  const chords = normalizeParameters('circle_angle', { arc1: 100, angle: 80 });
  assert.deepEqual(chords.parameters, { arc1: 100, arc2: 60 });
  assert.deepEqual(chords.measurements, { angle: 80 });

  const trig = normalizeParameters('trigonometric', { function: 'Sine' });
  assert.deepEqual(trig.parameters, { function: 'sin' });
  assert.deepEqual(trig.measurements, {});
});

test('unsupported trigonometric function is a missing parameter', () => {
  assert.throws(() => normalizeParameters('trigonometric', { function: 'sec' }), MissingParameterError);
});

test('unknown shapes pass their numeric values through', () => {
  const result = normalizeParameters('Hexagon', { side: '3', label: 'A' });
  assert.equal(result.shape, 'hexagon');
  assert.equal(result.known, false);
  assert.deepEqual(result.parameters, { side: 3 });
  assert.deepEqual(result.dropped, ['label']);
});

test('normalizing canonical output again changes nothing', () => {
  const results: NormalizationResult[] = [
    normalizeParameters('circle', { circumference: 31.4 }),
    normalizeParameters('rectangle', { area: 20, height: 4 }),
    normalizeParameters('right_triangle', { hypotenuse: 10, angles: [30, 60, 90] }),
    normalizeParameters('general_triangle', { side_a: 3, side_b: 4, side_c: 5 }),
    normalizeParameters('isosceles_triangle', { base: 6, area: 12 }),
    normalizeParameters('similar_triangles', { ratio: 1.5, corresponding_side2: 4 }),
    normalizeParameters('trigonometric', { function: 'tan' }),
  ];

  for (const result of results) {
    assert.deepEqual(normalizeParameters(result.shape, result.parameters).parameters, result.parameters, result.shape);
  }
});

test('deriveParameters resolves chains across passes and stops early', () => {
  const rules: ShapeRules = {
    required: ['c', 'b'],
    derived: new Map([
      ['c', [{ sources: ['b'], formula: (b: number) => b * 2 }]],
      ['b', [{ sources: ['a'], formula: (a: number) => a + 1 }]],
    ]),
  };

  const working = new Map([['a', 1]]);
  const outcome = deriveParameters(working, rules.required, rules);
  assert.deepEqual(outcome, { passes: 2, unresolved: [] });
  assert.equal(working.get('c'), 4);

  const stuck = deriveParameters(new Map(), rules.required, rules);
  assert.deepEqual(stuck, { passes: 3, unresolved: ['c', 'b'] });
});

test('a failing formula falls through to the next alternative', () => {
  const rules: ShapeRules = {
    required: ['x'],
    derived: new Map([
      [
        'x',
        [
          {
            sources: ['y'],
            formula: () => {
              throw new Error('domain');
            },
          },
          { sources: ['y'], formula: () => Number.NaN },
          { sources: ['y'], formula: (y: number) => y * 10 },
        ],
      ],
    ]),
  };

  const working = new Map([['y', 2]]);
  assert.deepEqual(deriveParameters(working, ['x'], rules), { passes: 1, unresolved: [] });
  assert.equal(working.get('x'), 20);
});
