import type { AngleTriple, ParameterMap } from '../types/geometry';
import { ANGLE_SUM_TOLERANCE, CONSISTENCY_TOLERANCE, SQUARE_TOLERANCE } from './constants';
import { InvalidGeometryError } from './errors';

export function relativeDifference(a: number, b: number): number {
  const scale = Math.max(Math.abs(a), Math.abs(b));
  return scale === 0 ? 0 : Math.abs(a - b) / scale;
}

export function withinTolerance(a: number, b: number, tolerance = CONSISTENCY_TOLERANCE): boolean {
  return relativeDifference(a, b) <= tolerance;
}

/**
 * Returns the angle hint when it holds three positive values summing to 180°.
 * Anything else is discarded with a warning; the request itself does not fail.
 */
export function validateAngleHint(angles: number[]): AngleTriple | undefined {
  if (angles.length !== 3) {
    console.warn(`⚠️ Ignoring angles hint ${JSON.stringify(angles)}: expected three values`);
    return undefined;
  }

  const [first, second, third] = angles;
  if (angles.some((angle) => !(angle > 0))) {
    console.warn(`⚠️ Ignoring angles hint ${JSON.stringify(angles)}: angles must be positive`);
    return undefined;
  }

  const sum = first + second + third;
  if (Math.abs(sum - 180) / 180 > ANGLE_SUM_TOLERANCE) {
    console.warn(`⚠️ Ignoring angles hint ${JSON.stringify(angles)}: sum is ${sum}°, not 180°`);
    return undefined;
  }

  return [first, second, third];
}

export function checkPositiveLengths(shape: string, values: Record<string, number>): void {
  for (const [name, value] of Object.entries(values)) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new InvalidGeometryError(shape, `${name} must be a positive number, got ${value}`, values);
    }
  }
}

export function checkTriangleInequality(shape: string, sides: Record<string, number>): void {
  checkPositiveLengths(shape, sides);

  const lengths = Object.values(sides);
  const total = lengths.reduce((sum, length) => sum + length, 0);
  if (lengths.some((length) => length >= total - length)) {
    throw new InvalidGeometryError(
      shape,
      `sides ${lengths.join(', ')} violate the triangle inequality (each side must be shorter than the other two combined)`,
      sides,
    );
  }
}

export function isSquare(width: number, height: number): boolean {
  return Math.abs(width - height) < SQUARE_TOLERANCE;
}

function read(values: ParameterMap, name: string): number {
  return values.get(name) ?? Number.NaN;
}

type ShapeValidator = (shape: string, values: ParameterMap) => void;

const VALIDATORS: Record<string, ShapeValidator> = {
  circle_angle: (shape, values) => {
    const arc1 = read(values, 'arc1');
    const arc2 = read(values, 'arc2');
    if (arc1 + arc2 > 360) {
      throw new InvalidGeometryError(shape, `arcs ${arc1}° and ${arc2}° exceed a full circle`, { arc1, arc2 });
    }
  },

  right_triangle: (shape, values) => {
    const side1 = read(values, 'side1');
    const side2 = read(values, 'side2');
    const hypotenuse = read(values, 'hypotenuse');
    checkTriangleInequality(shape, { side1, side2, hypotenuse });

    const expected = Math.hypot(side1, side2);
    if (!withinTolerance(hypotenuse, expected)) {
      throw new InvalidGeometryError(
        shape,
        `hypotenuse ${hypotenuse} does not match √(${side1}² + ${side2}²) ≈ ${expected.toFixed(2)}`,
        { side1, side2, hypotenuse },
      );
    }
  },

  isosceles_triangle: (shape, values) => {
    // base -> side_a, equal_sides -> side_b and side_c
    const sides = {
      side_a: read(values, 'base'),
      side_b: read(values, 'equal_sides'),
      side_c: read(values, 'equal_sides'),
    };
    if (sides.side_b !== sides.side_c) {
      throw new InvalidGeometryError(shape, `equal sides differ (${sides.side_b} vs ${sides.side_c})`, sides);
    }
    checkTriangleInequality(shape, sides);
  },

  general_triangle: (shape, values) => {
    checkTriangleInequality(shape, {
      side_a: read(values, 'side_a'),
      side_b: read(values, 'side_b'),
      side_c: read(values, 'side_c'),
    });
  },

  similar_triangles: (shape, values) => {
    const ratio = read(values, 'ratio');
    const side1 = read(values, 'corresponding_side1');
    const side2 = read(values, 'corresponding_side2');
    const expected = side1 / side2;
    if (!withinTolerance(ratio, expected)) {
      throw new InvalidGeometryError(
        shape,
        `ratio ${ratio} does not match corresponding sides ${side1}/${side2} ≈ ${expected.toFixed(3)}`,
        { ratio, corresponding_side1: side1, corresponding_side2: side2 },
      );
    }
  },
};

/**
 * Geometric checks for a shape whose required parameters are all present.
 * Throws InvalidGeometryError on the first violation.
 */
export function validateShape(shape: string, required: readonly string[], values: ParameterMap): void {
  const numeric: Record<string, number> = {};
  for (const name of required) {
    const value = values.get(name);
    if (value !== undefined) {
      numeric[name] = value;
    }
  }
  checkPositiveLengths(shape, numeric);
  VALIDATORS[shape]?.(shape, values);
}
