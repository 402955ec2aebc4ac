import { FormulaDomainError } from './errors';
import { SQRT2, SQRT3 } from './constants';

// Guarded primitives. Formulas throw FormulaDomainError instead of returning NaN.

export function safeSqrt(value: number): number {
  if (value < 0) {
    throw new FormulaDomainError(`square root of negative value ${value}`);
  }
  return Math.sqrt(value);
}

export function safeDivide(numerator: number, denominator: number): number {
  if (denominator === 0) {
    throw new FormulaDomainError('division by zero');
  }
  return numerator / denominator;
}

function safeAcos(value: number): number {
  if (value < -1 || value > 1) {
    throw new FormulaDomainError(`acos argument ${value} outside [-1, 1]`);
  }
  return Math.acos(value);
}

function safeAsin(value: number): number {
  if (value < -1 || value > 1) {
    throw new FormulaDomainError(`asin argument ${value} outside [-1, 1]`);
  }
  return Math.asin(value);
}

export const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;
export const toDegrees = (radians: number): number => (radians * 180) / Math.PI;

// Circle

export const radiusFromDiameter = (diameter: number): number => diameter / 2;
export const radiusFromCircumference = (circumference: number): number => circumference / (2 * Math.PI);
export const radiusFromArea = (area: number): number => safeSqrt(area / Math.PI);
export const diameterFromRadius = (radius: number): number => 2 * radius;
export const circumferenceFromRadius = (radius: number): number => 2 * Math.PI * radius;
export const circleArea = (radius: number): number => Math.PI * radius ** 2;

/** Angle formed by two intersecting chords: the mean of the intercepted arcs. */
export const chordAngle = (arc1: number, arc2: number): number => (arc1 + arc2) / 2;
export const arcFromChordAngle = (angle: number, otherArc: number): number => 2 * angle - otherArc;

// Rectangle / square

export const identity = (value: number): number => value;
export const dimensionFromArea = (area: number, other: number): number => safeDivide(area, other);
export const dimensionFromDiagonal = (diagonal: number, other: number): number => safeSqrt(diagonal ** 2 - other ** 2);
export const dimensionFromPerimeter = (perimeter: number, other: number): number => (perimeter - 2 * other) / 2;
export const squareSideFromDiagonal = (diagonal: number): number => diagonal / SQRT2;
export const squareSideFromPerimeter = (perimeter: number): number => perimeter / 4;
export const squareSideFromArea = (area: number): number => safeSqrt(area);
export const rectangleArea = (width: number, height: number): number => width * height;
export const rectanglePerimeter = (width: number, height: number): number => 2 * (width + height);
export const rectangleDiagonal = (width: number, height: number): number => Math.hypot(width, height);

// Right triangle. `angle` is in degrees and sits opposite side1.

export const legFromHypotenuse = (hypotenuse: number, otherLeg: number): number =>
  safeSqrt(hypotenuse ** 2 - otherLeg ** 2);
export const oppositeLegFromHypotenuse = (hypotenuse: number, angle: number): number =>
  hypotenuse * Math.sin(toRadians(angle));
export const adjacentLegFromHypotenuse = (hypotenuse: number, angle: number): number =>
  hypotenuse * Math.cos(toRadians(angle));
export const oppositeLegFromAdjacent = (adjacent: number, angle: number): number =>
  adjacent * Math.tan(toRadians(angle));
export const adjacentLegFromOpposite = (opposite: number, angle: number): number =>
  safeDivide(opposite, Math.tan(toRadians(angle)));
export const hypotenuseFromLegs = (leg1: number, leg2: number): number => Math.hypot(leg1, leg2);
export const hypotenuseFromOpposite = (opposite: number, angle: number): number =>
  safeDivide(opposite, Math.sin(toRadians(angle)));
export const hypotenuseFromAdjacent = (adjacent: number, angle: number): number =>
  safeDivide(adjacent, Math.cos(toRadians(angle)));
export const angleFromOppositeAndHypotenuse = (opposite: number, hypotenuse: number): number =>
  toDegrees(safeAsin(safeDivide(opposite, hypotenuse)));
export const rightTriangleArea = (leg1: number, leg2: number): number => (leg1 * leg2) / 2;

// Triangles in general

export const trianglePerimeter = (a: number, b: number, c: number): number => a + b + c;

/** Heron's formula. */
export function heronArea(a: number, b: number, c: number): number {
  const s = (a + b + c) / 2;
  return safeSqrt(s * (s - a) * (s - b) * (s - c));
}

/** Law of cosines: angle (degrees) opposite `opposite`, between sides `b` and `c`. */
export const angleFromSides = (opposite: number, b: number, c: number): number =>
  toDegrees(safeAcos(safeDivide(b ** 2 + c ** 2 - opposite ** 2, 2 * b * c)));

/** Law of cosines: side opposite the included angle (degrees) between `b` and `c`. */
export const sideFromIncludedAngle = (b: number, c: number, angle: number): number =>
  safeSqrt(b ** 2 + c ** 2 - 2 * b * c * Math.cos(toRadians(angle)));

export const remainingAngle = (first: number, second: number): number => 180 - first - second;
export const heightFromArea = (area: number, base: number): number => safeDivide(2 * area, base);

// Equilateral

export const equilateralHeight = (side: number): number => (SQRT3 / 2) * side;
export const equilateralArea = (side: number): number => (SQRT3 / 4) * side ** 2;
export const equilateralSideFromHeight = (height: number): number => (2 * height) / SQRT3;
export const equilateralSideFromArea = (area: number): number => safeSqrt((4 * area) / SQRT3);
export const equilateralPerimeter = (side: number): number => 3 * side;
export const equilateralSideFromPerimeter = (perimeter: number): number => perimeter / 3;

// Isosceles

export const isoscelesHeight = (base: number, equalSides: number): number =>
  safeSqrt(equalSides ** 2 - (base / 2) ** 2);
export const isoscelesEqualSidesFromHeight = (base: number, height: number): number =>
  Math.hypot(base / 2, height);
export const isoscelesBaseFromHeight = (equalSides: number, height: number): number =>
  2 * safeSqrt(equalSides ** 2 - height ** 2);
export const isoscelesEqualSidesFromArea = (base: number, area: number): number =>
  Math.hypot(base / 2, heightFromArea(area, base));
export const triangleAreaFromBaseAndHeight = (base: number, height: number): number => (base * height) / 2;
export const isoscelesPerimeter = (base: number, equalSides: number): number => base + 2 * equalSides;

// Similar triangles

export const ratioFromSides = (side1: number, side2: number): number => safeDivide(side1, side2);
export const scaledSide = (ratio: number, side2: number): number => ratio * side2;
export const unscaledSide = (side1: number, ratio: number): number => safeDivide(side1, ratio);
export const areaRatio = (ratio: number): number => ratio ** 2;
