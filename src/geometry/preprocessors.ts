import type { AngleTriple, ParameterMap, ShapeKey, TrigFunction } from '../types/geometry';
import { isTrigFunction } from '../types/geometry';
import { CONSISTENCY_TOLERANCE, DISCRIMINANT_SLACK, RIGHT_ANGLE_TOLERANCE, SQRT3 } from './constants';
import { InvalidGeometryError } from './errors';
import { squareSideFromArea, squareSideFromDiagonal, squareSideFromPerimeter } from './formulas';
import { relativeDifference, withinTolerance } from './validation';

export interface PreprocessContext {
  values: ParameterMap;
  text: Map<string, string>;
  angles?: AngleTriple;
}

type Preprocessor = (context: PreprocessContext) => void;

/**
 * Moves legacy or alternative names onto their canonical name. When both are
 * present the canonical value wins and the alias is dropped.
 */
export function applyAliases(values: ParameterMap, aliases: Record<string, string>): void {
  for (const [alias, canonical] of Object.entries(aliases)) {
    const value = values.get(alias);
    if (value === undefined) {
      continue;
    }
    values.delete(alias);
    const existing = values.get(canonical);
    if (existing === undefined) {
      values.set(canonical, value);
    } else if (existing !== value) {
      console.warn(`⚠️ Ignoring ${alias}=${value}; ${canonical}=${existing} was also supplied`);
    }
  }
}

/** Warns when a value that derivation will never read disagrees with the one it shadows. */
function warnIfShadowed(values: ParameterMap, name: string, canonical: string): void {
  const value = values.get(name);
  const existing = values.get(canonical);
  if (value !== undefined && existing !== undefined && !withinTolerance(value, existing)) {
    console.warn(`⚠️ Ignoring ${name}=${value}; ${canonical}=${existing} was also supplied`);
  }
}

const SQUARE_SHORTCUTS: Array<[string, (value: number) => number]> = [
  ['perimeter', squareSideFromPerimeter],
  ['diagonal', squareSideFromDiagonal],
  ['area', squareSideFromArea],
];

/**
 * Width and height from their sum and product: the roots of
 * x² − sum·x + product = 0, larger root first. Null when no positive pair exists.
 */
function sidesFromSumAndProduct(sum: number, product: number): [number, number] | null {
  const discriminant = sum ** 2 - 4 * product;
  if (!(sum > 0) || !(product > 0) || discriminant < -DISCRIMINANT_SLACK * sum ** 2) {
    return null;
  }
  const root = Math.sqrt(Math.max(0, discriminant));
  return [(sum + root) / 2, (sum - root) / 2];
}

/** Solves width and height from two of area, perimeter and diagonal. */
function solveRectangleFromMeasures(values: ParameterMap): [number, number] | null {
  const area = values.get('area');
  const perimeter = values.get('perimeter');
  const diagonal = values.get('diagonal');

  if (area !== undefined && perimeter !== undefined) {
    return sidesFromSumAndProduct(perimeter / 2, area);
  }
  if (area !== undefined && diagonal !== undefined) {
    return sidesFromSumAndProduct(Math.sqrt(Math.max(0, diagonal ** 2 + 2 * area)), area);
  }
  if (perimeter !== undefined && diagonal !== undefined) {
    const sum = perimeter / 2;
    return sidesFromSumAndProduct(sum, (sum ** 2 - diagonal ** 2) / 2);
  }
  return null;
}

function preprocessRectangle({ values }: PreprocessContext): void {
  const side = values.get('side');
  if (side !== undefined) {
    if (!values.has('width')) values.set('width', side);
    if (!values.has('height')) values.set('height', side);
    return;
  }

  if (values.has('width') || values.has('height')) {
    return;
  }

  const supplied = SQUARE_SHORTCUTS.filter(([name]) => values.has(name));
  if (supplied.length > 1) {
    const sides = solveRectangleFromMeasures(values);
    if (sides === null) {
      const given = Object.fromEntries(supplied.map(([name]) => [name, values.get(name) ?? Number.NaN]));
      const described = Object.entries(given)
        .map(([name, value]) => `${name} ${value}`)
        .join(' and ');
      throw new InvalidGeometryError('rectangle', `no rectangle has ${described}`, given);
    }
    values.set('width', sides[0]);
    values.set('height', sides[1]);
    return;
  }

  if (supplied.length === 0) {
    return;
  }

  const [name, toSide] = supplied[0];
  const measure = values.get(name);
  if (measure === undefined || measure < 0) {
    return;
  }
  const squareSide = toSide(measure);
  values.set('width', squareSide);
  values.set('height', squareSide);
}

/**
 * Scales the 1 : √3 : 2 ratio from whichever of hypotenuse, side1 (30° leg)
 * and side2 (60° leg) were supplied. Supplied values must agree with each other.
 */
function applyThirtySixtyNinety(values: ParameterMap): void {
  const unitEstimates: Array<[string, number, number]> = [];
  const hypotenuse = values.get('hypotenuse');
  const side1 = values.get('side1');
  const side2 = values.get('side2');
  if (hypotenuse !== undefined) unitEstimates.push(['hypotenuse', hypotenuse, hypotenuse / 2]);
  if (side1 !== undefined) unitEstimates.push(['side1', side1, side1]);
  if (side2 !== undefined) unitEstimates.push(['side2', side2, side2 / SQRT3]);

  if (unitEstimates.length === 0) {
    return;
  }

  const [, , unit] = unitEstimates[0];
  for (const [name, value, estimate] of unitEstimates.slice(1)) {
    if (relativeDifference(unit, estimate) > CONSISTENCY_TOLERANCE) {
      const supplied = Object.fromEntries(unitEstimates.map(([key, raw]) => [key, raw]));
      throw new InvalidGeometryError(
        'right_triangle',
        `${name}=${value} does not fit the 30-60-90 ratio 1 : √3 : 2 implied by the other sides`,
        supplied,
      );
    }
  }

  if (hypotenuse === undefined) values.set('hypotenuse', 2 * unit);
  if (side1 === undefined) values.set('side1', unit);
  if (side2 === undefined) values.set('side2', SQRT3 * unit);
}

function preprocessRightTriangle({ values, angles }: PreprocessContext): void {
  applyAliases(values, { leg1: 'side1', leg2: 'side2' });

  if (!angles) {
    return;
  }

  const rightIndex = angles.findIndex((angle) => Math.abs(angle - 90) <= RIGHT_ANGLE_TOLERANCE);
  if (rightIndex === -1) {
    console.warn(`⚠️ Angles ${JSON.stringify(angles)} contain no right angle; ignoring them for derivation`);
    return;
  }

  const [smaller, larger] = angles.filter((_, index) => index !== rightIndex).sort((a, b) => a - b);
  if (Math.abs(smaller - 30) <= RIGHT_ANGLE_TOLERANCE && Math.abs(larger - 60) <= RIGHT_ANGLE_TOLERANCE) {
    applyThirtySixtyNinety(values);
    return;
  }

  if (!values.has('angle')) {
    values.set('angle', smaller);
  }
}

const EQUILATERAL_SIDE_NAMES = ['side_a', 'side_b', 'side_c', 'side1', 'side2', 'side3'];

function preprocessEquilateral({ values }: PreprocessContext): void {
  if (values.has('side')) {
    for (const name of EQUILATERAL_SIDE_NAMES) {
      warnIfShadowed(values, name, 'side');
    }
    return;
  }

  const supplied = EQUILATERAL_SIDE_NAMES
    .map((name) => values.get(name))
    .filter((value): value is number => value !== undefined);
  if (supplied.length === 0) {
    return;
  }

  const [first] = supplied;
  if (supplied.some((value) => relativeDifference(value, first) > CONSISTENCY_TOLERANCE)) {
    throw new InvalidGeometryError(
      'equilateral_triangle',
      `sides ${supplied.join(', ')} are not all equal`,
      Object.fromEntries(supplied.map((value, index) => [`side${index + 1}`, value])),
    );
  }
  values.set('side', first);
}

function preprocessIsosceles({ values }: PreprocessContext): void {
  applyAliases(values, { equal_side: 'equal_sides', leg: 'equal_sides', legs: 'equal_sides' });

  const sideB = values.get('side_b');
  const sideC = values.get('side_c');
  if (sideB !== undefined && sideC !== undefined && !withinTolerance(sideB, sideC)) {
    throw new InvalidGeometryError(
      'isosceles_triangle',
      `equal sides differ (side_b=${sideB}, side_c=${sideC})`,
      { side_b: sideB, side_c: sideC },
    );
  }

  warnIfShadowed(values, 'side_a', 'base');
  warnIfShadowed(values, 'side_b', 'equal_sides');
  warnIfShadowed(values, 'side_c', 'equal_sides');
}

function preprocessGeneralTriangle({ values }: PreprocessContext): void {
  applyAliases(values, {
    side1: 'side_a',
    side2: 'side_b',
    side3: 'side_c',
    a: 'side_a',
    b: 'side_b',
    c: 'side_c',
  });
}

function preprocessSimilarTriangles({ values }: PreprocessContext): void {
  applyAliases(values, {
    side1: 'corresponding_side1',
    side2: 'corresponding_side2',
    scale_factor: 'ratio',
  });
}

function preprocessCircle({ values }: PreprocessContext): void {
  applyAliases(values, { r: 'radius', d: 'diameter' });
}

const TRIG_ALIASES: Record<string, TrigFunction> = {
  sine: 'sin',
  cosine: 'cos',
  tangent: 'tan',
};

function preprocessTrigonometric({ text }: PreprocessContext): void {
  const raw = text.get('function');
  if (raw === undefined) {
    return;
  }

  // "sin(x)", "y = cos x" and "Sine" all name the same curve.
  const name = raw.replace(/^y\s*=\s*/, '').replace(/\s*\(?\s*x\s*\)?$/, '').trim();
  const resolved = TRIG_ALIASES[name] ?? name;
  if (isTrigFunction(resolved)) {
    text.set('function', resolved);
  } else {
    console.warn(`⚠️ Unsupported trigonometric function "${raw}"`);
    text.delete('function');
  }
}

const PREPROCESSORS: Partial<Record<ShapeKey, Preprocessor>> = {
  circle: preprocessCircle,
  rectangle: preprocessRectangle,
  right_triangle: preprocessRightTriangle,
  equilateral_triangle: preprocessEquilateral,
  isosceles_triangle: preprocessIsosceles,
  general_triangle: preprocessGeneralTriangle,
  similar_triangles: preprocessSimilarTriangles,
  trigonometric: preprocessTrigonometric,
};

/** Shape-specific adjustments that change which keys are present before derivation. */
export function preprocess(shape: ShapeKey, context: PreprocessContext): void {
  PREPROCESSORS[shape]?.(context);
}
