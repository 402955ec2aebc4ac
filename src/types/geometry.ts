export type ShapeKey =
  | 'circle'
  | 'circle_angle'
  | 'rectangle'
  | 'right_triangle'
  | 'equilateral_triangle'
  | 'isosceles_triangle'
  | 'general_triangle'
  | 'similar_triangles'
  | 'trigonometric';

export const SHAPE_KEYS: readonly ShapeKey[] = [
  'circle',
  'circle_angle',
  'rectangle',
  'right_triangle',
  'equilateral_triangle',
  'isosceles_triangle',
  'general_triangle',
  'similar_triangles',
  'trigonometric',
];

export type TrigFunction = 'sin' | 'cos' | 'tan';

export const TRIG_FUNCTIONS: readonly TrigFunction[] = ['sin', 'cos', 'tan'];

export function isTrigFunction(value: string): value is TrigFunction {
  return TRIG_FUNCTIONS.some((name) => name === value);
}

export type ParameterName = string;

/** Value a raw parameter may carry after coercion. */
export type CoercedValue = number | number[];

/** Raw parameters as proposed by the tutor model or a user, untrusted. */
export type RawParameters = Record<string, unknown>;

/** Numeric working set used by the registry and the derivation engine. */
export type ParameterMap = Map<ParameterName, number>;

export type ParameterValue = number | TrigFunction;

export type CanonicalParameters = Record<ParameterName, ParameterValue>;

export type AngleTriple = [number, number, number];

export interface NormalizationResult {
  /** Normalized shape key. Unknown shapes are passed through verbatim. */
  shape: string;
  known: boolean;
  /** Required canonical values, in render-dispatch order for known shapes. */
  parameters: CanonicalParameters;
  /** Additional values derived from the canonical set (area, angles, ...). */
  measurements: Record<ParameterName, number>;
  /** Advisory angle labels, present only when they summed to 180°. */
  angles?: AngleTriple;
  /** Raw keys that could not be coerced and were dropped. */
  dropped: ParameterName[];
}

export type CanonicalShape =
  | { shape: 'circle'; radius: number }
  | { shape: 'circle_angle'; arc1: number; arc2: number }
  | { shape: 'rectangle'; width: number; height: number }
  | { shape: 'right_triangle'; side1: number; side2: number; hypotenuse: number }
  | { shape: 'equilateral_triangle'; side: number }
  | { shape: 'isosceles_triangle'; base: number; equal_sides: number }
  | { shape: 'general_triangle'; side_a: number; side_b: number; side_c: number }
  | {
      shape: 'similar_triangles';
      ratio: number;
      corresponding_side1: number;
      corresponding_side2: number;
    }
  | { shape: 'trigonometric'; function: TrigFunction };
