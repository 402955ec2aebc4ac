import type { CanonicalParameters, CanonicalShape, NormalizationResult, ShapeKey } from '../types/geometry';
import { isTrigFunction } from '../types/geometry';

type ShapeFields<K extends ShapeKey> = Exclude<keyof Extract<CanonicalShape, { shape: K }>, 'shape'>;

/** Ordered parameter names each drawing routine takes. */
export const RENDER_PARAMETERS: { readonly [K in ShapeKey]: readonly ShapeFields<K>[] } = {
  circle: ['radius'],
  circle_angle: ['arc1', 'arc2'],
  rectangle: ['width', 'height'],
  right_triangle: ['side1', 'side2', 'hypotenuse'],
  equilateral_triangle: ['side'],
  isosceles_triangle: ['base', 'equal_sides'],
  general_triangle: ['side_a', 'side_b', 'side_c'],
  similar_triangles: ['ratio', 'corresponding_side1', 'corresponding_side2'],
  trigonometric: ['function'],
};

function numbers(parameters: CanonicalParameters, names: readonly string[]): number[] | null {
  const values: number[] = [];
  for (const name of names) {
    const value = parameters[name];
    if (typeof value !== 'number') {
      return null;
    }
    values.push(value);
  }
  return values;
}

/** Names the drawing routine expects but the parameter set lacks. */
export function missingRenderParameters(shape: ShapeKey, parameters: CanonicalParameters): string[] {
  const expected: readonly string[] = RENDER_PARAMETERS[shape];
  return expected.filter((name) => parameters[name] === undefined);
}

/**
 * Converts the engine's name -> value mapping into the typed shape struct the
 * drawing routines take. Returns null for unknown shapes or incomplete sets.
 */
export function toCanonicalShape(result: Pick<NormalizationResult, 'shape' | 'parameters'>): CanonicalShape | null {
  const p = result.parameters;

  switch (result.shape) {
    case 'circle': {
      const v = numbers(p, RENDER_PARAMETERS.circle);
      return v && { shape: 'circle', radius: v[0] };
    }
    case 'circle_angle': {
      const v = numbers(p, RENDER_PARAMETERS.circle_angle);
      return v && { shape: 'circle_angle', arc1: v[0], arc2: v[1] };
    }
    case 'rectangle': {
      const v = numbers(p, RENDER_PARAMETERS.rectangle);
      return v && { shape: 'rectangle', width: v[0], height: v[1] };
    }
    case 'right_triangle': {
      const v = numbers(p, RENDER_PARAMETERS.right_triangle);
      return v && { shape: 'right_triangle', side1: v[0], side2: v[1], hypotenuse: v[2] };
    }
    case 'equilateral_triangle': {
      const v = numbers(p, RENDER_PARAMETERS.equilateral_triangle);
      return v && { shape: 'equilateral_triangle', side: v[0] };
    }
    case 'isosceles_triangle': {
      const v = numbers(p, RENDER_PARAMETERS.isosceles_triangle);
      return v && { shape: 'isosceles_triangle', base: v[0], equal_sides: v[1] };
    }
    case 'general_triangle': {
      const v = numbers(p, RENDER_PARAMETERS.general_triangle);
      return v && { shape: 'general_triangle', side_a: v[0], side_b: v[1], side_c: v[2] };
    }
    case 'similar_triangles': {
      const v = numbers(p, RENDER_PARAMETERS.similar_triangles);
      return v && { shape: 'similar_triangles', ratio: v[0], corresponding_side1: v[1], corresponding_side2: v[2] };
    }
    case 'trigonometric': {
      const fn = p.function;
      return typeof fn === 'string' && isTrigFunction(fn) ? { shape: 'trigonometric', function: fn } : null;
    }
    default:
      return null;
  }
}

/** Back to the generic mapping, e.g. to re-run a typed shape through the engine. */
export function fromCanonicalShape(canonical: CanonicalShape): { shape: ShapeKey; parameters: CanonicalParameters } {
  const { shape, ...parameters } = canonical;
  return { shape, parameters };
}
