import type { ParameterName, ShapeKey } from '../types/geometry';
import { SHAPE_KEYS } from '../types/geometry';
import * as f from './formulas';

export type Formula = (...values: number[]) => number;

/** One way to produce a target: every source must already be known. */
export interface DerivationRule {
  readonly sources: readonly ParameterName[];
  readonly formula: Formula;
}

export interface ShapeRules {
  readonly required: readonly ParameterName[];
  /** Alternatives per target, tried in declaration order. */
  readonly derived: ReadonlyMap<ParameterName, readonly DerivationRule[]>;
}

type RuleTable = Record<ShapeKey, {
  required: ParameterName[];
  derived: Record<ParameterName, DerivationRule[]>;
}>;

const rule = (sources: ParameterName[], formula: Formula): DerivationRule => ({ sources, formula });

const RULE_TABLE: RuleTable = {
  circle: {
    required: ['radius'],
    derived: {
      radius: [
        rule(['diameter'], f.radiusFromDiameter),
        rule(['circumference'], f.radiusFromCircumference),
        rule(['area'], f.radiusFromArea),
      ],
      diameter: [rule(['radius'], f.diameterFromRadius)],
      circumference: [rule(['radius'], f.circumferenceFromRadius)],
      area: [rule(['radius'], f.circleArea)],
    },
  },

  circle_angle: {
    required: ['arc1', 'arc2'],
    derived: {
      arc1: [rule(['angle', 'arc2'], f.arcFromChordAngle)],
      arc2: [rule(['angle', 'arc1'], f.arcFromChordAngle)],
      angle: [rule(['arc1', 'arc2'], f.chordAngle)],
    },
  },

  // Two-dimension alternatives come before the square shortcuts so that a
  // supplied width or height is never overridden by a square assumption.
  rectangle: {
    required: ['width', 'height'],
    derived: {
      width: [
        rule(['area', 'height'], f.dimensionFromArea),
        rule(['side'], f.identity),
        rule(['diagonal', 'height'], f.dimensionFromDiagonal),
        rule(['perimeter', 'height'], f.dimensionFromPerimeter),
        rule(['diagonal'], f.squareSideFromDiagonal),
        rule(['perimeter'], f.squareSideFromPerimeter),
        rule(['area'], f.squareSideFromArea),
      ],
      height: [
        rule(['area', 'width'], f.dimensionFromArea),
        rule(['side'], f.identity),
        rule(['diagonal', 'width'], f.dimensionFromDiagonal),
        rule(['perimeter', 'width'], f.dimensionFromPerimeter),
        rule(['diagonal'], f.squareSideFromDiagonal),
        rule(['perimeter'], f.squareSideFromPerimeter),
        rule(['area'], f.squareSideFromArea),
      ],
      area: [rule(['width', 'height'], f.rectangleArea)],
      perimeter: [rule(['width', 'height'], f.rectanglePerimeter)],
      diagonal: [rule(['width', 'height'], f.rectangleDiagonal)],
    },
  },

  // `angle` is the acute angle opposite side1, in degrees.
  right_triangle: {
    required: ['side1', 'side2', 'hypotenuse'],
    derived: {
      side1: [
        rule(['hypotenuse', 'side2'], f.legFromHypotenuse),
        rule(['hypotenuse', 'angle'], f.oppositeLegFromHypotenuse),
        rule(['side2', 'angle'], f.oppositeLegFromAdjacent),
      ],
      side2: [
        rule(['hypotenuse', 'side1'], f.legFromHypotenuse),
        rule(['hypotenuse', 'angle'], f.adjacentLegFromHypotenuse),
        rule(['side1', 'angle'], f.adjacentLegFromOpposite),
      ],
      hypotenuse: [
        rule(['side1', 'side2'], f.hypotenuseFromLegs),
        rule(['side1', 'angle'], f.hypotenuseFromOpposite),
        rule(['side2', 'angle'], f.hypotenuseFromAdjacent),
      ],
      angle: [rule(['side1', 'hypotenuse'], f.angleFromOppositeAndHypotenuse)],
      area: [rule(['side1', 'side2'], f.rightTriangleArea)],
      perimeter: [rule(['side1', 'side2', 'hypotenuse'], f.trianglePerimeter)],
    },
  },

  equilateral_triangle: {
    required: ['side'],
    derived: {
      side: [
        rule(['height'], f.equilateralSideFromHeight),
        rule(['area'], f.equilateralSideFromArea),
        rule(['perimeter'], f.equilateralSideFromPerimeter),
      ],
      height: [rule(['side'], f.equilateralHeight)],
      area: [rule(['side'], f.equilateralArea)],
      perimeter: [rule(['side'], f.equilateralPerimeter)],
    },
  },

  // side_a is the base; side_b and side_c are the equal sides.
  isosceles_triangle: {
    required: ['base', 'equal_sides'],
    derived: {
      base: [
        rule(['side_a'], f.identity),
        rule(['equal_sides', 'height'], f.isoscelesBaseFromHeight),
      ],
      equal_sides: [
        rule(['side_b'], f.identity),
        rule(['side_c'], f.identity),
        rule(['base', 'height'], f.isoscelesEqualSidesFromHeight),
        rule(['base', 'area'], f.isoscelesEqualSidesFromArea),
      ],
      height: [rule(['base', 'equal_sides'], f.isoscelesHeight)],
      area: [rule(['base', 'height'], f.triangleAreaFromBaseAndHeight)],
      perimeter: [rule(['base', 'equal_sides'], f.isoscelesPerimeter)],
    },
  },

  // angle_x is opposite side_x, in degrees.
  general_triangle: {
    required: ['side_a', 'side_b', 'side_c'],
    derived: {
      side_a: [rule(['side_b', 'side_c', 'angle_a'], f.sideFromIncludedAngle)],
      side_b: [rule(['side_a', 'side_c', 'angle_b'], f.sideFromIncludedAngle)],
      side_c: [rule(['side_a', 'side_b', 'angle_c'], f.sideFromIncludedAngle)],
      angle_a: [rule(['side_a', 'side_b', 'side_c'], f.angleFromSides)],
      angle_b: [rule(['side_b', 'side_a', 'side_c'], f.angleFromSides)],
      angle_c: [rule(['angle_a', 'angle_b'], f.remainingAngle)],
      area: [rule(['side_a', 'side_b', 'side_c'], f.heronArea)],
      height: [rule(['area', 'side_a'], f.heightFromArea)],
      perimeter: [rule(['side_a', 'side_b', 'side_c'], f.trianglePerimeter)],
    },
  },

  similar_triangles: {
    required: ['ratio', 'corresponding_side1', 'corresponding_side2'],
    derived: {
      ratio: [rule(['corresponding_side1', 'corresponding_side2'], f.ratioFromSides)],
      corresponding_side1: [rule(['ratio', 'corresponding_side2'], f.scaledSide)],
      corresponding_side2: [rule(['corresponding_side1', 'ratio'], f.unscaledSide)],
      area_ratio: [rule(['ratio'], f.areaRatio)],
    },
  },

  trigonometric: {
    required: ['function'],
    derived: {},
  },
};

function freezeRules(definition: RuleTable[ShapeKey]): ShapeRules {
  const derived = new Map<ParameterName, readonly DerivationRule[]>();
  for (const [target, alternatives] of Object.entries(definition.derived)) {
    derived.set(target, Object.freeze(alternatives.map((alt) => Object.freeze({ ...alt, sources: Object.freeze([...alt.sources]) }))));
  }
  return Object.freeze({ required: Object.freeze([...definition.required]), derived });
}

const REGISTRY: ReadonlyMap<string, ShapeRules> = new Map(
  SHAPE_KEYS.map((shape) => [shape, freezeRules(RULE_TABLE[shape])] as const),
);

const EMPTY_RULES: ShapeRules = Object.freeze({
  required: Object.freeze([]),
  derived: new Map<ParameterName, readonly DerivationRule[]>(),
});

/** Rules for a shape; an unrecognized shape gets an empty rule set. */
export function rulesFor(shape: string): ShapeRules {
  return REGISTRY.get(shape) ?? EMPTY_RULES;
}

export function isKnownShape(shape: string): shape is ShapeKey {
  return REGISTRY.has(shape);
}

/** Derivable targets that are not required: the shape's secondary measurements. */
export function measurementTargets(rules: ShapeRules): ParameterName[] {
  return [...rules.derived.keys()].filter((target) => !rules.required.includes(target));
}
