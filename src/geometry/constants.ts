// Derivation budget: required parameters are filled in at most this many passes.
export const MAX_DERIVATION_PASSES = 3;

// Relative tolerance for 30-60-90 ratios, Pythagorean and similarity ratio checks.
export const CONSISTENCY_TOLERANCE = 0.01;

// Relative tolerance of an `angles` hint against 180°.
export const ANGLE_SUM_TOLERANCE = 0.01;

// Absolute width/height difference below which a rectangle is presented as a square.
export const SQUARE_TOLERANCE = 0.001;

// An angle within this many degrees of 90 is treated as the right angle.
export const RIGHT_ANGLE_TOLERANCE = 0.01;

// Relative slack below zero for the width/height discriminant, so that square inputs still solve.
export const DISCRIMINANT_SLACK = 1e-9;

export const SQRT2 = Math.SQRT2;
export const SQRT3 = Math.sqrt(3);
