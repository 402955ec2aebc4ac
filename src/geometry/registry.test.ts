import assert from 'node:assert/strict';
import { test } from 'node:test';
import { SHAPE_KEYS } from '../types/geometry';
import { RENDER_PARAMETERS } from './canonical';
import { isKnownShape, measurementTargets, rulesFor } from './registry';

test('required parameters match what each drawing routine takes', () => {
  for (const shape of SHAPE_KEYS) {
    assert.deepEqual([...rulesFor(shape).required], [...RENDER_PARAMETERS[shape]], shape);
  }
});

test('unknown shapes get an empty rule set', () => {
  const rules = rulesFor('hexagon');
  assert.deepEqual(rules.required, []);
  assert.equal(rules.derived.size, 0);
  assert.equal(isKnownShape('hexagon'), false);
  assert.equal(isKnownShape('circle'), true);
});

test('rule tables are read-only', () => {
  const rules = rulesFor('circle');
  assert.ok(Object.isFrozen(rules));
  assert.ok(Object.isFrozen(rules.required));
  const radius = rules.derived.get('radius') ?? [];
  assert.ok(Object.isFrozen(radius));
  assert.ok(Object.isFrozen(radius[0]?.sources));
});

test('alternatives keep their declaration order', () => {
  const width = rulesFor('rectangle').derived.get('width') ?? [];
  assert.deepEqual(
    width.map((alt) => alt.sources.join('+')),
    ['area+height', 'side', 'diagonal+height', 'perimeter+height', 'diagonal', 'perimeter', 'area'],
  );

  const radius = rulesFor('circle').derived.get('radius') ?? [];
  assert.deepEqual(
    radius.map((alt) => alt.sources.join('+')),
    ['diameter', 'circumference', 'area'],
  );
});

test('formulas compute the expected values', () => {
  const [fromDiameter, fromCircumference] = rulesFor('circle').derived.get('radius') ?? [];
  assert.equal(fromDiameter?.formula(10), 5);
  assert.equal(fromCircumference?.formula(2 * Math.PI), 1);

  const [fromLegs] = rulesFor('right_triangle').derived.get('hypotenuse') ?? [];
  assert.equal(fromLegs?.formula(3, 4), 5);

  const [heron] = rulesFor('general_triangle').derived.get('area') ?? [];
  assert.equal(heron?.formula(3, 4, 5), 6);
});

test('measurement targets are the non-required derivations', () => {
  assert.deepEqual(measurementTargets(rulesFor('circle')), ['diameter', 'circumference', 'area']);
  assert.deepEqual(measurementTargets(rulesFor('circle_angle')), ['angle']);
  assert.deepEqual(measurementTargets(rulesFor('rectangle')), ['area', 'perimeter', 'diagonal']);
  assert.deepEqual(measurementTargets(rulesFor('right_triangle')), ['angle', 'area', 'perimeter']);
  assert.deepEqual(measurementTargets(rulesFor('general_triangle')), [
    'angle_a',
    'angle_b',
    'angle_c',
    'area',
    'height',
    'perimeter',
  ]);
  assert.deepEqual(measurementTargets(rulesFor('similar_triangles')), ['area_ratio']);
  assert.deepEqual(measurementTargets(rulesFor('trigonometric')), []);
});
