import assert from 'node:assert/strict';
import { test } from 'node:test';
import { coerceParameters, coerceValue } from './coercion';

test('numbers pass through; non-finite numbers are rejected', () => {
  assert.equal(coerceValue(4), 4);
  assert.equal(coerceValue(-2.5), -2.5);
  assert.equal(coerceValue(Number.NaN), null);
  assert.equal(coerceValue(Number.POSITIVE_INFINITY), null);
});

test('numeric strings and expressions are evaluated', () => {
  assert.equal(coerceValue('12'), 12);
  assert.equal(coerceValue(' 2.5 '), 2.5);
  assert.equal(coerceValue('2*π'), 2 * Math.PI);
  assert.equal(coerceValue('3^2'), 9);
});

test('hostile or empty input becomes null without throwing', () => {
  assert.equal(coerceValue('DROP TABLE'), null);
  assert.equal(coerceValue('process.exit(1)'), null);
  assert.equal(coerceValue(''), null);
  assert.equal(coerceValue('   '), null);
  assert.equal(coerceValue(null), null);
  assert.equal(coerceValue(undefined), null);
  assert.equal(coerceValue(true), null);
  assert.equal(coerceValue({ value: 3 }), null);
});

test('lists coerce element-wise and fail as a whole', () => {
  assert.deepEqual(coerceValue([30, '60', '45*2']), [30, 60, 90]);
  assert.equal(coerceValue([30, 'sixty', 90]), null);
  assert.equal(coerceValue([30, [60], 90]), null);
  assert.deepEqual(coerceValue([]), []);
});

test('coerceParameters splits numbers, text and dropped keys', () => {
  const result = coerceParameters({
    radius: '5',
    diameter: null,
    area: 'lots',
    angles: [90, 45, 45],
    function: ' Sin ',
  });

  assert.deepEqual(result.values, { radius: 5, angles: [90, 45, 45] });
  assert.deepEqual(result.text, { function: 'sin' });
  assert.deepEqual(result.dropped, ['area']);
});

test('a non-string function parameter is dropped', () => {
  const result = coerceParameters({ function: 3 });
  assert.deepEqual(result.text, {});
  assert.deepEqual(result.dropped, ['function']);
});
