import assert from 'node:assert/strict';
import { test } from 'node:test';
import { InvalidGeometryError, MissingParameterError } from '../geometry/errors';
import { getUserFriendlyErrorMessage } from './errorHandler';

test('names the parameters still needed', () => {
  assert.equal(
    getUserFriendlyErrorMessage(new MissingParameterError('right_triangle', ['side1', 'side2', 'hypotenuse'], 3)),
    'I need a bit more information to draw this right triangle. Please give the side1, side2 and hypotenuse.',
  );
  assert.equal(
    getUserFriendlyErrorMessage(new MissingParameterError('circle', ['radius'], 3)),
    'I need a bit more information to draw this circle. Please give the radius.',
  );
  assert.equal(
    getUserFriendlyErrorMessage(new MissingParameterError('isosceles_triangle', ['base', 'equal_sides'], 3)),
    'I need a bit more information to draw this isosceles triangle. Please give the base and equal sides.',
  );
});

test('explains impossible geometry', () => {
  assert.equal(
    getUserFriendlyErrorMessage(new InvalidGeometryError('circle_angle', 'arcs 200° and 200° exceed a full circle')),
    "Those measurements can't form a circle angle: arcs 200° and 200° exceed a full circle.",
  );
});

test('maps upstream failures', () => {
  const timeout = new Error('The operation was aborted');
  timeout.name = 'AbortError';
  assert.equal(getUserFriendlyErrorMessage(timeout), 'Request timed out. Please try again in a moment.');
  assert.equal(
    getUserFriendlyErrorMessage(new Error('429 Rate limit reached')),
    'Too many requests. Please wait a moment and try again.',
  );
  assert.equal(
    getUserFriendlyErrorMessage(new Error('401 Incorrect API key provided')),
    'The tutor service is not configured correctly. Please contact support.',
  );
  assert.equal(
    getUserFriendlyErrorMessage(new Error('503 Service Unavailable')),
    'Our servers are experiencing issues. Please try again in a few moments.',
  );
  assert.equal(getUserFriendlyErrorMessage(new Error('something odd')), 'Please try rephrasing your question.');
  assert.equal(getUserFriendlyErrorMessage('not an error'), 'An unexpected error occurred. Please try again.');
});
