import { InvalidGeometryError, MissingParameterError } from '../geometry/errors';

function humanizeName(name: string): string {
  return name.replace(/_/g, ' ');
}

function humanizeShape(shape: string): string {
  return humanizeName(shape);
}

function listNames(names: string[]): string {
  const readable = names.map(humanizeName);
  if (readable.length <= 1) {
    return readable.join('');
  }
  return `${readable.slice(0, -1).join(', ')} and ${readable[readable.length - 1]}`;
}

/**
 * Converts errors into messages a student can act on:
 * - which measurements are still needed for a drawing
 * - why the measurements cannot form the shape
 * - upstream outages, timeouts and rate limits
 */
export function getUserFriendlyErrorMessage(error: unknown): string {
  if (error instanceof MissingParameterError) {
    return `I need a bit more information to draw this ${humanizeShape(error.shape)}. Please give the ${listNames(error.missing)}.`;
  }

  if (error instanceof InvalidGeometryError) {
    return `Those measurements can't form a ${humanizeShape(error.shape)}: ${error.reason}.`;
  }

  if (!(error instanceof Error)) {
    return 'An unexpected error occurred. Please try again.';
  }

  const errorMessage = error.message.toLowerCase();
  const errorName = error.name;

  if (errorName === 'AbortError' || errorMessage.includes('timeout') || errorMessage.includes('timed out')) {
    return 'Request timed out. Please try again in a moment.';
  }

  if (errorMessage.includes('429') || errorMessage.includes('rate limit') || errorMessage.includes('quota')) {
    return 'Too many requests. Please wait a moment and try again.';
  }

  if (errorMessage.includes('401') || errorMessage.includes('unauthorized') || errorMessage.includes('api key')) {
    return 'The tutor service is not configured correctly. Please contact support.';
  }

  if (
    errorMessage.includes('500') ||
    errorMessage.includes('502') ||
    errorMessage.includes('503') ||
    errorMessage.includes('504') ||
    errorMessage.includes('server error')
  ) {
    return 'Our servers are experiencing issues. Please try again in a few moments.';
  }

  if (errorMessage.includes('invalid base64') || errorMessage.includes('image too large')) {
    return 'Failed to process image. Please try a different photo (JPEG or PNG under 5MB).';
  }

  return 'Please try rephrasing your question.';
}
