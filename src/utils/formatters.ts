import { isSquare } from '../geometry/validation';

const EXPLANATION_REPLACEMENTS: Array<[RegExp, string]> = [
  [/\\\(/g, ''],
  [/\\\)/g, ''],
  [/\\\[/g, ''],
  [/\\\]/g, ''],
  [/\^2\b/g, '²'],
  [/\^3\b/g, '³'],
  [/\\sqrt/g, '√'],
  [/\\times/g, '×'],
  [/\\div/g, '÷'],
  [/\\pi\b/g, 'π'],
  [/\\[dt]?frac\{([^{}]+)\}\{([^{}]+)\}/g, '$1/$2'],
];

/** Strips LaTeX delimiters and swaps common commands for plain Unicode. */
export function enhanceExplanation(text: string): string {
  let enhanced = text;
  for (const [pattern, replacement] of EXPLANATION_REPLACEMENTS) {
    enhanced = enhanced.replace(pattern, replacement);
  }
  return enhanced;
}

export function normalizeContent(content: string): string {
  let normalized = content.replace(/\r\n/g, '\n');

  normalized = normalized.replace(/\n\s*([.,!?:])/g, '$1');
  normalized = normalized.replace(/\n{3,}/g, '\n\n');

  return normalized.trim();
}

/**
 * Presents a rectangle whose sides match as a square. Only the wording
 * changes; the parameters stay width and height.
 */
export function describeRectangle(explanation: string, width: number, height: number): string {
  if (!isSquare(width, height)) {
    return explanation;
  }
  const relabelled = explanation.replace(/rectangle/g, 'square').replace(/Rectangle/g, 'Square');
  return `${relabelled}\nNote: Square with side length ${width.toFixed(2)} cm.`;
}

export function formatMeasurement(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

const DRAW_KEYWORDS = ['draw', 'illustrate', 'sketch', 'visualize'];

export function wantsDiagram(text: string): boolean {
  const lower = text.toLowerCase();
  return DRAW_KEYWORDS.some((keyword) => lower.includes(keyword));
}
