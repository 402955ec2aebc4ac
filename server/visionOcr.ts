/**
 * GOOGLE CLOUD VISION OCR
 *
 * Extracts the text of a photographed geometry problem so it can go through
 * the same tutor flow as a typed question. REST API with API key auth.
 */

export const MAX_IMAGE_BYTES = 5 * 1024 * 1024;
const VISION_TIMEOUT_MS = 30000;

export interface OCRResult {
  text: string;
  confidence: number;
}

export interface PreparedImage {
  mimeType: string;
  base64: string;
  sizeBytes: number;
}

/** Upload rejected before any OCR call; reported to the client as a 400. */
export class ImageValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ImageValidationError';
  }
}

const DATA_URI = /^data:([^;,]+);base64,([\s\S]*)$/;

export function prepareImageForVision(imageUri: string): PreparedImage {
  const match = DATA_URI.exec(imageUri.trim());
  if (!match) {
    throw new ImageValidationError('Invalid image data');
  }

  const mimeType = match[1].toLowerCase();
  if (!mimeType.startsWith('image/')) {
    throw new ImageValidationError('Invalid file type');
  }

  const base64 = match[2].replace(/\s+/g, '');
  if (base64.length === 0 || !/^[A-Za-z0-9+/]*={0,2}$/.test(base64)) {
    throw new ImageValidationError('Invalid base64 image data');
  }

  const padding = base64.endsWith('==') ? 2 : base64.endsWith('=') ? 1 : 0;
  const sizeBytes = Math.floor((base64.length * 3) / 4) - padding;
  if (sizeBytes > MAX_IMAGE_BYTES) {
    throw new ImageValidationError('File too large (max 5MB)');
  }

  return { mimeType, base64, sizeBytes };
}

function field(value: unknown, key: string): unknown {
  return typeof value === 'object' && value !== null ? Reflect.get(value, key) : undefined;
}

function list(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function averageWordConfidence(annotation: unknown): number {
  let totalConfidence = 0;
  let wordCount = 0;

  for (const page of list(field(annotation, 'pages'))) {
    for (const block of list(field(page, 'blocks'))) {
      for (const paragraph of list(field(block, 'paragraphs'))) {
        for (const word of list(field(paragraph, 'words'))) {
          const confidence = field(word, 'confidence');
          if (typeof confidence === 'number') {
            totalConfidence += confidence;
            wordCount++;
          }
        }
      }
    }
  }

  return wordCount > 0 ? totalConfidence / wordCount : 0.95;
}

async function describeFailure(response: Response): Promise<string> {
  const errorData: unknown = await response.json().catch(() => ({}));
  const message = field(field(errorData, 'error'), 'message');

  if (response.status === 401 || response.status === 403) {
    return 'Google Vision API authentication failed. Check API key permissions.';
  }
  if (response.status === 429) {
    return 'Google Vision API rate limit exceeded. Please try again later.';
  }
  if (response.status === 400) {
    return `Invalid request to Google Vision API: ${typeof message === 'string' ? message : 'Bad request'}`;
  }
  if (response.status >= 500) {
    return `Google Vision API server error (${response.status}). Please try again.`;
  }
  return `Google Vision API error: ${response.status} - ${JSON.stringify(errorData)}`;
}

/**
 * Runs DOCUMENT_TEXT_DETECTION on base64 image data (no data-URI prefix).
 * Resolves with empty text when the image holds none.
 */
export async function extractTextFromImage(
  base64Data: string,
  apiKey: string | undefined,
  fetchImpl: typeof fetch = fetch,
): Promise<OCRResult> {
  if (!apiKey) {
    throw new Error('GOOGLE_CLOUD_VISION_API_KEY not found in environment variables');
  }

  const url = `https://vision.googleapis.com/v1/images:annotate?key=${apiKey}`;
  const requestBody = {
    requests: [
      {
        image: { content: base64Data },
        features: [{ type: 'DOCUMENT_TEXT_DETECTION', maxResults: 1 }],
        imageContext: { languageHints: ['en'] },
      },
    ],
  };

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), VISION_TIMEOUT_MS);

  try {
    const response = await fetchImpl(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(requestBody),
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new Error(await describeFailure(response));
    }

    const data: unknown = await response.json();
    const first = list(field(data, 'responses'))[0];

    const apiError = field(field(first, 'error'), 'message');
    if (typeof apiError === 'string') {
      throw new Error(`Vision API error: ${apiError}`);
    }

    const annotation = field(first, 'fullTextAnnotation');
    const text = field(annotation, 'text');
    if (typeof text !== 'string' || text.trim() === '') {
      return { text: '', confidence: 0 };
    }

    return { text: text.trim(), confidence: averageWordConfidence(annotation) };
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new Error('Google Vision API request timed out after 30 seconds');
    }
    console.error('❌ Google Vision OCR error:', error);
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

/** Normalizes whitespace while keeping line breaks. */
export function formatOCRText(text: string): string {
  return text
    .trim()
    .replace(/[ \t]+/g, ' ')
    .replace(/\n{3,}/g, '\n\n');
}

const MATH_KEYWORDS = [
  'area',
  'perimeter',
  'radius',
  'diameter',
  'circumference',
  'triangle',
  'rectangle',
  'square',
  'circle',
  'angle',
  'hypotenuse',
  'sin',
  'cos',
  'tan',
  'π',
];

/** Returns the cleaned problem text, or null when it holds nothing mathematical. */
export function extractMathProblem(text: string): string | null {
  const formatted = formatOCRText(text);
  if (!formatted) {
    return null;
  }
  const lower = formatted.toLowerCase();
  const looksMathematical = /\d/.test(formatted) || MATH_KEYWORDS.some((keyword) => lower.includes(keyword));
  return looksMathematical ? formatted : null;
}
