import type { ChatResult, ShapeReply, TutorReply } from '../src/types';
import { isShapeReply } from '../src/types';
import { isGeometryError } from '../src/geometry/errors';
import { normalizeParameters } from '../src/geometry/normalize';
import { missingRenderParameters, toCanonicalShape } from '../src/geometry/canonical';
import { isKnownShape } from '../src/geometry/registry';
import { describeRectangle, wantsDiagram } from '../src/utils/formatters';
import { getUserFriendlyErrorMessage } from '../src/utils/errorHandler';
import type { DiagramRenderer } from './diagrams';
import type { OCRResult } from './visionOcr';
import { ImageValidationError, extractMathProblem, prepareImageForVision } from './visionOcr';

const STEP_BY_STEP = "Let's work through this step by step...";

export interface ChatDependencies {
  tutor: (message: string) => Promise<TutorReply>;
  renderer: DiagramRenderer;
}

export interface ImageDependencies extends ChatDependencies {
  ocr: (base64Image: string) => Promise<OCRResult>;
}

function errorResult(status: number, content: string): ChatResult {
  return { status, body: { type: 'error', content } };
}

/** Normalizes the tutor's proposed parameters and draws the shape. Never returns an image on error. */
export async function handleVisualization(reply: ShapeReply, renderer: DiagramRenderer): Promise<ChatResult> {
  try {
    const result = normalizeParameters(reply.shape, reply.parameters);
    if (!isKnownShape(result.shape)) {
      return errorResult(400, `Unsupported shape '${result.shape}'.`);
    }

    const canonical = toCanonicalShape(result);
    if (!canonical) {
      const missing = missingRenderParameters(result.shape, result.parameters);
      console.warn(`⚠️ ${result.shape} drawing is missing ${missing.join(', ')}`);
      return errorResult(400, `Missing required parameters for ${result.shape} drawing.`);
    }

    const explanation =
      canonical.shape === 'rectangle'
        ? describeRectangle(reply.explanation, canonical.width, canonical.height)
        : reply.explanation;

    const image = await renderer(canonical);

    return {
      status: 200,
      body: {
        type: 'visual',
        explanation,
        image: image.base64,
        mimeType: image.mimeType,
        parameters: result.parameters,
        measurements: result.measurements,
      },
    };
  } catch (error) {
    if (isGeometryError(error)) {
      console.warn(`⚠️ ${error.message}`);
      return errorResult(400, getUserFriendlyErrorMessage(error));
    }
    console.error('❌ Visualization error:', error);
    return errorResult(500, 'Error generating image.');
  }
}

/** Chooses between a drawing and a text answer from the question's wording. */
export async function handleTutorResponse(
  question: string,
  reply: TutorReply,
  renderer: DiagramRenderer,
): Promise<ChatResult> {
  if (!isShapeReply(reply)) {
    return { status: 200, body: { type: 'text', content: reply.response || STEP_BY_STEP } };
  }

  if (wantsDiagram(question)) {
    return handleVisualization(reply, renderer);
  }

  return { status: 200, body: { type: 'text', content: reply.explanation || STEP_BY_STEP } };
}

export async function handleChat(message: string, deps: ChatDependencies): Promise<ChatResult> {
  try {
    console.log(`📐 Tutoring request: ${message}`);
    const reply = await deps.tutor(message);
    return await handleTutorResponse(message, reply, deps.renderer);
  } catch (error) {
    console.error('❌ Chat endpoint error:', error);
    return errorResult(500, 'Please try rephrasing your question');
  }
}

/** OCRs an uploaded problem photo, then answers it like a typed question. */
export async function handleImage(imageUri: string, deps: ImageDependencies): Promise<ChatResult> {
  try {
    const image = prepareImageForVision(imageUri);
    const ocr = await deps.ocr(image.base64);
    console.log(`📐 Extracted text (${(ocr.confidence * 100).toFixed(0)}% confidence): ${ocr.text}`);

    const problem = extractMathProblem(ocr.text);
    if (!problem) {
      return errorResult(400, 'No math problem detected');
    }

    return await handleChat(problem, deps);
  } catch (error) {
    if (error instanceof ImageValidationError) {
      return errorResult(400, error.message);
    }
    console.error('❌ Image processing error:', error);
    return errorResult(500, 'Error processing image');
  }
}
