import type { CanonicalParameters, RawParameters } from './geometry';

export type {
  AngleTriple,
  CanonicalParameters,
  CanonicalShape,
  NormalizationResult,
  ParameterValue,
  RawParameters,
  ShapeKey,
  TrigFunction,
} from './geometry';

/** Tutor proposed a shape; parameters are untrusted until normalized. */
export interface ShapeReply {
  shape: string;
  parameters: RawParameters;
  explanation: string;
}

/** Tutor answered in prose only. */
export interface TextReply {
  response: string;
}

export type TutorReply = ShapeReply | TextReply;

export function isShapeReply(reply: TutorReply): reply is ShapeReply {
  return 'shape' in reply;
}

export interface RenderedImage {
  /** Base64 payload without a data-URI prefix. */
  base64: string;
  mimeType: 'image/png' | 'image/svg+xml';
}

export interface VisualResponse {
  type: 'visual';
  explanation: string;
  image: string;
  mimeType: RenderedImage['mimeType'];
  parameters: CanonicalParameters;
  measurements: Record<string, number>;
}

export interface TextResponse {
  type: 'text';
  content: string;
}

export interface ErrorResponse {
  type: 'error';
  content: string;
}

export type ChatResponse = VisualResponse | TextResponse | ErrorResponse;

export interface ChatResult {
  status: number;
  body: ChatResponse;
}
