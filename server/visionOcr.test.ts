import assert from 'node:assert/strict';
import { test } from 'node:test';
import { extractMathProblem, extractTextFromImage, formatOCRText, prepareImageForVision } from './visionOcr';

interface RecordedRequest {
  url: string;
  body: string;
}

function fakeFetch(status: number, payload: unknown, requests: RecordedRequest[] = []): typeof fetch {
  return async (input, init) => {
    requests.push({ url: String(input), body: typeof init?.body === 'string' ? init.body : '' });
    return new Response(JSON.stringify(payload), { status, headers: { 'Content-Type': 'application/json' } });
  };
}

test('data URIs are split into MIME type, payload and size', () => {
  assert.deepEqual(prepareImageForVision('data:image/png;base64,aGVsbG8='), {
    mimeType: 'image/png',
    base64: 'aGVsbG8=',
    sizeBytes: 5,
  });
  assert.throws(() => prepareImageForVision('data:image/png;base64,'), { message: 'Invalid base64 image data' });
  assert.throws(() => prepareImageForVision('data:image/png;base64,' + 'A'.repeat(7_000_000)), {
    message: 'File too large (max 5MB)',
  });
});

test('OCR text comes back trimmed with the mean word confidence', async () => {
  const requests: RecordedRequest[] = [];
  const payload = {
    responses: [
      {
        fullTextAnnotation: {
          text: '  Find the area of a circle with radius 4\n',
          pages: [{ blocks: [{ paragraphs: [{ words: [{ confidence: 0.5 }, { confidence: 1 }] }] }] }],
        },
      },
    ],
  };

  const result = await extractTextFromImage('aGVsbG8=', 'test-key', fakeFetch(200, payload, requests));
  assert.deepEqual(result, { text: 'Find the area of a circle with radius 4', confidence: 0.75 });
  assert.equal(requests.length, 1);
  assert.ok(requests[0].url.endsWith('images:annotate?key=test-key'));
  assert.ok(requests[0].body.includes('"DOCUMENT_TEXT_DETECTION"'));
});

test('an image without text resolves with empty text', async () => {
  assert.deepEqual(await extractTextFromImage('aGVsbG8=', 'test-key', fakeFetch(200, { responses: [{}] })), {
    text: '',
    confidence: 0,
  });
});

test('OCR failures are described', async () => {
  await assert.rejects(extractTextFromImage('aGVsbG8=', undefined, fakeFetch(200, {})), /GOOGLE_CLOUD_VISION_API_KEY/);
  await assert.rejects(extractTextFromImage('aGVsbG8=', 'test-key', fakeFetch(403, {})), {
    message: 'Google Vision API authentication failed. Check API key permissions.',
  });
  await assert.rejects(
    extractTextFromImage('aGVsbG8=', 'test-key', fakeFetch(200, { responses: [{ error: { message: 'Bad image' } }] })),
    { message: 'Vision API error: Bad image' },
  );
});

test('formatOCRText collapses spaces and blank lines', () => {
  assert.equal(formatOCRText('  a   b\n\n\n\nc '), 'a b\n\nc');
});

test('extractMathProblem keeps only mathematical text', () => {
  assert.equal(extractMathProblem('hello world'), null);
  assert.equal(extractMathProblem('   '), null);
  assert.equal(extractMathProblem('Find the AREA of the circle'), 'Find the AREA of the circle');
  assert.equal(extractMathProblem('x = 5'), 'x = 5');
});
