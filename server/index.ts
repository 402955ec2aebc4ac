/**
 * GEOMETRY TUTOR API SERVER
 *
 * POST /chat           question -> tutor reply, with a diagram when asked to draw
 * POST /process-image  photographed problem -> OCR -> same flow as /chat
 * GET  /health
 */

import express from 'express';
import cors from 'cors';
import { loadConfig, warnMissingKeys } from './config';
import { handleChat, handleImage } from './chat';
import type { ImageDependencies } from './chat';
import { renderDiagram } from './diagrams';
import { logMemoryUsage } from './memoryUsage';
import { createTutorProviders, getTutorResponse } from './tutor';
import { extractTextFromImage } from './visionOcr';

const config = loadConfig();
warnMissingKeys(config);

const providers = createTutorProviders(config);

const deps: ImageDependencies = {
  tutor: (message) => getTutorResponse(message, providers),
  renderer: renderDiagram,
  ocr: (base64Image) => extractTextFromImage(base64Image, config.visionApiKey),
};

const app = express();

app.get('/health', (req, res) => {
  res.status(200).json({ status: 'active', service: 'Geometry Tutor API' });
});

app.use(
  cors({
    origin: config.corsOrigin,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }),
);

app.use(express.json({ limit: '10mb' }));
app.use(logMemoryUsage);

function readString(body: unknown, ...keys: string[]): string | undefined {
  if (typeof body !== 'object' || body === null) {
    return undefined;
  }
  for (const key of keys) {
    const value: unknown = Reflect.get(body, key);
    if (typeof value === 'string' && value.trim()) {
      return value.trim();
    }
  }
  return undefined;
}

app.post('/chat', async (req, res) => {
  const message = readString(req.body, 'user_message', 'message');
  if (!message) {
    res.status(400).json({ type: 'error', content: 'Please enter a question.' });
    return;
  }

  const result = await handleChat(message, deps);
  res.status(result.status).json(result.body);
});

app.post('/process-image', async (req, res) => {
  const imageUri = readString(req.body, 'imageUri');
  if (!imageUri) {
    res.status(400).json({ type: 'error', content: 'No image provided' });
    return;
  }

  const result = await handleImage(imageUri, deps);
  res.status(result.status).json(result.body);
});

app.listen(config.port, '0.0.0.0', () => {
  console.log(`🚀 Geometry tutor API running on port ${config.port}`);
});
