import express, { type ErrorRequestHandler, type Express, type RequestHandler } from 'express';
import cors from 'cors';
import multer from 'multer';

import type { AppConfig } from './config';
import { findDiseaseInfo, knownDiseases, NO_ADDITIONAL_INFO } from './diagnosis/knowledge';
import { buildDiagnosisReport } from './diagnosis/report';
import { DiagnosisError, PayloadTooLargeError } from './errors';
import type { DiagnosisService } from './services/diagnosis.service';

export const API_VERSION = '1.0.0';

export interface AppDeps {
  diagnosis: DiagnosisService;
  config: Pick<AppConfig, 'upload' | 'corsOrigin'>;
}

export function createApp({ diagnosis, config }: AppDeps): Express {
  const app = express();

  // Middleware
  app.use(cors(config.corsOrigin ? { origin: config.corsOrigin } : undefined));
  app.use(express.json());

  // Uploads stay in memory; they are base64-encoded and forwarded, never stored.
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.upload.maxBytes, files: 1 },
  });

  const analyzeUpload: RequestHandler = async (req, res, next) => {
    try {
      if (!req.file) {
        res.status(400).json({ error: 'No image provided', code: 'missing_file' });
        return;
      }
      console.info(`[api] received ${req.file.originalname || 'image'} (${req.file.size} bytes)`);

      const result = await diagnosis.diagnose({
        bytes: req.file.buffer,
        contentType: req.file.mimetype,
        filename: req.file.originalname,
      });

      if (req.query.format === 'report') {
        res.json({ result, report: buildDiagnosisReport(result) });
        return;
      }
      res.json(result);
    } catch (error) {
      next(error);
    }
  };

  app.get('/', (req, res) => {
    res.json({
      message: 'Leaf Disease Detection API',
      version: API_VERSION,
      endpoints: {
        analyze: '/api/analyze (POST, multipart field "image")',
        disease_detection_file: '/disease-detection-file (POST, multipart field "file")',
        diseases: '/api/diseases/:name (GET)',
        health: '/api/health (GET)',
      },
    });
  });

  // Health check
  app.get('/api/health', (req, res) => {
    res.json({ status: 'ok' });
  });

  // Leaf analysis endpoints
  app.post('/api/analyze', upload.single('image'), analyzeUpload);
  app.post('/disease-detection-file', upload.single('file'), analyzeUpload);

  // Disease background text
  app.get('/api/diseases', (req, res) => {
    res.json({ diseases: knownDiseases() });
  });

  app.get('/api/diseases/:name', (req, res) => {
    const info = findDiseaseInfo(req.params.name);
    res.json({ name: req.params.name, known: info !== undefined, info: info ?? NO_ADDITIONAL_INFO });
  });

  app.use(errorHandler(config.upload.maxBytes));

  return app;
}

function errorHandler(maxUploadBytes: number): ErrorRequestHandler {
  return (error: unknown, req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (error instanceof multer.MulterError && error.code !== 'LIMIT_FILE_SIZE') {
      res.status(400).json({ error: error.message, code: error.code.toLowerCase() });
      return;
    }
    const failure = error instanceof multer.MulterError ? new PayloadTooLargeError(maxUploadBytes) : error;

    if (failure instanceof DiagnosisError) {
      const line = `[api] ${req.method} ${req.path} -> ${failure.status} ${failure.code}: ${failure.message}`;
      if (failure.status >= 500) console.error(line);
      else console.warn(line);
      res.status(failure.status).json({ error: failure.message, code: failure.code });
      return;
    }

    console.error(`[api] ${req.method} ${req.path} failed:`, error);
    res.status(500).json({ error: 'Server error' });
  };
}
