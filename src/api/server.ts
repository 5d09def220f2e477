import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import type { Server } from 'http';
import { isDictationError } from '../errors/DictationError.js';
import type { SessionController } from '../services/SessionController.js';
import type { StatusBoard } from '../services/StatusBoard.js';
import type { FailureKind } from '../types/index.js';

export interface ServerDeps {
  controller: SessionController;
  statusBoard: StatusBoard;
  hotkey: string;
  maxUploadBytes: number;
}

const FAILURE_STATUS_CODES: Record<FailureKind, number> = {
  'device-unavailable': 503,
  'auth-failure': 502,
  'rate-limited': 429,
  'network-timeout': 504,
  'payload-too-large': 413,
  'server-error': 502,
  'delivery-failed': 500,
};

export function createApp(deps: ServerDeps): express.Express {
  const { controller, statusBoard } = deps;
  const app = express();

  // Middleware
  app.use(cors({ origin: /^https?:\/\/(localhost|127\.0\.0\.1)(:\d+)?$/ }));
  app.use(express.json());

  // Uploads stay in memory; they are forwarded as-is to the provider
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: deps.maxUploadBytes,
      files: 1,
    },
  });

  /**
   * Health check endpoint
   */
  app.get('/health', (req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /**
   * Hotkey pressed: start a session unless one is already active
   */
  app.post('/api/hotkey/down', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await controller.handleKeyDown();
      if (result.kind === 'ignored') {
        res.status(409).json({ accepted: false, state: result.state });
        return;
      }
      if (result.kind === 'failed') {
        // The session already ended; report it so the caller does not wait for a key-up
        res.status(FAILURE_STATUS_CODES[result.failure]).json({
          accepted: true,
          state: controller.getState(),
          session: controller.getSession(),
          outcome: result,
        });
        return;
      }
      res.status(202).json({
        accepted: true,
        state: controller.getState(),
        session: controller.getSession(),
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Hotkey released: stop recording and wait for the session to finish
   */
  app.post('/api/hotkey/up', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const outcome = await controller.handleKeyUp();
      if (!outcome) {
        res.status(409).json({ accepted: false, state: controller.getState() });
        return;
      }
      res.json({ accepted: true, outcome });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Current state and the latest status notification
   */
  app.get('/api/status', (req: Request, res: Response) => {
    res.json({
      hotkey: deps.hotkey,
      state: controller.getState(),
      session: controller.getSession(),
      status: statusBoard.getSnapshot(),
    });
  });

  /**
   * Upload an audio file and return its corrected transcript (not pasted)
   */
  app.post('/api/transcribe', upload.single('audio'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.file) {
        res.status(400).json({ error: 'No audio file provided' });
        return;
      }
      const result = await controller.transcribeAudio(req.file.buffer, req.file.originalname || 'upload.wav');
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof multer.MulterError) {
      const status = error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      res.status(status).json({ error: error.message });
      return;
    }
    if (isDictationError(error)) {
      res.status(FAILURE_STATUS_CODES[error.kind]).json({ error: error.message, kind: error.kind });
      return;
    }
    console.error('Request failed:', error);
    res.status(500).json({ error: error instanceof Error ? error.message : 'Unknown error' });
  });

  return app;
}

/**
 * Start server
 */
export function startServer(deps: ServerDeps, port: number, host = '127.0.0.1'): Promise<Server> {
  const app = createApp(deps);

  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      console.log(`Dictation server running on http://${host}:${port}`);
      console.log(`Health check: http://${host}:${port}/health`);
      console.log(`Bind ${deps.hotkey} down/up to POST /api/hotkey/down and /api/hotkey/up`);
      resolve(server);
    });
    server.once('error', reject);
  });
}
