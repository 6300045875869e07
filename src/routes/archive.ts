import express, { type Request, type Response } from 'express';
import { randomUUID } from 'crypto';

import { ConversionFailedError, ToolUnavailableError } from '../errors';
import type { ArtifactStore, FileArtifact } from '../services/artifactStore';
import { TaskManager } from '../services/taskManager';
import { WebpageConverter } from '../services/webpageConverter';
import { isHttpUrl, toTaskPayload } from './taskPayload';

interface ArchiveRequestBody {
  url?: unknown;
  fileName?: unknown;
  cookieJar?: unknown;
}

export function createArchiveRouter(
  converter: WebpageConverter,
  taskManager: TaskManager,
  artifactStore: ArtifactStore
): express.Router {
  const router = express.Router();

  router.post('/', async (req: Request, res: Response) => {
    const body: ArchiveRequestBody = req.body ?? {};
    const url = typeof body.url === 'string' ? body.url.trim() : '';
    const fileName = typeof body.fileName === 'string' && body.fileName.trim() ? body.fileName.trim() : undefined;
    const cookieJarId = typeof body.cookieJar === 'string' && body.cookieJar.trim() ? body.cookieJar.trim() : undefined;

    if (!url) {
      return res.status(400).json({ message: 'url is required.' });
    }

    if (!isHttpUrl(url)) {
      return res.status(400).json({ message: 'url must be an absolute http or https URL.' });
    }

    let cookieJar: FileArtifact | undefined;
    if (cookieJarId) {
      cookieJar = await artifactStore.find(cookieJarId, '.jar');
      if (!cookieJar) {
        return res.status(400).json({ message: 'Unknown cookie jar.', cookieJar: cookieJarId });
      }
    }

    if (!(await converter.isAvailable())) {
      const unavailable = new ToolUnavailableError(converter.getCommandName());
      return res.status(503).json({ message: unavailable.message });
    }

    const task = taskManager.createTask({ id: randomUUID(), url, fileName, cookieJarId });

    try {
      const pdf = await converter.convert(url, fileName, cookieJar);
      const completed = taskManager.attachResult(task.id, pdf.path, pdf.fileName) ?? task;

      return res.status(200).json({
        message: 'Webpage archived successfully.',
        task: toTaskPayload(req, completed)
      });
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown conversion error.';
      const failed = taskManager.attachError(task.id, error instanceof ConversionFailedError
        ? { error: errorMessage, exitCode: error.exitCode, timedOut: error.timedOut }
        : { error: errorMessage }) ?? task;

      return res.status(error instanceof ConversionFailedError ? 502 : 500).json({
        message: errorMessage,
        task: toTaskPayload(req, failed)
      });
    }
  });

  return router;
}
