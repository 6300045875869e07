import express, { type Request, type Response } from 'express';

import { ConversionFailedError, ToolUnavailableError } from '../errors';
import { WebpageConverter } from '../services/webpageConverter';
import { isHttpUrl } from './taskPayload';

interface LoginRequestBody {
  url?: unknown;
  loginInfo?: unknown;
}

export function createLoginRouter(converter: WebpageConverter): express.Router {
  const router = express.Router();

  router.post('/', async (req: Request, res: Response) => {
    const body: LoginRequestBody = req.body ?? {};
    const url = typeof body.url === 'string' ? body.url.trim() : '';
    const loginInfo = typeof body.loginInfo === 'string' ? body.loginInfo.trim() : '';

    if (!url || !loginInfo) {
      return res.status(400).json({ message: 'url and loginInfo are required.' });
    }

    if (!isHttpUrl(url)) {
      return res.status(400).json({ message: 'url must be an absolute http or https URL.' });
    }

    if (!(await converter.isAvailable())) {
      const unavailable = new ToolUnavailableError(converter.getCommandName());
      return res.status(503).json({ message: unavailable.message });
    }

    try {
      const cookieJar = await converter.login(url, loginInfo);
      return res.status(201).json({
        message: 'Login completed, use the cookie jar for authenticated captures.',
        cookieJar: { id: cookieJar.id }
      });
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown login error.';
      return res.status(error instanceof ConversionFailedError ? 502 : 500).json({ message: errorMessage });
    }
  });

  return router;
}
