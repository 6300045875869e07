import 'dotenv/config';
import http from 'http';

import { createApp } from './app';

const port = Number(process.env.PORT ?? 3100);

async function bootstrap(): Promise<void> {
  try {
    const { app, converter } = await createApp();
    const server = http.createServer(app);

    if (!(await converter.isAvailable())) {
      // eslint-disable-next-line no-console
      console.error(`Warning: "${converter.getCommandName()}" is not available, archive requests will be refused.`);
    }

    server.listen(port, () => {
      // eslint-disable-next-line no-console
      console.log(`Webpage archiver listening on port ${port}`);
      const host = (process.env.HOST ?? 'localhost').trim() || 'localhost';
      // eslint-disable-next-line no-console
      console.log(`Open http://${host}:${port}/health`);
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown startup error';
    // eslint-disable-next-line no-console
    console.error('Failed to start server:', message);
    process.exit(1);
  }
}

void bootstrap();
