import express, { type Request, type Response } from 'express';

import { ensureStorageDirectories, resolveStorageLayout } from './config/storage';
import { createArchiveRouter } from './routes/archive';
import { createDownloadRouter } from './routes/download';
import { createLoginRouter } from './routes/login';
import { createTaskRouter } from './routes/tasks';
import type { CommandRegistry } from './services/commandRegistry';
import { createConverterContext, type ConverterContext } from './services/converterContext';
import { TaskManager } from './services/taskManager';
import { WebpageConverter } from './services/webpageConverter';

export interface AppOptions {
  storageRoot?: string;
  commandRegistry?: CommandRegistry;
  timeoutMs?: number;
}

export interface AppContext {
  app: express.Express;
  converter: WebpageConverter;
  converterContext: ConverterContext;
  taskManager: TaskManager;
}

export async function createApp(options: AppOptions = {}): Promise<AppContext> {
  const storage = resolveStorageLayout(options.storageRoot);
  await ensureStorageDirectories(storage);

  const converterContext = await createConverterContext({
    artifactsDirectory: storage.artifactsDir,
    commandRegistry: options.commandRegistry,
    executablePath: process.env.WKHTMLTOPDF_PATH,
    commandLinesFile: process.env.COMMAND_LINES_FILE
  });
  const converter = new WebpageConverter(converterContext, {
    timeoutMs: options.timeoutMs ?? Number(process.env.WKHTMLTOPDF_TIMEOUT_MS ?? 0)
  });
  const taskManager = new TaskManager();

  console.log(`Using storage directory: ${storage.root}`);
  const availability = await converterContext.commandRegistry.getCommandAvailability(converterContext.commandName);
  console.log(`Renderer "${converterContext.commandName}": ${availability.available ? 'available' : availability.errorMessage ?? 'not available'}`);
  console.log(`Renderer timeout: ${converter.getTimeout()}ms`);

  const app = express();
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.use('/archive', createArchiveRouter(converter, taskManager, converterContext.artifactStore));
  app.use('/login', createLoginRouter(converter));
  app.use('/tasks', createTaskRouter(taskManager));
  app.use('/download', createDownloadRouter(taskManager));

  app.get('/health', async (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      renderer: {
        command: converterContext.commandName,
        available: await converter.isAvailable()
      }
    });
  });

  return { app, converter, converterContext, taskManager };
}
