import express, { type Request, type Response } from 'express';

import { TaskManager } from '../services/taskManager';
import { toTaskPayload } from './taskPayload';

export function createTaskRouter(taskManager: TaskManager): express.Router {
  const router = express.Router();

  router.get('/:taskId', (req: Request, res: Response) => {
    const { taskId } = req.params;
    const task = taskManager.getTask(taskId);

    if (!task) {
      return res.status(404).json({ message: 'Task not found.' });
    }

    return res.json({ task: toTaskPayload(req, task) });
  });

  return router;
}
