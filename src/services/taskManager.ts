import { ArchiveTask, TaskStatus } from '../types/task';

export interface CreateTaskPayload {
  id: string;
  url: string;
  fileName?: string;
  cookieJarId?: string;
}

export interface TaskFailure {
  error: string;
  exitCode?: number | null;
  timedOut?: boolean;
}

export class TaskManager {
  private readonly tasks = new Map<string, ArchiveTask>();

  createTask(payload: CreateTaskPayload): ArchiveTask {
    const task: ArchiveTask = {
      ...payload,
      status: 'processing',
      createdAt: new Date(),
      updatedAt: new Date()
    };

    this.tasks.set(payload.id, task);
    return task;
  }

  updateStatus(id: string, status: TaskStatus, updates: Partial<ArchiveTask> = {}): ArchiveTask | undefined {
    const task = this.tasks.get(id);
    if (!task) {
      return undefined;
    }

    const nextTask: ArchiveTask = {
      ...task,
      ...updates,
      status,
      updatedAt: new Date()
    };

    this.tasks.set(id, nextTask);
    return nextTask;
  }

  attachResult(id: string, outputPath: string, fileName: string): ArchiveTask | undefined {
    return this.updateStatus(id, 'completed', { outputPath, fileName });
  }

  attachError(id: string, failure: TaskFailure): ArchiveTask | undefined {
    return this.updateStatus(id, 'failed', failure);
  }

  getTask(id: string): ArchiveTask | undefined {
    return this.tasks.get(id);
  }
}
