import type { Request } from 'express';

import { ArchiveTask } from '../types/task';

export function buildDownloadUrl(req: Request, taskId: string): string | undefined {
  const host = req.get('host');

  if (!host) {
    return undefined;
  }

  const protocol = req.protocol;
  const base = `${protocol}://${host}`;

  try {
    return new URL(`download/${encodeURIComponent(taskId)}`, base).toString();
  } catch (_error) {
    return undefined;
  }
}

export function toTaskPayload(req: Request, task: ArchiveTask) {
  const downloadUrl = task.status === 'completed' && task.outputPath
    ? buildDownloadUrl(req, task.id)
    : undefined;

  return {
    id: task.id,
    status: task.status,
    url: task.url,
    fileName: task.fileName,
    cookieJar: task.cookieJarId,
    error: task.error,
    exitCode: task.exitCode,
    timedOut: task.timedOut,
    createdAt: task.createdAt,
    updatedAt: task.updatedAt,
    downloadUrl
  };
}

export function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch (_error) {
    return false;
  }
}
