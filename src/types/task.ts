export type TaskStatus = 'processing' | 'completed' | 'failed';

export interface ArchiveTask {
  id: string;
  url: string;
  fileName?: string;
  cookieJarId?: string;
  status: TaskStatus;
  createdAt: Date;
  updatedAt: Date;
  outputPath?: string;
  error?: string;
  exitCode?: number | null;
  timedOut?: boolean;
}
