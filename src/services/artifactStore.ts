import { randomUUID } from 'crypto';
import fs from 'fs';
import path from 'path';

export interface FileArtifact {
  /** File name inside the store directory, used as the public identifier. */
  id: string;
  path: string;
  /** Name presented to whoever downloads the artifact. */
  fileName: string;
  extension: string;
}

export interface ArtifactStore {
  create(extension: string, fileName?: string): Promise<FileArtifact>;
  find(id: string, extension?: string): Promise<FileArtifact | undefined>;
}

/**
 * Allocates empty files in a single directory. Files are never removed here:
 * whoever receives an artifact owns it.
 */
export class TempArtifactStore implements ArtifactStore {
  constructor(private readonly directory: string) {}

  async create(extension: string, fileName?: string): Promise<FileArtifact> {
    const normalizedExtension = this.normalizeExtension(extension);
    await fs.promises.mkdir(this.directory, { recursive: true });

    const id = `${Date.now()}-${randomUUID()}${normalizedExtension}`;
    const filePath = path.join(this.directory, id);
    await fs.promises.writeFile(filePath, '');

    return {
      id,
      path: filePath,
      fileName: fileName ?? id,
      extension: normalizedExtension
    };
  }

  async find(id: string, extension?: string): Promise<FileArtifact | undefined> {
    if (!id || id !== path.basename(id) || id === '.' || id === '..') {
      return undefined;
    }

    const fileExtension = path.extname(id);
    if (extension && fileExtension !== this.normalizeExtension(extension)) {
      return undefined;
    }

    const filePath = path.join(this.directory, id);
    const stats = await fs.promises.stat(filePath).catch(() => undefined);
    if (!stats?.isFile()) {
      return undefined;
    }

    return { id, path: filePath, fileName: id, extension: fileExtension };
  }

  private normalizeExtension(extension: string): string {
    const trimmed = extension.trim().toLowerCase();
    return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
  }
}
