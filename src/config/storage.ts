import fs from 'fs';
import path from 'path';

export interface StorageLayout {
  root: string;
  artifactsDir: string;
}

export function resolveStorageLayout(root: string = process.env.STORAGE_DIR ?? path.resolve(process.cwd(), 'storage')): StorageLayout {
  const storageRoot = path.resolve(root);
  return {
    root: storageRoot,
    artifactsDir: path.join(storageRoot, 'artifacts')
  };
}

export async function ensureStorageDirectories(layout: StorageLayout): Promise<void> {
  await Promise.all([
    fs.promises.mkdir(layout.root, { recursive: true }),
    fs.promises.mkdir(layout.artifactsDir, { recursive: true })
  ]);
}
