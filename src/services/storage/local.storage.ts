import { mkdir, readFile, rm, stat, writeFile } from 'fs/promises';
import path from 'path';
import { BadRequestError } from '../../utils/errors';
import type { FileStorage } from './file-storage';

export class LocalFileStorage implements FileStorage {
  private readonly root: string;

  constructor(rootDir: string) {
    this.root = path.resolve(rootDir);
  }

  async save(key: string, content: Buffer) {
    const target = this.resolve(key);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content);
    return key;
  }

  read(key: string) {
    return readFile(this.resolve(key));
  }

  async exists(key: string) {
    try {
      const info = await stat(this.resolve(key));
      return info.isFile();
    } catch (err) {
      if (isMissingFile(err)) return false;
      throw err;
    }
  }

  async remove(key: string) {
    await rm(this.resolve(key), { force: true });
  }

  private resolve(key: string) {
    const target = path.resolve(this.root, key);
    if (target !== this.root && !target.startsWith(this.root + path.sep)) {
      throw new BadRequestError('Invalid file path');
    }
    return target;
  }
}

function isMissingFile(err: unknown) {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
