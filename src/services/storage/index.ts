import type { AppConfig } from '../../config';
import { AzureBlobFileStorage } from './azure-blob.storage';
import type { FileStorage } from './file-storage';
import { LocalFileStorage } from './local.storage';

export type { FileStorage } from './file-storage';
export { LocalFileStorage } from './local.storage';

export function createFileStorage(storage: AppConfig['storage']): FileStorage {
  if (storage.driver === 'azure') {
    return new AzureBlobFileStorage(storage.azureConnectionString, storage.azureContainerName);
  }
  return new LocalFileStorage(storage.uploadDir);
}
