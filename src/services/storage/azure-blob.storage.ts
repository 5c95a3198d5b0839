import { BlobServiceClient, ContainerClient } from '@azure/storage-blob';
import type { FileStorage } from './file-storage';

export class AzureBlobFileStorage implements FileStorage {
  private readonly container: ContainerClient;
  private containerReady?: Promise<unknown>;

  constructor(connectionString: string, containerName: string) {
    this.container = BlobServiceClient.fromConnectionString(connectionString).getContainerClient(containerName);
  }

  async save(key: string, content: Buffer, contentType?: string) {
    if (!this.containerReady) {
      this.containerReady = this.container.createIfNotExists().catch((err: unknown) => {
        this.containerReady = undefined;
        throw err;
      });
    }
    await this.containerReady;

    await this.container.getBlockBlobClient(key).uploadData(content, {
      blobHTTPHeaders: contentType ? { blobContentType: contentType } : undefined,
    });
    return key;
  }

  read(key: string) {
    return this.container.getBlockBlobClient(key).downloadToBuffer();
  }

  exists(key: string) {
    return this.container.getBlockBlobClient(key).exists();
  }

  async remove(key: string) {
    await this.container.getBlockBlobClient(key).deleteIfExists();
  }
}
