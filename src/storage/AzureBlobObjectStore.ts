import { BlobServiceClient, ContainerClient, RestError } from '@azure/storage-blob';
import { ObjectStore, StoredObject } from './ObjectStore';

const isNotFound = (e: unknown) => e instanceof RestError && e.statusCode === 404;

export class AzureBlobObjectStore implements ObjectStore {
  public readonly name = 'azure-blob';
  private readonly container: ContainerClient;
  private ensured?: Promise<void>;

  constructor(client: BlobServiceClient, containerName: string) {
    this.container = client.getContainerClient(containerName);
  }

  public static fromConnectionString(connectionString: string, containerName: string): AzureBlobObjectStore {
    return new AzureBlobObjectStore(BlobServiceClient.fromConnectionString(connectionString), containerName);
  }

  public async put(key: string, body: string): Promise<void> {
    await this.ensureContainer();
    const blockBlobClient = this.container.getBlockBlobClient(key);
    await blockBlobClient.upload(body, Buffer.byteLength(body), {
      blobHTTPHeaders: { blobContentType: 'application/json' },
    });
  }

  public async list(prefix: string): Promise<StoredObject[]> {
    const objects: StoredObject[] = [];
    try {
      for await (const blob of this.container.listBlobsFlat({ prefix })) {
        objects.push({ key: blob.name, lastModified: blob.properties.lastModified.getTime() });
      }
    } catch (e) {
      // Container not created yet: nothing has been written.
      if (isNotFound(e)) return [];
      throw e;
    }
    return objects;
  }

  public async get(key: string): Promise<string | null> {
    try {
      const buffer = await this.container.getBlobClient(key).downloadToBuffer();
      return buffer.toString('utf8');
    } catch (e) {
      if (isNotFound(e)) return null;
      throw e;
    }
  }

  private ensureContainer(): Promise<void> {
    this.ensured ??= this.container.createIfNotExists().then(() => undefined);
    return this.ensured;
  }
}
