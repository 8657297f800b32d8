export interface StoredObject {
  buffer: Buffer;
  contentType: string;
}

/**
 * Replaces the MinIO-backed StorageService. Keys are `{folder}/{n}-{name}`
 * with a running counter so tests can predict them.
 */
export class FakeStorageService {
  readonly objects = new Map<string, StoredObject>();
  private sequence = 0;

  async uploadFile(
    folder: string,
    buffer: Buffer,
    originalName: string,
    mimeType: string,
  ): Promise<string> {
    this.sequence += 1;
    const key = `${folder}/${this.sequence}-${originalName}`;
    this.objects.set(key, { buffer, contentType: mimeType });
    return key;
  }

  async removeFile(objectKey: string): Promise<void> {
    this.objects.delete(objectKey);
  }
}
