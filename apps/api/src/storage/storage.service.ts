import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as Minio from 'minio';
import { randomUUID } from 'crypto';
import { getNumber } from '../common/config/config-values';
import { StorageRemoveException, StorageUploadException } from './storage.exceptions';

/** Max length of the sanitized file name suffix in the object key */
const MAX_FILENAME_LENGTH = 100;

/**
 * StorageService: object storage for user-uploaded files (avatars).
 *
 * Backed by MinIO (S3-compatible). Callers only see object keys, so the
 * backend can be swapped for S3 without touching them.
 *
 * Object key pattern:  {folder}/{uuid}-{sanitized-filename}
 * Example:             avatars/f3a2b1c0-me.png
 */
@Injectable()
export class StorageService implements OnModuleInit {
  private readonly logger = new Logger(StorageService.name);
  private client!: Minio.Client;
  private readonly bucket: string;
  private readonly endpoint: string;
  private readonly port: number;
  private readonly useSSL: boolean;

  constructor(private readonly configService: ConfigService) {
    this.endpoint = this.configService.get<string>('MINIO_ENDPOINT', 'localhost');
    this.port = getNumber(this.configService, 'MINIO_PORT', 9000);
    this.useSSL = this.configService.get<string>('MINIO_USE_SSL', 'false') === 'true';
    this.bucket = this.configService.get<string>('MINIO_BUCKET', 'taskapi-uploads');
  }

  async onModuleInit(): Promise<void> {
    const accessKey = this.configService.get<string>('MINIO_ACCESS_KEY', 'minioadmin');
    const secretKey = this.configService.get<string>('MINIO_SECRET_KEY', 'minioadmin_secret');

    this.client = new Minio.Client({
      endPoint: this.endpoint,
      port: this.port,
      useSSL: this.useSSL,
      accessKey,
      secretKey,
    });

    await this.ensureBucketExists();
    this.logger.log(
      `StorageService ready, bucket: "${this.bucket}" @ ${this.endpoint}:${this.port}`,
    );
  }

  /**
   * Uploads a file buffer and returns its object key.
   *
   * @throws StorageUploadException on any MinIO error
   */
  async uploadFile(
    folder: string,
    buffer: Buffer,
    originalName: string,
    mimeType: string,
  ): Promise<string> {
    const objectKey = this.buildObjectKey(folder, originalName);
    const metadata = { 'Content-Type': mimeType };

    this.logger.debug(`Uploading ${objectKey} (${buffer.length} bytes)`);

    try {
      await this.client.putObject(this.bucket, objectKey, buffer, buffer.length, metadata);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Failed to upload "${objectKey}" to MinIO: ${cause.message}`);
      throw new StorageUploadException(originalName, cause);
    }

    this.logger.log(`Uploaded "${objectKey}" (${buffer.length} bytes)`);
    return objectKey;
  }

  /**
   * Deletes an object. Removing a key that no longer exists is not an error.
   *
   * @throws StorageRemoveException on any other MinIO error
   */
  async removeFile(objectKey: string): Promise<void> {
    try {
      await this.client.removeObject(this.bucket, objectKey);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Failed to remove "${objectKey}" from MinIO: ${cause.message}`);
      throw new StorageRemoveException(objectKey, cause);
    }

    this.logger.log(`Removed "${objectKey}"`);
  }

  // ── Helpers ────────────────────────────────────────────────

  private buildObjectKey(folder: string, originalName: string): string {
    return `${folder}/${randomUUID()}-${this.sanitizeFilename(originalName)}`;
  }

  /**
   * Strips path traversal characters and whitespace, and truncates
   * to MAX_FILENAME_LENGTH characters.
   */
  private sanitizeFilename(filename: string): string {
    return filename
      .replace(/[^a-zA-Z0-9._-]/g, '_')
      .slice(0, MAX_FILENAME_LENGTH)
      .toLowerCase();
  }

  private async ensureBucketExists(): Promise<void> {
    try {
      const exists = await this.client.bucketExists(this.bucket);
      if (!exists) {
        await this.client.makeBucket(this.bucket, 'us-east-1');
        this.logger.log(`Created bucket "${this.bucket}"`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to ensure bucket "${this.bucket}" exists: ${message}`);
      // Non-fatal during init: uploads fail with StorageUploadException
    }
  }
}
