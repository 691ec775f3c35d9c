import { Storage } from '@google-cloud/storage';
import { logger } from '@/lib/logger';
import { TransportError, getErrorMessage } from '@/lib/errors';
import type { ObjectDownloader } from '@/interfaces/video-generation-client.interface';

export interface GcsLocation {
  bucket: string;
  path: string;
}

/**
 * Splits "gs://bucket/path/to/object" into bucket and object path
 */
export function parseGcsUri(uri: string): GcsLocation {
  const match = /^gs:\/\/([^/]+)\/(.+)$/.exec(uri);
  if (!match?.[1] || !match[2]) {
    throw new Error(`Invalid Cloud Storage URI: ${uri}`);
  }
  return { bucket: match[1], path: match[2] };
}

// Cloud Storage service class
export class GcsService implements ObjectDownloader {
  private readonly storage: Storage;

  constructor(credentialsPath: string, projectId: string) {
    this.storage = new Storage({ keyFilename: credentialsPath, projectId });
  }

  /**
   * Download an object fully into memory
   */
  async download(uri: string): Promise<Buffer> {
    const { bucket, path } = parseGcsUri(uri);

    try {
      const [contents] = await this.storage.bucket(bucket).file(path).download();
      logger.info(`File downloaded from Cloud Storage: ${uri}`, { bytes: contents.length });
      return contents;
    } catch (error) {
      const message = getErrorMessage(error);
      logger.error(`Failed to download file from Cloud Storage: ${uri}`, { error: message });
      throw new TransportError(`Failed to download file: ${message}`);
    }
  }
}
