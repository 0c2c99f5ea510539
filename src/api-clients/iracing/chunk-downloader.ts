/**
 * Bulk dataset downloads from pre-signed blob storage chunks.
 * Chunks are plain JSON or gzip-compressed JSON arrays.
 */

import { AxiosResponse } from 'axios';
import { gunzipSync } from 'zlib';
import { z } from 'zod';
import { logger } from '../../utils/logger';
import { decodeUtf8, describeTransportError, HttpClient } from './http';
import {
  ChunkDescriptor,
  DownloadChunksOptions,
  failure,
  IRacingAPIError,
  JsonValue,
  Result,
  success
} from './types';

const ChunkInfoSchema = z.object({
  base_download_url: z.string().min(1),
  chunk_file_names: z.array(z.string().min(1)).min(1),
  rows: z.number().int().nonnegative().optional()
});

/**
 * Converts the API's `chunk_info` object into a ChunkDescriptor
 */
export function parseChunkInfo(payload: unknown): Result<ChunkDescriptor> {
  const parsed = ChunkInfoSchema.safeParse(payload);
  if (!parsed.success) {
    return failure('Invalid chunk_info payload', 'MALFORMED_PAYLOAD', undefined, parsed.error.issues);
  }

  return success({
    baseDownloadUrl: parsed.data.base_download_url,
    chunkFileNames: parsed.data.chunk_file_names,
    rows: parsed.data.rows
  });
}

/**
 * Decodes chunk bytes: plain UTF-8 JSON first, then gzip-compressed JSON.
 * Invalid UTF-8 counts as a decode failure, not as replacement characters.
 */
export function decodeChunk(bytes: Buffer): Result<JsonValue[]> {
  let value: JsonValue;
  try {
    value = JSON.parse(decodeUtf8(bytes));
  } catch {
    try {
      value = JSON.parse(decodeUtf8(gunzipSync(bytes)));
    } catch (error) {
      return failure(
        'Chunk is neither JSON nor gzip-compressed JSON',
        'MALFORMED_PAYLOAD',
        undefined,
        error instanceof Error ? error.message : String(error)
      );
    }
  }

  if (!Array.isArray(value)) {
    return failure('Chunk does not contain a JSON array', 'MALFORMED_PAYLOAD');
  }
  return success(value);
}

export class ChunkDownloader {
  constructor(private http: HttpClient) {}

  /**
   * Downloads the first chunk of a dataset, or every chunk with `allChunks`
   */
  async download(
    descriptor: ChunkDescriptor,
    options: DownloadChunksOptions = {}
  ): Promise<Result<JsonValue[]>> {
    this.assertDescriptor(descriptor);

    const fileNames = options.allChunks
      ? descriptor.chunkFileNames
      : descriptor.chunkFileNames.slice(0, 1);

    const records: JsonValue[] = [];
    for (const fileName of fileNames) {
      const chunk = await this.fetchChunk(descriptor.baseDownloadUrl + fileName);
      if (!chunk.ok) {
        return chunk;
      }
      records.push(...chunk.value);
    }

    logger.debug('Downloaded iRacing chunk data', {
      chunks: fileNames.length,
      totalChunks: descriptor.chunkFileNames.length,
      records: records.length
    });

    return success(records);
  }

  private async fetchChunk(url: string): Promise<Result<JsonValue[]>> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(url, { responseType: 'arraybuffer' });
    } catch (error) {
      logger.error('iRacing chunk download failed', { url, ...describeTransportError(error) });
      return failure('Chunk download failed', 'TRANSPORT_ERROR', undefined, describeTransportError(error));
    }

    if (response.status !== 200) {
      logger.error('iRacing chunk download rejected', { url, status: response.status });
      return failure(`Chunk download returned ${response.status}`, 'HTTP_ERROR', response.status);
    }

    const bytes = toBuffer(response.data);
    if (!bytes) {
      return failure('Chunk response has no binary body', 'MALFORMED_PAYLOAD');
    }

    const decoded = decodeChunk(bytes);
    if (!decoded.ok) {
      logger.error('iRacing chunk could not be decoded', { url, reason: decoded.error.message });
    }
    return decoded;
  }

  private assertDescriptor(descriptor: ChunkDescriptor): void {
    if (!descriptor.baseDownloadUrl || descriptor.chunkFileNames.length === 0) {
      throw new IRacingAPIError(
        'Chunk descriptor needs a base URL and at least one file name',
        'INVALID_CHUNK_DESCRIPTOR'
      );
    }
  }
}

function toBuffer(data: unknown): Buffer | undefined {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (data instanceof Uint8Array) return Buffer.from(data);
  if (typeof data === 'string') return Buffer.from(data, 'utf8');
  return undefined;
}
