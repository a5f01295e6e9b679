import { openAsBlob } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';

/** Anything that can be uploaded: a file path, bytes, a Blob (or File) or an open file handle. */
export type UploadSource = string | Blob | Uint8Array | ArrayBuffer | FileHandle;

/** Fallback when no content type is given and none can be inferred. */
export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

/** Content types by file extension, for uploads without an explicit type. */
const CONTENT_TYPES: Record<string, string> = {
  '.bmp': 'image/bmp',
  '.gif': 'image/gif',
  '.heic': 'image/heic',
  '.jpeg': 'image/jpeg',
  '.jpg': 'image/jpeg',
  '.png': 'image/png',
  '.tif': 'image/tiff',
  '.tiff': 'image/tiff',
  '.webp': 'image/webp',
  '.3gp': 'video/3gpp',
  '.avi': 'video/x-msvideo',
  '.mkv': 'video/x-matroska',
  '.mov': 'video/quicktime',
  '.mp4': 'video/mp4',
  '.mpeg': 'video/mpeg',
  '.mpg': 'video/mpeg',
  '.webm': 'video/webm',
  '.wmv': 'video/x-ms-wmv',
};

/**
 * Checks for an open `node:fs/promises` file handle.
 */
export function isFileHandle(value: unknown): value is FileHandle {
  return (
    typeof value === 'object' &&
    value !== null &&
    'fd' in value &&
    typeof value.fd === 'number' &&
    'readFile' in value &&
    typeof value.readFile === 'function'
  );
}

/**
 * Checks whether a value can be wrapped by {@link UploadableIO}.
 */
export function isUploadSource(value: unknown): value is UploadSource {
  return (
    typeof value === 'string' ||
    value instanceof Blob ||
    value instanceof Uint8Array ||
    value instanceof ArrayBuffer ||
    isFileHandle(value)
  );
}

/**
 * Guesses a content type from a file name's extension.
 */
export function contentTypeFor(filename: string): string {
  return CONTENT_TYPES[extname(filename).toLowerCase()] ?? DEFAULT_CONTENT_TYPE;
}

/**
 * Byte source for uploads. Holds on to the source as given and only produces
 * the bytes (as a `Blob`) when the transport builds the multipart body; paths
 * are opened with `fs.openAsBlob`, so file contents are not read up front.
 */
export class UploadableIO {
  /** Source as handed in */
  #source: UploadSource;

  /** Content type sent along with the file part */
  readonly contentType: string;
  /** File name sent along with the file part */
  readonly filename: string;

  /**
   * @param source - File path, bytes, Blob or open file handle.
   * @param contentType - Explicit content type; otherwise taken from the Blob, then from the file extension.
   * @param filename - Explicit file name; otherwise taken from the path or File name.
   */
  constructor(source: UploadSource, contentType?: string, filename?: string) {
    this.#source = source;
    this.filename = filename ?? UploadableIO.#filenameOf(source);
    this.contentType = contentType || UploadableIO.#contentTypeOf(source, this.filename);
  }

  /** Source as handed in */
  get source(): UploadSource {
    return this.#source;
  }

  /**
   * Materializes the upload as a `Blob` carrying {@link UploadableIO.contentType}.
   */
  async toBlob(): SafeWrapAsync<Error, Blob> {
    const source = this.#source;
    const type = this.contentType;

    if (typeof source === 'string') {
      // Unreadable paths either reject or resolve with the read error, depending on the Node release.
      const [err, blob] = await safeWrapAsync<Error, unknown>(() => openAsBlob(source, { type }));
      if (err || !(blob instanceof Blob)) {
        return [new Error(`error opening upload ${source}`, { cause: err ?? blob }), null];
      }

      return [null, blob];
    }

    if (source instanceof Blob) {
      return [null, source.type === type ? source : source.slice(0, source.size, type)];
    }

    if (source instanceof Uint8Array || source instanceof ArrayBuffer) {
      return [null, new Blob([source], { type })];
    }

    const [err, buffer] = await safeWrapAsync(() => source.readFile());
    if (err) {
      return [new Error(`error reading upload from file handle ${source.fd}`, { cause: err }), null];
    }

    return [null, new Blob([buffer], { type })];
  }

  static #filenameOf(source: UploadSource): string {
    if (typeof source === 'string') {
      return basename(source);
    }

    if (source instanceof Blob && 'name' in source && typeof source.name === 'string' && source.name) {
      return source.name;
    }

    return 'upload';
  }

  static #contentTypeOf(source: UploadSource, filename: string): string {
    if (source instanceof Blob && source.type) {
      return source.type;
    }

    return contentTypeFor(filename);
  }
}
