import { open } from 'node:fs/promises';
import { basename } from 'node:path';
import { FilePayloadError } from '../error/filePayloadError.js';
import { safeWrapAsync } from '../utils/wrap.js';

/** Multipart field the service reads uploads from. */
export const FILE_FIELD = 'file';

/** Content type every upload is tagged with. */
export const FILE_CONTENT_TYPE = 'application/octet-stream';

/** The part of a file handle an upload needs. */
export interface ReadableFile {
  readFile(): Promise<Uint8Array>;
  close(): Promise<void>;
}

/** Opens a file for reading. */
export type OpenFile = (path: string) => Promise<ReadableFile>;

const openForRead: OpenFile = (path) => open(path, 'r');

/** Options for {@link withFilePayload}. */
export interface FilePayloadOptions {
  /** Opens the file. Defaults to `fs.promises.open` in read mode. */
  openFile?: OpenFile;
  /** Receives the error of a handle that failed to close. The upload's outcome stands either way. */
  onCloseError?: (error: Error) => void;
}

/**
 * Reads the file at `path` into a single-part multipart form and hands it to `send`.
 *
 * The file handle is held only for the duration of the call and closed once `send`
 * settles, whether it resolved or rejected.
 *
 * @throws {FilePayloadError} when the file cannot be opened or read; never collapsed into a `null` result.
 */
export async function withFilePayload<T>(
  path: string,
  send: (form: FormData) => Promise<T>,
  { openFile = openForRead, onCloseError }: FilePayloadOptions = {},
): Promise<T> {
  const [errOpen, handle] = await safeWrapAsync(() => openFile(path));
  if (errOpen) {
    throw new FilePayloadError(`error opening ${path} for upload`, path, { cause: errOpen });
  }

  try {
    const [errRead, contents] = await safeWrapAsync(() => handle.readFile());
    if (errRead) {
      throw new FilePayloadError(`error reading ${path} for upload`, path, { cause: errRead });
    }

    const form = new FormData();
    form.append(FILE_FIELD, new Blob([contents], { type: FILE_CONTENT_TYPE }), basename(path));
    return await send(form);
  } finally {
    const [errClose] = await safeWrapAsync(() => handle.close());
    if (errClose) {
      onCloseError?.(new FilePayloadError(`error closing ${path} after upload`, path, { cause: errClose }));
    }
  }
}

/**
 * Serializes a JSON payload together with its content-type header.
 */
export function jsonPayload(body: Record<string, string>): { body: string; headers: Record<string, string> } {
  return {
    body: JSON.stringify(body),
    headers: { 'content-type': 'application/json' },
  };
}
