import JSZip from 'jszip';
import { readFile } from 'fs/promises';
import debug from 'debug';
import { Debugger } from 'debug';
import { IoError, IoErrorReason } from './errors';
import { FileData } from './types';

const log: Debugger = debug('quire:archive');

const READ_FAILED = 'Failed to read EPUB file.';

/** A file waiting to be written into the archive on the next save */
type StagedFile =
  | { source: 'file'; localPath: string }
  | { source: 'data'; data: Buffer | string };

// fs errors may come from another realm, so they are checked by shape
function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}

function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

function reasonForCode(code: string | undefined): IoErrorReason {
  switch (code) {
    case 'ENOENT':
      return 'NOT_FOUND';
    case 'EACCES':
    case 'EPERM':
      return 'PERMISSION';
    default:
      return 'UNKNOWN';
  }
}

/**
 * Maps an fs failure to an IoError, prefixing the message with `context`
 */
export function fileSystemError(error: unknown, context: string): IoError {
  const code = isErrnoException(error) ? error.code : undefined;
  const reason = reasonForCode(code);
  switch (reason) {
    case 'NOT_FOUND':
      return new IoError(`${context} No such file.`, reason, code);
    case 'PERMISSION':
      return new IoError(`${context} Permission denied.`, reason, code);
    default:
      return new IoError(`${context} Unknown error (${code ?? errorMessage(error)}).`, reason, code);
  }
}

function zipError(error: unknown): IoError {
  const message = errorMessage(error);
  if (/corrupt/i.test(message)) {
    return new IoError(`${READ_FAILED} Zip archive inconsistent.`, 'INCONSISTENT');
  }
  if (/is this a zip file/i.test(message)) {
    return new IoError(`${READ_FAILED} Not a zip archive.`, 'NOT_A_ZIP');
  }
  return new IoError(`${READ_FAILED} Unknown error (${message}).`, 'UNKNOWN');
}

/**
 * The zip container of an EPUB. Wraps JSZip with path based access and keeps
 * a list of files staged for insertion, which are only read from disk when
 * the archive is flushed for saving.
 */
export class EpubArchive {
  private readonly zip: JSZip;
  private readonly staged = new Map<string, StagedFile>();

  private constructor(zip: JSZip) {
    this.zip = zip;
  }

  /**
   * Opens an EPUB archive from the file system
   * @throws {IoError} If the file is missing, unreadable or not a zip archive
   */
  static async open(location: string): Promise<EpubArchive> {
    let data: Buffer;
    try {
      data = await readFile(location);
    } catch (error) {
      throw fileSystemError(error, READ_FAILED);
    }
    log('read %d bytes from %s', data.length, location);
    return EpubArchive.fromData(data);
  }

  /**
   * Loads an EPUB archive from memory
   * @throws {IoError} If the data is not a readable zip archive
   */
  static async fromData(data: FileData): Promise<EpubArchive> {
    try {
      return new EpubArchive(await JSZip.loadAsync(data));
    } catch (error) {
      throw zipError(error);
    }
  }

  /** Whether a file exists in the archive or is staged for it */
  has(path: string): boolean {
    if (this.staged.has(path)) {
      return true;
    }
    const entry = this.zip.file(path);
    return entry !== null && !entry.dir;
  }

  private async readStaged(file: StagedFile): Promise<Buffer> {
    if (file.source === 'data') {
      return typeof file.data === 'string' ? Buffer.from(file.data, 'utf8') : file.data;
    }
    try {
      return await readFile(file.localPath);
    } catch (error) {
      throw fileSystemError(error, `Failed to read ${file.localPath}.`);
    }
  }

  /**
   * Reads a member, `null` when the archive has no such file. Staged files
   * are returned as they will be written.
   */
  async read(path: string): Promise<Buffer | null> {
    const staged = this.staged.get(path);
    if (staged) {
      return this.readStaged(staged);
    }
    const entry = this.zip.file(path);
    if (!entry || entry.dir) {
      return null;
    }
    return entry.async('nodebuffer');
  }

  async readText(path: string): Promise<string | null> {
    const data = await this.read(path);
    return data === null ? null : data.toString('utf8').replace(/^\uFEFF/, '');
  }

  /** Size in bytes of the uncompressed member, 0 when absent */
  async size(path: string): Promise<number> {
    const data = await this.read(path);
    return data ? data.length : 0;
  }

  write(path: string, content: string | Buffer): void {
    this.zip.file(path, content, { compression: 'DEFLATE' });
  }

  delete(path: string): void {
    this.zip.remove(path);
  }

  /** Paths of all files in the archive, in archive order */
  list(): string[] {
    const paths: string[] = [];
    this.zip.forEach((relativePath, entry) => {
      if (!entry.dir) {
        paths.push(relativePath);
      }
    });
    return paths;
  }

  /**
   * Schedules a file from the local file system to be copied into the archive
   */
  stageFile(path: string, localPath: string): void {
    log('staging %s from %s', path, localPath);
    this.staged.set(path, { source: 'file', localPath });
  }

  stageData(path: string, data: Buffer | string): void {
    log('staging %s', path);
    this.staged.set(path, { source: 'data', data });
  }

  unstage(path: string): boolean {
    return this.staged.delete(path);
  }

  isStaged(path: string): boolean {
    return this.staged.has(path);
  }

  /**
   * Writes every staged file into the archive and empties the staging list
   * @throws {IoError} If a staged local file cannot be read
   */
  async flushStaged(): Promise<void> {
    for (const [path, file] of this.staged) {
      this.write(path, await this.readStaged(file));
      log('flushed %s', path);
    }
    this.staged.clear();
  }

  /**
   * Builds the zip. `mimetype` is kept uncompressed as the OCF requires.
   */
  async generate(): Promise<Buffer> {
    const mimetype = await this.readText('mimetype');
    if (mimetype !== null) {
      this.zip.file('mimetype', mimetype, { compression: 'STORE' });
    }
    return this.zip.generateAsync({
      type: 'nodebuffer',
      compression: 'DEFLATE',
      compressionOptions: {
        level: 9
      }
    });
  }
}
