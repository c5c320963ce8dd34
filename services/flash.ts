import { constants } from 'node:fs';
import { open, type FileHandle } from 'node:fs/promises';
import type { Readable } from 'node:stream';
import { DEFAULT_CHUNK_SIZE } from './config.js';
import { CancelledError, FlashError, VerificationError, describeError, errnoOf, isFlasherError } from './errors.js';
import { openImage, type ImageSource } from './image.js';
import { createLogger } from './log.js';

const { log, err } = createLogger('flash');

export type ProgressCallback = (current: number, total: number | null) => void;
export type StatusCallback = (message: string) => void;

export type WriteOptions = {
  chunkSize?: number;
  dryRun?: boolean;
  onProgress?: ProgressCallback;
  onStatus?: StatusCallback;
  signal?: AbortSignal;
};

export type VerifyOptions = Omit<WriteOptions, 'dryRun'>;

export type FlashOptions = WriteOptions & {
  verify?: boolean;
  /** Por defecto, onProgress. */
  onVerifyProgress?: ProgressCallback;
};

function checkChunkSize(chunkSize: number): number {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  return chunkSize;
}

function checkCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new CancelledError();
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof Uint8Array) return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  return Buffer.from(String(data));
}

/** Re-corta `stream` en buffers de exactamente `chunkSize` bytes; solo el último puede ser menor. */
export async function* readChunks(stream: Readable, chunkSize: number): AsyncGenerator<Buffer> {
  let pending: Buffer[] = [];
  let pendingLength = 0;
  for await (const data of stream) {
    let buf = toBuffer(data);
    while (buf.length > 0) {
      const need = chunkSize - pendingLength;
      if (buf.length < need) {
        pending.push(buf);
        pendingLength += buf.length;
        break;
      }
      pending.push(buf.subarray(0, need));
      yield Buffer.concat(pending, chunkSize);
      pending = [];
      pendingLength = 0;
      buf = buf.subarray(need);
    }
  }
  if (pendingLength > 0) yield Buffer.concat(pending, pendingLength);
}

function openFailureMessage(e: unknown, devicePath: string, action: 'opening' | 'reading'): string {
  switch (errnoOf(e)) {
    case 'EACCES':
    case 'EPERM':
      return `Permission denied when ${action} ${devicePath}. Try running as root.`;
    case 'ENOENT':
      return `Device not found: ${devicePath}`;
    default:
      return action === 'opening'
        ? `Unable to open device ${devicePath}: ${describeError(e)}`
        : `Unable to read ${devicePath}: ${describeError(e)}`;
  }
}

interface ChunkSink {
  write(chunk: Buffer, offset: number): Promise<void>;
  close(): Promise<void>;
}

/** Destino del dry run: no guarda nada. */
class DiscardSink implements ChunkSink {
  async write(): Promise<void> {}
  async close(): Promise<void> {}
}

class DeviceSink implements ChunkSink {
  private constructor(
    private readonly fh: FileHandle,
    private readonly devicePath: string,
  ) {}

  static async open(devicePath: string): Promise<DeviceSink> {
    try {
      return new DeviceSink(await open(devicePath, constants.O_RDWR | constants.O_SYNC), devicePath);
    } catch (e) {
      throw new FlashError(openFailureMessage(e, devicePath, 'opening'), devicePath, { cause: e });
    }
  }

  async write(chunk: Buffer, offset: number): Promise<void> {
    try {
      let done = 0;
      while (done < chunk.length) {
        const { bytesWritten } = await this.fh.write(chunk, done, chunk.length - done, offset + done);
        done += bytesWritten;
      }
    } catch (e) {
      throw new FlashError(
        `Write failed on ${this.devicePath} at offset ${offset}: ${describeError(e)}`,
        this.devicePath,
        { cause: e },
      );
    }
    try {
      await this.fh.sync();
    } catch (e) {
      // no todos los dispositivos implementan fsync
      log(`fsync on ${this.devicePath} ignored: ${describeError(e)}`);
    }
  }

  async close(): Promise<void> {
    try {
      await this.fh.close();
    } catch (e) {
      err(`closing ${this.devicePath} failed: ${describeError(e)}`);
    }
  }
}

/**
 * Copia la imagen decodificada sobre `devicePath` chunk a chunk, con sync
 * después de cada uno. En dry run el dispositivo ni se abre.
 */
export async function writeImage(source: ImageSource, devicePath: string, opts: WriteOptions = {}): Promise<number> {
  const chunkSize = checkChunkSize(opts.chunkSize ?? DEFAULT_CHUNK_SIZE);
  checkCancelled(opts.signal);
  opts.onStatus?.('Starting write');

  let stream: Readable;
  try {
    stream = await source.openStream();
  } catch (e) {
    throw new FlashError(`Unable to open image: ${describeError(e)}`, devicePath, { cause: e });
  }

  let sink: ChunkSink;
  try {
    sink = opts.dryRun ? new DiscardSink() : await DeviceSink.open(devicePath);
  } catch (e) {
    stream.destroy();
    throw e;
  }

  let written = 0;
  try {
    for await (const chunk of readChunks(stream, chunkSize)) {
      checkCancelled(opts.signal);
      await sink.write(chunk, written);
      written += chunk.length;
      opts.onProgress?.(written, source.size);
    }
  } catch (e) {
    if (isFlasherError(e)) throw e;
    throw new FlashError(`Unable to read image ${source.displayName}: ${describeError(e)}`, devicePath, { cause: e });
  } finally {
    stream.destroy();
    await sink.close();
  }

  opts.onStatus?.('Write completed');
  return written;
}

async function readFully(fh: FileHandle, buf: Buffer, length: number, position: number): Promise<number> {
  let got = 0;
  while (got < length) {
    const { bytesRead } = await fh.read(buf, got, length - got, position + got);
    if (bytesRead === 0) break;
    got += bytesRead;
  }
  return got;
}

/**
 * Relee el dispositivo y lo compara con un stream nuevo de `source`.
 * El offset de una diferencia se informa con granularidad de chunk.
 */
export async function verifyImage(source: ImageSource, devicePath: string, opts: VerifyOptions = {}): Promise<void> {
  const chunkSize = checkChunkSize(opts.chunkSize ?? DEFAULT_CHUNK_SIZE);
  opts.onStatus?.('Starting verification');

  let stream: Readable;
  try {
    stream = await source.openStream();
  } catch (e) {
    throw new VerificationError(`Unable to reopen image: ${describeError(e)}`, null, { cause: e });
  }

  let fh: FileHandle;
  try {
    fh = await open(devicePath, 'r');
  } catch (e) {
    stream.destroy();
    throw new VerificationError(openFailureMessage(e, devicePath, 'reading'), null, { cause: e });
  }

  const deviceChunk = Buffer.alloc(chunkSize);
  let checked = 0;
  try {
    for await (const imageChunk of readChunks(stream, chunkSize)) {
      checkCancelled(opts.signal);
      const got = await readFully(fh, deviceChunk, imageChunk.length, checked);
      if (got !== imageChunk.length || !imageChunk.equals(deviceChunk.subarray(0, got))) {
        throw VerificationError.mismatch(checked);
      }
      checked += imageChunk.length;
      opts.onProgress?.(checked, source.size);
    }
  } catch (e) {
    if (isFlasherError(e)) throw e;
    throw new VerificationError(`Verification aborted at offset ${checked}: ${describeError(e)}`, checked, { cause: e });
  } finally {
    stream.destroy();
    await fh.close();
  }

  opts.onStatus?.('Verification completed');
}

/** abrir → escribir → verificar (opcional); la imagen se limpia siempre. */
export async function flashImage(imagePath: string, devicePath: string, opts: FlashOptions = {}): Promise<number> {
  const source = await openImage(imagePath);
  try {
    const written = await writeImage(source, devicePath, opts);
    if (opts.verify && !opts.dryRun) {
      await verifyImage(source, devicePath, {
        chunkSize: opts.chunkSize,
        onProgress: opts.onVerifyProgress ?? opts.onProgress,
        onStatus: opts.onStatus,
        signal: opts.signal,
      });
    }
    return written;
  } finally {
    await source.cleanup();
  }
}
