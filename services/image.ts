import { createReadStream, createWriteStream, type Stats } from 'node:fs';
import { mkdtemp, rm, rmdir, stat } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { PassThrough, type Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { createGunzip } from 'node:zlib';
import lzma from 'lzma-native';
import unbzip2 from 'unbzip2-stream';
import yauzl, { type Entry } from 'yauzl';
import { SourceError, describeError, errnoOf } from './errors.js';
import { createLogger } from './log.js';

const { log, err } = createLogger('image');

/**
 * Los bytes decodificados de una imagen. `openStream` se puede llamar varias
 * veces (escritura y luego verificación); cada stream arranca en el byte 0.
 */
export interface ImageSource {
  readonly displayName: string;
  /** Tamaño decodificado en bytes; null si el formato no lo dice de antemano. */
  readonly size: number | null;
  openStream(): Promise<Readable>;
  /** Borra los temporales de esta imagen. Idempotente, nunca lanza. */
  cleanup(): Promise<void>;
}

type DecoderFactory = () => NodeJS.ReadWriteStream;

const DECODERS = new Map<string, DecoderFactory>([
  ['.gz', createGunzip],
  ['.gzip', createGunzip],
  ['.xz', () => lzma.createDecompressor()],
  ['.lzma', () => lzma.createDecompressor()],
  ['.bz2', () => unbzip2()],
  ['.bzip2', () => unbzip2()],
]);

export class RawImageSource implements ImageSource {
  constructor(
    private readonly filePath: string,
    readonly displayName: string,
    readonly size: number | null,
  ) {}

  async openStream(): Promise<Readable> {
    return createReadStream(this.filePath);
  }

  async cleanup(): Promise<void> {}
}

export class DecodedImageSource implements ImageSource {
  readonly size = null;

  constructor(
    private readonly filePath: string,
    readonly displayName: string,
    private readonly createDecoder: DecoderFactory,
  ) {}

  async openStream(): Promise<Readable> {
    const input = createReadStream(this.filePath);
    const decoder = this.createDecoder();
    // algunos decoders son streams clásicos: exponer un Readable de verdad
    const output = new PassThrough();
    input.on('error', (e) => output.destroy(e));
    decoder.on('error', (e: Error) => output.destroy(e));
    output.on('close', () => input.destroy());
    input.pipe(decoder).pipe(output);
    return output;
  }

  async cleanup(): Promise<void> {}
}

function isDirectoryEntry(entry: Entry): boolean {
  return entry.fileName.endsWith('/');
}

function listZipFiles(zipPath: string): Promise<Entry[]> {
  return new Promise((resolve, reject) => {
    yauzl.open(zipPath, { lazyEntries: true, autoClose: true }, (e, zip) => {
      if (e || !zip) return reject(e ?? new Error(`cannot open ${zipPath}`));
      const files: Entry[] = [];
      zip.on('error', reject);
      zip.on('entry', (entry: Entry) => {
        if (!isDirectoryEntry(entry)) files.push(entry);
        zip.readEntry();
      });
      zip.on('end', () => resolve(files));
      zip.readEntry();
    });
  });
}

function extractZipEntry(zipPath: string, entryName: string, dest: string): Promise<void> {
  return new Promise((resolve, reject) => {
    yauzl.open(zipPath, { lazyEntries: true, autoClose: false }, (e, zip) => {
      if (e || !zip) return reject(e ?? new Error(`cannot open ${zipPath}`));
      let found = false;
      const fail = (cause: unknown) => {
        zip.close();
        reject(cause);
      };
      zip.on('error', fail);
      zip.on('entry', (entry: Entry) => {
        if (entry.fileName !== entryName) return zip.readEntry();
        found = true;
        zip.openReadStream(entry, (e2, stream) => {
          if (e2 || !stream) return fail(e2 ?? new Error(`cannot read ${entryName}`));
          // 'wx': extraer dos veces al mismo archivo es un bug
          pipeline(stream, createWriteStream(dest, { flags: 'wx' })).then(() => {
            zip.close();
            resolve();
          }, fail);
        });
      });
      zip.on('end', () => {
        if (!found) fail(new Error(`${entryName} not found in ${zipPath}`));
      });
      zip.readEntry();
    });
  });
}

export class ZipImageSource implements ImageSource {
  private extraction: Promise<string> | null = null;
  private tempDir: string | null = null;

  private constructor(
    private readonly zipPath: string,
    private readonly entryName: string,
    readonly displayName: string,
    readonly size: number,
  ) {}

  static async open(zipPath: string): Promise<ZipImageSource> {
    let files: Entry[];
    try {
      files = await listZipFiles(zipPath);
    } catch (e) {
      throw new SourceError(`Unable to read ZIP archive ${zipPath}: ${describeError(e)}`, { cause: e });
    }
    if (files.length !== 1) {
      throw new SourceError('ZIP archives must contain exactly one image file');
    }
    const [entry] = files;
    return new ZipImageSource(
      zipPath,
      entry.fileName,
      `${path.basename(zipPath)} -> ${entry.fileName}`,
      entry.uncompressedSize,
    );
  }

  /** Ruta de la imagen extraída; extrae solo en la primera llamada. */
  extractedPath(): Promise<string> {
    if (!this.extraction) {
      this.extraction = this.extract().catch((e: unknown) => {
        this.extraction = null;
        throw new SourceError(`Unable to extract ${this.entryName}: ${describeError(e)}`, { cause: e });
      });
    }
    return this.extraction;
  }

  private async extract(): Promise<string> {
    const dir = this.tempDir ?? (this.tempDir = await mkdtemp(path.join(os.tmpdir(), 'diskflash-zip-')));
    const target = path.join(dir, path.basename(this.entryName));
    log(`extracting ${this.entryName} to ${target}`);
    await extractZipEntry(this.zipPath, this.entryName, target);
    return target;
  }

  async openStream(): Promise<Readable> {
    return createReadStream(await this.extractedPath());
  }

  async cleanup(): Promise<void> {
    const pending = this.extraction;
    this.extraction = null;
    if (pending) await pending.catch(() => undefined);
    const dir = this.tempDir;
    this.tempDir = null;
    if (!dir) return;
    try {
      await rm(path.join(dir, path.basename(this.entryName)), { force: true });
      await rmdir(dir);
    } catch (e) {
      if (errnoOf(e) !== 'ENOENT') err(`cleanup of ${dir} failed: ${describeError(e)}`);
    }
  }
}

/** Elige lector por la última extensión; lo desconocido es imagen cruda. */
export async function openImage(imagePath: string): Promise<ImageSource> {
  let st: Stats;
  try {
    st = await stat(imagePath);
  } catch (e) {
    if (errnoOf(e) === 'ENOENT') throw new SourceError(`Image file not found: ${imagePath}`, { cause: e });
    throw new SourceError(`Unable to read image ${imagePath}: ${describeError(e)}`, { cause: e });
  }
  if (!st.isFile()) throw new SourceError(`Image path is not a file: ${imagePath}`);

  const ext = path.extname(imagePath).toLowerCase();
  const name = path.basename(imagePath);
  const decoder = DECODERS.get(ext);
  if (decoder) return new DecodedImageSource(imagePath, name, decoder);
  if (ext === '.zip') return ZipImageSource.open(imagePath);
  return new RawImageSource(imagePath, name, st.size);
}
