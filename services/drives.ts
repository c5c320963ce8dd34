import path from 'node:path';
import { z } from 'zod';
import type { BlockDevice } from '../shared/ipc.js';
import { EnumerationError, describeError } from './errors.js';
import { createLogger } from './log.js';
import { CommandNotFoundError, formatSize, processExecutor, type Executor, type RunResult } from './util.js';

const { log } = createLogger('drives');

/** Enumera discos enteros (sin particiones) de una plataforma. */
export interface DeviceBackend {
  readonly platform: string;
  list(): Promise<BlockDevice[]>;
}

export const LSBLK_ARGS = [
  '--bytes',
  '--all',
  '--json',
  '--output',
  'NAME,TYPE,SIZE,RM,MODEL,TRAN,MOUNTPOINT,MOUNTPOINTS',
] as const;

// según la versión, lsblk imprime números, strings numéricos o booleanos
const flexibleInt = z
  .union([z.number(), z.string(), z.boolean(), z.null()])
  .optional()
  .transform((v) => {
    if (typeof v === 'boolean') return v ? 1 : 0;
    const n = Number(v ?? 0);
    return Number.isFinite(n) ? n : 0;
  });

type LsblkNode = {
  name?: string | null;
  type?: string | null;
  size: number;
  rm: number;
  model?: string | null;
  tran?: string | null;
  mountpoint?: string | null;
  mountpoints?: (string | null)[] | null;
  children?: LsblkNode[] | null;
};

const lsblkNodeSchema: z.ZodType<LsblkNode, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    name: z.string().nullish(),
    type: z.string().nullish(),
    size: flexibleInt,
    rm: flexibleInt,
    model: z.string().nullish(),
    tran: z.string().nullish(),
    mountpoint: z.string().nullish(),
    mountpoints: z.array(z.string().nullable()).nullish(),
    children: z.array(lsblkNodeSchema).nullish(),
  }),
);

const lsblkOutputSchema = z.object({
  blockdevices: z.array(lsblkNodeSchema).default([]),
});

export function isWritable(device: Pick<BlockDevice, 'path'>): boolean {
  return !device.path.startsWith('/dev/loop') && !device.path.startsWith('/dev/ram');
}

export function formatDescription(name: string, size: number, model: string, transport: string | null): string {
  let label = model || 'Generic Device';
  if (transport) label = `${label} (${transport})`;
  return `${name} - ${formatSize(size)} - ${label}`;
}

function collectMountpoints(node: LsblkNode, into = new Set<string>()): Set<string> {
  if (node.mountpoint) into.add(node.mountpoint);
  for (const mp of node.mountpoints ?? []) {
    if (mp) into.add(mp);
  }
  for (const child of node.children ?? []) collectMountpoints(child, into);
  return into;
}

/** Salida de `lsblk --json` → discos; EnumerationError si viene mal formada. */
export function parseLsblk(stdout: string): BlockDevice[] {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch (e) {
    throw new EnumerationError('Failed to parse lsblk output', { cause: e });
  }
  const parsed = lsblkOutputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new EnumerationError('Failed to parse lsblk output', { cause: parsed.error });
  }

  const devices: BlockDevice[] = [];
  for (const node of parsed.data.blockdevices) {
    if (node.type !== 'disk' || !node.name) continue;
    const model = (node.model ?? '').trim();
    const transport = node.tran || null;
    devices.push({
      name: node.name,
      path: path.posix.join('/dev', node.name),
      size: node.size,
      model,
      removable: node.rm !== 0,
      transport,
      description: formatDescription(node.name, node.size, model, transport),
      mountpoints: [...collectMountpoints(node)].sort(),
    });
  }
  return devices;
}

export class LinuxDeviceBackend implements DeviceBackend {
  readonly platform = 'linux';

  constructor(private readonly exec: Executor = processExecutor) {}

  async list(): Promise<BlockDevice[]> {
    let result: RunResult;
    try {
      result = await this.exec.run('lsblk', LSBLK_ARGS);
    } catch (e) {
      if (e instanceof CommandNotFoundError) {
        throw new EnumerationError('`lsblk` command not available', { cause: e });
      }
      throw new EnumerationError(`lsblk failed: ${describeError(e)}`, { cause: e });
    }
    if (result.code !== 0) {
      throw new EnumerationError(result.stderr.trim() || 'lsblk failed');
    }
    return parseLsblk(result.stdout);
  }
}

export class UnsupportedDeviceBackend implements DeviceBackend {
  constructor(readonly platform: string) {}

  async list(): Promise<BlockDevice[]> {
    throw new EnumerationError(`${this.platform} device enumeration is not supported`);
  }
}

export function selectBackend(platform: string = process.platform, exec: Executor = processExecutor): DeviceBackend {
  switch (platform) {
    case 'linux':
      return new LinuxDeviceBackend(exec);
    default:
      return new UnsupportedDeviceBackend(platform);
  }
}

export async function listDevices(
  { requireRemovable = true }: { requireRemovable?: boolean } = {},
  backend: DeviceBackend = selectBackend(),
): Promise<BlockDevice[]> {
  const devices = await backend.list();
  log(`enumerated ${devices.length} disk(s) on ${backend.platform}`);
  return requireRemovable ? devices.filter((d) => d.removable) : devices;
}

/**
 * Búsqueda fresca por ruta. `undefined` es "desconocido": los fallos de
 * enumeración se loguean, no se lanzan.
 */
export async function findDevice(
  devicePath: string,
  backend: DeviceBackend = selectBackend(),
): Promise<BlockDevice | undefined> {
  let devices: BlockDevice[];
  try {
    devices = await listDevices({ requireRemovable: false }, backend);
  } catch (e) {
    log(`lookup of ${devicePath} failed: ${describeError(e)}`);
    return undefined;
  }
  return devices.find((d) => d.path === devicePath);
}
