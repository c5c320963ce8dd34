import type { BlockDevice } from '../shared/ipc.js';
import { UnmountError, describeError } from './errors.js';
import { createLogger } from './log.js';
import { CommandNotFoundError, processExecutor, type Executor } from './util.js';

const { log, err } = createLogger('mounts');

type Command = [cmd: string, ...args: string[]];

/** Primero los más anidados: los hijos se desmontan antes que el padre. */
export function orderUnmountTargets(mountpoints: readonly string[]): string[] {
  return [...new Set(mountpoints.filter((mp) => mp))].sort((a, b) => b.length - a.length);
}

/** Origen del montaje (p.ej. /dev/sdb1), si findmnt lo sabe. */
export async function lookupMountSource(target: string, exec: Executor = processExecutor): Promise<string | undefined> {
  try {
    const r = await exec.run('findmnt', ['-no', 'SOURCE', '--', target]);
    if (r.code !== 0) return undefined;
    return r.stdout.trim() || undefined;
  } catch (e) {
    if (!(e instanceof CommandNotFoundError)) err(`findmnt failed: ${describeError(e)}`);
    return undefined;
  }
}

async function tryCommand([cmd, ...args]: Command, exec: Executor): Promise<boolean> {
  try {
    const r = await exec.run(cmd, args);
    if (r.code === 0) return true;
    log(`${cmd} ${args.join(' ')} exited ${r.code}: ${r.stderr.trim()}`);
    return false;
  } catch (e) {
    // herramienta ausente: probar la siguiente estrategia
    if (e instanceof CommandNotFoundError) return false;
    err(`${cmd} failed to start: ${describeError(e)}`);
    return false;
  }
}

/** umount; si falla, udisksctl por dispositivo; si no, umount -l. */
export async function unmountTarget(target: string, exec: Executor = processExecutor): Promise<boolean> {
  if (await tryCommand(['umount', target], exec)) return true;

  const source = await lookupMountSource(target, exec);
  if (source && (await tryCommand(['udisksctl', 'unmount', '-b', source], exec))) return true;

  return tryCommand(['umount', '-l', target], exec);
}

/**
 * Desmonta todos los puntos de montaje de `device`. Se intentan todos aunque
 * falle alguno; UnmountError lleva los que sí se desmontaron.
 */
export async function unmountDevice(device: Pick<BlockDevice, 'path' | 'mountpoints'>, exec: Executor = processExecutor): Promise<string[]> {
  const targets = orderUnmountTargets(device.mountpoints);
  const unmounted: string[] = [];
  const failed: string[] = [];

  for (const target of targets) {
    if (await unmountTarget(target, exec)) {
      log(`unmounted ${target} (${device.path})`);
      unmounted.push(target);
    } else {
      err(`could not unmount ${target} (${device.path})`);
      failed.push(target);
    }
  }

  if (failed.length) throw new UnmountError(targets, unmounted, failed);
  return unmounted;
}
