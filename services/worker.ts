import type { EventEmitter } from 'node:events';
import type { BlockDevice, FlashEvent } from '../shared/ipc.js';
import { ExitCode, encodeEvent } from '../shared/ipc.js';
import { findDevice, isWritable } from './drives.js';
import {
  CancelledError,
  FlashError,
  SourceError,
  UnmountError,
  VerificationError,
  describeError,
} from './errors.js';
import { flashImage, type FlashOptions } from './flash.js';
import { createLogger } from './log.js';
import { unmountDevice } from './mounts.js';

const { log, err } = createLogger('worker');

export type WorkerArgs = {
  image?: string;
  device?: string;
  chunkSize: number;
  verify: boolean;
  dryRun: boolean;
  signal?: AbortSignal;
};

export type EventSink = (event: FlashEvent) => void;

/** Puntos de inyección para los tests; en producción, los servicios reales. */
export type WorkerDeps = {
  findDevice: (devicePath: string) => Promise<BlockDevice | undefined>;
  unmountDevice: (device: BlockDevice) => Promise<string[]>;
  flashImage: (imagePath: string, devicePath: string, opts: FlashOptions) => Promise<number>;
};

const defaultDeps: WorkerDeps = {
  findDevice: (p) => findDevice(p),
  unmountDevice: (d) => unmountDevice(d),
  flashImage,
};

export const stdoutSink: EventSink = (event) => {
  process.stdout.write(encodeEvent(event));
};

function failureExitCode(e: unknown): ExitCode {
  if (e instanceof FlashError || e instanceof SourceError) return ExitCode.WriteFailed;
  if (e instanceof VerificationError) return ExitCode.VerificationFailed;
  if (e instanceof CancelledError) return ExitCode.Cancelled;
  return ExitCode.Unexpected;
}

/**
 * Lado worker del protocolo: refrescar montajes, desmontar, escribir y
 * verificar. Emite progress/status/log y exactamente un evento terminal
 * (done o error).
 */
export async function runWorker(args: WorkerArgs, emit: EventSink, deps: WorkerDeps = defaultDeps): Promise<ExitCode> {
  const { image, device, signal } = args;
  if (!image || !device) {
    emit({ event: 'error', message: 'Worker missing required arguments' });
    return ExitCode.MissingArguments;
  }
  if (!isWritable({ path: device })) {
    emit({ event: 'error', message: `Refusing to write to pseudo device ${device}` });
    return ExitCode.WriteFailed;
  }

  // estado de montaje fresco: puede haber cambiado desde que el caller miró
  const info = await deps.findDevice(device);
  if (info === undefined) {
    emit({ event: 'log', message: `Warning: could not refresh device info for ${device}` });
  } else if (info.mountpoints.length > 0 && !args.dryRun) {
    emit({ event: 'status', message: `Unmounting ${device}` });
    try {
      const unmounted = await deps.unmountDevice(info);
      for (const mp of unmounted) emit({ event: 'log', message: `Unmounted ${mp}` });
    } catch (e) {
      if (e instanceof UnmountError) {
        for (const mp of e.unmounted) emit({ event: 'log', message: `Unmounted ${mp}` });
        emit({ event: 'error', message: e.message });
        return ExitCode.WorkerUnmountFailed;
      }
      err('unmount crashed:', describeError(e));
      emit({ event: 'error', message: `Unexpected error: ${describeError(e)}` });
      return ExitCode.Unexpected;
    }
  }

  let written: number;
  try {
    written = await deps.flashImage(image, device, {
      chunkSize: args.chunkSize,
      verify: args.verify,
      dryRun: args.dryRun,
      signal,
      onProgress: (current, total) => emit({ event: 'progress', phase: 'write', current, total }),
      onVerifyProgress: (current, total) => emit({ event: 'progress', phase: 'verify', current, total }),
      onStatus: (message) => emit({ event: 'status', message }),
    });
  } catch (e) {
    const code = failureExitCode(e);
    const message = code === ExitCode.Unexpected ? `Unexpected error: ${describeError(e)}` : describeError(e);
    err(message);
    emit({ event: 'error', message });
    return code;
  }

  log(`wrote ${written} bytes to ${device}${args.dryRun ? ' (dry run)' : ''}`);
  emit({ event: 'done', bytes_written: written, dry_run: args.dryRun });
  return ExitCode.Success;
}

export type CancelHandle = {
  readonly signal: AbortSignal;
  uninstall(): void;
};

/**
 * SIGINT/SIGTERM abortan la escritura entre chunks; runWorker limpia la
 * imagen y termina con "Operation cancelled" (exit 130). Una segunda señal
 * cae en el comportamiento por defecto del proceso.
 */
export function installCancelHandlers(target: EventEmitter = process): CancelHandle {
  const controller = new AbortController();
  const onSignal = (name: NodeJS.Signals) => {
    log(`received ${name}, cancelling`);
    controller.abort();
  };
  target.once('SIGINT', onSignal);
  target.once('SIGTERM', onSignal);
  return {
    signal: controller.signal,
    uninstall: () => {
      target.off('SIGINT', onSignal);
      target.off('SIGTERM', onSignal);
    },
  };
}
