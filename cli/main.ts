#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { ExitCode, type FlashEvent } from '../shared/ipc.js';
import { loadConfig } from '../services/config.js';
import { listDevices } from '../services/drives.js';
import { describeError, exitCodeFor } from '../services/errors.js';
import { createLogger } from '../services/log.js';
import { flash, type CallerOptions } from '../services/privileged.js';
import { formatProgressLine, formatSize } from '../services/util.js';
import { installCancelHandlers, runWorker, stdoutSink } from '../services/worker.js';

const { err } = createLogger('cli');

export type Output = { write(text: string): unknown };
export type Io = { out: Output; err: Output };

const USAGE = `usage: diskflash --list
       diskflash --image <file> --device <path> [--verify] [--dry-run] [--chunk-size <bytes>]`;

const argsSchema = z.object({
  list: z.boolean().default(false),
  image: z.string().min(1).optional(),
  device: z.string().min(1).optional(),
  verify: z.boolean().default(false),
  dryRun: z.boolean().default(false),
  chunkSize: z.coerce.number({ invalid_type_error: 'chunk size must be a number' }).int().positive().optional(),
  worker: z.boolean().default(false),
});

export type CliArgs = z.infer<typeof argsSchema>;

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const { values } = parseArgs({
    args: [...argv],
    options: {
      list: { type: 'boolean' },
      image: { type: 'string', short: 'i' },
      device: { type: 'string', short: 'd' },
      verify: { type: 'boolean' },
      'dry-run': { type: 'boolean' },
      'chunk-size': { type: 'string' },
      worker: { type: 'boolean' },
    },
    strict: true,
  });
  return argsSchema.parse({
    list: values.list,
    image: values.image,
    device: values.device,
    verify: values.verify,
    dryRun: values['dry-run'],
    chunkSize: values['chunk-size'],
    worker: values.worker,
  });
}

async function printDevices(io: Io): Promise<number> {
  const devices = await listDevices({ requireRemovable: false });
  if (!devices.length) {
    io.out.write('No devices detected\n');
    return ExitCode.Success;
  }
  for (const d of devices) {
    const removable = d.removable ? '(removable)' : '';
    const mounts = d.mountpoints.length ? d.mountpoints.join(', ') : '--';
    io.out.write(`${d.path}\t${formatSize(d.size)}\t${d.description} ${removable}\tMounted: ${mounts}\n`);
  }
  return ExitCode.Success;
}

export function renderEvent(event: FlashEvent, io: Io): void {
  switch (event.event) {
    case 'progress': {
      const label = event.phase === 'write' ? 'Writing' : 'Verifying';
      io.out.write('\r' + formatProgressLine(label, event.current, event.total));
      return;
    }
    case 'status':
    case 'log':
      if (event.message) io.err.write(event.message + '\n');
      return;
    case 'done':
      io.out.write(event.dry_run ? '\nDry run completed successfully\n' : `\nWrite completed (${formatSize(event.bytes_written)})\n`);
      return;
    case 'error':
      io.out.write('\n');
      io.err.write(event.message + '\n');
      return;
  }
}

export async function main(
  argv: readonly string[] = process.argv.slice(2),
  io: Io = { out: process.stdout, err: process.stderr },
  callerOptions: CallerOptions = {},
): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (e) {
    const message = e instanceof z.ZodError ? e.issues.map((i) => i.message).join('; ') : describeError(e);
    io.err.write(`${message}\n${USAGE}\n`);
    return ExitCode.MissingArguments;
  }

  try {
    const chunkSize = args.chunkSize ?? loadConfig().chunkSize;

    if (args.worker) {
      const cancel = installCancelHandlers();
      try {
        return await runWorker({ ...args, chunkSize, signal: cancel.signal }, stdoutSink);
      } finally {
        cancel.uninstall();
      }
    }

    if (args.list) return await printDevices(io);

    if (!args.image || !args.device) {
      io.err.write(`specify both --image and --device\n${USAGE}\n`);
      return ExitCode.MissingArguments;
    }

    const cancel = installCancelHandlers();
    try {
      const outcome = await flash(args.image, args.device, {
        chunkSize,
        verify: args.verify,
        dryRun: args.dryRun,
        onEvent: (event) => renderEvent(event, io),
        onDiagnostic: (line) => io.err.write(line + '\n'),
        signal: cancel.signal,
        ...callerOptions,
      });
      return outcome.ok ? ExitCode.Success : outcome.exitCode;
    } finally {
      cancel.uninstall();
    }
  } catch (e) {
    err(describeError(e));
    io.err.write(describeError(e) + '\n');
    return exitCodeFor(e);
  }
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  void main().then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      process.stderr.write(`Unexpected error: ${describeError(e)}\n`);
      process.exitCode = ExitCode.Unexpected;
    },
  );
}
