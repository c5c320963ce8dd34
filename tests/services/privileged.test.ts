import path from 'node:path';
import { setImmediate as tick } from 'node:timers/promises';
import { fileURLToPath } from 'node:url';
import type { FlashEvent, FlashParams } from '../../shared/ipc.js';
import { encodeEvent } from '../../shared/ipc.js';
import { PrivilegeError } from '../../services/errors.js';
import {
  FlashSession,
  Inbox,
  buildWorkerArgs,
  defaultWorkerEntry,
  flash,
  needsEscalation,
  resolveElevator,
  startFlash,
  type CallerOptions,
} from '../../services/privileged.js';
import { FakeWorker } from '../setup/testHarness.js';

const MiB = 1024 * 1024;

const params: FlashParams = {
  imagePath: '/tmp/disk.img',
  devicePath: '/dev/sdz',
  chunkSize: 4 * MiB,
  verify: false,
  dryRun: false,
};

type Launch = { cmd: string; args: readonly string[] };

function escalated(worker: FakeWorker, diagnostics: string[] = []) {
  const launches: Launch[] = [];
  const options: CallerOptions = {
    escalate: true,
    elevator: process.execPath,
    workerEntry: '/opt/diskflash/cli/main.js',
    launcher: (cmd, args) => {
      launches.push({ cmd, args });
      return worker;
    },
    onDiagnostic: (line) => diagnostics.push(line),
  };
  return { launches, options };
}

async function drain(session: FlashSession): Promise<FlashEvent[]> {
  const events: FlashEvent[] = [];
  for await (const event of session) events.push(event);
  return events;
}

describe('Inbox', () => {
  it('delivers queued and later items in order, then ends', async () => {
    const inbox = new Inbox<number>();
    inbox.push(1);
    const seen: number[] = [];
    const consuming = (async () => {
      for await (const n of inbox) seen.push(n);
    })();
    inbox.push(2);
    inbox.close();
    inbox.push(3);
    await consuming;
    expect(seen).toEqual([1, 2]);
  });
});

describe('FlashSession', () => {
  it('tracks the run state from its events', () => {
    const session = new FlashSession(() => undefined);
    expect(session.state).toBe('idle');
    session.launching();
    expect(session.state).toBe('launching');
    session.deliver({ event: 'status', message: 'Starting write' });
    expect(session.state).toBe('streaming');
    session.deliver({ event: 'progress', phase: 'verify', current: 1, total: 2 });
    expect(session.state).toBe('verifying');
    session.deliver({ event: 'done', bytes_written: 2, dry_run: false });
    expect(session.state).toBe('done');
  });

  it('keeps only the first terminal event', async () => {
    const diagnostics: string[] = [];
    const session = new FlashSession((line) => diagnostics.push(line));
    session.deliver({ event: 'error', message: 'Write failed' });
    session.deliver({ event: 'log', message: 'late' });
    session.finish(2);

    expect(await drain(session)).toEqual([{ event: 'error', message: 'Write failed' }]);
    expect(diagnostics).toEqual(['[worker] event after completion: {"event":"log","message":"late"}']);
    expect(session.state).toBe('failed');
  });
});

describe('buildWorkerArgs', () => {
  it('re-invokes the entry point in worker mode', () => {
    const args = buildWorkerArgs(
      { imagePath: 'a.img', devicePath: '/dev/sdb', chunkSize: 1024, verify: true, dryRun: true },
      '/x/cli/main.ts',
      ['--import', 'tsx'],
    );
    expect(args).toEqual([
      '--import',
      'tsx',
      '/x/cli/main.ts',
      '--worker',
      '--image',
      path.resolve('a.img'),
      '--device',
      '/dev/sdb',
      '--chunk-size',
      '1024',
      '--verify',
      '--dry-run',
    ]);
  });

  it('points at the cli beside the services', () => {
    const here = path.dirname(fileURLToPath(import.meta.url));
    expect(defaultWorkerEntry()).toBe(path.resolve(here, '..', '..', 'cli', 'main.ts'));
  });
});

describe('needsEscalation', () => {
  it('never escalates a dry run', async () => {
    expect(await needsEscalation({ ...params, dryRun: true }, true)).toBe(false);
  });

  it('follows an explicit override', async () => {
    expect(await needsEscalation(params, true)).toBe(true);
    expect(await needsEscalation(params, false)).toBe(false);
  });
});

describe('resolveElevator', () => {
  it('accepts an executable path', async () => {
    expect(await resolveElevator(process.execPath, 1000)).toBe(process.execPath);
  });

  it('fails with a privilege error when the helper is missing', async () => {
    await expect(resolveElevator('diskflash-missing-elevator', 1000)).rejects.toThrow(
      new PrivilegeError('diskflash-missing-elevator'),
    );
  });
});

describe('startFlash through the elevation helper', () => {
  it('launches the helper with the worker command line', async () => {
    const worker = new FakeWorker();
    const { launches, options } = escalated(worker);
    const session = await startFlash({ ...params, verify: true }, options);
    worker.exit(0);
    await drain(session);

    expect(launches).toEqual([
      {
        cmd: process.execPath,
        args: [
          process.execPath,
          ...process.execArgv,
          '/opt/diskflash/cli/main.js',
          '--worker',
          '--image',
          '/tmp/disk.img',
          '--device',
          '/dev/sdz',
          '--chunk-size',
          String(4 * MiB),
          '--verify',
        ],
      },
    ]);
  });

  it('delivers worker events in order and resolves the outcome', async () => {
    const worker = new FakeWorker();
    const diagnostics: string[] = [];
    const { options } = escalated(worker, diagnostics);
    const session = await startFlash(params, options);
    expect(session.state).toBe('launching');

    const lines: FlashEvent[] = [
      { event: 'progress', phase: 'write', current: MiB, total: 4 * MiB },
      { event: 'progress', phase: 'write', current: 4 * MiB, total: 4 * MiB },
      { event: 'done', bytes_written: 4 * MiB, dry_run: false },
    ];
    worker.emitLines(lines.map((e) => encodeEvent(e).trimEnd()));
    worker.exit(0);

    expect(await drain(session)).toEqual(lines);
    expect(await session.outcome).toEqual({ ok: true, bytesWritten: 4 * MiB, dryRun: false });
    expect(diagnostics).toEqual([]);
    expect(session.state).toBe('done');
  });

  it('turns non-event output into diagnostics', async () => {
    const worker = new FakeWorker();
    const diagnostics: string[] = [];
    const { options } = escalated(worker, diagnostics);
    const session = await startFlash(params, options);

    worker.stderr.write('polkit: authentication agent started\n');
    worker.emitLines(['not-json', '', '{"event":"unknown"}', encodeEvent({ event: 'done', bytes_written: 0, dry_run: false }).trimEnd()]);
    worker.exit(0);

    expect(await drain(session)).toEqual([{ event: 'done', bytes_written: 0, dry_run: false }]);
    await tick();
    expect(diagnostics).toContain('[worker] not-json');
    expect(diagnostics).toContain('[worker] {"event":"unknown"}');
    expect(diagnostics).toContain('[worker] polkit: authentication agent started');
    expect(diagnostics).toHaveLength(3);
  });

  it('synthesizes an error when the helper exits without a result', async () => {
    const worker = new FakeWorker();
    const { options } = escalated(worker);
    const session = await startFlash(params, options);
    worker.exit(126);

    expect(await drain(session)).toEqual([{ event: 'error', message: 'Privileged helper exited with code 126' }]);
    expect(await session.outcome).toEqual({ ok: false, message: 'Privileged helper exited with code 126', exitCode: 126 });
  });

  it('treats a clean exit without a result as a failure', async () => {
    const worker = new FakeWorker();
    const { options } = escalated(worker);
    const session = await startFlash(params, options);
    worker.exit(0);

    expect(await drain(session)).toEqual([
      { event: 'error', message: 'Privileged helper exited without reporting a result' },
    ]);
    expect(await session.outcome).toEqual({
      ok: false,
      message: 'Privileged helper exited without reporting a result',
      exitCode: 1,
    });
  });

  it('reports the worker exit code with its error event', async () => {
    const worker = new FakeWorker();
    const { options } = escalated(worker);
    const session = await startFlash(params, options);
    worker.emitLines([encodeEvent({ event: 'error', message: 'Verification failed at offset 0' }).trimEnd()]);
    worker.exit(3);

    expect(await drain(session)).toEqual([{ event: 'error', message: 'Verification failed at offset 0' }]);
    expect(await session.outcome).toEqual({ ok: false, message: 'Verification failed at offset 0', exitCode: 3 });
  });

  it('fails a done event followed by a non-zero exit', async () => {
    const worker = new FakeWorker();
    const { options } = escalated(worker);
    const session = await startFlash(params, options);
    worker.emitLines([encodeEvent({ event: 'done', bytes_written: 8, dry_run: false }).trimEnd()]);
    worker.exit(1);

    expect(await drain(session)).toEqual([{ event: 'done', bytes_written: 8, dry_run: false }]);
    expect(await session.outcome).toEqual({ ok: false, message: 'Privileged helper exited with code 1', exitCode: 1 });
  });

  it('maps a signal exit to 128 plus the signal number', async () => {
    const worker = new FakeWorker();
    const { options } = escalated(worker);
    const session = await startFlash(params, options);
    worker.exit(null, 'SIGTERM');

    await drain(session);
    expect(await session.outcome).toEqual({ ok: false, message: 'Privileged helper exited with code 143', exitCode: 143 });
  });

  it('reports a helper that fails to launch', async () => {
    const worker = new FakeWorker();
    const { options } = escalated(worker);
    const session = await startFlash(params, options);
    worker.emit('error', new Error('spawn pkexec EACCES'));

    expect(await drain(session)).toEqual([
      { event: 'error', message: 'Failed to launch privileged helper: spawn pkexec EACCES' },
    ]);
    expect(await session.outcome).toEqual({
      ok: false,
      message: 'Failed to launch privileged helper: spawn pkexec EACCES',
      exitCode: 6,
    });
  });

  it('refuses to start without an elevation helper', async () => {
    const worker = new FakeWorker();
    const { launches, options } = escalated(worker);
    const attempt = startFlash(params, { ...options, elevator: 'diskflash-missing-elevator' });

    await expect(attempt).rejects.toBeInstanceOf(PrivilegeError);
    await expect(attempt).rejects.toMatchObject({ exitCode: 5 });
    expect(launches).toEqual([]);
  });
});

describe('flash', () => {
  it('runs in process when no escalation is needed', async () => {
    const seen: FlashEvent[] = [];
    const runInProcess = vi.fn(async (run: FlashParams, emit: (e: FlashEvent) => void) => {
      emit({ event: 'status', message: 'Starting write' });
      emit({ event: 'done', bytes_written: 10, dry_run: run.dryRun });
      return 0;
    });

    const outcome = await flash('/tmp/disk.img', '/dev/sdz', {
      dryRun: true,
      chunkSize: 512,
      runInProcess,
      onEvent: (e) => seen.push(e),
    });

    expect(outcome).toEqual({ ok: true, bytesWritten: 10, dryRun: true });
    expect(seen.map((e) => e.event)).toEqual(['status', 'done']);
    expect(runInProcess).toHaveBeenCalledWith(
      { imagePath: '/tmp/disk.img', devicePath: '/dev/sdz', chunkSize: 512, verify: false, dryRun: true },
      expect.any(Function),
    );
  });

  it('turns a crash of the in-process worker into an error event', async () => {
    const seen: FlashEvent[] = [];
    const outcome = await flash('/tmp/disk.img', '/dev/sdz', {
      escalate: false,
      runInProcess: async () => {
        throw new Error('boom');
      },
      onEvent: (e) => seen.push(e),
    });

    expect(seen).toEqual([{ event: 'error', message: 'Unexpected error: boom' }]);
    expect(outcome).toEqual({ ok: false, message: 'Unexpected error: boom', exitCode: 99 });
  });
});
