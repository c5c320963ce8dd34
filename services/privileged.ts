import { spawn } from 'node:child_process';
import type { EventEmitter } from 'node:events';
import { constants } from 'node:fs';
import { access } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import readline from 'node:readline';
import type { Readable } from 'node:stream';
import { fileURLToPath } from 'node:url';
import {
  ExitCode,
  isTerminal,
  parseEventLine,
  type FlashEvent,
  type FlashOutcome,
  type FlashParams,
  type TerminalEvent,
} from '../shared/ipc.js';
import { loadConfig } from './config.js';
import { PrivilegeError, describeError } from './errors.js';
import { createLogger } from './log.js';
import { findExecutable, isRoot, withTimeout } from './util.js';
import { runWorker, type EventSink } from './worker.js';

const { log, err } = createLogger('caller');

export type FlashState = 'idle' | 'launching' | 'streaming' | 'verifying' | 'done' | 'failed';

/** Lo que el caller necesita del worker lanzado; ChildProcess lo cumple. */
export interface WorkerProcess extends EventEmitter {
  readonly stdout: Readable;
  readonly stderr: Readable;
}

export type Launcher = (cmd: string, args: readonly string[]) => WorkerProcess;

export const spawnLauncher: Launcher = (cmd, args) => spawn(cmd, args, { stdio: ['ignore', 'pipe', 'pipe'] });

export type CallerOptions = {
  /** Salida libre del worker, ya con el prefijo `[worker]`. */
  onDiagnostic?: (line: string) => void;
  launcher?: Launcher;
  /** Fuerza (true) u omite (false) la elevación en vez de probar el dispositivo. */
  escalate?: boolean;
  elevator?: string;
  lookupTimeoutMs?: number;
  workerEntry?: string;
  /** Corre el worker en este proceso cuando no hace falta elevar. */
  runInProcess?: (params: FlashParams, emit: EventSink) => Promise<number>;
  /** Cancela la ejecución en este proceso; el worker elevado recibe las señales del terminal. */
  signal?: AbortSignal;
};

/** FIFO de un solo consumidor: los productores nunca esperan. */
export class Inbox<T> implements AsyncIterable<T> {
  private readonly items: { value: T }[] = [];
  private readonly waiters: ((r: IteratorResult<T, undefined>) => void)[] = [];
  private closed = false;

  push(value: T): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) waiter({ value, done: false });
    else this.items.push({ value });
  }

  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) waiter({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => {
        const item = this.items.shift();
        if (item) return Promise.resolve<IteratorResult<T, undefined>>({ value: item.value, done: false });
        if (this.closed) return Promise.resolve<IteratorResult<T, undefined>>({ value: undefined, done: true });
        return new Promise<IteratorResult<T, undefined>>((resolve) => {
          this.waiters.push(resolve);
        });
      },
    };
  }
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let settle: (value: T) => void = () => undefined;
  const promise = new Promise<T>((resolve) => {
    settle = resolve;
  });
  return { promise, resolve: (value) => settle(value) };
}

/**
 * Una escritura vista desde el caller: eventos en orden que terminan en
 * exactamente un done/error, más el resultado final.
 */
export class FlashSession implements AsyncIterable<FlashEvent> {
  private readonly inbox = new Inbox<FlashEvent>();
  private terminal: TerminalEvent | undefined;
  private currentState: FlashState = 'idle';
  private readonly result = deferred<FlashOutcome>();
  readonly outcome: Promise<FlashOutcome> = this.result.promise;

  constructor(private readonly onDiagnostic: (line: string) => void) {}

  get state(): FlashState {
    return this.currentState;
  }

  get terminalEvent(): TerminalEvent | undefined {
    return this.terminal;
  }

  launching(): void {
    this.currentState = 'launching';
  }

  deliver(event: FlashEvent): void {
    if (this.terminal) {
      this.onDiagnostic(`[worker] event after completion: ${JSON.stringify(event)}`);
      return;
    }
    if (isTerminal(event)) {
      this.terminal = event;
      this.currentState = event.event === 'done' ? 'done' : 'failed';
    } else if (event.event === 'progress') {
      this.currentState = event.phase === 'verify' ? 'verifying' : 'streaming';
    } else if (this.currentState === 'launching') {
      this.currentState = 'streaming';
    }
    this.inbox.push(event);
  }

  diagnostic(line: string): void {
    this.onDiagnostic(line);
  }

  /** Se llama cuando el worker terminó; si nunca mandó done/error, se sintetiza uno. */
  finish(exitCode: number): void {
    if (!this.terminal) {
      this.deliver({
        event: 'error',
        message:
          exitCode !== 0
            ? `Privileged helper exited with code ${exitCode}`
            : 'Privileged helper exited without reporting a result',
      });
    }
    this.inbox.close();
    this.result.resolve(outcomeOf(this.terminal, exitCode));
  }

  [Symbol.asyncIterator](): AsyncIterator<FlashEvent, undefined> {
    return this.inbox[Symbol.asyncIterator]();
  }
}

function outcomeOf(terminal: TerminalEvent | undefined, exitCode: number): FlashOutcome {
  if (terminal?.event === 'done') {
    if (exitCode !== 0) {
      return { ok: false, message: `Privileged helper exited with code ${exitCode}`, exitCode };
    }
    return { ok: true, bytesWritten: terminal.bytes_written, dryRun: terminal.dry_run };
  }
  return {
    ok: false,
    message: terminal?.message ?? 'Unknown error',
    exitCode: exitCode !== 0 ? exitCode : ExitCode.Failure,
  };
}

/** cli/main con la misma extensión que este módulo (.ts en fuentes, .js compilado). */
export function defaultWorkerEntry(): string {
  const here = fileURLToPath(import.meta.url);
  return path.resolve(path.dirname(here), '..', 'cli', `main${path.extname(here)}`);
}

export function buildWorkerArgs(params: FlashParams, entry: string, execArgv: readonly string[] = process.execArgv): string[] {
  const args = [
    ...execArgv,
    entry,
    '--worker',
    '--image',
    path.resolve(params.imagePath),
    '--device',
    params.devicePath,
    '--chunk-size',
    String(params.chunkSize),
  ];
  if (params.verify) args.push('--verify');
  if (params.dryRun) args.push('--dry-run');
  return args;
}

/** Root, o lectura+escritura sobre el nodo: no hace falta elevar. */
export async function canOpenDevice(devicePath: string): Promise<boolean> {
  if (isRoot()) return true;
  try {
    await access(devicePath, constants.R_OK | constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

export async function needsEscalation(params: FlashParams, override?: boolean): Promise<boolean> {
  if (params.dryRun) return false;
  if (override !== undefined) return override;
  return !(await canOpenDevice(params.devicePath));
}

export async function resolveElevator(elevator: string, timeoutMs: number): Promise<string> {
  const found = await withTimeout(findExecutable(elevator), timeoutMs, () => new PrivilegeError(elevator));
  if (!found) throw new PrivilegeError(elevator);
  return found;
}

function exitCodeOf(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal) {
    const signo = Object.entries(os.constants.signals).find(([name]) => name === signal)?.[1];
    return 128 + (signo ?? 0);
  }
  return ExitCode.Failure;
}

/** Drena stdout (eventos) y stderr (diagnóstico) por separado. */
export function attachWorker(child: WorkerProcess, session: FlashSession): void {
  const events = readline.createInterface({ input: child.stdout, crlfDelay: Infinity });
  const diagnostics = readline.createInterface({ input: child.stderr, crlfDelay: Infinity });

  events.on('line', (raw) => {
    const line = raw.trim();
    if (!line) return;
    const event = parseEventLine(line);
    if (event) session.deliver(event);
    else session.diagnostic(`[worker] ${line}`);
  });
  diagnostics.on('line', (raw) => {
    const line = raw.trimEnd();
    if (line) session.diagnostic(`[worker] ${line}`);
  });

  const drained = new Promise<void>((resolve) => events.once('close', () => resolve()));
  let settled = false;

  child.once('error', (e: Error) => {
    if (settled) return;
    settled = true;
    err('worker launch failed:', describeError(e));
    session.deliver({ event: 'error', message: `Failed to launch privileged helper: ${describeError(e)}` });
    events.close();
    diagnostics.close();
    session.finish(ExitCode.LaunchFailed);
  });

  child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
    const exitCode = exitCodeOf(code, signal);
    log(`worker exited with ${exitCode}`);
    // el evento terminal puede llegar después del exit: esperar a stdout
    void drained.then(() => {
      if (settled) return;
      settled = true;
      session.finish(exitCode);
    });
  });
}

/**
 * Arranca una escritura. Si este proceso no puede abrir el dispositivo pasa
 * por el helper de elevación; si puede, corre la lógica del worker acá.
 */
export async function startFlash(
  request: Pick<FlashParams, 'imagePath' | 'devicePath'> & Partial<FlashParams>,
  options: CallerOptions = {},
): Promise<FlashSession> {
  const config = loadConfig();
  const params: FlashParams = {
    imagePath: request.imagePath,
    devicePath: request.devicePath,
    chunkSize: request.chunkSize ?? config.chunkSize,
    verify: request.verify ?? false,
    dryRun: request.dryRun ?? false,
  };
  const session = new FlashSession(options.onDiagnostic ?? ((line) => process.stderr.write(line + '\n')));
  session.launching();

  if (!(await needsEscalation(params, options.escalate))) {
    const run =
      options.runInProcess ?? ((p: FlashParams, emit: EventSink) => runWorkerInProcess(p, emit, options.signal));
    void run(params, (event) => session.deliver(event)).then(
      (code) => session.finish(code),
      (e: unknown) => {
        session.deliver({ event: 'error', message: `Unexpected error: ${describeError(e)}` });
        session.finish(ExitCode.Unexpected);
      },
    );
    return session;
  }

  const elevator = await resolveElevator(
    options.elevator ?? config.elevator,
    options.lookupTimeoutMs ?? config.lookupTimeoutMs,
  );
  const args = [process.execPath, ...buildWorkerArgs(params, options.workerEntry ?? defaultWorkerEntry())];
  log(`launching ${elevator} ${args.join(' ')}`);
  const child = (options.launcher ?? spawnLauncher)(elevator, args);
  attachWorker(child, session);
  return session;
}

function runWorkerInProcess(params: FlashParams, emit: EventSink, signal?: AbortSignal): Promise<number> {
  return runWorker(
    {
      image: params.imagePath,
      device: params.devicePath,
      chunkSize: params.chunkSize,
      verify: params.verify,
      dryRun: params.dryRun,
      signal,
    },
    emit,
  );
}

export type FlashCallbacks = CallerOptions & {
  onEvent?: (event: FlashEvent) => void;
};

/** startFlash, pasando cada evento a `onEvent` hasta que termina. */
export async function flash(
  imagePath: string,
  devicePath: string,
  options: Partial<Omit<FlashParams, 'imagePath' | 'devicePath'>> & FlashCallbacks = {},
): Promise<FlashOutcome> {
  const { chunkSize, verify, dryRun, onEvent, ...callerOptions } = options;
  const session = await startFlash({ imagePath, devicePath, chunkSize, verify, dryRun }, callerOptions);
  for await (const event of session) onEvent?.(event);
  return session.outcome;
}
