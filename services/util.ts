import { spawn } from 'node:child_process';
import { constants } from 'node:fs';
import { access } from 'node:fs/promises';
import path from 'node:path';

export type RunResult = { code: number; stdout: string; stderr: string };

/** Ejecuta herramientas externas; en los tests se cambia por un fake. */
export interface Executor {
  run(cmd: string, args: readonly string[]): Promise<RunResult>;
}

export class CommandNotFoundError extends Error {
  constructor(public readonly command: string) {
    super(`${command}: command not found`);
    this.name = 'CommandNotFoundError';
  }
}

export function run(cmd: string, args: readonly string[]): Promise<RunResult> {
  return new Promise((resolve, reject) => {
    const p = spawn(cmd, args, { stdio: ['ignore', 'pipe', 'pipe'], shell: false });
    let stdout = '';
    let stderr = '';
    p.stdout.setEncoding('utf8').on('data', (d: string) => { stdout += d; });
    p.stderr.setEncoding('utf8').on('data', (d: string) => { stderr += d; });
    p.on('error', (e: NodeJS.ErrnoException) => reject(e.code === 'ENOENT' ? new CommandNotFoundError(cmd) : e));
    p.on('close', (code) => resolve({ code: code ?? -1, stdout, stderr }));
  });
}

export const processExecutor: Executor = { run };

/** Como `which`: primer ejecutable en PATH, o undefined. */
export async function findExecutable(cmd: string, envPath = process.env.PATH ?? ''): Promise<string | undefined> {
  if (cmd.includes('/')) {
    return (await isExecutable(cmd)) ? cmd : undefined;
  }
  for (const dir of envPath.split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, cmd);
    if (await isExecutable(candidate)) return candidate;
  }
  return undefined;
}

async function isExecutable(p: string): Promise<boolean> {
  try {
    await access(p, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export function formatSize(bytes: number): string {
  if (!(bytes > 0)) return 'Unknown';
  const units = ['B', 'KiB', 'MiB', 'GiB', 'TiB'];
  let value = bytes;
  let unit = units[0];
  for (unit of units) {
    if (value < 1024) break;
    if (unit === units[units.length - 1]) break;
    value /= 1024;
  }
  return `${value.toFixed(1)} ${unit}`;
}

export function formatProgressLine(label: string, current: number, total: number | null): string {
  if (total !== null && total > 0) {
    const percent = ((current / total) * 100).toFixed(1).padStart(5);
    return `${label}: ${percent}% (${formatSize(current)} / ${formatSize(total)})`;
  }
  return `${label}: ${formatSize(current)}`;
}

export function isRoot(): boolean {
  return typeof process.geteuid === 'function' && process.geteuid() === 0;
}

/** Rechaza con `onTimeout()` si `op` no terminó en `timeoutMs`. */
export async function withTimeout<T>(op: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });
  try {
    return await Promise.race([op, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
