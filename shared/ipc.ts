import { z } from 'zod';

export type BlockDevice = {
  readonly name: string; // p.ej. sdb
  readonly path: string; // /dev/sdb
  readonly size: number; // bytes, 0 si el kernel no lo informa
  readonly model: string;
  readonly removable: boolean;
  readonly transport: string | null; // usb, sata, nvme...
  readonly description: string;
  readonly mountpoints: readonly string[];
};

export type FlashPhase = 'write' | 'verify';

export type FlashParams = {
  imagePath: string; // ruta local
  devicePath: string; // destino
  chunkSize: number;
  verify: boolean;
  dryRun: boolean;
};

// Eventos del protocolo: un objeto JSON por línea en el stdout del worker.
export const flashEventSchema = z.discriminatedUnion('event', [
  z.object({
    event: z.literal('progress'),
    phase: z.enum(['write', 'verify']),
    current: z.number().int().nonnegative(),
    total: z.number().int().nonnegative().nullable(),
  }),
  z.object({ event: z.literal('status'), message: z.string() }),
  z.object({ event: z.literal('log'), message: z.string() }),
  z.object({
    event: z.literal('done'),
    bytes_written: z.number().int().nonnegative(),
    dry_run: z.boolean(),
  }),
  z.object({ event: z.literal('error'), message: z.string() }),
]);

export type FlashEvent = z.infer<typeof flashEventSchema>;
export type TerminalEvent = Extract<FlashEvent, { event: 'done' | 'error' }>;

export function isTerminal(event: FlashEvent): event is TerminalEvent {
  return event.event === 'done' || event.event === 'error';
}

export function encodeEvent(event: FlashEvent): string {
  return JSON.stringify(event) + '\n';
}

/** undefined para cualquier línea que no sea un evento válido. */
export function parseEventLine(line: string): FlashEvent | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return undefined;
  }
  const parsed = flashEventSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

// Estables: hay scripts que dependen de ellos.
export const ExitCode = {
  Success: 0,
  Failure: 1,
  WriteFailed: 2,
  VerificationFailed: 3,
  UnmountFailed: 4,
  PrivilegeUnavailable: 5,
  LaunchFailed: 6,
  WorkerUnmountFailed: 10,
  MissingArguments: 64,
  Unexpected: 99,
  Cancelled: 130,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export type FlashOutcome =
  | { ok: true; bytesWritten: number; dryRun: boolean }
  | { ok: false; message: string; exitCode: number };
