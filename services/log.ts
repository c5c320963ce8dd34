import createDebug from 'debug';

// stdout del worker es solo protocolo: debug escribe en stderr.
const root = createDebug('diskflash');

export type Logger = {
  log: (...a: unknown[]) => void;
  err: (...a: unknown[]) => void;
};

export function createLogger(scope: string): Logger {
  const info = root.extend(scope);
  const error = root.extend(`${scope}:error`);
  return {
    log: (...a) => info('%s', a.map(String).join(' ')),
    err: (...a) => error('%s', a.map(String).join(' ')),
  };
}
