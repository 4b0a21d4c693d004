export interface LoggerBackend {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  debug?(msg: string): void;
}

const PREFIX = "[ledger]";

const consoleBackend: LoggerBackend = {
  info: (msg) => console.log(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
  debug: (msg) => console.debug(msg),
};

let backend: LoggerBackend = consoleBackend;
let debugEnabled = false;

/**
 * Install the sink every `log.*` call writes to. The CLI passes the console;
 * tests pass a collector. Debug lines are dropped unless `debug` is true.
 */
export function initLogger(next: LoggerBackend | undefined, debug: boolean): void {
  backend = next ?? consoleBackend;
  debugEnabled = debug;
}

function format(msg: string, extra: unknown[]): string {
  const tail = extra
    .map((e) => (e instanceof Error ? e.message : String(e)))
    .join(" ");
  return tail.length > 0 ? `${PREFIX} ${msg} ${tail}` : `${PREFIX} ${msg}`;
}

export const log = {
  info(msg: string, ...extra: unknown[]): void {
    backend.info(format(msg, extra));
  },
  warn(msg: string, ...extra: unknown[]): void {
    backend.warn(format(msg, extra));
  },
  error(msg: string, ...extra: unknown[]): void {
    backend.error(format(msg, extra));
  },
  debug(msg: string, ...extra: unknown[]): void {
    if (!debugEnabled) return;
    (backend.debug ?? backend.info).call(backend, format(msg, extra));
  },
};
