/**
 * Console logger with timestamped, levelled lines.
 */

let verbose = false;

function ts(): string {
  return new Date().toISOString().slice(11, 23);
}

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export function isVerbose(): boolean {
  return verbose;
}

export function debug(msg: string): void {
  if (verbose) {
    console.log(`${ts()} [DEBUG] ${msg}`);
  }
}

export function info(msg: string): void {
  console.log(`${ts()} ${msg}`);
}

export function warn(msg: string): void {
  console.warn(`${ts()} [WARN] ${msg}`);
}

export function error(msg: string, err?: unknown): void {
  const detail = err ? ` ${err instanceof Error ? err.stack || err.message : String(err)}` : '';
  console.error(`${ts()} [ERROR] ${msg}${detail}`);
}
