/**
 * Signal handling hook. A long-running command registers a handler that
 * stops scheduling new work; without one, a signal exits immediately.
 */

type ShutdownHandler = (signal: string) => void;

let handler: ShutdownHandler | null = null;

export function setShutdownHandler(fn: ShutdownHandler | null): void {
  handler = fn;
}

export function getShutdownHandler(): ShutdownHandler | null {
  return handler;
}
