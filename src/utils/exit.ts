export interface Flushable {
  flush(cb: (err?: Error) => void): void;
}

/**
 * Exit once `target` has flushed. A pino-pretty transport writes from a worker
 * thread, so exiting straight away can drop its last lines.
 */
export function exitAfterFlush(
  target: Flushable,
  code: number,
  exit: (code: number) => void = c => process.exit(c)
): void {
  target.flush(() => exit(code));
}
