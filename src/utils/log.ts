function stamp(message: string): string {
  return `[${new Date().toISOString()}] ${message}`;
}

export function log(message: string) {
  // eslint-disable-next-line no-console
  console.log(stamp(message));
}

export function warn(message: string) {
  // eslint-disable-next-line no-console
  console.warn(stamp(message));
}

export function logError(message: string, err?: unknown) {
  // eslint-disable-next-line no-console
  if (err === undefined) console.error(stamp(message));
  // eslint-disable-next-line no-console
  else console.error(stamp(message), err);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
