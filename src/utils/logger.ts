export type LogMeta = Record<string, unknown>;

export function logInfo(message: string, meta: LogMeta = {}) {
  const payload = { level: 'info', message, ...meta };
  console.log(JSON.stringify(payload));
}

export function logWarn(message: string, meta: LogMeta = {}) {
  const payload = { level: 'warn', message, ...meta };
  console.warn(JSON.stringify(payload));
}

export function logError(message: string, meta: LogMeta = {}) {
  const payload = { level: 'error', message, ...meta, ...(meta.err instanceof Error ? { err: meta.err.message } : {}) };
  console.error(JSON.stringify(payload));
}
