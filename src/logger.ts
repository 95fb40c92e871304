/** Console logger with timestamp and component tag */

type LogArgs = unknown[];

export interface Logger {
  info: (...a: LogArgs) => void;
  warn: (...a: LogArgs) => void;
  error: (...a: LogArgs) => void;
}

// CLIs that print data on stdout keep it clean by moving info lines to stderr
let infoToStderr = false;

export function sendInfoToStderr(enabled = true): void {
  infoToStderr = enabled;
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    info: (...a) => (infoToStderr ? console.error : console.log)(new Date().toISOString(), prefix, ...a),
    warn: (...a) => console.warn(new Date().toISOString(), prefix, ...a),
    error: (...a) => console.error(new Date().toISOString(), prefix, ...a),
  };
}
