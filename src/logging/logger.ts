export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    info: (message) => log("INFO", prefix, message),
    warn: (message) => log("WARN", prefix, message),
    error: (message) => log("ERROR", prefix, message),
    child: (childScope) => createLogger(`${scope}:${childScope}`),
  };
}

export function createNullLogger(): Logger {
  const logger: Logger = {
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
    child: () => logger,
  };
  return logger;
}

function log(level: string, prefix: string, message: string): void {
  const timestamp = new Date().toISOString();
  process.stdout.write(`${timestamp} ${level} ${prefix} ${message}\n`);
}
