export type LogFn = (msg: string) => void;

export interface HostLog {
  debug: LogFn;
  warn: LogFn;
}

// Tagged console output; debug lines only print when enabled (MDHOST_DEBUG=1).
export function createLog(tag: string, debug: boolean): HostLog {
  const prefix = `[${tag}]`;
  return {
    debug: debug ? (msg) => console.log(`${prefix} ${msg}`) : () => {},
    warn: (msg) => console.warn(`${prefix} ${msg}`),
  };
}
