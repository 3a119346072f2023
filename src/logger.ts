// stdout carries the protocol, so every diagnostic goes to stderr.
export type Logger = (message: string) => void;

export function stderrLogger(scope: string): Logger {
  return (message) => console.error(`[${scope}] ${message}`);
}

export const quietLogger: Logger = () => {};
