/** Where commands write: results to `out` (stdout), diagnostics to `err` (stderr). */
export interface CommandIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

export const consoleIO: CommandIO = {
  out: line => console.log(line),
  err: line => console.error(line),
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
