/**
 * Minimal logger interface shared by the pipeline packages. Defaults to console.
 */
export interface PipelineLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const consoleLogger: PipelineLogger = {
  debug: (msg) => console.debug(msg),
  info: (msg) => console.log(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
};

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
