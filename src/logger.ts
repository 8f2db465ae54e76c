import { Logger } from "@vscode/debugadapter";

/**
 * Logger which discards all output
 */
export class NullLogger implements Logger.ILogger {
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  log(_message: string) {
    return;
  }
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  verbose(_message: string) {
    return;
  }
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  warn(_message: string) {
    return;
  }
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  error(_message: string) {
    return;
  }
}
