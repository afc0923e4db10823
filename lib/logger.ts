/**
 * The sink for progress messages.
 *
 * `console` satisfies this interface; the GitHub Action routes it through
 * `@actions/core` instead.
 */
export interface ILogger {
    log(message: string): void;
    warn(message: string): void;
    time(label: string): void;
    timeEnd(label: string): void;
}

export const consoleLogger: ILogger = console;
