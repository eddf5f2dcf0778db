/**
 * Console-shaped logger. Defaults to `console`; pass your own to route or silence
 * client diagnostics.
 */
export type Logger = Pick<Console, 'debug' | 'warn' | 'error'>;

export const defaultLogger: Logger = console;
