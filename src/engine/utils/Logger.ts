import { EventBus } from './EventBus';

export type LogClass = 'normal' | 'action' | 'combat' | 'economy' | 'debug' | 'critical' | 'system';

let consoleOutput = true;
let verbose = false;

export const Logger = {
  log(text: string, type: LogClass = 'normal'): void {
    if (consoleOutput && (type !== 'debug' || verbose)) {
      console.log(`[${type.toUpperCase()}] ${text}`);
    }
    EventBus.emit('logMessage', { text, cls: type });
  },

  /** Toggle console printing; `logMessage` events are emitted either way. */
  setConsoleOutput(enabled: boolean): void {
    consoleOutput = enabled;
  },

  /** Print `debug` lines (rejected actions, abandoned agent tasks). */
  setVerbose(enabled: boolean): void {
    verbose = enabled;
  },
};
