import type { TypedEventBus } from './EventBus';

export type LogClass = 'normal' | 'action' | 'combat' | 'production' | 'critical' | 'system';

export class Logger {
  constructor(
    private readonly bus: TypedEventBus,
    private readonly toConsole = true,
  ) {}

  log(text: string, type: LogClass = 'normal'): void {
    if (this.toConsole) console.log(`[${type.toUpperCase()}] ${text}`);
    this.bus.emit('logMessage', { text, cls: type });
  }
}
