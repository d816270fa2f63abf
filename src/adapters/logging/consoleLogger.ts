import type { LoggerPort } from "../../application/ports";

export class ConsoleLogger implements LoggerPort {
  constructor(private readonly prefix = "") {}

  info(message: string): void {
    console.log(this.prefix ? `${this.prefix} ${message}` : message);
  }

  warn(message: string): void {
    console.warn(this.prefix ? `${this.prefix} Advertencia: ${message}` : `Advertencia: ${message}`);
  }
}

export const consoleLogger: LoggerPort = new ConsoleLogger("[cover]");
