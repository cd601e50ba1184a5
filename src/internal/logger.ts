export interface Logger {
  clone(): Logger;
  setContext(context: string | undefined): void;
  trace(message: string, ...attributes: unknown[]): void;
  debug(message: string, ...attributes: unknown[]): void;
  info(message: string, ...attributes: unknown[]): void;
  warn(message: string, ...attributes: unknown[]): void;
  error(message: string, ...attributes: unknown[]): void;
}

export class ConsoleLogger implements Logger {
  #context: string | undefined;

  constructor(context?: string) {
    this.#context = context;
  }

  clone(): ConsoleLogger {
    return new ConsoleLogger(this.#context);
  }

  setContext(context: string | undefined): void {
    this.#context = context;
  }

  trace(message: string, ...attributes: unknown[]): void {
    if (this.#context) console.trace(this.#context, message, ...attributes);
    else console.trace(message, ...attributes);
  }

  debug(message: string, ...attributes: unknown[]): void {
    if (this.#context) console.debug(this.#context, message, ...attributes);
    else console.debug(message, ...attributes);
  }

  info(message: string, ...attributes: unknown[]): void {
    if (this.#context) console.info(this.#context, message, ...attributes);
    else console.info(message, ...attributes);
  }

  warn(message: string, ...attributes: unknown[]): void {
    if (this.#context) console.warn(this.#context, message, ...attributes);
    else console.warn(message, ...attributes);
  }

  error(message: string, ...attributes: unknown[]): void {
    if (this.#context) console.error(this.#context, message, ...attributes);
    else console.error(message, ...attributes);
  }
}

export class SilentLogger implements Logger {
  clone(): SilentLogger {
    return new SilentLogger();
  }

  setContext(): void {}
  trace(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}
