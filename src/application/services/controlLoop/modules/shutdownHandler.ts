// Turns SIGINT/SIGTERM into a single shutdown request the loop can observe
// at any suspension point (agent run, commit, delay).

export type ShutdownListener = (signal: NodeJS.Signals) => void;

export interface SignalSource {
  on(signal: NodeJS.Signals, listener: ShutdownListener): unknown;
  removeListener(signal: NodeJS.Signals, listener: ShutdownListener): unknown;
}

export type SleepResult = 'elapsed' | 'interrupted';

export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

export class ShutdownHandler {
  private requestedBy: NodeJS.Signals | null = null;
  private wakers = new Set<() => void>();
  private installed: ShutdownListener | null = null;

  constructor(
    private source: SignalSource = process,
    private signals: readonly NodeJS.Signals[] = SHUTDOWN_SIGNALS
  ) {}

  get isRequested(): boolean {
    return this.requestedBy !== null;
  }

  get signal(): NodeJS.Signals | null {
    return this.requestedBy;
  }

  /**
   * onShutdown fires once, for the first signal received
   */
  install(onShutdown: ShutdownListener): void {
    if (this.installed) {
      throw new Error('Shutdown handler is already installed');
    }

    const listener: ShutdownListener = (signal) => {
      if (this.requestedBy !== null) {
        return;
      }
      this.requestedBy = signal;
      for (const wake of this.wakers) {
        wake();
      }
      this.wakers.clear();
      onShutdown(signal);
    };

    for (const signal of this.signals) {
      this.source.on(signal, listener);
    }
    this.installed = listener;
  }

  uninstall(): void {
    const listener = this.installed;
    if (!listener) {
      return;
    }
    for (const signal of this.signals) {
      this.source.removeListener(signal, listener);
    }
    this.installed = null;
  }

  /**
   * Waits for ms, or less if a shutdown is requested meanwhile
   */
  sleep(ms: number): Promise<SleepResult> {
    if (this.isRequested) {
      return Promise.resolve('interrupted');
    }

    return new Promise<SleepResult>((resolve) => {
      const wake = (): void => {
        clearTimeout(timer);
        resolve('interrupted');
      };
      const timer = setTimeout(() => {
        this.wakers.delete(wake);
        resolve('elapsed');
      }, ms);
      this.wakers.add(wake);
    });
  }
}
