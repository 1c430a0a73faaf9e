import process from "node:process";

/**
 * Where interrupt handlers get installed. The process is the real source;
 * tests pass an EventEmitter-backed stand-in.
 */
export interface SignalSource {
  onSignal(signal: NodeJS.Signals, handler: () => void): void;
  offSignal(signal: NodeJS.Signals, handler: () => void): void;
}

export const processSignals: SignalSource = {
  onSignal: (signal, handler) => {
    process.on(signal, handler);
  },
  offSignal: (signal, handler) => {
    process.off(signal, handler);
  }
};

export interface CancellationOptions {
  source?: SignalSource;
  signals?: NodeJS.Signals[];
  /** Called once, from the signal handler, when the first interrupt arrives */
  onInterrupt?: (signal: NodeJS.Signals) => void;
}

/** Read side of a cancellation context, handed to the download code. */
export interface CancellationToken {
  readonly isCancelled: boolean;
  observe(): Promise<void>;
  /**
   * Registers a one-shot listener and returns its removal. A listener added
   * after cancellation runs immediately.
   */
  subscribe(listener: () => void): () => void;
}

// Sources that currently have a live context; an entry is owned by that context.
const owners = new WeakMap<SignalSource, CancellationContext>();

/**
 * One-shot cancellation latch bound to OS interrupt signals.
 *
 * Constructing the context installs the handlers on its signal source and
 * `dispose()` removes them. A source can be owned by one live context at a
 * time; a second construction throws.
 */
export class CancellationContext implements CancellationToken {
  private cancelled = false;
  private disposed = false;
  private readonly source: SignalSource;
  private readonly signals: NodeJS.Signals[];
  private readonly onInterrupt?: (signal: NodeJS.Signals) => void;
  private readonly latch: Promise<void>;
  private release: () => void = () => undefined;
  private readonly handlers = new Map<NodeJS.Signals, () => void>();
  private readonly listeners = new Set<() => void>();

  constructor(options: CancellationOptions = {}) {
    this.source = options.source ?? processSignals;
    this.signals = options.signals ?? ["SIGINT"];
    this.onInterrupt = options.onInterrupt;

    if (owners.has(this.source)) {
      throw new Error(
        "A cancellation context is already installed for this signal source; dispose it before creating another"
      );
    }

    this.latch = new Promise<void>((resolve) => {
      this.release = resolve;
    });

    for (const signal of this.signals) {
      const handler = (): void => {
        if (!this.cancelled) {
          this.onInterrupt?.(signal);
        }
        this.trigger();
      };
      this.handlers.set(signal, handler);
      this.source.onSignal(signal, handler);
    }
    owners.set(this.source, this);
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /** Latches the context; later calls have no effect. */
  trigger(): void {
    if (this.cancelled) {
      return;
    }
    this.cancelled = true;
    this.release();
    const listeners = [...this.listeners];
    this.listeners.clear();
    for (const listener of listeners) {
      listener();
    }
  }

  /** Resolves once cancelled, immediately on every call after that. */
  observe(): Promise<void> {
    return this.latch;
  }

  subscribe(listener: () => void): () => void {
    if (this.cancelled) {
      listener();
      return () => undefined;
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Listeners still waiting for cancellation. */
  get pendingListeners(): number {
    return this.listeners.size;
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    for (const [signal, handler] of this.handlers) {
      this.source.offSignal(signal, handler);
    }
    this.handlers.clear();
    this.listeners.clear();
    if (owners.get(this.source) === this) {
      owners.delete(this.source);
    }
  }
}
