// Supported process signals as string literal types
export type Signals = 'SIGINT' | 'SIGTERM';

export type Closer = () => void | Promise<void>;

export type ShutdownRegistry = {
  /** Registra un closer; los closers se ejecutan en orden inverso al registro. */
  readonly register: (closer: Closer) => () => void;
  readonly shutdown: (signal?: Signals) => Promise<void>;
  readonly bind: () => void;
  readonly isShuttingDown: () => boolean;
};

export type ShutdownRegistryOptions = {
  readonly onError?: (error: unknown) => void;
  /** Reenvía la señal original una vez cerrados los recursos (por defecto: true). */
  readonly resendSignal?: boolean;
  readonly target?: SignalTarget;
};

/** La parte de `process` que usa el registro. */
export type SignalTarget = {
  readonly pid: number;
  once(event: Signals, listener: () => void): unknown;
  kill(pid: number, signal: Signals): unknown;
};

const SIGNALS_TO_HANDLE: Signals[] = ['SIGINT', 'SIGTERM'];

export function createShutdownRegistry(options: ShutdownRegistryOptions = {}): ShutdownRegistry {
  const { onError, resendSignal = true, target = process } = options;

  const closersStack: Closer[] = [];
  const closersSet = new Set<Closer>();

  let shuttingDown = false;
  let bound = false;
  let shutdownPromise: Promise<void> | null = null;

  const runClosers = async (): Promise<void> => {
    const recordedClosers = closersStack.slice();
    closersStack.length = 0;

    for (let index = recordedClosers.length - 1; index >= 0; index -= 1) {
      const closer = recordedClosers[index];
      if (!closersSet.has(closer)) {
        continue;
      }

      closersSet.delete(closer);

      try {
        await closer();
      } catch (error) {
        if (onError) {
          onError(error);
        } else {
          // eslint-disable-next-line no-console
          console.error('[signals] Error al ejecutar un closer registrado:', error);
        }
      }
    }

    closersSet.clear();
  };

  const shutdown = (signal?: Signals): Promise<void> => {
    if (shuttingDown && shutdownPromise) {
      return shutdownPromise;
    }

    shuttingDown = true;
    shutdownPromise = runClosers().then(() => {
      if (signal && resendSignal) {
        // Reenvía la señal original para permitir que Node finalice el proceso.
        setImmediate(() => {
          try {
            target.kill(target.pid, signal);
          } catch (error) {
            onError?.(error);
          }
        });
      }
    });

    return shutdownPromise;
  };

  const bind = (): void => {
    if (bound) {
      return;
    }
    bound = true;

    for (const signal of SIGNALS_TO_HANDLE) {
      target.once(signal, () => {
        void shutdown(signal);
      });
    }
  };

  const register = (closer: Closer): (() => void) => {
    closersStack.push(closer);
    closersSet.add(closer);

    return () => {
      closersSet.delete(closer);
    };
  };

  return {
    register,
    shutdown,
    bind,
    isShuttingDown: () => shuttingDown,
  };
}
