import { createLogger } from '../logger';

export const EXIT_INTERRUPTED = 130;

const logger = createLogger('interrupt');

export interface SignalSource {
  on(event: NodeJS.Signals, listener: () => void): unknown;
  off(event: NodeJS.Signals, listener: () => void): unknown;
}

export interface InterruptOptions {
  message?: string;
  signals?: readonly NodeJS.Signals[];
  target?: SignalSource;
  /** Called on a second interruption, while the first is still being handled. */
  forceExit?: (signal: NodeJS.Signals) => void;
}

const DEFAULT_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

function exitImmediately(): void {
  process.exit(EXIT_INTERRUPTED);
}

/**
 * Runs `callback` once on the first interruption. A repeated signal removes
 * the listeners and calls `forceExit`. Returns a disposer that removes the
 * listeners.
 */
export function onInterrupt(
  callback: (signal: NodeJS.Signals) => void,
  options: InterruptOptions = {},
): () => void {
  const target = options.target ?? process;
  const signals = options.signals ?? DEFAULT_SIGNALS;
  const message = options.message ?? 'Process interrupted. Exiting...';
  const forceExit = options.forceExit ?? exitImmediately;
  let invoked = false;

  const dispose = () => {
    for (const { signal, listener } of listeners) {
      target.off(signal, listener);
    }
  };

  const listeners = signals.map((signal) => {
    const listener = () => {
      if (invoked) {
        dispose();
        logger.line(`Interrupted again (${signal}). Exiting without saving.`);
        forceExit(signal);
        return;
      }
      invoked = true;
      logger.line(`${message} (${signal})`);
      try {
        callback(signal);
      } catch (error) {
        logger.failure(error);
      }
    };
    target.on(signal, listener);
    return { signal, listener };
  });

  return dispose;
}

export interface InterruptSignal {
  signal: AbortSignal;
  dispose(): void;
}

export function createInterruptSignal(options: InterruptOptions = {}): InterruptSignal {
  const controller = new AbortController();
  const dispose = onInterrupt((signal) => controller.abort(signal), options);
  return { signal: controller.signal, dispose };
}
