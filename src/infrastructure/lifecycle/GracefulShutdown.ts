import { Logger } from "../../application/interfaces/Logger";

export interface ShutdownTarget {
  shutdown(timeoutMs?: number): Promise<unknown>;
}

export interface SignalSource {
  once(signal: NodeJS.Signals, listener: () => void): unknown;
}

export interface GracefulShutdownOptions {
  logger: Logger;
  timeoutMs?: number;
  signals?: NodeJS.Signals[];
  processRef?: SignalSource;
  exit?: (code: number) => void;
}

/**
 * Drains `target` when the process is asked to terminate, then exits.
 * Returns the shutdown routine so the host can also run it from its own hooks.
 */
export function registerGracefulShutdown(
  target: ShutdownTarget,
  options: GracefulShutdownOptions
): (signal: string) => Promise<void> {
  const {
    logger,
    timeoutMs,
    signals = ["SIGTERM", "SIGINT"],
    processRef = process,
    exit = (code: number) => process.exit(code),
  } = options;
  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down gracefully`);

    try {
      const result = await target.shutdown(timeoutMs);
      logger.info("Application shutdown completed", { result });
      exit(0);
    } catch (error) {
      logger.error("Error during shutdown", {
        error: error instanceof Error ? error.message : String(error),
      });
      exit(1);
    }
  };

  for (const signal of signals) {
    processRef.once(signal, () => {
      void shutdown(signal);
    });
  }

  return shutdown;
}
