type ClosableServer = {
  close: (callback?: (error?: Error) => void) => unknown;
};

type SignalSource = {
  on: (signal: NodeJS.Signals, listener: () => void) => unknown;
};

type ShutdownLogger = {
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
};

/** Close `server` on SIGTERM/SIGINT, then exit; a second signal is ignored. */
export function installGracefulShutdown(
  server: ClosableServer,
  options?: {
    service?: string;
    logger?: ShutdownLogger;
    cleanup?: () => void;
    exit?: (code: number) => void;
    signals?: SignalSource;
  },
): void {
  let stopping = false;
  const service = options?.service ?? "server";
  const exit = options?.exit ?? ((code: number) => process.exit(code));

  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;

    options?.logger?.info("shutdown_started", { service, signal });
    try {
      options?.cleanup?.();
    } catch (error) {
      options?.logger?.warn("shutdown_cleanup_failed", { service, error: String(error) });
    }

    server.close((error) => {
      if (error) {
        options?.logger?.warn("shutdown_stop_failed", { service, error: error.message });
        exit(1);
        return;
      }
      options?.logger?.info("shutdown_complete", { service });
      exit(0);
    });
  };

  const signals = options?.signals ?? process;
  signals.on("SIGTERM", () => shutdown("SIGTERM"));
  signals.on("SIGINT", () => shutdown("SIGINT"));
}
