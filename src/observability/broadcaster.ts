import type { ObservabilityAdapter } from "../core/types.js";

/**
 * Fans observability events out to every configured adapter.
 *
 * **Failure Policy:**
 * - Adapters never break or abort the calling operation
 * - Each adapter is invoked independently
 * - Failures are aggregated and written to console.error, not to the
 *   adapters themselves (which would loop)
 */
export class ObservabilityBroadcaster {
  readonly adapters: readonly ObservabilityAdapter[];

  constructor(adapters: ObservabilityAdapter[]) {
    this.adapters = adapters;
  }

  broadcast(action: (adapter: ObservabilityAdapter) => void, actionName: string): void {
    const errors: Array<{ adapter: string; error: unknown }> = [];

    for (const obs of this.adapters) {
      try {
        action(obs);
      } catch (error) {
        errors.push({
          adapter: obs.constructor?.name || "UnknownObservabilityAdapter",
          error,
        });
      }
    }

    if (errors.length > 0) {
      const errorSummary = errors
        .map(
          ({ adapter, error }) =>
            `  - ${adapter}: ${error instanceof Error ? error.message : String(error)}`
        )
        .join("\n");

      console.error(
        `[zendesk-custom-objects] Observability failure in ${actionName} (${errors.length}/${this.adapters.length} adapters failed):\n${errorSummary}`
      );
    }
  }

  logInfo(message: string, metadata?: Record<string, unknown>): void {
    this.broadcast((obs) => obs.logInfo(message, metadata), "logInfo");
  }

  logWarning(message: string, metadata?: Record<string, unknown>): void {
    this.broadcast((obs) => obs.logWarning(message, metadata), "logWarning");
  }
}
