import type { FileEvent } from '@vaultwatch/shared';
import { errorMessage } from './errors';
import type { MetricsSink } from './metrics';
import type { HandlerTelemetry } from './telemetry';
import type { FeatureHandler, RoutedResult } from './handlers/types';

/**
 * Exclusive dispatch: each event goes to the first handler, in registration
 * order, whose `canHandle` returns true. No chaining, no fan-out.
 */
export class EventRouter {
  private readonly handlers: readonly FeatureHandler[];

  constructor(
    handlers: FeatureHandler[],
    private telemetry: HandlerTelemetry,
    private metrics: MetricsSink
  ) {
    const names = new Set<string>();
    for (const handler of handlers) {
      if (names.has(handler.name)) throw new Error(`Duplicate handler name: ${handler.name}`);
      names.add(handler.name);
    }
    this.handlers = [...handlers];
  }

  handlerNames(): string[] {
    return this.handlers.map((h) => h.name);
  }

  /** Route one event. Resolves null when no handler claimed it. */
  async route(event: FileEvent): Promise<RoutedResult | null> {
    for (const handler of this.handlers) {
      if (!(await this.claims(handler, event))) continue;
      return this.telemetry.invoke(handler.name, event.path, () => handler.handle(event));
    }

    this.metrics.incrementCounter('events_unclaimed');
    console.debug(`[router] No handler for ${event.kind} ${event.path}`);
    return null;
  }

  private async claims(handler: FeatureHandler, event: FileEvent): Promise<boolean> {
    try {
      return await handler.canHandle(event);
    } catch (err) {
      console.warn(`[router] ${handler.name}.canHandle failed for ${event.path}:`, errorMessage(err));
      return false;
    }
  }
}
