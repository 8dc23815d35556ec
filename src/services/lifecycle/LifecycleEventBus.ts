import { Media, MediaDraft, Source } from '../../types/models.js';
import { logger } from '../../utils/logging.js';

/**
 * Entity lifecycle events and their payloads
 *
 * `media:before-save` hands over a draft the handlers may change; whatever
 * the draft holds once every handler returned is what gets written. With
 * `refilter` false the capture rules are not applied to that save, and with
 * `resave` false a source save queues no re-check of its media.
 */
export interface LifecycleEvents {
  'source:before-update': { previous: Source | null; next: Source };
  'source:after-create': { source: Source };
  'source:after-update': { source: Source; resave: boolean };
  'source:before-delete': { source: Source };
  'source:after-delete': { source: Source };
  'media:before-save': { draft: MediaDraft; source: Source; created: boolean; refilter: boolean };
  'media:after-create': { media: Media; source: Source };
  'media:after-update': { media: Media; source: Source };
  'media:before-delete': { media: Media; source: Source };
  'media:after-delete': { media: Media; source: Source };
}

export type LifecycleEvent = keyof LifecycleEvents;

export type LifecycleHandler<E extends LifecycleEvent> = (payload: LifecycleEvents[E]) => Promise<void>;

type HandlerTable = { [E in LifecycleEvent]: Array<LifecycleHandler<E>> };

/**
 * Lifecycle Event Bus
 *
 * Unlike an EventEmitter, emit() awaits every handler in registration order,
 * so a mutation only resolves once the rules it triggers have run. A handler
 * that throws stops the remaining handlers and rejects the emit.
 */
export class LifecycleEventBus {
  private handlers: HandlerTable = {
    'source:before-update': [],
    'source:after-create': [],
    'source:after-update': [],
    'source:before-delete': [],
    'source:after-delete': [],
    'media:before-save': [],
    'media:after-create': [],
    'media:after-update': [],
    'media:before-delete': [],
    'media:after-delete': [],
  };

  on<E extends LifecycleEvent>(event: E, handler: LifecycleHandler<E>): void {
    const registered: Array<LifecycleHandler<E>> = this.handlers[event];
    registered.push(handler);
  }

  async emit<E extends LifecycleEvent>(event: E, payload: LifecycleEvents[E]): Promise<void> {
    const registered: Array<LifecycleHandler<E>> = this.handlers[event];

    logger.debug('[LifecycleEventBus] Emitting lifecycle event', {
      service: 'LifecycleEventBus',
      operation: 'emit',
      event,
      handlers: registered.length,
    });

    for (const handler of registered) {
      await handler(payload);
    }
  }

  listenerCount(event: LifecycleEvent): number {
    return this.handlers[event].length;
  }
}
