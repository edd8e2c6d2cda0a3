/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * Synchronous, in-process event bus for assembly observability.
 *
 * @module @relatedfeed/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";

/**
 * In-memory EventBus implementation.
 *
 * Handlers registered for "*" receive every event after the
 * type-specific handlers. A throwing handler is reported on stderr and
 * does not stop delivery to the others.
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus();
 *
 * bus.subscribe("feed:recordEmitted", (event) => {
 *     console.log("Emitted:", event.data);
 * });
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private readonly handlers: Map<EventType | "*", Set<EventHandler>> = new Map();

    emit(event: EventPayload): void {
        this.dispatch(event.type, event);
        this.dispatch("*", event);
    }

    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription {
        let handlers = this.handlers.get(eventType);
        if (!handlers) {
            handlers = new Set();
            this.handlers.set(eventType, handlers);
        }
        handlers.add(handler);

        return {
            unsubscribe: () => {
                const registered = this.handlers.get(eventType);
                if (!registered) {
                    return;
                }
                registered.delete(handler);
                if (registered.size === 0) {
                    this.handlers.delete(eventType);
                }
            },
        };
    }

    once(eventType: EventType, handler: EventHandler): Subscription {
        const subscription = this.subscribe(eventType, (event) => {
            subscription.unsubscribe();
            handler(event);
        });
        return subscription;
    }

    clear(eventType?: EventType | "*"): void {
        if (eventType === undefined || eventType === "*") {
            this.handlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    /**
     * Number of handlers for an event type. Useful for testing.
     */
    handlerCount(eventType: EventType | "*"): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private dispatch(key: EventType | "*", event: EventPayload): void {
        const handlers = this.handlers.get(key);
        if (!handlers) {
            return;
        }

        // Snapshot so once() handlers can unsubscribe mid-dispatch
        for (const handler of [...handlers]) {
            try {
                handler(event);
            }
            catch (error) {
                console.error(`EventBus handler error for ${event.type}:`, error);
            }
        }
    }
}
