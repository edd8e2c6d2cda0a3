/**
 * @fileoverview EventBus Contract
 *
 * Observability channel for assembly runs. The orchestrator publishes
 * one event per lifecycle step; subscribers never influence the run.
 *
 * Design decisions:
 * - Synchronous dispatch
 * - In-memory implementation, no external queue
 * - Ordering is preserved within a single run
 *
 * @module @relatedfeed/engine/contracts/EventBus
 */

/**
 * Event payload base interface.
 */
export interface EventPayload {
    /** Event type identifier */
    readonly type: EventType;

    /** ISO timestamp when event was emitted */
    readonly timestamp: string;

    /** Trace ID of the assembly run */
    readonly traceId?: string;

    /** Event-specific data */
    readonly data?: Record<string, unknown>;
}

/**
 * Events emitted over the life of one assembly run.
 */
export type FeedEventType =
    | "feed:started"
    | "feed:phase"
    | "feed:recordEmitted"
    | "feed:unrecognized"
    | "feed:accessDenied"
    | "feed:shortfall"
    | "feed:completed"
    | "feed:failed";

/**
 * All known event types; adapters may publish their own.
 */
export type EventType = FeedEventType | (string & {});

/**
 * Event handler function signature.
 */
export type EventHandler<T extends EventPayload = EventPayload> = (event: T) => void;

/**
 * Subscription handle returned when subscribing to events.
 */
export interface Subscription {
    unsubscribe(): void;
}

/**
 * EventBus interface.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * const sub = bus.subscribe("feed:shortfall", (event) => {
 *     console.log("Short feed:", event.data);
 * });
 *
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    emit(event: EventPayload): void;

    /**
     * @param eventType - The event type to subscribe to (or "*" for all events)
     * @param handler - Called synchronously for each matching event
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription;

    /** Subscribe for a single event, then unsubscribe automatically. */
    once(eventType: EventType, handler: EventHandler): Subscription;

    /** Remove subscriptions for a type, or all of them. */
    clear(eventType?: EventType | "*"): void;
}

/**
 * Build an event payload stamped with the current time.
 */
export function createEvent(
    type: EventType,
    data?: Record<string, unknown>,
    traceId?: string
): EventPayload {
    return {
        type,
        timestamp: new Date().toISOString(),
        traceId,
        data,
    };
}
