/**
 * @fileoverview Simulation event contract
 *
 * Hosts follow steps, feedback resolution and prior updates through
 * these events instead of polling the read model. Dispatch is synchronous
 * and events of one type arrive in emission order.
 *
 * @module @bandit-router/engine/contracts/EventBus
 */

/**
 * One emitted event.
 */
export interface EventPayload {
    /** e.g. "prior:updated" */
    readonly type: string;

    /** ISO-8601 emission time */
    readonly timestamp: string;

    /** Shared by every event of one step */
    readonly traceId?: string;

    readonly data?: Record<string, unknown>;
}

/**
 * Events outside the step loop: construction, updates and runs.
 */
export type LifecycleEventType =
    | "simulation:created"
    | "parameters:updated"
    | "simulation:runStarted"
    | "simulation:runCompleted"
    | "simulation:runAborted";

/**
 * Events emitted from inside step().
 */
export type StepEventType =
    | "simulation:stepped"
    | "feedback:resolved"
    | "prior:updated";

/** Known types, open to host-defined ones */
export type EventType = LifecycleEventType | StepEventType | (string & {});

export type EventHandler<T extends EventPayload = EventPayload> = (event: T) => void;

export interface Subscription {
    /** Idempotent */
    unsubscribe(): void;
}

/**
 * Publish/subscribe channel between the engine and its hosts.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * const sub = bus.subscribe("prior:updated", (event) => {
 *     console.log("Prior updated:", event.data);
 * });
 *
 * bus.emit(createEvent("prior:updated", { classifierName: "Model A" }));
 *
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    /** Deliver to every matching handler before returning. */
    emit(event: EventPayload): void;

    /**
     * Register a handler for one type, or "*" for every event.
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription;

    /** Like subscribe(), removed after its first delivery. */
    once(eventType: EventType, handler: EventHandler): Subscription;

    /**
     * Drop the handlers of one type. "*" or no argument drops all of them.
     */
    clear(eventType?: EventType | "*"): void;
}

/**
 * Build a payload stamped with the current time.
 */
export function createEvent(type: EventType, data?: Record<string, unknown>, traceId?: string): EventPayload {
    const timestamp = new Date().toISOString();
    return { type, timestamp, traceId, data };
}
