/**
 * @fileoverview Synchronous in-process event bus
 *
 * Dispatch completes before emit() returns, so subscribers observe a
 * step's events before step() returns.
 *
 * @module @bandit-router/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";
import type { Logger } from "../contracts/Logger.js";
import { createConsoleLogger } from "../contracts/Logger.js";

export interface InMemoryEventBusOptions {
    /** Receives handler failures (default: console logger tagged "EventBus") */
    readonly logger?: Logger;
}

/**
 * Handlers are kept per type in insertion order. A handler that throws is
 * logged and the remaining handlers still run.
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus();
 *
 * bus.subscribe("feedback:resolved", (event) => {
 *     console.log("Resolved:", event.data);
 * });
 *
 * bus.emit(createEvent("feedback:resolved", { classifierName: "Model A" }));
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private readonly handlers = new Map<string, Set<EventHandler>>();
    private readonly logger: Logger;

    constructor(options: InMemoryEventBusOptions = {}) {
        this.logger = options.logger ?? createConsoleLogger("EventBus");
    }

    /** Typed handlers first, then "*" handlers. */
    emit(event: EventPayload): void {
        this.dispatch(this.handlers.get(event.type), event, event.type);
        this.dispatch(this.handlers.get("*"), event, "*");
    }

    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription {
        const registered = this.handlers.get(eventType) ?? new Set<EventHandler>();
        registered.add(handler);
        this.handlers.set(eventType, registered);

        const unsubscribe = (): void => {
            const current = this.handlers.get(eventType);
            current?.delete(handler);
            if (current?.size === 0) {
                this.handlers.delete(eventType);
            }
        };

        return { unsubscribe };
    }

    once(eventType: EventType, handler: EventHandler): Subscription {
        const subscription: Subscription = this.subscribe(eventType, (event) => {
            subscription.unsubscribe();
            handler(event);
        });
        return subscription;
    }

    /** "*" or no argument removes every handler. */
    clear(eventType?: EventType | "*"): void {
        if (eventType !== undefined && eventType !== "*") {
            this.handlers.delete(eventType);
            return;
        }
        this.handlers.clear();
    }

    /** Handlers currently registered for exactly this key. */
    handlerCount(eventType: EventType | "*"): number {
        const registered = this.handlers.get(eventType);
        return registered ? registered.size : 0;
    }

    private dispatch(handlers: Set<EventHandler> | undefined, event: EventPayload, channel: string): void {
        if (!handlers) {
            return;
        }

        // Copy so once() handlers can unsubscribe mid-dispatch
        for (const handler of [...handlers]) {
            try {
                handler(event);
            }
            catch (error) {
                this.logger.error("Event handler failed", {
                    eventType: event.type,
                    channel,
                    error    : error instanceof Error ? error.message : String(error),
                });
            }
        }
    }
}
