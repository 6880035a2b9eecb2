import type { MatchEvent } from "../events.js";

/**
 * One-way, non-retained delivery of events to currently subscribed observers.
 *
 * Delivery is fire-and-forget: an observer that subscribes after an event fired never receives
 * it and must reconcile through the coordinator's query surface instead.
 */
export interface BroadcastChannel {
  publish(channel: string, event: MatchEvent): Promise<void>;
}
