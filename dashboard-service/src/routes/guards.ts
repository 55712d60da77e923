import type { BrokerState } from '../state.js';
import { ApiError } from '../errors.js';

export function requireBroker(state: BrokerState): void {
  if (!state.isBrokerConnected()) throw new ApiError(503, 'broker_disconnected', 'Not connected to MQTT broker');
}

export function requireSysMonitor(state: BrokerState): void {
  requireBroker(state);
  if (!state.isSysSubscribed()) throw new ApiError(503, 'sys_not_subscribed', 'Not subscribed to broker statistics');
}

export function requireTopicTracker(state: BrokerState): void {
  requireBroker(state);
  if (!state.isTopicTrackerSubscribed()) {
    throw new ApiError(503, 'topic_tracker_not_subscribed', 'Not subscribed to topic tracking');
  }
}
