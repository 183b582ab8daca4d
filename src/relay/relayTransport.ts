export const RELAY_CHANNELS = {
	telemetry: 'robot-telemetry',
	status: 'robot-status',
	/** Reserved for operator commands; nothing publishes on it yet. */
	control: 'robot-control'
} as const;

export type RelayChannelName = (typeof RELAY_CHANNELS)[keyof typeof RELAY_CHANNELS];

export type RelayListener = (payload: string) => void;

export interface RelaySubscription {
	unsubscribe(): void;
}

/**
 * Publish/subscribe seam between the relay clients and whatever carries the
 * messages. Publishing is fire-and-forget: delivery is not confirmed, and
 * `publish` returns false when the message could not even be handed off
 * (for example while reconnecting).
 */
export interface RelayTransport {
	connect(): Promise<void>;
	close(): Promise<void>;
	isConnected(): boolean;
	publish(channel: string, payload: string): boolean;
	subscribe(channel: string, listener: RelayListener): RelaySubscription;
}
