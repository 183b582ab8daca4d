export interface TransportRequestOptions {
	timeoutMs: number;
	signal: AbortSignal;
	/** Motor id the reply must come from; replies from other ids are dropped. */
	expectedId?: number;
	/** Broadcast and no-reply writes resolve as soon as the bytes are out. */
	expectReply?: boolean;
}

export interface TransportAdapter {
	open(): Promise<void>;
	close(): Promise<void>;
	send(packet: Uint8Array, options: TransportRequestOptions): Promise<Uint8Array>;
}
