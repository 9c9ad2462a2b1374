// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

type RelayEventType = 'GREETING:QUOTED' | 'GREETING:SENT' | 'GREETING:RECEIVED' | 'GREETING:REJECTED';

/**
 * One line of relay traffic: what happened, on which domain, and the values involved.
 */
interface IRelayEvent {
    type: RelayEventType;
    domain: number;             // Target domain for outbound events, source domain for inbound ones
    address?: string;           // Counterparty address
    text?: string;              // Greeting text, when known
    cost?: string;              // Quoted or paid cost in native units
    detail?: string;            // Transaction hash, delivery hash or failure reason
}

export type { RelayEventType, IRelayEvent };
