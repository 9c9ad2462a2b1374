// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

/**
 * Defines the structure for domain configuration details.
 */
export interface NetworkConfig {
    id: number;             // Domain identifier used by the relay service
    name: string;           // Human-readable name of the domain
    rpc: string;            // RPC URL for network interaction
    relayer: string;        // Address of the relay service contract on this domain
}

/**
 * Everything a node needs to talk to its home domain.
 */
export interface RelayConfig {
    nodePrivateKey: string;     // Key the node signs dispatches with
    network: NetworkConfig;
    dataStreamPort?: number;    // Port of the greeting data stream, if enabled
    debug: boolean;
}
