// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

/**
 * 16-bit tag identifying a destination domain (chain) on the relay network.
 */
type DomainId = number;

/**
 * A decoded greeting as it travels between domains.
 */
interface IGreeting {
    readonly text: string;              // UTF-8 greeting text
    readonly sender: string;            // Address of the participant that sent it
}

/**
 * The most recently received greeting along with where it came from.
 */
interface ILatestGreeting {
    readonly text: string;
    readonly sourceDomain: DomainId;
    readonly sender: string;
}

/**
 * Notification emitted for every greeting applied by the receiver.
 */
interface IGreetingReceived extends ILatestGreeting {
    readonly deliveryHash: string;
}

/**
 * Everything the relay service hands over when it invokes the delivery callback.
 */
interface IDelivery {
    payload: string;                    // Encoded greeting (hex)
    additionalMessages: string[];       // Extra proof material, currently unused
    sourceAddress: string;              // Address that dispatched the payload on the source domain
    sourceDomain: DomainId;             // Domain the payload was dispatched from
    deliveryHash: string;               // Relay-owned identifier of this delivery attempt
}

export type { DomainId, IGreeting, ILatestGreeting, IGreetingReceived, IDelivery };
