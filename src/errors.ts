// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

import type { ethers } from "ethers";

/**
 * Base error for every failure raised by the greeting relay.
 */
export class RelayError extends Error {
    constructor(message?: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "RelayError";
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/** Raised for bad construction or send parameters. */
export class InvalidArgumentError extends RelayError {
    constructor(message?: string) {
        super(message);
        this.name = "InvalidArgumentError";
    }
}

/** Raised when the funds offered do not cover the quoted delivery cost. */
export class InsufficientFundsError extends RelayError {
    public readonly required: ethers.BigNumber;
    public readonly provided: ethers.BigNumber;

    constructor(required: ethers.BigNumber, provided: ethers.BigNumber) {
        super(`insufficient funds: ${provided.toString()} provided, ${required.toString()} required`);
        this.name = "InsufficientFundsError";
        this.required = required;
        this.provided = provided;
    }
}

/** Raised when the delivery callback is invoked by anyone but the trusted relay service. */
export class UnauthorizedError extends RelayError {
    public readonly caller: string;

    constructor(caller: string) {
        super(`unauthorized deliverer ${caller}`);
        this.name = "UnauthorizedError";
        this.caller = caller;
    }
}

/** Raised when an inbound payload does not decode as a greeting. */
export class DecodeError extends RelayError {
    constructor(message?: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "DecodeError";
    }
}

/** Raised when a delivery hash has already been applied and replays are rejected. */
export class ReplayedDeliveryError extends RelayError {
    public readonly deliveryHash: string;

    constructor(deliveryHash: string) {
        super(`delivery ${deliveryHash} already applied`);
        this.name = "ReplayedDeliveryError";
        this.deliveryHash = deliveryHash;
    }
}

/**
 * Failure reported by the relay service's pricing or dispatch calls. Keeps the upstream
 * message as is and the upstream error as `cause`.
 */
export class UpstreamError extends RelayError {
    constructor(message?: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "UpstreamError";
    }

    static from(err: unknown): UpstreamError {
        if (err instanceof UpstreamError) return err;
        const message = err instanceof Error ? err.message : String(err);
        return new UpstreamError(message, { cause: err });
    }
}
