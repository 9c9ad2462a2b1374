// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

import type { ethers } from "ethers";
import type { DomainId, IDelivery } from "./IGreeting.js";

/**
 * Price returned by the relay service for one delivery.
 */
interface IDeliveryQuote {
    cost: ethers.BigNumber;                 // Native amount to attach to the dispatch
    refundPerGasUnused: ethers.BigNumber;   // Refund rate for unused execution budget on the target domain
}

/**
 * Arguments of a single dispatch to the relay service.
 */
interface IDispatchRequest {
    targetDomain: DomainId;
    targetAddress: string;
    payload: string;
    sender: string;                         // Address the relay will report as the source address
    receiverValue: ethers.BigNumber;
    gasLimit: number;
    value: ethers.BigNumber;                // Funds forwarded with the dispatch
}

/**
 * What the relay service reports back after accepting a dispatch.
 */
interface IDispatchResult {
    transactionHash: string;
    sequence?: number;
}

/**
 * Narrow view of an external relay service: pricing, dispatch and its on-network identity.
 */
interface IRelayService {
    /**
     * Address the relay service uses when it invokes delivery callbacks.
     */
    readonly address: string;

    /**
     * Asks the relay service what delivering `gasLimit` units of execution to `targetDomain` costs.
     */
    quoteDeliveryPrice(targetDomain: DomainId, receiverValue: ethers.BigNumberish, gasLimit: ethers.BigNumberish): Promise<IDeliveryQuote>;

    /**
     * Hands a payload to the relay service for delivery. Completion on the target domain is asynchronous.
     */
    dispatch(request: IDispatchRequest): Promise<IDispatchResult>;
}

/**
 * Anything the relay service can deliver to.
 */
interface IDeliveryEndpoint {
    onDeliver(caller: string, delivery: IDelivery): unknown;
}

export type { IDeliveryQuote, IDispatchRequest, IDispatchResult, IRelayService, IDeliveryEndpoint };
