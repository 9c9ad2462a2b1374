// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

import type { ethers } from "ethers";
import type { DomainId, IDelivery, IGreetingReceived, ILatestGreeting } from "./IGreeting.js";
import type { IDeliveryEndpoint } from "./IRelayService.js";
import type { ISendReceipt } from "../services/ServiceSend.js";

type GreetingListener = (greeting: IGreetingReceived) => void;

/**
 * Interface for the HelloRelay class, which sends greetings through a relay service and
 * applies the ones delivered to it.
 */
interface IHelloRelay extends IDeliveryEndpoint {
    /**
     * Execution budget bought for every delivery.
     */
    readonly GAS_LIMIT: number;

    /**
     * Text of the latest greeting received.
     */
    readonly latestGreeting: string;

    /**
     * Quotes the cost of delivering a greeting to `targetDomain`.
     */
    quote(targetDomain: DomainId): Promise<ethers.BigNumber>;

    /**
     * Sends a greeting, paying the freshly quoted cost out of `fundsProvided`.
     */
    send(targetDomain: DomainId, targetAddress: string, text: string, fundsProvided: ethers.BigNumberish): Promise<ISendReceipt>;

    /**
     * Delivery callback, only to be invoked by the relay service.
     * @param caller - Address of the immediate caller.
     * @param delivery - The delivered payload and its provenance.
     */
    onDeliver(caller: string, delivery: IDelivery): ILatestGreeting;

    /**
     * The latest greeting with its source domain and sender.
     */
    latest(): ILatestGreeting;

    /**
     * Registers a listener for applied greetings.
     * @returns A function removing the listener again.
     */
    onGreetingReceived(listener: GreetingListener): () => void;
}

export type { GreetingListener, IHelloRelay };
