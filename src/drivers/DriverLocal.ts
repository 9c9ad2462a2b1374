// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

import type { ethers } from "ethers";
import type { DomainId } from "../types/IGreeting.js";
import type { IDeliveryQuote, IDispatchRequest, IDispatchResult } from "../types/IRelayService.js";
import DriverBase from "./DriverBase.js";
import { LocalRelayNetwork } from "./LocalRelayNetwork.js";

/**
 * A relay driver for one domain of an in-process {@link LocalRelayNetwork}.
 */
export default class DriverLocal extends DriverBase {
    constructor(private network: LocalRelayNetwork, domainId: DomainId) {
        super(domainId);
    }

    get address(): string {
        return this.network.address;
    }

    async quoteDeliveryPrice(targetDomain: DomainId, receiverValue: ethers.BigNumberish, gasLimit: ethers.BigNumberish): Promise<IDeliveryQuote> {
        return this.network.quote(targetDomain, receiverValue, gasLimit);
    }

    async dispatch(request: IDispatchRequest): Promise<IDispatchResult> {
        const result = this.network.enqueue(this.domainId, request);
        this.debug('dispatched ' + result.transactionHash);
        return result;
    }
}
