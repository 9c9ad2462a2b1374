// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

import type { ethers } from "ethers";
import type { IRelayService } from "../types/IRelayService.js";
import type { DomainId } from "../types/IGreeting.js";
import { GAS_LIMIT, RECEIVER_VALUE } from "../constants.js";
import { UpstreamError } from "../errors.js";

/**
 * Quotes the delivery cost of a greeting. Every call asks the relay service again.
 */
export class ServiceQuote {
    constructor(private relayService: IRelayService) {}

    async quote(targetDomain: DomainId): Promise<ethers.BigNumber> {
        try {
            const { cost } = await this.relayService.quoteDeliveryPrice(targetDomain, RECEIVER_VALUE, GAS_LIMIT);
            return cost;
        } catch (err) {
            throw UpstreamError.from(err);
        }
    }
}
