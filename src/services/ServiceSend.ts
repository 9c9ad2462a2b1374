// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

import { ethers } from "ethers";
import type { IDispatchResult, IRelayService } from "../types/IRelayService.js";
import type { DomainId } from "../types/IGreeting.js";
import { ServiceQuote } from "./ServiceQuote.js";
import { encodeGreeting } from "../codec/PayloadCodec.js";
import { GAS_LIMIT, RECEIVER_VALUE } from "../constants.js";
import { InsufficientFundsError, InvalidArgumentError, UpstreamError } from "../errors.js";
import { isNonZeroAddress } from "../utils/address.js";

export interface ISendReceipt extends IDispatchResult {
    cost: ethers.BigNumber;
}

/**
 * Validates, prices and dispatches outbound greetings.
 */
export class ServiceSend {
    constructor(
        private relayService: IRelayService,
        private quoter: ServiceQuote,
        private senderAddress: string
    ) {}

    /**
     * Sends `text` to `targetAddress` on `targetDomain`, paying exactly the freshly quoted cost.
     * Checks run in order: target address, text, quote, funds.
     *
     * @param fundsProvided Upper bound the caller is willing to pay.
     */
    async send(targetDomain: DomainId, targetAddress: string, text: string, fundsProvided: ethers.BigNumberish): Promise<ISendReceipt> {
        if (!isNonZeroAddress(targetAddress)) {
            throw new InvalidArgumentError('target address');
        }
        if (text.length === 0) {
            throw new InvalidArgumentError('empty message');
        }

        const cost = await this.quoter.quote(targetDomain);

        let funds: ethers.BigNumber;
        try {
            funds = ethers.BigNumber.from(fundsProvided);
        } catch {
            throw new InvalidArgumentError('funds');
        }
        if (funds.lt(cost)) {
            throw new InsufficientFundsError(cost, funds);
        }

        let result: IDispatchResult;
        try {
            result = await this.relayService.dispatch({
                targetDomain,
                targetAddress,
                payload: encodeGreeting(text, this.senderAddress),
                sender: this.senderAddress,
                receiverValue: ethers.BigNumber.from(RECEIVER_VALUE),
                gasLimit: GAS_LIMIT,
                value: cost,
            });
        } catch (err) {
            throw UpstreamError.from(err);
        }

        return { ...result, cost };
    }
}
