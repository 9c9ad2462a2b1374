// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

import type { ethers } from "ethers";
import type { DomainId } from "../types/IGreeting.js";
import type { IDeliveryQuote, IDispatchRequest, IDispatchResult, IRelayService } from "../types/IRelayService.js";
import { logDebug } from "../utils/logDebug.js";

/**
 * Abstract base class for relay service drivers, providing a common framework for the
 * different ways of reaching a relay service from one domain.
 */
abstract class DriverBase implements IRelayService {
    public domainId: DomainId;

    /**
     * Constructs a new DriverBase instance.
     * @param domainId Domain this driver dispatches from.
     */
    constructor(domainId: DomainId) {
        this.domainId = domainId;
    }

    /**
     * Address the relay service delivers from.
     */
    abstract get address(): string;

    /**
     * Quotes the native cost of a delivery to the target domain.
     * @param targetDomain Domain the payload is delivered to.
     * @param receiverValue Native value forwarded to the receiver.
     * @param gasLimit Execution budget on the target domain.
     */
    abstract quoteDeliveryPrice(targetDomain: DomainId, receiverValue: ethers.BigNumberish, gasLimit: ethers.BigNumberish): Promise<IDeliveryQuote>;

    /**
     * Hands a payload over to the relay service.
     * @param request The dispatch arguments, including the attached value.
     */
    abstract dispatch(request: IDispatchRequest): Promise<IDispatchResult>;

    protected debug(log: string): void {
        logDebug(this.domainId, log);
    }
}

export default DriverBase;
