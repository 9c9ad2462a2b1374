// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

import type { IDeliveryAuthorizer } from "../types/IDeliveryAuthorizer.js";
import { sameAddress } from "../utils/address.js";

/**
 * Trusts exactly one caller: the configured relay service address.
 */
export class RelayerAuthorizer implements IDeliveryAuthorizer {
    constructor(private readonly relayerAddress: string) {}

    isAuthorizedDeliverer(caller: string): boolean {
        return sameAddress(caller, this.relayerAddress);
    }
}
