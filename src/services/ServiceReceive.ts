// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

import type { IDeliveryAuthorizer } from "../types/IDeliveryAuthorizer.js";
import type { IGreetingStore } from "../types/IGreetingStore.js";
import type { IDelivery, IGreetingReceived, ILatestGreeting } from "../types/IGreeting.js";
import { SeenDeliveries } from "../state/SeenDeliveries.js";
import { decodeGreeting } from "../codec/PayloadCodec.js";
import { ReplayedDeliveryError, UnauthorizedError } from "../errors.js";

/**
 * Applies greetings handed over by the relay service.
 */
export class ServiceReceive {
    constructor(
        private authorizer: IDeliveryAuthorizer,
        private store: IGreetingStore,
        private notify: (greeting: IGreetingReceived) => void,
        private seen?: SeenDeliveries
    ) {}

    /**
     * Authorizes the caller, decodes the payload and overwrites the latest greeting.
     * Any failure leaves the store untouched.
     *
     * @param caller Immediate caller of the delivery callback.
     */
    onDeliver(caller: string, delivery: IDelivery): ILatestGreeting {
        if (!this.authorizer.isAuthorizedDeliverer(caller)) {
            throw new UnauthorizedError(caller);
        }

        const greeting = decodeGreeting(delivery.payload);

        if (this.seen?.has(delivery.deliveryHash)) {
            throw new ReplayedDeliveryError(delivery.deliveryHash);
        }

        const latest: ILatestGreeting = {
            text: greeting.text,
            sourceDomain: delivery.sourceDomain,
            sender: greeting.sender,
        };
        this.store.set(latest);
        this.seen?.add(delivery.deliveryHash);

        this.notify({ ...latest, deliveryHash: delivery.deliveryHash });
        return latest;
    }
}
