// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

import type { ethers } from "ethers";
import type { DomainId, IDelivery, IGreetingReceived, ILatestGreeting } from "./types/IGreeting.js";
import type { IRelayService } from "./types/IRelayService.js";
import type { IGreetingStore } from "./types/IGreetingStore.js";
import type { IDeliveryAuthorizer } from "./types/IDeliveryAuthorizer.js";
import type { IRelayEvent } from "./types/IRelayEvent.js";
import type { GreetingListener, IHelloRelay } from "./types/IHelloRelay.js";
import { ServiceQuote } from "./services/ServiceQuote.js";
import { ServiceSend, type ISendReceipt } from "./services/ServiceSend.js";
import { ServiceReceive } from "./services/ServiceReceive.js";
import { MemoryGreetingStore } from "./state/MemoryGreetingStore.js";
import { SeenDeliveries } from "./state/SeenDeliveries.js";
import { RelayerAuthorizer } from "./auth/RelayerAuthorizer.js";
import { GAS_LIMIT } from "./constants.js";
import { InvalidArgumentError } from "./errors.js";
import { isNonZeroAddress } from "./utils/address.js";
import { logTraffic } from "./utils/logTraffic.js";

export interface HelloRelayOptions {
    relayService: IRelayService;
    relayerAddress: string;                 // Only caller allowed to deliver, unless `authorizer` says otherwise
    senderAddress: string;                  // Identity encoded into outbound greetings
    store?: IGreetingStore;
    authorizer?: IDeliveryAuthorizer;
    rejectReplayedDeliveries?: boolean;     // Refuse a delivery hash that was already applied
    traffic?: (event: IRelayEvent) => void;
}

/**
 * Core class of the greeting relay, wiring quoting, sending and receiving around one relay service.
 */
export class HelloRelay implements IHelloRelay {
    public readonly GAS_LIMIT = GAS_LIMIT;
    public readonly relayerAddress: string;
    public readonly senderAddress: string;

    private quoter: ServiceQuote;
    private sender: ServiceSend;
    private receiver: ServiceReceive;
    private store: IGreetingStore;
    private listeners = new Set<GreetingListener>();
    private traffic: (event: IRelayEvent) => void;

    /**
     * @param options Relay service, trusted relayer and sender identity, plus optional collaborators.
     */
    constructor(options: HelloRelayOptions) {
        if (!isNonZeroAddress(options.relayerAddress)) {
            throw new InvalidArgumentError('relayer address');
        }
        if (!isNonZeroAddress(options.senderAddress)) {
            throw new InvalidArgumentError('sender address');
        }

        this.relayerAddress = options.relayerAddress;
        this.senderAddress = options.senderAddress;
        this.store = options.store ?? new MemoryGreetingStore();
        this.traffic = options.traffic ?? logTraffic;

        this.quoter = new ServiceQuote(options.relayService);
        this.sender = new ServiceSend(options.relayService, this.quoter, this.senderAddress);
        this.receiver = new ServiceReceive(
            options.authorizer ?? new RelayerAuthorizer(this.relayerAddress),
            this.store,
            this.emitGreeting.bind(this),
            options.rejectReplayedDeliveries ? new SeenDeliveries() : undefined
        );
    }

    get latestGreeting(): string {
        return this.store.get().text;
    }

    latest(): ILatestGreeting {
        return this.store.get();
    }

    async quote(targetDomain: DomainId): Promise<ethers.BigNumber> {
        const cost = await this.quoter.quote(targetDomain);
        this.traffic({ type: 'GREETING:QUOTED', domain: targetDomain, cost: cost.toString() });
        return cost;
    }

    async send(targetDomain: DomainId, targetAddress: string, text: string, fundsProvided: ethers.BigNumberish): Promise<ISendReceipt> {
        const receipt = await this.sender.send(targetDomain, targetAddress, text, fundsProvided);
        this.traffic({
            type: 'GREETING:SENT',
            domain: targetDomain,
            address: targetAddress,
            text,
            cost: receipt.cost.toString(),
            detail: receipt.transactionHash,
        });
        return receipt;
    }

    onDeliver(caller: string, delivery: IDelivery): ILatestGreeting {
        try {
            return this.receiver.onDeliver(caller, delivery);
        } catch (err) {
            this.traffic({
                type: 'GREETING:REJECTED',
                domain: delivery.sourceDomain,
                address: caller,
                detail: err instanceof Error ? err.message : String(err),
            });
            throw err;
        }
    }

    onGreetingReceived(listener: GreetingListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /**
     * Reports an applied greeting to the traffic log and every listener.
     * A failing listener is logged and does not stop the others.
     */
    private emitGreeting(greeting: IGreetingReceived): void {
        this.traffic({
            type: 'GREETING:RECEIVED',
            domain: greeting.sourceDomain,
            address: greeting.sender,
            text: greeting.text,
            detail: greeting.deliveryHash,
        });

        for (const listener of this.listeners) {
            try {
                listener(greeting);
            } catch (err) {
                console.error('greeting listener failed:', err);
            }
        }
    }
}
