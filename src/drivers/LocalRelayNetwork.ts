// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

import { ethers } from "ethers";
import type { DomainId, IDelivery } from "../types/IGreeting.js";
import type { IDeliveryEndpoint, IDeliveryQuote, IDispatchRequest, IDispatchResult } from "../types/IRelayService.js";
import { UpstreamError } from "../errors.js";
import { logDebug } from "../utils/logDebug.js";

interface PendingDelivery {
    sequence: number;
    sourceDomain: DomainId;
    request: IDispatchRequest;
}

export interface FailedDelivery {
    sequence: number;
    targetDomain: DomainId;
    targetAddress: string;
    reason: string;
}

/**
 * In-process relay network connecting any number of domains. Dispatches are queued and
 * only delivered when {@link deliverAll} runs, always from the network's own address.
 */
export class LocalRelayNetwork {
    public readonly address: string;

    private failed: FailedDelivery[] = [];

    private pricePerGas: Record<number, ethers.BigNumber> = {};
    private endpoints: Record<string, IDeliveryEndpoint> = {};
    private pending: PendingDelivery[] = [];
    private sequence = 0;

    /**
     * @param address Address the network delivers from.
     * @param prices Native price per unit of execution budget, keyed by target domain.
     */
    constructor(address: string, prices: Record<number, ethers.BigNumberish> = {}) {
        this.address = ethers.utils.getAddress(address);
        for (const [domain, price] of Object.entries(prices)) {
            this.setPrice(Number(domain), price);
        }
    }

    setPrice(domain: DomainId, pricePerGas: ethers.BigNumberish): void {
        this.pricePerGas[domain] = ethers.BigNumber.from(pricePerGas);
    }

    /**
     * Makes `endpoint` reachable at `address` on `domain`.
     */
    register(domain: DomainId, address: string, endpoint: IDeliveryEndpoint): void {
        this.endpoints[this.endpointKey(domain, address)] = endpoint;
    }

    get pendingCount(): number {
        return this.pending.length;
    }

    quote(targetDomain: DomainId, receiverValue: ethers.BigNumberish, gasLimit: ethers.BigNumberish): IDeliveryQuote {
        const price = this.pricePerGas[targetDomain];
        if (price === undefined) {
            throw new UpstreamError('unsupported target domain ' + targetDomain);
        }
        return {
            cost: price.mul(gasLimit).add(receiverValue),
            refundPerGasUnused: price,
        };
    }

    enqueue(sourceDomain: DomainId, request: IDispatchRequest): IDispatchResult {
        const { cost } = this.quote(request.targetDomain, request.receiverValue, request.gasLimit);
        if (request.value.lt(cost)) {
            throw new UpstreamError('delivery payment ' + request.value.toString() + ' below price ' + cost.toString());
        }

        const sequence = this.sequence++;
        this.pending.push({ sequence, sourceDomain, request });
        logDebug(sourceDomain, 'queued delivery ' + sequence + ' to domain ' + request.targetDomain);

        return {
            transactionHash: ethers.utils.keccak256(ethers.utils.defaultAbiCoder.encode(
                ["uint16", "uint64", "bytes"],
                [sourceDomain, sequence, request.payload]
            )),
            sequence,
        };
    }

    /** Deliveries that failed since the last {@link clearFailures}, oldest first. */
    get failures(): readonly FailedDelivery[] {
        return this.failed;
    }

    /**
     * Forgets the recorded failures.
     *
     * @returns The failures that were recorded.
     */
    clearFailures(): FailedDelivery[] {
        const cleared = this.failed;
        this.failed = [];
        return cleared;
    }

    /**
     * Delivers every queued dispatch in order. Deliveries whose endpoint is missing or throws
     * are recorded in {@link failures}.
     *
     * @returns The number of successful deliveries.
     */
    deliverAll(): number {
        const batch = this.pending;
        this.pending = [];

        let delivered = 0;
        for (const item of batch) {
            const { request } = item;
            const endpoint = this.endpoints[this.endpointKey(request.targetDomain, request.targetAddress)];
            if (!endpoint) {
                this.fail(item, 'no endpoint registered');
                continue;
            }

            const delivery: IDelivery = {
                payload: request.payload,
                additionalMessages: [],
                sourceAddress: request.sender,
                sourceDomain: item.sourceDomain,
                deliveryHash: this.deliveryHash(item),
            };

            try {
                endpoint.onDeliver(this.address, delivery);
                delivered++;
            } catch (err) {
                this.fail(item, err instanceof Error ? err.message : String(err));
            }
        }
        return delivered;
    }

    private deliveryHash(item: PendingDelivery): string {
        return ethers.utils.keccak256(ethers.utils.defaultAbiCoder.encode(
            ["uint16", "uint16", "uint64", "bytes"],
            [item.sourceDomain, item.request.targetDomain, item.sequence, item.request.payload]
        ));
    }

    private fail(item: PendingDelivery, reason: string): void {
        logDebug(item.request.targetDomain, 'delivery ' + item.sequence + ' failed: ' + reason);
        this.failed.push({
            sequence: item.sequence,
            targetDomain: item.request.targetDomain,
            targetAddress: item.request.targetAddress,
            reason,
        });
    }

    private endpointKey(domain: DomainId, address: string): string {
        return domain + ':' + address.toLowerCase();
    }
}
