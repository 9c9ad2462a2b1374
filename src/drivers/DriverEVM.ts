// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

import { ethers } from "ethers";
import type { DomainId } from "../types/IGreeting.js";
import type { NetworkConfig } from "../types/IChainConfig.js";
import type { IDeliveryQuote, IDispatchRequest, IDispatchResult } from "../types/IRelayService.js";
import DriverBase from "./DriverBase.js";
import { InvalidArgumentError, UpstreamError } from "../errors.js";
import { isNonZeroAddress, sameAddress } from "../utils/address.js";

/**
 * A relay driver for EVM-based domains, talking to the relayer contract over JSON-RPC.
 */
export default class DriverEVM extends DriverBase {
    public nodeSigner: ethers.Wallet;
    public provider?: ethers.providers.JsonRpcProvider;     // JSON RPC provider for network interaction
    private contract?: ethers.Contract;                     // Relayer contract interaction handler
    private relayerInterface = new ethers.utils.Interface([
        "function quoteEVMDeliveryPrice(uint16 targetChain, uint256 receiverValue, uint256 gasLimit) view returns (uint256 nativePriceQuote, uint256 targetChainRefundPerGasUnused)",
        "function sendPayloadToEvm(uint16 targetChain, address targetAddress, bytes payload, uint256 receiverValue, uint256 gasLimit) payable returns (uint64 sequence)",
    ]);
    private coreInterface = new ethers.utils.Interface([    // Emitted by the messaging core when the relayer publishes a payload
        "event LogMessagePublished(address indexed sender, uint64 sequence, uint32 nonce, bytes payload, uint8 consistencyLevel)",
    ]);

    /**
     * @param nodePrivateKey Key the dispatch transactions are signed with.
     * @param domainId Domain this driver dispatches from.
     */
    constructor(nodePrivateKey: string, domainId: DomainId) {
        super(domainId);
        this.nodeSigner = new ethers.Wallet(nodePrivateKey);
    }

    get address(): string {
        return this.requireContract().address;
    }

    /**
     * Connects to the domain's RPC and binds the relayer contract with the node signer.
     *
     * @param config - The domain configuration.
     * @param provider - Provider to use instead of one built from `config.rpc`.
     */
    async connect(config: NetworkConfig, provider?: ethers.providers.JsonRpcProvider): Promise<void> {
        if (!isNonZeroAddress(config.relayer)) {
            throw new InvalidArgumentError(`relayer address for domain ${config.id}`);
        }
        this.provider = provider ?? new ethers.providers.StaticJsonRpcProvider(config.rpc);
        this.contract = new ethers.Contract(config.relayer, this.relayerInterface, this.nodeSigner.connect(this.provider));
        this.debug('connected to ' + config.name + ' relayer ' + config.relayer);
    }

    async quoteDeliveryPrice(targetDomain: DomainId, receiverValue: ethers.BigNumberish, gasLimit: ethers.BigNumberish): Promise<IDeliveryQuote> {
        const contract = this.requireContract();
        const [nativePriceQuote, targetChainRefundPerGasUnused] = await contract.quoteEVMDeliveryPrice(targetDomain, receiverValue, gasLimit);
        this.debug('quoted ' + nativePriceQuote.toString() + ' for domain ' + targetDomain);

        return {
            cost: ethers.BigNumber.from(nativePriceQuote),
            refundPerGasUnused: ethers.BigNumber.from(targetChainRefundPerGasUnused),
        };
    }

    /**
     * Sends the payload through the relayer contract and waits for the transaction to be mined.
     * The relayer reports the signing wallet as the source address, so `request.sender` must be it.
     */
    async dispatch(request: IDispatchRequest): Promise<IDispatchResult> {
        const contract = this.requireContract();
        if (!sameAddress(request.sender, this.nodeSigner.address)) {
            throw new InvalidArgumentError('sender must be the node signer ' + this.nodeSigner.address);
        }

        const tx: ethers.ContractTransaction = await contract.sendPayloadToEvm(
            request.targetDomain,
            request.targetAddress,
            request.payload,
            request.receiverValue,
            request.gasLimit,
            { value: request.value }
        );
        this.debug('dispatched ' + tx.hash + ' to domain ' + request.targetDomain);

        const receipt = await tx.wait();
        return {
            transactionHash: receipt.transactionHash,
            sequence: this.findSequence(receipt.logs),
        };
    }

    /**
     * Pulls the sequence number out of the messaging core's publish event, if the receipt has one.
     */
    private findSequence(logs: ethers.providers.Log[]): number | undefined {
        for (const log of logs) {
            try {
                const parsed = this.coreInterface.parseLog(log);
                return ethers.BigNumber.from(parsed.args.sequence).toNumber();
            } catch {
                // not a publish event
                continue;
            }
        }
        this.debug('no publish event found');
        return undefined;
    }

    private requireContract(): ethers.Contract {
        if (!this.contract) {
            throw new UpstreamError('relayer not connected for domain ' + this.domainId);
        }
        return this.contract;
    }
}
