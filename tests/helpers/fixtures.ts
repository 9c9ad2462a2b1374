import { ethers } from "ethers";
import type { DomainId } from "../../src/types/IGreeting.js";
import type { IDeliveryQuote, IDispatchRequest, IDispatchResult, IRelayService } from "../../src/types/IRelayService.js";

export const RELAYER = "0x1111111111111111111111111111111111111111";
export const ALICE = "0x2222222222222222222222222222222222222222";
export const BOB = "0x3333333333333333333333333333333333333333";
export const MALLORY = "0x4444444444444444444444444444444444444444";
export const ZERO = ethers.constants.AddressZero;

export const hashOf = (label: string): string => ethers.utils.id(label);

// Corrupts one 32-byte word of an ABI-encoded payload, starting `at` bytes into the word.
const patchWord = (payload: string, word: number, at: number, bytes: string): string => {
    const start = 2 + word * 64 + at * 2;
    return payload.slice(0, start) + bytes + payload.slice(start + bytes.length);
};

/** `(text, sender)` payload whose address word has a non-zero upper byte. */
export const withDirtyAddress = (payload: string): string => patchWord(payload, 1, 0, "ff");

/** `(text, sender)` payload whose first two text bytes are not valid UTF-8. */
export const withBadUtf8 = (payload: string): string => patchWord(payload, 3, 0, "fffe");

/**
 * Relay service double with a settable price that records every call.
 */
export class FakeRelayService implements IRelayService {
    public readonly address = RELAYER;
    public cost: ethers.BigNumber;
    public quotes: Array<{ targetDomain: DomainId; receiverValue: string; gasLimit: string }> = [];
    public dispatches: IDispatchRequest[] = [];
    public quoteError?: Error;
    public dispatchError?: Error;

    constructor(cost: ethers.BigNumberish = 1000) {
        this.cost = ethers.BigNumber.from(cost);
    }

    async quoteDeliveryPrice(targetDomain: DomainId, receiverValue: ethers.BigNumberish, gasLimit: ethers.BigNumberish): Promise<IDeliveryQuote> {
        this.quotes.push({
            targetDomain,
            receiverValue: ethers.BigNumber.from(receiverValue).toString(),
            gasLimit: ethers.BigNumber.from(gasLimit).toString(),
        });
        if (this.quoteError) throw this.quoteError;
        return { cost: this.cost, refundPerGasUnused: ethers.BigNumber.from(1) };
    }

    async dispatch(request: IDispatchRequest): Promise<IDispatchResult> {
        this.dispatches.push(request);
        if (this.dispatchError) throw this.dispatchError;
        return { transactionHash: hashOf("tx-" + this.dispatches.length), sequence: this.dispatches.length - 1 };
    }
}
