// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

import { ethers } from "ethers";
import type { IGreetingStore } from "../types/IGreetingStore.js";
import type { ILatestGreeting } from "../types/IGreeting.js";

export const EMPTY_GREETING: ILatestGreeting = Object.freeze({
    text: '',
    sourceDomain: 0,
    sender: ethers.constants.AddressZero,
});

/**
 * In-memory single-slot greeting store. Last write wins.
 */
export class MemoryGreetingStore implements IGreetingStore {
    private latest: ILatestGreeting = EMPTY_GREETING;

    get(): ILatestGreeting {
        return this.latest;
    }

    set(value: ILatestGreeting): void {
        this.latest = Object.freeze({ ...value });
    }
}
