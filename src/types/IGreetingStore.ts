// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

import type { ILatestGreeting } from "./IGreeting.js";

/**
 * Single-slot store for the latest received greeting. Every `set` replaces the previous value.
 */
interface IGreetingStore {
    get(): ILatestGreeting;
    set(value: ILatestGreeting): void;
}

export type { IGreetingStore };
