// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

/**
 * Delivery hashes that have already been applied. Hashes are compared case-insensitively.
 */
export class SeenDeliveries {
    private hashes = new Set<string>();

    has(deliveryHash: string): boolean {
        return this.hashes.has(deliveryHash.toLowerCase());
    }

    add(deliveryHash: string): void {
        this.hashes.add(deliveryHash.toLowerCase());
    }

    get size(): number {
        return this.hashes.size;
    }
}
