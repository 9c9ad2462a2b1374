// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

/**
 * Decides whether a caller may invoke the delivery callback.
 */
interface IDeliveryAuthorizer {
    isAuthorizedDeliverer(caller: string): boolean;
}

export type { IDeliveryAuthorizer };
