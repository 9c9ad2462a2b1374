// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

import { ethers } from "ethers";

/**
 * True when `value` is a well-formed address other than the zero address.
 */
export const isNonZeroAddress = (value: string | undefined | null): value is string => {
    if (!value || !ethers.utils.isAddress(value)) return false;
    return ethers.utils.getAddress(value) !== ethers.constants.AddressZero;
};

export const sameAddress = (a: string, b: string): boolean => a.toLowerCase() === b.toLowerCase();
