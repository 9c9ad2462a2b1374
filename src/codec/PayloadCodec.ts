// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

import { ethers } from "ethers";
import type { IGreeting } from "../types/IGreeting.js";
import { DecodeError } from "../errors.js";

// (string text, address sender)
const GREETING_LAYOUT = ["string", "address"];

/**
 * ABI-encodes a greeting as a `(string, address)` tuple.
 * The layout carries no version tag, so changing it breaks existing receivers.
 */
export function encodeGreeting(text: string, sender: string): string {
    return ethers.utils.defaultAbiCoder.encode(GREETING_LAYOUT, [text, sender]);
}

/**
 * Decodes a payload produced by {@link encodeGreeting}. The sender comes back checksummed.
 */
export function decodeGreeting(payload: ethers.utils.BytesLike): IGreeting {
    if (!ethers.utils.isBytesLike(payload)) {
        throw new DecodeError('payload is not a byte string');
    }

    // a bad field only throws once its entry is read
    let text: unknown;
    let sender: unknown;
    try {
        const decoded = ethers.utils.defaultAbiCoder.decode(GREETING_LAYOUT, payload);
        text = decoded[0];
        sender = decoded[1];
    } catch (err) {
        throw new DecodeError('payload is not a (string, address) tuple', { cause: err });
    }

    if (typeof text !== 'string' || typeof sender !== 'string') {
        throw new DecodeError('payload is not a (string, address) tuple');
    }

    return { text, sender };
}
