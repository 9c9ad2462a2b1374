// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

/**
 * Execution budget (gas units) bought for every delivery. The same value is used to
 * quote and to dispatch.
 */
export const GAS_LIMIT = 50_000;

/**
 * Value forwarded to the receiving contract on the target domain.
 */
export const RECEIVER_VALUE = 0;

export const MAX_DOMAIN_ID = 0xffff;
