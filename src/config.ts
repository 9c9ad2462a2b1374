// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

import { ethers } from "ethers";
import type { RelayConfig } from "./types/IChainConfig.js";
import { InvalidArgumentError } from "./errors.js";
import { isNonZeroAddress } from "./utils/address.js";
import { MAX_DOMAIN_ID } from "./constants.js";

type Env = Record<string, string | undefined>;

const required = (env: Env, key: string): string => {
    const value = env[key];
    if (value === undefined || value.trim() === '') {
        throw new InvalidArgumentError(`missing ${key}`);
    }
    return value.trim();
};

const parseInteger = (key: string, value: string, min: number, max: number): number => {
    if (!/^\d+$/.test(value)) {
        throw new InvalidArgumentError(`${key} must be an integer`);
    }
    const parsed = parseInt(value, 10);
    if (parsed < min || parsed > max) {
        throw new InvalidArgumentError(`${key} must be between ${min} and ${max}`);
    }
    return parsed;
};

/**
 * Parses a decimal domain id, rejecting anything outside 0..{@link MAX_DOMAIN_ID}.
 *
 * @param key - Name reported in the error.
 */
export function parseDomainId(key: string, value: string): number {
    return parseInteger(key, value.trim(), 0, MAX_DOMAIN_ID);
}

/**
 * Reads the node configuration from environment variables.
 *
 * Required: `NODE_PRIVATE_KEY`, `RPC_URL`, `RELAYER_ADDRESS`, `DOMAIN_ID`.
 * Optional: `NETWORK_NAME`, `DATA_STREAM_PORT`, `DEBUG`.
 */
export function loadConfig(env: Env = process.env): RelayConfig {
    const nodePrivateKey = required(env, 'NODE_PRIVATE_KEY');
    if (!ethers.utils.isHexString(nodePrivateKey, 32)) {
        throw new InvalidArgumentError('NODE_PRIVATE_KEY must be a 32-byte hex string');
    }

    const relayer = required(env, 'RELAYER_ADDRESS');
    if (!isNonZeroAddress(relayer)) {
        throw new InvalidArgumentError('RELAYER_ADDRESS must be a non-zero address');
    }

    const id = parseDomainId('DOMAIN_ID', required(env, 'DOMAIN_ID'));

    const config: RelayConfig = {
        nodePrivateKey,
        network: {
            id,
            name: env.NETWORK_NAME?.trim() || `domain-${id}`,
            rpc: required(env, 'RPC_URL'),
            relayer,
        },
        debug: env.DEBUG === 'true',
    };

    if (env.DATA_STREAM_PORT) {
        config.dataStreamPort = parseInteger('DATA_STREAM_PORT', env.DATA_STREAM_PORT.trim(), 1, 65535);
    }

    return config;
}
