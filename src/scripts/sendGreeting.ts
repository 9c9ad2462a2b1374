#!/usr/bin/env node
// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

import { loadConfig, parseDomainId } from "../config.js";
import { HelloRelay } from "../HelloRelay.js";
import DriverEVM from "../drivers/DriverEVM.js";
import { InvalidArgumentError } from "../errors.js";

/**
 * Sends one greeting from the configured domain.
 * Usage: sendGreeting <targetDomain> <targetAddress> <text> [fundsWei]
 * Funds default to the current quote.
 */
async function sendGreeting(argv: string[]): Promise<void> {
    const [domainArg, targetAddress, text, fundsArg] = argv;
    if (domainArg === undefined || targetAddress === undefined || text === undefined) {
        throw new InvalidArgumentError('usage: sendGreeting <targetDomain> <targetAddress> <text> [fundsWei]');
    }
    const targetDomain = parseDomainId('target domain', domainArg);

    const config = loadConfig();
    if (config.debug) process.env.DEBUG = 'true';

    const driver = new DriverEVM(config.nodePrivateKey, config.network.id);
    await driver.connect(config.network);

    const relay = new HelloRelay({
        relayService: driver,
        relayerAddress: config.network.relayer,
        senderAddress: driver.nodeSigner.address,
    });

    const funds = fundsArg ?? (await relay.quote(targetDomain));
    const receipt = await relay.send(targetDomain, targetAddress, text, funds);

    console.log(`cost=${receipt.cost.toString()}`);
    console.log(`transaction=${receipt.transactionHash}`);
    if (receipt.sequence !== undefined) {
        console.log(`sequence=${receipt.sequence}`);
    }
}

sendGreeting(process.argv.slice(2)).catch(error => {
    console.error("Failed to send greeting:", error);
    process.exit(1);
});
