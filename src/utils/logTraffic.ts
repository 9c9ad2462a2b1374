// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

import c from "chalk";
import fws from "fixed-width-string";
import type { IRelayEvent } from "../types/IRelayEvent.js";

/**
 * Logs relay traffic with the event type, domain, counterparty and payload details.
 * Colours tell the event types apart.
 *
 * @param log The event to log.
 */
export const logTraffic = (log: IRelayEvent) => {
    switch (log.type) {
        case 'GREETING:QUOTED':
            process.stdout.write(fws(c.gray('GREETING:QUOTED'), 20));
            break;
        case 'GREETING:SENT':
            process.stdout.write(fws(c.yellow('GREETING:SENT'), 20));
            break;
        case 'GREETING:RECEIVED':
            process.stdout.write(fws(c.green('GREETING:RECEIVED'), 20));
            break;
        case 'GREETING:REJECTED':
            process.stdout.write(fws(c.bgRed('GREETING:REJECTED'), 20));
            break;
    }

    process.stdout.write(fws(c.blue(log.domain.toString()), 10) + " ");
    process.stdout.write(fws(log.address ?? '', 42) + " ");
    if (log.cost !== undefined) {
        process.stdout.write(c.cyan(log.cost) + " ");
    }
    if (log.text !== undefined) {
        process.stdout.write(JSON.stringify(log.text) + " ");
    }
    if (log.detail) {
        process.stdout.write(c.gray(log.detail));
    }
    process.stdout.write("\n");
};
