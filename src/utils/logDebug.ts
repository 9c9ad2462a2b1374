// Copyright 2021-2024 Atlas
// Author: Atlas (atlas@vialabs.io)

import c from "chalk";
import fws from "fixed-width-string";

/**
 * Outputs debug information to the console with formatted domain and log message.
 * Debugging must be enabled through the environment variable `DEBUG` set to 'true'.
 *
 * @param domain The domain the log relates to.
 * @param log The debug message to log.
 */
export const logDebug = (domain: number, log: string) => {
    if (process.env.DEBUG !== 'true') return;

    process.stdout.write(fws(c.gray('DEBUG'), 20));
    process.stdout.write(fws(c.blue(domain.toString()), 10) + " ");
    process.stdout.write(log);
    process.stdout.write("\n");
};
