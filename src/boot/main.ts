#!/usr/bin/env node
/**
 * @file Process entry point for the `vex-match` command.
 */

import { causeMessage } from "../types/result";
import { createCli, EXIT_CODE_ERROR } from "./cli";

createCli()
	.run(process.argv.slice(2))
	.then((code) => {
		process.exitCode = code;
	})
	.catch((cause: unknown) => {
		process.stderr.write(
			`vex-match: ${causeMessage(cause)}\n`,
		);
		process.exitCode = EXIT_CODE_ERROR;
	});
