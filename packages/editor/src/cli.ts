#!/usr/bin/env node
/**
 * xed CLI 入口点。
 *
 * 测试命令：npx tsx src/cli.ts [args...]
 */
process.title = "xed";

import chalk from "chalk";
import { main } from "./main.js";

main(process.argv.slice(2)).catch((error: unknown) => {
	console.error(chalk.red(error instanceof Error ? (error.stack ?? error.message) : String(error)));
	process.exit(1);
});
