/**
 * keywords 子命令：从两个以空白分隔的单词列表生成文件类型定义。
 */

import { readFileSync } from "fs";
import { type FileTypeDefinition, validateFileTypeDefinitions } from "@xed/buffer";
import chalk from "chalk";
import { APP_NAME, getFileTypesPath } from "../config.js";

export interface KeywordsArgs {
	primaryPath: string;
	secondaryPath: string;
	name: string;
	extensions: string[];
	commentDelimiter: string;
}

export function parseKeywordsArgs(args: string[]): { args?: KeywordsArgs; error?: string } {
	const paths: string[] = [];
	const extensions: string[] = [];
	let name: string | undefined;
	let commentDelimiter = "//";

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (arg === "--name" && i + 1 < args.length) {
			name = args[++i];
		} else if (arg === "--ext" && i + 1 < args.length) {
			extensions.push(args[++i]);
		} else if (arg === "--comment" && i + 1 < args.length) {
			commentDelimiter = args[++i];
		} else if (arg.startsWith("--")) {
			return { error: `Unknown or incomplete option "${arg}"` };
		} else {
			paths.push(arg);
		}
	}

	const [primaryPath, secondaryPath] = paths;
	if (paths.length !== 2 || primaryPath === undefined || secondaryPath === undefined) {
		return { error: "Expected exactly two word list files" };
	}
	if (!name) {
		return { error: "Missing --name" };
	}
	if (extensions.length === 0) {
		return { error: "Missing --ext" };
	}
	return { args: { primaryPath, secondaryPath, name, extensions, commentDelimiter } };
}

export function splitWords(content: string): string[] {
	return content.split(/\s+/).filter((word) => word.length > 0);
}

export function buildFileTypeDefinition(
	args: Omit<KeywordsArgs, "primaryPath" | "secondaryPath">,
	primaryKeywords: string[],
	secondaryKeywords: string[],
): FileTypeDefinition {
	return {
		name: args.name,
		extensions: args.extensions,
		numbers: true,
		strings: true,
		characters: true,
		comments: true,
		commentDelimiters: [args.commentDelimiter],
		primaryKeywords,
		secondaryKeywords,
	};
}

/**
 * 运行 keywords 子命令，定义以 JSON 打印到 stdout。
 * @returns 进程退出码
 */
export function runKeywordsCommand(argv: string[]): number {
	const parsed = parseKeywordsArgs(argv);
	if (!parsed.args) {
		console.error(chalk.red(`Error: ${parsed.error ?? "invalid arguments"}`));
		console.error(`Usage: ${APP_NAME} keywords <primary.txt> <secondary.txt> --name <name> --ext <.ext>`);
		return 1;
	}

	const args = parsed.args;
	let primary: string[];
	let secondary: string[];
	try {
		primary = splitWords(readFileSync(args.primaryPath, "utf-8"));
		secondary = splitWords(readFileSync(args.secondaryPath, "utf-8"));
	} catch (error) {
		console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
		return 1;
	}

	const definition = buildFileTypeDefinition(args, primary, secondary);
	const errors = validateFileTypeDefinitions([definition]);
	if (errors.length > 0) {
		console.error(chalk.red(`Error: invalid definition:\n  - ${errors.join("\n  - ")}`));
		return 1;
	}

	console.log(JSON.stringify(definition, null, "\t"));
	console.error(chalk.dim(`Add the definition to the array in ${getFileTypesPath()}`));
	return 0;
}
