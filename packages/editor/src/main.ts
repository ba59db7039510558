/**
 * 编辑器主入口：解析参数、加载设置和文件类型、打开文档并运行编辑器。
 */

import type { Document } from "@xed/buffer";
import { EditorKeybindingsManager, ProcessTerminal } from "@xed/tui";
import chalk from "chalk";
import { parseArgs, printHelp } from "./cli/args.js";
import { runKeywordsCommand } from "./cli/keywords.js";
import { getDebugLogPath, getFileTypesPath, VERSION } from "./config.js";
import { DebugLog } from "./core/debug-log.js";
import { loadFileTypes } from "./core/filetype-registry.js";
import { SettingsManager } from "./core/settings-manager.js";
import { Editor, openDocument } from "./modes/interactive/editor.js";
import { Theme } from "./modes/interactive/theme.js";

export async function main(args: string[]): Promise<void> {
	if (args[0] === "keywords") {
		process.exitCode = runKeywordsCommand(args.slice(1));
		return;
	}

	const parsed = parseArgs(args);
	if (parsed.help) {
		printHelp();
		return;
	}
	if (parsed.version) {
		console.log(VERSION);
		return;
	}

	const debugLog = new DebugLog(getDebugLogPath());
	const warnings: string[] = [];

	const settingsManager = SettingsManager.create();
	warnings.push(...settingsManager.getLoadErrors());
	if (parsed.insert) {
		settingsManager.applyOverrides({ startMode: "insert" });
	}

	const fileTypes = loadFileTypes(getFileTypesPath());
	if (fileTypes.error) {
		warnings.push(fileTypes.error);
	}

	for (const warning of warnings) {
		console.error(chalk.yellow(`Warning: ${warning}`));
		debugLog.log(`warning: ${warning}`);
	}

	let initialStatus: string | undefined;
	const documents: Document[] = [];
	for (const file of parsed.files) {
		try {
			documents.push(openDocument(file, fileTypes.definitions));
		} catch (error) {
			initialStatus = `error: could not open file '${file}'`;
			debugLog.log(`open failed: ${error instanceof Error ? error.message : String(error)}`);
		}
	}
	if (initialStatus === undefined && warnings.length > 0) {
		initialStatus = `warning: ${warnings[0]?.split("\n")[0] ?? ""}`;
	}

	const editor = new Editor(new ProcessTerminal(), {
		documents,
		fileTypes: fileTypes.definitions,
		startMode: settingsManager.getStartMode(),
		statusMessageTimeoutMs: settingsManager.getStatusMessageTimeoutMs(),
		theme: new Theme(settingsManager.getThemeColors(), settingsManager.getStatusBarColors()),
		keybindings: new EditorKeybindingsManager(settingsManager.getKeybindings()),
		initialStatus,
		debugLog,
	});
	await editor.run();

	const disabledReason = debugLog.getDisabledReason();
	if (disabledReason) {
		console.error(chalk.yellow(`Warning: debug log disabled: ${disabledReason}`));
	}
}
