import { existsSync, readFileSync } from "fs";
import {
	type FileTypeDefinition,
	getBuiltInFileTypes,
	isFileTypeDefinitions,
	validateFileTypeDefinitions,
} from "@xed/buffer";

export interface FileTypeRegistryResult {
	/** 用户定义在前，内置定义在后（第一个匹配的扩展名获胜） */
	definitions: readonly FileTypeDefinition[];
	/** 用户文件无法使用时的错误描述 */
	error: string | undefined;
}

/**
 * 加载用户的 filetypes.json 并与内置定义合并。
 * 文件不存在时只使用内置定义；文件无效时报告错误并回退到内置定义。
 */
export function loadFileTypes(fileTypesPath: string): FileTypeRegistryResult {
	const builtIn = getBuiltInFileTypes();
	if (!existsSync(fileTypesPath)) {
		return { definitions: builtIn, error: undefined };
	}

	try {
		const data: unknown = JSON.parse(readFileSync(fileTypesPath, "utf-8"));
		if (!isFileTypeDefinitions(data)) {
			const errors = validateFileTypeDefinitions(data).map((e) => `  - ${e}`);
			return {
				definitions: builtIn,
				error: `Invalid filetypes.json schema:\n${errors.join("\n")}\n\nFile: ${fileTypesPath}`,
			};
		}
		return { definitions: [...data, ...builtIn], error: undefined };
	} catch (error) {
		if (error instanceof SyntaxError) {
			return {
				definitions: builtIn,
				error: `Failed to parse filetypes.json: ${error.message}\n\nFile: ${fileTypesPath}`,
			};
		}
		return {
			definitions: builtIn,
			error: `Failed to load filetypes.json: ${error instanceof Error ? error.message : String(error)}\n\nFile: ${fileTypesPath}`,
		};
	}
}
