import { readFileSync } from "node:fs";
import { type Static, Type } from "@sinclair/typebox";
import { compileSchema, formatValidationErrors } from "./validation.js";

// =============================================================================
// Schema
// =============================================================================

export const FileTypeDefinitionSchema = Type.Object({
	name: Type.String({ minLength: 1 }),
	extensions: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
	numbers: Type.Optional(Type.Boolean()),
	strings: Type.Optional(Type.Boolean()),
	characters: Type.Optional(Type.Boolean()),
	comments: Type.Optional(Type.Boolean()),
	commentDelimiters: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
	primaryKeywords: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
	secondaryKeywords: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
});

export const FileTypeDefinitionsSchema = Type.Array(FileTypeDefinitionSchema);

export type FileTypeDefinition = Static<typeof FileTypeDefinitionSchema>;

const validateDefinitions = compileSchema(FileTypeDefinitionsSchema);

/**
 * 根据 schema 验证文件类型定义列表。
 * @returns 错误描述列表，验证通过时为空
 */
export function validateFileTypeDefinitions(data: unknown): string[] {
	if (validateDefinitions(data)) {
		return [];
	}
	return formatValidationErrors(validateDefinitions);
}

export function isFileTypeDefinitions(data: unknown): data is FileTypeDefinition[] {
	return validateDefinitions(data);
}

// =============================================================================
// FileType
// =============================================================================

export interface HighlightOptions {
	readonly numbers: boolean;
	readonly strings: boolean;
	readonly characters: boolean;
	readonly comments: boolean;
	/** 单行注释起始序列，例如 "//" 或 "#" */
	readonly commentDelimiters: readonly string[];
	readonly primaryKeywords: ReadonlySet<string>;
	readonly secondaryKeywords: ReadonlySet<string>;
}

/**
 * 由文件名选出的不可变高亮规则集。只会被整体替换，不会原地修改。
 */
export interface FileType {
	readonly name: string;
	readonly highlightOptions: HighlightOptions;
}

export const DEFAULT_FILE_TYPE: FileType = Object.freeze({
	name: "No filetype",
	highlightOptions: Object.freeze({
		numbers: false,
		strings: false,
		characters: false,
		comments: false,
		commentDelimiters: Object.freeze([]),
		primaryKeywords: new Set<string>(),
		secondaryKeywords: new Set<string>(),
	}),
});

export function createFileType(definition: FileTypeDefinition): FileType {
	return Object.freeze({
		name: definition.name,
		highlightOptions: Object.freeze({
			numbers: definition.numbers ?? false,
			strings: definition.strings ?? false,
			characters: definition.characters ?? false,
			comments: definition.comments ?? false,
			commentDelimiters: Object.freeze([...(definition.commentDelimiters ?? [])]),
			primaryKeywords: new Set(definition.primaryKeywords ?? []),
			secondaryKeywords: new Set(definition.secondaryKeywords ?? []),
		}),
	});
}

let builtInFileTypes: readonly FileTypeDefinition[] | undefined;

/**
 * 内置文件类型定义（从 filetypes.json 加载，首次调用时缓存）。
 */
export function getBuiltInFileTypes(): readonly FileTypeDefinition[] {
	if (!builtInFileTypes) {
		const content = readFileSync(new URL("./filetypes.json", import.meta.url), "utf-8");
		const data: unknown = JSON.parse(content);
		if (!isFileTypeDefinitions(data)) {
			throw new Error(`Invalid built-in filetypes.json:\n  - ${validateFileTypeDefinitions(data).join("\n  - ")}`);
		}
		builtInFileTypes = Object.freeze(data.map((definition) => Object.freeze(definition)));
	}
	return builtInFileTypes;
}

/**
 * 按扩展名从文件名推断文件类型。第一个匹配的定义获胜，未识别时返回 DEFAULT_FILE_TYPE。
 */
export function fileTypeFromName(
	fileName: string,
	definitions: readonly FileTypeDefinition[] = getBuiltInFileTypes(),
): FileType {
	for (const definition of definitions) {
		if (definition.extensions.some((extension) => fileName.endsWith(extension))) {
			return createFileType(definition);
		}
	}
	return DEFAULT_FILE_TYPE;
}
