// 文档模型
export { Document, type DocumentOptions, type Position, splitLines } from "./document.js";
// 文件类型分类
export {
	createFileType,
	DEFAULT_FILE_TYPE,
	type FileType,
	type FileTypeDefinition,
	FileTypeDefinitionSchema,
	FileTypeDefinitionsSchema,
	fileTypeFromName,
	getBuiltInFileTypes,
	type HighlightOptions,
	isFileTypeDefinitions,
	validateFileTypeDefinitions,
} from "./filetype.js";
// 字形工具
export { getSegmenter, graphemeCount, graphemeIndexAt, graphemeOffsets, splitGraphemes } from "./grapheme.js";
// 高亮标记
export {
	HIGHLIGHT_RESET_MARKER,
	HIGHLIGHT_TYPES,
	type HighlightedSegment,
	type HighlightType,
	highlightMarker,
	isHighlightType,
	parseHighlightMarkers,
} from "./highlighting.js";
// 行
export { Row, type RowView, type SearchDirection } from "./row.js";
// Schema 验证
export { compileSchema, formatValidationErrors, type SchemaValidator } from "./validation.js";
