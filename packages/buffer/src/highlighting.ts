/**
 * 每个字形的分类标签。
 */
export type HighlightType =
	| "none"
	| "number"
	| "match"
	| "string"
	| "character"
	| "comment"
	| "primaryKeyword"
	| "secondaryKeyword";

export const HIGHLIGHT_TYPES: readonly HighlightType[] = [
	"none",
	"number",
	"match",
	"string",
	"character",
	"comment",
	"primaryKeyword",
	"secondaryKeyword",
];

export function isHighlightType(value: string): value is HighlightType {
	return (HIGHLIGHT_TYPES as readonly string[]).includes(value);
}

/**
 * Row.render 在每段同类字形前插入的标记。
 * 使用 APC 序列（ESC _ ... BEL），终端会忽略未识别的 APC，渲染器负责将其转换为颜色。
 */
const MARKER_PREFIX = "\x1b_xed:hl:";
const MARKER_SUFFIX = "\x07";

export const HIGHLIGHT_RESET_MARKER = `${MARKER_PREFIX}reset${MARKER_SUFFIX}`;

export function highlightMarker(type: HighlightType): string {
	return `${MARKER_PREFIX}${type}${MARKER_SUFFIX}`;
}

/** 渲染字符串中的一段：相同分类的连续文本 */
export interface HighlightedSegment {
	type: HighlightType;
	text: string;
}

const markerPattern = /\x1b_xed:hl:([A-Za-z]+)\x07/g;

/**
 * 将 Row.render 的输出拆分为分段。
 * 第一个标记之前和重置标记之后的文本归为 "none"。
 */
export function parseHighlightMarkers(rendered: string): HighlightedSegment[] {
	const segments: HighlightedSegment[] = [];
	let current: HighlightType = "none";
	let last = 0;

	const push = (text: string) => {
		if (text.length === 0) return;
		const previous = segments[segments.length - 1];
		if (previous && previous.type === current) {
			previous.text += text;
		} else {
			segments.push({ type: current, text });
		}
	};

	for (const match of rendered.matchAll(markerPattern)) {
		const index = match.index ?? 0;
		push(rendered.slice(last, index));
		const name = match[1] ?? "";
		current = isHighlightType(name) ? name : "none";
		last = index + match[0].length;
	}
	push(rendered.slice(last));

	return segments;
}
