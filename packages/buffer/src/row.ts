import type { HighlightOptions } from "./filetype.js";
import { graphemeCount, graphemeIndexAt, graphemeOffsets, splitGraphemes } from "./grapheme.js";
import { HIGHLIGHT_RESET_MARKER, type HighlightType, highlightMarker } from "./highlighting.js";

export type SearchDirection = "forward" | "backward";

/**
 * Row 的只读视图。Document 通过它对外暴露行，行的修改只能经由 Document。
 */
export interface RowView {
	readonly length: number;
	isEmpty(): boolean;
	getText(): string;
	getHighlighting(): readonly HighlightType[];
	render(start: number, end: number): string;
	find(query: string, startColumn: number, direction: SearchDirection): number | undefined;
}

const identifierCharRegex = /^[\p{L}\p{N}_]\p{M}*$/u;
const digitRegex = /^[0-9]$/;

function isIdentifierChar(grapheme: string): boolean {
	return identifierCharRegex.test(grapheme);
}

/** 将列号限制在 [0, max] 内 */
function clampColumn(column: number, max: number): number {
	if (Number.isNaN(column) || column <= 0) return 0;
	if (column >= max) return max;
	return Math.floor(column);
}

/**
 * 一行文本及其逐字形的高亮标记。
 *
 * 所有列号都是字形集群索引。结构修改（insert/delete/append/split）不会重新计算高亮，
 * 调用方需要随后调用 highlight()。
 */
export class Row implements RowView {
	private text: string;
	private len: number;
	private highlighting: HighlightType[] = [];

	constructor(text: string = "") {
		this.text = text;
		this.len = graphemeCount(text);
	}

	static fromText(text: string): Row {
		return new Row(text);
	}

	get length(): number {
		return this.len;
	}

	isEmpty(): boolean {
		return this.len === 0;
	}

	getText(): string {
		return this.text;
	}

	getHighlighting(): readonly HighlightType[] {
		return this.highlighting;
	}

	/**
	 * 渲染 [start, end) 范围内的字形。每段同类字形前插入高亮标记，末尾插入重置标记。
	 * 制表符渲染为单个空格。
	 */
	render(start: number, end: number): string {
		const graphemes = splitGraphemes(this.text);
		const to = clampColumn(end, graphemes.length);
		const from = clampColumn(start, to);

		let result = "";
		let current: HighlightType | undefined;
		for (let i = from; i < to; i++) {
			const type = this.highlighting[i] ?? "none";
			if (type !== current) {
				current = type;
				result += highlightMarker(type);
			}
			const grapheme = graphemes[i];
			result += grapheme === "\t" ? " " : grapheme;
		}
		return result + HIGHLIGHT_RESET_MARKER;
	}

	/**
	 * 在字形列 column 处插入文本，column 超出行尾时追加到末尾。
	 * 从字形序列重建整行，因为插入的码点可能与相邻集群合并。
	 */
	insert(column: number, ch: string): void {
		if (ch.length === 0) return;
		if (column >= this.len) {
			this.text += ch;
		} else {
			const graphemes = splitGraphemes(this.text);
			graphemes.splice(clampColumn(column, this.len), 0, ch);
			this.text = graphemes.join("");
		}
		this.len = graphemeCount(this.text);
	}

	delete(column: number): void {
		if (!(column >= 0 && column < this.len)) return;
		const graphemes = splitGraphemes(this.text);
		graphemes.splice(Math.floor(column), 1);
		this.text = graphemes.join("");
		this.len = graphemeCount(this.text);
	}

	append(other: RowView): void {
		this.text += other.getText();
		this.len = graphemeCount(this.text);
	}

	/**
	 * 截断为 [0, column)，返回包含 [column, length) 的新行。两行的高亮标记都需要重新计算。
	 */
	split(column: number): Row {
		const at = clampColumn(column, this.len);
		const graphemes = splitGraphemes(this.text);
		this.text = graphemes.slice(0, at).join("");
		this.len = graphemeCount(this.text);
		this.highlighting = [];
		return new Row(graphemes.slice(at).join(""));
	}

	/**
	 * 在行内查找 query，返回匹配起点的字形索引。
	 *
	 * - forward：startColumn 处或之后的第一个匹配
	 * - backward：从行首扫描，返回 startColumn 之前的最后一个匹配
	 *
	 * 起点落在多码点集群内部的匹配会被跳过。
	 */
	find(query: string, startColumn: number, direction: SearchDirection): number | undefined {
		if (query.length === 0) return undefined;
		const offsets = graphemeOffsets(this.text);

		if (direction === "forward") {
			let offset = this.text.indexOf(query, offsets[clampColumn(startColumn, this.len)]);
			while (offset !== -1) {
				const index = graphemeIndexAt(offsets, offset);
				if (index !== undefined) return index;
				offset = this.text.indexOf(query, offset + 1);
			}
			return undefined;
		}

		const limit = offsets[clampColumn(startColumn, this.len)];
		let found: number | undefined;
		let offset = this.text.indexOf(query);
		while (offset !== -1 && offset < limit) {
			const index = graphemeIndexAt(offsets, offset);
			if (index !== undefined) found = index;
			offset = this.text.indexOf(query, offset + 1);
		}
		return found;
	}

	/**
	 * 从左到右单遍分类，每个字形一个标签。只在行内携带状态（是否在字符串中）。
	 * searchWord 的匹配只覆盖原本为 "none" 的字形。
	 */
	highlight(options: HighlightOptions, searchWord?: string): void {
		const offsets = graphemeOffsets(this.text);
		const count = offsets.length - 1;
		const graphemes: string[] = [];
		for (let i = 0; i < count; i++) {
			graphemes.push(this.text.slice(offsets[i], offsets[i + 1]));
		}

		const marks: HighlightType[] = [];
		let prevIsSeparator = true;
		let inString = false;
		let index = 0;

		while (index < count) {
			const grapheme = graphemes[index];
			const previous = index > 0 ? marks[index - 1] : "none";

			if (
				options.comments &&
				!inString &&
				options.commentDelimiters.some((delimiter) => this.text.startsWith(delimiter, offsets[index]))
			) {
				for (; index < count; index++) {
					marks.push("comment");
				}
				break;
			}

			if (options.characters && !inString && grapheme === "'") {
				prevIsSeparator = true;
				const closing = graphemes[index + 1] === "\\" ? index + 3 : index + 2;
				if (closing < count && graphemes[closing] === "'") {
					for (; index <= closing; index++) {
						marks.push("character");
					}
					continue;
				}
				marks.push("none");
				index++;
				continue;
			}

			if (options.strings) {
				if (inString) {
					marks.push("string");
					if (grapheme === "\\" && index + 1 < count) {
						marks.push("string");
						index += 2;
						continue;
					}
					if (grapheme === '"') {
						inString = false;
						prevIsSeparator = true;
					} else {
						prevIsSeparator = false;
					}
					index++;
					continue;
				}
				if (grapheme === '"') {
					inString = true;
					marks.push("string");
					index++;
					continue;
				}
			}

			if (
				options.numbers &&
				((digitRegex.test(grapheme) && (prevIsSeparator || previous === "number")) ||
					(grapheme === "." && previous === "number"))
			) {
				marks.push("number");
				prevIsSeparator = false;
				index++;
				continue;
			}

			if (prevIsSeparator && isIdentifierChar(grapheme)) {
				let end = index;
				while (end < count && isIdentifierChar(graphemes[end])) {
					end++;
				}
				const word = graphemes.slice(index, end).join("");
				const type: HighlightType = options.primaryKeywords.has(word)
					? "primaryKeyword"
					: options.secondaryKeywords.has(word)
						? "secondaryKeyword"
						: "none";
				for (; index < end; index++) {
					marks.push(type);
				}
				prevIsSeparator = false;
				continue;
			}

			marks.push("none");
			prevIsSeparator = !isIdentifierChar(grapheme);
			index++;
		}

		if (searchWord) {
			let grapheme = 0;
			let offset = this.text.indexOf(searchWord);
			while (offset !== -1) {
				const end = offset + searchWord.length;
				while (grapheme < count && offsets[grapheme] < offset) grapheme++;
				for (; grapheme < count && offsets[grapheme] < end; grapheme++) {
					if (marks[grapheme] === "none") marks[grapheme] = "match";
				}
				offset = this.text.indexOf(searchWord, end);
			}
		}

		this.highlighting = marks;
	}
}
