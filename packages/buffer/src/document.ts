import { readFileSync, writeFileSync } from "node:fs";
import { type FileType, type FileTypeDefinition, fileTypeFromName, getBuiltInFileTypes } from "./filetype.js";
import { Row, type RowView, type SearchDirection } from "./row.js";

/** 文档中的位置：x 为字形列，y 为行号，均从 0 开始 */
export interface Position {
	x: number;
	y: number;
}

export interface DocumentOptions {
	/** 推断文件类型时使用的定义（默认为内置定义） */
	fileTypes?: readonly FileTypeDefinition[];
}

function isLineTerminator(ch: string): boolean {
	return ch === "\n" || ch === "\r" || ch === "\r\n";
}

function isRowIndex(y: number): boolean {
	return Number.isInteger(y) && y >= 0;
}

/**
 * 将文件内容拆分为行。行终止符不保留，最后一个终止符之后的空串被丢弃。
 */
export function splitLines(content: string): string[] {
	const lines = content.split("\n").map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
	if (lines[lines.length - 1] === "") {
		lines.pop();
	}
	return lines;
}

/**
 * 一个打开的文件：有序的行、文件名、文件类型和脏标记。
 *
 * 每次结构修改之后，受影响的行会立即按当前文件类型重新高亮。
 * 越界的位置不会抛出错误，只会被忽略。
 */
export class Document {
	private rows: Row[];
	private fileType: FileType;
	private dirty = false;
	private readonly fileTypes: readonly FileTypeDefinition[];
	private name: string | undefined;

	constructor(fileName?: string, lines: readonly string[] = [], options: DocumentOptions = {}) {
		this.name = fileName;
		this.fileTypes = options.fileTypes ?? getBuiltInFileTypes();
		this.fileType = fileTypeFromName(fileName ?? "", this.fileTypes);
		this.rows = lines.map((line) => {
			const row = Row.fromText(line);
			row.highlight(this.fileType.highlightOptions);
			return row;
		});
	}

	/**
	 * 读取整个文件并逐行构建文档。读取失败时抛出 fs 错误。
	 */
	static open(path: string, options: DocumentOptions = {}): Document {
		const content = readFileSync(path, "utf-8");
		return new Document(path, splitLines(content), options);
	}

	get fileName(): string | undefined {
		return this.name;
	}

	/** 设置文件名（例如"另存为"）。文件类型在下一次 save() 时重新推断。 */
	setFileName(fileName: string): void {
		this.name = fileName;
	}

	get rowCount(): number {
		return this.rows.length;
	}

	isEmpty(): boolean {
		return this.rows.length === 0;
	}

	isDirty(): boolean {
		return this.dirty;
	}

	row(index: number): RowView | undefined {
		return this.rows[index];
	}

	getFileType(): FileType {
		return this.fileType;
	}

	getFileTypeName(): string {
		return this.fileType.name;
	}

	/** 文档保存时写入的内容 */
	getText(): string {
		return this.rows.map((row) => `${row.getText()}\n`).join("");
	}

	/**
	 * 写入所有行，每行后跟一个 "\n"。没有文件名时不执行任何操作并返回 false。
	 * 写入失败时抛出 fs 错误，缓冲区、文件类型和脏标记保持不变。
	 */
	save(): boolean {
		if (this.name === undefined) {
			return false;
		}

		const fileType = fileTypeFromName(this.name, this.fileTypes);
		writeFileSync(this.name, this.getText(), "utf-8");

		this.fileType = fileType;
		for (const row of this.rows) {
			row.highlight(fileType.highlightOptions);
		}
		this.dirty = false;
		return true;
	}

	/**
	 * 在位置处插入文本。含有行终止符的文本按行拆分，每个终止符都通过 insertNewline 处理，
	 * 行内永远不含终止符。
	 */
	insert(at: Position, ch: string): void {
		if (isLineTerminator(ch)) {
			this.insertNewline(at);
			return;
		}
		if (!isRowIndex(at.y) || at.y > this.rows.length || ch.length === 0) {
			return;
		}

		const [first = "", ...rest] = ch.split(/\r\n|\r|\n/);
		let position = this.insertIntoRow(at, first);
		for (const line of rest) {
			this.insertNewline(position);
			position = this.insertIntoRow({ x: 0, y: position.y + 1 }, line);
		}
	}

	/** 在一行内插入不含终止符的文本，返回插入内容之后的位置 */
	private insertIntoRow(at: Position, text: string): Position {
		const row = this.rows[at.y];
		const column = row ? Math.max(0, Math.min(at.x, row.length)) : 0;
		if (text.length === 0) {
			return { x: column, y: at.y };
		}

		if (!row) {
			const appended = new Row();
			appended.insert(0, text);
			appended.highlight(this.fileType.highlightOptions);
			this.rows.push(appended);
			this.dirty = true;
			return { x: appended.length, y: at.y };
		}

		const before = row.length;
		row.insert(column, text);
		row.highlight(this.fileType.highlightOptions);
		this.dirty = true;
		return { x: column + row.length - before, y: at.y };
	}

	/**
	 * 在位置处换行：位于末尾之后一行时追加空行，否则在 x 处拆分该行。
	 */
	insertNewline(at: Position): void {
		if (!isRowIndex(at.y) || at.y > this.rows.length) {
			return;
		}

		if (at.y === this.rows.length) {
			this.rows.push(new Row());
		} else {
			const current = this.rows[at.y];
			const next = current.split(at.x);
			current.highlight(this.fileType.highlightOptions);
			next.highlight(this.fileType.highlightOptions);
			this.rows.splice(at.y + 1, 0, next);
		}
		this.dirty = true;
	}

	/**
	 * 删除位置处的字形。位于非末行的行尾时，将下一行合并到当前行。
	 */
	delete(at: Position): void {
		if (!isRowIndex(at.y) || at.y >= this.rows.length) {
			return;
		}

		const row = this.rows[at.y];
		if (at.x === row.length && at.y + 1 < this.rows.length) {
			const [next] = this.rows.splice(at.y + 1, 1);
			row.append(next);
			row.highlight(this.fileType.highlightOptions);
			this.dirty = true;
			return;
		}

		const before = row.length;
		row.delete(at.x);
		if (row.length !== before) {
			row.highlight(this.fileType.highlightOptions);
			this.dirty = true;
		}
	}

	/**
	 * 从 from 开始查找 query，到达文档边界即停止，不回绕。
	 */
	find(query: string, from: Position, direction: SearchDirection): Position | undefined {
		if (query.length === 0 || this.rows.length === 0 || !isRowIndex(from.y)) {
			return undefined;
		}

		if (direction === "forward") {
			for (let y = from.y; y < this.rows.length; y++) {
				const x = this.rows[y].find(query, y === from.y ? from.x : 0, "forward");
				if (x !== undefined) {
					return { x, y };
				}
			}
			return undefined;
		}

		const startY = Math.min(from.y, this.rows.length - 1);
		for (let y = startY; y >= 0; y--) {
			const row = this.rows[y];
			const x = row.find(query, y === from.y ? from.x : row.length, "backward");
			if (x !== undefined) {
				return { x, y };
			}
		}
		return undefined;
	}

	/**
	 * 重新高亮所有行，word 的每次出现都会标记为 "match"。
	 */
	highlight(word?: string): void {
		for (const row of this.rows) {
			row.highlight(this.fileType.highlightOptions, word);
		}
	}
}
