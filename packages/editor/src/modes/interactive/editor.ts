import { Document, type FileTypeDefinition, type Position, type SearchDirection, splitGraphemes } from "@xed/buffer";
import {
	type EditorAction,
	EditorKeybindingsManager,
	isPrintable,
	type Terminal,
	truncateToWidth,
	visibleWidth,
} from "@xed/tui";
import { APP_NAME, VERSION } from "../../config.js";
import { DebugLog } from "../../core/debug-log.js";
import { DEFAULT_STATUS_MESSAGE_TIMEOUT_MS, type EditorMode } from "../../core/settings-manager.js";
import { Theme } from "./theme.js";

const BRACKETED_PASTE_START = "\x1b[200~";
const BRACKETED_PASTE_END = "\x1b[201~";

type CursorMove = "up" | "down" | "left" | "right" | "pageUp" | "pageDown" | "home" | "end";

// 两种模式下都可用的光标操作
const CURSOR_ACTIONS: ReadonlyArray<[EditorAction, CursorMove]> = [
	["cursorUp", "up"],
	["cursorDown", "down"],
	["cursorLeft", "left"],
	["cursorRight", "right"],
	["pageUp", "pageUp"],
	["pageDown", "pageDown"],
	["cursorLineStart", "home"],
	["cursorLineEnd", "end"],
];

// 查看模式下的 h/j/k/l
const VIEW_ACTIONS: ReadonlyArray<[EditorAction, CursorMove]> = [
	["viewUp", "up"],
	["viewDown", "down"],
	["viewLeft", "left"],
	["viewRight", "right"],
];

/** 一个打开的文档及其光标和滚动位置 */
interface OpenDocument {
	document: Document;
	cursor: Position;
	offset: Position;
}

interface StatusMessage {
	text: string;
	time: number;
}

interface PromptState {
	label: string;
	input: string;
	/** 每次按键（确认和取消除外）之后调用 */
	onKey?: (data: string, input: string) => void;
	/** 确认时传入输入内容，取消或输入为空时传入 undefined */
	onDone: (value: string | undefined) => void;
}

export interface EditorOptions {
	/** 打开的文档，第一个为当前文档（默认：一个空文档） */
	documents?: Document[];
	/** 通过 Ctrl-N 打开文件时使用的文件类型定义 */
	fileTypes?: readonly FileTypeDefinition[];
	startMode?: EditorMode;
	statusMessageTimeoutMs?: number;
	theme?: Theme;
	keybindings?: EditorKeybindingsManager;
	/** 启动时消息栏中的文本（默认：按键提示） */
	initialStatus?: string;
	/** 时钟，返回毫秒 */
	now?: () => number;
	debugLog?: DebugLog;
}

function isNotFoundError(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** 字形在屏幕上占的列数，制表符与 Row.render 一样显示为一个空格 */
function columnWidth(graphemes: readonly string[]): number {
	return visibleWidth(graphemes.join("").replace(/\t/g, " "));
}

/**
 * 打开文件；文件不存在时返回带该文件名的空文档。其他读取错误会抛出。
 */
export function openDocument(path: string, fileTypes?: readonly FileTypeDefinition[]): Document {
	try {
		return Document.open(path, { fileTypes });
	} catch (error) {
		if (isNotFoundError(error)) {
			return new Document(path, [], { fileTypes });
		}
		throw error;
	}
}

/**
 * 模态文本编辑器：查看模式（类似 vim 的普通模式）和插入模式。
 *
 * 屏幕布局：文本区域占 rows - 2 行，随后是状态栏和消息栏。
 * 提示输入（另存为、退出确认、搜索、打开文件）在消息栏中进行，
 * 期间所有输入都交给提示处理。
 */
export class Editor {
	private readonly terminal: Terminal;
	private readonly documents: OpenDocument[];
	private current = 0;
	private mode: EditorMode;
	private statusMessage: StatusMessage;
	private prompt: PromptState | undefined;
	private quitRequested = false;
	private readonly fileTypes: readonly FileTypeDefinition[] | undefined;
	private readonly statusMessageTimeoutMs: number;
	private readonly theme: Theme;
	private readonly keybindings: EditorKeybindingsManager;
	private readonly now: () => number;
	private readonly debugLog: DebugLog;
	private running = false;
	private messageTimer: ReturnType<typeof setTimeout> | undefined;
	private resolveExit: (() => void) | undefined;

	constructor(terminal: Terminal, options: EditorOptions = {}) {
		this.terminal = terminal;
		const documents = options.documents && options.documents.length > 0 ? options.documents : [new Document()];
		this.documents = documents.map((document) => ({ document, cursor: { x: 0, y: 0 }, offset: { x: 0, y: 0 } }));
		this.fileTypes = options.fileTypes;
		this.mode = options.startMode ?? "view";
		this.statusMessageTimeoutMs = options.statusMessageTimeoutMs ?? DEFAULT_STATUS_MESSAGE_TIMEOUT_MS;
		this.theme = options.theme ?? new Theme();
		this.keybindings = options.keybindings ?? new EditorKeybindingsManager();
		this.now = options.now ?? Date.now;
		this.debugLog = options.debugLog ?? new DebugLog(undefined);
		this.statusMessage = { text: options.initialStatus ?? this.defaultStatus(), time: this.now() };
	}

	// =========================================================================
	// 生命周期
	// =========================================================================

	/**
	 * 接管终端直到用户退出。
	 */
	run(): Promise<void> {
		return new Promise((resolve) => {
			this.resolveExit = resolve;
			this.running = true;
			this.terminal.start(
				(data) => this.handleInput(data),
				() => this.render(),
			);
			this.terminal.setTitle(`${APP_NAME} - ${this.displayName(this.openDocument.document)}`);
			this.setStatus(this.statusMessage.text);
			this.render();
		});
	}

	private exit(): void {
		if (this.messageTimer) {
			clearTimeout(this.messageTimer);
			this.messageTimer = undefined;
		}
		if (!this.running) return;
		this.running = false;
		this.terminal.stop();
		this.terminal.write("see you later.\r\n");
		const resolve = this.resolveExit;
		this.resolveExit = undefined;
		resolve?.();
	}

	// =========================================================================
	// 状态访问
	// =========================================================================

	getMode(): EditorMode {
		return this.mode;
	}

	getDocument(): Document {
		return this.openDocument.document;
	}

	getDocuments(): Document[] {
		return this.documents.map((open) => open.document);
	}

	getCursor(): Position {
		return { ...this.openDocument.cursor };
	}

	getOffset(): Position {
		return { ...this.openDocument.offset };
	}

	getStatusMessage(): string {
		return this.statusMessage.text;
	}

	isPromptActive(): boolean {
		return this.prompt !== undefined;
	}

	hasQuit(): boolean {
		return this.quitRequested;
	}

	private get openDocument(): OpenDocument {
		const open = this.documents[this.current];
		if (!open) {
			throw new Error(`No document at index ${this.current}`);
		}
		return open;
	}

	/** 文本区域的高度（去掉状态栏和消息栏） */
	private get textHeight(): number {
		return Math.max(0, this.terminal.rows - 2);
	}

	private setStatus(text: string): void {
		this.statusMessage = { text, time: this.now() };
		if (!this.running) return;

		// 消息过期后重绘一次，清除消息栏
		if (this.messageTimer) {
			clearTimeout(this.messageTimer);
		}
		this.messageTimer = setTimeout(() => {
			this.messageTimer = undefined;
			if (this.running) this.render();
		}, this.statusMessageTimeoutMs);
	}

	private defaultStatus(): string {
		const key = (action: EditorAction) => this.keybindings.getKeys(action)[0] ?? "?";
		return [
			`${key("quit")} quit`,
			`${key("save")} save`,
			`${key("search")} search`,
			`${key("openFile")} open`,
			`${key("nextDocument")} next`,
		].join(" | ");
	}

	// =========================================================================
	// 输入处理
	// =========================================================================

	handleInput(data: string): void {
		if (this.quitRequested) return;

		if (data.startsWith(BRACKETED_PASTE_START) && data.endsWith(BRACKETED_PASTE_END)) {
			this.handlePaste(data.slice(BRACKETED_PASTE_START.length, -BRACKETED_PASTE_END.length));
		} else if (this.prompt) {
			this.handlePromptInput(this.prompt, data);
		} else if (!this.handleCommand(data)) {
			if (this.mode === "view") {
				this.handleViewInput(data);
			} else {
				this.handleInsertInput(data);
			}
		}

		if (this.quitRequested) {
			this.exit();
			return;
		}
		this.scroll();
		if (this.running) this.render();
	}

	/** 两种模式下都可用的命令 */
	private handleCommand(data: string): boolean {
		const kb = this.keybindings;
		if (kb.matches(data, "quit")) {
			this.quit();
		} else if (kb.matches(data, "save")) {
			this.save();
		} else if (kb.matches(data, "search")) {
			this.search();
		} else if (kb.matches(data, "openFile")) {
			this.openFile();
		} else if (kb.matches(data, "nextDocument")) {
			this.nextDocument();
		} else {
			return this.handleCursorKeys(data, CURSOR_ACTIONS);
		}
		return true;
	}

	private handleCursorKeys(data: string, actions: ReadonlyArray<[EditorAction, CursorMove]>): boolean {
		for (const [action, move] of actions) {
			if (this.keybindings.matches(data, action)) {
				this.moveCursor(move);
				return true;
			}
		}
		return false;
	}

	private handleViewInput(data: string): void {
		if (this.keybindings.matches(data, "enterInsertMode")) {
			this.mode = "insert";
			return;
		}
		this.handleCursorKeys(data, VIEW_ACTIONS);
	}

	private handleInsertInput(data: string): void {
		const kb = this.keybindings;
		const document = this.openDocument.document;
		const cursor = this.openDocument.cursor;

		if (kb.matches(data, "exitInsertMode")) {
			this.mode = "view";
		} else if (kb.matches(data, "deleteCharBackward")) {
			if (cursor.x > 0 || cursor.y > 0) {
				this.moveCursor("left");
				document.delete(this.openDocument.cursor);
			}
		} else if (kb.matches(data, "deleteCharForward")) {
			document.delete(cursor);
		} else if (kb.matches(data, "newLine")) {
			this.insertText("\n");
		} else if (kb.matches(data, "tab")) {
			this.insertText("\t");
		} else if (isPrintable(data)) {
			this.insertText(data);
		}
	}

	private handlePaste(content: string): void {
		if (this.prompt) {
			const line = content.replace(/[\r\n]+/g, " ");
			if (isPrintable(line)) {
				this.prompt.input += line;
				this.prompt.onKey?.(line, this.prompt.input);
			}
			return;
		}
		if (this.mode === "insert") {
			this.insertText(content);
		}
	}

	/**
	 * 在光标处逐个码点插入文本，光标随之前进。
	 * 与前一个字形合并的码点（例如组合符号）不会移动光标。
	 */
	private insertText(text: string): void {
		const open = this.openDocument;
		for (const ch of text.replace(/\r\n/g, "\n")) {
			const { x, y } = open.cursor;
			if (ch === "\n" || ch === "\r") {
				open.document.insertNewline(open.cursor);
				open.cursor = { x: 0, y: y + 1 };
				continue;
			}
			if (ch !== "\t" && !isPrintable(ch)) {
				continue;
			}
			const before = open.document.row(y)?.length ?? 0;
			open.document.insert(open.cursor, ch);
			const after = open.document.row(y)?.length ?? 0;
			open.cursor = { x: x + Math.max(0, after - before), y };
		}
	}

	// =========================================================================
	// 提示输入
	// =========================================================================

	private startPrompt(label: string, onDone: PromptState["onDone"], onKey?: PromptState["onKey"]): void {
		this.prompt = { label, input: "", onDone, onKey };
	}

	private handlePromptInput(prompt: PromptState, data: string): void {
		const kb = this.keybindings;
		if (kb.matches(data, "confirm")) {
			this.finishPrompt(prompt, prompt.input);
			return;
		}
		if (kb.matches(data, "cancel")) {
			this.finishPrompt(prompt, "");
			return;
		}

		if (kb.matches(data, "deleteCharBackward")) {
			prompt.input = splitGraphemes(prompt.input).slice(0, -1).join("");
		} else if (isPrintable(data)) {
			prompt.input += data;
		}
		prompt.onKey?.(data, prompt.input);
	}

	private finishPrompt(prompt: PromptState, input: string): void {
		this.prompt = undefined;
		this.setStatus("");
		prompt.onDone(input.length > 0 ? input : undefined);
	}

	// =========================================================================
	// 命令
	// =========================================================================

	private save(): void {
		const document = this.openDocument.document;
		if (document.fileName === undefined) {
			this.startPrompt("save as: ", (name) => {
				if (name === undefined) {
					this.setStatus("save stopped");
					return;
				}
				document.setFileName(name);
				this.writeDocument(document);
			});
			return;
		}
		this.writeDocument(document);
	}

	private writeDocument(document: Document): void {
		try {
			document.save();
			this.setStatus("file saved");
			this.debugLog.log(`saved ${document.fileName ?? ""} as ${document.getFileTypeName()}`);
		} catch (error) {
			this.setStatus("error writing file");
			this.debugLog.log(`save failed: ${error instanceof Error ? error.message : String(error)}`);
		}
	}

	/** 有未保存的修改时先确认 */
	private quit(): void {
		if (!this.documents.some((open) => open.document.isDirty())) {
			this.quitRequested = true;
			return;
		}
		this.startPrompt("exit without saving? (yes/no)", (answer) => {
			if (answer === "yes" || answer === "y") {
				this.quitRequested = true;
			}
		});
	}

	/**
	 * 增量搜索：每次按键都从光标处重新查找并高亮查询。
	 * 右/下方向键跳到下一个匹配，左/上方向键跳到上一个匹配。取消时恢复光标。
	 */
	private search(): void {
		const open = this.openDocument;
		const savedCursor = { ...open.cursor };
		const kb = this.keybindings;

		this.startPrompt(
			"search: ",
			(query) => {
				if (query === undefined) {
					open.cursor = savedCursor;
					this.scroll();
				}
				open.document.highlight();
			},
			(data, query) => {
				let direction: SearchDirection = "forward";
				let moved = false;
				if (kb.matches(data, "cursorRight") || kb.matches(data, "cursorDown")) {
					this.moveCursor("right");
					moved = true;
				} else if (kb.matches(data, "cursorLeft") || kb.matches(data, "cursorUp")) {
					direction = "backward";
				}

				const position = open.document.find(query, open.cursor, direction);
				if (position) {
					open.cursor = position;
					this.scroll();
				} else if (moved) {
					this.moveCursor("left");
				}
				open.document.highlight(query);
			},
		);
	}

	private openFile(): void {
		this.startPrompt("new filepath: ", (path) => {
			if (path === undefined) return;
			let document: Document;
			try {
				document = openDocument(path, this.fileTypes);
			} catch (error) {
				this.setStatus(`error: could not open file '${path}'`);
				this.debugLog.log(`open failed: ${error instanceof Error ? error.message : String(error)}`);
				return;
			}
			this.documents.push({ document, cursor: { x: 0, y: 0 }, offset: { x: 0, y: 0 } });
			this.current = this.documents.length - 1;
			this.setStatus(document.isEmpty() ? `new file: ${path}` : `opened ${path}`);
		});
	}

	private nextDocument(): void {
		if (this.documents.length < 2) return;
		this.current = (this.current + 1) % this.documents.length;
		this.setStatus(`switched to ${this.displayName(this.openDocument.document)}`);
	}

	// =========================================================================
	// 光标与滚动
	// =========================================================================

	private moveCursor(move: CursorMove): void {
		const open = this.openDocument;
		const document = open.document;
		const terminalHeight = this.textHeight;
		const height = document.rowCount;
		const rowLength = (y: number) => document.row(y)?.length ?? 0;
		let { x, y } = open.cursor;

		switch (move) {
			case "up":
				y = Math.max(0, y - 1);
				break;
			case "down":
				if (y < height) y++;
				break;
			case "left":
				if (x > 0) {
					x--;
				} else if (y > 0) {
					y--;
					x = rowLength(y);
				}
				break;
			case "right":
				if (x < rowLength(y)) {
					x++;
				} else if (y < height) {
					y++;
					x = 0;
				}
				break;
			case "pageUp":
				y = y > terminalHeight ? y - terminalHeight : 0;
				break;
			case "pageDown":
				y = y + terminalHeight < height ? y + terminalHeight : height;
				break;
			case "home":
				x = 0;
				break;
			case "end":
				x = rowLength(y);
				break;
		}

		open.cursor = { x: Math.min(x, rowLength(y)), y };
	}

	/** 调整偏移量，使光标保持在屏幕内 */
	private scroll(): void {
		const { cursor, offset } = this.openDocument;
		const width = this.terminal.columns;
		const height = this.textHeight;

		if (cursor.y < offset.y) {
			offset.y = cursor.y;
		} else if (cursor.y >= offset.y + height) {
			offset.y = Math.max(0, cursor.y - height + 1);
		}

		// 水平方向按显示宽度计算，宽字符占两列
		if (cursor.x < offset.x) {
			offset.x = cursor.x;
		} else {
			const graphemes = splitGraphemes(this.openDocument.document.row(cursor.y)?.getText() ?? "");
			while (offset.x < cursor.x && columnWidth(graphemes.slice(offset.x, cursor.x)) >= width) {
				offset.x++;
			}
		}
	}

	// =========================================================================
	// 渲染
	// =========================================================================

	/**
	 * 渲染整个屏幕：文本区域、状态栏、消息栏。
	 */
	renderLines(): string[] {
		const lines: string[] = [];
		const { document, offset } = this.openDocument;
		const width = this.terminal.columns;
		const height = this.textHeight;

		for (let terminalRow = 0; terminalRow < height; terminalRow++) {
			const row = document.row(offset.y + terminalRow);
			if (row) {
				const rendered = this.theme.renderRow(row.render(offset.x, offset.x + width));
				lines.push(truncateToWidth(rendered, width, ""));
			} else if (document.isEmpty() && terminalRow === Math.floor(height / 3)) {
				lines.push(this.welcomeMessage(width));
			} else {
				lines.push("~");
			}
		}

		lines.push(this.statusBar(width));
		lines.push(this.messageBar(width));
		return lines;
	}

	private render(): void {
		const lines = this.renderLines();
		this.terminal.hideCursor();
		this.terminal.moveTo(0, 0);
		this.terminal.write(lines.map((line) => `${line}\x1b[K`).join("\r\n"));
		const { column, row } = this.cursorScreenPosition();
		this.terminal.moveTo(column, row);
		this.terminal.showCursor();
	}

	/** 光标在屏幕上的位置（宽字符占两列） */
	cursorScreenPosition(): { column: number; row: number } {
		const { document, cursor, offset } = this.openDocument;
		const graphemes = splitGraphemes(document.row(cursor.y)?.getText() ?? "");
		return { column: columnWidth(graphemes.slice(offset.x, cursor.x)), row: cursor.y - offset.y };
	}

	private welcomeMessage(width: number): string {
		const message = `${APP_NAME} editor -- version ${VERSION}`;
		const padding = Math.floor(Math.max(0, width - message.length) / 2);
		const spaces = " ".repeat(Math.max(0, padding - 1));
		return truncateToWidth(`~${spaces}${message}`, width, "");
	}

	private displayName(document: Document): string {
		return document.fileName ?? "[no name]";
	}

	private statusBar(width: number): string {
		const document = this.openDocument.document;
		const modified = document.isDirty() ? " (edited)" : "";
		const fileName = document.fileName === undefined ? "[no name]" : [...document.fileName].slice(0, 20).join("");
		const open = this.documents.map((entry) => this.displayName(entry.document)).join(", ");
		const status = `${this.mode} | ${fileName}${modified} | open: ${open}`;
		const lineIndicator = `[${this.openDocument.cursor.y + 1}/${document.rowCount}] [${document.getFileTypeName()}]`;

		const padding = " ".repeat(Math.max(0, width - visibleWidth(status) - visibleWidth(lineIndicator)));
		return this.theme.statusBar(truncateToWidth(`${status}${padding}${lineIndicator}`, width, "", true));
	}

	private messageBar(width: number): string {
		if (this.prompt) {
			return truncateToWidth(`${this.prompt.label}${this.prompt.input}`, width, "");
		}
		if (this.now() - this.statusMessage.time < this.statusMessageTimeoutMs) {
			return truncateToWidth(this.statusMessage.text, width, "");
		}
		return "";
	}
}
