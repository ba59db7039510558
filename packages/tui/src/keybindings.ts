import { type KeyId, matchesKey } from "./keys.js";

/**
 * 可绑定到按键的编辑器操作。
 */
export type EditorAction =
	// 光标移动（两种模式）
	| "cursorUp"
	| "cursorDown"
	| "cursorLeft"
	| "cursorRight"
	| "cursorLineStart"
	| "cursorLineEnd"
	| "pageUp"
	| "pageDown"
	// 查看模式下的移动
	| "viewUp"
	| "viewDown"
	| "viewLeft"
	| "viewRight"
	// 模式切换
	| "enterInsertMode"
	| "exitInsertMode"
	// 删除
	| "deleteCharBackward"
	| "deleteCharForward"
	// 文本输入
	| "newLine"
	| "tab"
	// 命令
	| "save"
	| "quit"
	| "search"
	| "openFile"
	| "nextDocument"
	// 提示输入
	| "confirm"
	| "cancel";

export const EDITOR_ACTIONS: readonly EditorAction[] = [
	"cursorUp",
	"cursorDown",
	"cursorLeft",
	"cursorRight",
	"cursorLineStart",
	"cursorLineEnd",
	"pageUp",
	"pageDown",
	"viewUp",
	"viewDown",
	"viewLeft",
	"viewRight",
	"enterInsertMode",
	"exitInsertMode",
	"deleteCharBackward",
	"deleteCharForward",
	"newLine",
	"tab",
	"save",
	"quit",
	"search",
	"openFile",
	"nextDocument",
	"confirm",
	"cancel",
];

export function isEditorAction(value: string): value is EditorAction {
	return (EDITOR_ACTIONS as readonly string[]).includes(value);
}

export type { KeyId };

/**
 * 编辑器按键绑定配置。
 */
export type EditorKeybindingsConfig = {
	[K in EditorAction]?: KeyId | KeyId[];
};

/**
 * 默认编辑器按键绑定。
 */
export const DEFAULT_EDITOR_KEYBINDINGS: Required<EditorKeybindingsConfig> = {
	// 光标移动
	cursorUp: "up",
	cursorDown: "down",
	cursorLeft: "left",
	cursorRight: "right",
	cursorLineStart: "home",
	cursorLineEnd: "end",
	pageUp: "pageUp",
	pageDown: "pageDown",
	// 查看模式
	viewUp: "k",
	viewDown: "j",
	viewLeft: "h",
	viewRight: "l",
	// 模式切换
	enterInsertMode: "i",
	exitInsertMode: "escape",
	// 删除
	deleteCharBackward: "backspace",
	deleteCharForward: "delete",
	// 文本输入
	newLine: "enter",
	tab: "tab",
	// 命令
	save: "ctrl+s",
	quit: "ctrl+q",
	search: "ctrl+f",
	openFile: "ctrl+n",
	nextDocument: "ctrl+t",
	// 提示输入
	confirm: "enter",
	cancel: ["escape", "ctrl+c"],
};

function toKeyArray(keys: KeyId | KeyId[]): KeyId[] {
	return Array.isArray(keys) ? [...keys] : [keys];
}

/**
 * 管理编辑器的按键绑定。
 */
export class EditorKeybindingsManager {
	private actionToKeys = new Map<EditorAction, KeyId[]>();

	constructor(config: EditorKeybindingsConfig = {}) {
		this.buildMaps(config);
	}

	private buildMaps(config: EditorKeybindingsConfig): void {
		this.actionToKeys.clear();

		// 用户配置覆盖默认值
		for (const action of EDITOR_ACTIONS) {
			const keys = config[action] ?? DEFAULT_EDITOR_KEYBINDINGS[action];
			this.actionToKeys.set(action, toKeyArray(keys));
		}
	}

	/**
	 * 检查输入是否匹配特定操作。
	 */
	matches(data: string, action: EditorAction): boolean {
		const keys = this.actionToKeys.get(action);
		if (!keys) return false;
		return keys.some((key) => matchesKey(data, key));
	}

	/**
	 * 获取绑定到操作的按键。
	 */
	getKeys(action: EditorAction): KeyId[] {
		return this.actionToKeys.get(action) ?? [];
	}

	/**
	 * 更新配置。
	 */
	setConfig(config: EditorKeybindingsConfig): void {
		this.buildMaps(config);
	}
}
