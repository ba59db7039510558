// 终端输入输出基础设施

// 按键绑定
export {
	DEFAULT_EDITOR_KEYBINDINGS,
	EDITOR_ACTIONS,
	type EditorAction,
	type EditorKeybindingsConfig,
	EditorKeybindingsManager,
	isEditorAction,
} from "./keybindings.js";
// 键盘输入处理
export { isPrintable, Key, type KeyId, matchesKey, parseKey } from "./keys.js";
// 用于批处理拆分的输入缓冲
export {
	extractCompleteSequences,
	StdinBuffer,
	type StdinBufferEventMap,
	type StdinBufferOptions,
} from "./stdin-buffer.js";
// 终端接口和实现
export { cursorPosition, ProcessTerminal, type Terminal } from "./terminal.js";
// 工具函数
export { extractAnsiCode, stripAnsi, truncateToWidth, visibleWidth } from "./utils.js";
