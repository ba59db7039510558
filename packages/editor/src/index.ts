// 配置
export { APP_NAME, CONFIG_DIR_NAME, getConfigDir, getFileTypesPath, getSettingsPath, VERSION } from "./config.js";
// 调试日志
export { DebugLog } from "./core/debug-log.js";
// 文件类型
export { type FileTypeRegistryResult, loadFileTypes } from "./core/filetype-registry.js";
// 设置
export {
	type EditorMode,
	type Settings,
	SettingsManager,
	SettingsSchema,
	type StatusBarSettings,
	type ThemeSettings,
} from "./core/settings-manager.js";
// 主入口
export { main } from "./main.js";
// 编辑器
export { Editor, type EditorOptions, openDocument } from "./modes/interactive/editor.js";
export { DEFAULT_STATUS_BAR_COLORS, DEFAULT_THEME_COLORS, Theme } from "./modes/interactive/theme.js";
