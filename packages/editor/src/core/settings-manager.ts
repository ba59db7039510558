import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { type Static, Type } from "@sinclair/typebox";
import { compileSchema, formatValidationErrors } from "@xed/buffer";
import { type EditorKeybindingsConfig, isEditorAction } from "@xed/tui";
import { CONFIG_DIR_NAME, getConfigDir } from "../config.js";

const HexColorSchema = Type.String({ pattern: "^#[0-9a-fA-F]{6}$" });

// 每种高亮分类的前景色
const ThemeSettingsSchema = Type.Object({
	none: Type.Optional(HexColorSchema),
	number: Type.Optional(HexColorSchema),
	match: Type.Optional(HexColorSchema),
	string: Type.Optional(HexColorSchema),
	character: Type.Optional(HexColorSchema),
	comment: Type.Optional(HexColorSchema),
	primaryKeyword: Type.Optional(HexColorSchema),
	secondaryKeyword: Type.Optional(HexColorSchema),
});

const StatusBarSettingsSchema = Type.Object({
	foreground: Type.Optional(HexColorSchema),
	background: Type.Optional(HexColorSchema),
});

export const SettingsSchema = Type.Object({
	startMode: Type.Optional(Type.Union([Type.Literal("view"), Type.Literal("insert")])),
	statusMessageTimeoutMs: Type.Optional(Type.Integer({ minimum: 0 })), // 默认：5000
	theme: Type.Optional(ThemeSettingsSchema),
	statusBar: Type.Optional(StatusBarSettingsSchema),
	keybindings: Type.Optional(Type.Record(Type.String(), Type.Union([Type.String(), Type.Array(Type.String())]))),
});

export type Settings = Static<typeof SettingsSchema>;
export type ThemeSettings = Static<typeof ThemeSettingsSchema>;
export type StatusBarSettings = Static<typeof StatusBarSettingsSchema>;
export type EditorMode = "view" | "insert";

export const DEFAULT_STATUS_MESSAGE_TIMEOUT_MS = 5000;

const validateSettings = compileSchema(SettingsSchema);

function mergeNested<T extends object>(base: T | undefined, override: T | undefined): T | undefined {
	if (base === undefined) return override;
	if (override === undefined) return base;
	return { ...base, ...override };
}

/** 深度合并设置：项目/覆盖优先，嵌套对象按键合并 */
function deepMergeSettings(base: Settings, overrides: Settings): Settings {
	return {
		...base,
		...overrides,
		startMode: overrides.startMode ?? base.startMode,
		statusMessageTimeoutMs: overrides.statusMessageTimeoutMs ?? base.statusMessageTimeoutMs,
		theme: mergeNested(base.theme, overrides.theme),
		statusBar: mergeNested(base.statusBar, overrides.statusBar),
		keybindings: mergeNested(base.keybindings, overrides.keybindings),
	};
}

/**
 * 读取并验证设置文件。文件不存在时返回空设置，JSON 或 schema 错误时抛出。
 */
function loadFromFile(path: string): Settings {
	if (!existsSync(path)) {
		return {};
	}
	const data: unknown = JSON.parse(readFileSync(path, "utf-8"));
	if (!validateSettings(data)) {
		throw new Error(`Invalid settings:\n  - ${formatValidationErrors(validateSettings).join("\n  - ")}`);
	}
	return data;
}

/**
 * 全局设置 (~/.xed/settings.json) 与项目设置 (.xed/settings.json) 的合并视图。
 * 无效的文件被忽略，错误通过 getLoadErrors() 报告。
 */
export class SettingsManager {
	private settingsPath: string | null;
	private projectSettingsPath: string | null;
	private globalSettings: Settings;
	private projectSettings: Settings;
	private settings: Settings;
	private overrides: Settings = {};
	private loadErrors: string[] = [];

	private constructor(
		settingsPath: string | null,
		projectSettingsPath: string | null,
		globalSettings: Settings,
		projectSettings: Settings,
	) {
		this.settingsPath = settingsPath;
		this.projectSettingsPath = projectSettingsPath;
		this.globalSettings = globalSettings;
		this.projectSettings = projectSettings;
		this.settings = deepMergeSettings(globalSettings, projectSettings);
	}

	/** 创建从文件加载的 SettingsManager */
	static create(cwd: string = process.cwd(), configDir: string = getConfigDir()): SettingsManager {
		const manager = new SettingsManager(
			join(configDir, "settings.json"),
			join(cwd, CONFIG_DIR_NAME, "settings.json"),
			{},
			{},
		);
		manager.reload();
		return manager;
	}

	/** 创建内存中的 SettingsManager（无文件 I/O） */
	static inMemory(settings: Settings = {}): SettingsManager {
		return new SettingsManager(null, null, structuredClone(settings), {});
	}

	/** 重新读取设置文件，之前应用的覆盖保持有效 */
	reload(): void {
		this.loadErrors = [];
		if (this.settingsPath) {
			this.globalSettings = this.tryLoad(this.settingsPath);
		}
		if (this.projectSettingsPath) {
			this.projectSettings = this.tryLoad(this.projectSettingsPath);
		}
		this.settings = deepMergeSettings(deepMergeSettings(this.globalSettings, this.projectSettings), this.overrides);
	}

	private tryLoad(path: string): Settings {
		try {
			return loadFromFile(path);
		} catch (error) {
			this.loadErrors.push(`${path}: ${error instanceof Error ? error.message : String(error)}`);
			return {};
		}
	}

	/** 在当前设置之上应用额外的覆盖（例如命令行标志） */
	applyOverrides(overrides: Settings): void {
		this.overrides = deepMergeSettings(this.overrides, overrides);
		this.settings = deepMergeSettings(this.settings, overrides);
	}

	getLoadErrors(): string[] {
		return [...this.loadErrors];
	}

	getGlobalSettings(): Settings {
		return structuredClone(this.globalSettings);
	}

	getProjectSettings(): Settings {
		return structuredClone(this.projectSettings);
	}

	getStartMode(): EditorMode {
		return this.settings.startMode ?? "view";
	}

	getStatusMessageTimeoutMs(): number {
		return this.settings.statusMessageTimeoutMs ?? DEFAULT_STATUS_MESSAGE_TIMEOUT_MS;
	}

	getThemeColors(): ThemeSettings {
		return { ...this.settings.theme };
	}

	getStatusBarColors(): StatusBarSettings {
		return { ...this.settings.statusBar };
	}

	/** 用户按键绑定，忽略未知的操作名 */
	getKeybindings(): EditorKeybindingsConfig {
		const config: EditorKeybindingsConfig = {};
		for (const [action, keys] of Object.entries(this.settings.keybindings ?? {})) {
			if (isEditorAction(action)) {
				config[action] = keys;
			}
		}
		return config;
	}
}
