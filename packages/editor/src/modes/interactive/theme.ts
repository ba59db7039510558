import { type HighlightType, parseHighlightMarkers } from "@xed/buffer";
import chalk, { type ChalkInstance } from "chalk";
import type { StatusBarSettings, ThemeSettings } from "../../core/settings-manager.js";

type ColoredHighlightType = Exclude<HighlightType, "none">;

export const DEFAULT_THEME_COLORS: Readonly<Record<ColoredHighlightType, string>> = {
	number: "#DCA3A3",
	match: "#268BD2",
	string: "#D33682",
	character: "#6C71C4",
	comment: "#859900",
	primaryKeyword: "#B58900",
	secondaryKeyword: "#2AA198",
};

export const DEFAULT_STATUS_BAR_COLORS: Readonly<Required<StatusBarSettings>> = {
	foreground: "#3F3F3F",
	background: "#FFFFFF",
};

/**
 * 将高亮标记转换为终端颜色。
 * "none" 使用终端默认前景色，除非设置中指定了颜色。
 */
export class Theme {
	private readonly colors: ThemeSettings;
	private readonly statusBarColors: Required<StatusBarSettings>;
	private readonly chalk: ChalkInstance;

	constructor(colors: ThemeSettings = {}, statusBar: StatusBarSettings = {}, chalkInstance: ChalkInstance = chalk) {
		this.colors = { ...DEFAULT_THEME_COLORS, ...colors };
		this.statusBarColors = { ...DEFAULT_STATUS_BAR_COLORS, ...statusBar };
		this.chalk = chalkInstance;
	}

	getColor(type: HighlightType): string | undefined {
		return this.colors[type];
	}

	highlight(type: HighlightType, text: string): string {
		const color = this.colors[type];
		return color ? this.chalk.hex(color)(text) : text;
	}

	/** 为 Row.render 的输出着色 */
	renderRow(rendered: string): string {
		return parseHighlightMarkers(rendered)
			.map((segment) => this.highlight(segment.type, segment.text))
			.join("");
	}

	statusBar(text: string): string {
		return this.chalk.bgHex(this.statusBarColors.background).hex(this.statusBarColors.foreground)(text);
	}
}
