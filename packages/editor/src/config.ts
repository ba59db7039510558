import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { dirname, join } from "path";
import { fileURLToPath } from "url";

// =============================================================================
// 包检测
// =============================================================================

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

interface PackageInfo {
	dir: string;
	version: string;
	name?: string;
	configDir?: string;
}

function readPackageInfo(dir: string): PackageInfo | undefined {
	const path = join(dir, "package.json");
	if (!existsSync(path)) {
		return undefined;
	}
	const data: unknown = JSON.parse(readFileSync(path, "utf-8"));
	if (typeof data !== "object" || data === null) {
		return undefined;
	}
	const version = "version" in data && typeof data.version === "string" ? data.version : "0.0.0";
	const config = "xedConfig" in data && typeof data.xedConfig === "object" ? data.xedConfig : null;
	if (config === null) {
		return { dir, version };
	}
	return {
		dir,
		version,
		name: "name" in config && typeof config.name === "string" ? config.name : undefined,
		configDir: "configDir" in config && typeof config.configDir === "string" ? config.configDir : undefined,
	};
}

/**
 * 从 __dirname 向上查找 package.json。
 * - 对于 tsx (src/)：返回 packages/editor
 * - 对于 Node.js (dist/)：没有带 xedConfig 的 package.json 时，使用找到的第一个
 */
function findPackage(): PackageInfo | undefined {
	let first: PackageInfo | undefined;
	let dir = __dirname;
	while (dir !== dirname(dir)) {
		const info = readPackageInfo(dir);
		if (info?.name !== undefined) {
			return info;
		}
		first ??= info;
		dir = dirname(dir);
	}
	return first;
}

const pkg = findPackage();

/** 获取包目录（包含 package.json 的目录） */
export function getPackageDir(): string {
	return pkg?.dir ?? __dirname;
}

// =============================================================================
// 应用配置（来自 package.json xedConfig）
// =============================================================================

export const APP_NAME: string = pkg?.name || "xed";
export const CONFIG_DIR_NAME: string = pkg?.configDir || ".xed";
export const VERSION: string = pkg?.version ?? "0.0.0";

// 例如：XED_DIR
export const ENV_CONFIG_DIR = `${APP_NAME.toUpperCase()}_DIR`;
export const ENV_DEBUG_LOG = `${APP_NAME.toUpperCase()}_DEBUG_LOG`;

// =============================================================================
// 用户配置路径 (~/.xed/*)
// =============================================================================

/** 获取配置目录（例如：~/.xed/） */
export function getConfigDir(): string {
	const envDir = process.env[ENV_CONFIG_DIR];
	if (envDir) {
		// 将波浪号扩展为主目录
		if (envDir === "~") return homedir();
		if (envDir.startsWith("~/")) return homedir() + envDir.slice(1);
		return envDir;
	}
	return join(homedir(), CONFIG_DIR_NAME);
}

/** 获取 settings.json 的路径 */
export function getSettingsPath(): string {
	return join(getConfigDir(), "settings.json");
}

/** 获取用户 filetypes.json 的路径 */
export function getFileTypesPath(): string {
	return join(getConfigDir(), "filetypes.json");
}

/** 获取调试日志文件的路径（未设置 XED_DEBUG_LOG 时为 undefined） */
export function getDebugLogPath(): string | undefined {
	return process.env[ENV_DEBUG_LOG] || undefined;
}
